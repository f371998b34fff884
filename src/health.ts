import express, { type Express } from 'express';
import type { Server } from 'node:http';
import type { Logger } from './logger';

export const HEALTH_BODY = 'GIF bot is running';

export function createHealthApp(): Express {
  const app = express();
  app.disable('x-powered-by');
  app.use((req, res, next) => {
    if (req.method !== 'GET' && req.method !== 'HEAD') return next();
    res.status(200).type('text/plain').send(HEALTH_BODY);
  });
  return app;
}

export function startHealthServer(port: number, logger: Logger): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = createHealthApp().listen(port, () => {
      logger.info({ port }, 'Health server listening');
      resolve(server);
    });
    server.on('error', reject);
  });
}
