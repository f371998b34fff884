import type { Server } from 'node:http';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { HEALTH_BODY, startHealthServer } from './health';
import { silentLogger } from './logger';

describe('health server', () => {
  let server: Server;
  let base: string;

  beforeAll(async () => {
    server = await startHealthServer(0, silentLogger);
    const address = server.address();
    if (address === null || typeof address === 'string') throw new Error('expected a TCP address');
    base = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  it('answers GET on any path', async () => {
    for (const route of ['/', '/health', '/anything/else']) {
      const res = await fetch(`${base}${route}`);
      expect(res.status).toBe(200);
      expect(res.headers.get('content-type')).toBe('text/plain; charset=utf-8');
      expect(await res.text()).toBe(HEALTH_BODY);
    }
  });

  it('answers HEAD without a body', async () => {
    const res = await fetch(`${base}/`, { method: 'HEAD' });
    expect(res.status).toBe(200);
    expect(await res.text()).toBe('');
  });

  it('does not answer other methods', async () => {
    const res = await fetch(`${base}/`, { method: 'POST' });
    expect(res.status).toBe(404);
    await res.text();
  });
});
