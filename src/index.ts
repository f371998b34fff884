import 'dotenv/config';
import process from 'node:process';
import type { Server } from 'node:http';
import { loadConfig, type AppConfig } from './env';
import { createLogger, type Logger } from './logger';
import { FfmpegTranscoder } from './ffmpeg';
import { handleGifJob } from './gifJob';
import { GiphySearch } from './gifSearch';
import { startHealthServer } from './health';
import { createEndpoint } from './hosting';
import { DEFAULT_LADDER, loadLadderFile } from './profiles';
import { createRedisConnection, GifQueue, startGifWorker } from './queue';
import { createBot, TelegramFileSource, TelegramNotifier } from './telegram';
import { UploadDispatcher } from './upload';

async function start(config: AppConfig, logger: Logger) {
  const ladder = config.ladderFile ? await loadLadderFile(config.ladderFile) : DEFAULT_LADDER;
  logger.info(
    {
      budgetBytes: config.budgetBytes,
      ladder: ladder.map((p) => p.name),
      endpoints: config.uploadEndpoints,
      concurrency: config.workerConcurrency,
      queue: config.queueName,
    },
    'Starting GIF bot',
  );

  const connection = createRedisConnection(config.redisUrl);
  const queue = new GifQueue(config.queueName, connection);
  const transcoder = new FfmpegTranscoder({
    ffmpegPath: config.ffmpegPath,
    ffprobePath: config.ffprobePath,
    timeoutSeconds: config.ffmpegTimeoutSeconds,
    logger,
  });
  if (!(await transcoder.isAvailable())) {
    logger.warn({ ffmpegPath: config.ffmpegPath }, 'ffmpeg unavailable; files will be passed through unconverted');
  }
  const uploader = new UploadDispatcher(
    config.uploadEndpoints.map((name) => createEndpoint(name, config)),
    logger,
  );
  const gifSearch = config.giphyApiKey ? new GiphySearch({ apiKey: config.giphyApiKey, logger }) : undefined;

  const bot = createBot({ token: config.botToken, maxInputBytes: config.maxInputBytes, queue, logger, gifSearch });
  const notifier = new TelegramNotifier(bot.api);
  const source = new TelegramFileSource(bot.api, config.botToken);

  // Aborted on shutdown so running ffmpeg processes die and scratch dirs are removed.
  const inFlight = new AbortController();
  const worker = startGifWorker({
    name: config.queueName,
    connection,
    concurrency: config.workerConcurrency,
    logger,
    process: (jobId, data) =>
      handleGifJob(
        jobId,
        data,
        {
          budgetBytes: config.budgetBytes,
          scratchDir: config.scratchDir,
          ladder,
          logger,
          source,
          transcoder,
          prober: transcoder,
          uploader,
          notifier,
        },
        inFlight.signal,
      ),
  });

  const server: Server = await startHealthServer(config.port, logger);

  const shutdown = async (signal: string) => {
    try {
      logger.info({ signal, pid: process.pid }, 'Shutting down');
      inFlight.abort(new Error(`Received ${signal}`));
      await bot.stop();
      await worker.close();
      await queue.close();
      await connection.quit();
      await new Promise<void>((resolve) => server.close(() => resolve()));
      process.exit(0);
    } catch (err) {
      logger.error({ err }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  await bot.start({
    drop_pending_updates: true,
    onStart: (me) => logger.info({ username: me.username }, 'Bot polling started'),
  });
}

async function main() {
  const config = loadConfig(process.env);
  const logger = createLogger(config.logLevel);
  try {
    await start(config, logger);
  } catch (err) {
    logger.fatal({ err }, 'GIF bot stopped');
    throw err;
  }
}

main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error(err);
  process.exit(1);
});
