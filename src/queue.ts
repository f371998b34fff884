import { Queue, Worker, type Job } from 'bullmq';
import IORedis from 'ioredis';
import type { Logger } from './logger';
import type { GifJobData, GifJobResult } from './types';

// Create the Redis connection.
// BullMQ workers block on Redis and require maxRetriesPerRequest: null
export function createRedisConnection(redisUrl: string): IORedis {
  return new IORedis(redisUrl, { maxRetriesPerRequest: null });
}

// One job per user message
export function gifJobId(data: Pick<GifJobData, 'chatId' | 'replyToMessageId'>): string {
  return `${data.chatId}-${data.replyToMessageId}`;
}

export interface GifJobQueue {
  enqueue(data: GifJobData): Promise<string>;
}

export class GifQueue implements GifJobQueue {
  private readonly queue: Queue<GifJobData, GifJobResult>;

  constructor(name: string, connection: IORedis) {
    // Create the queue
    this.queue = new Queue<GifJobData, GifJobResult>(name, {
      connection,
      defaultJobOptions: {
        // Failures are reported to the user; never retried behind their back.
        attempts: 1,
        // Keep a short history of finished jobs
        removeOnComplete: { age: 3600, count: 1000 },
        removeOnFail: { age: 24 * 3600, count: 1000 },
      },
    });
  }

  async enqueue(data: GifJobData): Promise<string> {
    // Add the job under its deterministic id
    const jobId = gifJobId(data);
    await this.queue.add('gif', data, { jobId });
    return jobId;
  }

  async close(): Promise<void> {
    await this.queue.close();
  }
}

export type StartGifWorkerOptions = {
  name: string;
  connection: IORedis;
  concurrency: number;
  logger: Logger;
  process: (jobId: string, data: GifJobData) => Promise<GifJobResult>;
};

// Create the worker
export function startGifWorker({ name, connection, concurrency, logger, process }: StartGifWorkerOptions) {
  // Log the number of parallel slots
  logger.info({ concurrency, queue: name }, 'Initializing BullMQ worker');

  const worker = new Worker<GifJobData, GifJobResult>(
    name,
    async (job: Job<GifJobData, GifJobResult>) => {
      // Log the received job
      logger.info({ jobId: job.id, data: job.data }, 'Worker received job');
      // process runs the whole pipeline:
      // 1) Download the user's file
      // 2) Probe it
      // 3) Fit it to the size budget
      // 4) Upload with endpoint fallback
      // 5) Report back in the chat
      return process(job.id ?? gifJobId(job.data), job.data);
    },
    // Up to `concurrency` jobs run in parallel
    { connection, concurrency },
  );

  // Completed event
  worker.on('completed', (job, result) => {
    logger.info({ jobId: job.id, status: result.status }, 'Job completed');
  });
  // Failed event: only reached when process itself throws
  worker.on('failed', (job, err) => {
    logger.error({ jobId: job?.id, err }, 'Job failed');
  });
  // Worker error event (connection and the like)
  worker.on('error', (err) => {
    logger.error({ err }, 'Worker error');
  });

  // Return the worker
  return worker;
}
