import os from 'node:os';
import ffmpegInstaller from '@ffmpeg-installer/ffmpeg';
import ffprobeInstaller from '@ffprobe-installer/ffprobe';
import { z } from 'zod';
import { ConfigMissingError } from './errors';

const MB = 1024 * 1024;

export const ENDPOINT_NAMES = ['catbox', '0x0', 'r2'] as const;
export type EndpointName = (typeof ENDPOINT_NAMES)[number];

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() !== '' ? v.trim() : undefined));

const schema = z.object({
  BOT_TOKEN: z.string({ required_error: 'BOT_TOKEN is required' }).trim().min(1, 'BOT_TOKEN is required'),
  PORT: z.coerce.number().int().min(0).max(65535).default(8080),

  MAX_GIF_SIZE_MB: z.coerce.number().positive('MAX_GIF_SIZE_MB must be greater than 0').finite().default(2.5),
  MAX_INPUT_SIZE_MB: z.coerce.number().positive().finite().default(20),
  SCRATCH_DIR: z.string().min(1).default(os.tmpdir()),

  FFMPEG_PATH: optionalString,
  FFPROBE_PATH: optionalString,
  FFMPEG_TIMEOUT_SECONDS: z.coerce.number().int().positive().default(120),
  LADDER_FILE: optionalString,

  REDIS_URL: z.string().min(1).default('redis://127.0.0.1:6379'),
  QUEUE_NAME: z.string().min(1).default('gif-convert'),
  WORKER_CONCURRENCY: z.coerce.number().int().min(1).max(32).default(2),

  UPLOAD_ENDPOINTS: z
    .string()
    .default('catbox,0x0')
    .transform((v) => v.split(',').map((s) => s.trim().toLowerCase()).filter(Boolean))
    .pipe(z.array(z.enum(ENDPOINT_NAMES)).min(1, 'UPLOAD_ENDPOINTS must name at least one endpoint')),
  UPLOAD_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  CATBOX_URL: z.string().url().default('https://catbox.moe/user/api.php'),
  ZEROX0_URL: z.string().url().default('https://0x0.st'),

  R2_ACCESS_KEY_ID: optionalString,
  R2_SECRET_ACCESS_KEY: optionalString,
  R2_BUCKET: optionalString,
  R2_ENDPOINT: optionalString.pipe(z.string().url().optional()),
  R2_PUBLIC_BASE_URL: optionalString.pipe(z.string().url().optional()),

  GIPHY_API_KEY: optionalString,
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

export type R2Config = {
  accessKeyId: string;
  secretAccessKey: string;
  bucket: string;
  endpoint: string;
  publicBaseUrl: string;
};

export type AppConfig = Readonly<{
  botToken: string;
  port: number;
  budgetBytes: number;
  maxInputBytes: number;
  scratchDir: string;
  ffmpegPath: string;
  ffprobePath: string;
  ffmpegTimeoutSeconds: number;
  ladderFile?: string;
  redisUrl: string;
  queueName: string;
  workerConcurrency: number;
  uploadEndpoints: readonly EndpointName[];
  uploadTimeoutMs: number;
  catboxUrl: string;
  zeroX0Url: string;
  r2?: R2Config;
  giphyApiKey?: string;
  logLevel: string;
}>;

export function loadConfig(source: NodeJS.ProcessEnv): AppConfig {
  const parsed = schema.safeParse(source);
  if (!parsed.success) {
    throw new ConfigMissingError(
      parsed.error.issues.map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`),
    );
  }
  const env = parsed.data;

  let r2: R2Config | undefined;
  if (env.R2_ACCESS_KEY_ID && env.R2_SECRET_ACCESS_KEY && env.R2_BUCKET && env.R2_ENDPOINT && env.R2_PUBLIC_BASE_URL) {
    r2 = {
      accessKeyId: env.R2_ACCESS_KEY_ID,
      secretAccessKey: env.R2_SECRET_ACCESS_KEY,
      bucket: env.R2_BUCKET,
      endpoint: env.R2_ENDPOINT,
      publicBaseUrl: env.R2_PUBLIC_BASE_URL.replace(/\/+$/, ''),
    };
  } else if (env.UPLOAD_ENDPOINTS.includes('r2')) {
    throw new ConfigMissingError([
      'UPLOAD_ENDPOINTS: r2 needs R2_ACCESS_KEY_ID, R2_SECRET_ACCESS_KEY, R2_BUCKET, R2_ENDPOINT and R2_PUBLIC_BASE_URL',
    ]);
  }

  return Object.freeze({
    botToken: env.BOT_TOKEN,
    port: env.PORT,
    budgetBytes: Math.floor(env.MAX_GIF_SIZE_MB * MB),
    maxInputBytes: Math.floor(env.MAX_INPUT_SIZE_MB * MB),
    scratchDir: env.SCRATCH_DIR,
    ffmpegPath: env.FFMPEG_PATH ?? ffmpegInstaller.path,
    ffprobePath: env.FFPROBE_PATH ?? ffprobeInstaller.path,
    ffmpegTimeoutSeconds: env.FFMPEG_TIMEOUT_SECONDS,
    ladderFile: env.LADDER_FILE,
    redisUrl: env.REDIS_URL,
    queueName: env.QUEUE_NAME,
    workerConcurrency: env.WORKER_CONCURRENCY,
    uploadEndpoints: Object.freeze([...new Set(env.UPLOAD_ENDPOINTS)]),
    uploadTimeoutMs: env.UPLOAD_TIMEOUT_MS,
    catboxUrl: env.CATBOX_URL,
    zeroX0Url: env.ZEROX0_URL,
    r2,
    giphyApiKey: env.GIPHY_API_KEY,
    logLevel: env.LOG_LEVEL,
  });
}
