import fs from 'node:fs/promises';
import path from 'node:path';
import type { Logger } from './logger';
import { errorMessage } from './errors';
import { withTempDir, type MediaProber, type Transcoder } from './ffmpeg';
import { clampLadder, type ConversionProfile } from './profiles';
import { fitToBudget } from './sizeFit';
import type { Uploader } from './upload';
import type { GifJobData, GifJobResult, MediaArtifact, MediaFormat, PassthroughReason } from './types';

export type ChatTarget = {
  chatId: number;
  statusMessageId: number;
  replyToMessageId: number;
};

export type Delivery = {
  url: string;
  sizeBytes: number;
  format: MediaFormat;
  withinBudget: boolean;
  passthrough?: PassthroughReason;
};

export interface ChatNotifier {
  status(target: ChatTarget, text: string): Promise<void>;
  delivered(target: ChatTarget, delivery: Delivery): Promise<void>;
  failed(target: ChatTarget, text: string): Promise<void>;
}

export interface MediaSource {
  download(fileId: string, destination: string): Promise<void>;
}

export type GifJobDeps = {
  budgetBytes: number;
  scratchDir: string;
  ladder: ConversionProfile;
  logger: Logger;
  source: MediaSource;
  transcoder: Transcoder;
  prober?: MediaProber;
  uploader: Uploader;
  notifier: ChatNotifier;
};

export const JOB_MESSAGES = {
  converting: 'Converting to optimized GIF...',
  uploading: 'Uploading your GIF...',
  uploadFailed: 'Upload failed - all services down. Try again later.',
  interrupted: 'The bot restarted while working on this file. Please send it again.',
} as const;

const MB = 1024 * 1024;

// A file name safe inside the job directory: basename only, plain characters
export function safeFileName(fileName: string, fallbackStem = 'input'): string {
  const base = path.basename(fileName.replace(/\\/g, '/'));
  // Short alphanumeric extension, or none
  const rawExt = path.extname(base).toLowerCase();
  const ext = /^\.[a-z0-9]{1,5}$/.test(rawExt) ? rawExt : '';
  const stem = base
    .slice(0, base.length - rawExt.length)
    .replace(/[^a-zA-Z0-9_-]+/g, '_')
    .replace(/^_+|_+$/g, '')
    .slice(0, 64);
  return `${stem || fallbackStem}${ext}`;
}

// Handles one GIF job end to end:
// 1) Download the user's file
// 2) Probe it (only to keep the ladder from upscaling)
// 3) Fit it to the size budget
// 4) Upload with endpoint fallback
// 5) Report the result in the chat
// Never throws: every failure becomes a message and a 'failed' result.
export async function handleGifJob(
  jobId: string,
  data: GifJobData,
  deps: GifJobDeps,
  signal?: AbortSignal,
): Promise<GifJobResult> {
  // Job logger: jobId and chatId on every line
  const log = deps.logger.child({ jobId, chatId: data.chatId });
  // Status message to edit, user message to reply to
  const target: ChatTarget = {
    chatId: data.chatId,
    statusMessageId: data.statusMessageId,
    replyToMessageId: data.replyToMessageId,
  };
  // Job start time
  const startTime = Date.now();

  try {
    // Each job gets its own directory, named after the job id
    return await withTempDir(
      async (tmp) => {
        // 1) Download original to temp file
        const downloadStart = Date.now();
        const inputPath = path.join(tmp, safeFileName(data.fileName));
        await deps.source.download(data.fileId, inputPath);
        // Measure the downloaded file
        const input: MediaArtifact = {
          path: inputPath,
          sizeBytes: (await fs.stat(inputPath)).size,
          format: 'source',
        };
        const downloadDuration = Date.now() - downloadStart;
        log.info(
          { phase: 'download', duration: downloadDuration, sizeMB: (input.sizeBytes / MB).toFixed(2) },
          'Download completed',
        );

        await deps.notifier.status(target, JOB_MESSAGES.converting);

        // 2) Probe: the source width caps every rung's width
        let ladder = deps.ladder;
        if (deps.prober) {
          try {
            const info = await deps.prober.probe(inputPath);
            log.info({ info }, 'ffprobe info');
            ladder = clampLadder(ladder, info.width);
          } catch (err) {
            // Probe failure is not fatal; the ladder runs as configured
            log.warn({ err }, 'Probe failed; using ladder as configured');
          }
        }

        // 3) Fit to budget
        const fitStart = Date.now();
        const fit = await fitToBudget(deps.transcoder, input, ladder, {
          budgetBytes: deps.budgetBytes,
          scratchDir: tmp,
          logger: log,
          signal,
        });
        const fitDuration = Date.now() - fitStart;
        log.info(
          {
            phase: 'fit',
            duration: fitDuration,
            profile: fit.profile,
            withinBudget: fit.withinBudget,
            passthrough: fit.passthrough,
            sizeMB: (fit.artifact.sizeBytes / MB).toFixed(2),
            attempts: fit.attempts,
          },
          'Fit completed',
        );

        // 4) Upload
        await deps.notifier.status(target, JOB_MESSAGES.uploading);
        const uploadStart = Date.now();
        const upload = await deps.uploader.upload(fit.artifact);
        const uploadDuration = Date.now() - uploadStart;

        // Fields shared by every result
        const base = {
          sizeBytes: fit.artifact.sizeBytes,
          format: fit.artifact.format,
          profile: fit.profile,
          withinBudget: fit.withinBudget,
          ...(fit.passthrough ? { passthrough: fit.passthrough } : {}),
        };

        // Every endpoint failed: tell the user, no retry
        if (!upload.ok) {
          log.error({ err: upload.error, phase: 'upload', duration: uploadDuration }, 'All upload endpoints failed');
          await deps.notifier.failed(target, JOB_MESSAGES.uploadFailed);
          return { status: 'upload-failed', ...base, error: upload.error.message };
        }

        // 5) Deliver the link
        await deps.notifier.delivered(target, {
          url: upload.value.url,
          sizeBytes: fit.artifact.sizeBytes,
          format: fit.artifact.format,
          withinBudget: fit.withinBudget,
          ...(fit.passthrough ? { passthrough: fit.passthrough } : {}),
        });

        // Performance summary
        log.info(
          {
            phase: 'summary',
            totalDuration: Date.now() - startTime,
            endpoint: upload.value.endpoint,
            breakdown: {
              download: { duration: downloadDuration },
              fit: { duration: fitDuration },
              upload: { duration: uploadDuration },
            },
          },
          'Job completed - Performance summary',
        );

        return { status: 'delivered', ...base, url: upload.value.url, endpoint: upload.value.endpoint };
      },
      { baseDir: deps.scratchDir, prefix: `job-${safeFileName(jobId, 'job')}-`, logger: log },
    );
  } catch (err) {
    // Job boundary: the scratch directory is already gone here
    log.error({ err }, 'GIF job failed');
    const text = signal?.aborted ? JOB_MESSAGES.interrupted : `Error: ${errorMessage(err)}`;
    try {
      await deps.notifier.failed(target, text);
    } catch (notifyErr) {
      log.error({ err: notifyErr }, 'Could not report failure to chat');
    }
    return { status: 'failed', error: errorMessage(err) };
  }
}
