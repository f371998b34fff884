import ffmpeg, { type FfmpegCommand, type FfprobeData } from 'fluent-ffmpeg';
import { execFile } from 'node:child_process';
import path from 'node:path';
import os from 'node:os';
import fs from 'node:fs/promises';
import { promisify } from 'node:util';
import type { Logger } from './logger';
import { ConversionFailedError, ToolUnavailableError, type ConversionError, errorMessage } from './errors';
import type { ConversionProfileEntry } from './profiles';
import type { MediaArtifact, Result } from './types';

const execFileAsync = promisify(execFile);

// Probe info: only what the job reads
export type ProbeInfo = {
  durationSeconds: number;
  width?: number;
  height?: number;
  fps?: number;
};

export type TranscodeOptions = {
  scratchDir: string;
  signal?: AbortSignal;
};

export interface Transcoder {
  transcode(
    input: MediaArtifact,
    profile: ConversionProfileEntry,
    options: TranscodeOptions,
  ): Promise<Result<MediaArtifact, ConversionError>>;
}

export interface MediaProber {
  probe(filePath: string): Promise<ProbeInfo>;
}

// Frame rate and width; height follows the source aspect ratio (-1)
function scaleFilter(profile: ConversionProfileEntry): string {
  return `fps=${profile.fps},scale=${profile.width}:-1:flags=lanczos`;
}

export function singlePassFilter(profile: ConversionProfileEntry): string {
  return scaleFilter(profile);
}

// Two-pass step 1: build the palette
export function paletteGenFilter(profile: ConversionProfileEntry): string {
  // max_colors only when the palette is smaller than the full 256
  const maxColors = profile.maxColors && profile.maxColors < 256 ? `:max_colors=${profile.maxColors}` : '';
  return `${scaleFilter(profile)},palettegen=stats_mode=diff${maxColors}`;
}

// Two-pass step 2: apply the palette.
// Input 0 is the source, input 1 the palette written by paletteGenFilter.
export function paletteUseFilter(profile: ConversionProfileEntry): string {
  let dither = `dither=${profile.dither}`;
  // bayer_scale only applies to bayer dithering
  if (profile.dither === 'bayer' && profile.bayerScale != null) {
    dither += `:bayer_scale=${profile.bayerScale}`;
  }
  return `${scaleFilter(profile)}[x];[x][1:v]paletteuse=${dither}`;
}

// Rung outputs: <stem>-<profile>.gif with its palette beside it
export function outputPaths(input: MediaArtifact, profile: ConversionProfileEntry, scratchDir: string) {
  const stem = path.parse(input.path).name;
  return {
    gifPath: path.join(scratchDir, `${stem}-${profile.name}.gif`),
    palettePath: path.join(scratchDir, `${stem}-${profile.name}-palette.png`),
  };
}

// Parse r_frame_rate ("30000/1001")
function parseFrameRate(rate?: string): number | undefined {
  if (!rate || !rate.includes('/')) return undefined;
  const [num, den] = rate.split('/').map(Number);
  return den ? num / den : undefined;
}

// File size, 0 when the file is missing
async function fileSize(filePath: string): Promise<number> {
  try {
    return (await fs.stat(filePath)).size;
  } catch {
    return 0;
  }
}

export type FfmpegTranscoderOptions = {
  ffmpegPath: string;
  ffprobePath: string;
  timeoutSeconds: number;
  logger: Logger;
};

/**
 * fluent-ffmpeg wrapper bound to one pair of binaries. Paths are set on each
 * command, never through the library-wide setters, so two instances can point
 * at different binaries.
 */
export class FfmpegTranscoder implements Transcoder, MediaProber {
  private availability?: Promise<boolean>;

  constructor(private readonly options: FfmpegTranscoderOptions) {}

  /** Runs this instance's ffmpeg with -version once and remembers the answer. */
  isAvailable(): Promise<boolean> {
    if (!this.availability) {
      const { ffmpegPath, logger } = this.options;
      this.availability = execFileAsync(ffmpegPath, ['-hide_banner', '-version'], { timeout: 10_000 }).then(
        () => true,
        (err: unknown) => {
          logger.warn({ err, ffmpegPath }, 'ffmpeg not available');
          return false;
        },
      );
    }
    return this.availability;
  }

  async probe(filePath: string): Promise<ProbeInfo> {
    // Run this instance's ffprobe
    const data = await new Promise<FfprobeData>((resolve, reject) => {
      ffmpeg(filePath)
        .setFfprobePath(this.options.ffprobePath)
        .ffprobe((err: unknown, result: FfprobeData) => {
          if (err) return reject(err);
          resolve(result);
        });
    });
    // Get the video stream
    const vStream = data.streams.find((s) => s.codec_type === 'video');
    return {
      durationSeconds: Number(data.format.duration || 0),
      width: vStream?.width,
      height: vStream?.height,
      fps: parseFrameRate(vStream?.r_frame_rate),
    };
  }

  async transcode(
    input: MediaArtifact,
    profile: ConversionProfileEntry,
    { scratchDir, signal }: TranscodeOptions,
  ): Promise<Result<MediaArtifact, ConversionError>> {
    // No binary, no conversion: the caller passes the original through
    if (!(await this.isAvailable())) {
      return { ok: false, error: new ToolUnavailableError(this.options.ffmpegPath) };
    }

    const { gifPath, palettePath } = outputPaths(input, profile, scratchDir);
    try {
      if (profile.palette === 'two-pass') {
        try {
          // 1) Generate the palette from the source
          await this.run(
            this.command(input.path).videoFilters(paletteGenFilter(profile)).output(palettePath),
            `${profile.name}:palettegen`,
            signal,
          );
          // 2) Encode the GIF with the palette as the second input
          await this.run(
            this.command(input.path)
              .input(palettePath)
              .complexFilter(paletteUseFilter(profile))
              .output(gifPath),
            `${profile.name}:paletteuse`,
            signal,
          );
        } finally {
          // The palette never outlives the rung
          await fs.rm(palettePath, { force: true });
        }
      } else {
        // Single pass: fps + scale straight to GIF
        await this.run(
          this.command(input.path).videoFilters(singlePassFilter(profile)).output(gifPath),
          profile.name,
          signal,
        );
      }
    } catch (err) {
      // Remove partial output
      await fs.rm(gifPath, { force: true });
      // Aborts propagate; any other failure is ConversionFailed
      if (signal?.aborted) throw signal.reason;
      return { ok: false, error: new ConversionFailedError(profile.name, errorMessage(err), err) };
    }

    // Exit 0 with no bytes is still a failure
    const sizeBytes = await fileSize(gifPath);
    if (sizeBytes === 0) {
      await fs.rm(gifPath, { force: true });
      return { ok: false, error: new ConversionFailedError(profile.name, 'no output produced') };
    }
    return { ok: true, value: { path: gifPath, sizeBytes, format: 'gif' } };
  }

  // Base command: this instance's binaries, overwrite output, drop audio, bounded run time
  private command(inputPath: string): FfmpegCommand {
    return ffmpeg(inputPath, { timeout: this.options.timeoutSeconds })
      .setFfmpegPath(this.options.ffmpegPath)
      .setFfprobePath(this.options.ffprobePath)
      .outputOptions(['-y', '-an']);
  }

  private run(command: FfmpegCommand, step: string, signal?: AbortSignal): Promise<void> {
    const { logger } = this.options;
    return new Promise<void>((resolve, reject) => {
      // Already aborted: never spawn
      if (signal?.aborted) return reject(signal.reason);
      // Abort kills the running ffmpeg
      const onAbort = () => command.kill('SIGKILL');
      signal?.addEventListener('abort', onAbort, { once: true });

      command
        .on('start', (cmd: string) => logger.debug({ cmd, step }, 'ffmpeg start'))
        .on('error', (err: Error, _stdout: string | null, stderr: string | null) => {
          signal?.removeEventListener('abort', onAbort);
          // Log only the tail of stderr
          logger.warn({ err, step, stderr: stderr?.slice(-2000) }, 'ffmpeg error');
          reject(err);
        })
        .on('end', () => {
          signal?.removeEventListener('abort', onAbort);
          logger.debug({ step }, 'ffmpeg finished');
          resolve();
        })
        .run();
    });
  }
}

/**
 * Runs fn inside a fresh directory under baseDir and removes it afterwards,
 * whichever way fn exits.
 */
export async function withTempDir<T>(
  fn: (dir: string) => Promise<T>,
  options: { baseDir?: string; prefix?: string; logger?: Logger } = {},
): Promise<T> {
  // Create the base directory and the job's own directory inside it
  const baseDir = options.baseDir ?? os.tmpdir();
  await fs.mkdir(baseDir, { recursive: true });
  const dir = await fs.mkdtemp(path.join(baseDir, options.prefix ?? 'gif-'));
  try {
    return await fn(dir);
  } finally {
    // Remove the job directory
    try {
      await fs.rm(dir, { recursive: true, force: true });
    } catch (err) {
      options.logger?.warn({ err, dir }, 'Failed to remove scratch directory');
    }
  }
}
