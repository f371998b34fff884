import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { ConversionFailedError, ToolUnavailableError, type ConversionError } from './errors';
import { outputPaths, type TranscodeOptions, type Transcoder } from './ffmpeg';
import type { ConversionProfileEntry } from './profiles';
import type { MediaArtifact, Result } from './types';

export const MB = 1024 * 1024;

export async function makeTempDir(prefix = 'gif-test-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

// Sparse file: the reported size without the disk cost.
export async function writeSizedFile(filePath: string, sizeBytes: number): Promise<void> {
  await fs.writeFile(filePath, '');
  await fs.truncate(filePath, sizeBytes);
}

export async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

export function profile(name: string, overrides: Partial<ConversionProfileEntry> = {}): ConversionProfileEntry {
  return { name, fps: 10, width: 320, palette: 'none', dither: 'none', ...overrides };
}

/** Planned outcome per profile name: an output size in bytes, or a failure. */
export type FakePlan = Record<string, number | 'fail' | 'unavailable'>;

export class FakeTranscoder implements Transcoder {
  readonly calls: string[] = [];
  readonly produced: string[] = [];

  constructor(private readonly plan: FakePlan) {}

  async transcode(
    input: MediaArtifact,
    entry: ConversionProfileEntry,
    { scratchDir, signal }: TranscodeOptions,
  ): Promise<Result<MediaArtifact, ConversionError>> {
    signal?.throwIfAborted();
    this.calls.push(entry.name);
    const planned = this.plan[entry.name];
    if (planned === 'unavailable') {
      return { ok: false, error: new ToolUnavailableError('/missing/ffmpeg') };
    }
    if (planned === undefined || planned === 'fail') {
      return { ok: false, error: new ConversionFailedError(entry.name, 'exit code 1') };
    }
    const { gifPath } = outputPaths(input, entry, scratchDir);
    await writeSizedFile(gifPath, planned);
    this.produced.push(gifPath);
    return { ok: true, value: { path: gifPath, sizeBytes: planned, format: 'gif' } };
  }
}
