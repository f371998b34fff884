import fs from 'node:fs/promises';
import type { Logger } from './logger';
import { ToolUnavailableError } from './errors';
import type { Transcoder } from './ffmpeg';
import type { ConversionProfile, ConversionProfileEntry } from './profiles';
import type { MediaArtifact, PassthroughReason } from './types';

export type FitAttempt = {
  profile: string;
  outcome: 'fit' | 'over-budget' | 'failed';
  sizeBytes?: number;
  error?: string;
};

export type FitOutcome = {
  artifact: MediaArtifact;
  profile: string | null; // null: the input came back untouched
  withinBudget: boolean;
  attempts: FitAttempt[];
  passthrough?: PassthroughReason; // set only when profile is null
};

export type FitOptions = {
  budgetBytes: number;
  scratchDir: string;
  logger: Logger;
  signal?: AbortSignal;
};

/**
 * Walks the ladder from highest to lowest quality and returns the first
 * artifact within budget. This is a fixed ladder, not a search: each rung is
 * tried at most once and the ladder order is the only knob.
 *
 * If nothing fits, the last artifact produced (the smallest) is returned
 * rather than the input. The input is returned only when no rung produced
 * anything, or the conversion tool is missing.
 */
export async function fitToBudget(
  transcoder: Transcoder,
  input: MediaArtifact,
  ladder: ConversionProfile,
  { budgetBytes, scratchDir, logger, signal }: FitOptions,
): Promise<FitOutcome> {
  if (!Number.isFinite(budgetBytes) || budgetBytes <= 0) {
    throw new RangeError(`Size budget must be a positive number of bytes, got ${budgetBytes}`);
  }

  const attempts: FitAttempt[] = [];
  let best: { artifact: MediaArtifact; profile: ConversionProfileEntry } | null = null;
  let toolUnavailable = false;

  try {
    for (const profile of ladder) {
      signal?.throwIfAborted();

      const result = await transcoder.transcode(input, profile, { scratchDir, signal });
      if (!result.ok) {
        if (result.error instanceof ToolUnavailableError) {
          logger.warn({ profile: profile.name, err: result.error }, 'Conversion tool unavailable; passing original through');
          toolUnavailable = true;
          break;
        }
        attempts.push({ profile: profile.name, outcome: 'failed', error: result.error.message });
        logger.warn({ profile: profile.name, err: result.error }, 'Profile failed, moving to next rung');
        continue;
      }

      // The new artifact supersedes the previous one.
      if (best) await discard(best.artifact, logger);
      best = { artifact: result.value, profile };

      const sizeBytes = result.value.sizeBytes;
      if (sizeBytes <= budgetBytes) {
        attempts.push({ profile: profile.name, outcome: 'fit', sizeBytes });
        logger.info({ profile: profile.name, sizeBytes, budgetBytes }, 'Artifact within budget');
        return { artifact: result.value, profile: profile.name, withinBudget: true, attempts };
      }
      attempts.push({ profile: profile.name, outcome: 'over-budget', sizeBytes });
      logger.info({ profile: profile.name, sizeBytes, budgetBytes }, 'Artifact over budget');
    }
  } catch (err) {
    if (best) await discard(best.artifact, logger);
    throw err;
  }

  if (best) {
    logger.warn(
      { profile: best.profile.name, sizeBytes: best.artifact.sizeBytes, budgetBytes },
      'Ladder exhausted; returning smallest artifact',
    );
    return { artifact: best.artifact, profile: best.profile.name, withinBudget: false, attempts };
  }

  return {
    artifact: input,
    profile: null,
    withinBudget: input.sizeBytes <= budgetBytes,
    attempts,
    passthrough: toolUnavailable ? 'tool-unavailable' : 'conversion-failed',
  };
}

async function discard(artifact: MediaArtifact, logger: Logger): Promise<void> {
  await fs.rm(artifact.path, { force: true });
  logger.debug({ path: artifact.path }, 'Discarded superseded artifact');
}
