import fs from 'node:fs/promises';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { silentLogger } from './logger';
import { fitToBudget } from './sizeFit';
import type { MediaArtifact } from './types';
import { FakeTranscoder, MB, exists, makeTempDir, profile, writeSizedFile } from './test-utils';

describe('fitToBudget', () => {
  let scratchDir: string;
  let input: MediaArtifact;

  beforeEach(async () => {
    scratchDir = await makeTempDir();
    const inputPath = path.join(scratchDir, 'clip.mp4');
    await writeSizedFile(inputPath, 20 * MB);
    input = { path: inputPath, sizeBytes: 20 * MB, format: 'source' };
  });

  afterEach(async () => {
    await fs.rm(scratchDir, { recursive: true, force: true });
  });

  const options = () => ({ budgetBytes: 8 * MB, scratchDir, logger: silentLogger });

  it('discards an over-budget rung and returns the next one that fits', async () => {
    const transcoder = new FakeTranscoder({ a: 10 * MB, b: 6 * MB });

    const outcome = await fitToBudget(transcoder, input, [profile('a'), profile('b')], options());

    expect(outcome.profile).toBe('b');
    expect(outcome.withinBudget).toBe(true);
    expect(outcome.artifact).toEqual({ path: path.join(scratchDir, 'clip-b.gif'), sizeBytes: 6 * MB, format: 'gif' });
    expect(await exists(path.join(scratchDir, 'clip-a.gif'))).toBe(false);
    expect(await exists(path.join(scratchDir, 'clip-b.gif'))).toBe(true);
    expect(outcome.attempts).toEqual([
      { profile: 'a', outcome: 'over-budget', sizeBytes: 10 * MB },
      { profile: 'b', outcome: 'fit', sizeBytes: 6 * MB },
    ]);
  });

  it('stops at the first rung within budget and never runs later ones', async () => {
    const transcoder = new FakeTranscoder({ a: 12 * MB, b: 7 * MB, c: 3 * MB });

    const outcome = await fitToBudget(transcoder, input, [profile('a'), profile('b'), profile('c')], options());

    expect(outcome.profile).toBe('b');
    expect(outcome.artifact.sizeBytes).toBe(7 * MB);
    expect(transcoder.calls).toEqual(['a', 'b']);
  });

  it('returns the first rung without trying others when it already fits', async () => {
    const transcoder = new FakeTranscoder({ a: 2 * MB, b: 1 * MB });

    const outcome = await fitToBudget(transcoder, input, [profile('a'), profile('b')], options());

    expect(outcome.profile).toBe('a');
    expect(transcoder.calls).toEqual(['a']);
  });

  it('returns the last rung when nothing fits, not the original input', async () => {
    const transcoder = new FakeTranscoder({ a: 15 * MB, b: 11 * MB, c: 9 * MB });

    const outcome = await fitToBudget(transcoder, input, [profile('a'), profile('b'), profile('c')], options());

    expect(outcome.profile).toBe('c');
    expect(outcome.withinBudget).toBe(false);
    expect(outcome.artifact.path).toBe(path.join(scratchDir, 'clip-c.gif'));
    expect(outcome.artifact.sizeBytes).toBe(9 * MB);
    expect((await fs.readdir(scratchDir)).sort()).toEqual(['clip-c.gif', 'clip.mp4']);
  });

  it('advances past a failed rung without retrying it', async () => {
    const transcoder = new FakeTranscoder({ a: 'fail', b: 5 * MB });

    const outcome = await fitToBudget(transcoder, input, [profile('a'), profile('b')], options());

    expect(transcoder.calls).toEqual(['a', 'b']);
    expect(outcome.profile).toBe('b');
    expect(outcome.attempts[0]).toEqual({
      profile: 'a',
      outcome: 'failed',
      error: 'Conversion with profile "a" failed: exit code 1',
    });
  });

  it('keeps the best artifact so far when a later rung fails', async () => {
    const transcoder = new FakeTranscoder({ a: 10 * MB, b: 'fail' });

    const outcome = await fitToBudget(transcoder, input, [profile('a'), profile('b')], options());

    expect(outcome.profile).toBe('a');
    expect(outcome.withinBudget).toBe(false);
    expect(await exists(outcome.artifact.path)).toBe(true);
  });

  it('passes the original through untouched when the tool is unavailable', async () => {
    const transcoder = new FakeTranscoder({ a: 'unavailable', b: 'unavailable' });

    const outcome = await fitToBudget(transcoder, input, [profile('a'), profile('b')], options());

    expect(outcome.profile).toBeNull();
    expect(outcome.artifact).toBe(input);
    expect((await fs.stat(input.path)).size).toBe(20 * MB);
    expect(transcoder.calls).toEqual(['a']);
    expect(outcome.passthrough).toBe('tool-unavailable');
  });

  it('returns the original when every rung fails', async () => {
    const transcoder = new FakeTranscoder({ a: 'fail', b: 'fail' });

    const outcome = await fitToBudget(transcoder, input, [profile('a'), profile('b')], options());

    expect(outcome.artifact).toBe(input);
    expect(outcome.withinBudget).toBe(false);
    expect(outcome.attempts.map((a) => a.outcome)).toEqual(['failed', 'failed']);
    expect(outcome.passthrough).toBe('conversion-failed');
  });

  it('gives no passthrough reason once any rung produced a GIF', async () => {
    const transcoder = new FakeTranscoder({ a: 'fail', b: 9 * MB });

    const outcome = await fitToBudget(transcoder, input, [profile('a'), profile('b')], options());

    expect(outcome.profile).toBe('b');
    expect(outcome.passthrough).toBeUndefined();
  });

  it('leaves only the returned artifact behind after a long ladder', async () => {
    const transcoder = new FakeTranscoder({ a: 20 * MB, b: 16 * MB, c: 12 * MB, d: 9 * MB, e: 4 * MB });
    const ladder = ['a', 'b', 'c', 'd', 'e'].map((name) => profile(name));

    const outcome = await fitToBudget(transcoder, input, ladder, options());

    expect(outcome.profile).toBe('e');
    expect((await fs.readdir(scratchDir)).sort()).toEqual(['clip-e.gif', 'clip.mp4']);
  });

  it('deletes its artifact when aborted between rungs', async () => {
    const controller = new AbortController();
    const transcoder = new FakeTranscoder({ a: 10 * MB, b: 6 * MB });
    const abortingTranscoder = {
      async transcode(...args: Parameters<FakeTranscoder['transcode']>) {
        const result = await transcoder.transcode(...args);
        controller.abort(new Error('cancelled'));
        return result;
      },
    };

    await expect(
      fitToBudget(abortingTranscoder, input, [profile('a'), profile('b')], { ...options(), signal: controller.signal }),
    ).rejects.toThrow('cancelled');
    expect((await fs.readdir(scratchDir)).sort()).toEqual(['clip.mp4']);
  });

  it.each([0, -1, Number.NaN, Number.POSITIVE_INFINITY])('rejects a budget of %s', async (budgetBytes) => {
    const transcoder = new FakeTranscoder({ a: MB });

    await expect(
      fitToBudget(transcoder, input, [profile('a')], { ...options(), budgetBytes }),
    ).rejects.toBeInstanceOf(RangeError);
    expect(transcoder.calls).toEqual([]);
  });
});
