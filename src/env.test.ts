import { describe, expect, it } from 'vitest';
import { loadConfig } from './env';
import { ConfigMissingError } from './errors';

const MB = 1024 * 1024;

function issuesOf(env: NodeJS.ProcessEnv): readonly string[] {
  try {
    loadConfig(env);
  } catch (err) {
    if (err instanceof ConfigMissingError) return err.issues;
    throw err;
  }
  throw new Error('expected loadConfig to fail');
}

describe('loadConfig', () => {
  it('fills in defaults around the bot token', () => {
    const config = loadConfig({ BOT_TOKEN: 'test-token' });

    expect(config).toMatchObject({
      botToken: 'test-token',
      port: 8080,
      budgetBytes: 2_621_440,
      maxInputBytes: 20 * MB,
      ffmpegTimeoutSeconds: 120,
      redisUrl: 'redis://127.0.0.1:6379',
      queueName: 'gif-convert',
      workerConcurrency: 2,
      uploadEndpoints: ['catbox', '0x0'],
      uploadTimeoutMs: 30_000,
      catboxUrl: 'https://catbox.moe/user/api.php',
      zeroX0Url: 'https://0x0.st',
      logLevel: 'info',
    });
    expect(config.r2).toBeUndefined();
    expect(config.giphyApiKey).toBeUndefined();
    expect(config.ladderFile).toBeUndefined();
  });

  it('requires a bot token', () => {
    expect(issuesOf({})).toContain('BOT_TOKEN: BOT_TOKEN is required');
    expect(issuesOf({ BOT_TOKEN: '   ' })).toContain('BOT_TOKEN: BOT_TOKEN is required');
  });

  it.each(['0', '-1'])('rejects a size budget of %s MB', (value) => {
    expect(issuesOf({ BOT_TOKEN: 'test-token', MAX_GIF_SIZE_MB: value })).toEqual([
      'MAX_GIF_SIZE_MB: MAX_GIF_SIZE_MB must be greater than 0',
    ]);
  });

  it('converts a fractional budget to whole bytes', () => {
    expect(loadConfig({ BOT_TOKEN: 'test-token', MAX_GIF_SIZE_MB: '8' }).budgetBytes).toBe(8 * MB);
    expect(loadConfig({ BOT_TOKEN: 'test-token', MAX_GIF_SIZE_MB: '0.1' }).budgetBytes).toBe(104_857);
  });

  it('parses the endpoint order case-insensitively and drops repeats', () => {
    const config = loadConfig({ BOT_TOKEN: 'test-token', UPLOAD_ENDPOINTS: ' 0x0 , CATBOX,0x0' });

    expect(config.uploadEndpoints).toEqual(['0x0', 'catbox']);
  });

  it('rejects unknown endpoint names', () => {
    expect(() => loadConfig({ BOT_TOKEN: 'test-token', UPLOAD_ENDPOINTS: 'catbox,ftp' })).toThrow(ConfigMissingError);
  });

  it('rejects r2 as an endpoint without bucket settings', () => {
    expect(issuesOf({ BOT_TOKEN: 'test-token', UPLOAD_ENDPOINTS: 'r2,catbox' })).toEqual([
      'UPLOAD_ENDPOINTS: r2 needs R2_ACCESS_KEY_ID, R2_SECRET_ACCESS_KEY, R2_BUCKET, R2_ENDPOINT and R2_PUBLIC_BASE_URL',
    ]);
  });

  it('builds the r2 settings when all of them are present', () => {
    const config = loadConfig({
      BOT_TOKEN: 'test-token',
      UPLOAD_ENDPOINTS: 'r2',
      R2_ACCESS_KEY_ID: 'test-key-id',
      R2_SECRET_ACCESS_KEY: 'test-secret',
      R2_BUCKET: 'gifs',
      R2_ENDPOINT: 'https://account.r2.example',
      R2_PUBLIC_BASE_URL: 'https://cdn.example/gifs//',
    });

    expect(config.uploadEndpoints).toEqual(['r2']);
    expect(config.r2).toEqual({
      accessKeyId: 'test-key-id',
      secretAccessKey: 'test-secret',
      bucket: 'gifs',
      endpoint: 'https://account.r2.example',
      publicBaseUrl: 'https://cdn.example/gifs',
    });
  });

  it('treats blank optional values as unset', () => {
    const config = loadConfig({ BOT_TOKEN: 'test-token', GIPHY_API_KEY: '  ', FFMPEG_PATH: '/usr/local/bin/ffmpeg' });

    expect(config.giphyApiKey).toBeUndefined();
    expect(config.ffmpegPath).toBe('/usr/local/bin/ffmpeg');
  });
});
