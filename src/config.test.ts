import path from 'node:path';
import { describe, expect, it } from 'vitest';
import {
  DEFAULT_OUTPUT_DIR,
  audioBitrateFor,
  configFromEnv,
  formatSelectorFor,
  resolveJobConfig,
} from './config.js';
import { BatchSetupError } from './errors.js';

describe('resolveJobConfig', () => {
  it('fills in defaults and freezes the result', () => {
    const config = resolveJobConfig({ outputDir: 'out' });

    expect(config).toEqual({
      outputDir: path.resolve('out'),
      mode: 'audio',
      audioQuality: '192',
      videoQuality: 'best',
      maxWorkers: 3,
    });
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('uses the platform downloads folder when no output directory is given', () => {
    expect(resolveJobConfig({}).outputDir).toBe(path.resolve(DEFAULT_OUTPUT_DIR));
  });

  it.each([
    [{ maxWorkers: 0 }],
    [{ maxWorkers: 1.5 }],
    [{ maxWorkers: Number.NaN }],
    [{ videoQuality: '4k' }],
    [{ audioQuality: '256' }],
    [{ threads: 2 }],
  ])('rejects %j', (input) => {
    expect(() => resolveJobConfig(input)).toThrow(BatchSetupError);
  });

  it('reports the offending field', () => {
    try {
      resolveJobConfig({ maxWorkers: 0 });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(BatchSetupError);
      expect(error).toMatchObject({ code: 'INVALID_CONFIG' });
      expect(String(error)).toContain('maxWorkers');
    }
  });
});

describe('quality mapping', () => {
  it('maps video quality onto a format selector', () => {
    const config = resolveJobConfig({ mode: 'video', videoQuality: '480p' });

    expect(formatSelectorFor(config)).toBe('best[height<=480][ext=mp4]/best[height<=480]');
  });

  it('exposes the audio bitrate as a number', () => {
    expect(audioBitrateFor(resolveJobConfig({ audioQuality: '320' }))).toBe(320);
  });
});

describe('configFromEnv', () => {
  it('reads overrides from the environment', () => {
    expect(configFromEnv({ DOWNLOAD_CONCURRENCY: '5', YT_DLP_PATH: ' /opt/yt-dlp ', DOWNLOAD_DIR: '' })).toEqual({
      maxWorkers: 5,
      ytDlpPath: '/opt/yt-dlp',
    });
  });

  it('returns nothing for an empty environment', () => {
    expect(configFromEnv({})).toEqual({});
  });
});
