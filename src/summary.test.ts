import path from 'node:path';
import fs from 'fs-extra';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { CancellationToken } from './cancellation.js';
import { FAILED_URLS_FILE, resolveJobConfig } from './config.js';
import { emptyBatchResult, runBatch } from './runner.js';
import { formatReportLines, persistFailures, summarize } from './summary.js';
import { FakeFetcher, makeTempDir } from './testing/fakes.js';
import type { BatchResult } from './types.js';
import { readUrlList } from './utils.js';

const resultWith = (overrides: Partial<BatchResult>): BatchResult => ({ ...emptyBatchResult(), ...overrides });

describe('formatReportLines', () => {
  it('lists counts and every failure for a completed batch', () => {
    const report = summarize(
      resultWith({
        total: 3,
        success: 1,
        failed: 2,
        failures: [
          { url: 'https://example/a', reason: 'Video unavailable' },
          { url: 'https://example/b', reason: 'HTTP Error 403' },
        ],
      }),
    );

    expect(report.state).toBe('completed');
    expect(formatReportLines(report)).toEqual([
      '='.repeat(60),
      'Download summary: completed (3 items)',
      'Success: 1',
      'Failed: 2',
      '',
      'Failed URLs:',
      '  - https://example/a (Video unavailable)',
      '  - https://example/b (HTTP Error 403)',
      '='.repeat(60),
    ]);
  });

  it('omits zero cancelled and not-started counts', () => {
    const lines = formatReportLines(summarize(resultWith({ total: 2, success: 2 })));

    expect(lines).toEqual(['='.repeat(60), 'Download summary: completed (2 items)', 'Success: 2', 'Failed: 0', '='.repeat(60)]);
  });
});

describe('persistFailures', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  it('writes nothing when every item succeeded', async () => {
    expect(await persistFailures(resultWith({ total: 1, success: 1 }), dir)).toBeNull();
    expect(await fs.pathExists(path.join(dir, FAILED_URLS_FILE))).toBe(false);
  });

  it('replaces the previous retry file', async () => {
    await fs.writeFile(path.join(dir, FAILED_URLS_FILE), 'https://example/old\n');

    await persistFailures(
      resultWith({
        failed: 2,
        failures: [
          { url: 'https://example/b', reason: 'x' },
          { url: 'https://example/a', reason: 'y' },
        ],
      }),
      dir,
    );

    expect(await fs.readFile(path.join(dir, FAILED_URLS_FILE), 'utf-8')).toBe('https://example/b\nhttps://example/a\n');
  });

  it('produces a file that can be fed back in as a URL list', async () => {
    const flaky = new Set(['https://example/b', 'https://example/c']);
    const config = resolveJobConfig({ outputDir: dir, maxWorkers: 1 });
    const first = await runBatch(['https://example/a', 'https://example/b', 'https://example/c'], {
      config,
      token: new CancellationToken(),
      fetcher: new FakeFetcher({ failResolve: (url) => (flaky.has(url) ? 'Temporary failure' : undefined) }),
    });
    const failedFile = await persistFailures(first, dir);
    expect(failedFile).not.toBeNull();

    const retryUrls = await readUrlList(path.join(dir, FAILED_URLS_FILE));
    const retry = await runBatch(retryUrls, { config, token: new CancellationToken(), fetcher: new FakeFetcher() });

    expect(retryUrls).toEqual(['https://example/b', 'https://example/c']);
    expect(retry).toMatchObject({ total: 2, success: 2, failed: 0 });
  });
});
