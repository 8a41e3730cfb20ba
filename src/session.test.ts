import path from 'node:path';
import fs from 'fs-extra';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { ProgressChannel } from './channel.js';
import { FAILED_URLS_FILE } from './config.js';
import { ERRORS_LOG } from './logs.js';
import { startDownloadSession } from './session.js';
import { FakeFetcher, makeTempDir } from './testing/fakes.js';
import type { ProgressEvent } from './types.js';

const collect = async (channel: ProgressChannel): Promise<ProgressEvent[]> => {
  const events: ProgressEvent[] = [];
  for await (const event of channel) {
    events.push(event);
  }
  return events;
};

describe('startDownloadSession', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  it('rejects a list without any URL', async () => {
    await expect(
      startDownloadSession({ urls: ['', '# nothing here'], config: { outputDir: dir }, fetcher: new FakeFetcher() }),
    ).rejects.toMatchObject({ code: 'NO_VALID_URLS', message: 'No valid URLs were found' });
  });

  it('rejects an invalid configuration before starting', async () => {
    const fetcher = new FakeFetcher();

    await expect(
      startDownloadSession({ urls: ['https://example/a'], config: { outputDir: dir, maxWorkers: 0 }, fetcher }),
    ).rejects.toMatchObject({ code: 'INVALID_CONFIG' });
    expect(fetcher.resolveCalls).toEqual([]);
  });

  it('rejects an output directory that cannot be created', async () => {
    const blocker = path.join(dir, 'file');
    await fs.writeFile(blocker, 'x');

    await expect(
      startDownloadSession({
        urls: ['https://example/a'],
        config: { outputDir: path.join(blocker, 'out') },
        fetcher: new FakeFetcher(),
      }),
    ).rejects.toMatchObject({ code: 'OUTPUT_DIR_UNAVAILABLE' });
  });

  it('streams the batch and ends the channel with the final status', async () => {
    const session = await startDownloadSession({
      urls: ['https://example/a', '# skipped', 'https://example/b'],
      config: { outputDir: dir, maxWorkers: 1 },
      fetcher: () => new FakeFetcher({ failResolve: (url) => (url.endsWith('/a') ? 'Video unavailable' : undefined) }),
    });
    const streamed = collect(session.channel);

    const { result, report, failedUrlsFile } = await session.completion;
    const events = await streamed;

    expect(session.entries).toEqual(['https://example/a', 'https://example/b']);
    expect(result).toMatchObject({ total: 2, success: 1, failed: 1 });
    expect(report.state).toBe('completed');
    expect(failedUrlsFile).toBe(path.resolve(dir, FAILED_URLS_FILE));

    expect(events[0]).toEqual({ type: 'log', level: 'info', message: 'Found 2 URLs, starting download...' });
    expect(events.slice(-3)).toEqual([
      { type: 'log', level: 'info', message: '--- Batch finished ---' },
      { type: 'status', text: 'Completed' },
      { type: 'done', status: 'Completed', progress: 0 },
    ]);
    expect(events).toContainEqual({ type: 'log', level: 'warn', message: `Failed URLs saved to: ${failedUrlsFile}` });
    expect(session.channel.isClosed).toBe(true);

    const errorsLog = await fs.readFile(path.join(dir, ERRORS_LOG), 'utf-8');
    expect(errorsLog.trimEnd().endsWith('] https://example/a :: Video unavailable')).toBe(true);
  });

  it('finishes as cancelled when cancel() is called', async () => {
    const session = await startDownloadSession({
      urls: ['https://example/a', 'https://example/b', 'https://example/c'],
      config: { outputDir: dir, maxWorkers: 1 },
      fetcher: new FakeFetcher({ steps: 4, stepDelayMs: 50 }),
    });
    const streamed = collect(session.channel);

    session.cancel();
    session.cancel();
    const { result, report } = await session.completion;
    const events = await streamed;

    expect(result.success).toBe(0);
    expect(result.interrupted).toBe(true);
    expect(report.state).toBe('cancelled-partial');
    expect(events.filter((event) => event.type === 'log' && event.message === 'Cancelling download...')).toHaveLength(1);
    expect(events[events.length - 1]).toEqual({ type: 'done', status: 'Cancelled', progress: 0 });
  });
});
