import fs from 'fs-extra';
import { CancellationToken } from './cancellation.js';
import { ProgressChannel } from './channel.js';
import { resolveJobConfig, type JobConfig, type JobConfigInput } from './config.js';
import { BatchSetupError, describeError } from './errors.js';
import { createActivityLog, type ActivityLog } from './logs.js';
import type { ItemProcessor } from './processor.js';
import { runBatch } from './runner.js';
import { formatReportLines, persistFailures, summarize, type BatchReport } from './summary.js';
import type { BatchResult, MediaFetcher } from './types.js';
import { filterUrlEntries } from './utils.js';

export interface SessionRequest {
  readonly urls: readonly string[];
  readonly config: JobConfigInput;
  readonly fetcher: MediaFetcher | ((config: JobConfig) => MediaFetcher);
  readonly channel?: ProgressChannel;
  readonly processor?: ItemProcessor;
  readonly activityLog?: ActivityLog;
}

export interface SessionResult {
  readonly result: BatchResult;
  readonly report: BatchReport;
  readonly failedUrlsFile: string | null;
}

export interface DownloadSession {
  readonly config: JobConfig;
  readonly entries: readonly string[];
  readonly channel: ProgressChannel;
  readonly token: CancellationToken;
  readonly completion: Promise<SessionResult>;
  cancel(): void;
}

/**
 * Validates the request and prepares the output directory. Every batch-level fatal
 * condition surfaces here, before any worker has started.
 */
export const prepareSession = async (
  urls: readonly string[],
  input: JobConfigInput,
): Promise<{ config: JobConfig; entries: string[] }> => {
  const config = resolveJobConfig(input);
  const entries = filterUrlEntries(urls);
  if (entries.length === 0) {
    throw new BatchSetupError('NO_VALID_URLS', 'No valid URLs were found');
  }
  try {
    await fs.ensureDir(config.outputDir);
  } catch (error) {
    throw new BatchSetupError(
      'OUTPUT_DIR_UNAVAILABLE',
      `Could not create output directory ${config.outputDir}: ${describeError(error)}`,
      { cause: error },
    );
  }
  return { config, entries };
};

/**
 * Starts a batch in the background and streams its progress over the returned channel.
 * The channel always ends with a `done` event, whatever happened to the batch.
 */
export const startDownloadSession = async (request: SessionRequest): Promise<DownloadSession> => {
  const { config, entries } = await prepareSession(request.urls, request.config);
  const channel = request.channel ?? new ProgressChannel();
  const token = new CancellationToken();
  const fetcher = typeof request.fetcher === 'function' ? request.fetcher(config) : request.fetcher;
  const activityLog = request.activityLog ?? createActivityLog(config.outputDir, channel);

  const run = async (): Promise<SessionResult> => {
    let finalStatus = 'Completed';
    try {
      channel.log(`Found ${entries.length} URLs, starting download...`);
      channel.status(`Downloading ${entries.length} items...`);

      const result = await runBatch(entries, {
        config,
        token,
        fetcher,
        channel,
        activityLog,
        processor: request.processor,
      });
      const report = summarize(result);
      const failedUrlsFile = await persistFailures(result, config.outputDir);
      await activityLog.summary(result);

      for (const line of formatReportLines(report)) {
        channel.log(line, report.state === 'completed' ? 'info' : 'warn');
      }
      if (failedUrlsFile) {
        channel.log(`Failed URLs saved to: ${failedUrlsFile}`, 'warn');
      }
      if (result.interrupted || token.isSignaled()) {
        finalStatus = 'Cancelled';
      }
      return { result, report, failedUrlsFile };
    } catch (error) {
      finalStatus = `Error: ${describeError(error)}`;
      channel.log(`Batch aborted: ${describeError(error)}`, 'error');
      throw error;
    } finally {
      channel.log('--- Batch finished ---');
      channel.status(finalStatus);
      channel.done(finalStatus);
    }
  };

  return {
    config,
    entries,
    channel,
    token,
    completion: run(),
    cancel: () => {
      if (!token.isSignaled()) {
        channel.log('Cancelling download...', 'warn');
        channel.status('Cancelling...');
      }
      token.signal();
    },
  };
};
