import path from 'node:path';
import fs from 'fs-extra';
import type { ProgressChannel } from './channel.js';
import { describeError } from './errors.js';
import type { BatchResult } from './types.js';

export const ERRORS_LOG = 'errors.log';
export const DOWNLOADED_LOG = 'downloaded.log';

/**
 * Append-only record of what a batch downloaded and what failed.
 */
export interface ActivityLog {
  success(filePath: string, url: string): Promise<void>;
  failure(message: string): Promise<void>;
  summary(result: BatchResult): Promise<void>;
}

export const silentActivityLog: ActivityLog = {
  success: async () => undefined,
  failure: async () => undefined,
  summary: async () => undefined,
};

/**
 * Writes timestamped lines to `downloaded.log` and `errors.log` in the output directory.
 * A log write that fails is reported on the channel; it never fails the item.
 */
export const createActivityLog = (outputDir: string, channel?: ProgressChannel): ActivityLog => {
  const errorsLog = path.resolve(outputDir, ERRORS_LOG);
  const downloadedLog = path.resolve(outputDir, DOWNLOADED_LOG);

  const append = async (filePath: string, text: string): Promise<void> => {
    try {
      await fs.appendFile(filePath, text);
    } catch (error) {
      channel?.log(`Could not write ${path.basename(filePath)}: ${describeError(error)}`, 'warn');
    }
  };

  return {
    success: async (filePath, url) => {
      const timestamp = new Date().toISOString();
      await append(downloadedLog, `[${timestamp}] ${path.basename(filePath)} <- ${url}\n`);
    },
    failure: async (message) => {
      const timestamp = new Date().toISOString();
      await append(errorsLog, `[${timestamp}] ${message}\n`);
    },
    summary: async (result) => {
      const timestamp = new Date().toISOString();
      const state = result.interrupted ? 'CANCELLED (partial)' : 'COMPLETED';
      await append(
        downloadedLog,
        `\n[${timestamp}] ========================================\n` +
          `[${timestamp}] BATCH ${state}\n` +
          `[${timestamp}] SUCCESS: ${result.success}/${result.total} FAILED: ${result.failed} ` +
          `CANCELLED: ${result.cancelled} SKIPPED: ${result.skipped}\n` +
          `[${timestamp}] ========================================\n\n`,
      );
    },
  };
};
