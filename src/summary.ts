import path from 'node:path';
import fs from 'fs-extra';
import { FAILED_URLS_FILE } from './config.js';
import type { BatchResult, FailedItem } from './types.js';

export type BatchState = 'completed' | 'cancelled-partial';

export interface BatchReport {
  readonly state: BatchState;
  readonly total: number;
  readonly success: number;
  readonly failed: number;
  readonly cancelled: number;
  readonly skipped: number;
  readonly failures: readonly FailedItem[];
}

const RULE = '='.repeat(60);

export const summarize = (result: BatchResult): BatchReport => ({
  state: result.interrupted ? 'cancelled-partial' : 'completed',
  total: result.total,
  success: result.success,
  failed: result.failed,
  cancelled: result.cancelled,
  skipped: result.skipped,
  failures: result.failures,
});

/**
 * Renders the end-of-batch summary block, one entry per line.
 */
export const formatReportLines = (report: BatchReport): string[] => {
  const lines = [RULE];
  lines.push(
    report.state === 'completed'
      ? `Download summary: completed (${report.total} items)`
      : `Download summary: CANCELLED, partial result (${report.total} items)`,
  );
  lines.push(`Success: ${report.success}`);
  lines.push(`Failed: ${report.failed}`);
  if (report.cancelled > 0) {
    lines.push(`Cancelled: ${report.cancelled}`);
  }
  if (report.skipped > 0) {
    lines.push(`Not started: ${report.skipped}`);
  }
  if (report.failures.length > 0) {
    lines.push('', 'Failed URLs:');
    for (const failure of report.failures) {
      lines.push(`  - ${failure.url} (${failure.reason})`);
    }
  }
  lines.push(RULE);
  return lines;
};

export const formatReport = (report: BatchReport): string => formatReportLines(report).join('\n');

/**
 * Writes failed URLs, one per line in recorded order, to `failed_urls.txt`.
 * Returns the file path, or null when there was nothing to write.
 */
export const persistFailures = async (result: BatchResult, outputDir: string): Promise<string | null> => {
  if (result.failures.length === 0) {
    return null;
  }
  await fs.ensureDir(outputDir);
  const failedFile = path.resolve(outputDir, FAILED_URLS_FILE);
  const body = result.failures.map((failure) => `${failure.url}\n`).join('');
  await fs.writeFile(failedFile, body, 'utf-8');
  return failedFile;
};
