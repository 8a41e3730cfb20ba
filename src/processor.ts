import fs from 'fs-extra';
import type { CancellationToken } from './cancellation.js';
import type { ProgressChannel } from './channel.js';
import { audioBitrateFor, formatSelectorFor, type JobConfig } from './config.js';
import { describeError } from './errors.js';
import { silentActivityLog, type ActivityLog } from './logs.js';
import { writeSidecars } from './metadata.js';
import type { FetchRequest, ItemRef, MediaFetcher, MediaInfo, Outcome, TransferProgress } from './types.js';
import {
  buildVideoDirectoryName,
  claimAudioPath,
  createUniqueDirectory,
  isUrlEntry,
  truncateTitle,
} from './utils.js';

export interface ItemContext {
  readonly config: JobConfig;
  readonly token: CancellationToken;
  readonly fetcher: MediaFetcher;
  readonly channel?: ProgressChannel;
  readonly activityLog?: ActivityLog;
}

export type ItemProcessor = (item: ItemRef, context: ItemContext) => Promise<Outcome>;

const prepareTarget = async (info: MediaInfo, config: JobConfig): Promise<string> => {
  if (config.mode === 'video') {
    return createUniqueDirectory(config.outputDir, buildVideoDirectoryName(info.uploader, info.title));
  }
  return claimAudioPath(info.title, config.outputDir);
};

/**
 * Removes the file or directory claimed for an item that did not succeed.
 */
const discardTarget = async (target: string | undefined, channel: ProgressChannel | undefined): Promise<void> => {
  if (!target) {
    return;
  }
  try {
    await fs.remove(target);
  } catch (error) {
    channel?.log(`Could not remove ${target}: ${describeError(error)}`, 'warn');
  }
};

/**
 * Downloads a single entry and classifies what happened. Every failure, including
 * unexpected ones, is returned as an outcome; this function does not reject.
 */
export const processItem: ItemProcessor = async (item, context) => {
  const { config, token, fetcher, channel } = context;
  const activityLog = context.activityLog ?? silentActivityLog;
  const url = item.url.trim();

  if (!isUrlEntry(url)) {
    return { status: 'failed', reason: 'Not a downloadable entry' };
  }

  if (token.isSignaled()) {
    channel?.log(`Skipped (cancelled): ${url}`, 'warn');
    return { status: 'cancelled' };
  }

  let label = url;
  let target: string | undefined;
  let cancelledMidTransfer = false;

  try {
    const info = await fetcher.resolve(url);
    label = info.title;
    const ref: ItemRef = { ...item, url, label: truncateTitle(info.title) };
    channel?.log(`Starting: ${info.title}`);

    target = await prepareTarget(info, config);
    if (config.mode === 'video') {
      channel?.log(`Created directory: ${target}`);
    }

    const request: FetchRequest = {
      url,
      info,
      mode: config.mode,
      target,
      audioBitrate: audioBitrateFor(config),
      formatSelector: formatSelectorFor(config),
    };

    const result = await fetcher.fetch(request, (progress: TransferProgress) => {
      if (token.isSignaled()) {
        cancelledMidTransfer = true;
        return 'abort';
      }
      channel?.progress(progress.fraction, ref);
      channel?.status(`${progress.status}: ${ref.label ?? url}`);
      return 'continue';
    });

    if (result.status === 'aborted') {
      await discardTarget(target, channel);
      channel?.log(`Cancelled: ${info.title}`, 'warn');
      return { status: 'cancelled' };
    }

    if (config.mode === 'video') {
      const sidecars = await writeSidecars(target, info);
      for (const error of sidecars.errors) {
        channel?.log(`Metadata not saved for ${info.title} (${error})`, 'warn');
      }
    }

    channel?.log(`Done: ${info.title}`);
    await activityLog.success(result.filePath, url);

    return config.mode === 'video'
      ? { status: 'success', filePath: result.filePath, directory: target }
      : { status: 'success', filePath: result.filePath };
  } catch (error) {
    await discardTarget(target, channel);
    if (cancelledMidTransfer) {
      channel?.log(`Cancelled: ${label}`, 'warn');
      return { status: 'cancelled' };
    }
    const reason = describeError(error);
    channel?.log(`Failed: ${url} - ${reason}`, 'error');
    await activityLog.failure(`${url} :: ${reason}`);
    return { status: 'failed', reason };
  }
};
