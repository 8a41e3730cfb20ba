import pLimit from 'p-limit';
import type { CancellationToken } from './cancellation.js';
import { AsyncQueue, type ProgressChannel } from './channel.js';
import type { JobConfig } from './config.js';
import { describeError } from './errors.js';
import type { ActivityLog } from './logs.js';
import { processItem, type ItemProcessor } from './processor.js';
import type { BatchResult, Completion, MediaFetcher, Outcome } from './types.js';
import { filterUrlEntries } from './utils.js';

export interface BatchOptions {
  readonly config: JobConfig;
  readonly token: CancellationToken;
  readonly fetcher: MediaFetcher;
  readonly channel?: ProgressChannel;
  readonly activityLog?: ActivityLog;
  readonly processor?: ItemProcessor;
}

export const emptyBatchResult = (total = 0): BatchResult => ({
  total,
  success: 0,
  failed: 0,
  cancelled: 0,
  skipped: 0,
  failures: [],
  completions: [],
  interrupted: false,
});

/**
 * Folds one completion into a new result; the previous value is left untouched.
 */
export const foldCompletion = (result: BatchResult, completion: Completion): BatchResult => {
  const completions = [...result.completions, completion];
  const { outcome } = completion;
  switch (outcome.status) {
    case 'success':
      return { ...result, completions, success: result.success + 1 };
    case 'cancelled':
      return { ...result, completions, cancelled: result.cancelled + 1 };
    case 'failed':
      return {
        ...result,
        completions,
        failed: result.failed + 1,
        failures: [...result.failures, { url: completion.url, reason: outcome.reason }],
      };
  }
};

type Wakeup =
  | { readonly kind: 'completion'; readonly completion: Completion }
  | { readonly kind: 'cancelled' }
  | { readonly kind: 'closed' };

/**
 * Runs every valid entry through the item processor on a pool of `config.maxWorkers`
 * and collects outcomes in completion order.
 *
 * When cancellation is observed mid-run, queued entries that have not started are
 * dropped and counted as `skipped`; items already running are awaited and folded in.
 * A token that is already signaled when the run begins lets every entry reach the
 * processor, which reports it as cancelled without touching the network.
 */
export const runBatch = async (urls: readonly string[], options: BatchOptions): Promise<BatchResult> => {
  const { config, token, fetcher, channel, activityLog } = options;
  const processor = options.processor ?? processItem;
  const entries = filterUrlEntries(urls);

  if (entries.length === 0) {
    return emptyBatchResult();
  }

  const limit = pLimit(config.maxWorkers);
  const completions = new AsyncQueue<Completion>();
  const observeCancellation = !token.isSignaled();
  let started = 0;

  const invoke = async (url: string, index: number): Promise<Outcome> => {
    started += 1;
    const item = { id: index + 1, url };
    channel?.itemStarted(item);
    let outcome: Outcome;
    try {
      outcome = await processor(item, { config, token, fetcher, channel, activityLog });
    } catch (error) {
      outcome = { status: 'failed', reason: describeError(error) };
      channel?.log(`Unexpected fault while processing ${url}: ${outcome.reason}`, 'error');
    }
    channel?.itemFinished(item, outcome);
    return outcome;
  };

  entries.forEach((url, index) => {
    void limit(() => invoke(url, index)).then(
      (outcome) => completions.push({ index, url, outcome }),
      (error: unknown) => completions.push({ index, url, outcome: { status: 'failed', reason: describeError(error) } }),
    );
  });

  const cancellation: Promise<Wakeup> = token.whenSignaled().then((): Wakeup => ({ kind: 'cancelled' }));
  const nextCompletion = async (): Promise<Wakeup> => {
    const next = await completions.next();
    return next.done ? { kind: 'closed' } : { kind: 'completion', completion: next.value };
  };

  let result = emptyBatchResult(entries.length);
  let interrupted = false;
  let pending = nextCompletion();
  const expected = (): number => (interrupted ? started : entries.length);

  while (result.completions.length < expected()) {
    const wakeup = interrupted || !observeCancellation ? await pending : await Promise.race([pending, cancellation]);

    if (wakeup.kind === 'closed') {
      break;
    }
    if (wakeup.kind === 'cancelled') {
      interrupted = true;
      limit.clearQueue();
      channel?.log('Cancellation requested, waiting for running downloads to stop.', 'warn');
      continue;
    }

    result = foldCompletion(result, wakeup.completion);
    pending = nextCompletion();
    channel?.progress(result.completions.length / entries.length);
  }

  completions.close();

  return {
    ...result,
    skipped: entries.length - result.completions.length,
    interrupted: interrupted || !observeCancellation,
  };
};
