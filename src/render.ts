import process from 'node:process';
import cliProgress from 'cli-progress';
import pc from 'picocolors';
import type { ProgressChannel } from './channel.js';
import type { LogLevel, Outcome, ProgressEvent } from './types.js';
import { truncateTitle } from './utils.js';

type ProgressBar = ReturnType<cliProgress.MultiBar['create']>;

export const colorize = (level: LogLevel, message: string): string => {
  switch (level) {
    case 'error':
      return pc.red(message);
    case 'warn':
      return pc.yellow(message);
    case 'info':
      return message;
  }
};

const outcomeLabel = (outcome: Outcome | undefined): string => {
  switch (outcome?.status) {
    case 'success':
      return pc.green('done');
    case 'failed':
      return pc.red('failed');
    case 'cancelled':
      return pc.yellow('cancelled');
    default:
      return '';
  }
};

export const createMultiBar = (stream: NodeJS.WritableStream = process.stderr): cliProgress.MultiBar =>
  new cliProgress.MultiBar(
    {
      clearOnComplete: false,
      hideCursor: true,
      format: '{bar} {percentage}% | {title}',
      stream,
    },
    cliProgress.Presets.shades_grey,
  );

/**
 * Consumes a session's progress channel until its `done` event, drawing one bar per
 * running item plus an overall bar, and printing log lines above them.
 */
export const renderProgress = async (channel: ProgressChannel, bars: cliProgress.MultiBar): Promise<string> => {
  const itemBars = new Map<number, ProgressBar>();
  const overall = bars.create(100, 0, { title: pc.bold('Preparing...') });
  let finalStatus = '';

  const handle = (event: ProgressEvent): void => {
    switch (event.type) {
      case 'log':
        bars.log(`${colorize(event.level, event.message)}\n`);
        break;
      case 'status':
        overall.update({ title: pc.bold(truncateTitle(event.text, 60)) });
        break;
      case 'progress': {
        const percent = Math.floor(event.fraction * 100);
        if (!event.item) {
          overall.update(percent);
          break;
        }
        const bar = itemBars.get(event.item.id);
        bar?.update(percent, { title: truncateTitle(event.item.label ?? event.item.url) });
        break;
      }
      case 'item': {
        if (event.phase === 'started') {
          itemBars.set(event.item.id, bars.create(100, 0, { title: truncateTitle(event.item.url) }));
          break;
        }
        const bar = itemBars.get(event.item.id);
        if (bar) {
          bar.update({ title: `${outcomeLabel(event.outcome)} ${truncateTitle(event.item.label ?? event.item.url)}` });
          bar.stop();
          bars.remove(bar);
          itemBars.delete(event.item.id);
        }
        break;
      }
      case 'done':
        finalStatus = event.status;
        overall.update(event.progress, { title: pc.bold(event.status) });
        break;
    }
  };

  for await (const event of channel) {
    handle(event);
  }

  bars.stop();
  return finalStatus;
};
