import path from 'node:path';
import fs from 'fs-extra';
import ffmpeg from 'fluent-ffmpeg';
import ytdl from '@distube/ytdl-core';
import { z } from 'zod';
import { describeError } from './errors.js';
import type {
  FetchRequest,
  FetchResult,
  MediaFetcher,
  MediaInfo,
  ProgressCallback,
} from './types.js';

const REQUEST_HEADERS: Record<string, string> = {
  'User-Agent':
    'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/127.0.0.0 Safari/537.36',
  'Accept-Language': 'en-US,en;q=0.9',
  Referer: 'https://www.youtube.com/',
  Origin: 'https://www.youtube.com',
};

const MEDIA_EXTENSIONS = new Set(['.mp4', '.mkv', '.webm', '.mov', '.m4a', '.mp3', '.opus']);

export interface FetcherOptions {
  readonly ffmpegPath?: string;
  readonly ytDlpPath?: string;
  /** Runner used in place of yt-dlp-wrap; the wrapper is loaded lazily when omitted. */
  readonly ytDlp?: YtDlpRunner;
}

const optionalNumber = z.number().nullish().transform((value) => value ?? undefined);

const ytDlpInfoSchema = z.object({
  id: z.string(),
  title: z.string().nullish(),
  uploader: z.string().nullish(),
  channel: z.string().nullish(),
  webpage_url: z.string().nullish(),
  original_url: z.string().nullish(),
  description: z.string().nullish(),
  upload_date: z.string().nullish(),
  duration: optionalNumber,
  view_count: optionalNumber,
  like_count: optionalNumber,
});

/**
 * Maps yt-dlp's `--dump-single-json` output onto the fields the processor needs.
 */
export const parseYtDlpInfo = (raw: string, url: string): MediaInfo => {
  const data = ytDlpInfoSchema.parse(JSON.parse(raw));
  return {
    id: data.id,
    title: data.title ?? 'Unknown',
    uploader: data.uploader ?? data.channel ?? 'Unknown',
    webpageUrl: data.webpage_url ?? data.original_url ?? url,
    description: data.description ?? '',
    uploadDate: data.upload_date ?? undefined,
    durationSeconds: data.duration,
    viewCount: data.view_count,
    likeCount: data.like_count,
  };
};

const toCount = (value: string | number | null | undefined): number | undefined => {
  if (value === null || value === undefined) {
    return undefined;
  }
  const numeric = typeof value === 'number' ? value : Number.parseInt(value, 10);
  return Number.isNaN(numeric) ? undefined : numeric;
};

/**
 * Maps ytdl-core's basic info onto the fields the processor needs.
 */
export const fromYtdlInfo = (info: ytdl.videoInfo, url: string): MediaInfo => {
  const details = info.videoDetails;
  return {
    id: details.videoId,
    title: details.title || 'Unknown',
    uploader: details.ownerChannelName || details.author?.name || 'Unknown',
    webpageUrl: details.video_url || url,
    description: details.description ?? '',
    uploadDate: details.uploadDate || undefined,
    durationSeconds: toCount(details.lengthSeconds),
    viewCount: toCount(details.viewCount),
    likeCount: toCount(details.likes),
  };
};

/**
 * Determines whether we should escalate to the yt-dlp fallback based on the error surface.
 */
export const shouldFallback = (error: unknown): boolean => {
  const message = describeError(error);
  return /Status code: 403/i.test(message) || /Could not parse/i.test(message) || /decipher/i.test(message);
};

export const buildAudioArgs = (
  url: string,
  targetPath: string,
  bitrate: number,
  ffmpegPath?: string,
): string[] => {
  const args = [
    url,
    '-o',
    targetPath,
    '-x',
    '--audio-format',
    'mp3',
    '--audio-quality',
    `${bitrate}K`,
    '--no-playlist',
    '--no-part',
    '--force-overwrites',
    '--newline',
    '--no-warnings',
  ];
  if (ffmpegPath) {
    args.push('--ffmpeg-location', ffmpegPath);
  }
  return args;
};

export const buildVideoArgs = (
  url: string,
  directory: string,
  formatSelector: string,
  ffmpegPath?: string,
): string[] => {
  const args = [
    url,
    '-f',
    formatSelector,
    '-o',
    path.join(directory, '%(title)s.%(ext)s'),
    '--no-playlist',
    '--write-info-json',
    '--write-description',
    '--write-thumbnail',
    '--write-subs',
    '--write-auto-subs',
    '--newline',
    '--no-warnings',
  ];
  if (ffmpegPath) {
    args.push('--ffmpeg-location', ffmpegPath);
  }
  return args;
};

export interface YtDlpEmitter {
  on: (event: string, listener: (...args: unknown[]) => void) => YtDlpEmitter;
  once: (event: string, listener: (...args: unknown[]) => void) => YtDlpEmitter;
}

export interface YtDlpRunner {
  exec: (args: string[], options?: object, abortSignal?: AbortSignal) => YtDlpEmitter;
  execPromise: (args: string[], options?: object, abortSignal?: AbortSignal) => Promise<string>;
}

type YtDlpConstructor = new (binaryPath?: string) => YtDlpRunner;

const ytDlpInstances = new Map<string, Promise<YtDlpRunner>>();

/**
 * yt-dlp-wrap is CommonJS with a transpiled default export, so the constructor sits one or
 * two `default` levels deep depending on the loader.
 */
const resolveConstructor = (loaded: unknown): YtDlpConstructor => {
  let candidate: unknown = loaded;
  for (let depth = 0; depth < 2 && typeof candidate === 'object' && candidate !== null; depth += 1) {
    candidate = 'default' in candidate ? candidate.default : candidate;
  }
  if (typeof candidate !== 'function') {
    throw new Error('yt-dlp-wrap did not export a constructor');
  }
  return candidate as YtDlpConstructor;
};

/**
 * Lazily instantiates the yt-dlp wrapper once per binary path.
 */
const getYtDlp = (binaryPath: string): Promise<YtDlpRunner> => {
  let instance = ytDlpInstances.get(binaryPath);
  if (!instance) {
    instance = import('yt-dlp-wrap').then((module) => {
      const Constructor = resolveConstructor(module);
      return new Constructor(binaryPath);
    });
    ytDlpInstances.set(binaryPath, instance);
  }
  return instance;
};

const readPercent = (raw: unknown): number | null => {
  if (!raw || typeof raw !== 'object' || !('percent' in raw)) {
    return null;
  }
  const percentValue = raw.percent;
  const numeric =
    typeof percentValue === 'number'
      ? percentValue
      : typeof percentValue === 'string'
        ? Number.parseFloat(percentValue.replace('%', ''))
        : Number.NaN;
  return Number.isNaN(numeric) ? null : Math.min(1, Math.max(0, numeric / 100));
};

/**
 * Scans a per-video directory for the downloaded media file.
 */
const findMediaFile = async (directory: string): Promise<string> => {
  const entries = await fs.readdir(directory);
  const media = entries.find((name) => MEDIA_EXTENSIONS.has(path.extname(name).toLowerCase()));
  if (!media) {
    throw new Error(`No media file was written to ${directory}`);
  }
  return path.join(directory, media);
};

/**
 * Production media fetcher: ytdl-core and ffmpeg for YouTube audio, yt-dlp for video,
 * for other hosts, and as the fallback when ytdl-core cannot decode a stream.
 */
export class YoutubeFetcher implements MediaFetcher {
  private readonly ffmpegPath?: string;

  private readonly ytDlpPath: string;

  private readonly ytDlp?: YtDlpRunner;

  constructor(options: FetcherOptions = {}) {
    this.ffmpegPath = options.ffmpegPath;
    this.ytDlpPath = options.ytDlpPath ?? 'yt-dlp';
    this.ytDlp = options.ytDlp;
  }

  async resolve(url: string): Promise<MediaInfo> {
    if (!ytdl.validateURL(url)) {
      return this.resolveWithYtDlp(url);
    }
    try {
      const info = await ytdl.getBasicInfo(url);
      return fromYtdlInfo(info, url);
    } catch (error) {
      if (!shouldFallback(error)) {
        throw error;
      }
      return this.resolveWithYtDlp(url);
    }
  }

  async fetch(request: FetchRequest, onProgress: ProgressCallback): Promise<FetchResult> {
    if (request.mode === 'video') {
      await fs.ensureDir(request.target);
      const args = buildVideoArgs(request.url, request.target, request.formatSelector, this.ffmpegPath);
      const result = await this.runYtDlp(args, onProgress);
      if (result === 'aborted') {
        return { status: 'aborted' };
      }
      return { status: 'completed', filePath: await findMediaFile(request.target) };
    }

    await fs.ensureDir(path.dirname(request.target));
    if (ytdl.validateURL(request.url)) {
      try {
        return await this.downloadWithCore(request, onProgress);
      } catch (error) {
        if (!shouldFallback(error)) {
          throw error;
        }
      }
    }
    const args = buildAudioArgs(request.url, request.target, request.audioBitrate, this.ffmpegPath);
    const result = await this.runYtDlp(args, onProgress);
    return result === 'aborted' ? { status: 'aborted' } : { status: 'completed', filePath: request.target };
  }

  private loadYtDlp(): Promise<YtDlpRunner> {
    return this.ytDlp ? Promise.resolve(this.ytDlp) : getYtDlp(this.ytDlpPath);
  }

  private async resolveWithYtDlp(url: string): Promise<MediaInfo> {
    const ytDlp = await this.loadYtDlp();
    const raw = await ytDlp.execPromise([url, '--dump-single-json', '--skip-download', '--no-playlist', '--no-warnings']);
    return parseYtDlpInfo(raw, url);
  }

  /**
   * Streams the audio track through ffmpeg into a `.part` file and moves it into place.
   */
  private downloadWithCore(request: FetchRequest, onProgress: ProgressCallback): Promise<FetchResult> {
    const tempPath = `${request.target}.part`;

    return new Promise<FetchResult>((resolve, reject) => {
      let settled = false;
      const settle = (outcome: { result: FetchResult } | { error: Error }): void => {
        if (settled) {
          return;
        }
        settled = true;
        if ('error' in outcome) {
          fs.remove(tempPath).then(
            () => reject(outcome.error),
            () => reject(outcome.error),
          );
        } else if (outcome.result.status === 'aborted') {
          fs.remove(tempPath).then(
            () => resolve(outcome.result),
            () => resolve(outcome.result),
          );
        } else {
          resolve(outcome.result);
        }
      };

      const stream = ytdl(request.url, {
        quality: 'highestaudio',
        filter: 'audioonly',
        highWaterMark: 1 << 25,
        dlChunkSize: 1 << 20,
        requestOptions: { headers: REQUEST_HEADERS },
      });

      const command = ffmpeg(stream).audioBitrate(request.audioBitrate).format('mp3');
      if (this.ffmpegPath) {
        command.setFfmpegPath(this.ffmpegPath);
      }

      stream.on('progress', (_chunkLength: number, downloaded: number, total: number) => {
        const fraction = total > 0 ? downloaded / total : 0;
        if (onProgress({ fraction, status: 'Downloading' }) === 'abort') {
          stream.destroy();
          command.kill('SIGKILL');
          settle({ result: { status: 'aborted' } });
        }
      });

      stream.on('error', (error: Error) => settle({ error }));

      command
        .on('error', (error: Error) => settle({ error }))
        .on('end', () => {
          if (settled) {
            return;
          }
          onProgress({ fraction: 1, status: 'Converting' });
          fs.move(tempPath, request.target, { overwrite: true }).then(
            () => settle({ result: { status: 'completed', filePath: request.target } }),
            (error: unknown) => settle({ error: error instanceof Error ? error : new Error(String(error)) }),
          );
        })
        .save(tempPath);
    });
  }

  /**
   * Runs yt-dlp, forwarding its progress and killing the process when the callback aborts.
   */
  private async runYtDlp(args: string[], onProgress: ProgressCallback): Promise<'completed' | 'aborted'> {
    const ytDlp = await this.loadYtDlp();
    const controller = new AbortController();

    return new Promise<'completed' | 'aborted'>((resolve, reject) => {
      const runner = ytDlp.exec(args, {}, controller.signal);
      let status = 'Downloading';

      const forward = (fraction: number): void => {
        if (controller.signal.aborted) {
          return;
        }
        if (onProgress({ fraction, status }) === 'abort') {
          controller.abort();
        }
      };

      runner.on('progress', (raw: unknown) => {
        const fraction = readPercent(raw);
        if (fraction !== null) {
          forward(fraction);
        }
      });
      runner.on('ytDlpEvent', (eventType: unknown) => {
        if (typeof eventType === 'string' && eventType !== 'download') {
          status = `Processing: ${eventType}`;
          forward(1);
        }
      });
      runner.once('error', (error: unknown) => {
        if (controller.signal.aborted) {
          resolve('aborted');
          return;
        }
        reject(error instanceof Error ? error : new Error(String(error)));
      });
      runner.once('close', (code: unknown) => {
        if (controller.signal.aborted) {
          resolve('aborted');
          return;
        }
        if (typeof code !== 'number' || code !== 0) {
          reject(new Error(`yt-dlp exited with code ${String(code)}`));
          return;
        }
        resolve('completed');
      });
    });
  }
}
