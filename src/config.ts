import os from 'node:os';
import path from 'node:path';
import { z } from 'zod';
import { BatchSetupError } from './errors.js';

export const DEFAULT_CONCURRENCY = 3;
export const DEFAULT_OUTPUT_DIR = path.join(os.homedir(), 'Downloads');
export const FAILED_URLS_FILE = 'failed_urls.txt';
export const MAX_DIRECTORY_NAME_LENGTH = 100;

export const downloadModeSchema = z.enum(['audio', 'video']);
export const audioQualitySchema = z.enum(['128', '192', '320']);
export const videoQualitySchema = z.enum(['best', '2160p', '1080p', '720p', '480p', 'worst']);

export type AudioQuality = z.infer<typeof audioQualitySchema>;
export type VideoQuality = z.infer<typeof videoQualitySchema>;

/**
 * yt-dlp format selectors for each video quality choice.
 */
export const VIDEO_FORMAT_SELECTORS: Record<VideoQuality, string> = {
  best: 'bestvideo[ext=mp4]+bestaudio[ext=m4a]/best[ext=mp4]/best',
  '2160p':
    'bestvideo[height<=2160][ext=mp4]+bestaudio[ext=m4a]/best[height<=2160][ext=mp4]/best[height<=2160]',
  '1080p':
    'bestvideo[height<=1080][ext=mp4]+bestaudio[ext=m4a]/best[height<=1080][ext=mp4]/best[height<=1080]',
  '720p':
    'bestvideo[height<=720][ext=mp4]+bestaudio[ext=m4a]/best[height<=720][ext=mp4]/best[height<=720]',
  '480p': 'best[height<=480][ext=mp4]/best[height<=480]',
  worst: 'worstvideo[ext=mp4]+worstaudio[ext=m4a]/worst[ext=mp4]/worst',
};

export const jobConfigSchema = z
  .object({
    outputDir: z.string().trim().min(1).default(DEFAULT_OUTPUT_DIR),
    mode: downloadModeSchema.default('audio'),
    audioQuality: audioQualitySchema.default('192'),
    videoQuality: videoQualitySchema.default('best'),
    maxWorkers: z.coerce.number().int().positive().default(DEFAULT_CONCURRENCY),
    ffmpegPath: z.string().min(1).optional(),
    ytDlpPath: z.string().min(1).optional(),
  })
  .strict();

export type JobConfigInput = z.input<typeof jobConfigSchema>;
export type JobConfig = Readonly<z.output<typeof jobConfigSchema>>;

/**
 * Validates a raw configuration once, before the batch starts, and freezes it.
 */
export const resolveJobConfig = (input: unknown): JobConfig => {
  const parsed = jobConfigSchema.safeParse(input ?? {});
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : 'config'}: ${issue.message}`)
      .join('; ');
    throw new BatchSetupError('INVALID_CONFIG', `Invalid configuration (${details})`, { cause: parsed.error });
  }
  return Object.freeze({ ...parsed.data, outputDir: path.resolve(parsed.data.outputDir) });
};

export const formatSelectorFor = (config: JobConfig): string => VIDEO_FORMAT_SELECTORS[config.videoQuality];

export const audioBitrateFor = (config: JobConfig): number => Number.parseInt(config.audioQuality, 10);

/**
 * Reads configuration overrides from the environment; invalid values are left for the schema to reject.
 */
export const configFromEnv = (env: NodeJS.ProcessEnv = process.env): JobConfigInput => {
  const input: JobConfigInput = {};
  const concurrency = env.DOWNLOAD_CONCURRENCY?.trim();
  if (concurrency) {
    input.maxWorkers = Number(concurrency);
  }
  if (env.DOWNLOAD_DIR?.trim()) {
    input.outputDir = env.DOWNLOAD_DIR.trim();
  }
  if (env.FFMPEG_PATH?.trim()) {
    input.ffmpegPath = env.FFMPEG_PATH.trim();
  }
  if (env.YT_DLP_PATH?.trim()) {
    input.ytDlpPath = env.YT_DLP_PATH.trim();
  }
  return input;
};
