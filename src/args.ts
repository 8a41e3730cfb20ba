import process from 'node:process';
import {
  audioQualitySchema,
  configFromEnv,
  downloadModeSchema,
  videoQualitySchema,
  type JobConfigInput,
} from './config.js';

export interface CliOptions {
  readonly files: string[];
  readonly urls: string[];
  readonly config: JobConfigInput;
  readonly expandPlaylists: boolean;
  readonly quality?: string;
  readonly help: boolean;
  readonly version: boolean;
}

const looksLikeUrl = (value: string): boolean => /^https?:\/\//i.test(value);

/**
 * Parses incoming CLI arguments and resolves the effective batch configuration.
 * Numeric values are handed to the config schema as given so invalid ones are rejected there.
 */
export const parseArgs = (argv: readonly string[], env: NodeJS.ProcessEnv = process.env): CliOptions => {
  const config: JobConfigInput = { ...configFromEnv(env) };
  const files: string[] = [];
  const urls: string[] = [];
  let quality: string | undefined;
  let expandPlaylists = true;
  let help = false;
  let version = false;

  const args = [...argv];
  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];
    const next = args[i + 1];
    switch (arg) {
      case '--help':
      case '-h':
        help = true;
        break;
      case '--version':
      case '-v':
        version = true;
        break;
      case '--file':
      case '-f':
        if (next) {
          files.push(next);
          i += 1;
        }
        break;
      case '--url':
      case '-u':
        if (next) {
          urls.push(next);
          i += 1;
        }
        break;
      case '--output':
      case '-o':
        if (next) {
          config.outputDir = next;
          i += 1;
        }
        break;
      case '--mode':
      case '-m': {
        if (next) {
          const mode = downloadModeSchema.safeParse(next);
          if (!mode.success) {
            throw new Error(`Unknown mode "${next}" (expected audio or video)`);
          }
          config.mode = mode.data;
          i += 1;
        }
        break;
      }
      case '--quality':
      case '-q':
        if (next) {
          quality = next;
          i += 1;
        }
        break;
      case '--concurrency':
      case '--threads':
      case '-c':
      case '-t':
        if (next) {
          config.maxWorkers = Number(next);
          i += 1;
        }
        break;
      case '--ffmpeg':
        if (next) {
          config.ffmpegPath = next;
          i += 1;
        }
        break;
      case '--yt-dlp':
        if (next) {
          config.ytDlpPath = next;
          i += 1;
        }
        break;
      case '--no-expand':
        expandPlaylists = false;
        break;
      default: {
        if (arg.startsWith('--concurrency=') || arg.startsWith('--threads=')) {
          config.maxWorkers = Number(arg.split('=')[1] ?? '');
          break;
        }
        if (arg.startsWith('-')) {
          throw new Error(`Unknown option: ${arg}`);
        }
        if (looksLikeUrl(arg)) {
          urls.push(arg);
        } else {
          files.push(arg);
        }
        break;
      }
    }
  }

  return { files, urls, config, expandPlaylists, quality, help, version };
};

/**
 * Applies `--quality` to whichever quality field the selected mode uses.
 */
export const withQuality = (options: CliOptions): JobConfigInput => {
  if (options.quality === undefined) {
    return options.config;
  }
  const value = options.quality.trim().toLowerCase().replace(/k(bps)?$/, '');

  if (options.config.mode === 'video') {
    const parsed = videoQualitySchema.safeParse(value);
    if (!parsed.success) {
      throw new Error(`Unsupported video quality "${options.quality}" (expected ${videoQualitySchema.options.join(', ')})`);
    }
    return { ...options.config, videoQuality: parsed.data };
  }

  const parsed = audioQualitySchema.safeParse(value);
  if (!parsed.success) {
    throw new Error(`Unsupported audio quality "${options.quality}" (expected ${audioQualitySchema.options.join(', ')})`);
  }
  return { ...options.config, audioQuality: parsed.data };
};
