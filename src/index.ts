#!/usr/bin/env node
import path from 'node:path';
import process from 'node:process';
import { stdin, stdout } from 'node:process';
import { createInterface } from 'node:readline/promises';
import fs from 'fs-extra';
import pc from 'picocolors';
import { parseArgs, withQuality, type CliOptions } from './args.js';
import { YoutubeFetcher } from './download.js';
import { describeError, isBatchSetupError } from './errors.js';
import { createMultiBar, renderProgress } from './render.js';
import { startDownloadSession } from './session.js';
import { expandPlaylistEntries, isUrlEntry, readUrlList } from './utils.js';

/**
 * Displays a concise help menu describing supported CLI options.
 */
const printHelp = (): void => {
  console.log('\nBatch media downloader\n');
  console.log('Usage:');
  console.log('  batch-dl links.txt                     # Download every URL listed in links.txt');
  console.log('  batch-dl links.txt -o ./music -q 320 -t 5');
  console.log('  batch-dl -m video -q 720p links.txt    # Video plus metadata, one folder per video');
  console.log('  batch-dl <URL> [<URL> ...]             # URLs given directly');
  console.log('\nList format: one URL per line; blank lines and lines starting with # are ignored.');
  console.log('\nOptions:');
  console.log('  -f, --file <path>          URL list file (also accepted as a positional argument)');
  console.log('  -u, --url <url>            Add a single URL (repeatable)');
  console.log('  -o, --output <dir>         Output directory (default ~/Downloads)');
  console.log('  -m, --mode <audio|video>   Download mp3 audio or full video (default audio)');
  console.log('  -q, --quality <value>      Audio: 128, 192, 320 (default 192)');
  console.log('                             Video: best, 2160p, 1080p, 720p, 480p, worst (default best)');
  console.log('  -t, -c, --threads <n>      Maximum parallel downloads (default 3)');
  console.log('      --concurrency=n        Alternative concurrency syntax');
  console.log('      --ffmpeg <path>        ffmpeg binary to use');
  console.log('      --yt-dlp <path>        yt-dlp binary to use (default: yt-dlp on PATH)');
  console.log('      --no-expand            Keep playlist URLs as single entries');
  console.log('  -v, --version              Show version');
  console.log('  -h, --help                 Show this help message');
  console.log('\nFailed URLs are written to <output>/failed_urls.txt; pass that file back in to retry.');
};

const printVersion = async (): Promise<void> => {
  const packageJson: unknown = await fs.readJson(new URL('../package.json', import.meta.url));
  const version =
    packageJson && typeof packageJson === 'object' && 'version' in packageJson && typeof packageJson.version === 'string'
      ? packageJson.version
      : '0.0.0';
  console.log(version);
};

/**
 * Prompts the user for a URL list file when none was given on an interactive terminal.
 */
const promptForListFile = async (): Promise<string> => {
  const rl = createInterface({ input: stdin, output: stdout });
  try {
    const answer = await rl.question('Path to a URL list file: ');
    return answer.trim();
  } finally {
    rl.close();
  }
};

/**
 * Gathers the URL entries from every list file and direct URL, in the order given.
 */
const collectEntries = async (options: CliOptions): Promise<string[]> => {
  const entries: string[] = [];
  for (const file of options.files) {
    entries.push(...(await readUrlList(path.resolve(process.cwd(), file))));
  }
  entries.push(...options.urls.filter(isUrlEntry).map((url) => url.trim()));

  if (!options.expandPlaylists) {
    return entries;
  }
  const expansion = await expandPlaylistEntries(entries);
  for (const warning of expansion.warnings) {
    console.warn(pc.yellow(warning));
  }
  return expansion.entries;
};

/**
 * Entry point: parses arguments, runs one batch and maps the outcome to an exit code.
 */
const main = async (argv: readonly string[]): Promise<number> => {
  let options = parseArgs(argv);

  if (options.help) {
    printHelp();
    return 0;
  }
  if (options.version) {
    await printVersion();
    return 0;
  }
  if (options.files.length === 0 && options.urls.length === 0) {
    if (!stdin.isTTY) {
      printHelp();
      return 1;
    }
    const listFile = await promptForListFile();
    options = { ...options, files: listFile ? [listFile] : [] };
  }

  try {
    const entries = await collectEntries(options);
    const session = await startDownloadSession({
      urls: entries,
      config: withQuality(options),
      fetcher: (config) => new YoutubeFetcher({ ffmpegPath: config.ffmpegPath, ytDlpPath: config.ytDlpPath }),
    });

    let interrupts = 0;
    const onInterrupt = (): void => {
      interrupts += 1;
      if (interrupts > 1) {
        process.exit(130);
      }
      session.cancel();
    };
    process.on('SIGINT', onInterrupt);

    console.log(pc.cyan(pc.bold(`Starting batch download of ${session.entries.length} URLs (${session.config.mode})`)));
    const rendering = renderProgress(session.channel, createMultiBar());
    try {
      await session.completion;
    } finally {
      await rendering;
      process.off('SIGINT', onInterrupt);
    }
    return 0;
  } catch (error) {
    if (isBatchSetupError(error)) {
      console.error(pc.red(error.message));
      return 1;
    }
    throw error;
  }
};

void main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(pc.red(`Fatal error: ${describeError(error)}`));
    process.exitCode = 1;
  },
);
