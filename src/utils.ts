import path from 'node:path';
import fs from 'fs-extra';
import ytpl from 'ytpl';
import { MAX_DIRECTORY_NAME_LENGTH } from './config.js';
import { BatchSetupError, describeError } from './errors.js';

/**
 * Whether a raw line is a URL entry rather than a blank line or a `#` comment.
 */
export const isUrlEntry = (line: string): boolean => {
  const trimmed = line.trim();
  return trimmed.length > 0 && !trimmed.startsWith('#');
};

/**
 * Trims entries and drops blank and comment lines; duplicates are kept.
 */
export const filterUrlEntries = (lines: readonly string[]): string[] =>
  lines.filter(isUrlEntry).map((line) => line.trim());

export const parseUrlList = (raw: string): string[] => filterUrlEntries(raw.split(/\r?\n/));

/**
 * Reads a UTF-8 URL list; a missing or unreadable file is fatal for the batch.
 */
export const readUrlList = async (filePath: string): Promise<string[]> => {
  const exists = await fs.pathExists(filePath);
  if (!exists) {
    throw new BatchSetupError('INPUT_UNREADABLE', `Input file not found: ${filePath}`);
  }
  try {
    const raw = await fs.readFile(filePath, 'utf-8');
    return parseUrlList(raw.replace(/^\uFEFF/, ''));
  } catch (error) {
    throw new BatchSetupError('INPUT_UNREADABLE', `Could not read ${filePath}: ${describeError(error)}`, {
      cause: error,
    });
  }
};

/**
 * Sanitizes possible file names so they are safe to write to the filesystem.
 */
export const sanitizeFileName = (value: string): string =>
  value
    .replace(/[<>:"/\\|?*\u0000-\u001f]/g, ' ')
    .replace(/\s+/g, ' ')
    .trim()
    .replace(/[.\s]+$/u, '');

const sliceCodePoints = (value: string, maxLength: number): string => Array.from(value).slice(0, maxLength).join('');

/**
 * Directory name for a video: `uploader - title`, sanitized and capped in length.
 */
export const buildVideoDirectoryName = (uploader: string, title: string): string => {
  const owner = sanitizeFileName(uploader) || 'Unknown';
  const name = sanitizeFileName(title) || 'Untitled';
  return sliceCodePoints(`${owner} - ${name}`, MAX_DIRECTORY_NAME_LENGTH).replace(/[.\s]+$/u, '');
};

const isAlreadyExists = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'EEXIST';

/**
 * `name` for the first claim, `name (n)` after that, with the base shortened so the
 * whole name stays within `maxLength` characters.
 */
export const candidateName = (name: string, counter: number, maxLength = MAX_DIRECTORY_NAME_LENGTH): string => {
  if (counter === 0) {
    return sliceCodePoints(name, maxLength);
  }
  const suffix = ` (${counter})`;
  const base = sliceCodePoints(name, maxLength - suffix.length).replace(/[.\s]+$/u, '');
  return `${base}${suffix}`;
};

/**
 * Creates a fresh directory under `baseDir`, appending ` (n)` until the name is free.
 * Uses exclusive mkdir so concurrent callers never receive the same directory.
 */
export const createUniqueDirectory = async (baseDir: string, name: string): Promise<string> => {
  await fs.ensureDir(baseDir);
  for (let counter = 0; ; counter += 1) {
    const candidate = path.resolve(baseDir, candidateName(name, counter));
    try {
      await fs.mkdir(candidate);
      return candidate;
    } catch (error) {
      if (!isAlreadyExists(error)) {
        throw error;
      }
    }
  }
};

/**
 * Claims `<baseName><extension>` under `baseDir` by creating it empty with the exclusive
 * `wx` flag, moving on to `<baseName> (n)<extension>` while the name is taken.
 */
export const claimUniqueFile = async (baseDir: string, baseName: string, extension: string): Promise<string> => {
  await fs.ensureDir(baseDir);
  for (let counter = 0; ; counter += 1) {
    const candidate = path.resolve(baseDir, `${candidateName(baseName, counter, Number.POSITIVE_INFINITY)}${extension}`);
    try {
      await fs.writeFile(candidate, '', { flag: 'wx' });
      return candidate;
    } catch (error) {
      if (!isAlreadyExists(error)) {
        throw error;
      }
    }
  }
};

/**
 * Truncates long titles so progress bars and status lines remain readable in narrower terminals.
 */
export const truncateTitle = (value: string, maxLength = 42): string =>
  Array.from(value).length <= maxLength ? value : `${sliceCodePoints(value, maxLength - 3)}...`;

/**
 * Claims a fresh mp3 path for a title, so two items with the same title never share a file.
 */
export const claimAudioPath = (title: string, baseDir: string): Promise<string> =>
  claimUniqueFile(baseDir, sanitizeFileName(title) || 'Untitled', '.mp3');

/**
 * Detects whether a given string looks like a direct YouTube URL.
 */
export const isYoutubeUrl = (input: string): boolean => {
  try {
    const parsed = new URL(input);
    return /(^|\.)youtube\.com$/.test(parsed.hostname) || parsed.hostname === 'youtu.be';
  } catch {
    return false;
  }
};

/**
 * Detects a playlist page (a `/playlist` path with a `list` parameter); watch URLs that
 * merely carry a `list` parameter still address a single video.
 */
export const isYoutubePlaylistUrl = (input: string): boolean => {
  if (!isYoutubeUrl(input)) {
    return false;
  }
  const parsed = new URL(input);
  return parsed.pathname.startsWith('/playlist') && parsed.searchParams.has('list');
};

export interface PlaylistItem {
  readonly url: string;
  readonly shortUrl?: string;
}

export type PlaylistLoader = (url: string) => Promise<{ readonly items: readonly PlaylistItem[] }>;

const loadPlaylist: PlaylistLoader = (url) => ytpl(url, { limit: Infinity });

export interface PlaylistExpansion {
  readonly entries: string[];
  readonly warnings: string[];
}

/**
 * Replaces every playlist URL with one entry per contained video. A playlist that
 * cannot be loaded stays in the list as-is, so it fails (and is retried) as one item.
 */
export const expandPlaylistEntries = async (
  entries: readonly string[],
  loader: PlaylistLoader = loadPlaylist,
): Promise<PlaylistExpansion> => {
  const expanded: string[] = [];
  const warnings: string[] = [];

  for (const entry of entries) {
    if (!isYoutubePlaylistUrl(entry)) {
      expanded.push(entry);
      continue;
    }
    try {
      const playlist = await loader(entry);
      const urls = playlist.items
        .map((item) => item.shortUrl ?? item.url)
        .filter((url) => url.length > 0);
      if (urls.length === 0) {
        warnings.push(`Playlist has no playable videos: ${entry}`);
      }
      expanded.push(...urls);
    } catch (error) {
      warnings.push(`Playlist load failed (${entry}) :: ${describeError(error)}`);
      expanded.push(entry);
    }
  }

  return { entries: expanded, warnings };
};
