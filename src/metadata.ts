import path from 'node:path';
import fs from 'fs-extra';
import type { MediaInfo } from './types.js';

export const METADATA_FILE = 'video_metadata.json';
export const README_FILE = 'README.md';

const DESCRIPTION_LIMIT = 1000;

export interface VideoMetadata {
  readonly title: string;
  readonly uploader: string;
  readonly upload_date: string;
  readonly duration: number;
  readonly view_count: number;
  readonly like_count: number;
  readonly url: string;
}

export const toVideoMetadata = (info: MediaInfo): VideoMetadata => ({
  title: info.title,
  uploader: info.uploader,
  upload_date: info.uploadDate ?? 'Unknown',
  duration: info.durationSeconds ?? 0,
  view_count: info.viewCount ?? 0,
  like_count: info.likeCount ?? 0,
  url: info.webpageUrl,
});

export const renderReadme = (info: MediaInfo): string => {
  const description = info.description.trim().length > 0 ? info.description : 'No description.';
  const excerpt =
    description.length > DESCRIPTION_LIMIT ? `${description.slice(0, DESCRIPTION_LIMIT)}...` : description;
  return [
    `# ${info.title}`,
    '',
    `**Channel:** ${info.uploader}`,
    '',
    `**Source:** ${info.webpageUrl}`,
    '',
    '## Description',
    '',
    excerpt,
    '',
  ].join('\n');
};

export interface SidecarReport {
  readonly written: string[];
  readonly errors: string[];
}

/**
 * Writes the JSON metadata and human-readable README next to a downloaded video.
 * Each file is attempted independently; failures are returned rather than thrown.
 */
export const writeSidecars = async (directory: string, info: MediaInfo): Promise<SidecarReport> => {
  const written: string[] = [];
  const errors: string[] = [];

  const attempt = async (fileName: string, write: (filePath: string) => Promise<void>): Promise<void> => {
    const filePath = path.join(directory, fileName);
    try {
      await write(filePath);
      written.push(filePath);
    } catch (error) {
      errors.push(`${fileName}: ${error instanceof Error ? error.message : String(error)}`);
    }
  };

  await attempt(METADATA_FILE, (filePath) => fs.writeJson(filePath, toVideoMetadata(info), { spaces: 2 }));
  await attempt(README_FILE, (filePath) => fs.writeFile(filePath, renderReadme(info), 'utf-8'));

  return { written, errors };
};
