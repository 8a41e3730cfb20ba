import path from 'node:path';
import fs from 'fs-extra';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { makeTempDir } from './testing/fakes.js';
import {
  buildVideoDirectoryName,
  candidateName,
  claimAudioPath,
  createUniqueDirectory,
  expandPlaylistEntries,
  isYoutubePlaylistUrl,
  isYoutubeUrl,
  parseUrlList,
  readUrlList,
  sanitizeFileName,
  truncateTitle,
  type PlaylistLoader,
} from './utils.js';

describe('parseUrlList', () => {
  it('keeps trimmed URLs and drops blank and comment lines', () => {
    const raw = 'https://example/a\r\n# comment\n\n  https://example/b  \n   # indented comment\nhttps://example/a\n';

    expect(parseUrlList(raw)).toEqual(['https://example/a', 'https://example/b', 'https://example/a']);
  });
});

describe('sanitizeFileName', () => {
  it('replaces illegal characters and trailing dots', () => {
    expect(sanitizeFileName('AC/DC: Live? <2024>.')).toBe('AC DC Live 2024');
  });
});

describe('buildVideoDirectoryName', () => {
  it('joins uploader and title', () => {
    expect(buildVideoDirectoryName('Some Channel', 'A "Great" Video')).toBe('Some Channel - A Great Video');
  });

  it('caps the name at 100 characters', () => {
    const name = buildVideoDirectoryName('Uploader', 'x'.repeat(200));

    expect(name).toHaveLength(100);
    expect(name.startsWith('Uploader - xxx')).toBe(true);
  });

  it('never splits a character made of two code units', () => {
    const name = buildVideoDirectoryName('U', `${'a'.repeat(95)}\u{1F600}bbb`);

    expect(name).toBe(`U - ${'a'.repeat(95)}\u{1F600}`);
  });

  it('falls back when both parts sanitize to nothing', () => {
    expect(buildVideoDirectoryName('', '???')).toBe('Unknown - Untitled');
  });
});

describe('truncateTitle', () => {
  it('shortens long titles with an ellipsis', () => {
    expect(truncateTitle('abcdefghij', 8)).toBe('abcde...');
    expect(truncateTitle('short', 8)).toBe('short');
  });

  it('counts an emoji as one character', () => {
    expect(truncateTitle('a\u{1F600}bcdef', 5)).toBe('a\u{1F600}...');
    expect(truncateTitle('ab\u{1F600}', 3)).toBe('ab\u{1F600}');
  });
});

describe('candidateName', () => {
  it('keeps suffixed names within the length cap', () => {
    const name = 'x'.repeat(100);

    expect(candidateName(name, 0)).toBe(name);
    expect(candidateName(name, 1)).toBe(`${'x'.repeat(96)} (1)`);
    expect(candidateName(name, 12)).toHaveLength(100);
  });

  it('drops trailing spaces left by the cut', () => {
    expect(candidateName('ab cd', 1, 7)).toBe('ab (1)');
  });
});

describe('URL detection', () => {
  it.each([
    ['https://www.youtube.com/watch?v=abc', true],
    ['https://youtu.be/abc', true],
    ['https://music.youtube.com/watch?v=abc', true],
    ['https://example.com/watch?v=abc', false],
    ['not a url', false],
  ])('isYoutubeUrl(%s) is %s', (input, expected) => {
    expect(isYoutubeUrl(input)).toBe(expected);
  });

  it.each([
    ['https://www.youtube.com/playlist?list=PL123', true],
    ['https://www.youtube.com/watch?v=abc&list=PL123', false],
    ['https://example.com/playlist?list=PL123', false],
  ])('isYoutubePlaylistUrl(%s) is %s', (input, expected) => {
    expect(isYoutubePlaylistUrl(input)).toBe(expected);
  });
});

describe('filesystem helpers', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  it('suffixes colliding directory names', async () => {
    const first = await createUniqueDirectory(dir, 'Chan - Song');
    const second = await createUniqueDirectory(dir, 'Chan - Song');

    expect(path.basename(first)).toBe('Chan - Song');
    expect(path.basename(second)).toBe('Chan - Song (1)');
  });

  it('hands out distinct directories to concurrent callers', async () => {
    const created = await Promise.all([
      createUniqueDirectory(dir, 'Same'),
      createUniqueDirectory(dir, 'Same'),
      createUniqueDirectory(dir, 'Same'),
    ]);

    expect(new Set(created).size).toBe(3);
    expect((await fs.readdir(dir)).sort()).toEqual(['Same', 'Same (1)', 'Same (2)']);
  });

  it('claims mp3 paths from a sanitized title without reusing one', async () => {
    const claimed = await Promise.all([claimAudioPath('Song: Live', dir), claimAudioPath('Song: Live', dir)]);

    expect([...claimed].sort()).toEqual([path.resolve(dir, 'Song Live (1).mp3'), path.resolve(dir, 'Song Live.mp3')]);
    expect(await fs.readFile(path.resolve(dir, 'Song Live.mp3'), 'utf-8')).toBe('');
  });

  it('caps colliding directory names including the suffix', async () => {
    const name = buildVideoDirectoryName('Uploader', 'y'.repeat(200));
    await createUniqueDirectory(dir, name);

    const second = await createUniqueDirectory(dir, name);

    expect(path.basename(second)).toHaveLength(100);
    expect(path.basename(second).endsWith('y (1)')).toBe(true);
  });

  it('reads a URL list file', async () => {
    const listFile = path.join(dir, 'links.txt');
    await fs.writeFile(listFile, '\uFEFFhttps://example/a\n# skip\nhttps://example/b\n');

    expect(await readUrlList(listFile)).toEqual(['https://example/a', 'https://example/b']);
  });

  it('treats a missing list file as fatal', async () => {
    await expect(readUrlList(path.join(dir, 'missing.txt'))).rejects.toMatchObject({
      name: 'BatchSetupError',
      code: 'INPUT_UNREADABLE',
    });
  });
});

describe('expandPlaylistEntries', () => {
  it('replaces playlists with their videos and keeps playlists that fail to load', async () => {
    const loader: PlaylistLoader = async (url) => {
      if (url.endsWith('PL1')) {
        return {
          items: [
            { url: 'https://www.youtube.com/watch?v=x&list=PL1', shortUrl: 'https://youtu.be/x' },
            { url: 'https://www.youtube.com/watch?v=y' },
          ],
        };
      }
      throw new Error('not found');
    };

    const expansion = await expandPlaylistEntries(
      ['https://youtu.be/a', 'https://www.youtube.com/playlist?list=PL1', 'https://www.youtube.com/playlist?list=BAD'],
      loader,
    );

    expect(expansion.entries).toEqual([
      'https://youtu.be/a',
      'https://youtu.be/x',
      'https://www.youtube.com/watch?v=y',
      'https://www.youtube.com/playlist?list=BAD',
    ]);
    expect(expansion.warnings).toEqual(['Playlist load failed (https://www.youtube.com/playlist?list=BAD) :: not found']);
  });
});
