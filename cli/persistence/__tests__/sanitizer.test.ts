import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { resolveCollision, slugify } from '../sanitizer';

const SAFE_SLUG_RE = /^[\p{L}\p{N}]+(?:-[\p{L}\p{N}]+)*$/u;

describe('slugify', () => {
  it('lowercases and joins words with single hyphens', () => {
    expect(slugify('Test Title')).toBe('test-title');
    expect(slugify('Hello, World!')).toBe('hello-world');
    expect(slugify('  --Multiple   spaces & symbols??  ')).toBe('multiple-spaces-symbols');
  });

  it('strips characters that are illegal in file names', () => {
    expect(slugify('a/b\\c:d*e?f"g<h>i|j')).toBe('a-b-c-d-e-f-g-h-i-j');
  });

  it('keeps non-latin letters', () => {
    expect(slugify('Café déjà vu')).toBe('café-déjà-vu');
    expect(slugify('日本語のタイトル')).toBe('日本語のタイトル');
  });

  it('falls back to a fixed name when nothing usable is left', () => {
    expect(slugify('!!!')).toBe('article');
    expect(slugify('')).toBe('article');
  });

  it('renames reserved device names', () => {
    expect(slugify('CON')).toBe('con-article');
    expect(slugify('lpt1')).toBe('lpt1-article');
  });

  it('truncates without leaving a trailing separator', () => {
    expect(slugify('a'.repeat(100))).toHaveLength(80);
    expect(slugify('abc def ghi', 8)).toBe('abc-def');
    expect(slugify('abcdefghijkl', 3)).toBe('abcdefgh');
  });

  it('truncates on code points', () => {
    const result = slugify('𝒜'.repeat(10), 8);
    expect(result).toBe('𝒜'.repeat(8));
    expect(Array.from(result)).toHaveLength(8);
  });

  it('is idempotent and only emits safe characters', () => {
    const titles = [
      'Test Title',
      'Why I Stopped Using Classes -- and What I Use Now',
      '10 Tips: Faster Builds (2024 Edition)',
      'Ünïcödé Everywhere…',
      'aux',
      '   ',
      'x'.repeat(300),
      'A “quoted” title — with dashes',
    ];
    for (const title of titles) {
      const once = slugify(title);
      expect(slugify(once)).toBe(once);
      expect(once).toMatch(SAFE_SLUG_RE);
    }
  });
});

describe('resolveCollision', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'article-reader-slug-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('returns the plain name in an empty directory', async () => {
    await expect(resolveCollision(dir, 'base')).resolves.toBe('base.html');
  });

  it('appends the smallest free numeric suffix', async () => {
    await fs.writeFile(path.join(dir, 'base.html'), '');
    await expect(resolveCollision(dir, 'base')).resolves.toBe('base-1.html');

    await fs.writeFile(path.join(dir, 'base-1.html'), '');
    await expect(resolveCollision(dir, 'base')).resolves.toBe('base-2.html');
  });

  it('fills gaps in increasing order', async () => {
    await fs.writeFile(path.join(dir, 'base.html'), '');
    await fs.writeFile(path.join(dir, 'base-2.html'), '');
    await expect(resolveCollision(dir, 'base')).resolves.toBe('base-1.html');
  });

  it('gives the same answer for the same directory state', async () => {
    await fs.writeFile(path.join(dir, 'base.html'), '');
    const first = await resolveCollision(dir, 'base');
    const second = await resolveCollision(dir, 'base');
    expect(second).toBe(first);
  });
});
