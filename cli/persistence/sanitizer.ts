import fs from 'node:fs/promises';
import path from 'node:path';

export const DEFAULT_SLUG_LENGTH = 80;
const MIN_SLUG_LENGTH = 8;
const FALLBACK_SLUG = 'article';
const EXTENSION = '.html';

// Device names Windows refuses as file names, with or without an extension.
const RESERVED_NAMES = new Set([
  'con', 'prn', 'aux', 'nul',
  'com1', 'com2', 'com3', 'com4', 'com5', 'com6', 'com7', 'com8', 'com9',
  'lpt1', 'lpt2', 'lpt3', 'lpt4', 'lpt5', 'lpt6', 'lpt7', 'lpt8', 'lpt9',
]);

const trimSeparators = (value: string): string => value.replace(/^-+|-+$/g, '');

/**
 * Turns a free-text title into a lowercase slug of letters, digits and single hyphens.
 * Idempotent: feeding a slug back in returns it unchanged.
 */
export const slugify = (title: string, maxLength: number = DEFAULT_SLUG_LENGTH): string => {
  const limit = Math.max(MIN_SLUG_LENGTH, Math.floor(maxLength));
  let slug = trimSeparators(title.normalize('NFC').toLowerCase().replace(/[^\p{L}\p{N}]+/gu, '-'));
  if (RESERVED_NAMES.has(slug)) {
    slug = `${slug}-${FALLBACK_SLUG}`;
  }
  // truncate on code points so surrogate pairs stay whole
  slug = trimSeparators(Array.from(slug).slice(0, limit).join(''));
  return slug || FALLBACK_SLUG;
};

const exists = async (target: string): Promise<boolean> => {
  try {
    await fs.access(target);
    return true;
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return false;
    }
    throw error;
  }
};

/**
 * Picks the first free file name in `directory`: `<base>.html`, then `<base>-1.html`,
 * `<base>-2.html`, ... Returns the file name, not the full path.
 */
export const resolveCollision = async (directory: string, baseName: string): Promise<string> => {
  const first = `${baseName}${EXTENSION}`;
  if (!(await exists(path.join(directory, first)))) {
    return first;
  }
  for (let counter = 1; ; counter += 1) {
    const candidate = `${baseName}-${counter}${EXTENSION}`;
    if (!(await exists(path.join(directory, candidate)))) {
      return candidate;
    }
  }
};
