import fs from 'node:fs/promises';
import path from 'node:path';
import type { AppConfig } from '../../shared/config';
import { FilesystemError, describeError } from '../errors';
import type { Logger } from '../obs/logger';
import { resolveCollision, slugify } from './sanitizer';

export interface ArticleStore {
  readonly outputDir: string;
  /** Writes the finished document and returns its absolute path. */
  save: (title: string, html: string) => Promise<string>;
}

const ensureDir = async (dir: string) => {
  try {
    await fs.mkdir(dir, { recursive: true });
  } catch (error) {
    throw new FilesystemError(`Could not create output directory ${dir}: ${describeError(error)}`, dir, { cause: error });
  }
};

const guardPath = (root: string, target: string) => {
  const relative = path.relative(root, target);
  if (relative.startsWith('..') || path.isAbsolute(relative)) {
    throw new FilesystemError(`Attempted to write outside of the output directory: ${target}`, target);
  }
};

export const createFsArticleStore = (config: Pick<AppConfig, 'storage'>, logger?: Logger): ArticleStore => {
  const outputDir = path.resolve(config.storage.outputDir);

  const removeTemp = async (tempPath: string) => {
    try {
      await fs.rm(tempPath, { force: true });
    } catch (error) {
      logger?.warn('Could not remove temporary file', { path: tempPath, error });
    }
  };

  // Written beside the target and renamed into place; the final name never holds a partial document.
  const writeAtomic = async (target: string, contents: string) => {
    const tempPath = path.join(path.dirname(target), `.${path.basename(target)}.${process.pid}.tmp`);
    try {
      await fs.writeFile(tempPath, contents, { encoding: 'utf-8', flag: 'w' });
      await fs.rename(tempPath, target);
    } catch (error) {
      await removeTemp(tempPath);
      throw new FilesystemError(`Could not write ${target}: ${describeError(error)}`, target, { cause: error });
    }
  };

  const save = async (title: string, html: string): Promise<string> => {
    await ensureDir(outputDir);
    const slug = slugify(title, config.storage.maxSlugLength);

    let fileName: string;
    try {
      fileName = await resolveCollision(outputDir, slug);
    } catch (error) {
      throw new FilesystemError(`Could not inspect ${outputDir}: ${describeError(error)}`, outputDir, { cause: error });
    }

    const target = path.join(outputDir, fileName);
    guardPath(outputDir, target);
    await writeAtomic(target, html);
    logger?.debug('Article saved', { path: target, bytes: Buffer.byteLength(html, 'utf-8') });
    return target;
  };

  return { outputDir, save };
};
