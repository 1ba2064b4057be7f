/**
 * @fileoverview Moves articles between the published and drafts trees
 */

import type { Stats } from 'node:fs';
import { copyFile, mkdir, rename, stat, unlink } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { createError } from '../cli/errors.js';
import { logDebug } from '../telemetry/logger.js';
import { getErrnoCode, isNotFoundError } from '../utils/errors.js';
import type { Article } from './types.js';

export interface MoveOptions {
  /** Replace an existing destination file. Never replaces a directory. */
  force: boolean;
}

async function statOrUndefined(path: string): Promise<Stats | undefined> {
  try {
    return await stat(path);
  } catch (error) {
    if (isNotFoundError(error)) return undefined;
    throw error;
  }
}

/**
 * Move `srcRoot/relpath` to `dstRoot/relpath`, creating parent directories.
 * Returns the destination path.
 */
export async function moveArticle(
  srcRoot: string,
  dstRoot: string,
  relpath: string,
  options: MoveOptions,
): Promise<string> {
  const src = join(srcRoot, relpath);
  const dst = join(dstRoot, relpath);
  await mkdir(dirname(dst), { recursive: true });

  const existing = await statOrUndefined(dst);
  if (existing) {
    if (!options.force) {
      throw createError('EDESTINATION_EXISTS', `Destination exists: ${dst}`, { destination: dst });
    }
    if (existing.isDirectory()) {
      throw createError('EDESTINATION_IS_DIRECTORY', `Destination is a directory: ${dst}`, { destination: dst });
    }
    await unlink(dst);
  }

  try {
    await rename(src, dst);
  } catch (error) {
    if (getErrnoCode(error) !== 'EXDEV') throw error;
    // Trees on different devices: rename cannot cross, so copy then remove.
    await copyFile(src, dst);
    await unlink(src);
  }
  logDebug('Moved article', { src, dst });
  return dst;
}

/** Move an article into another tree, keeping its relative path. */
export async function relocateArticle(article: Article, dstRoot: string, options: MoveOptions): Promise<string> {
  return moveArticle(article.root, dstRoot, article.relpath, options);
}
