/**
 * @fileoverview Article discovery
 *
 * Lists the markdown files of the published and drafts trees. Ordering is by
 * lower-cased absolute path, compared code point by code point, so the list
 * and the generated nav agree on every platform.
 */

import { stat } from 'node:fs/promises';
import { relative } from 'node:path';
import { glob } from 'glob';
import { createError } from '../cli/errors.js';
import { toPosix, type SiteConfig } from '../config/index.js';
import { isNotFoundError } from '../utils/errors.js';
import { createArticle, type Article } from './types.js';

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch (error) {
    if (isNotFoundError(error)) return false;
    throw error;
  }
}

function compareFolded(a: string, b: string): number {
  const left = a.toLowerCase();
  const right = b.toLowerCase();
  if (left < right) return -1;
  if (left > right) return 1;
  return 0;
}

/**
 * Every regular `*.md` file under `root`, recursively. A missing root yields `[]`.
 */
export async function listMarkdownFiles(root: string): Promise<string[]> {
  if (!(await isDirectory(root))) return [];
  const files = await glob('**/*.md', {
    cwd: root,
    absolute: true,
    nodir: true,
    dot: true,
  });
  return files.sort(compareFolded);
}

/** Published articles: the docs tree minus the reserved pages at its root. */
export async function listPublished(config: SiteConfig): Promise<Article[]> {
  const reserved = new Set(config.reservedPages);
  const articles: Article[] = [];
  for (const file of await listMarkdownFiles(config.docsDir)) {
    const rel = toPosix(relative(config.docsDir, file));
    if (reserved.has(rel)) continue;
    articles.push(createArticle(toPosix(config.docsDir), rel));
  }
  return articles;
}

export async function listDrafts(config: SiteConfig): Promise<Article[]> {
  const files = await listMarkdownFiles(config.draftsDir);
  return files.map((file) => createArticle(toPosix(config.draftsDir), toPosix(relative(config.draftsDir, file))));
}

export function normalizeRelpath(input: string): string {
  return input.trim().replace(/\\/g, '/').replace(/^(\.\/)+/, '');
}

/**
 * Resolve user-supplied relative paths against a listing. Fails on the first
 * path that names no article; repeated paths are returned once.
 */
export function findArticles(articles: Article[], requested: string[]): Article[] {
  const byPath = new Map(articles.map((article): [string, Article] => [article.relpath, article]));
  const found = new Map<string, Article>();
  for (const raw of requested) {
    const relpath = normalizeRelpath(raw);
    const article = byPath.get(relpath);
    if (!article) {
      throw createError('EARTICLE_NOT_FOUND', `No such article: ${relpath}`, { relpath });
    }
    found.set(relpath, article);
  }
  return [...found.values()];
}
