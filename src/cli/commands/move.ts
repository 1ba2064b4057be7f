/**
 * @fileoverview Publish and unpublish
 *
 * Both directions move articles with their relative path unchanged, then
 * regenerate the nav. A failed move stops the run before the nav is touched.
 */

import {
  findArticles,
  listDrafts,
  listPublished,
  relocateArticle,
  type Article,
} from '../../articles/index.js';
import type { SiteConfig } from '../../config/index.js';
import { updateMkdocsNav } from '../../nav/index.js';
import { createError } from '../errors.js';
import type { CommandContext } from './context.js';

export type MoveDirection = 'publish' | 'unpublish';

export interface DirectionSpec {
  sourceRoot: string;
  targetRoot: string;
  /** Past tense used in progress lines, e.g. `Published: llm/rag.md`. */
  done: 'Published' | 'Unpublished';
  candidates(config: SiteConfig): Promise<Article[]>;
}

export function directionSpec(config: SiteConfig, direction: MoveDirection): DirectionSpec {
  if (direction === 'publish') {
    return { sourceRoot: config.draftsDir, targetRoot: config.docsDir, done: 'Published', candidates: listDrafts };
  }
  return { sourceRoot: config.docsDir, targetRoot: config.draftsDir, done: 'Unpublished', candidates: listPublished };
}

export interface MoveSummary {
  direction: MoveDirection;
  moved: string[];
  navUpdate: 'replaced' | 'appended';
}

/**
 * Move the given articles, printing one line per article unless in JSON mode,
 * then regenerate the nav.
 */
export async function applyMoves(
  ctx: CommandContext,
  direction: MoveDirection,
  articles: Article[],
): Promise<MoveSummary> {
  const spec = directionSpec(ctx.config, direction);
  const moved: string[] = [];
  for (const article of articles) {
    await relocateArticle(article, spec.targetRoot, { force: ctx.force });
    moved.push(article.relpath);
    if (!ctx.json) ctx.io.out(`${spec.done}: ${article.relpath}`);
  }

  const result = await updateMkdocsNav(ctx.config);
  if (!ctx.json) ctx.io.out('Updated mkdocs nav.');
  return { direction, moved, navUpdate: result.mode };
}

export async function moveCommand(
  ctx: CommandContext,
  direction: MoveDirection,
  relpaths: string[],
): Promise<number> {
  if (relpaths.length === 0) {
    throw createError('EINVALID_ARGUMENT', `Usage: docshelf ${direction} <path...>`, { direction });
  }
  const spec = directionSpec(ctx.config, direction);
  const articles = findArticles(await spec.candidates(ctx.config), relpaths);
  const summary = await applyMoves(ctx, direction, articles);
  if (ctx.json) ctx.io.out(JSON.stringify(summary, null, 2));
  return 0;
}
