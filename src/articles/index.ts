/**
 * @fileoverview Articles
 *
 * Discovery, titles and moves for the markdown articles of a site.
 *
 * @packageDocumentation
 */

export { createArticle, type Article, type ArticleTree } from './types.js';
export {
  findArticles,
  listDrafts,
  listMarkdownFiles,
  listPublished,
  normalizeRelpath,
} from './discovery.js';
export { extractHeading, readTitle, titleFromStem } from './title.js';
export { moveArticle, relocateArticle, type MoveOptions } from './mover.js';
