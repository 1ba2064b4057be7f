/**
 * @fileoverview Article types
 */

import { posix } from 'node:path';

/** A markdown file addressed by the tree it lives in and its path inside that tree. */
export interface Article {
  /** Absolute path of the tree (docs dir or drafts dir). */
  root: string;
  /** POSIX path relative to `root`, e.g. `llm/rag.md`. */
  relpath: string;
  abspath: string;
  isMarkdown: boolean;
}

export type ArticleTree = 'published' | 'drafts';

export function createArticle(root: string, relpath: string): Article {
  return {
    root,
    relpath,
    abspath: posix.join(root, relpath),
    isMarkdown: posix.extname(relpath).toLowerCase() === '.md',
  };
}
