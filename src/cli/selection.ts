/**
 * @fileoverview Parsing of interactive item selections such as `1 2 5-7`
 */

import { createError } from './errors.js';

export type Selection =
  | { kind: 'quit' }
  /** 1-based indices, ascending and unique. Empty means the user cancelled. */
  | { kind: 'selected'; indices: number[] };

const QUIT_WORDS = new Set(['q', 'quit', 'exit']);
const NUMBER = /^\d+$/;
const RANGE = /^(\d+)-(\d+)$/;

export function isQuitWord(input: string): boolean {
  return QUIT_WORDS.has(input.trim().toLowerCase());
}

/**
 * Parse a selection against a list of `count` items.
 *
 * Tokens are separated by commas or whitespace. `a-b` is inclusive and may be
 * written backwards. Numbers outside `1..count` are dropped, but a selection
 * that keeps nothing is an error.
 */
export function parseSelection(raw: string, count: number): Selection {
  const input = raw.trim();
  if (input === '') return { kind: 'selected', indices: [] };
  if (isQuitWord(input)) return { kind: 'quit' };

  const picked = new Set<number>();
  for (const token of input.split(/[,\s]+/)) {
    if (token === '') continue;

    const range = RANGE.exec(token);
    if (range) {
      let start = Number(range[1]);
      let end = Number(range[2]);
      if (start > end) [start, end] = [end, start];
      for (let i = Math.max(start, 1); i <= Math.min(end, count); i++) {
        picked.add(i);
      }
      continue;
    }

    if (!NUMBER.test(token)) {
      throw createError('EINVALID_SELECTION', `Invalid selection: ${token}`, { token });
    }
    const value = Number(token);
    if (value >= 1 && value <= count) picked.add(value);
  }

  if (picked.size === 0) {
    throw createError('EINVALID_SELECTION', 'No valid selections.', { input });
  }
  return { kind: 'selected', indices: [...picked].sort((a, b) => a - b) };
}
