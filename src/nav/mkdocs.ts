/**
 * @fileoverview Reads and rewrites the `nav:` section of mkdocs.yml
 *
 * The nav is treated as the tail of the file: everything from the `nav:` line
 * to the end is replaced. The rest of the file is never parsed, so MkDocs tags
 * such as `!!python/name:` elsewhere in the config are left alone.
 */

import { readFile, writeFile } from 'node:fs/promises';
import { basename } from 'node:path';
import YAML from 'yaml';
import { createError } from '../cli/errors.js';
import type { SiteConfig } from '../config/index.js';
import { logDebug } from '../telemetry/logger.js';
import { isNotFoundError } from '../utils/errors.js';
import { renderNav } from './render.js';

const NAV_LINE = /^nav:\s*$/m;

export type NavUpdateMode = 'replaced' | 'appended';

export interface NavUpdateResult {
  mode: NavUpdateMode;
  nav: string;
}

export async function readMkdocs(config: SiteConfig): Promise<string> {
  try {
    return await readFile(config.mkdocsPath, 'utf8');
  } catch (error) {
    if (isNotFoundError(error)) {
      throw createError(
        'EMKDOCS_MISSING',
        `Missing ${basename(config.mkdocsPath)} in ${config.workspace}.`,
        { mkdocsPath: config.mkdocsPath },
      );
    }
    throw error;
  }
}

/**
 * Splice a rendered nav block into mkdocs.yml text. Line endings are
 * normalized to `\n` so the kept head and the new nav agree.
 */
export function spliceNav(raw: string, nav: string): { text: string; mode: NavUpdateMode } {
  const text = raw.replace(/\r\n?/g, '\n');
  const match = NAV_LINE.exec(text);
  if (!match) {
    const base = text.endsWith('\n') ? text : `${text}\n`;
    return { text: `${base}\n${nav}`, mode: 'appended' };
  }
  return { text: text.slice(0, match.index) + nav, mode: 'replaced' };
}

/**
 * Regenerate the nav from the docs tree and write it into mkdocs.yml.
 */
export async function updateMkdocsNav(config: SiteConfig): Promise<NavUpdateResult> {
  const text = await readMkdocs(config);
  const nav = await renderNav(config);
  const spliced = spliceNav(text, nav);
  await writeFile(config.mkdocsPath, spliced.text, 'utf8');
  logDebug('Wrote mkdocs nav', { mkdocsPath: config.mkdocsPath, mode: spliced.mode });
  return { mode: spliced.mode, nav };
}

function collectPaths(node: unknown, into: string[]): void {
  if (typeof node === 'string') {
    into.push(node);
    return;
  }
  if (Array.isArray(node)) {
    for (const item of node) collectPaths(item, into);
    return;
  }
  if (node !== null && typeof node === 'object') {
    for (const value of Object.values(node)) collectPaths(value, into);
  }
}

/**
 * Page paths referenced by the current nav, in order and without repeats.
 * External links are skipped. A file without a nav yields `[]`.
 */
export async function readNavEntries(config: SiteConfig): Promise<string[]> {
  const text = await readMkdocs(config);
  const match = NAV_LINE.exec(text);
  if (!match) return [];

  const parsed: unknown = YAML.parse(text.slice(match.index));
  const nav = parsed !== null && typeof parsed === 'object' && 'nav' in parsed ? parsed.nav : undefined;
  const paths: string[] = [];
  collectPaths(nav, paths);
  return [...new Set(paths.filter((path) => !path.includes('://')))];
}
