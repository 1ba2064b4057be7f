import { access } from 'node:fs/promises';
import { isAbsolute, join, relative } from 'node:path';
import { listPublished } from '../articles/index.js';
import type { SiteConfig } from '../config/index.js';
import { isNotFoundError } from '../utils/errors.js';
import { readNavEntries } from './mkdocs.js';

export interface NavCheckReport {
  /** Nav entries whose file is not in the docs tree. */
  missing: string[];
  /** Published articles under a nav section that the nav does not mention. */
  unlisted: string[];
  /** Published articles outside every nav section; `docshelf nav` never lists these. */
  unsectioned: string[];
}

function isWithin(dir: string, path: string): boolean {
  const rel = relative(dir, path);
  return rel !== '' && !rel.startsWith('..') && !isAbsolute(rel);
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch (error) {
    if (isNotFoundError(error)) return false;
    throw error;
  }
}

export async function checkNav(config: SiteConfig): Promise<NavCheckReport> {
  const entries = await readNavEntries(config);
  const missing: string[] = [];
  for (const entry of entries) {
    if (!(await exists(join(config.docsDir, entry)))) missing.push(entry);
  }

  const listed = new Set(entries);
  const unlisted: string[] = [];
  const unsectioned: string[] = [];
  for (const article of await listPublished(config)) {
    if (listed.has(article.relpath)) continue;
    const inSection = config.sections.some((section) => isWithin(section.dir, article.abspath));
    (inSection ? unlisted : unsectioned).push(article.relpath);
  }

  return { missing, unlisted, unsectioned };
}

export function isInSync(report: NavCheckReport): boolean {
  return report.missing.length === 0 && report.unlisted.length === 0 && report.unsectioned.length === 0;
}
