/**
 * @fileoverview Renders the MkDocs `nav:` block from the docs tree
 *
 * ```yaml
 * nav:
 *   - Home: index.md
 *   - LLM Notes:
 *       - Retrieval Pipelines: llm/rag.md
 *   - About: about.md
 * ```
 */

import { relative } from 'node:path';
import { listMarkdownFiles, readTitle } from '../articles/index.js';
import { toPosix, type SiteConfig } from '../config/index.js';

export interface NavPage {
  title: string;
  /** Path relative to the docs dir. */
  path: string;
}

export interface NavSectionEntries {
  title: string;
  pages: NavPage[];
}

export interface NavTree {
  home: string;
  sections: NavSectionEntries[];
  about: string;
}

const PLAIN_SAFE = /^[\p{L}\p{N}(][^:#'"\[\]\{\},&*!|>%@`\\]*$/u;
const KEYWORD = /^(?:true|false|yes|no|on|off|y|n|null|~)$/i;

/**
 * Emit `value` as a YAML scalar: plain when that reads back as the same string,
 * double-quoted otherwise. JSON string syntax is valid YAML double-quoted style.
 */
export function yamlScalar(value: string): string {
  const plain = PLAIN_SAFE.test(value) && !KEYWORD.test(value) && Number.isNaN(Number(value));
  return plain ? value : JSON.stringify(value);
}

/** Sections without any markdown file are left out. */
export async function buildNavTree(config: SiteConfig): Promise<NavTree> {
  const sections: NavSectionEntries[] = [];
  for (const section of config.sections) {
    const pages: NavPage[] = [];
    for (const file of await listMarkdownFiles(section.dir)) {
      pages.push({
        title: await readTitle(file),
        path: toPosix(relative(config.docsDir, file)),
      });
    }
    if (pages.length > 0) {
      sections.push({ title: section.title, pages });
    }
  }
  return { home: config.homePage, sections, about: config.aboutPage };
}

export function renderNavYaml(tree: NavTree): string {
  const lines: string[] = ['nav:', `  - Home: ${yamlScalar(tree.home)}`];
  for (const section of tree.sections) {
    lines.push(`  - ${yamlScalar(section.title)}:`);
    for (const page of section.pages) {
      lines.push(`      - ${yamlScalar(page.title)}: ${yamlScalar(page.path)}`);
    }
  }
  lines.push(`  - About: ${yamlScalar(tree.about)}`);
  return lines.join('\n') + '\n';
}

export async function renderNav(config: SiteConfig): Promise<string> {
  return renderNavYaml(await buildNavTree(config));
}
