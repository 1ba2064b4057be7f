/**
 * @fileoverview docshelf - article management for MkDocs sites
 *
 * Articles live either in the published tree (`docs/`) or in `drafts/`.
 * Moving one regenerates the `nav:` section of `mkdocs.yml` from the
 * published tree, titling each page by its first `# ` heading.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { loadSiteConfig, listDrafts, relocateArticle, updateMkdocsNav } from 'docshelf';
 *
 * const config = await loadSiteConfig({ workspace: '/path/to/site' });
 * for (const draft of await listDrafts(config)) {
 *   await relocateArticle(draft, config.docsDir, { force: false });
 * }
 * await updateMkdocsNav(config);
 * ```
 *
 * @packageDocumentation
 */

export * from './articles/index.js';
export * from './config/index.js';
export * from './nav/index.js';
export {
  DIAGRAM_OPTIONS,
  initializeDiagrams,
  isMermaidLike,
  type MermaidLike,
  type MermaidOptions,
  type MermaidSecurityLevel,
  type MermaidTheme,
} from './diagrams/mermaid_init.js';
export { parseSelection, type Selection } from './cli/selection.js';
export { runCli, type RunOptions } from './cli/run.js';
export { CliError, classifyError, type ErrorCode, type ErrorEnvelope } from './cli/errors.js';

export const DOCSHELF_VERSION = {
  major: 0,
  minor: 1,
  patch: 0,
  string: '0.1.0',
} as const;
