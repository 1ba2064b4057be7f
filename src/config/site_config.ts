/**
 * @fileoverview Site configuration
 *
 * Resolves the workspace and the directories the article commands work on.
 * Precedence: `--workspace`, then `DOCSHELF_WORKSPACE`, then the current
 * directory. An optional `docshelf.yml` in the workspace overrides the defaults
 * below.
 */

import { readFile } from 'node:fs/promises';
import { isAbsolute, join, relative, resolve, sep } from 'node:path';
import YAML from 'yaml';
import { createError } from '../cli/errors.js';
import { logDebug } from '../telemetry/logger.js';
import { getErrorMessage, isNotFoundError } from '../utils/errors.js';
import { SiteConfigFileSchema, type NavSectionInput, type SiteConfigFile } from './schema.js';

export const CONFIG_FILE_NAME = 'docshelf.yml';

export interface NavSection {
  title: string;
  /** Absolute path of the section directory. */
  dir: string;
}

export interface SiteConfig {
  workspace: string;
  docsDir: string;
  draftsDir: string;
  mkdocsPath: string;
  /** Nav target of the `Home` entry, relative to the docs dir. */
  homePage: string;
  /** Nav target of the `About` entry, relative to the docs dir. */
  aboutPage: string;
  /** Pages under the docs dir that are never listed or moved as articles. */
  reservedPages: string[];
  sections: NavSection[];
  /** Path of the config file that was applied, if any. */
  configFile?: string;
}

export const DEFAULT_SITE_CONFIG = {
  docsDir: 'docs',
  draftsDir: 'drafts',
  mkdocsFile: 'mkdocs.yml',
  homePage: 'index.md',
  aboutPage: 'about.md',
  sections: [
    { title: 'LLM Notes', dir: 'llm' },
    { title: 'Agent Architectures', dir: 'agents' },
    { title: 'AI for Science', dir: 'ai_for_science' },
  ],
} as const;

export interface LoadSiteConfigOptions {
  workspace?: string;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

export function resolveWorkspace(options: LoadSiteConfigOptions = {}): string {
  const env = options.env ?? process.env;
  const fromEnv = env.DOCSHELF_WORKSPACE?.trim();
  const chosen = options.workspace ?? (fromEnv ? fromEnv : undefined) ?? options.cwd ?? process.cwd();
  return resolve(chosen);
}

export function buildSiteConfig(workspace: string, file: SiteConfigFile = {}): SiteConfig {
  const docsDir = resolve(workspace, file.docsDir ?? DEFAULT_SITE_CONFIG.docsDir);
  const homePage = file.homePage ?? DEFAULT_SITE_CONFIG.homePage;
  const aboutPage = file.aboutPage ?? DEFAULT_SITE_CONFIG.aboutPage;
  const sections: readonly NavSectionInput[] = file.sections ?? DEFAULT_SITE_CONFIG.sections;
  return {
    workspace,
    docsDir,
    draftsDir: resolve(workspace, file.draftsDir ?? DEFAULT_SITE_CONFIG.draftsDir),
    mkdocsPath: resolve(workspace, file.mkdocsFile ?? DEFAULT_SITE_CONFIG.mkdocsFile),
    homePage,
    aboutPage,
    reservedPages: (file.reservedPages ?? [homePage, aboutPage]).map(toPosix),
    sections: sections.map((section) => ({ title: section.title, dir: resolve(docsDir, section.dir) })),
  };
}

/**
 * Load the site configuration for a workspace, applying `docshelf.yml` when present.
 */
export async function loadSiteConfig(options: LoadSiteConfigOptions = {}): Promise<SiteConfig> {
  const workspace = resolveWorkspace(options);
  const configPath = join(workspace, CONFIG_FILE_NAME);

  let raw: string;
  try {
    raw = await readFile(configPath, 'utf8');
  } catch (error) {
    if (isNotFoundError(error)) {
      logDebug('No config file, using defaults', { workspace });
      return buildSiteConfig(workspace);
    }
    throw error;
  }

  const file = parseConfigFile(raw, configPath);
  logDebug('Loaded config file', { configPath });
  return { ...buildSiteConfig(workspace, file), configFile: configPath };
}

export function parseConfigFile(raw: string, configPath: string): SiteConfigFile {
  let data: unknown;
  try {
    data = YAML.parse(raw);
  } catch (error) {
    throw createError('ECONFIG_INVALID', `${configPath} is not valid YAML: ${getErrorMessage(error)}`, {
      configPath,
    });
  }
  // An empty file parses to null; treat it as "no overrides".
  if (data === null || data === undefined) return {};

  const parsed = SiteConfigFileSchema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue && issue.path.length > 0 ? issue.path.join('.') : '(root)';
    throw createError('ECONFIG_INVALID', `${configPath}: ${field}: ${issue?.message ?? 'invalid value'}`, {
      configPath,
      field,
    });
  }
  return parsed.data;
}

/** Directory label for user-facing output, e.g. `docs/`. */
export function dirLabel(config: SiteConfig, dir: string): string {
  const rel = relative(config.workspace, dir);
  if (rel === '' || rel.startsWith('..') || isAbsolute(rel)) return `${toPosix(dir)}/`;
  return `${toPosix(rel)}/`;
}

export function toPosix(path: string): string {
  return path.split(sep).join('/');
}
