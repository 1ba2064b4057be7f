/**
 * @fileoverview Tests for site configuration loading
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, writeFile, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { CliError } from '../../cli/errors.js';
import {
  buildSiteConfig,
  dirLabel,
  loadSiteConfig,
  parseConfigFile,
  resolveWorkspace,
} from '../site_config.js';

describe('site config', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = join(tmpdir(), `docshelf-config-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await mkdir(testDir, { recursive: true });
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  describe('resolveWorkspace', () => {
    it('prefers the explicit workspace over the environment', () => {
      const workspace = resolveWorkspace({
        workspace: '/sites/explicit',
        env: { DOCSHELF_WORKSPACE: '/sites/env' },
        cwd: '/sites/cwd',
      });
      expect(workspace).toBe('/sites/explicit');
    });

    it('falls back to DOCSHELF_WORKSPACE, then the cwd', () => {
      expect(resolveWorkspace({ env: { DOCSHELF_WORKSPACE: '/sites/env' }, cwd: '/sites/cwd' })).toBe('/sites/env');
      expect(resolveWorkspace({ env: { DOCSHELF_WORKSPACE: '  ' }, cwd: '/sites/cwd' })).toBe('/sites/cwd');
    });
  });

  describe('buildSiteConfig', () => {
    it('applies the default layout', () => {
      const config = buildSiteConfig('/site');

      expect(config.docsDir).toBe('/site/docs');
      expect(config.draftsDir).toBe('/site/drafts');
      expect(config.mkdocsPath).toBe('/site/mkdocs.yml');
      expect(config.reservedPages).toEqual(['index.md', 'about.md']);
      expect(config.sections).toEqual([
        { title: 'LLM Notes', dir: '/site/docs/llm' },
        { title: 'Agent Architectures', dir: '/site/docs/agents' },
        { title: 'AI for Science', dir: '/site/docs/ai_for_science' },
      ]);
    });

    it('resolves section dirs against a custom docs dir', () => {
      const config = buildSiteConfig('/site', {
        docsDir: 'content',
        sections: [{ title: 'Notes', dir: 'notes' }],
      });
      expect(config.sections).toEqual([{ title: 'Notes', dir: '/site/content/notes' }]);
    });
  });

  describe('loadSiteConfig', () => {
    it('returns defaults when no config file exists', async () => {
      const config = await loadSiteConfig({ workspace: testDir });

      expect(config.workspace).toBe(testDir);
      expect(config.docsDir).toBe(join(testDir, 'docs'));
      expect(config.configFile).toBeUndefined();
    });

    it('applies overrides from docshelf.yml', async () => {
      await writeFile(join(testDir, 'docshelf.yml'), 'draftsDir: unpublished\nreservedPages: [index.md]\n');

      const config = await loadSiteConfig({ workspace: testDir });

      expect(config.draftsDir).toBe(join(testDir, 'unpublished'));
      expect(config.reservedPages).toEqual(['index.md']);
      expect(config.configFile).toBe(join(testDir, 'docshelf.yml'));
    });

    it('treats an empty config file as no overrides', async () => {
      await writeFile(join(testDir, 'docshelf.yml'), '');

      const config = await loadSiteConfig({ workspace: testDir });

      expect(config.draftsDir).toBe(join(testDir, 'drafts'));
    });
  });

  describe('parseConfigFile', () => {
    it('names the offending field', () => {
      let caught: unknown;
      try {
        parseConfigFile('sections:\n  - title: Notes\n', '/site/docshelf.yml');
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(CliError);
      if (caught instanceof CliError) {
        expect(caught.code).toBe('ECONFIG_INVALID');
        expect(caught.context?.field).toBe('sections.0.dir');
      }
    });

    it('rejects unknown keys', () => {
      expect(() => parseConfigFile('docs: content\n', '/site/docshelf.yml')).toThrow(CliError);
    });

    it('rejects malformed YAML', () => {
      expect(() => parseConfigFile('docsDir: [unclosed\n', '/site/docshelf.yml')).toThrow(/not valid YAML/);
    });
  });

  it('labels directories relative to the workspace', () => {
    const config = buildSiteConfig('/site');
    expect(dirLabel(config, config.docsDir)).toBe('docs/');
    expect(dirLabel(config, '/elsewhere/drafts')).toBe('/elsewhere/drafts/');
  });
});
