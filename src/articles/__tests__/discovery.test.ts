/**
 * @fileoverview Tests for article discovery
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'node:path';
import { CliError } from '../../cli/errors.js';
import { buildSiteConfig } from '../../config/index.js';
import { createSiteFixture, type SiteFixture } from '../../test/site_fixture.js';
import { findArticles, listDrafts, listMarkdownFiles, listPublished, normalizeRelpath } from '../discovery.js';

describe('article discovery', () => {
  let site: SiteFixture;

  beforeEach(async () => {
    site = await createSiteFixture({
      'docs/index.md': '# Home\n',
      'docs/about.md': '# About\n',
      'docs/llm/rag.md': '# RAG\n',
      'docs/llm/Attention.md': '# Attention\n',
      'docs/llm/index.md': '# LLM overview\n',
      'docs/agents/loops.md': '# Loops\n',
      'docs/agents/diagram.png': 'not markdown',
      'drafts/ai_for_science/provenance.md': '# Provenance\n',
    });
  });

  afterEach(async () => {
    await site.cleanup();
  });

  describe('listMarkdownFiles', () => {
    it('returns markdown files sorted case-insensitively', async () => {
      const files = await listMarkdownFiles(site.path('docs/llm'));

      expect(files).toEqual([
        site.path('docs/llm/Attention.md'),
        site.path('docs/llm/index.md'),
        site.path('docs/llm/rag.md'),
      ]);
    });

    it('returns an empty list for a missing directory', async () => {
      expect(await listMarkdownFiles(site.path('nowhere'))).toEqual([]);
    });
  });

  describe('listPublished', () => {
    it('skips the reserved pages at the docs root only', async () => {
      const articles = await listPublished(buildSiteConfig(site.root));

      expect(articles.map((article) => article.relpath)).toEqual([
        'agents/loops.md',
        'llm/Attention.md',
        'llm/index.md',
        'llm/rag.md',
      ]);
    });

    it('fills in the article paths', async () => {
      const [first] = await listPublished(buildSiteConfig(site.root));

      expect(first).toEqual({
        root: site.path('docs'),
        relpath: 'agents/loops.md',
        abspath: site.path('docs/agents/loops.md'),
        isMarkdown: true,
      });
    });
  });

  describe('listDrafts', () => {
    it('lists every markdown file in the drafts tree', async () => {
      const drafts = await listDrafts(buildSiteConfig(site.root));

      expect(drafts.map((article) => article.relpath)).toEqual(['ai_for_science/provenance.md']);
    });

    it('returns nothing when the drafts tree does not exist', async () => {
      const config = { ...buildSiteConfig(site.root), draftsDir: join(site.root, 'missing') };

      expect(await listDrafts(config)).toEqual([]);
    });
  });

  describe('findArticles', () => {
    it('matches normalized relative paths and drops repeats', async () => {
      const published = await listPublished(buildSiteConfig(site.root));

      const found = findArticles(published, ['./llm/rag.md', 'llm\\rag.md', 'agents/loops.md']);

      expect(found.map((article) => article.relpath)).toEqual(['llm/rag.md', 'agents/loops.md']);
    });

    it('rejects paths that name no article', async () => {
      const published = await listPublished(buildSiteConfig(site.root));

      expect(() => findArticles(published, ['index.md'])).toThrow(CliError);
      expect(() => findArticles(published, ['index.md'])).toThrow('No such article: index.md');
    });
  });

  it('normalizes user input', () => {
    expect(normalizeRelpath(' ./././llm/rag.md ')).toBe('llm/rag.md');
  });
});
