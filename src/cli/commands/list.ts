import { listDrafts, listPublished, type Article } from '../../articles/index.js';
import { dirLabel } from '../../config/index.js';
import type { CommandContext } from './context.js';

function printGroup(ctx: CommandContext, heading: string, articles: Article[]): void {
  ctx.io.out(heading);
  if (articles.length === 0) {
    ctx.io.out('  (none)');
    return;
  }
  for (const article of articles) {
    ctx.io.out(`  - ${article.relpath}`);
  }
}

export async function listCommand(ctx: CommandContext): Promise<number> {
  const { config } = ctx;
  const published = await listPublished(config);
  const drafts = await listDrafts(config);

  if (ctx.json) {
    ctx.io.out(
      JSON.stringify(
        {
          published: published.map((article) => article.relpath),
          drafts: drafts.map((article) => article.relpath),
        },
        null,
        2,
      ),
    );
    return 0;
  }

  printGroup(ctx, `Published (${dirLabel(config, config.docsDir)}):`, published);
  ctx.io.out('');
  printGroup(ctx, `Drafts (${dirLabel(config, config.draftsDir)}):`, drafts);
  return 0;
}
