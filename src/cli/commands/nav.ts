import { updateMkdocsNav } from '../../nav/index.js';
import type { CommandContext } from './context.js';

export async function navCommand(ctx: CommandContext): Promise<number> {
  const result = await updateMkdocsNav(ctx.config);
  if (ctx.json) {
    ctx.io.out(JSON.stringify({ navUpdate: result.mode, nav: result.nav }, null, 2));
  } else {
    ctx.io.out('Updated mkdocs nav.');
  }
  return 0;
}
