import { dirLabel } from '../../config/index.js';
import { checkNav, isInSync } from '../../nav/index.js';
import { ExitCodes } from '../errors.js';
import type { CommandContext } from './context.js';

export async function checkCommand(ctx: CommandContext): Promise<number> {
  const report = await checkNav(ctx.config);
  const inSync = isInSync(report);

  if (ctx.json) {
    ctx.io.out(JSON.stringify({ inSync, ...report }, null, 2));
  } else if (inSync) {
    ctx.io.out(`Nav is in sync with ${dirLabel(ctx.config, ctx.config.docsDir)}`);
  } else {
    if (report.missing.length > 0) {
      ctx.io.out('Nav entries without a file:');
      for (const entry of report.missing) ctx.io.out(`  - ${entry}`);
    }
    if (report.unlisted.length > 0) {
      ctx.io.out('Published articles missing from nav:');
      for (const entry of report.unlisted) ctx.io.out(`  - ${entry}`);
    }
    if (report.missing.length > 0 || report.unlisted.length > 0) {
      ctx.io.out('Run `docshelf nav` to regenerate the nav.');
    }
    if (report.unsectioned.length > 0) {
      ctx.io.out('Published articles outside every nav section:');
      for (const entry of report.unsectioned) ctx.io.out(`  - ${entry}`);
      ctx.io.out('Move them into a section directory or add a section in docshelf.yml.');
    }
  }
  return inSync ? ExitCodes.SUCCESS : ExitCodes.FAILURE;
}
