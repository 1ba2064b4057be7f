import { mkdir } from 'node:fs/promises';
import type { Article } from '../../articles/index.js';
import { dirLabel } from '../../config/index.js';
import { createError } from '../errors.js';
import { isQuitWord, parseSelection } from '../selection.js';
import type { CommandContext } from './context.js';
import { listCommand } from './list.js';
import { applyMoves, directionSpec, type MoveDirection } from './move.js';

const CHOICES = new Map<string, MoveDirection>([
  ['1', 'unpublish'],
  ['2', 'publish'],
]);

export async function interactiveCommand(ctx: CommandContext): Promise<number> {
  const { config, io } = ctx;
  await mkdir(config.draftsDir, { recursive: true });

  const unpublish = directionSpec(config, 'unpublish');
  const publish = directionSpec(config, 'publish');
  const route = (spec: typeof publish): string =>
    `move ${dirLabel(config, spec.sourceRoot)} -> ${dirLabel(config, spec.targetRoot)}`;

  const prompt = io.createPrompt();
  try {
    io.out('Choose an action:');
    io.out(`  1) Unpublish (${route(unpublish)})`);
    io.out(`  2) Publish   (${route(publish)})`);
    io.out('  3) List');

    const answer = await prompt.ask('Enter 1/2/3 (or q): ');
    if (answer === null) return 0;
    const choice = answer.trim().toLowerCase();
    if (isQuitWord(choice)) return 0;
    if (choice === '3') return await listCommand({ ...ctx, json: false });

    const direction = CHOICES.get(choice);
    if (!direction) {
      throw createError('EINVALID_CHOICE', 'Invalid choice.', { choice });
    }

    const candidates = await directionSpec(config, direction).candidates(config);
    if (candidates.length === 0) {
      io.out(`No articles available to ${direction}.`);
      return 0;
    }

    candidates.forEach((article, i) => {
      io.out(`${String(i + 1).padStart(2)}. ${article.relpath}`);
    });
    const raw = await prompt.ask('Select items (e.g. 1 2 5-7), Enter to cancel: ');
    if (raw === null) return 0;

    const selection = parseSelection(raw, candidates.length);
    if (selection.kind === 'quit') return 0;

    const picked = selection.indices.flatMap((index): Article[] => {
      const article = candidates[index - 1];
      return article ? [article] : [];
    });
    await applyMoves({ ...ctx, json: false }, direction, picked);
    return 0;
  } finally {
    prompt.close();
  }
}
