/**
 * @fileoverview Argument parsing and command dispatch
 *
 * `runCli` never throws: every failure is turned into an {@link ErrorEnvelope},
 * printed to stderr, and mapped to an exit code.
 */

import { parseArgs } from 'node:util';
import { loadSiteConfig } from '../config/index.js';
import { logDebug, setDebugLogging } from '../telemetry/logger.js';
import { getErrorMessage } from '../utils/errors.js';
import { checkCommand } from './commands/check.js';
import type { CommandContext } from './commands/context.js';
import { interactiveCommand } from './commands/interactive.js';
import { listCommand } from './commands/list.js';
import { moveCommand } from './commands/move.js';
import { navCommand } from './commands/nav.js';
import {
  classifyError,
  createErrorEnvelope,
  formatErrorJson,
  formatErrorWithHints,
  getExitCode,
  type ErrorEnvelope,
} from './errors.js';
import { showHelp } from './help.js';
import { createProcessIO, type CliIO } from './io.js';

type Command = 'interactive' | 'list' | 'publish' | 'unpublish' | 'nav' | 'check' | 'help';

const COMMANDS: readonly Command[] = ['interactive', 'list', 'publish', 'unpublish', 'nav', 'check', 'help'];

function isCommand(value: string): value is Command {
  return COMMANDS.some((command) => command === value);
}

function parseCliArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    options: {
      help: { type: 'boolean', short: 'h', default: false },
      version: { type: 'boolean', short: 'v', default: false },
      workspace: { type: 'string', short: 'w' },
      verbose: { type: 'boolean', default: false },
      json: { type: 'boolean', default: false },
      force: { type: 'boolean', default: false },
      list: { type: 'boolean', default: false },
    },
    allowPositionals: true,
    strict: true,
  });
}

type ParsedArgs = ReturnType<typeof parseCliArgs>;

export interface RunOptions {
  io?: CliIO;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

function outputStructuredError(io: CliIO, envelope: ErrorEnvelope, useJson: boolean): void {
  io.err(useJson ? formatErrorJson(envelope) : formatErrorWithHints(envelope));
}

export async function runCli(argv: string[], options: RunOptions = {}): Promise<number> {
  const io = options.io ?? createProcessIO();
  const jsonMode = argv.includes('--json');

  let parsed: ParsedArgs;
  try {
    parsed = parseCliArgs(argv);
  } catch (error) {
    const envelope = createErrorEnvelope('EINVALID_ARGUMENT', getErrorMessage(error), {
      context: { argv },
    });
    outputStructuredError(io, envelope, jsonMode);
    return getExitCode(envelope);
  }

  const { values, positionals } = parsed;

  if (values.version) {
    const { DOCSHELF_VERSION } = await import('../index.js');
    io.out(`docshelf ${DOCSHELF_VERSION.string}`);
    return 0;
  }

  const requested = values.list ? 'list' : positionals[0] ?? 'interactive';
  const commandArgs = values.list ? positionals : positionals.slice(1);

  if (values.help || requested === 'help') {
    showHelp(io.out, requested === 'help' ? commandArgs[0] : requested);
    return 0;
  }

  if (!isCommand(requested)) {
    const envelope = createErrorEnvelope('EINVALID_ARGUMENT', `Unknown command: ${requested}`, {
      recoveryHints: [
        `Run 'docshelf help' for usage information`,
        `Available commands: ${COMMANDS.join(', ')}`,
      ],
      context: { command: requested },
    });
    outputStructuredError(io, envelope, values.json);
    return getExitCode(envelope);
  }

  if (values.verbose) setDebugLogging(true);

  try {
    const config = await loadSiteConfig({ workspace: values.workspace, env: options.env, cwd: options.cwd });
    logDebug('Resolved site', { workspace: config.workspace, command: requested });
    const ctx: CommandContext = { config, io, json: values.json, force: values.force };

    switch (requested) {
      case 'interactive':
        return await interactiveCommand(ctx);
      case 'list':
        return await listCommand(ctx);
      case 'publish':
      case 'unpublish':
        return await moveCommand(ctx, requested, commandArgs);
      case 'nav':
        return await navCommand(ctx);
      case 'check':
        return await checkCommand(ctx);
      case 'help':
        showHelp(io.out, commandArgs[0]);
        return 0;
    }
  } catch (error) {
    const envelope = classifyError(error);
    envelope.context = { ...envelope.context, command: requested };
    outputStructuredError(io, envelope, values.json);
    return getExitCode(envelope);
  }
}
