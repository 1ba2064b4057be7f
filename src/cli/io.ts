/**
 * @fileoverview Terminal I/O for the CLI
 *
 * Commands write through {@link CliIO} instead of `console` so tests can run
 * them in process with scripted answers.
 */

import { createInterface } from 'node:readline/promises';

export interface Prompt {
  /** Resolves `null` once input has ended (Ctrl-D, closed pipe). */
  ask(question: string): Promise<string | null>;
  close(): void;
}

export interface CliIO {
  out(line: string): void;
  err(line: string): void;
  /** Only interactive commands open stdin. */
  createPrompt(): Prompt;
}

/**
 * Prompt over a readline interface. Lines are queued as they arrive, so input
 * piped in one chunk (`printf '1\n2\n' | docshelf`) answers successive
 * questions instead of being dropped between them.
 */
export function createTerminalPrompt(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): Prompt {
  const terminal = 'isTTY' in input && input.isTTY === true;
  const rl = createInterface({ input, output, terminal });
  const lines: string[] = [];
  const waiting: Array<(line: string | null) => void> = [];
  let closed = false;

  rl.on('line', (line) => {
    const next = waiting.shift();
    if (next) next(line);
    else lines.push(line);
  });
  rl.once('close', () => {
    closed = true;
    for (const next of waiting.splice(0)) next(null);
  });

  return {
    ask(question: string): Promise<string | null> {
      if (closed) {
        output.write(question);
      } else {
        rl.setPrompt(question);
        rl.prompt();
      }
      const buffered = lines.shift();
      if (buffered !== undefined) return Promise.resolve(buffered);
      if (closed) return Promise.resolve(null);
      return new Promise((resolve) => {
        waiting.push(resolve);
      });
    },
    close(): void {
      rl.close();
    },
  };
}

export function createProcessIO(): CliIO {
  return {
    out: (line) => console.log(line),
    err: (line) => console.error(line),
    createPrompt: () => createTerminalPrompt(),
  };
}
