/**
 * Console implementations of the interpreter's I/O seams
 */

import * as readline from 'readline';

import type { ScriptInput, ScriptOutput } from '../core/interpreter.js';

export interface ConsoleInput extends ScriptInput {
  close(): void;
}

/**
 * Write script output straight to a stream (stdout by default)
 */
export function createConsoleOutput(
  stream: NodeJS.WritableStream = process.stdout
): ScriptOutput {
  return {
    write(text: string): void {
      stream.write(text);
    },
  };
}

/**
 * Read lines from a stream (stdin by default)
 * The stream is only attached on the first read, so scripts that never
 * read do not hold stdin open.
 */
export function createConsoleInput(
  stream: NodeJS.ReadableStream = process.stdin
): ConsoleInput {
  let rl: readline.Interface | null = null;
  let lines: AsyncIterableIterator<string> | null = null;

  return {
    async readLine(): Promise<string | null> {
      if (!lines) {
        rl = readline.createInterface({ input: stream, terminal: false });
        lines = rl[Symbol.asyncIterator]();
      }
      const next = await lines.next();
      return next.done ? null : next.value;
    },
    close(): void {
      rl?.close();
    },
  };
}
