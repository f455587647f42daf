/**
 * Script error rendering with call trace
 */

import type { ScriptError } from '../script/errors.js';
import { formatPosition } from '../utils/formatting.js';

/** Trace lines shown before the rest are summarized */
const MAX_TRACE_LINES = 10;

/**
 * Render an error as plain text
 * Example:
 *   NameError: variable $x is not declared
 *       at lib.mem:4
 *       in fib, called at main.mem:2
 */
export function renderScriptError(
  error: ScriptError,
  cwd: string = process.cwd()
): string {
  const lines = [`${error.kind}: ${error.message}`];

  if (error.position) {
    lines.push(`    at ${formatPosition(error.position, cwd)}`);
  }

  // Innermost call first
  const frames = [...error.trace].reverse();
  for (const frame of frames.slice(0, MAX_TRACE_LINES)) {
    lines.push(`    in ${frame.alias}, called at ${formatPosition(frame.callSite, cwd)}`);
  }
  if (frames.length > MAX_TRACE_LINES) {
    lines.push(`    ... ${frames.length - MAX_TRACE_LINES} more calls`);
  }

  return lines.join('\n');
}
