/**
 * Shared formatting utilities
 */

import * as path from 'path';

import type { SourcePosition, Statement } from '../script/types.js';
import { TRUNCATE_STATEMENT } from './constants.js';

/**
 * Show a file relative to the working directory when it lives below it
 */
export function displayPath(file: string, cwd: string = process.cwd()): string {
  const relative = path.relative(cwd, file);
  if (relative === '' || relative.startsWith('..') || path.isAbsolute(relative)) {
    return file;
  }
  return relative;
}

/**
 * Format a source position as file:line
 */
export function formatPosition(
  position: SourcePosition,
  cwd: string = process.cwd()
): string {
  return `${displayPath(position.file, cwd)}:${position.line}`;
}

/**
 * Single-line preview of a statement, e.g. `print 'hello'`
 */
export function previewStatement(statement: Statement): string {
  const text = statement.args
    ? `${statement.kind} ${statement.args}`
    : statement.kind;
  const cleaned = text.replace(/[\r\n]+/g, ' ');
  return cleaned.length > TRUNCATE_STATEMENT
    ? cleaned.slice(0, TRUNCATE_STATEMENT) + '...'
    : cleaned;
}
