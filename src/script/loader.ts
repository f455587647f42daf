/**
 * Script loading and include expansion
 *
 * Includes are spliced in before anything runs, so aliases and sections
 * from included files behave as if written inline.
 */

import * as fs from 'fs';
import * as path from 'path';

import { extractAliases, MAIN_BODY_NAME } from './aliases.js';
import { includeCycleError, ioError, isScriptError, typeError } from './errors.js';
import { evaluate } from './expression.js';
import { resolveBody } from './labels.js';
import { lex } from './lexer.js';
import { createSymbolTable } from './symbols.js';
import type { Program, SourcePosition, Statement, Value } from './types.js';

/**
 * Bookkeeping threaded through one expansion
 */
interface ExpansionState {
  /** Absolute paths currently being expanded, outermost first */
  stack: string[];
  /** Every file read, in first-read order */
  files: string[];
}

function readScriptFile(file: string, includedFrom?: SourcePosition): string {
  if (!fs.existsSync(file)) {
    throw ioError(
      includedFrom ? `cannot read included file ${file}` : `Script not found: ${file}`,
      includedFrom
    );
  }
  try {
    return fs.readFileSync(file, 'utf-8');
  } catch (error) {
    const msg = error instanceof Error ? error.message : String(error);
    throw ioError(`cannot read ${file}: ${msg}`, includedFrom);
  }
}

/**
 * Evaluate an include argument to an absolute path
 * Only literals are available: nothing has executed yet
 */
function resolveIncludePath(statement: Statement): string {
  let target: Value;
  try {
    target = evaluate(statement.args, createSymbolTable());
  } catch (error) {
    throw isScriptError(error) ? error.at(statement.position) : error;
  }
  if (target.kind !== 'string') {
    throw typeError(`include path must be a string, got ${target.kind}`, statement.position);
  }
  return path.resolve(path.dirname(statement.position.file), target.value);
}

function describeCycle(stack: string[], repeated: string): string {
  const start = stack.indexOf(repeated);
  return [...stack.slice(start), repeated]
    .map((file) => path.basename(file))
    .join(' -> ');
}

function expandWith(statements: Statement[], state: ExpansionState): Statement[] {
  const expanded: Statement[] = [];

  for (const statement of statements) {
    if (statement.kind !== 'include') {
      expanded.push(statement);
      continue;
    }

    const target = resolveIncludePath(statement);
    if (state.stack.includes(target)) {
      throw includeCycleError(
        `include cycle: ${describeCycle(state.stack, target)}`,
        statement.position
      );
    }
    expanded.push(...loadFile(target, state, statement.position));
  }

  return expanded;
}

function loadFile(
  file: string,
  state: ExpansionState,
  includedFrom?: SourcePosition
): Statement[] {
  const content = readScriptFile(file, includedFrom);
  if (!state.files.includes(file)) state.files.push(file);

  state.stack.push(file);
  try {
    return expandWith(lex(content, file), state);
  } finally {
    state.stack.pop();
  }
}

/**
 * Replace every include statement with the statements of its target,
 * recursively. A stream without includes comes back unchanged.
 *
 * @param statements - Statements to expand
 * @param inProgress - Absolute paths already being expanded by the caller
 */
export function expandIncludes(
  statements: Statement[],
  inProgress: string[] = []
): Statement[] {
  return expandWith(statements, { stack: [...inProgress], files: [] });
}

/**
 * Register aliases and resolve labels for an expanded stream
 */
export function buildProgram(statements: Statement[], files: string[]): Program {
  const { main, aliases } = extractAliases(statements);
  return {
    main: resolveBody(MAIN_BODY_NAME, main),
    aliases,
    files,
  };
}

/**
 * Build a program from source text attributed to `file`
 * Relative includes resolve against the directory of `file`
 */
export function loadProgramFromSource(content: string, file: string): Program {
  const absolute = path.resolve(file);
  const state: ExpansionState = { stack: [absolute], files: [absolute] };
  const statements = expandWith(lex(content, absolute), state);
  return buildProgram(statements, state.files);
}

/**
 * Load, expand and resolve a script file
 *
 * @param scriptFile - Path to the entry script
 * @returns Program ready to run; every static error has been raised
 */
export function loadProgram(scriptFile: string): Program {
  const state: ExpansionState = { stack: [], files: [] };
  const statements = loadFile(path.resolve(scriptFile), state);
  return buildProgram(statements, state.files);
}
