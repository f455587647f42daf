/**
 * Script lexer
 *
 * Splits source text into `keyword args;` statements:
 * - `#` starts a comment that runs to the end of the line
 * - `;` terminates a statement (quoted text may contain either)
 * - empty statements are dropped
 */

import { isScriptError, syntaxError } from './errors.js';
import { parseExpression } from './expression.js';
import type { SourcePosition, Statement, StatementKind } from './types.js';

const KEYWORDS: readonly StatementKind[] = [
  'set',
  'mem',
  'copy',
  'print',
  'read',
  'out',
  'call',
  'alias',
  'endalias',
  'section',
  'gotoif',
  'goto',
  'include',
  'free',
  'isset',
  'typeof',
  'pass',
];

const VARIABLE_PATTERN = /^\$([A-Za-z_][A-Za-z0-9_]*)$/;
const ALIAS_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_.]*$/;
const SECTION_ID_PATTERN = /^\d+$/;

function isKeyword(word: string): word is StatementKind {
  return KEYWORDS.some((keyword) => keyword === word);
}

/** Get character at position, or empty string if out of bounds */
function charAt(input: string, pos: number): string {
  return input[pos] ?? '';
}

/**
 * Parse whitespace-separated `$name` operands, returning names without sigil
 */
export function parseVariableList(args: string): string[] {
  const trimmed = args.trim();
  if (trimmed === '') return [];

  return trimmed.split(/\s+/).map((token) => {
    const match = VARIABLE_PATTERN.exec(token);
    if (!match?.[1]) {
      throw syntaxError(`expected a variable like $name, got '${token}'`);
    }
    return match[1];
  });
}

export function parseSectionId(args: string): number {
  const trimmed = args.trim();
  if (!SECTION_ID_PATTERN.test(trimmed)) {
    throw syntaxError(`section id must be a non-negative integer, got '${trimmed}'`);
  }
  return Number(trimmed);
}

export function parseAliasName(args: string): string {
  const trimmed = args.trim();
  if (!ALIAS_NAME_PATTERN.test(trimmed)) {
    throw syntaxError(`invalid alias name '${trimmed}'`);
  }
  return trimmed;
}

function expectVariableCount(
  keyword: StatementKind,
  args: string,
  min: number,
  max: number
): void {
  const count = parseVariableList(args).length;
  if (count < min || count > max) {
    const expected =
      min === max
        ? `${min}`
        : max === Infinity
          ? `at least ${min}`
          : `${min} or ${max}`;
    throw syntaxError(`${keyword} takes ${expected} variable(s), got ${count}`);
  }
}

/**
 * Check operand shapes that can be known without evaluating anything
 */
function validateArguments(kind: StatementKind, args: string): void {
  switch (kind) {
    case 'set':
    case 'free':
      expectVariableCount(kind, args, 1, Infinity);
      return;
    case 'read':
    case 'isset':
      expectVariableCount(kind, args, 1, 1);
      return;
    case 'copy':
      expectVariableCount(kind, args, 1, 2);
      return;
    case 'mem':
    case 'print':
    case 'typeof':
    case 'include':
      if (args.trim() === '') {
        throw syntaxError(`${kind} requires an expression`);
      }
      parseExpression(args);
      return;
    case 'out':
      if (args.trim() !== '' && args.trim() !== '^') {
        throw syntaxError(`out only writes the register (^), got '${args.trim()}'`);
      }
      return;
    case 'call':
    case 'alias':
      parseAliasName(args);
      return;
    case 'section':
    case 'gotoif':
    case 'goto':
      parseSectionId(args);
      return;
    case 'endalias':
    case 'pass':
      if (args.trim() !== '') {
        throw syntaxError(`${kind} takes no arguments`);
      }
      return;
  }
}

/**
 * Parse the text of one statement (without its terminator)
 */
export function parseStatement(
  text: string,
  position: SourcePosition
): Statement {
  const trimmed = text.trim();
  const keywordMatch = /^[A-Za-z_]+/.exec(trimmed);
  const word = keywordMatch?.[0] ?? '';
  const rest = trimmed.slice(word.length);

  if (!word || (rest !== '' && !/^\s/.test(rest))) {
    throw syntaxError(
      `expected a keyword, got '${trimmed.split(/\s+/)[0] ?? trimmed}'`,
      position
    );
  }
  if (!isKeyword(word)) {
    throw syntaxError(`unknown keyword '${word}'`, position);
  }

  const args = rest.trim();
  try {
    validateArguments(word, args);
  } catch (error) {
    throw isScriptError(error) ? error.at(position) : error;
  }

  return { kind: word, args, position };
}

/**
 * Split script text into statements
 */
export function lex(content: string, file: string): Statement[] {
  const statements: Statement[] = [];
  let current = '';
  let line = 1;
  let startLine = 0; // 0 = no visible text yet
  let quote: string | null = null;
  let quoteLine = 0;
  let i = 0;

  while (i < content.length) {
    const char = charAt(content, i);

    if (quote) {
      current += char;
      if (char === '\\' && i + 1 < content.length) {
        const next = charAt(content, i + 1);
        current += next;
        if (next === '\n') line++;
        i += 2;
        continue;
      }
      if (char === '\n') line++;
      if (char === quote) quote = null;
      i++;
      continue;
    }

    if (char === '#') {
      // Comment: skip to end of line, keep the newline for line counting
      while (i < content.length && charAt(content, i) !== '\n') i++;
      continue;
    }

    if (char === ';') {
      if (startLine > 0) {
        statements.push(parseStatement(current, { file, line: startLine }));
      }
      current = '';
      startLine = 0;
      i++;
      continue;
    }

    if (char === "'" || char === '"') {
      quote = char;
      quoteLine = line;
    }
    if (startLine === 0 && !/\s/.test(char)) {
      startLine = line;
    }
    if (char === '\n') line++;
    current += char;
    i++;
  }

  if (quote) {
    throw syntaxError('unterminated string', { file, line: quoteLine });
  }
  if (startLine > 0) {
    throw syntaxError("missing ';' at end of input", { file, line: startLine });
  }

  return statements;
}
