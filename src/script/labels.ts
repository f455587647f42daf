/**
 * Per-body section tables and jump resolution
 */

import { nameError, syntaxError } from './errors.js';
import { parseSectionId } from './lexer.js';
import type { Body, LabelTable, Statement } from './types.js';

/**
 * Record each `section <id>` as id -> offset of the statement after it
 */
export function buildLabelTable(statements: Statement[]): LabelTable {
  const labels: LabelTable = new Map();

  for (const [index, statement] of statements.entries()) {
    if (statement.kind !== 'section') continue;

    const id = parseSectionId(statement.args);
    if (labels.has(id)) {
      throw syntaxError(`duplicate section ${id}`, statement.position);
    }
    labels.set(id, index + 1);
  }

  return labels;
}

/**
 * Check that every jump in the body targets one of its own sections
 */
export function checkJumpTargets(body: Body): void {
  for (const statement of body.statements) {
    if (statement.kind !== 'gotoif' && statement.kind !== 'goto') continue;

    const id = parseSectionId(statement.args);
    if (!body.labels.has(id)) {
      throw nameError(
        `section ${id} is not defined in ${body.name}`,
        statement.position
      );
    }
  }
}

/**
 * Build a body with its label table, rejecting unresolved jumps
 */
export function resolveBody(name: string, statements: Statement[]): Body {
  const body: Body = { name, statements, labels: buildLabelTable(statements) };
  checkJumpTargets(body);
  return body;
}

/**
 * Look up a jump target that resolution already guaranteed
 */
export function jumpTarget(body: Body, statement: Statement): number {
  const id = parseSectionId(statement.args);
  const offset = body.labels.get(id);
  if (offset === undefined) {
    throw nameError(`section ${id} is not defined in ${body.name}`, statement.position);
  }
  return offset;
}
