/**
 * Value model and coercion rules
 *
 * Every operator and conversion goes through here so the evaluator never
 * inspects value kinds on its own.
 */

import { typeError } from './errors.js';
import type {
  AbsentValue,
  BooleanValue,
  NumberValue,
  StringValue,
  Value,
} from './types.js';

export const ABSENT: AbsentValue = { kind: 'absent' };

export function num(value: number): NumberValue {
  return { kind: 'number', value };
}

export function str(value: string): StringValue {
  return { kind: 'string', value };
}

export function bool(value: boolean): BooleanValue {
  return { kind: 'boolean', value };
}

const NUMERIC_TEXT = /^[+-]?\d+(\.\d+)?$/;

/** Parse text as a decimal number, or null when it is not one */
function parseNumericText(text: string): number | null {
  const trimmed = text.trim();
  return NUMERIC_TEXT.test(trimmed) ? Number(trimmed) : null;
}

/**
 * Render a value the way `print` and `str()` show it
 */
export function toDisplayString(value: Value): string {
  switch (value.kind) {
    case 'string':
      return value.value;
    case 'number':
    case 'boolean':
      return String(value.value);
    case 'absent':
      return '';
  }
}

export function toInt(value: Value): NumberValue {
  switch (value.kind) {
    case 'number':
      return num(Math.trunc(value.value));
    case 'boolean':
      return num(value.value ? 1 : 0);
    case 'string': {
      const parsed = parseNumericText(value.value);
      if (parsed === null) {
        throw typeError(`int() cannot convert '${value.value}'`);
      }
      return num(Math.trunc(parsed));
    }
    case 'absent':
      throw typeError('int() cannot convert an absent value');
  }
}

export function isTruthy(value: Value): boolean {
  switch (value.kind) {
    case 'boolean':
      return value.value;
    case 'number':
      return value.value !== 0;
    case 'string':
      return value.value !== '';
    case 'absent':
      return false;
  }
}

export type ArithmeticOperator = '+' | '-' | '*' | '/' | '%';

export type ComparisonOperator = '<' | '>' | '<=' | '>=' | '==' | '!=';

export function applyArithmetic(
  op: ArithmeticOperator,
  left: Value,
  right: Value
): Value {
  if (op === '+' && left.kind === 'string' && right.kind === 'string') {
    return str(left.value + right.value);
  }
  if (left.kind !== 'number' || right.kind !== 'number') {
    throw typeError(
      `unsupported operand kinds for ${op}: ${left.kind} and ${right.kind}`
    );
  }
  switch (op) {
    case '+':
      return num(left.value + right.value);
    case '-':
      return num(left.value - right.value);
    case '*':
      return num(left.value * right.value);
    case '/':
    case '%':
      if (right.value === 0) {
        throw typeError(op === '/' ? 'division by zero' : 'modulo by zero');
      }
      return num(op === '/' ? left.value / right.value : left.value % right.value);
  }
}

/** Numeric reading used by comparisons, or null when the value is not numeric */
function numericView(value: Value): number | null {
  if (value.kind === 'number') return value.value;
  if (value.kind === 'string') return parseNumericText(value.value);
  return null;
}

function compareOrdered<T extends number | string>(
  op: ComparisonOperator,
  a: T,
  b: T
): boolean {
  switch (op) {
    case '<':
      return a < b;
    case '>':
      return a > b;
    case '<=':
      return a <= b;
    case '>=':
      return a >= b;
    case '==':
      return a === b;
    case '!=':
      return a !== b;
  }
}

export function applyComparison(
  op: ComparisonOperator,
  left: Value,
  right: Value
): BooleanValue {
  if (left.kind === 'absent' || right.kind === 'absent') {
    if (op === '==') return bool(left.kind === right.kind);
    if (op === '!=') return bool(left.kind !== right.kind);
    throw typeError(`cannot order an absent value with ${op}`);
  }

  const a = numericView(left);
  const b = numericView(right);
  if (a !== null && b !== null) {
    return bool(compareOrdered(op, a, b));
  }
  return bool(compareOrdered(op, toDisplayString(left), toDisplayString(right)));
}
