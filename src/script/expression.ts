/**
 * Expression parsing and evaluation
 *
 * Grammar, lowest precedence first:
 *   comparison     := additive (('<' | '>' | '<=' | '>=' | '==' | '!=') additive)*
 *   additive       := multiplicative (('+' | '-') multiplicative)*
 *   multiplicative := unary (('*' | '/' | '%') unary)*
 *   unary          := '-' unary | primary
 *   primary        := number | string | true | false | $name | ^
 *                   | str(comparison) | int(comparison) | (comparison)
 */

import { syntaxError } from './errors.js';
import { getVariable } from './symbols.js';
import type { SymbolTable, Value } from './types.js';
import {
  applyArithmetic,
  applyComparison,
  type ArithmeticOperator,
  bool,
  type ComparisonOperator,
  num,
  str,
  toDisplayString,
  toInt,
} from './values.js';

// ============================================================
// TOKENS
// ============================================================

type Token =
  | { type: 'number'; value: number }
  | { type: 'string'; value: string }
  | { type: 'variable'; name: string }
  | { type: 'register' }
  | { type: 'identifier'; name: string }
  | { type: 'operator'; op: ArithmeticOperator | ComparisonOperator }
  | { type: 'lparen' }
  | { type: 'rparen' };

const ESCAPES: Record<string, string> = {
  n: '\n',
  t: '\t',
  '\\': '\\',
  "'": "'",
  '"': '"',
};

const TWO_CHAR_OPERATORS = ['<=', '>=', '==', '!='] as const;
const ONE_CHAR_OPERATORS = ['+', '-', '*', '/', '%', '<', '>'] as const;

function charAt(input: string, pos: number): string {
  return input[pos] ?? '';
}

/**
 * Parse a quoted string, handling escape sequences
 * Returns the parsed string and the position after the closing quote
 */
export function parseQuotedString(
  input: string,
  startPos: number
): { value: string; endPos: number } {
  const quote = charAt(input, startPos);
  if (quote !== "'" && quote !== '"') {
    throw syntaxError(`expected opening quote at position ${startPos}`);
  }

  let result = '';
  let i = startPos + 1;

  while (i < input.length) {
    const char = charAt(input, i);

    if (char === '\\' && i + 1 < input.length) {
      const next = charAt(input, i + 1);
      const escaped = ESCAPES[next];
      // Unknown escapes are kept as written
      result += escaped ?? char + next;
      i += 2;
    } else if (char === quote) {
      return { value: result, endPos: i + 1 };
    } else {
      result += char;
      i++;
    }
  }

  throw syntaxError('unterminated string');
}

function tokenize(input: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < input.length) {
    const char = charAt(input, i);

    if (/\s/.test(char)) {
      i++;
      continue;
    }

    if (char === "'" || char === '"') {
      const { value, endPos } = parseQuotedString(input, i);
      tokens.push({ type: 'string', value });
      i = endPos;
      continue;
    }

    const numberMatch = /^\d+(\.\d+)?/.exec(input.slice(i));
    if (numberMatch) {
      tokens.push({ type: 'number', value: Number(numberMatch[0]) });
      i += numberMatch[0].length;
      continue;
    }

    if (char === '$') {
      const nameMatch = /^[A-Za-z_][A-Za-z0-9_]*/.exec(input.slice(i + 1));
      if (!nameMatch) {
        throw syntaxError(`variable name required after $ at position ${i}`);
      }
      tokens.push({ type: 'variable', name: nameMatch[0] });
      i += 1 + nameMatch[0].length;
      continue;
    }

    if (char === '^') {
      tokens.push({ type: 'register' });
      i++;
      continue;
    }

    const identMatch = /^[A-Za-z_][A-Za-z0-9_]*/.exec(input.slice(i));
    if (identMatch) {
      tokens.push({ type: 'identifier', name: identMatch[0] });
      i += identMatch[0].length;
      continue;
    }

    if (char === '(' || char === ')') {
      tokens.push({ type: char === '(' ? 'lparen' : 'rparen' });
      i++;
      continue;
    }

    const pair = input.slice(i, i + 2);
    const twoChar = TWO_CHAR_OPERATORS.find((op) => op === pair);
    if (twoChar) {
      tokens.push({ type: 'operator', op: twoChar });
      i += 2;
      continue;
    }
    const oneChar = ONE_CHAR_OPERATORS.find((op) => op === char);
    if (oneChar) {
      tokens.push({ type: 'operator', op: oneChar });
      i++;
      continue;
    }

    throw syntaxError(`unexpected character '${char}' at position ${i}`);
  }

  return tokens;
}

// ============================================================
// SYNTAX TREE
// ============================================================

export type Expression =
  | { type: 'literal'; value: Value }
  | { type: 'variable'; name: string }
  | { type: 'register' }
  | { type: 'negate'; operand: Expression }
  | {
      type: 'arithmetic';
      op: ArithmeticOperator;
      left: Expression;
      right: Expression;
    }
  | {
      type: 'comparison';
      op: ComparisonOperator;
      left: Expression;
      right: Expression;
    }
  | { type: 'convert'; to: 'str' | 'int'; operand: Expression };

const COMPARISON_OPERATORS: ReadonlySet<string> = new Set([
  '<',
  '>',
  '<=',
  '>=',
  '==',
  '!=',
]);

function isComparison(op: string): op is ComparisonOperator {
  return COMPARISON_OPERATORS.has(op);
}

class ExpressionParser {
  private pos = 0;

  constructor(private readonly tokens: Token[]) {}

  parse(): Expression {
    if (this.tokens.length === 0) {
      throw syntaxError('empty expression');
    }
    const expr = this.parseComparison();
    const extra = this.tokens[this.pos];
    if (extra) {
      throw syntaxError(`unexpected ${describeToken(extra)} in expression`);
    }
    return expr;
  }

  private peekOperator(): string | null {
    const token = this.tokens[this.pos];
    return token?.type === 'operator' ? token.op : null;
  }

  private parseComparison(): Expression {
    let left = this.parseAdditive();
    let op = this.peekOperator();
    while (op !== null && isComparison(op)) {
      this.pos++;
      left = { type: 'comparison', op, left, right: this.parseAdditive() };
      op = this.peekOperator();
    }
    return left;
  }

  private parseAdditive(): Expression {
    let left = this.parseMultiplicative();
    let op = this.peekOperator();
    while (op === '+' || op === '-') {
      this.pos++;
      left = { type: 'arithmetic', op, left, right: this.parseMultiplicative() };
      op = this.peekOperator();
    }
    return left;
  }

  private parseMultiplicative(): Expression {
    let left = this.parseUnary();
    let op = this.peekOperator();
    while (op === '*' || op === '/' || op === '%') {
      this.pos++;
      left = { type: 'arithmetic', op, left, right: this.parseUnary() };
      op = this.peekOperator();
    }
    return left;
  }

  private parseUnary(): Expression {
    if (this.peekOperator() === '-') {
      this.pos++;
      return { type: 'negate', operand: this.parseUnary() };
    }
    return this.parsePrimary();
  }

  private parsePrimary(): Expression {
    const token = this.tokens[this.pos];
    if (!token) {
      throw syntaxError('unexpected end of expression');
    }
    this.pos++;

    switch (token.type) {
      case 'number':
        return { type: 'literal', value: num(token.value) };
      case 'string':
        return { type: 'literal', value: str(token.value) };
      case 'variable':
        return { type: 'variable', name: token.name };
      case 'register':
        return { type: 'register' };
      case 'lparen': {
        const inner = this.parseComparison();
        this.expect('rparen');
        return inner;
      }
      case 'identifier':
        if (token.name === 'true' || token.name === 'false') {
          return { type: 'literal', value: bool(token.name === 'true') };
        }
        if (token.name === 'str' || token.name === 'int') {
          this.expect('lparen');
          const operand = this.parseComparison();
          this.expect('rparen');
          return { type: 'convert', to: token.name, operand };
        }
        throw syntaxError(`unknown name '${token.name}' in expression`);
      case 'operator':
      case 'rparen':
        throw syntaxError(`unexpected ${describeToken(token)} in expression`);
    }
  }

  private expect(type: 'lparen' | 'rparen'): void {
    const token = this.tokens[this.pos];
    if (token?.type !== type) {
      const wanted = type === 'lparen' ? "'('" : "')'";
      const got = token ? describeToken(token) : 'end of expression';
      throw syntaxError(`expected ${wanted}, got ${got}`);
    }
    this.pos++;
  }
}

function describeToken(token: Token): string {
  switch (token.type) {
    case 'number':
      return `number ${token.value}`;
    case 'string':
      return 'string';
    case 'variable':
      return `$${token.name}`;
    case 'register':
      return "'^'";
    case 'identifier':
      return `'${token.name}'`;
    case 'operator':
      return `'${token.op}'`;
    case 'lparen':
      return "'('";
    case 'rparen':
      return "')'";
  }
}

export function parseExpression(text: string): Expression {
  return new ExpressionParser(tokenize(text)).parse();
}

// ============================================================
// EVALUATION
// ============================================================

function evaluateNode(expr: Expression, symbols: SymbolTable): Value {
  switch (expr.type) {
    case 'literal':
      return expr.value;
    case 'variable':
      return getVariable(symbols, expr.name);
    case 'register':
      return symbols.register;
    case 'negate':
      return applyArithmetic('-', num(0), evaluateNode(expr.operand, symbols));
    case 'arithmetic':
      return applyArithmetic(
        expr.op,
        evaluateNode(expr.left, symbols),
        evaluateNode(expr.right, symbols)
      );
    case 'comparison':
      return applyComparison(
        expr.op,
        evaluateNode(expr.left, symbols),
        evaluateNode(expr.right, symbols)
      );
    case 'convert': {
      const operand = evaluateNode(expr.operand, symbols);
      return expr.to === 'str' ? str(toDisplayString(operand)) : toInt(operand);
    }
  }
}

/**
 * Evaluate a parsed expression against the current symbol state
 * Reads variables and the register; never writes them
 */
export function evaluateExpression(expr: Expression, symbols: SymbolTable): Value {
  return evaluateNode(expr, symbols);
}

export function evaluate(text: string, symbols: SymbolTable): Value {
  return evaluateNode(parseExpression(text), symbols);
}
