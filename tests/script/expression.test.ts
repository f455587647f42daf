import { describe, expect, it } from 'vitest';

import {
  evaluate,
  parseExpression,
  parseQuotedString,
} from '../../src/script/expression.js';
import { createSymbolTable, declareVariable } from '../../src/script/symbols.js';
import type { SymbolTable, Value } from '../../src/script/types.js';
import { bool, num, str } from '../../src/script/values.js';
import { catchScriptError } from '../helpers/mocks.js';

function symbolsWith(values: Record<string, Value>): SymbolTable {
  const symbols = createSymbolTable();
  for (const [name, value] of Object.entries(values)) {
    symbols.variables.set(name, value);
  }
  return symbols;
}

describe('parseQuotedString', () => {
  it('handles escape sequences', () => {
    expect(parseQuotedString("'a\\nb\\tc'", 0)).toEqual({
      value: 'a\nb\tc',
      endPos: 9,
    });
  });

  it('handles escaped quotes and backslashes', () => {
    expect(parseQuotedString("'it\\'s \\\\ ok'", 0).value).toBe("it's \\ ok");
  });

  it('accepts double quotes', () => {
    expect(parseQuotedString('"say \\"hi\\""', 0).value).toBe('say "hi"');
  });

  it('keeps unknown escapes as written', () => {
    expect(parseQuotedString("'\\d'", 0).value).toBe('\\d');
  });

  it('throws on unterminated string', () => {
    expect(() => parseQuotedString("'open", 0)).toThrow('unterminated string');
  });
});

describe('evaluate', () => {
  describe('literals and references', () => {
    it('evaluates integer and string literals', () => {
      const symbols = createSymbolTable();

      expect(evaluate('42', symbols)).toEqual(num(42));
      expect(evaluate("'hello'", symbols)).toEqual(str('hello'));
      expect(evaluate('true', symbols)).toEqual(bool(true));
    });

    it('reads variables', () => {
      expect(evaluate('$x', symbolsWith({ x: num(5) }))).toEqual(num(5));
    });

    it('reads the register', () => {
      const symbols = createSymbolTable();
      symbols.register = str('held');

      expect(evaluate('^ + \'!\'', symbols)).toEqual(str('held!'));
    });

    it('raises NameError for undeclared variables', () => {
      const error = catchScriptError(() => evaluate('$ghost + 1', createSymbolTable()));

      expect(error.kind).toBe('NameError');
      expect(error.message).toBe('variable $ghost is not declared');
    });

    it('does not modify state', () => {
      const symbols = symbolsWith({ x: num(1) });
      symbols.register = num(9);

      evaluate('$x + ^', symbols);

      expect(symbols.variables.get('x')).toEqual(num(1));
      expect(symbols.register).toEqual(num(9));
    });
  });

  describe('arithmetic', () => {
    it('applies multiplicative before additive', () => {
      expect(evaluate('1 + 2 * 3', createSymbolTable())).toEqual(num(7));
    });

    it('honors parentheses', () => {
      expect(evaluate('(1 + 2) * 3', createSymbolTable())).toEqual(num(9));
    });

    it('is left associative', () => {
      expect(evaluate('10 - 4 - 3', createSymbolTable())).toEqual(num(3));
    });

    it('divides and takes remainders', () => {
      const symbols = createSymbolTable();

      expect(evaluate('10 / 4', symbols)).toEqual(num(2.5));
      expect(evaluate('7 % 3', symbols)).toEqual(num(1));
    });

    it('negates numbers', () => {
      expect(evaluate('-3 + 5', createSymbolTable())).toEqual(num(2));
    });

    it('concatenates strings with +', () => {
      expect(evaluate("'ab' + 'cd'", createSymbolTable())).toEqual(str('abcd'));
    });

    it('rejects mixing strings and numbers', () => {
      const error = catchScriptError(() => evaluate("'a' + 1", createSymbolTable()));

      expect(error.kind).toBe('TypeError');
      expect(error.message).toBe('unsupported operand kinds for +: string and number');
    });

    it('rejects division by zero', () => {
      expect(() => evaluate('1 / 0', createSymbolTable())).toThrow('division by zero');
    });
  });

  describe('comparison', () => {
    it('has the lowest precedence', () => {
      expect(evaluate('1 + 2 < 4', createSymbolTable())).toEqual(bool(true));
    });

    it('compares numeric-looking strings as numbers', () => {
      const symbols = createSymbolTable();

      expect(evaluate("'10' < '9'", symbols)).toEqual(bool(false));
      expect(evaluate("'10' == 10", symbols)).toEqual(bool(true));
    });

    it('compares other strings lexicographically', () => {
      expect(evaluate("'abc' < 'abd'", createSymbolTable())).toEqual(bool(true));
    });

    it('compares absent values by kind only', () => {
      const symbols = createSymbolTable();
      declareVariable(symbols, 'a');

      expect(evaluate('$a == $a', symbols)).toEqual(bool(true));
      expect(evaluate('$a != 0', symbols)).toEqual(bool(true));
      expect(() => evaluate('$a < 1', symbols)).toThrow(
        'cannot order an absent value with <'
      );
    });
  });

  describe('conversions', () => {
    it('converts numbers to strings', () => {
      expect(evaluate("str(12) + 'x'", createSymbolTable())).toEqual(str('12x'));
    });

    it('converts numeric strings to numbers', () => {
      expect(evaluate("int('12') + int(' 3 ')", createSymbolTable())).toEqual(num(15));
    });

    it('truncates fractional strings', () => {
      expect(evaluate("int('1.9')", createSymbolTable())).toEqual(num(1));
    });

    it('rejects non-numeric strings', () => {
      const error = catchScriptError(() => evaluate("int('abc')", createSymbolTable()));

      expect(error.kind).toBe('TypeError');
      expect(error.message).toBe("int() cannot convert 'abc'");
    });
  });
});

describe('parseExpression', () => {
  it('builds a fresh tree for each parse', () => {
    const first = parseExpression('$a + 1');
    const second = parseExpression('$a + 1');

    expect(second).toEqual(first);
    expect(second).not.toBe(first);
  });

  it.each([
    ['1 +', 'unexpected end of expression'],
    ['1 2', 'unexpected number 2 in expression'],
    ['foo(1)', "unknown name 'foo' in expression"],
    ['str 1', "expected '(', got number 1"],
    ['(1 + 2', "expected ')', got end of expression"],
    ['1 & 2', "unexpected character '&' at position 2"],
    ['$', 'variable name required after $ at position 0'],
  ])('rejects %s', (text, message) => {
    const error = catchScriptError(() => parseExpression(text));

    expect(error.kind).toBe('SyntaxError');
    expect(error.message).toBe(message);
  });
});
