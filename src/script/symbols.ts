/**
 * Global variable bindings and the working register
 */

import { nameError } from './errors.js';
import type { SymbolTable, Value } from './types.js';
import { ABSENT, num, str } from './values.js';

/**
 * Create an empty symbol table
 */
export function createSymbolTable(): SymbolTable {
  return {
    variables: new Map(),
    register: ABSENT,
  };
}

/**
 * Declare (or redeclare) a variable, resetting it to absent
 */
export function declareVariable(symbols: SymbolTable, name: string): void {
  symbols.variables.set(name, ABSENT);
}

export function isDeclared(symbols: SymbolTable, name: string): boolean {
  return symbols.variables.has(name);
}

export function getVariable(symbols: SymbolTable, name: string): Value {
  const value = symbols.variables.get(name);
  if (value === undefined) {
    throw nameError(`variable $${name} is not declared`);
  }
  return value;
}

/**
 * Assign to an already declared variable
 */
export function setVariable(
  symbols: SymbolTable,
  name: string,
  value: Value
): void {
  if (!symbols.variables.has(name)) {
    throw nameError(`variable $${name} is not declared`);
  }
  symbols.variables.set(name, value);
}

export function freeVariable(symbols: SymbolTable, name: string): void {
  if (!symbols.variables.delete(name)) {
    throw nameError(`variable $${name} is not declared`);
  }
}

export function setRegister(symbols: SymbolTable, value: Value): void {
  symbols.register = value;
}

/**
 * Predeclare $argc and $arg1..$argN for script arguments
 */
export function declareArguments(symbols: SymbolTable, args: string[]): void {
  symbols.variables.set('argc', num(args.length));
  for (const [i, arg] of args.entries()) {
    symbols.variables.set(`arg${i + 1}`, str(arg));
  }
}
