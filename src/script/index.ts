/**
 * Script module - lexing, evaluation, include expansion and program resolution
 */

// Types
export type {
  AliasDefinition,
  Body,
  LabelTable,
  Program,
  SourcePosition,
  Statement,
  StatementKind,
  SymbolTable,
  Value,
  ValueKind,
} from './types.js';

// Errors
export {
  isScriptError,
  ScriptError,
  type ScriptErrorKind,
  type TraceFrame,
} from './errors.js';

// Loader
export {
  buildProgram,
  expandIncludes,
  loadProgram,
  loadProgramFromSource,
} from './loader.js';

// Lexer and evaluator (for direct use if needed)
export { lex } from './lexer.js';
export { evaluate, parseExpression } from './expression.js';

// Symbols
export {
  createSymbolTable,
  declareArguments,
  declareVariable,
  getVariable,
  setVariable,
} from './symbols.js';

// Values
export { str, num, toDisplayString } from './values.js';
