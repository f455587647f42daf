/**
 * Types for lexed statements, runtime values and resolved programs
 */

/**
 * Where a statement came from
 */
export interface SourcePosition {
  file: string;
  line: number;
}

export type StatementKind =
  | 'set'
  | 'mem'
  | 'copy'
  | 'print'
  | 'read'
  | 'out'
  | 'call'
  | 'alias'
  | 'endalias'
  | 'section'
  | 'gotoif'
  | 'goto'
  | 'include'
  | 'free'
  | 'isset'
  | 'typeof'
  | 'pass';

/**
 * A single `keyword args;` statement with its argument text left unparsed
 */
export interface Statement {
  kind: StatementKind;
  args: string;
  position: SourcePosition;
}

// ============================================================
// VALUES
// ============================================================

export interface NumberValue {
  kind: 'number';
  value: number;
}

export interface StringValue {
  kind: 'string';
  value: string;
}

export interface BooleanValue {
  kind: 'boolean';
  value: boolean;
}

export interface AbsentValue {
  kind: 'absent';
}

export type Value = NumberValue | StringValue | BooleanValue | AbsentValue;

export type ValueKind = Value['kind'];

// ============================================================
// RESOLVED PROGRAM
// ============================================================

/**
 * Section id -> offset of the statement following the section
 */
export type LabelTable = Map<number, number>;

/**
 * A statement sequence with its own label scope
 * (the top-level program, or one alias)
 */
export interface Body {
  name: string;
  statements: Statement[];
  labels: LabelTable;
}

export interface AliasDefinition extends Body {
  position: SourcePosition;
}

/**
 * Fully expanded and resolved program, ready to execute
 */
export interface Program {
  main: Body;
  aliases: Map<string, AliasDefinition>;
  /** Files read during include expansion, in first-read order */
  files: string[];
}

/**
 * Variables plus the working register
 */
export interface SymbolTable {
  /** Declared variables (name without sigil) */
  variables: Map<string, Value>;
  /** The working register (^) */
  register: Value;
}
