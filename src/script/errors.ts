/**
 * Script error taxonomy
 */

import type { SourcePosition } from './types.js';

export type ScriptErrorKind =
  | 'SyntaxError'
  | 'NameError'
  | 'TypeError'
  | 'IncludeCycleError'
  | 'IOError'
  | 'StackOverflow';

/**
 * One active alias call at the time an error was raised
 */
export interface TraceFrame {
  alias: string;
  /** Position of the `call` statement that entered the alias */
  callSite: SourcePosition;
}

export class ScriptError extends Error {
  readonly kind: ScriptErrorKind;
  readonly position: SourcePosition | null;
  readonly trace: TraceFrame[];

  constructor(
    kind: ScriptErrorKind,
    message: string,
    position: SourcePosition | null = null,
    trace: TraceFrame[] = []
  ) {
    super(message);
    this.name = kind;
    this.kind = kind;
    this.position = position;
    this.trace = trace;
  }

  /**
   * Copy with a position attached; an existing position wins
   */
  at(position: SourcePosition): ScriptError {
    if (this.position) return this;
    return new ScriptError(this.kind, this.message, position, this.trace);
  }

  withTrace(trace: TraceFrame[]): ScriptError {
    return new ScriptError(this.kind, this.message, this.position, trace);
  }
}

export function isScriptError(value: unknown): value is ScriptError {
  return value instanceof ScriptError;
}

export function syntaxError(
  message: string,
  position?: SourcePosition
): ScriptError {
  return new ScriptError('SyntaxError', message, position ?? null);
}

export function nameError(
  message: string,
  position?: SourcePosition
): ScriptError {
  return new ScriptError('NameError', message, position ?? null);
}

export function typeError(
  message: string,
  position?: SourcePosition
): ScriptError {
  return new ScriptError('TypeError', message, position ?? null);
}

export function ioError(
  message: string,
  position?: SourcePosition
): ScriptError {
  return new ScriptError('IOError', message, position ?? null);
}

export function includeCycleError(
  message: string,
  position?: SourcePosition
): ScriptError {
  return new ScriptError('IncludeCycleError', message, position ?? null);
}

export function stackOverflow(
  message: string,
  position?: SourcePosition
): ScriptError {
  return new ScriptError('StackOverflow', message, position ?? null);
}
