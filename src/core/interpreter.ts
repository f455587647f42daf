/**
 * Interpreter loop with an explicit call stack
 */

import type { Logger } from '../output/logger.js';
import { createRunStats, recordCall, type RunStats } from '../output/stats.js';
import {
  ioError,
  isScriptError,
  nameError,
  stackOverflow,
  type TraceFrame,
} from '../script/errors.js';
import {
  evaluateExpression,
  type Expression,
  parseExpression,
} from '../script/expression.js';
import { jumpTarget } from '../script/labels.js';
import { parseAliasName, parseVariableList } from '../script/lexer.js';
import {
  createSymbolTable,
  declareVariable,
  freeVariable,
  getVariable,
  isDeclared,
  setRegister,
  setVariable,
} from '../script/symbols.js';
import type {
  Body,
  Program,
  SourcePosition,
  Statement,
  SymbolTable,
  Value,
} from '../script/types.js';
import { bool, isTruthy, str, toDisplayString } from '../script/values.js';
import type { RunnerConfig } from '../types/runner.js';
import { formatPosition, previewStatement } from '../utils/formatting.js';

/**
 * Raw output transport
 */
export interface ScriptOutput {
  write(text: string): void;
}

/**
 * Line-based input; resolves null once input is exhausted
 */
export interface ScriptInput {
  readLine(): Promise<string | null>;
}

export interface InterpreterContext {
  output: ScriptOutput;
  input: ScriptInput;
  logger: Logger;
  config: Pick<RunnerConfig, 'maxCallDepth' | 'trace'>;
  /** Pre-populated symbols (script arguments); a fresh table otherwise */
  symbols?: SymbolTable | undefined;
}

export interface CallFrame {
  /** Alias name, or the main body name */
  alias: string;
  body: Body;
  /** Index of the next statement in `body` */
  ip: number;
  /** Position of the call that pushed this frame (null for main) */
  callSite: SourcePosition | null;
}

export interface RunResult {
  symbols: SymbolTable;
  stats: RunStats;
}

interface ExecutionState {
  program: Program;
  symbols: SymbolTable;
  frames: CallFrame[];
  stats: RunStats;
  context: InterpreterContext;
  /** Parsed arguments of expression statements, filled on first execution */
  expressions: Map<Statement, Expression>;
}

function traceOf(frames: CallFrame[]): TraceFrame[] {
  const trace: TraceFrame[] = [];
  for (const frame of frames) {
    if (frame.callSite) {
      trace.push({ alias: frame.alias, callSite: frame.callSite });
    }
  }
  return trace;
}

function pushCall(
  state: ExecutionState,
  statement: Statement
): void {
  const name = parseAliasName(statement.args);
  const alias = state.program.aliases.get(name);
  if (!alias) {
    throw nameError(`alias ${name} is not defined`);
  }

  // Main frame does not count toward the capacity
  const depth = state.frames.length;
  if (depth > state.context.config.maxCallDepth) {
    throw stackOverflow(
      `call depth exceeded ${state.context.config.maxCallDepth} calling ${name}`
    );
  }

  state.frames.push({
    alias: name,
    body: alias,
    ip: 0,
    callSite: statement.position,
  });
  recordCall(state.stats, depth);

  if (state.context.config.trace) {
    state.context.logger.logEvent({
      event: 'alias_call',
      alias: name,
      depth,
      at: formatPosition(statement.position),
    });
  }
}

function evaluateArgs(state: ExecutionState, statement: Statement): Value {
  let expr = state.expressions.get(statement);
  if (!expr) {
    expr = parseExpression(statement.args);
    state.expressions.set(statement, expr);
  }
  return evaluateExpression(expr, state.symbols);
}

function copy(symbols: SymbolTable, args: string): void {
  const [first, second] = parseVariableList(args);
  if (first === undefined) return;

  if (second === undefined) {
    setVariable(symbols, first, symbols.register);
  } else {
    setVariable(symbols, second, getVariable(symbols, first));
  }
}

function jump(state: ExecutionState, frame: CallFrame, statement: Statement): void {
  frame.ip = jumpTarget(frame.body, statement);
  state.stats.jumps++;
}

async function read(state: ExecutionState, statement: Statement): Promise<void> {
  const [name] = parseVariableList(statement.args);
  if (name === undefined) return;

  // Check before blocking so an undeclared target fails without consuming input
  getVariable(state.symbols, name);

  const line = await state.context.input.readLine();
  if (line === null) {
    throw ioError('end of input');
  }
  setVariable(state.symbols, name, str(line.replace(/\r$/, '')));
}

/**
 * Execute one statement against the current frame
 */
async function execute(
  state: ExecutionState,
  frame: CallFrame,
  statement: Statement
): Promise<void> {
  const { symbols, context } = state;

  switch (statement.kind) {
    case 'set':
      for (const name of parseVariableList(statement.args)) {
        declareVariable(symbols, name);
      }
      return;
    case 'free':
      for (const name of parseVariableList(statement.args)) {
        freeVariable(symbols, name);
      }
      return;
    case 'mem':
      setRegister(symbols, evaluateArgs(state, statement));
      return;
    case 'copy':
      copy(symbols, statement.args);
      return;
    case 'print':
      context.output.write(toDisplayString(evaluateArgs(state, statement)));
      return;
    case 'out':
      context.output.write(toDisplayString(symbols.register));
      return;
    case 'read':
      await read(state, statement);
      return;
    case 'isset': {
      const [name] = parseVariableList(statement.args);
      setRegister(symbols, bool(name !== undefined && isDeclared(symbols, name)));
      return;
    }
    case 'typeof':
      setRegister(symbols, str(evaluateArgs(state, statement).kind));
      return;
    case 'call':
      pushCall(state, statement);
      return;
    case 'gotoif':
      if (isTruthy(symbols.register)) {
        jump(state, frame, statement);
      }
      return;
    case 'goto':
      jump(state, frame, statement);
      return;
    case 'section':
    case 'pass':
      return;
    case 'include':
    case 'alias':
    case 'endalias':
      // Removed by include expansion and alias extraction before execution
      throw new Error(`unresolved ${statement.kind} statement reached the interpreter`);
  }
}

/**
 * Run a resolved program until the main body finishes
 *
 * @param program - Output of loadProgram / buildProgram
 * @param context - I/O seams, logger and call-depth settings
 * @returns Final symbols and run statistics
 * @throws ScriptError annotated with the failing statement and call trace
 */
export async function runProgram(
  program: Program,
  context: InterpreterContext
): Promise<RunResult> {
  const state: ExecutionState = {
    program,
    symbols: context.symbols ?? createSymbolTable(),
    frames: [
      { alias: program.main.name, body: program.main, ip: 0, callSite: null },
    ],
    stats: createRunStats(),
    context,
    expressions: new Map(),
  };
  const { frames, stats } = state;

  let frame = frames[frames.length - 1];
  while (frame) {
    const statement = frame.body.statements[frame.ip];
    if (!statement) {
      // End of body: return to the caller
      frames.pop();
      frame = frames[frames.length - 1];
      continue;
    }

    frame.ip++;
    stats.statements++;

    if (context.config.trace) {
      context.logger.logEvent({
        event: 'statement',
        at: formatPosition(statement.position),
        statement: previewStatement(statement),
      });
    }

    try {
      await execute(state, frame, statement);
    } catch (error) {
      if (isScriptError(error)) {
        throw error.at(statement.position).withTrace(traceOf(frames));
      }
      throw error;
    }

    frame = frames[frames.length - 1];
  }

  return { symbols: state.symbols, stats };
}
