#!/usr/bin/env node
/**
 * memscript - runs a script file against the console
 */

import { parseArgs } from './cli/args.js';
import { loadConfigFile, resolveConfig } from './config/config.js';
import { runProgram } from './core/interpreter.js';
import { createConsoleInput, createConsoleOutput } from './io/console.js';
import { colorize, formatDuration, printRunner } from './output/colors.js';
import { renderScriptError } from './output/errors.js';
import { createLogger } from './output/logger.js';
import { formatStatsSummary } from './output/stats.js';
import {
  createSymbolTable,
  declareArguments,
  isScriptError,
  loadProgram,
} from './script/index.js';
import { formatPosition } from './utils/formatting.js';

async function main(): Promise<number> {
  const startTime = Date.now();
  const parsed = parseArgs(process.argv.slice(2));

  const config = resolveConfig(loadConfigFile(parsed.configFile), parsed.config);
  const verbose = config.verbosity === 'verbose';

  const logger = createLogger(config.enableLog, config.logDir, parsed.scriptFile);
  if (verbose && logger.filePath) {
    printRunner(`Log: ${logger.filePath}`);
  }
  logger.logEvent({
    event: 'run_start',
    script: parsed.scriptFile,
    args: parsed.scriptArgs,
  });

  const input = createConsoleInput();
  try {
    const program = loadProgram(parsed.scriptFile);
    const statementCount = [...program.aliases.values()].reduce(
      (total, alias) => total + alias.statements.length,
      program.main.statements.length
    );
    logger.logEvent({
      event: 'program_loaded',
      files: program.files,
      statements: statementCount,
      aliases: [...program.aliases.keys()],
    });
    if (verbose) {
      printRunner(
        `Loaded ${program.files.length} file(s), ${statementCount} statements, ${program.aliases.size} aliases`
      );
    }

    const symbols = createSymbolTable();
    declareArguments(symbols, parsed.scriptArgs);

    const { stats } = await runProgram(program, {
      output: createConsoleOutput(),
      input,
      logger,
      config,
      symbols,
    });

    const summary = formatStatsSummary(stats, Date.now() - startTime);
    logger.logEvent({ event: 'run_end', status: 'ok', summary });
    if (verbose) {
      printRunner(`Run complete: ${summary}`);
    }
    return 0;
  } catch (error) {
    if (!isScriptError(error)) throw error;

    logger.logEvent({
      event: 'run_error',
      kind: error.kind,
      message: error.message,
      at: error.position ? formatPosition(error.position) : null,
    });
    const [headline = '', ...details] = renderScriptError(error).split('\n');
    const shown = config.verbosity === 'quiet' ? details.slice(0, 1) : details;
    const report = [colorize(headline, 'red'), ...shown].join('\n');
    console.error(report);
    logger.log(report);
    if (verbose) {
      printRunner(`Run failed after ${formatDuration(Date.now() - startTime)}`);
    }
    return 1;
  } finally {
    input.close();
    await logger.close();
  }
}

main()
  .then((code) => process.exit(code))
  .catch((err: unknown) => {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`Error: ${message}`);
    process.exit(1);
  });
