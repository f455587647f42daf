/**
 * CLI argument parsing
 */

import { createRequire } from 'module';

import type { ParsedArgs, RunnerConfig } from '../types/index.js';

const require = createRequire(import.meta.url);
const pkg = require('../../package.json') as { version: string };

const USAGE = 'Usage: memscript [options] <file.mem> [args...]';

/**
 * Read the value of `--name value` or `--name=value`
 * Returns the value and how many extra args it consumed
 */
function optionValue(
  args: string[],
  index: number,
  name: string
): { value: string; consumed: number } {
  const arg = args[index] ?? '';
  if (arg.startsWith(`${name}=`)) {
    return { value: arg.slice(name.length + 1), consumed: 0 };
  }
  const next = args[index + 1];
  if (next === undefined || next === '') {
    usageError(`${name} requires a value`);
  }
  return { value: next, consumed: 1 };
}

function usageError(message: string): never {
  console.error(`Error: ${message}`);
  console.error(USAGE);
  process.exit(1);
}

function matchesOption(arg: string, name: string): boolean {
  return arg === name || arg.startsWith(`${name}=`);
}

/**
 * Parse CLI arguments
 * Options come before the script file; everything after it belongs to the script
 */
export function parseArgs(args: string[]): ParsedArgs {
  const config: Partial<RunnerConfig> = {};
  let scriptFile: string | null = null;
  let configFile: string | null = null;
  const scriptArgs: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';

    if (scriptFile !== null) {
      scriptArgs.push(arg);
    } else if (arg === '--version' || arg === '-V') {
      console.log(pkg.version);
      process.exit(0);
    } else if (arg === '--help' || arg === '-h') {
      printUsage();
      process.exit(0);
    } else if (arg === '--quiet') {
      config.verbosity = 'quiet';
    } else if (arg === '--normal') {
      config.verbosity = 'normal';
    } else if (arg === '--verbose') {
      config.verbosity = 'verbose';
    } else if (arg === '--log') {
      config.enableLog = true;
    } else if (arg === '--no-log') {
      config.enableLog = false;
    } else if (arg === '--trace') {
      config.trace = true;
    } else if (matchesOption(arg, '--log-dir')) {
      const { value, consumed } = optionValue(args, i, '--log-dir');
      config.logDir = value;
      i += consumed;
    } else if (matchesOption(arg, '--max-depth')) {
      const { value, consumed } = optionValue(args, i, '--max-depth');
      const depth = Number(value);
      if (!Number.isInteger(depth) || depth < 1) {
        usageError(`--max-depth must be a positive integer, got '${value}'`);
      }
      config.maxCallDepth = depth;
      i += consumed;
    } else if (matchesOption(arg, '--config')) {
      const { value, consumed } = optionValue(args, i, '--config');
      configFile = value;
      i += consumed;
    } else if (arg.startsWith('-')) {
      usageError(`unknown option '${arg}'`);
    } else {
      scriptFile = arg;
    }
  }

  if (scriptFile === null) {
    usageError('script file required');
  }

  return { scriptFile, scriptArgs, configFile, config };
}

/**
 * Print usage information
 */
export function printUsage(): void {
  console.log(`
memscript - run register-based scripts

${USAGE}

Arguments after the script file are available to the script as
$argc, $arg1, $arg2, ...

Options:
  --quiet              Errors only
  --normal             Default output level
  --verbose            Print load and run summaries to stderr
  --log                Write a JSON-lines run log
  --no-log             Disable the run log (default)
  --log-dir <dir>      Directory for run logs (default: logs)
  --max-depth <n>      Alias call-stack capacity (default: 1000)
  --trace              Log every executed statement (needs --log)
  --config <file>      Config file (default: ./memscript.config.json5 if present)
  --version, -V        Print version
  --help, -h           Show this help
`);
}
