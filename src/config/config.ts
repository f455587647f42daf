/**
 * Configuration resolution: defaults, then config file, then CLI flags
 */

import * as fs from 'fs';
import JSON5 from 'json5';
import * as path from 'path';

import {
  DEFAULT_CONFIG,
  type RunnerConfig,
  type Verbosity,
} from '../types/runner.js';
import { CONFIG_FILE_NAME } from '../utils/constants.js';

const VERBOSITY_LEVELS: readonly Verbosity[] = ['quiet', 'normal', 'verbose'];

function isVerbosity(value: unknown): value is Verbosity {
  return VERBOSITY_LEVELS.some((level) => level === value);
}

function expectBoolean(key: string, value: unknown): boolean {
  if (typeof value !== 'boolean') {
    throw new Error(`Config ${key} must be true or false`);
  }
  return value;
}

/**
 * Validate parsed config file content
 */
export function parseConfig(content: string, file: string): Partial<RunnerConfig> {
  let raw: unknown;
  try {
    raw = JSON5.parse(content);
  } catch (error) {
    const msg = error instanceof Error ? error.message : String(error);
    throw new Error(`Invalid config file ${file}: ${msg}`);
  }

  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new Error(`Invalid config file ${file}: expected an object`);
  }

  const config: Partial<RunnerConfig> = {};
  const entries: [string, unknown][] = Object.entries(raw);

  for (const [key, value] of entries) {
    switch (key) {
      case 'verbosity':
        if (!isVerbosity(value)) {
          throw new Error(
            `Config verbosity must be one of: ${VERBOSITY_LEVELS.join(', ')}`
          );
        }
        config.verbosity = value;
        break;
      case 'enableLog':
        config.enableLog = expectBoolean(key, value);
        break;
      case 'trace':
        config.trace = expectBoolean(key, value);
        break;
      case 'logDir':
        if (typeof value !== 'string' || value === '') {
          throw new Error('Config logDir must be a non-empty string');
        }
        config.logDir = value;
        break;
      case 'maxCallDepth':
        if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
          throw new Error('Config maxCallDepth must be a positive integer');
        }
        config.maxCallDepth = value;
        break;
      default:
        throw new Error(`Unknown config key '${key}' in ${file}`);
    }
  }

  return config;
}

/**
 * Load a config file
 *
 * @param configFile - Explicit file (must exist), or null to look for
 *   the default config file in `cwd` (optional)
 * @param cwd - Directory searched for the default config file
 */
export function loadConfigFile(
  configFile: string | null,
  cwd: string = process.cwd()
): Partial<RunnerConfig> {
  const file = configFile ?? path.join(cwd, CONFIG_FILE_NAME);

  if (!fs.existsSync(file)) {
    if (configFile) {
      throw new Error(`Config file not found: ${configFile}`);
    }
    return {};
  }

  return parseConfig(fs.readFileSync(file, 'utf-8'), file);
}

/**
 * Merge config layers over the defaults, later layers win
 */
export function resolveConfig(
  ...layers: Partial<RunnerConfig>[]
): RunnerConfig {
  return layers.reduce<RunnerConfig>(
    (merged, layer) => ({ ...merged, ...layer }),
    { ...DEFAULT_CONFIG }
  );
}
