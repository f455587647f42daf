/**
 * Runner configuration types
 */

import {
  DEFAULT_LOG_DIR,
  DEFAULT_MAX_CALL_DEPTH,
} from '../utils/constants.js';

export type Verbosity = 'quiet' | 'normal' | 'verbose';

/**
 * Runner configuration
 */
export interface RunnerConfig {
  verbosity: Verbosity;
  enableLog: boolean;
  logDir: string;
  /** Alias call-stack capacity */
  maxCallDepth: number;
  /** Log every executed statement to the run log */
  trace: boolean;
}

/**
 * Default runner configuration
 */
export const DEFAULT_CONFIG: RunnerConfig = {
  verbosity: 'normal',
  enableLog: false,
  logDir: DEFAULT_LOG_DIR,
  maxCallDepth: DEFAULT_MAX_CALL_DEPTH,
  trace: false,
};

/**
 * Parsed CLI arguments
 */
export interface ParsedArgs {
  /** Entry script path */
  scriptFile: string;
  /** Arguments exposed to the script as $arg1, $arg2, ... */
  scriptArgs: string[];
  /** Explicit config file (--config) */
  configFile: string | null;
  /** Settings given on the command line; these override the config file */
  config: Partial<RunnerConfig>;
}
