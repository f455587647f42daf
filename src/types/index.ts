/**
 * Shared runner types
 */

export type { ParsedArgs, RunnerConfig, Verbosity } from './runner.js';
export { DEFAULT_CONFIG } from './runner.js';
