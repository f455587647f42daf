/**
 * Run statistics tracking and summary formatting
 */

import { formatDuration } from './colors.js';

/**
 * Run statistics
 */
export interface RunStats {
  /** Statements executed */
  statements: number;
  /** Alias calls made */
  calls: number;
  /** Deepest alias nesting reached */
  maxDepth: number;
  /** Jumps taken by goto/gotoif */
  jumps: number;
}

/**
 * Create empty run stats
 */
export function createRunStats(): RunStats {
  return {
    statements: 0,
    calls: 0,
    maxDepth: 0,
    jumps: 0,
  };
}

/**
 * Record an alias call reaching the given nesting depth
 */
export function recordCall(stats: RunStats, depth: number): void {
  stats.calls++;
  if (depth > stats.maxDepth) {
    stats.maxDepth = depth;
  }
}

/**
 * Format number with commas
 */
function formatNumber(n: number): string {
  return n.toLocaleString('en-US');
}

/**
 * Format stats summary for display
 * Example: 12ms | 240 stmts | 1 calls | depth 1 | 19 jumps
 */
export function formatStatsSummary(
  stats: RunStats,
  durationMs: number
): string {
  return [
    formatDuration(durationMs),
    `${formatNumber(stats.statements)} stmts`,
    `${formatNumber(stats.calls)} calls`,
    `depth ${stats.maxDepth}`,
    `${formatNumber(stats.jumps)} jumps`,
  ].join(' | ');
}
