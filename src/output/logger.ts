/**
 * Run log: JSON-lines events plus plain text notes, ANSI stripped
 */

import * as fs from 'fs';
import * as path from 'path';

import { stripAnsi } from './colors.js';

export interface RunEventData {
  event: string;
  [key: string]: unknown;
}

/**
 * Line written to the run log for each event
 */
export interface RunEvent extends RunEventData {
  type: 'run';
  script: string;
  timestamp: string;
}

export interface Logger {
  /** Append a plain text note (colors removed) */
  log(msg: string): void;
  logEvent(event: RunEventData): void;
  /** Resolves once everything written has reached the file */
  close(): Promise<void>;
  filePath: string | null;
}

/**
 * Logger that drops everything
 */
export function createNullLogger(): Logger {
  return {
    log: () => undefined,
    logEvent: () => undefined,
    close: () => Promise.resolve(),
    filePath: null,
  };
}

/**
 * Log file name for a run of `scriptFile` started at `date`
 * Example: fib-2024-01-01T09-05-07.log
 */
export function logFileName(scriptFile: string, date: Date = new Date()): string {
  const timestamp = date.toISOString().replace(/[:.]/g, '-').slice(0, 19);
  const base = path.basename(scriptFile, path.extname(scriptFile));
  return `${base}-${timestamp}.log`;
}

/**
 * Create the run logger; a null logger unless logging is enabled
 */
export function createLogger(
  enabled: boolean,
  logDir: string,
  scriptFile: string
): Logger {
  if (!enabled) {
    return createNullLogger();
  }

  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }

  const logFile = path.join(logDir, logFileName(scriptFile));
  const logStream = fs.createWriteStream(logFile, { flags: 'a' });
  const script = path.basename(scriptFile);

  return {
    log(msg: string): void {
      logStream.write(stripAnsi(msg) + '\n');
    },
    logEvent(eventData: RunEventData): void {
      const fullEvent: RunEvent = {
        type: 'run',
        script,
        timestamp: new Date().toISOString(),
        ...eventData,
      };
      logStream.write(JSON.stringify(fullEvent) + '\n');
    },
    close(): Promise<void> {
      return new Promise((resolve, reject) => {
        logStream.once('error', reject);
        logStream.end(() => resolve());
      });
    },
    filePath: logFile,
  };
}
