import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { createLogger } from '../../src/output/logger.js';

describe('run log file', () => {
  let logDir: string;

  beforeEach(() => {
    logDir = fs.mkdtempSync(path.join(os.tmpdir(), 'memscript-log-'));
  });

  afterEach(() => {
    fs.rmSync(logDir, { recursive: true, force: true });
  });

  it('holds every event once close resolves', async () => {
    const logger = createLogger(true, logDir, 'scripts/ok.mem');

    logger.logEvent({ event: 'run_start', args: [] });
    logger.log('\x1b[31mNameError: variable $x is not declared\x1b[0m');
    logger.logEvent({ event: 'run_end', status: 'ok' });
    await logger.close();

    const files = fs.readdirSync(logDir);
    expect(files).toHaveLength(1);
    expect(files[0]).toMatch(/^ok-\d{4}-\d{2}-\d{2}T\d{2}-\d{2}-\d{2}\.log$/);

    const lines = fs
      .readFileSync(path.join(logDir, files[0] ?? ''), 'utf-8')
      .trimEnd()
      .split('\n');
    expect(lines).toHaveLength(3);
    expect(JSON.parse(lines[0] ?? '')).toMatchObject({
      type: 'run',
      script: 'ok.mem',
      event: 'run_start',
    });
    expect(lines[1]).toBe('NameError: variable $x is not declared');
    expect(JSON.parse(lines[2] ?? '')).toMatchObject({
      event: 'run_end',
      status: 'ok',
    });
  });

  it('creates the file for a run that logs nothing', async () => {
    const logger = createLogger(true, logDir, 'quiet.mem');

    await logger.close();

    expect(fs.readFileSync(logger.filePath ?? '', 'utf-8')).toBe('');
  });
});
