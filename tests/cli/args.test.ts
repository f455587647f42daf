import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from 'vitest';

import { parseArgs, printUsage } from '../../src/cli/args.js';

describe('parseArgs', () => {
  let exitSpy: MockInstance<typeof process.exit>;
  let errorSpy: ReturnType<typeof vi.spyOn>;
  let logSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    vi.clearAllMocks();

    // Mock process.exit to throw
    exitSpy = vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`process.exit(${code})`);
    });

    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    exitSpy.mockRestore();
    errorSpy.mockRestore();
    logSpy.mockRestore();
  });

  describe('script file', () => {
    it('exits with error when no script file given', () => {
      expect(() => parseArgs([])).toThrow('process.exit(1)');
      expect(errorSpy).toHaveBeenCalledWith('Error: script file required');
    });

    it('parses a bare script file', () => {
      const result = parseArgs(['main.mem']);

      expect(result).toEqual({
        scriptFile: 'main.mem',
        scriptArgs: [],
        configFile: null,
        config: {},
      });
    });

    it('passes everything after the script file to the script', () => {
      const result = parseArgs(['main.mem', 'one', '--quiet', 'two']);

      expect(result.scriptArgs).toEqual(['one', '--quiet', 'two']);
      expect(result.config).toEqual({});
    });
  });

  describe('options', () => {
    it('sets verbosity', () => {
      expect(parseArgs(['--quiet', 'a.mem']).config.verbosity).toBe('quiet');
      expect(parseArgs(['--normal', 'a.mem']).config.verbosity).toBe('normal');
      expect(parseArgs(['--verbose', 'a.mem']).config.verbosity).toBe(
        'verbose'
      );
    });

    it('lets the last verbosity flag win', () => {
      const result = parseArgs(['--quiet', '--verbose', 'a.mem']);

      expect(result.config.verbosity).toBe('verbose');
    });

    it('toggles logging and tracing', () => {
      expect(parseArgs(['--log', 'a.mem']).config.enableLog).toBe(true);
      expect(parseArgs(['--log', '--no-log', 'a.mem']).config.enableLog).toBe(
        false
      );
      expect(parseArgs(['--trace', 'a.mem']).config.trace).toBe(true);
    });

    it('reads option values in both forms', () => {
      const spaced = parseArgs(['--log-dir', 'out', 'a.mem']);
      const joined = parseArgs(['--log-dir=out', 'a.mem']);

      expect(spaced.config.logDir).toBe('out');
      expect(joined.config.logDir).toBe('out');
      expect(joined.scriptFile).toBe('a.mem');
    });

    it('parses --max-depth', () => {
      const result = parseArgs(['--max-depth', '64', 'a.mem']);

      expect(result.config.maxCallDepth).toBe(64);
    });

    it('rejects a non-positive --max-depth', () => {
      expect(() => parseArgs(['--max-depth=0', 'a.mem'])).toThrow(
        'process.exit(1)'
      );
      expect(errorSpy).toHaveBeenCalledWith(
        "Error: --max-depth must be a positive integer, got '0'"
      );
    });

    it('parses --config', () => {
      const result = parseArgs(['--config', 'custom.json5', 'a.mem']);

      expect(result.configFile).toBe('custom.json5');
    });

    it('exits when an option value is missing', () => {
      expect(() => parseArgs(['--config'])).toThrow('process.exit(1)');
      expect(errorSpy).toHaveBeenCalledWith('Error: --config requires a value');
    });

    it('exits on unknown options', () => {
      expect(() => parseArgs(['--fast', 'a.mem'])).toThrow('process.exit(1)');
      expect(errorSpy).toHaveBeenCalledWith("Error: unknown option '--fast'");
    });
  });

  describe('informational flags', () => {
    it('prints the version and exits', () => {
      expect(() => parseArgs(['--version'])).toThrow('process.exit(0)');
      expect(logSpy).toHaveBeenCalledTimes(1);
    });

    it('prints usage for --help and exits', () => {
      expect(() => parseArgs(['-h'])).toThrow('process.exit(0)');
      expect(logSpy).toHaveBeenCalledWith(
        expect.stringContaining('Usage: memscript [options] <file.mem>')
      );
    });
  });
});

describe('printUsage', () => {
  it('lists the options', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    printUsage();

    const text = String(logSpy.mock.calls[0]?.[0]);
    expect(text).toContain('--max-depth <n>');
    expect(text).toContain('--config <file>');
    logSpy.mockRestore();
  });
});
