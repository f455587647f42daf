import { describe, expect, it } from 'vitest';

import { renderScriptError } from '../../src/output/errors.js';
import { ScriptError, type TraceFrame } from '../../src/script/errors.js';

const CWD = '/work';

function frame(alias: string, line: number): TraceFrame {
  return { alias, callSite: { file: '/work/main.mem', line } };
}

describe('renderScriptError', () => {
  it('renders the headline alone without a position', () => {
    const error = new ScriptError('IOError', 'Script not found: /work/x.mem');

    expect(renderScriptError(error, CWD)).toBe(
      'IOError: Script not found: /work/x.mem'
    );
  });

  it('shows the position relative to the working directory', () => {
    const error = new ScriptError('NameError', 'variable $x is not declared', {
      file: '/work/lib/util.mem',
      line: 4,
    });

    expect(renderScriptError(error, CWD)).toBe(
      ['NameError: variable $x is not declared', '    at lib/util.mem:4'].join('\n')
    );
  });

  it('keeps paths outside the working directory absolute', () => {
    const error = new ScriptError('SyntaxError', 'unterminated string', {
      file: '/elsewhere/a.mem',
      line: 1,
    });

    expect(renderScriptError(error, CWD)).toBe(
      ['SyntaxError: unterminated string', '    at /elsewhere/a.mem:1'].join('\n')
    );
  });

  it('lists calls innermost first', () => {
    const error = new ScriptError(
      'TypeError',
      'division by zero',
      { file: '/work/main.mem', line: 9 },
      [frame('outer', 12), frame('inner', 3)]
    );

    expect(renderScriptError(error, CWD)).toBe(
      [
        'TypeError: division by zero',
        '    at main.mem:9',
        '    in inner, called at main.mem:3',
        '    in outer, called at main.mem:12',
      ].join('\n')
    );
  });

  it('summarizes deep traces', () => {
    const trace = Array.from({ length: 13 }, (_, i) => frame('loop', i + 1));
    const error = new ScriptError(
      'StackOverflow',
      'call depth exceeded 12 calling loop',
      { file: '/work/main.mem', line: 2 },
      trace
    );

    const lines = renderScriptError(error, CWD).split('\n');

    expect(lines).toHaveLength(13);
    expect(lines[2]).toBe('    in loop, called at main.mem:13');
    expect(lines[11]).toBe('    in loop, called at main.mem:4');
    expect(lines[12]).toBe('    ... 3 more calls');
  });
});
