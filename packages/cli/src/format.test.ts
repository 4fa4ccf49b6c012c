import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  colors,
  setColorsEnabled,
  getColorsEnabled,
  success,
  error,
  warning,
  header,
  dim,
  bold,
  red,
  green,
  blue,
  magenta,
  cyan,
  shortHash,
  stripAnsi,
  table,
  keyValue,
} from './format';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** True if a string contains at least one ANSI escape sequence. */
function hasAnsi(s: string): boolean {
  // eslint-disable-next-line no-control-regex
  return /\x1b\[/.test(s);
}

afterEach(() => setColorsEnabled(true));

// ---------------------------------------------------------------------------
// stripAnsi
// ---------------------------------------------------------------------------

describe('stripAnsi', () => {
  it('removes color and reset codes', () => {
    expect(stripAnsi('\x1b[31mred\x1b[0m')).toBe('red');
  });

  it('removes stacked sequences', () => {
    expect(stripAnsi(`${colors.bold}${colors.underline}header${colors.reset}`)).toBe('header');
  });

  it('returns plain strings unchanged', () => {
    expect(stripAnsi('Node 1 receives block: Block 1')).toBe('Node 1 receives block: Block 1');
  });
});

// ---------------------------------------------------------------------------
// Color toggle
// ---------------------------------------------------------------------------

describe('color toggle', () => {
  it('disables every colorizer', () => {
    setColorsEnabled(false);
    expect(getColorsEnabled()).toBe(false);
    expect([bold('x'), red('x'), green('x'), blue('x'), magenta('x'), cyan('x')]).toEqual(['x', 'x', 'x', 'x', 'x', 'x']);
  });

  it('re-enables colors', () => {
    setColorsEnabled(false);
    setColorsEnabled(true);
    expect(hasAnsi(bold('x'))).toBe(true);
  });
});

describe('colorizers (colors enabled)', () => {
  beforeEach(() => setColorsEnabled(true));

  it('wrap text in the code and a reset', () => {
    expect(red('byzantine')).toBe(`${colors.red}byzantine${colors.reset}`);
    expect(magenta('Commit')).toBe(`${colors.magenta}Commit${colors.reset}`);
    expect(stripAnsi(blue('Prepare'))).toBe('Prepare');
  });
});

// ---------------------------------------------------------------------------
// Semantic formatters
// ---------------------------------------------------------------------------

describe('semantic formatters without colors', () => {
  beforeEach(() => setColorsEnabled(false));

  it('use bracketed prefixes', () => {
    expect(success('done')).toBe('[OK] done');
    expect(error('failed')).toBe('[ERROR] failed');
    expect(warning('careful')).toBe('[WARN] careful');
  });

  it('leave headers and dim text plain', () => {
    expect(header('Final state')).toBe('Final state');
    expect(dim('quiet')).toBe('quiet');
  });
});

describe('semantic formatters with colors', () => {
  it('use symbols', () => {
    expect(stripAnsi(success('done'))).toBe('✔ done');
    expect(stripAnsi(error('failed'))).toBe('✘ failed');
    expect(stripAnsi(warning('careful'))).toBe('! careful');
  });
});

// ---------------------------------------------------------------------------
// shortHash
// ---------------------------------------------------------------------------

describe('shortHash', () => {
  it('keeps the first 12 characters by default', () => {
    expect(shortHash('0123456789abcdef')).toBe('0123456789ab');
    expect(shortHash('0123456789abcdef', 4)).toBe('0123');
  });
});

// ---------------------------------------------------------------------------
// table
// ---------------------------------------------------------------------------

describe('table()', () => {
  beforeEach(() => setColorsEnabled(false));

  it('aligns columns to the widest cell', () => {
    const result = table(
      ['Node', 'Phase'],
      [
        ['1', 'preprepared'],
        ['12', 'committed'],
      ],
    );
    expect(result.split('\n')).toEqual([
      'Node  Phase',
      '────  ───────────',
      '1     preprepared',
      '12    committed',
    ]);
  });

  it('measures width without ANSI codes', () => {
    setColorsEnabled(true);
    const result = table(['Role'], [[red('byzantine')]]);
    expect(stripAnsi(result).split('\n')[1]).toBe('─────────');
  });

  it('renders only header and separator for no rows', () => {
    expect(table(['A', 'B'], []).split('\n')).toEqual(['A  B', '─  ─']);
  });
});

// ---------------------------------------------------------------------------
// keyValue
// ---------------------------------------------------------------------------

describe('keyValue()', () => {
  beforeEach(() => setColorsEnabled(false));

  it('pads keys to the longest one', () => {
    expect(keyValue([['Leader', 'node 1'], ['Proposer', 'node 2']])).toBe('Leader    node 1\nProposer  node 2');
  });

  it('returns an empty string for no pairs', () => {
    expect(keyValue([])).toBe('');
  });
});
