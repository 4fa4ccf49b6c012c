/**
 * Terminal formatting for the bftsim CLI.
 *
 * Plain ANSI escape codes; every helper degrades to undecorated text when
 * colours are switched off with `--no-color`.
 *
 * @packageDocumentation
 */

// ─── ANSI color codes ─────────────────────────────────────────────────────────

export const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  underline: '\x1b[4m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
} as const;

// ─── Global color toggle ──────────────────────────────────────────────────────

let colorsEnabled = true;

/** Enable or disable ANSI color output globally. */
export function setColorsEnabled(enabled: boolean): void {
  colorsEnabled = enabled;
}

export function getColorsEnabled(): boolean {
  return colorsEnabled;
}

// ─── Low-level colorizers ─────────────────────────────────────────────────────

function c(code: string, text: string): string {
  if (!colorsEnabled) return text;
  return `${code}${text}${colors.reset}`;
}

export function bold(text: string): string {
  return c(colors.bold, text);
}

export function red(text: string): string {
  return c(colors.red, text);
}

export function green(text: string): string {
  return c(colors.green, text);
}

export function blue(text: string): string {
  return c(colors.blue, text);
}

export function magenta(text: string): string {
  return c(colors.magenta, text);
}

export function cyan(text: string): string {
  return c(colors.cyan, text);
}

// ─── Semantic formatters ──────────────────────────────────────────────────────

/** Green checkmark + message. */
export function success(msg: string): string {
  if (!colorsEnabled) return `[OK] ${msg}`;
  return `${colors.green}✔${colors.reset} ${msg}`;
}

/** Red X + message. */
export function error(msg: string): string {
  if (!colorsEnabled) return `[ERROR] ${msg}`;
  return `${colors.red}✘${colors.reset} ${msg}`;
}

/** Yellow exclamation + message. */
export function warning(msg: string): string {
  if (!colorsEnabled) return `[WARN] ${msg}`;
  return `${colors.yellow}!${colors.reset} ${msg}`;
}

/** Bold + underlined header text. */
export function header(msg: string): string {
  if (!colorsEnabled) return msg;
  return `${colors.bold}${colors.underline}${msg}${colors.reset}`;
}

/** Dim/gray text. */
export function dim(msg: string): string {
  if (!colorsEnabled) return msg;
  return `${colors.gray}${msg}${colors.reset}`;
}

/** Leading characters of a hash, enough to tell blocks apart on screen. */
export function shortHash(hash: string, length: number = 12): string {
  return hash.slice(0, length);
}

// ─── Strip ANSI codes ─────────────────────────────────────────────────────────

/** Strip all ANSI escape sequences from a string. */
export function stripAnsi(text: string): string {
  // eslint-disable-next-line no-control-regex
  return text.replace(/\x1b\[[0-9;]*m/g, '');
}

// ─── Table formatting ─────────────────────────────────────────────────────────

/**
 * Render an aligned table from headers and rows.
 * All cells are left-aligned with a 2-space gutter; widths ignore ANSI codes.
 */
export function table(headers: string[], rows: string[][]): string {
  const widths = headers.map((h, col) =>
    rows.reduce((max, row) => Math.max(max, stripAnsi(row[col] ?? '').length), stripAnsi(h).length),
  );

  function padCell(text: string, width: number): string {
    const pad = width - stripAnsi(text).length;
    return pad > 0 ? text + ' '.repeat(pad) : text;
  }

  const gutter = '  ';
  const lines: string[] = [];

  lines.push(headers.map((h, i) => bold(padCell(h, widths[i] ?? 0))).join(gutter).trimEnd());
  lines.push(dim(widths.map((w) => '─'.repeat(w)).join(gutter)));
  for (const row of rows) {
    lines.push(row.map((cell, i) => padCell(cell, widths[i] ?? 0)).join(gutter).trimEnd());
  }

  return lines.join('\n');
}

// ─── Key-value display ────────────────────────────────────────────────────────

/**
 * Render key-value pairs with aligned values.
 * Keys are displayed in bold, values are plain.
 */
export function keyValue(pairs: [string, string][]): string {
  if (pairs.length === 0) return '';

  const maxKeyLen = Math.max(...pairs.map(([k]) => k.length));
  return pairs.map(([key, value]) => `${bold(key.padEnd(maxKeyLen))}  ${value}`).join('\n');
}
