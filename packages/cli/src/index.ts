/**
 * bftsim command-line interface.
 *
 * `run(argv)` is the whole CLI: it returns the exit code and captured
 * output instead of touching the process, so `bin.ts` stays a thin shell.
 *
 * @packageDocumentation
 */

import { FAULT_STRATEGIES, runSimulation } from '@bftsim/simulation';
import type { FaultStrategyKind, SimulationConfigInput } from '@bftsim/simulation';
import {
  ConfigurationError,
  LogLevel,
  createLogger,
  formatError,
  isBftError,
  parseLogLevel,
} from '@bftsim/types';

import { CONFIG_FILE_NAME, loadConfig, loadConfigFile } from './config';
import type { BftsimFileConfig } from './config';
import { bold, dim, setColorsEnabled } from './format';
import { createNarrator, renderReport } from './narrate';

export { CONFIG_FILE_NAME, findConfigFile, loadConfig, loadConfigFile, parseConfigFile } from './config';
export type { BftsimFileConfig, LoadedConfig } from './config';

export const VERSION = '0.1.0';

/** Outcome of one CLI invocation. */
export interface RunResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

// ─── Argument parsing ─────────────────────────────────────────────────────────

interface ParsedArgs {
  command: string;
  positional: string[];
  /** Every value given for each flag, in order. Boolean flags hold `true`. */
  flags: Map<string, Array<string | true>>;
}

/** Flags that never take a value. */
const BOOLEAN_FLAGS = new Set(['json', 'no-color', 'help']);

function parseArgs(args: string[]): ParsedArgs {
  const positional: string[] = [];
  const flags = new Map<string, Array<string | true>>();
  let command = '';

  const addFlag = (key: string, value: string | true): void => {
    flags.set(key, [...(flags.get(key) ?? []), value]);
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';
    if (arg.startsWith('--')) {
      const body = arg.slice(2);
      const eq = body.indexOf('=');
      if (eq >= 0) {
        addFlag(body.slice(0, eq), body.slice(eq + 1));
        continue;
      }
      const next = args[i + 1];
      if (!BOOLEAN_FLAGS.has(body) && next !== undefined && !next.startsWith('--')) {
        addFlag(body, next);
        i++;
      } else {
        addFlag(body, true);
      }
    } else if (command === '') {
      command = arg;
    } else {
      positional.push(arg);
    }
  }

  return { command, positional, flags };
}

function hasFlag(parsed: ParsedArgs, key: string): boolean {
  return parsed.flags.has(key);
}

/** All string values of a flag. */
function getFlagValues(parsed: ParsedArgs, key: string): string[] {
  const values = parsed.flags.get(key) ?? [];
  if (values.some((v) => v === true)) {
    throw new ConfigurationError(`--${key} requires a value`, key);
  }
  return values.filter((v): v is string => v !== true);
}

/** Last string value of a flag. */
function getFlag(parsed: ParsedArgs, key: string): string | undefined {
  const values = getFlagValues(parsed, key);
  return values[values.length - 1];
}

function parseIntegerOption(value: string, flag: string, field: string): number {
  if (!/^-?\d+$/.test(value.trim())) {
    throw new ConfigurationError(`--${flag} must be an integer, got ${value}`, field);
  }
  return Number(value);
}

function parseStrategy(value: string, source: string): FaultStrategyKind {
  const strategy = FAULT_STRATEGIES.find((kind) => kind === value);
  if (!strategy) {
    throw new ConfigurationError(
      `${source} must be one of ${FAULT_STRATEGIES.join(', ')}, got ${value}`,
      'strategy',
    );
  }
  return strategy;
}

function resolveLogLevel(value: string, source: string): LogLevel {
  const level = parseLogLevel(value);
  if (level === undefined) {
    throw new ConfigurationError(
      `${source} must be one of debug, info, warn, error, silent, got ${value}`,
      'logLevel',
    );
  }
  return level;
}

// ─── Option merging ───────────────────────────────────────────────────────────

/** Config file values, overridden by flags. Unset fields fall to the defaults. */
function buildSimulationInput(parsed: ParsedArgs, file: BftsimFileConfig | undefined): SimulationConfigInput {
  const input: { -readonly [K in keyof SimulationConfigInput]: SimulationConfigInput[K] } = {};

  if (file) {
    if (file.nodes !== undefined) input.nodes = file.nodes;
    if (file.faulty !== undefined) input.faulty = file.faulty;
    if (file.byzantineIds !== undefined) input.byzantineIds = file.byzantineIds;
    if (file.blocks !== undefined) input.blocks = file.blocks;
    if (file.strategy !== undefined) input.strategy = file.strategy;
    if (file.maxMessages !== undefined) input.maxMessages = file.maxMessages;
    if (file.logLevel !== undefined) input.logLevel = resolveLogLevel(file.logLevel, 'logLevel');
  }

  const nodes = getFlag(parsed, 'nodes');
  if (nodes !== undefined) input.nodes = parseIntegerOption(nodes, 'nodes', 'nodes');
  const faulty = getFlag(parsed, 'faulty');
  if (faulty !== undefined) input.faulty = parseIntegerOption(faulty, 'faulty', 'faulty');
  const byzantine = getFlag(parsed, 'byzantine');
  if (byzantine !== undefined) {
    input.byzantineIds = byzantine
      .split(',')
      .map((id) => id.trim())
      .filter((id) => id.length > 0)
      .map((id) => parseIntegerOption(id, 'byzantine', 'byzantineIds'));
  }
  const blocks = getFlagValues(parsed, 'block');
  if (blocks.length > 0) input.blocks = blocks;
  const strategy = getFlag(parsed, 'strategy');
  if (strategy !== undefined) input.strategy = parseStrategy(strategy, '--strategy');
  const maxMessages = getFlag(parsed, 'max-messages');
  if (maxMessages !== undefined) input.maxMessages = parseIntegerOption(maxMessages, 'max-messages', 'maxMessages');
  const logLevel = getFlag(parsed, 'log-level');
  if (logLevel !== undefined) input.logLevel = resolveLogLevel(logLevel, '--log-level');

  return input;
}

// ─── Help text ────────────────────────────────────────────────────────────────

function helpText(): string {
  return [
    bold('bftsim') + ' - PBFT consensus simulator',
    '',
    bold('Usage'),
    '  bftsim run [options]',
    '  bftsim help',
    '  bftsim version',
    '',
    bold('Commands'),
    '  run        Run one consensus round per block and print the outcome',
    '  help       Show this help',
    '  version    Print the version',
    '',
    bold('Options for run'),
    '  --nodes <n>            Total nodes (default 4)',
    '  --faulty <f>           Faults to tolerate; requires nodes > 3f (default 1)',
    '  --byzantine <ids>      Comma-separated byzantine ids (default: the first f)',
    '  --block <data>         Block payload; repeat for several rounds (default "Block 1")',
    '  --strategy <kind>      byzantine or random (default byzantine)',
    '  --max-messages <n>     Delivery budget before giving up (default 10000)',
    '  --log-level <level>    debug, info, warn, error or silent (default warn)',
    '  --config <file>        Read options from this file',
    '  --json                 Print the report as JSON',
    '  --no-color             Disable colored output',
    '',
    dim(`Options not given on the command line are read from ${CONFIG_FILE_NAME},`),
    dim('searched for from the working directory upwards.'),
  ].join('\n');
}

// ─── Commands ─────────────────────────────────────────────────────────────────

async function cmdRun(parsed: ParsedArgs, cwd: string, out: string[], err: string[]): Promise<void> {
  const configPath = getFlag(parsed, 'config');
  const loaded = configPath !== undefined ? await loadConfigFile(configPath) : await loadConfig(cwd);
  const input = buildSimulationInput(parsed, loaded?.config);
  const json = hasFlag(parsed, 'json');

  const logger = createLogger({
    level: input.logLevel ?? LogLevel.WARN,
    output: (entry) => err.push(JSON.stringify(entry)),
  });
  if (loaded) {
    logger.child('cli').info('config file loaded', { path: loaded.path });
  }

  const report = runSimulation(input, {
    logger,
    onEvent: json ? undefined : createNarrator((line) => out.push(line)),
  });

  if (json) {
    out.push(JSON.stringify(report, null, 2));
  } else {
    out.push(renderReport(report));
  }
}

/**
 * Run the CLI with user arguments (no `node` or script path).
 *
 * @param cwd - Where to start looking for a config file.
 */
export async function run(argv: string[], cwd: string = process.cwd()): Promise<RunResult> {
  const out: string[] = [];
  const err: string[] = [];
  let exitCode = 0;

  try {
    const parsed = parseArgs(argv);
    setColorsEnabled(!hasFlag(parsed, 'no-color'));

    switch (parsed.command) {
      case '':
      case 'help':
        out.push(helpText());
        break;
      case 'version':
        out.push(hasFlag(parsed, 'json') ? JSON.stringify({ version: VERSION }) : VERSION);
        break;
      case 'run':
        if (hasFlag(parsed, 'help')) {
          out.push(helpText());
          break;
        }
        await cmdRun(parsed, cwd, out, err);
        break;
      default:
        err.push(`Error: unknown command "${parsed.command}". Run "bftsim help" for usage.`);
        exitCode = 1;
    }
  } catch (e) {
    exitCode = 1;
    if (isBftError(e)) {
      err.push(formatError(e));
    } else {
      err.push(`Error: ${e instanceof Error ? e.message : String(e)}`);
    }
  }

  return { exitCode, stdout: out.join('\n'), stderr: err.join('\n') };
}
