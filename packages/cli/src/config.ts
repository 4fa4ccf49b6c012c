/**
 * `bftsim.config.json` support.
 *
 * The file holds the same fields as the command-line options. It is found
 * by walking up from the working directory, or named with `--config`.
 *
 * @packageDocumentation
 */

import { existsSync } from 'fs';
import { readFile } from 'fs/promises';
import { join, resolve } from 'path';

import { FAULT_STRATEGIES } from '@bftsim/simulation';
import type { FaultStrategyKind } from '@bftsim/simulation';
import { BftErrorCode, ConfigurationError, isPlainObject, sanitizeJsonInput } from '@bftsim/types';

// ─── Types ────────────────────────────────────────────────────────────────────

/** Shape of a `bftsim.config.json` file. Every field is optional. */
export interface BftsimFileConfig {
  nodes?: number;
  faulty?: number;
  byzantineIds?: number[];
  blocks?: string[];
  strategy?: FaultStrategyKind;
  maxMessages?: number;
  /** Level name: debug, info, warn, error or silent. */
  logLevel?: string;
}

/** A parsed config file and where it came from. */
export interface LoadedConfig {
  path: string;
  config: BftsimFileConfig;
}

/** Name of the configuration file. */
export const CONFIG_FILE_NAME = 'bftsim.config.json';

const KNOWN_KEYS: readonly string[] = ['nodes', 'faulty', 'byzantineIds', 'blocks', 'strategy', 'maxMessages', 'logLevel'];

// ─── Parsing ──────────────────────────────────────────────────────────────────

function invalid(path: string, message: string, field: string): ConfigurationError {
  return new ConfigurationError(`${path}: ${message}`, field, BftErrorCode.CONFIG_FILE_INVALID, {
    context: { path },
  });
}

function readNumber(raw: Record<string, unknown>, key: string, path: string): number | undefined {
  const value = raw[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'number') {
    throw invalid(path, `"${key}" must be a number`, key);
  }
  return value;
}

function readString(raw: Record<string, unknown>, key: string, path: string): string | undefined {
  const value = raw[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'string') {
    throw invalid(path, `"${key}" must be a string`, key);
  }
  return value;
}

function readNumberArray(raw: Record<string, unknown>, key: string, path: string): number[] | undefined {
  const value = raw[key];
  if (value === undefined) return undefined;
  if (!Array.isArray(value) || !value.every((item): item is number => typeof item === 'number')) {
    throw invalid(path, `"${key}" must be an array of numbers`, key);
  }
  return value;
}

function readStringArray(raw: Record<string, unknown>, key: string, path: string): string[] | undefined {
  const value = raw[key];
  if (value === undefined) return undefined;
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw invalid(path, `"${key}" must be an array of strings`, key);
  }
  return value;
}

function readStrategy(raw: Record<string, unknown>, path: string): FaultStrategyKind | undefined {
  const value = readString(raw, 'strategy', path);
  if (value === undefined) return undefined;
  const strategy = FAULT_STRATEGIES.find((kind) => kind === value);
  if (!strategy) {
    throw invalid(path, `"strategy" must be one of ${FAULT_STRATEGIES.join(', ')}`, 'strategy');
  }
  return strategy;
}

/**
 * Parse and type-check the contents of a config file. Value ranges are
 * left to the simulation config validation.
 *
 * @throws {ConfigurationError} `CONFIG_FILE_INVALID` for malformed JSON,
 *   unknown keys or wrongly typed values.
 */
export function parseConfigFile(text: string, path: string): BftsimFileConfig {
  let raw: unknown;
  try {
    raw = sanitizeJsonInput(text);
  } catch (err) {
    throw new ConfigurationError(`${path}: not valid JSON`, 'config', BftErrorCode.CONFIG_FILE_INVALID, {
      context: { path },
      cause: err instanceof Error ? err : undefined,
    });
  }
  if (!isPlainObject(raw)) {
    throw invalid(path, 'expected a JSON object', 'config');
  }
  for (const key of Object.keys(raw)) {
    if (!KNOWN_KEYS.includes(key)) {
      throw invalid(path, `unknown option "${key}"`, key);
    }
  }

  const config: BftsimFileConfig = {};
  const nodes = readNumber(raw, 'nodes', path);
  if (nodes !== undefined) config.nodes = nodes;
  const faulty = readNumber(raw, 'faulty', path);
  if (faulty !== undefined) config.faulty = faulty;
  const byzantineIds = readNumberArray(raw, 'byzantineIds', path);
  if (byzantineIds !== undefined) config.byzantineIds = byzantineIds;
  const blocks = readStringArray(raw, 'blocks', path);
  if (blocks !== undefined) config.blocks = blocks;
  const strategy = readStrategy(raw, path);
  if (strategy !== undefined) config.strategy = strategy;
  const maxMessages = readNumber(raw, 'maxMessages', path);
  if (maxMessages !== undefined) config.maxMessages = maxMessages;
  const logLevel = readString(raw, 'logLevel', path);
  if (logLevel !== undefined) config.logLevel = logLevel;
  return config;
}

// ─── File lookup ──────────────────────────────────────────────────────────────

/**
 * Search for a `bftsim.config.json` starting from `cwd` and walking up to the
 * filesystem root. Returns the absolute path if found, or `undefined`.
 */
export function findConfigFile(cwd?: string): string | undefined {
  let dir = resolve(cwd ?? '.');

  for (;;) {
    const candidate = join(dir, CONFIG_FILE_NAME);
    if (existsSync(candidate)) {
      return candidate;
    }
    const parent = resolve(dir, '..');
    if (parent === dir) break; // reached filesystem root
    dir = parent;
  }

  return undefined;
}

/**
 * Read and parse one config file.
 *
 * @throws {ConfigurationError} `CONFIG_FILE_INVALID` when it cannot be read or parsed.
 */
export async function loadConfigFile(path: string): Promise<LoadedConfig> {
  const absolute = resolve(path);
  let text: string;
  try {
    text = await readFile(absolute, 'utf-8');
  } catch (err) {
    throw new ConfigurationError(`${absolute}: cannot be read`, 'config', BftErrorCode.CONFIG_FILE_INVALID, {
      context: { path: absolute },
      cause: err instanceof Error ? err : undefined,
      hint: 'Check the --config path',
    });
  }
  return { path: absolute, config: parseConfigFile(text, absolute) };
}

/**
 * Load the nearest `bftsim.config.json` above `cwd`, or `undefined` when
 * there is none.
 */
export async function loadConfig(cwd?: string): Promise<LoadedConfig | undefined> {
  const path = findConfigFile(cwd);
  return path === undefined ? undefined : loadConfigFile(path);
}
