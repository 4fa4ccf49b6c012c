/**
 * @bftsim/types: shared errors, logging and validation for the simulator.
 *
 * @packageDocumentation
 */

import { BftErrorCode, ConfigurationError } from './errors';

// ─── Shared identifiers ─────────────────────────────────────────────────────────

/** Node identifiers are integers in `[1, totalNodes]`. */
export type NodeId = number;

/** Hex-encoded SHA-256 digest. */
export type HashHex = string;

// ─── Validation utilities ───────────────────────────────────────────────────────

/**
 * Assert that `value` is an integer in `[min, max]`.
 *
 * @throws {ConfigurationError} with code CONFIG_INVALID naming `field`.
 *
 * @example
 * ```typescript
 * validateInteger(options.nodes, 'nodes', 1); // throws for 0, 2.5, '4'
 * ```
 */
export function validateInteger(
  value: unknown,
  field: string,
  min: number = 0,
  max: number = Number.MAX_SAFE_INTEGER,
): asserts value is number {
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new ConfigurationError(`${field} must be an integer, got ${String(value)}`, field);
  }
  if (value < min || value > max) {
    const range = max === Number.MAX_SAFE_INTEGER ? `>= ${min}` : `in [${min}, ${max}]`;
    throw new ConfigurationError(`${field} must be ${range}, got ${value}`, field);
  }
}

/**
 * Assert the byzantine fault-tolerance bound `totalNodes > 3f`.
 *
 * @throws {ConfigurationError} with code CONFIG_FAULT_TOLERANCE.
 */
export function validateFaultTolerance(totalNodes: number, f: number): void {
  validateInteger(totalNodes, 'totalNodes', 1);
  validateInteger(f, 'f', 0);
  if (totalNodes <= 3 * f) {
    throw new ConfigurationError(
      `totalNodes must be greater than 3f (got totalNodes=${totalNodes}, f=${f})`,
      'totalNodes',
      BftErrorCode.CONFIG_FAULT_TOLERANCE,
      {
        context: { totalNodes, f },
        hint: `Use at least ${3 * f + 1} nodes or tolerate at most ${Math.floor((totalNodes - 1) / 3)} faults`,
      },
    );
  }
}

// ─── Re-exports ─────────────────────────────────────────────────────────────────

export {
  BftErrorCode,
  BftError,
  ConfigurationError,
  LedgerError,
  isBftError,
  formatError,
} from './errors';
export type { BftErrorOptions } from './errors';

export { Logger, createLogger, defaultLogger, silentLogger, parseLogLevel, LogLevel } from './logger';
export type { LogEntry, LogOutput, LoggerOptions } from './logger';

export {
  isNonEmptyString,
  isNonNegativeInteger,
  isPlainObject,
  sanitizeJsonInput,
  freezeDeep,
  assertNever,
} from './guards';
