/**
 * Error code system for the simulator.
 *
 * Every error carries a stable code (BFTSIM_Exxx) that maps to one failure
 * mode, so drivers and the CLI can branch on the code instead of parsing
 * messages.
 *
 * @packageDocumentation
 */

// ─── Error codes ────────────────────────────────────────────────────────────────

/** All simulator error codes. */
export enum BftErrorCode {
  // Configuration (1xx)
  /** `totalNodes` does not exceed `3f`, so `f` faults cannot be tolerated. */
  CONFIG_FAULT_TOLERANCE = 'BFTSIM_E100',
  /** A configuration value is missing, of the wrong type, or out of range. */
  CONFIG_INVALID = 'BFTSIM_E101',
  /** A configuration file could not be read or parsed. */
  CONFIG_FILE_INVALID = 'BFTSIM_E102',

  // Ledger (2xx)
  /** An append was attempted on a ledger with no blocks. */
  LEDGER_EMPTY = 'BFTSIM_E200',
  /** The block does not link to the current tail of the ledger. */
  LEDGER_LINK_BROKEN = 'BFTSIM_E201',
  /** The block's hash is not the hash of its own fields. */
  BLOCK_INVALID = 'BFTSIM_E202',

  // Network (3xx)
  /** A message was routed to a node that has no mailbox. */
  PEER_UNKNOWN = 'BFTSIM_E300',

  // Simulation (4xx)
  /** The message pump exceeded its budget without draining. */
  SIMULATION_NOT_QUIESCENT = 'BFTSIM_E400',
}

// ─── Error classes ──────────────────────────────────────────────────────────────

/** Options for constructing a {@link BftError}. */
export interface BftErrorOptions {
  /** Additional structured context for diagnostics and logging. */
  context?: Record<string, unknown>;
  /** A human-readable hint suggesting how to resolve the error. */
  hint?: string;
  /** The underlying cause of this error. */
  cause?: Error;
}

/**
 * Base error class for all simulator errors.
 *
 * @example
 * ```typescript
 * throw new BftError(
 *   BftErrorCode.LEDGER_EMPTY,
 *   'Cannot append to an empty ledger',
 *   { hint: 'Start from createGenesis()' }
 * );
 * ```
 */
export class BftError extends Error {
  readonly code: BftErrorCode;
  readonly context?: Record<string, unknown>;
  readonly hint?: string;

  constructor(code: BftErrorCode, message: string, options?: BftErrorOptions) {
    super(message, options?.cause ? { cause: options.cause } : undefined);
    this.name = 'BftError';
    this.code = code;
    this.context = options?.context;
    this.hint = options?.hint;
  }

  /** Structured representation suitable for logging. */
  toJSON(): { code: string; message: string; hint?: string; context?: Record<string, unknown> } {
    const result: { code: string; message: string; hint?: string; context?: Record<string, unknown> } = {
      code: this.code,
      message: this.message,
    };
    if (this.hint !== undefined) {
      result.hint = this.hint;
    }
    if (this.context !== undefined) {
      result.context = this.context;
    }
    return result;
  }
}

/**
 * Thrown when simulation or node parameters are rejected.
 *
 * Raised before any node exists, so a run either starts with a valid
 * configuration or not at all.
 */
export class ConfigurationError extends BftError {
  /** The name of the option that failed validation. */
  readonly field: string;

  constructor(
    message: string,
    field: string,
    code: BftErrorCode = BftErrorCode.CONFIG_INVALID,
    options?: BftErrorOptions,
  ) {
    super(code, message, { ...options, context: { field, ...options?.context } });
    this.name = 'ConfigurationError';
    this.field = field;
  }
}

/** Thrown when a ledger operation would break the chain invariants. */
export class LedgerError extends BftError {
  constructor(code: BftErrorCode, message: string, options?: BftErrorOptions) {
    super(code, message, options);
    this.name = 'LedgerError';
  }
}

// ─── Utility functions ──────────────────────────────────────────────────────────

/** Narrow an unknown thrown value to a {@link BftError}. */
export function isBftError(value: unknown): value is BftError {
  return value instanceof BftError;
}

/**
 * Format an error for terminal output.
 *
 * @example
 * ```typescript
 * formatError(new BftError(BftErrorCode.LEDGER_EMPTY, 'Ledger has no blocks', { hint: 'Use createGenesis()' }));
 * // [BFTSIM_E200] Ledger has no blocks
 * // Hint: Use createGenesis()
 * ```
 */
export function formatError(error: BftError): string {
  const lines: string[] = [];
  lines.push(`[${error.code}] ${error.message}`);
  if (error.hint) {
    lines.push(`Hint: ${error.hint}`);
  }
  return lines.join('\n');
}
