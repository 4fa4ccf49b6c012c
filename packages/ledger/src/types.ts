import type { HashHex } from '@bftsim/types';

/** A block in the chain. Frozen once constructed. */
export interface Block {
  /** Opaque payload. */
  readonly data: string;
  /** Creation time in whole unix seconds. */
  readonly timestamp: number;
  /** Hash of the preceding block, or `"0"` for genesis. */
  readonly prevHash: string;
  /** SHA-256 of `data`, `timestamp` and `prevHash` concatenated. */
  readonly hash: HashHex;
}

/** Ordered blocks, genesis at index 0. Grows only at the tail. */
export type Ledger = readonly Block[];

/** Outcome of {@link verifyLedger}. */
export interface LedgerVerification {
  valid: boolean;
  /** Index of the first block that fails its own hash or its link. */
  brokenAt?: number;
  /** Number of blocks examined. */
  blocks: number;
}
