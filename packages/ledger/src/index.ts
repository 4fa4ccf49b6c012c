/**
 * Hash-linked block ledger.
 *
 * Every block's hash covers its payload, timestamp and the hash of the
 * block before it, so changing any historical block breaks the chain at
 * that index. All operations are pure: appends return a new frozen ledger.
 *
 * @packageDocumentation
 */

import { sha256String, unixTimestamp } from '@bftsim/crypto';
import { BftErrorCode, LedgerError } from '@bftsim/types';
import type { HashHex } from '@bftsim/types';

import type { Block, Ledger, LedgerVerification } from './types';

export type { Block, Ledger, LedgerVerification } from './types';

/** Payload of the first block of every ledger. */
export const GENESIS_DATA = 'Genesis Block';

/** `prevHash` carried by the genesis block. */
export const GENESIS_PREV_HASH = '0';

/**
 * Hash of a block's fields: SHA-256 over the UTF-8 concatenation
 * `data + timestamp + prevHash`.
 */
export function computeBlockHash(data: string, timestamp: number, prevHash: string): HashHex {
  return sha256String(`${data}${timestamp}${prevHash}`);
}

/**
 * Build a frozen block on top of `prevHash`.
 *
 * @param timestamp - Unix seconds; defaults to now.
 *
 * @example
 * ```typescript
 * const block = createBlock('Block 1', genesis.hash);
 * isBlockValid(block); // true
 * ```
 */
export function createBlock(data: string, prevHash: string, timestamp: number = unixTimestamp()): Block {
  return Object.freeze({
    data,
    timestamp,
    prevHash,
    hash: computeBlockHash(data, timestamp, prevHash),
  });
}

/** A one-block ledger holding only the genesis block. */
export function createGenesis(timestamp?: number): Ledger {
  return Object.freeze([createBlock(GENESIS_DATA, GENESIS_PREV_HASH, timestamp)]);
}

/** The tail block, or `undefined` for an empty ledger. */
export function lastBlock(ledger: Ledger): Block | undefined {
  return ledger[ledger.length - 1];
}

export function ledgerLength(ledger: Ledger): number {
  return ledger.length;
}

/** Whether a block with this hash is anywhere in the ledger. */
export function hasBlock(ledger: Ledger, hash: HashHex): boolean {
  return ledger.some((block) => block.hash === hash);
}

function requireTail(ledger: Ledger): Block {
  const tail = lastBlock(ledger);
  if (!tail) {
    throw new LedgerError(BftErrorCode.LEDGER_EMPTY, 'Cannot append to an empty ledger', {
      hint: 'Start from createGenesis()',
    });
  }
  return tail;
}

/**
 * Build a block on the tail and return the extended ledger.
 *
 * @throws {LedgerError} `LEDGER_EMPTY` when the ledger has no blocks.
 */
export function append(ledger: Ledger, data: string, timestamp?: number): Ledger {
  const tail = requireTail(ledger);
  return Object.freeze([...ledger, createBlock(data, tail.hash, timestamp)]);
}

/**
 * Append an existing block, so every node that commits it stores an
 * identical copy.
 *
 * @throws {LedgerError} `LEDGER_EMPTY`, `BLOCK_INVALID` when the block's hash
 *   is not the hash of its fields, or `LEDGER_LINK_BROKEN` when it does not
 *   build on the tail.
 */
export function appendBlock(ledger: Ledger, block: Block): Ledger {
  const tail = requireTail(ledger);
  if (!isBlockValid(block)) {
    throw new LedgerError(BftErrorCode.BLOCK_INVALID, `Block hash ${block.hash} does not match its contents`, {
      context: { hash: block.hash },
    });
  }
  if (!isLinked(tail, block)) {
    throw new LedgerError(BftErrorCode.LEDGER_LINK_BROKEN, 'Block does not link to the ledger tail', {
      context: { expected: tail.hash, actual: block.prevHash },
    });
  }
  return Object.freeze([...ledger, Object.isFrozen(block) ? block : Object.freeze({ ...block })]);
}

/** Recompute the hash and compare it with the stored one. */
export function isBlockValid(block: Block): boolean {
  return computeBlockHash(block.data, block.timestamp, block.prevHash) === block.hash;
}

export function isLinked(prev: Block, next: Block): boolean {
  return next.prevHash === prev.hash;
}

/**
 * Walk the chain and report the first index whose hash is inconsistent or
 * whose `prevHash` does not match its predecessor. An empty ledger is
 * invalid with nothing broken.
 */
export function verifyLedger(ledger: Ledger): LedgerVerification {
  if (ledger.length === 0) {
    return { valid: false, blocks: 0 };
  }
  for (let i = 0; i < ledger.length; i++) {
    const block = ledger[i];
    const prev = i > 0 ? ledger[i - 1] : undefined;
    if (!block || !isBlockValid(block) || (prev !== undefined && !isLinked(prev, block))) {
      return { valid: false, brokenAt: i, blocks: ledger.length };
    }
  }
  return { valid: true, blocks: ledger.length };
}

/**
 * `false` for an empty ledger, `true` for a single block, otherwise every
 * block must hash correctly and link to its predecessor.
 */
export function isChainValid(ledger: Ledger): boolean {
  if (ledger.length === 1) {
    return true;
  }
  return verifyLedger(ledger).valid;
}
