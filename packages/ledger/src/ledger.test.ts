import { describe, it, expect } from 'vitest';
import { sha256String } from '@bftsim/crypto';
import { BftErrorCode, LedgerError } from '@bftsim/types';
import {
  GENESIS_DATA,
  GENESIS_PREV_HASH,
  append,
  appendBlock,
  computeBlockHash,
  createBlock,
  createGenesis,
  hasBlock,
  isBlockValid,
  isChainValid,
  isLinked,
  lastBlock,
  ledgerLength,
  verifyLedger,
} from './index';
import type { Block, Ledger } from './index';

const T0 = 1_700_000_000;

function threeBlockLedger(): Ledger {
  return append(append(createGenesis(T0), 'Block 1', T0 + 1), 'Block 2', T0 + 2);
}

// ---------------------------------------------------------------------------
// Blocks
// ---------------------------------------------------------------------------
describe('computeBlockHash', () => {
  it('hashes data, timestamp and prevHash concatenated', () => {
    expect(computeBlockHash('Block 1', 42, 'abc')).toBe(sha256String('Block 142abc'));
  });
});

describe('createBlock', () => {
  it('fills in a consistent hash', () => {
    const block = createBlock('Block 1', 'prev', T0);
    expect(block).toEqual({
      data: 'Block 1',
      timestamp: T0,
      prevHash: 'prev',
      hash: sha256String(`Block 1${T0}prev`),
    });
  });

  it('returns a frozen block', () => {
    expect(Object.isFrozen(createBlock('x', '0', T0))).toBe(true);
  });

  it('defaults the timestamp to the current unix second', () => {
    const before = Math.floor(Date.now() / 1000);
    const block = createBlock('x', '0');
    expect(block.timestamp).toBeGreaterThanOrEqual(before);
    expect(block.timestamp).toBeLessThanOrEqual(Math.floor(Date.now() / 1000));
  });
});

describe('isBlockValid', () => {
  const block = createBlock('Block 1', 'prev', T0);

  it('accepts an untouched block', () => {
    expect(isBlockValid(block)).toBe(true);
  });

  it('rejects a block whose data was altered', () => {
    expect(isBlockValid({ ...block, data: 'Block 2' })).toBe(false);
  });

  it('rejects a block whose timestamp was altered', () => {
    expect(isBlockValid({ ...block, timestamp: T0 + 1 })).toBe(false);
  });

  it('rejects a block whose prevHash was altered', () => {
    expect(isBlockValid({ ...block, prevHash: 'other' })).toBe(false);
  });

  it('rejects a block whose hash was altered', () => {
    expect(isBlockValid({ ...block, hash: '0'.repeat(64) })).toBe(false);
  });
});

describe('isLinked', () => {
  it('compares next.prevHash with prev.hash', () => {
    const a = createBlock('a', '0', T0);
    const b = createBlock('b', a.hash, T0);
    expect(isLinked(a, b)).toBe(true);
    expect(isLinked(b, a)).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// Ledger construction
// ---------------------------------------------------------------------------
describe('createGenesis', () => {
  it('holds a single genesis block', () => {
    const ledger = createGenesis(T0);
    expect(ledgerLength(ledger)).toBe(1);
    expect(ledger[0]?.data).toBe(GENESIS_DATA);
    expect(ledger[0]?.prevHash).toBe(GENESIS_PREV_HASH);
    expect(ledger[0]?.hash).toBe(sha256String(`Genesis Block${T0}0`));
  });

  it('is frozen', () => {
    expect(Object.isFrozen(createGenesis(T0))).toBe(true);
  });
});

describe('append', () => {
  it('builds on the tail hash without touching the original', () => {
    const genesis = createGenesis(T0);
    const next = append(genesis, 'Block 1', T0 + 1);
    expect(ledgerLength(genesis)).toBe(1);
    expect(ledgerLength(next)).toBe(2);
    expect(next[1]?.prevHash).toBe(genesis[0]?.hash);
    expect(next[0]).toBe(genesis[0]);
  });

  it('fails with LEDGER_EMPTY on an empty ledger', () => {
    try {
      append([], 'Block 1');
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(LedgerError);
      expect((err as LedgerError).code).toBe(BftErrorCode.LEDGER_EMPTY);
    }
  });
});

describe('appendBlock', () => {
  const genesis = createGenesis(T0);
  const tailHash = genesis[0]?.hash ?? '';

  it('stores the exact block instance it was given', () => {
    const block = createBlock('Block 1', tailHash, T0 + 1);
    const next = appendBlock(genesis, block);
    expect(next[1]).toBe(block);
  });

  it('freezes a plain block before storing it', () => {
    const block: Block = { data: 'x', timestamp: T0, prevHash: tailHash, hash: computeBlockHash('x', T0, tailHash) };
    const next = appendBlock(genesis, block);
    expect(Object.isFrozen(next[1])).toBe(true);
    expect(next[1]).toEqual(block);
  });

  it('rejects an empty ledger', () => {
    expect(() => appendBlock([], createBlock('x', '0', T0))).toThrow('Cannot append to an empty ledger');
  });

  it('rejects an inconsistent block with BLOCK_INVALID', () => {
    const block = { ...createBlock('x', tailHash, T0), data: 'y' };
    try {
      appendBlock(genesis, block);
      expect.unreachable();
    } catch (err) {
      expect((err as LedgerError).code).toBe(BftErrorCode.BLOCK_INVALID);
    }
  });

  it('rejects a block on another parent with LEDGER_LINK_BROKEN', () => {
    const block = createBlock('x', 'elsewhere', T0);
    try {
      appendBlock(genesis, block);
      expect.unreachable();
    } catch (err) {
      const ledgerErr = err as LedgerError;
      expect(ledgerErr.code).toBe(BftErrorCode.LEDGER_LINK_BROKEN);
      expect(ledgerErr.context).toEqual({ expected: tailHash, actual: 'elsewhere' });
    }
  });
});

// ---------------------------------------------------------------------------
// Read helpers
// ---------------------------------------------------------------------------
describe('read helpers', () => {
  it('lastBlock returns the tail or undefined', () => {
    const ledger = threeBlockLedger();
    expect(lastBlock(ledger)?.data).toBe('Block 2');
    expect(lastBlock([])).toBeUndefined();
  });

  it('hasBlock looks up by hash', () => {
    const ledger = threeBlockLedger();
    expect(hasBlock(ledger, ledger[1]?.hash ?? '')).toBe(true);
    expect(hasBlock(ledger, 'missing')).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// Chain validation
// ---------------------------------------------------------------------------
describe('isChainValid', () => {
  it('is false for an empty ledger', () => {
    expect(isChainValid([])).toBe(false);
  });

  it('is true for a lone genesis block', () => {
    expect(isChainValid(createGenesis(T0))).toBe(true);
  });

  it('is true for a ledger grown by append', () => {
    expect(isChainValid(threeBlockLedger())).toBe(true);
  });

  it('is false when a middle prevHash is tampered', () => {
    const [g, b1, b2] = threeBlockLedger();
    if (!g || !b1 || !b2) throw new Error('fixture');
    expect(isChainValid([g, { ...b1, prevHash: 'tampered' }, b2])).toBe(false);
  });

  it('is false when a middle block is re-hashed onto another parent', () => {
    const [g, , b2] = threeBlockLedger();
    if (!g || !b2) throw new Error('fixture');
    const forged = createBlock('Block 1', 'elsewhere', T0 + 1);
    expect(isChainValid([g, forged, b2])).toBe(false);
  });

  it('is false when only the tail block is edited after hashing', () => {
    const [g, b1] = threeBlockLedger();
    if (!g || !b1) throw new Error('fixture');
    expect(isChainValid([g, { ...b1, data: 'Edited' }])).toBe(false);
  });
});

describe('verifyLedger', () => {
  it('reports the block count of a valid chain', () => {
    expect(verifyLedger(threeBlockLedger())).toEqual({ valid: true, blocks: 3 });
  });

  it('reports an empty ledger as invalid without an index', () => {
    expect(verifyLedger([])).toEqual({ valid: false, blocks: 0 });
  });

  it('points at the first broken index', () => {
    const [g, b1, b2] = threeBlockLedger();
    if (!g || !b1 || !b2) throw new Error('fixture');
    expect(verifyLedger([g, b1, { ...b2, data: 'changed' }])).toEqual({ valid: false, brokenAt: 2, blocks: 3 });
    expect(verifyLedger([{ ...g, data: 'changed' }, b1, b2])).toEqual({ valid: false, brokenAt: 0, blocks: 3 });
  });
});
