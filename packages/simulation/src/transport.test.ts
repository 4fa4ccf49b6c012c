import { describe, it, expect } from 'vitest';
import { BftError, BftErrorCode } from '@bftsim/types';
import { InMemoryTransport } from './transport';

describe('InMemoryTransport', () => {
  it('issues one handle per node', () => {
    const transport = new InMemoryTransport<string>();
    const first = transport.register(1);
    expect(transport.register(1)).toBe(first);
    expect(transport.handleFor(1)).toBe(first);
    expect(first).toEqual({ nodeId: 1 });
  });

  it('delivers in FIFO order across mailboxes', () => {
    const transport = new InMemoryTransport<string>();
    const a = transport.register(1);
    const b = transport.register(2);
    transport.post({ from: 2, to: 1, handle: a, message: 'first' });
    transport.post({ from: 1, to: 2, handle: b, message: 'second' });
    transport.post({ from: 2, to: 1, handle: a, message: 'third' });
    expect(transport.pending).toBe(3);
    expect([transport.next()?.message, transport.next()?.message, transport.next()?.message]).toEqual([
      'first',
      'second',
      'third',
    ]);
    expect(transport.next()).toBeUndefined();
    expect(transport.pending).toBe(0);
    expect(transport.totalPosted).toBe(3);
  });

  it('rejects an id with no mailbox', () => {
    const transport = new InMemoryTransport<string>();
    try {
      transport.handleFor(9);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(BftError);
      expect((err as BftError).code).toBe(BftErrorCode.PEER_UNKNOWN);
      expect((err as BftError).message).toBe('No mailbox for node 9');
    }
  });

  it('rejects a handle issued by another transport', () => {
    const transport = new InMemoryTransport<string>();
    transport.register(1);
    const foreign = new InMemoryTransport<string>().register(1);
    expect(() => transport.post({ from: 2, to: 1, handle: foreign, message: 'x' })).toThrow('No mailbox for node 1');
    expect(transport.pending).toBe(0);
  });
});
