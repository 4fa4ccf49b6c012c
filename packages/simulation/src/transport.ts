import { BftError, BftErrorCode } from '@bftsim/types';
import type { NodeId } from '@bftsim/types';
import type { Envelope } from '@bftsim/network';

/** Opaque handle for one mailbox. Only the transport that issued it accepts it. */
export interface MailboxHandle {
  readonly nodeId: NodeId;
}

/**
 * In-process message transport: one mailbox per node, drained in global
 * FIFO order so a run is reproducible.
 */
export class InMemoryTransport<M> {
  private readonly handles = new Map<NodeId, MailboxHandle>();
  private readonly queue: Envelope<MailboxHandle, M>[] = [];
  private posted = 0;

  /** Open (or return the existing) mailbox for `nodeId`. */
  register(nodeId: NodeId): MailboxHandle {
    const existing = this.handles.get(nodeId);
    if (existing) {
      return existing;
    }
    const handle: MailboxHandle = Object.freeze({ nodeId });
    this.handles.set(nodeId, handle);
    return handle;
  }

  /**
   * The handle issued for `nodeId`.
   *
   * @throws {BftError} `PEER_UNKNOWN` when no mailbox was registered.
   */
  handleFor(nodeId: NodeId): MailboxHandle {
    const handle = this.handles.get(nodeId);
    if (!handle) {
      throw unknownPeer(nodeId);
    }
    return handle;
  }

  /**
   * Queue an envelope for the mailbox behind its handle.
   *
   * @throws {BftError} `PEER_UNKNOWN` when the handle was not issued by this transport.
   */
  post(envelope: Envelope<MailboxHandle, M>): void {
    if (this.handles.get(envelope.handle.nodeId) !== envelope.handle) {
      throw unknownPeer(envelope.handle.nodeId);
    }
    this.queue.push(envelope);
    this.posted++;
  }

  /** The oldest undelivered envelope, removed from the queue. */
  next(): Envelope<MailboxHandle, M> | undefined {
    return this.queue.shift();
  }

  /** Envelopes still waiting. */
  get pending(): number {
    return this.queue.length;
  }

  /** Envelopes accepted since the transport was created. */
  get totalPosted(): number {
    return this.posted;
  }
}

function unknownPeer(nodeId: NodeId): BftError {
  return new BftError(BftErrorCode.PEER_UNKNOWN, `No mailbox for node ${nodeId}`, {
    context: { nodeId },
  });
}
