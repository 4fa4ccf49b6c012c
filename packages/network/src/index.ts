/**
 * Per-node directory of peers and the opaque handles used to reach them.
 *
 * The handle type is a type parameter: the directory never inspects it, it
 * only hands it back so the caller's transport can route through it.
 *
 * @packageDocumentation
 */

import type { NodeId } from '@bftsim/types';

/** Peers known to one node. A `null` handle means disconnected. */
export interface PeerDirectory<H> {
  readonly selfId: NodeId;
  readonly peers: ReadonlyMap<NodeId, H | null>;
}

/** A message addressed to one peer, carrying the handle to route it with. */
export interface Envelope<H, M> {
  readonly from: NodeId;
  readonly to: NodeId;
  readonly handle: H;
  readonly message: M;
}

export type RouteResult<H, M> =
  | { readonly delivered: true; readonly envelope: Envelope<H, M> }
  | { readonly delivered: false; readonly reason: 'self' | 'unknown-peer' | 'disconnected' };

function withPeers<H>(dir: PeerDirectory<H>, peers: Map<NodeId, H | null>): PeerDirectory<H> {
  return Object.freeze({ selfId: dir.selfId, peers });
}

/**
 * A directory in which every listed peer starts disconnected. `selfId` is
 * never recorded as a peer.
 */
export function createPeerDirectory<H>(selfId: NodeId, peerIds: readonly NodeId[] = []): PeerDirectory<H> {
  const peers = new Map<NodeId, H | null>();
  for (const id of peerIds) {
    if (id !== selfId) {
      peers.set(id, null);
    }
  }
  return Object.freeze({ selfId, peers });
}

/** Record a handle for `peerId`, replacing any previous one. */
export function connectPeer<H>(dir: PeerDirectory<H>, peerId: NodeId, handle: H): PeerDirectory<H> {
  if (peerId === dir.selfId) {
    return dir;
  }
  const peers = new Map(dir.peers);
  peers.set(peerId, handle);
  return withPeers(dir, peers);
}

/** Keep `peerId` known but drop its handle. */
export function disconnectPeer<H>(dir: PeerDirectory<H>, peerId: NodeId): PeerDirectory<H> {
  if (!dir.peers.has(peerId)) {
    return dir;
  }
  const peers = new Map(dir.peers);
  peers.set(peerId, null);
  return withPeers(dir, peers);
}

export function resolvePeer<H>(dir: PeerDirectory<H>, peerId: NodeId): H | undefined {
  return dir.peers.get(peerId) ?? undefined;
}

export function isConnected<H>(dir: PeerDirectory<H>, peerId: NodeId): boolean {
  return resolvePeer(dir, peerId) !== undefined;
}

/** Every peer id other than self, ascending. */
export function knownPeers<H>(dir: PeerDirectory<H>): NodeId[] {
  return [...dir.peers.keys()].sort((a, b) => a - b);
}

/**
 * Address `message` to `peerId`. Resolution failures are reported, not
 * thrown, so a broadcast can drop one peer and carry on.
 */
export function routeTo<H, M>(dir: PeerDirectory<H>, peerId: NodeId, message: M): RouteResult<H, M> {
  if (peerId === dir.selfId) {
    return { delivered: false, reason: 'self' };
  }
  if (!dir.peers.has(peerId)) {
    return { delivered: false, reason: 'unknown-peer' };
  }
  const handle = resolvePeer(dir, peerId);
  if (handle === undefined) {
    return { delivered: false, reason: 'disconnected' };
  }
  return {
    delivered: true,
    envelope: Object.freeze({ from: dir.selfId, to: peerId, handle, message }),
  };
}
