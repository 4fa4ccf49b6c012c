/**
 * A PBFT participant: ledger, round state and peers, driven only by
 * {@link deliver}.
 *
 * ```ts
 * let node = createNode<string>(1, 4, 1, false);
 * node = connect(node, 2, 'mailbox-2');
 * const { node: next, outbound } = deliver(node, prePrepare(block));
 * ```
 *
 * @packageDocumentation
 */

import { advanceView, createConsensusState } from '@bftsim/consensus';
import type { Phase } from '@bftsim/consensus';
import { createGenesis } from '@bftsim/ledger';
import type { Ledger } from '@bftsim/ledger';
import { connectPeer, createPeerDirectory, disconnectPeer } from '@bftsim/network';
import { silentLogger } from '@bftsim/types';
import type { Logger, NodeId } from '@bftsim/types';

import type { Message } from './messages';
import { strategyFor } from './strategies';
import type { Delivery, Node, NodeStrategy, StrategyName } from './types';

export { prePrepare, prepare, commit } from './messages';
export type { Message, MessageType, PrePrepareMessage, PrepareMessage, CommitMessage } from './messages';
export {
  HonestStrategy,
  ByzantineStrategy,
  RandomFaultStrategy,
  MALICIOUS_BLOCK_COUNT,
  broadcast,
  strategyFor,
} from './strategies';
export type { FaultAction } from './strategies';
export type { Node, NodeStrategy, Delivery, OutboundMessage, StrategyName } from './types';

export interface NodeOptions {
  /** Shorthand for the honest or byzantine strategy. Ignored when `strategy` is set. */
  byzantine?: boolean;
  strategy?: NodeStrategy;
  /** Parent logger; the node logs under `node.<id>`. Defaults to silent. */
  logger?: Logger;
  /** Genesis timestamp. Nodes that must agree need the same value. */
  genesisTimestamp?: number;
}

function freezeNode<H>(node: Node<H>): Node<H> {
  return Object.freeze(node);
}

/**
 * A node with a fresh genesis ledger and every other id in
 * `1..totalNodes` known but disconnected.
 *
 * @throws {ConfigurationError} when `totalNodes <= 3f` or `id` is out of range.
 */
export function createNode<H>(
  id: NodeId,
  totalNodes: number,
  f: number,
  isByzantineOrOptions: boolean | NodeOptions = false,
): Node<H> {
  const options: NodeOptions =
    typeof isByzantineOrOptions === 'boolean' ? { byzantine: isByzantineOrOptions } : isByzantineOrOptions;
  const consensus = createConsensusState(id, totalNodes, f);
  const peerIds = Array.from({ length: totalNodes }, (_, i) => i + 1);

  return freezeNode({
    id,
    ledger: createGenesis(options.genesisTimestamp),
    consensus,
    peers: createPeerDirectory<H>(id, peerIds),
    strategy: options.strategy ?? strategyFor(options.byzantine ?? false),
    logger: (options.logger ?? silentLogger).child(`node.${id}`, { nodeId: id }),
  });
}

export function connect<H>(node: Node<H>, peerId: NodeId, handle: H): Node<H> {
  return freezeNode({ ...node, peers: connectPeer(node.peers, peerId, handle) });
}

export function disconnect<H>(node: Node<H>, peerId: NodeId): Node<H> {
  return freezeNode({ ...node, peers: disconnectPeer(node.peers, peerId) });
}

/** Hand one message to the node's strategy. The only way a round advances. */
export function deliver<H>(node: Node<H>, message: Message): Delivery<H> {
  node.logger.debug('message received', {
    type: message.type,
    ...(message.type === 'PrePrepare' ? {} : { from: message.senderId }),
  });
  const result = node.strategy.handle(node, message);
  return { node: freezeNode(result.node), outbound: Object.freeze([...result.outbound]) };
}

/** Open the next view with a fresh round, keeping ledger and peers. */
export function advanceRound<H>(node: Node<H>): Node<H> {
  return freezeNode({ ...node, consensus: advanceView(node.consensus) });
}

export function ledger<H>(node: Node<H>): Ledger {
  return node.ledger;
}

export function phase<H>(node: Node<H>): Phase {
  return node.consensus.phase;
}

export function isByzantine<H>(node: Node<H>): boolean {
  return node.strategy.byzantine;
}

export function strategyName<H>(node: Node<H>): StrategyName {
  return node.strategy.name;
}
