import {
  hasQuorumFor,
  quorumReached,
  recordCommitVote,
  recordPrepareVote,
  start,
} from '@bftsim/consensus';
import { secureRandom } from '@bftsim/crypto';
import type { RandomSource } from '@bftsim/crypto';
import { appendBlock, createBlock, hasBlock, isBlockValid, isLinked, lastBlock } from '@bftsim/ledger';
import type { Block } from '@bftsim/ledger';
import { knownPeers, routeTo } from '@bftsim/network';
import { assertNever } from '@bftsim/types';

import { commit, prepare } from './messages';
import type { CommitMessage, Message, PrePrepareMessage, PrepareMessage } from './messages';
import type { Delivery, Node, NodeStrategy, OutboundMessage, StrategyName } from './types';

/** Number of conflicting blocks a byzantine node fabricates per proposal. */
export const MALICIOUS_BLOCK_COUNT = 3;

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Address `message` to every known peer. Peers without a handle are
 * skipped with a warning; the sender's state is unaffected.
 */
export function broadcast<H>(node: Node<H>, message: Message): OutboundMessage<H>[] {
  const outbound: OutboundMessage<H>[] = [];
  for (const peerId of knownPeers(node.peers)) {
    const route = routeTo(node.peers, peerId, message);
    if (route.delivered) {
      outbound.push(route.envelope);
    } else {
      node.logger.warn('peer disconnected, message dropped', { to: peerId, type: message.type, reason: route.reason });
    }
  }
  return outbound;
}

function unchanged<H>(node: Node<H>): Delivery<H> {
  return { node, outbound: [] };
}

// ---------------------------------------------------------------------------
// Honest
// ---------------------------------------------------------------------------

/** Follows the protocol. */
export class HonestStrategy implements NodeStrategy {
  readonly name: StrategyName = 'honest';
  readonly byzantine: boolean = false;

  handle<H>(node: Node<H>, message: Message): Delivery<H> {
    switch (message.type) {
      case 'PrePrepare':
        return this.onPrePrepare(node, message);
      case 'Prepare':
        return this.onPrepare(node, message);
      case 'Commit':
        return this.onCommit(node, message);
      default:
        return assertNever(message);
    }
  }

  private onPrePrepare<H>(node: Node<H>, message: PrePrepareMessage): Delivery<H> {
    const updated = { ...node, consensus: start(node.consensus, message.block) };
    node.logger.debug('proposal accepted', { hash: message.block.hash });
    return { node: updated, outbound: broadcast(updated, prepare(message.block, node.id)) };
  }

  private onPrepare<H>(node: Node<H>, message: PrepareMessage): Delivery<H> {
    const { totalNodes, f } = node.consensus;
    const before = quorumReached(node.consensus.prepareVotes, totalNodes, f);
    const consensus = recordPrepareVote(node.consensus, message.block, message.senderId);
    const updated = { ...node, consensus };

    // Only this block's tally changed, so a fresh quorum is a quorum for it.
    if (before || !quorumReached(consensus.prepareVotes, totalNodes, f)) {
      return { node: updated, outbound: [] };
    }
    node.logger.debug('prepare quorum reached', { hash: message.block.hash });
    return { node: updated, outbound: broadcast(updated, commit(message.block, node.id)) };
  }

  private onCommit<H>(node: Node<H>, message: CommitMessage): Delivery<H> {
    const { block } = message;
    const consensus = recordCommitVote(node.consensus, block, message.senderId);
    const updated = { ...node, consensus };

    if (consensus.phase !== 'committed' || !hasQuorumFor(consensus.commitVotes, block.hash, consensus.totalNodes, consensus.f)) {
      return { node: updated, outbound: [] };
    }
    if (hasBlock(node.ledger, block.hash)) {
      return { node: updated, outbound: [] };
    }

    const tail = lastBlock(node.ledger);
    if (!tail || !isBlockValid(block) || !isLinked(tail, block)) {
      node.logger.warn('committed block does not extend the ledger, not appended', {
        hash: block.hash,
        prevHash: block.prevHash,
        tail: tail?.hash,
      });
      return { node: updated, outbound: [] };
    }

    node.logger.info('block committed', { hash: block.hash, height: node.ledger.length });
    return { node: { ...updated, ledger: appendBlock(node.ledger, block) }, outbound: [] };
  }
}

// ---------------------------------------------------------------------------
// Byzantine
// ---------------------------------------------------------------------------

/**
 * Ignores the proposal and starts rounds on fabricated blocks instead,
 * without telling anyone. Votes from peers are ignored.
 */
export class ByzantineStrategy implements NodeStrategy {
  readonly name: StrategyName = 'byzantine';
  readonly byzantine: boolean = true;

  handle<H>(node: Node<H>, message: Message): Delivery<H> {
    if (message.type !== 'PrePrepare') {
      return unchanged(node);
    }

    const { prevHash, timestamp } = message.block;
    let consensus = node.consensus;
    const fabricated: Block[] = [];
    for (let i = 1; i <= MALICIOUS_BLOCK_COUNT; i++) {
      const block = createBlock(`Malicious block ${i} - node ${node.id}`, prevHash, timestamp);
      fabricated.push(block);
      consensus = start(consensus, block);
    }
    node.logger.info('malicious blocks fabricated', { hashes: fabricated.map((b) => b.hash) });
    return { node: { ...node, consensus }, outbound: [] };
  }
}

// ---------------------------------------------------------------------------
// Random fault
// ---------------------------------------------------------------------------

/** What a {@link RandomFaultStrategy} does with one message. */
export type FaultAction = 'obey' | 'equivocate' | 'silent';

const FAULT_ACTIONS: readonly FaultAction[] = ['obey', 'equivocate', 'silent'];

/**
 * Picks uniformly per message between following the protocol, voting for
 * a conflicting block of its own, and ignoring the message.
 *
 * The conflicting block depends only on the node, the view and the parent
 * hash, so a node equivocates at most once per round.
 */
export class RandomFaultStrategy implements NodeStrategy {
  readonly name: StrategyName = 'random';
  readonly byzantine: boolean = true;

  private readonly random: RandomSource;
  private readonly honest: NodeStrategy;

  constructor(random: RandomSource = secureRandom, honest: NodeStrategy = new HonestStrategy()) {
    this.random = random;
    this.honest = honest;
  }

  /** Draw the action for the next message. */
  pick(): FaultAction {
    return FAULT_ACTIONS[this.random(FAULT_ACTIONS.length)] ?? 'silent';
  }

  handle<H>(node: Node<H>, message: Message): Delivery<H> {
    const action = this.pick();
    node.logger.debug('fault action chosen', { action, type: message.type });
    switch (action) {
      case 'obey':
        return this.honest.handle(node, message);
      case 'equivocate':
        return this.equivocate(node, message.block);
      case 'silent':
        return unchanged(node);
      default:
        return assertNever(action);
    }
  }

  private equivocate<H>(node: Node<H>, proposed: Block): Delivery<H> {
    const conflicting = createBlock(
      `Equivocation view ${node.consensus.view} - node ${node.id}`,
      proposed.prevHash,
      proposed.timestamp,
    );
    if (node.consensus.prepareVotes.get(conflicting.hash)?.has(node.id)) {
      return unchanged(node);
    }
    const updated = { ...node, consensus: recordPrepareVote(node.consensus, conflicting, node.id) };
    node.logger.info('equivocating', { hash: conflicting.hash });
    return { node: updated, outbound: broadcast(updated, prepare(conflicting, node.id)) };
  }
}

/** Strategy for a node flagged only as byzantine or not. */
export function strategyFor(byzantine: boolean): NodeStrategy {
  return byzantine ? new ByzantineStrategy() : new HonestStrategy();
}
