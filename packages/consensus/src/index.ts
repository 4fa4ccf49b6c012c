import type { Block } from '@bftsim/ledger';
import { validateFaultTolerance, validateInteger } from '@bftsim/types';
import type { HashHex, NodeId } from '@bftsim/types';

export type { Phase, VoteTally, ConsensusState } from './types';

import type { Phase, VoteTally, ConsensusState } from './types';

// ---------------------------------------------------------------------------
// Phases
// ---------------------------------------------------------------------------

/** Phases in the order a round moves through them. */
export const PHASES: readonly Phase[] = ['initial', 'preprepared', 'prepared', 'committed'];

function phaseRank(phase: Phase): number {
  return PHASES.indexOf(phase);
}

/** The later of two phases. Rounds never move backwards. */
export function laterPhase(a: Phase, b: Phase): Phase {
  return phaseRank(a) >= phaseRank(b) ? a : b;
}

// ---------------------------------------------------------------------------
// Fault tolerance and quorum
// ---------------------------------------------------------------------------

/**
 * Throw a configuration error unless `totalNodes > 3f` with both counts
 * integers and `f >= 0`.
 */
export function assertFaultTolerance(totalNodes: number, f: number): void {
  validateFaultTolerance(totalNodes, f);
}

/** Votes one hash needs: `totalNodes - f - 1`. */
export function quorumThreshold(totalNodes: number, f: number): number {
  return totalNodes - f - 1;
}

/** Whether `hash` alone has at least {@link quorumThreshold} unique voters. */
export function hasQuorumFor(votes: VoteTally, hash: HashHex, totalNodes: number, f: number): boolean {
  return (votes.get(hash)?.size ?? 0) >= quorumThreshold(totalNodes, f);
}

/**
 * Whether any single block hash has reached quorum. Votes for different
 * hashes never add up.
 */
export function quorumReached(votes: VoteTally, totalNodes: number, f: number): boolean {
  const threshold = quorumThreshold(totalNodes, f);
  for (const voters of votes.values()) {
    if (voters.size >= threshold) {
      return true;
    }
  }
  return false;
}

/** Scheduled leader for `view`, an id in `[1, totalNodes]`. */
export function rotateLeader(view: number, totalNodes: number): NodeId {
  validateInteger(view, 'view', 0);
  validateInteger(totalNodes, 'totalNodes', 1);
  return (view % totalNodes) + 1;
}

// ---------------------------------------------------------------------------
// State transitions
// ---------------------------------------------------------------------------

function freezeState(state: ConsensusState): ConsensusState {
  return Object.freeze(state);
}

function addVote(votes: VoteTally, hash: HashHex, voterId: NodeId): VoteTally {
  const voters = votes.get(hash);
  if (voters?.has(voterId)) {
    return votes;
  }
  const next = new Map(votes);
  next.set(hash, new Set([...(voters ?? []), voterId]));
  return next;
}

/**
 * A fresh round for `nodeId`.
 *
 * @throws {ConfigurationError} when `totalNodes <= 3f` or `nodeId` is not in `[1, totalNodes]`.
 */
export function createConsensusState(nodeId: NodeId, totalNodes: number, f: number, view: number = 0): ConsensusState {
  assertFaultTolerance(totalNodes, f);
  validateInteger(nodeId, 'nodeId', 1, totalNodes);
  validateInteger(view, 'view', 0);
  return freezeState({
    nodeId,
    view,
    currentBlock: null,
    phase: 'initial',
    prepareVotes: new Map(),
    commitVotes: new Map(),
    f,
    totalNodes,
  });
}

/**
 * Accept a proposal: the round moves to `preprepared`, the node's own
 * prepare vote is seeded and commit votes are cleared.
 *
 * Once the round is `prepared` or `committed` a further proposal is ignored;
 * only {@link advanceView} opens a new round.
 */
export function start(state: ConsensusState, block: Block): ConsensusState {
  if (phaseRank(state.phase) > phaseRank('preprepared')) {
    return state;
  }
  return freezeState({
    ...state,
    currentBlock: block,
    phase: 'preprepared',
    prepareVotes: new Map([[block.hash, new Set([state.nodeId])]]),
    commitVotes: new Map(),
  });
}

/** Count a prepare vote; reaching quorum on any hash moves to `prepared`. */
export function recordPrepareVote(state: ConsensusState, block: Block, voterId: NodeId): ConsensusState {
  const prepareVotes = addVote(state.prepareVotes, block.hash, voterId);
  const phase = quorumReached(prepareVotes, state.totalNodes, state.f)
    ? laterPhase(state.phase, 'prepared')
    : state.phase;
  return freezeState({ ...state, prepareVotes, phase });
}

/** Count a commit vote; reaching quorum on any hash moves to `committed`. */
export function recordCommitVote(state: ConsensusState, block: Block, voterId: NodeId): ConsensusState {
  const commitVotes = addVote(state.commitVotes, block.hash, voterId);
  const phase = quorumReached(commitVotes, state.totalNodes, state.f)
    ? laterPhase(state.phase, 'committed')
    : state.phase;
  return freezeState({ ...state, commitVotes, phase });
}

/** Next view with a fresh round, for running several blocks in sequence. */
export function advanceView(state: ConsensusState): ConsensusState {
  return freezeState({
    ...state,
    view: state.view + 1,
    currentBlock: null,
    phase: 'initial',
    prepareVotes: new Map(),
    commitVotes: new Map(),
  });
}
