import type { Block } from '@bftsim/ledger';
import type { HashHex, NodeId } from '@bftsim/types';

/** Round phases, in the only order they may be entered. */
export type Phase = 'initial' | 'preprepared' | 'prepared' | 'committed';

/** Unique voters per block hash. */
export type VoteTally = ReadonlyMap<HashHex, ReadonlySet<NodeId>>;

/** One node's view of the current round. Replaced, never mutated. */
export interface ConsensusState {
  readonly nodeId: NodeId;
  readonly view: number;
  readonly currentBlock: Block | null;
  readonly phase: Phase;
  readonly prepareVotes: VoteTally;
  readonly commitVotes: VoteTally;
  readonly f: number;
  readonly totalNodes: number;
}
