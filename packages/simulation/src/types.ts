import type { Phase } from '@bftsim/consensus';
import type { RandomSource } from '@bftsim/crypto';
import type { Block, Ledger } from '@bftsim/ledger';
import type { Message, StrategyName } from '@bftsim/node';
import type { Logger, NodeId } from '@bftsim/types';

import type { SimulationConfig } from './config';

/** Final state of one node. */
export interface NodeReport {
  id: NodeId;
  byzantine: boolean;
  strategy: StrategyName;
  phase: Phase;
  ledger: Ledger;
  chainValid: boolean;
}

/** What happened to one proposed block. */
export interface RoundReport {
  view: number;
  /** Leader scheduled by rotation. */
  leader: NodeId;
  /** Node whose ledger tail the block was built on. */
  proposer: NodeId;
  block: Block;
  /** Ids whose ledger holds the block after the round. */
  committedBy: NodeId[];
  /** Deliveries made during the round, including the injected proposals. */
  messages: number;
}

export interface SimulationReport {
  config: SimulationConfig;
  nodes: NodeReport[];
  rounds: RoundReport[];
  /** Every honest ledger holds the same sequence of block hashes. */
  agreement: boolean;
  /** Deliveries across the whole run. */
  messages: number;
}

export type SimulationEvent =
  | {
      type: 'round-start';
      view: number;
      leader: NodeId;
      proposer: NodeId;
      block: Block;
      byzantineIds: readonly NodeId[];
    }
  | { type: 'delivered'; view: number; from: NodeId; to: NodeId; message: Message }
  | { type: 'phase'; view: number; nodeId: NodeId; from: Phase; to: Phase }
  | { type: 'round-end'; round: RoundReport };

export type SimulationEventType = SimulationEvent['type'];

export interface SimulationOptions {
  /** Parent logger. Defaults to JSON lines on stderr at the configured level. */
  logger?: Logger;
  /** Observer for progress; called synchronously. */
  onEvent?: (event: SimulationEvent) => void;
  /** Randomness for the random fault strategy. */
  random?: RandomSource;
  /** Unix-seconds clock used for genesis and proposed blocks. */
  now?: () => number;
}
