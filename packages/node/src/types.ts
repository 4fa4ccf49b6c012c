import type { ConsensusState } from '@bftsim/consensus';
import type { Ledger } from '@bftsim/ledger';
import type { Envelope, PeerDirectory } from '@bftsim/network';
import type { Logger, NodeId } from '@bftsim/types';

import type { Message } from './messages';

export type StrategyName = 'honest' | 'byzantine' | 'random';

/** One participant. `H` is the opaque handle type its peers are reached by. */
export interface Node<H> {
  readonly id: NodeId;
  readonly ledger: Ledger;
  readonly consensus: ConsensusState;
  readonly peers: PeerDirectory<H>;
  readonly strategy: NodeStrategy;
  readonly logger: Logger;
}

export type OutboundMessage<H> = Envelope<H, Message>;

/** Result of handing one message to a node. */
export interface Delivery<H> {
  readonly node: Node<H>;
  readonly outbound: readonly OutboundMessage<H>[];
}

/** How a node reacts to protocol messages. Fixed for the node's lifetime. */
export interface NodeStrategy {
  readonly name: StrategyName;
  /** Whether the node deviates from the protocol. */
  readonly byzantine: boolean;
  handle<H>(node: Node<H>, message: Message): Delivery<H>;
}
