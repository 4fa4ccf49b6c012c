import type { Block } from '@bftsim/ledger';
import type { NodeId } from '@bftsim/types';

/** Leader's proposal for the current round. */
export interface PrePrepareMessage {
  readonly type: 'PrePrepare';
  readonly block: Block;
}

/** A node's vote that it accepted the proposal. */
export interface PrepareMessage {
  readonly type: 'Prepare';
  readonly block: Block;
  readonly senderId: NodeId;
}

/** A node's vote that it saw a prepare quorum. */
export interface CommitMessage {
  readonly type: 'Commit';
  readonly block: Block;
  readonly senderId: NodeId;
}

export type Message = PrePrepareMessage | PrepareMessage | CommitMessage;

export type MessageType = Message['type'];

export function prePrepare(block: Block): PrePrepareMessage {
  return Object.freeze({ type: 'PrePrepare', block });
}

export function prepare(block: Block, senderId: NodeId): PrepareMessage {
  return Object.freeze({ type: 'Prepare', block, senderId });
}

export function commit(block: Block, senderId: NodeId): CommitMessage {
  return Object.freeze({ type: 'Commit', block, senderId });
}
