/**
 * Example 02: Hand-wired nodes
 *
 * Drives the node API without the simulation driver. Peer handles here are
 * plain strings standing in for addresses; any transport that can map a
 * handle back to a node works the same way.
 */

import { createBlock, lastBlock } from '@bftsim/ledger';
import { knownPeers } from '@bftsim/network';
import { connect, createNode, deliver, ledger, phase, prePrepare } from '@bftsim/node';
import type { Message, Node } from '@bftsim/node';
import type { NodeId } from '@bftsim/types';

type Address = string;

const TOTAL_NODES = 4;
const FAULTS = 1;
const GENESIS_TIMESTAMP = 1_700_000_000;

const addressOf = (id: NodeId): Address => `mem://node-${id}`;
const nodes = new Map<Address, Node<Address>>();

for (let id = 1; id <= TOTAL_NODES; id++) {
  let node = createNode<Address>(id, TOTAL_NODES, FAULTS, { genesisTimestamp: GENESIS_TIMESTAMP });
  for (const peerId of knownPeers(node.peers)) {
    node = connect(node, peerId, addressOf(peerId));
  }
  nodes.set(addressOf(id), node);
}

const proposer = nodes.get(addressOf(1));
const tail = proposer ? lastBlock(ledger(proposer)) : undefined;
if (!tail) {
  throw new Error('proposer has no ledger tail');
}
const block = createBlock('Block 1', tail.hash);

const queue: Array<{ to: Address; message: Message }> = [...nodes.keys()].map((to) => ({ to, message: prePrepare(block) }));
for (let next = queue.shift(); next; next = queue.shift()) {
  const node = nodes.get(next.to);
  if (!node) continue;
  const { node: updated, outbound } = deliver(node, next.message);
  nodes.set(next.to, updated);
  queue.push(...outbound.map((envelope) => ({ to: envelope.handle, message: envelope.message })));
}

for (const [address, node] of nodes) {
  console.log(`${address}: ${phase(node)}, ${ledger(node).length} blocks`);
}
