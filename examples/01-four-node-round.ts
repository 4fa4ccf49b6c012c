/**
 * Example 01: Four-node round
 *
 * Runs the default network (4 nodes, node 1 byzantine) through two blocks
 * and prints what each honest node ended up with.
 */

import { runSimulation } from '@bftsim/simulation';
import type { SimulationEvent } from '@bftsim/simulation';
import { LogLevel } from '@bftsim/types';

function onEvent(event: SimulationEvent): void {
  if (event.type === 'round-start') {
    console.log(`view ${event.view}: leader ${event.leader}, proposer ${event.proposer}, block "${event.block.data}"`);
  } else if (event.type === 'round-end') {
    console.log(`  committed by ${event.round.committedBy.join(', ')} after ${event.round.messages} messages`);
  }
}

const report = runSimulation({ blocks: ['Block 1', 'Block 2'], logLevel: LogLevel.ERROR }, { onEvent });

for (const node of report.nodes) {
  const chain = node.ledger.map((block) => block.data).join(' -> ');
  console.log(`node ${node.id} (${node.strategy}): ${chain}`);
}
console.log(report.agreement ? 'honest ledgers agree' : 'honest ledgers diverged');
