/**
 * Human-readable narration of a simulation run.
 *
 * @packageDocumentation
 */

import type { MessageType } from '@bftsim/node';
import type { SimulationEvent, SimulationReport } from '@bftsim/simulation';

import {
  blue,
  bold,
  cyan,
  error,
  green,
  header,
  keyValue,
  magenta,
  red,
  shortHash,
  success,
  table,
  warning,
} from './format';

const PHASE_HEADINGS: Record<MessageType, (text: string) => string> = {
  PrePrepare: (text) => green(bold(text)),
  Prepare: (text) => blue(bold(text)),
  Commit: (text) => magenta(bold(text)),
};

const PHASE_LABELS: Record<MessageType, string> = {
  PrePrepare: 'Pre-Prepare',
  Prepare: 'Prepare',
  Commit: 'Commit',
};

/**
 * Build an event observer that writes narration lines through `write`.
 * Each protocol phase gets one heading per round, when its first message
 * is delivered.
 */
export function createNarrator(write: (line: string) => void): (event: SimulationEvent) => void {
  let announced = new Set<MessageType>();

  return (event) => {
    switch (event.type) {
      case 'round-start': {
        announced = new Set();
        const byzantine = event.byzantineIds.length > 0 ? red(event.byzantineIds.join(', ')) : 'none';
        write('');
        write(header(`View ${event.view}: ${event.block.data}`));
        write(
          keyValue([
            ['Leader', `node ${event.leader}`],
            ['Proposer', `node ${event.proposer}`],
            ['Byzantine', byzantine],
          ]),
        );
        if (event.proposer !== event.leader) {
          write(warning(`Leader ${event.leader} is byzantine, node ${event.proposer} proposes instead`));
        }
        return;
      }
      case 'delivered': {
        const { message } = event;
        if (!announced.has(message.type)) {
          announced.add(message.type);
          write(PHASE_HEADINGS[message.type](`-- ${PHASE_LABELS[message.type]} --`));
        }
        if (message.type === 'PrePrepare') {
          write(`Node ${event.to} receives block: ${message.block.data}`);
        }
        return;
      }
      case 'phase':
        if (event.to === 'prepared') {
          write(`Node ${event.nodeId} prepared`);
        } else if (event.to === 'committed') {
          write(`Node ${event.nodeId} committed`);
        }
        return;
      case 'round-end': {
        const { round } = event;
        write(
          round.committedBy.length > 0
            ? success(`${round.block.data} committed by nodes ${round.committedBy.join(', ')}`)
            : warning(`${round.block.data} was not committed by any node`),
        );
        return;
      }
    }
  };
}

/** Final node table and the agreement verdict. */
export function renderReport(report: SimulationReport): string {
  const rows = report.nodes.map((node) => [
    String(node.id),
    node.byzantine ? red('byzantine') : green('honest'),
    node.strategy,
    node.phase,
    String(node.ledger.length),
    shortHash(node.ledger[node.ledger.length - 1]?.hash ?? ''),
    node.chainValid ? 'valid' : red('invalid'),
  ]);
  const verdict = report.agreement ? success('Honest ledgers agree') : error('Honest ledgers diverged');

  return [
    '',
    cyan(header('Final state')),
    table(['Node', 'Role', 'Strategy', 'Phase', 'Blocks', 'Tail', 'Chain'], rows),
    '',
    `${verdict} (${report.messages} messages delivered)`,
  ].join('\n');
}
