import { rotateLeader } from '@bftsim/consensus';
import { secureRandom, unixTimestamp } from '@bftsim/crypto';
import { createBlock, hasBlock, isChainValid, lastBlock } from '@bftsim/ledger';
import type { Block, Ledger } from '@bftsim/ledger';
import { knownPeers } from '@bftsim/network';
import {
  ByzantineStrategy,
  HonestStrategy,
  RandomFaultStrategy,
  advanceRound,
  connect,
  createNode,
  deliver,
  isByzantine,
  phase,
  prePrepare,
  strategyName,
} from '@bftsim/node';
import type { Message, Node, NodeStrategy } from '@bftsim/node';
import type { RandomSource } from '@bftsim/crypto';
import { BftError, BftErrorCode, createLogger } from '@bftsim/types';
import type { Logger, NodeId } from '@bftsim/types';

import { resolveSimulationConfig } from './config';
import type { SimulationConfig, SimulationConfigInput } from './config';
import { InMemoryTransport } from './transport';
import type { MailboxHandle } from './transport';
import type { NodeReport, RoundReport, SimulationEvent, SimulationOptions, SimulationReport } from './types';

type SimNode = Node<MailboxHandle>;

function strategyForNode(config: SimulationConfig, id: NodeId, random: RandomSource): NodeStrategy {
  if (!config.byzantineIds.includes(id)) {
    return new HonestStrategy();
  }
  return config.strategy === 'random' ? new RandomFaultStrategy(random) : new ByzantineStrategy();
}

/** Proposer for a round: the scheduled leader when honest, else the lowest honest id. */
export function chooseProposer(leader: NodeId, nodes: number, byzantineIds: readonly NodeId[]): NodeId {
  if (!byzantineIds.includes(leader)) {
    return leader;
  }
  for (let id = 1; id <= nodes; id++) {
    if (!byzantineIds.includes(id)) {
      return id;
    }
  }
  return leader;
}

function sameChain(a: Ledger, b: Ledger): boolean {
  return a.length === b.length && a.every((block, i) => block.hash === b[i]?.hash);
}

/** Whether every honest node holds an identical ledger. */
export function honestAgreement(reports: readonly NodeReport[]): boolean {
  const honest = reports.filter((r) => !r.byzantine);
  const [first, ...rest] = honest;
  return first === undefined || rest.every((r) => sameChain(first.ledger, r.ledger));
}

/**
 * Drives whole rounds over an in-memory transport. One instance per run.
 */
class SimulationRun {
  private readonly nodes = new Map<NodeId, SimNode>();
  private readonly transport = new InMemoryTransport<Message>();
  private readonly log: Logger;
  private readonly emit: (event: SimulationEvent) => void;
  private readonly now: () => number;
  private delivered = 0;

  constructor(
    private readonly config: SimulationConfig,
    options: SimulationOptions,
  ) {
    const root = options.logger ?? createLogger({ level: config.logLevel });
    this.log = root.child('simulation');
    this.emit = options.onEvent ?? (() => undefined);
    this.now = options.now ?? (() => unixTimestamp());

    const genesisTimestamp = this.now();
    const random = options.random ?? secureRandom;
    for (let id = 1; id <= config.nodes; id++) {
      this.transport.register(id);
      this.nodes.set(
        id,
        createNode<MailboxHandle>(id, config.nodes, config.faulty, {
          strategy: strategyForNode(config, id, random),
          logger: root,
          genesisTimestamp,
        }),
      );
    }
    for (const [id, node] of this.nodes) {
      let connected = node;
      for (const peerId of knownPeers(node.peers)) {
        connected = connect(connected, peerId, this.transport.handleFor(peerId));
      }
      this.nodes.set(id, connected);
    }
    this.log.info('nodes created', {
      nodes: config.nodes,
      faulty: config.faulty,
      byzantineIds: [...config.byzantineIds],
      strategy: config.strategy,
    });
  }

  run(): SimulationReport {
    const rounds = this.config.blocks.map((data, view) => this.runRound(view, data));
    const nodes = [...this.nodes.values()].map(
      (node): NodeReport => ({
        id: node.id,
        byzantine: isByzantine(node),
        strategy: strategyName(node),
        phase: phase(node),
        ledger: node.ledger,
        chainValid: isChainValid(node.ledger),
      }),
    );
    const agreement = honestAgreement(nodes);
    if (!agreement) {
      this.log.error('honest ledgers diverged');
    }
    return { config: this.config, nodes, rounds, agreement, messages: this.delivered };
  }

  private node(id: NodeId): SimNode {
    const node = this.nodes.get(id);
    if (!node) {
      throw new BftError(BftErrorCode.PEER_UNKNOWN, `No node with id ${id}`, { context: { nodeId: id } });
    }
    return node;
  }

  private runRound(view: number, data: string): RoundReport {
    if (view > 0) {
      for (const [id, node] of this.nodes) {
        this.nodes.set(id, advanceRound(node));
      }
    }

    const leader = rotateLeader(view, this.config.nodes);
    const proposer = chooseProposer(leader, this.config.nodes, this.config.byzantineIds);
    if (proposer !== leader) {
      this.log.warn('scheduled leader is byzantine, proposing from lowest honest node', { view, leader, proposer });
    }
    const tail = lastBlock(this.node(proposer).ledger);
    if (!tail) {
      throw new BftError(BftErrorCode.LEDGER_EMPTY, `Proposer ${proposer} has an empty ledger`);
    }
    const block: Block = createBlock(data, tail.hash, this.now());

    this.emit({ type: 'round-start', view, leader, proposer, block, byzantineIds: this.config.byzantineIds });
    this.log.info('round started', { view, leader, proposer, hash: block.hash });

    const before = this.delivered;
    const message = prePrepare(block);
    for (const id of this.nodes.keys()) {
      this.transport.post({ from: proposer, to: id, handle: this.transport.handleFor(id), message });
    }
    this.pump(view);

    const committedBy = [...this.nodes.values()].filter((n) => hasBlock(n.ledger, block.hash)).map((n) => n.id);
    const round: RoundReport = { view, leader, proposer, block, committedBy, messages: this.delivered - before };
    this.log.info('round finished', { view, committedBy, messages: round.messages });
    this.emit({ type: 'round-end', round });
    return round;
  }

  private pump(view: number): void {
    for (let envelope = this.transport.next(); envelope; envelope = this.transport.next()) {
      if (this.delivered >= this.config.maxMessages) {
        throw new BftError(
          BftErrorCode.SIMULATION_NOT_QUIESCENT,
          `Message budget of ${this.config.maxMessages} exhausted with ${this.transport.pending + 1} still queued`,
          {
            context: { view, maxMessages: this.config.maxMessages },
            hint: 'Raise maxMessages or check for strategies that answer every message',
          },
        );
      }
      const target = envelope.handle.nodeId;
      const node = this.node(target);
      const result = deliver(node, envelope.message);
      this.nodes.set(target, result.node);
      this.delivered++;

      this.emit({ type: 'delivered', view, from: envelope.from, to: target, message: envelope.message });
      if (phase(result.node) !== phase(node)) {
        this.emit({ type: 'phase', view, nodeId: target, from: phase(node), to: phase(result.node) });
      }
      for (const outbound of result.outbound) {
        this.transport.post(outbound);
      }
    }
  }
}

/**
 * Run one PBFT round per configured block and report the final state.
 *
 * Every node is connected to every other through an in-memory transport.
 * Each round injects the proposal into every node and delivers messages
 * until none remain.
 *
 * @throws {ConfigurationError} when the configuration is rejected.
 * @throws {BftError} `SIMULATION_NOT_QUIESCENT` when `maxMessages` deliveries
 *   do not drain the queue.
 *
 * @example
 * ```typescript
 * const report = runSimulation({ nodes: 7, faulty: 2 });
 * report.agreement; // true
 * ```
 */
export function runSimulation(input: SimulationConfigInput = {}, options: SimulationOptions = {}): SimulationReport {
  return new SimulationRun(resolveSimulationConfig(input), options).run();
}
