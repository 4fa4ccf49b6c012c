/**
 * Simulation driver: builds a fully connected set of nodes, runs one PBFT
 * round per block over an in-memory transport and reports the outcome.
 *
 * @packageDocumentation
 */

export {
  DEFAULT_SIMULATION_CONFIG,
  FAULT_STRATEGIES,
  defaultByzantineIds,
  resolveSimulationConfig,
  validateSimulationConfig,
} from './config';
export type { FaultStrategyKind, SimulationConfig, SimulationConfigInput } from './config';

export { InMemoryTransport } from './transport';
export type { MailboxHandle } from './transport';

export { runSimulation, chooseProposer, honestAgreement } from './driver';

export type {
  NodeReport,
  RoundReport,
  SimulationReport,
  SimulationEvent,
  SimulationEventType,
  SimulationOptions,
} from './types';
