import {
  BftErrorCode,
  ConfigurationError,
  LogLevel,
  freezeDeep,
  isNonEmptyString,
  isNonNegativeInteger,
  validateInteger,
} from '@bftsim/types';
import type { NodeId } from '@bftsim/types';

/** How the byzantine nodes misbehave. */
export type FaultStrategyKind = 'byzantine' | 'random';

export const FAULT_STRATEGIES: readonly FaultStrategyKind[] = ['byzantine', 'random'];

export interface SimulationConfig {
  /** Total number of nodes, ids `1..nodes`. */
  readonly nodes: number;
  /** Faults the quorum rule must tolerate. */
  readonly faulty: number;
  /** Ids that misbehave. At most `faulty` of them. */
  readonly byzantineIds: readonly NodeId[];
  /** One round per entry, proposed in order. */
  readonly blocks: readonly string[];
  readonly strategy: FaultStrategyKind;
  /** Deliveries allowed across the whole run before giving up. */
  readonly maxMessages: number;
  readonly logLevel: LogLevel;
}

/** Any subset of {@link SimulationConfig}; the rest comes from the defaults. */
export type SimulationConfigInput = Partial<SimulationConfig>;

export const DEFAULT_SIMULATION_CONFIG: Omit<SimulationConfig, 'byzantineIds'> = Object.freeze({
  nodes: 4,
  faulty: 1,
  blocks: Object.freeze(['Block 1']),
  strategy: 'byzantine',
  maxMessages: 10_000,
  logLevel: LogLevel.WARN,
});

/** The first `faulty` ids. */
export function defaultByzantineIds(faulty: number): NodeId[] {
  return Array.from({ length: faulty }, (_, i) => i + 1);
}

function isFaultStrategy(value: unknown): value is FaultStrategyKind {
  return FAULT_STRATEGIES.some((kind) => kind === value);
}

/**
 * Check every field of a complete configuration.
 *
 * @throws {ConfigurationError} naming the offending field. A node count that
 *   cannot tolerate `faulty` faults uses `CONFIG_FAULT_TOLERANCE`.
 */
export function validateSimulationConfig(config: SimulationConfig): void {
  validateInteger(config.nodes, 'nodes', 1);
  validateInteger(config.faulty, 'faulty', 0);
  if (config.nodes <= 3 * config.faulty) {
    throw new ConfigurationError(
      `nodes must be greater than 3 * faulty (got nodes=${config.nodes}, faulty=${config.faulty})`,
      'nodes',
      BftErrorCode.CONFIG_FAULT_TOLERANCE,
      {
        context: { nodes: config.nodes, faulty: config.faulty },
        hint: `Use at least ${3 * config.faulty + 1} nodes`,
      },
    );
  }

  const seen = new Set<NodeId>();
  for (const id of config.byzantineIds) {
    validateInteger(id, 'byzantineIds', 1, config.nodes);
    if (seen.has(id)) {
      throw new ConfigurationError(`byzantineIds contains ${id} more than once`, 'byzantineIds');
    }
    seen.add(id);
  }
  if (seen.size > config.faulty) {
    throw new ConfigurationError(
      `byzantineIds lists ${seen.size} nodes but only ${config.faulty} faults are tolerated`,
      'byzantineIds',
      BftErrorCode.CONFIG_INVALID,
      { hint: 'Raise faulty or list fewer byzantine ids' },
    );
  }

  if (config.blocks.length === 0) {
    throw new ConfigurationError('blocks must list at least one block payload', 'blocks');
  }
  for (const data of config.blocks) {
    if (!isNonEmptyString(data)) {
      throw new ConfigurationError(`blocks must contain non-empty strings, got ${JSON.stringify(data)}`, 'blocks');
    }
  }

  if (!isFaultStrategy(config.strategy)) {
    throw new ConfigurationError(
      `strategy must be one of ${FAULT_STRATEGIES.join(', ')}, got ${String(config.strategy)}`,
      'strategy',
    );
  }
  validateInteger(config.maxMessages, 'maxMessages', 1);
  validateInteger(config.logLevel, 'logLevel', LogLevel.DEBUG, LogLevel.SILENT);
}

/**
 * Fill in defaults and validate. Byzantine ids default to the first
 * `faulty` nodes.
 *
 * @example
 * ```typescript
 * resolveSimulationConfig({ nodes: 7, faulty: 2 }).byzantineIds; // [1, 2]
 * ```
 */
export function resolveSimulationConfig(input: SimulationConfigInput = {}): SimulationConfig {
  const defaults = DEFAULT_SIMULATION_CONFIG;
  const faulty = input.faulty ?? defaults.faulty;
  const config: SimulationConfig = {
    nodes: input.nodes ?? defaults.nodes,
    faulty,
    byzantineIds: input.byzantineIds ?? (isNonNegativeInteger(faulty) ? defaultByzantineIds(faulty) : []),
    blocks: input.blocks ?? defaults.blocks,
    strategy: input.strategy ?? defaults.strategy,
    maxMessages: input.maxMessages ?? defaults.maxMessages,
    logLevel: input.logLevel ?? defaults.logLevel,
  };
  validateSimulationConfig(config);
  return freezeDeep({
    ...config,
    byzantineIds: [...config.byzantineIds].sort((a, b) => a - b),
    blocks: [...config.blocks],
  });
}
