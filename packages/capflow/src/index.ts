import type { CapacityMatrix, NodeIndex } from './matrix';
import { validateCapacityMatrix, validateSourceCapacity, validateTerminals } from './matrix';
import { reduceTerminals } from './reduce';
import { edmondsKarp, type FlowOptions } from './flow';

export * from './matrix';
export * from './reduce';
export * from './search';
export * from './flow';
export * from './cut';

export type MaxFlowOptions = FlowOptions;

export type MaxFlowReport = {
  value: number;
  bypassFlow: number;
  networkFlow: number;
  augmentations: number;
};

export function solveMaxFlow(
  sources: Iterable<NodeIndex>,
  sinks: Iterable<NodeIndex>,
  capacity: CapacityMatrix,
  options: MaxFlowOptions = {},
): MaxFlowReport {
  validateCapacityMatrix(capacity);
  const terminals = validateTerminals(capacity.length, sources, sinks);
  validateSourceCapacity(capacity, terminals.sources);
  const network = reduceTerminals(capacity, terminals.sources, terminals.sinks);
  const run = edmondsKarp(network.capacity, network.source, network.sink, options);
  return {
    value: network.bypassFlow + run.value,
    bypassFlow: network.bypassFlow,
    networkFlow: run.value,
    augmentations: run.augmentations,
  };
}

/** Maximum units per tick that can move from `sources` to `sinks` through `capacity`. */
export function maxFlow(
  sources: Iterable<NodeIndex>,
  sinks: Iterable<NodeIndex>,
  capacity: CapacityMatrix,
  options: MaxFlowOptions = {},
): number {
  return solveMaxFlow(sources, sinks, capacity, options).value;
}
