import type { CapacityMatrix, FlowMatrix, NodeIndex } from '../matrix';
import { InvalidInputError, zeroMatrix } from '../matrix';
import { findAugmentingPath, residualCapacity } from '../search';

export type AugmentStep = {
  iteration: number;
  path: NodeIndex[];
  bottleneck: number;
  total: number;
};

export type FlowOptions = {
  onAugment?: (step: AugmentStep) => void;
};

export type FlowRun = {
  value: number;
  augmentations: number;
  flow: FlowMatrix;
};

export function bottleneck(capacity: CapacityMatrix, flow: FlowMatrix, path: ReadonlyArray<NodeIndex>): number {
  if (path.length < 2) {
    throw new InvalidInputError(`Path needs at least 2 nodes, got ${path.length}.`, 'INVALID_PATH', {
      size: path.length,
    });
  }
  let aug = Infinity;
  for (let i = 1; i < path.length; i += 1) {
    const u = path[i - 1] ?? -1;
    const v = path[i] ?? -1;
    aug = Math.min(aug, residualCapacity(capacity, flow, u, v));
  }
  return aug;
}

/**
 * Pushes the path's bottleneck along every edge of `path`, crediting the reverse edges so
 * later paths can cancel it. Mutates `flow` and returns the amount pushed.
 */
export function augmentFlow(capacity: CapacityMatrix, flow: FlowMatrix, path: ReadonlyArray<NodeIndex>): number {
  const aug = bottleneck(capacity, flow, path);
  if (!(aug > 0)) {
    throw new InvalidInputError(`Path ${path.join('->')} has no residual capacity.`, 'INVALID_PATH');
  }

  for (let i = 1; i < path.length; i += 1) {
    const u = path[i - 1] ?? -1;
    const v = path[i] ?? -1;
    const forward = flow[u];
    const backward = flow[v];
    if (!forward || !backward) {
      throw new InvalidInputError(`Path edge ${u}->${v} is outside the flow matrix.`, 'INVALID_PATH', {
        row: u,
        column: v,
      });
    }
    forward[v] = (forward[v] ?? 0) + aug;
    backward[u] = (backward[u] ?? 0) - aug;
  }

  return aug;
}

export function inflow(flow: FlowMatrix, node: NodeIndex): number {
  let total = 0;
  for (const row of flow) {
    total += row[node] ?? 0;
  }
  return total;
}

/** Edmonds-Karp over a capacity matrix with a single source and sink. */
export function edmondsKarp(
  capacity: CapacityMatrix,
  source: NodeIndex,
  sink: NodeIndex,
  options: FlowOptions = {},
): FlowRun {
  const flow = zeroMatrix(capacity.length);
  let augmentations = 0;
  let total = 0;

  for (;;) {
    const path = findAugmentingPath(capacity, flow, source, sink);
    if (!path) break;
    const aug = augmentFlow(capacity, flow, path);
    augmentations += 1;
    total += aug;
    options.onAugment?.({ iteration: augmentations, path, bottleneck: aug, total });
  }

  return { value: inflow(flow, sink), augmentations, flow };
}
