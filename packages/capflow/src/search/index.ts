import type { CapacityMatrix, FlowMatrix, NodeIndex } from '../matrix';
import { InvalidInputError, capacityAt } from '../matrix';

type SearchRecord = {
  node: NodeIndex;
  parent: number; // arena slot of the predecessor, -1 for the source
};

export function residualCapacity(capacity: CapacityMatrix, flow: FlowMatrix, u: NodeIndex, v: NodeIndex): number {
  return capacityAt(capacity, u, v) - (flow[u]?.[v] ?? 0);
}

function checkEndpoints(capacity: CapacityMatrix, flow: FlowMatrix, source: NodeIndex, sink: NodeIndex) {
  const n = capacity.length;
  if (flow.length !== n) {
    throw new InvalidInputError(`Flow matrix has ${flow.length} rows, expected ${n}.`, 'SIZE_MISMATCH', {
      size: flow.length,
    });
  }
  for (const index of [source, sink]) {
    if (!Number.isInteger(index) || index < 0 || index >= n) {
      throw new InvalidInputError(`Node ${index} is outside [0, ${n}).`, 'INDEX_OUT_OF_RANGE', { index, size: n });
    }
  }
  if (source === sink) {
    throw new InvalidInputError(`Source and sink are the same node ${source}.`, 'OVERLAPPING_TERMINALS', {
      index: source,
    });
  }
}

function tracePath(arena: SearchRecord[], slot: number): NodeIndex[] {
  const path: NodeIndex[] = [];
  for (let cursor = slot; cursor !== -1; ) {
    const record = arena[cursor];
    if (!record) break;
    path.push(record.node);
    cursor = record.parent;
  }
  return path.reverse();
}

/**
 * Breadth-first search for a source-to-sink path whose every edge has positive residual
 * capacity. Returns the path with the fewest edges, ties going to the lowest node index
 * at each branch, or `null` once the sink is unreachable.
 */
export function findAugmentingPath(
  capacity: CapacityMatrix,
  flow: FlowMatrix,
  source: NodeIndex,
  sink: NodeIndex,
): NodeIndex[] | null {
  checkEndpoints(capacity, flow, source, sink);
  const n = capacity.length;
  const visited = Array<boolean>(n).fill(false);
  const arena: SearchRecord[] = [{ node: source, parent: -1 }];
  visited[source] = true;

  for (let head = 0; head < arena.length; head += 1) {
    const current = arena[head];
    if (!current) break;
    for (let next = 0; next < n; next += 1) {
      if (visited[next]) continue;
      if (residualCapacity(capacity, flow, current.node, next) <= 0) continue;
      visited[next] = true;
      arena.push({ node: next, parent: head });
      if (next === sink) return tracePath(arena, arena.length - 1);
    }
  }

  return null;
}
