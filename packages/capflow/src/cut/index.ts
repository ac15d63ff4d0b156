import type { CapacityArc, CapacityMatrix, NodeIndex } from '../matrix';
import { capacityAt, validateCapacityMatrix, validateSourceCapacity, validateTerminals } from '../matrix';
import { reduceTerminals } from '../reduce';
import { edmondsKarp } from '../flow';
import { residualCapacity } from '../search';

export type MinCut = {
  value: number;
  sourceSide: NodeIndex[];
  edges: CapacityArc[];
};

export function minCut(
  sources: Iterable<NodeIndex>,
  sinks: Iterable<NodeIndex>,
  capacity: CapacityMatrix,
): MinCut {
  validateCapacityMatrix(capacity);
  const terminals = validateTerminals(capacity.length, sources, sinks);
  validateSourceCapacity(capacity, terminals.sources);
  const network = reduceTerminals(capacity, terminals.sources, terminals.sinks);
  const { flow } = edmondsKarp(network.capacity, network.source, network.sink);

  const size = network.capacity.length;
  const reached = Array<boolean>(size).fill(false);
  reached[network.source] = true;
  const queue: NodeIndex[] = [network.source];
  for (let head = 0; head < queue.length; head += 1) {
    const u = queue[head] ?? network.source;
    for (let v = 0; v < size; v += 1) {
      if (reached[v] || residualCapacity(network.capacity, flow, u, v) <= 0) continue;
      reached[v] = true;
      queue.push(v);
    }
  }

  const inSourceSide = Array<boolean>(capacity.length).fill(false);
  for (const s of terminals.sources) inSourceSide[s] = true;
  network.nodes.forEach((original, i) => {
    if (reached[i + 1]) inSourceSide[original] = true;
  });

  const sourceSide: NodeIndex[] = [];
  const edges: CapacityArc[] = [];
  let value = 0;
  for (let u = 0; u < capacity.length; u += 1) {
    if (!inSourceSide[u]) continue;
    sourceSide.push(u);
    for (let v = 0; v < capacity.length; v += 1) {
      const cap = capacityAt(capacity, u, v);
      if (inSourceSide[v] || cap <= 0) continue;
      edges.push({ from: u, to: v, capacity: cap });
      value += cap;
    }
  }

  return { value, sourceSide, edges };
}
