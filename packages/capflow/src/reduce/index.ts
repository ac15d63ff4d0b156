import type { CapacityMatrix, NodeIndex } from '../matrix';
import { capacityAt, validateTerminals, zeroMatrix } from '../matrix';

export type ReducedNetwork = {
  capacity: number[][];
  source: NodeIndex;
  sink: NodeIndex;
  // original index of reduced node i + 1
  nodes: NodeIndex[];
  bypassFlow: number;
};

/**
 * Collapses every source into a super-source (index 0) and every sink into a super-sink
 * (last index). Terminals are dropped from the reduced graph; capacity running straight
 * from a source to a sink is returned as `bypassFlow` instead.
 */
export function reduceTerminals(
  capacity: CapacityMatrix,
  sources: Iterable<NodeIndex>,
  sinks: Iterable<NodeIndex>,
): ReducedNetwork {
  const n = capacity.length;
  const terminals = validateTerminals(n, sources, sinks, { allowEmpty: true });
  const isTerminal = Array<boolean>(n).fill(false);
  for (const s of terminals.sources) isTerminal[s] = true;
  for (const t of terminals.sinks) isTerminal[t] = true;

  let bypassFlow = 0;
  for (const s of terminals.sources) {
    for (const t of terminals.sinks) {
      bypassFlow += capacityAt(capacity, s, t);
    }
  }

  const nodes: NodeIndex[] = [];
  for (let v = 0; v < n; v += 1) {
    if (!isTerminal[v]) nodes.push(v);
  }

  const size = nodes.length + 2;
  const sink = size - 1;
  const reduced = zeroMatrix(size);
  const sourceRow = reduced[0]!;

  nodes.forEach((original, i) => {
    const row = reduced[i + 1]!;
    for (const s of terminals.sources) {
      sourceRow[i + 1] = (sourceRow[i + 1] ?? 0) + capacityAt(capacity, s, original);
    }
    nodes.forEach((other, j) => {
      row[j + 1] = capacityAt(capacity, original, other);
    });
    let toSink = 0;
    for (const t of terminals.sinks) {
      toSink += capacityAt(capacity, original, t);
    }
    row[sink] = toSink;
  });

  return { capacity: reduced, source: 0, sink, nodes, bypassFlow };
}
