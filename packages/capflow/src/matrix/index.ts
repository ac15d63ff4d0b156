export type NodeIndex = number;

export type CapacityMatrix = ReadonlyArray<ReadonlyArray<number>>;

// Signed net flow; flow[u][v] === -flow[v][u].
export type FlowMatrix = number[][];

export type CapacityArc = {
  from: NodeIndex;
  to: NodeIndex;
  capacity: number;
};

export type InvalidInputCode =
  | 'TOO_SMALL'
  | 'NOT_SQUARE'
  | 'NON_INTEGER_CAPACITY'
  | 'NEGATIVE_CAPACITY'
  | 'CAPACITY_OVERFLOW'
  | 'EMPTY_TERMINALS'
  | 'INDEX_OUT_OF_RANGE'
  | 'OVERLAPPING_TERMINALS'
  | 'INVALID_PATH'
  | 'SIZE_MISMATCH';

export type InvalidInputDetail = {
  row?: number;
  column?: number;
  index?: number;
  size?: number;
};

/** Thrown for malformed matrices, terminal sets or paths, before any flow is computed. */
export class InvalidInputError extends Error {
  constructor(
    message: string,
    public readonly code: InvalidInputCode,
    public readonly detail: InvalidInputDetail = {},
  ) {
    super(message);
    this.name = 'InvalidInputError';
  }
}

export function zeroMatrix(n: number): number[][] {
  return Array.from({ length: n }, () => Array<number>(n).fill(0));
}

export function cloneMatrix(matrix: CapacityMatrix): number[][] {
  return matrix.map((row) => [...row]);
}

export function capacityAt(capacity: CapacityMatrix, u: NodeIndex, v: NodeIndex): number {
  return capacity[u]?.[v] ?? 0;
}

/**
 * Checks that `capacity` is an N×N matrix (N ≥ 2) of non-negative safe integers. Missing
 * cells, `null` and `NaN` count as non-integer capacities.
 */
export function validateCapacityMatrix(capacity: CapacityMatrix): void {
  const n = capacity.length;
  if (n < 2) {
    throw new InvalidInputError(`Capacity matrix needs at least 2 nodes, got ${n}.`, 'TOO_SMALL', { size: n });
  }

  for (let u = 0; u < n; u += 1) {
    const row = capacity[u] ?? [];
    if (row.length !== n) {
      throw new InvalidInputError(`Row ${u} has ${row.length} entries, expected ${n}.`, 'NOT_SQUARE', {
        row: u,
        size: row.length,
      });
    }
    for (let v = 0; v < n; v += 1) {
      const value = row[v];
      if (value === undefined || !Number.isSafeInteger(value)) {
        throw new InvalidInputError(`Capacity ${u}->${v} is not an integer: ${value}.`, 'NON_INTEGER_CAPACITY', {
          row: u,
          column: v,
        });
      }
      if (value < 0) {
        throw new InvalidInputError(`Capacity ${u}->${v} is negative: ${value}.`, 'NEGATIVE_CAPACITY', {
          row: u,
          column: v,
        });
      }
    }
  }
}

/**
 * Bounds the capacity leaving `sources`. Every flow value, bypass total and bottleneck is
 * at most this sum, so keeping it within `Number.MAX_SAFE_INTEGER` keeps them exact.
 * Edges that never leave a source are only limited per cell by `validateCapacityMatrix`.
 */
export function validateSourceCapacity(capacity: CapacityMatrix, sources: Iterable<NodeIndex>): void {
  let total = 0;
  for (const s of sources) {
    for (const value of capacity[s] ?? []) {
      total += value;
    }
    if (!Number.isSafeInteger(total)) {
      throw new InvalidInputError(
        'Capacity leaving the sources exceeds Number.MAX_SAFE_INTEGER.',
        'CAPACITY_OVERFLOW',
        { index: s },
      );
    }
  }
}

export type TerminalOptions = {
  allowEmpty?: boolean;
};

export type Terminals = {
  sources: NodeIndex[];
  sinks: NodeIndex[];
};

const collectTerminals = (indices: Iterable<NodeIndex>, n: number, role: string): NodeIndex[] => {
  const seen = new Set<NodeIndex>();
  for (const index of indices) {
    if (!Number.isInteger(index) || index < 0 || index >= n) {
      throw new InvalidInputError(`${role} index ${index} is outside [0, ${n}).`, 'INDEX_OUT_OF_RANGE', {
        index,
        size: n,
      });
    }
    seen.add(index);
  }
  return [...seen].sort((a, b) => a - b);
};

/**
 * Normalizes source and sink sets to sorted, duplicate-free lists over `[0, n)`.
 * A node may not be both a source and a sink.
 */
export function validateTerminals(
  n: number,
  sources: Iterable<NodeIndex>,
  sinks: Iterable<NodeIndex>,
  options: TerminalOptions = {},
): Terminals {
  const allowEmpty = options.allowEmpty ?? false;
  const sourceList = collectTerminals(sources, n, 'Source');
  const sinkList = collectTerminals(sinks, n, 'Sink');

  if (!allowEmpty && sourceList.length === 0) {
    throw new InvalidInputError('At least one source is required.', 'EMPTY_TERMINALS');
  }
  if (!allowEmpty && sinkList.length === 0) {
    throw new InvalidInputError('At least one sink is required.', 'EMPTY_TERMINALS');
  }

  const sourceSet = new Set(sourceList);
  for (const sink of sinkList) {
    if (sourceSet.has(sink)) {
      throw new InvalidInputError(`Node ${sink} is both a source and a sink.`, 'OVERLAPPING_TERMINALS', {
        index: sink,
      });
    }
  }

  return { sources: sourceList, sinks: sinkList };
}

export function capacityFromArcs(nodeCount: number, arcs: ReadonlyArray<CapacityArc>): number[][] {
  const matrix = zeroMatrix(nodeCount);
  for (const arc of arcs) {
    const row = matrix[arc.from];
    if (!row || !Number.isInteger(arc.to) || arc.to < 0 || arc.to >= nodeCount) {
      throw new InvalidInputError(`Invalid arc ${arc.from}->${arc.to}.`, 'INDEX_OUT_OF_RANGE', {
        row: arc.from,
        column: arc.to,
        size: nodeCount,
      });
    }
    row[arc.to] = (row[arc.to] ?? 0) + arc.capacity;
  }
  return matrix;
}
