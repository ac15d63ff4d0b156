import { describe, expect, it } from 'vitest';

import { minCut } from '../src/cut';

describe('cut', () => {
  it('separates a single corridor at its narrowest segment', () => {
    const cut = minCut([0], [3], [
      [0, 7, 0, 0],
      [0, 0, 6, 0],
      [0, 0, 0, 8],
      [9, 0, 0, 0],
    ]);
    expect(cut).toEqual({
      value: 6,
      sourceSide: [0, 1],
      edges: [{ from: 1, to: 2, capacity: 6 }],
    });
  });

  it('includes direct source-to-sink arcs', () => {
    expect(minCut([0], [1], [[0, 5], [0, 0]])).toEqual({
      value: 5,
      sourceSide: [0],
      edges: [{ from: 0, to: 1, capacity: 5 }],
    });
  });

  it('maps reduced nodes back to original indices', () => {
    const cut = minCut([0, 1], [4, 5], [
      [0, 0, 4, 6, 0, 0],
      [0, 0, 5, 2, 0, 0],
      [0, 0, 0, 0, 4, 4],
      [0, 0, 0, 0, 6, 6],
      [0, 0, 0, 0, 0, 0],
      [0, 0, 0, 0, 0, 0],
    ]);
    expect(cut.value).toBe(16);
    expect(cut.sourceSide).toEqual([0, 1, 2]);
    expect(cut.edges).toEqual([
      { from: 0, to: 3, capacity: 6 },
      { from: 1, to: 3, capacity: 2 },
      { from: 2, to: 4, capacity: 4 },
      { from: 2, to: 5, capacity: 4 },
    ]);
  });
});
