import { describe, expect, it } from 'vitest';

import { InvalidInputError, zeroMatrix } from '../src/matrix';
import { augmentFlow, bottleneck, edmondsKarp, inflow, type AugmentStep } from '../src/flow';

describe('flow', () => {
  it('finds the bottleneck of a path', () => {
    const capacity = [
      [0, 3, 0],
      [0, 0, 2],
      [0, 0, 0],
    ];
    expect(bottleneck(capacity, zeroMatrix(3), [0, 1, 2])).toBe(2);
  });

  it('augments forward edges and credits reverse edges', () => {
    const capacity = [
      [0, 3, 0],
      [0, 0, 2],
      [0, 0, 0],
    ];
    const flow = zeroMatrix(3);
    expect(augmentFlow(capacity, flow, [0, 1, 2])).toBe(2);
    expect(flow).toEqual([
      [0, 2, 0],
      [-2, 0, 2],
      [0, -2, 0],
    ]);
    expect(inflow(flow, 2)).toBe(2);
  });

  it('rejects paths without residual capacity', () => {
    const capacity = [
      [0, 0],
      [0, 0],
    ];
    expect(() => augmentFlow(capacity, zeroMatrix(2), [0, 1])).toThrow(InvalidInputError);
    expect(() => augmentFlow(capacity, zeroMatrix(2), [0])).toThrow(InvalidInputError);
  });

  it('cancels flow through reverse edges', () => {
    const capacity = [
      [0, 1, 1, 0, 0, 0],
      [0, 0, 0, 1, 1, 0],
      [0, 0, 0, 1, 0, 0],
      [0, 0, 0, 0, 0, 1],
      [0, 0, 0, 0, 0, 1],
      [0, 0, 0, 0, 0, 0],
    ];
    const steps: AugmentStep[] = [];
    const run = edmondsKarp(capacity, 0, 5, { onAugment: (step) => steps.push(step) });
    expect(run.value).toBe(2);
    expect(run.augmentations).toBe(2);
    expect(steps.map((step) => step.path)).toEqual([
      [0, 1, 3, 5],
      [0, 2, 3, 1, 4, 5],
    ]);
    expect(steps[1]?.total).toBe(2);
    expect(run.flow[1]?.[3]).toBe(0);
    expect(run.flow[3]?.[1]).toBe(0);
  });

  it('needs two augmentations regardless of capacity magnitude', () => {
    const big = 1_000_000_000;
    const capacity = [
      [0, big, big, 0],
      [0, 0, 1, big],
      [0, 0, 0, big],
      [0, 0, 0, 0],
    ];
    const run = edmondsKarp(capacity, 0, 3);
    expect(run.value).toBe(2 * big);
    expect(run.augmentations).toBe(2);
  });

  it('reports zero flow when source and sink are disconnected', () => {
    const run = edmondsKarp(
      [
        [0, 0],
        [0, 0],
      ],
      0,
      1,
    );
    expect(run).toEqual({ value: 0, augmentations: 0, flow: [[0, 0], [0, 0]] });
  });
});
