import { describe, it, expect } from 'vitest';
import { FlatL2Index } from '../src/retrieval/vector-index.js';
import { ArtifactMismatchError, DimensionMismatchError, IndexNotBuiltError } from '../src/errors.js';

const POINTS = [
  [0, 0],
  [1, 0],
  [0, 2],
  [1, 1]
];

describe('FlatL2Index', () => {
  it('returns nearest neighbours by squared euclidean distance', () => {
    const index = new FlatL2Index().build(POINTS);
    expect(index.size).toBe(4);
    expect(index.dimension).toBe(2);
    expect(index.search([0, 0], 3)).toEqual([
      { ordinal: 0, distance: 0 },
      { ordinal: 1, distance: 1 },
      { ordinal: 3, distance: 2 }
    ]);
  });

  it('breaks distance ties by ordinal', () => {
    const index = new FlatL2Index().build([
      [1, 0],
      [0, 1],
      [-1, 0]
    ]);
    expect(index.search([0, 0], 3).map((n) => n.ordinal)).toEqual([0, 1, 2]);
  });

  it('caps results at the number of stored vectors', () => {
    const index = new FlatL2Index().build(POINTS);
    expect(index.search([5, 5], 10)).toHaveLength(4);
    expect(index.search([5, 5], 0)).toEqual([]);
  });

  it('returns nothing from an empty index', () => {
    const index = new FlatL2Index().build([], 3);
    expect(index.isBuilt).toBe(true);
    expect(index.search([0, 0, 0], 5)).toEqual([]);
  });

  it('rejects searches before build', () => {
    const index = new FlatL2Index();
    expect(index.isBuilt).toBe(false);
    expect(() => index.search([0, 0], 1)).toThrow(IndexNotBuiltError);
  });

  it('rejects vectors and queries of the wrong dimension', () => {
    expect(() => new FlatL2Index().build([[1, 2], [1]])).toThrow(DimensionMismatchError);
    expect(() => new FlatL2Index().build([[1, 2]], 3)).toThrow(DimensionMismatchError);
    const index = new FlatL2Index().build(POINTS);
    expect(() => index.search([0, 0, 0], 1)).toThrow(DimensionMismatchError);
  });

  it('serializes with its build id and restores the same neighbours', () => {
    const index = new FlatL2Index().build(POINTS);
    const { index: restored, buildId } = FlatL2Index.deserialize(index.serialize('build-abc'));

    expect(buildId).toBe('build-abc');
    expect(restored.size).toBe(4);
    expect(restored.dimension).toBe(2);
    expect(restored.search([0, 0], 4)).toEqual(index.search([0, 0], 4));
  });

  it('refuses corrupt or truncated files', () => {
    expect(() => FlatL2Index.deserialize(Buffer.from('nope'))).toThrow(ArtifactMismatchError);
    const bytes = new FlatL2Index().build(POINTS).serialize('x');
    expect(() => FlatL2Index.deserialize(bytes.subarray(0, bytes.length - 4))).toThrow(ArtifactMismatchError);
  });
});
