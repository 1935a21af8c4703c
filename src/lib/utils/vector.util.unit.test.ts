import { describe, it, expect } from 'vitest';
import { cosineSimilarity, dotProduct, euclideanDistance, manhattanDistance } from './vector.util.js';

describe('vector utils', () => {
  it('computes cosine similarity from dot products', () => {
    expect(cosineSimilarity([1, 0], [1, 0])).toBe(1);
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
    expect(cosineSimilarity([1, 0], [-1, 0])).toBe(-1);
    expect(cosineSimilarity([3, 4], [6, 8])).toBe(1);
  });

  it('returns 0 for empty, mismatched and zero vectors', () => {
    expect(cosineSimilarity([], [])).toBe(0);
    expect(cosineSimilarity([1, 2], [1, 2, 3])).toBe(0);
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
  });

  it('measures distances', () => {
    expect(dotProduct([1, 2, 3], [4, 5, 6])).toBe(32);
    expect(euclideanDistance([0, 0], [3, 4])).toBe(5);
    expect(manhattanDistance([1, -1], [-2, 3])).toBe(7);
    expect(euclideanDistance([1], [1, 2])).toBe(Number.POSITIVE_INFINITY);
  });
});
