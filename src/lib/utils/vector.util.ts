/**
 * Compute cosine similarity between two numeric vectors.
 * Returns 0 if vectors have mismatched length or zero norm.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (!a.length || a.length !== b.length) return 0;
  const squaredNorms = dotProduct(a, a) * dotProduct(b, b);
  if (squaredNorms === 0) return 0;
  return dotProduct(a, b) / Math.sqrt(squaredNorms);
}

export function dotProduct(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) return 0;
  let dot = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
  }
  return dot;
}

export function euclideanDistance(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) return Number.POSITIVE_INFINITY;
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    const diff = a[i] - b[i];
    sum += diff * diff;
  }
  return Math.sqrt(sum);
}

export function manhattanDistance(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) return Number.POSITIVE_INFINITY;
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    sum += Math.abs(a[i] - b[i]);
  }
  return sum;
}

export function zeroVector(dimension: number): number[] {
  return new Array<number>(dimension).fill(0);
}

export function clampScore(score: number): number {
  if (Number.isNaN(score)) return 0;
  return Math.min(1, Math.max(0, score));
}

/** Map a raw cosine similarity in [-1, 1] onto [0, 1] */
export function cosineToScore(similarity: number): number {
  return clampScore((1 + similarity) / 2);
}

/** Map a distance in [0, ∞) onto (0, 1] */
export function distanceToScore(distance: number): number {
  return clampScore(1 / (1 + Math.max(0, distance)));
}

/** Map an inner product onto [0, 1]; exact for unit vectors */
export function innerProductToScore(product: number): number {
  return clampScore((1 + product) / 2);
}

/** Inverse of `cosineToScore`, used to push a normalised threshold down to a backend */
export function scoreToCosine(score: number): number {
  return score * 2 - 1;
}

/** Inverse of `distanceToScore`; a score of 0 admits any distance */
export function scoreToDistance(score: number): number {
  return score <= 0 ? Number.POSITIVE_INFINITY : 1 / score - 1;
}

/**
 * Validate an unknown value (typically a parsed JSON body) as a numeric vector
 */
export function toNumberArray(value: unknown): number[] | undefined {
  if (!Array.isArray(value)) return undefined;
  const vector: number[] = [];
  for (const item of value) {
    if (typeof item !== 'number' || !Number.isFinite(item)) return undefined;
    vector.push(item);
  }
  return vector;
}
