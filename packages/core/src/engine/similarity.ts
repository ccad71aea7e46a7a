/**
 * Vector math for prototype matching. Inputs are plain number sequences so
 * both Float32Array embeddings and test fixtures work.
 */
export type Vector = ArrayLike<number>;

/**
 * Cosine of the angle between two vectors, in [-1, 1].
 * Zero-magnitude vectors have similarity 0 with everything.
 */
export function cosineSimilarity(a: Vector, b: Vector): number {
  if (a.length !== b.length) {
    throw new RangeError(`Vector length mismatch: ${a.length} vs ${b.length}`);
  }

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    const x = a[i];
    const y = b[i];
    dotProduct += x * y;
    normA += x * x;
    normB += y * y;
  }

  if (normA === 0 || normB === 0) {
    return 0;
  }

  return dotProduct / (Math.sqrt(normA) * Math.sqrt(normB));
}

/**
 * Elementwise mean of one or more equal-length vectors.
 */
export function centroid(vectors: readonly Vector[]): Float64Array {
  if (vectors.length === 0) {
    throw new RangeError('Cannot take the centroid of zero vectors');
  }

  const sum = new Float64Array(vectors[0].length);
  for (const vector of vectors) {
    if (vector.length !== sum.length) {
      throw new RangeError(`Vector length mismatch: ${sum.length} vs ${vector.length}`);
    }
    for (let i = 0; i < sum.length; i++) {
      sum[i] += vector[i];
    }
  }

  for (let i = 0; i < sum.length; i++) {
    sum[i] /= vectors.length;
  }
  return sum;
}

export function clampUnit(value: number): number {
  return Math.max(0, Math.min(1, value));
}

/**
 * True when the vector has the expected length and only finite components.
 */
export function isWellFormed(vector: Vector, dimension: number): boolean {
  if (vector.length !== dimension) return false;
  for (let i = 0; i < vector.length; i++) {
    if (!Number.isFinite(vector[i])) return false;
  }
  return true;
}
