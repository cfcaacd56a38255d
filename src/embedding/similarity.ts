/**
 * Vector helpers shared by the vector store, the domain gate and the tests.
 * All functions tolerate zero vectors by scoring them 0.
 */

export function dot(left: readonly number[], right: readonly number[]): number {
  const length = Math.min(left.length, right.length);
  let sum = 0;
  for (let index = 0; index < length; index += 1) {
    sum += left[index] * right[index];
  }
  return sum;
}

export function norm(vector: readonly number[]): number {
  return Math.sqrt(dot(vector, vector));
}

/** Returns a unit-length copy of {@link vector} (zero vectors are returned as-is). */
export function normalise(vector: readonly number[]): number[] {
  const length = norm(vector);
  if (length === 0) {
    return [...vector];
  }
  return vector.map((value) => value / length);
}

/** Cosine similarity in `[-1, 1]`. */
export function cosineSimilarity(left: readonly number[], right: readonly number[]): number {
  const denominator = norm(left) * norm(right);
  if (denominator === 0) {
    return 0;
  }
  const score = dot(left, right) / denominator;
  // Rounding can push identical vectors marginally past 1.
  return Math.max(-1, Math.min(1, score));
}

/** Maximum cosine similarity between a unit query and rows of unit vectors. */
export function maxSimilarity(unitQuery: readonly number[], unitRows: ReadonlyArray<readonly number[]>): number {
  let best = Number.NEGATIVE_INFINITY;
  for (const row of unitRows) {
    const score = dot(unitQuery, row);
    if (score > best) {
      best = score;
    }
  }
  return best === Number.NEGATIVE_INFINITY ? 0 : Math.max(-1, Math.min(1, best));
}
