import { NumericError } from "./errors.js";

function largestMagnitude(v: readonly number[]): number {
  let largest = 0;
  for (const x of v) {
    if (!Number.isFinite(x)) {
      throw new NumericError(`Cannot compute similarity: non-finite component ${x}`);
    }
    largest = Math.max(largest, Math.abs(x));
  }
  return largest;
}

/**
 * Cosine similarity, i.e. `1 - cosineDistance(a, b)`, clamped to [-1, 1].
 * Throws `NumericError` for mismatched lengths, empty vectors, non-finite
 * components or a zero magnitude, where the value is undefined.
 *
 * Both vectors are scaled by their largest component first so that very large
 * or very small magnitudes neither overflow nor underflow.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new NumericError(`Embedding dimension mismatch: ${a.length} vs ${b.length}`);
  }
  if (a.length === 0) {
    throw new NumericError("Cannot compute similarity of empty vectors");
  }
  const scaleA = largestMagnitude(a);
  const scaleB = largestMagnitude(b);
  if (scaleA === 0 || scaleB === 0) {
    throw new NumericError("Cannot compute similarity: zero magnitude vector");
  }

  let dot = 0;
  let a2 = 0;
  let b2 = 0;
  for (let i = 0; i < a.length; i += 1) {
    const av = (a[i] ?? 0) / scaleA;
    const bv = (b[i] ?? 0) / scaleB;
    dot += av * bv;
    a2 += av * av;
    b2 += bv * bv;
  }
  const score = dot / (Math.sqrt(a2) * Math.sqrt(b2));
  if (!Number.isFinite(score)) {
    throw new NumericError(`Cannot compute similarity: non-finite result ${score}`);
  }
  return Math.min(1, Math.max(-1, score));
}
