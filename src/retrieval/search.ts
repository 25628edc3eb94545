import { EmptyCollectionError, NoCandidatesError } from "./errors.js";
import { cosineSimilarity } from "./similarity.js";
import type { ReadableCollection, SimilarityMatch } from "./types.js";

/**
 * Similarity of every record to the reference. The reference's own slot is
 * forced to 0.0 instead of its self-similarity of 1.0.
 */
export function scoreAgainst(collection: ReadableCollection, referenceIndex: number): number[] {
  if (collection.size === 0) {
    throw new EmptyCollectionError();
  }
  const reference = collection.get(referenceIndex);

  const scores: number[] = [];
  for (let i = 0; i < collection.size; i += 1) {
    scores.push(i === referenceIndex ? 0 : cosineSimilarity(reference.vector, collection.get(i).vector));
  }
  return scores;
}

function toMatch(collection: ReadableCollection, index: number, score: number): SimilarityMatch {
  const record = collection.get(index);
  return { index, location: record.location, title: record.title, score };
}

/**
 * Nearest neighbour of the reference, excluding the reference itself. Ties go
 * to the lowest index. The relation is not symmetric: `bestMatch(a) === b`
 * says nothing about `bestMatch(b)`.
 */
export function bestMatch(collection: ReadableCollection, referenceIndex: number): SimilarityMatch {
  const scores = scoreAgainst(collection, referenceIndex);

  let best = -1;
  let bestScore = Number.NEGATIVE_INFINITY;
  scores.forEach((score, i) => {
    if (i === referenceIndex) return;
    if (best === -1 || score > bestScore) {
      best = i;
      bestScore = score;
    }
  });

  if (best === -1) {
    throw new NoCandidatesError(referenceIndex);
  }
  return toMatch(collection, best, bestScore);
}

export function topMatches(
  collection: ReadableCollection,
  referenceIndex: number,
  limit: number
): SimilarityMatch[] {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new Error(`limit must be a positive integer, got: ${limit}`);
  }
  const scores = scoreAgainst(collection, referenceIndex);

  return scores
    .map((score, index) => ({ index, score }))
    .filter((s) => s.index !== referenceIndex)
    .sort((a, b) => b.score - a.score || a.index - b.index)
    .slice(0, limit)
    .map((s) => toMatch(collection, s.index, s.score));
}
