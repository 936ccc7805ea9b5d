import { DimensionMismatchError } from '../errors.js';
import { dot, compareScoresDesc } from './rank.js';
import type { SuggestOptions } from '../types.js';

/** Minimum centroid similarity for a tag to be suggested */
export const DEFAULT_SUGGEST_THRESHOLD = 0.45;

/** Maximum number of suggested tags */
export const DEFAULT_SUGGEST_MAX = 5;

/** Tags too common to carry signal; never turned into centroids */
export const DEFAULT_SKIP_TAGS: ReadonlySet<string> = new Set(['conversation', 'context']);

/**
 * Compute one centroid per tag: the component-wise mean of its member
 * vectors, L2-normalized. A mean with zero norm is returned as-is (the zero
 * vector), which scores 0 against everything.
 *
 * Tags in `skipTags` and tags without members are left out of the result.
 */
export function computeCentroids(
  tagVectors: ReadonlyMap<string, readonly ArrayLike<number>[]>,
  skipTags: ReadonlySet<string> = DEFAULT_SKIP_TAGS,
): Map<string, Float32Array> {
  const centroids = new Map<string, Float32Array>();

  for (const [tag, vectors] of tagVectors) {
    if (skipTags.has(tag) || vectors.length === 0) continue;
    centroids.set(tag, normalize(mean(vectors)));
  }

  return centroids;
}

/**
 * Suggest tags for a vector by comparing it against tag centroids.
 *
 * Keeps tags scoring at or above the threshold, ordered by score descending
 * and then by tag name, truncated to `maxTags`. Read-only.
 */
export function suggestTags(
  vector: ArrayLike<number>,
  centroids: ReadonlyMap<string, ArrayLike<number>>,
  options: SuggestOptions = {},
): string[] {
  const {
    threshold = DEFAULT_SUGGEST_THRESHOLD,
    maxTags = DEFAULT_SUGGEST_MAX,
  } = options;

  if (centroids.size === 0 || maxTags <= 0) return [];

  const scored: Array<{ tag: string; score: number }> = [];
  for (const [tag, centroid] of centroids) {
    const score = dot(vector, centroid);
    if (score >= threshold) {
      scored.push({ tag, score });
    }
  }

  scored.sort((a, b) => compareScoresDesc(a.score, b.score) || compareTags(a.tag, b.tag));
  return scored.slice(0, maxTags).map(s => s.tag);
}

// Code-point order, independent of locale.
function compareTags(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

function mean(vectors: readonly ArrayLike<number>[]): Float64Array {
  const dimensions = vectors[0].length;
  const sum = new Float64Array(dimensions);

  for (const vector of vectors) {
    if (vector.length !== dimensions) {
      throw new DimensionMismatchError(dimensions, vector.length);
    }
    for (let i = 0; i < dimensions; i++) {
      sum[i] += vector[i];
    }
  }

  for (let i = 0; i < dimensions; i++) {
    sum[i] /= vectors.length;
  }
  return sum;
}

function normalize(vector: Float64Array): Float32Array {
  let squares = 0;
  for (let i = 0; i < vector.length; i++) {
    squares += vector[i] * vector[i];
  }

  const norm = Math.sqrt(squares);
  const out = new Float32Array(vector.length);
  for (let i = 0; i < vector.length; i++) {
    out[i] = norm === 0 ? vector[i] : vector[i] / norm;
  }
  return out;
}
