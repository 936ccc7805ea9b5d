import { DimensionMismatchError } from '../errors.js';
import type { KeyedVector, RankedResult } from '../types.js';

/**
 * Dot product of two vectors. Equal to cosine similarity when both are
 * unit-normalized; no normalization happens here.
 */
export function dot(a: ArrayLike<number>, b: ArrayLike<number>): number {
  if (a.length !== b.length) {
    throw new DimensionMismatchError(a.length, b.length);
  }

  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    sum += a[i] * b[i];
  }
  return sum;
}

/** Comparator for descending scores. NaN sorts below every number. */
export function compareScoresDesc(a: number, b: number): number {
  const x = Number.isNaN(a) ? -Infinity : a;
  const y = Number.isNaN(b) ? -Infinity : b;
  if (x === y) return 0;
  return x > y ? -1 : 1;
}

/**
 * Rank candidates by similarity to the query, highest first.
 * Equal scores keep their input order (Array#sort is stable).
 */
export function rank(query: ArrayLike<number>, candidates: readonly KeyedVector[]): RankedResult[] {
  if (candidates.length === 0) return [];

  const scored: RankedResult[] = candidates.map(([key, vector]) => ({
    key,
    score: dot(query, vector),
  }));

  scored.sort((a, b) => compareScoresDesc(a.score, b.score));
  return scored;
}
