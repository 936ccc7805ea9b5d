import type { KeyedVector } from '../types.js';

/**
 * Read access the engine needs from storage. The SQLite stores in `src/db`
 * implement these; tests can pass plain objects.
 */
export interface EmbeddingReader {
  /** Every stored `[key, vector]` pair, ordered by key. */
  listVectors(): KeyedVector[];
}

export interface TagMembershipReader {
  /** Tag → keys of the notes carrying it. */
  tagMembership(): Map<string, Set<string>>;
}

/**
 * Join tag membership with stored vectors. Members without a vector are
 * skipped, so a tag whose notes were never encoded maps to an empty list.
 */
export function collectTagVectors(
  tags: TagMembershipReader,
  embeddings: EmbeddingReader,
): Map<string, Float32Array[]> {
  const byKey = new Map(embeddings.listVectors());
  const result = new Map<string, Float32Array[]>();

  for (const [tag, keys] of tags.tagMembership()) {
    const vectors: Float32Array[] = [];
    for (const key of keys) {
      const vector = byKey.get(key);
      if (vector) vectors.push(vector);
    }
    result.set(tag, vectors);
  }

  return result;
}
