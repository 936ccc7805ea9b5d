/**
 * The contract every encoder implements.
 *
 * Providers turn text into unit-normalized vectors. The knowledge base takes
 * one as a constructor argument, so tests can hand it a deterministic fake.
 */
export interface EmbeddingProvider {
  /** Provider identifier, e.g. 'voyage', 'openai' */
  readonly name: string;

  /** Model identifier, e.g. 'voyage-3-lite', 'text-embedding-3-small' */
  readonly model: string;

  /** Output vector dimensions, e.g. 512, 1536 */
  readonly dimensions: number;

  /**
   * Generate embeddings for a batch of texts.
   * Returns one unit-length Float32Array per input text, each of length `dimensions`.
   */
  embed(texts: string[]): Promise<Float32Array[]>;
}

/**
 * Convert an API vector to float32 and scale it to unit length. A zero
 * vector is returned unchanged.
 */
export function toUnitVector(values: readonly number[]): Float32Array {
  let squares = 0;
  for (const v of values) squares += v * v;
  const norm = Math.sqrt(squares);

  const out = new Float32Array(values.length);
  for (let i = 0; i < values.length; i++) {
    out[i] = norm === 0 ? values[i] : values[i] / norm;
  }
  return out;
}
