import { getDatabase } from './schema.js';
import { decodeBlob, encodeBlob } from '../engine/codec.js';
import type { EmbeddingReader } from '../engine/repository.js';
import type { KeyedVector } from '../types.js';

export interface EmbeddingMetadata {
  key: string;
  provider: string;
  model: string;
  dimensions: number;
  createdAt: string;
}

export interface EncoderInfo {
  provider: string;
  model: string;
}

interface MetadataRow {
  key: string;
  provider: string;
  model: string;
  dimensions: number;
  created_at: string;
}

export class EmbeddingStore implements EmbeddingReader {
  /** Store or replace a note's embedding, and record which encoder produced it. */
  upsert(key: string, embedding: ArrayLike<number>, encoder?: EncoderInfo): void {
    const db = getDatabase();

    db.prepare(`
      INSERT INTO note_embeddings (key, embedding)
      VALUES (?, ?)
      ON CONFLICT(key) DO UPDATE SET embedding = excluded.embedding
    `).run(key, encodeBlob(embedding));

    if (encoder) {
      db.prepare(`
        INSERT INTO embedding_metadata (key, provider, model, dimensions)
        VALUES (?, ?, ?, ?)
        ON CONFLICT(key) DO UPDATE SET
          provider = excluded.provider,
          model = excluded.model,
          dimensions = excluded.dimensions,
          created_at = datetime('now')
      `).run(key, encoder.provider, encoder.model, embedding.length);
    }
  }

  get(key: string): Float32Array | null {
    const db = getDatabase();
    const row = db.prepare(
      'SELECT embedding FROM note_embeddings WHERE key = ?'
    ).get(key) as { embedding: Buffer } | undefined;

    if (!row) return null;
    return decodeBlob(row.embedding);
  }

  listVectors(): KeyedVector[] {
    const db = getDatabase();
    const rows = db.prepare(
      'SELECT key, embedding FROM note_embeddings ORDER BY key'
    ).all() as { key: string; embedding: Buffer }[];

    return rows.map(row => [row.key, decodeBlob(row.embedding)]);
  }

  /** Keys of notes that have no embedding yet */
  findMissing(): string[] {
    const db = getDatabase();
    const rows = db.prepare(`
      SELECT n.key FROM notes n
      LEFT JOIN note_embeddings e ON n.key = e.key
      WHERE e.key IS NULL
      ORDER BY n.key
    `).all() as { key: string }[];

    return rows.map(r => r.key);
  }

  /**
   * Keys whose embedding was produced by another provider or model, or has
   * no metadata at all. These need re-encoding before they compare cleanly
   * with fresh vectors.
   */
  findMismatched(encoder: EncoderInfo): string[] {
    const db = getDatabase();
    const rows = db.prepare(`
      SELECT e.key FROM note_embeddings e
      LEFT JOIN embedding_metadata m ON e.key = m.key
      WHERE m.key IS NULL OR m.provider != ? OR m.model != ?
      ORDER BY e.key
    `).all(encoder.provider, encoder.model) as { key: string }[];

    return rows.map(r => r.key);
  }

  getMetadata(key: string): EmbeddingMetadata | null {
    const db = getDatabase();
    const row = db.prepare(
      'SELECT key, provider, model, dimensions, created_at FROM embedding_metadata WHERE key = ?'
    ).get(key) as MetadataRow | undefined;

    if (!row) return null;
    return {
      key: row.key,
      provider: row.provider,
      model: row.model,
      dimensions: row.dimensions,
      createdAt: row.created_at,
    };
  }

  /** The provider/model used by most stored embeddings */
  activeProviderInfo(): { provider: string; model: string; dimensions: number; count: number } | null {
    const db = getDatabase();
    const row = db.prepare(`
      SELECT provider, model, dimensions, COUNT(*) as count
      FROM embedding_metadata
      GROUP BY provider, model
      ORDER BY count DESC
      LIMIT 1
    `).get() as { provider: string; model: string; dimensions: number; count: number } | undefined;

    return row ?? null;
  }

  count(): number {
    const db = getDatabase();
    const row = db.prepare('SELECT COUNT(*) as count FROM note_embeddings').get() as { count: number };
    return row.count;
  }

  remove(key: string): void {
    const db = getDatabase();
    db.prepare('DELETE FROM note_embeddings WHERE key = ?').run(key);
    db.prepare('DELETE FROM embedding_metadata WHERE key = ?').run(key);
  }
}
