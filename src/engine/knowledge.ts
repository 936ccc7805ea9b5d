import { withTransaction } from '../db/schema.js';
import type { EmbeddingStore, EncoderInfo } from '../db/embeddings.js';
import type { NoteRepository, ListOptions } from '../db/notes.js';
import { ConfigError, EncodingFailedError, NotFoundError, VecnoteError } from '../errors.js';
import { mergeTags, normalizeTags } from '../tags.js';
import type {
  KeyedVector,
  Note,
  NoteGraph,
  NoteSummary,
  SearchHit,
  StoreNoteInput,
  StoreNoteResult,
  SuggestOptions,
} from '../types.js';
import {
  computeCentroids,
  suggestTags,
  DEFAULT_SKIP_TAGS,
  DEFAULT_SUGGEST_MAX,
  DEFAULT_SUGGEST_THRESHOLD,
} from './centroids.js';
import type { EmbeddingProvider } from './embeddings/provider.js';
import { buildGraph, DEFAULT_GRAPH_NEIGHBORS } from './graph.js';
import { rank } from './rank.js';
import { collectTagVectors, type EmbeddingReader } from './repository.js';
import { extractTitle, snippet } from './titles.js';

export interface KnowledgeBaseOptions {
  threshold?: number;
  maxTags?: number;
  skipTags?: ReadonlySet<string>;
  searchLimit?: number;
  graphNeighbors?: number;
}

export interface SearchOptions {
  keyword?: boolean;  // substring match instead of semantic ranking
  limit?: number;     // semantic results kept (default 10)
}

export interface StoreOptions {
  /** Reuse centroids computed once for a batch instead of recomputing per note */
  centroids?: ReadonlyMap<string, Float32Array>;
  /** Override created_at/updated_at */
  timestamp?: string;
}

export interface BackfillOptions {
  /** Also re-encode notes stored with a different provider or model */
  reencode?: boolean;
  batchSize?: number;
  onProgress?: (done: number, total: number, key: string) => void;
}

export interface EmbeddingStatus {
  totalNotes: number;
  withEmbeddings: number;
  missing: number;
  mismatched: number;
  active: { provider: string; model: string; dimensions: number; count: number } | null;
}

export type SuggestTarget = { key: string } | { text: string };

const DEFAULT_BACKFILL_BATCH = 32;

/**
 * Notes with embeddings: storage, semantic search, tag suggestion and the
 * similarity graph. The encoder is injected; commands that never encode can
 * omit it.
 */
export class KnowledgeBase {
  private readonly threshold: number;
  private readonly maxTags: number;
  private readonly skipTags: ReadonlySet<string>;
  private readonly searchLimit: number;
  private readonly graphNeighbors: number;

  constructor(
    private readonly notes: NoteRepository,
    private readonly embeddings: EmbeddingStore,
    private readonly encoder?: EmbeddingProvider,
    options: KnowledgeBaseOptions = {},
  ) {
    this.threshold = options.threshold ?? DEFAULT_SUGGEST_THRESHOLD;
    this.maxTags = options.maxTags ?? DEFAULT_SUGGEST_MAX;
    this.skipTags = options.skipTags ?? DEFAULT_SKIP_TAGS;
    this.searchLimit = options.searchLimit ?? 10;
    this.graphNeighbors = options.graphNeighbors ?? DEFAULT_GRAPH_NEIGHBORS;
  }

  /**
   * Save or overwrite a note and its embedding in one transaction.
   *
   * With `autoTag`, tags suggested from the current centroids are appended
   * after the explicit ones (skip-set tags never are).
   */
  async storeNote(input: StoreNoteInput, options: StoreOptions = {}): Promise<StoreNoteResult> {
    const tags = normalizeTags(input.tags);
    const [vector] = await this.encode([input.body]);

    let suggestedTags: string[] = [];
    if (input.autoTag) {
      const centroids = options.centroids ?? this.centroids(vector.length);
      suggestedTags = suggestTags(vector, centroids, { threshold: this.threshold, maxTags: this.maxTags })
        .filter(tag => !this.skipTags.has(tag) && !tags.includes(tag));
    }

    const encoder = this.encoderInfo();
    const note = withTransaction(() => {
      const stored = this.notes.store({
        key: input.key,
        body: input.body,
        tags: mergeTags(tags, suggestedTags, this.skipTags),
        timestamp: options.timestamp,
      });
      this.embeddings.upsert(input.key, vector, encoder);
      return stored;
    });

    return { note, suggestedTags };
  }

  getNote(key: string): Note | null {
    return this.notes.get(key);
  }

  listNotes(options: ListOptions = {}): NoteSummary[] {
    return this.notes.list(options);
  }

  /** Overwrite a note's created/updated timestamps; body, tags and embedding are untouched. */
  redateNote(key: string, timestamp: string): void {
    if (!this.notes.setTimestamps(key, timestamp)) {
      throw new NotFoundError('Note', key);
    }
  }

  /** Delete a note and its embedding. */
  deleteNote(key: string): void {
    if (!this.notes.delete(key)) {
      throw new NotFoundError('Note', key);
    }
  }

  async search(query: string, options: SearchOptions = {}): Promise<SearchHit[]> {
    if (options.keyword) {
      return this.notes.keywordSearch(query).map(note => ({ note }));
    }

    const [queryVector] = await this.encode([query]);
    const limit = options.limit ?? this.searchLimit;
    const top = rank(queryVector, this.vectorsOfWidth(queryVector.length)).slice(0, limit);
    if (top.length === 0) return [];

    const scores = new Map(top.map(r => [r.key, r.score]));
    return this.notes.getMany(top.map(r => r.key)).map(note => ({
      note,
      score: scores.get(note.key),
    }));
  }

  /**
   * Centroids of every tag outside the skip-set, recomputed from the corpus.
   * Only vectors of `width` take part; it defaults to the encoder's width,
   * then to the width most stored vectors have.
   */
  centroids(width: number | undefined = this.encoder?.dimensions): Map<string, Float32Array> {
    const vectors: EmbeddingReader = { listVectors: () => this.vectorsOfWidth(width) };
    return computeCentroids(collectTagVectors(this.notes, vectors), this.skipTags);
  }

  /**
   * Suggest tags for a stored note or for free text. Nothing is written.
   * A stored note without an embedding is encoded on the fly.
   */
  async suggestTagsFor(target: SuggestTarget, options: SuggestOptions = {}): Promise<string[]> {
    const vector = await this.vectorFor(target);
    return suggestTags(vector, this.centroids(vector.length), {
      threshold: options.threshold ?? this.threshold,
      maxTags: options.maxTags ?? this.maxTags,
    });
  }

  /**
   * Top-k similarity graph with display fields, over the notes whose vectors
   * have the width most stored embeddings have.
   */
  graph(k: number = this.graphNeighbors): NoteGraph {
    const { nodes, edges } = buildGraph(this.vectorsOfWidth(undefined), k);
    if (nodes.length === 0) return { nodes: [], links: [] };

    const byKey = new Map(this.notes.getMany(nodes).map(n => [n.key, n]));
    return {
      nodes: nodes.map(key => {
        const note = byKey.get(key);
        const body = note?.body ?? '';
        return {
          key,
          title: extractTitle(body),
          tags: note?.tags ?? [],
          snippet: snippet(body),
          bodyLength: body.length,
        };
      }),
      links: edges,
    };
  }

  /**
   * Encode notes that have no embedding (and, with `reencode`, those encoded
   * by another provider/model). Returns the number of notes written.
   */
  async backfill(options: BackfillOptions = {}): Promise<number> {
    const batchSize = Math.max(1, options.batchSize ?? DEFAULT_BACKFILL_BATCH);
    const keys = [...this.embeddings.findMissing()];
    if (options.reencode) {
      for (const key of this.embeddings.findMismatched(this.encoderInfo())) {
        if (!keys.includes(key)) keys.push(key);
      }
    }

    const encoder = this.encoderInfo();
    let done = 0;
    for (let i = 0; i < keys.length; i += batchSize) {
      const notes = this.notes.getMany(keys.slice(i, i + batchSize));
      const vectors = await this.encode(notes.map(n => n.body));

      withTransaction(() => {
        notes.forEach((note, index) => this.embeddings.upsert(note.key, vectors[index], encoder));
      });

      for (const note of notes) {
        done++;
        options.onProgress?.(done, keys.length, note.key);
      }
    }
    return done;
  }

  /** Counts for embed-status. `encoder` defaults to the injected one, if any. */
  status(encoder: EncoderInfo | undefined = this.encoder ? this.encoderInfo() : undefined): EmbeddingStatus {
    return {
      totalNotes: this.notes.count(),
      withEmbeddings: this.embeddings.count(),
      missing: this.embeddings.findMissing().length,
      mismatched: encoder ? this.embeddings.findMismatched(encoder).length : 0,
      active: this.embeddings.activeProviderInfo(),
    };
  }

  private async vectorFor(target: SuggestTarget): Promise<Float32Array> {
    if ('text' in target) {
      const [vector] = await this.encode([target.text]);
      return vector;
    }

    const stored = this.embeddings.get(target.key);
    if (stored) return stored;

    const note = this.notes.get(target.key);
    if (!note) {
      throw new NotFoundError('Note', target.key);
    }
    const [vector] = await this.encode([note.body]);
    return vector;
  }

  /**
   * Stored vectors of one width. After a model switch the store can hold two
   * widths until every note is re-encoded; only same-width vectors compare.
   */
  private vectorsOfWidth(width: number | undefined): KeyedVector[] {
    const vectors = this.embeddings.listVectors();
    const target = width ?? this.embeddings.activeProviderInfo()?.dimensions ?? dominantWidth(vectors);
    return vectors.filter(([, vector]) => vector.length === target);
  }

  private requireEncoder(): EmbeddingProvider {
    if (!this.encoder) {
      throw new ConfigError('No embedding provider configured');
    }
    return this.encoder;
  }

  private encoderInfo(): EncoderInfo {
    const encoder = this.requireEncoder();
    return { provider: encoder.name, model: encoder.model };
  }

  /** Encode texts, one vector per text; anything else is an encoding failure. */
  private async encode(texts: string[]): Promise<Float32Array[]> {
    const encoder = this.requireEncoder();

    let vectors: Float32Array[];
    try {
      vectors = await encoder.embed(texts);
    } catch (err) {
      if (err instanceof VecnoteError) throw err;
      throw new EncodingFailedError(`${encoder.name} encoder failed: ${err instanceof Error ? err.message : String(err)}`);
    }

    if (vectors.length !== texts.length) {
      throw new EncodingFailedError(`${encoder.name} returned ${vectors.length} embeddings for ${texts.length} texts`);
    }
    return vectors;
  }
}

function dominantWidth(vectors: readonly KeyedVector[]): number | undefined {
  const counts = new Map<number, number>();
  let best: number | undefined;
  let bestCount = 0;
  for (const [, vector] of vectors) {
    const count = (counts.get(vector.length) ?? 0) + 1;
    counts.set(vector.length, count);
    if (count > bestCount) {
      best = vector.length;
      bestCount = count;
    }
  }
  return best;
}
