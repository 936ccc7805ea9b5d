/** A note key paired with its embedding. */
export type KeyedVector = [key: string, vector: Float32Array];

export interface RankedResult {
  key: string;
  score: number;
}

export interface Note {
  key: string;
  body: string;
  tags: string[];
  createdAt: string;
  updatedAt: string;
}

export interface NoteSummary {
  key: string;
  tags: string[];
  createdAt: string;
  updatedAt: string;
}

export interface StoreNoteInput {
  key: string;
  body: string;
  tags?: string | string[];
  autoTag?: boolean;
}

export interface StoreNoteResult {
  note: Note;
  /** Tags added by centroid suggestion (empty unless autoTag was set). */
  suggestedTags: string[];
}

export interface SearchHit {
  note: Note;
  /** Similarity for semantic search; undefined for keyword matches. */
  score?: number;
}

export interface SimilarityEdge {
  source: string;
  target: string;
  similarity: number;
}

export interface NeighborGraph {
  nodes: string[];
  edges: SimilarityEdge[];
}

export interface GraphNode {
  key: string;
  title: string;
  tags: string[];
  snippet: string;
  bodyLength: number;
}

export interface NoteGraph {
  nodes: GraphNode[];
  links: SimilarityEdge[];
}

export interface StoredFile {
  name: string;
  mimeType: string;
  tags: string[];
  sizeBytes: number;
  createdAt: string;
}

export interface StoredFileWithContent extends StoredFile {
  content: Buffer;
}

export interface SuggestOptions {
  threshold?: number;  // minimum centroid similarity (default 0.45)
  maxTags?: number;    // max tags returned (default 5)
}
