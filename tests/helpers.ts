import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import type { EmbeddingProvider } from '../src/engine/embeddings/provider.js';

export function tmpDbPath(label = 'test'): string {
  return path.join(os.tmpdir(), `vecnote-${label}-${Date.now()}-${Math.random().toString(36).slice(2)}.db`);
}

export function removeDb(dbPath: string): void {
  for (const suffix of ['', '-wal', '-shm']) {
    fs.rmSync(dbPath + suffix, { force: true });
  }
}

/**
 * Deterministic encoder for tests. Texts listed in `fixed` get those vectors
 * (normalized); anything else gets a vector derived from its character codes.
 */
export class FakeEncoder implements EmbeddingProvider {
  readonly name = 'fake';
  readonly model: string;
  readonly dimensions: number;
  readonly calls: string[][] = [];
  failWith: Error | null = null;

  constructor(
    private readonly fixed: Record<string, number[]> = {},
    dimensions = 3,
    model = 'fake-v1',
  ) {
    this.dimensions = dimensions;
    this.model = model;
  }

  async embed(texts: string[]): Promise<Float32Array[]> {
    this.calls.push([...texts]);
    if (this.failWith) throw this.failWith;
    return texts.map(t => unit(this.fixed[t] ?? this.derive(t)));
  }

  private derive(text: string): number[] {
    const v = new Array<number>(this.dimensions).fill(0);
    for (let i = 0; i < text.length; i++) {
      v[i % this.dimensions] += text.charCodeAt(i);
    }
    return v;
  }
}

export function unit(values: number[]): Float32Array {
  const norm = Math.sqrt(values.reduce((s, v) => s + v * v, 0));
  return new Float32Array(values.map(v => (norm === 0 ? v : v / norm)));
}
