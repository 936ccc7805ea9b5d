import { getDatabase } from './schema.js';
import { parseTags } from '../tags.js';
import type { TagMembershipReader } from '../engine/repository.js';
import type { Note, NoteSummary } from '../types.js';

interface NoteRow {
  key: string;
  body: string;
  tags: string;
  created_at: string;
  updated_at: string;
}

function rowToNote(row: NoteRow): Note {
  return {
    key: row.key,
    body: row.body,
    tags: parseTags(row.tags),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export interface NoteWrite {
  key: string;
  body: string;
  tags: string[];
  /** Override both timestamps, e.g. when importing dated history */
  timestamp?: string;
}

export interface ListOptions {
  tag?: string;
}

function escapeLike(text: string): string {
  return text.replace(/[\\%_]/g, ch => `\\${ch}`);
}

export class NoteRepository implements TagMembershipReader {
  /** Insert or overwrite a note. Creation time survives an overwrite unless `timestamp` is given. */
  store(input: NoteWrite): Note {
    const db = getDatabase();
    const tags = JSON.stringify(input.tags);

    if (input.timestamp) {
      db.prepare(`
        INSERT INTO notes (key, body, tags, created_at, updated_at)
        VALUES (?, ?, ?, ?, ?)
        ON CONFLICT(key) DO UPDATE SET
          body = excluded.body,
          tags = excluded.tags,
          created_at = excluded.created_at,
          updated_at = excluded.updated_at
      `).run(input.key, input.body, tags, input.timestamp, input.timestamp);
    } else {
      db.prepare(`
        INSERT INTO notes (key, body, tags)
        VALUES (?, ?, ?)
        ON CONFLICT(key) DO UPDATE SET
          body = excluded.body,
          tags = excluded.tags,
          updated_at = datetime('now')
      `).run(input.key, input.body, tags);
    }

    const note = this.get(input.key);
    if (!note) {
      throw new Error(`Note vanished after write: ${input.key}`);
    }
    return note;
  }

  get(key: string): Note | null {
    const db = getDatabase();
    const row = db.prepare(
      'SELECT key, body, tags, created_at, updated_at FROM notes WHERE key = ?'
    ).get(key) as NoteRow | undefined;
    return row ? rowToNote(row) : null;
  }

  /** Fetch several notes, returned in the order of `keys`; unknown keys are dropped. */
  getMany(keys: readonly string[]): Note[] {
    if (keys.length === 0) return [];

    const db = getDatabase();
    const placeholders = keys.map(() => '?').join(', ');
    const rows = db.prepare(
      `SELECT key, body, tags, created_at, updated_at FROM notes WHERE key IN (${placeholders})`
    ).all(...keys) as NoteRow[];

    const byKey = new Map(rows.map(r => [r.key, rowToNote(r)]));
    const notes: Note[] = [];
    for (const key of keys) {
      const note = byKey.get(key);
      if (note) notes.push(note);
    }
    return notes;
  }

  list(options: ListOptions = {}): NoteSummary[] {
    const db = getDatabase();
    const rows = options.tag
      ? db.prepare(`
          SELECT key, tags, created_at, updated_at FROM notes
          WHERE EXISTS (SELECT 1 FROM json_each(notes.tags) WHERE json_each.value = ?)
          ORDER BY key
        `).all(options.tag) as Omit<NoteRow, 'body'>[]
      : db.prepare(
          'SELECT key, tags, created_at, updated_at FROM notes ORDER BY key'
        ).all() as Omit<NoteRow, 'body'>[];

    return rows.map(row => ({
      key: row.key,
      tags: parseTags(row.tags),
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    }));
  }

  /** Case-insensitive substring match over key, body and tags, most recently updated first. */
  keywordSearch(query: string): Note[] {
    const db = getDatabase();
    const pattern = `%${escapeLike(query)}%`;
    const rows = db.prepare(`
      SELECT key, body, tags, created_at, updated_at FROM notes
      WHERE key LIKE ? ESCAPE '\\'
         OR body LIKE ? ESCAPE '\\'
         OR tags LIKE ? ESCAPE '\\'
      ORDER BY updated_at DESC, key
    `).all(pattern, pattern, pattern) as NoteRow[];

    return rows.map(rowToNote);
  }

  /** Delete a note; its embedding goes with it. Returns false if the key was unknown. */
  delete(key: string): boolean {
    const db = getDatabase();
    const remove = db.transaction((k: string) => {
      db.prepare('DELETE FROM note_embeddings WHERE key = ?').run(k);
      db.prepare('DELETE FROM embedding_metadata WHERE key = ?').run(k);
      return db.prepare('DELETE FROM notes WHERE key = ?').run(k).changes > 0;
    });
    return remove(key);
  }

  tagMembership(): Map<string, Set<string>> {
    const db = getDatabase();
    const rows = db.prepare('SELECT key, tags FROM notes ORDER BY key').all() as { key: string; tags: string }[];

    const membership = new Map<string, Set<string>>();
    for (const row of rows) {
      for (const tag of parseTags(row.tags)) {
        let keys = membership.get(tag);
        if (!keys) {
          keys = new Set();
          membership.set(tag, keys);
        }
        keys.add(row.key);
      }
    }
    return membership;
  }

  /** Set both timestamps of an existing note. Returns false if the key is unknown. */
  setTimestamps(key: string, timestamp: string): boolean {
    const db = getDatabase();
    return db.prepare(
      'UPDATE notes SET created_at = ?, updated_at = ? WHERE key = ?'
    ).run(timestamp, timestamp, key).changes > 0;
  }

  count(): number {
    const db = getDatabase();
    return (db.prepare('SELECT COUNT(*) as count FROM notes').get() as { count: number }).count;
  }
}
