import fs from 'node:fs';
import path from 'node:path';
import { getDatabase } from './schema.js';
import { VecnoteError } from '../errors.js';
import { parseTags } from '../tags.js';
import type { StoredFile, StoredFileWithContent } from '../types.js';

interface FileRow {
  name: string;
  mime_type: string;
  tags: string;
  size_bytes: number;
  created_at: string;
}

function rowToFile(row: FileRow): StoredFile {
  return {
    name: row.name,
    mimeType: row.mime_type,
    tags: parseTags(row.tags),
    sizeBytes: row.size_bytes,
    createdAt: row.created_at,
  };
}

/**
 * Files live on disk under `filesDir/<name>`; mime type, tags and size are
 * kept in the `files` table. Names may contain `/` to form subdirectories.
 */
export class FileStore {
  constructor(private readonly filesDir: string) {}

  store(name: string, content: Buffer, mimeType: string, tags: string[] = []): StoredFile {
    const dest = this.resolve(name);
    fs.mkdirSync(path.dirname(dest), { recursive: true });
    fs.writeFileSync(dest, content);

    const db = getDatabase();
    db.prepare(`
      INSERT INTO files (name, mime_type, tags, size_bytes)
      VALUES (?, ?, ?, ?)
      ON CONFLICT(name) DO UPDATE SET
        mime_type = excluded.mime_type,
        tags = excluded.tags,
        size_bytes = excluded.size_bytes
    `).run(name, mimeType, JSON.stringify(tags), content.length);

    const stored = this.getMetadata(name);
    if (!stored) {
      throw new Error(`File metadata vanished after write: ${name}`);
    }
    return stored;
  }

  getMetadata(name: string): StoredFile | null {
    const db = getDatabase();
    const row = db.prepare(
      'SELECT name, mime_type, tags, size_bytes, created_at FROM files WHERE name = ?'
    ).get(name) as FileRow | undefined;
    return row ? rowToFile(row) : null;
  }

  /** Content plus metadata, or null when the file is not on disk. */
  get(name: string): StoredFileWithContent | null {
    const filePath = this.resolve(name);
    if (!fs.existsSync(filePath)) return null;

    const content = fs.readFileSync(filePath);
    const meta = this.getMetadata(name) ?? {
      name,
      mimeType: 'application/octet-stream',
      tags: [],
      sizeBytes: content.length,
      createdAt: '',
    };
    return { ...meta, content };
  }

  list(options: { tag?: string } = {}): StoredFile[] {
    const db = getDatabase();
    const rows = db.prepare(
      'SELECT name, mime_type, tags, size_bytes, created_at FROM files ORDER BY name'
    ).all() as FileRow[];

    const files = rows.map(rowToFile);
    const { tag } = options;
    return tag ? files.filter(f => f.tags.includes(tag)) : files;
  }

  /** Remove from disk and from the table. Returns false if neither had it. */
  delete(name: string): boolean {
    const filePath = this.resolve(name);
    let removedFromDisk = false;
    if (fs.existsSync(filePath)) {
      fs.unlinkSync(filePath);
      removedFromDisk = true;
    }

    const db = getDatabase();
    const deleted = db.prepare('DELETE FROM files WHERE name = ?').run(name).changes > 0;
    return deleted || removedFromDisk;
  }

  private resolve(name: string): string {
    const root = path.resolve(this.filesDir);
    const target = path.resolve(root, name);
    if (!name || target === root || !target.startsWith(root + path.sep)) {
      throw new VecnoteError(`Invalid file name: ${name}`, 'INVALID_FILE_NAME');
    }
    return target;
  }
}
