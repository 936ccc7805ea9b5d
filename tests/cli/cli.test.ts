import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { run, type CliDeps } from '../../src/cli.js';
import { ConfigError } from '../../src/errors.js';
import { FakeEncoder } from '../helpers.js';

const VECTORS: Record<string, number[]> = {
  'rust borrow': [1, 0, 0],
  'pasta recipe': [0, 1, 0],
  'cargo build': [0.95, 0.05, 0],
  'query rust': [1, 0, 0],
};

describe('CLI', () => {
  let dataDir: string;
  let deps: CliDeps;
  let logSpy: MockInstance<typeof console.log>;
  let errorSpy: MockInstance<typeof console.error>;

  beforeEach(() => {
    dataDir = fs.mkdtempSync(path.join(os.tmpdir(), 'vecnote-cli-'));
    const encoder = new FakeEncoder(VECTORS);
    deps = { env: { VECNOTE_DATA_DIR: dataDir }, encoder: () => encoder };
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
    fs.rmSync(dataDir, { recursive: true, force: true });
  });

  function output(): string[] {
    return logSpy.mock.calls.map(call => String(call[0]));
  }

  async function cli(...argv: string[]): Promise<string[]> {
    logSpy.mockClear();
    await run(argv, deps);
    return output();
  }

  it('ping', async () => {
    expect(await cli('ping')).toEqual(['pong']);
  });

  it('init creates the database', async () => {
    const dbPath = path.join(dataDir, 'notes.db');
    expect(await cli('init')).toEqual([`✓ Database initialized at ${dbPath}`]);
    expect(fs.existsSync(dbPath)).toBe(true);
    expect(fs.existsSync(path.join(dataDir, 'files'))).toBe(true);
  });

  it('stores, lists and shows notes', async () => {
    expect(await cli('store', 'a', '--body', 'rust borrow', '--tags', 'rust, lang'))
      .toEqual(["✓ Stored note 'a'.", '  tags: rust, lang']);
    await cli('store', 'b', '--body', 'pasta recipe');

    expect(await cli('list')).toEqual(['  a [rust, lang]', '  b', '\n2 note(s)']);
    expect(await cli('list', '--tag', 'rust')).toEqual(['  a [rust, lang]', '\n1 note(s)']);

    const [json] = await cli('get', 'a', '--format', 'json');
    expect(JSON.parse(json)).toMatchObject({ key: 'a', body: 'rust borrow', tags: ['rust', 'lang'] });
  });

  it('reports auto-tagged tags', async () => {
    await cli('store', 'a', '--body', 'rust borrow', '--tags', 'rust');
    await cli('store', 'b', '--body', 'pasta recipe', '--tags', 'cooking');

    expect(await cli('store', 'c', '--body', 'cargo build', '--auto-tag'))
      .toEqual(["✓ Stored note 'c'.", '  tags: rust', '  auto-tagged: rust']);
  });

  it('searches by meaning and by keyword', async () => {
    await cli('store', 'a', '--body', 'rust borrow');
    await cli('store', 'b', '--body', 'pasta recipe');

    expect(await cli('search', 'query rust', '--limit', '1')).toEqual(['  [100%] a — rust borrow']);
    expect(await cli('search', 'PASTA', '--keyword')).toEqual(['  b — pasta recipe']);
    expect(await cli('search', 'nothing here', '--keyword')).toEqual(['No matching notes.']);
  });

  it('suggests tags for text', async () => {
    await cli('store', 'a', '--body', 'rust borrow', '--tags', 'rust');
    expect(await cli('suggest-tags', '--text', 'cargo build')).toEqual(['rust']);
    expect(await cli('suggest-tags', '--text', 'pasta recipe')).toEqual(['No tag suggestions.']);
  });

  it('prints the similarity graph as JSON', async () => {
    await cli('store', 'a', '--body', 'rust borrow');
    await cli('store', 'c', '--body', 'cargo build');

    const graph = JSON.parse((await cli('graph', '--neighbors', '1')).join('\n')) as {
      nodes: Array<{ key: string }>;
      links: Array<{ source: string; target: string }>;
    };
    expect(graph.nodes.map(n => n.key)).toEqual(['a', 'c']);
    expect(graph.links.map(l => [l.source, l.target])).toEqual([['a', 'c']]);
  });

  it('shows embedding status', async () => {
    await cli('store', 'a', '--body', 'rust borrow');
    expect(await cli('embed-status')).toEqual([
      'Total notes: 1',
      'With embeddings: 1',
      'Missing embeddings: 0',
      'Other provider/model: 0',
      'Active: fake/fake-v1 (3 dims)',
    ]);
    expect(await cli('embed')).toEqual(['All notes already have embeddings. Nothing to do.']);
  });

  it('deletes notes and reports unknown keys', async () => {
    await cli('store', 'a', '--body', 'rust borrow');
    expect(await cli('delete', 'a')).toEqual(["✓ Deleted note 'a'."]);

    await cli('delete', 'a');
    expect(errorSpy).toHaveBeenCalledWith('Error: Note not found: a');
    expect(process.exitCode).toBe(1);
  });

  it('requires exactly one of --key or --text', async () => {
    await cli('suggest-tags');
    expect(errorSpy).toHaveBeenCalledWith('Error: Pass exactly one of --key or --text');
    expect(process.exitCode).toBe(1);
  });

  it('runs read-only commands without an encoder', async () => {
    await cli('store', 'a', '--body', 'rust borrow');
    deps = {
      env: deps.env,
      encoder: () => { throw new ConfigError('Missing API key for voyage: set VOYAGE_API_KEY environment variable'); },
    };

    expect(await cli('list')).toEqual(['  a', '\n1 note(s)']);
    expect(await cli('search', 'rust', '--keyword')).toEqual(['  a — rust borrow']);

    await cli('store', 'b', '--body', 'pasta recipe');
    expect(errorSpy).toHaveBeenCalledWith('Error: Missing API key for voyage: set VOYAGE_API_KEY environment variable');
  });

  it('stores and lists files', async () => {
    const source = path.join(dataDir, 'source.txt');
    fs.writeFileSync(source, 'hello');

    expect(await cli('file', 'store', 'docs/hello.txt', source, '--mime', 'text/plain', '--tags', 'docs'))
      .toEqual(["✓ Stored 'docs/hello.txt' (5 bytes, text/plain)."]);
    expect(await cli('file', 'list')).toEqual(['  docs/hello.txt  text/plain, 5 bytes', '\n1 file(s)']);
    expect(await cli('file', 'delete', 'docs/hello.txt')).toEqual(["✓ Deleted 'docs/hello.txt'."]);
  });
});
