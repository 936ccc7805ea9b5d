import fs from 'node:fs';
import path from 'node:path';
import { Command, InvalidArgumentError } from 'commander';
import { loadConfig, type VecnoteConfig } from './config.js';
import { EmbeddingStore } from './db/embeddings.js';
import { FileStore } from './db/files.js';
import { NoteRepository } from './db/notes.js';
import { initDatabase, closeDatabase } from './db/schema.js';
import { importConversations, loadTopicRules, readExportFile, type ImportSummary } from './engine/chatgpt-import.js';
import { createProvider, loadEmbeddingConfig, type EmbeddingProvider } from './engine/embeddings/index.js';
import { KnowledgeBase } from './engine/knowledge.js';
import { extractTitle } from './engine/titles.js';
import { ConfigError, NotFoundError, VecnoteError } from './errors.js';
import { loadPlugins } from './plugins.js';
import { normalizeTags } from './tags.js';

export const VERSION = '0.1.0';

export interface CliDeps {
  env?: NodeJS.ProcessEnv;
  /** Build the encoder; defaults to the provider named by the environment */
  encoder?: (provider?: string, model?: string) => EmbeddingProvider;
}

interface GlobalOpts {
  db: string;
  filesDir: string;
  plugins?: string;
  provider?: string;
  model?: string;
}

type Format = 'json' | 'human';

interface Session {
  kb: KnowledgeBase;
  notes: NoteRepository;
  embeddings: EmbeddingStore;
  files: FileStore;
}

function parseInteger(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return n;
}

function parseSimilarity(value: string): number {
  const n = Number(value);
  if (value.trim() === '' || !Number.isFinite(n) || n < -1 || n > 1) {
    throw new InvalidArgumentError('Expected a number between -1 and 1.');
  }
  return n;
}

function parseFormat(value: string): Format {
  if (value !== 'json' && value !== 'human') {
    throw new InvalidArgumentError("Expected 'json' or 'human'.");
  }
  return value;
}

function ensureDir(dir: string): void {
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

export function createProgram(deps: CliDeps = {}): Command {
  const env = deps.env ?? process.env;
  const config: VecnoteConfig = loadConfig(env);
  const buildEncoder = deps.encoder ?? ((provider?: string, model?: string) => {
    const resolved = loadEmbeddingConfig(provider, model, env);
    return createProvider(resolved.provider, { model: resolved.model, apiKey: resolved.apiKey });
  });

  const program = new Command();

  program
    .name('vecnote')
    .description('Notes with semantic search, tag suggestion and a similarity graph.')
    .version(VERSION)
    .option('--db <path>', 'Database path', config.dbPath)
    .option('--files-dir <path>', 'Directory for stored files', config.filesDir)
    .option('--plugins <dir>', 'Directory of command plugins', config.pluginsDir)
    .option('--provider <name>', 'Embedding provider: voyage | openai')
    .option('--model <name>', 'Embedding model');

  const globals = (): GlobalOpts => program.opts<GlobalOpts>();

  /** Open the database and run `fn`; the connection is closed afterwards. */
  async function withSession<T>(fn: (s: Session) => T | Promise<T>, needsEncoder = false): Promise<T> {
    const opts = globals();
    const encoder = needsEncoder ? buildEncoder(opts.provider, opts.model) : optionalEncoder(opts);

    ensureDir(path.dirname(opts.db));
    initDatabase(opts.db);
    try {
      const notes = new NoteRepository();
      const embeddings = new EmbeddingStore();
      const kb = new KnowledgeBase(notes, embeddings, encoder, {
        threshold: config.autoTag.threshold,
        maxTags: config.autoTag.maxTags,
        skipTags: config.autoTag.skipTags,
        searchLimit: config.searchLimit,
        graphNeighbors: config.graphNeighbors,
      });
      return await fn({ kb, notes, embeddings, files: new FileStore(opts.filesDir) });
    } finally {
      closeDatabase();
    }
  }

  // Commands that only read can run without an API key.
  function optionalEncoder(opts: GlobalOpts): EmbeddingProvider | undefined {
    try {
      return buildEncoder(opts.provider, opts.model);
    } catch (err) {
      if (err instanceof ConfigError) return undefined;
      throw err;
    }
  }

  // === init ===
  program
    .command('init')
    .description('Initialize the database and files directory')
    .action(() => {
      const opts = globals();
      ensureDir(path.dirname(opts.db));
      ensureDir(opts.filesDir);
      initDatabase(opts.db);
      closeDatabase();
      console.log(`✓ Database initialized at ${opts.db}`);
    });

  // === ping ===
  program
    .command('ping')
    .description('Health check')
    .action(() => {
      console.log('pong');
    });

  // === store ===
  program
    .command('store <key>')
    .description('Save or overwrite a note (its embedding is stored alongside)')
    .option('--body <text>', 'Note text')
    .option('--stdin', 'Read the note text from stdin')
    .option('--tags <tags>', 'Comma-separated tags')
    .option('--auto-tag', 'Add tags suggested by similar notes')
    .option('--format <fmt>', 'Output format: json | human', parseFormat, 'human')
    .action(async (key: string, opts: { body?: string; stdin?: boolean; tags?: string; autoTag?: boolean; format: Format }) => {
      const body = opts.stdin ? fs.readFileSync(0, 'utf-8') : opts.body;
      if (body === undefined || body.trim() === '') {
        throw new VecnoteError('Note body is empty: pass --body <text> or --stdin', 'INVALID_INPUT');
      }

      await withSession(async ({ kb }) => {
        const result = await kb.storeNote({ key, body, tags: opts.tags, autoTag: !!opts.autoTag });

        if (opts.format === 'json') {
          printJson(result);
          return;
        }
        console.log(`✓ Stored note '${key}'.`);
        console.log(`  tags: ${result.note.tags.join(', ') || '(none)'}`);
        if (result.suggestedTags.length > 0) {
          console.log(`  auto-tagged: ${result.suggestedTags.join(', ')}`);
        }
      }, true);
    });

  // === get ===
  program
    .command('get <key>')
    .description('Show a note')
    .option('--format <fmt>', 'Output format: json | human', parseFormat, 'human')
    .action(async (key: string, opts: { format: Format }) => {
      await withSession(({ kb }) => {
        const note = kb.getNote(key);
        if (!note) throw new NotFoundError('Note', key);

        if (opts.format === 'json') {
          printJson(note);
          return;
        }
        console.log(`${note.key}  [${note.tags.join(', ') || 'no tags'}]`);
        console.log(`  created: ${note.createdAt} | updated: ${note.updatedAt}`);
        console.log('');
        console.log(note.body);
      });
    });

  // === list ===
  program
    .command('list')
    .description('List notes (no bodies)')
    .option('--tag <tag>', 'Only notes carrying this tag')
    .option('--format <fmt>', 'Output format: json | human', parseFormat, 'human')
    .action(async (opts: { tag?: string; format: Format }) => {
      await withSession(({ kb }) => {
        const notes = kb.listNotes({ tag: opts.tag });

        if (opts.format === 'json') {
          printJson(notes);
          return;
        }
        if (notes.length === 0) {
          console.log('No notes found.');
          return;
        }
        for (const n of notes) {
          const tags = n.tags.length > 0 ? ` [${n.tags.join(', ')}]` : '';
          console.log(`  ${n.key}${tags}`);
        }
        console.log(`\n${notes.length} note(s)`);
      });
    });

  // === delete ===
  program
    .command('delete <key>')
    .description('Delete a note and its embedding')
    .action(async (key: string) => {
      await withSession(({ kb }) => {
        kb.deleteNote(key);
        console.log(`✓ Deleted note '${key}'.`);
      });
    });

  // === search ===
  program
    .command('search <query>')
    .description('Find notes by meaning (default) or by keyword')
    .option('--keyword', 'Case-insensitive substring match instead of semantic search')
    .option('--limit <n>', 'Maximum semantic results', parseInteger)
    .option('--format <fmt>', 'Output format: json | human', parseFormat, 'human')
    .action(async (query: string, opts: { keyword?: boolean; limit?: number; format: Format }) => {
      await withSession(async ({ kb }) => {
        const hits = await kb.search(query, { keyword: !!opts.keyword, limit: opts.limit });

        if (opts.format === 'json') {
          printJson(hits.map(h => ({ ...h.note, score: h.score })));
          return;
        }
        if (hits.length === 0) {
          console.log('No matching notes.');
          return;
        }
        for (const { note, score } of hits) {
          const pct = score === undefined ? '' : `[${(score * 100).toFixed(0)}%] `;
          console.log(`  ${pct}${note.key} — ${extractTitle(note.body)}`);
        }
      }, !opts.keyword);
    });

  // === suggest-tags ===
  program
    .command('suggest-tags')
    .description('Suggest tags for a stored note or for text (nothing is written)')
    .option('--key <key>', 'Stored note to tag')
    .option('--text <text>', 'Free text to tag')
    .option('--threshold <number>', 'Minimum centroid similarity', parseSimilarity)
    .option('--max <n>', 'Maximum tags', parseInteger)
    .option('--format <fmt>', 'Output format: json | human', parseFormat, 'human')
    .action(async (opts: { key?: string; text?: string; threshold?: number; max?: number; format: Format }) => {
      const { key, text } = opts;
      if ((key === undefined) === (text === undefined)) {
        throw new VecnoteError('Pass exactly one of --key or --text', 'INVALID_INPUT');
      }

      await withSession(async ({ kb }) => {
        const target = key !== undefined ? { key } : { text: text ?? '' };
        const tags = await kb.suggestTagsFor(target, { threshold: opts.threshold, maxTags: opts.max });

        if (opts.format === 'json') {
          printJson(tags);
          return;
        }
        console.log(tags.length > 0 ? tags.join(', ') : 'No tag suggestions.');
      }, text !== undefined);
    });

  // === graph ===
  program
    .command('graph')
    .description('Similarity graph of all embedded notes')
    .option('--neighbors <k>', 'Links per note', parseInteger)
    .option('--format <fmt>', 'Output format: json | human', parseFormat, 'json')
    .action(async (opts: { neighbors?: number; format: Format }) => {
      await withSession(({ kb }) => {
        const graph = kb.graph(opts.neighbors);

        if (opts.format === 'json') {
          printJson(graph);
          return;
        }
        console.log(`${graph.nodes.length} node(s), ${graph.links.length} link(s)`);
        for (const link of graph.links) {
          console.log(`  ${link.source} — ${link.target} (${link.similarity.toFixed(3)})`);
        }
      });
    });

  // === embed ===
  program
    .command('embed')
    .description('Backfill embeddings for notes that have none')
    .option('--reencode', 'Also re-encode notes stored with another provider or model')
    .action(async (opts: { reencode?: boolean }) => {
      await withSession(async ({ kb }) => {
        const done = await kb.backfill({
          reencode: !!opts.reencode,
          onProgress: (i, total, key) => console.log(`  [${i}/${total}] ${key}`),
        });
        console.log(done === 0 ? 'All notes already have embeddings. Nothing to do.' : `✓ Encoded ${done} note(s).`);
      }, true);
    });

  // === embed-status ===
  program
    .command('embed-status')
    .description('Show embedding coverage')
    .option('--format <fmt>', 'Output format: json | human', parseFormat, 'human')
    .action(async (opts: { format: Format }) => {
      await withSession(({ kb }) => {
        const status = kb.status();

        if (opts.format === 'json') {
          printJson(status);
          return;
        }
        console.log(`Total notes: ${status.totalNotes}`);
        console.log(`With embeddings: ${status.withEmbeddings}`);
        console.log(`Missing embeddings: ${status.missing}`);
        console.log(`Other provider/model: ${status.mismatched}`);
        if (status.active) {
          console.log(`Active: ${status.active.provider}/${status.active.model} (${status.active.dimensions} dims)`);
        }
      });
    });

  // === import-chatgpt ===
  program
    .command('import-chatgpt <files...>')
    .description('Import ChatGPT export files (conversations-*.json) as notes')
    .option('--dry-run', "Parse and classify only; don't write")
    .option('--min-chars <n>', 'Skip conversations with less text', parseInteger, 300)
    .option('--topics <file>', 'Topic keyword rules (JSON)')
    .action(async (files: string[], opts: { dryRun?: boolean; minChars: number; topics?: string }) => {
      const topics = loadTopicRules(opts.topics);
      console.log(`Processing ${files.length} file(s)`);
      if (opts.dryRun) console.log('DRY RUN — nothing will be written');

      await withSession(async ({ kb }) => {
        const totals: ImportSummary = { total: 0, stored: 0, skippedShort: 0, skippedExisting: 0 };
        for (const file of files) {
          console.log(`\n── ${path.basename(file)} ──`);
          const summary = await importConversations(kb, readExportFile(file), {
            dryRun: !!opts.dryRun,
            minChars: opts.minChars,
            topics,
            log: line => console.log(line),
          });
          totals.total += summary.total;
          totals.stored += summary.stored;
          totals.skippedShort += summary.skippedShort;
          totals.skippedExisting += summary.skippedExisting;
        }

        console.log('');
        console.log(`Total conversations : ${totals.total}`);
        console.log(`Stored              : ${totals.stored}`);
        console.log(`Skipped (too short) : ${totals.skippedShort}`);
        console.log(`Skipped (duplicate) : ${totals.skippedExisting}`);
      }, !opts.dryRun);
    });

  // === file ===
  const file = program
    .command('file')
    .description('Store and retrieve files');

  file
    .command('store <name> <source>')
    .description('Copy a local file into the store under <name>')
    .option('--mime <type>', 'MIME type', 'application/octet-stream')
    .option('--tags <tags>', 'Comma-separated tags')
    .action(async (name: string, source: string, opts: { mime: string; tags?: string }) => {
      const content = fs.readFileSync(source);
      await withSession(({ files }) => {
        const stored = files.store(name, content, opts.mime, normalizeTags(opts.tags));
        console.log(`✓ Stored '${stored.name}' (${stored.sizeBytes.toLocaleString('en-US')} bytes, ${stored.mimeType}).`);
      });
    });

  file
    .command('get <name>')
    .description('Show a stored file, or write it out with --out')
    .option('--out <path>', 'Write the content to this path')
    .option('--format <fmt>', 'Output format: json | human', parseFormat, 'human')
    .action(async (name: string, opts: { out?: string; format: Format }) => {
      await withSession(({ files }) => {
        const stored = files.get(name);
        if (!stored) throw new NotFoundError('File', name);

        const { content, ...meta } = stored;
        if (opts.out) {
          fs.writeFileSync(opts.out, content);
          console.log(`✓ Wrote '${name}' to ${opts.out}`);
          return;
        }
        if (opts.format === 'json') {
          printJson({ ...meta, contentBase64: content.toString('base64') });
          return;
        }
        console.log(`${meta.name}  ${meta.mimeType}, ${meta.sizeBytes} bytes`);
        console.log(`  tags: ${meta.tags.join(', ') || '(none)'} | created: ${meta.createdAt}`);
      });
    });

  file
    .command('list')
    .description('List stored files')
    .option('--tag <tag>', 'Only files carrying this tag')
    .option('--format <fmt>', 'Output format: json | human', parseFormat, 'human')
    .action(async (opts: { tag?: string; format: Format }) => {
      await withSession(({ files }) => {
        const list = files.list({ tag: opts.tag });

        if (opts.format === 'json') {
          printJson(list);
          return;
        }
        if (list.length === 0) {
          console.log('No files stored.');
          return;
        }
        for (const f of list) {
          console.log(`  ${f.name}  ${f.mimeType}, ${f.sizeBytes} bytes`);
        }
        console.log(`\n${list.length} file(s)`);
      });
    });

  file
    .command('delete <name>')
    .description('Delete a stored file')
    .action(async (name: string) => {
      await withSession(({ files }) => {
        if (!files.delete(name)) throw new NotFoundError('File', name);
        console.log(`✓ Deleted '${name}'.`);
      });
    });

  return program;
}

/**
 * Build the program, load plugins, and run it. VecnoteErrors are printed
 * to stderr and set exit code 1; anything else propagates.
 */
export async function run(argv: string[], deps: CliDeps = {}): Promise<void> {
  try {
    const program = createProgram(deps);

    // Plugins must register before parsing, so read --plugins ahead of time.
    const pluginsDir = pluginsDirFrom(argv) ?? program.opts<GlobalOpts>().plugins;
    if (pluginsDir) {
      await loadPlugins(pluginsDir, program);
    }

    await program.parseAsync(argv, { from: 'user' });
  } catch (err) {
    if (err instanceof VecnoteError) {
      console.error(`Error: ${err.message}`);
      process.exitCode = 1;
      return;
    }
    throw err;
  }
}

function pluginsDirFrom(argv: readonly string[]): string | undefined {
  for (let i = 0; i < argv.length; i++) {
    if (argv[i] === '--plugins') return argv[i + 1];
    if (argv[i].startsWith('--plugins=')) return argv[i].slice('--plugins='.length);
  }
  return undefined;
}
