import os from 'node:os';
import path from 'node:path';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import { normalizeTags } from './tags.js';
import {
  DEFAULT_SKIP_TAGS,
  DEFAULT_SUGGEST_MAX,
  DEFAULT_SUGGEST_THRESHOLD,
} from './engine/centroids.js';
import { DEFAULT_GRAPH_NEIGHBORS } from './engine/graph.js';

export const DEFAULT_DATA_DIR = path.join(os.homedir(), '.config', 'vecnote');

/** Semantic search result count */
export const DEFAULT_SEARCH_LIMIT = 10;

export interface AutoTagConfig {
  threshold: number;
  maxTags: number;
  skipTags: ReadonlySet<string>;
}

export interface VecnoteConfig {
  dataDir: string;
  dbPath: string;
  filesDir: string;
  pluginsDir?: string;
  autoTag: AutoTagConfig;
  graphNeighbors: number;
  searchLimit: number;
}

const nonEmpty = (value: string | undefined) => (value === undefined || value.trim() === '' ? undefined : value);

const envSchema = z.object({
  VECNOTE_DATA_DIR: z.string().optional(),
  VECNOTE_PLUGINS_DIR: z.string().optional(),
  VECNOTE_AUTO_TAG_THRESHOLD: z.coerce.number().min(-1).max(1).optional(),
  VECNOTE_AUTO_TAG_MAX: z.coerce.number().int().min(0).optional(),
  VECNOTE_AUTO_TAG_SKIP: z.string().optional(),
  VECNOTE_GRAPH_NEIGHBORS: z.coerce.number().int().min(0).optional(),
  VECNOTE_SEARCH_LIMIT: z.coerce.number().int().min(1).optional(),
});

/**
 * Read configuration from environment variables, falling back to defaults.
 * Blank variables count as unset.
 *
 * @throws ConfigError naming the first invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): VecnoteConfig {
  const raw = Object.fromEntries(
    Object.keys(envSchema.shape).map(name => [name, nonEmpty(env[name])]),
  );

  const parsed = envSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const name = issue?.path.join('.') ?? 'environment';
    throw new ConfigError(`Invalid ${name}: ${issue?.message ?? 'unreadable value'}`);
  }

  const vars = parsed.data;
  const dataDir = vars.VECNOTE_DATA_DIR ?? DEFAULT_DATA_DIR;

  return {
    dataDir,
    dbPath: path.join(dataDir, 'notes.db'),
    filesDir: path.join(dataDir, 'files'),
    pluginsDir: vars.VECNOTE_PLUGINS_DIR,
    autoTag: {
      threshold: vars.VECNOTE_AUTO_TAG_THRESHOLD ?? DEFAULT_SUGGEST_THRESHOLD,
      maxTags: vars.VECNOTE_AUTO_TAG_MAX ?? DEFAULT_SUGGEST_MAX,
      skipTags: vars.VECNOTE_AUTO_TAG_SKIP !== undefined
        ? new Set(normalizeTags(vars.VECNOTE_AUTO_TAG_SKIP))
        : DEFAULT_SKIP_TAGS,
    },
    graphNeighbors: vars.VECNOTE_GRAPH_NEIGHBORS ?? DEFAULT_GRAPH_NEIGHBORS,
    searchLimit: vars.VECNOTE_SEARCH_LIMIT ?? DEFAULT_SEARCH_LIMIT,
  };
}
