import { describe, it, expect } from 'vitest';
import os from 'node:os';
import path from 'node:path';
import { loadConfig } from '../src/config.js';
import { ConfigError } from '../src/errors.js';

describe('loadConfig', () => {
  it('uses defaults when nothing is set', () => {
    const config = loadConfig({});
    const dataDir = path.join(os.homedir(), '.config', 'vecnote');
    expect(config.dataDir).toBe(dataDir);
    expect(config.dbPath).toBe(path.join(dataDir, 'notes.db'));
    expect(config.filesDir).toBe(path.join(dataDir, 'files'));
    expect(config.pluginsDir).toBeUndefined();
    expect(config.autoTag.threshold).toBe(0.45);
    expect(config.autoTag.maxTags).toBe(5);
    expect([...config.autoTag.skipTags].sort()).toEqual(['context', 'conversation']);
    expect(config.graphNeighbors).toBe(3);
    expect(config.searchLimit).toBe(10);
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      VECNOTE_DATA_DIR: '/srv/notes',
      VECNOTE_PLUGINS_DIR: '/srv/plugins',
      VECNOTE_AUTO_TAG_THRESHOLD: '0.6',
      VECNOTE_AUTO_TAG_MAX: '2',
      VECNOTE_AUTO_TAG_SKIP: 'misc, inbox',
      VECNOTE_GRAPH_NEIGHBORS: '5',
      VECNOTE_SEARCH_LIMIT: '20',
    });
    expect(config.dbPath).toBe(path.join('/srv/notes', 'notes.db'));
    expect(config.pluginsDir).toBe('/srv/plugins');
    expect(config.autoTag.threshold).toBe(0.6);
    expect(config.autoTag.maxTags).toBe(2);
    expect([...config.autoTag.skipTags]).toEqual(['misc', 'inbox']);
    expect(config.graphNeighbors).toBe(5);
    expect(config.searchLimit).toBe(20);
  });

  it('treats blank variables as unset', () => {
    expect(loadConfig({ VECNOTE_AUTO_TAG_MAX: '  ' }).autoTag.maxTags).toBe(5);
  });

  it('rejects invalid numbers, naming the variable', () => {
    expect(() => loadConfig({ VECNOTE_AUTO_TAG_THRESHOLD: 'high' })).toThrow(ConfigError);
    expect(() => loadConfig({ VECNOTE_AUTO_TAG_THRESHOLD: 'high' })).toThrow('Invalid VECNOTE_AUTO_TAG_THRESHOLD');
    expect(() => loadConfig({ VECNOTE_GRAPH_NEIGHBORS: '2.5' })).toThrow('Invalid VECNOTE_GRAPH_NEIGHBORS');
    expect(() => loadConfig({ VECNOTE_SEARCH_LIMIT: '0' })).toThrow('Invalid VECNOTE_SEARCH_LIMIT');
  });
});
