/**
 * Command plugins: every `.js` / `.mjs` module in a directory that exports
 * `register(program)` gets to add commands before the CLI parses arguments.
 * Files starting with `_` are ignored.
 */

import fs from 'node:fs';
import path from 'node:path';
import { pathToFileURL } from 'node:url';
import type { Command } from 'commander';

export interface CommandPlugin {
  register(program: Command): void | Promise<void>;
}

export interface PluginLoadResult {
  loaded: string[];
  skipped: string[];
  failed: Array<{ file: string; error: string }>;
}

const PLUGIN_EXTENSIONS = new Set(['.js', '.mjs']);

function isCommandPlugin(mod: unknown): mod is CommandPlugin {
  return typeof mod === 'object'
    && mod !== null
    && 'register' in mod
    && typeof mod.register === 'function';
}

export async function loadPlugins(
  dir: string,
  program: Command,
  log: (line: string) => void = line => console.error(line),
): Promise<PluginLoadResult> {
  const result: PluginLoadResult = { loaded: [], skipped: [], failed: [] };
  if (!fs.existsSync(dir)) return result;

  const files = fs.readdirSync(dir)
    .filter(f => PLUGIN_EXTENSIONS.has(path.extname(f)) && !f.startsWith('_'))
    .sort();

  for (const file of files) {
    try {
      const mod: unknown = await import(pathToFileURL(path.join(dir, file)).href);
      if (isCommandPlugin(mod)) {
        await mod.register(program);
        result.loaded.push(file);
        log(`[plugins] Loaded: ${file}`);
      } else {
        result.skipped.push(file);
        log(`[plugins] Skipped ${file}: no register(program) export`);
      }
    } catch (err) {
      const error = err instanceof Error ? err.message : String(err);
      result.failed.push({ file, error });
      log(`[plugins] Failed to load ${file}: ${error}`);
    }
  }

  return result;
}
