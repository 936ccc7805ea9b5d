/**
 * Import a ChatGPT data export (conversations-*.json) as notes.
 *
 * Each conversation becomes one markdown note keyed
 * `chatgpt/<date>-<slug>`, tagged by a keyword topic classifier plus
 * `chatgpt` plus centroid suggestions.
 */

import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { VecnoteError } from '../errors.js';
import type { KnowledgeBase } from './knowledge.js';
import { charLength, truncate } from './titles.js';

export const DEFAULT_MIN_CHARS = 300;

/** Assistant replies are cut to this many characters in the note body */
export const ASSISTANT_REPLY_LIMIT = 1200;

const SLUG_MAX = 80;

export const DEFAULT_TOPICS_PATH = fileURLToPath(new URL('../../data/topics.json', import.meta.url));

const nodeSchema = z.object({
  message: z.object({
    author: z.object({ role: z.string().optional() }).optional(),
    content: z.unknown().optional(),
  }).nullable().optional(),
  parent: z.string().nullable().optional(),
  children: z.array(z.string()).optional(),
});

const conversationSchema = z.object({
  title: z.string().nullable().optional(),
  create_time: z.number().nullable().optional(),
  update_time: z.number().nullable().optional(),
  mapping: z.record(nodeSchema).optional(),
});

const exportSchema = z.array(conversationSchema);

const partsSchema = z.object({ parts: z.array(z.unknown()) });

const topicRulesSchema = z.array(z.object({
  tag: z.string().min(1),
  keywords: z.array(z.string().min(1)),
}));

export type Conversation = z.infer<typeof conversationSchema>;
export type TopicRule = z.infer<typeof topicRulesSchema>[number];

export interface ChatMessage {
  role: 'user' | 'assistant';
  text: string;
}

export interface ExtractedConversation {
  title: string;
  date: string;  // YYYY-MM-DD (UTC) or 'unknown'
  messages: ChatMessage[];
}

export interface ImportOptions {
  minChars?: number;
  dryRun?: boolean;
  topics?: readonly TopicRule[];
  log?: (line: string) => void;
}

export interface ImportSummary {
  total: number;
  stored: number;
  skippedShort: number;
  skippedExisting: number;
}

/** Read and validate an export file. */
export function readExportFile(filePath: string): Conversation[] {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw new VecnoteError(
      `Cannot read ChatGPT export ${filePath}: ${err instanceof Error ? err.message : String(err)}`,
      'INVALID_IMPORT',
    );
  }

  const parsed = exportSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new VecnoteError(
      `Invalid ChatGPT export ${filePath}: ${issue ? `${issue.path.join('.')}: ${issue.message}` : 'unreadable'}`,
      'INVALID_IMPORT',
    );
  }
  return parsed.data;
}

export function loadTopicRules(filePath: string = DEFAULT_TOPICS_PATH): TopicRule[] {
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  const parsed = topicRulesSchema.safeParse(raw);
  if (!parsed.success) {
    throw new VecnoteError(`Invalid topic rules in ${filePath}`, 'INVALID_TOPICS');
  }
  return parsed.data;
}

/** Tags whose keywords occur (case-insensitively) in the title or text. */
export function classifyTopics(title: string, text: string, rules: readonly TopicRule[]): string[] {
  const combined = `${title} ${text}`.toLowerCase();
  return rules
    .filter(rule => rule.keywords.some(kw => combined.includes(kw.toLowerCase())))
    .map(rule => rule.tag);
}

export function slugify(title: string): string {
  return title
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '')
    .slice(0, SLUG_MAX);
}

/**
 * Flatten the conversation tree into user/assistant text, depth-first from
 * the root (the first node without a known parent).
 */
export function extractConversation(conv: Conversation): ExtractedConversation {
  const title = conv.title || 'Untitled';
  const ts = conv.create_time || conv.update_time || 0;
  const date = ts ? new Date(ts * 1000).toISOString().slice(0, 10) : 'unknown';

  const mapping = conv.mapping ?? {};
  const root = Object.keys(mapping).find(id => {
    const parent = mapping[id].parent;
    return !parent || !(parent in mapping);
  });

  const messages: ChatMessage[] = [];
  const visited = new Set<string>();
  const stack = root ? [root] : [];

  while (stack.length > 0) {
    const id = stack.pop();
    if (id === undefined || visited.has(id) || !(id in mapping)) continue;
    visited.add(id);

    const node = mapping[id];
    const role = node.message?.author?.role;
    const text = messageText(node.message?.content);
    if (text && (role === 'user' || role === 'assistant')) {
      messages.push({ role, text });
    }

    const children = node.children ?? [];
    for (let i = children.length - 1; i >= 0; i--) {
      stack.push(children[i]);
    }
  }

  return { title, date, messages };
}

export function buildNoteBody(conv: ExtractedConversation): string {
  const lines = [`# ${conv.title}`, `*ChatGPT conversation — ${conv.date}*`, ''];
  for (const { role, text } of conv.messages) {
    const label = role === 'user' ? '**User:**' : '**Assistant:**';
    const body = role === 'user' || charLength(text) <= ASSISTANT_REPLY_LIMIT
      ? text
      : `${truncate(text, ASSISTANT_REPLY_LIMIT)} …`;
    lines.push(`${label}\n${body}\n`);
  }
  return lines.join('\n');
}

/**
 * Store every conversation long enough to be worth keeping. Keys already in
 * the store only get their dates reset to the conversation's date. Centroids
 * for auto-tagging are computed once, before the first write.
 */
export async function importConversations(
  kb: KnowledgeBase,
  conversations: readonly Conversation[],
  options: ImportOptions = {},
): Promise<ImportSummary> {
  const minChars = options.minChars ?? DEFAULT_MIN_CHARS;
  const topics = options.topics ?? loadTopicRules();
  const log = options.log ?? (() => {});
  const centroids = options.dryRun ? new Map<string, Float32Array>() : kb.centroids();
  const seen = new Set<string>();

  const summary: ImportSummary = { total: 0, stored: 0, skippedShort: 0, skippedExisting: 0 };

  for (const conv of conversations) {
    summary.total++;
    const extracted = extractConversation(conv);
    const contentText = extracted.messages.map(m => m.text).join(' ');
    const contentLength = charLength(contentText);

    if (contentLength < minChars) {
      summary.skippedShort++;
      continue;
    }

    const key = `chatgpt/${extracted.date}-${slugify(extracted.title)}`;
    const timestamp = extracted.date === 'unknown' ? undefined : `${extracted.date} 00:00:00`;
    if (seen.has(key) || kb.getNote(key)) {
      // Re-imports repair the dates of notes already stored; nothing is re-encoded.
      if (!options.dryRun && timestamp) kb.redateNote(key, timestamp);
      summary.skippedExisting++;
      continue;
    }
    seen.add(key);

    const tags = [...classifyTopics(extracted.title, contentText, topics), 'chatgpt'];

    if (options.dryRun) {
      log(`  [dry] ${key}  [${tags.slice(0, 5).join(', ')}]  (${contentLength} chars)`);
      summary.stored++;
      continue;
    }

    const { note } = await kb.storeNote(
      { key, body: buildNoteBody(extracted), tags, autoTag: true },
      {
        centroids,
        timestamp,
      },
    );
    summary.stored++;
    log(`  [+] ${key}  [${note.tags.slice(0, 5).join(', ')}]`);
  }

  return summary;
}

function messageText(content: unknown): string {
  const parsed = partsSchema.safeParse(content);
  if (!parsed.success) return '';
  return parsed.data.parts
    .filter((p): p is string => typeof p === 'string' && p.trim() !== '')
    .join('\n');
}
