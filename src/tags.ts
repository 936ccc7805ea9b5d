/**
 * Accept tags as an array or a comma-separated string. Entries are trimmed,
 * empty ones dropped, duplicates removed (first occurrence wins).
 */
export function normalizeTags(tags: string | readonly string[] | null | undefined): string[] {
  if (tags === null || tags === undefined) return [];

  const parts = typeof tags === 'string' ? tags.split(',') : tags;
  const out: string[] = [];
  for (const part of parts) {
    const tag = String(part).trim();
    if (tag && !out.includes(tag)) out.push(tag);
  }
  return out;
}

/** Parse the JSON tag column; anything that is not an array of strings reads as no tags. */
export function parseTags(raw: string | null): string[] {
  if (!raw) return [];

  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    return [];
  }
  return Array.isArray(value) ? value.filter((t): t is string => typeof t === 'string') : [];
}

/** Append `extra` tags not already in `base`, skipping any in `skip`. */
export function mergeTags(base: readonly string[], extra: readonly string[], skip: ReadonlySet<string> = new Set()): string[] {
  const merged = [...base];
  for (const tag of extra) {
    if (!skip.has(tag) && !merged.includes(tag)) merged.push(tag);
  }
  return merged;
}
