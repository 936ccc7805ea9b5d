/** Characters of body text shown as a node preview */
export const SNIPPET_LENGTH = 140;

const SESSION_PREFIXES = ['Session: ', 'Session - '];

/**
 * Derive a display title from a note body's first line.
 *
 * - `## Session: title` / `# title` → heading text without `#` and session prefix
 * - `Session on 2024-01-02 in project: X` → `X`
 * - `session: title` → `title`
 * - anything else → the trimmed first line
 */
export function extractTitle(body: string): string {
  const firstLine = body.split('\n')[0].trim();

  if (firstLine.startsWith('#')) {
    let title = firstLine.replace(/^#+/, '').trim();
    for (const prefix of SESSION_PREFIXES) {
      if (title.startsWith(prefix)) {
        title = title.slice(prefix.length);
      }
    }
    return title;
  }

  if (firstLine.includes('in project:')) {
    const parts = firstLine.split('in project:');
    return parts[parts.length - 1].trim();
  }

  if (firstLine.toLowerCase().startsWith('session:')) {
    return firstLine.slice(firstLine.indexOf(':') + 1).trim();
  }

  return firstLine;
}

/** First SNIPPET_LENGTH characters of the body on one line. */
export function snippet(body: string): string {
  return truncate(body, SNIPPET_LENGTH).replace(/\n/g, ' ');
}

/** Length in code points, so a surrogate pair counts once. */
export function charLength(text: string): number {
  return Array.from(text).length;
}

/** The first `max` code points of `text`; surrogate pairs are never split. */
export function truncate(text: string, max: number): string {
  if (text.length <= max) return text;
  return Array.from(text).slice(0, max).join('');
}
