/**
 * KEY=VALUE files (board overlay config, boot state). Lines that are not
 * assignments are kept as they are.
 */

const ASSIGNMENT = /^\s*([A-Za-z0-9_.-]+)\s*=(.*)$/;

export function parseKeyValues(text: string): Map<string, string> {
  const values = new Map<string, string>();
  for (const line of text.split(/\r?\n/)) {
    if (line.trimStart().startsWith('#')) continue;
    const match = ASSIGNMENT.exec(line);
    if (match && !values.has(match[1])) {
      values.set(match[1], match[2].trim());
    }
  }
  return values;
}

/**
 * Apply updates to the text: a string sets the key in place (or appends
 * it), `null` removes every assignment of the key.
 */
export function updateKeyValues(text: string, updates: Readonly<Record<string, string | null>>): string {
  const lines = text === '' ? [] : text.replace(/\r?\n$/, '').split(/\r?\n/);
  const seen = new Set<string>();
  const out: string[] = [];

  for (const line of lines) {
    const match = line.trimStart().startsWith('#') ? null : ASSIGNMENT.exec(line);
    const key = match?.[1];
    if (key === undefined || !(key in updates)) {
      out.push(line);
      continue;
    }
    const value = updates[key];
    if (value === null || seen.has(key)) continue;
    seen.add(key);
    out.push(`${key}=${value}`);
  }

  for (const [key, value] of Object.entries(updates)) {
    if (value !== null && !seen.has(key)) out.push(`${key}=${value}`);
  }
  return out.length === 0 ? '' : `${out.join('\n')}\n`;
}
