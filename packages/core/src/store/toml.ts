import * as TOML from '@iarna/toml';
import { ParseError } from '../errors.js';

/** Any value a TOML document can hold. */
export type TomlValue = string | number | boolean | Date | TomlValue[] | TomlTable;
export interface TomlTable {
  [key: string]: TomlValue;
}

const BARE_KEY = /^[A-Za-z0-9_-]+$/;

export function isTable(value: TomlValue | undefined): value is TomlTable {
  return (
    typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date)
  );
}

/** Sub-table `key` of `table`, or undefined when absent or not a table. */
export function tableAt(table: TomlTable | undefined, key: string): TomlTable | undefined {
  const value = table?.[key];
  return isTable(value) ? value : undefined;
}

/**
 * Parse TOML text.
 *
 * @throws {ParseError} with 1-based line and column
 */
export function parseToml(text: string, filePath: string): TomlTable {
  try {
    return TOML.parse(text);
  } catch (err) {
    const line = err instanceof Error && 'line' in err && typeof err.line === 'number' ? err.line + 1 : 1;
    const column = err instanceof Error && 'col' in err && typeof err.col === 'number' ? err.col + 1 : 1;
    const reason = err instanceof Error ? err.message.split('\n')[0] : String(err);
    throw new ParseError(
      `Malformed TOML in ${filePath} at line ${line}, column ${column}: ${reason}`,
      filePath,
      line,
      column,
    );
  }
}

export function renderKey(key: string): string {
  return BARE_KEY.test(key) ? key : TOML.stringify.value(key);
}

export function renderKeyPath(path: readonly string[]): string {
  return path.map(renderKey).join('.');
}

/** Inline TOML text for a value (tables become inline tables). */
export function renderValue(value: TomlValue): string {
  if (typeof value === 'boolean') return String(value);
  if (typeof value === 'number') {
    return Number.isInteger(value) ? String(value) : TOML.stringify.value(value);
  }
  if (typeof value === 'string' || value instanceof Date) return TOML.stringify.value(value);
  if (Array.isArray(value)) return `[${value.map(renderValue).join(', ')}]`;
  const entries = Object.entries(value).map(([k, v]) => `${renderKey(k)} = ${renderValue(v)}`);
  return entries.length === 0 ? '{}' : `{ ${entries.join(', ')} }`;
}
