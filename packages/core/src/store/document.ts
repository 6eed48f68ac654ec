/**
 * Key-preserving TOML document tree.
 *
 * The text is split into blocks, one per table header (plus the root
 * block before the first header). Each block records the line extent of
 * every key/value pair it holds, so individual values can be replaced,
 * keys inserted and whole tables removed while every other byte of the
 * document (comments, blank lines, unknown keys, formatting) stays as it
 * was written.
 *
 * The document only tracks structure. Values are rendered by the caller.
 */

import * as TOML from '@iarna/toml';
import { renderKey, renderKeyPath } from './toml.js';

export type KeyPath = readonly string[];

export interface DocumentEntry {
  /** Key segments relative to the enclosing block (dotted keys have several) */
  key: string[];
  /** First line of the key/value pair */
  start: number;
  /** Last line of the key/value pair (multi-line arrays and strings span lines) */
  end: number;
  /** Column where the value starts on the first line */
  valueStart: number;
  /** Column just past the value on the last line */
  valueEnd: number;
}

export interface DocumentBlock {
  kind: 'root' | 'table' | 'array';
  path: string[];
  /** First line, including comment lines directly above the header */
  start: number;
  /** Header line; -1 for the root block */
  header: number;
  /** Last line, up to the start of the next block */
  end: number;
  entries: DocumentEntry[];
}

/** The document cannot be edited at the requested path without restructuring it. */
export class DocumentError extends Error {
  constructor(
    message: string,
    public readonly path: string,
  ) {
    super(message);
    this.name = 'DocumentError';
  }
}

// ─── Scanning ────────────────────────────────────────────────────────────

const BARE_KEY_CHARS = /^[A-Za-z0-9_-]+/;

function skipSpace(line: string, pos: number): number {
  let i = pos;
  while (i < line.length && (line[i] === ' ' || line[i] === '\t')) i++;
  return i;
}

function isBlankOrComment(line: string): boolean {
  const trimmed = line.trim();
  return trimmed === '' || trimmed.startsWith('#');
}

function isComment(line: string): boolean {
  return line.trim().startsWith('#');
}

/** Index of the closing quote of the basic string opening at `pos`. */
function basicStringEnd(line: string, pos: number, lineNo: number): number {
  for (let i = pos + 1; i < line.length; i++) {
    if (line[i] === '\\') {
      i++;
    } else if (line[i] === '"') {
      return i;
    }
  }
  throw new DocumentError(`Unterminated string on line ${lineNo + 1}`, '');
}

/** Index just past the closing delimiter of a multi-line string, or -1. */
function multilineStringEnd(line: string, from: number, delimiter: string): number {
  for (let i = from; i < line.length; i++) {
    if (delimiter === '"""' && line[i] === '\\') {
      i++;
    } else if (line.startsWith(delimiter, i)) {
      // up to two quotes may directly precede the closing delimiter
      let end = i + 3;
      while (end < i + 5 && line[end] === delimiter[0]) end++;
      return end;
    }
  }
  return -1;
}

function decodeQuotedKey(raw: string): string {
  const parsed = TOML.parse(`k = ${raw}`)['k'];
  if (typeof parsed !== 'string') {
    throw new DocumentError(`Invalid quoted key ${raw}`, '');
  }
  return parsed;
}

function parseKey(line: string, from: number, lineNo: number): { segments: string[]; pos: number } {
  const segments: string[] = [];
  let pos = from;
  for (;;) {
    pos = skipSpace(line, pos);
    const ch = line[pos];
    if (ch === '"') {
      const close = basicStringEnd(line, pos, lineNo);
      segments.push(decodeQuotedKey(line.slice(pos, close + 1)));
      pos = close + 1;
    } else if (ch === "'") {
      const close = line.indexOf("'", pos + 1);
      if (close < 0) throw new DocumentError(`Unterminated key on line ${lineNo + 1}`, '');
      segments.push(line.slice(pos + 1, close));
      pos = close + 1;
    } else {
      const match = BARE_KEY_CHARS.exec(line.slice(pos));
      if (!match) throw new DocumentError(`Expected a key on line ${lineNo + 1}`, '');
      segments.push(match[0]);
      pos += match[0].length;
    }
    pos = skipSpace(line, pos);
    if (line[pos] !== '.') return { segments, pos };
    pos++;
  }
}

/** Find where the value starting at (`lineNo`, `col`) ends. */
function scanValue(lines: string[], lineNo: number, col: number): { endLine: number; endCol: number } {
  let depth = 0;
  let started = false;
  let multiline: string | undefined;

  for (let li = lineNo; li < lines.length; li++) {
    const line = lines[li];
    let i = li === lineNo ? col : 0;
    let lastEnd = i;

    while (i < line.length) {
      if (multiline !== undefined) {
        const close = multilineStringEnd(line, i, multiline);
        if (close < 0) break;
        i = close;
        lastEnd = i;
        multiline = undefined;
        continue;
      }
      const ch = line[i];
      if (ch === ' ' || ch === '\t') {
        i++;
        continue;
      }
      if (ch === '#') break;
      if (line.startsWith('"""', i) || line.startsWith("'''", i)) {
        multiline = line.slice(i, i + 3);
        started = true;
        i += 3;
        continue;
      }
      if (ch === '"') {
        i = basicStringEnd(line, i, li) + 1;
      } else if (ch === "'") {
        const close = line.indexOf("'", i + 1);
        if (close < 0) throw new DocumentError(`Unterminated string on line ${li + 1}`, '');
        i = close + 1;
      } else {
        if (ch === '[' || ch === '{') depth++;
        else if (ch === ']' || ch === '}') depth--;
        i++;
      }
      started = true;
      lastEnd = i;
    }

    if (started && depth === 0 && multiline === undefined) {
      return { endLine: li, endCol: lastEnd };
    }
  }
  throw new DocumentError(`Unterminated value starting on line ${lineNo + 1}`, '');
}

function indexLines(lines: string[]): DocumentBlock[] {
  const root: DocumentBlock = { kind: 'root', path: [], start: 0, header: -1, end: -1, entries: [] };
  const blocks: DocumentBlock[] = [root];
  let current = root;
  let lastContent = -1;

  let i = 0;
  while (i < lines.length) {
    const line = lines[i];
    const indent = skipSpace(line, 0);
    if (isBlankOrComment(line)) {
      i++;
      continue;
    }

    if (line[indent] === '[') {
      const isArray = line.startsWith('[[', indent);
      const { segments, pos } = parseKey(line, indent + (isArray ? 2 : 1), i);
      if (!line.startsWith(isArray ? ']]' : ']', pos)) {
        throw new DocumentError(`Malformed table header on line ${i + 1}`, '');
      }
      let start = i;
      while (start - 1 > lastContent && isComment(lines[start - 1])) start--;
      current.end = start - 1;
      current = { kind: isArray ? 'array' : 'table', path: segments, start, header: i, end: -1, entries: [] };
      blocks.push(current);
      lastContent = i;
      i++;
      continue;
    }

    const { segments, pos } = parseKey(line, indent, i);
    if (line[pos] !== '=') {
      throw new DocumentError(`Expected "=" after key on line ${i + 1}`, '');
    }
    const valueStart = skipSpace(line, pos + 1);
    const { endLine, endCol } = scanValue(lines, i, valueStart);
    current.entries.push({ key: segments, start: i, end: endLine, valueStart, valueEnd: endCol });
    lastContent = endLine;
    i = endLine + 1;
  }

  current.end = lines.length - 1;
  return blocks;
}

// ─── Path helpers ────────────────────────────────────────────────────────

function hasPrefix(path: KeyPath, prefix: KeyPath): boolean {
  return prefix.length <= path.length && prefix.every((segment, i) => path[i] === segment);
}

function samePath(a: KeyPath, b: KeyPath): boolean {
  return a.length === b.length && hasPrefix(a, b);
}

function fullPath(block: DocumentBlock, entry: DocumentEntry): string[] {
  return [...block.path, ...entry.key];
}

// ─── Document ────────────────────────────────────────────────────────────

export class TomlDocument {
  private lines: string[];
  private index: DocumentBlock[];
  private readonly eol: string;
  private readonly trailingNewline: boolean;

  private constructor(text: string) {
    this.eol = text.includes('\r\n') ? '\r\n' : '\n';
    this.trailingNewline = /\r?\n$/.test(text);
    const body = text.replace(/\r?\n$/, '');
    this.lines = text === '' ? [] : body.split(/\r?\n/);
    this.index = indexLines(this.lines);
  }

  /**
   * @throws {DocumentError} if the text cannot be split into blocks
   */
  static parse(text: string): TomlDocument {
    return new TomlDocument(text);
  }

  get blocks(): readonly DocumentBlock[] {
    return this.index;
  }

  toString(): string {
    if (this.lines.length === 0) return '';
    return this.lines.join(this.eol) + (this.trailingNewline ? this.eol : '');
  }

  /**
   * Locate the key/value pair that defines `path`.
   *
   * @throws {DocumentError} if `path` sits inside an inline table or array
   */
  findEntry(path: KeyPath): { block: DocumentBlock; entry: DocumentEntry } | undefined {
    for (const block of this.index) {
      if (block.kind === 'array') continue;
      for (const entry of block.entries) {
        const full = fullPath(block, entry);
        if (samePath(full, path)) return { block, entry };
        if (full.length < path.length && hasPrefix(path, full)) {
          throw new DocumentError(
            `${renderKeyPath(path)} is defined inline by ${renderKeyPath(full)}`,
            renderKeyPath(path),
          );
        }
      }
    }
    return undefined;
  }

  /**
   * Set the value at `path` to the already-rendered `valueText`. An existing
   * value is replaced in place (key spelling and trailing comment kept); a
   * missing key is added to its table, which is created when absent.
   */
  setValue(path: KeyPath, valueText: string): void {
    const found = this.findEntry(path);
    if (found) {
      const { entry } = found;
      const replaced =
        this.lines[entry.start].slice(0, entry.valueStart) +
        valueText +
        this.lines[entry.end].slice(entry.valueEnd);
      this.splice(entry.start, entry.end - entry.start + 1, [replaced]);
      return;
    }

    const parent = path.slice(0, -1);
    const leaf = path[path.length - 1];

    const table = this.index.find((b) => b.kind !== 'array' && samePath(b.path, parent));
    if (table) {
      const last = table.entries[table.entries.length - 1];
      const at = last ? last.end + 1 : table.header + 1;
      const indent = last ? this.indentOf(last.start) : '';
      this.splice(at, 0, [`${indent}${renderKey(leaf)} = ${valueText}`]);
      return;
    }

    // parent defined through dotted keys: add a dotted sibling
    let sibling: { block: DocumentBlock; entry: DocumentEntry } | undefined;
    for (const block of this.index) {
      // sub-tables of parent may precede its header; only dotted keys conflict
      if (block.kind === 'array' || hasPrefix(block.path, parent)) continue;
      for (const entry of block.entries) {
        const full = fullPath(block, entry);
        if (full.length > parent.length && hasPrefix(full, parent)) {
          if (full.length !== path.length || entry.key.length < 2) {
            throw new DocumentError(
              `${renderKeyPath(parent)} is defined by dotted keys`,
              renderKeyPath(path),
            );
          }
          sibling = { block, entry };
        }
      }
    }
    if (sibling) {
      const { entry } = sibling;
      const keyText = renderKeyPath([...entry.key.slice(0, -1), leaf]);
      this.splice(entry.end + 1, 0, [`${this.indentOf(entry.start)}${keyText} = ${valueText}`]);
      return;
    }

    this.insertSection(this.placementFor(parent), [
      `[${renderKeyPath(parent)}]`,
      `${renderKey(leaf)} = ${valueText}`,
    ]);
  }

  /**
   * Remove every key and table at or below `path`.
   *
   * @returns whether anything was removed
   */
  removePath(path: KeyPath): boolean {
    const ranges: Array<[number, number]> = [];
    for (const block of this.index) {
      if (block.kind !== 'root' && hasPrefix(block.path, path)) {
        ranges.push([block.start, block.end]);
        continue;
      }
      for (const entry of block.entries) {
        const full = fullPath(block, entry);
        if (hasPrefix(full, path)) {
          ranges.push([entry.start, entry.end]);
        } else if (block.kind !== 'array' && full.length < path.length && hasPrefix(path, full)) {
          throw new DocumentError(
            `${renderKeyPath(path)} is defined inline by ${renderKeyPath(full)}`,
            renderKeyPath(path),
          );
        }
      }
    }
    if (ranges.length === 0) return false;

    const reachesEnd = ranges.some(([, end]) => end >= this.lines.length - 1);
    ranges.sort((a, b) => b[0] - a[0]);
    for (const [start, end] of ranges) {
      this.lines.splice(start, end - start + 1);
    }
    if (reachesEnd) {
      while (this.lines.length > 0 && this.lines[this.lines.length - 1].trim() === '') {
        this.lines.pop();
      }
    }
    this.index = indexLines(this.lines);
    return true;
  }

  /** Append `[[path]]` tables, each given as rendered `key = value` lines. */
  insertArrayTables(path: KeyPath, tables: ReadonlyArray<readonly string[]>): void {
    if (tables.length === 0) return;
    const header = `[[${renderKeyPath(path)}]]`;
    const body: string[] = [];
    tables.forEach((lines, i) => {
      if (i > 0) body.push('');
      body.push(header, ...lines);
    });
    this.insertSection(this.placementFor(path), body);
  }

  // ─── Internals ───────────────────────────────────────────────────────

  private indentOf(lineNo: number): string {
    const line = this.lines[lineNo];
    return line.slice(0, skipSpace(line, 0));
  }

  private contentEnd(block: DocumentBlock): number {
    for (let i = block.end; i >= block.start; i--) {
      if (this.lines[i].trim() !== '') return i;
    }
    return block.start - 1;
  }

  /**
   * Line at which a new table for `path` goes: before its first existing
   * sub-table, else after the last table of the same top-level section,
   * else at the end of the document.
   */
  private placementFor(path: KeyPath): number {
    const sub = this.index.find((b) => b.kind !== 'root' && hasPrefix(b.path, path));
    if (sub) return sub.start;

    const section = this.index.filter((b) => b.kind !== 'root' && b.path[0] === path[0]);
    const last = section[section.length - 1];
    if (last) return this.contentEnd(last) + 1;

    let end = this.lines.length;
    while (end > 0 && this.lines[end - 1].trim() === '') end--;
    return end;
  }

  /** Insert a table, keeping one blank line between it and its neighbours. */
  private insertSection(at: number, body: string[]): void {
    const chunk = [...body];
    if (at > 0 && this.lines[at - 1].trim() !== '') chunk.unshift('');
    if (at < this.lines.length && this.lines[at].trim() !== '') chunk.push('');
    this.splice(at, 0, chunk);
  }

  private splice(at: number, deleteCount: number, insert: string[]): void {
    this.lines.splice(at, deleteCount, ...insert);
    this.index = indexLines(this.lines);
  }
}
