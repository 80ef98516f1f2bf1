/**
 * @fileoverview Format-preserving TOML editing
 *
 * smol-toml validates the text and produces the data; a span scanner then
 * records where every header, key and value sits so that single values can
 * be replaced or new keys inserted while every other byte stays as written.
 */

import * as TOML from 'smol-toml';

import type { TomlTable, TomlValue } from '../../types/index.js';
import { ManifestParseError } from '../../utils/errors.js';

export type TomlNodeKind = 'string' | 'inline-table' | 'array' | 'scalar';

export interface TomlNode {
  kind: TomlNodeKind;
  start: number;
  end: number;
  /** Key/value pairs of an inline table, empty for every other kind */
  entries: TomlEntry[];
}

export interface TomlEntry {
  /** Absolute key path: enclosing header (or inline table) plus the dotted key */
  path: string[];
  start: number;
  /** Offset of the last segment of a dotted key */
  lastKeyStart: number;
  value: TomlNode;
  /** Offset after the value and any trailing comment, before the line break */
  lineEnd: number;
}

export interface TomlHeader {
  path: string[];
  arrayOfTables: boolean;
  start: number;
  lineEnd: number;
  entries: TomlEntry[];
}

/** A key/value pair written directly under a header, or at the top level */
export interface PlacedEntry {
  /** Path of the enclosing header; empty at the top level */
  base: string[];
  entry: TomlEntry;
}

interface TextEdit {
  start: number;
  end: number;
  text: string;
  order: number;
}

const BARE_KEY = /^[A-Za-z0-9_-]+$/;
const SCALAR_STOP = new Set([' ', '\t', '\r', '\n', ',', '#', ']', '}']);
const LOCAL_DATE = /^\d{4}-\d{2}-\d{2}$/;

const ESCAPES: Record<string, string> = {
  b: '\b',
  t: '\t',
  n: '\n',
  f: '\f',
  r: '\r',
  '"': '"',
  '\\': '\\'
};

function samePath(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((segment, i) => segment === b[i]);
}

function startsWithPath(path: readonly string[], prefix: readonly string[]): boolean {
  return path.length > prefix.length && prefix.every((segment, i) => segment === path[i]);
}

/**
 * Records the layout of a document that smol-toml has already accepted, so
 * it only needs to find boundaries, not report syntax errors.
 */
class SpanScanner {
  private pos = 0;
  readonly headers: TomlHeader[] = [];
  readonly rootEntries: TomlEntry[] = [];

  constructor(private readonly text: string) {}

  scan(): void {
    let current: TomlHeader | undefined;
    if (this.text.startsWith('\uFEFF')) {
      this.pos = 1;
    }

    for (;;) {
      this.skipTrivia();
      if (this.pos >= this.text.length) break;

      const before = this.pos;
      if (this.text[this.pos] === '[') {
        current = this.readHeader();
        this.headers.push(current);
      } else {
        const entry = this.readEntry(current?.arrayOfTables ? null : current?.path ?? []);
        entry.lineEnd = this.toLineEnd();
        (current ? current.entries : this.rootEntries).push(entry);
      }
      this.ensureProgress(before);
    }
  }

  private ensureProgress(before: number): void {
    if (this.pos <= before) {
      throw new SyntaxError(`unexpected character at offset ${before}`);
    }
  }

  private readHeader(): TomlHeader {
    const start = this.pos;
    const arrayOfTables = this.text.startsWith('[[', this.pos);
    this.pos += arrayOfTables ? 2 : 1;
    const { segments: path } = this.readKey();
    this.skipInlineSpace();
    this.pos += arrayOfTables ? 2 : 1;
    return { path, arrayOfTables, start, lineEnd: this.toLineEnd(), entries: [] };
  }

  /**
   * `base` is null under an array-of-tables header: those keys are never
   * addressed by path, so they get no absolute path.
   */
  private readEntry(base: string[] | null): TomlEntry {
    const start = this.pos;
    const { segments, lastStart } = this.readKey();
    this.skipInlineSpace();
    this.pos += 1; // '='
    this.skipInlineSpace();
    const path = base === null ? [] : [...base, ...segments];
    const value = this.readValue(base === null ? null : path);
    return { path, start, lastKeyStart: lastStart, value, lineEnd: value.end };
  }

  private readKey(): { segments: string[]; lastStart: number } {
    const segments: string[] = [];
    let lastStart = this.pos;
    for (;;) {
      this.skipInlineSpace();
      lastStart = this.pos;
      segments.push(this.readKeySegment());
      this.skipInlineSpace();
      if (this.text[this.pos] !== '.') break;
      this.pos += 1;
    }
    return { segments, lastStart };
  }

  private readKeySegment(): string {
    const ch = this.text[this.pos];
    if (ch === '"') {
      const end = this.findBasicStringEnd(this.pos);
      const raw = this.text.slice(this.pos + 1, end - 1);
      this.pos = end;
      return decodeBasicString(raw);
    }
    if (ch === "'") {
      const end = this.text.indexOf("'", this.pos + 1) + 1;
      const raw = this.text.slice(this.pos + 1, end - 1);
      this.pos = end;
      return raw;
    }
    const start = this.pos;
    while (this.pos < this.text.length && /[A-Za-z0-9_-]/.test(this.text[this.pos])) {
      this.pos += 1;
    }
    return this.text.slice(start, this.pos);
  }

  private readValue(path: string[] | null): TomlNode {
    const start = this.pos;
    const text = this.text;

    if (text.startsWith('"""', start)) {
      this.pos = this.findMultilineEnd(start, '"""', true);
      return { kind: 'string', start, end: this.pos, entries: [] };
    }
    if (text.startsWith("'''", start)) {
      this.pos = this.findMultilineEnd(start, "'''", false);
      return { kind: 'string', start, end: this.pos, entries: [] };
    }
    if (text[start] === '"') {
      this.pos = this.findBasicStringEnd(start);
      return { kind: 'string', start, end: this.pos, entries: [] };
    }
    if (text[start] === "'") {
      this.pos = text.indexOf("'", start + 1) + 1;
      return { kind: 'string', start, end: this.pos, entries: [] };
    }
    if (text[start] === '[') {
      this.readArray();
      return { kind: 'array', start, end: this.pos, entries: [] };
    }
    if (text[start] === '{') {
      const entries = this.readInlineTable(path);
      return { kind: 'inline-table', start, end: this.pos, entries };
    }

    this.readScalar();
    return { kind: 'scalar', start, end: this.pos, entries: [] };
  }

  private readArray(): void {
    this.pos += 1;
    for (;;) {
      this.skipTrivia();
      if (this.text[this.pos] === ']') break;
      const before = this.pos;
      this.readValue(null);
      this.ensureProgress(before);
      this.skipTrivia();
      if (this.text[this.pos] === ',') {
        this.pos += 1;
      }
    }
    this.pos += 1;
  }

  private readInlineTable(path: string[] | null): TomlEntry[] {
    const entries: TomlEntry[] = [];
    this.pos += 1;
    for (;;) {
      this.skipTrivia();
      if (this.text[this.pos] === '}') break;
      const before = this.pos;
      entries.push(this.readEntry(path));
      this.ensureProgress(before);
      this.skipTrivia();
      if (this.text[this.pos] === ',') {
        this.pos += 1;
      }
    }
    this.pos += 1;
    return entries;
  }

  private readScalar(): void {
    const start = this.pos;
    while (this.pos < this.text.length && !SCALAR_STOP.has(this.text[this.pos])) {
      this.pos += 1;
    }
    // Offset date-times may use a space between date and time
    if (
      LOCAL_DATE.test(this.text.slice(start, this.pos)) &&
      this.text[this.pos] === ' ' &&
      /\d/.test(this.text[this.pos + 1] ?? '')
    ) {
      this.pos += 1;
      while (this.pos < this.text.length && !SCALAR_STOP.has(this.text[this.pos])) {
        this.pos += 1;
      }
    }
  }

  private findBasicStringEnd(start: number): number {
    let i = start + 1;
    while (i < this.text.length) {
      const ch = this.text[i];
      if (ch === '\\') {
        i += 2;
        continue;
      }
      if (ch === '"') return i + 1;
      i += 1;
    }
    return i;
  }

  private findMultilineEnd(start: number, delimiter: string, escapes: boolean): number {
    let i = start + 3;
    while (i < this.text.length) {
      if (escapes && this.text[i] === '\\') {
        i += 2;
        continue;
      }
      if (this.text.startsWith(delimiter, i)) {
        // Up to two quotes may sit directly before the closing delimiter
        let extra = 0;
        while (extra < 2 && this.text[i + 3 + extra] === delimiter[0]) {
          extra += 1;
        }
        return i + 3 + extra;
      }
      i += 1;
    }
    return i;
  }

  private skipInlineSpace(): void {
    while (this.text[this.pos] === ' ' || this.text[this.pos] === '\t') {
      this.pos += 1;
    }
  }

  private skipTrivia(): void {
    for (;;) {
      const ch = this.text[this.pos];
      if (ch === ' ' || ch === '\t' || ch === '\r' || ch === '\n') {
        this.pos += 1;
      } else if (ch === '#') {
        this.skipComment();
      } else {
        return;
      }
    }
  }

  private skipComment(): void {
    while (this.pos < this.text.length && this.text[this.pos] !== '\n' && this.text[this.pos] !== '\r') {
      this.pos += 1;
    }
  }

  private toLineEnd(): number {
    this.skipInlineSpace();
    if (this.text[this.pos] === '#') {
      this.skipComment();
    }
    return this.pos;
  }
}

function decodeBasicString(raw: string): string {
  return raw.replace(/\\(u[0-9A-Fa-f]{4}|U[0-9A-Fa-f]{8}|.)/g, (_match, escape: string) => {
    if (escape.length > 1) {
      return String.fromCodePoint(parseInt(escape.slice(1), 16));
    }
    return ESCAPES[escape] ?? escape;
  });
}

export function formatTomlKey(key: string): string {
  return BARE_KEY.test(key) ? key : formatTomlString(key);
}

export function formatTomlString(value: string): string {
  return JSON.stringify(value).replace(/\u007f/g, '\\u007F');
}

/**
 * Render a value in inline form: strings, arrays and `{ key = value }` tables.
 */
export function formatTomlValue(value: TomlValue): string {
  if (typeof value === 'string') {
    return formatTomlString(value);
  }
  if (typeof value === 'bigint' || typeof value === 'boolean') {
    return value.toString();
  }
  if (typeof value === 'number') {
    if (Number.isNaN(value)) return 'nan';
    if (value === Infinity) return 'inf';
    if (value === -Infinity) return '-inf';
    return String(value);
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (Array.isArray(value)) {
    return `[${value.map(formatTomlValue).join(', ')}]`;
  }
  const pairs = Object.entries(value).map(([key, item]) => `${formatTomlKey(key)} = ${formatTomlValue(item)}`);
  return pairs.length === 0 ? '{}' : `{ ${pairs.join(', ')} }`;
}

/**
 * Parse with smol-toml, reporting failures as {@link ManifestParseError}.
 */
export function parseToml(source: string, filePath: string): TomlTable {
  try {
    return TOML.parse(source);
  } catch (error) {
    throw new ManifestParseError(filePath, error instanceof Error ? error.message : String(error));
  }
}

/**
 * A parsed TOML file that accumulates text edits against its original source.
 */
export class TomlDocument {
  readonly data: TomlTable;
  readonly eol: string;
  private readonly headers: TomlHeader[];
  private readonly placed: PlacedEntry[];
  private readonly entries: TomlEntry[];
  private readonly edits: TextEdit[] = [];

  private constructor(
    readonly filePath: string,
    readonly source: string,
    data: TomlTable,
    scanner: SpanScanner
  ) {
    this.data = data;
    this.eol = source.includes('\r\n') ? '\r\n' : '\n';
    this.headers = scanner.headers;
    this.placed = [
      ...scanner.rootEntries.map((entry): PlacedEntry => ({ base: [], entry })),
      ...scanner.headers
        .filter(header => !header.arrayOfTables)
        .flatMap(header => header.entries.map((entry): PlacedEntry => ({ base: header.path, entry })))
    ];
    this.entries = flattenEntries([...scanner.rootEntries, ...scanner.headers.flatMap(header => header.entries)]);
  }

  static parse(source: string, filePath: string): TomlDocument {
    const data = parseToml(source, filePath);
    const scanner = new SpanScanner(source);
    try {
      scanner.scan();
    } catch (error) {
      throw new ManifestParseError(filePath, error instanceof Error ? error.message : String(error));
    }
    return new TomlDocument(filePath, source, data, scanner);
  }

  /** The `[a.b]` header for `path`, if the document has one */
  findTable(path: readonly string[]): TomlHeader | undefined {
    return this.headers.find(header => !header.arrayOfTables && samePath(header.path, path));
  }

  /**
   * Dotted keys that define children of `path` from an enclosing header,
   * such as `dependencies.serde = "1"` under `[workspace]`.
   */
  dottedEntries(path: readonly string[]): PlacedEntry[] {
    return this.placed.filter(
      ({ base, entry }) => base.length < path.length && startsWithPath(entry.path, path)
    );
  }

  /** The key/value pair at exactly `path`, including keys inside inline tables */
  findEntry(path: readonly string[]): TomlEntry | undefined {
    return this.entries.find(entry => samePath(entry.path, path));
  }

  /** Whether any header or key lies strictly below `path` */
  hasDescendants(path: readonly string[]): boolean {
    return (
      this.headers.some(header => startsWithPath(header.path, path)) ||
      this.entries.some(entry => startsWithPath(entry.path, path))
    );
  }

  /**
   * Names of the direct children of the table at `path`, in document order,
   * however they are written (keys, dotted keys, sub-table headers).
   */
  childKeys(path: readonly string[]): string[] {
    const found: Array<{ offset: number; key: string }> = [];
    for (const header of this.headers) {
      if (!header.arrayOfTables && startsWithPath(header.path, path)) {
        found.push({ offset: header.start, key: header.path[path.length] });
      }
    }
    for (const entry of this.entries) {
      if (startsWithPath(entry.path, path)) {
        found.push({ offset: entry.start, key: entry.path[path.length] });
      }
    }
    found.sort((a, b) => a.offset - b.offset);
    return [...new Set(found.map(item => item.key))];
  }

  replace(start: number, end: number, text: string): void {
    this.edits.push({ start, end, text, order: this.edits.length });
  }

  insert(offset: number, text: string): void {
    this.replace(offset, offset, text);
  }

  get modified(): boolean {
    return this.edits.length > 0;
  }

  /**
   * Apply the recorded edits. Inserts at the same offset keep the order in
   * which they were recorded.
   */
  toString(): string {
    const edits = [...this.edits].sort((a, b) => b.start - a.start || b.order - a.order);
    let output = this.source;
    let limit = Infinity;
    for (const edit of edits) {
      if (edit.end > limit) {
        throw new Error(`Overlapping edits in ${this.filePath} at offset ${edit.start}`);
      }
      output = output.slice(0, edit.start) + edit.text + output.slice(edit.end);
      limit = edit.start;
    }
    return output;
  }
}

function flattenEntries(entries: TomlEntry[]): TomlEntry[] {
  const flat: TomlEntry[] = [];
  for (const entry of entries) {
    if (entry.path.length === 0) continue;
    flat.push(entry);
    if (entry.value.kind === 'inline-table') {
      flat.push(...flattenEntries(entry.value.entries));
    }
  }
  return flat;
}
