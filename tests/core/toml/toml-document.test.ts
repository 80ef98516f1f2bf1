import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { TomlDocument, formatTomlKey, formatTomlValue } from '../../../src/core/toml/toml-document.js';
import { ManifestParseError } from '../../../src/utils/errors.js';

const MANIFEST = [
  '[package]',
  'name = "demo"',
  'description = """',
  'a [fake] table = "x"',
  '"""',
  '',
  '[dependencies]',
  'serde = "1.0" # comment',
  'tokio = { version = "1", features = ["full"] }',
  'rand.version = "0.8"',
  'list = [',
  '  "a", # comment ]',
  '  "b",',
  ']',
  '',
  '[dependencies.regex]',
  'version = "1.5"',
  ''
].join('\n');

function valueText(document: TomlDocument, path: string[]): string | undefined {
  const entry = document.findEntry(path);
  return entry ? document.source.slice(entry.value.start, entry.value.end) : undefined;
}

describe('TomlDocument.parse', () => {
  it('exposes the parsed data', () => {
    const document = TomlDocument.parse(MANIFEST, 'Cargo.toml');
    assert.deepEqual(JSON.parse(JSON.stringify(document.data.dependencies)), {
      serde: '1.0',
      tokio: { version: '1', features: ['full'] },
      rand: { version: '0.8' },
      list: ['a', 'b'],
      regex: { version: '1.5' }
    });
  });

  it('skips a leading byte order mark', () => {
    const document = TomlDocument.parse('\uFEFF[dependencies]\nlib = "1.0"\n', 'Cargo.toml');

    assert.deepEqual(document.childKeys(['dependencies']), ['lib']);
    assert.equal(valueText(document, ['dependencies', 'lib']), '"1.0"');
  });

  it('reports invalid TOML as a manifest parse error', () => {
    assert.throws(() => TomlDocument.parse('[dependencies\nserde = "1"', 'bad/Cargo.toml'), ManifestParseError);
  });
});

describe('TomlDocument lookups', () => {
  const document = TomlDocument.parse(MANIFEST, 'Cargo.toml');

  it('lists table children however they are written', () => {
    assert.deepEqual(document.childKeys(['dependencies']), ['serde', 'tokio', 'rand', 'list', 'regex']);
  });

  it('finds values behind keys, inline tables, dotted keys and sub-tables', () => {
    assert.equal(valueText(document, ['dependencies', 'serde']), '"1.0"');
    assert.equal(valueText(document, ['dependencies', 'tokio', 'version']), '"1"');
    assert.equal(valueText(document, ['dependencies', 'rand', 'version']), '"0.8"');
    assert.equal(valueText(document, ['dependencies', 'regex', 'version']), '"1.5"');
    assert.equal(document.findEntry(['dependencies', 'tokio'])?.value.kind, 'inline-table');
    assert.equal(document.findEntry(['dependencies', 'list'])?.value.kind, 'array');
  });

  it('does not treat string contents as structure', () => {
    assert.equal(document.findTable(['fake']), undefined);
    assert.equal(valueText(document, ['package', 'name']), '"demo"');
  });

  it('lists dotted keys that define a table from its parent', () => {
    const dotted = TomlDocument.parse('[workspace]\nmembers = []\ndependencies.serde = "1"\n', 'Cargo.toml');
    const placed = dotted.dottedEntries(['workspace', 'dependencies']);

    assert.equal(placed.length, 1);
    assert.deepEqual(placed[0].base, ['workspace']);
    assert.deepEqual(placed[0].entry.path, ['workspace', 'dependencies', 'serde']);
  });

  it('finds headers and descendants', () => {
    assert.equal(document.findTable(['dependencies', 'regex'])?.entries.length, 1);
    assert.equal(document.hasDescendants(['dependencies', 'regex']), true);
    assert.equal(document.hasDescendants(['dependencies', 'serde']), false);
  });
});

describe('TomlDocument edits', () => {
  it('replaces a single value and keeps the rest byte for byte', () => {
    const document = TomlDocument.parse(MANIFEST, 'Cargo.toml');
    const entry = document.findEntry(['dependencies', 'serde']);
    assert.ok(entry);

    document.replace(entry.value.start, entry.value.end, '"2.0"');

    assert.equal(document.modified, true);
    assert.equal(document.toString(), MANIFEST.replace('serde = "1.0" # comment', 'serde = "2.0" # comment'));
  });

  it('keeps the recording order of inserts at the same offset', () => {
    const document = TomlDocument.parse('a = 1\n', 'Cargo.toml');
    document.insert(5, '\nb = 2');
    document.insert(5, '\nc = 3');

    assert.equal(document.toString(), 'a = 1\nb = 2\nc = 3\n');
  });

  it('returns the source unchanged without edits', () => {
    const document = TomlDocument.parse(MANIFEST, 'Cargo.toml');
    assert.equal(document.modified, false);
    assert.equal(document.toString(), MANIFEST);
  });

  it('detects CRLF line endings', () => {
    assert.equal(TomlDocument.parse('a = 1\r\nb = 2\r\n', 'Cargo.toml').eol, '\r\n');
    assert.equal(TomlDocument.parse('a = 1\nb = 2\n', 'Cargo.toml').eol, '\n');
  });
});

describe('formatTomlValue', () => {
  it('renders dependency values inline', () => {
    assert.equal(formatTomlValue('^1.0'), '"^1.0"');
    assert.equal(
      formatTomlValue({ version: '1.0', features: ['derive'], 'default-features': false }),
      '{ version = "1.0", features = ["derive"], default-features = false }'
    );
    assert.equal(formatTomlValue({}), '{}');
  });

  it('quotes keys that are not bare', () => {
    assert.equal(formatTomlKey('serde_json'), 'serde_json');
    assert.equal(formatTomlKey('my.key'), '"my.key"');
  });

  it('escapes strings', () => {
    assert.equal(formatTomlValue('say "hi"\n'), '"say \\"hi\\"\\n"');
  });
});
