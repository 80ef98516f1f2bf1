import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { patchMemberDocument, patchWorkspaceDocument } from '../../../src/core/consolidate/document-patcher.js';
import { TomlDocument, parseToml } from '../../../src/core/toml/toml-document.js';
import type { DependencySpec, UnifiedTable } from '../../../src/types/index.js';
import { UnsupportedEntryError } from '../../../src/utils/errors.js';

function table(entries: Array<[string, DependencySpec]>): UnifiedTable {
  return new Map(entries);
}

const LIB_UNIFIED = table([['lib', { kind: 'simple', version: '1.0, 2.0' }]]);

function patchMember(source: string, unified: UnifiedTable, inherit = false): { output: string; patched: string[] } {
  const document = TomlDocument.parse(source, 'crates/a/Cargo.toml');
  const patched = patchMemberDocument(document, unified, { inherit });
  return { output: document.toString(), patched };
}

describe('patchMemberDocument', () => {
  it('replaces only the version of an inline table', () => {
    const source = '[package]\nname = "a"\n\n[dependencies]\nlib = { version = "1.0", features = ["x"] }\n';
    const { output, patched } = patchMember(source, LIB_UNIFIED);

    assert.equal(output, '[package]\nname = "a"\n\n[dependencies]\nlib = { version = "1.0, 2.0", features = ["x"] }\n');
    assert.deepEqual(patched, ['lib']);
  });

  it('replaces a bare requirement string and keeps its comment', () => {
    const { output } = patchMember('[dependencies]\nlib = "1.0" # keep\nother = "3"\n', LIB_UNIFIED);
    assert.equal(output, '[dependencies]\nlib = "1.0, 2.0" # keep\nother = "3"\n');
  });

  it('updates the version line of a sub-table', () => {
    const source = '[dependencies.lib]\nversion = "1.0"\nfeatures = ["x"]\n';
    const { output } = patchMember(source, LIB_UNIFIED);
    assert.equal(output, '[dependencies.lib]\nversion = "1.0, 2.0"\nfeatures = ["x"]\n');
  });

  it('updates dotted version keys', () => {
    const { output } = patchMember('[dependencies]\nlib.version = "1.0"\n', LIB_UNIFIED);
    assert.equal(output, '[dependencies]\nlib.version = "1.0, 2.0"\n');
  });

  it('patches every dependency section', () => {
    const source = '[dependencies]\nlib = "1.0"\n\n[dev-dependencies]\nlib = "2.0"\n\n[build-dependencies]\nlib = { version = "2.0" }\n';
    const { output, patched } = patchMember(source, LIB_UNIFIED);

    assert.equal(
      output,
      '[dependencies]\nlib = "1.0, 2.0"\n\n[dev-dependencies]\nlib = "1.0, 2.0"\n\n[build-dependencies]\nlib = { version = "1.0, 2.0" }\n'
    );
    assert.deepEqual(patched, ['lib', 'lib', 'lib']);
  });

  it('leaves a table without version untouched', () => {
    const source = '[dependencies]\nlib = { path = "../lib" }\n';
    const document = TomlDocument.parse(source, 'Cargo.toml');
    const patched = patchMemberDocument(document, LIB_UNIFIED);

    assert.deepEqual(patched, []);
    assert.equal(document.modified, false);
    assert.equal(document.toString(), source);
  });

  it('ignores packages that were not unified', () => {
    const source = '[dependencies]\nserde = { workspace = true }\n';
    const { output, patched } = patchMember(source, LIB_UNIFIED);
    assert.equal(output, source);
    assert.deepEqual(patched, []);
  });

  it('finds entries in a file that starts with a byte order mark', () => {
    const { output, patched } = patchMember('\uFEFF[dependencies]\nlib = "1.0"\n', LIB_UNIFIED);

    assert.equal(output, '\uFEFF[dependencies]\nlib = "1.0, 2.0"\n');
    assert.deepEqual(patched, ['lib']);
  });

  it('rejects an entry that is neither a string nor a table', () => {
    assert.throws(() => patchMember('[dependencies]\nlib = 5\n', LIB_UNIFIED), UnsupportedEntryError);
  });

  it('uses the version of a detailed unified spec', () => {
    const unified = table([['lib', { kind: 'detailed', version: '^1.0', attributes: { features: ['y'] } }]]);
    const { output } = patchMember('[dependencies]\nlib = "1.0"\n', unified);
    assert.equal(output, '[dependencies]\nlib = "^1.0"\n');
  });

  describe('with inherit', () => {
    it('turns a bare string into a workspace reference', () => {
      const { output } = patchMember('[dependencies]\nlib = "1.0" # keep\n', LIB_UNIFIED, true);
      assert.equal(output, '[dependencies]\nlib = { workspace = true } # keep\n');
    });

    it('swaps the version field for the workspace marker', () => {
      const { output } = patchMember('[dependencies]\nlib = { version = "1.0", features = ["x"] }\n', LIB_UNIFIED, true);
      assert.equal(output, '[dependencies]\nlib = { workspace = true, features = ["x"] }\n');
    });

    it('keeps the dotted prefix of a dotted version key', () => {
      const { output } = patchMember('[dependencies]\nlib.version = "1.0"\n', LIB_UNIFIED, true);
      assert.equal(output, '[dependencies]\nlib.workspace = true\n');
    });
  });
});

describe('patchWorkspaceDocument', () => {
  const unified = table([
    ['anyhow', { kind: 'simple', version: '^1.0' }],
    ['tokio', { kind: 'detailed', version: '^1', attributes: { features: ['full'] } }]
  ]);

  it('appends new keys after the last shared entry', () => {
    const source = [
      '[workspace]',
      'members = ["a", "b"]',
      '',
      '[workspace.dependencies]',
      'serde = "1.0" # shared',
      '',
      '[profile.release]',
      'lto = true',
      ''
    ].join('\n');
    const document = TomlDocument.parse(source, 'Cargo.toml');
    patchWorkspaceDocument(document, unified);

    assert.equal(
      document.toString(),
      [
        '[workspace]',
        'members = ["a", "b"]',
        '',
        '[workspace.dependencies]',
        'serde = "1.0" # shared',
        'anyhow = "^1.0"',
        'tokio = { version = "^1", features = ["full"] }',
        '',
        '[profile.release]',
        'lto = true',
        ''
      ].join('\n')
    );
  });

  it('fills an empty shared table', () => {
    const source = '[workspace]\nmembers = []\n\n[workspace.dependencies]\n\n[profile.release]\nlto = true\n';
    const document = TomlDocument.parse(source, 'Cargo.toml');
    patchWorkspaceDocument(document, table([['anyhow', { kind: 'simple', version: '^1.0' }]]));

    assert.equal(
      document.toString(),
      '[workspace]\nmembers = []\n\n[workspace.dependencies]\nanyhow = "^1.0"\n\n[profile.release]\nlto = true\n'
    );
  });

  it('creates the shared table when the root has none', () => {
    const document = TomlDocument.parse('[workspace]\nmembers = ["a"]\n', 'Cargo.toml');
    patchWorkspaceDocument(document, table([['anyhow', { kind: 'simple', version: '^1.0' }]]));

    assert.equal(document.toString(), '[workspace]\nmembers = ["a"]\n\n[workspace.dependencies]\nanyhow = "^1.0"\n');
  });

  it('extends an inline shared table', () => {
    const document = TomlDocument.parse('[workspace]\ndependencies = { serde = "1" }\n', 'Cargo.toml');
    patchWorkspaceDocument(document, table([['anyhow', { kind: 'simple', version: '^1.0' }]]));

    assert.equal(document.toString(), '[workspace]\ndependencies = { serde = "1", anyhow = "^1.0" }\n');
  });

  it('extends a shared table written with dotted keys under [workspace]', () => {
    const document = TomlDocument.parse('[workspace]\nmembers = ["a"]\ndependencies.serde = "1"\n', 'Cargo.toml');
    patchWorkspaceDocument(document, table([['anyhow', { kind: 'simple', version: '^1.0' }]]));

    const output = document.toString();
    assert.equal(output, '[workspace]\nmembers = ["a"]\ndependencies.serde = "1"\ndependencies.anyhow = "^1.0"\n');
    assert.deepEqual(JSON.parse(JSON.stringify(parseToml(output, 'Cargo.toml'))), {
      workspace: { members: ['a'], dependencies: { serde: '1', anyhow: '^1.0' } }
    });
  });

  it('extends a shared table written with top-level dotted keys', () => {
    const source = 'workspace.members = ["a"]\nworkspace.dependencies.serde = "1"\n\n[package]\nname = "root"\n';
    const document = TomlDocument.parse(source, 'Cargo.toml');
    patchWorkspaceDocument(document, table([['anyhow', { kind: 'simple', version: '^1.0' }]]));

    const output = document.toString();
    assert.equal(
      output,
      'workspace.members = ["a"]\nworkspace.dependencies.serde = "1"\nworkspace.dependencies.anyhow = "^1.0"\n\n[package]\nname = "root"\n'
    );
    assert.doesNotThrow(() => parseToml(output, 'Cargo.toml'));
  });

  it('overwrites an existing key', () => {
    const document = TomlDocument.parse('[workspace.dependencies]\nanyhow = "0.1"\n', 'Cargo.toml');
    patchWorkspaceDocument(document, table([['anyhow', { kind: 'simple', version: '^1.0' }]]));

    assert.equal(document.toString(), '[workspace.dependencies]\nanyhow = "^1.0"\n');
  });

  it('writes inserted lines with the document line ending', () => {
    const document = TomlDocument.parse('[workspace.dependencies]\r\nserde = "1"\r\n', 'Cargo.toml');
    patchWorkspaceDocument(document, table([['anyhow', { kind: 'simple', version: '^1.0' }]]));

    assert.equal(document.toString(), '[workspace.dependencies]\r\nserde = "1"\r\nanyhow = "^1.0"\r\n');
  });

  it('leaves the document alone for an empty table', () => {
    const source = '[workspace]\nmembers = []\n';
    const document = TomlDocument.parse(source, 'Cargo.toml');
    patchWorkspaceDocument(document, new Map());
    assert.equal(document.modified, false);
  });
});
