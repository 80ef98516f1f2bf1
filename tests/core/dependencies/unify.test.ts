import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { collectNewDependencies, unifyDependencies } from '../../../src/core/dependencies/unify.js';
import type { DependencySpec, WorkspaceModel } from '../../../src/types/index.js';
import { InheritedDependencyError } from '../../../src/utils/errors.js';

function workspaceModel(): WorkspaceModel {
  return {
    manifestPath: '/ws/Cargo.toml',
    sharedDependencies: new Map<string, DependencySpec>([['serde', { kind: 'simple', version: '1.0' }]]),
    members: [
      {
        member: 'crates/a',
        manifestPath: '/ws/crates/a/Cargo.toml',
        dependencies: [
          { name: 'serde', section: 'dependencies', spec: { kind: 'inherited', attributes: { workspace: true } } },
          { name: 'tokio', section: 'dependencies', spec: { kind: 'simple', version: '1' } }
        ]
      },
      {
        member: 'crates/b',
        manifestPath: '/ws/crates/b/Cargo.toml',
        dependencies: [
          {
            name: 'tokio',
            section: 'dependencies',
            spec: { kind: 'detailed', version: '1.2', attributes: { features: ['rt'] } }
          },
          { name: 'anyhow', section: 'dev-dependencies', spec: { kind: 'simple', version: '1' } }
        ]
      }
    ]
  };
}

describe('collectNewDependencies', () => {
  it('groups member declarations not yet shared, in discovery order', () => {
    const groups = collectNewDependencies(workspaceModel());

    assert.deepEqual([...groups.keys()], ['tokio', 'anyhow']);
    assert.deepEqual(groups.get('tokio'), [
      { kind: 'simple', version: '1' },
      { kind: 'detailed', version: '1.2', attributes: { features: ['rt'] } }
    ]);
    assert.equal(groups.has('serde'), false);
  });

  it('copies specs instead of sharing them with the model', () => {
    const model = workspaceModel();
    const groups = collectNewDependencies(model);
    const collected = groups.get('tokio')?.[1];
    const declared = model.members[1].dependencies[0].spec;

    assert.notEqual(collected, declared);
    assert.deepEqual(collected, declared);
  });
});

describe('unifyDependencies', () => {
  it('joins simple requirements into one simple spec', () => {
    const unified = unifyDependencies(
      new Map<string, DependencySpec[]>([
        ['pkg', [{ kind: 'simple', version: '1.0' }, { kind: 'simple', version: '2.0' }]]
      ])
    );

    assert.equal(unified.size, 1);
    assert.deepEqual(unified.get('pkg'), { kind: 'simple', version: '^1.0, ^2.0' });
  });

  it('seeds the fold with the first discovered spec', () => {
    const unified = unifyDependencies(collectNewDependencies(workspaceModel()));

    assert.deepEqual(unified.get('tokio'), {
      kind: 'detailed',
      version: '^1, ^1.2',
      attributes: { features: ['rt'] }
    });
    assert.deepEqual(unified.get('anyhow'), { kind: 'simple', version: '^1' });
  });

  it('returns entries sorted by name', () => {
    const unified = unifyDependencies(
      new Map<string, DependencySpec[]>([
        ['zeta', [{ kind: 'simple', version: '0.1' }]],
        ['alpha', [{ kind: 'simple', version: '0.2' }]]
      ])
    );

    assert.deepEqual([...unified.keys()], ['alpha', 'zeta']);
  });

  it('fails on an inherited declaration the root does not share', () => {
    const groups = new Map<string, DependencySpec[]>([
      ['ghost', [{ kind: 'simple', version: '1' }, { kind: 'inherited', attributes: { workspace: true } }]]
    ]);

    assert.throws(
      () => unifyDependencies(groups),
      (error: unknown) => error instanceof InheritedDependencyError && error.message.includes("'ghost'")
    );
  });

  it('fails when the first declaration is inherited', () => {
    const groups = new Map<string, DependencySpec[]>([
      ['ghost', [{ kind: 'inherited', attributes: { workspace: true } }]]
    ]);

    assert.throws(() => unifyDependencies(groups), InheritedDependencyError);
  });
});
