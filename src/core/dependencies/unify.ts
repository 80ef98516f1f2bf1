/**
 * @fileoverview Grouping and folding of member dependencies
 */

import type { DependencySpec, UnifiedTable, WorkspaceModel } from '../../types/index.js';
import { InheritedDependencyError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { cloneDependency } from './dependency-spec.js';
import { mergeDetailed, mergeSimple, simplifyDependency } from './dependency-merge.js';

/**
 * Group every member declaration whose name is not yet shared by the root.
 *
 * Members are walked in manifest order and each member's entries in section
 * then document order; each group lists its specs in that discovery order.
 */
export function collectNewDependencies(workspace: WorkspaceModel): Map<string, DependencySpec[]> {
  const groups = new Map<string, DependencySpec[]>();

  for (const member of workspace.members) {
    for (const entry of member.dependencies) {
      if (workspace.sharedDependencies.has(entry.name)) {
        continue;
      }
      const group = groups.get(entry.name);
      if (group) {
        group.push(cloneDependency(entry.spec));
      } else {
        groups.set(entry.name, [cloneDependency(entry.spec)]);
      }
    }
  }

  return groups;
}

function foldGroup(name: string, specs: DependencySpec[]): DependencySpec {
  const [seed, ...rest] = specs;
  if (seed === undefined) {
    throw new Error(`No declarations collected for '${name}'`);
  }
  if (seed.kind === 'inherited') {
    throw new InheritedDependencyError(name);
  }

  let acc: DependencySpec = seed;
  for (const incoming of rest) {
    switch (incoming.kind) {
      case 'simple':
        acc = mergeSimple(acc, incoming.version);
        break;
      case 'detailed':
        acc = mergeDetailed(acc, { version: incoming.version, attributes: incoming.attributes });
        break;
      case 'inherited':
        // Marked as shared by a member but missing from the root
        throw new InheritedDependencyError(name);
    }
  }
  return acc;
}

/**
 * Fold each group into one simplified spec. The first discovered spec seeds
 * the fold. The result is sorted by package name.
 */
export function unifyDependencies(groups: Map<string, DependencySpec[]>): UnifiedTable {
  const unified: UnifiedTable = new Map();
  const names = [...groups.keys()].sort();

  for (const name of names) {
    const specs = groups.get(name) ?? [];
    const merged = simplifyDependency(foldGroup(name, specs));
    logger.debug(`Unified ${specs.length} declaration(s) of '${name}'`, { merged });
    unified.set(name, merged);
  }

  return unified;
}
