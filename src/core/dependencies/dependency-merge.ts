/**
 * @fileoverview Merging of two declarations of the same package
 *
 * Requirement intersection is not attempted: constraints are concatenated
 * with ", " so that every declared bound survives, then deduplicated by
 * {@link simplifyDependency}.
 */

import { REQUIREMENT_SEPARATOR } from '../../constants/index.js';
import type { DependencyDetail, DependencySpec } from '../../types/index.js';
import { InheritedDependencyError } from '../../utils/errors.js';
import { simplifyVersionRequirement } from './version-requirement.js';

function joinRequirements(left: string, right: string): string {
  return `${left}${REQUIREMENT_SEPARATOR}${right}`;
}

/**
 * Merge a bare requirement string into `spec`.
 *
 * A detailed spec without a version stays as it is.
 */
export function mergeSimple(spec: DependencySpec, version: string): DependencySpec {
  switch (spec.kind) {
    case 'simple':
      return { kind: 'simple', version: joinRequirements(spec.version, version) };
    case 'detailed':
      if (spec.version === undefined) {
        return spec;
      }
      return { ...spec, version: joinRequirements(spec.version, version) };
    case 'inherited':
      throw new InheritedDependencyError();
  }
}

/**
 * Merge a detailed declaration into `spec`.
 *
 * A simple spec takes the incoming attributes; a detailed spec keeps its own.
 * The existing requirement always comes first.
 */
export function mergeDetailed(spec: DependencySpec, detail: DependencyDetail): DependencySpec {
  switch (spec.kind) {
    case 'simple':
      return {
        kind: 'detailed',
        version: detail.version === undefined ? spec.version : joinRequirements(spec.version, detail.version),
        attributes: { ...detail.attributes }
      };
    case 'detailed':
      if (detail.version === undefined) {
        return spec;
      }
      if (spec.version === undefined) {
        return { ...spec, version: detail.version };
      }
      return { ...spec, version: joinRequirements(spec.version, detail.version) };
    case 'inherited':
      throw new InheritedDependencyError();
  }
}

/**
 * Deduplicate the comparators of the spec's requirement.
 */
export function simplifyDependency(spec: DependencySpec): DependencySpec {
  switch (spec.kind) {
    case 'simple':
      return { kind: 'simple', version: simplifyVersionRequirement(spec.version) };
    case 'detailed':
      if (spec.version === undefined) {
        return spec;
      }
      return { ...spec, version: simplifyVersionRequirement(spec.version) };
    case 'inherited':
      throw new InheritedDependencyError();
  }
}
