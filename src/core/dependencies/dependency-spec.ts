/**
 * @fileoverview Conversion between raw manifest values and DependencySpec
 */

import { WORKSPACE_KEYS } from '../../constants/index.js';
import type { DependencySpec, TomlTable, TomlValue } from '../../types/index.js';
import { ManifestParseError } from '../../utils/errors.js';

export function isTomlTable(value: TomlValue | undefined): value is TomlTable {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

/**
 * Interpret one value of a dependency table.
 */
export function toDependencySpec(name: string, value: TomlValue, manifestPath: string): DependencySpec {
  if (typeof value === 'string') {
    return { kind: 'simple', version: value };
  }

  if (!isTomlTable(value)) {
    throw new ManifestParseError(manifestPath, `dependency '${name}' must be a string or a table`);
  }

  if (value[WORKSPACE_KEYS.INHERIT_MARKER] === true) {
    return { kind: 'inherited', attributes: { ...value } };
  }

  const { [WORKSPACE_KEYS.VERSION]: version, ...attributes } = value;

  if (version === undefined) {
    return { kind: 'detailed', attributes };
  }
  if (typeof version !== 'string') {
    throw new ManifestParseError(manifestPath, `dependency '${name}' has a non-string version`);
  }
  return { kind: 'detailed', version, attributes };
}

/**
 * The requirement string a spec carries, if any.
 */
export function dependencyVersion(spec: DependencySpec): string | undefined {
  switch (spec.kind) {
    case 'simple':
      return spec.version;
    case 'detailed':
      return spec.version;
    case 'inherited':
      return undefined;
  }
}

/**
 * Back to the plain value a manifest would hold.
 */
export function toTomlValue(spec: DependencySpec): TomlValue {
  switch (spec.kind) {
    case 'simple':
      return spec.version;
    case 'detailed':
      return spec.version === undefined
        ? { ...spec.attributes }
        : { [WORKSPACE_KEYS.VERSION]: spec.version, ...spec.attributes };
    case 'inherited':
      return { ...spec.attributes };
  }
}

export function cloneDependency(spec: DependencySpec): DependencySpec {
  switch (spec.kind) {
    case 'simple':
      return { kind: 'simple', version: spec.version };
    case 'detailed': {
      const attributes = structuredClone(spec.attributes);
      return spec.version === undefined
        ? { kind: 'detailed', attributes }
        : { kind: 'detailed', version: spec.version, attributes };
    }
    case 'inherited':
      return { kind: 'inherited', attributes: structuredClone(spec.attributes) };
  }
}
