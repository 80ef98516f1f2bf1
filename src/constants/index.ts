/**
 * Shared constants for the cargo-unify CLI application
 */

import type { DependencySection } from '../types/index.js';

export const FILE_PATTERNS = {
  CARGO_TOML: 'Cargo.toml',
  TEMP_SUFFIX: '.cargo-unify.tmp'
} as const;

export const WORKSPACE_KEYS = {
  WORKSPACE: 'workspace',
  MEMBERS: 'members',
  EXCLUDE: 'exclude',
  DEPENDENCIES: 'dependencies',
  INHERIT_MARKER: 'workspace',
  VERSION: 'version'
} as const;

/** Path of the shared table inside the root manifest */
export const SHARED_DEPENDENCIES_PATH = ['workspace', 'dependencies'] as const;

/** Member sections scanned, in scan order */
export const DEPENDENCY_SECTIONS: readonly DependencySection[] = [
  'dependencies',
  'dev-dependencies',
  'build-dependencies'
];

/** Separator used when concatenating requirement strings */
export const REQUIREMENT_SEPARATOR = ', ';
