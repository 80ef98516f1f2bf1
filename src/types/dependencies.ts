/**
 * Dependency model shared by the loader, the unifier and the patcher.
 */

/**
 * Any value smol-toml can produce. Dates come back as `TomlDate`, which
 * extends `Date`.
 */
export type TomlValue =
  | string
  | number
  | bigint
  | boolean
  | Date
  | TomlValue[]
  | { [key: string]: TomlValue };

export type TomlTable = { [key: string]: TomlValue };

/**
 * A bare requirement string: `serde = "1.0"`
 */
export interface SimpleDependency {
  kind: 'simple';
  version: string;
}

/**
 * A table declaration: `serde = { version = "1.0", features = ["derive"] }`.
 * Every key except `version` is carried through untouched.
 */
export interface DetailedDependency {
  kind: 'detailed';
  version?: string;
  attributes: TomlTable;
}

/**
 * `serde = { workspace = true }`: the value lives in the workspace root.
 */
export interface InheritedDependency {
  kind: 'inherited';
  attributes: TomlTable;
}

export type DependencySpec = SimpleDependency | DetailedDependency | InheritedDependency;

/** A detailed declaration without its discriminant, as passed to a merge. */
export type DependencyDetail = Omit<DetailedDependency, 'kind'>;

export type DependencySection = 'dependencies' | 'dev-dependencies' | 'build-dependencies';

export interface DependencyEntry {
  name: string;
  section: DependencySection;
  spec: DependencySpec;
}

export interface MemberManifest {
  /** Member directory as written in `workspace.members` (or the glob match) */
  member: string;
  /** Absolute path to the member's Cargo.toml */
  manifestPath: string;
  /** Entries in section order, then document order */
  dependencies: DependencyEntry[];
}

export interface WorkspaceModel {
  /** Absolute path to the root Cargo.toml */
  manifestPath: string;
  /** Contents of `[workspace.dependencies]` */
  sharedDependencies: Map<string, DependencySpec>;
  members: MemberManifest[];
}

/** Package name → merged spec, sorted by name */
export type UnifiedTable = Map<string, DependencySpec>;
