/**
 * @fileoverview Reads a workspace root and its members into a WorkspaceModel
 *
 * Each manifest is parsed once into a TomlDocument; the same documents are
 * handed to the patcher, so what is unified is exactly what gets edited.
 */

import path from 'path';
import { minimatch } from 'minimatch';

import { DEPENDENCY_SECTIONS, FILE_PATTERNS, WORKSPACE_KEYS } from '../../constants/index.js';
import type { DependencyEntry, DependencySpec, MemberManifest, TomlValue, WorkspaceModel } from '../../types/index.js';
import { FileSystemError, ManifestParseError, MissingWorkspaceError } from '../../utils/errors.js';
import { exists, isDirectory, listDirectories, readTextFile } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { isTomlTable, toDependencySpec } from '../dependencies/dependency-spec.js';
import { TomlDocument } from '../toml/toml-document.js';

export interface LoadedWorkspace {
  model: WorkspaceModel;
  /** Every parsed manifest by absolute path; the root is always present */
  documents: Map<string, TomlDocument>;
}

const GLOB_CHARS = /[*?[\]{}]/;
const SKIPPED_DIRECTORIES = new Set(['target', 'node_modules']);

export async function readManifestDocument(manifestPath: string): Promise<TomlDocument> {
  const source = await readTextFile(manifestPath);
  return TomlDocument.parse(source, manifestPath);
}

function readStringList(value: TomlValue | undefined, manifestPath: string, key: string): string[] {
  if (value === undefined) {
    return [];
  }
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw new ManifestParseError(manifestPath, `${key} must be an array of strings`);
  }
  return value;
}

/**
 * Interpret a dependency table, keeping document order.
 */
export function readDependencyTable(
  value: TomlValue | undefined,
  manifestPath: string,
  label: string
): Array<[string, DependencySpec]> {
  if (value === undefined) {
    return [];
  }
  if (!isTomlTable(value)) {
    throw new ManifestParseError(manifestPath, `[${label}] must be a table`);
  }
  return Object.entries(value).map(([name, raw]) => [name, toDependencySpec(name, raw, manifestPath)]);
}

function readMemberDependencies(document: TomlDocument): DependencyEntry[] {
  const entries: DependencyEntry[] = [];
  for (const section of DEPENDENCY_SECTIONS) {
    for (const [name, spec] of readDependencyTable(document.data[section], document.filePath, section)) {
      entries.push({ name, section, spec });
    }
  }
  return entries;
}

function normalizeMember(member: string): string {
  return member.replace(/\\/g, '/').replace(/\/+$/, '').replace(/^\.\//, '');
}

async function walkDirectories(absolute: string, relative: string, depth: number): Promise<string[]> {
  if (depth <= 0 || !(await isDirectory(absolute))) {
    return [];
  }
  const found: string[] = [];
  for (const name of await listDirectories(absolute)) {
    if (name.startsWith('.') || SKIPPED_DIRECTORIES.has(name)) continue;
    const rel = relative ? `${relative}/${name}` : name;
    found.push(rel);
    found.push(...(await walkDirectories(path.join(absolute, name), rel, depth - 1)));
  }
  return found;
}

/**
 * Expand a `workspace.members` glob to the matching directories, sorted.
 */
export async function expandMemberPattern(rootDir: string, pattern: string): Promise<string[]> {
  const normalized = normalizeMember(pattern);
  const segments = normalized.split('/');
  const firstGlob = segments.findIndex(segment => GLOB_CHARS.test(segment));
  if (firstGlob === -1) {
    return [normalized];
  }

  const base = segments.slice(0, firstGlob).join('/');
  const rest = segments.slice(firstGlob);
  const depth = rest.includes('**') ? Number.POSITIVE_INFINITY : rest.length;
  const candidates = await walkDirectories(path.join(rootDir, base), base, depth);

  return candidates.filter(candidate => minimatch(candidate, normalized)).sort();
}

function isExcluded(member: string, excludes: string[]): boolean {
  return excludes.some(excluded => member === excluded || member.startsWith(`${excluded}/`));
}

/**
 * Resolve member directories in declaration order, each once.
 */
export async function resolveMembers(
  rootDir: string,
  members: string[],
  excludes: string[]
): Promise<Array<{ member: string; manifestPath: string }>> {
  const normalizedExcludes = excludes.map(normalizeMember);
  const resolved: Array<{ member: string; manifestPath: string }> = [];
  const seen = new Set<string>();

  for (const pattern of members) {
    const isGlob = GLOB_CHARS.test(pattern);
    for (const member of await expandMemberPattern(rootDir, pattern)) {
      if (isExcluded(member, normalizedExcludes)) {
        logger.debug(`Skipping excluded member: ${member}`);
        continue;
      }
      const manifestPath = path.resolve(rootDir, member, FILE_PATTERNS.CARGO_TOML);
      if (seen.has(manifestPath)) continue;

      if (!(await exists(manifestPath))) {
        if (isGlob) {
          logger.debug(`Skipping ${member}: no ${FILE_PATTERNS.CARGO_TOML}`);
          continue;
        }
        throw new FileSystemError(`Workspace member manifest not found: ${manifestPath}`, { member, manifestPath });
      }

      seen.add(manifestPath);
      resolved.push({ member, manifestPath });
    }
  }

  return resolved;
}

/**
 * Parse the root manifest and every member manifest.
 *
 * A root that is also a package (`[package]`) counts as a member, backed by
 * the same document as the workspace.
 */
export async function loadWorkspace(manifestPath: string): Promise<LoadedWorkspace> {
  const rootPath = path.resolve(manifestPath);
  const root = await readManifestDocument(rootPath);
  const workspace = root.data[WORKSPACE_KEYS.WORKSPACE];

  if (!isTomlTable(workspace)) {
    throw new MissingWorkspaceError(rootPath);
  }

  const sharedDependencies = new Map(
    readDependencyTable(workspace[WORKSPACE_KEYS.DEPENDENCIES], rootPath, 'workspace.dependencies')
  );
  const rootDir = path.dirname(rootPath);
  const memberPatterns = readStringList(workspace[WORKSPACE_KEYS.MEMBERS], rootPath, 'workspace.members');
  const excludes = readStringList(workspace[WORKSPACE_KEYS.EXCLUDE], rootPath, 'workspace.exclude');

  const documents = new Map<string, TomlDocument>([[rootPath, root]]);
  const members: MemberManifest[] = [];

  if (isTomlTable(root.data.package)) {
    members.push({ member: '.', manifestPath: rootPath, dependencies: readMemberDependencies(root) });
  }

  for (const { member, manifestPath: memberPath } of await resolveMembers(rootDir, memberPatterns, excludes)) {
    if (memberPath === rootPath) continue;
    const document = await readManifestDocument(memberPath);
    documents.set(memberPath, document);
    members.push({ member, manifestPath: memberPath, dependencies: readMemberDependencies(document) });
    logger.debug(`Loaded member ${member}`, { manifestPath: memberPath });
  }

  return {
    model: { manifestPath: rootPath, sharedDependencies, members },
    documents
  };
}
