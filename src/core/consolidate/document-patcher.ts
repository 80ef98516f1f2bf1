/**
 * @fileoverview Writes unified dependencies back into TOML documents
 *
 * The root gains one `[workspace.dependencies]` key per unified package;
 * members get their existing entries pointed at the unified requirement.
 * Only the touched values change; everything else keeps its formatting.
 */

import { DEPENDENCY_SECTIONS, SHARED_DEPENDENCIES_PATH, WORKSPACE_KEYS } from '../../constants/index.js';
import type { DependencySpec, UnifiedTable } from '../../types/index.js';
import { ManifestParseError, UnsupportedEntryError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { dependencyVersion, isTomlTable, toTomlValue } from '../dependencies/dependency-spec.js';
import { formatTomlKey, formatTomlString, formatTomlValue } from '../toml/toml-document.js';
import type { PlacedEntry, TomlDocument, TomlEntry } from '../toml/toml-document.js';

export interface MemberPatchOptions {
  /**
   * Replace member requirements with `workspace = true` instead of
   * repeating the unified requirement.
   */
  inherit?: boolean;
}

const INHERIT_FIELD = `${WORKSPACE_KEYS.INHERIT_MARKER} = true`;

function serializeDependency(spec: DependencySpec): string {
  return formatTomlValue(toTomlValue(spec));
}

/**
 * Insert or overwrite every unified package in the root's shared table.
 */
export function patchWorkspaceDocument(document: TomlDocument, unified: UnifiedTable): void {
  const tablePath = [...SHARED_DEPENDENCIES_PATH];
  const additions: string[] = [];

  for (const [name, spec] of unified) {
    const entryPath = [...tablePath, name];
    const existing = document.findEntry(entryPath);
    if (existing) {
      document.replace(existing.value.start, existing.value.end, serializeDependency(spec));
      continue;
    }
    if (document.hasDescendants(entryPath)) {
      throw new UnsupportedEntryError(name, document.filePath, 'cannot overwrite a table-form shared entry');
    }
    additions.push(`${formatTomlKey(name)} = ${serializeDependency(spec)}`);
  }

  if (additions.length === 0) {
    return;
  }

  const eol = document.eol;
  const header = document.findTable(tablePath);
  if (header) {
    const last = header.entries[header.entries.length - 1];
    const offset = last ? last.lineEnd : header.lineEnd;
    document.insert(offset, additions.map(line => `${eol}${line}`).join(''));
    return;
  }

  const inline = document.findEntry(tablePath);
  if (inline && inline.value.kind === 'inline-table') {
    const lastChild = inline.value.entries[inline.value.entries.length - 1];
    if (lastChild) {
      document.insert(lastChild.value.end, additions.map(line => `, ${line}`).join(''));
    } else {
      document.replace(inline.value.start, inline.value.end, `{ ${additions.join(', ')} }`);
    }
    return;
  }
  if (inline) {
    throw new UnsupportedEntryError(tablePath.join('.'), document.filePath, `shared table is a ${inline.value.kind}`);
  }

  // `dependencies.serde = ...` under [workspace], or `workspace.dependencies.serde = ...`
  const lastDotted = document
    .dottedEntries(tablePath)
    .reduce<PlacedEntry | undefined>((last, item) => (!last || item.entry.start > last.entry.start ? item : last), undefined);
  if (lastDotted) {
    const prefix = tablePath.slice(lastDotted.base.length).map(formatTomlKey).join('.');
    document.insert(lastDotted.entry.lineEnd, additions.map(line => `${eol}${prefix}.${line}`).join(''));
    return;
  }

  const source = document.source;
  const lead = source.length === 0 ? '' : source.endsWith('\n') ? eol : `${eol}${eol}`;
  document.insert(
    source.length,
    `${lead}[${tablePath.join('.')}]${eol}${additions.join(eol)}${eol}`
  );
  logger.debug(`Created [${tablePath.join('.')}] in ${document.filePath}`);
}

function replaceVersionField(document: TomlDocument, versionEntry: TomlEntry, version: string, inherit: boolean): void {
  if (inherit) {
    document.replace(versionEntry.lastKeyStart, versionEntry.value.end, INHERIT_FIELD);
  } else {
    document.replace(versionEntry.value.start, versionEntry.value.end, formatTomlString(version));
  }
}

/**
 * Point every member entry of a unified package at the unified requirement.
 * Returns the names that were rewritten.
 */
export function patchMemberDocument(
  document: TomlDocument,
  unified: UnifiedTable,
  options: MemberPatchOptions = {}
): string[] {
  const inherit = options.inherit === true;
  const patched: string[] = [];

  for (const section of DEPENDENCY_SECTIONS) {
    const located = document.childKeys([section]);
    const declared = document.data[section];
    if (isTomlTable(declared)) {
      const missing = Object.keys(declared).find(name => unified.has(name) && !located.includes(name));
      if (missing !== undefined) {
        throw new ManifestParseError(document.filePath, `could not locate '${missing}' in [${section}]`);
      }
    }

    for (const name of located) {
      const spec = unified.get(name);
      if (!spec) continue;

      const version = dependencyVersion(spec);
      if (version === undefined) {
        logger.debug(`Unified '${name}' has no version; leaving ${section} in ${document.filePath} unchanged`);
        continue;
      }

      const entryPath = [section, name];
      const direct = document.findEntry(entryPath);

      if (direct && direct.value.kind === 'string') {
        const text = inherit ? `{ ${INHERIT_FIELD} }` : formatTomlString(version);
        document.replace(direct.value.start, direct.value.end, text);
        patched.push(name);
        continue;
      }

      if (direct && direct.value.kind !== 'inline-table') {
        throw new UnsupportedEntryError(name, document.filePath, `unexpected ${direct.value.kind} value`);
      }

      // Inline table, [section.name] sub-table or dotted keys
      const versionEntry = document.findEntry([...entryPath, WORKSPACE_KEYS.VERSION]);
      if (!versionEntry) {
        logger.debug(`'${name}' in ${document.filePath} has no version field to update`);
        continue;
      }
      replaceVersionField(document, versionEntry, version, inherit);
      patched.push(name);
    }
  }

  return patched;
}
