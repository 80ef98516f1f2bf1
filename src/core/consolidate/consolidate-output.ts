/**
 * @fileoverview Output formatting and display for the consolidate command
 */

import path from 'path';

import { SHARED_DEPENDENCIES_PATH } from '../../constants/index.js';
import { formatPathForDisplay } from '../../utils/formatters.js';
import { toTomlValue } from '../dependencies/dependency-spec.js';
import { formatTomlKey, formatTomlValue } from '../toml/toml-document.js';
import type { OutputPort } from '../ports/output.js';
import type { ConsolidateData } from './consolidate-types.js';

/**
 * One `name = value` line per unified dependency, as written to the root.
 */
export function formatUnifiedLines(data: Pick<ConsolidateData, 'unified'>): string[] {
  return [...data.unified].map(([name, spec]) => `${formatTomlKey(name)} = ${formatTomlValue(toTomlValue(spec))}`);
}

export function displayConsolidateSummary(data: ConsolidateData, out: OutputPort): void {
  if (data.unified.size === 0) {
    out.info('No member dependencies to consolidate.');
    return;
  }

  const table = `[${SHARED_DEPENDENCIES_PATH.join('.')}]`;
  out.note(formatUnifiedLines(data).join('\n'), `${table} (${data.unified.size} added)`);

  for (const name of data.unversioned) {
    out.warn(`'${name}' has no version requirement; member entries were left unchanged`);
  }

  const rootDir = path.dirname(data.manifestPath);
  const files = data.changedFiles.map(file => `  ${formatPathForDisplay(file, rootDir)}`).join('\n');

  if (data.dryRun) {
    out.info(`Dry run: ${data.changedFiles.length} manifest(s) would change`);
    out.info(files);
  } else {
    out.success(`Updated ${data.changedFiles.length} manifest(s)`);
    out.info(files);
  }
}
