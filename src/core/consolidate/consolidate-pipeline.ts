/**
 * @fileoverview Main pipeline for the consolidate command
 *
 * Loads the workspace, unifies member dependencies, patches every document
 * in memory and only then writes the changed files.
 */

import path from 'path';

import { FILE_PATTERNS } from '../../constants/index.js';
import type { ExecutionContext } from '../../types/index.js';
import { FileSystemError } from '../../utils/errors.js';
import { commitTextFiles, exists, isDirectory } from '../../utils/fs.js';
import { assertCleanWorkingTree } from '../../utils/git-status.js';
import { logger } from '../../utils/logger.js';
import { dependencyVersion } from '../dependencies/dependency-spec.js';
import { collectNewDependencies, unifyDependencies } from '../dependencies/unify.js';
import { loadWorkspace } from '../manifest/manifest-loader.js';
import { parseToml } from '../toml/toml-document.js';
import { resolveOutput } from '../ports/resolve.js';
import { patchMemberDocument, patchWorkspaceDocument } from './document-patcher.js';
import { displayConsolidateSummary } from './consolidate-output.js';
import type { ConsolidateOptions, ConsolidatePlan, ConsolidateResult } from './consolidate-types.js';

/**
 * Resolve the root manifest path; a directory means its Cargo.toml.
 */
export async function resolveTargetManifest(target: string): Promise<string> {
  let manifestPath = path.resolve(target);
  if (await isDirectory(manifestPath)) {
    manifestPath = path.join(manifestPath, FILE_PATTERNS.CARGO_TOML);
  }
  if (!(await exists(manifestPath))) {
    throw new FileSystemError(`file/directory not found: ${manifestPath}`, { target });
  }
  return manifestPath;
}

/**
 * Compute the new content of every file the run touches, without writing.
 */
export async function planConsolidation(
  manifestPath: string,
  options: Pick<ConsolidateOptions, 'inherit'> = {}
): Promise<ConsolidatePlan> {
  const { model, documents } = await loadWorkspace(manifestPath);

  const groups = collectNewDependencies(model);
  const unified = unifyDependencies(groups);
  logger.debug(`Unified ${unified.size} dependencies across ${model.members.length} members`);

  const root = documents.get(model.manifestPath);
  if (root) {
    patchWorkspaceDocument(root, unified);
  }

  for (const member of model.members) {
    const document = documents.get(member.manifestPath);
    if (!document) continue;
    const patched = patchMemberDocument(document, unified, { inherit: options.inherit });
    if (patched.length > 0) {
      logger.debug(`Patched ${member.member}`, { dependencies: patched });
    }
  }

  // Every edited file must still be valid TOML before anything is written
  const files = new Map<string, string>();
  for (const [filePath, document] of documents) {
    if (document.modified) {
      const content = document.toString();
      parseToml(content, filePath);
      files.set(filePath, content);
    }
  }

  return { manifestPath: model.manifestPath, unified, files };
}

export async function runConsolidatePipeline(
  options: ConsolidateOptions,
  ctx: ExecutionContext = {}
): Promise<ConsolidateResult> {
  const manifestPath = await resolveTargetManifest(options.target);
  logger.debug(`Consolidating workspace: ${manifestPath}`);

  if (!options.dryRun) {
    await assertCleanWorkingTree(path.dirname(manifestPath), options, ctx.git);
  }

  const plan = await planConsolidation(manifestPath, { inherit: options.inherit });
  const dryRun = options.dryRun === true;

  if (!dryRun && plan.files.size > 0) {
    await commitTextFiles(plan.files);
  }

  const data = {
    manifestPath: plan.manifestPath,
    unified: plan.unified,
    changedFiles: [...plan.files.keys()],
    unversioned: [...plan.unified].filter(([, spec]) => dependencyVersion(spec) === undefined).map(([name]) => name),
    dryRun
  };
  displayConsolidateSummary(data, resolveOutput(ctx));

  return { success: true, data };
}
