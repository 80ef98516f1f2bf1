import type { CommandResult, UnifiedTable } from '../../types/index.js';

export interface ConsolidateOptions {
  /** Root Cargo.toml, or the directory holding it */
  target: string;
  allowDirty?: boolean;
  allowStaged?: boolean;
  /** Point members at the shared value with `workspace = true` */
  inherit?: boolean;
  /** Compute every change but write nothing */
  dryRun?: boolean;
}

export interface ConsolidatePlan {
  manifestPath: string;
  unified: UnifiedTable;
  /** New content by absolute path, only for files that changed */
  files: Map<string, string>;
}

export interface ConsolidateData {
  manifestPath: string;
  unified: UnifiedTable;
  /** Absolute paths of the changed files, root first */
  changedFiles: string[];
  /** Unified packages without a version; their member entries are left as they are */
  unversioned: string[];
  dryRun: boolean;
}

export type ConsolidateResult = CommandResult<ConsolidateData>;
