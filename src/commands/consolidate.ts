/**
 * @fileoverview Command setup for 'cargo-unify'
 *
 * Moves member dependencies into [workspace.dependencies].
 */

import path from 'path';
import { Command } from 'commander';

import { FILE_PATTERNS } from '../constants/index.js';
import { LogLevel } from '../types/index.js';
import { withErrorHandling } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { createCliExecutionContext } from '../cli/context.js';
import { runConsolidatePipeline } from '../core/consolidate/consolidate-pipeline.js';

interface ConsolidateCommandOptions {
  allowDirty?: boolean;
  allowStaged?: boolean;
  inherit?: boolean;
  dryRun?: boolean;
  verbose?: boolean;
}

/**
 * Configure the root program as the consolidate command
 */
export function setupConsolidateCommand(program: Command): void {
  program
    .argument('[target]', 'target Cargo.toml workspace to consolidate', path.join(process.cwd(), FILE_PATTERNS.CARGO_TOML))
    .option('--allow-dirty', 'consolidate even if the working directory is dirty', false)
    .option('--allow-staged', 'consolidate even if the working directory has staged changes', false)
    .option('--inherit', 'replace member requirements with `workspace = true`', false)
    .option('--dry-run', 'show what would change without writing', false)
    .option('--verbose', 'print debug logs', false)
    .action(
      withErrorHandling(async (target: string, options: ConsolidateCommandOptions) => {
        if (options.verbose) {
          logger.setLevel(LogLevel.DEBUG);
        }
        const result = await runConsolidatePipeline(
          {
            target,
            allowDirty: options.allowDirty,
            allowStaged: options.allowStaged,
            inherit: options.inherit,
            dryRun: options.dryRun
          },
          createCliExecutionContext()
        );
        if (!result.success) {
          throw new Error(result.error || 'Consolidation failed');
        }
      })
    );
}
