import { execFile } from 'child_process';
import { promisify } from 'util';

import { logger } from './logger.js';
import { DirtyWorkingTreeError } from './errors.js';

const execFileAsync = promisify(execFile);

/**
 * Runs git with `args` in `cwd` and resolves to its stdout.
 */
export type GitRunner = (args: string[], cwd: string) => Promise<string>;

export interface WorkingTreeStatus {
  /** Modified in the working tree, or untracked */
  dirty: string[];
  /** Changes recorded in the index */
  staged: string[];
}

export interface WorkingTreeCheckOptions {
  allowDirty?: boolean;
  allowStaged?: boolean;
}

export const runGit: GitRunner = async (args, cwd) => {
  const { stdout } = await execFileAsync('git', args, { cwd });
  return stdout;
};

/**
 * Split `git status --porcelain` output into staged and dirty paths.
 */
export function parsePorcelainStatus(output: string): WorkingTreeStatus {
  const status: WorkingTreeStatus = { dirty: [], staged: [] };

  for (const line of output.split(/\r?\n/)) {
    if (line.length < 4) continue;
    const index = line[0];
    const worktree = line[1];
    const file = line.slice(3);

    if (index === '?' && worktree === '?') {
      status.dirty.push(file);
      continue;
    }
    if (index !== ' ') {
      status.staged.push(file);
    }
    if (worktree !== ' ') {
      status.dirty.push(file);
    }
  }

  return status;
}

async function isInsideWorkTree(git: GitRunner, cwd: string): Promise<boolean> {
  try {
    const output = await git(['rev-parse', '--is-inside-work-tree'], cwd);
    return output.trim() === 'true';
  } catch (error) {
    logger.debug(`Not a git working tree: ${cwd}`, { error: error instanceof Error ? error.message : String(error) });
    return false;
  }
}

/**
 * Refuse to rewrite manifests on top of uncommitted work.
 *
 * `allowDirty` accepts any change; `allowStaged` accepts changes that are
 * only staged. Directories outside git are not checked.
 */
export async function assertCleanWorkingTree(
  cwd: string,
  options: WorkingTreeCheckOptions,
  git: GitRunner = runGit
): Promise<void> {
  if (options.allowDirty) {
    return;
  }
  if (!(await isInsideWorkTree(git, cwd))) {
    return;
  }

  const status = parsePorcelainStatus(await git(['status', '--porcelain'], cwd));

  if (status.dirty.length > 0) {
    throw new DirtyWorkingTreeError('dirty', status.dirty);
  }
  if (status.staged.length > 0 && !options.allowStaged) {
    throw new DirtyWorkingTreeError('staged', status.staged);
  }
}
