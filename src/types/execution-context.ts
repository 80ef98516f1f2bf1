/**
 * Execution Context Types
 *
 * Carries the port interfaces a command run needs, so the same core logic
 * can be driven by the CLI or by tests.
 */

import type { OutputPort } from '../core/ports/output.js';
import type { GitRunner } from '../utils/git-status.js';

export interface ExecutionContext {
  /**
   * User-facing output. Falls back to plain console output when absent.
   */
  output?: OutputPort;

  /**
   * Runs git for the working-tree check. Falls back to the git binary.
   */
  git?: GitRunner;
}
