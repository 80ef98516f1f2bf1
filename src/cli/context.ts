/**
 * CLI Context Factory
 *
 * Creates ExecutionContext instances with CLI-specific port implementations.
 */

import type { ExecutionContext } from '../types/execution-context.js';
import { consoleOutput } from '../core/ports/console-output.js';
import { createClackOutput } from './clack-output-adapter.js';

/** Detect whether the current session is interactive (TTY, no CI). */
export function detectInteractive(override?: boolean): boolean {
  if (override !== undefined) return override;
  return process.stdout.isTTY === true && process.env.CI !== 'true';
}

/**
 * In interactive mode (TTY) output goes through Clack; otherwise plain console.
 */
export function createCliExecutionContext(options: { interactive?: boolean } = {}): ExecutionContext {
  return {
    output: detectInteractive(options.interactive) ? createClackOutput() : consoleOutput
  };
}
