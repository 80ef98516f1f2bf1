import { relative, isAbsolute } from 'path';

/**
 * Formatting utilities for consistent display across commands
 */

/**
 * Format a file system path for display to the user: relative to `cwd`
 * when it lies inside it, absolute otherwise.
 *
 * @example
 * formatPathForDisplay('/work/ws/crates/a/Cargo.toml', '/work/ws') // => 'crates/a/Cargo.toml'
 */
export function formatPathForDisplay(path: string, cwd: string): string {
  if (!isAbsolute(path)) {
    return path;
  }

  const relativePath = relative(cwd, path);
  if (relativePath && !relativePath.startsWith('..') && !isAbsolute(relativePath)) {
    return relativePath;
  }

  return path;
}
