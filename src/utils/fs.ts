import { promises as fs, constants as fsConstants } from 'fs';
import { join, dirname, basename } from 'path';
import { logger } from './logger.js';
import { FileSystemError } from './errors.js';
import { FILE_PATTERNS } from '../constants/index.js';

/**
 * File system utilities with proper error handling
 */

/**
 * Check if a file or directory exists
 */
export async function exists(path: string): Promise<boolean> {
  try {
    await fs.access(path, fsConstants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Check if a path is a directory
 */
export async function isDirectory(path: string): Promise<boolean> {
  try {
    const stats = await fs.stat(path);
    return stats.isDirectory();
  } catch {
    return false;
  }
}

/**
 * Read a file as text
 */
export async function readTextFile(path: string, encoding: BufferEncoding = 'utf8'): Promise<string> {
  try {
    return await fs.readFile(path, encoding);
  } catch (error) {
    throw new FileSystemError(`Failed to read file: ${path}`, { path, error });
  }
}

/**
 * Write text to a file
 */
export async function writeTextFile(path: string, content: string, encoding: BufferEncoding = 'utf8'): Promise<void> {
  try {
    await fs.writeFile(path, content, encoding);
    logger.debug(`Wrote file: ${path}`);
  } catch (error) {
    throw new FileSystemError(`Failed to write file: ${path}`, { path, error });
  }
}

/**
 * List directories in a directory (non-recursive)
 */
export async function listDirectories(dirPath: string): Promise<string[]> {
  try {
    const entries = await fs.readdir(dirPath, { withFileTypes: true });
    return entries
      .filter(entry => entry.isDirectory())
      .map(entry => entry.name);
  } catch (error) {
    throw new FileSystemError(`Failed to list directories in directory: ${dirPath}`, { dirPath, error });
  }
}

/**
 * Write a set of files so that none is replaced before all have been staged.
 *
 * Each file is first written next to its target, then the staged copies are
 * renamed over the targets. A failure while staging removes the staged copies
 * and leaves every target untouched.
 */
export async function commitTextFiles(files: ReadonlyMap<string, string>): Promise<void> {
  const staged: Array<{ tempPath: string; path: string }> = [];

  try {
    for (const [path, content] of files) {
      const tempPath = join(dirname(path), `.${basename(path)}${FILE_PATTERNS.TEMP_SUFFIX}`);
      await writeTextFile(tempPath, content);
      staged.push({ tempPath, path });
    }
  } catch (error) {
    await Promise.all(staged.map(({ tempPath }) => fs.rm(tempPath, { force: true })));
    throw error;
  }

  for (const { tempPath, path } of staged) {
    try {
      await fs.rename(tempPath, path);
      logger.debug(`Committed: ${path}`);
    } catch (error) {
      throw new FileSystemError(`Failed to replace ${path}`, { path, tempPath, error });
    }
  }
}
