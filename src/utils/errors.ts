import { UnifyError, ErrorCodes, CommandResult } from '../types/index.js';
import { logger } from './logger.js';

/**
 * Custom error classes for the failure modes of a consolidation run.
 * Every one of them is terminal for the run.
 */

export class MissingWorkspaceError extends UnifyError {
  constructor(manifestPath: string) {
    super(`No [workspace] table was found in ${manifestPath}`, ErrorCodes.MISSING_WORKSPACE, { manifestPath });
    this.name = 'MissingWorkspaceError';
  }
}

export class ManifestParseError extends UnifyError {
  constructor(manifestPath: string, reason: string) {
    super(`Failed to parse ${manifestPath}: ${reason}`, ErrorCodes.MANIFEST_PARSE_ERROR, { manifestPath, reason });
    this.name = 'ManifestParseError';
  }
}

export class VersionRequirementError extends UnifyError {
  constructor(requirement: string, reason: string) {
    super(`Invalid version requirement "${requirement}": ${reason}`, ErrorCodes.VERSION_REQUIREMENT_ERROR, {
      requirement,
      reason
    });
    this.name = 'VersionRequirementError';
  }
}

export class InheritedDependencyError extends UnifyError {
  constructor(packageName?: string) {
    const subject = packageName ? `'${packageName}'` : 'dependency';
    super(
      `Inherited dependency ${subject} is not declared in [workspace.dependencies]`,
      ErrorCodes.INHERITED_DEPENDENCY,
      { packageName }
    );
    this.name = 'InheritedDependencyError';
  }
}

export class UnsupportedEntryError extends UnifyError {
  constructor(packageName: string, documentPath: string, shape: string) {
    super(
      `Unsupported entry for '${packageName}' in ${documentPath}: ${shape}`,
      ErrorCodes.UNSUPPORTED_ENTRY,
      { packageName, documentPath, shape }
    );
    this.name = 'UnsupportedEntryError';
  }
}

export class FileSystemError extends UnifyError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`File system error: ${message}`, ErrorCodes.FILE_SYSTEM_ERROR, details);
    this.name = 'FileSystemError';
  }
}

export class DirtyWorkingTreeError extends UnifyError {
  constructor(kind: 'dirty' | 'staged', files: string[]) {
    const flag = kind === 'dirty' ? '--allow-dirty' : '--allow-staged';
    const label = kind === 'dirty' ? 'uncommitted changes' : 'staged changes';
    super(
      `The working tree has ${label} (${files.join(', ')}); commit them or pass ${flag}`,
      ErrorCodes.DIRTY_WORKING_TREE,
      { kind, files }
    );
    this.name = 'DirtyWorkingTreeError';
  }
}

/**
 * Error handler function that provides consistent error handling across commands
 */
export function handleError(error: unknown): CommandResult {
  if (error instanceof UnifyError) {
    logger.debug(error.message, { code: error.code, details: error.details });
    return {
      success: false,
      error: error.message
    };
  } else if (error instanceof Error) {
    logger.debug('Unexpected error occurred', { message: error.message, stack: error.stack });
    return {
      success: false,
      error: error.message
    };
  } else {
    logger.debug('Unknown error occurred', { error });
    return {
      success: false,
      error: 'An unknown error occurred'
    };
  }
}

/**
 * Wraps an async function with error handling for Commander.js actions
 */
export function withErrorHandling<T extends unknown[]>(
  fn: (...args: T) => Promise<void>
): (...args: T) => Promise<void> {
  return async (...args: T): Promise<void> => {
    try {
      await fn(...args);
    } catch (error) {
      const result = handleError(error);
      console.error(result.error);
      process.exit(1);
    }
  };
}
