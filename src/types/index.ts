/**
 * Common types and interfaces for the cargo-unify CLI application
 */

export * from './execution-context.js';
export * from './dependencies.js';

export interface CommandResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
}

// Error types
export class UnifyError extends Error {
  public code: string;
  public details?: Record<string, unknown>;

  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'UnifyError';
    this.code = code;
    this.details = details;
  }
}

export enum ErrorCodes {
  MISSING_WORKSPACE = 'MISSING_WORKSPACE',
  MANIFEST_PARSE_ERROR = 'MANIFEST_PARSE_ERROR',
  VERSION_REQUIREMENT_ERROR = 'VERSION_REQUIREMENT_ERROR',
  INHERITED_DEPENDENCY = 'INHERITED_DEPENDENCY',
  UNSUPPORTED_ENTRY = 'UNSUPPORTED_ENTRY',
  FILE_SYSTEM_ERROR = 'FILE_SYSTEM_ERROR',
  DIRTY_WORKING_TREE = 'DIRTY_WORKING_TREE'
}

// Logger types
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

export interface Logger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}
