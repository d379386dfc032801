/**
 * Common types and interfaces for the feature-closure CLI and library
 */

export * from './descriptor.js';

// Core application types
export interface FeatureClosureDirectories {
  config: string;
}

export interface FeatureClosureConfig {
  /**
   * Root of the Maven-layout repository artifacts are resolved from.
   * Supports a leading `~` for the home directory.
   */
  localRepository?: string;
}

export interface CommandResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  warnings?: string[];
}

// Error types
export class FeatureClosureError extends Error {
  public code: string;
  public details?: Record<string, unknown>;

  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'FeatureClosureError';
    this.code = code;
    this.details = details;
  }
}

export enum ErrorCodes {
  MALFORMED_LOCATION = 'MALFORMED_LOCATION',
  DESCRIPTOR_NOT_FOUND = 'DESCRIPTOR_NOT_FOUND',
  MALFORMED_DESCRIPTOR = 'MALFORMED_DESCRIPTOR',
  UNRESOLVABLE_COORDINATE = 'UNRESOLVABLE_COORDINATE',
  FILE_SYSTEM_ERROR = 'FILE_SYSTEM_ERROR',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  CONFIG_ERROR = 'CONFIG_ERROR'
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
