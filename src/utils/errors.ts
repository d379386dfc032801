import { FeatureClosureError, ErrorCodes, CommandResult } from '../types/index.js';
import { logger } from './logger.js';

/**
 * Error classes for the failure kinds of coordinate normalization,
 * descriptor loading and artifact resolution
 */

export class MalformedLocationError extends FeatureClosureError {
  constructor(location: string, reason: string) {
    super(`Malformed location '${location}': ${reason}`, ErrorCodes.MALFORMED_LOCATION, { location, reason });
    this.name = 'MalformedLocationError';
  }
}

export class DescriptorNotFoundError extends FeatureClosureError {
  constructor(path: string, cause?: unknown) {
    super(`Descriptor '${path}' not found`, ErrorCodes.DESCRIPTOR_NOT_FOUND, { path, cause });
    this.name = 'DescriptorNotFoundError';
  }
}

export class MalformedDescriptorError extends FeatureClosureError {
  constructor(source: string, reason: string) {
    super(`Invalid descriptor ${source}: ${reason}`, ErrorCodes.MALFORMED_DESCRIPTOR, { source, reason });
    this.name = 'MalformedDescriptorError';
  }
}

export class UnresolvableCoordinateError extends FeatureClosureError {
  constructor(coordinate: string, reason: string, details?: Record<string, unknown>) {
    super(`Cannot resolve '${coordinate}': ${reason}`, ErrorCodes.UNRESOLVABLE_COORDINATE, { coordinate, ...details });
    this.name = 'UnresolvableCoordinateError';
  }
}

export class FileSystemError extends FeatureClosureError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`File system error: ${message}`, ErrorCodes.FILE_SYSTEM_ERROR, details);
    this.name = 'FileSystemError';
  }
}

export class ValidationError extends FeatureClosureError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`Validation error: ${message}`, ErrorCodes.VALIDATION_ERROR, details);
    this.name = 'ValidationError';
  }
}

export class ConfigError extends FeatureClosureError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.CONFIG_ERROR, details);
    this.name = 'ConfigError';
  }
}

/**
 * Error handler function that provides consistent error handling across commands
 */
export function handleError(error: unknown): CommandResult {
  if (error instanceof FeatureClosureError) {
    // Details only surface in verbose mode
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
