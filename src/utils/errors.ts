import { LabsetupError, ErrorCodes, CommandResult } from '../types/index.js';
import { logger } from './logger.js';

/**
 * Custom error classes for different types of errors in the labsetup CLI
 */

export class UnknownUnitError extends LabsetupError {
  constructor(unitName: string) {
    super(`Unknown unit '${unitName}'`, ErrorCodes.UNKNOWN_UNIT, { unitName });
    this.name = 'UnknownUnitError';
  }
}

export class InstallFailureError extends LabsetupError {
  constructor(unitName: string, cause: Error) {
    super(`Failed to install '${unitName}': ${cause.message}`, ErrorCodes.INSTALL_FAILURE, { unitName, cause });
    this.name = 'InstallFailureError';
  }
}

export class CheckFailureError extends LabsetupError {
  constructor(unitName: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Check for '${unitName}' failed: ${reason}`, ErrorCodes.CHECK_FAILURE, { unitName, cause });
    this.name = 'CheckFailureError';
  }
}

export class CatalogError extends LabsetupError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`Invalid catalog: ${message}`, ErrorCodes.CATALOG_ERROR, details);
    this.name = 'CatalogError';
  }
}

export class CommandFailedError extends LabsetupError {
  constructor(commandLine: string, exitCode: number, stderr: string) {
    const detail = stderr.trim();
    super(
      `Command '${commandLine}' exited with status ${exitCode}${detail ? `: ${detail}` : ''}`,
      ErrorCodes.COMMAND_FAILED,
      { commandLine, exitCode }
    );
    this.name = 'CommandFailedError';
  }
}

export class FileSystemError extends LabsetupError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`File system error: ${message}`, ErrorCodes.FILE_SYSTEM_ERROR, details);
  }
}

export class ValidationError extends LabsetupError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`Validation error: ${message}`, ErrorCodes.VALIDATION_ERROR, details);
  }
}

export class ConfigError extends LabsetupError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.CONFIG_ERROR, details);
  }
}

export class UserCancellationError extends Error {
  constructor(message: string = 'Operation cancelled by user') {
    super(message);
    this.name = 'UserCancellationError';
  }
}

/**
 * Normalize anything thrown into an Error instance
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Error handler function that provides consistent error handling across commands
 */
export function handleError(error: unknown): CommandResult {
  if (error instanceof LabsetupError) {
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
      if (error instanceof UserCancellationError) {
        process.exit(0);
      }

      const result = handleError(error);
      console.error(result.error);
      process.exit(1);
    }
  };
}
