import chalk from 'chalk';
import { AppError, ErrorCode } from './types';

interface ErrorLike {
  message: string;
  name?: unknown;
  code?: unknown;
  path?: unknown;
}

/**
 * Structural check rather than `instanceof Error`: errors raised by Node's
 * own modules can come from another realm (Jest's sandbox, vm contexts).
 */
function isErrorLike(error: unknown): error is ErrorLike {
  return typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string';
}

/**
 * Convert any error to AppError.
 *
 * Store and mapping failures are wrapped where they happen, so anything
 * else reaching this point is unexpected and reported as such.
 */
export function toAppError(error: unknown): AppError {
  // Already an AppError
  if (error instanceof AppError) {
    return error;
  }

  if (isErrorLike(error)) {
    return new AppError(
      error.message || 'System error',
      ErrorCode.UNKNOWN_ERROR,
      {
        originalError: typeof error.name === 'string' ? error.name : undefined,
        originalCode: typeof error.code === 'string' ? error.code : undefined,
        path: typeof error.path === 'string' ? error.path : undefined,
      },
    );
  }

  // Unknown error type
  return new AppError(String(error), ErrorCode.UNKNOWN_ERROR);
}

/**
 * Report an error on stderr.
 *
 * Git only reads stdout of a credential helper, so this is the one channel
 * a failure reaches the user through. Stack traces are printed in debug mode
 * only.
 */
export function handleError(error: unknown, debug: boolean = false): void {
  const appError = toAppError(error);

  console.error(chalk.red.bold('✗ Error:'), appError.toUserMessage());

  const suggestion = appError.getRecoverySuggestion();
  if (suggestion) {
    console.error(chalk.yellow('  Suggestion:'), suggestion);
  }

  if (debug) {
    console.error(chalk.dim('  Error Code:'), appError.code);
    console.error(chalk.dim('  Technical Message:'), appError.message);

    if (appError.details && Object.keys(appError.details).length > 0) {
      console.error(chalk.dim('  Details:'));
      console.error(chalk.dim(JSON.stringify(appError.details, null, 4)));
    }

    if (appError.stack) {
      console.error(chalk.dim('  Stack Trace:'));
      console.error(chalk.dim(appError.stack));
    }
  }
}
