import chalk from 'chalk';
import { AppError, ErrorCode } from './types';
import { HttpClientError, isHttpClientError } from '../api/http-client';

// API codes that mean the username/password pair was rejected
const WRONG_CREDENTIALS_API_CODES: ReadonlySet<number> = new Set([8002]);

/**
 * Pull `{ Code, Error }` out of an API error body, when it has one
 */
export function readApiError(data: unknown): { apiCode?: number; apiMessage?: string } {
  if (typeof data !== 'object' || data === null) {
    return {};
  }
  const apiCode = 'Code' in data && typeof data.Code === 'number' ? data.Code : undefined;
  const apiMessage = 'Error' in data && typeof data.Error === 'string' ? data.Error : undefined;
  return { apiCode, apiMessage };
}

/**
 * Map HTTP client errors to app errors. The server's own message is kept
 * verbatim when it sent one.
 */
export function mapHttpError(error: HttpClientError): AppError {
  // No response - network error
  if (!error.response) {
    if (error.code === 'ECONNREFUSED') {
      return new AppError(
        'Connection refused',
        ErrorCode.CONNECTION_REFUSED,
        { originalError: error.message },
        true
      );
    }
    if (error.code === 'ETIMEDOUT' || error.code === 'ECONNABORTED') {
      return new AppError(
        'Request timed out',
        ErrorCode.TIMEOUT,
        { originalError: error.message },
        true
      );
    }
    if (error.code === 'ERR_CANCELED') {
      return new AppError('Request aborted', ErrorCode.OPERATION_CANCELLED);
    }
    return new AppError(
      'Network error',
      ErrorCode.NETWORK_ERROR,
      { originalError: error.message, originalCode: error.code },
      true
    );
  }

  const statusCode = error.response.status;
  const { apiCode, apiMessage } = readApiError(error.response.data);

  if (apiCode !== undefined && WRONG_CREDENTIALS_API_CODES.has(apiCode)) {
    return new AppError(
      apiMessage || 'Incorrect login credentials',
      ErrorCode.INVALID_CREDENTIALS,
      { statusCode, apiCode },
      false
    );
  }

  if (statusCode === 401) {
    return new AppError(
      apiMessage || 'Authentication failed',
      ErrorCode.AUTH_FAILED,
      { statusCode, apiCode },
      false
    );
  }

  if (statusCode === 429) {
    const retryAfter = error.response.headers['retry-after'] || '60';
    return new AppError(
      apiMessage || 'Rate limited',
      ErrorCode.RATE_LIMITED,
      { statusCode, apiCode, retryAfter },
      true
    );
  }

  if (statusCode >= 500) {
    return new AppError(
      apiMessage || 'Server error',
      ErrorCode.API_ERROR,
      { statusCode, apiCode },
      true // Server errors are recoverable (might be temporary)
    );
  }

  return new AppError(
    apiMessage || error.message || 'API request failed',
    ErrorCode.API_ERROR,
    { statusCode, apiCode },
    false
  );
}

/**
 * Convert any error to AppError
 */
export function toAppError(error: unknown): AppError {
  // Already an AppError
  if (error instanceof AppError) {
    return error;
  }

  if (isHttpClientError(error)) {
    return mapHttpError(error);
  }

  // Generic Error
  if (error instanceof Error) {
    if (error.name === 'AbortError') {
      return new AppError('Operation cancelled', ErrorCode.OPERATION_CANCELLED);
    }
    return new AppError(
      error.message,
      ErrorCode.UNKNOWN_ERROR,
      { originalError: error.name },
      false
    );
  }

  // Unknown error type
  return new AppError(
    String(error),
    ErrorCode.UNKNOWN_ERROR,
    {},
    false
  );
}

/**
 * Handle and format error for CLI display
 */
export function handleError(error: unknown, debug: boolean = false): void {
  const appError = toAppError(error);

  // Display main error message
  console.error(chalk.red.bold('\n✗ Error:'), appError.toUserMessage());

  // Show recovery suggestion
  const suggestion = appError.getRecoverySuggestion();
  if (suggestion) {
    console.error(chalk.yellow('\n💡 Suggestion:'), suggestion);
  }

  // Show recovery hint for temporary errors
  if (appError.isRecoverable && !suggestion) {
    console.error(chalk.yellow('\n💡 This error may be temporary. Please try again.'));
  }

  // Show details in debug mode
  if (debug) {
    console.error(chalk.dim('\n📋 Debug Information:'));
    console.error(chalk.dim('  Error Code:'), appError.code);
    console.error(chalk.dim('  Technical Message:'), appError.message);
    console.error(chalk.dim('  Recoverable:'), appError.isRecoverable);

    if (appError.details && Object.keys(appError.details).length > 0) {
      console.error(chalk.dim('  Details:'));
      console.error(chalk.dim(JSON.stringify(appError.details, null, 4)));
    }

    if (appError.stack) {
      console.error(chalk.dim('\n📚 Stack Trace:'));
      console.error(chalk.dim(appError.stack));
    }
  } else {
    console.error(chalk.dim('\n💻 Run with --debug for detailed error information'));
  }
}
