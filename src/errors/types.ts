/**
 * Error codes for different error scenarios
 */
export enum ErrorCode {
  // Transport errors
  NETWORK_ERROR = 'NETWORK_ERROR',
  TIMEOUT = 'TIMEOUT',
  CONNECTION_REFUSED = 'CONNECTION_REFUSED',
  API_ERROR = 'API_ERROR',
  AUTH_FAILED = 'AUTH_FAILED',
  INVALID_CREDENTIALS = 'INVALID_CREDENTIALS',
  RATE_LIMITED = 'RATE_LIMITED',

  // SRP protocol integrity
  INVALID_MODULUS = 'INVALID_MODULUS',
  INVALID_SERVER_EPHEMERAL = 'INVALID_SERVER_EPHEMERAL',
  SERVER_PROOF_MISMATCH = 'SERVER_PROOF_MISMATCH',
  UNSUPPORTED_AUTH_VERSION = 'UNSUPPORTED_AUTH_VERSION',

  // Key unlock
  MALFORMED_KEY_RING = 'MALFORMED_KEY_RING',
  MALFORMED_KEY_SALT = 'MALFORMED_KEY_SALT',
  DECRYPTION_FAILED = 'DECRYPTION_FAILED',

  // Generic
  INVALID_STATE = 'INVALID_STATE',
  NOT_AUTHENTICATED = 'NOT_AUTHENTICATED',
  OPERATION_CANCELLED = 'OPERATION_CANCELLED',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  UNKNOWN_ERROR = 'UNKNOWN_ERROR',
}

const TRANSPORT_CODES: ReadonlySet<ErrorCode> = new Set([
  ErrorCode.NETWORK_ERROR,
  ErrorCode.TIMEOUT,
  ErrorCode.CONNECTION_REFUSED,
  ErrorCode.API_ERROR,
  ErrorCode.AUTH_FAILED,
  ErrorCode.INVALID_CREDENTIALS,
  ErrorCode.RATE_LIMITED,
]);

/**
 * Custom application error class with error codes and recovery hints
 */
export class AppError extends Error {
  constructor(
    message: string,
    public code: ErrorCode,
    public details?: Record<string, unknown>,
    public isRecoverable: boolean = false
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert to user-friendly message
   */
  toUserMessage(): string {
    switch (this.code) {
      case ErrorCode.NETWORK_ERROR:
        return 'Network connection failed. Please check your internet connection and try again.';

      case ErrorCode.TIMEOUT:
        return 'Request timed out. The server took too long to respond.';

      case ErrorCode.CONNECTION_REFUSED:
        return 'Connection refused. The server may be down or unreachable.';

      case ErrorCode.AUTH_FAILED:
        return 'Authentication failed. Please check your credentials and try again.';

      case ErrorCode.INVALID_CREDENTIALS:
        return 'Invalid username or password. Please check your credentials.';

      case ErrorCode.RATE_LIMITED:
        return this.message || 'Too many requests. Please try again later.';

      case ErrorCode.INVALID_MODULUS:
        return 'The server sent SRP parameters that could not be verified. Authentication was aborted.';

      case ErrorCode.INVALID_SERVER_EPHEMERAL:
        return 'The server sent an invalid SRP challenge. Authentication was aborted.';

      case ErrorCode.SERVER_PROOF_MISMATCH:
        return 'The server could not prove it knows your password. Authentication was aborted.';

      case ErrorCode.UNSUPPORTED_AUTH_VERSION:
        return `Unsupported auth version: ${String(this.details?.version ?? 'unknown')}`;

      case ErrorCode.MALFORMED_KEY_RING:
        return 'Your private key could not be read.';

      case ErrorCode.MALFORMED_KEY_SALT:
        return 'The key salt sent by the server is malformed.';

      case ErrorCode.DECRYPTION_FAILED:
        return 'Could not unlock your private key. The password may be wrong.';

      case ErrorCode.NOT_AUTHENTICATED:
        return 'Not logged in.';

      case ErrorCode.OPERATION_CANCELLED:
        return 'Operation cancelled by user.';

      case ErrorCode.VALIDATION_ERROR:
        return this.message || 'Validation error. Please check your input.';

      default:
        return this.message || 'An unknown error occurred.';
    }
  }

  /**
   * Get recovery suggestion for the error
   */
  getRecoverySuggestion(): string | null {
    switch (this.code) {
      case ErrorCode.AUTH_FAILED:
      case ErrorCode.INVALID_CREDENTIALS:
      case ErrorCode.NOT_AUTHENTICATED:
        return 'Run: mail-auth login';

      case ErrorCode.NETWORK_ERROR:
      case ErrorCode.TIMEOUT:
      case ErrorCode.CONNECTION_REFUSED:
        return 'Check your internet connection and try again';

      case ErrorCode.RATE_LIMITED:
        return 'Wait a few moments before trying again';

      case ErrorCode.DECRYPTION_FAILED:
        return 'Re-enter your password (the mailbox password in two-password mode)';

      case ErrorCode.INVALID_MODULUS:
      case ErrorCode.INVALID_SERVER_EPHEMERAL:
      case ErrorCode.SERVER_PROOF_MISMATCH:
        return 'Check the API URL you are connecting to; do not retry on an untrusted network';

      default:
        return null;
    }
  }
}

/**
 * True for errors that came from the HTTP/JSON layer rather than from SRP or key handling.
 */
export function isTransportError(error: unknown): error is AppError {
  return error instanceof AppError && TRANSPORT_CODES.has(error.code);
}
