import { AppError, ErrorCode, isTransportError } from './types';

describe('AppError', () => {
  it('sets fields correctly via constructor', () => {
    const err = new AppError('test message', ErrorCode.AUTH_FAILED, { key: 'val' }, true);
    expect(err.message).toBe('test message');
    expect(err.code).toBe(ErrorCode.AUTH_FAILED);
    expect(err.details).toEqual({ key: 'val' });
    expect(err.isRecoverable).toBe(true);
    expect(err.name).toBe('AppError');
  });

  it('is an instance of Error', () => {
    const err = new AppError('msg', ErrorCode.UNKNOWN_ERROR);
    expect(err).toBeInstanceOf(Error);
  });

  it('defaults isRecoverable to false', () => {
    const err = new AppError('msg', ErrorCode.UNKNOWN_ERROR);
    expect(err.isRecoverable).toBe(false);
  });
});

describe('toUserMessage', () => {
  it('returns non-empty string for all ErrorCode values', () => {
    for (const code of Object.values(ErrorCode)) {
      const msg = new AppError('', code).toUserMessage();
      expect(msg.length).toBeGreaterThan(0);
    }
  });

  it('explains a server proof mismatch', () => {
    const err = new AppError('x', ErrorCode.SERVER_PROOF_MISMATCH);
    expect(err.toUserMessage()).toBe(
      'The server could not prove it knows your password. Authentication was aborted.'
    );
  });

  it('names the unsupported auth version', () => {
    const err = new AppError('x', ErrorCode.UNSUPPORTED_AUTH_VERSION, { version: 1 });
    expect(err.toUserMessage()).toBe('Unsupported auth version: 1');
  });

  it('keeps the message of a validation error', () => {
    const err = new AppError('Client ID must not be empty', ErrorCode.VALIDATION_ERROR);
    expect(err.toUserMessage()).toBe('Client ID must not be empty');
  });

  it('falls back to the message for UNKNOWN_ERROR', () => {
    const err = new AppError('something odd', ErrorCode.UNKNOWN_ERROR);
    expect(err.toUserMessage()).toBe('something odd');
  });
});

describe('getRecoverySuggestion', () => {
  it('points at login for credential errors', () => {
    expect(new AppError('x', ErrorCode.INVALID_CREDENTIALS).getRecoverySuggestion()).toBe('Run: mail-auth login');
    expect(new AppError('x', ErrorCode.NOT_AUTHENTICATED).getRecoverySuggestion()).toBe('Run: mail-auth login');
  });

  it('warns against retrying on integrity failures', () => {
    for (const code of [ErrorCode.INVALID_MODULUS, ErrorCode.INVALID_SERVER_EPHEMERAL, ErrorCode.SERVER_PROOF_MISMATCH]) {
      expect(new AppError('x', code).getRecoverySuggestion()).toBe(
        'Check the API URL you are connecting to; do not retry on an untrusted network'
      );
    }
  });

  it('returns null for codes without a suggestion', () => {
    expect(new AppError('x', ErrorCode.INVALID_STATE).getRecoverySuggestion()).toBeNull();
  });
});

describe('isTransportError', () => {
  it('is true for HTTP-layer codes', () => {
    expect(isTransportError(new AppError('x', ErrorCode.TIMEOUT))).toBe(true);
    expect(isTransportError(new AppError('x', ErrorCode.INVALID_CREDENTIALS))).toBe(true);
  });

  it('is false for protocol and key errors', () => {
    expect(isTransportError(new AppError('x', ErrorCode.SERVER_PROOF_MISMATCH))).toBe(false);
    expect(isTransportError(new AppError('x', ErrorCode.DECRYPTION_FAILED))).toBe(false);
  });

  it('is false for plain errors', () => {
    expect(isTransportError(new Error('x'))).toBe(false);
  });
});
