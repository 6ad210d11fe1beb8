/**
 * Explicit conversions from transport DTOs to the domain values callers see.
 * Nothing protocol-only (Code, ServerProof) survives the mapping.
 */

import {
  AuthInfo,
  AuthInfoResponse,
  AuthResponse,
  PasswordMode,
  RefreshResponse,
  SessionCredentials,
} from '../types/auth';
import { AppError, ErrorCode } from '../errors/types';

function incomplete(what: string, missing: string[]): AppError {
  return new AppError(`Incomplete ${what} response: missing ${missing.join(', ')}`, ErrorCode.API_ERROR, { missing });
}

function missingFields<T extends object>(data: T, fields: (keyof T & string)[]): string[] {
  return fields.filter((field) => {
    const value = data[field];
    return value === undefined || value === null || value === '';
  });
}

export function toPasswordMode(value: number): PasswordMode {
  switch (value) {
    case PasswordMode.Single:
      return PasswordMode.Single;
    case PasswordMode.Two:
      return PasswordMode.Two;
    default:
      throw new AppError(`Unknown password mode: ${value}`, ErrorCode.API_ERROR, { passwordMode: value });
  }
}

export function toAuthInfo(username: string, data: AuthInfoResponse): AuthInfo {
  const missing = missingFields(data, ['Modulus', 'ServerEphemeral', 'Salt', 'SRPSession']);
  if (!Number.isInteger(data.Version)) {
    missing.push('Version');
  }
  if (missing.length > 0) {
    throw incomplete('auth info', missing);
  }

  return Object.freeze({
    username,
    version: data.Version,
    modulus: data.Modulus,
    serverEphemeral: data.ServerEphemeral,
    salt: data.Salt,
    srpSession: data.SRPSession,
    twoFactor: Boolean(data.TwoFactor),
    serverUsername: data.Username,
  });
}

export function toSessionCredentials(data: AuthResponse): SessionCredentials {
  const missing = missingFields(data, ['Uid', 'AccessToken', 'RefreshToken', 'PrivateKey']);
  if (missing.length > 0) {
    throw incomplete('auth', missing);
  }

  return Object.freeze({
    uid: data.Uid,
    accessToken: data.AccessToken,
    refreshToken: data.RefreshToken,
    tokenType: data.TokenType ?? 'Bearer',
    scope: data.Scope ?? '',
    expiresIn: data.ExpiresIn ?? 0,
    eventId: data.EventID ?? '',
    passwordMode: toPasswordMode(data.PasswordMode),
    privateKey: data.PrivateKey,
    keySalt: data.KeySalt ?? '',
  });
}

/**
 * New credentials carrying the refreshed tokens; key material is unchanged.
 */
export function withRefreshedTokens(credentials: SessionCredentials, data: RefreshResponse): SessionCredentials {
  const missing = missingFields(data, ['AccessToken', 'RefreshToken']);
  if (missing.length > 0) {
    throw incomplete('refresh', missing);
  }

  return Object.freeze({
    ...credentials,
    uid: data.Uid || credentials.uid,
    accessToken: data.AccessToken,
    refreshToken: data.RefreshToken,
    tokenType: data.TokenType ?? credentials.tokenType,
    scope: data.Scope ?? credentials.scope,
    expiresIn: data.ExpiresIn ?? credentials.expiresIn,
  });
}
