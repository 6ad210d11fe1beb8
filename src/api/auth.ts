import { HttpClient, RequestConfig } from './http-client';
import {
  AuthInfoRequest,
  AuthInfoResponse,
  AuthRequest,
  AuthResponse,
  RefreshRequest,
  RefreshResponse,
} from '../types/auth';
import { AppError, ErrorCode } from '../errors/types';
import { readApiError, toAppError } from '../errors/handler';
import { API_SUCCESS_CODE, DEFAULT_APP_VERSION_HEADER, DEFAULT_AUTH_TIMEOUT_MS } from '../constants';
import { logger } from '../utils/logger';

/**
 * The four auth endpoints, as seen by the handshake. Implementations throw
 * AppError with a transport-family code for anything that goes wrong on the wire.
 */
export interface AuthTransport {
  getAuthInfo(request: AuthInfoRequest, signal?: AbortSignal): Promise<AuthInfoResponse>;
  authenticate(request: AuthRequest, signal?: AbortSignal): Promise<AuthResponse>;
  refresh(request: RefreshRequest, signal?: AbortSignal): Promise<RefreshResponse>;
  logout(uid: string, accessToken: string): Promise<void>;
}

export interface AuthApiClientOptions {
  baseUrl: string;
  appVersion?: string;
  timeout?: number;
}

type JsonObject = Record<string, unknown>;

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(obj: JsonObject, key: string): string {
  const value = obj[key];
  return typeof value === 'string' ? value : '';
}

function readOptionalString(obj: JsonObject, key: string): string | undefined {
  const value = obj[key];
  return typeof value === 'string' ? value : undefined;
}

// NaN marks a missing number so the mappers can tell it apart from 0
function readNumber(obj: JsonObject, key: string): number {
  const value = obj[key];
  return typeof value === 'number' ? value : NaN;
}

function readOptionalNumber(obj: JsonObject, key: string): number | undefined {
  const value = obj[key];
  return typeof value === 'number' ? value : undefined;
}

/**
 * Check the `Code` envelope of a 2xx body and hand back its fields
 */
function expectSuccess(data: unknown, endpoint: string): JsonObject {
  if (!isJsonObject(data)) {
    throw new AppError(`Unexpected response from ${endpoint}`, ErrorCode.API_ERROR, { endpoint });
  }
  const { apiCode, apiMessage } = readApiError(data);
  if (apiCode !== API_SUCCESS_CODE) {
    throw new AppError(
      apiMessage || `${endpoint} failed with code ${String(apiCode)}`,
      ErrorCode.API_ERROR,
      { endpoint, apiCode }
    );
  }
  return data;
}

export function parseAuthInfoResponse(data: unknown): AuthInfoResponse {
  const obj = expectSuccess(data, '/auth/info');
  return {
    Code: readNumber(obj, 'Code'),
    Version: readNumber(obj, 'Version'),
    Modulus: readString(obj, 'Modulus'),
    ServerEphemeral: readString(obj, 'ServerEphemeral'),
    Salt: readString(obj, 'Salt'),
    SRPSession: readString(obj, 'SRPSession'),
    TwoFactor: readOptionalNumber(obj, 'TwoFactor'),
    Username: readOptionalString(obj, 'Username'),
  };
}

export function parseAuthResponse(data: unknown): AuthResponse {
  const obj = expectSuccess(data, '/auth');
  return {
    Code: readNumber(obj, 'Code'),
    AccessToken: readString(obj, 'AccessToken'),
    TokenType: readOptionalString(obj, 'TokenType'),
    ExpiresIn: readOptionalNumber(obj, 'ExpiresIn'),
    Scope: readOptionalString(obj, 'Scope'),
    Uid: readString(obj, 'Uid') || readString(obj, 'UID'),
    RefreshToken: readString(obj, 'RefreshToken'),
    EventID: readOptionalString(obj, 'EventID'),
    PasswordMode: readNumber(obj, 'PasswordMode'),
    ServerProof: readString(obj, 'ServerProof'),
    PrivateKey: readString(obj, 'PrivateKey'),
    KeySalt: readOptionalString(obj, 'KeySalt'),
  };
}

export function parseRefreshResponse(data: unknown): RefreshResponse {
  const obj = expectSuccess(data, '/auth/refresh');
  return {
    Code: readNumber(obj, 'Code'),
    AccessToken: readString(obj, 'AccessToken'),
    TokenType: readOptionalString(obj, 'TokenType'),
    ExpiresIn: readOptionalNumber(obj, 'ExpiresIn'),
    Scope: readOptionalString(obj, 'Scope'),
    Uid: readOptionalString(obj, 'Uid') ?? readOptionalString(obj, 'UID'),
    RefreshToken: readString(obj, 'RefreshToken'),
  };
}

/**
 * Authentication API client for the mail service.
 * Performs the two SRP round-trips plus token refresh and revocation.
 */
export class AuthApiClient implements AuthTransport {
  private client: HttpClient;

  constructor(options: AuthApiClientOptions) {
    this.client = HttpClient.create({
      baseURL: options.baseUrl,
      timeout: options.timeout ?? DEFAULT_AUTH_TIMEOUT_MS,
      headers: {
        'Content-Type': 'application/json',
        'x-pm-appversion': options.appVersion ?? DEFAULT_APP_VERSION_HEADER,
      },
    });
  }

  /**
   * Get authentication info (Step 1 of SRP auth)
   * @returns SRP parameters for one attempt
   */
  async getAuthInfo(request: AuthInfoRequest, signal?: AbortSignal): Promise<AuthInfoResponse> {
    const data = await this.send('POST', '/auth/info', request, { signal });
    return parseAuthInfoResponse(data);
  }

  /**
   * Submit SRP proofs (Step 2 of SRP auth)
   * @returns Tokens, key material and the server's proof
   */
  async authenticate(request: AuthRequest, signal?: AbortSignal): Promise<AuthResponse> {
    const data = await this.send('POST', '/auth', request, { signal });
    return parseAuthResponse(data);
  }

  async refresh(request: RefreshRequest, signal?: AbortSignal): Promise<RefreshResponse> {
    const data = await this.send('POST', '/auth/refresh', request, {
      signal,
      headers: { 'x-pm-uid': request.UID },
    });
    return parseRefreshResponse(data);
  }

  /**
   * Revoke the session server-side
   */
  async logout(uid: string, accessToken: string): Promise<void> {
    await this.send('DELETE', '/auth', undefined, {
      headers: {
        'Authorization': `Bearer ${accessToken}`,
        'x-pm-uid': uid,
      },
    });
  }

  private async send(method: string, path: string, body: unknown, config: RequestConfig): Promise<unknown> {
    try {
      const response = await this.client.request(method, path, body, config);
      return response.data;
    } catch (error) {
      const appError = toAppError(error);
      logger.debug(`${method} ${path} failed:`, appError.code, appError.message);
      throw appError;
    }
  }
}
