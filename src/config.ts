import {
  DEFAULT_API_BASE_URL,
  DEFAULT_APP_VERSION_HEADER,
  DEFAULT_AUTH_TIMEOUT_MS,
  DEFAULT_CLIENT_ID,
  ENV_PREFIX,
} from './constants';
import { AppError, ErrorCode } from './errors/types';

export interface ClientConfig {
  apiBaseUrl: string;
  clientId: string;
  clientSecret: string;
  /** Sent as `x-pm-appversion` */
  appVersion: string;
  /** Per-request timeout in milliseconds */
  timeout: number;
  /**
   * Let an attempt run on an AuthInfo another attempt already used. Off by
   * default: a consumed AuthInfo makes the next attempt fetch a new one.
   */
  allowSrpSessionReuse: boolean;
}

export type ClientConfigOptions = Partial<ClientConfig>;

type Env = Record<string, string | undefined>;

function envValue(env: Env, name: string): string | undefined {
  const value = env[`${ENV_PREFIX}${name}`]?.trim();
  return value ? value : undefined;
}

function parseTimeout(raw: string): number {
  const timeout = Number(raw);
  if (!Number.isInteger(timeout) || timeout <= 0) {
    throw new AppError(
      `Invalid ${ENV_PREFIX}TIMEOUT: ${raw}`,
      ErrorCode.VALIDATION_ERROR,
      { value: raw }
    );
  }
  return timeout;
}

function parseBoolean(name: string, raw: string): boolean {
  switch (raw.toLowerCase()) {
    case '1':
    case 'true':
    case 'yes':
      return true;
    case '0':
    case 'false':
    case 'no':
      return false;
    default:
      throw new AppError(
        `Invalid ${ENV_PREFIX}${name}: ${raw}`,
        ErrorCode.VALIDATION_ERROR,
        { value: raw }
      );
  }
}

function validateConfig(config: ClientConfig): ClientConfig {
  let url: URL;
  try {
    url = new URL(config.apiBaseUrl);
  } catch {
    throw new AppError(
      `Invalid API base URL: ${config.apiBaseUrl}`,
      ErrorCode.VALIDATION_ERROR,
      { apiBaseUrl: config.apiBaseUrl }
    );
  }
  if (url.protocol !== 'https:' && url.protocol !== 'http:') {
    throw new AppError(
      `Unsupported API URL scheme: ${url.protocol}`,
      ErrorCode.VALIDATION_ERROR,
      { apiBaseUrl: config.apiBaseUrl }
    );
  }
  if (!Number.isInteger(config.timeout) || config.timeout <= 0) {
    throw new AppError(
      `Invalid timeout: ${config.timeout}`,
      ErrorCode.VALIDATION_ERROR,
      { timeout: config.timeout }
    );
  }
  if (!config.clientId) {
    throw new AppError('Client ID must not be empty', ErrorCode.VALIDATION_ERROR);
  }
  return config;
}

/**
 * Resolve client configuration: explicit options first, then
 * MAIL_AUTH_* environment variables, then built-in defaults.
 */
export function resolveConfig(options: ClientConfigOptions = {}, env: Env = process.env): ClientConfig {
  const envTimeout = envValue(env, 'TIMEOUT');
  const envReuse = envValue(env, 'ALLOW_SRP_SESSION_REUSE');

  return validateConfig({
    apiBaseUrl: options.apiBaseUrl ?? envValue(env, 'API_URL') ?? DEFAULT_API_BASE_URL,
    clientId: options.clientId ?? envValue(env, 'CLIENT_ID') ?? DEFAULT_CLIENT_ID,
    clientSecret: options.clientSecret ?? envValue(env, 'CLIENT_SECRET') ?? '',
    appVersion: options.appVersion ?? envValue(env, 'APP_VERSION') ?? DEFAULT_APP_VERSION_HEADER,
    timeout: options.timeout ?? (envTimeout !== undefined ? parseTimeout(envTimeout) : DEFAULT_AUTH_TIMEOUT_MS),
    allowSrpSessionReuse: options.allowSrpSessionReuse
      ?? (envReuse !== undefined ? parseBoolean('ALLOW_SRP_SESSION_REUSE', envReuse) : false),
  });
}
