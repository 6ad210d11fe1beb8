import { resolveConfig } from './config';
import {
  DEFAULT_API_BASE_URL,
  DEFAULT_APP_VERSION_HEADER,
  DEFAULT_AUTH_TIMEOUT_MS,
  DEFAULT_CLIENT_ID,
} from './constants';
import { ErrorCode } from './errors/types';
import { captureError } from './test/errors';

describe('resolveConfig', () => {
  test('falls back to defaults', () => {
    expect(resolveConfig({}, {})).toEqual({
      apiBaseUrl: DEFAULT_API_BASE_URL,
      clientId: DEFAULT_CLIENT_ID,
      clientSecret: '',
      appVersion: DEFAULT_APP_VERSION_HEADER,
      timeout: DEFAULT_AUTH_TIMEOUT_MS,
      allowSrpSessionReuse: false,
    });
  });

  test('reads MAIL_AUTH_* variables', () => {
    const config = resolveConfig({}, {
      MAIL_AUTH_API_URL: 'http://localhost:8080/api',
      MAIL_AUTH_CLIENT_ID: 'cli',
      MAIL_AUTH_CLIENT_SECRET: 'test-secret',
      MAIL_AUTH_APP_VERSION: 'cli@2.0.0',
      MAIL_AUTH_TIMEOUT: '2500',
      MAIL_AUTH_ALLOW_SRP_SESSION_REUSE: 'yes',
    });

    expect(config).toEqual({
      apiBaseUrl: 'http://localhost:8080/api',
      clientId: 'cli',
      clientSecret: 'test-secret',
      appVersion: 'cli@2.0.0',
      timeout: 2500,
      allowSrpSessionReuse: true,
    });
  });

  test('explicit options win over the environment', () => {
    const config = resolveConfig(
      { apiBaseUrl: 'https://mail.example.com/api', timeout: 1000, allowSrpSessionReuse: false },
      { MAIL_AUTH_API_URL: 'http://localhost:8080/api', MAIL_AUTH_TIMEOUT: '2500', MAIL_AUTH_ALLOW_SRP_SESSION_REUSE: 'true' }
    );

    expect(config).toMatchObject({
      apiBaseUrl: 'https://mail.example.com/api',
      timeout: 1000,
      allowSrpSessionReuse: false,
    });
  });

  test('ignores blank variables', () => {
    expect(resolveConfig({}, { MAIL_AUTH_CLIENT_ID: '   ' }).clientId).toBe(DEFAULT_CLIENT_ID);
  });

  test('rejects a non-numeric timeout variable', () => {
    expect(captureError(() => resolveConfig({}, { MAIL_AUTH_TIMEOUT: 'soon' }))).toMatchObject({
      code: ErrorCode.VALIDATION_ERROR,
      message: 'Invalid MAIL_AUTH_TIMEOUT: soon',
    });
  });

  test('rejects an unknown boolean', () => {
    expect(() => resolveConfig({}, { MAIL_AUTH_ALLOW_SRP_SESSION_REUSE: 'maybe' }))
      .toThrow('Invalid MAIL_AUTH_ALLOW_SRP_SESSION_REUSE: maybe');
  });

  test('accepts 0 as false', () => {
    expect(resolveConfig({}, { MAIL_AUTH_ALLOW_SRP_SESSION_REUSE: '0' }).allowSrpSessionReuse).toBe(false);
  });

  test('rejects an unparseable URL', () => {
    expect(() => resolveConfig({ apiBaseUrl: 'not a url' }, {})).toThrow('Invalid API base URL: not a url');
  });

  test('rejects a non-HTTP scheme', () => {
    expect(() => resolveConfig({ apiBaseUrl: 'ftp://mail.example.com' }, {})).toThrow('Unsupported API URL scheme: ftp:');
  });

  test('rejects a non-positive timeout option', () => {
    expect(() => resolveConfig({ timeout: 0 }, {})).toThrow('Invalid timeout: 0');
    expect(() => resolveConfig({ timeout: NaN }, {})).toThrow('Invalid timeout: NaN');
  });

  test('rejects an empty client ID', () => {
    expect(() => resolveConfig({ clientId: '' }, {})).toThrow('Client ID must not be empty');
  });
});
