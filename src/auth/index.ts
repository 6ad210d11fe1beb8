import { randomBytes } from 'crypto';
import * as openpgp from 'openpgp';
import { AuthApiClient, AuthTransport } from '../api/auth';
import { ClientConfig, ClientConfigOptions, resolveConfig } from '../config';
import { REFRESH_REDIRECT_URI } from '../constants';
import { KeyRingProvider, OpenPGPKeyRingProvider } from '../crypto/keys';
import { AppError, ErrorCode } from '../errors/types';
import { AuthInfo, PasswordMode, SessionCredentials, UnlockedIdentity } from '../types/auth';
import { logger } from '../utils/logger';
import { AuthAttempt } from './attempt';
import { toAuthInfo, withRefreshedTokens } from './mappers';
import { Session, SessionState } from './session';
import { SRPClient } from './srp';
import { KeyUnlocker } from './unlock';

export interface MailAuthClientDeps<TKey> {
  transport: AuthTransport;
  srp: SRPClient;
  keyRingProvider: KeyRingProvider<TKey>;
  config: ClientConfig;
}

export interface LoginOptions {
  twoFactorCode?: string;
  /** Required for accounts in two-password mode */
  mailboxPassword?: string;
  signal?: AbortSignal;
}

/**
 * Main authentication service
 * Runs SRP logins, unlocks key rings and owns the resulting session
 */
export class MailAuthClient<TKey> {
  readonly session = new Session<TKey>();

  private readonly unlocker: KeyUnlocker<TKey>;
  private readonly consumedAuthInfo = new WeakSet<AuthInfo>();
  // Lets unlock() find the attempt that produced a set of credentials
  private readonly attempts = new WeakMap<SessionCredentials, AuthAttempt<TKey>>();

  constructor(private readonly deps: MailAuthClientDeps<TKey>) {
    this.unlocker = new KeyUnlocker(deps.keyRingProvider);
  }

  get config(): ClientConfig {
    return this.deps.config;
  }

  /**
   * Start a new attempt; callers that want to watch the state machine use this
   */
  createAttempt(username: string): AuthAttempt<TKey> {
    return new AuthAttempt({
      transport: this.deps.transport,
      srp: this.deps.srp,
      unlocker: this.unlocker,
      config: this.deps.config,
      consumedAuthInfo: this.consumedAuthInfo,
    }, username);
  }

  /**
   * Fetch SRP parameters for `username` (Step 1 of SRP auth)
   */
  async authInfo(username: string, signal?: AbortSignal): Promise<AuthInfo> {
    const response = await this.deps.transport.getAuthInfo({
      ClientID: this.deps.config.clientId,
      ClientSecret: this.deps.config.clientSecret,
      Username: username,
    }, signal);
    return toAuthInfo(username, response);
  }

  /**
   * Authenticate with username and password using SRP protocol
   * @param info - Parameters from authInfo(); fetched when absent or already used
   * @returns Session credentials; the key ring is still locked
   */
  async auth(
    username: string,
    password: string,
    twoFactorCode?: string,
    info?: AuthInfo,
    signal?: AbortSignal
  ): Promise<SessionCredentials> {
    const attempt = this.createAttempt(username);
    const credentials = await attempt.authenticate(password, { twoFactorCode, authInfo: info, signal });
    this.attempts.set(credentials, attempt);
    logger.debug(`Authenticated ${username} (password mode ${credentials.passwordMode})`);
    return credentials;
  }

  /**
   * Decrypt the key ring carried by `credentials` and make it the active session
   * @param password - Login password in single-password mode, mailbox password in two-password mode
   */
  async unlock(credentials: SessionCredentials, password: string, signal?: AbortSignal): Promise<UnlockedIdentity<TKey>> {
    return this.session.runExclusive(async () => {
      const attempt = this.attempts.get(credentials);
      const identity = attempt
        ? await attempt.unlock(password, signal)
        : await this.unlocker.unlock(credentials, password);

      this.session.commit(identity);
      this.attempts.delete(credentials);
      return identity;
    });
  }

  /**
   * auth() and unlock() in one call
   */
  async login(username: string, password: string, options: LoginOptions = {}): Promise<UnlockedIdentity<TKey>> {
    const credentials = await this.auth(username, password, options.twoFactorCode, undefined, options.signal);

    try {
      let keyPassword = password;
      if (credentials.passwordMode === PasswordMode.Two) {
        if (!options.mailboxPassword) {
          throw new AppError(
            'This account uses a separate mailbox password',
            ErrorCode.VALIDATION_ERROR,
            { passwordMode: credentials.passwordMode }
          );
        }
        keyPassword = options.mailboxPassword;
      }

      const identity = await this.unlock(credentials, keyPassword, options.signal);
      logger.info('Authentication successful');
      return identity;
    } catch (error) {
      // Tokens were issued but the keys stay locked
      await this.revoke(credentials);
      throw error;
    }
  }

  /**
   * Revoke tokens from auth() that never became the active session.
   * Failures are logged, not thrown.
   */
  async revoke(credentials: SessionCredentials): Promise<void> {
    this.attempts.delete(credentials);
    try {
      await this.deps.transport.logout(credentials.uid, credentials.accessToken);
    } catch (error) {
      logger.warn('Failed to revoke session:', error instanceof Error ? error.message : String(error));
    }
  }

  /**
   * Exchange the refresh token for new tokens; unlocked keys are kept
   */
  async refresh(signal?: AbortSignal): Promise<SessionState<TKey>> {
    return this.session.runExclusive(async () => {
      const { uid, credentials } = this.session.require();
      const response = await this.deps.transport.refresh({
        ClientID: this.deps.config.clientId,
        UID: uid,
        RefreshToken: credentials.refreshToken,
        ResponseType: 'token',
        GrantType: 'refresh_token',
        RedirectURI: REFRESH_REDIRECT_URI,
        State: randomBytes(16).toString('hex'),
      }, signal);

      logger.debug('Session tokens refreshed');
      return this.session.replaceCredentials(withRefreshedTokens(credentials, response));
    });
  }

  /**
   * Revoke the session server-side and forget it locally. The local session
   * is cleared even when revocation fails.
   */
  async logout(): Promise<void> {
    await this.session.runExclusive(async () => {
      const state = this.session.current;
      if (!state) return;

      try {
        await this.deps.transport.logout(state.uid, state.accessToken);
      } catch (error) {
        logger.warn('Failed to revoke session:', error instanceof Error ? error.message : String(error));
      } finally {
        this.session.clear();
      }
    });
  }
}

/**
 * Client wired to the HTTP API and OpenPGP.js
 */
export function createMailAuthClient(options: ClientConfigOptions = {}): MailAuthClient<openpgp.PrivateKey> {
  const config = resolveConfig(options);
  return new MailAuthClient({
    transport: new AuthApiClient({
      baseUrl: config.apiBaseUrl,
      appVersion: config.appVersion,
      timeout: config.timeout,
    }),
    srp: new SRPClient(),
    keyRingProvider: new OpenPGPKeyRingProvider(),
    config,
  });
}

export { AuthAttempt } from './attempt';
export type { AttemptState, AttemptStatus, AuthenticateOptions } from './attempt';
export { Session } from './session';
export type { SessionState } from './session';
export { SRPClient } from './srp';
export type { SRPClientOptions } from './srp';
export { KeyUnlocker } from './unlock';
export { AppError, ErrorCode, isTransportError } from '../errors/types';
export { resolveConfig } from '../config';
export type { ClientConfig, ClientConfigOptions } from '../config';
export { AuthApiClient } from '../api/auth';
export type { AuthTransport } from '../api/auth';
export { OpenPGPKeyRingProvider } from '../crypto/keys';
export type { KeyRing, KeyRingProvider } from '../crypto/keys';
export * from '../types/auth';
