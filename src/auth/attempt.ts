import { AuthTransport } from '../api/auth';
import { ClientConfig } from '../config';
import { AuthInfo, SessionCredentials, UnlockedIdentity } from '../types/auth';
import { AppError, ErrorCode } from '../errors/types';
import { toAppError } from '../errors/handler';
import { logger } from '../utils/logger';
import { toAuthInfo, toSessionCredentials } from './mappers';
import { SRPClient } from './srp';
import { KeyUnlocker } from './unlock';

export type AttemptState<TKey> =
  | { readonly status: 'idle' }
  | { readonly status: 'awaiting-auth-params' }
  | { readonly status: 'proof-computed' }
  | { readonly status: 'authenticated'; readonly credentials: SessionCredentials }
  | { readonly status: 'unlocked'; readonly identity: UnlockedIdentity<TKey> }
  | { readonly status: 'failed'; readonly reason: ErrorCode; readonly error: AppError };

export type AttemptStatus = AttemptState<unknown>['status'];

export interface AttemptDeps<TKey> {
  transport: AuthTransport;
  srp: SRPClient;
  unlocker: KeyUnlocker<TKey>;
  config: ClientConfig;
  /** AuthInfo objects some attempt has already run on; shared per client */
  consumedAuthInfo: WeakSet<AuthInfo>;
}

export interface AuthenticateOptions {
  twoFactorCode?: string;
  /** Pre-fetched parameters; ignored once another attempt has used them */
  authInfo?: AuthInfo;
  signal?: AbortSignal;
}

// These leave the handshake intact; the caller may retry unlock
const RECOVERABLE_UNLOCK_CODES: ReadonlySet<ErrorCode> = new Set([
  ErrorCode.MALFORMED_KEY_RING,
  ErrorCode.MALFORMED_KEY_SALT,
  ErrorCode.DECRYPTION_FAILED,
]);

/**
 * One login for one user: fetch parameters, prove the password, check the
 * server's proof, then unlock the key ring.
 *
 * idle → awaiting-auth-params → proof-computed → authenticated → unlocked,
 * with `failed` reachable from every step. Nothing from a failed step is
 * ever handed back to the caller.
 */
export class AuthAttempt<TKey> {
  private current: AttemptState<TKey> = { status: 'idle' };

  constructor(
    private readonly deps: AttemptDeps<TKey>,
    readonly username: string
  ) {}

  get state(): AttemptState<TKey> {
    return this.current;
  }

  get status(): AttemptStatus {
    return this.current.status;
  }

  /**
   * Run both SRP round-trips
   * @returns Credentials, only once the server has proven it knows the verifier
   */
  async authenticate(password: string, options: AuthenticateOptions = {}): Promise<SessionCredentials> {
    this.expectStatus('idle', 'authenticate');
    const { signal } = options;

    try {
      this.throwIfCancelled(signal);
      this.transition({ status: 'awaiting-auth-params' });
      const info = await this.resolveAuthInfo(options.authInfo, signal);
      this.throwIfCancelled(signal);

      const proof = await this.deps.srp.computeProof(password, info);
      this.throwIfCancelled(signal);
      this.transition({ status: 'proof-computed' });

      const response = await this.deps.transport.authenticate({
        ClientID: this.deps.config.clientId,
        ClientSecret: this.deps.config.clientSecret,
        Username: this.username,
        SRPSession: info.srpSession,
        ClientEphemeral: proof.clientEphemeral,
        ClientProof: proof.clientProof,
        TwoFactorCode: options.twoFactorCode ?? '',
      }, signal);
      this.throwIfCancelled(signal);

      this.deps.srp.verifyServerProof(proof.expectedServerProof, response.ServerProof);

      const credentials = toSessionCredentials(response);
      this.transition({ status: 'authenticated', credentials });
      return credentials;
    } catch (error) {
      throw this.fail(error);
    }
  }

  /**
   * Decrypt the key ring of an authenticated attempt. A wrong password or a
   * bad key ring keeps the attempt authenticated so unlock can be retried.
   */
  async unlock(password: string, signal?: AbortSignal): Promise<UnlockedIdentity<TKey>> {
    const state = this.current;
    if (state.status !== 'authenticated') {
      throw this.invalidState('unlock');
    }

    try {
      this.throwIfCancelled(signal);
      const identity = await this.deps.unlocker.unlock(state.credentials, password);
      this.throwIfCancelled(signal);
      this.transition({ status: 'unlocked', identity });
      return identity;
    } catch (error) {
      const appError = toAppError(error);
      if (RECOVERABLE_UNLOCK_CODES.has(appError.code)) {
        logger.debug(`Unlock failed (${appError.code}); attempt stays authenticated`);
        throw appError;
      }
      throw this.fail(appError);
    }
  }

  private async resolveAuthInfo(supplied: AuthInfo | undefined, signal?: AbortSignal): Promise<AuthInfo> {
    const { consumedAuthInfo, config } = this.deps;

    let info: AuthInfo;
    if (supplied && supplied.username === this.username
        && (!consumedAuthInfo.has(supplied) || config.allowSrpSessionReuse)) {
      info = supplied;
    } else {
      if (supplied) {
        logger.debug('Supplied auth info was already used; fetching fresh parameters');
      }
      const response = await this.deps.transport.getAuthInfo({
        ClientID: config.clientId,
        ClientSecret: config.clientSecret,
        Username: this.username,
      }, signal);
      info = toAuthInfo(this.username, response);
    }

    consumedAuthInfo.add(info);
    return info;
  }

  private transition(next: AttemptState<TKey>): void {
    logger.debug(`Auth attempt: ${this.current.status} → ${next.status}`);
    this.current = next;
  }

  private fail(error: unknown): AppError {
    const appError = toAppError(error);
    // Modulus and ephemeral problems are already reported where they are found
    if (appError.code === ErrorCode.SERVER_PROOF_MISMATCH) {
      logger.warn(`Authentication aborted: ${appError.message}`);
    }
    this.transition({ status: 'failed', reason: appError.code, error: appError });
    return appError;
  }

  private throwIfCancelled(signal?: AbortSignal): void {
    if (signal?.aborted) {
      throw new AppError('Authentication cancelled', ErrorCode.OPERATION_CANCELLED);
    }
  }

  private expectStatus(status: AttemptStatus, operation: string): void {
    if (this.current.status !== status) {
      throw this.invalidState(operation);
    }
  }

  private invalidState(operation: string): AppError {
    return new AppError(
      `Cannot ${operation} while attempt is ${this.current.status}`,
      ErrorCode.INVALID_STATE,
      { state: this.current.status, operation }
    );
  }
}
