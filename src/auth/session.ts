import PQueue from 'p-queue';
import { SessionCredentials, UnlockedIdentity } from '../types/auth';
import { AppError, ErrorCode } from '../errors/types';

/**
 * What a logged-in client knows about itself. Lives in memory only.
 */
export interface SessionState<TKey> {
  readonly uid: string;
  readonly accessToken: string;
  readonly credentials: SessionCredentials;
  readonly keys: readonly TKey[];
}

/**
 * Owned session state for one client. Reads are free; every mutation goes
 * through `runExclusive`, which runs callers one at a time.
 */
export class Session<TKey> {
  private queue = new PQueue({ concurrency: 1 });
  private state: SessionState<TKey> | null = null;

  /**
   * Run `fn` once every earlier exclusive section has settled
   */
  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    return this.queue.add(fn);
  }

  get current(): SessionState<TKey> | null {
    return this.state;
  }

  isUnlocked(): boolean {
    return this.state !== null;
  }

  /**
   * Current state, or NOT_AUTHENTICATED when nobody has logged in
   */
  require(): SessionState<TKey> {
    if (!this.state) {
      throw new AppError('No active session', ErrorCode.NOT_AUTHENTICATED);
    }
    return this.state;
  }

  /**
   * Replace every field at once with a freshly unlocked identity
   */
  commit(identity: UnlockedIdentity<TKey>): SessionState<TKey> {
    this.state = Object.freeze({
      uid: identity.credentials.uid,
      accessToken: identity.credentials.accessToken,
      credentials: identity.credentials,
      keys: identity.keys,
    });
    return this.state;
  }

  /**
   * Swap in refreshed credentials; the unlocked keys stay
   */
  replaceCredentials(credentials: SessionCredentials): SessionState<TKey> {
    const { keys } = this.require();
    return this.commit({ credentials, keys });
  }

  clear(): void {
    this.state = null;
  }
}
