import { PasswordMode, SessionCredentials, UnlockedIdentity } from '../types/auth';
import { deriveKeyPassphrase } from '../crypto/key-password';
import { KeyRingProvider } from '../crypto/keys';
import { AppError, ErrorCode } from '../errors/types';
import { logger } from '../utils/logger';

/**
 * Turns a password into the passphrase of the account's private keys and
 * decrypts them. Holds no state between calls.
 */
export class KeyUnlocker<TKey> {
  constructor(private readonly keyRingProvider: KeyRingProvider<TKey>) {}

  /**
   * @param credentials - Result of a successful handshake
   * @param password - Login password in single-password mode, mailbox password in two-password mode
   */
  async unlock(credentials: SessionCredentials, password: string): Promise<UnlockedIdentity<TKey>> {
    const passphrase = credentials.passwordMode === PasswordMode.Single
      ? await deriveKeyPassphrase(password, credentials.keySalt)
      : password;

    const keyRing = await this.keyRingProvider.parseArmoredKeyRing(credentials.privateKey);
    if (keyRing.size === 0) {
      throw new AppError('Key ring is empty', ErrorCode.MALFORMED_KEY_RING, undefined, true);
    }

    let keys: TKey[];
    try {
      keys = await keyRing.decryptEach(passphrase);
    } catch (error) {
      if (error instanceof AppError) throw error;
      throw new AppError(
        'Failed to decrypt private key',
        ErrorCode.DECRYPTION_FAILED,
        { reason: error instanceof Error ? error.message : String(error) },
        true
      );
    }

    logger.debug(`Unlocked ${keys.length} private key(s)`);
    return Object.freeze({ credentials, keys: Object.freeze(keys) });
  }
}
