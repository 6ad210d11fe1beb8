import * as openpgp from 'openpgp';
import { AppError, ErrorCode } from '../errors/types';

/**
 * A parsed, still-encrypted set of private keys
 */
export interface KeyRing<TKey> {
  readonly size: number;

  /**
   * Decrypt every key with the same passphrase. Rejects on the first key that
   * refuses it; never resolves with a partial set.
   */
  decryptEach(passphrase: string): Promise<TKey[]>;
}

export interface KeyRingProvider<TKey> {
  parseArmoredKeyRing(armored: string): Promise<KeyRing<TKey>>;
}

export class OpenPGPKeyRing implements KeyRing<openpgp.PrivateKey> {
  constructor(private readonly keys: readonly openpgp.PrivateKey[]) {}

  get size(): number {
    return this.keys.length;
  }

  async decryptEach(passphrase: string): Promise<openpgp.PrivateKey[]> {
    const decrypted: openpgp.PrivateKey[] = [];

    for (const [index, privateKey] of this.keys.entries()) {
      if (privateKey.isDecrypted()) {
        decrypted.push(privateKey);
        continue;
      }

      try {
        decrypted.push(await openpgp.decryptKey({ privateKey, passphrase }));
      } catch (error) {
        throw new AppError(
          'Failed to decrypt private key',
          ErrorCode.DECRYPTION_FAILED,
          {
            index,
            keyId: privateKey.getKeyID().toHex(),
            reason: error instanceof Error ? error.message : String(error),
          },
          true
        );
      }
    }

    return decrypted;
  }
}

/**
 * Reads armored private key blocks with OpenPGP.js
 */
export class OpenPGPKeyRingProvider implements KeyRingProvider<openpgp.PrivateKey> {
  async parseArmoredKeyRing(armored: string): Promise<OpenPGPKeyRing> {
    let keys: openpgp.PrivateKey[];
    try {
      keys = await openpgp.readPrivateKeys({ armoredKeys: armored });
    } catch (error) {
      throw new AppError(
        'Failed to read private key ring',
        ErrorCode.MALFORMED_KEY_RING,
        { reason: error instanceof Error ? error.message : String(error) },
        true
      );
    }
    return new OpenPGPKeyRing(keys);
  }
}
