/**
 * Thin wrapper over node:crypto hashing and OpenPGP.js signature checks,
 * so the SRP modules never touch either library directly.
 */

import * as openpgp from 'openpgp';
import { createHash } from 'crypto';
import { mergeUint8Arrays } from './utils';

export type HashAlgorithm = 'SHA512' | 'unsafeMD5';

export enum VERIFICATION_STATUS {
  NOT_SIGNED = 0,
  SIGNED_AND_VALID = 1,
  SIGNED_AND_INVALID = 2,
}

const NODE_HASH_NAMES: Record<HashAlgorithm, string> = {
  SHA512: 'sha512',
  unsafeMD5: 'md5',
};

export class CryptoProxy {
  static computeHash({ algorithm, data }: { algorithm: HashAlgorithm; data: Uint8Array }): Uint8Array {
    return new Uint8Array(createHash(NODE_HASH_NAMES[algorithm]).update(data).digest());
  }

  /**
   * SRP's 2048-bit hash: four SHA-512 digests of the input suffixed with 0..3
   */
  static expandHash(input: Uint8Array): Uint8Array {
    return mergeUint8Arrays(
      [0, 1, 2, 3].map((i) =>
        CryptoProxy.computeHash({
          algorithm: 'SHA512',
          data: mergeUint8Arrays([input, new Uint8Array([i])]),
        })
      )
    );
  }

  static async importPublicKey({ armoredKey }: { armoredKey: string }): Promise<openpgp.Key> {
    try {
      return await openpgp.readKey({ armoredKey });
    } catch (error) {
      throw new Error(`Failed to import public key: ${error instanceof Error ? error.message : 'Unknown error'}`);
    }
  }

  /**
   * Verify a cleartext signed message and return its text
   */
  static async verifyCleartextMessage({
    armoredCleartextMessage,
    verificationKeys,
  }: {
    armoredCleartextMessage: string;
    verificationKeys: openpgp.Key;
  }): Promise<{ data: string; verificationStatus: VERIFICATION_STATUS }> {
    const message = await openpgp.readCleartextMessage({
      cleartextMessage: armoredCleartextMessage,
    });

    const result = await openpgp.verify({
      message,
      verificationKeys: [verificationKeys],
    });

    let verificationStatus = VERIFICATION_STATUS.NOT_SIGNED;
    for (const signature of result.signatures) {
      try {
        await signature.verified;
        verificationStatus = VERIFICATION_STATUS.SIGNED_AND_VALID;
        break;
      } catch {
        verificationStatus = VERIFICATION_STATUS.SIGNED_AND_INVALID;
      }
    }

    if (typeof result.data !== 'string') {
      throw new Error('Cleartext message did not yield text');
    }

    return { data: result.data, verificationStatus };
  }
}
