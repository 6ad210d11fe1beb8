/**
 * Modulus verification for SRP.
 *
 * A server-chosen modulus is only accepted when it carries a valid signature
 * from the pinned modulus key and is a safe prime of the expected size.
 */

import type { Key } from 'openpgp';
import { CryptoProxy, VERIFICATION_STATUS } from './crypto-proxy';
import { MODULUS_PRIME_ROUNDS, SRP_LEN, SRP_MODULUS_KEY } from './constants';
import { byteLength, isProbablePrime, uint8ArrayToBigInt } from './bigint';
import { fromBase64 } from './utils';
import { AppError, ErrorCode } from '../../errors/types';
import { logger } from '../../utils/logger';

const { SIGNED_AND_VALID } = VERIFICATION_STATUS;

const keyCache = new Map<string, Promise<Key>>();

/**
 * Get key to verify the modulus (cached per armored key)
 */
function getModulusKey(armoredKey: string): Promise<Key> {
  let cached = keyCache.get(armoredKey);
  if (!cached) {
    cached = CryptoProxy.importPublicKey({ armoredKey });
    keyCache.set(armoredKey, cached);
    // A failed import must not poison later attempts
    void cached.catch(() => keyCache.delete(armoredKey));
  }
  return cached;
}

function invalidModulus(reason: string): AppError {
  // A bad modulus is what a man-in-the-middle would send
  logger.warn(`Rejected SRP modulus (${reason}); possible tampering`);
  return new AppError('Unable to verify server identity', ErrorCode.INVALID_MODULUS, { reason });
}

/**
 * Verify the modulus signature with the SRP public key
 * @returns the signed base64 text
 * @throws AppError(INVALID_MODULUS) on any verification error
 */
export async function verifyModulus(publicKey: Key, modulus: string): Promise<string> {
  let result: Awaited<ReturnType<typeof CryptoProxy.verifyCleartextMessage>>;
  try {
    result = await CryptoProxy.verifyCleartextMessage({
      armoredCleartextMessage: modulus,
      verificationKeys: publicKey,
    });
  } catch (error) {
    throw invalidModulus(error instanceof Error ? error.message : 'unreadable signed message');
  }

  if (result.verificationStatus !== SIGNED_AND_VALID) {
    throw invalidModulus('signature verification failed');
  }

  return result.data.trim();
}

/**
 * Check that little-endian modulus bytes encode a safe prime of exactly
 * `expectedLength` bytes.
 * @returns the modulus as a bigint
 */
export function validateModulus(modulusBytes: Uint8Array, expectedLength: number = SRP_LEN): bigint {
  if (modulusBytes.length !== expectedLength) {
    throw invalidModulus(`expected ${expectedLength} bytes, got ${modulusBytes.length}`);
  }

  const modulus = uint8ArrayToBigInt(modulusBytes, 'le');
  if (byteLength(modulus) !== expectedLength) {
    throw invalidModulus('high byte is zero');
  }
  if ((modulus & 1n) === 0n || !isProbablePrime(modulus, MODULUS_PRIME_ROUNDS)) {
    throw invalidModulus('not prime');
  }
  if (!isProbablePrime(modulus >> 1n, MODULUS_PRIME_ROUNDS)) {
    throw invalidModulus('not a safe prime');
  }

  return modulus;
}

/**
 * Verify modulus from the API and get its bytes (little-endian).
 */
export async function verifyAndGetModulus(
  modulus: string,
  armoredKey: string = SRP_MODULUS_KEY
): Promise<Uint8Array> {
  let publicKey: Key;
  try {
    publicKey = await getModulusKey(armoredKey);
  } catch (error) {
    throw invalidModulus(error instanceof Error ? error.message : 'verification key unusable');
  }

  const modulusData = await verifyModulus(publicKey, modulus);
  const modulusBytes = fromBase64(modulusData);
  if (!modulusBytes) {
    throw invalidModulus('signed content is not base64');
  }

  validateModulus(modulusBytes);
  return modulusBytes;
}
