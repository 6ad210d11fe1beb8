/**
 * Key password derivation for decrypting user keys
 * Uses the same bcrypt hashing as SRP but with key salts
 */

import { encodeBase64 as bcryptEncodeBase64, hash as bcryptHash } from 'bcryptjs';
import { BCRYPT_PREFIX, KEY_SALT_LEN } from '../auth/srp/constants';
import { fromBase64 } from '../auth/srp/utils';
import { AppError, ErrorCode } from '../errors/types';

// "$2y$10$" plus the 22-character encoded salt
const BCRYPT_HEADER_LEN = 29;

/**
 * Derive the key passphrase from password and salt
 * This is used to decrypt user's private keys in single-password mode
 *
 * @param password - Login password
 * @param keySalt - Base64-encoded key salt from the auth response
 * @returns The 31-character bcrypt hash without its header
 */
export async function deriveKeyPassphrase(password: string, keySalt: string): Promise<string> {
  const saltBinary = fromBase64(keySalt);
  if (!saltBinary || saltBinary.length !== KEY_SALT_LEN) {
    throw new AppError(
      `Key salt must be ${KEY_SALT_LEN} bytes of base64`,
      ErrorCode.MALFORMED_KEY_SALT,
      { length: saltBinary?.length ?? null },
      true
    );
  }

  const bcryptSalt = bcryptEncodeBase64(Array.from(saltBinary), saltBinary.length);
  const hashedPassword = await bcryptHash(password, BCRYPT_PREFIX + bcryptSalt);

  return hashedPassword.substring(BCRYPT_HEADER_LEN);
}
