/**
 * Password hashing for SRP: turns the account password into the private
 * exponent x, one scheme per auth version.
 */

import { encodeBase64 as bcryptEncodeBase64, hash as bcryptHash } from 'bcryptjs';
import { CryptoProxy } from './crypto-proxy';
import { binaryStringToArray, encodeUtf8, mergeUint8Arrays, toBase64, toHex } from './utils';
import { BCRYPT_PREFIX, SALT_SUFFIX } from './constants';
import { cleanUsername } from './username';
import { AppError, ErrorCode } from '../../errors/types';

export interface HashPasswordParams {
  password: string;
  /** Binary string of the decoded account salt (versions 3 and 4) */
  salt?: string;
  username?: string;
  /** Little-endian modulus bytes */
  modulus: Uint8Array;
  version: number;
}

/**
 * bcrypt, then expand together with the modulus
 */
async function formatHash(password: string, salt: string, modulus: Uint8Array): Promise<Uint8Array> {
  const unexpandedHash = await bcryptHash(password, BCRYPT_PREFIX + salt);
  return CryptoProxy.expandHash(mergeUint8Arrays([binaryStringToArray(unexpandedHash), modulus]));
}

/**
 * Hash password in version 3 and 4.
 */
function hashPassword3(password: string, salt: string, modulus: Uint8Array): Promise<Uint8Array> {
  const saltBinary = binaryStringToArray(salt + SALT_SUFFIX);
  const bcryptSalt = bcryptEncodeBase64(Array.from(saltBinary), saltBinary.length);
  return formatHash(password, bcryptSalt, modulus);
}

/**
 * Hash password in version 1 and 2.
 */
function hashPassword1(password: string, username: string, modulus: Uint8Array): Promise<Uint8Array> {
  const value = binaryStringToArray(encodeUtf8(username.toLowerCase()));
  const salt = toHex(CryptoProxy.computeHash({ algorithm: 'unsafeMD5', data: value }));
  return formatHash(password, salt, modulus);
}

/**
 * Hash password in version 0.
 */
function hashPassword0(password: string, username: string, modulus: Uint8Array): Promise<Uint8Array> {
  const value = CryptoProxy.computeHash({
    algorithm: 'SHA512',
    data: binaryStringToArray(username.toLowerCase() + encodeUtf8(password)),
  });
  return hashPassword1(toBase64(value), username, modulus);
}

function missing(field: string, version: number): AppError {
  return new AppError(`Missing ${field}`, ErrorCode.VALIDATION_ERROR, { version });
}

/**
 * Hash a password based on the auth version.
 */
export async function hashPassword({
  password,
  salt,
  username,
  modulus,
  version,
}: HashPasswordParams): Promise<Uint8Array> {
  switch (version) {
    case 4:
    case 3:
      if (!salt) throw missing('salt', version);
      return hashPassword3(password, salt, modulus);

    case 2:
      if (!username) throw missing('username', version);
      return hashPassword1(password, cleanUsername(username), modulus);

    case 1:
      if (!username) throw missing('username', version);
      return hashPassword1(password, username, modulus);

    case 0:
      if (!username) throw missing('username', version);
      return hashPassword0(password, username, modulus);

    default:
      throw new AppError('Unsupported auth version', ErrorCode.UNSUPPORTED_AUTH_VERSION, { version });
  }
}
