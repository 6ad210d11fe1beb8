/**
 * Client side of SRP-6a over the 2048-bit expand hash.
 *
 * All arrays are little-endian and exactly `byteLength` long. The client
 * secret `a` is created and dropped inside generateProofs.
 */

import { timingSafeEqual } from 'crypto';
import { CryptoProxy } from './crypto-proxy';
import { SRP_GENERATOR } from './constants';
import {
  bigIntToUint8Array,
  byteLength as bigIntByteLength,
  mod,
  modExp,
  randomBigIntInRange,
  uint8ArrayToBigInt,
} from './bigint';
import { fromBase64, mergeUint8Arrays } from './utils';
import { AppError, ErrorCode } from '../../errors/types';
import { logger } from '../../utils/logger';

export interface GenerateProofsParams {
  byteLength: number;
  modulusArray: Uint8Array;
  hashedPasswordArray: Uint8Array;
  serverEphemeralArray: Uint8Array;
}

export interface SRPProofs {
  clientEphemeral: Uint8Array;
  clientProof: Uint8Array;
  expectedServerProof: Uint8Array;
  sharedSession: Uint8Array;
}

function readModulus(modulusArray: Uint8Array, byteLength: number): bigint {
  const modulus = uint8ArrayToBigInt(modulusArray, 'le');
  if (modulusArray.length !== byteLength || bigIntByteLength(modulus) !== byteLength) {
    throw new AppError('SRP modulus has incorrect size', ErrorCode.INVALID_MODULUS, {
      expected: byteLength,
      actual: bigIntByteLength(modulus),
    });
  }
  return modulus;
}

function invalidServerEphemeral(reason: string): AppError {
  logger.warn(`Rejected SRP server ephemeral (${reason}); possible tampering`);
  return new AppError('SRP server ephemeral is out of bounds', ErrorCode.INVALID_SERVER_EPHEMERAL, { reason });
}

/**
 * k = H(g | N) mod N
 */
export function computeMultiplier(modulusArray: Uint8Array, byteLength: number): bigint {
  const modulus = readModulus(modulusArray, byteLength);
  const generatorArray = bigIntToUint8Array(SRP_GENERATOR, 'le', byteLength);
  const multiplierHash = CryptoProxy.expandHash(mergeUint8Arrays([generatorArray, modulusArray]));
  return mod(uint8ArrayToBigInt(multiplierHash, 'le'), modulus);
}

/**
 * u = H(A | B)
 */
export function computeScramblingParam(clientEphemeralArray: Uint8Array, serverEphemeralArray: Uint8Array): bigint {
  const hash = CryptoProxy.expandHash(mergeUint8Arrays([clientEphemeralArray, serverEphemeralArray]));
  return uint8ArrayToBigInt(hash, 'le');
}

/**
 * Generate a fresh client ephemeral and both proofs for one handshake
 */
export function generateProofs({
  byteLength,
  modulusArray,
  hashedPasswordArray,
  serverEphemeralArray,
}: GenerateProofsParams): SRPProofs {
  const modulus = readModulus(modulusArray, byteLength);
  const multiplier = computeMultiplier(modulusArray, byteLength);

  if (serverEphemeralArray.length !== byteLength) {
    throw invalidServerEphemeral(`expected ${byteLength} bytes, got ${serverEphemeralArray.length}`);
  }
  const serverEphemeral = uint8ArrayToBigInt(serverEphemeralArray, 'le');
  if (mod(serverEphemeral, modulus) === 0n) {
    throw invalidServerEphemeral('B mod N is zero');
  }

  const hashedPassword = uint8ArrayToBigInt(hashedPasswordArray, 'le');
  const modulusMinusOne = modulus - 1n;
  const secretFloor = BigInt(byteLength * 8 * 2);

  let clientSecret: bigint;
  let clientEphemeral: bigint;
  do {
    clientSecret = randomBigIntInRange(secretFloor + 1n, modulusMinusOne);
    clientEphemeral = modExp(SRP_GENERATOR, clientSecret, modulus);
  } while (clientEphemeral <= 1n);

  const clientEphemeralArray = bigIntToUint8Array(clientEphemeral, 'le', byteLength);

  const scramblingParam = computeScramblingParam(clientEphemeralArray, serverEphemeralArray);
  if (scramblingParam === 0n) {
    throw invalidServerEphemeral('scrambling parameter is zero');
  }

  // S = (B - k * g^x) ^ (a + u * x) mod N
  const kgx = mod(modExp(SRP_GENERATOR, hashedPassword, modulus) * multiplier, modulus);
  const sharedSessionKeyExponent = mod(scramblingParam * hashedPassword + clientSecret, modulusMinusOne);
  const sharedSessionKeyBase = mod(serverEphemeral - kgx, modulus);
  const sharedSessionKey = modExp(sharedSessionKeyBase, sharedSessionKeyExponent, modulus);

  const sharedSessionArray = bigIntToUint8Array(sharedSessionKey, 'le', byteLength);

  const clientProof = CryptoProxy.expandHash(
    mergeUint8Arrays([clientEphemeralArray, serverEphemeralArray, sharedSessionArray])
  );
  const expectedServerProof = CryptoProxy.expandHash(
    mergeUint8Arrays([clientEphemeralArray, clientProof, sharedSessionArray])
  );

  return {
    clientEphemeral: clientEphemeralArray,
    clientProof,
    expectedServerProof,
    sharedSession: sharedSessionArray,
  };
}

/**
 * v = g^x mod N
 */
export function generateVerifier({
  byteLength,
  modulusArray,
  hashedPasswordArray,
}: Omit<GenerateProofsParams, 'serverEphemeralArray'>): Uint8Array {
  const modulus = readModulus(modulusArray, byteLength);
  const hashedPassword = uint8ArrayToBigInt(hashedPasswordArray, 'le');
  return bigIntToUint8Array(modExp(SRP_GENERATOR, hashedPassword, modulus), 'le', byteLength);
}

/**
 * Constant-time comparison of two proofs. Length is not secret, so
 * differing lengths return early.
 */
export function proofsEqual(expected: Uint8Array, received: Uint8Array): boolean {
  if (expected.length === 0 || expected.length !== received.length) {
    return false;
  }
  return timingSafeEqual(expected, received);
}

/**
 * Verify the server proof (base64) against the one computed during the handshake
 * @throws AppError(SERVER_PROOF_MISMATCH) on any difference
 */
export function verifyServerProof(expectedServerProof: string, serverProof: string): void {
  const expected = fromBase64(expectedServerProof);
  const received = fromBase64(serverProof);

  if (!expected || !received || !proofsEqual(expected, received)) {
    throw new AppError(
      'Server authentication failed: invalid server proof',
      ErrorCode.SERVER_PROOF_MISMATCH
    );
  }
}
