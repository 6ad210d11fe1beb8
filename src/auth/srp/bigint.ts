/**
 * BigInt helpers for the SRP computation.
 *
 * Byte arrays on the wire are little-endian; every conversion names the
 * endianness it expects.
 */

import { randomBytes } from 'crypto';

/**
 * Modular exponentiation: (base^exponent) mod modulus
 */
export function modExp(base: bigint, exponent: bigint, modulus: bigint): bigint {
  if (modulus === 1n) return 0n;

  let result = 1n;
  base = mod(base, modulus);

  while (exponent > 0n) {
    if (exponent & 1n) {
      result = (result * base) % modulus;
    }
    exponent >>= 1n;
    base = (base * base) % modulus;
  }

  return result;
}

/**
 * Modulo operation that never returns a negative value
 */
export function mod(n: bigint, modulus: bigint): bigint {
  const result = n % modulus;
  return result < 0n ? result + modulus : result;
}

/**
 * Get byte length of a BigInt
 */
export function byteLength(n: bigint): number {
  if (n === 0n) return 1;
  return Math.ceil(bitLength(n) / 8);
}

export function bitLength(n: bigint): number {
  return n === 0n ? 0 : n.toString(2).length;
}

/**
 * Convert BigInt to Uint8Array
 * @param n - BigInt to convert
 * @param endianness - 'be' for big-endian, 'le' for little-endian
 * @param length - Target length in bytes; shorter values are zero-padded
 */
export function bigIntToUint8Array(
  n: bigint,
  endianness: 'be' | 'le' = 'be',
  length?: number
): Uint8Array {
  const size = Math.max(byteLength(n), length ?? 0);
  const arr = new Uint8Array(size);
  let rest = n;
  for (let i = 0; i < size; i++) {
    arr[endianness === 'le' ? i : size - 1 - i] = Number(rest & 0xffn);
    rest >>= 8n;
  }
  return arr;
}

/**
 * Convert Uint8Array to BigInt
 * @param arr - Uint8Array to convert
 * @param endianness - 'be' for big-endian, 'le' for little-endian
 */
export function uint8ArrayToBigInt(arr: Uint8Array, endianness: 'be' | 'le' = 'be'): bigint {
  const bytes = endianness === 'le' ? arr.slice().reverse() : arr;
  const hex = Array.from(bytes)
    .map(byte => byte.toString(16).padStart(2, '0'))
    .join('');
  return BigInt('0x' + (hex || '0'));
}

/**
 * Uniformly random integer with the given number of bytes
 */
export function randomBigInt(bytes: number): bigint {
  return uint8ArrayToBigInt(randomBytes(bytes), 'be');
}

/**
 * Random integer in [min, max)
 */
export function randomBigIntInRange(min: bigint, max: bigint): bigint {
  const range = max - min;
  if (range <= 0n) {
    throw new RangeError('Empty range');
  }
  const bytes = byteLength(range);
  // Rejection sampling keeps the distribution uniform
  for (;;) {
    const candidate = randomBigInt(bytes);
    if (candidate < range) {
      return min + candidate;
    }
  }
}

const SMALL_PRIMES = [3n, 5n, 7n, 11n, 13n, 17n, 19n, 23n, 29n, 31n, 37n, 41n, 43n, 47n];

/**
 * Miller-Rabin probable-prime test with random bases
 */
export function isProbablePrime(n: bigint, rounds: number = 10): boolean {
  if (n < 2n) return false;
  if (n === 2n) return true;
  if ((n & 1n) === 0n) return false;

  for (const p of SMALL_PRIMES) {
    if (n === p) return true;
    if (n % p === 0n) return false;
  }

  let d = n - 1n;
  let s = 0;
  while ((d & 1n) === 0n) {
    d >>= 1n;
    s++;
  }

  witness: for (let i = 0; i < rounds; i++) {
    const a = randomBigIntInRange(2n, n - 2n);
    let x = modExp(a, d, n);
    if (x === 1n || x === n - 1n) continue;

    for (let r = 1; r < s; r++) {
      x = (x * x) % n;
      if (x === n - 1n) continue witness;
    }
    return false;
  }

  return true;
}
