/**
 * Byte and string helpers shared by the SRP modules
 */

/**
 * Merge multiple Uint8Arrays into a single Uint8Array
 */
export function mergeUint8Arrays(arrays: Uint8Array[]): Uint8Array {
  const totalLength = arrays.reduce((sum, arr) => sum + arr.length, 0);
  const result = new Uint8Array(totalLength);
  let offset = 0;
  for (const arr of arrays) {
    result.set(arr, offset);
    offset += arr.length;
  }
  return result;
}

/**
 * Convert binary string to Uint8Array (one byte per char code)
 */
export function binaryStringToArray(str: string): Uint8Array {
  const arr = new Uint8Array(str.length);
  for (let i = 0; i < str.length; i++) {
    arr[i] = str.charCodeAt(i) & 0xff;
  }
  return arr;
}

/**
 * Convert Uint8Array to binary string
 */
export function arrayToBinaryString(arr: Uint8Array): string {
  let result = '';
  for (const byte of arr) {
    result += String.fromCharCode(byte);
  }
  return result;
}

/**
 * Encode a string as UTF-8 and return it as a binary string
 */
export function encodeUtf8(str: string): string {
  return arrayToBinaryString(new TextEncoder().encode(str));
}

export function toBase64(arr: Uint8Array): string {
  return Buffer.from(arr).toString('base64');
}

/**
 * Strict base64 decode; returns null for anything that is not canonical base64.
 */
export function fromBase64(base64: string): Uint8Array | null {
  const trimmed = base64.trim();
  if (!/^[A-Za-z0-9+/]*={0,2}$/.test(trimmed) || trimmed.length % 4 !== 0) {
    return null;
  }
  return new Uint8Array(Buffer.from(trimmed, 'base64'));
}

export function toHex(arr: Uint8Array): string {
  return Buffer.from(arr).toString('hex');
}
