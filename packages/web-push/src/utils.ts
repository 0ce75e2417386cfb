/**
 * Byte helpers shared by the encryption and signing code
 */

/**
 * Concatenate byte arrays into one
 */
export function concatBytes(...arrays: Uint8Array[]): Uint8Array {
  const length = arrays.reduce((total, arr) => total + arr.byteLength, 0);
  const out = new Uint8Array(length);
  let offset = 0;
  for (const arr of arrays) {
    out.set(arr, offset);
    offset += arr.byteLength;
  }
  return out;
}

/**
 * Constant-length comparison of two byte arrays
 */
export function equalBytes(a: Uint8Array, b: Uint8Array): boolean {
  if (a.byteLength !== b.byteLength) {
    return false;
  }
  let diff = 0;
  for (let i = 0; i < a.byteLength; i++) {
    diff |= a[i] ^ b[i];
  }
  return diff === 0;
}

/**
 * Encode an unsigned 32-bit integer as 4 big-endian bytes
 */
export function uint32BE(value: number): Uint8Array {
  const out = new Uint8Array(4);
  new DataView(out.buffer).setUint32(0, value, false);
  return out;
}
