/**
 * Base64 encoding/decoding utilities with URL-safe format support
 */

const BASE64URL_PATTERN = /^[A-Za-z0-9_-]*$/;

/**
 * Decode a base64 string to bytes
 */
export function decodeBase64(str: string): Uint8Array {
  const binaryString = atob(str);
  const bytes = new Uint8Array(binaryString.length);
  for (let i = 0; i < binaryString.length; i++) {
    bytes[i] = binaryString.charCodeAt(i);
  }
  return bytes;
}

/**
 * Encode bytes to base64 string
 */
export function encodeBase64(buffer: ArrayBuffer | Uint8Array): string {
  const bytes = buffer instanceof Uint8Array ? buffer : new Uint8Array(buffer);
  let binary = '';
  for (let i = 0; i < bytes.byteLength; i++) {
    binary += String.fromCharCode(bytes[i]);
  }
  return btoa(binary);
}

/**
 * Decode an unpadded URL-safe base64 string to bytes.
 * Throws on characters outside the URL-safe alphabet or an impossible length.
 */
export function decodeBase64Url(str: string): Uint8Array {
  if (!BASE64URL_PATTERN.test(str) || str.length % 4 === 1) {
    throw new Error('Invalid base64url string');
  }
  const padded = str.replace(/-/g, '+').replace(/_/g, '/') + '='.repeat((4 - (str.length % 4)) % 4);
  return decodeBase64(padded);
}

/**
 * Decode a URL-safe base64 string, returning undefined instead of throwing
 */
export function tryDecodeBase64Url(str: string): Uint8Array | undefined {
  try {
    return decodeBase64Url(str);
  } catch {
    return undefined;
  }
}

/**
 * Encode bytes to unpadded URL-safe base64 string
 */
export function encodeBase64Url(buffer: ArrayBuffer | Uint8Array): string {
  return encodeBase64(buffer).replace(/\//g, '_').replace(/\+/g, '-').replace(/=+$/, '');
}

/**
 * Convert object to URL-safe base64 string of its JSON form
 */
export function objectToBase64Url(obj: object): string {
  return encodeBase64Url(new TextEncoder().encode(JSON.stringify(obj)));
}

/**
 * Convert URL-safe base64 JSON back to a value
 */
export function base64UrlToObject(str: string): unknown {
  return JSON.parse(new TextDecoder().decode(decodeBase64Url(str)));
}
