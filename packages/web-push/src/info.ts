/**
 * Based on @block65/webcrypto-web-push
 * https://github.com/block65/webcrypto-web-push
 * Copyright 2024 Block65 Pte Ltd - MIT License
 *
 * Info strings for the RFC 8291 key derivation
 */

import { concatBytes } from './utils';

const encoder = new TextEncoder();

/**
 * "WebPush: info" || 0x00 || ua_public || as_public
 */
export function createKeyInfo(clientPublic: Uint8Array, serverPublic: Uint8Array): Uint8Array {
  return concatBytes(encoder.encode('WebPush: info\0'), clientPublic, serverPublic);
}

/**
 * "Content-Encoding: <type>" || 0x00, used for the content encryption key and the nonce
 */
export function createContentEncodingInfo(type: 'aes128gcm' | 'nonce'): Uint8Array {
  return encoder.encode(`Content-Encoding: ${type}\0`);
}
