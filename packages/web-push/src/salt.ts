/**
 * Based on @block65/webcrypto-web-push
 * https://github.com/block65/webcrypto-web-push
 * Copyright 2024 Block65 Pte Ltd - MIT License
 *
 * Generate random salt for encryption
 */

import { randomBytes } from './webcrypto';

export const SALT_LENGTH = 16;

export function getSalt(): Uint8Array {
  return randomBytes(SALT_LENGTH);
}
