/**
 * VAPID public key as handed to `PushManager.subscribe()`
 */
export interface VapidPublicKeyResponse {
  /**
   * base64url, uncompressed P-256 point
   */
  publicKey: string;

  /**
   * Prefix of the public key; clients resubscribe when it changes
   */
  keyId: string;
}

/**
 * Signing keys known to a rotating signer
 */
export interface KeyListing {
  current: string;

  /**
   * Most recently retired first
   */
  previous: string[];
}

/**
 * Outcome of a usage-driven key cleanup
 */
export interface KeyCleanupResult {
  removedKeys: string[];
  retainedKeys: string[];
}

export interface KeyRotationResponse extends KeyListing {
  /**
   * PEM file the new current key was written to
   */
  keyPath: string;
}
