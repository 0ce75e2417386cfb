/**
 * Error taxonomy for the push core.
 *
 * Every error thrown by this package extends WebPushError and carries a `kind` so that callers can tell
 * input problems, cryptographic failures, signer failures, delivery failures and rotation misuse apart
 * without string matching. Wrapped errors travel unmodified in `cause`.
 */

export type WebPushErrorKind = 'validation' | 'crypto' | 'signer' | 'delivery' | 'rotation';

export abstract class WebPushError extends Error {
  abstract readonly kind: WebPushErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

// validation

export class InvalidSubscriptionError extends WebPushError {
  readonly kind = 'validation';
}

export class InvalidEndpointError extends WebPushError {
  readonly kind = 'validation';
}

export class InvalidPushOptionsError extends WebPushError {
  readonly kind = 'validation';
}

export class MalformedKeyError extends WebPushError {
  readonly kind = 'validation';
}

export class MalformedSecretError extends WebPushError {
  readonly kind = 'validation';
}

export class MalformedRecordError extends WebPushError {
  readonly kind = 'validation';
}

// crypto

export class CryptoFailureError extends WebPushError {
  readonly kind = 'crypto';
}

// signer

export class SigningFailedError extends WebPushError {
  readonly kind = 'signer';
}

// delivery

export class PushRejectedError extends WebPushError {
  readonly kind = 'delivery';

  constructor(
    readonly statusCode: number,
    readonly body: string,
  ) {
    super(`Push service returned ${statusCode}: ${body}`);
  }

  /**
   * 404 and 410 mean the subscription no longer exists and its record should be dropped
   */
  isGone(): boolean {
    return this.statusCode === 404 || this.statusCode === 410;
  }
}

export class PushTransportError extends WebPushError {
  readonly kind = 'delivery';
}

// rotation

export class CannotRemoveCurrentKeyError extends WebPushError {
  readonly kind = 'rotation';

  constructor() {
    super('Cannot remove the current key');
  }
}

export class KeyNotFoundError extends WebPushError {
  readonly kind = 'rotation';

  constructor() {
    super('Key not found');
  }
}

export class NoPreviousKeysError extends WebPushError {
  readonly kind = 'rotation';

  constructor() {
    super('No previous keys to remove');
  }
}

export function isWebPushError(err: unknown): err is WebPushError {
  return err instanceof WebPushError;
}

/**
 * Extract error message from unknown error value.
 */
export function getErrorMessage(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  if (typeof err === 'string') {
    return err;
  }
  if (typeof err === 'object' && err !== null && 'message' in err && typeof err.message === 'string') {
    return err.message;
  }
  try {
    return String(err);
  } catch {
    return 'Unknown error';
  }
}
