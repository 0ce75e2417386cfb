import type { ValueOf } from '../util';

/**
 * Urgency levels understood by push services (RFC 8030 section 5.3)
 */
export const PushUrgency = {
  veryLow: 'very-low',
  low: 'low',
  normal: 'normal',
  high: 'high',
} as const;
export type PushUrgency = ValueOf<typeof PushUrgency>;

export const PUSH_URGENCIES: readonly PushUrgency[] = Object.values(PushUrgency);

/**
 * Type guard for PushUrgency
 */
export function isPushUrgency(value: unknown): value is PushUrgency {
  return typeof value === 'string' && PUSH_URGENCIES.some((urgency) => urgency === value);
}

/**
 * Subscription as produced by the browser's `PushSubscription.toJSON()`
 */
export interface PushSubscriptionJSON {
  /**
   * Push service endpoint, must be https
   */
  endpoint: string;

  /**
   * DOMHighResTimeStamp, or null when the subscription does not expire
   */
  expirationTime?: number | null;

  keys: {
    /**
     * User agent's P-256 ECDH public key (base64url, uncompressed point)
     */
    p256dh: string;
    /**
     * 16-byte authentication secret (base64url)
     */
    auth: string;
  };
}

/**
 * Type guard for PushSubscriptionJSON (shape only, values are validated by the parser)
 */
export function isPushSubscriptionJSON(obj: unknown): obj is PushSubscriptionJSON {
  if (typeof obj !== 'object' || obj === null) return false;
  if (!('endpoint' in obj) || typeof obj.endpoint !== 'string') return false;
  if (!('keys' in obj) || typeof obj.keys !== 'object' || obj.keys === null) return false;
  const keys = obj.keys;
  return 'p256dh' in keys && typeof keys.p256dh === 'string' && 'auth' in keys && typeof keys.auth === 'string';
}

/**
 * Per-message delivery options
 */
export interface PushMessageOptions {
  /**
   * Seconds the push service should retain the message (defaults to four weeks)
   */
  ttl?: number;

  urgency?: PushUrgency;

  /**
   * Replaces any pending message carrying the same topic
   */
  topic?: string;
}

/**
 * Notification content sent by the server's broadcast endpoint
 */
export interface NotificationPayload {
  title: string;
  body: string;
}

export interface SubscribeResponse {
  id: string;
  message: string;
}

/**
 * Outcome of a broadcast
 */
export interface PingResponse {
  sent: number;
  failed: number;
  /**
   * Subscriptions removed because the push service reported them gone
   */
  pruned: number;
}
