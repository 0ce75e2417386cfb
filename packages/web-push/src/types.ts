import type { PushMessageOptions } from '@relaypush/shared';

export interface SendOptions extends PushMessageOptions {
  /**
   * Cancels signing and the HTTP request
   */
  signal?: AbortSignal;
}

/**
 * A request ready to be handed to any HTTP client
 */
export interface BuiltPushRequest {
  endpoint: string;
  method: 'POST';
  headers: Record<string, string>;
  body: Uint8Array;
}
