/**
 * Push client: encrypts a payload for one subscription, authenticates with VAPID and posts it to the
 * subscription's push service.
 */

import { isPushUrgency } from '@relaypush/shared';

import { encryptNotification } from './encrypt';
import { InvalidPushOptionsError, InvalidSubscriptionError, PushRejectedError, PushTransportError } from './errors';
import type { Signer } from './signer';
import type { Subscription } from './subscription';
import { fetchTransport, type PushResponse, type PushTransport } from './transport';
import type { BuiltPushRequest, SendOptions } from './types';
import { buildVapidAssertion, vapidAuthorization } from './vapid';

/**
 * Four weeks, the longest retention push services commonly accept
 */
export const DEFAULT_TTL = 2419200;

const TOPIC_PATTERN = /^[A-Za-z0-9_-]{1,32}$/;

function validateOptions(options: SendOptions): void {
  if (options.ttl !== undefined && (!Number.isInteger(options.ttl) || options.ttl < 0)) {
    throw new InvalidPushOptionsError(`ttl must be a non-negative integer, got ${options.ttl}`);
  }
  if (options.urgency !== undefined && !isPushUrgency(options.urgency)) {
    throw new InvalidPushOptionsError(`unknown urgency: ${options.urgency}`);
  }
  if (options.topic !== undefined && !TOPIC_PATTERN.test(options.topic)) {
    throw new InvalidPushOptionsError('topic must be 1-32 characters from the URL-safe base64 alphabet');
  }
}

export class PushClient {
  readonly #signer: Signer;
  readonly #subject: string;
  readonly #transport: PushTransport;

  /**
   * @param subject - contact URI for the push service operator, `mailto:` or `https:`
   */
  constructor(signer: Signer, subject: string, transport: PushTransport = fetchTransport) {
    this.#signer = signer;
    this.#subject = subject;
    this.#transport = transport;
  }

  get signer(): Signer {
    return this.#signer;
  }

  get subject(): string {
    return this.#subject;
  }

  /**
   * Copy of this client that sends through `transport`
   */
  withTransport(transport: PushTransport): PushClient {
    return new PushClient(this.#signer, this.#subject, transport);
  }

  /**
   * Encrypt and authenticate a message without sending it
   */
  async buildRequest(
    subscription: Subscription,
    payload: Uint8Array | string,
    options: SendOptions = {},
  ): Promise<BuiltPushRequest> {
    if (!subscription.endpoint.startsWith('https://')) {
      throw new InvalidSubscriptionError(`Push endpoint must use https: ${subscription.endpoint}`);
    }
    validateOptions(options);

    const plaintext = typeof payload === 'string' ? new TextEncoder().encode(payload) : payload;
    const body = await encryptNotification(subscription.clientPublicKey, subscription.clientAuthSecret, plaintext);
    const assertion = await buildVapidAssertion(subscription.endpoint, this.#subject, this.#signer, {
      signal: options.signal,
    });

    const headers: Record<string, string> = {
      Authorization: vapidAuthorization(assertion),
      'Content-Encoding': 'aes128gcm',
      'Content-Type': 'application/octet-stream',
      TTL: String(options.ttl ?? DEFAULT_TTL),
    };
    if (options.urgency) {
      headers.Urgency = options.urgency;
    }
    if (options.topic) {
      headers.Topic = options.topic;
    }

    return { endpoint: subscription.endpoint, method: 'POST', headers, body };
  }

  /**
   * Deliver one message. Resolves once the push service has accepted it (2xx).
   */
  async send(subscription: Subscription, payload: Uint8Array | string, options: SendOptions = {}): Promise<void> {
    const { endpoint, method, headers, body } = await this.buildRequest(subscription, payload, options);

    let response: PushResponse;
    try {
      response = await this.#transport(endpoint, { method, headers, body, signal: options.signal });
    } catch (error) {
      throw new PushTransportError(`Failed to reach push service at ${endpoint}`, { cause: error });
    }

    if (response.status < 200 || response.status >= 300) {
      let text = '';
      try {
        text = await response.text();
      } catch (error) {
        throw new PushTransportError(`Failed to read push service response (${response.status})`, { cause: error });
      }
      throw new PushRejectedError(response.status, text);
    }
  }
}
