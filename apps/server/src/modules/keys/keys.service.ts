import { dirname, join } from 'node:path';

import { Inject, Injectable, Logger } from '@nestjs/common';
import type { KeyCleanupResult, KeyListing, KeyRotationResponse, VapidPublicKeyResponse } from '@relaypush/shared';
import { generateFileSigner, RotatingSigner } from '@relaypush/web-push';

import { toHttpException } from '../../common/http-errors';
import { VapidConfig } from '../../config/vapid.config';
import { SubscriptionRepository } from '../subscriptions/subscription.repository';

/**
 * Clients compare this prefix of the public key to notice a rotation and resubscribe
 */
export const KEY_ID_LENGTH = 16;

@Injectable()
export class KeysService {
  private readonly logger = new Logger(KeysService.name);

  constructor(
    @Inject(RotatingSigner) private readonly signer: RotatingSigner,
    @Inject(SubscriptionRepository) private readonly subscriptions: SubscriptionRepository,
    @Inject(VapidConfig) private readonly vapidConfig: Pick<VapidConfig, 'keyPath'>,
  ) {}

  getPublicKey(): VapidPublicKeyResponse {
    const publicKey = this.signer.publicKeyBase64();
    return { publicKey, keyId: publicKey.slice(0, KEY_ID_LENGTH) };
  }

  listKeys(): KeyListing {
    return {
      current: this.signer.publicKeyBase64(),
      previous: this.signer.previousKeysBase64(),
    };
  }

  /**
   * Generate a key file next to the configured key and make it current
   */
  async rotate(): Promise<KeyRotationResponse> {
    const keyPath = join(dirname(this.vapidConfig.keyPath), `vapid-${Date.now()}.pem`);
    const next = await generateFileSigner(keyPath);
    await this.signer.rotate(next);

    this.logger.log(`Rotated VAPID key, new key ${next.publicKeyBase64().slice(0, KEY_ID_LENGTH)} at ${keyPath}`);
    return { ...this.listKeys(), keyPath };
  }

  /**
   * Drop previous keys that no stored subscription was created with
   */
  async cleanup(): Promise<KeyCleanupResult> {
    const result = await this.signer.removeUnusedKeys({
      countByKey: (key) => this.subscriptions.countByVapidKey(key),
    });
    this.logger.log(`Key cleanup removed ${result.removedKeys.length}, kept ${result.retainedKeys.length}`);
    return result;
  }

  async removeKey(key: string): Promise<KeyListing> {
    try {
      await this.signer.removeKey(key);
    } catch (error) {
      throw toHttpException(error);
    }
    this.logger.log(`Removed VAPID key ${key.slice(0, KEY_ID_LENGTH)}`);
    return this.listKeys();
  }
}
