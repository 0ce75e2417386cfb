import { randomUUID } from 'node:crypto';

import { BadRequestException, Inject, Injectable, Logger } from '@nestjs/common';
import type { NotificationPayload, PingResponse, PushMessageOptions, SubscribeResponse } from '@relaypush/shared';
import {
  getErrorMessage,
  parseSubscription,
  PushClient,
  PushRejectedError,
  RotatingSigner,
  type PushTransport,
} from '@relaypush/web-push';

import { toHttpException } from '../../common/http-errors';
import { PushServiceWhitelistConfig } from '../../config/push-service-whitelist.config';
import { VapidConfig } from '../../config/vapid.config';
import { SubscriptionNotFoundError, type SubscriptionRecord } from '../subscriptions/subscription.record';
import { SubscriptionRepository } from '../subscriptions/subscription.repository';
import { PushTransportToken } from './push-transport.provider';
import { PingReqBody, SubscribeReqBody } from './push.dto';

const BROADCAST_PAGE_SIZE = 1000;

const BROADCAST_OPTIONS: PushMessageOptions = { ttl: 3600, urgency: 'normal' };

@Injectable()
export class PushService {
  private readonly logger = new Logger(PushService.name);

  constructor(
    @Inject(RotatingSigner) private readonly signer: RotatingSigner,
    @Inject(SubscriptionRepository) private readonly subscriptions: SubscriptionRepository,
    @Inject(VapidConfig) private readonly vapidConfig: Pick<VapidConfig, 'subject'>,
    @Inject(PushServiceWhitelistConfig)
    private readonly pushServiceWhitelistConfig: PushServiceWhitelistConfig,
    @Inject(PushTransportToken) private readonly transport: PushTransport,
  ) {}

  async subscribe(reqBody: SubscribeReqBody): Promise<SubscribeResponse> {
    const subscription = {
      endpoint: reqBody.endpoint,
      expirationTime: reqBody.expirationTime ?? null,
      keys: { p256dh: reqBody.keys.p256dh, auth: reqBody.keys.auth },
    };

    try {
      parseSubscription(subscription);
    } catch (error) {
      throw toHttpException(error);
    }
    if (!this.isAllowedPushService(subscription.endpoint)) {
      throw new BadRequestException('Push service is not allowed');
    }

    try {
      const existing = await this.subscriptions.getByEndpoint(subscription.endpoint);
      return { id: existing.id, message: 'Already subscribed' };
    } catch (error) {
      if (!(error instanceof SubscriptionNotFoundError)) {
        throw error;
      }
    }

    try {
      const record = await this.subscriptions.save({
        id: randomUUID(),
        ...(reqBody.userId === undefined ? {} : { userId: reqBody.userId }),
        subscription,
        vapidKey: this.signer.publicKeyBase64(),
      });
      this.logger.log(`New subscription: ${record.id}`);
      return { id: record.id, message: 'Subscribed successfully' };
    } catch (error) {
      throw toHttpException(error);
    }
  }

  async unsubscribe(endpoint: string): Promise<{ message: string }> {
    try {
      await this.subscriptions.deleteByEndpoint(endpoint);
    } catch (error) {
      throw toHttpException(error);
    }
    this.logger.log(`Unsubscribed: ${endpoint}`);
    return { message: 'Unsubscribed successfully' };
  }

  /**
   * Send a notification to every stored subscription. Each subscriber gets a message signed with the key it
   * subscribed under; subscriptions the push service reports gone are deleted.
   */
  async ping(reqBody: PingReqBody, now = new Date()): Promise<PingResponse> {
    const payload: NotificationPayload = {
      title: reqBody.title || 'Ping!',
      body: reqBody.body || `Someone pinged the server at ${now.toISOString()}`,
    };
    const message = JSON.stringify(payload);

    const records = await this.listAll();
    const result: PingResponse = { sent: 0, failed: 0, pruned: 0 };
    if (records.length === 0) {
      this.logger.log('No subscribers to notify');
      return result;
    }

    for (const record of records) {
      try {
        await this.sendTo(record, message);
        result.sent++;
      } catch (error) {
        result.failed++;
        this.logger.warn(`Failed to send to ${record.id}: ${getErrorMessage(error)}`);
        if (error instanceof PushRejectedError && error.isGone() && (await this.prune(record))) {
          result.pruned++;
        }
      }
    }

    this.logger.log(`Push sent: ${result.sent} successful, ${result.failed} failed, ${result.pruned} pruned`);
    return result;
  }

  /**
   * Host check against ALLOWED_PUSH_SERVICE_HOSTS; `*.example.com` matches subdomains of example.com
   */
  isAllowedPushService(endpoint: string): boolean {
    const allowed = this.pushServiceWhitelistConfig.allowedPushServiceHosts;
    if (allowed.length === 0) {
      return true;
    }

    let hostname: string;
    try {
      hostname = new URL(endpoint).hostname;
    } catch {
      return false;
    }

    return allowed.some((allowedPattern) => {
      if (allowedPattern.startsWith('*.')) {
        return hostname.endsWith(allowedPattern.slice(1));
      }
      return hostname === allowedPattern;
    });
  }

  private async sendTo(record: SubscriptionRecord, message: string): Promise<void> {
    const signer = this.signer.getSignerForKey(record.vapidKey) ?? this.signer;
    const client = new PushClient(signer, this.vapidConfig.subject, this.transport);
    await client.send(parseSubscription(record.subscription), message, BROADCAST_OPTIONS);
  }

  private async prune(record: SubscriptionRecord): Promise<boolean> {
    try {
      await this.subscriptions.delete(record.id);
      this.logger.log(`Deleted expired subscription: ${record.id}`);
      return true;
    } catch (error) {
      if (!(error instanceof SubscriptionNotFoundError)) {
        this.logger.error(`Failed to delete expired subscription ${record.id}: ${getErrorMessage(error)}`);
      }
      return false;
    }
  }

  private async listAll(): Promise<SubscriptionRecord[]> {
    const records: SubscriptionRecord[] = [];
    for (let offset = 0; ; offset += BROADCAST_PAGE_SIZE) {
      const page = await this.subscriptions.list(BROADCAST_PAGE_SIZE, offset);
      records.push(...page);
      if (page.length < BROADCAST_PAGE_SIZE) {
        return records;
      }
    }
  }
}
