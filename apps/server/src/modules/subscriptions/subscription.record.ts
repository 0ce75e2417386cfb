import type { PushSubscriptionJSON } from '@relaypush/shared';

/**
 * A stored browser subscription
 */
export interface SubscriptionRecord {
  id: string;
  userId?: string;
  subscription: PushSubscriptionJSON;
  /**
   * Base64url public key that was current when the browser subscribed. Messages to this subscriber must be
   * signed with this key until it resubscribes.
   */
  vapidKey: string;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Input of SubscriptionRepository.save. Timestamps are managed by the repository.
 */
export type NewSubscriptionRecord = Omit<SubscriptionRecord, 'createdAt' | 'updatedAt'> & {
  createdAt?: Date;
};

export class SubscriptionNotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SubscriptionNotFoundError';
  }
}

export class SubscriptionConflictError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SubscriptionConflictError';
  }
}

export function copyRecord(record: SubscriptionRecord): SubscriptionRecord {
  return {
    ...record,
    subscription: {
      ...record.subscription,
      keys: { ...record.subscription.keys },
    },
    createdAt: new Date(record.createdAt),
    updatedAt: new Date(record.updatedAt),
  };
}
