import type { NewSubscriptionRecord, SubscriptionRecord } from './subscription.record';

/**
 * Storage port for push subscriptions.
 *
 * Lookups and deletions of a single record throw SubscriptionNotFoundError when nothing matches; saving a
 * second record for an endpoint that is already stored throws SubscriptionConflictError.
 */
export abstract class SubscriptionRepository {
  /**
   * Insert or update by id. `createdAt` is kept from an existing record and `updatedAt` is refreshed.
   */
  abstract save(record: NewSubscriptionRecord): Promise<SubscriptionRecord>;

  abstract get(id: string): Promise<SubscriptionRecord>;

  abstract getByEndpoint(endpoint: string): Promise<SubscriptionRecord>;

  abstract getByUserId(userId: string): Promise<SubscriptionRecord[]>;

  abstract getByVapidKey(vapidKey: string): Promise<SubscriptionRecord[]>;

  /**
   * Number of subscribers bound to a VAPID key, used to decide whether a retired key can be dropped
   */
  abstract countByVapidKey(vapidKey: string): Promise<number>;

  abstract delete(id: string): Promise<void>;

  abstract deleteByEndpoint(endpoint: string): Promise<void>;

  /**
   * Records in insertion order
   */
  abstract list(limit: number, offset: number): Promise<SubscriptionRecord[]>;

  abstract close(): Promise<void>;
}
