import {
  copyRecord,
  SubscriptionConflictError,
  SubscriptionNotFoundError,
  type NewSubscriptionRecord,
  type SubscriptionRecord,
} from './subscription.record';
import { SubscriptionRepository } from './subscription.repository';

/**
 * Process-local store. Records are copied on the way in and out so callers cannot mutate stored state.
 */
export class MemorySubscriptionRepository extends SubscriptionRepository {
  private readonly records = new Map<string, SubscriptionRecord>();

  async save(record: NewSubscriptionRecord): Promise<SubscriptionRecord> {
    for (const stored of this.records.values()) {
      if (stored.id !== record.id && stored.subscription.endpoint === record.subscription.endpoint) {
        throw new SubscriptionConflictError(`Endpoint is already subscribed as ${stored.id}`);
      }
    }

    const now = new Date();
    const existing = this.records.get(record.id);
    const saved: SubscriptionRecord = copyRecord({
      ...record,
      createdAt: existing?.createdAt ?? record.createdAt ?? now,
      updatedAt: now,
    });
    this.records.set(saved.id, saved);
    return copyRecord(saved);
  }

  async get(id: string): Promise<SubscriptionRecord> {
    const record = this.records.get(id);
    if (!record) {
      throw new SubscriptionNotFoundError(`Subscription ${id} not found`);
    }
    return copyRecord(record);
  }

  async getByEndpoint(endpoint: string): Promise<SubscriptionRecord> {
    const record = this.find((r) => r.subscription.endpoint === endpoint)[0];
    if (!record) {
      throw new SubscriptionNotFoundError(`No subscription for endpoint ${endpoint}`);
    }
    return record;
  }

  async getByUserId(userId: string): Promise<SubscriptionRecord[]> {
    return this.find((r) => r.userId === userId);
  }

  async getByVapidKey(vapidKey: string): Promise<SubscriptionRecord[]> {
    return this.find((r) => r.vapidKey === vapidKey);
  }

  async countByVapidKey(vapidKey: string): Promise<number> {
    let count = 0;
    for (const record of this.records.values()) {
      if (record.vapidKey === vapidKey) {
        count++;
      }
    }
    return count;
  }

  async delete(id: string): Promise<void> {
    if (!this.records.delete(id)) {
      throw new SubscriptionNotFoundError(`Subscription ${id} not found`);
    }
  }

  async deleteByEndpoint(endpoint: string): Promise<void> {
    for (const [id, record] of this.records) {
      if (record.subscription.endpoint === endpoint) {
        this.records.delete(id);
        return;
      }
    }
    throw new SubscriptionNotFoundError(`No subscription for endpoint ${endpoint}`);
  }

  async list(limit: number, offset: number): Promise<SubscriptionRecord[]> {
    return [...this.records.values()].slice(offset, offset + limit).map(copyRecord);
  }

  async close(): Promise<void> {}

  private find(predicate: (record: SubscriptionRecord) => boolean): SubscriptionRecord[] {
    return [...this.records.values()].filter(predicate).map(copyRecord);
  }
}
