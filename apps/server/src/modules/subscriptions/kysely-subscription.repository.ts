import { Logger } from '@nestjs/common';
import { sql, type Selectable } from 'kysely';

import { DatabaseService } from './database.service';
import type { SubscriptionsTable } from './database.types';
import {
  SubscriptionConflictError,
  SubscriptionNotFoundError,
  type NewSubscriptionRecord,
  type SubscriptionRecord,
} from './subscription.record';
import { SubscriptionRepository } from './subscription.repository';

function toRecord(row: Selectable<SubscriptionsTable>): SubscriptionRecord {
  return {
    id: row.id,
    ...(row.user_id === null ? {} : { userId: row.user_id }),
    subscription: {
      endpoint: row.endpoint,
      expirationTime: row.expiration_time,
      keys: { p256dh: row.p256dh, auth: row.auth },
    },
    vapidKey: row.vapid_key,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}

function isUniqueViolation(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    (error.code === 'SQLITE_CONSTRAINT_UNIQUE' || error.code === 'SQLITE_CONSTRAINT_PRIMARYKEY')
  );
}

export class KyselySubscriptionRepository extends SubscriptionRepository {
  private readonly logger = new Logger(KyselySubscriptionRepository.name);

  constructor(private readonly database: DatabaseService) {
    super();
  }

  async save(record: NewSubscriptionRecord): Promise<SubscriptionRecord> {
    const now = new Date().toISOString();
    try {
      const row = await this.database
        .getDb()
        .insertInto('subscriptions')
        .values({
          id: record.id,
          user_id: record.userId ?? null,
          endpoint: record.subscription.endpoint,
          expiration_time: record.subscription.expirationTime ?? null,
          p256dh: record.subscription.keys.p256dh,
          auth: record.subscription.keys.auth,
          vapid_key: record.vapidKey,
          created_at: (record.createdAt ?? new Date(now)).toISOString(),
          updated_at: now,
        })
        .onConflict((oc) =>
          oc.column('id').doUpdateSet((eb) => ({
            user_id: eb.ref('excluded.user_id'),
            endpoint: eb.ref('excluded.endpoint'),
            expiration_time: eb.ref('excluded.expiration_time'),
            p256dh: eb.ref('excluded.p256dh'),
            auth: eb.ref('excluded.auth'),
            vapid_key: eb.ref('excluded.vapid_key'),
            updated_at: eb.ref('excluded.updated_at'),
          })),
        )
        .returningAll()
        .executeTakeFirstOrThrow();

      this.logger.debug(`Saved subscription ${record.id}`);
      return toRecord(row);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new SubscriptionConflictError(`Endpoint ${record.subscription.endpoint} is already subscribed`);
      }
      throw error;
    }
  }

  async get(id: string): Promise<SubscriptionRecord> {
    const row = await this.database.getDb().selectFrom('subscriptions').selectAll().where('id', '=', id).executeTakeFirst();
    if (!row) {
      throw new SubscriptionNotFoundError(`Subscription ${id} not found`);
    }
    return toRecord(row);
  }

  async getByEndpoint(endpoint: string): Promise<SubscriptionRecord> {
    const row = await this.database
      .getDb()
      .selectFrom('subscriptions')
      .selectAll()
      .where('endpoint', '=', endpoint)
      .executeTakeFirst();
    if (!row) {
      throw new SubscriptionNotFoundError(`No subscription for endpoint ${endpoint}`);
    }
    return toRecord(row);
  }

  async getByUserId(userId: string): Promise<SubscriptionRecord[]> {
    const rows = await this.database
      .getDb()
      .selectFrom('subscriptions')
      .selectAll()
      .where('user_id', '=', userId)
      .orderBy(sql`rowid`)
      .execute();
    return rows.map(toRecord);
  }

  async getByVapidKey(vapidKey: string): Promise<SubscriptionRecord[]> {
    const rows = await this.database
      .getDb()
      .selectFrom('subscriptions')
      .selectAll()
      .where('vapid_key', '=', vapidKey)
      .orderBy(sql`rowid`)
      .execute();
    return rows.map(toRecord);
  }

  async countByVapidKey(vapidKey: string): Promise<number> {
    const { count } = await this.database
      .getDb()
      .selectFrom('subscriptions')
      .select((eb) => eb.fn.countAll<number>().as('count'))
      .where('vapid_key', '=', vapidKey)
      .executeTakeFirstOrThrow();
    return Number(count);
  }

  async delete(id: string): Promise<void> {
    const result = await this.database.getDb().deleteFrom('subscriptions').where('id', '=', id).executeTakeFirst();
    if (result.numDeletedRows === 0n) {
      throw new SubscriptionNotFoundError(`Subscription ${id} not found`);
    }
  }

  async deleteByEndpoint(endpoint: string): Promise<void> {
    const result = await this.database
      .getDb()
      .deleteFrom('subscriptions')
      .where('endpoint', '=', endpoint)
      .executeTakeFirst();
    if (result.numDeletedRows === 0n) {
      throw new SubscriptionNotFoundError(`No subscription for endpoint ${endpoint}`);
    }
  }

  async list(limit: number, offset: number): Promise<SubscriptionRecord[]> {
    const rows = await this.database
      .getDb()
      .selectFrom('subscriptions')
      .selectAll()
      .orderBy(sql`rowid`)
      .limit(limit)
      .offset(offset)
      .execute();
    return rows.map(toRecord);
  }

  async close(): Promise<void> {
    await this.database.close();
  }
}
