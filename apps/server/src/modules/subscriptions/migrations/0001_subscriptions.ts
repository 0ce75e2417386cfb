import { Kysely } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createTable('subscriptions')
    .ifNotExists()
    .addColumn('id', 'text', (col) => col.primaryKey())
    .addColumn('user_id', 'text')
    .addColumn('endpoint', 'text', (col) => col.notNull().unique())
    .addColumn('expiration_time', 'integer')
    .addColumn('p256dh', 'text', (col) => col.notNull())
    .addColumn('auth', 'text', (col) => col.notNull())
    .addColumn('vapid_key', 'text', (col) => col.notNull())
    .addColumn('created_at', 'text', (col) => col.notNull())
    .addColumn('updated_at', 'text', (col) => col.notNull())
    .execute();

  await db.schema.createIndex('idx_subscriptions_user_id').ifNotExists().on('subscriptions').column('user_id').execute();
  await db.schema
    .createIndex('idx_subscriptions_endpoint')
    .ifNotExists()
    .on('subscriptions')
    .column('endpoint')
    .execute();
  await db.schema
    .createIndex('idx_subscriptions_vapid_key')
    .ifNotExists()
    .on('subscriptions')
    .column('vapid_key')
    .execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable('subscriptions').ifExists().execute();
}
