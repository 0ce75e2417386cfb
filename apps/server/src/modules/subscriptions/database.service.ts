import { Logger } from '@nestjs/common';
import Database from 'better-sqlite3';
import { Kysely, Migrator, SqliteDialect, type Migration } from 'kysely';

import type { PushDatabase } from './database.types';
import * as subscriptionsSchema from './migrations/0001_subscriptions';

const MIGRATIONS: Record<string, Migration> = {
  '0001_subscriptions': subscriptionsSchema,
};

/**
 * SQLite connection through Kysely. `path` may be `:memory:`.
 */
export class DatabaseService {
  private readonly logger = new Logger(DatabaseService.name);
  private readonly db: Kysely<PushDatabase>;
  private closed = false;

  constructor(path: string) {
    this.db = new Kysely<PushDatabase>({
      dialect: new SqliteDialect({ database: new Database(path) }),
    });
  }

  getDb(): Kysely<PushDatabase> {
    return this.db;
  }

  async migrate(): Promise<void> {
    const migrator = new Migrator({
      db: this.db,
      provider: { getMigrations: async () => MIGRATIONS },
    });

    const { error, results } = await migrator.migrateToLatest();
    results?.forEach((result) => {
      if (result.status === 'Success') {
        this.logger.log(`Migration ${result.migrationName} applied`);
      } else if (result.status === 'Error') {
        this.logger.error(`Migration ${result.migrationName} failed`);
      }
    });
    if (error) {
      throw error;
    }
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    await this.db.destroy();
  }
}
