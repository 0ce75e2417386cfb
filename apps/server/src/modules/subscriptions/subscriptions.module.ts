import { Inject, Logger, Module, OnApplicationShutdown } from '@nestjs/common';

import { StorageConfig } from '../../config/storage.config';
import { DatabaseService } from './database.service';
import { KyselySubscriptionRepository } from './kysely-subscription.repository';
import { MemorySubscriptionRepository } from './memory-subscription.repository';
import { SubscriptionRepository } from './subscription.repository';

export async function createSubscriptionRepository(
  config: Pick<StorageConfig, 'driver' | 'sqlitePath'>,
): Promise<SubscriptionRepository> {
  const logger = new Logger(SubscriptionsModule.name);
  if (config.driver === 'sqlite') {
    const database = new DatabaseService(config.sqlitePath);
    await database.migrate();
    logger.log(`SQLite storage initialized at ${config.sqlitePath}`);
    return new KyselySubscriptionRepository(database);
  }
  logger.log('Using in-memory subscription storage');
  return new MemorySubscriptionRepository();
}

@Module({
  providers: [
    {
      provide: SubscriptionRepository,
      inject: [StorageConfig],
      useFactory: createSubscriptionRepository,
    },
  ],
  exports: [SubscriptionRepository],
})
export class SubscriptionsModule implements OnApplicationShutdown {
  constructor(@Inject(SubscriptionRepository) private readonly subscriptions: SubscriptionRepository) {}

  async onApplicationShutdown(): Promise<void> {
    await this.subscriptions.close();
  }
}
