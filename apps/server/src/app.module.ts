import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';

import { ProcessConfigFactory } from './config/process.config';
import { PushServiceWhitelistConfigFactory } from './config/push-service-whitelist.config';
import { StorageConfigFactory } from './config/storage.config';
import { VapidConfigFactory } from './config/vapid.config';

import { KeysModule } from './modules/keys/keys.module';
import { PushModule } from './modules/push/push.module';
import { SubscriptionsModule } from './modules/subscriptions/subscriptions.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
      load: [ProcessConfigFactory, VapidConfigFactory, StorageConfigFactory, PushServiceWhitelistConfigFactory],
    }),
    SubscriptionsModule,
    KeysModule,
    PushModule,
  ],
})
export class AppModule {}
