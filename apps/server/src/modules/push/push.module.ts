import { Module } from '@nestjs/common';

import { KeysModule } from '../keys/keys.module';
import { SubscriptionsModule } from '../subscriptions/subscriptions.module';
import { PushTransportProvider } from './push-transport.provider';
import { PushController } from './push.controller';
import { PushService } from './push.service';

@Module({
  imports: [KeysModule, SubscriptionsModule],
  controllers: [PushController],
  providers: [PushTransportProvider, PushService],
})
export class PushModule {}
