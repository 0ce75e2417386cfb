import { Module } from '@nestjs/common';
import { RotatingSigner } from '@relaypush/web-push';

import { SubscriptionsModule } from '../subscriptions/subscriptions.module';
import { KeysController } from './keys.controller';
import { KeysService } from './keys.service';
import { VapidSignerProvider } from './vapid-signer.provider';

@Module({
  imports: [SubscriptionsModule],
  controllers: [KeysController],
  providers: [VapidSignerProvider, KeysService],
  exports: [RotatingSigner],
})
export class KeysModule {}
