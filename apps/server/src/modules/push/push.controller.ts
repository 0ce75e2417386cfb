import { Body, Controller, HttpCode, Inject, Post } from '@nestjs/common';

import { PingReqBody, SubscribeReqBody, UnsubscribeReqBody } from './push.dto';
import { PushService } from './push.service';

@Controller()
export class PushController {
  constructor(@Inject(PushService) private readonly pushService: PushService) {}

  @Post('subscribe')
  @HttpCode(200)
  async subscribe(@Body() body: SubscribeReqBody) {
    return this.pushService.subscribe(body);
  }

  @Post('unsubscribe')
  @HttpCode(200)
  async unsubscribe(@Body() body: UnsubscribeReqBody) {
    return this.pushService.unsubscribe(body.endpoint);
  }

  @Post('ping')
  @HttpCode(200)
  async ping(@Body() body: PingReqBody) {
    return this.pushService.ping(body);
  }
}
