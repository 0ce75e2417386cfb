import { Controller, Delete, Get, HttpCode, Inject, Param, Post } from '@nestjs/common';

import { KeysService } from './keys.service';

@Controller()
export class KeysController {
  constructor(@Inject(KeysService) private readonly keysService: KeysService) {}

  @Get('vapid-public-key')
  getPublicKey() {
    return this.keysService.getPublicKey();
  }

  @Get('keys')
  listKeys() {
    return this.keysService.listKeys();
  }

  @Post('keys/rotate')
  @HttpCode(200)
  async rotate() {
    return this.keysService.rotate();
  }

  @Post('keys/cleanup')
  @HttpCode(200)
  async cleanup() {
    return this.keysService.cleanup();
  }

  @Delete('keys/:key')
  async removeKey(@Param('key') key: string) {
    return this.keysService.removeKey(key);
  }
}
