import { access } from 'node:fs/promises';

import { Logger, type Provider } from '@nestjs/common';
import { generateFileSigner, loadFileSigner, RotatingSigner, type LocalSigner } from '@relaypush/web-push';

import { VapidConfig } from '../../config/vapid.config';

const logger = new Logger('VapidSigner');

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Load the current key (generating it on first start) and every configured previous key
 */
export async function createVapidSigner(
  config: Pick<VapidConfig, 'keyPath' | 'previousKeyPaths'>,
): Promise<RotatingSigner> {
  let current: LocalSigner;
  if (await exists(config.keyPath)) {
    current = await loadFileSigner(config.keyPath);
    logger.log(`VAPID key loaded from ${config.keyPath}`);
  } else {
    current = await generateFileSigner(config.keyPath);
    logger.log(`VAPID key generated and saved to ${config.keyPath}`);
  }

  const previous = await Promise.all(config.previousKeyPaths.map((path) => loadFileSigner(path)));
  if (previous.length > 0) {
    logger.log(`Loaded ${previous.length} previous VAPID key(s)`);
  }
  return new RotatingSigner(current, previous);
}

export const VapidSignerProvider: Provider = {
  provide: RotatingSigner,
  inject: [VapidConfig],
  useFactory: createVapidSigner,
};
