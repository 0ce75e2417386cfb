import type { Provider } from '@nestjs/common';
import { fetchTransport, type PushTransport } from '@relaypush/web-push';

export const PushTransportToken = Symbol.for('push-transport');

export const PushTransportProvider: Provider<PushTransport> = {
  provide: PushTransportToken,
  useValue: fetchTransport,
};
