import { registerAs } from '@nestjs/config';

import { splitList } from '../typescript/expect';

/**
 * Hosts subscriptions may point at. `*.example.com` matches any subdomain; an empty list allows every host.
 */
export const PushServiceWhitelistConfigFactory = registerAs(
  'push-service-whitelist-config',
  () =>
    ({
      allowedPushServiceHosts: splitList(process.env.ALLOWED_PUSH_SERVICE_HOSTS),
    }) as const,
);

export type PushServiceWhitelistConfig = ReturnType<typeof PushServiceWhitelistConfigFactory>;
export const PushServiceWhitelistConfig = PushServiceWhitelistConfigFactory.KEY;
