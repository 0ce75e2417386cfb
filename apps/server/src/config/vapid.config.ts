import { registerAs } from '@nestjs/config';

import { expectPropertyExists, propertyOrDefault, splitList } from '../typescript/expect';

export const VapidConfigFactory = registerAs(
  'vapid-config',
  () =>
    ({
      /**
       * Contact URI sent to push services, `mailto:` or `https:`
       */
      subject: expectPropertyExists(process.env, 'VAPID_SUBJECT'),
      /**
       * PEM file of the current signing key, generated on first start
       */
      keyPath: propertyOrDefault(process.env, 'VAPID_KEY_PATH', './vapid-private.pem'),
      /**
       * Retired keys still accepted for existing subscribers, most recently retired first
       */
      previousKeyPaths: splitList(process.env.VAPID_PREVIOUS_KEY_PATHS),
    }) as const,
);

export type VapidConfig = ReturnType<typeof VapidConfigFactory>;
export const VapidConfig = VapidConfigFactory.KEY;
