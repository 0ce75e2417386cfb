import { registerAs } from '@nestjs/config';

import { expectPropertyExists, splitList } from '../typescript/expect';

function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error(`PORT must be an integer between 0 and 65535, got "${value}"`);
  }
  return port;
}

export const ProcessConfigFactory = registerAs(
  'process-config',
  () =>
    ({
      port: parsePort(expectPropertyExists(process.env, 'PORT')),
      webOrigin: splitList(expectPropertyExists(process.env, 'WEB_ORIGIN')),
    }) as const,
);

export type ProcessConfig = ReturnType<typeof ProcessConfigFactory>;
export const ProcessConfig = ProcessConfigFactory.KEY;
