import { registerAs } from '@nestjs/config';

import { propertyOrDefault } from '../typescript/expect';

export const STORAGE_DRIVERS = ['memory', 'sqlite'] as const;
export type StorageDriver = (typeof STORAGE_DRIVERS)[number];

function parseDriver(value: string): StorageDriver {
  const driver = STORAGE_DRIVERS.find((candidate) => candidate === value);
  if (!driver) {
    throw new Error(`STORAGE_DRIVER must be one of ${STORAGE_DRIVERS.join(', ')}, got "${value}"`);
  }
  return driver;
}

export const StorageConfigFactory = registerAs(
  'storage-config',
  () =>
    ({
      driver: parseDriver(propertyOrDefault(process.env, 'STORAGE_DRIVER', 'memory')),
      sqlitePath: propertyOrDefault(process.env, 'SQLITE_PATH', './subscriptions.db'),
    }) as const,
);

export type StorageConfig = ReturnType<typeof StorageConfigFactory>;
export const StorageConfig = StorageConfigFactory.KEY;
