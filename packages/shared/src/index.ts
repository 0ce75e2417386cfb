export * from './push/types';
export * from './keys/types';
