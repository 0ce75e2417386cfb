export * from './base64';
export * from './client';
export * from './decrypt';
export {
  AUTH_SECRET_LENGTH,
  encryptNotification,
  encryptWithMaterial,
  RECORD_DELIMITER,
  RECORD_HEADER_LENGTH,
  type EncryptionMaterial,
} from './encrypt';
export * from './errors';
export { P256_PRIVATE_KEY_LENGTH, P256_PUBLIC_KEY_LENGTH } from './keys';
export { generateLocalKeys, type LocalKeys } from './local-keys';
export * from './rotation/rotating-kms-signer';
export * from './rotation/rotating-signer';
export * from './signer';
export * from './signers/der';
export * from './signers/file-signer';
export * from './signers/kms-signer';
export * from './signers/local-signer';
export * from './subscription';
export * from './transport';
export * from './types';
export * from './vapid';
