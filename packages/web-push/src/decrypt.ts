/**
 * User-agent side of RFC 8291: opens a single aes128gcm record addressed to a subscription.
 */

import { CryptoFailureError, MalformedRecordError, MalformedSecretError } from './errors';
import { AUTH_SECRET_LENGTH, deriveContentKeys, RECORD_DELIMITER } from './encrypt';
import { assertUncompressedPoint, importEcdhPrivateKey, importEcdhPublicKey } from './keys';
import { SALT_LENGTH } from './salt';
import { subtle } from './webcrypto';

export interface RecordHeader {
  salt: Uint8Array;
  recordSize: number;
  keyId: Uint8Array;
  ciphertext: Uint8Array;
}

/**
 * Split an encrypted body into its header fields and ciphertext
 */
export function parseRecordHeader(record: Uint8Array): RecordHeader {
  if (record.byteLength < SALT_LENGTH + 5) {
    throw new MalformedRecordError('Record is shorter than its header');
  }
  const view = new DataView(record.buffer, record.byteOffset, record.byteLength);
  const recordSize = view.getUint32(SALT_LENGTH, false);
  const keyIdLength = record[SALT_LENGTH + 4];
  const ciphertextStart = SALT_LENGTH + 5 + keyIdLength;
  if (record.byteLength < ciphertextStart) {
    throw new MalformedRecordError('Record is shorter than its key id');
  }
  return {
    salt: record.slice(0, SALT_LENGTH),
    recordSize,
    keyId: record.slice(SALT_LENGTH + 5, ciphertextStart),
    ciphertext: record.slice(ciphertextStart),
  };
}

/**
 * Decrypt a record with the subscriber's key pair and auth secret, returning the plaintext without
 * the delimiter or padding.
 */
export async function decryptNotification(
  record: Uint8Array,
  clientPrivateKey: Uint8Array,
  clientPublicKey: Uint8Array,
  clientAuthSecret: Uint8Array,
): Promise<Uint8Array> {
  if (clientAuthSecret.byteLength !== AUTH_SECRET_LENGTH) {
    throw new MalformedSecretError(`client auth secret must be ${AUTH_SECRET_LENGTH} bytes`);
  }
  const { salt, keyId, ciphertext } = parseRecordHeader(record);
  assertUncompressedPoint(keyId, 'record key id');

  const privateKey = await importEcdhPrivateKey(clientPrivateKey, clientPublicKey);
  const serverKey = await importEcdhPublicKey(keyId);

  let padded: Uint8Array;
  try {
    const sharedSecret = new Uint8Array(await subtle.deriveBits({ name: 'ECDH', public: serverKey }, privateKey, 256));
    const { cek, nonce } = await deriveContentKeys(sharedSecret, clientAuthSecret, clientPublicKey, keyId, salt);
    const cekCryptoKey = await subtle.importKey('raw', cek, { name: 'AES-GCM', length: 128 }, false, ['decrypt']);
    padded = new Uint8Array(await subtle.decrypt({ name: 'AES-GCM', iv: nonce }, cekCryptoKey, ciphertext));
  } catch (error) {
    throw new CryptoFailureError('Failed to decrypt notification', { cause: error });
  }

  let end = padded.byteLength - 1;
  while (end >= 0 && padded[end] === 0) {
    end--;
  }
  if (end < 0 || padded[end] !== RECORD_DELIMITER) {
    throw new MalformedRecordError('Record is missing the final-record delimiter');
  }
  return padded.slice(0, end);
}
