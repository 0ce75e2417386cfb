/**
 * Based on @block65/webcrypto-web-push
 * https://github.com/block65/webcrypto-web-push
 * Copyright 2024 Block65 Pte Ltd - MIT License
 *
 * Notification encryption for Web Push using aes128gcm (RFC 8291, RFC 8188).
 *
 * Output layout:
 *   salt (16) || rs (uint32 BE) || idlen (1) || keyid (65, ephemeral public key) || ciphertext
 *
 * The plaintext is sent as a single record terminated by the 0x02 delimiter. No further padding is
 * added, so the record length follows the plaintext length.
 */

import { CryptoFailureError, MalformedKeyError, MalformedSecretError } from './errors';
import { hkdf, hkdfExpand, hkdfExtract } from './hkdf';
import { createContentEncodingInfo, createKeyInfo } from './info';
import { importEcdhPublicKey, P256_PUBLIC_KEY_LENGTH } from './keys';
import { generateLocalKeys, type LocalKeys } from './local-keys';
import { getSalt, SALT_LENGTH } from './salt';
import { concatBytes, uint32BE } from './utils';
import { subtle, type CryptoKey } from './webcrypto';

export const AUTH_SECRET_LENGTH = 16;
export const RECORD_DELIMITER = 0x02;

/**
 * salt (16) + rs (4) + idlen (1) + keyid (65)
 */
export const RECORD_HEADER_LENGTH = SALT_LENGTH + 4 + 1 + P256_PUBLIC_KEY_LENGTH;

export interface EncryptionMaterial {
  localKeys: LocalKeys;
  salt: Uint8Array;
}

/**
 * Encrypt `plaintext` for one subscriber. A fresh ephemeral key pair and salt are drawn on every call.
 */
export async function encryptNotification(
  clientPublicKey: Uint8Array,
  clientAuthSecret: Uint8Array,
  plaintext: Uint8Array,
): Promise<Uint8Array> {
  validateAuthSecret(clientAuthSecret);
  const clientKey = await importEcdhPublicKey(clientPublicKey);

  let material: EncryptionMaterial;
  try {
    material = { localKeys: await generateLocalKeys(), salt: getSalt() };
  } catch (error) {
    throw new CryptoFailureError('Failed to generate ephemeral key material', { cause: error });
  }

  return sealRecord(clientKey, clientPublicKey, clientAuthSecret, plaintext, material);
}

/**
 * Encrypt with caller-supplied ephemeral material. Only for reproducing published test vectors:
 * reusing a key pair or salt across messages breaks confidentiality.
 */
export async function encryptWithMaterial(
  clientPublicKey: Uint8Array,
  clientAuthSecret: Uint8Array,
  plaintext: Uint8Array,
  material: EncryptionMaterial,
): Promise<Uint8Array> {
  validateAuthSecret(clientAuthSecret);
  if (material.salt.byteLength !== SALT_LENGTH) {
    throw new CryptoFailureError(`salt must be ${SALT_LENGTH} bytes`);
  }
  const clientKey = await importEcdhPublicKey(clientPublicKey);
  return sealRecord(clientKey, clientPublicKey, clientAuthSecret, plaintext, material);
}

/**
 * Derive the content encryption key and nonce shared by both directions of RFC 8291
 */
export async function deriveContentKeys(
  ecdhSecret: Uint8Array,
  authSecret: Uint8Array,
  clientPublicKey: Uint8Array,
  serverPublicKey: Uint8Array,
  salt: Uint8Array,
): Promise<{ cek: Uint8Array; nonce: Uint8Array }> {
  // IKM = HKDF(auth_secret, ecdh_secret, key_info, 32)
  const prkKey = await hkdfExtract(authSecret, ecdhSecret);
  const ikm = await hkdfExpand(prkKey, createKeyInfo(clientPublicKey, serverPublicKey), 32);

  const messageHkdf = await hkdf(salt, ikm);
  const cek = await messageHkdf.expand(createContentEncodingInfo('aes128gcm'), 16);
  const nonce = await messageHkdf.expand(createContentEncodingInfo('nonce'), 12);
  return { cek, nonce };
}

function validateAuthSecret(clientAuthSecret: Uint8Array): void {
  if (clientAuthSecret.byteLength !== AUTH_SECRET_LENGTH) {
    throw new MalformedSecretError(
      `client auth secret must be ${AUTH_SECRET_LENGTH} bytes, got ${clientAuthSecret.byteLength}`,
    );
  }
}

async function sealRecord(
  clientKey: CryptoKey,
  clientPublicKey: Uint8Array,
  clientAuthSecret: Uint8Array,
  plaintext: Uint8Array,
  { localKeys, salt }: EncryptionMaterial,
): Promise<Uint8Array> {
  if (localKeys.publicKeyBytes.byteLength !== P256_PUBLIC_KEY_LENGTH) {
    throw new MalformedKeyError('ephemeral public key must be an uncompressed P-256 point');
  }

  try {
    const sharedSecret = new Uint8Array(
      await subtle.deriveBits({ name: 'ECDH', public: clientKey }, localKeys.privateKey, 256),
    );

    const { cek, nonce } = await deriveContentKeys(
      sharedSecret,
      clientAuthSecret,
      clientPublicKey,
      localKeys.publicKeyBytes,
      salt,
    );

    const cekCryptoKey = await subtle.importKey('raw', cek, { name: 'AES-GCM', length: 128 }, false, ['encrypt']);

    const padded = concatBytes(plaintext, new Uint8Array([RECORD_DELIMITER]));
    const ciphertext = new Uint8Array(await subtle.encrypt({ name: 'AES-GCM', iv: nonce }, cekCryptoKey, padded));

    return concatBytes(
      salt,
      uint32BE(ciphertext.byteLength + RECORD_HEADER_LENGTH),
      new Uint8Array([localKeys.publicKeyBytes.byteLength]),
      localKeys.publicKeyBytes,
      ciphertext,
    );
  } catch (error) {
    throw new CryptoFailureError('Failed to encrypt notification', { cause: error });
  }
}
