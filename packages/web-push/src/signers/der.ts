/**
 * DER <-> IEEE P1363 conversion for P-256 ECDSA signatures
 *
 * DER format: 0x30 [length] 0x02 [r-length] [r] 0x02 [s-length] [s]
 * P-1363 format: [r (32 bytes)] [s (32 bytes)]
 */

import { p256 } from '@noble/curves/p256';

const SIGNATURE_LENGTH = 64;

export function derToP1363(der: Uint8Array): Uint8Array {
  try {
    return p256.Signature.fromDER(der).toCompactRawBytes();
  } catch (error) {
    throw new Error('Invalid DER signature', { cause: error });
  }
}

export function p1363ToDer(signature: Uint8Array): Uint8Array {
  if (signature.byteLength !== SIGNATURE_LENGTH) {
    throw new Error(`P1363 signature must be ${SIGNATURE_LENGTH} bytes`);
  }
  return p256.Signature.fromCompact(signature).toDERRawBytes();
}
