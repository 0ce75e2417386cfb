import { p256 } from '@noble/curves/p256';
import { describe, expect, it } from 'vitest';

import { derToP1363, p1363ToDer } from '../src/signers/der';

function filled(length: number, value: number): Uint8Array {
  return new Uint8Array(length).fill(value);
}

describe('derToP1363', () => {
  it('converts 32-byte components', () => {
    const der = new Uint8Array([0x30, 68, 0x02, 32, ...filled(32, 0x11), 0x02, 32, ...filled(32, 0x22)]);
    expect(derToP1363(der)).toEqual(new Uint8Array([...filled(32, 0x11), ...filled(32, 0x22)]));
  });

  it('drops the sign byte of high components', () => {
    const der = new Uint8Array([0x30, 70, 0x02, 33, 0x00, ...filled(32, 0x81), 0x02, 33, 0x00, ...filled(32, 0xee)]);
    expect(derToP1363(der)).toEqual(new Uint8Array([...filled(32, 0x81), ...filled(32, 0xee)]));
  });

  it('left-pads short components', () => {
    const der = new Uint8Array([0x30, 8, 0x02, 2, 0x01, 0x02, 0x02, 2, 0x03, 0x04]);
    const out = derToP1363(der);
    expect(out.byteLength).toBe(64);
    expect(out.slice(30, 32)).toEqual(new Uint8Array([0x01, 0x02]));
    expect(out.slice(0, 30)).toEqual(new Uint8Array(30));
    expect(out.slice(62)).toEqual(new Uint8Array([0x03, 0x04]));
  });

  it('rejects malformed input', () => {
    expect(() => derToP1363(new Uint8Array([0x31, 0]))).toThrow('Invalid DER signature');
    expect(() => derToP1363(new Uint8Array([0x30, 10, 0x02, 1, 0x01]))).toThrow('Invalid DER signature');
    expect(() => derToP1363(new Uint8Array([0x30, 6, 0x03, 1, 0x01, 0x02, 1, 0x01]))).toThrow(
      'Invalid DER signature',
    );
  });

  it('converts real signatures', () => {
    const privateKey = p256.utils.randomPrivateKey();
    const digest = filled(32, 0x42);
    const signature = p256.sign(digest, privateKey);

    expect(derToP1363(signature.toDERRawBytes())).toEqual(signature.toCompactRawBytes());
  });
});

describe('p1363ToDer', () => {
  it('is the inverse of derToP1363', () => {
    const signature = new Uint8Array([...filled(32, 0x90), 0x00, 0x00, ...filled(30, 0x05)]);
    const der = p1363ToDer(signature);
    expect(der[0]).toBe(0x30);
    expect(der[3]).toBe(33);
    expect(derToP1363(der)).toEqual(signature);
  });

  it('rejects signatures of the wrong length', () => {
    expect(() => p1363ToDer(new Uint8Array(63))).toThrow('must be 64 bytes');
  });
});
