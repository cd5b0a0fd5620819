import { describe, expect, it } from 'vitest';

import { decode, encode, pkcs7Pad, pkcs7Unpad } from '../src/codec.js';
import { EWPE_PROTOCOL } from '../src/constants.js';
import { CryptoError } from '../src/errors.js';

const KEY = EWPE_PROTOCOL.GENERIC_KEY;

describe('pkcs7Pad', () => {
  it('pads a short payload up to one block', () => {
    const padded = pkcs7Pad(Buffer.from('abc'));
    expect(padded.length).toBe(16);
    expect([...padded.subarray(3)]).toEqual(new Array(13).fill(13));
  });

  it('adds a whole block to aligned input', () => {
    const padded = pkcs7Pad(Buffer.alloc(16, 0x41));
    expect(padded.length).toBe(32);
    expect([...padded.subarray(16)]).toEqual(new Array(16).fill(16));
  });
});

describe('pkcs7Unpad', () => {
  it('removes as many bytes as the last byte says', () => {
    const unpadded = pkcs7Unpad(Buffer.from([0x61, 0x62, 0x02, 0x02]));
    expect(unpadded.toString()).toBe('ab');
  });

  it('never trims more than the buffer holds', () => {
    expect(pkcs7Unpad(Buffer.from([0x61, 0x09])).length).toBe(0);
  });

  it('leaves an empty buffer alone', () => {
    expect(pkcs7Unpad(Buffer.alloc(0)).length).toBe(0);
  });
});

describe('encode / decode', () => {
  it('round-trips a JSON pack', () => {
    const text = JSON.stringify({ mac: 'f4911e000001', t: 'bind', uid: 0 });
    expect(decode(encode(text, KEY), KEY)).toBe(text);
  });

  it('round-trips a plaintext of exactly one block', () => {
    const text = '0123456789abcdef';
    const pack = encode(text, KEY);
    expect(Buffer.from(pack, 'base64').length).toBe(32);
    expect(decode(pack, KEY)).toBe(text);
  });

  it('round-trips the empty string', () => {
    const pack = encode('', KEY);
    expect(Buffer.from(pack, 'base64').length).toBe(16);
    expect(decode(pack, KEY)).toBe('');
  });

  it('produces different ciphertexts for different keys', () => {
    expect(encode('{"t":"status"}', KEY)).not.toBe(encode('{"t":"status"}', 'test-secret-0001'));
  });

  it('rejects text that is not base64', () => {
    expect(() => decode('not base64!', KEY)).toThrow(CryptoError);
  });

  it('rejects ciphertext that is not a whole number of blocks', () => {
    expect(() => decode(Buffer.alloc(10).toString('base64'), KEY)).toThrow(CryptoError);
  });

  it('rejects keys that are not 16 bytes', () => {
    expect(() => encode('{}', 'short')).toThrow(CryptoError);
    expect(() => decode(encode('{}', KEY), 'short')).toThrow(/must be 16 bytes, got 5/);
  });
});
