/**
 * Envelope codec: AES-128-ECB with PKCS7 padding, base64 on the wire
 */

import { createCipheriv, createDecipheriv } from 'node:crypto';

import { EWPE_PROTOCOL } from './constants.js';
import { CryptoError, errorMessage } from './errors.js';

const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

function toKeyBuffer(key: string | Uint8Array): Buffer {
  const buffer = typeof key === 'string' ? Buffer.from(key, 'utf8') : Buffer.from(key);
  if (buffer.length !== EWPE_PROTOCOL.BLOCK_SIZE) {
    throw new CryptoError(`AES-128 key must be ${EWPE_PROTOCOL.BLOCK_SIZE} bytes, got ${buffer.length}`);
  }
  return buffer;
}

/**
 * Pad to a block boundary. Aligned input gets a whole extra block.
 */
export function pkcs7Pad(payload: Uint8Array, blockSize: number = EWPE_PROTOCOL.BLOCK_SIZE): Buffer {
  const padLength = blockSize - (payload.length % blockSize);
  return Buffer.concat([Buffer.from(payload), Buffer.alloc(padLength, padLength)]);
}

/**
 * Trim as many bytes as the trailing byte says.
 * The other padding bytes are not checked.
 */
export function pkcs7Unpad(payload: Buffer): Buffer {
  if (payload.length === 0) {
    return payload;
  }
  const padLength = payload[payload.length - 1];
  return payload.subarray(0, Math.max(0, payload.length - padLength));
}

function encryptBlocks(key: Buffer, data: Buffer): Buffer {
  try {
    const cipher = createCipheriv('aes-128-ecb', key, null).setAutoPadding(false);
    return Buffer.concat([cipher.update(data), cipher.final()]);
  } catch (err) {
    throw new CryptoError(`AES-128-ECB encryption failed: ${errorMessage(err)}`, { cause: err });
  }
}

function decryptBlocks(key: Buffer, data: Buffer): Buffer {
  try {
    const decipher = createDecipheriv('aes-128-ecb', key, null).setAutoPadding(false);
    return Buffer.concat([decipher.update(data), decipher.final()]);
  } catch (err) {
    throw new CryptoError(`AES-128-ECB decryption failed: ${errorMessage(err)}`, { cause: err });
  }
}

/**
 * Encrypt a plaintext payload and encode it as base64
 */
export function encode(plaintext: string | Uint8Array, key: string | Uint8Array): string {
  const data = typeof plaintext === 'string' ? Buffer.from(plaintext, 'utf8') : plaintext;
  const encrypted = encryptBlocks(toKeyBuffer(key), pkcs7Pad(data));
  return encrypted.toString('base64');
}

/**
 * Decode a base64 pack and decrypt it to text
 */
export function decode(pack: string, key: string | Uint8Array): string {
  if (!BASE64_PATTERN.test(pack)) {
    throw new CryptoError('Pack is not valid base64');
  }
  const ciphertext = Buffer.from(pack, 'base64');
  if (ciphertext.length % EWPE_PROTOCOL.BLOCK_SIZE !== 0) {
    throw new CryptoError(`Ciphertext length ${ciphertext.length} is not a multiple of ${EWPE_PROTOCOL.BLOCK_SIZE}`);
  }
  const decrypted = decryptBlocks(toKeyBuffer(key), ciphertext);
  // lossy: invalid sequences become U+FFFD
  return pkcs7Unpad(decrypted).toString('utf8');
}
