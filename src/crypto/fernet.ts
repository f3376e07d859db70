import { createCipheriv, createDecipheriv, createHmac, randomBytes, timingSafeEqual } from 'crypto';
import { CryptoError } from '../errors';

/**
 * Fernet tokens (AES-128-CBC + HMAC-SHA256), interoperable with any other
 * implementation of the Fernet format.
 *
 * Layout: version (0x80) | timestamp (u64 BE, seconds) | IV (16) | ciphertext | HMAC (32),
 * url-safe base64 with padding.
 */

const VERSION = 0x80;
const HEADER_LENGTH = 1 + 8 + 16;
const BLOCK_SIZE = 16;
const HMAC_LENGTH = 32;
const MAX_CLOCK_SKEW = 60;

const TOKEN_PATTERN = /^[A-Za-z0-9_-]+={0,2}$/;

export interface FernetEncryptOptions {
  /** Unix seconds written into the token. */
  now?: number;
  iv?: Buffer;
}

export interface FernetDecryptOptions {
  /** Reject tokens older than this many seconds. No expiry when unset. */
  ttlSeconds?: number;
  now?: number;
}

export function encodeBase64Url(data: Buffer): string {
  return data.toString('base64').replace(/\+/g, '-').replace(/\//g, '_');
}

export function decodeBase64Url(value: string): Buffer {
  if (!TOKEN_PATTERN.test(value)) {
    throw new CryptoError('Value is not url-safe base64');
  }
  return Buffer.from(value.replace(/-/g, '+').replace(/_/g, '/'), 'base64');
}

const invalidToken = () => new CryptoError('Invalid Fernet token');

export class Fernet {
  private readonly signingKey: Buffer;
  private readonly encryptionKey: Buffer;

  constructor(key: string) {
    let raw: Buffer;
    try {
      raw = decodeBase64Url(key.trim());
    } catch {
      throw new CryptoError('Fernet key must be 32 url-safe base64-encoded bytes');
    }
    if (raw.length !== 32) {
      throw new CryptoError('Fernet key must be 32 url-safe base64-encoded bytes');
    }
    this.signingKey = raw.subarray(0, 16);
    this.encryptionKey = raw.subarray(16);
  }

  static generateKey(): string {
    return encodeBase64Url(randomBytes(32));
  }

  encrypt(plaintext: string | Buffer, options: FernetEncryptOptions = {}): string {
    const iv = options.iv ?? randomBytes(BLOCK_SIZE);
    if (iv.length !== BLOCK_SIZE) {
      throw new CryptoError('IV must be 16 bytes');
    }
    const timestamp = options.now ?? Math.floor(Date.now() / 1000);

    const header = Buffer.alloc(9);
    header.writeUInt8(VERSION, 0);
    header.writeBigUInt64BE(BigInt(timestamp), 1);

    const cipher = createCipheriv('aes-128-cbc', this.encryptionKey, iv);
    const input = typeof plaintext === 'string' ? Buffer.from(plaintext, 'utf8') : plaintext;
    const ciphertext = Buffer.concat([cipher.update(input), cipher.final()]);

    const body = Buffer.concat([header, iv, ciphertext]);
    const mac = createHmac('sha256', this.signingKey).update(body).digest();
    return encodeBase64Url(Buffer.concat([body, mac]));
  }

  decrypt(token: string, options: FernetDecryptOptions = {}): Buffer {
    let data: Buffer;
    try {
      data = decodeBase64Url(token);
    } catch {
      throw invalidToken();
    }

    const cipherLength = data.length - HEADER_LENGTH - HMAC_LENGTH;
    if (data[0] !== VERSION || cipherLength < BLOCK_SIZE || cipherLength % BLOCK_SIZE !== 0) {
      throw invalidToken();
    }

    if (options.ttlSeconds !== undefined) {
      const timestamp = Number(data.readBigUInt64BE(1));
      const now = options.now ?? Math.floor(Date.now() / 1000);
      if (timestamp + options.ttlSeconds < now) {
        throw new CryptoError('Fernet token expired');
      }
      if (now + MAX_CLOCK_SKEW < timestamp) {
        throw invalidToken();
      }
    }

    const body = data.subarray(0, data.length - HMAC_LENGTH);
    const expected = createHmac('sha256', this.signingKey).update(body).digest();
    if (!timingSafeEqual(expected, data.subarray(data.length - HMAC_LENGTH))) {
      throw invalidToken();
    }

    const iv = data.subarray(9, HEADER_LENGTH);
    try {
      const decipher = createDecipheriv('aes-128-cbc', this.encryptionKey, iv);
      return Buffer.concat([decipher.update(data.subarray(HEADER_LENGTH, data.length - HMAC_LENGTH)), decipher.final()]);
    } catch {
      throw invalidToken();
    }
  }
}
