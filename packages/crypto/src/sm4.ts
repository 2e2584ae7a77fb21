/**
 * SM4-CBC codec for the `bizContent` field
 *
 * The business body is canonicalized, encrypted with SM4 in CBC mode with
 * PKCS#7 padding under a fixed key/IV pair, and carried as uppercase hex.
 * The block cipher itself comes from sm-crypto-v2.
 */

import { sm4 } from 'sm-crypto-v2';
import { decode, encode, type FieldMap, type FieldRecord } from './canonical.js';
import { ConfigError, DecryptError, EncryptError, ErrorCodes, describeError, isGatewayError } from './errors.js';
import { bytesToHex, parseHexBytes, toBytes } from './hex.js';
import { primitiveOutputToBytes } from './sm3.js';

export const SM4_KEY_BYTES = 16;
export const SM4_BLOCK_BYTES = 16;

const CBC_OPTIONS = { mode: 'cbc', padding: 'pkcs#7', output: 'array' } as const;
// Decrypt unpadded; stripPkcs7 checks every pad byte
const RAW_CBC_OPTIONS = { mode: 'cbc', padding: 'none', output: 'array' } as const;

function keyBytes(value: string | Uint8Array, label: string, length: number): Uint8Array {
  try {
    return toBytes(value, label, length);
  } catch (err) {
    throw new ConfigError(ErrorCodes.KEY_INVALID, describeError(err), { cause: err });
  }
}

function stripPkcs7(padded: Uint8Array): Uint8Array {
  const count = padded[padded.length - 1] ?? 0;
  if (count < 1 || count > SM4_BLOCK_BYTES || count > padded.length) {
    throw new DecryptError('SM4 decryption failed: padding is invalid');
  }
  for (let i = padded.length - count; i < padded.length; i++) {
    if (padded[i] !== count) {
      throw new DecryptError('SM4 decryption failed: padding is invalid');
    }
  }
  return padded.slice(0, padded.length - count);
}

/**
 * SM4 key/IV pair, validated once at construction.
 */
export class Sm4Codec {
  private readonly key: Uint8Array;
  private readonly iv: Uint8Array;

  constructor(key: string | Uint8Array, iv: string | Uint8Array) {
    this.key = keyBytes(key, 'SM4 key', SM4_KEY_BYTES);
    this.iv = keyBytes(iv, 'SM4 IV', SM4_BLOCK_BYTES);
  }

  /**
   * Encrypt raw bytes; returns uppercase hex ciphertext.
   */
  encrypt(plaintext: Uint8Array): string {
    try {
      const ciphertext = primitiveOutputToBytes(
        sm4.encrypt(plaintext, this.key, { ...CBC_OPTIONS, iv: this.iv })
      );
      return bytesToHex(ciphertext);
    } catch (err) {
      throw new EncryptError(`SM4 encryption failed: ${describeError(err)}`, { cause: err });
    }
  }

  /**
   * Decrypt uppercase or lowercase hex ciphertext to raw bytes.
   *
   * @throws DecryptError on malformed hex, partial blocks or bad padding
   */
  decrypt(cipherHex: string): Uint8Array {
    let ciphertext: Uint8Array;
    try {
      ciphertext = parseHexBytes(cipherHex.trim(), 'bizContent');
    } catch (err) {
      throw new DecryptError(describeError(err), { cause: err });
    }
    if (ciphertext.length === 0 || ciphertext.length % SM4_BLOCK_BYTES !== 0) {
      throw new DecryptError(
        `bizContent: ciphertext must be a non-empty multiple of ${SM4_BLOCK_BYTES} bytes, got ${ciphertext.length}`
      );
    }

    let padded: Uint8Array;
    try {
      padded = primitiveOutputToBytes(sm4.decrypt(ciphertext, this.key, { ...RAW_CBC_OPTIONS, iv: this.iv }));
    } catch (err) {
      throw new DecryptError(`SM4 decryption failed: ${describeError(err)}`, { cause: err });
    }
    return stripPkcs7(padded);
  }

  /**
   * Canonicalize and encrypt a business body.
   */
  encryptBody(body: FieldMap | FieldRecord): string {
    return this.encrypt(encode(body));
  }

  /**
   * Decrypt and parse a business body.
   *
   * @throws DecryptError if decryption or the JSON parse fails
   */
  decryptBody(cipherHex: string): FieldMap {
    const plaintext = this.decrypt(cipherHex);
    try {
      return decode(plaintext);
    } catch (err) {
      if (isGatewayError(err) && err.phase !== 'decode') {
        throw err;
      }
      throw new DecryptError(`Decrypted bizContent is not a JSON object: ${describeError(err)}`, {
        cause: err,
      });
    }
  }
}

/**
 * Encrypt a business body under `key`/`iv`; returns uppercase hex.
 */
export function encryptBody(
  body: FieldMap | FieldRecord,
  key: string | Uint8Array,
  iv: string | Uint8Array
): string {
  return new Sm4Codec(key, iv).encryptBody(body);
}

/**
 * Reverse of {@link encryptBody}.
 */
export function decryptBody(cipherHex: string, key: string | Uint8Array, iv: string | Uint8Array): FieldMap {
  return new Sm4Codec(key, iv).decryptBody(cipherHex);
}
