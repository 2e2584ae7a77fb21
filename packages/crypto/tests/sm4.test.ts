/**
 * Tests for the SM4-CBC bizContent codec
 */

import { describe, it, expect } from 'vitest';
import { ConfigError, DecryptError } from '../src/errors.js';
import { Sm4Codec, decryptBody, encryptBody } from '../src/sm4.js';

const KEY = '0123456789ABCDEFFEDCBA9876543210';
const IV = '000102030405060708090A0B0C0D0E0F';
const SINGLE_FIELD_CIPHERTEXT =
  '53CE7CEC99DCD1449D14D43154C16AF9E40CC9CEAC9118A10A5BBD4B194C3264D6FDFE32477416A0F58F9C6EE23BE57A';

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('expected function to throw');
}

describe('Sm4Codec construction', () => {
  it('requires a 16-byte key and IV', () => {
    const err = captureError(() => new Sm4Codec('00', IV));
    expect(err).toBeInstanceOf(ConfigError);
    if (err instanceof ConfigError) {
      expect(err.code).toBe('E_KEY_INVALID');
      expect(err.message).toBe('SM4 key: expected 16 bytes, got 1 bytes');
    }
    expect(() => new Sm4Codec(KEY, `${IV}00`)).toThrow('SM4 IV: expected 16 bytes, got 17 bytes');
  });

  it('accepts raw bytes and lowercase hex', () => {
    const fromBytes = new Sm4Codec(Uint8Array.from(Buffer.from(KEY, 'hex')), IV.toLowerCase());
    expect(fromBytes.encryptBody({ payAcctNo: '733000120190056868' })).toBe(SINGLE_FIELD_CIPHERTEXT);
  });
});

describe('encryptBody / decryptBody', () => {
  it('encrypts the canonical body to uppercase hex', () => {
    expect(encryptBody(new Map([['payAcctNo', '733000120190056868']]), KEY, IV)).toBe(SINGLE_FIELD_CIPHERTEXT);
  });

  it('decrypts back to an ordered map', () => {
    const body = decryptBody(SINGLE_FIELD_CIPHERTEXT.toLowerCase(), KEY, IV);
    expect([...body.entries()]).toEqual([['payAcctNo', '733000120190056868']]);
  });

  it('adds a full padding block to block-aligned input', () => {
    const codec = new Sm4Codec(KEY, IV);
    const ciphertext = codec.encrypt(new TextEncoder().encode('0123456789abcdef'));
    expect(ciphertext).toBe('9D193C43FDC9AC44B40C27629EA9DF0C8DCE12D6419F61023C46B703DBD1BD2D');
    expect(new TextDecoder().decode(codec.decrypt(ciphertext))).toBe('0123456789abcdef');
  });
});

describe('decryption failures', () => {
  const codec = new Sm4Codec(KEY, IV);

  const cases: Array<{ name: string; input: string; message: string }> = [
    { name: 'non-hex input', input: 'XYZ1', message: 'bizContent: invalid hex encoding' },
    {
      name: 'partial block',
      input: '00'.repeat(15),
      message: 'bizContent: ciphertext must be a non-empty multiple of 16 bytes, got 15',
    },
    {
      name: 'empty ciphertext',
      input: '',
      message: 'bizContent: ciphertext must be a non-empty multiple of 16 bytes, got 0',
    },
  ];

  for (const testCase of cases) {
    it(`rejects ${testCase.name}`, () => {
      const err = captureError(() => codec.decrypt(testCase.input));
      expect(err).toBeInstanceOf(DecryptError);
      if (err instanceof DecryptError) {
        expect(err.code).toBe('E_DECRYPT_FAILED');
        expect(err.message).toBe(testCase.message);
      }
    });
  }

  it('rejects invalid padding', () => {
    // Plaintext block of 16 spaces: last byte 0x20 is not a valid pad length
    const err = captureError(() => codec.decrypt('F42952CF94AC83688437C9B671D6C7FA'));
    expect(err).toBeInstanceOf(DecryptError);
    if (err instanceof DecryptError) {
      expect(err.phase).toBe('decrypt');
      expect(err.message.startsWith('SM4 decryption failed: ')).toBe(true);
    }
  });

  describe('pad byte checks', () => {
    // In CBC the first ciphertext block alone decrypts to the first plaintext block
    const firstBlockCipher = (block: Uint8Array) => codec.encrypt(block).slice(0, 32);
    const block = (...tail: number[]) => {
      const bytes = new Uint8Array(16).fill(0x41);
      bytes.set(tail, 16 - tail.length);
      return bytes;
    };

    const invalid: Array<{ name: string; tail: number[] }> = [
      { name: 'a zero pad byte', tail: [0, 0, 0, 0] },
      { name: 'a pad length above the block size', tail: [0x11] },
      { name: 'inconsistent pad bytes', tail: [3, 2, 3] },
    ];

    for (const testCase of invalid) {
      it(`rejects ${testCase.name}`, () => {
        const err = captureError(() => codec.decrypt(firstBlockCipher(block(...testCase.tail))));
        expect(err).toBeInstanceOf(DecryptError);
        if (err instanceof DecryptError) {
          expect(err.message).toBe('SM4 decryption failed: padding is invalid');
        }
      });
    }

    it('strips a valid pad', () => {
      const plaintext = codec.decrypt(firstBlockCipher(block(2, 2)));
      expect(plaintext).toEqual(new Uint8Array(14).fill(0x41));
    });
  });

  it('rejects plaintext that is not a JSON object', () => {
    const err = captureError(() => codec.decryptBody('9F70CAC27596E76BDB659458C9B07F49'));
    expect(err).toBeInstanceOf(DecryptError);
    if (err instanceof DecryptError) {
      expect(err.message).toBe(
        'Decrypted bizContent is not a JSON object: Invalid JSON at position 0: expected a JSON object'
      );
    }
  });
});
