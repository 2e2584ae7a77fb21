/**
 * Tests for the built-in SM2/SM4 crypto provider
 */

import { describe, it, expect } from 'vitest';
import { ConfigError } from '../src/errors.js';
import { SmCryptoProvider, type KeyMaterial } from '../src/provider.js';
import { fixedNonce } from '../src/testkit.js';

const KEYS: KeyMaterial = {
  privateKey: '0123456789ABCDEF0123456789ABCDEF0123456789ABCDEF0123456789ABCDEF',
  sm4Key: '0123456789ABCDEFFEDCBA9876543210',
  sm4Iv: '000102030405060708090A0B0C0D0E0F',
};
const PUBLIC_KEY =
  '04344081B80805540A38D71D721BD072D8957EAE15AEB852E72086AB4C5962B89B5BB8628B9D9C4EDD30F341A5A25886C063CFF46DC04C7E68F2EFB3B58830E0F3';

const utf8 = (text: string) => new TextEncoder().encode(text);

describe('SmCryptoProvider', () => {
  it('exposes the derived public key', () => {
    const provider = new SmCryptoProvider(KEYS);
    expect(provider.publicKey).toBe(PUBLIC_KEY);
    expect(provider.canVerify).toBe(false);
  });

  it('encrypts and decrypts bytes', async () => {
    const provider = new SmCryptoProvider(KEYS);
    const ciphertext = await provider.encrypt(utf8('{"payAcctNo":"733000120190056868"}'));
    expect(ciphertext).toBe(
      '53CE7CEC99DCD1449D14D43154C16AF9E40CC9CEAC9118A10A5BBD4B194C3264D6FDFE32477416A0F58F9C6EE23BE57A'
    );
    expect(new TextDecoder().decode(await provider.decrypt(ciphertext))).toBe('{"payAcctNo":"733000120190056868"}');
  });

  it('signs with the configured nonce source', async () => {
    const provider = new SmCryptoProvider(KEYS, {
      nonce: fixedNonce('1F2E3D4C5B6A79880F1E2D3C4B5A69788796A5B4C3D2E1F00112233445566778'),
    });
    const message = utf8(
      '{"x-aob-appID":"test-app","x-aob-bankID":"WZB","bizContent":"53CE7CEC99DCD1449D14D43154C16AF9E40CC9CEAC9118A10A5BBD4B194C3264D6FDFE32477416A0F58F9C6EE23BE57A"}'
    );
    expect(await provider.sign(message)).toBe(
      '304402201C7EA0DA68494A64F27A1ED029F5F1FBF4C3EA6F7F1CE17CD05E0D78F192F89C02207A2C036955206069099DF80A42B5A3191F545E7DC122E42FB52CE93A83753269'
    );
  });

  it('verifies with the bank public key', async () => {
    // Loopback: the bank key is our own, so our signatures verify
    const provider = new SmCryptoProvider({ ...KEYS, bankPublicKey: PUBLIC_KEY });
    const message = utf8('{"bizContent":"00"}');
    const signature = await provider.sign(message);

    expect(provider.canVerify).toBe(true);
    await expect(provider.verify(message, signature)).resolves.toBe(true);
    await expect(provider.verify(utf8('{"bizContent":"01"}'), signature)).resolves.toBe(false);
  });

  it('refuses to verify without a bank public key', async () => {
    const provider = new SmCryptoProvider(KEYS);
    await expect(provider.verify(utf8('{}'), '3006020101020101')).rejects.toMatchObject({
      name: 'ConfigError',
      code: 'E_KEY_MISSING',
    });
  });

  it('checks the declared public key at construction', () => {
    expect(
      () =>
        new SmCryptoProvider({
          ...KEYS,
          publicKey: `04${'11'.repeat(64)}`,
        })
    ).toThrow(ConfigError);
  });
});
