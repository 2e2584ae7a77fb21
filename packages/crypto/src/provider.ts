/**
 * Crypto provider capability
 *
 * The request orchestrator only needs four operations. Anything that
 * implements them (the built-in SM2/SM4 provider, an HSM bridge, a remote
 * signing service) can be handed to the client.
 */

import { SM2_DOMAIN, type Sm2Domain } from './curve.js';
import { ConfigError, ErrorCodes } from './errors.js';
import type { PublicKeyInput } from './identity.js';
import { Sm2Signer, Sm2Verifier, type NonceSource } from './sm2.js';
import { Sm4Codec } from './sm4.js';

export interface CryptoProvider {
  /** Sign canonical bytes; returns the signature header value */
  sign(data: Uint8Array): Promise<string>;
  /** Verify a counterparty signature over canonical bytes */
  verify(data: Uint8Array, signature: string): Promise<boolean>;
  /** Encrypt a canonical body; returns uppercase hex */
  encrypt(plaintext: Uint8Array): Promise<string>;
  /** Decrypt hex ciphertext to plaintext bytes */
  decrypt(cipherHex: string): Promise<Uint8Array>;
}

/**
 * Key material for the built-in provider. Hex strings or raw bytes.
 */
export interface KeyMaterial {
  /** SM2 private scalar (32 bytes) */
  privateKey: string | Uint8Array;
  /** Our public key as registered with the bank, checked against privateKey */
  publicKey?: PublicKeyInput;
  /** Bank public key, used to verify response signatures */
  bankPublicKey?: PublicKeyInput;
  /** SM4 key (16 bytes) */
  sm4Key: string | Uint8Array;
  /** SM4 IV (16 bytes) */
  sm4Iv: string | Uint8Array;
}

export interface SmCryptoProviderOptions {
  domain?: Sm2Domain;
  nonce?: NonceSource;
}

/**
 * SM2 + SM4 provider built from in-memory key material.
 */
export class SmCryptoProvider implements CryptoProvider {
  private readonly signer: Sm2Signer;
  private readonly verifier: Sm2Verifier | undefined;
  private readonly codec: Sm4Codec;

  constructor(keys: KeyMaterial, options: SmCryptoProviderOptions = {}) {
    const domain = options.domain ?? SM2_DOMAIN;
    this.signer = new Sm2Signer(keys.privateKey, {
      domain,
      nonce: options.nonce,
      publicKey: keys.publicKey,
    });
    this.verifier =
      keys.bankPublicKey === undefined ? undefined : new Sm2Verifier(keys.bankPublicKey, domain);
    this.codec = new Sm4Codec(keys.sm4Key, keys.sm4Iv);
  }

  /** Our uncompressed public key (uppercase hex) */
  get publicKey(): string {
    return this.signer.publicKey;
  }

  /** Whether a bank public key was supplied */
  get canVerify(): boolean {
    return this.verifier !== undefined;
  }

  async sign(data: Uint8Array): Promise<string> {
    return this.signer.sign(data);
  }

  async verify(data: Uint8Array, signature: string): Promise<boolean> {
    if (!this.verifier) {
      throw new ConfigError(ErrorCodes.KEY_MISSING, 'No bank public key configured for verification');
    }
    return this.verifier.verify(data, signature);
  }

  async encrypt(plaintext: Uint8Array): Promise<string> {
    return this.codec.encrypt(plaintext);
  }

  async decrypt(cipherHex: string): Promise<Uint8Array> {
    return this.codec.decrypt(cipherHex);
  }
}
