/**
 * SM2 digital signatures (GB/T 32918.2)
 *
 * Point arithmetic comes from @noble/curves; this module composes it into
 * the SM2 signing equations:
 *
 *   e  = SM3(ZA || M)
 *   (x1, y1) = k·G,  r = (e + x1) mod n
 *   s  = (1 + d)^-1 · (k - r·d) mod n
 *
 * and encodes (r, s) as DER `SEQUENCE { INTEGER r, INTEGER s }`, uppercase
 * hex, which is what the gateway expects in `x-aob-signature`.
 *
 * Key material handling:
 * - Private keys are 32-byte scalars in [1, n-2], given as hex or bytes
 * - Every signature draws a fresh k from the NonceSource; reusing k for two
 *   different messages reveals the private key
 * - JavaScript cannot zeroize memory; never log signer instances
 */

import { randomBytes } from 'node:crypto';
import { DER } from '@noble/curves/abstract/weierstrass';
import { invert, mod } from '@noble/curves/abstract/modular';
import { bytesToNumberBE, concatBytes } from '@noble/curves/abstract/utils';
import { COORDINATE_BYTES, SM2_DOMAIN, curvePoints, type CurvePoint, type CurvePoints, type Sm2Domain } from './curve.js';
import { ConfigError, ErrorCodes, SignatureError, describeError } from './errors.js';
import { toBytes, parseHexBytes } from './hex.js';
import { encodePublicKey, identityDigest, parsePublicKey, type PublicKeyInput } from './identity.js';
import { sm3Digest } from './sm3.js';

/**
 * Source of per-signature nonces. Must return a value in [1, order - 1]
 * and an independent one on every call.
 */
export type NonceSource = (order: bigint) => bigint;

/** CSPRNG nonce, 64 extra bits so the reduction bias is negligible */
export const randomNonce: NonceSource = (order) => {
  const bytes = randomBytes(COORDINATE_BYTES + 8);
  return mod(bytesToNumberBE(bytes), order - 1n) + 1n;
};

/** Attempts before giving up on degenerate (r, s) values */
const MAX_SIGN_ATTEMPTS = 16;

export interface Sm2SignerOptions {
  domain?: Sm2Domain;
  nonce?: NonceSource;
  /** Declared public key; must match the one derived from the private key */
  publicKey?: PublicKeyInput;
}

function parsePrivateKey(privateKey: string | Uint8Array, curve: CurvePoints): bigint {
  let d: bigint;
  try {
    d = bytesToNumberBE(toBytes(privateKey, 'private key', COORDINATE_BYTES));
  } catch (err) {
    throw new ConfigError(ErrorCodes.KEY_INVALID, `Invalid SM2 private key: ${describeError(err)}`, {
      cause: err,
    });
  }
  // d = n - 1 would make (1 + d) non-invertible
  if (d < 1n || d > curve.params.n - 2n) {
    throw new ConfigError(ErrorCodes.KEY_INVALID, 'Invalid SM2 private key: scalar out of range');
  }
  return d;
}

/**
 * Derive the uncompressed public key (`04` + X + Y, uppercase hex).
 */
export function derivePublicKey(privateKey: string | Uint8Array, domain: Sm2Domain = SM2_DOMAIN): string {
  const curve = curvePoints(domain.curve);
  const d = parsePrivateKey(privateKey, curve);
  return encodePublicKey(curve.Point.BASE.multiply(d));
}

/**
 * SM2 signer bound to one key pair. The public key and ZA are computed once.
 */
export class Sm2Signer {
  /** Uncompressed public key, uppercase hex */
  readonly publicKey: string;

  private readonly curve: CurvePoints;
  private readonly d: bigint;
  private readonly za: Uint8Array;
  private readonly nonce: NonceSource;

  constructor(privateKey: string | Uint8Array, options: Sm2SignerOptions = {}) {
    const domain = options.domain ?? SM2_DOMAIN;
    this.curve = curvePoints(domain.curve);
    this.d = parsePrivateKey(privateKey, this.curve);
    this.nonce = options.nonce ?? randomNonce;

    const point = this.curve.Point.BASE.multiply(this.d);
    if (options.publicKey !== undefined && !parsePublicKey(options.publicKey, domain).equals(point)) {
      throw new ConfigError(
        ErrorCodes.KEY_MISMATCH,
        'Declared SM2 public key does not match the private key'
      );
    }

    this.publicKey = encodePublicKey(point);
    this.za = identityDigest(point, domain);
  }

  /** ZA of this signer's public key */
  get identityDigest(): Uint8Array {
    return this.za.slice();
  }

  /** e = SM3(ZA || message) */
  digest(message: Uint8Array): Uint8Array {
    return sm3Digest(concatBytes(this.za, message));
  }

  /**
   * Sign `message`; returns the DER signature as uppercase hex.
   */
  sign(message: Uint8Array): string {
    const { n } = this.curve.params;
    const { BASE } = this.curve.Point;
    const e = bytesToNumberBE(this.digest(message));

    for (let attempt = 0; attempt < MAX_SIGN_ATTEMPTS; attempt++) {
      const k = this.nonce(n);
      if (k < 1n || k >= n) {
        throw new SignatureError(ErrorCodes.SIGN_FAILED, 'Nonce source returned a value outside [1, n-1]');
      }
      const { x: x1 } = BASE.multiply(k).toAffine();
      const r = mod(e + x1, n);
      if (r === 0n || r + k === n) {
        continue;
      }
      const s = mod(invert(1n + this.d, n) * (k - r * this.d), n);
      if (s === 0n) {
        continue;
      }
      return DER.hexFromSig({ r, s }).toUpperCase();
    }

    throw new SignatureError(
      ErrorCodes.SIGN_FAILED,
      `No valid SM2 signature after ${MAX_SIGN_ATTEMPTS} nonces`
    );
  }
}

/**
 * SM2 verifier bound to one public key.
 */
export class Sm2Verifier {
  private readonly curve: CurvePoints;
  private readonly point: CurvePoint;
  private readonly za: Uint8Array;

  constructor(publicKey: PublicKeyInput, domain: Sm2Domain = SM2_DOMAIN) {
    this.curve = curvePoints(domain.curve);
    this.point = parsePublicKey(publicKey, domain);
    this.za = identityDigest(this.point, domain);
  }

  /**
   * Check a DER hex signature over `message`.
   *
   * @returns false for any signature that does not verify
   * @throws SignatureError(E_SIGNATURE_MALFORMED) if the hex or DER is malformed
   */
  verify(message: Uint8Array, signatureHex: string): boolean {
    let r: bigint;
    let s: bigint;
    try {
      ({ r, s } = DER.toSig(parseHexBytes(signatureHex.trim(), 'signature')));
    } catch (err) {
      throw new SignatureError(
        ErrorCodes.SIGNATURE_MALFORMED,
        `Malformed SM2 signature: ${describeError(err)}`,
        { cause: err }
      );
    }

    const { n } = this.curve.params;
    const { BASE, ZERO } = this.curve.Point;
    if (r < 1n || r >= n || s < 1n || s >= n) {
      return false;
    }
    const t = mod(r + s, n);
    if (t === 0n) {
      return false;
    }

    const sum = BASE.multiply(s).add(this.point.multiply(t));
    if (sum.equals(ZERO)) {
      return false;
    }
    const e = bytesToNumberBE(sm3Digest(concatBytes(this.za, message)));
    return mod(e + sum.toAffine().x, n) === r;
  }
}
