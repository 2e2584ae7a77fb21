/**
 * SM2 identity digest
 *
 *   ZA = SM3( ENTL || ID || a || b || Gx || Gy || Px || Py )
 *
 * ENTL is the bit length of ID as two big-endian bytes. ZA is prepended to
 * every message before hashing, on both the signing and verifying side.
 */

import { concatBytes, numberToBytesBE } from '@noble/curves/abstract/utils';
import { COORDINATE_BYTES, SM2_DOMAIN, curvePoints, type CurvePoint, type Sm2Domain } from './curve.js';
import { ConfigError, ErrorCodes, describeError } from './errors.js';
import { bytesToHex, toBytes } from './hex.js';
import { sm3Digest } from './sm3.js';

/** Public key as hex (`04||X||Y`, `X||Y`, `02/03||X`) or bytes */
export type PublicKeyInput = string | Uint8Array;

export interface PublicKeyCoordinates {
  x: Uint8Array;
  y: Uint8Array;
}

const MAX_USER_ID_BITS = 0xffff;

/**
 * Parse a public key in any supported encoding into a validated curve point.
 *
 * @throws ConfigError(E_KEY_INVALID) if the encoding or point is invalid
 */
export function parsePublicKey(publicKey: PublicKeyInput, domain: Sm2Domain = SM2_DOMAIN): CurvePoint {
  const { Point } = curvePoints(domain.curve);
  try {
    let bytes = toBytes(publicKey, 'public key');
    // Bare X||Y carries no format prefix
    if (bytes.length === COORDINATE_BYTES * 2) {
      bytes = concatBytes(Uint8Array.of(0x04), bytes);
    }
    const point = Point.fromHex(bytes);
    point.assertValidity();
    return point;
  } catch (err) {
    throw new ConfigError(ErrorCodes.KEY_INVALID, `Invalid SM2 public key: ${describeError(err)}`, {
      cause: err,
    });
  }
}

/**
 * 32-byte X and Y coordinates of a public key, prefix byte stripped.
 */
export function publicKeyCoordinates(
  publicKey: PublicKeyInput | CurvePoint,
  domain: Sm2Domain = SM2_DOMAIN
): PublicKeyCoordinates {
  const point =
    typeof publicKey === 'string' || publicKey instanceof Uint8Array
      ? parsePublicKey(publicKey, domain)
      : publicKey;
  const { x, y } = point.toAffine();
  return {
    x: numberToBytesBE(x, COORDINATE_BYTES),
    y: numberToBytesBE(y, COORDINATE_BYTES),
  };
}

/**
 * Uncompressed public key hex (`04` + X + Y, uppercase).
 */
export function encodePublicKey(point: CurvePoint): string {
  const { x, y } = point.toAffine();
  return `04${bytesToHex(numberToBytesBE(x, COORDINATE_BYTES))}${bytesToHex(numberToBytesBE(y, COORDINATE_BYTES))}`;
}

/**
 * Compute ZA for a public key under the given domain.
 *
 * Pure: depends only on the public key and the domain, so signers and
 * verifiers compute it once per key.
 */
export function identityDigest(
  publicKey: PublicKeyInput | CurvePoint,
  domain: Sm2Domain = SM2_DOMAIN
): Uint8Array {
  const entlBits = domain.userId.length * 8;
  if (entlBits > MAX_USER_ID_BITS) {
    throw new ConfigError(ErrorCodes.KEY_INVALID, 'SM2 user ID longer than 8191 bytes');
  }
  const { curve } = domain;
  const { x, y } = publicKeyCoordinates(publicKey, domain);

  return sm3Digest(
    concatBytes(
      numberToBytesBE(entlBits, 2),
      domain.userId,
      numberToBytesBE(curve.a, COORDINATE_BYTES),
      numberToBytesBE(curve.b, COORDINATE_BYTES),
      numberToBytesBE(curve.gx, COORDINATE_BYTES),
      numberToBytesBE(curve.gy, COORDINATE_BYTES),
      x,
      y
    )
  );
}
