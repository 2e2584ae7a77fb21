/**
 * SM2 domain parameters (GB/T 32918.5 recommended curve) and the
 * identity tag mixed into every signature digest.
 *
 * Signers and verifiers take an `Sm2Domain` argument rather than reading
 * module state.
 */

import { hmac } from '@noble/hashes/hmac';
import { sha256 } from '@noble/hashes/sha256';
import { randomBytes } from '@noble/hashes/utils';
import {
  weierstrass,
  type ProjConstructor,
  type ProjPointType,
} from '@noble/curves/abstract/weierstrass';
import { Field } from '@noble/curves/abstract/modular';
import { concatBytes } from '@noble/curves/abstract/utils';

export interface CurveParameters {
  /** Field prime */
  p: bigint;
  a: bigint;
  b: bigint;
  /** Order of the base point */
  n: bigint;
  gx: bigint;
  gy: bigint;
}

export interface Sm2Domain {
  curve: CurveParameters;
  /** Signer identity (`ID` in ZA), as raw bytes */
  userId: Uint8Array;
}

export const SM2_CURVE: Readonly<CurveParameters> = Object.freeze({
  p: BigInt('0xFFFFFFFEFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFF00000000FFFFFFFFFFFFFFFF'),
  a: BigInt('0xFFFFFFFEFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFF00000000FFFFFFFFFFFFFFFC'),
  b: BigInt('0x28E9FA9E9D9F5E344D5A9E4BCF6509A7F39789F515AB8F92DDBCBD414D940E93'),
  n: BigInt('0xFFFFFFFEFFFFFFFFFFFFFFFFFFFFFFFF7203DF6B21C6052B53BBF40939D54123'),
  gx: BigInt('0x32C4AE2C1F1981195F9904466A39C9948FE30BBFF2660BE1715A4589334C74C7'),
  gy: BigInt('0xBC3736A2F4F6779C59BDCEE36B692153D0A9877CC62A474002DF32E52139F0A0'),
});

/** Default signer ID used by the bank's reference implementation */
export const DEFAULT_USER_ID = '1234567812345678';

export const SM2_DOMAIN: Readonly<Sm2Domain> = Object.freeze({
  curve: SM2_CURVE,
  userId: new TextEncoder().encode(DEFAULT_USER_ID),
});

/**
 * SM2 domain for a signer ID; the shared default domain for the default ID.
 */
export function sm2Domain(userId: string = DEFAULT_USER_ID): Readonly<Sm2Domain> {
  return userId === DEFAULT_USER_ID
    ? SM2_DOMAIN
    : { curve: SM2_CURVE, userId: new TextEncoder().encode(userId) };
}

/** Coordinate and scalar width in bytes */
export const COORDINATE_BYTES = 32;

export type CurvePoint = ProjPointType<bigint>;

export interface CurvePoints {
  /** Point constructor (fromHex, BASE, ZERO) */
  Point: ProjConstructor<bigint>;
  params: CurveParameters;
}

const curveCache = new WeakMap<CurveParameters, CurvePoints>();

/**
 * Point arithmetic for a parameter set, built once per parameter object.
 */
export function curvePoints(params: CurveParameters): CurvePoints {
  const cached = curveCache.get(params);
  if (cached) {
    return cached;
  }
  // hash/hmac feed noble's ECDSA helpers, which SM2 does not use
  const { ProjectivePoint } = weierstrass({
    a: params.a,
    b: params.b,
    Fp: Field(params.p),
    n: params.n,
    h: 1n,
    Gx: params.gx,
    Gy: params.gy,
    hash: sha256,
    hmac: (key: Uint8Array, ...msgs: Uint8Array[]) => hmac(sha256, key, concatBytes(...msgs)),
    randomBytes,
  });
  const curve: CurvePoints = { Point: ProjectivePoint, params };
  curveCache.set(params, curve);
  return curve;
}
