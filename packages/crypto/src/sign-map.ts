/**
 * Signature payload ("sign map") construction
 *
 * The gateway signs a canonical JSON object made of selected transport
 * headers, in a fixed order, followed by the encrypted body. The header
 * names and their order are part of the wire contract.
 */

import { encode, type FieldMap } from './canonical.js';
import type { Sm2Signer, Sm2Verifier } from './sm2.js';

export const WireHeaders = {
  AUTHORIZATION: 'Authorization',
  APP_ID: 'x-aob-appID',
  BANK_ID: 'x-aob-bankID',
  LAST_LOGON_TIME: 'x-aob-customer-last-logger-time',
  CUSTOMER_IP: 'x-aob-customer-ip-address',
  INTERACTION_ID: 'x-aob-interaction-id',
  ACCESS_TOKEN: 'x-aob-access-token',
  CUSTOMER_USER_AGENT: 'x-customer-user-agent',
  IDEMPOTENCY_KEY: 'x-idempotency-key',
  SIGNATURE: 'x-aob-signature',
} as const;

/** Headers that take part in the signature, in signing order */
export const SIGN_HEADER_ALLOW_LIST: readonly string[] = [
  WireHeaders.AUTHORIZATION,
  WireHeaders.APP_ID,
  WireHeaders.BANK_ID,
  WireHeaders.LAST_LOGON_TIME,
  WireHeaders.CUSTOMER_IP,
  WireHeaders.INTERACTION_ID,
  WireHeaders.ACCESS_TOKEN,
  WireHeaders.CUSTOMER_USER_AGENT,
  WireHeaders.IDEMPOTENCY_KEY,
];

/** Body field carrying the SM4 ciphertext */
export const BIZ_CONTENT_FIELD = 'bizContent';

export type HeaderBag = Readonly<Record<string, string | undefined>>;

/** Exact spelling wins; otherwise the first non-empty case-insensitive match */
function findHeader(headers: HeaderBag, name: string): string | undefined {
  const exact = headers[name];
  if (exact) {
    return exact;
  }
  const lower = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (value && key.toLowerCase() === lower) {
      return value;
    }
  }
  return undefined;
}

/**
 * Build the ordered sign map.
 *
 * Header lookup ignores case; the emitted key uses the allow-list spelling.
 * Absent or empty headers are skipped, and so is an absent or empty
 * bizContent. Entries are never sorted.
 */
export function buildSignMap(
  headers: HeaderBag,
  bizContent: string | undefined,
  allowList: readonly string[] = SIGN_HEADER_ALLOW_LIST
): FieldMap {
  const signMap: FieldMap = new Map();
  for (const name of allowList) {
    const value = findHeader(headers, name);
    if (value) {
      signMap.set(name, value);
    }
  }
  if (bizContent) {
    signMap.set(BIZ_CONTENT_FIELD, bizContent);
  }
  return signMap;
}

/**
 * Canonicalize a sign map and sign it.
 */
export function signSignMap(signMap: FieldMap, signer: Sm2Signer): string {
  return signer.sign(encode(signMap));
}

/**
 * Canonicalize a sign map and verify a signature over it.
 */
export function verifySignMap(signMap: FieldMap, signatureHex: string, verifier: Sm2Verifier): boolean {
  return verifier.verify(encode(signMap), signatureHex);
}
