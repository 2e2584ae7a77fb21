/**
 * Crypto Test Kit
 *
 * Deterministic nonce sources for TEST FIXTURES ONLY. They are not
 * exported from the main entry point.
 *
 * Import path: @bankgw/crypto/testkit
 *
 * SECURITY: a fixed nonce used for two different messages reveals the
 * private key. Never pass these to a production signer.
 */

import type { NonceSource } from './sm2.js';

function toScalar(value: bigint | string): bigint {
  return typeof value === 'bigint' ? value : BigInt(`0x${value}`);
}

/**
 * Nonce source that always returns `k`.
 *
 * WARNING: FOR TEST FIXTURES ONLY. DO NOT USE IN PRODUCTION.
 *
 * @example
 * ```ts
 * import { fixedNonce } from '@bankgw/crypto/testkit';
 *
 * const signer = new Sm2Signer(TEST_PRIVATE_KEY, { nonce: fixedNonce('1F2E…') });
 * ```
 */
export function fixedNonce(k: bigint | string): NonceSource {
  const scalar = toScalar(k);
  return () => scalar;
}

/**
 * Nonce source that replays `values` in order and then fails.
 *
 * WARNING: FOR TEST FIXTURES ONLY. DO NOT USE IN PRODUCTION.
 */
export function sequenceNonce(values: ReadonlyArray<bigint | string>): NonceSource {
  const scalars = values.map(toScalar);
  let index = 0;
  return () => {
    const next = scalars[index++];
    if (next === undefined) {
      throw new Error('sequenceNonce exhausted');
    }
    return next;
  };
}
