/**
 * SM3 digest (GB/T 32905)
 *
 * The compression function comes from sm-crypto-v2; this module only pins
 * the byte-in / byte-out contract the rest of the package relies on.
 */

import { sm3 } from 'sm-crypto-v2';
import { hexToBytes } from './hex.js';

export const SM3_DIGEST_BYTES = 32;

/**
 * Normalize a primitive-library result to bytes. sm-crypto-v2 returns hex
 * text by default and byte arrays when asked for them.
 */
export function primitiveOutputToBytes(output: unknown): Uint8Array {
  if (output instanceof Uint8Array) {
    return output;
  }
  if (Array.isArray(output) && output.every((b) => typeof b === 'number')) {
    return Uint8Array.from(output);
  }
  if (typeof output === 'string') {
    return hexToBytes(output);
  }
  throw new Error('Unexpected output from SM primitive library');
}

/**
 * Compute the SM3 digest of `data` (32 bytes).
 */
export function sm3Digest(data: Uint8Array): Uint8Array {
  const digest = primitiveOutputToBytes(sm3(data));
  if (digest.length !== SM3_DIGEST_BYTES) {
    throw new Error(`SM3 digest must be ${SM3_DIGEST_BYTES} bytes, got ${digest.length}`);
  }
  return digest;
}
