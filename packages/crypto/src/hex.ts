/**
 * Hex helpers
 *
 * The gateway exchanges every binary value (ciphertext, signatures, keys)
 * as hexadecimal text. Output is uppercase, matching the bank reference;
 * input is accepted in either case.
 */

/**
 * Convert hex string to Uint8Array
 *
 * @param hex - Hex string, either case, even length
 */
export function hexToBytes(hex: string): Uint8Array {
  // Validate: must be even length and contain only hex characters
  if (hex.length % 2 !== 0 || !/^[0-9a-fA-F]*$/.test(hex)) {
    throw new Error('Invalid hex string');
  }
  const bytes = new Uint8Array(hex.length / 2);
  for (let i = 0; i < bytes.length; i++) {
    bytes[i] = parseInt(hex.slice(i * 2, i * 2 + 2), 16);
  }
  return bytes;
}

/**
 * Convert Uint8Array to uppercase hex string
 */
export function bytesToHex(bytes: Uint8Array): string {
  return Array.from(bytes)
    .map((b) => b.toString(16).padStart(2, '0'))
    .join('')
    .toUpperCase();
}

/**
 * Decode hex and check the byte length.
 *
 * @throws Error naming `label` when the hex is malformed or the length differs
 */
export function parseHexBytes(value: string, label: string, expectedBytes?: number): Uint8Array {
  let bytes: Uint8Array;
  try {
    bytes = hexToBytes(value);
  } catch {
    throw new Error(`${label}: invalid hex encoding`);
  }

  if (expectedBytes !== undefined && bytes.length !== expectedBytes) {
    throw new Error(`${label}: expected ${expectedBytes} bytes, got ${bytes.length} bytes`);
  }

  return bytes;
}

/**
 * Accept key material given either as hex text or raw bytes.
 */
export function toBytes(value: string | Uint8Array, label: string, expectedBytes?: number): Uint8Array {
  if (typeof value === 'string') {
    return parseHexBytes(value.trim(), label, expectedBytes);
  }
  if (expectedBytes !== undefined && value.length !== expectedBytes) {
    throw new Error(`${label}: expected ${expectedBytes} bytes, got ${value.length} bytes`);
  }
  return value;
}
