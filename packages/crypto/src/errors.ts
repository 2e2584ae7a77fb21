/**
 * Typed errors for the gateway protocol layer
 *
 * Every failure surfaced by this package (and by @bankgw/client) extends
 * GatewayError and carries the phase that failed plus a stable code, so
 * callers can branch on `err.phase` / `err.code` without parsing messages.
 */

export type ErrorPhase =
  | 'encode'
  | 'decode'
  | 'encrypt'
  | 'sign'
  | 'verify'
  | 'decrypt'
  | 'config'
  | 'transport'
  | 'validate';

export const ErrorCodes = {
  /** FieldMap could not be rendered as canonical JSON */
  ENCODE_FAILED: 'E_ENCODE_FAILED',
  /** Bytes were not UTF-8 encoded JSON object text */
  DECODE_FAILED: 'E_DECODE_FAILED',
  /** Symmetric encryption failed */
  ENCRYPT_FAILED: 'E_ENCRYPT_FAILED',
  /** Hex, cipher, padding or post-decrypt parse failure */
  DECRYPT_FAILED: 'E_DECRYPT_FAILED',
  /** Response carried no bizContent while encryption was required */
  RESPONSE_NOT_ENCRYPTED: 'E_RESPONSE_NOT_ENCRYPTED',
  /** Signature generation failed */
  SIGN_FAILED: 'E_SIGN_FAILED',
  /** Signature did not verify */
  SIGNATURE_INVALID: 'E_SIGNATURE_INVALID',
  /** Signature hex/DER encoding is malformed */
  SIGNATURE_MALFORMED: 'E_SIGNATURE_MALFORMED',
  /** Response signature header absent while it was required */
  SIGNATURE_MISSING: 'E_SIGNATURE_MISSING',
  /** Required key material not supplied */
  KEY_MISSING: 'E_KEY_MISSING',
  /** Key material has the wrong length, range or point encoding */
  KEY_INVALID: 'E_KEY_INVALID',
  /** Declared public key does not belong to the private key */
  KEY_MISMATCH: 'E_KEY_MISMATCH',
  /** Client configuration failed validation */
  CONFIG_INVALID: 'E_CONFIG_INVALID',
  /** Gateway answered with a non-2xx status */
  HTTP_STATUS: 'E_HTTP_STATUS',
  /** Gateway answered 2xx with a body that is not a JSON object */
  RESPONSE_INVALID: 'E_RESPONSE_INVALID',
  /** Request never produced a response (network, timeout, abort) */
  TRANSPORT_FAILED: 'E_TRANSPORT_FAILED',
  /** Endpoint parameters failed validation */
  VALIDATION_FAILED: 'E_VALIDATION_FAILED',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export interface GatewayErrorOptions {
  cause?: unknown;
}

/**
 * Base class for every error raised by the gateway packages.
 */
export class GatewayError extends Error {
  readonly phase: ErrorPhase;
  readonly code: ErrorCode;

  constructor(phase: ErrorPhase, code: ErrorCode, message: string, options?: GatewayErrorOptions) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'GatewayError';
    this.phase = phase;
    this.code = code;
    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class EncodeError extends GatewayError {
  constructor(message: string, options?: GatewayErrorOptions) {
    super('encode', ErrorCodes.ENCODE_FAILED, message, options);
    this.name = 'EncodeError';
  }
}

export class DecodeError extends GatewayError {
  constructor(message: string, options?: GatewayErrorOptions) {
    super('decode', ErrorCodes.DECODE_FAILED, message, options);
    this.name = 'DecodeError';
  }
}

export class EncryptError extends GatewayError {
  constructor(message: string, options?: GatewayErrorOptions) {
    super('encrypt', ErrorCodes.ENCRYPT_FAILED, message, options);
    this.name = 'EncryptError';
  }
}

export type DecryptErrorCode =
  | typeof ErrorCodes.DECRYPT_FAILED
  | typeof ErrorCodes.RESPONSE_NOT_ENCRYPTED;

export class DecryptError extends GatewayError {
  constructor(
    message: string,
    options?: GatewayErrorOptions & { code?: DecryptErrorCode }
  ) {
    super('decrypt', options?.code ?? ErrorCodes.DECRYPT_FAILED, message, options);
    this.name = 'DecryptError';
  }
}

export type SignatureErrorCode =
  | typeof ErrorCodes.SIGN_FAILED
  | typeof ErrorCodes.SIGNATURE_INVALID
  | typeof ErrorCodes.SIGNATURE_MALFORMED
  | typeof ErrorCodes.SIGNATURE_MISSING;

/**
 * Signature generation (phase `sign`) or verification (phase `verify`) failure.
 */
export class SignatureError extends GatewayError {
  constructor(code: SignatureErrorCode, message: string, options?: GatewayErrorOptions) {
    super(code === ErrorCodes.SIGN_FAILED ? 'sign' : 'verify', code, message, options);
    this.name = 'SignatureError';
  }
}

export type ConfigErrorCode =
  | typeof ErrorCodes.KEY_MISSING
  | typeof ErrorCodes.KEY_INVALID
  | typeof ErrorCodes.KEY_MISMATCH
  | typeof ErrorCodes.CONFIG_INVALID;

export class ConfigError extends GatewayError {
  constructor(code: ConfigErrorCode, message: string, options?: GatewayErrorOptions) {
    super('config', code, message, options);
    this.name = 'ConfigError';
  }
}

export function isGatewayError(error: unknown): error is GatewayError {
  return error instanceof GatewayError;
}

/**
 * Message of an unknown thrown value, for wrapping into a typed error.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
