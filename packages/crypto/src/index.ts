/**
 * Bank gateway crypto package
 *
 * Canonical JSON, SM2 signatures with the identity digest, SM4-CBC body
 * encryption, sign-map construction and the crypto provider capability.
 *
 * @packageDocumentation
 */

export * from './canonical.js';
export * from './curve.js';
export * from './errors.js';
export * from './hex.js';
export * from './identity.js';
export * from './provider.js';
export * from './sign-map.js';
export * from './sm2.js';
export * from './sm3.js';
export * from './sm4.js';
