/**
 * @bankgw/cli - bank gateway command line
 * Offline signing and decryption plus a one-shot gateway call
 */

export { CallCommand } from './commands/call.js';
export { DecryptCommand } from './commands/decrypt.js';
export { PubkeyCommand } from './commands/pubkey.js';
export { SignCommand, type SignOptions } from './commands/sign.js';
export type { CommandDeps } from './commands/deps.js';
export { formatOutput, createExitHandler, parseHeaderPairs } from './utils.js';
export type * from './types.js';
