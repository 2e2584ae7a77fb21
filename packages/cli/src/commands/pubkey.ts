/**
 * bankgw pubkey command
 * Prints the public key for BANKGW_PRIVATE_KEY, checked against
 * BANKGW_PUBLIC_KEY when that is set
 */

import { Sm2Signer } from '@bankgw/crypto';
import { loadKeysFromEnv } from '@bankgw/client';
import type { CLIOptions, CommandResult, PubkeyResult } from '../types.js';
import { handleError, timing } from '../utils.js';
import type { CommandDeps } from './deps.js';

export class PubkeyCommand {
  constructor(private readonly deps: CommandDeps = {}) {}

  async execute(_options: CLIOptions = {}): Promise<CommandResult<PubkeyResult>> {
    const timer = timing();

    try {
      const keys = loadKeysFromEnv(this.deps.env);
      const signer = new Sm2Signer(keys.privateKey, { publicKey: keys.publicKey });

      return {
        success: true,
        data: { kind: 'pubkey', publicKey: signer.publicKey },
        timing: timer.end(),
      };
    } catch (error) {
      return {
        ...handleError<PubkeyResult>(error),
        timing: timer.end(),
      };
    }
  }
}
