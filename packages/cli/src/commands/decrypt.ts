/**
 * bankgw decrypt <hex> command
 */

import { Sm4Codec, toPlainObject } from '@bankgw/crypto';
import { loadKeysFromEnv } from '@bankgw/client';
import type { CLIOptions, CommandResult, DecryptResult } from '../types.js';
import { handleError, timing } from '../utils.js';
import type { CommandDeps } from './deps.js';

export class DecryptCommand {
  constructor(private readonly deps: CommandDeps = {}) {}

  async execute(cipherHex: string, _options: CLIOptions = {}): Promise<CommandResult<DecryptResult>> {
    const timer = timing();

    try {
      const keys = loadKeysFromEnv(this.deps.env);
      const body = new Sm4Codec(keys.sm4Key, keys.sm4Iv).decryptBody(cipherHex);

      return {
        success: true,
        data: { kind: 'decrypt', body: toPlainObject(body) },
        timing: timer.end(),
      };
    } catch (error) {
      return {
        ...handleError<DecryptResult>(error),
        timing: timer.end(),
      };
    }
  }
}
