/**
 * bankgw call <path> <body-json> command
 */

import { decode } from '@bankgw/crypto';
import { BankGatewayClient, loadConfigFromEnv } from '@bankgw/client';
import type { CallResult, CLIOptions, CommandResult } from '../types.js';
import { handleError, timing } from '../utils.js';
import type { CommandDeps } from './deps.js';

export interface CallCommandOptions extends CLIOptions {
  /** Add message metadata; defaults to BANKGW_INJECT_MESSAGE_METADATA */
  metadata?: boolean;
}

export class CallCommand {
  constructor(private readonly deps: CommandDeps = {}) {}

  async execute(
    path: string,
    bodyJson: string,
    options: CallCommandOptions = {}
  ): Promise<CommandResult<CallResult>> {
    const timer = timing();

    try {
      const config = loadConfigFromEnv(
        this.deps.env,
        options.timeout === undefined ? {} : { timeoutMs: options.timeout }
      );
      const client = new BankGatewayClient(config, {
        transport: this.deps.transport,
        logger: this.deps.logger,
        metadata: this.deps.metadata,
        nonce: this.deps.nonce,
      });
      const result = await client.post(path, decode(bodyJson), {
        injectMessageMetadata: options.metadata,
      });

      return {
        success: true,
        data: {
          kind: 'call',
          status: result.status,
          decrypted: result.decrypted,
          verification: result.verification,
          trace: result.trace,
          data: result.data,
        },
        timing: timer.end(),
      };
    } catch (error) {
      return {
        ...handleError<CallResult>(error),
        timing: timer.end(),
      };
    }
  }
}
