/**
 * bankgw sign <body-json> command
 * Builds the encrypted envelope and request signature offline
 */

import { SmCryptoProvider, canonicalize, decode, sm2Domain } from '@bankgw/crypto';
import { createMetadataSource, loadConfigFromEnv, prepareRequest } from '@bankgw/client';
import type { CLIOptions, CommandResult, SignResult } from '../types.js';
import { handleError, parseHeaderPairs, timing } from '../utils.js';
import { requireKeys, type CommandDeps } from './deps.js';

export interface SignOptions extends CLIOptions {
  /** Extra `name=value` headers */
  header?: string[];
  /** Add message metadata; defaults to BANKGW_INJECT_MESSAGE_METADATA */
  metadata?: boolean;
}

export class SignCommand {
  constructor(private readonly deps: CommandDeps = {}) {}

  async execute(bodyJson: string, options: SignOptions = {}): Promise<CommandResult<SignResult>> {
    const timer = timing();

    try {
      const config = loadConfigFromEnv(this.deps.env);
      const keys = requireKeys(config);
      const provider = new SmCryptoProvider(keys, {
        domain: sm2Domain(config.userId),
        nonce: this.deps.nonce,
      });

      const inject = options.metadata ?? config.injectMessageMetadata;
      const metadata = inject ? (this.deps.metadata ?? createMetadataSource())() : undefined;
      const prepared = await prepareRequest(
        { appId: config.appId, bankId: config.bankId, defaultHeaders: config.defaultHeaders, provider },
        decode(bodyJson),
        { headers: parseHeaderPairs(options.header ?? []), metadata }
      );

      return {
        success: true,
        data: {
          kind: 'sign',
          headers: prepared.headers,
          plaintext: canonicalize(prepared.body),
          bizContent: prepared.bizContent,
          envelope: prepared.envelope,
        },
        timing: timer.end(),
      };
    } catch (error) {
      return {
        ...handleError<SignResult>(error),
        timing: timer.end(),
      };
    }
  }
}
