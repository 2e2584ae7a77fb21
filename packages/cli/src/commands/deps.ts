import { ConfigError, ErrorCodes, type NonceSource } from '@bankgw/crypto';
import type { ClientConfig, KeyMaterialConfig, Logger, MetadataSource, Transport } from '@bankgw/client';

/** Collaborators a command may be handed instead of the real ones */
export interface CommandDeps {
  env?: NodeJS.ProcessEnv;
  transport?: Transport;
  logger?: Logger;
  metadata?: MetadataSource;
  nonce?: NonceSource;
}

export function requireKeys(config: ClientConfig): KeyMaterialConfig {
  if (!config.keys) {
    throw new ConfigError(
      ErrorCodes.KEY_MISSING,
      'No key material: set BANKGW_PRIVATE_KEY, BANKGW_SM4_KEY and BANKGW_SM4_IV'
    );
  }
  return config.keys;
}
