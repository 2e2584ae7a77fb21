/**
 * Bank gateway client
 *
 * Validates configuration, assembles the collaborators (crypto provider,
 * transport, logger, metadata source) and runs one GatewayCall per `post`.
 */

import {
  ConfigError,
  ErrorCodes,
  SmCryptoProvider,
  sm2Domain,
  type CryptoProvider,
  type FieldMap,
  type FieldRecord,
  type NonceSource,
} from '@bankgw/crypto';
import { parseConfig, type ClientConfig, type ClientConfigInput } from './config.js';
import { createLogger, type Logger } from './logging.js';
import { createMetadataSource, type MetadataSource } from './metadata.js';
import { GatewayCall, type GatewayCallContext } from './orchestrator.js';
import { UndiciTransport, type Transport } from './transport.js';
import type { CallOptions, GatewayResult } from './types.js';

export interface BankGatewayClientDeps {
  /** Replaces the built-in SM2/SM4 provider (HSM, remote signer) */
  provider?: CryptoProvider;
  transport?: Transport;
  logger?: Logger;
  metadata?: MetadataSource;
  /** Nonce source for the built-in provider */
  nonce?: NonceSource;
}

export class BankGatewayClient {
  readonly config: ClientConfig;
  /** Our SM2 public key, when the built-in provider is used */
  readonly publicKey: string | undefined;

  private readonly context: GatewayCallContext;
  private readonly logger: Logger;

  constructor(config: ClientConfigInput, deps: BankGatewayClientDeps = {}) {
    this.config = parseConfig(config);
    const { keys } = this.config;

    let provider: CryptoProvider;
    let verifyByDefault: boolean;
    if (deps.provider) {
      provider = deps.provider;
      verifyByDefault = true;
      this.publicKey = undefined;
    } else if (keys) {
      const builtIn = new SmCryptoProvider(keys, {
        domain: sm2Domain(this.config.userId),
        nonce: deps.nonce,
      });
      if (this.config.verifyResponseSignature === true && !builtIn.canVerify) {
        throw new ConfigError(
          ErrorCodes.KEY_MISSING,
          'verifyResponseSignature requires keys.bankPublicKey'
        );
      }
      provider = builtIn;
      verifyByDefault = builtIn.canVerify;
      this.publicKey = builtIn.publicKey;
    } else {
      throw new ConfigError(ErrorCodes.KEY_MISSING, 'Either keys or a crypto provider is required');
    }

    this.logger = (
      deps.logger ?? createLogger({ level: this.config.debug ? 'debug' : undefined })
    ).child({ appId: this.config.appId });

    this.context = {
      baseUrl: this.config.baseUrl,
      appId: this.config.appId,
      bankId: this.config.bankId,
      defaultHeaders: this.config.defaultHeaders,
      injectMessageMetadata: this.config.injectMessageMetadata,
      verifyResponseSignature: this.config.verifyResponseSignature ?? verifyByDefault,
      requireResponseSignature: this.config.requireResponseSignature,
      requireEncryptedResponse: this.config.requireEncryptedResponse,
      debug: this.config.debug,
      provider,
      transport: deps.transport ?? new UndiciTransport({ timeoutMs: this.config.timeoutMs }),
      metadata: deps.metadata ?? createMetadataSource(),
      logger: this.logger,
    };
  }

  /**
   * POST a business body to `path`: encrypt, sign, send, verify, decrypt.
   *
   * @param path - Endpoint path, with or without a leading slash
   */
  async post(path: string, body: FieldMap | FieldRecord, options: CallOptions = {}): Promise<GatewayResult> {
    const call = new GatewayCall(this.context, path, body, options);
    try {
      const result = await call.execute();
      this.logger.debug(
        { path, status: result.status, decrypted: result.decrypted, verification: result.verification },
        'Gateway call completed'
      );
      return result;
    } catch (err) {
      this.logger.error({ err, path, trace: call.trace }, 'Gateway call failed');
      throw err;
    }
  }
}
