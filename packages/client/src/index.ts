/**
 * Bank gateway client
 *
 * Request orchestration (encrypt, sign, send, verify, decrypt), the
 * documented endpoint wrappers and the ambient configuration and logging.
 *
 * @packageDocumentation
 */

export { BankGatewayClient, type BankGatewayClientDeps } from './client.js';
export {
  ClientConfigSchema,
  DEFAULT_BANK_ID,
  DEFAULT_BASE_URL,
  DEFAULT_TIMEOUT_MS,
  KeyMaterialSchema,
  loadConfigFromEnv,
  loadKeysFromEnv,
  parseConfig,
  type ClientConfig,
  type ClientConfigInput,
  type KeyMaterialConfig,
} from './config.js';
export * from './endpoints.js';
export { HTTPError, TransportError, ValidationError, type HTTPErrorCode, type ValidationIssue } from './errors.js';
export { createLogger, type CreateLoggerOptions, type Logger } from './logging.js';
export {
  BANK_UTC_OFFSET_MINUTES,
  METADATA_FIELDS,
  createMetadataSource,
  injectMessageMetadata,
  type MessageMetadata,
  type MetadataSource,
  type MetadataSourceOptions,
} from './metadata.js';
export {
  CallState,
  GatewayCall,
  buildRequestHeaders,
  joinUrl,
  prepareRequest,
  type GatewayCallContext,
  type PrepareRequestOptions,
  type PreparedRequest,
  type RequestContext,
} from './orchestrator.js';
export {
  UndiciTransport,
  normalizeHeaders,
  type Transport,
  type UndiciTransportOptions,
  type WireRequest,
  type WireResponse,
} from './transport.js';
export type * from './types.js';
