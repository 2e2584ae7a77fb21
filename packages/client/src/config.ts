/**
 * Client configuration
 *
 * Validated once with zod when the client is built; every call then reads
 * the same immutable values.
 */

import { z } from 'zod';
import { ConfigError, DEFAULT_USER_ID, ErrorCodes } from '@bankgw/crypto';

export const DEFAULT_BANK_ID = 'WZB';
export const DEFAULT_BASE_URL = 'https://openapi.wzbank.cn/prdApiGW/';
export const DEFAULT_TIMEOUT_MS = 30_000;

function hexField(name: string, bytes: number) {
  return z
    .string()
    .trim()
    .regex(new RegExp(`^[0-9a-fA-F]{${bytes * 2}}$`), `${name} must be ${bytes} bytes of hex`);
}

function publicKeyField(name: string) {
  return z
    .string()
    .trim()
    .regex(
      /^(?:04[0-9a-fA-F]{128}|[0-9a-fA-F]{128}|0[23][0-9a-fA-F]{64})$/,
      `${name} must be an SM2 public key in hex`
    );
}

export const KeyMaterialSchema = z.object({
  privateKey: hexField('privateKey', 32),
  publicKey: publicKeyField('publicKey').optional(),
  bankPublicKey: publicKeyField('bankPublicKey').optional(),
  sm4Key: hexField('sm4Key', 16),
  sm4Iv: hexField('sm4Iv', 16),
});

function withTrailingSlash(url: string): string {
  return `${url.replace(/\/+$/, '')}/`;
}

export const ClientConfigSchema = z.object({
  /** Application ID issued by the bank (`x-aob-appID`) */
  appId: z.string().trim().min(1, 'appId is required'),
  /** Bank ID (`x-aob-bankID`) */
  bankId: z.string().trim().min(1).default(DEFAULT_BANK_ID),
  baseUrl: z.string().url().default(DEFAULT_BASE_URL).transform(withTrailingSlash),
  timeoutMs: z.number().int().positive().default(DEFAULT_TIMEOUT_MS),
  /** Log outgoing envelopes and decrypted responses at debug level */
  debug: z.boolean().default(false),
  /** Key material for the built-in SM2/SM4 provider */
  keys: KeyMaterialSchema.optional(),
  /** SM2 signer ID mixed into ZA */
  userId: z.string().min(1).default(DEFAULT_USER_ID),
  /** Defaults to true when a bank public key (or custom provider) is available */
  verifyResponseSignature: z.boolean().optional(),
  /** Treat a response without `x-aob-signature` as an error */
  requireResponseSignature: z.boolean().default(false),
  /** Treat a response without `bizContent` as an error */
  requireEncryptedResponse: z.boolean().default(false),
  /** Add mesgId / mesgDate / mesgTime to every body that lacks them; calls can opt in alone */
  injectMessageMetadata: z.boolean().default(false),
  /** Headers sent on every call (signed when allow-listed) */
  defaultHeaders: z.record(z.string()).default({}),
});

export type KeyMaterialConfig = z.infer<typeof KeyMaterialSchema>;
export type ClientConfigInput = z.input<typeof ClientConfigSchema>;
export type ClientConfig = z.output<typeof ClientConfigSchema>;

/**
 * Validate raw configuration.
 *
 * @throws ConfigError(E_CONFIG_INVALID) listing every issue
 */
export function parseConfig(input: unknown): ClientConfig {
  const result = ClientConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(
      ErrorCodes.CONFIG_INVALID,
      `Invalid client configuration: ${formatIssues(result.error)}`,
      { cause: result.error }
    );
  }
  return result.data;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

function envFlag(value: string | undefined): boolean | string | undefined {
  if (value === undefined || value === '') {
    return undefined;
  }
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) {
    return true;
  }
  if (['0', 'false', 'no', 'off'].includes(normalized)) {
    return false;
  }
  // Left as a string so validation reports it
  return value;
}

function envNumber(value: string | undefined): number | undefined {
  return value === undefined || value === '' ? undefined : Number(value);
}

function envString(value: string | undefined): string | undefined {
  return value === undefined || value === '' ? undefined : value;
}

function dropUndefined(record: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(record).filter(([, value]) => value !== undefined));
}

function keysFromEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  return dropUndefined({
    privateKey: envString(env.BANKGW_PRIVATE_KEY),
    publicKey: envString(env.BANKGW_PUBLIC_KEY),
    bankPublicKey: envString(env.BANKGW_BANK_PUBLIC_KEY),
    sm4Key: envString(env.BANKGW_SM4_KEY),
    sm4Iv: envString(env.BANKGW_SM4_IV),
  });
}

/**
 * Key material alone from `BANKGW_*` variables, for offline tools that
 * never reach the gateway.
 *
 * @throws ConfigError(E_KEY_MISSING) when none of the key variables is set
 */
export function loadKeysFromEnv(env: NodeJS.ProcessEnv = process.env): KeyMaterialConfig {
  const keys = keysFromEnv(env);
  if (Object.keys(keys).length === 0) {
    throw new ConfigError(
      ErrorCodes.KEY_MISSING,
      'No key material: set BANKGW_PRIVATE_KEY, BANKGW_SM4_KEY and BANKGW_SM4_IV'
    );
  }
  const result = KeyMaterialSchema.safeParse(keys);
  if (!result.success) {
    throw new ConfigError(
      ErrorCodes.CONFIG_INVALID,
      `Invalid key configuration: ${formatIssues(result.error)}`,
      { cause: result.error }
    );
  }
  return result.data;
}

/**
 * Build configuration from `BANKGW_*` environment variables.
 *
 * | Variable | Field |
 * |---|---|
 * | BANKGW_APP_ID | appId |
 * | BANKGW_BANK_ID | bankId |
 * | BANKGW_BASE_URL | baseUrl |
 * | BANKGW_TIMEOUT_MS | timeoutMs |
 * | BANKGW_DEBUG | debug |
 * | BANKGW_USER_ID | userId |
 * | BANKGW_PRIVATE_KEY, BANKGW_PUBLIC_KEY, BANKGW_BANK_PUBLIC_KEY | keys.* |
 * | BANKGW_SM4_KEY, BANKGW_SM4_IV | keys.sm4Key, keys.sm4Iv |
 * | BANKGW_VERIFY_RESPONSE_SIGNATURE | verifyResponseSignature |
 * | BANKGW_REQUIRE_RESPONSE_SIGNATURE | requireResponseSignature |
 * | BANKGW_REQUIRE_ENCRYPTED_RESPONSE | requireEncryptedResponse |
 * | BANKGW_INJECT_MESSAGE_METADATA | injectMessageMetadata |
 *
 * `overrides` win over the environment.
 */
export function loadConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<ClientConfigInput> = {}
): ClientConfig {
  const keys = keysFromEnv(env);

  const fromEnv = dropUndefined({
    appId: envString(env.BANKGW_APP_ID),
    bankId: envString(env.BANKGW_BANK_ID),
    baseUrl: envString(env.BANKGW_BASE_URL),
    timeoutMs: envNumber(env.BANKGW_TIMEOUT_MS),
    debug: envFlag(env.BANKGW_DEBUG),
    userId: envString(env.BANKGW_USER_ID),
    keys: Object.keys(keys).length > 0 ? keys : undefined,
    verifyResponseSignature: envFlag(env.BANKGW_VERIFY_RESPONSE_SIGNATURE),
    requireResponseSignature: envFlag(env.BANKGW_REQUIRE_RESPONSE_SIGNATURE),
    requireEncryptedResponse: envFlag(env.BANKGW_REQUIRE_ENCRYPTED_RESPONSE),
    injectMessageMetadata: envFlag(env.BANKGW_INJECT_MESSAGE_METADATA),
  });

  return parseConfig({ ...fromEnv, ...dropUndefined(overrides) });
}
