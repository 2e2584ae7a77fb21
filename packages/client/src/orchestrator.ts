/**
 * Request/response orchestrator
 *
 * One GatewayCall per call:
 *
 *   Building -> BodyEncrypted -> Signed -> Sent -> ResponseParsed
 *     -> Verified | VerifySkipped -> [Decrypted] -> Done
 *
 * and Failed from any non-terminal state. The states visited are recorded
 * and returned with the result.
 */

import {
  BIZ_CONTENT_FIELD,
  DecryptError,
  EncryptError,
  ErrorCodes,
  SignatureError,
  WireHeaders,
  buildSignMap,
  canonicalize,
  decode,
  describeError,
  encode,
  isGatewayError,
  toFieldMap,
  toPlainObject,
  type CryptoProvider,
  type FieldMap,
  type FieldRecord,
  type FieldValue,
  type GatewayError,
} from '@bankgw/crypto';
import { HTTPError, TransportError } from './errors.js';
import type { Logger } from './logging.js';
import { injectMessageMetadata, type MessageMetadata, type MetadataSource } from './metadata.js';
import type { Transport, WireResponse } from './transport.js';
import type { CallOptions, GatewayResult, VerificationOutcome } from './types.js';

export const CallState = {
  BUILDING: 'Building',
  BODY_ENCRYPTED: 'BodyEncrypted',
  SIGNED: 'Signed',
  SENT: 'Sent',
  RESPONSE_PARSED: 'ResponseParsed',
  VERIFIED: 'Verified',
  VERIFY_SKIPPED: 'VerifySkipped',
  DECRYPTED: 'Decrypted',
  DONE: 'Done',
  FAILED: 'Failed',
} as const;

export type CallState = (typeof CallState)[keyof typeof CallState];

const TRANSITIONS: Record<CallState, readonly CallState[]> = {
  Building: ['BodyEncrypted'],
  BodyEncrypted: ['Signed'],
  Signed: ['Sent'],
  Sent: ['ResponseParsed'],
  ResponseParsed: ['Verified', 'VerifySkipped'],
  Verified: ['Decrypted', 'Done'],
  VerifySkipped: ['Decrypted', 'Done'],
  Decrypted: ['Done'],
  Done: [],
  Failed: [],
};

/** What building a signed request reads */
export interface RequestContext {
  appId: string;
  bankId: string;
  defaultHeaders: Readonly<Record<string, string>>;
  provider: CryptoProvider;
}

/** Everything a call reads; shared by all calls of one client */
export interface GatewayCallContext extends RequestContext {
  baseUrl: string;
  injectMessageMetadata: boolean;
  verifyResponseSignature: boolean;
  requireResponseSignature: boolean;
  requireEncryptedResponse: boolean;
  debug: boolean;
  transport: Transport;
  metadata: MetadataSource;
  logger: Logger;
}

/**
 * Join base URL and endpoint path; leading slashes on the path are dropped.
 */
export function joinUrl(baseUrl: string, path: string): string {
  const base = baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`;
  return base + path.replace(/^\/+/, '');
}

/**
 * Outgoing headers in sending order. A caller-supplied signature header is
 * dropped: the signature is always set last by the call itself.
 */
export function buildRequestHeaders(
  appId: string,
  bankId: string,
  defaults: Readonly<Record<string, string>>,
  extra: Readonly<Record<string, string>> = {}
): Record<string, string> {
  const headers: Record<string, string> = {
    'Content-Type': 'application/json',
    Accept: 'application/json',
    [WireHeaders.APP_ID]: appId,
    [WireHeaders.BANK_ID]: bankId,
  };
  for (const [name, value] of [...Object.entries(defaults), ...Object.entries(extra)]) {
    if (name.toLowerCase() === WireHeaders.SIGNATURE) {
      continue;
    }
    // Replace a differently-cased duplicate in place
    const existing = Object.keys(headers).find((key) => key.toLowerCase() === name.toLowerCase());
    headers[existing ?? name] = value;
  }
  return headers;
}

async function guard<T>(work: () => Promise<T>, wrap: (err: unknown) => GatewayError): Promise<T> {
  try {
    return await work();
  } catch (err) {
    throw isGatewayError(err) ? err : wrap(err);
  }
}

export interface PrepareRequestOptions {
  /** Extra headers; allow-listed ones are signed */
  headers?: Readonly<Record<string, string>>;
  /** Appended to the body when given; fields already present are kept */
  metadata?: MessageMetadata;
  /** Called on reaching BodyEncrypted and then Signed */
  onState?: (state: CallState) => void;
}

export interface PreparedRequest {
  /** Business body as encrypted, metadata included */
  body: FieldMap;
  bizContent: string;
  /** Headers in sending order, signature last */
  headers: Record<string, string>;
  /** Request body as sent: {"bizContent":"..."} */
  envelope: string;
}

/**
 * The Building, BodyEncrypted and Signed steps of a call: append metadata,
 * encrypt the canonical body, then sign the allow-listed headers together
 * with the ciphertext. The caller's body is not modified.
 */
export async function prepareRequest(
  ctx: RequestContext,
  body: FieldMap | FieldRecord,
  options: PrepareRequestOptions = {}
): Promise<PreparedRequest> {
  let fields = toFieldMap(body);
  if (options.metadata) {
    fields = injectMessageMetadata(fields, options.metadata);
  }

  const plaintext = encode(fields);
  const bizContent = await guard(
    () => ctx.provider.encrypt(plaintext),
    (err) => new EncryptError(`Body encryption failed: ${describeError(err)}`, { cause: err })
  );
  options.onState?.(CallState.BODY_ENCRYPTED);

  const headers = buildRequestHeaders(ctx.appId, ctx.bankId, ctx.defaultHeaders, options.headers);
  const signMap = buildSignMap(headers, bizContent);
  headers[WireHeaders.SIGNATURE] = await guard(
    () => ctx.provider.sign(encode(signMap)),
    (err) =>
      new SignatureError(ErrorCodes.SIGN_FAILED, `Request signing failed: ${describeError(err)}`, {
        cause: err,
      })
  );
  options.onState?.(CallState.SIGNED);

  return {
    body: fields,
    bizContent,
    headers,
    envelope: canonicalize(new Map<string, FieldValue>([[BIZ_CONTENT_FIELD, bizContent]])),
  };
}

export class GatewayCall {
  private current: CallState = CallState.BUILDING;
  private readonly visited: CallState[] = [CallState.BUILDING];
  private started = false;

  constructor(
    private readonly ctx: GatewayCallContext,
    private readonly path: string,
    private readonly body: FieldMap | FieldRecord,
    private readonly options: CallOptions = {}
  ) {}

  get state(): CallState {
    return this.current;
  }

  get trace(): readonly CallState[] {
    return [...this.visited];
  }

  async execute(): Promise<GatewayResult> {
    if (this.started) {
      throw new Error('GatewayCall.execute() may only be called once');
    }
    this.started = true;
    try {
      return await this.run();
    } catch (err) {
      this.fail();
      throw err;
    }
  }

  private transition(next: CallState): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new Error(`Illegal call state transition: ${this.current} -> ${next}`);
    }
    this.current = next;
    this.visited.push(next);
  }

  private fail(): void {
    if (this.current !== CallState.DONE && this.current !== CallState.FAILED) {
      this.current = CallState.FAILED;
      this.visited.push(CallState.FAILED);
    }
  }

  private async run(): Promise<GatewayResult> {
    const { ctx, options } = this;

    // Building -> BodyEncrypted -> Signed
    const url = joinUrl(ctx.baseUrl, this.path);
    const inject = options.injectMessageMetadata ?? ctx.injectMessageMetadata;
    const { headers, envelope } = await prepareRequest(ctx, this.body, {
      headers: options.headers,
      metadata: inject ? ctx.metadata() : undefined,
      onState: (state) => this.transition(state),
    });

    // Sent
    if (ctx.debug) {
      ctx.logger.debug({ url, headers, body: envelope }, 'Sending gateway request');
    }
    const response = await guard(
      () =>
        ctx.transport.send({
          url,
          headers,
          body: envelope,
          signal: options.signal,
          timeoutMs: options.timeoutMs,
        }),
      (err) => new TransportError(`POST ${url} failed: ${describeError(err)}`, { cause: err })
    );
    this.transition(CallState.SENT);
    if (response.status < 200 || response.status >= 300) {
      throw HTTPError.status(response.status, response.body);
    }

    // ResponseParsed
    let raw: FieldMap;
    try {
      raw = decode(response.body);
    } catch (err) {
      throw HTTPError.invalidBody(response.status, response.body, describeError(err), err);
    }
    this.transition(CallState.RESPONSE_PARSED);

    // Verified | VerifySkipped
    const verification = await this.verifyResponse(response, raw);
    this.transition(
      verification.status === 'verified' ? CallState.VERIFIED : CallState.VERIFY_SKIPPED
    );

    const encrypted = raw.get(BIZ_CONTENT_FIELD);
    if (encrypted === undefined || encrypted === null) {
      if (ctx.requireEncryptedResponse) {
        throw new DecryptError('Response carries no bizContent', {
          code: ErrorCodes.RESPONSE_NOT_ENCRYPTED,
        });
      }
      ctx.logger.warn(
        { url, status: response.status },
        'No bizContent in response; returning it as is'
      );
      this.transition(CallState.DONE);
      return {
        decrypted: false,
        status: response.status,
        headers: response.headers,
        body: raw,
        data: toPlainObject(raw),
        verification,
        trace: this.trace,
      };
    }
    if (typeof encrypted !== 'string') {
      throw new DecryptError(`Response bizContent must be a string, got ${describeValue(encrypted)}`);
    }

    // Decrypted
    const decrypted = await this.decryptBody(encrypted);
    this.transition(CallState.DECRYPTED);
    const data = toPlainObject(decrypted);
    if (ctx.debug) {
      ctx.logger.debug({ url, response: data }, 'Decrypted gateway response');
    }

    this.transition(CallState.DONE);
    return {
      decrypted: true,
      status: response.status,
      headers: response.headers,
      body: decrypted,
      data,
      verification,
      trace: this.trace,
    };
  }

  private async verifyResponse(response: WireResponse, raw: FieldMap): Promise<VerificationOutcome> {
    const { ctx } = this;
    const enabled = this.options.verifyResponseSignature ?? ctx.verifyResponseSignature;
    if (!enabled) {
      return { status: 'skipped', reason: 'disabled' };
    }

    const signature = response.headers[WireHeaders.SIGNATURE.toLowerCase()];
    if (!signature) {
      if (ctx.requireResponseSignature) {
        throw new SignatureError(
          ErrorCodes.SIGNATURE_MISSING,
          'Response carries no x-aob-signature header'
        );
      }
      ctx.logger.warn({ status: response.status }, 'No response signature; verification skipped');
      return { status: 'skipped', reason: 'no-signature-header' };
    }

    // The bank signs {"bizContent": <value>} with null standing in for an absent field
    const signed = raw.get(BIZ_CONTENT_FIELD) ?? null;
    const payload = encode(new Map<string, FieldValue>([[BIZ_CONTENT_FIELD, signed]]));
    const valid = await guard(
      () => ctx.provider.verify(payload, signature),
      (err) =>
        new SignatureError(
          ErrorCodes.SIGNATURE_INVALID,
          `Response verification failed: ${describeError(err)}`,
          { cause: err }
        )
    );
    if (!valid) {
      throw new SignatureError(ErrorCodes.SIGNATURE_INVALID, 'Response signature verification failed');
    }
    return { status: 'verified' };
  }

  private async decryptBody(encrypted: string): Promise<FieldMap> {
    const plaintext = await guard(
      () => this.ctx.provider.decrypt(encrypted),
      (err) => new DecryptError(`Failed to decrypt bizContent: ${describeError(err)}`, { cause: err })
    );
    try {
      return decode(plaintext);
    } catch (err) {
      throw new DecryptError(`Failed to parse decrypted bizContent: ${describeError(err)}`, {
        cause: err,
      });
    }
  }
}

function describeValue(value: FieldValue): string {
  if (Array.isArray(value)) {
    return 'array';
  }
  return value instanceof Map ? 'object' : typeof value;
}
