/**
 * Public call and result types
 */

import type { FieldMap, FieldRecord, PlainObject } from '@bankgw/crypto';
import type { CallState } from './orchestrator.js';

export interface CallOptions {
  /** Extra headers for this call; allow-listed ones are signed */
  headers?: Record<string, string>;
  signal?: AbortSignal;
  /** Overrides the client-level setting for this call */
  verifyResponseSignature?: boolean;
  /** Add mesgId / mesgDate / mesgTime for endpoints whose contract takes them */
  injectMessageMetadata?: boolean;
  timeoutMs?: number;
}

export interface EndpointOptions extends CallOptions {
  /** Extra body fields, merged before the endpoint's named fields */
  common?: FieldRecord;
}

export type VerificationOutcome =
  | { status: 'verified' }
  | { status: 'skipped'; reason: 'disabled' | 'no-signature-header' };

interface ResultBase {
  /** HTTP status of the gateway response */
  status: number;
  /** Response headers, names lower-cased */
  headers: Record<string, string>;
  verification: VerificationOutcome;
  /** States visited by the call, in order */
  trace: readonly CallState[];
  /** `body` as a plain object */
  data: PlainObject;
}

/** Response carried bizContent and it was decrypted */
export interface DecryptedResult extends ResultBase {
  decrypted: true;
  /** Decrypted business body, in wire order */
  body: FieldMap;
}

/** Response carried no bizContent; the parsed envelope is returned as is */
export interface PassThroughResult extends ResultBase {
  decrypted: false;
  body: FieldMap;
}

export type GatewayResult = DecryptedResult | PassThroughResult;
