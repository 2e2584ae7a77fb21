/**
 * HTTP transport
 *
 * The orchestrator hands a fully built envelope to a Transport and gets the
 * raw response back. UndiciTransport is the default; tests and alternative
 * stacks provide their own.
 */

import { request, type Dispatcher } from 'undici';
import { describeError } from '@bankgw/crypto';
import { TransportError } from './errors.js';

export interface WireRequest {
  url: string;
  headers: Record<string, string>;
  /** JSON envelope text */
  body: string;
  signal?: AbortSignal;
  /** Per-request override of the transport timeout */
  timeoutMs?: number;
}

export interface WireResponse {
  status: number;
  /** Header names lower-cased */
  headers: Record<string, string>;
  body: string;
}

export interface Transport {
  send(request: WireRequest): Promise<WireResponse>;
}

export interface UndiciTransportOptions {
  /** Agent, Pool or MockAgent; the global dispatcher when omitted */
  dispatcher?: Dispatcher;
  /** Headers and body timeout */
  timeoutMs?: number;
}

/**
 * Lower-case header names; repeated headers are joined with `, `.
 */
export function normalizeHeaders(
  headers: Record<string, string | string[] | undefined>
): Record<string, string> {
  const normalized: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined) {
      continue;
    }
    normalized[name.toLowerCase()] = Array.isArray(value) ? value.join(', ') : value;
  }
  return normalized;
}

export class UndiciTransport implements Transport {
  private readonly dispatcher: Dispatcher | undefined;
  private readonly timeoutMs: number | undefined;

  constructor(options: UndiciTransportOptions = {}) {
    this.dispatcher = options.dispatcher;
    this.timeoutMs = options.timeoutMs;
  }

  async send(wire: WireRequest): Promise<WireResponse> {
    const timeout = wire.timeoutMs ?? this.timeoutMs;
    try {
      const response = await request(wire.url, {
        method: 'POST',
        headers: wire.headers,
        body: wire.body,
        signal: wire.signal,
        headersTimeout: timeout,
        bodyTimeout: timeout,
        dispatcher: this.dispatcher,
      });
      const body = await response.body.text();
      return {
        status: response.statusCode,
        headers: normalizeHeaders(response.headers),
        body,
      };
    } catch (err) {
      throw new TransportError(`POST ${wire.url} failed: ${describeError(err)}`, { cause: err });
    }
  }
}
