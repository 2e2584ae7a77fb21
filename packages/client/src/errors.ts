/**
 * Client-level errors
 *
 * Transport and validation failures. Crypto-side failures are raised by
 * @bankgw/crypto and share the same GatewayError base.
 */

import { ErrorCodes, GatewayError, type GatewayErrorOptions } from '@bankgw/crypto';

export type HTTPErrorCode = typeof ErrorCodes.HTTP_STATUS | typeof ErrorCodes.RESPONSE_INVALID;

/**
 * The gateway answered, but not with something we can process.
 *
 * `E_HTTP_STATUS`: non-2xx status, `body` is the raw response text.
 * `E_RESPONSE_INVALID`: 2xx status with a body that is not a JSON object.
 */
export class HTTPError extends GatewayError {
  readonly status: number;
  readonly body: string;

  constructor(
    code: HTTPErrorCode,
    status: number,
    body: string,
    message: string,
    options?: GatewayErrorOptions
  ) {
    super('transport', code, message, options);
    this.name = 'HTTPError';
    this.status = status;
    this.body = body;
  }

  static status(status: number, body: string): HTTPError {
    return new HTTPError(ErrorCodes.HTTP_STATUS, status, body, `HTTP ${status}: ${body}`);
  }

  static invalidBody(status: number, body: string, reason: string, cause?: unknown): HTTPError {
    return new HTTPError(
      ErrorCodes.RESPONSE_INVALID,
      status,
      body,
      `Invalid JSON response (HTTP ${status}): ${reason}`,
      { cause }
    );
  }
}

/**
 * The request never produced a response (network error, timeout, abort).
 */
export class TransportError extends GatewayError {
  constructor(message: string, options?: GatewayErrorOptions) {
    super('transport', ErrorCodes.TRANSPORT_FAILED, message, options);
    this.name = 'TransportError';
  }
}

export interface ValidationIssue {
  /** Dotted field path, empty for the whole parameter object */
  path: string;
  message: string;
}

/**
 * Endpoint parameters failed validation. Raised before any crypto runs.
 */
export class ValidationError extends GatewayError {
  readonly issues: readonly ValidationIssue[];

  constructor(endpoint: string, issues: readonly ValidationIssue[]) {
    super(
      'validate',
      ErrorCodes.VALIDATION_FAILED,
      `Invalid parameters for ${endpoint}: ${issues.map((issue) => issue.message).join('; ')}`
    );
    this.name = 'ValidationError';
    this.issues = issues;
  }
}
