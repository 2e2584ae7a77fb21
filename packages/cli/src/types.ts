/**
 * Types for the bankgw CLI
 */

import type { PlainObject } from '@bankgw/crypto';
import type { CallState, VerificationOutcome } from '@bankgw/client';

export interface CLIOptions {
  verbose?: boolean;
  json?: boolean;
  /** Request timeout in milliseconds */
  timeout?: number;
}

export interface CommandTiming {
  started: number;
  completed: number;
  duration: number;
}

export interface SignResult {
  kind: 'sign';
  /** Headers in sending order, signature last */
  headers: Record<string, string>;
  /** Canonical business body before encryption */
  plaintext: string;
  bizContent: string;
  /** Request body as sent: {"bizContent":"..."} */
  envelope: string;
}

export interface DecryptResult {
  kind: 'decrypt';
  body: PlainObject;
}

export interface PubkeyResult {
  kind: 'pubkey';
  publicKey: string;
}

export interface CallResult {
  kind: 'call';
  status: number;
  decrypted: boolean;
  verification: VerificationOutcome;
  trace: readonly CallState[];
  data: PlainObject;
}

export type CommandData = SignResult | DecryptResult | PubkeyResult | CallResult;

export interface CommandResult<T extends CommandData = CommandData> {
  success: boolean;
  data?: T;
  error?: string;
  /** GatewayError code, when the failure carries one */
  code?: string;
  timing?: CommandTiming;
}
