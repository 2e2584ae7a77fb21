/**
 * CLI utilities and formatting
 */

import chalk from 'chalk';
import { describeError, isGatewayError } from '@bankgw/crypto';
import type { CallResult, CommandData, CommandResult, SignResult } from './types.js';

/** JSON.stringify has no bigint support; large integers print as strings */
function toJson(value: unknown): string {
  return JSON.stringify(
    value,
    (_key, item: unknown) => (typeof item === 'bigint' ? item.toString() : item),
    2
  );
}

export function formatOutput(result: CommandResult, json = false): string {
  if (json) {
    return toJson(result);
  }

  if (!result.success || !result.data) {
    const code = result.code ? ` [${result.code}]` : '';
    return chalk.red(`Error${code}: ${result.error ?? 'Unknown error'}`);
  }

  const { data } = result;
  switch (data.kind) {
    case 'sign':
      return formatSignResult(data);
    case 'decrypt':
      return toJson(data.body);
    case 'pubkey':
      return chalk.green(data.publicKey);
    case 'call':
      return formatCallResult(data);
  }
}

function formatSignResult(data: SignResult): string {
  const lines = ['Headers:'];
  for (const [name, value] of Object.entries(data.headers)) {
    lines.push(`  ${name}: ${value}`);
  }
  lines.push('', `Plaintext: ${data.plaintext}`, `Body: ${chalk.green(data.envelope)}`);
  return lines.join('\n');
}

function formatCallResult(data: CallResult): string {
  const verification =
    data.verification.status === 'verified'
      ? chalk.green('verified')
      : chalk.yellow(`skipped (${data.verification.reason})`);
  return [
    `HTTP ${data.status}`,
    `Signature: ${verification}`,
    `Decrypted: ${data.decrypted ? 'yes' : 'no'}`,
    '',
    toJson(data.data),
  ].join('\n');
}

/**
 * Parse repeated `name=value` header options.
 */
export function parseHeaderPairs(pairs: readonly string[]): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const pair of pairs) {
    const separator = pair.indexOf('=');
    const name = separator > 0 ? pair.slice(0, separator).trim() : '';
    if (!name) {
      throw new Error(`Invalid header "${pair}": expected name=value`);
    }
    headers[name] = pair.slice(separator + 1);
  }
  return headers;
}

export function createExitHandler() {
  return (code: number) => {
    process.exit(code);
  };
}

export function handleError<T extends CommandData = CommandData>(error: unknown): CommandResult<T> {
  return {
    success: false,
    error: describeError(error),
    ...(isGatewayError(error) ? { code: error.code } : {}),
  };
}

export function timing() {
  const started = Date.now();
  return {
    started,
    end: () => {
      const completed = Date.now();
      return {
        started,
        completed,
        duration: completed - started,
      };
    },
  };
}
