#!/usr/bin/env node
/**
 * bankgw command line
 * Commands: sign, decrypt, pubkey, call
 *
 * Keys and IDs come from BANKGW_* environment variables.
 */

import { Command } from 'commander';
import pino from 'pino';
import { createLogger } from '@bankgw/client';
import { CallCommand } from './commands/call.js';
import { DecryptCommand } from './commands/decrypt.js';
import { PubkeyCommand } from './commands/pubkey.js';
import { SignCommand } from './commands/sign.js';
import type { CLIOptions, CommandResult } from './types.js';
import { formatOutput, createExitHandler } from './utils.js';

type GlobalOptions = {
  json?: boolean;
  verbose?: boolean;
  timeout?: string;
};

const program = new Command();
const exit = createExitHandler();

program
  .name('bankgw')
  .description('Sign, encrypt and send bank gateway requests')
  .version('0.3.0');

// Global options
program
  .option('-j, --json', 'output in JSON format')
  .option('-v, --verbose', 'log gateway traffic to stderr')
  .option('-t, --timeout <ms>', 'request timeout in milliseconds');

function globalOptions(): CLIOptions {
  const options = program.opts<GlobalOptions>();
  return {
    json: options.json,
    verbose: options.verbose,
    timeout: options.timeout === undefined ? undefined : Number(options.timeout),
  };
}

function print(result: CommandResult, json?: boolean): void {
  console.log(formatOutput(result, json));
  exit(result.success ? 0 : 1);
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

// bankgw sign <body-json> [-H name=value ...]
program
  .command('sign <body-json>')
  .description('Encrypt a body and sign the request headers, offline')
  .option('-H, --header <name=value>', 'extra request header (repeatable)', collect, [])
  .option('-m, --metadata', 'add mesgId, mesgDate and mesgTime to the body')
  .option('--no-metadata', 'never add message metadata')
  .action(async (bodyJson: string, options: { header: string[]; metadata?: boolean }) => {
    const global = globalOptions();
    const result = await new SignCommand().execute(bodyJson, {
      ...global,
      header: options.header,
      metadata: options.metadata,
    });
    print(result, global.json);
  });

// bankgw decrypt <hex>
program
  .command('decrypt <hex>')
  .description('Decrypt a bizContent value')
  .action(async (cipherHex: string) => {
    const global = globalOptions();
    print(await new DecryptCommand().execute(cipherHex, global), global.json);
  });

// bankgw pubkey
program
  .command('pubkey')
  .description('Print the SM2 public key for BANKGW_PRIVATE_KEY')
  .action(async () => {
    const global = globalOptions();
    print(await new PubkeyCommand().execute(global), global.json);
  });

// bankgw call <path> <body-json>
program
  .command('call <path> <body-json>')
  .description('Send a request to the gateway and print the decrypted response')
  .option('-m, --metadata', 'add mesgId, mesgDate and mesgTime to the body')
  .option('--no-metadata', 'never add message metadata')
  .action(async (path: string, bodyJson: string, options: { metadata?: boolean }) => {
    const global = globalOptions();
    const logger = createLogger({
      level: global.verbose ? 'debug' : 'warn',
      destination: pino.destination(2),
    });
    print(
      await new CallCommand({ logger }).execute(path, bodyJson, { ...global, metadata: options.metadata }),
      global.json
    );
  });

// Handle unknown commands
program.on('command:*', () => {
  console.error('Invalid command. See --help for available commands.');
  exit(1);
});

// If no command provided, show help
if (!process.argv.slice(2).length) {
  program.outputHelp();
  exit(0);
}

await program.parseAsync(process.argv);
