/**
 * CLI command tests
 *
 * Commands run in process with environment and collaborators injected.
 */

import { describe, it, expect } from 'vitest';
import { fixedNonce } from '@bankgw/crypto/testkit';
import { createLogger, createMetadataSource, type Transport, type WireRequest, type WireResponse } from '@bankgw/client';
import { CallCommand } from '../src/commands/call.js';
import { DecryptCommand } from '../src/commands/decrypt.js';
import { PubkeyCommand } from '../src/commands/pubkey.js';
import { SignCommand } from '../src/commands/sign.js';

const CLIENT_PUBLIC_KEY =
  '04344081B80805540A38D71D721BD072D8957EAE15AEB852E72086AB4C5962B89B5BB8628B9D9C4EDD30F341A5A25886C063CFF46DC04C7E68F2EFB3B58830E0F3';
const BANK_PUBLIC_KEY =
  '04C91B21097408027836D680DC58B5AA3CFE0D36D7B745FD0EAC14A5BDB6C0783F4133E905E1E3A12BFD260197F556D9626C75A585FD8483BE5716F5DD1DFB1E9D';
const NONCE = '1F2E3D4C5B6A79880F1E2D3C4B5A69788796A5B4C3D2E1F00112233445566778';
const BODY_JSON = '{"payAcctNo":"733000120190056868"}';
const BODY_CIPHERTEXT =
  '53CE7CEC99DCD1449D14D43154C16AF9E40CC9CEAC9118A10A5BBD4B194C3264D6FDFE32477416A0F58F9C6EE23BE57A';
const BODY_SIGNATURE =
  '304402201C7EA0DA68494A64F27A1ED029F5F1FBF4C3EA6F7F1CE17CD05E0D78F192F89C02207A2C036955206069099DF80A42B5A3191F545E7DC122E42FB52CE93A83753269';
const METADATA_BODY_SIGNATURE =
  '3046022100C8E5E3362CF8CA0B0F3B6300134846218C3A59146945524FB797561207E90F6F022100970F48F0D9F7372DCF9F6A4F42586FB457E01115D59B43C32A00318B25F60305';
const RESPONSE_CIPHERTEXT =
  '8E946AE9344AA83815D66F5BF15949A31BD4EBD24AE07C604EAAB36D5132F95B0BBBCEC2986423C6A9073BBD79FBB42F5F262B87EC5B7F206F4176CB849223306AEF83658F7568FA8134E286EEA0DC09';
const RESPONSE_SIGNATURE =
  '3045022100CEC01D4390C95686EF2CFB8B0A7F864B989790E83EF10B954295A71D7B1B70F1022018D40A5A7073675B6ED2DA845828429AE028AC933020E7AEA1F7E711FEA2F656';

const KEY_ENV = {
  BANKGW_PRIVATE_KEY: '0123456789ABCDEF0123456789ABCDEF0123456789ABCDEF0123456789ABCDEF',
  BANKGW_SM4_KEY: '0123456789ABCDEFFEDCBA9876543210',
  BANKGW_SM4_IV: '000102030405060708090A0B0C0D0E0F',
};
const ENV = { ...KEY_ENV, BANKGW_APP_ID: 'test-app' };
const METADATA_PLAINTEXT =
  '{"payAcctNo":"733000120190056868","mesgId":"0f0e0d0c0b0a09080706050403020100","mesgDate":"20260102","mesgTime":"030405006"}';

const metadata = createMetadataSource({
  clock: () => new Date('2026-01-01T19:04:05.006Z'),
  idSource: () => '0f0e0d0c0b0a09080706050403020100',
});

describe('SignCommand', () => {
  it('prints headers, body and signature', async () => {
    const result = await new SignCommand({ env: ENV, nonce: fixedNonce(NONCE) }).execute(BODY_JSON);

    expect(result.success).toBe(true);
    expect(result.data).toEqual({
      kind: 'sign',
      headers: {
        'Content-Type': 'application/json',
        Accept: 'application/json',
        'x-aob-appID': 'test-app',
        'x-aob-bankID': 'WZB',
        'x-aob-signature': BODY_SIGNATURE,
      },
      plaintext: BODY_JSON,
      bizContent: BODY_CIPHERTEXT,
      envelope: `{"bizContent":"${BODY_CIPHERTEXT}"}`,
    });
    expect(result.timing?.duration).toBeGreaterThanOrEqual(0);
  });

  it('adds message metadata when asked', async () => {
    const result = await new SignCommand({ env: ENV, nonce: fixedNonce(NONCE), metadata }).execute(BODY_JSON, {
      metadata: true,
    });

    expect(result.data?.plaintext).toBe(METADATA_PLAINTEXT);
    expect(result.data?.headers['x-aob-signature']).toBe(METADATA_BODY_SIGNATURE);
  });

  it('follows the environment unless the option overrides it', async () => {
    const env = { ...ENV, BANKGW_INJECT_MESSAGE_METADATA: 'true' };
    const fromEnv = await new SignCommand({ env, metadata }).execute(BODY_JSON);
    expect(fromEnv.data?.plaintext).toBe(METADATA_PLAINTEXT);

    const overridden = await new SignCommand({ env, metadata }).execute(BODY_JSON, { metadata: false });
    expect(overridden.data?.plaintext).toBe(BODY_JSON);
  });

  it('includes extra headers before the signature', async () => {
    const result = await new SignCommand({ env: ENV }).execute(BODY_JSON, {
      header: ['x-idempotency-key=idem-1'],
    });
    expect(Object.keys(result.data?.headers ?? {})).toEqual([
      'Content-Type',
      'Accept',
      'x-aob-appID',
      'x-aob-bankID',
      'x-idempotency-key',
      'x-aob-signature',
    ]);
  });

  it('reports a malformed header option', async () => {
    const result = await new SignCommand({ env: ENV }).execute(BODY_JSON, { header: ['novalue'] });
    expect(result.success).toBe(false);
    expect(result.error).toBe('Invalid header "novalue": expected name=value');
    expect(result.code).toBeUndefined();
  });

  it('reports missing keys', async () => {
    const result = await new SignCommand({ env: { BANKGW_APP_ID: 'test-app' } }).execute(BODY_JSON);
    expect(result).toMatchObject({
      success: false,
      code: 'E_KEY_MISSING',
      error: 'No key material: set BANKGW_PRIVATE_KEY, BANKGW_SM4_KEY and BANKGW_SM4_IV',
    });
  });

  it('reports a body that is not a JSON object', async () => {
    const result = await new SignCommand({ env: ENV }).execute('[1,2]');
    expect(result).toMatchObject({ success: false, code: 'E_DECODE_FAILED' });
  });
});

describe('DecryptCommand', () => {
  it('decrypts a bizContent value', async () => {
    const result = await new DecryptCommand({ env: KEY_ENV }).execute(RESPONSE_CIPHERTEXT);
    expect(result.data).toEqual({
      kind: 'decrypt',
      body: { retCode: '0000', balance: '1024.50', acctName: '测试账户' },
    });
  });

  it('reports bad ciphertext', async () => {
    const result = await new DecryptCommand({ env: KEY_ENV }).execute('ABCD');
    expect(result).toMatchObject({
      success: false,
      code: 'E_DECRYPT_FAILED',
      error: 'bizContent: ciphertext must be a non-empty multiple of 16 bytes, got 2',
    });
  });
});

describe('PubkeyCommand', () => {
  it('derives the public key', async () => {
    const result = await new PubkeyCommand({ env: KEY_ENV }).execute();
    expect(result.data).toEqual({ kind: 'pubkey', publicKey: CLIENT_PUBLIC_KEY });
  });

  it('rejects a declared public key that does not match', async () => {
    const result = await new PubkeyCommand({
      env: { ...KEY_ENV, BANKGW_PUBLIC_KEY: BANK_PUBLIC_KEY },
    }).execute();
    expect(result).toMatchObject({
      success: false,
      code: 'E_KEY_MISMATCH',
      error: 'Declared SM2 public key does not match the private key',
    });
  });
});

describe('CallCommand', () => {
  class StubTransport implements Transport {
    readonly requests: WireRequest[] = [];

    constructor(private readonly response: WireResponse) {}

    async send(request: WireRequest): Promise<WireResponse> {
      this.requests.push(request);
      return this.response;
    }
  }

  const env = {
    ...ENV,
    BANKGW_BASE_URL: 'https://gateway.test/prdApiGW',
    BANKGW_BANK_PUBLIC_KEY: BANK_PUBLIC_KEY,
  };

  it('sends the call and returns the decrypted response', async () => {
    const transport = new StubTransport({
      status: 200,
      headers: { 'x-aob-signature': RESPONSE_SIGNATURE },
      body: `{"bizContent":"${RESPONSE_CIPHERTEXT}"}`,
    });
    const command = new CallCommand({
      env,
      transport,
      nonce: fixedNonce(NONCE),
      logger: createLogger({ level: 'silent' }),
    });

    const result = await command.execute('V1/P01502/S01/queryeaccountbalance', BODY_JSON, { timeout: 5000 });

    expect(transport.requests[0]?.url).toBe('https://gateway.test/prdApiGW/V1/P01502/S01/queryeaccountbalance');
    expect(transport.requests[0]?.headers['x-aob-signature']).toBe(BODY_SIGNATURE);
    expect(result.data).toEqual({
      kind: 'call',
      status: 200,
      decrypted: true,
      verification: { status: 'verified' },
      trace: ['Building', 'BodyEncrypted', 'Signed', 'Sent', 'ResponseParsed', 'Verified', 'Decrypted', 'Done'],
      data: { retCode: '0000', balance: '1024.50', acctName: '测试账户' },
    });
  });

  it('adds message metadata when asked', async () => {
    const transport = new StubTransport({ status: 200, headers: {}, body: '{"retCode":"0000"}' });
    const command = new CallCommand({
      env,
      transport,
      metadata,
      nonce: fixedNonce(NONCE),
      logger: createLogger({ level: 'silent' }),
    });

    await command.execute('V1/P01502/S01/queryeaccountbalance', BODY_JSON, { metadata: true });
    expect(transport.requests[0]?.headers['x-aob-signature']).toBe(METADATA_BODY_SIGNATURE);
  });

  it('reports gateway failures with their code', async () => {
    const transport = new StubTransport({ status: 500, headers: {}, body: 'gateway error' });
    const command = new CallCommand({ env, transport, logger: createLogger({ level: 'silent' }) });

    const result = await command.execute('V1/P01502/S01/queryeaccountbalance', BODY_JSON);
    expect(result).toMatchObject({
      success: false,
      code: 'E_HTTP_STATUS',
      error: 'HTTP 500: gateway error',
    });
  });
});
