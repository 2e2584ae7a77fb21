/**
 * Shared fixtures for client tests
 */

import { createLogger } from '../src/logging.js';
import { createMetadataSource } from '../src/metadata.js';
import type { Transport, WireRequest, WireResponse } from '../src/transport.js';

export const CLIENT_PRIVATE_KEY = '0123456789ABCDEF0123456789ABCDEF0123456789ABCDEF0123456789ABCDEF';
export const CLIENT_PUBLIC_KEY =
  '04344081B80805540A38D71D721BD072D8957EAE15AEB852E72086AB4C5962B89B5BB8628B9D9C4EDD30F341A5A25886C063CFF46DC04C7E68F2EFB3B58830E0F3';
export const BANK_PUBLIC_KEY =
  '04C91B21097408027836D680DC58B5AA3CFE0D36D7B745FD0EAC14A5BDB6C0783F4133E905E1E3A12BFD260197F556D9626C75A585FD8483BE5716F5DD1DFB1E9D';
export const SM4_KEY = '0123456789ABCDEFFEDCBA9876543210';
export const SM4_IV = '000102030405060708090A0B0C0D0E0F';
export const NONCE = '1F2E3D4C5B6A79880F1E2D3C4B5A69788796A5B4C3D2E1F00112233445566778';

export const BASE_URL = 'https://gateway.test/prdApiGW/';
export const BALANCE_PATH = 'V1/P01502/S01/queryeaccountbalance';

/** {"payAcctNo":"733000120190056868"} */
export const PLAIN_BODY_CIPHERTEXT =
  '53CE7CEC99DCD1449D14D43154C16AF9E40CC9CEAC9118A10A5BBD4B194C3264D6FDFE32477416A0F58F9C6EE23BE57A';
export const PLAIN_BODY_SIGNATURE =
  '304402201C7EA0DA68494A64F27A1ED029F5F1FBF4C3EA6F7F1CE17CD05E0D78F192F89C02207A2C036955206069099DF80A42B5A3191F545E7DC122E42FB52CE93A83753269';

/** Same body plus the pinned message metadata */
export const METADATA_BODY_CIPHERTEXT =
  '53CE7CEC99DCD1449D14D43154C16AF9E40CC9CEAC9118A10A5BBD4B194C32649DCED5A26F507026754FA6BB106CB542F4DD66D0E5B4B0A03731096BD8EF511010D018E221B4C7DFE0C75A0E89E9C456C1E0AD63760B27D4166505A1FEC4053BC0B8A64B20ABBD6F57A03EBE9386452A27CF8B4811FA897D3452434B8D5EB031';
export const METADATA_BODY_SIGNATURE =
  '3046022100C8E5E3362CF8CA0B0F3B6300134846218C3A59146945524FB797561207E90F6F022100970F48F0D9F7372DCF9F6A4F42586FB457E01115D59B43C32A00318B25F60305';

/** {"retCode":"0000","balance":"1024.50","acctName":"测试账户"} */
export const RESPONSE_CIPHERTEXT =
  '8E946AE9344AA83815D66F5BF15949A31BD4EBD24AE07C604EAAB36D5132F95B0BBBCEC2986423C6A9073BBD79FBB42F5F262B87EC5B7F206F4176CB849223306AEF83658F7568FA8134E286EEA0DC09';
/** Bank signature over {"bizContent":RESPONSE_CIPHERTEXT} */
export const RESPONSE_SIGNATURE =
  '3045022100CEC01D4390C95686EF2CFB8B0A7F864B989790E83EF10B954295A71D7B1B70F1022018D40A5A7073675B6ED2DA845828429AE028AC933020E7AEA1F7E711FEA2F656';
/** {"retCode":"9999"} */
export const OTHER_CIPHERTEXT = 'FDCEAD96186AC2DE75814AE7894124C9C2583BAB8A9DECEFC6330B080EA795B5';

export const keys = (bankPublicKey?: string) => ({
  privateKey: CLIENT_PRIVATE_KEY,
  sm4Key: SM4_KEY,
  sm4Iv: SM4_IV,
  ...(bankPublicKey === undefined ? {} : { bankPublicKey }),
});

/** 2026-01-02 03:04:05.006 in UTC+8 */
export const fixedMetadata = () =>
  createMetadataSource({
    clock: () => new Date('2026-01-01T19:04:05.006Z'),
    idSource: () => '0f0e0d0c0b0a09080706050403020100',
  });

export const silentLogger = () => createLogger({ level: 'silent' });

/**
 * In-process transport: records requests and answers with queued responses.
 */
export class FakeTransport implements Transport {
  readonly requests: WireRequest[] = [];
  private readonly responses: Array<WireResponse | Error> = [];

  reply(status: number, body: string, headers: Record<string, string> = {}): this {
    this.responses.push({ status, body, headers });
    return this;
  }

  fail(error: Error): this {
    this.responses.push(error);
    return this;
  }

  async send(request: WireRequest): Promise<WireResponse> {
    this.requests.push(request);
    const next = this.responses.shift();
    if (next === undefined) {
      throw new Error('FakeTransport has no queued response');
    }
    if (next instanceof Error) {
      throw next;
    }
    return next;
  }

  get last(): WireRequest {
    const request = this.requests[this.requests.length - 1];
    if (request === undefined) {
      throw new Error('FakeTransport received no request');
    }
    return request;
  }
}
