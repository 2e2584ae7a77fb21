/**
 * Documented gateway endpoints
 *
 * Thin body producers: validate the named fields, merge them over any extra
 * common fields, and hand the body to BankGatewayClient.post. Paths are part
 * of the wire contract.
 */

import { z } from 'zod';
import { toFieldMap, type FieldMap, type FieldRecord } from '@bankgw/crypto';
import type { BankGatewayClient } from './client.js';
import { ValidationError } from './errors.js';
import type { EndpointOptions, GatewayResult } from './types.js';

export const EndpointPaths = {
  QUERY_ACCOUNT_BALANCE: 'V1/P01502/S01/queryeaccountbalance',
  SINGLE_TRANSFER: 'V1/P01506/S01/singletrans',
  QUERY_SINGLE_TRANSFER_RESULT: 'V1/P01507/S01/selsingletrans',
  BATCH_TRANSFER: 'V1/P01508/S01/batchtrans',
  QUERY_BATCH_TRANSFER_RESULT: 'V1/P01509/S01/selbatchtrans',
  QUERY_HOUR_DETAILS: 'V1/P01512/S01/queryhourdetails',
  DOWNLOAD_DETAILS_RECEIPT: 'V1/P01513/S01/detailsreceipt',
  CHECK_ACCOUNT: 'V1/P01518/S01/checkAcct',
  UPDATE_CHECK_RESULT: 'V1/P01519/S01/checkResultUpdate',
  QUERY_SUB_ACCOUNT_BALANCE: 'V1/P01520/S01/queryeSubacctBalance',
  QUERY_HOUR_DETAILS_2: 'V1/P01522/S01/queryhourdetails2',
  QUERY_RECEIPT_DETAILS: 'V1/P01523/S01/queryreceiptdetails',
  QUERY_BANK_INFOS: 'V1/P01524/S01/querybankinfos',
  QUERY_CERT_EXPIRY: 'V1/P01525/S01/queryCertExpiry',
} as const;

/** Currency code default for single transfers (CNY) */
export const DEFAULT_CUR_CODE = '1';
/** Cash/transfer flag default for single transfers */
export const DEFAULT_CUR_TYPE = '0';

function required(name: string) {
  return z
    .string({ required_error: `${name} is required`, invalid_type_error: `${name} must be a string` })
    .trim()
    .min(1, `${name} is required`);
}

function optional(name: string) {
  return z.string({ invalid_type_error: `${name} must be a string` }).optional();
}

function withDefault(name: string, fallback: string) {
  return optional(name).transform((value) => (value ? value : fallback));
}

export const AccountParamsSchema = z.object({
  payAcctNo: required('payAcctNo'),
});

export const DateRangeParamsSchema = z.object({
  payAcctNo: required('payAcctNo'),
  startDate: required('startDate'),
  endDate: required('endDate'),
});

export const SingleTransferParamsSchema = z.object({
  payAcctNo: required('payAcctNo'),
  transAmt: required('transAmt'),
  payAcctName: required('payAcctName'),
  rcvAcctNo: required('rcvAcctNo'),
  rcvAcctName: required('rcvAcctName'),
  inbankno: required('inbankno'),
  inbankname: optional('inbankname'),
  curCode: withDefault('curCode', DEFAULT_CUR_CODE),
  curType: withDefault('curType', DEFAULT_CUR_TYPE),
  orderNo: required('orderNo'),
  remark: optional('remark'),
  reserve1: optional('reserve1'),
  reserve2: required('reserve2'),
});

export const BatchTransferResultParamsSchema = z.object({
  payAcctNo: required('payAcctNo'),
  batchNo: required('batchNo'),
});

export const DetailsReceiptParamsSchema = z.object({
  acctNo: required('acctNo'),
  transDate: required('transDate'),
  transSeqno: required('transSeqno'),
  transOperNo: optional('transOperNo'),
  transBrno: optional('transBrno'),
});

/**
 * `type` 0 looks a bank up by name, 1 by bank number. Only the field the
 * lookup type needs is sent.
 */
export const BankInfoParamsSchema = z
  .object({
    type: required('type'),
    bankName: optional('bankName'),
    bankNo: optional('bankNo'),
  })
  .superRefine((params, ctx) => {
    if (params.type === '0' && !params.bankName) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['bankName'], message: 'type=0 requires bankName' });
    }
    if (params.type === '1' && !params.bankNo) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['bankNo'], message: 'type=1 requires bankNo' });
    }
  })
  .transform((params) => ({
    type: params.type,
    bankName: params.type === '0' ? params.bankName : undefined,
    bankNo: params.type === '1' ? params.bankNo : undefined,
  }));

export type AccountParams = z.input<typeof AccountParamsSchema>;
export type DateRangeParams = z.input<typeof DateRangeParamsSchema>;
export type SingleTransferParams = z.input<typeof SingleTransferParamsSchema>;
export type BatchTransferResultParams = z.input<typeof BatchTransferResultParamsSchema>;
export type DetailsReceiptParams = z.input<typeof DetailsReceiptParamsSchema>;
export type BankInfoParams = z.input<typeof BankInfoParamsSchema>;

type NamedFields = Record<string, string | undefined>;

/**
 * Validate endpoint parameters.
 *
 * @throws ValidationError listing every failed field
 */
export function validateParams<S extends z.ZodType<NamedFields, z.ZodTypeDef, unknown>>(
  endpoint: string,
  schema: S,
  params: unknown
): z.output<S> {
  const result = schema.safeParse(params);
  if (!result.success) {
    throw new ValidationError(
      endpoint,
      result.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }))
    );
  }
  return result.data;
}

/**
 * Common fields first, then the named fields; a named field that is also a
 * common field keeps the common field's position.
 */
export function mergeBody(common: FieldRecord | undefined, named: NamedFields): FieldMap {
  const body = toFieldMap(common ?? {});
  for (const [key, value] of Object.entries(named)) {
    if (value !== undefined) {
      body.set(key, value);
    }
  }
  return body;
}

/**
 * Typed wrappers for the documented endpoints.
 */
export class GatewayApi {
  constructor(private readonly client: BankGatewayClient) {}

  private async validated<S extends z.ZodType<NamedFields, z.ZodTypeDef, unknown>>(
    endpoint: string,
    path: string,
    schema: S,
    params: z.input<S>,
    options: EndpointOptions
  ): Promise<GatewayResult> {
    const named = validateParams(endpoint, schema, params);
    const { common, ...callOptions } = options;
    return this.client.post(path, mergeBody(common, named), callOptions);
  }

  private async freeForm(path: string, params: FieldRecord, options: EndpointOptions): Promise<GatewayResult> {
    const { common, ...callOptions } = options;
    return this.client.post(path, toFieldMap({ ...common, ...params }), callOptions);
  }

  /** Account balance (returns payAcctBal, payAcctUseBal, curCode, ...) */
  queryAccountBalance(params: AccountParams, options: EndpointOptions = {}): Promise<GatewayResult> {
    return this.validated(
      'queryAccountBalance',
      EndpointPaths.QUERY_ACCOUNT_BALANCE,
      AccountParamsSchema,
      params,
      options
    );
  }

  /**
   * Single transfer. curCode defaults to `1` and curType to `0` when absent
   * or empty. Returns orderNo, bankSeqNo, workdate.
   */
  singleTransfer(params: SingleTransferParams, options: EndpointOptions = {}): Promise<GatewayResult> {
    return this.validated(
      'singleTransfer',
      EndpointPaths.SINGLE_TRANSFER,
      SingleTransferParamsSchema,
      params,
      options
    );
  }

  querySingleTransferResult(params: FieldRecord = {}, options: EndpointOptions = {}): Promise<GatewayResult> {
    return this.freeForm(EndpointPaths.QUERY_SINGLE_TRANSFER_RESULT, params, options);
  }

  batchTransfer(params: FieldRecord = {}, options: EndpointOptions = {}): Promise<GatewayResult> {
    return this.freeForm(EndpointPaths.BATCH_TRANSFER, params, options);
  }

  queryBatchTransferResult(
    params: BatchTransferResultParams,
    options: EndpointOptions = {}
  ): Promise<GatewayResult> {
    return this.validated(
      'queryBatchTransferResult',
      EndpointPaths.QUERY_BATCH_TRANSFER_RESULT,
      BatchTransferResultParamsSchema,
      params,
      options
    );
  }

  queryHourDetails(params: DateRangeParams, options: EndpointOptions = {}): Promise<GatewayResult> {
    return this.validated(
      'queryHourDetails',
      EndpointPaths.QUERY_HOUR_DETAILS,
      DateRangeParamsSchema,
      params,
      options
    );
  }

  downloadDetailsReceipt(params: DetailsReceiptParams, options: EndpointOptions = {}): Promise<GatewayResult> {
    return this.validated(
      'downloadDetailsReceipt',
      EndpointPaths.DOWNLOAD_DETAILS_RECEIPT,
      DetailsReceiptParamsSchema,
      params,
      options
    );
  }

  /** Reconciliation statement for a date range */
  checkAccount(params: DateRangeParams, options: EndpointOptions = {}): Promise<GatewayResult> {
    return this.validated('checkAccount', EndpointPaths.CHECK_ACCOUNT, DateRangeParamsSchema, params, options);
  }

  updateCheckResult(params: FieldRecord = {}, options: EndpointOptions = {}): Promise<GatewayResult> {
    return this.freeForm(EndpointPaths.UPDATE_CHECK_RESULT, params, options);
  }

  querySubAccountBalance(params: AccountParams, options: EndpointOptions = {}): Promise<GatewayResult> {
    return this.validated(
      'querySubAccountBalance',
      EndpointPaths.QUERY_SUB_ACCOUNT_BALANCE,
      AccountParamsSchema,
      params,
      options
    );
  }

  queryHourDetails2(params: DateRangeParams, options: EndpointOptions = {}): Promise<GatewayResult> {
    return this.validated(
      'queryHourDetails2',
      EndpointPaths.QUERY_HOUR_DETAILS_2,
      DateRangeParamsSchema,
      params,
      options
    );
  }

  queryReceiptDetails(params: FieldRecord = {}, options: EndpointOptions = {}): Promise<GatewayResult> {
    return this.freeForm(EndpointPaths.QUERY_RECEIPT_DETAILS, params, options);
  }

  /** Bank name / bank number lookup */
  queryBankInfos(params: BankInfoParams, options: EndpointOptions = {}): Promise<GatewayResult> {
    return this.validated(
      'queryBankInfos',
      EndpointPaths.QUERY_BANK_INFOS,
      BankInfoParamsSchema,
      params,
      options
    );
  }

  queryCertExpiry(params: AccountParams, options: EndpointOptions = {}): Promise<GatewayResult> {
    return this.validated(
      'queryCertExpiry',
      EndpointPaths.QUERY_CERT_EXPIRY,
      AccountParamsSchema,
      params,
      options
    );
  }
}
