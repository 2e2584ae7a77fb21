/**
 * Message metadata (`mesgId`, `mesgDate`, `mesgTime`)
 *
 * The gateway expects every business body to carry a unique message ID and
 * the bank-local send date and time. Clock and ID source are injectable.
 */

import { randomUUID } from 'node:crypto';
import type { FieldMap } from '@bankgw/crypto';

export interface MessageMetadata {
  /** 32 lowercase hex characters */
  mesgId: string;
  /** YYYYMMDD */
  mesgDate: string;
  /** HHmmssSSS */
  mesgTime: string;
}

export type MetadataSource = () => MessageMetadata;

export interface MetadataSourceOptions {
  clock?: () => Date;
  idSource?: () => string;
  /** Offset of the bank's local time from UTC */
  utcOffsetMinutes?: number;
}

/** China Standard Time, UTC+08:00 */
export const BANK_UTC_OFFSET_MINUTES = 480;

export const METADATA_FIELDS = ['mesgId', 'mesgDate', 'mesgTime'] as const;

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

export function createMetadataSource(options: MetadataSourceOptions = {}): MetadataSource {
  const clock = options.clock ?? (() => new Date());
  const idSource = options.idSource ?? (() => randomUUID().replace(/-/g, ''));
  const offsetMs = (options.utcOffsetMinutes ?? BANK_UTC_OFFSET_MINUTES) * 60_000;

  return () => {
    // Shift the instant, then read UTC fields as bank-local fields
    const local = new Date(clock().getTime() + offsetMs);
    return {
      mesgId: idSource(),
      mesgDate: `${local.getUTCFullYear()}${pad(local.getUTCMonth() + 1)}${pad(local.getUTCDate())}`,
      mesgTime: `${pad(local.getUTCHours())}${pad(local.getUTCMinutes())}${pad(local.getUTCSeconds())}${pad(local.getUTCMilliseconds(), 3)}`,
    };
  };
}

/**
 * Copy `body` and append any metadata field it does not already have.
 */
export function injectMessageMetadata(body: FieldMap, metadata: MessageMetadata): FieldMap {
  const result: FieldMap = new Map(body);
  for (const field of METADATA_FIELDS) {
    if (!result.has(field)) {
      result.set(field, metadata[field]);
    }
  }
  return result;
}
