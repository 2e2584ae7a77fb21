import { describe, it, expect } from 'vitest';
import type { FieldMap, FieldValue } from '@bankgw/crypto';
import { createMetadataSource, injectMessageMetadata } from '../src/metadata.js';
import { fixedMetadata } from './helpers.js';

describe('createMetadataSource', () => {
  it('formats date and time in bank-local time', () => {
    expect(fixedMetadata()()).toEqual({
      mesgId: '0f0e0d0c0b0a09080706050403020100',
      mesgDate: '20260102',
      mesgTime: '030405006',
    });
  });

  it('rolls the date over at local midnight', () => {
    const next = createMetadataSource({ clock: () => new Date('2026-12-31T16:00:00.000Z') });
    const metadata = next();
    expect(metadata.mesgDate).toBe('20270101');
    expect(metadata.mesgTime).toBe('000000000');
  });

  it('honors a custom UTC offset', () => {
    const next = createMetadataSource({
      clock: () => new Date('2026-03-04T05:06:07.089Z'),
      utcOffsetMinutes: 0,
    });
    expect(next().mesgDate).toBe('20260304');
    expect(next().mesgTime).toBe('050607089');
  });

  it('generates 32 lowercase hex message IDs', () => {
    const next = createMetadataSource();
    const first = next().mesgId;
    expect(first).toMatch(/^[0-9a-f]{32}$/);
    expect(next().mesgId).not.toBe(first);
  });
});

describe('injectMessageMetadata', () => {
  const metadata = { mesgId: 'id-1', mesgDate: '20260102', mesgTime: '030405006' };

  it('appends missing fields after the body fields', () => {
    const body: FieldMap = new Map<string, FieldValue>([['payAcctNo', '733000120190056868']]);
    const result = injectMessageMetadata(body, metadata);
    expect([...result.entries()]).toEqual([
      ['payAcctNo', '733000120190056868'],
      ['mesgId', 'id-1'],
      ['mesgDate', '20260102'],
      ['mesgTime', '030405006'],
    ]);
    expect(body.size).toBe(1);
  });

  it('keeps fields the caller already set', () => {
    const body: FieldMap = new Map<string, FieldValue>([
      ['mesgId', 'caller-id'],
      ['payAcctNo', '733000120190056868'],
    ]);
    const result = injectMessageMetadata(body, metadata);
    expect([...result.entries()]).toEqual([
      ['mesgId', 'caller-id'],
      ['payAcctNo', '733000120190056868'],
      ['mesgDate', '20260102'],
      ['mesgTime', '030405006'],
    ]);
  });
});
