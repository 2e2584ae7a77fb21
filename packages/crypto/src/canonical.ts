/**
 * Canonical JSON for the gateway wire format
 *
 * Unlike RFC 8785 the bank's canonical form does NOT sort keys: it is the
 * compact JSON rendering (no whitespace, non-ASCII left unescaped) of an
 * ordered field map, in insertion order. Both the encrypted body and the
 * signed payload depend on that order, so field maps are modelled as
 * `Map` and decoding builds maps in document order.
 */

import { DecodeError, EncodeError, describeError } from './errors.js';

/** Integers beyond Number's safe range are carried as bigint */
export type FieldValue = string | number | bigint | boolean | null | FieldValue[] | FieldMap;

/** Ordered field map; re-setting a key keeps its original position */
export type FieldMap = Map<string, FieldValue>;

/** Values accepted where a FieldMap is built from plain objects */
export type FieldInput =
  | string
  | number
  | bigint
  | boolean
  | null
  | FieldInput[]
  | FieldMap
  | { [key: string]: FieldInput };

export type FieldRecord = { [key: string]: FieldInput };

export type PlainValue =
  | string
  | number
  | bigint
  | boolean
  | null
  | PlainValue[]
  | { [key: string]: PlainValue };

export type PlainObject = { [key: string]: PlainValue };

function toFieldValue(input: FieldInput, path: string): FieldValue {
  if (
    input === null ||
    typeof input === 'string' ||
    typeof input === 'boolean' ||
    typeof input === 'bigint'
  ) {
    return input;
  }
  if (typeof input === 'number') {
    if (!Number.isFinite(input)) {
      throw new EncodeError(`Cannot encode non-finite number at ${path}`);
    }
    return input;
  }
  if (input instanceof Map) {
    return input;
  }
  if (Array.isArray(input)) {
    return input.map((item, index) => toFieldValue(item, `${path}[${index}]`));
  }
  if (typeof input === 'object') {
    return toFieldMap(input, path);
  }
  throw new EncodeError(`Cannot encode value of type ${typeof input} at ${path}`);
}

/**
 * Build a FieldMap from a plain object (or return a FieldMap unchanged).
 *
 * Plain objects iterate integer-like keys first, so callers that rely on
 * such keys keeping their position must pass a Map.
 */
export function toFieldMap(input: FieldMap | FieldRecord, path = '$'): FieldMap {
  if (input instanceof Map) {
    return input;
  }
  const map: FieldMap = new Map();
  for (const [key, value] of Object.entries(input)) {
    map.set(key, toFieldValue(value, `${path}.${key}`));
  }
  return map;
}

function toPlainValue(value: FieldValue): PlainValue {
  if (value instanceof Map) {
    return toPlainObject(value);
  }
  if (Array.isArray(value)) {
    return value.map(toPlainValue);
  }
  return value;
}

/**
 * Convert a FieldMap to a plain object (nested maps included).
 */
export function toPlainObject(map: FieldMap): PlainObject {
  const obj: PlainObject = {};
  for (const [key, value] of map) {
    // defineProperty so a "__proto__" field stays an own property
    Object.defineProperty(obj, key, {
      value: toPlainValue(value),
      enumerable: true,
      writable: true,
      configurable: true,
    });
  }
  return obj;
}

function renderValue(value: FieldValue, path: string): string {
  if (value === null) {
    return 'null';
  }
  if (typeof value === 'boolean') {
    return value ? 'true' : 'false';
  }
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new EncodeError(`Cannot encode non-finite number at ${path}`);
    }
    return JSON.stringify(value);
  }
  if (typeof value === 'bigint') {
    return value.toString();
  }
  if (typeof value === 'string') {
    // JSON.stringify escapes only quote, backslash and control characters
    return JSON.stringify(value);
  }
  if (Array.isArray(value)) {
    return `[${value.map((item, index) => renderValue(item, `${path}[${index}]`)).join(',')}]`;
  }
  if (value instanceof Map) {
    return renderMap(value, path);
  }
  throw new EncodeError(`Cannot encode value of type ${typeof value} at ${path}`);
}

function renderMap(map: FieldMap, path: string): string {
  const pairs: string[] = [];
  for (const [key, value] of map) {
    pairs.push(`${JSON.stringify(key)}:${renderValue(value, `${path}.${key}`)}`);
  }
  return `{${pairs.join(',')}}`;
}

/**
 * Render a field map as canonical JSON text.
 */
export function canonicalize(map: FieldMap | FieldRecord): string {
  return renderMap(toFieldMap(map), '$');
}

/**
 * Canonicalize and encode as UTF-8 bytes
 */
export function encode(map: FieldMap | FieldRecord): Uint8Array {
  return new TextEncoder().encode(canonicalize(map));
}

const STRING_TOKEN = /"(?:[^"\\\u0000-\u001f]|\\(?:["\\/bfnrt]|u[0-9a-fA-F]{4}))*"/y;
const NUMBER_TOKEN = /-?(?:0|[1-9]\d*)(?:\.\d+)?(?:[eE][+-]?\d+)?/y;
const INTEGER_TOKEN = /^-?\d+$/;

class CanonicalParser {
  private pos = 0;

  constructor(private readonly text: string) {}

  parseDocument(): FieldMap {
    this.skipWhitespace();
    if (this.text[this.pos] !== '{') {
      this.fail('expected a JSON object');
    }
    const map = this.parseObject();
    this.skipWhitespace();
    if (this.pos < this.text.length) {
      this.fail('unexpected trailing data');
    }
    return map;
  }

  private parseValue(): FieldValue {
    this.skipWhitespace();
    const ch = this.text[this.pos];
    switch (ch) {
      case '{':
        return this.parseObject();
      case '[':
        return this.parseArray();
      case '"':
        return this.parseString();
      case 't':
        return this.parseLiteral('true', true);
      case 'f':
        return this.parseLiteral('false', false);
      case 'n':
        return this.parseLiteral('null', null);
      default:
        return this.parseNumber();
    }
  }

  private parseObject(): FieldMap {
    const map: FieldMap = new Map();
    this.pos++; // {
    this.skipWhitespace();
    if (this.text[this.pos] === '}') {
      this.pos++;
      return map;
    }
    for (;;) {
      this.skipWhitespace();
      if (this.text[this.pos] !== '"') {
        this.fail('expected a string key');
      }
      const key = this.parseString();
      this.skipWhitespace();
      this.expect(':');
      map.set(key, this.parseValue());
      this.skipWhitespace();
      if (this.text[this.pos] === ',') {
        this.pos++;
        continue;
      }
      this.expect('}');
      return map;
    }
  }

  private parseArray(): FieldValue[] {
    const items: FieldValue[] = [];
    this.pos++; // [
    this.skipWhitespace();
    if (this.text[this.pos] === ']') {
      this.pos++;
      return items;
    }
    for (;;) {
      items.push(this.parseValue());
      this.skipWhitespace();
      if (this.text[this.pos] === ',') {
        this.pos++;
        continue;
      }
      this.expect(']');
      return items;
    }
  }

  private parseString(): string {
    STRING_TOKEN.lastIndex = this.pos;
    const match = STRING_TOKEN.exec(this.text);
    if (!match) {
      this.fail('invalid string literal');
    }
    this.pos += match[0].length;
    // The token is a validated JSON string literal; JSON.parse resolves escapes
    const value: unknown = JSON.parse(match[0]);
    if (typeof value !== 'string') {
      this.fail('invalid string literal');
    }
    return value;
  }

  private parseNumber(): number | bigint {
    NUMBER_TOKEN.lastIndex = this.pos;
    const match = NUMBER_TOKEN.exec(this.text);
    if (!match) {
      this.fail('unexpected character');
    }
    const token = match[0];
    this.pos += token.length;
    const value = Number(token);
    if (INTEGER_TOKEN.test(token) && !Number.isSafeInteger(value)) {
      return BigInt(token);
    }
    if (!Number.isFinite(value)) {
      this.fail('number out of range');
    }
    return value;
  }

  private parseLiteral<T extends FieldValue>(word: string, value: T): T {
    if (!this.text.startsWith(word, this.pos)) {
      this.fail('unexpected character');
    }
    this.pos += word.length;
    return value;
  }

  private expect(ch: string): void {
    if (this.text[this.pos] !== ch) {
      this.fail(`expected '${ch}'`);
    }
    this.pos++;
  }

  private skipWhitespace(): void {
    while (this.pos < this.text.length) {
      const ch = this.text[this.pos];
      if (ch !== ' ' && ch !== '\t' && ch !== '\n' && ch !== '\r') {
        return;
      }
      this.pos++;
    }
  }

  private fail(reason: string): never {
    throw new DecodeError(`Invalid JSON at position ${this.pos}: ${reason}`);
  }
}

/**
 * Parse canonical JSON object text (or its UTF-8 bytes) into an ordered
 * FieldMap. Duplicate keys keep their first position and last value.
 *
 * @throws DecodeError on malformed UTF-8, invalid JSON or a non-object document
 */
export function decode(input: Uint8Array | string): FieldMap {
  let text: string;
  if (typeof input === 'string') {
    text = input;
  } else {
    try {
      text = new TextDecoder('utf-8', { fatal: true }).decode(input);
    } catch (err) {
      throw new DecodeError(`Invalid UTF-8: ${describeError(err)}`, { cause: err });
    }
  }
  return new CanonicalParser(text).parseDocument();
}
