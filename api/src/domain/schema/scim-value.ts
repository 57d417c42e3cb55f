/**
 * SCIM value model.
 *
 * Every payload the engine validates is converted once into this closed
 * tagged union; validators switch on `kind` instead of probing `typeof`.
 * Numbers keep their lexical token so `1` and `1.0` remain distinguishable
 * for integer vs decimal attributes.
 */

import { isLosslessNumber, parse as parseLossless } from 'lossless-json';

import { duplicateAttribute, invalidSyntax } from '../errors/scim-validation-error';

// ─── Types ───────────────────────────────────────────────────────────────────

export type ScimValue =
  | { readonly kind: 'null' }
  | { readonly kind: 'boolean'; readonly value: boolean }
  | { readonly kind: 'number'; readonly token: string }
  | { readonly kind: 'string'; readonly value: string }
  | { readonly kind: 'list'; readonly items: readonly ScimValue[] }
  | { readonly kind: 'map'; readonly entries: ReadonlyMap<string, ScimValue> };

export type ScimMapValue = Extract<ScimValue, { kind: 'map' }>;

/** Plain JSON data produced by validation; integers past 2^53 stay exact as bigint */
export type CanonicalValue =
  | null
  | boolean
  | number
  | bigint
  | string
  | CanonicalValue[]
  | { [key: string]: CanonicalValue };

/** A validated resource (or sub-resource): canonical attribute name → value */
export type ScimAttributeMap = Record<string, CanonicalValue>;

const NULL_VALUE: ScimValue = Object.freeze({ kind: 'null' });

export const INT64_MIN = -(2n ** 63n);
export const INT64_MAX = 2n ** 63n - 1n;

const INTEGER_TOKEN = /^-?\d+$/;
// lossless-json rejects a key repeated with a different value
const DUPLICATE_KEY_MESSAGE = /^Duplicate key '(.*)' encountered at position \d+$/;
const SAFE_MIN = BigInt(Number.MIN_SAFE_INTEGER);
const SAFE_MAX = BigInt(Number.MAX_SAFE_INTEGER);

export function isIntegerToken(token: string): boolean {
  return INTEGER_TOKEN.test(token);
}

/** A JS number when it round-trips exactly, the bigint otherwise */
export function toCanonicalInteger(exact: bigint): number | bigint {
  return exact >= SAFE_MIN && exact <= SAFE_MAX ? Number(exact) : exact;
}

// ─── Constructors ────────────────────────────────────────────────────────────

export const scimNull = (): ScimValue => NULL_VALUE;
export const scimBoolean = (value: boolean): ScimValue => ({ kind: 'boolean', value });
export const scimNumber = (token: string): ScimValue => ({ kind: 'number', token });
export const scimString = (value: string): ScimValue => ({ kind: 'string', value });
export const scimList = (items: ScimValue[]): ScimValue => ({ kind: 'list', items });

export function scimMap(entries: Iterable<[string, ScimValue]>): ScimMapValue {
  return { kind: 'map', entries: new Map(entries) };
}

// ─── Decoding ────────────────────────────────────────────────────────────────

/**
 * Decode a raw JSON body, keeping every number as its source token.
 * Throws an invalidSyntax ScimValidationError when the text is not JSON, and
 * a duplicate attribute error when a key repeats with a different value.
 */
export function decodeScimJson(raw: string | Buffer): ScimValue {
  const text = Buffer.isBuffer(raw) ? raw.toString('utf8') : raw;
  let parsed: unknown;
  try {
    parsed = parseLossless(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    const duplicate = DUPLICATE_KEY_MESSAGE.exec(reason);
    if (duplicate) {
      throw duplicateAttribute(duplicate[1]);
    }
    throw invalidSyntax(`Failed to parse request body: ${reason}`);
  }
  return toScimValue(parsed);
}

/**
 * Convert already-parsed data (e.g. a body decoded by the HTTP layer) into a
 * ScimValue. Object properties holding `undefined` are treated as not supplied.
 */
export function toScimValue(input: unknown): ScimValue {
  if (input === null || input === undefined) {
    return NULL_VALUE;
  }
  if (isLosslessNumber(input)) {
    return scimNumber(input.value);
  }

  switch (typeof input) {
    case 'boolean':
      return scimBoolean(input);
    case 'string':
      return scimString(input);
    case 'bigint':
      return scimNumber(input.toString());
    case 'number':
      if (!Number.isFinite(input)) {
        throw invalidSyntax(`Numeric value ${String(input)} is not representable in JSON.`);
      }
      return scimNumber(String(input));
    case 'object':
      break;
    default:
      throw invalidSyntax(`Values of type ${typeof input} are not representable in JSON.`);
  }

  if (Array.isArray(input)) {
    return scimList(input.map((item: unknown) => toScimValue(item)));
  }

  const entries: Array<[string, ScimValue]> = [];
  for (const [key, value] of Object.entries(input)) {
    if (value !== undefined) {
      entries.push([key, toScimValue(value)]);
    }
  }
  return scimMap(entries);
}

// ─── Encoding ────────────────────────────────────────────────────────────────

/** Convert a ScimValue back to plain JSON data; integer tokens past 2^53 become bigint */
export function toCanonical(value: ScimValue): CanonicalValue {
  switch (value.kind) {
    case 'null':
      return null;
    case 'boolean':
    case 'string':
      return value.value;
    case 'number':
      return isIntegerToken(value.token) ? toCanonicalInteger(BigInt(value.token)) : Number(value.token);
    case 'list':
      return value.items.map(toCanonical);
    case 'map': {
      const result: { [key: string]: CanonicalValue } = {};
      for (const [key, item] of value.entries) {
        result[key] = toCanonical(item);
      }
      return result;
    }
  }
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

/** Absent means "not supplied": either missing or an explicit JSON null */
export function isAbsent(value: ScimValue | undefined): value is undefined | { kind: 'null' } {
  return value === undefined || value.kind === 'null';
}

/**
 * Group map entries by lower-cased key (RFC 7643 §2.1: attribute names are
 * case insensitive). Each bucket keeps every original key that folded into it.
 */
export function indexEntriesCaseInsensitive(
  map: ScimMapValue,
): Map<string, Array<[string, ScimValue]>> {
  const index = new Map<string, Array<[string, ScimValue]>>();
  for (const entry of map.entries) {
    const folded = entry[0].toLowerCase();
    const bucket = index.get(folded);
    if (bucket) {
      bucket.push(entry);
    } else {
      index.set(folded, [entry]);
    }
  }
  return index;
}

export function isCanonicalRecord(
  value: CanonicalValue | undefined,
): value is { [key: string]: CanonicalValue } {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
