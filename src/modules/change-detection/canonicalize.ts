import { createHash } from 'crypto';

/**
 * Input accepted by the canonicalizer: plain JSON-like data.
 * Object members may be undefined; they are dropped.
 */
export type ConfigValue =
  | null
  | boolean
  | number
  | string
  | readonly ConfigValue[]
  | { readonly [key: string]: ConfigValue | undefined };

export type CanonicalValue =
  | null
  | boolean
  | number
  | string
  | CanonicalValue[]
  | { [key: string]: CanonicalValue };

/** Decimal places kept for every number */
export const FLOAT_PRECISION = 1;

/**
 * Members that identify a record inside a list, by priority. A list whose
 * records all carry the same identity member is compared as a set keyed by it.
 */
export const IDENTITY_KEYS = ['circuitId', 'id', 'position', 'day'] as const;

type CanonicalRecord = { [key: string]: CanonicalValue };
type Identity = string | number;

export function roundFloat(value: number): number {
  const factor = 10 ** FLOAT_PRECISION;
  const rounded = Math.round(value * factor) / factor;
  return Object.is(rounded, -0) ? 0 : rounded;
}

const isRecord = (value: CanonicalValue): value is CanonicalRecord =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const isConfigArray = (value: ConfigValue): value is readonly ConfigValue[] => Array.isArray(value);

const identityOf = (record: CanonicalRecord, key: string): Identity | null => {
  const candidate = record[key];
  return typeof candidate === 'string' || typeof candidate === 'number' ? candidate : null;
};

const compareIdentity = (a: Identity, b: Identity): number => {
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  const left = String(a);
  const right = String(b);
  return left < right ? -1 : left > right ? 1 : 0;
};

function orderByIdentity(items: CanonicalValue[]): CanonicalValue[] {
  if (items.length < 2) return items;

  const records = items.filter(isRecord);
  if (records.length !== items.length) return items;

  const key = IDENTITY_KEYS.find((candidate) =>
    records.every((record) => identityOf(record, candidate) !== null),
  );
  if (!key) return items;

  return [...records].sort((a, b) => {
    const byIdentity = compareIdentity(identityOf(a, key) ?? '', identityOf(b, key) ?? '');
    if (byIdentity !== 0) return byIdentity;
    const left = JSON.stringify(a);
    const right = JSON.stringify(b);
    return left < right ? -1 : left > right ? 1 : 0;
  });
}

/**
 * Deterministic normalization applied before hashing:
 *
 * - object keys sorted lexicographically, undefined members dropped
 * - numbers rounded to {@link FLOAT_PRECISION} decimals, -0 becomes 0,
 *   non-finite numbers become null
 * - lists of records sharing an identity member ({@link IDENTITY_KEYS})
 *   sorted by it; every other list keeps its order
 */
export function canonicalize(value: ConfigValue): CanonicalValue {
  if (value === null || typeof value === 'boolean' || typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? roundFloat(value) : null;
  }
  if (isConfigArray(value)) {
    return orderByIdentity(value.map((item) => canonicalize(item)));
  }

  const result: CanonicalRecord = {};
  for (const key of Object.keys(value).sort()) {
    const member = value[key];
    if (member !== undefined) {
      result[key] = canonicalize(member);
    }
  }
  return result;
}

export function canonicalJson(value: CanonicalValue): string {
  return JSON.stringify(value);
}

/**
 * SHA-256 of the canonical JSON. Two values hash equal exactly when their
 * canonical forms are equal.
 */
export function hashCanonical(value: CanonicalValue): string {
  return createHash('sha256').update(canonicalJson(value)).digest('hex');
}

/**
 * Narrow data read back from storage (`JSON.parse` output) to a canonical value.
 */
export function isCanonicalValue(value: unknown): value is CanonicalValue {
  if (value === null || typeof value === 'boolean' || typeof value === 'string') {
    return true;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value);
  }
  if (Array.isArray(value)) {
    return value.every((item: unknown) => isCanonicalValue(item));
  }
  if (typeof value === 'object') {
    return Object.values(value).every((member: unknown) => isCanonicalValue(member));
  }
  return false;
}

export function parseCanonicalJson(json: string): CanonicalValue {
  const parsed: unknown = JSON.parse(json);
  if (!isCanonicalValue(parsed)) {
    throw new Error('Stored value is not canonical JSON data');
  }
  return parsed;
}
