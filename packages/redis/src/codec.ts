import { SponsorConfigError, SponsorValidationError } from '@gas-sponsor/core';

/**
 * JSON (de)serialization of store records. Bigints are written as decimal
 * strings; reads check every field so a corrupted key fails loudly instead of
 * surfacing as NaN or undefined further down.
 */

export const MAX_KEY_PREFIX_LENGTH = 128;

export function resolveKeyPrefix(keyPrefix: string | undefined, fallback: string): string {
  const prefix = keyPrefix ?? fallback;
  if (typeof prefix !== 'string' || prefix.length === 0) {
    throw new SponsorValidationError('keyPrefix must be a non-empty string', 'keyPrefix');
  }
  if (prefix.length > MAX_KEY_PREFIX_LENGTH) {
    throw new SponsorValidationError(
      `keyPrefix must be at most ${MAX_KEY_PREFIX_LENGTH} characters`,
      'keyPrefix',
    );
  }
  return prefix;
}

export type StoredRecord = Record<string, unknown>;

function isRecord(value: unknown): value is StoredRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function stringify(value: unknown): string {
  return JSON.stringify(value, (_key, v: unknown) => (typeof v === 'bigint' ? v.toString() : v));
}

/**
 * @throws SponsorConfigError if the value is not a JSON object
 */
export function parseRecord(value: string, what: string): StoredRecord {
  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch (error) {
    throw new SponsorConfigError(
      `Failed to parse ${what} from Redis: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
  if (!isRecord(parsed)) {
    throw new SponsorConfigError(`Stored ${what} is not an object`);
  }
  return parsed;
}

export function parseBigInt(value: unknown, field: string): bigint {
  if (typeof value !== 'string' || !/^-?[0-9]+$/.test(value)) {
    throw new SponsorConfigError(`Stored field '${field}' is not an integer string`);
  }
  return BigInt(value);
}

export function readBigInt(record: StoredRecord, field: string): bigint {
  return parseBigInt(record[field], field);
}

export function readString(record: StoredRecord, field: string): string {
  const value = record[field];
  if (typeof value !== 'string') {
    throw new SponsorConfigError(`Stored field '${field}' is not a string`);
  }
  return value;
}

export function readBoolean(record: StoredRecord, field: string): boolean {
  const value = record[field];
  if (typeof value !== 'boolean') {
    throw new SponsorConfigError(`Stored field '${field}' is not a boolean`);
  }
  return value;
}

export function readObject(record: StoredRecord, field: string): StoredRecord {
  const value = record[field];
  if (!isRecord(value)) {
    throw new SponsorConfigError(`Stored field '${field}' is not an object`);
  }
  return value;
}

export function readBigIntArray(record: StoredRecord, field: string): bigint[] {
  const value = record[field];
  if (!Array.isArray(value)) {
    throw new SponsorConfigError(`Stored field '${field}' is not an array`);
  }
  return value.map((item: unknown, i) => parseBigInt(item, `${field}[${i}]`));
}
