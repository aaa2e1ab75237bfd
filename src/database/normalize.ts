/**
 * Driver value normalization
 * The one place driver-native values become JSON values
 */

import { JsonValue, Row } from '../types/index.js';

/** pg type OID of int8 / bigint, delivered by the driver as a string */
const INT8_OID = 20;

export interface FieldInfo {
  name: string;
  dataTypeID: number;
}

function hasToPostgres(value: object): value is { toPostgres: () => unknown } {
  return 'toPostgres' in value && typeof value.toPostgres === 'function';
}

/**
 * Coerce a driver value to a JSON value.
 * Dates become ISO strings, binary becomes PostgreSQL hex text (`\x...`),
 * arrays and JSON documents become JSON text.
 */
export function toJsonValue(value: unknown, dataTypeId?: number): JsonValue {
  if (value === null || value === undefined) return null;

  if (typeof value === 'string') {
    if (dataTypeId === INT8_OID && /^-?\d+$/.test(value)) {
      const n = Number(value);
      return Number.isSafeInteger(n) ? n : value;
    }
    return value;
  }
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return Number.isFinite(value) ? value : String(value);
  if (typeof value === 'bigint') {
    const n = Number(value);
    return Number.isSafeInteger(n) ? n : value.toString();
  }
  if (typeof value !== 'object' || value === null) return String(value);

  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? String(value) : value.toISOString();
  }
  if (value instanceof Uint8Array) {
    return `\\x${Buffer.from(value).toString('hex')}`;
  }
  if (hasToPostgres(value)) {
    return String(value.toPostgres());
  }
  return JSON.stringify(value, (_key, v: unknown) => (typeof v === 'bigint' ? v.toString() : v));
}

/**
 * Build a row object from positional values, keys in result column order
 */
export function normalizeRow(fields: readonly FieldInfo[], values: readonly unknown[]): Row {
  // Own properties only: assigning row['__proto__'] would set the prototype instead
  return Object.fromEntries(
    fields.map((field, i): [string, JsonValue] => [field.name, toJsonValue(values[i], field.dataTypeID)])
  );
}
