/**
 * chunkframe — Arrow type mapping
 *
 * Maps Arrow logical types onto the package's ColumnType tags, and Arrow
 * value buffers onto the typed arrays each numeric tag exposes.
 *
 *   Arrow                    ColumnType   value buffer
 *   ───────────────────────  ──────────   ──────────────
 *   Int(32, signed)          i32          Int32Array
 *   Int(64, signed)          i64          BigInt64Array
 *   Int(64, unsigned)        u64          BigUint64Array
 *   Float(SINGLE)            f32          Float32Array
 *   Float(DOUBLE)            f64          Float64Array
 *   Utf8, Dictionary<Utf8>   utf8         (offsets + bytes, read by value)
 *   Bool                     bool         (LSB-first bitmap)
 *
 * Anything else reports as 'unsupported': listed by columns() and carried
 * through filters and rechunks, never read.
 */

import { DataType, Precision, type Schema } from 'apache-arrow';
import type { ColumnInfo, ColumnTypeName, NumericArrays, NumericColumnType } from './types';

// ─── Type Tags ────────────────────────────────────────────────────────────────

export function columnTypeOf(type: DataType): ColumnTypeName {
  if (DataType.isInt(type)) {
    if (type.bitWidth === 32 && type.isSigned) return 'i32';
    if (type.bitWidth === 64) return type.isSigned ? 'i64' : 'u64';
    return 'unsupported';
  }
  if (DataType.isFloat(type)) {
    if (type.precision === Precision.SINGLE) return 'f32';
    if (type.precision === Precision.DOUBLE) return 'f64';
    return 'unsupported';
  }
  if (DataType.isUtf8(type)) return 'utf8';
  if (DataType.isBool(type)) return 'bool';
  if (DataType.isDictionary(type)) {
    return DataType.isUtf8(type.dictionary) ? 'utf8' : 'unsupported';
  }
  return 'unsupported';
}

export function describeSchema(schema: Schema): ColumnInfo[] {
  return schema.fields.map((field) => ({ name: field.name, type: columnTypeOf(field.type) }));
}

// ─── Value Buffer Views ───────────────────────────────────────────────────────

type ValueView<T extends NumericColumnType> = (values: unknown, length: number) => NumericArrays[T] | null;

/**
 * View the first `length` elements of an Arrow value buffer as the typed
 * array of tag T. Returns null when the buffer is not that array type.
 *
 * Arrow slices value buffers to the chunk's own offset on construction, so
 * element 0 of `values` is row 0 of the chunk.
 */
export const NUMERIC_VIEWS: { readonly [T in NumericColumnType]: ValueView<T> } = {
  i32: (values, length) => (values instanceof Int32Array     ? values.subarray(0, length) : null),
  i64: (values, length) => (values instanceof BigInt64Array  ? values.subarray(0, length) : null),
  u64: (values, length) => (values instanceof BigUint64Array ? values.subarray(0, length) : null),
  f32: (values, length) => (values instanceof Float32Array   ? values.subarray(0, length) : null),
  f64: (values, length) => (values instanceof Float64Array   ? values.subarray(0, length) : null),
};
