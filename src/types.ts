/**
 * chunkframe — type definitions
 *
 * These types describe the contract between a Table, its columns and the
 * external table engine. The engine's buffers ARE the data; these types are
 * a lens into them.
 */

// ─── Column Types ─────────────────────────────────────────────────────────────

/**
 * Supported column types.
 *
 * i32 / i64 / u64 / f32 / f64:
 *           Fixed-width numerics. Exposed zero-copy: every chunk is a typed
 *           array view straight into the engine's value buffer.
 *
 * utf8:     Variable-length strings (offsets + bytes upstream). Cannot be
 *           viewed as fixed-width elements, so every read allocates.
 *
 * bool:     Bit-packed upstream (LSB-first, 8 values per byte). A `bool[]`
 *           view of that memory does not exist; reads always go through the
 *           engine's materializing accessor.
 */
export type ColumnType = 'i32' | 'i64' | 'u64' | 'f32' | 'f64' | 'utf8' | 'bool';

/** The column types with a zero-copy chunk accessor. */
export type NumericColumnType = 'i32' | 'i64' | 'u64' | 'f32' | 'f64';

/** Reported for stored columns whose type has no accessor. */
export type ColumnTypeName = ColumnType | 'unsupported';

export const COLUMN_TYPES: readonly ColumnType[] = ['i32', 'i64', 'u64', 'f32', 'f64', 'utf8', 'bool'];

export const NUMERIC_COLUMN_TYPES: readonly NumericColumnType[] = ['i32', 'i64', 'u64', 'f32', 'f64'];

export function isNumericColumnType(type: ColumnTypeName): type is NumericColumnType {
  return type === 'i32' || type === 'i64' || type === 'u64' || type === 'f32' || type === 'f64';
}

/** The typed array that backs one chunk of each numeric column type. */
export interface NumericArrays {
  i32: Int32Array;
  i64: BigInt64Array;
  u64: BigUint64Array;
  f32: Float32Array;
  f64: Float64Array;
}

/** JS value of one cell, per column type. */
export interface ColumnValues {
  i32:  number;
  i64:  bigint;
  u64:  bigint;
  f32:  number;
  f64:  number;
  utf8: string;
  bool: boolean;
}

export type ColumnValue<T extends ColumnType> = ColumnValues[T];

// ─── Column Metadata ──────────────────────────────────────────────────────────

export interface ColumnInfo {
  readonly name: string;
  readonly type: ColumnTypeName;
}

// ─── Column Payloads ──────────────────────────────────────────────────────────

/**
 * One column handed to an engine writer.
 *
 * bool columns travel as one byte per element (0 = false) — no bit-packed
 * construction is attempted on the write path either.
 */
export type ColumnPayload =
  | { readonly type: 'i32';  readonly values: Int32Array }
  | { readonly type: 'i64';  readonly values: BigInt64Array }
  | { readonly type: 'u64';  readonly values: BigUint64Array }
  | { readonly type: 'f32';  readonly values: Float32Array }
  | { readonly type: 'f64';  readonly values: Float64Array }
  | { readonly type: 'utf8'; readonly values: readonly string[] }
  | { readonly type: 'bool'; readonly values: Uint8Array };

// ─── Filters ──────────────────────────────────────────────────────────────────

export type FilterOp = 'eq' | 'ne' | 'lt' | 'le' | 'gt' | 'ge';

/**
 * A filter literal tagged with the engine entry point that evaluates it.
 *
 * The tag is fixed when the predicate is registered, so a list of
 * heterogeneous predicates stays one homogeneous array.
 */
export type FilterValue =
  | { readonly type: 'i32';  readonly value: number }
  | { readonly type: 'i64';  readonly value: bigint }
  | { readonly type: 'u64';  readonly value: bigint }
  | { readonly type: 'f32';  readonly value: number }
  | { readonly type: 'f64';  readonly value: number }
  | { readonly type: 'utf8'; readonly value: string }
  | { readonly type: 'bool'; readonly value: boolean };

export interface FilterPredicate {
  readonly column: string;
  readonly op:     FilterOp;
  readonly value:  FilterValue;
}

/** Plain JS literals accepted by name-level filters. */
export type FilterLiteral = number | bigint | string | boolean;
