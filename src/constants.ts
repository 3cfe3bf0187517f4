/**
 * chunkframe — constants
 */

import type { FilterOp } from './types';

// ─── Row Groups ───────────────────────────────────────────────────────────────

/**
 * Rows per record batch when an engine writer splits a table into row
 * groups. Each record batch becomes one chunk of every column on read.
 */
export const DEFAULT_ROW_GROUP_SIZE = 65_536;

// ─── Filter Operators ─────────────────────────────────────────────────────────

export const Eq: FilterOp = 'eq';
export const Ne: FilterOp = 'ne';
export const Lt: FilterOp = 'lt';
export const Le: FilterOp = 'le';
export const Gt: FilterOp = 'gt';
export const Ge: FilterOp = 'ge';

export const FILTER_OPS: readonly FilterOp[] = [Eq, Ne, Lt, Le, Gt, Ge];

/** Operators that make sense on unordered values (bool columns). */
export const EQUALITY_OPS: ReadonlySet<FilterOp> = new Set<FilterOp>([Eq, Ne]);
