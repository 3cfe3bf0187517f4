/**
 * chunkframe — error classes
 *
 * Every failure surfaces at the offending call as one of these classes.
 * Nothing is retried: all operations are single-shot reads of immutable
 * data, so a retry reproduces the same error.
 */

/**
 * Thrown when a path does not resolve to a readable table, or when the bytes
 * behind it cannot be decoded as one.
 */
export class TableIOError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TableIOError';
  }
}

/**
 * Thrown when a typed accessor or a filter literal does not match the stored
 * column type. There is no silent coercion between column types.
 */
export class TypeMismatchError extends TypeError {
  readonly column:   string;
  readonly expected: string;
  readonly actual:   string;

  constructor(column: string, expected: string, actual: string, detail?: string) {
    super(
      `Column '${column}' has type '${actual}', expected '${expected}'.` +
      (detail !== undefined ? ` ${detail}` : ''),
    );
    this.name     = 'TypeMismatchError';
    this.column   = column;
    this.expected = expected;
    this.actual   = actual;
  }
}

/** Thrown when a column name is absent from a table or a codec. */
export class ColumnNotFoundError extends Error {
  readonly column:    string;
  readonly available: readonly string[];

  constructor(column: string, available: readonly string[]) {
    super(
      `Column '${column}' not found. ` +
      `Available columns: ${available.length > 0 ? available.join(', ') : '(none)'}.`,
    );
    this.name      = 'ColumnNotFoundError';
    this.column    = column;
    this.available = available;
  }
}

/** Thrown by the bounds-checked ChunkedColumn.at(). get() never throws it. */
export class IndexOutOfRangeError extends RangeError {
  constructor(index: number, size: number) {
    super(`Index ${index} is out of range for a column of size ${size}.`);
    this.name = 'IndexOutOfRangeError';
  }
}

/** Thrown when a codec reverse lookup finds no field registered under a key. */
export class FieldNotRegisteredError extends Error {
  readonly key: string;

  constructor(key: string, registered: readonly string[]) {
    super(
      `Field '${key}' is not registered in this codec. ` +
      `Registered fields: ${registered.length > 0 ? registered.join(', ') : '(none)'}.`,
    );
    this.name = 'FieldNotRegisteredError';
    this.key  = key;
  }
}

/**
 * Thrown when a column view is used after its table was closed or rechunked.
 *
 * Column chunks point into memory owned by the table's engine handle; the
 * lease check catches reads through views that no longer describe it.
 */
export class StaleColumnError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StaleColumnError';
  }
}

/** Thrown when a TableWriter receives records after finish() or discard(). */
export class WriterClosedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'WriterClosedError';
  }
}

/** Thrown when configuration input fails validation. */
export class ConfigError extends Error {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid chunkframe configuration: ${issues.join('; ')}`);
    this.name   = 'ConfigError';
    this.issues = issues;
  }
}
