/**
 * chunkframe — TableWriter
 *
 * Buffers records in memory and writes them to a table file in one shot.
 *
 * ── Lifecycle ────────────────────────────────────────────────────────────────
 *
 *   writeRecord / writeRecords   append to the buffer
 *   finish()                     encode every buffered record through the
 *                                record type's codec and write the file
 *   discard()                    drop the buffer; nothing is written
 *   close()                      finish() if records are pending, else no-op
 *
 * After finish() or discard() the writer is finalized: further writes throw
 * WriterClosedError, and finish(), discard() and close() do nothing.
 *
 * ── Failure on close ─────────────────────────────────────────────────────────
 *
 * finish() propagates every error and leaves the buffer in place, so a caller
 * can retry. close() is the end-of-scope path: if its implicit flush fails the
 * error is logged at error level and the buffered records are dropped.
 *
 * An empty buffer never creates a file.
 */

import { defaultEngine } from './arrow-engine';
import type { RecordType } from './codec';
import type { TableEngine } from './engine';
import { WriterClosedError } from './errors';
import { noopLogger, type Logger } from './logging';

export interface TableWriterOptions {
  /** Defaults to the shared engine over the working directory. */
  engine?: TableEngine;
  /** Receives the failure of an implicit flush in close(). */
  logger?: Logger;
}

export class TableWriter<R extends object> {
  private _buffer:    R[]     = [];
  private _finalized: boolean = false;

  private readonly _engine: TableEngine;
  private readonly _logger: Logger;

  constructor(
    readonly path: string,
    private readonly _recordType: RecordType<R>,
    options: TableWriterOptions = {},
  ) {
    this._engine = options.engine ?? defaultEngine();
    this._logger = options.logger ?? noopLogger;
  }

  // ─── Buffering ──────────────────────────────────────────────────────────────

  /** Buffers a shallow copy; later changes to `record` are not written. */
  writeRecord(record: R): void {
    this.assertWritable();
    this._buffer.push({ ...record });
  }

  writeRecords(records: Iterable<R>): void {
    this.assertWritable();
    for (const record of records) this._buffer.push({ ...record });
  }

  /** Records waiting for finish(). */
  get bufferSize(): number {
    return this._buffer.length;
  }

  get finalized(): boolean {
    return this._finalized;
  }

  // ─── Finalization ───────────────────────────────────────────────────────────

  /**
   * Write every buffered record to `path`.
   *
   * On failure nothing is marked finalized and the buffer is kept.
   */
  finish(): void {
    if (this._finalized) return;

    if (this._buffer.length > 0) {
      const codec  = this._recordType.codec();
      const writer = this._engine.newWriter(this.path);
      try {
        codec.writeAll(
          { addColumn: (name, column) => this._engine.writerAddColumn(writer, name, column) },
          this._buffer,
        );
      } catch (error) {
        this._engine.writerAbort(writer);
        throw error;
      }
      this._engine.writerFinish(writer);
    }

    this._buffer    = [];
    this._finalized = true;
  }

  /** Drop the buffer without writing. */
  discard(): void {
    this._buffer    = [];
    this._finalized = true;
  }

  /**
   * finish() when records are pending. A failure is logged, not thrown, and
   * the pending records are lost.
   */
  close(): void {
    if (this._finalized) return;
    const pending = this._buffer.length;
    try {
      this.finish();
    } catch (error) {
      this._logger.error(
        `Dropped ${pending} buffered records: writing '${this.path}' failed on close.`,
        error instanceof Error ? error : new Error(String(error)),
        { path: this.path, rows: pending, operation: 'close' },
      );
      this.discard();
    }
  }

  private assertWritable(): void {
    if (this._finalized) {
      throw new WriterClosedError(`Writer for '${this.path}' is finalized; records can no longer be added.`);
    }
  }
}
