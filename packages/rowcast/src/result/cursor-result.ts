/**
 * Result objects.
 *
 * A CursorResult owns one driver cursor through its current fetch strategy
 * and turns raw driver rows into Rows under a single RowMetadata.
 *
 * Lifecycle:
 *
 * - `open`: the driver cursor is live.
 * - `soft_closed`: the cursor was released because the rows ran out or the
 *   statement returns none. Reads return no rows; `rowCount` and
 *   `lastRowId` stay readable.
 * - `hard_closed`: `close()` was called. Reads raise ResourceClosedError.
 */
import type { ExecutionOptions } from "../config";
import type {
  DriverCursor,
  RawColumnDescriptor,
  RawRow,
} from "../driver/types";
import {
  DatabaseOperationError,
  isRowcastError,
  MultipleResultsError,
  NoResultError,
  ResourceClosedError,
} from "../errors";
import { createLogger } from "../logging";
import {
  BufferedRowFetchStrategy,
  CursorFetchStrategy,
  type FetchOwner,
  type FetchStrategy,
  FullyBufferedFetchStrategy,
  NoCursorNoRowsFetchStrategy,
} from "./fetch-strategy";
import { Row, RowMapping } from "./row";
import type { RowKey, RowMetadata } from "./row-metadata";

const log = createLogger("result");

// ============================================================
// Types
// ============================================================

export type ResultState = "open" | "soft_closed" | "hard_closed";

export type CursorResultInit = Readonly<{
  cursor: DriverCursor;
  options: ExecutionOptions;
  /** Builds the metadata for the cursor's column descriptors */
  resolveMetadata: (description: readonly RawColumnDescriptor[]) => RowMetadata;
  /** SQL text, reported with driver failures */
  statement?: string;
  /**
   * Receives every driver failure, and any failure to resolve the metadata,
   * before it is thrown
   */
  onError?: (error: Error) => void;
}>;

const NO_ROWS_MESSAGE =
  "This result object does not return rows. It has been closed automatically.";

function describeFailure(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ============================================================
// Cursor Result
// ============================================================

export class CursorResult implements Iterable<Row> {
  readonly #cursor: DriverCursor;
  readonly #statement: string | undefined;
  readonly #onError: ((error: Error) => void) | undefined;
  readonly #returnsRows: boolean;
  #metadata: RowMetadata | undefined;
  #strategy: FetchStrategy;
  #state: ResultState = "open";
  #yieldPer: number | undefined;
  #rowCount = -1;
  #lastRowId: number | bigint | undefined;

  readonly #owner: FetchOwner = {
    softClose: () => {
      this.#softClose(false);
    },
    setStrategy: (strategy) => {
      this.#strategy = strategy;
    },
    handleExecutionError: (error, operation) =>
      this.#handleExecutionError(error, operation),
  };

  constructor(init: CursorResultInit) {
    const { cursor, options } = init;
    this.#cursor = cursor;
    this.#statement = init.statement;
    this.#onError = init.onError;
    this.#yieldPer = options.yieldPer;

    const description = cursor.description;
    if (description === undefined) {
      this.#returnsRows = false;
      this.#strategy = new NoCursorNoRowsFetchStrategy();
      this.#softClose(false);
      return;
    }

    this.#returnsRows = true;
    this.#metadata = this.#resolveMetadata(init, description);
    if (log.enabled) {
      log("Col %o", this.#metadata.keys);
    }

    this.#strategy = new CursorFetchStrategy(
      cursor,
      description,
      options.arraySize,
    );
    if (options.bufferFully) {
      this.#strategy = FullyBufferedFetchStrategy.create(
        this.#owner,
        cursor,
        description,
      );
    } else if (options.yieldPer !== undefined) {
      this.#strategy = BufferedRowFetchStrategy.create(
        this.#owner,
        cursor,
        description,
        {
          maxRowBuffer: options.yieldPer,
          growthFactor: 0,
          initialBufferSize: options.yieldPer,
        },
      );
    } else if (options.streamResults) {
      this.#strategy = BufferedRowFetchStrategy.create(
        this.#owner,
        cursor,
        description,
        options,
      );
    }
  }

  // ============================================================
  // State
  // ============================================================

  get state(): ResultState {
    return this.#state;
  }

  get closed(): boolean {
    return this.#state === "hard_closed";
  }

  /** False for statements without a row descriptor. */
  get returnsRows(): boolean {
    return this.#returnsRows;
  }

  /** The current fetch strategy. */
  get strategy(): FetchStrategy {
    return this.#strategy;
  }

  /** Rows affected, as reported by the driver; -1 when unknown. */
  get rowCount(): number {
    return this.#state === "open" ? this.#cursor.rowCount : this.#rowCount;
  }

  get lastRowId(): number | bigint | undefined {
    return this.#state === "open" ? this.#cursor.lastRowId : this.#lastRowId;
  }

  /**
   * @throws ResourceClosedError when the statement does not return rows
   */
  get metadata(): RowMetadata {
    if (this.#metadata === undefined) {
      throw new ResourceClosedError(NO_ROWS_MESSAGE);
    }
    return this.#metadata;
  }

  keys(): readonly string[] {
    return this.metadata.keys;
  }

  /**
   * Closes the result. Safe to call in any state; the driver cursor is
   * released if it is still live.
   */
  close(): void {
    this.#softClose(true);
  }

  #softClose(hard: boolean): void {
    if (this.#state === "hard_closed") return;
    if (!hard && this.#state === "soft_closed") return;

    if (this.#state === "open") {
      this.#releaseCursor();
    }
    if (hard) {
      this.#strategy.hardClose(this.#owner);
    } else {
      this.#strategy.softClose(this.#owner);
    }
    this.#state = hard ? "hard_closed" : "soft_closed";
    log("result %s", this.#state);
  }

  /** Resolves the metadata, releasing the driver cursor when that fails. */
  #resolveMetadata(
    init: CursorResultInit,
    description: readonly RawColumnDescriptor[],
  ): RowMetadata {
    try {
      return init.resolveMetadata(description);
    } catch (error) {
      try {
        init.cursor.close();
      } catch (closeError) {
        log("cursor close failed after metadata resolution: %O", closeError);
      }
      this.#state = "hard_closed";
      this.#onError?.(error instanceof Error ? error : new Error(String(error)));
      throw error;
    }
  }

  #releaseCursor(): void {
    this.#rowCount = this.#cursor.rowCount;
    this.#lastRowId = this.#cursor.lastRowId;
    this.#cursor.close();
  }

  #handleExecutionError(error: unknown, operation: string): never {
    if (isRowcastError(error)) {
      throw error;
    }
    const wrapped = new DatabaseOperationError(
      `Driver failed during ${operation}: ${describeFailure(error)}`,
      {
        operation,
        ...(this.#statement !== undefined && { statement: this.#statement }),
      },
      { cause: error },
    );
    this.#onError?.(wrapped);

    if (this.#state === "open") {
      try {
        this.#releaseCursor();
      } catch (closeError) {
        log("cursor close failed after %s: %O", operation, closeError);
      }
      this.#state = "soft_closed";
    }
    this.#strategy.hardClose(this.#owner);
    this.#state = "hard_closed";
    throw wrapped;
  }

  // ============================================================
  // Fetching
  // ============================================================

  #makeRow(raw: RawRow): Row {
    const metadata = this.metadata;
    const row = new Row(metadata, metadata.filterRow(raw), metadata.decoders);
    if (log.enabled) {
      log("Row %s", row.toString());
    }
    return row;
  }

  fetchOne(): Row | undefined {
    const raw = this.#strategy.fetchOne(this.#owner);
    return raw === undefined ? undefined : this.#makeRow(raw);
  }

  /**
   * Fetches up to `size` rows. Without a size the strategy's default
   * batch is used.
   */
  fetchMany(size?: number): Row[] {
    return this.#strategy
      .fetchMany(this.#owner, size)
      .map((raw) => this.#makeRow(raw));
  }

  fetchAll(): Row[] {
    return this.#strategy.fetchAll(this.#owner).map((raw) => this.#makeRow(raw));
  }

  all(): Row[] {
    return this.fetchAll();
  }

  *[Symbol.iterator](): Iterator<Row> {
    for (;;) {
      const row = this.fetchOne();
      if (row === undefined) return;
      yield row;
    }
  }

  /**
   * Yields lists of rows until the result is exhausted. The size defaults
   * to the `yieldPer` batch, when one is set.
   */
  *partitions(size?: number): Generator<Row[], void, undefined> {
    const batch = size ?? this.#yieldPer;
    for (;;) {
      const rows = this.fetchMany(batch);
      if (rows.length === 0) return;
      yield rows;
    }
  }

  /**
   * Fetches in fixed batches of `size` rows from now on.
   */
  yieldPer(size: number): this {
    this.#yieldPer = size;
    this.#strategy.yieldPer(this.#owner, size);
    return this;
  }

  // ============================================================
  // Single Rows
  // ============================================================

  /**
   * Returns the first row, or undefined, and closes the result.
   */
  first(): Row | undefined {
    try {
      return this.fetchOne();
    } finally {
      this.close();
    }
  }

  /**
   * Returns the first column of the first row, and closes the result.
   */
  scalar(): unknown {
    return this.first()?.at(0);
  }

  /**
   * Returns the only row, and closes the result.
   *
   * @throws NoResultError when there are no rows
   * @throws MultipleResultsError when there is more than one row
   */
  one(): Row {
    const row = this.oneOrUndefined();
    if (row === undefined) {
      throw new NoResultError();
    }
    return row;
  }

  /**
   * @throws MultipleResultsError when there is more than one row
   */
  oneOrUndefined(): Row | undefined {
    try {
      const row = this.fetchOne();
      if (row !== undefined && this.fetchOne() !== undefined) {
        throw new MultipleResultsError();
      }
      return row;
    } finally {
      this.close();
    }
  }

  scalarOne(): unknown {
    return this.one().at(0);
  }

  // ============================================================
  // Projections
  // ============================================================

  /**
   * Restricts the rows of this result to `keys`, in the given order.
   *
   * @throws NoSuchColumnError when a key is unknown
   * @throws AmbiguousColumnError when a key is ambiguous
   */
  columns(...keys: RowKey[]): this {
    this.#metadata = this.metadata.reduce(keys);
    return this;
  }

  mappings(): MappingResult {
    return new MappingResult(this);
  }

  /**
   * Returns a view yielding one column of each row.
   */
  scalars(key: RowKey = 0): ScalarResult {
    return new ScalarResult(this, this.metadata.indexOf(key));
  }
}

// ============================================================
// Derived Results
// ============================================================

abstract class DerivedResult<T> implements Iterable<T> {
  protected readonly source: CursorResult;

  constructor(source: CursorResult) {
    this.source = source;
  }

  protected abstract transform(row: Row): T;

  get closed(): boolean {
    return this.source.closed;
  }

  keys(): readonly string[] {
    return this.source.keys();
  }

  close(): void {
    this.source.close();
  }

  fetchOne(): T | undefined {
    const row = this.source.fetchOne();
    return row === undefined ? undefined : this.transform(row);
  }

  fetchMany(size?: number): T[] {
    return this.source.fetchMany(size).map((row) => this.transform(row));
  }

  fetchAll(): T[] {
    return this.source.fetchAll().map((row) => this.transform(row));
  }

  all(): T[] {
    return this.fetchAll();
  }

  *[Symbol.iterator](): Iterator<T> {
    for (const row of this.source) {
      yield this.transform(row);
    }
  }

  *partitions(size?: number): Generator<T[], void, undefined> {
    for (const rows of this.source.partitions(size)) {
      yield rows.map((row) => this.transform(row));
    }
  }

  first(): T | undefined {
    const row = this.source.first();
    return row === undefined ? undefined : this.transform(row);
  }

  one(): T {
    return this.transform(this.source.one());
  }

  oneOrUndefined(): T | undefined {
    const row = this.source.oneOrUndefined();
    return row === undefined ? undefined : this.transform(row);
  }
}

/**
 * Yields a RowMapping per row.
 */
export class MappingResult extends DerivedResult<RowMapping> {
  protected transform(row: Row): RowMapping {
    return row.mapping;
  }
}

/**
 * Yields the value of one column per row.
 */
export class ScalarResult extends DerivedResult<unknown> {
  readonly #index: number;

  constructor(source: CursorResult, index: number) {
    super(source);
    this.#index = index;
  }

  protected transform(row: Row): unknown {
    return row.at(this.#index);
  }
}
