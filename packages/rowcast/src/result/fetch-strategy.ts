/**
 * Fetch strategies.
 *
 * A strategy owns the driver cursor of one result and decides how rows are
 * pulled from it. The result swaps strategies on lifecycle transitions:
 * exhausting a cursor soft-closes it (the strategy is replaced by
 * `NoCursorRowsFetchStrategy`), `yieldPer()` replaces the direct strategy
 * by a fixed-size buffered one.
 *
 * Driver failures never escape a strategy directly; they go through the
 * owner's `handleExecutionError`.
 */
import type { ExecutionOptions } from "../config";
import type { DriverCursor, RawColumnDescriptor, RawRow } from "../driver/types";
import { ResourceClosedError } from "../errors";

// ============================================================
// Types
// ============================================================

export type FetchStrategyKind =
  | "direct"
  | "growth_buffered"
  | "fully_buffered"
  | "no_cursor_rows"
  | "no_cursor_no_rows";

/**
 * The result a strategy works for.
 */
export interface FetchOwner {
  /** Releases the driver cursor; reads return no rows afterwards */
  softClose(): void;
  /** Installs the strategy that replaces the current one */
  setStrategy(strategy: FetchStrategy): void;
  /** Reports a driver failure; always throws */
  handleExecutionError(error: unknown, operation: string): never;
}

export interface FetchStrategy {
  readonly kind: FetchStrategyKind;
  /** Column descriptors, or undefined when no rows are returned */
  readonly description: readonly RawColumnDescriptor[] | undefined;

  fetchOne(owner: FetchOwner): RawRow | undefined;
  fetchMany(owner: FetchOwner, size?: number): RawRow[];
  fetchAll(owner: FetchOwner): RawRow[];
  /** Called by the owner when it soft-closes */
  softClose(owner: FetchOwner): void;
  /** Called by the owner on an explicit close */
  hardClose(owner: FetchOwner): void;
  yieldPer(owner: FetchOwner, size: number): void;
}

export type BufferingOptions = Pick<
  ExecutionOptions,
  "maxRowBuffer" | "growthFactor" | "initialBufferSize"
>;

// ============================================================
// No Cursor
// ============================================================

const CLOSED_MESSAGE = "This result object is closed.";
const NO_ROWS_MESSAGE =
  "This result object does not return rows. It has been closed automatically.";

abstract class NoCursorFetchStrategy implements FetchStrategy {
  abstract readonly kind: FetchStrategyKind;
  readonly description = undefined;

  protected abstract nonResult(): RawRow[];

  fetchOne(): RawRow | undefined {
    this.nonResult();
    return undefined;
  }

  fetchMany(): RawRow[] {
    return this.nonResult();
  }

  fetchAll(): RawRow[] {
    return this.nonResult();
  }

  softClose(): void {}

  hardClose(): void {}

  yieldPer(): void {}
}

/**
 * Stand-in after a row-returning cursor was released. Reads return no rows
 * until the result is closed explicitly.
 */
export class NoCursorRowsFetchStrategy extends NoCursorFetchStrategy {
  readonly kind = "no_cursor_rows";
  #closed: boolean;

  constructor(closed = false) {
    super();
    this.#closed = closed;
  }

  get closed(): boolean {
    return this.#closed;
  }

  override hardClose(): void {
    this.#closed = true;
  }

  protected nonResult(): RawRow[] {
    if (this.#closed) {
      throw new ResourceClosedError(CLOSED_MESSAGE);
    }
    return [];
  }
}

/**
 * Stand-in for statements that never return rows.
 */
export class NoCursorNoRowsFetchStrategy extends NoCursorFetchStrategy {
  readonly kind = "no_cursor_no_rows";

  protected nonResult(): RawRow[] {
    throw new ResourceClosedError(NO_ROWS_MESSAGE);
  }
}

// ============================================================
// Direct
// ============================================================

/**
 * Forwards every call to the driver cursor.
 */
export class CursorFetchStrategy implements FetchStrategy {
  readonly kind: FetchStrategyKind = "direct";
  readonly description: readonly RawColumnDescriptor[];
  protected readonly cursor: DriverCursor;
  readonly #arraySize: number;

  constructor(
    cursor: DriverCursor,
    description: readonly RawColumnDescriptor[],
    arraySize = 1,
  ) {
    this.cursor = cursor;
    this.description = description;
    this.#arraySize = arraySize;
  }

  softClose(owner: FetchOwner): void {
    owner.setStrategy(new NoCursorRowsFetchStrategy(false));
  }

  hardClose(owner: FetchOwner): void {
    owner.setStrategy(new NoCursorRowsFetchStrategy(true));
  }

  /**
   * Replaces this strategy by a buffered one with a fixed batch size.
   */
  yieldPer(owner: FetchOwner, size: number): void {
    owner.setStrategy(
      new BufferedRowFetchStrategy(this.cursor, this.description, {
        maxRowBuffer: size,
        growthFactor: 0,
        initialBufferSize: size,
      }),
    );
  }

  fetchOne(owner: FetchOwner): RawRow | undefined {
    try {
      const row = this.cursor.fetchOne();
      if (row === undefined) {
        owner.softClose();
      }
      return row;
    } catch (error) {
      return owner.handleExecutionError(error, "fetchOne");
    }
  }

  fetchMany(owner: FetchOwner, size?: number): RawRow[] {
    try {
      const rows = this.cursor.fetchMany(size ?? this.#arraySize);
      if (rows.length === 0) {
        owner.softClose();
      }
      return rows;
    } catch (error) {
      return owner.handleExecutionError(error, "fetchMany");
    }
  }

  fetchAll(owner: FetchOwner): RawRow[] {
    try {
      const rows = this.cursor.fetchAll();
      owner.softClose();
      return rows;
    } catch (error) {
      return owner.handleExecutionError(error, "fetchAll");
    }
  }
}

// ============================================================
// Growth Buffered
// ============================================================

/**
 * Reads ahead into a FIFO buffer. The first read fetches
 * `initialBufferSize` rows; each refill fetches `growthFactor` times more
 * than the last, up to `maxRowBuffer`. A growth factor of 0 keeps the size
 * fixed.
 */
export class BufferedRowFetchStrategy extends CursorFetchStrategy {
  override readonly kind: FetchStrategyKind = "growth_buffered";
  #buffer: RawRow[];
  #bufferSize: number;
  #maxRowBuffer: number;
  #growthFactor: number;

  constructor(
    cursor: DriverCursor,
    description: readonly RawColumnDescriptor[],
    options: BufferingOptions,
    initialBuffer: readonly RawRow[] = [],
  ) {
    super(cursor, description);
    this.#buffer = [...initialBuffer];
    this.#maxRowBuffer = options.maxRowBuffer;
    this.#growthFactor = options.growthFactor;
    this.#bufferSize =
      options.growthFactor === 0
        ? options.maxRowBuffer
        : Math.min(
            options.maxRowBuffer,
            options.initialBufferSize * options.growthFactor,
          );
  }

  /**
   * Creates the strategy and performs the initial read.
   */
  static create(
    owner: FetchOwner,
    cursor: DriverCursor,
    description: readonly RawColumnDescriptor[],
    options: BufferingOptions,
  ): BufferedRowFetchStrategy {
    let initial: RawRow[];
    try {
      initial = cursor.fetchMany(options.initialBufferSize);
    } catch (error) {
      return owner.handleExecutionError(error, "fetchMany");
    }
    return new BufferedRowFetchStrategy(cursor, description, options, initial);
  }

  /** Rows currently held in the buffer. */
  get buffered(): number {
    return this.#buffer.length;
  }

  /** Size of the next refill. */
  get bufferSize(): number {
    return this.#bufferSize;
  }

  /**
   * Fixes the batch size and stops growth.
   */
  override yieldPer(_owner: FetchOwner, size: number): void {
    this.#growthFactor = 0;
    this.#maxRowBuffer = size;
    this.#bufferSize = size;
  }

  #refill(owner: FetchOwner): void {
    const size = this.#bufferSize;
    let rows: RawRow[];
    try {
      rows = this.cursor.fetchMany(size);
    } catch (error) {
      return owner.handleExecutionError(error, "fetchMany");
    }
    if (rows.length === 0) return;

    this.#buffer.push(...rows);
    if (this.#growthFactor > 0 && size < this.#maxRowBuffer) {
      this.#bufferSize = Math.min(this.#maxRowBuffer, size * this.#growthFactor);
    }
  }

  override softClose(owner: FetchOwner): void {
    this.#buffer = [];
    super.softClose(owner);
  }

  override hardClose(owner: FetchOwner): void {
    this.#buffer = [];
    super.hardClose(owner);
  }

  override fetchOne(owner: FetchOwner): RawRow | undefined {
    if (this.#buffer.length === 0) {
      this.#refill(owner);
      if (this.#buffer.length === 0) {
        owner.softClose();
        return undefined;
      }
    }
    return this.#buffer.shift();
  }

  override fetchMany(owner: FetchOwner, size?: number): RawRow[] {
    if (size === undefined) {
      return this.fetchAll(owner);
    }

    if (size > this.#buffer.length) {
      let rows: RawRow[];
      try {
        rows = this.cursor.fetchMany(size - this.#buffer.length);
      } catch (error) {
        return owner.handleExecutionError(error, "fetchMany");
      }
      this.#buffer.push(...rows);
    }

    const result = this.#buffer.splice(0, size);
    if (result.length === 0) {
      owner.softClose();
    }
    return result;
  }

  override fetchAll(owner: FetchOwner): RawRow[] {
    let rest: RawRow[];
    try {
      rest = this.cursor.fetchAll();
    } catch (error) {
      return owner.handleExecutionError(error, "fetchAll");
    }
    const result = [...this.#buffer, ...rest];
    this.#buffer = [];
    owner.softClose();
    return result;
  }
}

// ============================================================
// Fully Buffered
// ============================================================

/**
 * Holds every row in memory; the driver cursor is drained when the strategy
 * is created.
 */
export class FullyBufferedFetchStrategy implements FetchStrategy {
  readonly kind = "fully_buffered";
  readonly description: readonly RawColumnDescriptor[];
  #buffer: RawRow[];

  constructor(
    description: readonly RawColumnDescriptor[],
    rows: readonly RawRow[],
  ) {
    this.description = description;
    this.#buffer = [...rows];
  }

  static create(
    owner: FetchOwner,
    cursor: DriverCursor,
    description: readonly RawColumnDescriptor[],
  ): FullyBufferedFetchStrategy {
    let rows: RawRow[];
    try {
      rows = cursor.fetchAll();
    } catch (error) {
      return owner.handleExecutionError(error, "fetchAll");
    }
    return new FullyBufferedFetchStrategy(description, rows);
  }

  get buffered(): number {
    return this.#buffer.length;
  }

  softClose(owner: FetchOwner): void {
    this.#buffer = [];
    owner.setStrategy(new NoCursorRowsFetchStrategy(false));
  }

  hardClose(owner: FetchOwner): void {
    this.#buffer = [];
    owner.setStrategy(new NoCursorRowsFetchStrategy(true));
  }

  yieldPer(): void {}

  fetchOne(owner: FetchOwner): RawRow | undefined {
    const row = this.#buffer.shift();
    if (row === undefined) {
      owner.softClose();
    }
    return row;
  }

  fetchMany(owner: FetchOwner, size?: number): RawRow[] {
    if (size === undefined) {
      return this.fetchAll(owner);
    }
    const rows = this.#buffer.splice(0, size);
    if (rows.length === 0) {
      owner.softClose();
    }
    return rows;
  }

  fetchAll(owner: FetchOwner): RawRow[] {
    const rows = this.#buffer;
    this.#buffer = [];
    owner.softClose();
    return rows;
  }
}
