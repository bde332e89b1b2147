/**
 * Driver adapter for better-sqlite3.
 *
 * @example
 * ```typescript
 * import Database from "better-sqlite3";
 * import { createBetterSqliteConnection } from "rowcast";
 *
 * const connection = createBetterSqliteConnection(new Database(":memory:"));
 * ```
 *
 * better-sqlite3 holds the database busy while a statement iterator is
 * open; close a result before executing the next statement on the same
 * database.
 */
import type Database from "better-sqlite3";

import type {
  DriverConnection,
  DriverCursor,
  DriverParameters,
  RawColumnDescriptor,
  RawRow,
} from "./types";

function toRawRow(value: unknown): RawRow {
  if (!Array.isArray(value)) {
    throw new TypeError("better-sqlite3 returned a non-array row in raw mode");
  }
  return value;
}

function bindArguments(parameters: DriverParameters): unknown[] {
  if (Array.isArray(parameters)) {
    return [...parameters];
  }
  return Object.keys(parameters).length === 0 ? [] : [parameters];
}

// ============================================================
// Cursors
// ============================================================

class RowsCursor implements DriverCursor {
  readonly description: readonly RawColumnDescriptor[];
  readonly rowCount = -1;
  readonly lastRowId = undefined;
  readonly #iterator: IterableIterator<unknown>;
  #exhausted = false;

  constructor(
    description: readonly RawColumnDescriptor[],
    iterator: IterableIterator<unknown>,
  ) {
    this.description = description;
    this.#iterator = iterator;
  }

  fetchOne(): RawRow | undefined {
    if (this.#exhausted) return undefined;
    const next = this.#iterator.next();
    if (next.done === true) {
      this.#exhausted = true;
      return undefined;
    }
    return toRawRow(next.value);
  }

  fetchMany(size = 1): RawRow[] {
    const rows: RawRow[] = [];
    while (rows.length < size) {
      const row = this.fetchOne();
      if (row === undefined) break;
      rows.push(row);
    }
    return rows;
  }

  fetchAll(): RawRow[] {
    const rows: RawRow[] = [];
    for (let row = this.fetchOne(); row !== undefined; row = this.fetchOne()) {
      rows.push(row);
    }
    return rows;
  }

  close(): void {
    if (this.#exhausted) return;
    this.#exhausted = true;
    this.#iterator.return?.();
  }
}

class RunCursor implements DriverCursor {
  readonly description = undefined;
  readonly rowCount: number;
  readonly lastRowId: number | bigint;

  constructor(result: Database.RunResult) {
    this.rowCount = result.changes;
    this.lastRowId = result.lastInsertRowid;
  }

  fetchOne(): RawRow | undefined {
    return undefined;
  }

  fetchMany(): RawRow[] {
    return [];
  }

  fetchAll(): RawRow[] {
    return [];
  }

  close(): void {}
}

// ============================================================
// Connection
// ============================================================

/**
 * Wraps a better-sqlite3 database. Row-returning statements are read in raw
 * (array) mode; their declared column types are passed on as type codes.
 */
export function createBetterSqliteConnection(
  db: Database.Database,
): DriverConnection {
  return {
    execute(sql, parameters) {
      const statement = db.prepare(sql);
      const args = bindArguments(parameters);

      if (!statement.reader) {
        return new RunCursor(statement.run(...args));
      }

      const description = statement.columns().map(
        (column): RawColumnDescriptor => ({
          name: column.name,
          typeCode: column.type ?? undefined,
        }),
      );
      return new RowsCursor(description, statement.raw(true).iterate(...args));
    },
  };
}
