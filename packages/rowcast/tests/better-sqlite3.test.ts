/**
 * Executes statements against an in-memory SQLite database.
 */
import type Database from "better-sqlite3";
import { describe, expect, it, vi } from "vitest";

import { createBetterSqliteConnection } from "../src/driver/better-sqlite3";
import { InvalidRequestError } from "../src/errors";
import { createExecutor, type Executor } from "../src/execution/executor";
import type { ExecutionHooks } from "../src/execution/types";
import { column, text } from "../src/sql/elements";
import { DateTimeType, INTEGER } from "../src/sql/types";
import { createTestDatabase } from "./test-utils";

function seededDatabase(): Database.Database {
  const db = createTestDatabase();
  db.exec(`
    CREATE TABLE users (id INTEGER PRIMARY KEY, name TEXT NOT NULL, created DATETIME);
    INSERT INTO users (name, created) VALUES ('ada', '2024-01-02 03:04:05');
    INSERT INTO users (name, created) VALUES ('brian', '2024-02-03 04:05:06');
  `);
  return db;
}

function executorFor(db: Database.Database): Executor {
  return createExecutor({ connection: createBetterSqliteConnection(db) });
}

describe("better-sqlite3 connection", () => {
  it("reports changes and the last row id of writes", () => {
    const executor = executorFor(seededDatabase());

    const result = executor.execute(
      text("INSERT INTO users (name) VALUES (:name)").bindParams({ name: "cleo" }),
    );

    expect(result.returnsRows).toBe(false);
    expect(result.rowCount).toBe(1);
    expect(result.lastRowId).toBe(3);
  });

  it("reads rows keyed by the driver's column names", () => {
    const executor = executorFor(seededDatabase());

    const rows = executor
      .execute(text("SELECT id, name FROM users ORDER BY id"))
      .all();

    expect(rows.map((row) => row.toObject())).toEqual([
      { id: 1, name: "ada" },
      { id: 2, name: "brian" },
    ]);
    expect(rows[0]?.metadata.strategy).toBe("none");
  });

  it("binds named parameters", () => {
    const executor = executorFor(seededDatabase());
    const name = executor
      .execute(text("SELECT name FROM users WHERE id = :id").bindParams({ id: 2 }))
      .scalar();
    expect(name).toBe("brian");
  });

  it("matches declared columns by position and decodes them", () => {
    const executor = executorFor(seededDatabase());
    const id = column("id", INTEGER);
    const created = column("created", new DateTimeType());

    const row = executor
      .execute(
        text("SELECT id, created FROM users WHERE id = 1").columns([id, created]),
      )
      .one();

    expect(row.metadata.strategy).toBe("textual_positional");
    expect(row.get(id)).toBe(1);
    expect(row.get(created)).toEqual(new Date("2024-01-02T03:04:05.000Z"));
  });

  it("matches columns declared by type only by name", () => {
    const executor = executorFor(seededDatabase());

    const row = executor
      .execute(
        text("SELECT created AS joined FROM users WHERE id = 2").columns([], {
          types: { joined: new DateTimeType() },
        }),
      )
      .one();

    expect(row.metadata.strategy).toBe("name");
    expect(row.get("joined")).toEqual(new Date("2024-02-03T04:05:06.000Z"));
  });

  it("streams rows in growing batches", () => {
    const executor = executorFor(seededDatabase());

    const result = executor.execute(text("SELECT id FROM users ORDER BY id"), {
      streamResults: true,
    });

    expect(result.strategy.kind).toBe("growth_buffered");
    expect([...result.scalars()]).toEqual([1, 2]);
    expect(result.state).toBe("soft_closed");
  });

  it("releases the statement when a result is closed early", () => {
    const db = seededDatabase();
    const executor = executorFor(db);

    const first = executor.execute(text("SELECT id FROM users ORDER BY id")).first();
    expect(first?.at(0)).toBe(1);

    executor.execute(text("DELETE FROM users WHERE id = 1"));
    expect(executor.execute(text("SELECT count(*) AS n FROM users")).scalar()).toBe(
      1,
    );
  });

  it("reuses compiled statements across parameter values", () => {
    const executor = executorFor(seededDatabase());
    const byId = text("SELECT name FROM users WHERE id = :id");

    expect(executor.execute(byId.bindParams({ id: 1 })).scalar()).toBe("ada");
    expect(executor.execute(byId.bindParams({ id: 2 })).scalar()).toBe("brian");
    expect(executor.cacheStats).toMatchObject({
      compiledHits: 1,
      compiledMisses: 1,
      metadataHits: 1,
      metadataMisses: 1,
    });
  });

  it("adapts cached metadata to newly built column objects", () => {
    const executor = executorFor(seededDatabase());
    executor
      .execute(
        text("SELECT id, name FROM users ORDER BY id").columns([
          column("id", INTEGER),
          column("name"),
        ]),
      )
      .close();

    const nextId = column("id", INTEGER);
    const nextName = column("name");
    const row = executor
      .execute(text("SELECT id, name FROM users ORDER BY id").columns([nextId, nextName]))
      .first();

    expect(executor.cacheStats.metadataHits).toBe(1);
    expect(row?.get(nextId)).toBe(1);
    expect(row?.get(nextName)).toBe("ada");
  });

  it("releases the statement when its result columns cannot be resolved", () => {
    const db = seededDatabase();
    const onError = vi.fn<NonNullable<ExecutionHooks["onError"]>>();
    const executor = createExecutor({
      connection: createBetterSqliteConnection(db),
      hooks: { onError },
    });
    const id = column("id", INTEGER);

    expect(() =>
      executor.execute(
        text("SELECT id, name FROM users").columns([id, id], { positional: true }),
      ),
    ).toThrow(InvalidRequestError);
    expect(onError).toHaveBeenCalledTimes(1);
    expect(onError.mock.calls[0]?.[1]).toBeInstanceOf(InvalidRequestError);

    const inserted = executor.execute(
      text("INSERT INTO users (name) VALUES ('dora')"),
    );
    expect(inserted.rowCount).toBe(1);
    expect(executor.execute(text("SELECT count(*) AS n FROM users")).scalar()).toBe(3);
  });
});
