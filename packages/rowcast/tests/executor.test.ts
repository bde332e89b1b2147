import { describe, expect, it, vi } from "vitest";

import { ConfigurationError, DatabaseOperationError } from "../src/errors";
import { createExecutor } from "../src/execution/executor";
import type { ExecutionHooks } from "../src/execution/types";
import {
  column,
  OpaqueClause,
  select,
  table,
  text,
} from "../src/sql/elements";
import { INTEGER, StringType } from "../src/sql/types";
import {
  FakeConnection,
  FakeCursor,
  numberedCursor,
  SelectCompiler,
} from "./test-utils";

function usersTable() {
  return table("users", { id: INTEGER, name: new StringType() });
}

function usersCursor(): FakeCursor {
  return new FakeCursor({
    description: [
      { name: "id", typeCode: "INTEGER" },
      { name: "name", typeCode: "TEXT" },
    ],
    rows: [[5, "ada"]],
  });
}

describe("Executor", () => {
  it("compiles once per statement shape", () => {
    const connection = new FakeConnection().enqueue(usersCursor(), usersCursor());
    const compiler = new SelectCompiler();
    const executor = createExecutor({ connection, compiler });
    const users = usersTable();

    executor.execute(select(users).where(users.c("id").eq(5))).close();
    executor.execute(select(users).where(users.c("id").eq(6))).close();

    expect(compiler.compile).toHaveBeenCalledTimes(1);
    expect(connection.calls.map((call) => call.parameters)).toEqual([[5], [6]]);
    expect(executor.cacheStats).toEqual({
      compiledHits: 1,
      compiledMisses: 1,
      metadataHits: 1,
      metadataMisses: 1,
      uncacheable: 0,
    });
  });

  it("adapts cached metadata to the columns of a rebuilt statement", () => {
    const connection = new FakeConnection().enqueue(usersCursor(), usersCursor());
    const executor = createExecutor({ connection, compiler: new SelectCompiler() });

    const original = usersTable();
    executor.execute(select(original).where(original.c("id").eq(5))).close();

    const rebuilt = usersTable();
    const row = executor
      .execute(select(rebuilt).where(rebuilt.c("id").eq(5)))
      .one();

    expect(executor.cacheStats.metadataHits).toBe(1);
    expect(row.get(rebuilt.c("id"))).toBe(5);
    expect(row.get(rebuilt.c("name"))).toBe("ada");
    expect(row.get(original.c("name"))).toBe("ada");
  });

  it("adapts metadata resolved after the compiled statement was cached", () => {
    const connection = new FakeConnection().enqueue(
      usersCursor(),
      numberedCursor(1),
      usersCursor(),
    );
    const executor = createExecutor({
      connection,
      compiler: new SelectCompiler(),
      metadataCacheSize: 1,
    });

    const original = usersTable();
    executor.execute(select(original)).close();
    executor.execute(text("SELECT n FROM numbers")).close();

    const rebuilt = usersTable();
    const row = executor.execute(select(rebuilt)).one();

    expect(executor.cacheStats).toEqual({
      compiledHits: 1,
      compiledMisses: 2,
      metadataHits: 0,
      metadataMisses: 3,
      uncacheable: 0,
    });
    expect(row.get(rebuilt.c("id"))).toBe(5);
    expect(row.get(rebuilt.c("name"))).toBe("ada");
  });

  it("does not cache statements with opaque structure", () => {
    const connection = new FakeConnection().enqueue(numberedCursor(1), numberedCursor(1));
    const compiler = new SelectCompiler();
    const executor = createExecutor({ connection, compiler });
    const statement = () =>
      select(column("n", INTEGER)).where(new OpaqueClause({ raw: "n % 2 = 1" }));

    expect(executor.execute(statement()).scalar()).toBe(1);
    expect(executor.execute(statement()).scalar()).toBe(1);

    expect(compiler.compile).toHaveBeenCalledTimes(2);
    expect(executor.cacheStats).toMatchObject({
      uncacheable: 2,
      compiledMisses: 0,
      metadataMisses: 0,
    });
  });

  it("compiles again after the caches are cleared", () => {
    const connection = new FakeConnection().enqueue(numberedCursor(1), numberedCursor(1));
    const executor = createExecutor({ connection });
    const statement = text("SELECT n FROM numbers");

    executor.execute(statement).close();
    executor.clearCaches();
    executor.execute(statement).close();

    expect(executor.cacheStats.compiledMisses).toBe(2);
  });

  it("applies default and per-call execution options", () => {
    const connection = new FakeConnection().enqueue(
      numberedCursor(3),
      numberedCursor(3),
      numberedCursor(3),
    );
    const executor = createExecutor({
      connection,
      executionOptions: { streamResults: true },
    });
    const statement = text("SELECT n FROM numbers");

    expect(executor.execute(statement).strategy.kind).toBe("growth_buffered");
    expect(
      executor.execute(statement, { streamResults: false, bufferFully: true }).strategy
        .kind,
    ).toBe("fully_buffered");
    expect(executor.execute(statement, { yieldPer: 2 }).strategy.kind).toBe(
      "growth_buffered",
    );
    expect(() => executor.execute(statement, { bufferFully: true })).toThrow(
      ConfigurationError,
    );
  });

  it("resolves dialects by name", () => {
    const connection = new FakeConnection();
    expect(createExecutor({ connection }).dialect.name).toBe("sqlite");
    expect(createExecutor({ connection, dialect: "postgres" }).dialect.name).toBe(
      "postgres",
    );
  });

  it("rejects invalid cache sizes", () => {
    expect(() =>
      createExecutor({ connection: new FakeConnection(), compiledCacheSize: 0 }),
    ).toThrow(ConfigurationError);
  });

  it("passes textual column warnings to the warning handler", () => {
    const warn = vi.fn<(message: string) => void>();
    const connection = new FakeConnection().enqueue(numberedCursor(1));
    const executor = createExecutor({ connection, warn });

    executor
      .execute(text("SELECT n FROM numbers").columns([column("n"), column("m")]))
      .close();

    expect(warn).toHaveBeenCalledWith(
      "Number of columns in textual SQL (1) is smaller than number of columns requested (2)",
    );
  });

  describe("hooks", () => {
    function hooked(connection: FakeConnection) {
      const hooks = {
        onQueryStart: vi.fn<NonNullable<ExecutionHooks["onQueryStart"]>>(),
        onQueryEnd: vi.fn<NonNullable<ExecutionHooks["onQueryEnd"]>>(),
        onError: vi.fn<NonNullable<ExecutionHooks["onError"]>>(),
      };
      return { hooks, executor: createExecutor({ connection, hooks }) };
    }

    it("reports the start and end of an execution", () => {
      const { hooks, executor } = hooked(
        new FakeConnection().enqueue(numberedCursor(1)),
      );

      executor.execute(text("SELECT n FROM numbers WHERE n > :n").bindParams({ n: 0 }));

      expect(hooks.onQueryStart).toHaveBeenCalledWith(
        expect.objectContaining({
          sql: "SELECT n FROM numbers WHERE n > :n",
          params: { n: 0 },
          operationId: expect.any(String),
          startedAt: expect.any(Date),
        }),
      );
      expect(hooks.onQueryEnd).toHaveBeenCalledWith(
        hooks.onQueryStart.mock.calls[0]?.[0],
        { durationMs: expect.any(Number), returnsRows: true, cacheHit: false },
      );
      expect(hooks.onError).not.toHaveBeenCalled();
    });

    it("reports cache hits", () => {
      const { hooks, executor } = hooked(
        new FakeConnection().enqueue(numberedCursor(1), numberedCursor(1)),
      );
      const statement = text("SELECT n FROM numbers");

      executor.execute(statement).close();
      executor.execute(statement).close();

      expect(hooks.onQueryEnd.mock.calls.map((call) => call[1].cacheHit)).toEqual([
        false,
        true,
      ]);
    });

    it("wraps and reports execution failures", () => {
      const { hooks, executor } = hooked(new FakeConnection());

      expect(() => executor.execute(text("SELECT 1"))).toThrow(
        new DatabaseOperationError(
          "Driver failed during execute: no cursor queued for: SELECT 1",
          { operation: "execute" },
        ),
      );
      expect(hooks.onError).toHaveBeenCalledTimes(1);
      expect(hooks.onError.mock.calls[0]?.[1]).toBeInstanceOf(DatabaseOperationError);
      expect(hooks.onQueryEnd).not.toHaveBeenCalled();
    });

    it("reports failures raised while fetching", () => {
      const { hooks, executor } = hooked(
        new FakeConnection().enqueue(numberedCursor(2, { failOn: "fetchAll" })),
      );

      const result = executor.execute(text("SELECT n FROM numbers"));
      expect(() => result.all()).toThrow(DatabaseOperationError);

      const startContext = hooks.onQueryStart.mock.calls[0]?.[0];
      const [errorContext, error] = hooks.onError.mock.calls[0] ?? [];
      expect(errorContext).toBe(startContext);
      expect(error).toMatchObject({
        details: { operation: "fetchAll", statement: "SELECT n FROM numbers" },
      });
    });
  });
});
