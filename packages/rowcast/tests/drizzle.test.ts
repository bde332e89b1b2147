import { sql } from "drizzle-orm";
import { describe, expect, it } from "vitest";

import { generateCacheKey } from "../src/cache-key/cache-key";
import { fromDrizzle } from "../src/compiler/drizzle";
import { createBetterSqliteConnection } from "../src/driver/better-sqlite3";
import { ConfigurationError } from "../src/errors";
import { createExecutor } from "../src/execution/executor";
import { column } from "../src/sql/elements";
import { INTEGER } from "../src/sql/types";
import { createTestDatabase } from "./test-utils";

describe("fromDrizzle", () => {
  it("turns query parameters into positional bind parameters", () => {
    const clause = fromDrizzle(sql`SELECT ${5} AS n`);

    expect(clause.text).toBe("SELECT ? AS n");
    expect(clause.positionalParameters).toBe(true);
    expect(clause.bindParameters.map((parameter) => parameter.key)).toEqual(["p1"]);
    expect(clause.bindParameters.map((parameter) => parameter.value)).toEqual([5]);
  });

  it("shares cache keys between queries differing in values", () => {
    const first = generateCacheKey(fromDrizzle(sql`SELECT ${1} AS n`));
    const second = generateCacheKey(fromDrizzle(sql`SELECT ${2} AS n`));

    expect(first).toBeDefined();
    expect(first?.hash).toBe(second?.hash);
    expect(first?.parameterValues).toEqual([1]);
    expect(second?.parameterValues).toEqual([2]);
  });

  it("rejects placeholders without values", () => {
    expect(() => fromDrizzle(sql`SELECT ${sql.placeholder("id")} AS n`)).toThrow(
      new ConfigurationError("Placeholder 'id' has no value"),
    );
  });

  it("declares result columns", () => {
    const n = column("n", INTEGER);
    const textual = fromDrizzle(sql`SELECT ${5} AS n`, [n]);

    expect(textual.positional).toBe(true);
    expect(textual.selectedColumns).toEqual([n]);
  });

  it("executes against better-sqlite3", () => {
    const db = createTestDatabase();
    db.exec("CREATE TABLE scores (player TEXT, points INTEGER)");
    db.exec("INSERT INTO scores VALUES ('ada', 7), ('brian', 3), ('cleo', 9)");
    const executor = createExecutor({
      connection: createBetterSqliteConnection(db),
    });

    const points = column("points", INTEGER);
    const threshold = 5;
    const rows = executor
      .execute(
        fromDrizzle(
          sql`SELECT player, points FROM scores WHERE points > ${threshold} ORDER BY points`,
          ["player", points],
        ),
      )
      .all();

    expect(rows.map((row) => [row.get("player"), row.get(points)])).toEqual([
      ["ada", 7],
      ["cleo", 9],
    ]);
  });
});
