import { describe, expect, it } from "vitest";

import { AnonMap } from "../src/cache-key/anon-map";
import { generateCacheKey } from "../src/cache-key/cache-key";
import { LruCache } from "../src/cache-key/lru-cache";
import {
  and_,
  bindParam,
  case_,
  column,
  func,
  literal,
  OpaqueClause,
  select,
  table,
  text,
} from "../src/sql/elements";
import { INTEGER, StringType } from "../src/sql/types";

const users = table("users", { id: INTEGER, name: new StringType(50) });

function keyOf(element: Parameters<typeof generateCacheKey>[0]) {
  const key = generateCacheKey(element);
  if (key === undefined) {
    throw new Error("expected a cacheable statement");
  }
  return key;
}

describe("AnonMap", () => {
  it("assigns counter ids in first-seen order", () => {
    const anonMap = new AnonMap();
    const first = {};
    const second = {};
    expect(anonMap.idFor(first)).toBe("0");
    expect(anonMap.idFor(second)).toBe("1");
    expect(anonMap.idFor(first)).toBe("0");
    expect(anonMap.size).toBe(2);
  });

  it("reports whether an object was seen before", () => {
    const anonMap = new AnonMap();
    const target = {};
    expect(anonMap.intern(target)).toEqual(["0", false]);
    expect(anonMap.intern(target)).toEqual(["0", true]);
  });

  it("forks with shared ids and an independent counter", () => {
    const anonMap = new AnonMap();
    const shared = {};
    anonMap.idFor(shared);

    const fork = anonMap.fork();
    expect(fork.idFor(shared)).toBe("0");
    expect(fork.idFor({})).toBe("1");
    expect(anonMap.idFor({})).toBe("1");
    expect(anonMap.size).toBe(2);
  });

  it("carries the uncacheable flag", () => {
    const anonMap = new AnonMap();
    expect(anonMap.uncacheable).toBe(false);
    anonMap.markUncacheable();
    expect(anonMap.uncacheable).toBe(true);
  });
});

describe("generateCacheKey", () => {
  it("gives equal keys to statements differing only in literal values", () => {
    const first = keyOf(select(users).where(users.c("id").eq(5)));
    const second = keyOf(select(users).where(users.c("id").eq(6)));

    expect(first.equals(second)).toBe(true);
    expect(first.hash).toBe(second.hash);
    expect(first.parameterValues).toEqual([5]);
    expect(second.parameterValues).toEqual([6]);
  });

  it("collects bind parameters in traversal order", () => {
    const id = users.c("id");
    const key = keyOf(
      select(users)
        .where(id.gt(1), id.lt(10))
        .limit(20),
    );
    expect(key.parameterValues).toEqual([1, 10, 20]);
  });

  it("distinguishes different columns", () => {
    const byId = keyOf(select(users.c("id")));
    const byName = keyOf(select(users.c("name")));
    expect(byId.equals(byName)).toBe(false);
  });

  it("distinguishes literal types", () => {
    const numeric = keyOf(select(literal(1)));
    const textual = keyOf(select(literal("1")));
    expect(numeric.equals(textual)).toBe(false);
  });

  it("distinguishes operators", () => {
    const id = users.c("id");
    expect(keyOf(id.lt(1)).equals(keyOf(id.gt(1)))).toBe(false);
  });

  it("includes plain values such as the table name", () => {
    const other = table("accounts", { id: INTEGER, name: new StringType(50) });
    expect(keyOf(select(users)).equals(keyOf(select(other)))).toBe(false);
  });

  it("compares type parameters through the static type key", () => {
    const short = keyOf(select(column("name", new StringType(10))));
    const long = keyOf(select(column("name", new StringType(20))));
    const same = keyOf(select(column("name", new StringType(10))));
    expect(short.equals(long)).toBe(false);
    expect(short.equals(same)).toBe(true);
  });

  it("keys anonymous aliases by identity within one statement", () => {
    const first = users.alias();
    const second = users.alias();

    const sameAliasTwice = keyOf(select(first.c("id"), first.c("name")));
    const twoAliases = keyOf(select(first.c("id"), second.c("name")));
    const otherAliasTwice = keyOf(select(second.c("id"), second.c("name")));

    expect(sameAliasTwice.equals(otherAliasTwice)).toBe(true);
    expect(sameAliasTwice.equals(twoAliases)).toBe(false);
  });

  it("extracts a parameter used twice only once", () => {
    const limit = bindParam("limit", 3);
    const key = keyOf(
      and_(column("a").lt(limit), column("b").lt(limit)),
    );
    expect(key.parameterValues).toEqual([3]);
  });

  it("keys text by its SQL and parameter names", () => {
    const first = keyOf(
      text("SELECT * FROM users WHERE id = :id").bindParams({ id: 1 }),
    );
    const second = keyOf(
      text("SELECT * FROM users WHERE id = :id").bindParams({ id: 2 }),
    );
    const other = keyOf(text("SELECT * FROM users WHERE id > :id"));

    expect(first.equals(second)).toBe(true);
    expect(first.parameterValues).toEqual([1]);
    expect(first.equals(other)).toBe(false);
  });

  it("includes function names", () => {
    const count = keyOf(select(func.count()));
    const max = keyOf(select(func.max(users.c("id"))));
    expect(count.equals(max)).toBe(false);
  });

  it("returns undefined when the tree has unknown structure", () => {
    const statement = select(users.c("id")).where(
      new OpaqueClause({ raw: "id % 2 = 0" }),
    );
    expect(generateCacheKey(statement)).toBeUndefined();
  });

  it("renders through toString", () => {
    const key = keyOf(column("a"));
    expect(key.toString()).toBe(`CacheKey(${key.hash})`);
  });
});

describe("generateCacheKey over unordered sets", () => {
  function filteredAlias(name: string, value: number) {
    return select(column(name, INTEGER))
      .where(column(name, INTEGER).eq(value))
      .alias(`${name}_sub`);
  }

  it("ignores the order in which correlated clauses are listed", () => {
    const first = keyOf(
      select(column("x")).correlate(filteredAlias("a", 1), filteredAlias("b", 2)),
    );
    const second = keyOf(
      select(column("x")).correlate(filteredAlias("b", 2), filteredAlias("a", 1)),
    );

    expect(first.equals(second)).toBe(true);
    expect(second.hash).toBe(first.hash);
  });

  it("extracts parameters in the sorted member order", () => {
    const first = keyOf(
      select(column("x")).correlate(filteredAlias("a", 1), filteredAlias("b", 2)),
    );
    const second = keyOf(
      select(column("x")).correlate(filteredAlias("b", 20), filteredAlias("a", 10)),
    );

    expect(second.hash).toBe(first.hash);
    expect(first.parameterValues).toEqual([1, 2]);
    expect(second.parameterValues).toEqual([10, 20]);
  });

  it("keeps members that reference the enclosing statement distinct", () => {
    const outer = users.alias("outer_users");
    const correlated = select(outer.c("id")).correlate(outer, users);
    const swapped = select(outer.c("id")).correlate(users, outer);

    expect(keyOf(swapped).hash).toBe(keyOf(correlated).hash);
    expect(keyOf(correlated).hash).not.toBe(
      keyOf(select(outer.c("id")).correlate(users)).hash,
    );
  });
});

describe("generateCacheKey over tuples", () => {
  const a = column("a", INTEGER);
  const b = column("b", INTEGER);

  it("extracts branch values in order and shares keys across values", () => {
    const first = keyOf(case_([[a.eq(1), "x"], [b.eq(2), "y"]], { else: "z" }));
    const second = keyOf(case_([[a.eq(3), "p"], [b.eq(4), "q"]], { else: "r" }));

    expect(second.hash).toBe(first.hash);
    expect(first.parameterValues).toEqual([1, "x", 2, "y", "z"]);
  });

  it("distinguishes reordered branches", () => {
    const first = keyOf(case_([[a.eq(1), "x"], [b.eq(2), "y"]]));
    const second = keyOf(case_([[b.eq(2), "y"], [a.eq(1), "x"]]));

    expect(second.hash).not.toBe(first.hash);
  });
});

describe("LruCache", () => {
  it("evicts the least recently used entry", () => {
    const cache = new LruCache<string, number>(2);
    cache.set("a", 1);
    cache.set("b", 2);
    expect(cache.get("a")).toBe(1);
    cache.set("c", 3);

    expect(cache.has("a")).toBe(true);
    expect(cache.has("b")).toBe(false);
    expect(cache.has("c")).toBe(true);
    expect(cache.size).toBe(2);
  });

  it("deletes and clears entries", () => {
    const cache = new LruCache<string, number>(3);
    cache.set("a", 1);
    cache.set("b", 2);
    cache.delete("a");
    expect(cache.get("a")).toBeUndefined();
    cache.clear();
    expect(cache.size).toBe(0);
  });
});
