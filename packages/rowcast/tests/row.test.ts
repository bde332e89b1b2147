import { describe, expect, it } from "vitest";

import { sqliteDialect } from "../src/dialect";
import {
  AmbiguousColumnError,
  InvalidRequestError,
  NoSuchColumnError,
  RowAttributeError,
} from "../src/errors";
import { resolveRowMetadata } from "../src/result/resolver";
import { Row } from "../src/result/row";
import type { RowMetadata } from "../src/result/row-metadata";

function undeclared(...names: string[]): RowMetadata {
  return resolveRowMetadata({
    description: names.map((name) => ({ name, typeCode: undefined })),
    dialect: sqliteDialect,
  });
}

const metadata = undeclared("id", "name");

describe("Row", () => {
  it("reads values by position, negative position and name", () => {
    const row = new Row(metadata, [1, "x"]);
    expect(row[1]).toBe("x");
    expect(row.at(-1)).toBe("x");
    expect(row.get(0)).toBe(1);
    expect(row.get("NAME")).toBe("x");
    expect(row.length).toBe(2);
  });

  it("raises for positions out of range", () => {
    const row = new Row(metadata, [1, "x"]);
    expect(() => row.at(2)).toThrow(NoSuchColumnError);
    expect(() => row.at(-3)).toThrow(NoSuchColumnError);
    expect(() => row.get(1.5)).toThrow(NoSuchColumnError);
  });

  it("wraps missing names in attribute errors", () => {
    const row = new Row(metadata, [1, "x"]);
    expect(row.attr("name")).toBe("x");

    let caught: unknown;
    try {
      row.attr("nickname");
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(RowAttributeError);
    expect(caught).toMatchObject({
      message: "Row has no attribute 'nickname'",
      cause: expect.any(NoSuchColumnError),
    });
  });

  it("lets ambiguity errors through attribute access", () => {
    const row = new Row(undeclared("id", "id"), [1, 2]);
    expect(() => row.attr("id")).toThrow(AmbiguousColumnError);
  });

  it("behaves as an immutable sequence", () => {
    const row = new Row(metadata, [1, "x"]);
    expect(Object.isFrozen(row)).toBe(true);
    expect([...row]).toEqual([1, "x"]);
    expect(row.toArray()).toEqual([1, "x"]);
    expect(row.slice(1)).toEqual(["x"]);
    expect(row.includes("x")).toBe(true);
    expect(row.includes("y")).toBe(false);
  });

  it("exposes fields and keys", () => {
    const row = new Row(metadata, [1, "x"]);
    expect(row.fields).toEqual(["id", "name"]);
    expect(row.has("ID")).toBe(true);
    expect(row.has("email")).toBe(false);
    expect(row.metadata).toBe(metadata);
  });

  it("renders as a tuple", () => {
    expect(new Row(metadata, [1, "x"]).toString()).toBe("(1, 'x')");
    expect(new Row(metadata, [null, 5n]).toString()).toBe("(null, 5n)");
  });

  it("compares values regardless of metadata", () => {
    const row = new Row(metadata, [1, "x"]);
    const other = new Row(undeclared("a", "b"), [1, "x"]);

    expect(row.equals(other)).toBe(true);
    expect(row.equals([1, "x"])).toBe(true);
    expect(row.hashKey()).toBe(other.hashKey());
    expect(row.compare([1, "y"])).toBe(-1);
    expect(row.compare([1])).toBe(1);
    expect(row.compare([null, "x"])).toBe(1);
  });

  it("applies decoders at construction", () => {
    const row = new Row(metadata, ["7", "x"], [(value) => Number(value), undefined]);
    expect(row.get("id")).toBe(7);
    expect(row.get("name")).toBe("x");
  });
});

describe("RowMapping", () => {
  const row = new Row(metadata, [1, "x"]);

  it("reads by key", () => {
    expect(row.mapping.get("id")).toBe(1);
    expect(row.mapping.has("name")).toBe(true);
    expect(row.mapping.size).toBe(2);
  });

  it("rejects integer keys", () => {
    expect(() => row.mapping.get(0)).toThrow(
      new InvalidRequestError("RowMapping does not accept integer keys (got 0)"),
    );
    expect(row.mapping.has(0)).toBe(false);
  });

  it("iterates keys and pairs them with values", () => {
    expect([...row.mapping]).toEqual(["id", "name"]);
    expect(row.mapping.keys()).toEqual(["id", "name"]);
    expect(row.mapping.values()).toEqual([1, "x"]);
    expect(row.mapping.entries()).toEqual([
      ["id", 1],
      ["name", "x"],
    ]);
    expect(row.toObject()).toEqual({ id: 1, name: "x" });
  });
});
