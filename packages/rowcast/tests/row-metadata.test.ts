import { describe, expect, it } from "vitest";

import { resultColumnFor } from "../src/compiler/compiled";
import { sqliteDialect } from "../src/dialect";
import {
  AmbiguousColumnError,
  ConfigurationError,
  NoSuchColumnError,
} from "../src/errors";
import { resolveRowMetadata } from "../src/result/resolver";
import { Row } from "../src/result/row";
import { RowMetadata } from "../src/result/row-metadata";
import { column, type ColumnElement, table } from "../src/sql/elements";
import { INTEGER } from "../src/sql/types";

function positional(...columns: ColumnElement[]): RowMetadata {
  return resolveRowMetadata({
    resultColumns: columns.map((element, index) => resultColumnFor(element, index)),
    columnsAreOrdered: true,
    description: columns.map((element) => ({
      name: element.key ?? "",
      typeCode: undefined,
    })),
    dialect: sqliteDialect,
  });
}

function undeclared(...names: string[]): RowMetadata {
  return resolveRowMetadata({
    description: names.map((name) => ({ name, typeCode: undefined })),
    dialect: sqliteDialect,
  });
}

function rowOf(metadata: RowMetadata, values: readonly unknown[]): Row {
  return new Row(metadata, metadata.filterRow(values), metadata.decoders);
}

describe("RowMetadata", () => {
  describe("lookup", () => {
    it("finds records by position, name and element", () => {
      const a = column("a");
      const metadata = positional(a, column("b"));

      expect(metadata.indexOf(1)).toBe(1);
      expect(metadata.indexOf("b")).toBe(1);
      expect(metadata.indexOf(a)).toBe(0);
      expect(metadata.lookup("a").renderedName).toBe("a");
    });

    it("folds string lookups on case-insensitive metadata", () => {
      const metadata = undeclared("Email");
      expect(metadata.caseSensitive).toBe(false);
      expect(metadata.indexOf("EMAIL")).toBe(0);
    });

    it("raises for unknown keys and out of range positions", () => {
      const metadata = undeclared("a");
      expect(() => metadata.lookup("missing")).toThrow(NoSuchColumnError);
      expect(() => metadata.lookup(3)).toThrow(NoSuchColumnError);
      expect(metadata.has(column("a"))).toBe(false);
    });

    it("reports ambiguous keys as present but unreadable", () => {
      const metadata = undeclared("id", "id");
      expect(metadata.has("id")).toBe(true);
      expect(() => metadata.lookup("id")).toThrow(AmbiguousColumnError);
      expect(metadata.fields).toEqual([]);
    });
  });

  describe("reduce", () => {
    it("projects and reorders columns by key", () => {
      const metadata = undeclared("a", "b", "c");
      const reduced = metadata.reduce(["c", "a"]);

      expect(reduced.keys).toEqual(["c", "a"]);
      expect(reduced.tupleFilter).toEqual([2, 0]);
      expect(reduced.filterRow([1, 2, 3])).toEqual([3, 1]);
      expect(reduced.strategy).toBeUndefined();

      const row = rowOf(reduced, [1, 2, 3]);
      expect(row.get("c")).toBe(3);
      expect(row.get("a")).toBe(1);
      expect(row.at(0)).toBe(3);
    });

    it("projects by position", () => {
      const reduced = undeclared("a", "b", "c").reduce([1]);
      expect(reduced.keys).toEqual(["b"]);
      expect(reduced.filterRow([1, 2, 3])).toEqual([2]);
    });

    it("composes projections against the raw row", () => {
      const reduced = undeclared("a", "b", "c").reduce(["c", "a"]).reduce(["a"]);
      expect(reduced.tupleFilter).toEqual([0]);
      expect(reduced.filterRow([1, 2, 3])).toEqual([1]);
    });

    it("keeps element keys of projected columns", () => {
      const b = column("b");
      const reduced = positional(column("a"), b).reduce([b]);
      expect(reduced.indexOf(b)).toBe(0);
    });

    it("rejects ambiguous keys", () => {
      expect(() => undeclared("id", "id").reduce(["id"])).toThrow(
        AmbiguousColumnError,
      );
    });
  });

  describe("adaptTo", () => {
    it("adds keys for the columns of an equivalent statement", () => {
      const a = column("a", INTEGER);
      const b = column("b", INTEGER);
      const metadata = positional(a, b);
      const resultColumns = [resultColumnFor(a, 0), resultColumnFor(b, 1)];

      const nextA = column("a", INTEGER);
      const nextB = column("b", INTEGER);
      const adapted = metadata.adaptTo(resultColumns, [nextA, nextB]);
      const row = rowOf(adapted, [1, 2]);

      expect(row.get(nextA)).toBe(1);
      expect(row.get(nextB)).toBe(2);
      expect(row.get(a)).toBe(1);
      expect(metadata.has(nextA)).toBe(false);
      expect(adapted.strategy).toBe("positional");
    });

    it("re-points duplicate names through their declaring elements", () => {
      const build = () => ({
        users: table("users", { id: INTEGER }),
        orders: table("orders", { id: INTEGER }),
      });
      const first = build();
      const declared = [first.users.c("id"), first.orders.c("id")];
      const metadata = positional(...declared);
      const resultColumns = declared.map((element, index) =>
        resultColumnFor(element, index),
      );

      const next = build();
      const adapted = metadata.adaptTo(resultColumns, [
        next.users.c("id"),
        next.orders.c("id"),
      ]);
      const row = rowOf(adapted, [1, 2]);

      expect(row.get(next.users.c("id"))).toBe(1);
      expect(row.get(next.orders.c("id"))).toBe(2);
      expect(() => row.get("id")).toThrow(AmbiguousColumnError);
    });

    it("returns the same metadata without declared columns", () => {
      const metadata = undeclared("a");
      expect(metadata.adaptTo([], [column("a")])).toBe(metadata);
    });
  });

  describe("serialization", () => {
    it("keeps name keys and positions", () => {
      const metadata = positional(column("a"), column("b"));
      expect(metadata.toSerialized()).toEqual({
        version: 1,
        keys: ["a", "b"],
        caseSensitive: false,
        columns: [
          { lookupKey: "a", renderedName: "a" },
          { lookupKey: "b", renderedName: "b" },
        ],
        keymap: [
          ["a", 0],
          ["b", 1],
        ],
      });
    });

    it("serializes ambiguous keys as null and restores them", () => {
      const serialized = undeclared("id", "id").toSerialized();
      expect(serialized.keymap).toEqual([["id", null]]);

      const restored = RowMetadata.fromSerialized(serialized);
      expect(() => restored.lookup("id")).toThrow(AmbiguousColumnError);
      expect(restored.indexOf(1)).toBe(1);
    });

    it("keeps untranslated names", () => {
      const serialized = undeclared("users.id").toSerialized();
      expect(serialized.columns).toEqual([
        { lookupKey: "id", renderedName: "id", untranslated: "users.id" },
      ]);
      expect(serialized.keymap).toEqual([
        ["id", 0],
        ["users.id", 0],
      ]);
    });

    it("drops element keys", () => {
      const a = column("a");
      const restored = RowMetadata.fromSerialized(positional(a).toSerialized());
      expect(restored.has(a)).toBe(false);
      expect(restored.has("A")).toBe(true);
    });

    it("restores rows through JSON", () => {
      const row = rowOf(positional(column("a"), column("b")), [1, "x"]);
      const restored = Row.fromSerialized(
        JSON.parse(JSON.stringify(row.toSerialized())),
      );

      expect(restored.get("a")).toBe(1);
      expect(restored.get("b")).toBe("x");
      expect(restored.equals(row)).toBe(true);
    });

    it("rejects malformed input", () => {
      expect(() => RowMetadata.fromSerialized({ version: 2 })).toThrow(
        ConfigurationError,
      );
      expect(() =>
        RowMetadata.fromSerialized({
          version: 1,
          keys: ["a"],
          caseSensitive: false,
          columns: [{ lookupKey: "a", renderedName: "a" }],
          keymap: [["a", 4]],
        }),
      ).toThrow(ConfigurationError);
    });

    it("rejects rows whose values do not fit their metadata", () => {
      const metadata = positional(column("a"), column("b")).toSerialized();
      expect(() => Row.fromSerialized({ metadata, values: [1] })).toThrow(
        "Serialized row has 1 values but its metadata describes 2 columns",
      );
    });
  });
});
