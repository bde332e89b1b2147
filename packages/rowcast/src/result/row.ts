/**
 * Rows and row mappings.
 *
 * A Row is an immutable, positionally addressed sequence of decoded values.
 * Names and declaring elements are resolved through the shared RowMetadata.
 * A RowMapping is a second view over the same values that accepts column
 * keys only.
 */
import { z } from "zod";

import type { ColumnKey } from "../compiler/types";
import type { RawRow } from "../driver/types";
import {
  ConfigurationError,
  InvalidRequestError,
  NoSuchColumnError,
  RowAttributeError,
} from "../errors";
import { validateConfig } from "../errors/validation";
import type { ValueDecoder } from "../sql/types";
import { compareSequences, stableKey } from "../utils/values";
import {
  type RowKey,
  RowMetadata,
  type SerializedRowMetadata,
} from "./row-metadata";

// ============================================================
// Serialized Form
// ============================================================

const serializedRowSchema = z.object({
  metadata: z.unknown(),
  values: z.array(z.unknown()),
});

export type SerializedRow = Readonly<{
  metadata: SerializedRowMetadata;
  values: readonly unknown[];
}>;

function decode(
  raw: RawRow,
  decoders: readonly (ValueDecoder | undefined)[] | undefined,
): readonly unknown[] {
  if (decoders === undefined) return [...raw];
  return raw.map((value, index) => {
    const decoder = decoders[index];
    return decoder === undefined ? value : decoder(value);
  });
}

function renderValue(value: unknown): string {
  if (typeof value === "string") return `'${value}'`;
  if (typeof value === "bigint") return `${value}n`;
  if (value instanceof Date) return value.toISOString();
  return String(value);
}

// ============================================================
// Row
// ============================================================

export class Row implements Iterable<unknown> {
  /** Decoded values by position */
  readonly [index: number]: unknown;

  readonly #metadata: RowMetadata;
  readonly #data: readonly unknown[];

  /**
   * Values are decoded once, here: each raw value passes through the
   * decoder at its position.
   */
  constructor(
    metadata: RowMetadata,
    raw: RawRow,
    decoders?: readonly (ValueDecoder | undefined)[],
  ) {
    this.#metadata = metadata;
    this.#data = Object.freeze(decode(raw, decoders));
    for (const [index, value] of this.#data.entries()) {
      Object.defineProperty(this, index, { value, enumerable: true });
    }
    Object.freeze(this);
  }

  get metadata(): RowMetadata {
    return this.#metadata;
  }

  get length(): number {
    return this.#data.length;
  }

  /**
   * Returns the value at `index`; negative indexes count from the end.
   *
   * @throws NoSuchColumnError when the index is out of range
   */
  at(index: number): unknown {
    const normalized = index < 0 ? this.#data.length + index : index;
    if (
      !Number.isInteger(normalized) ||
      normalized < 0 ||
      normalized >= this.#data.length
    ) {
      throw new NoSuchColumnError(index);
    }
    return this.#data[normalized];
  }

  slice(start?: number, end?: number): readonly unknown[] {
    return this.#data.slice(start, end);
  }

  /**
   * Returns the value for a position, name or declaring element.
   *
   * @throws NoSuchColumnError when the key is unknown
   * @throws AmbiguousColumnError when the key matches several columns
   */
  get(key: RowKey): unknown {
    if (typeof key === "number") {
      return this.at(key);
    }
    return this.#data[this.#metadata.indexOf(key)];
  }

  /**
   * Attribute-style access by column name.
   *
   * @throws RowAttributeError when no column has the name
   */
  attr(name: string): unknown {
    try {
      return this.get(name);
    } catch (error) {
      if (error instanceof NoSuchColumnError) {
        throw new RowAttributeError(name, { cause: error });
      }
      throw error;
    }
  }

  /** True when `key` is a key of this row, even an ambiguous one. */
  has(key: RowKey): boolean {
    return this.#metadata.has(key);
  }

  /** True when `value` is one of the row's values. */
  includes(value: unknown): boolean {
    return this.#data.includes(value);
  }

  /** Names of the columns that can be read by name. */
  get fields(): readonly string[] {
    return this.#metadata.fields;
  }

  get mapping(): RowMapping {
    return new RowMapping(this.#metadata, this.#data);
  }

  toObject(): Record<string, unknown> {
    return this.mapping.toObject();
  }

  toArray(): unknown[] {
    return [...this.#data];
  }

  [Symbol.iterator](): Iterator<unknown> {
    return this.#data[Symbol.iterator]();
  }

  /**
   * Compares values only; the metadata of either row is ignored.
   */
  equals(other: Row | readonly unknown[]): boolean {
    return this.compare(other) === 0;
  }

  compare(other: Row | readonly unknown[]): number {
    const values = other instanceof Row ? other.#data : other;
    return compareSequences(this.#data, values);
  }

  /**
   * A string equal for rows with equal values, usable as a Map key.
   */
  hashKey(): string {
    return stableKey(this.#data);
  }

  toString(): string {
    return `(${this.#data.map((value) => renderValue(value)).join(", ")})`;
  }

  toSerialized(): SerializedRow {
    return {
      metadata: this.#metadata.toSerialized(),
      values: [...this.#data],
    };
  }

  /**
   * Restores a row; its metadata keeps name keys only.
   *
   * @throws ConfigurationError when `data` is not a serialized row
   */
  static fromSerialized(data: unknown): Row {
    const parsed = validateConfig(serializedRowSchema, data, "serialized row");
    const metadata = RowMetadata.fromSerialized(parsed.metadata);
    if (parsed.values.length !== metadata.size) {
      throw new ConfigurationError(
        `Serialized row has ${parsed.values.length} values but its metadata describes ${metadata.size} columns`,
        { values: parsed.values.length, columns: metadata.size },
      );
    }
    return new Row(metadata, parsed.values);
  }
}

// ============================================================
// Row Mapping
// ============================================================

/**
 * Mapping view of a row. Integer keys are rejected so that positions and
 * names cannot be confused.
 */
export class RowMapping implements Iterable<string> {
  readonly #metadata: RowMetadata;
  readonly #data: readonly unknown[];

  constructor(metadata: RowMetadata, data: readonly unknown[]) {
    this.#metadata = metadata;
    this.#data = data;
  }

  /**
   * @throws InvalidRequestError for integer keys
   * @throws NoSuchColumnError when the key is unknown
   * @throws AmbiguousColumnError when the key matches several columns
   */
  get(key: ColumnKey | number): unknown {
    if (typeof key === "number") {
      throw new InvalidRequestError(
        `RowMapping does not accept integer keys (got ${key})`,
        { key },
        { suggestion: `Use row.at(${key}) for positional access.` },
      );
    }
    return this.#data[this.#metadata.indexOf(key)];
  }

  has(key: ColumnKey | number): boolean {
    return typeof key !== "number" && this.#metadata.has(key);
  }

  keys(): readonly string[] {
    return this.#metadata.keys;
  }

  values(): unknown[] {
    return [...this.#data];
  }

  /** Key/value pairs in declared key order. */
  entries(): [string, unknown][] {
    return this.#metadata.keys.map((key, index) => [key, this.#data[index]]);
  }

  get size(): number {
    return this.#data.length;
  }

  [Symbol.iterator](): Iterator<string> {
    return this.#metadata.keys[Symbol.iterator]();
  }

  toObject(): Record<string, unknown> {
    return Object.fromEntries(this.entries());
  }
}
