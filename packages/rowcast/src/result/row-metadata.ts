/**
 * Row metadata: the keymap shared by every row of one result.
 *
 * Every valid lookup key (position, name, declaring element, label) maps to
 * a column record. Keys that more than one column claims map to an
 * ambiguous record, which raises on every read.
 */
import { z } from "zod";

import type { ColumnKey, ResultColumn } from "../compiler/types";
import type { RawRow } from "../driver/types";
import { AmbiguousColumnError, describeKey, NoSuchColumnError } from "../errors";
import { validateConfig } from "../errors/validation";
import type { ColumnElement } from "../sql/elements";
import type { ValueDecoder } from "../sql/types";

// ============================================================
// Types
// ============================================================

/**
 * Key accepted by row lookups: a position or a column key.
 */
export type RowKey = number | ColumnKey;

/**
 * How declared columns were matched to the driver's columns.
 */
export type MatchStrategy =
  | "positional"
  | "textual_positional"
  | "name"
  | "none";

export type ColumnRecord = Readonly<{
  __type: "column";
  /** Position in the rows produced under this metadata */
  index: number;
  /** Declared alternate keys; undefined when restored from serialized form */
  objects: readonly ColumnKey[] | undefined;
  /** Name key, folded when the dialect is case-insensitive */
  lookupKey: string;
  renderedName: string;
  /** Undefined means values pass through unchanged */
  decoder: ValueDecoder | undefined;
  /** Raw driver name, when the dialect rewrote it */
  untranslated: string | undefined;
}>;

export type AmbiguousRecord = Readonly<{
  __type: "ambiguous";
  key: ColumnKey;
}>;

export type KeymapRecord = ColumnRecord | AmbiguousRecord;

export type RowMetadataInit = Readonly<{
  keys: readonly string[];
  columns: readonly ColumnRecord[];
  keymap: ReadonlyMap<ColumnKey, KeymapRecord>;
  caseSensitive: boolean;
  /** Raw positions to project from each driver row */
  tupleFilter?: readonly number[];
  strategy?: MatchStrategy;
}>;

// ============================================================
// Serialized Form
// ============================================================

export const serializedRowMetadataSchema = z
  .object({
    version: z.literal(1),
    keys: z.array(z.string()),
    caseSensitive: z.boolean(),
    columns: z.array(
      z.object({
        lookupKey: z.string(),
        renderedName: z.string(),
        untranslated: z.string().optional(),
      }),
    ),
    keymap: z.array(
      z.tuple([z.string(), z.number().int().nonnegative().nullable()]),
    ),
  })
  .refine(
    (data) =>
      data.keys.length === data.columns.length &&
      data.keymap.every(
        ([, index]) => index === null || index < data.columns.length,
      ),
    { message: "keymap indexes must refer to declared columns" },
  );

/**
 * Index-only form of row metadata. Declared-element keys and decoders do
 * not survive serialization.
 */
export type SerializedRowMetadata = z.output<typeof serializedRowMetadataSchema>;

// ============================================================
// Row Metadata
// ============================================================

export class RowMetadata {
  readonly #keys: readonly string[];
  readonly #columns: readonly ColumnRecord[];
  readonly #keymap: ReadonlyMap<ColumnKey, KeymapRecord>;
  readonly #caseSensitive: boolean;
  readonly #tupleFilter: readonly number[] | undefined;
  readonly #decoders: readonly (ValueDecoder | undefined)[];
  readonly #strategy: MatchStrategy | undefined;

  constructor(init: RowMetadataInit) {
    this.#keys = init.keys;
    this.#columns = init.columns;
    this.#keymap = init.keymap;
    this.#caseSensitive = init.caseSensitive;
    this.#tupleFilter = init.tupleFilter;
    this.#decoders = init.columns.map((column) => column.decoder);
    this.#strategy = init.strategy;
  }

  /** Declared keys, in column order. */
  get keys(): readonly string[] {
    return this.#keys;
  }

  get columns(): readonly ColumnRecord[] {
    return this.#columns;
  }

  get size(): number {
    return this.#columns.length;
  }

  get caseSensitive(): boolean {
    return this.#caseSensitive;
  }

  /** Set on metadata built by a projection. */
  get tupleFilter(): readonly number[] | undefined {
    return this.#tupleFilter;
  }

  /** Decoders aligned with row positions. */
  get decoders(): readonly (ValueDecoder | undefined)[] {
    return this.#decoders;
  }

  /** Undefined for projected or restored metadata. */
  get strategy(): MatchStrategy | undefined {
    return this.#strategy;
  }

  /**
   * Keys a row exposes as fields: every declared key that is not ambiguous.
   */
  get fields(): readonly string[] {
    return this.#keys.filter(
      (key) => this.#find(key)?.__type === "column",
    );
  }

  has(key: RowKey): boolean {
    return this.#find(key) !== undefined;
  }

  /**
   * Returns the column record for `key`.
   *
   * @throws NoSuchColumnError when no column has the key
   * @throws AmbiguousColumnError when several columns claim the key
   */
  lookup(key: RowKey): ColumnRecord {
    const record = this.#find(key);
    if (record === undefined) {
      throw new NoSuchColumnError(key);
    }
    if (record.__type === "ambiguous") {
      throw new AmbiguousColumnError(describeKey(key));
    }
    return record;
  }

  indexOf(key: RowKey): number {
    return this.lookup(key).index;
  }

  /**
   * Projects a raw driver row to the positions this metadata describes.
   */
  filterRow(raw: RawRow): RawRow {
    const filter = this.#tupleFilter;
    if (filter === undefined) return raw;
    return filter.map((index) => raw[index]);
  }

  #find(key: RowKey): KeymapRecord | undefined {
    if (typeof key === "number") {
      return Number.isInteger(key) ? this.#columns.at(key) : undefined;
    }
    const record = this.#keymap.get(key);
    if (record !== undefined || typeof key !== "string" || this.#caseSensitive) {
      return record;
    }
    return this.#keymap.get(key.toLowerCase());
  }

  // ============================================================
  // Derived Metadata
  // ============================================================

  /**
   * Builds the metadata of a projection onto `keys`.
   *
   * Positions in the projection follow the order of `keys`; raw rows are
   * filtered through the projection before decoding.
   */
  reduce(keys: readonly RowKey[]): RowMetadata {
    const records = keys.map((key) => this.lookup(key));
    const rawIndexes = records.map(
      (record) => this.#tupleFilter?.[record.index] ?? record.index,
    );

    const columns = records.map(
      (record, index): ColumnRecord => ({ ...record, index }),
    );
    const keymap = new Map<ColumnKey, KeymapRecord>();
    for (const column of columns) {
      keymap.set(column.lookupKey, column);
      for (const object of column.objects ?? []) {
        keymap.set(object, column);
      }
    }

    return new RowMetadata({
      keys: records.map(
        (record) => this.#keys[record.index] ?? record.lookupKey,
      ),
      columns,
      keymap,
      caseSensitive: this.#caseSensitive,
      tupleFilter: rawIndexes,
    });
  }

  /**
   * Re-points declared-element keys to the columns of another instance of
   * the same statement shape.
   *
   * `resultColumns` are the declared columns this metadata was resolved
   * from; `invokedColumns` are the selected columns of the statement being
   * executed, in the same order. Each invoked column takes the record of
   * the element that declared its counterpart, or of its name when that
   * element has no usable record.
   */
  adaptTo(
    resultColumns: readonly ResultColumn[],
    invokedColumns: readonly ColumnElement[],
  ): RowMetadata {
    if (resultColumns.length === 0) return this;

    const keymap = new Map(this.#keymap);
    for (const [index, existing] of resultColumns.entries()) {
      const invoked = invokedColumns[index];
      if (invoked === undefined) break;
      const record =
        existing.objects
          .filter((key) => typeof key !== "string")
          .map((key) => this.#find(key))
          .find((found) => found?.__type === "column") ??
        this.#find(existing.name);
      if (record !== undefined) {
        keymap.set(invoked, record);
      }
    }

    return new RowMetadata({
      keys: this.#keys,
      columns: this.#columns,
      keymap,
      caseSensitive: this.#caseSensitive,
      ...(this.#tupleFilter !== undefined && { tupleFilter: this.#tupleFilter }),
      ...(this.#strategy !== undefined && { strategy: this.#strategy }),
    });
  }

  // ============================================================
  // Serialization
  // ============================================================

  /**
   * Degrades to an index-only form. Element keys are dropped; name keys,
   * including ambiguous ones, are kept. Positions refer to rows as this
   * metadata produces them, after any projection.
   */
  toSerialized(): SerializedRowMetadata {
    const keymap: [string, number | null][] = [];
    for (const [key, record] of this.#keymap) {
      if (typeof key !== "string") continue;
      keymap.push([key, record.__type === "column" ? record.index : null]);
    }

    return {
      version: 1,
      keys: [...this.#keys],
      caseSensitive: this.#caseSensitive,
      columns: this.#columns.map((column) => ({
        lookupKey: column.lookupKey,
        renderedName: column.renderedName,
        ...(column.untranslated !== undefined && {
          untranslated: column.untranslated,
        }),
      })),
      keymap,
    };
  }

  /**
   * Restores metadata from its serialized form. Every decoder is a
   * pass-through: serialized rows carry decoded values.
   *
   * @throws ConfigurationError when `data` is not serialized row metadata
   */
  static fromSerialized(data: unknown): RowMetadata {
    const parsed = validateConfig(
      serializedRowMetadataSchema,
      data,
      "serialized row metadata",
    );

    const columns = parsed.columns.map(
      (column, index): ColumnRecord => ({
        __type: "column",
        index,
        objects: undefined,
        lookupKey: column.lookupKey,
        renderedName: column.renderedName,
        decoder: undefined,
        untranslated: column.untranslated,
      }),
    );

    const keymap = new Map<ColumnKey, KeymapRecord>();
    for (const [key, index] of parsed.keymap) {
      const column = index === null ? undefined : columns[index];
      keymap.set(key, column ?? { __type: "ambiguous", key });
    }

    return new RowMetadata({
      keys: parsed.keys,
      columns,
      keymap,
      caseSensitive: parsed.caseSensitive,
    });
  }
}
