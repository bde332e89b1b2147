/**
 * Resolves row metadata from declared result columns and the driver's
 * column descriptors.
 *
 * Strategies, in priority order:
 *
 * 1. `positional`: declared columns are ordered and as many as the driver
 *    reports; position i is declared column i. Raw names are not read.
 * 2. `textual_positional`: literal SQL declared its columns in order; the
 *    first N raw columns take them by position.
 * 3. `name`: raw names are matched to declared rendered names.
 * 4. `none`: no declared columns; each raw column is keyed by its own name.
 */
import type { ColumnKey, ResultColumn } from "../compiler/types";
import type { Dialect } from "../dialect/types";
import type { RawColumnDescriptor } from "../driver/types";
import { describeKey, InvalidRequestError } from "../errors";
import { createLogger, warnInDevelopment, type WarningHandler } from "../logging";
import { NULLTYPE, type RawTypeCode, type SqlType } from "../sql/types";
import {
  type ColumnRecord,
  type KeymapRecord,
  type MatchStrategy,
  RowMetadata,
} from "./row-metadata";

const log = createLogger("result");

export type ResolveRowMetadataInput = Readonly<{
  /** Declared columns; absent for literal SQL without declared columns */
  resultColumns?: readonly ResultColumn[];
  columnsAreOrdered?: boolean;
  textualOrdered?: boolean;
  looseColumnNameMatching?: boolean;
  description: readonly RawColumnDescriptor[];
  dialect: Dialect;
  /** Receives warning-level diagnostics */
  warn?: WarningHandler;
}>;

/**
 * Picks the matching strategy for `input`.
 */
export function selectMatchStrategy(input: ResolveRowMetadataInput): MatchStrategy {
  const declaredCount = input.resultColumns?.length ?? 0;
  if (declaredCount === 0) {
    return "none";
  }
  if (
    input.columnsAreOrdered === true &&
    input.textualOrdered !== true &&
    declaredCount === input.description.length
  ) {
    return "positional";
  }
  if (input.textualOrdered === true) {
    return "textual_positional";
  }
  return "name";
}

/**
 * Builds row metadata for one (declared columns, raw descriptors) pair.
 *
 * @throws InvalidRequestError when an ordered textual column list names the
 *   same element twice
 */
export function resolveRowMetadata(input: ResolveRowMetadataInput): RowMetadata {
  const strategy = selectMatchStrategy(input);
  const resultColumns = input.resultColumns ?? [];
  const { dialect } = input;
  log(
    "resolving %d raw columns with strategy %s",
    input.description.length,
    strategy,
  );

  let keys: readonly string[];
  let records: readonly ColumnRecord[];

  if (strategy === "positional") {
    keys = resultColumns.map((column) => column.name);
    records = resultColumns.map((column, index): ColumnRecord => ({
      __type: "column",
      index,
      objects: column.objects,
      lookupKey: foldName(column.name, dialect),
      renderedName: column.renderedName,
      decoder: dialect.getResultDecoder(
        column.type,
        input.description[index]?.typeCode,
      ),
      untranslated: undefined,
    }));
  } else {
    const raw = namesFromDescription(input.description, dialect);
    keys = raw.map((column) => column.key);
    const matched = matchRawColumns(strategy, raw, input);
    records = matched.map((match): ColumnRecord => ({
      __type: "column",
      index: match.raw.index,
      objects: match.objects,
      lookupKey: match.raw.name,
      renderedName: match.raw.name,
      decoder: dialect.getResultDecoder(match.type, match.raw.typeCode),
      untranslated: match.raw.untranslated,
    }));
  }

  const keymap = buildKeymap(records, resultColumns.length, dialect);

  return new RowMetadata({
    keys,
    columns: records,
    keymap,
    caseSensitive: dialect.caseSensitive,
    strategy,
  });
}

// ============================================================
// Raw Names
// ============================================================

type RawColumn = Readonly<{
  index: number;
  /** Key exposed for the column (normalized, not folded) */
  key: string;
  /** Lookup name (normalized and folded) */
  name: string;
  untranslated: string | undefined;
  typeCode: RawTypeCode;
}>;

function foldName(name: string, dialect: Dialect): string {
  return dialect.caseSensitive ? name : name.toLowerCase();
}

function namesFromDescription(
  description: readonly RawColumnDescriptor[],
  dialect: Dialect,
): RawColumn[] {
  return description.map((descriptor, index) => {
    let name = descriptor.name;
    let untranslated: string | undefined;

    if (dialect.translateColumnName !== undefined) {
      [name, untranslated] = dialect.translateColumnName(name);
    }
    if (dialect.requiresNameNormalize) {
      name = dialect.normalizeName(name);
    }

    return {
      index,
      key: name,
      name: foldName(name, dialect),
      untranslated,
      typeCode: descriptor.typeCode,
    };
  });
}

// ============================================================
// Matching
// ============================================================

type RawMatch = Readonly<{
  raw: RawColumn;
  objects: readonly ColumnKey[] | undefined;
  type: SqlType;
}>;

function matchRawColumns(
  strategy: MatchStrategy,
  raw: readonly RawColumn[],
  input: ResolveRowMetadataInput,
): RawMatch[] {
  const resultColumns = input.resultColumns ?? [];

  switch (strategy) {
    case "textual_positional": {
      return matchTextualByPosition(
        raw,
        resultColumns,
        input.warn ?? warnInDevelopment,
      );
    }
    case "name": {
      return matchByName(
        raw,
        resultColumns,
        input.looseColumnNameMatching === true,
        input.dialect,
      );
    }
    case "none":
    case "positional": {
      return raw.map((column) => ({
        raw: column,
        objects: undefined,
        type: NULLTYPE,
      }));
    }
  }
}

function matchTextualByPosition(
  raw: readonly RawColumn[],
  resultColumns: readonly ResultColumn[],
  warn: WarningHandler,
): RawMatch[] {
  if (resultColumns.length > raw.length) {
    warn(
      `Number of columns in textual SQL (${raw.length}) is smaller than number of columns requested (${resultColumns.length})`,
    );
  }

  const seen = new Set<ColumnKey>();
  return raw.map((column) => {
    const declared = resultColumns[column.index];
    if (declared === undefined) {
      return { raw: column, objects: undefined, type: NULLTYPE };
    }

    const primary = declared.objects[0];
    if (primary !== undefined) {
      if (seen.has(primary)) {
        throw new InvalidRequestError(
          `Duplicate column expression requested in textual SQL: ${describeKey(primary)}`,
          { column: describeKey(primary) },
          { suggestion: `Declare each column once in text().columns().` },
        );
      }
      seen.add(primary);
    }
    return { raw: column, objects: declared.objects, type: declared.type };
  });
}

type NameMatch = Readonly<{
  objects: readonly ColumnKey[];
  type: SqlType;
}>;

/**
 * Maps folded rendered names (and, with loose matching, every alternate
 * name) to declared columns. A name declared twice collects the alternate
 * keys of both columns, so every one of them ends up ambiguous.
 */
function createDescriptionMatchMap(
  resultColumns: readonly ResultColumn[],
  loose: boolean,
  dialect: Dialect,
): Map<string, NameMatch> {
  const matches = new Map<string, NameMatch>();

  for (const column of resultColumns) {
    const key = foldName(column.renderedName, dialect);
    const existing = matches.get(key);
    matches.set(
      key,
      existing === undefined
        ? { objects: column.objects, type: column.type }
        : { objects: [...existing.objects, ...column.objects], type: existing.type },
    );

    if (loose) {
      for (const object of column.objects) {
        if (typeof object !== "string") continue;
        const alternate = foldName(object, dialect);
        if (!matches.has(alternate)) {
          matches.set(alternate, { objects: column.objects, type: column.type });
        }
      }
    }
  }
  return matches;
}

function matchByName(
  raw: readonly RawColumn[],
  resultColumns: readonly ResultColumn[],
  loose: boolean,
  dialect: Dialect,
): RawMatch[] {
  const matches = createDescriptionMatchMap(resultColumns, loose, dialect);
  return raw.map((column) => {
    const match = matches.get(column.name);
    return match === undefined
      ? { raw: column, objects: undefined, type: NULLTYPE }
      : { raw: column, objects: match.objects, type: match.type };
  });
}

// ============================================================
// Keymap
// ============================================================

function foldKey(key: ColumnKey, dialect: Dialect): ColumnKey {
  return typeof key === "string" ? foldName(key, dialect) : key;
}

/**
 * Builds the keymap. Name keys take precedence over alternate keys; any key
 * claimed by more than one position is marked ambiguous. Conflicts are
 * computed over the whole column list before any record is stored, so the
 * result does not depend on column order.
 */
function buildKeymap(
  records: readonly ColumnRecord[],
  declaredCount: number,
  dialect: Dialect,
): Map<ColumnKey, KeymapRecord> {
  const keymap = new Map<ColumnKey, KeymapRecord>();
  const byKey = new Map<ColumnKey, KeymapRecord>();
  for (const record of records) {
    byKey.set(record.lookupKey, record);
  }

  if (byKey.size === declaredCount) {
    for (const record of records) {
      for (const object of record.objects ?? []) {
        keymap.set(object, record);
      }
    }
  } else {
    const indexByKey = new Map<ColumnKey, number>();
    const duplicates = new Set<ColumnKey>();
    for (const record of records) {
      for (const key of [record.renderedName, ...(record.objects ?? [])]) {
        const folded = foldKey(key, dialect);
        const index = indexByKey.get(folded);
        if (index === undefined) {
          indexByKey.set(folded, record.index);
        } else if (index !== record.index) {
          duplicates.add(folded);
        }
      }
    }

    for (const record of records) {
      for (const object of record.objects ?? []) {
        if (!duplicates.has(foldKey(object, dialect))) {
          keymap.set(object, record);
        }
      }
    }
    for (const key of duplicates) {
      byKey.set(key, { __type: "ambiguous", key });
    }
  }

  for (const [key, record] of byKey) {
    keymap.set(key, record);
  }

  if (declaredCount === 0 && dialect.translateColumnName !== undefined) {
    for (const record of records) {
      if (record.untranslated === undefined) continue;
      const target = keymap.get(record.lookupKey);
      if (target !== undefined) keymap.set(record.untranslated, target);
    }
  }

  return keymap;
}
