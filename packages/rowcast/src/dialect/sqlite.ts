/**
 * SQLite Dialect
 *
 * SQLite reports declared column types as strings and stores booleans,
 * dates and JSON as integers or text, so every logical type that has a
 * decoder uses it. Identifiers are case-insensitive.
 */
import { type Dialect } from "./types";

/**
 * Strips a `table.` prefix that some SQLite builds leave on column names of
 * compound selects.
 */
const DOTTED_NAME = /^[\w$]+\.([\w$]+)$/;

function translateSqliteColumnName(
  name: string,
): readonly [string, string | undefined] {
  const match = DOTTED_NAME.exec(name);
  const column = match?.[1];
  return column === undefined ? [name, undefined] : [column, name];
}

export const sqliteDialect: Dialect = {
  name: "sqlite",
  caseSensitive: false,
  requiresNameNormalize: false,
  normalizeName: (name) => name,
  translateColumnName: translateSqliteColumnName,
  getResultDecoder: (type, typeCode) => type.resultDecoder(typeCode),
};
