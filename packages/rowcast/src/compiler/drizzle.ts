import { Placeholder, type SQL } from "drizzle-orm";
import { SQLiteSyncDialect } from "drizzle-orm/sqlite-core";

import { ConfigurationError } from "../errors";
import {
  BindParameter,
  type ColumnElement,
  type TextColumnsOptions,
  TextClause,
  type TextualSelect,
} from "../sql/elements";

const sqliteCompiler = new SQLiteSyncDialect();

/**
 * Builds a text construct from a drizzle-orm `SQL` query.
 *
 * Parameters become positional bind parameters, so statements that differ
 * only in values share a cache key.
 */
export function fromDrizzle(query: SQL): TextClause;
export function fromDrizzle(
  query: SQL,
  columns: readonly (ColumnElement | string)[],
  options?: TextColumnsOptions,
): TextualSelect;
export function fromDrizzle(
  query: SQL,
  columns?: readonly (ColumnElement | string)[],
  options?: TextColumnsOptions,
): TextClause | TextualSelect {
  const compiled = sqliteCompiler.sqlToQuery(query);

  const parameters = new Map<string, BindParameter>();
  for (const [index, value] of compiled.params.entries()) {
    if (value instanceof Placeholder) {
      throw new ConfigurationError(
        `Placeholder '${value.name}' has no value`,
        { placeholder: value.name },
        {
          suggestion: `Inline the value into the sql\`\` template instead of sql.placeholder().`,
        },
      );
    }
    const name = `p${index + 1}`;
    parameters.set(name, new BindParameter(name, value));
  }

  const clause = new TextClause(compiled.sql, parameters, true);
  return columns === undefined ? clause : clause.columns(columns, options);
}
