/**
 * SQL Dialect Module
 *
 * Name handling and decoder selection per database.
 * Use `getDialect()` to get the rules for a dialect name.
 */

export { postgresDialect } from "./postgres";
export { sqliteDialect } from "./sqlite";
export type { Dialect, SqlDialect } from "./types";

import { postgresDialect } from "./postgres";
import { sqliteDialect } from "./sqlite";
import { type Dialect, type SqlDialect } from "./types";

const DIALECTS: Record<SqlDialect, Dialect> = {
  sqlite: sqliteDialect,
  postgres: postgresDialect,
};

/**
 * Gets the dialect rules for a given dialect name.
 */
export function getDialect(dialect: SqlDialect): Dialect {
  return DIALECTS[dialect];
}

/**
 * Derives a dialect with some rules replaced.
 *
 * @example
 * ```typescript
 * const upperCaseDriver = createDialect(sqliteDialect, {
 *   requiresNameNormalize: true,
 *   normalizeName: (name) => name.toLowerCase(),
 * });
 * ```
 */
export function createDialect(
  base: Dialect,
  overrides: Partial<Dialect>,
): Dialect {
  return { ...base, ...overrides };
}

/**
 * Default dialect used when none is specified.
 */
export const DEFAULT_DIALECT: SqlDialect = "sqlite";
