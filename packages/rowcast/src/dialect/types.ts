import type { RawTypeCode, SqlType, ValueDecoder } from "../sql/types";

/**
 * Names of the built-in dialects.
 */
export type SqlDialect = "sqlite" | "postgres";

/**
 * Name handling and decoding rules of one database.
 */
export type Dialect = Readonly<{
  name: string;
  /**
   * When false, names are folded to lower case before matching and string
   * lookups fall back to their folded form.
   */
  caseSensitive: boolean;
  /** Whether raw column names must pass through `normalizeName` */
  requiresNameNormalize: boolean;
  normalizeName: (name: string) => string;
  /**
   * Rewrites a raw column name; returns the translated name and, when it
   * changed, the original.
   */
  translateColumnName:
    | ((name: string) => readonly [string, string | undefined])
    | undefined;
  /** Chooses the decoder for a column of `type` reported under `typeCode` */
  getResultDecoder: (
    type: SqlType,
    typeCode: RawTypeCode,
  ) => ValueDecoder | undefined;
}>;
