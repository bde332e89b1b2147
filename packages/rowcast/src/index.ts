/**
 * rowcast: the execution-result layer of a SQL toolkit.
 *
 * @example
 * ```typescript
 * import Database from "better-sqlite3";
 * import { column, createBetterSqliteConnection, createExecutor, text } from "rowcast";
 *
 * const executor = createExecutor({
 *   connection: createBetterSqliteConnection(new Database(":memory:")),
 * });
 *
 * const id = column("id");
 * const result = executor.execute(
 *   text("SELECT 1 AS id, 'Ada' AS name").columns([id, column("name")]),
 * );
 * const row = result.one();
 * row.get(id); // 1
 * row.get("name"); // "Ada"
 * ```
 */

// ============================================================
// SQL Constructs
// ============================================================

export * from "./sql";

// ============================================================
// Cache Keys
// ============================================================

export {
  AnonMap,
  CacheKey,
  type CompareMode,
  type CompareOptions,
  compareStructure,
  generateCacheKey,
  LruCache,
} from "./cache-key";

// ============================================================
// Compilation
// ============================================================

export {
  type ColumnKey,
  type CompiledStatement,
  createCompiledStatement,
  fromDrizzle,
  type ResultColumn,
  resultColumnFor,
  type StatementCompiler,
  TextCompiler,
} from "./compiler";

// ============================================================
// Dialects and Drivers
// ============================================================

export {
  createDialect,
  DEFAULT_DIALECT,
  type Dialect,
  getDialect,
  postgresDialect,
  type SqlDialect,
  sqliteDialect,
} from "./dialect";
export {
  createBetterSqliteConnection,
  type DriverConnection,
  type DriverCursor,
  type DriverParameters,
  type RawColumnDescriptor,
  type RawRow,
} from "./driver";

// ============================================================
// Results
// ============================================================

export * from "./result";

// ============================================================
// Execution
// ============================================================

export {
  createExecutor,
  type ExecutionHooks,
  Executor,
  type ExecutorCacheStats,
  type ExecutorOptions,
  type HookContext,
  type QueryHookContext,
} from "./execution";

// ============================================================
// Configuration
// ============================================================

export {
  DEFAULT_ARRAY_SIZE,
  DEFAULT_GROWTH_FACTOR,
  DEFAULT_INITIAL_BUFFER_SIZE,
  DEFAULT_MAX_ROW_BUFFER,
  type ExecutionOptions,
  type ExecutionOptionsInput,
  executionOptionsSchema,
  type ExecutorCacheOptions,
  parseExecutionOptions,
} from "./config";

// ============================================================
// Errors
// ============================================================

export {
  AmbiguousColumnError,
  ConfigurationError,
  DatabaseOperationError,
  type ErrorCategory,
  getErrorSuggestion,
  InvalidRequestError,
  isRowcastError,
  isSystemError,
  isUserRecoverable,
  MultipleResultsError,
  NoResultError,
  NoSuchColumnError,
  ResourceClosedError,
  RowAttributeError,
  RowcastError,
  type ValidationIssue,
} from "./errors";

// ============================================================
// Logging
// ============================================================

export { createLogger, type WarningHandler } from "./logging";
