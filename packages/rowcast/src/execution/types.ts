import type { StatementCompiler } from "../compiler/types";
import type { ExecutionOptionsInput } from "../config";
import type { Dialect, SqlDialect } from "../dialect/types";
import type { DriverConnection, DriverParameters } from "../driver/types";
import type { WarningHandler } from "../logging";

// ============================================================
// Hook Types
// ============================================================

/**
 * Context passed to every hook.
 */
export type HookContext = Readonly<{
  /** Unique ID for this execution */
  operationId: string;
  /** Timestamp when the execution started */
  startedAt: Date;
}>;

/**
 * Query hook context with SQL information.
 */
export type QueryHookContext = HookContext &
  Readonly<{
    /** The SQL text sent to the driver */
    sql: string;
    /** Driver parameters */
    params: DriverParameters;
  }>;

/**
 * Observability hooks for statement execution.
 *
 * `onQueryEnd` fires once the driver has executed the statement; rows may
 * still be pending. `onError` also receives driver failures raised later,
 * while rows are fetched.
 *
 * @example
 * ```typescript
 * const hooks: ExecutionHooks = {
 *   onQueryStart: (ctx) => {
 *     console.log(`[${ctx.operationId}] Query: ${ctx.sql}`);
 *   },
 *   onQueryEnd: (ctx, result) => {
 *     console.log(`[${ctx.operationId}] Executed in ${result.durationMs}ms`);
 *   },
 *   onError: (ctx, error) => {
 *     console.error(`[${ctx.operationId}] Error:`, error);
 *   },
 * };
 * ```
 */
export type ExecutionHooks = Readonly<{
  /** Called before the statement is sent to the driver */
  onQueryStart?: (ctx: QueryHookContext) => void;
  /** Called after the driver executed the statement */
  onQueryEnd?: (
    ctx: QueryHookContext,
    result: Readonly<{
      durationMs: number;
      returnsRows: boolean;
      cacheHit: boolean;
    }>,
  ) => void;
  /** Called when the driver fails */
  onError?: (ctx: HookContext, error: Error) => void;
}>;

// ============================================================
// Executor Options
// ============================================================

export type ExecutorOptions = Readonly<{
  connection: DriverConnection;
  /** Dialect rules, or the name of a built-in dialect. Defaults to sqlite */
  dialect?: Dialect | SqlDialect;
  /** Compiler for statements; defaults to the text compiler */
  compiler?: StatementCompiler;
  /** Maximum number of compiled statements kept */
  compiledCacheSize?: number;
  /** Maximum number of row metadata objects kept */
  metadataCacheSize?: number;
  hooks?: ExecutionHooks;
  /** Defaults for every execution; per-call options override them */
  executionOptions?: ExecutionOptionsInput;
  /** Receives warning-level diagnostics */
  warn?: WarningHandler;
}>;

/**
 * Hit and miss counters of the executor caches.
 */
export type ExecutorCacheStats = Readonly<{
  compiledHits: number;
  compiledMisses: number;
  metadataHits: number;
  metadataMisses: number;
  uncacheable: number;
}>;
