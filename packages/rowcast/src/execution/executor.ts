/**
 * Statement executor.
 *
 * Ties the layer together: cache key, compiled statement cache, driver
 * execution, row metadata cache and the result object.
 */
import { type CacheKey, generateCacheKey } from "../cache-key/cache-key";
import { LruCache } from "../cache-key/lru-cache";
import { TextCompiler } from "../compiler/text-compiler";
import type { CompiledStatement, StatementCompiler } from "../compiler/types";
import {
  type ExecutionOptions,
  type ExecutionOptionsInput,
  parseExecutionOptions,
  parseExecutorCacheOptions,
} from "../config";
import { getDialect } from "../dialect";
import type { Dialect } from "../dialect/types";
import type {
  DriverConnection,
  DriverCursor,
  RawColumnDescriptor,
} from "../driver/types";
import { DatabaseOperationError, isRowcastError } from "../errors";
import { createLogger, type WarningHandler } from "../logging";
import { CursorResult } from "../result/cursor-result";
import { resolveRowMetadata } from "../result/resolver";
import type { RowMetadata } from "../result/row-metadata";
import {
  type BindParameter,
  type ClauseElement,
  type ColumnElement,
  Select,
  TextualSelect,
} from "../sql/elements";
import { generateId } from "../utils/id";
import type {
  ExecutionHooks,
  ExecutorCacheStats,
  ExecutorOptions,
  QueryHookContext,
} from "./types";

const log = createLogger("executor");
const cacheLog = createLogger("cache");

type CompiledEntry = Readonly<{
  compiled: CompiledStatement;
  /** Bind parameters of the cache key the statement was compiled under */
  keyParameters: readonly BindParameter[];
}>;

type MetadataEntry = Readonly<{
  metadata: RowMetadata;
  /** The compiled statement the metadata was resolved from */
  compiled: CompiledStatement;
}>;

function descriptionSignature(
  description: readonly RawColumnDescriptor[],
): string {
  return JSON.stringify(
    description.map((descriptor) => [descriptor.name, descriptor.typeCode ?? null]),
  );
}

function selectedColumnsOf(statement: ClauseElement): readonly ColumnElement[] {
  if (statement instanceof Select || statement instanceof TextualSelect) {
    return statement.selectedColumns;
  }
  return [];
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Aligns the bind parameters of the invoked statement with those of the
 * compiled one. Both cache keys have the same shape, so parameters
 * correspond by position.
 */
function extractParameters(
  entry: CompiledEntry,
  cacheKey: CacheKey,
): readonly BindParameter[] {
  const replacements = new Map<BindParameter, BindParameter>();
  for (const [index, parameter] of entry.keyParameters.entries()) {
    const invoked = cacheKey.bindParameters[index];
    if (invoked !== undefined) {
      replacements.set(parameter, invoked);
    }
  }
  return entry.compiled.bindParameters.map(
    (parameter) => replacements.get(parameter) ?? parameter,
  );
}

// ============================================================
// Executor
// ============================================================

export class Executor {
  readonly #connection: DriverConnection;
  readonly #dialect: Dialect;
  readonly #compiler: StatementCompiler;
  readonly #hooks: ExecutionHooks;
  readonly #warn: WarningHandler | undefined;
  readonly #defaultOptionsInput: ExecutionOptionsInput;
  readonly #defaultOptions: ExecutionOptions;
  readonly #compiledCache: LruCache<string, CompiledEntry>;
  readonly #metadataCache: LruCache<string, MetadataEntry>;
  readonly #stats = {
    compiledHits: 0,
    compiledMisses: 0,
    metadataHits: 0,
    metadataMisses: 0,
    uncacheable: 0,
  };

  constructor(options: ExecutorOptions) {
    const cacheOptions = parseExecutorCacheOptions({
      ...(options.compiledCacheSize !== undefined && {
        compiledCacheSize: options.compiledCacheSize,
      }),
      ...(options.metadataCacheSize !== undefined && {
        metadataCacheSize: options.metadataCacheSize,
      }),
    });

    this.#connection = options.connection;
    this.#dialect =
      typeof options.dialect === "string" || options.dialect === undefined
        ? getDialect(options.dialect ?? "sqlite")
        : options.dialect;
    this.#compiler = options.compiler ?? new TextCompiler();
    this.#hooks = options.hooks ?? {};
    this.#warn = options.warn;
    this.#defaultOptionsInput = options.executionOptions ?? {};
    this.#defaultOptions = parseExecutionOptions(this.#defaultOptionsInput);
    this.#compiledCache = new LruCache(cacheOptions.compiledCacheSize);
    this.#metadataCache = new LruCache(cacheOptions.metadataCacheSize);
  }

  get dialect(): Dialect {
    return this.#dialect;
  }

  get cacheStats(): ExecutorCacheStats {
    return { ...this.#stats };
  }

  clearCaches(): void {
    this.#compiledCache.clear();
    this.#metadataCache.clear();
  }

  /**
   * Executes a statement and returns its result.
   *
   * @throws DatabaseOperationError when the driver fails
   * @throws ConfigurationError when `options` are invalid
   */
  execute(
    statement: ClauseElement,
    options?: ExecutionOptionsInput,
  ): CursorResult {
    const executionOptions =
      options === undefined
        ? this.#defaultOptions
        : parseExecutionOptions({ ...this.#defaultOptionsInput, ...options });

    const cacheKey = generateCacheKey(statement);
    if (cacheKey === undefined) {
      this.#stats.uncacheable++;
      cacheLog("statement is uncacheable: %s", statement.description);
    }
    const { compiled, extracted, cacheHit } = this.#compile(statement, cacheKey);
    const params = compiled.constructParams(extracted);

    const ctx: QueryHookContext = {
      operationId: generateId(),
      startedAt: new Date(),
      sql: compiled.sql,
      params,
    };
    this.#hooks.onQueryStart?.(ctx);
    log("[%s] %s", ctx.operationId, compiled.sql);

    const startTime = Date.now();
    let cursor: DriverCursor;
    try {
      cursor = this.#connection.execute(compiled.sql, params);
    } catch (error) {
      const wrapped = isRowcastError(error)
        ? error
        : new DatabaseOperationError(
            `Driver failed during execute: ${toError(error).message}`,
            { operation: "execute", statement: compiled.sql },
            { cause: error },
          );
      this.#hooks.onError?.(ctx, wrapped);
      throw wrapped;
    }

    const result = new CursorResult({
      cursor,
      options: executionOptions,
      statement: compiled.sql,
      resolveMetadata: (description) =>
        this.#metadataFor(statement, compiled, cacheKey, description),
      onError: (error) => {
        this.#hooks.onError?.(ctx, error);
      },
    });

    this.#hooks.onQueryEnd?.(ctx, {
      durationMs: Date.now() - startTime,
      returnsRows: result.returnsRows,
      cacheHit,
    });
    return result;
  }

  #compile(
    statement: ClauseElement,
    cacheKey: CacheKey | undefined,
  ): Readonly<{
    compiled: CompiledStatement;
    extracted: readonly BindParameter[] | undefined;
    cacheHit: boolean;
  }> {
    if (cacheKey === undefined) {
      return {
        compiled: this.#compiler.compile(statement, this.#dialect),
        extracted: undefined,
        cacheHit: false,
      };
    }

    const cached = this.#compiledCache.get(cacheKey.hash);
    if (cached !== undefined) {
      this.#stats.compiledHits++;
      return {
        compiled: cached.compiled,
        extracted: extractParameters(cached, cacheKey),
        cacheHit: true,
      };
    }

    this.#stats.compiledMisses++;
    const compiled = this.#compiler.compile(statement, this.#dialect);
    this.#compiledCache.set(cacheKey.hash, {
      compiled,
      keyParameters: cacheKey.bindParameters,
    });
    return { compiled, extracted: undefined, cacheHit: false };
  }

  #resolve(
    compiled: CompiledStatement,
    description: readonly RawColumnDescriptor[],
  ): RowMetadata {
    return resolveRowMetadata({
      resultColumns: compiled.resultColumns,
      columnsAreOrdered: compiled.columnsAreOrdered,
      textualOrdered: compiled.textualOrdered,
      looseColumnNameMatching: compiled.looseColumnNameMatching,
      description,
      dialect: this.#dialect,
      ...(this.#warn !== undefined && { warn: this.#warn }),
    });
  }

  /**
   * Returns cached metadata for the statement's shape and raw columns,
   * adapted to the invoked statement, or resolves and caches it.
   */
  #metadataFor(
    statement: ClauseElement,
    compiled: CompiledStatement,
    cacheKey: CacheKey | undefined,
    description: readonly RawColumnDescriptor[],
  ): RowMetadata {
    if (cacheKey === undefined) {
      return this.#resolve(compiled, description);
    }

    const key = `${cacheKey.hash}|${descriptionSignature(description)}`;
    let cached = this.#metadataCache.get(key);
    if (cached === undefined) {
      this.#stats.metadataMisses++;
      cached = { metadata: this.#resolve(compiled, description), compiled };
      this.#metadataCache.set(key, cached);
    } else {
      this.#stats.metadataHits++;
    }

    // Metadata is resolved from the columns of the statement compiled first
    if (cached.compiled.statement === statement) {
      return cached.metadata;
    }
    cacheLog("adapting cached metadata to %s", statement.description);
    return cached.metadata.adaptTo(
      cached.compiled.resultColumns,
      selectedColumnsOf(statement),
    );
  }
}

/**
 * Creates an executor over a driver connection.
 *
 * @example
 * ```typescript
 * const executor = createExecutor({
 *   connection: createBetterSqliteConnection(new Database(":memory:")),
 * });
 * const result = executor.execute(text("SELECT 1 AS one"));
 * result.scalar(); // 1
 * ```
 */
export function createExecutor(options: ExecutorOptions): Executor {
  return new Executor(options);
}
