/**
 * Execution options.
 *
 * Parsed with zod; invalid values raise ConfigurationError carrying the
 * individual issues.
 */
import { z } from "zod";

import { validateConfig } from "./errors/validation";

// ============================================================
// Defaults
// ============================================================

/** Ceiling for the growth-buffered strategy's buffer */
export const DEFAULT_MAX_ROW_BUFFER = 1000;

/** Multiplier applied to the buffer size after each refill */
export const DEFAULT_GROWTH_FACTOR = 5;

/** Size of the first fetch of the growth-buffered strategy */
export const DEFAULT_INITIAL_BUFFER_SIZE = 1;

/** Default `fetchMany()` size when the driver is called directly */
export const DEFAULT_ARRAY_SIZE = 1;

export const DEFAULT_COMPILED_CACHE_SIZE = 500;
export const DEFAULT_METADATA_CACHE_SIZE = 500;

// ============================================================
// Schemas
// ============================================================

const positiveInt = z.number().int().positive();

export const executionOptionsSchema = z
  .object({
    /** Stream rows through the growth-buffered strategy */
    streamResults: z.boolean().default(false),
    maxRowBuffer: positiveInt.default(DEFAULT_MAX_ROW_BUFFER),
    growthFactor: z.number().int().nonnegative().default(DEFAULT_GROWTH_FACTOR),
    initialBufferSize: positiveInt.default(DEFAULT_INITIAL_BUFFER_SIZE),
    /** Stream with a fixed batch size */
    yieldPer: positiveInt.optional(),
    /** Read every row into memory when the statement executes */
    bufferFully: z.boolean().default(false),
    arraySize: positiveInt.default(DEFAULT_ARRAY_SIZE),
  })
  .strict()
  .refine((options) => !(options.bufferFully && options.streamResults), {
    message: "bufferFully and streamResults cannot both be set",
    path: ["bufferFully"],
  });

export type ExecutionOptions = z.output<typeof executionOptionsSchema>;
export type ExecutionOptionsInput = z.input<typeof executionOptionsSchema>;

export const executorCacheOptionsSchema = z
  .object({
    compiledCacheSize: positiveInt.default(DEFAULT_COMPILED_CACHE_SIZE),
    metadataCacheSize: positiveInt.default(DEFAULT_METADATA_CACHE_SIZE),
  })
  .strict();

export type ExecutorCacheOptions = z.output<typeof executorCacheOptionsSchema>;
export type ExecutorCacheOptionsInput = z.input<typeof executorCacheOptionsSchema>;

// ============================================================
// Parsing
// ============================================================

/**
 * Validates execution options and fills in defaults.
 *
 * @throws ConfigurationError when a value is invalid
 */
export function parseExecutionOptions(input: unknown = {}): ExecutionOptions {
  return validateConfig(executionOptionsSchema, input, "execution options");
}

export function parseExecutorCacheOptions(
  input: unknown = {},
): ExecutorCacheOptions {
  return validateConfig(executorCacheOptionsSchema, input, "executor options");
}
