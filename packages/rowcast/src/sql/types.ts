/**
 * Logical SQL types.
 *
 * A type contributes two things to this layer: a static cache key (types are
 * never traversed structurally) and a result decoder chosen from the raw
 * type code the driver reports for a column.
 */
import type { KeyPart } from "./traversal";

// ============================================================
// Decoders
// ============================================================

/**
 * Converts a raw driver value into its application value.
 */
export type ValueDecoder = (value: unknown) => unknown;

/**
 * The driver's type code for a column: a declared type name (SQLite) or a
 * type OID (PostgreSQL). Absent when the driver cannot tell.
 */
export type RawTypeCode = string | number | undefined;

export type TypeAffinity =
  | "integer"
  | "float"
  | "numeric"
  | "string"
  | "boolean"
  | "datetime"
  | "json"
  | "blob"
  | "null";

const INTEGER_PATTERN = /^-?\d+$/;

function decodeInteger(value: unknown): unknown {
  if (typeof value === "bigint") {
    return value >= BigInt(Number.MIN_SAFE_INTEGER) &&
      value <= BigInt(Number.MAX_SAFE_INTEGER)
      ? Number(value)
      : value;
  }
  if (typeof value === "string" && INTEGER_PATTERN.test(value)) {
    const parsed = Number(value);
    return Number.isSafeInteger(parsed) ? parsed : BigInt(value);
  }
  return value;
}

function decodeFloat(value: unknown): unknown {
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isNaN(parsed) ? value : parsed;
  }
  if (typeof value === "bigint") return Number(value);
  return value;
}

function decodeBoolean(value: unknown): unknown {
  if (typeof value === "number" || typeof value === "bigint") {
    return value !== 0 && value !== 0n;
  }
  if (value === "t" || value === "true" || value === "1") return true;
  if (value === "f" || value === "false" || value === "0") return false;
  return value;
}

const TIMEZONE_SUFFIX = /(Z|[+-]\d{2}:?\d{2})$/;

function decodeDateTime(value: unknown): unknown {
  if (typeof value === "string") {
    const iso = value.includes("T") ? value : value.replace(" ", "T");
    const withZone = TIMEZONE_SUFFIX.test(iso) ? iso : `${iso}Z`;
    const parsed = new Date(withZone);
    return Number.isNaN(parsed.getTime()) ? value : parsed;
  }
  if (typeof value === "number") return new Date(value);
  return value;
}

function decodeJson(value: unknown): unknown {
  if (typeof value !== "string") return value;
  return JSON.parse(value);
}

// ============================================================
// Types
// ============================================================

export abstract class SqlType {
  abstract readonly typeName: string;
  abstract readonly affinity: TypeAffinity;

  /**
   * Key used in place of a structural traversal of this type.
   */
  get staticCacheKey(): KeyPart {
    return [this.typeName, ...this.cacheKeyParams()];
  }

  protected cacheKeyParams(): readonly KeyPart[] {
    return [];
  }

  /**
   * Returns the decoder for values reported under `typeCode`, or undefined
   * when raw values pass through unchanged.
   */
  resultDecoder(_typeCode: RawTypeCode): ValueDecoder | undefined {
    return undefined;
  }

  toString(): string {
    return this.typeName;
  }
}

export class IntegerType extends SqlType {
  readonly typeName = "INTEGER";
  readonly affinity = "integer";

  override resultDecoder(): ValueDecoder {
    return decodeInteger;
  }
}

export class FloatType extends SqlType {
  readonly typeName = "FLOAT";
  readonly affinity = "float";

  override resultDecoder(): ValueDecoder {
    return decodeFloat;
  }
}

export class NumericType extends SqlType {
  readonly typeName = "NUMERIC";
  readonly affinity = "numeric";
  readonly precision: number | undefined;
  readonly scale: number | undefined;

  constructor(options: Readonly<{ precision?: number; scale?: number }> = {}) {
    super();
    this.precision = options.precision;
    this.scale = options.scale;
  }

  protected override cacheKeyParams(): readonly KeyPart[] {
    return [this.precision ?? null, this.scale ?? null];
  }

  /**
   * Whole numbers when the scale is 0. Other decimals keep the exact form
   * the driver returned, usually a string.
   */
  override resultDecoder(): ValueDecoder | undefined {
    return this.scale === 0 ? decodeInteger : undefined;
  }
}

export class StringType extends SqlType {
  readonly typeName = "VARCHAR";
  readonly affinity = "string";
  readonly length: number | undefined;

  constructor(length?: number) {
    super();
    this.length = length;
  }

  protected override cacheKeyParams(): readonly KeyPart[] {
    return [this.length ?? null];
  }
}

export class BooleanType extends SqlType {
  readonly typeName = "BOOLEAN";
  readonly affinity = "boolean";

  override resultDecoder(): ValueDecoder {
    return decodeBoolean;
  }
}

export class DateTimeType extends SqlType {
  readonly typeName = "DATETIME";
  readonly affinity = "datetime";

  override resultDecoder(): ValueDecoder {
    return decodeDateTime;
  }
}

export class JsonType extends SqlType {
  readonly typeName = "JSON";
  readonly affinity = "json";

  override resultDecoder(): ValueDecoder {
    return decodeJson;
  }
}

export class BlobType extends SqlType {
  readonly typeName = "BLOB";
  readonly affinity = "blob";
}

/**
 * Type of expressions whose type is unknown. Values pass through.
 */
export class NullType extends SqlType {
  readonly typeName = "NULL";
  readonly affinity = "null";
}

export const NULLTYPE = new NullType();
export const INTEGER = new IntegerType();
export const STRING = new StringType();
export const BOOLEAN = new BooleanType();

/**
 * Infers a type for a literal value.
 */
export function typeForValue(value: unknown): SqlType {
  switch (typeof value) {
    case "number": {
      return Number.isInteger(value) ? INTEGER : new FloatType();
    }
    case "bigint": {
      return INTEGER;
    }
    case "string": {
      return STRING;
    }
    case "boolean": {
      return BOOLEAN;
    }
    default: {
      if (value instanceof Date) return new DateTimeType();
      if (value instanceof Uint8Array) return new BlobType();
      return NULLTYPE;
    }
  }
}
