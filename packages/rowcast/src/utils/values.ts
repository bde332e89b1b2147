/**
 * Helpers for comparing and hashing decoded column values.
 */

/**
 * Deterministic string form of a value, equal for values `compareValues`
 * finds equal.
 */
export function stableKey(value: unknown): string {
  if (value === null) return "null";
  switch (typeof value) {
    case "undefined": {
      return "undefined";
    }
    case "bigint": {
      return String(value);
    }
    case "number": {
      // Integral numbers share the key of the equal bigint
      return Number.isInteger(value) ? String(BigInt(value)) : String(value);
    }
    case "string": {
      return JSON.stringify(value);
    }
    case "boolean": {
      return String(value);
    }
    case "object": {
      if (value instanceof Date) {
        return Number.isNaN(value.getTime())
          ? "Date(Invalid)"
          : `Date(${value.toISOString()})`;
      }
      if (value instanceof Uint8Array) return `Bytes(${[...value].join(",")})`;
      if (Array.isArray(value)) {
        return `[${value.map((item: unknown) => stableKey(item)).join(",")}]`;
      }
      const entries = Object.entries(value).sort(([left], [right]) =>
        left < right ? -1 : left > right ? 1 : 0,
      );
      return `{${entries
        .map(([key, item]) => `${JSON.stringify(key)}:${stableKey(item)}`)
        .join(",")}}`;
    }
    default: {
      return String(value);
    }
  }
}

function typeRank(value: unknown): number {
  if (value === null || value === undefined) return 0;
  switch (typeof value) {
    case "boolean": {
      return 1;
    }
    case "number":
    case "bigint": {
      return 2;
    }
    case "string": {
      return 3;
    }
    default: {
      if (value instanceof Date) return 4;
      if (value instanceof Uint8Array) return 5;
      return 6;
    }
  }
}

function compareNumeric(left: number | bigint, right: number | bigint): number {
  const leftNaN = typeof left === "number" && Number.isNaN(left);
  const rightNaN = typeof right === "number" && Number.isNaN(right);
  if (leftNaN || rightNaN) {
    return Number(leftNaN) - Number(rightNaN);
  }
  return left < right ? -1 : left > right ? 1 : 0;
}

/**
 * Orders two values: nulls first, then by type, then by value. Numbers and
 * bigints compare by numeric value; NaN equals only NaN and sorts after
 * every other number.
 */
export function compareValues(left: unknown, right: unknown): number {
  const rank = typeRank(left) - typeRank(right);
  if (rank !== 0) return Math.sign(rank);

  if (
    (typeof left === "number" || typeof left === "bigint") &&
    (typeof right === "number" || typeof right === "bigint")
  ) {
    return compareNumeric(left, right);
  }
  if (typeof left === "string" && typeof right === "string") {
    return left < right ? -1 : left > right ? 1 : 0;
  }
  if (typeof left === "boolean" && typeof right === "boolean") {
    return Number(left) - Number(right);
  }
  if (left instanceof Date && right instanceof Date) {
    return compareNumeric(left.getTime(), right.getTime());
  }

  const leftKey = stableKey(left);
  const rightKey = stableKey(right);
  return leftKey < rightKey ? -1 : leftKey > rightKey ? 1 : 0;
}

/**
 * Compares two sequences element by element, then by length.
 */
export function compareSequences(
  left: readonly unknown[],
  right: readonly unknown[],
): number {
  const length = Math.min(left.length, right.length);
  for (let index = 0; index < length; index++) {
    const result = compareValues(left[index], right[index]);
    if (result !== 0) return result;
  }
  return Math.sign(left.length - right.length);
}
