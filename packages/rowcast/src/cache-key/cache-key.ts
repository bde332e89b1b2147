/**
 * Structural cache keys.
 *
 * A cache key captures everything about a statement that affects its
 * compiled form. Bound values are left out of the key and collected, in
 * traversal order, into `bindParameters`, so statements that differ only in
 * literal values share one key.
 */
import { BindParameter, type ClauseElement } from "../sql/elements";
import {
  type KeyPart,
  sortedEntries,
  type TraversalField,
  VisitKind,
} from "../sql/traversal";
import { AnonMap } from "./anon-map";

// ============================================================
// Cache Key
// ============================================================

export class CacheKey {
  /** Nested structural key */
  readonly key: KeyPart;
  /** Bind parameters of the statement the key was generated from */
  readonly bindParameters: readonly BindParameter[];
  #hash: string | undefined;

  constructor(key: KeyPart, bindParameters: readonly BindParameter[]) {
    this.key = key;
    this.bindParameters = bindParameters;
  }

  /**
   * String form of the key, usable as a Map key.
   */
  get hash(): string {
    this.#hash ??= JSON.stringify(this.key);
    return this.#hash;
  }

  /**
   * Compares keys only; bind parameters are ignored.
   */
  equals(other: CacheKey): boolean {
    return this === other || this.hash === other.hash;
  }

  /** The extracted bound values, in traversal order. */
  get parameterValues(): readonly unknown[] {
    return this.bindParameters.map((parameter) => parameter.value);
  }

  toString(): string {
    return `CacheKey(${this.hash})`;
  }
}

// ============================================================
// Generation
// ============================================================

/**
 * Generates the cache key for a construct tree.
 *
 * Returns undefined when the tree contains structure that cannot be keyed;
 * callers skip caching for that statement.
 */
export function generateCacheKey(element: ClauseElement): CacheKey | undefined {
  const anonMap = new AnonMap();
  const bindParameters: BindParameter[] = [];
  const key = elementKey(element, anonMap, bindParameters);

  if (anonMap.uncacheable) {
    return undefined;
  }
  return new CacheKey(key, bindParameters);
}

function elementKey(
  element: ClauseElement,
  anonMap: AnonMap,
  bindParameters: BindParameter[],
): KeyPart {
  const [id, seen] = anonMap.intern(element);
  if (seen) {
    return [id, element.visitName];
  }

  if (element instanceof BindParameter) {
    bindParameters.push(element);
  }

  const parts: KeyPart[] = [id, element.visitName];
  for (const field of element.traversalFields()) {
    const part = fieldKey(field, anonMap, bindParameters);
    if (part !== undefined) {
      parts.push(field.name, part);
    }
  }
  return parts;
}

/**
 * Key for one field, or undefined when the field contributes nothing.
 */
function fieldKey(
  field: TraversalField,
  anonMap: AnonMap,
  bindParameters: BindParameter[],
): KeyPart | undefined {
  switch (field.kind) {
    case VisitKind.NODE: {
      return field.value === undefined
        ? undefined
        : elementKey(field.value, anonMap, bindParameters);
    }
    case VisitKind.NODE_LIST: {
      if (field.value.length === 0) return undefined;
      return field.value.map((child) =>
        elementKey(child, anonMap, bindParameters),
      );
    }
    case VisitKind.NODE_TUPLES: {
      if (field.value.length === 0) return undefined;
      return field.value.map((tuple) =>
        tuple.map((child) => elementKey(child, anonMap, bindParameters)),
      );
    }
    case VisitKind.PLAIN: {
      const value = field.value;
      if (value === undefined || value === null || value === false || value === "") {
        return undefined;
      }
      return value;
    }
    case VisitKind.OPERATOR: {
      return field.value?.name;
    }
    case VisitKind.TYPE: {
      return field.value.staticCacheKey;
    }
    case VisitKind.ANON_NAME: {
      const value = field.value;
      if (value === undefined) return undefined;
      return typeof value === "string" ? value : value.apply(anonMap);
    }
    case VisitKind.UNORDERED_SET: {
      if (field.value.length === 0) return undefined;
      return orderedByStructure(field.value, anonMap).map((child) =>
        elementKey(child, anonMap, bindParameters),
      );
    }
    case VisitKind.STRING_NODE_DICT: {
      if (field.value.size === 0) return undefined;
      return sortedEntries(field.value).map(([name, child]) => [
        name,
        elementKey(child, anonMap, bindParameters),
      ]);
    }
    case VisitKind.UNKNOWN: {
      anonMap.markUncacheable();
      return undefined;
    }
  }
}

/**
 * Sorts set members by a key computed for each one from the same starting
 * point, so the order they were listed in does not matter. Members are
 * interned for real only after sorting.
 */
function orderedByStructure(
  members: readonly ClauseElement[],
  anonMap: AnonMap,
): readonly ClauseElement[] {
  return members
    .map((member) => {
      const key = JSON.stringify(elementKey(member, anonMap.fork(), []));
      return [key, member] as const;
    })
    .sort(([left], [right]) => (left < right ? -1 : left > right ? 1 : 0))
    .map(([, member]) => member);
}
