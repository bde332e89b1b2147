/**
 * Traversal specification shared by every visitor of the construct tree.
 *
 * Each element lists its attributes as `TraversalField` entries, in the order
 * they are visited. Visitors (cache key generation, structural comparison,
 * child iteration) switch on `kind`; no visitor looks attributes up by name.
 */
import type { AnonymousName } from "./anonymous-name";
import type { ClauseElement } from "./elements";
import type { Operator } from "./operators";
import type { SqlType } from "./types";

// ============================================================
// Key Parts
// ============================================================

/**
 * A value that may be copied into a cache key as-is.
 */
export type PlainValue = string | number | boolean | null;

/**
 * One element of a cache key: a plain value or a nested tuple.
 */
export type KeyPart = PlainValue | readonly KeyPart[];

// ============================================================
// Visitation Kinds
// ============================================================

export const VisitKind = {
  /** A nested cacheable element, or absent */
  NODE: "node",
  /** An ordered list of nested elements */
  NODE_LIST: "node_list",
  /** An ordered list of tuples of nested elements */
  NODE_TUPLES: "node_tuples",
  /** A plain value, copied into the key in place */
  PLAIN: "plain",
  /** An operator, keyed by name */
  OPERATOR: "operator",
  /** A SQL type, keyed by its static cache key */
  TYPE: "type",
  /** A name that may be anonymous and must be interned */
  ANON_NAME: "anon_name",
  /** Nested elements whose order carries no meaning */
  UNORDERED_SET: "unordered_set",
  /** Nested elements keyed by string, visited in key order */
  STRING_NODE_DICT: "string_node_dict",
  /** Structure the visitors cannot describe */
  UNKNOWN: "unknown",
} as const;

export type VisitKind = (typeof VisitKind)[keyof typeof VisitKind];

// ============================================================
// Traversal Fields
// ============================================================

export type TraversalField =
  | Readonly<{
      kind: typeof VisitKind.NODE;
      name: string;
      value: ClauseElement | undefined;
    }>
  | Readonly<{
      kind: typeof VisitKind.NODE_LIST;
      name: string;
      value: readonly ClauseElement[];
    }>
  | Readonly<{
      kind: typeof VisitKind.NODE_TUPLES;
      name: string;
      value: readonly (readonly ClauseElement[])[];
    }>
  | Readonly<{
      kind: typeof VisitKind.PLAIN;
      name: string;
      value: PlainValue | undefined;
    }>
  | Readonly<{
      kind: typeof VisitKind.OPERATOR;
      name: string;
      value: Operator | undefined;
    }>
  | Readonly<{
      kind: typeof VisitKind.TYPE;
      name: string;
      value: SqlType;
    }>
  | Readonly<{
      kind: typeof VisitKind.ANON_NAME;
      name: string;
      value: string | AnonymousName | undefined;
    }>
  | Readonly<{
      kind: typeof VisitKind.UNORDERED_SET;
      name: string;
      value: readonly ClauseElement[];
    }>
  | Readonly<{
      kind: typeof VisitKind.STRING_NODE_DICT;
      name: string;
      value: ReadonlyMap<string, ClauseElement>;
    }>
  | Readonly<{
      kind: typeof VisitKind.UNKNOWN;
      name: string;
    }>;

/**
 * Builders for traversal fields, used by element classes.
 */
export const visit = {
  node: (name: string, value: ClauseElement | undefined): TraversalField => ({
    kind: VisitKind.NODE,
    name,
    value,
  }),
  nodeList: (name: string, value: readonly ClauseElement[]): TraversalField => ({
    kind: VisitKind.NODE_LIST,
    name,
    value,
  }),
  nodeTuples: (
    name: string,
    value: readonly (readonly ClauseElement[])[],
  ): TraversalField => ({ kind: VisitKind.NODE_TUPLES, name, value }),
  plain: (name: string, value: PlainValue | undefined): TraversalField => ({
    kind: VisitKind.PLAIN,
    name,
    value,
  }),
  operator: (name: string, value: Operator | undefined): TraversalField => ({
    kind: VisitKind.OPERATOR,
    name,
    value,
  }),
  type: (name: string, value: SqlType): TraversalField => ({
    kind: VisitKind.TYPE,
    name,
    value,
  }),
  anonName: (
    name: string,
    value: string | AnonymousName | undefined,
  ): TraversalField => ({ kind: VisitKind.ANON_NAME, name, value }),
  unorderedSet: (
    name: string,
    value: readonly ClauseElement[],
  ): TraversalField => ({ kind: VisitKind.UNORDERED_SET, name, value }),
  stringNodeDict: (
    name: string,
    value: ReadonlyMap<string, ClauseElement>,
  ): TraversalField => ({ kind: VisitKind.STRING_NODE_DICT, name, value }),
  unknown: (name: string): TraversalField => ({ kind: VisitKind.UNKNOWN, name }),
} as const;

// ============================================================
// Child Iteration
// ============================================================

/**
 * Returns the direct children of a field, in visiting order.
 */
export function fieldChildren(field: TraversalField): readonly ClauseElement[] {
  switch (field.kind) {
    case VisitKind.NODE: {
      return field.value === undefined ? [] : [field.value];
    }
    case VisitKind.NODE_LIST:
    case VisitKind.UNORDERED_SET: {
      return field.value;
    }
    case VisitKind.NODE_TUPLES: {
      return field.value.flat();
    }
    case VisitKind.STRING_NODE_DICT: {
      return sortedEntries(field.value).map(([, element]) => element);
    }
    case VisitKind.PLAIN:
    case VisitKind.OPERATOR:
    case VisitKind.TYPE:
    case VisitKind.ANON_NAME:
    case VisitKind.UNKNOWN: {
      return [];
    }
  }
}

/**
 * Walks an element tree depth-first, visiting each element once.
 *
 * Outside unordered sets, the order matches the order in which cache key
 * generation extracts bind parameters.
 */
export function* iterateElements(
  root: ClauseElement,
): Generator<ClauseElement, void, undefined> {
  const seen = new Set<ClauseElement>();
  const stack: ClauseElement[] = [root];

  while (stack.length > 0) {
    const element = stack.pop();
    if (element === undefined || seen.has(element)) continue;
    seen.add(element);
    yield element;

    const children = element
      .traversalFields()
      .flatMap((field) => fieldChildren(field));
    for (let index = children.length - 1; index >= 0; index--) {
      const child = children[index];
      if (child !== undefined) stack.push(child);
    }
  }
}

export function sortedEntries<T>(
  map: ReadonlyMap<string, T>,
): readonly (readonly [string, T])[] {
  return [...map.entries()].sort(([left], [right]) =>
    left < right ? -1 : left > right ? 1 : 0,
  );
}
