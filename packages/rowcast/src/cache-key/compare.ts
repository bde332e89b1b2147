/**
 * Structural comparison of construct trees.
 *
 * Walks both trees side by side using the same traversal fields as cache
 * key generation. Elements with commutative or associative operators may
 * match with their children in another order.
 */
import {
  BinaryExpression,
  BindParameter,
  BooleanClauseList,
  type ClauseElement,
  ClauseList,
  ColumnClause,
  Label,
  Table,
} from "../sql/elements";
import { sortedEntries, type TraversalField, VisitKind } from "../sql/traversal";
import { AnonMap } from "./anon-map";

export type CompareMode = "structural" | "lineage";

export type CompareOptions = Readonly<{
  /**
   * `structural` compares shape only. `lineage` also treats two columns as
   * equal when one is derived from the other, and tables by identity.
   */
  mode?: CompareMode;
  /** Compare the values of bind parameters (default: true) */
  compareValues?: boolean;
}>;

/**
 * Returns true when `left` and `right` are structurally equivalent.
 */
export function compareStructure(
  left: ClauseElement,
  right: ClauseElement,
  options: CompareOptions = {},
): boolean {
  return new StructureComparator(options).compare(left, right);
}

// ============================================================
// Comparator
// ============================================================

/**
 * Outcome of an element-specific comparison: fail, stop descending into
 * this pair, or continue with the fields not already handled.
 */
type ElementOutcome =
  | Readonly<{ __type: "failed" }>
  | Readonly<{ __type: "skip_traverse" }>
  | Readonly<{ __type: "compared"; fields: ReadonlySet<string> }>;

const FAILED: ElementOutcome = { __type: "failed" };
const SKIP_TRAVERSE: ElementOutcome = { __type: "skip_traverse" };
const NOTHING_COMPARED: ElementOutcome = { __type: "compared", fields: new Set() };

function compared(...fields: readonly string[]): ElementOutcome {
  return { __type: "compared", fields: new Set(fields) };
}

type Pair = readonly [ClauseElement, ClauseElement];

class StructureComparator {
  readonly #options: CompareOptions;
  readonly #stack: Pair[] = [];
  readonly #seen = new Map<ClauseElement, Set<ClauseElement>>();
  readonly #leftNames = new AnonMap();
  readonly #rightNames = new AnonMap();

  constructor(options: CompareOptions) {
    this.#options = options;
  }

  compare(left: ClauseElement, right: ClauseElement): boolean {
    this.#stack.push([left, right]);

    while (this.#stack.length > 0) {
      const pair = this.#stack.pop();
      if (pair === undefined) break;
      const [leftElement, rightElement] = pair;

      if (leftElement === rightElement) continue;
      if (this.#markSeen(leftElement, rightElement)) continue;
      if (leftElement.visitName !== rightElement.visitName) return false;

      const outcome = this.#compareElement(leftElement, rightElement);
      if (outcome.__type === "failed") return false;
      if (outcome.__type === "skip_traverse") continue;

      if (!this.#compareFields(leftElement, rightElement, outcome.fields)) {
        return false;
      }
    }
    return true;
  }

  /** Returns true when the pair was already compared. */
  #markSeen(left: ClauseElement, right: ClauseElement): boolean {
    let partners = this.#seen.get(left);
    if (partners === undefined) {
      partners = new Set();
      this.#seen.set(left, partners);
    }
    if (partners.has(right)) return true;
    partners.add(right);
    return false;
  }

  #compareFields(
    left: ClauseElement,
    right: ClauseElement,
    handled: ReadonlySet<string>,
  ): boolean {
    const leftFields = left.traversalFields();
    const rightFields = right.traversalFields();
    if (leftFields.length !== rightFields.length) return false;

    for (const [index, leftField] of leftFields.entries()) {
      const rightField = rightFields[index];
      if (
        rightField === undefined ||
        rightField.name !== leftField.name ||
        rightField.kind !== leftField.kind
      ) {
        return false;
      }
      if (handled.has(leftField.name)) continue;
      if (!this.#compareField(leftField, rightField)) return false;
    }
    return true;
  }

  #compareField(left: TraversalField, right: TraversalField): boolean {
    switch (left.kind) {
      case VisitKind.NODE: {
        if (right.kind !== left.kind) return false;
        if (left.value === undefined || right.value === undefined) {
          return left.value === right.value;
        }
        this.#stack.push([left.value, right.value]);
        return true;
      }
      case VisitKind.NODE_LIST: {
        if (right.kind !== left.kind) return false;
        return this.#pushSequences(left.value, right.value);
      }
      case VisitKind.NODE_TUPLES: {
        if (right.kind !== left.kind) return false;
        if (left.value.length !== right.value.length) return false;
        return left.value.every((tuple, index) =>
          this.#pushSequences(tuple, right.value[index] ?? []),
        );
      }
      case VisitKind.PLAIN: {
        if (right.kind !== left.kind) return false;
        return left.value === right.value;
      }
      case VisitKind.OPERATOR: {
        if (right.kind !== left.kind) return false;
        return left.value === right.value;
      }
      case VisitKind.TYPE: {
        if (right.kind !== left.kind) return false;
        return left.value.affinity === right.value.affinity;
      }
      case VisitKind.ANON_NAME: {
        if (right.kind !== left.kind) return false;
        const leftName =
          typeof left.value === "object"
            ? left.value.apply(this.#leftNames)
            : left.value;
        const rightName =
          typeof right.value === "object"
            ? right.value.apply(this.#rightNames)
            : right.value;
        return leftName === rightName;
      }
      case VisitKind.UNORDERED_SET: {
        if (right.kind !== left.kind) return false;
        return this.#compareUnordered(left.value, right.value);
      }
      case VisitKind.STRING_NODE_DICT: {
        if (right.kind !== left.kind) return false;
        const leftEntries = sortedEntries(left.value);
        const rightEntries = sortedEntries(right.value);
        if (leftEntries.length !== rightEntries.length) return false;
        for (const [index, [name, element]] of leftEntries.entries()) {
          const other = rightEntries[index];
          if (other === undefined || other[0] !== name) return false;
          this.#stack.push([element, other[1]]);
        }
        return true;
      }
      case VisitKind.UNKNOWN: {
        // Identical elements were accepted before reaching here
        return false;
      }
    }
  }

  #pushSequences(
    left: readonly ClauseElement[],
    right: readonly ClauseElement[],
  ): boolean {
    if (left.length !== right.length) return false;
    for (const [index, element] of left.entries()) {
      const other = right[index];
      if (other === undefined) return false;
      this.#stack.push([element, other]);
    }
    return true;
  }

  // ============================================================
  // Element-specific comparison
  // ============================================================

  #compareElement(left: ClauseElement, right: ClauseElement): ElementOutcome {
    if (this.#options.mode === "lineage") {
      const outcome = this.#compareLineage(left, right);
      if (outcome !== undefined) return outcome;
    }

    if (left instanceof BinaryExpression && right instanceof BinaryExpression) {
      return this.#compareBinary(left, right);
    }
    if (
      (left instanceof BooleanClauseList && right instanceof BooleanClauseList) ||
      (left instanceof ClauseList && right instanceof ClauseList)
    ) {
      return this.#compareClauseList(left, right);
    }
    if (left instanceof BindParameter && right instanceof BindParameter) {
      if (this.#options.compareValues ?? true) {
        return valuesEqual(left.value, right.value) ? NOTHING_COMPARED : FAILED;
      }
      return NOTHING_COMPARED;
    }
    return NOTHING_COMPARED;
  }

  #compareLineage(
    left: ClauseElement,
    right: ClauseElement,
  ): ElementOutcome | undefined {
    if (
      (left instanceof ColumnClause && right instanceof ColumnClause) ||
      (left instanceof Label && right instanceof Label)
    ) {
      return left.sharesLineage(right) ? SKIP_TRAVERSE : FAILED;
    }
    if (left instanceof Table && right instanceof Table) {
      return left === right ? SKIP_TRAVERSE : FAILED;
    }
    return undefined;
  }

  #compareBinary(left: BinaryExpression, right: BinaryExpression): ElementOutcome {
    if (left.operator !== right.operator) return FAILED;
    if (!left.operator.commutative) return compared("operator", "negate");

    const sameOrder =
      this.#compareInner(left.left, right.left) &&
      this.#compareInner(left.right, right.right);
    const swapped =
      sameOrder ||
      (this.#compareInner(left.left, right.right) &&
        this.#compareInner(left.right, right.left));
    return swapped ? compared("operator", "negate", "left", "right") : FAILED;
  }

  #compareClauseList(
    left: BooleanClauseList | ClauseList,
    right: BooleanClauseList | ClauseList,
  ): ElementOutcome {
    if (left.operator !== right.operator) return FAILED;
    if (!left.operator.associative) return compared("operator");
    return this.#compareUnordered(left.clauses, right.clauses)
      ? compared("operator", "clauses")
      : FAILED;
  }

  /**
   * Matches every element of `left` to a distinct element of `right`.
   */
  #compareUnordered(
    left: readonly ClauseElement[],
    right: readonly ClauseElement[],
  ): boolean {
    if (left.length !== right.length) return false;
    const matched = new Set<ClauseElement>();
    for (const element of left) {
      const partner = right.find(
        (candidate) =>
          !matched.has(candidate) && this.#compareInner(element, candidate),
      );
      if (partner === undefined) return false;
      matched.add(partner);
    }
    return true;
  }

  #compareInner(left: ClauseElement, right: ClauseElement): boolean {
    return new StructureComparator(this.#options).compare(left, right);
  }
}

function valuesEqual(left: unknown, right: unknown): boolean {
  if (Object.is(left, right)) return true;
  if (left instanceof Date && right instanceof Date) {
    return left.getTime() === right.getTime();
  }
  if (Array.isArray(left) && Array.isArray(right)) {
    return (
      left.length === right.length &&
      left.every((value, index) => valuesEqual(value, right[index]))
    );
  }
  return false;
}
