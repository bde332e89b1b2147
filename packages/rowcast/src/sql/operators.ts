/**
 * SQL operators.
 *
 * Operators are singletons; elements reference them and visitors compare
 * them by identity. The flags tell the structural comparator when child
 * order may be ignored.
 */
export type Operator = Readonly<{
  name: string;
  symbol: string;
  /** `a op b` equals `b op a` */
  commutative: boolean;
  /** `(a op b) op c` equals `a op (b op c)` */
  associative: boolean;
}>;

function defineOperator(
  name: string,
  symbol: string,
  flags: Readonly<{ commutative?: boolean; associative?: boolean }> = {},
): Operator {
  return Object.freeze({
    name,
    symbol,
    commutative: flags.commutative ?? false,
    associative: flags.associative ?? false,
  });
}

export const operators = {
  eq: defineOperator("eq", "=", { commutative: true }),
  ne: defineOperator("ne", "!=", { commutative: true }),
  lt: defineOperator("lt", "<"),
  le: defineOperator("le", "<="),
  gt: defineOperator("gt", ">"),
  ge: defineOperator("ge", ">="),
  add: defineOperator("add", "+", { commutative: true, associative: true }),
  sub: defineOperator("sub", "-"),
  mul: defineOperator("mul", "*", { commutative: true, associative: true }),
  div: defineOperator("div", "/"),
  concat: defineOperator("concat", "||", { associative: true }),
  like: defineOperator("like", "LIKE"),
  notLike: defineOperator("not_like", "NOT LIKE"),
  in: defineOperator("in", "IN"),
  notIn: defineOperator("not_in", "NOT IN"),
  is: defineOperator("is", "IS"),
  isNot: defineOperator("is_not", "IS NOT"),
  and: defineOperator("and", "AND", { commutative: true, associative: true }),
  or: defineOperator("or", "OR", { commutative: true, associative: true }),
  not: defineOperator("not", "NOT"),
  neg: defineOperator("neg", "-"),
  desc: defineOperator("desc", "DESC"),
  asc: defineOperator("asc", "ASC"),
  comma: defineOperator("comma", ","),
} as const;

export type OperatorName = keyof typeof operators;

const NEGATIONS: ReadonlyMap<Operator, Operator> = new Map([
  [operators.eq, operators.ne],
  [operators.ne, operators.eq],
  [operators.lt, operators.ge],
  [operators.ge, operators.lt],
  [operators.gt, operators.le],
  [operators.le, operators.gt],
  [operators.like, operators.notLike],
  [operators.notLike, operators.like],
  [operators.in, operators.notIn],
  [operators.notIn, operators.in],
  [operators.is, operators.isNot],
  [operators.isNot, operators.is],
]);

/**
 * Returns the operator that negates `operator`, if one exists.
 */
export function negationOf(operator: Operator): Operator | undefined {
  return NEGATIONS.get(operator);
}

/**
 * Operators whose result is boolean.
 */
export function isComparison(operator: Operator): boolean {
  return NEGATIONS.has(operator);
}
