/**
 * SQL construct tree.
 *
 * Elements describe statement structure only; SQL text comes from a
 * compiler. Each element lists its attributes through `traversalFields()`,
 * which drives cache key generation and structural comparison.
 */
import { InvalidRequestError } from "../errors";
import { AnonymousName, renderName } from "./anonymous-name";
import { negationOf, type Operator, operators } from "./operators";
import { type PlainValue, type TraversalField, visit } from "./traversal";
import { BOOLEAN, INTEGER, NULLTYPE, type SqlType, typeForValue } from "./types";

// ============================================================
// Base Classes
// ============================================================

export abstract class ClauseElement {
  /** Stable name of the element kind, shared by every instance */
  abstract readonly visitName: string;

  abstract traversalFields(): readonly TraversalField[];

  /** Human-readable form, used in error messages. */
  get description(): string {
    return this.visitName;
  }
}

/**
 * A value that may stand on either side of an operator.
 */
export type ColumnOperand = ColumnElement | PlainValue | bigint | Date;

function coerce(value: ColumnOperand, type?: SqlType): ColumnElement {
  return value instanceof ColumnElement ? value : literal(value, type);
}

export abstract class ColumnElement extends ClauseElement {
  abstract readonly type: SqlType;

  /** Name the element is selected under, when it has one. */
  get key(): string | undefined {
    return undefined;
  }

  /**
   * This element plus every element it was derived from.
   */
  get proxySet(): ReadonlySet<ColumnElement> {
    return new Set<ColumnElement>([this]);
  }

  /**
   * True when both elements derive from a common column.
   */
  sharesLineage(other: ColumnElement): boolean {
    const mine = this.proxySet;
    for (const element of other.proxySet) {
      if (mine.has(element)) return true;
    }
    return false;
  }

  eq(other: ColumnOperand): BinaryExpression {
    return this.#compare(other, operators.eq);
  }

  ne(other: ColumnOperand): BinaryExpression {
    return this.#compare(other, operators.ne);
  }

  lt(other: ColumnOperand): BinaryExpression {
    return this.#compare(other, operators.lt);
  }

  le(other: ColumnOperand): BinaryExpression {
    return this.#compare(other, operators.le);
  }

  gt(other: ColumnOperand): BinaryExpression {
    return this.#compare(other, operators.gt);
  }

  ge(other: ColumnOperand): BinaryExpression {
    return this.#compare(other, operators.ge);
  }

  like(pattern: ColumnOperand): BinaryExpression {
    return this.#compare(pattern, operators.like);
  }

  isNull(): BinaryExpression {
    return new BinaryExpression(this, new Null(), operators.is, BOOLEAN);
  }

  add(other: ColumnOperand): BinaryExpression {
    return new BinaryExpression(
      this,
      coerce(other, this.type),
      operators.add,
      this.type,
    );
  }

  sub(other: ColumnOperand): BinaryExpression {
    return new BinaryExpression(
      this,
      coerce(other, this.type),
      operators.sub,
      this.type,
    );
  }

  mul(other: ColumnOperand): BinaryExpression {
    return new BinaryExpression(
      this,
      coerce(other, this.type),
      operators.mul,
      this.type,
    );
  }

  concat(other: ColumnOperand): BinaryExpression {
    return new BinaryExpression(
      this,
      coerce(other, this.type),
      operators.concat,
      this.type,
    );
  }

  inValues(values: readonly ColumnOperand[]): BinaryExpression {
    const list = new ClauseList(
      values.map((value) => coerce(value, this.type)),
      operators.comma,
    );
    return new BinaryExpression(this, list, operators.in, BOOLEAN);
  }

  label(name?: string): Label {
    return new Label(name, this);
  }

  desc(): UnaryExpression {
    return new UnaryExpression(this, { modifier: operators.desc });
  }

  asc(): UnaryExpression {
    return new UnaryExpression(this, { modifier: operators.asc });
  }

  #compare(other: ColumnOperand, operator: Operator): BinaryExpression {
    return new BinaryExpression(
      this,
      coerce(other, this.type),
      operator,
      BOOLEAN,
    );
  }
}

/**
 * Something columns are selected from.
 */
export type FromClause = Table | Alias;

// ============================================================
// Columns and Tables
// ============================================================

export type ColumnClauseOptions = Readonly<{
  table?: FromClause;
  /** Rendered verbatim (e.g. `*`) rather than as an identifier */
  isLiteral?: boolean;
  /** Columns this column was derived from */
  proxies?: readonly ColumnElement[];
}>;

export class ColumnClause extends ColumnElement {
  readonly visitName = "column";
  readonly name: string;
  readonly type: SqlType;
  readonly table: FromClause | undefined;
  readonly isLiteral: boolean;
  readonly #proxies: readonly ColumnElement[];

  constructor(
    name: string,
    type: SqlType = NULLTYPE,
    options: ColumnClauseOptions = {},
  ) {
    super();
    this.name = name;
    this.type = type;
    this.table = options.table;
    this.isLiteral = options.isLiteral ?? false;
    this.#proxies = options.proxies ?? [];
  }

  override get key(): string {
    return this.name;
  }

  override get proxySet(): ReadonlySet<ColumnElement> {
    const result = new Set<ColumnElement>([this]);
    for (const proxied of this.#proxies) {
      for (const element of proxied.proxySet) result.add(element);
    }
    return result;
  }

  override get description(): string {
    return this.table === undefined
      ? this.name
      : `${renderName(this.table.name)}.${this.name}`;
  }

  traversalFields(): readonly TraversalField[] {
    return [
      visit.anonName("name", this.name),
      visit.type("type", this.type),
      visit.node("table", this.table),
      visit.plain("isLiteral", this.isLiteral),
    ];
  }
}

function findColumn(
  owner: ClauseElement,
  columns: readonly ColumnClause[],
  name: string,
): ColumnClause {
  const found = columns.find((candidate) => candidate.name === name);
  if (found === undefined) {
    throw new InvalidRequestError(
      `${owner.description} has no column named '${name}'`,
      { column: name, available: columns.map((candidate) => candidate.name) },
    );
  }
  return found;
}

export type ColumnDefinitions = Readonly<Record<string, SqlType>>;

export class Table extends ClauseElement {
  readonly visitName = "table";
  readonly name: string;
  readonly schema: string | undefined;
  readonly columns: readonly ColumnClause[];

  constructor(
    name: string,
    columns: ColumnDefinitions,
    options: Readonly<{ schema?: string }> = {},
  ) {
    super();
    this.name = name;
    this.schema = options.schema;
    this.columns = Object.entries(columns).map(
      ([columnName, type]) => new ColumnClause(columnName, type, { table: this }),
    );
  }

  /** Returns the column named `name`. */
  c(name: string): ColumnClause {
    return findColumn(this, this.columns, name);
  }

  alias(name?: string): Alias {
    return new Alias(this, name);
  }

  override get description(): string {
    return this.schema === undefined ? this.name : `${this.schema}.${this.name}`;
  }

  traversalFields(): readonly TraversalField[] {
    return [
      visit.plain("name", this.name),
      visit.plain("schema", this.schema),
      visit.nodeList("columns", this.columns),
    ];
  }
}

/**
 * A renamed table or subquery. Its columns proxy the columns of the
 * element it renames.
 */
export class Alias extends ClauseElement {
  readonly visitName = "alias";
  readonly element: Table | Select;
  readonly name: string | AnonymousName;
  readonly columns: readonly ColumnClause[];

  constructor(element: Table | Select, name?: string) {
    super();
    this.element = element;
    this.name = name ?? new AnonymousName(this, "anon");
    const source =
      element instanceof Table ? element.columns : element.selectedColumns;
    this.columns = source.map(
      (column, index) =>
        new ColumnClause(column.key ?? `column_${index + 1}`, column.type, {
          table: this,
          proxies: [column],
        }),
    );
  }

  c(name: string): ColumnClause {
    return findColumn(this, this.columns, name);
  }

  override get description(): string {
    return renderName(this.name);
  }

  traversalFields(): readonly TraversalField[] {
    return [visit.node("element", this.element), visit.anonName("name", this.name)];
  }
}

// ============================================================
// Expressions
// ============================================================

/**
 * A bound value. Cache keys record its key and type, never its value.
 */
export class BindParameter extends ColumnElement {
  readonly visitName = "bindparam";
  readonly paramKey: string | AnonymousName;
  readonly value: unknown;
  readonly type: SqlType;

  constructor(
    paramKey: string | undefined,
    value: unknown,
    type: SqlType = typeForValue(value),
  ) {
    super();
    this.paramKey = paramKey ?? new AnonymousName(this, "param");
    this.value = value;
    this.type = type;
  }

  override get key(): string | undefined {
    return typeof this.paramKey === "string" ? this.paramKey : undefined;
  }

  override get description(): string {
    return `:${renderName(this.paramKey)}`;
  }

  /** A copy with the same key and type carrying another value. */
  withValue(value: unknown): BindParameter {
    return new BindParameter(
      typeof this.paramKey === "string" ? this.paramKey : this.paramKey.label,
      value,
      this.type,
    );
  }

  traversalFields(): readonly TraversalField[] {
    return [visit.anonName("key", this.paramKey), visit.type("type", this.type)];
  }
}

/** SQL `NULL`. */
export class Null extends ColumnElement {
  readonly visitName = "null";
  readonly type = NULLTYPE;

  traversalFields(): readonly TraversalField[] {
    return [];
  }
}

export class Label extends ColumnElement {
  readonly visitName = "label";
  readonly name: string | AnonymousName;
  readonly element: ColumnElement;
  readonly type: SqlType;

  constructor(name: string | undefined, element: ColumnElement) {
    super();
    this.name = name ?? new AnonymousName(this, "anon");
    this.element = element;
    this.type = element.type;
  }

  override get key(): string | undefined {
    return typeof this.name === "string" ? this.name : undefined;
  }

  override get proxySet(): ReadonlySet<ColumnElement> {
    return new Set<ColumnElement>([this, ...this.element.proxySet]);
  }

  override get description(): string {
    return renderName(this.name);
  }

  traversalFields(): readonly TraversalField[] {
    return [
      visit.anonName("name", this.name),
      visit.node("element", this.element),
      visit.type("type", this.type),
    ];
  }
}

export class BinaryExpression extends ColumnElement {
  readonly visitName = "binary";
  readonly left: ColumnElement;
  readonly right: ClauseElement;
  readonly operator: Operator;
  readonly negate: Operator | undefined;
  readonly type: SqlType;

  constructor(
    left: ColumnElement,
    right: ClauseElement,
    operator: Operator,
    type: SqlType,
  ) {
    super();
    this.left = left;
    this.right = right;
    this.operator = operator;
    this.negate = negationOf(operator);
    this.type = type;
  }

  override get description(): string {
    return `${this.left.description} ${this.operator.symbol} ${this.right.description}`;
  }

  traversalFields(): readonly TraversalField[] {
    return [
      visit.node("left", this.left),
      visit.node("right", this.right),
      visit.operator("operator", this.operator),
      visit.operator("negate", this.negate),
      visit.type("type", this.type),
    ];
  }
}

/**
 * Clauses joined by one operator, such as function arguments or an `IN`
 * list.
 */
export class ClauseList extends ClauseElement {
  readonly visitName: string = "clauselist";
  readonly clauses: readonly ColumnElement[];
  readonly operator: Operator;

  constructor(clauses: readonly ColumnElement[], operator: Operator) {
    super();
    this.clauses = clauses;
    this.operator = operator;
  }

  traversalFields(): readonly TraversalField[] {
    return [
      visit.operator("operator", this.operator),
      visit.nodeList("clauses", this.clauses),
    ];
  }
}

/**
 * `AND` / `OR` of boolean expressions.
 */
export class BooleanClauseList extends ColumnElement {
  readonly visitName = "boolean_clauselist";
  readonly clauses: readonly ColumnElement[];
  readonly operator: Operator;
  readonly type = BOOLEAN;

  constructor(clauses: readonly ColumnElement[], operator: Operator) {
    super();
    this.clauses = clauses;
    this.operator = operator;
  }

  traversalFields(): readonly TraversalField[] {
    return [
      visit.operator("operator", this.operator),
      visit.nodeList("clauses", this.clauses),
    ];
  }
}

export class UnaryExpression extends ColumnElement {
  readonly visitName = "unary";
  readonly element: ColumnElement;
  readonly operator: Operator | undefined;
  readonly modifier: Operator | undefined;
  readonly type: SqlType;

  constructor(
    element: ColumnElement,
    options: Readonly<{
      operator?: Operator;
      modifier?: Operator;
      type?: SqlType;
    }>,
  ) {
    super();
    this.element = element;
    this.operator = options.operator;
    this.modifier = options.modifier;
    this.type = options.type ?? element.type;
  }

  traversalFields(): readonly TraversalField[] {
    return [
      visit.node("element", this.element),
      visit.operator("operator", this.operator),
      visit.operator("modifier", this.modifier),
      visit.type("type", this.type),
    ];
  }
}

export class FunctionCall extends ColumnElement {
  readonly visitName = "function";
  readonly name: string;
  readonly arguments: ClauseList;
  readonly type: SqlType;

  constructor(name: string, args: readonly ColumnElement[], type: SqlType) {
    super();
    this.name = name;
    this.arguments = new ClauseList(args, operators.comma);
    this.type = type;
  }

  override get key(): string {
    return this.name;
  }

  override get description(): string {
    return `${this.name}(${this.arguments.clauses
      .map((clause) => clause.description)
      .join(", ")})`;
  }

  traversalFields(): readonly TraversalField[] {
    return [
      visit.plain("name", this.name),
      visit.node("arguments", this.arguments),
      visit.type("type", this.type),
    ];
  }
}

/**
 * `CASE WHEN ... THEN ... [ELSE ...] END`. Branches are tested in order.
 */
export class Case extends ColumnElement {
  readonly visitName = "case";
  readonly whens: readonly (readonly [ColumnElement, ColumnElement])[];
  readonly else_: ColumnElement | undefined;
  readonly type: SqlType;

  constructor(
    whens: readonly (readonly [ColumnElement, ColumnElement])[],
    else_?: ColumnElement,
  ) {
    super();
    this.whens = whens;
    this.else_ = else_;
    this.type = whens[0]?.[1].type ?? else_?.type ?? NULLTYPE;
  }

  traversalFields(): readonly TraversalField[] {
    return [
      visit.nodeTuples("whens", this.whens),
      visit.node("else", this.else_),
      visit.type("type", this.type),
    ];
  }
}

/**
 * An element whose structure cannot be described to the visitors.
 * Statements containing one are never cached.
 */
export class OpaqueClause extends ColumnElement {
  readonly visitName = "opaque";
  readonly payload: unknown;
  readonly type: SqlType;

  constructor(payload: unknown, type: SqlType = NULLTYPE) {
    super();
    this.payload = payload;
    this.type = type;
  }

  traversalFields(): readonly TraversalField[] {
    return [visit.unknown("payload")];
  }
}

// ============================================================
// Statements
// ============================================================

type SelectState = Readonly<{
  columns: readonly ColumnElement[];
  from: readonly FromClause[];
  where: ColumnElement | undefined;
  groupBy: readonly ColumnElement[];
  orderBy: readonly ColumnElement[];
  limit: BindParameter | undefined;
  offset: BindParameter | undefined;
  distinct: boolean;
  correlate: readonly FromClause[];
}>;

/**
 * An immutable SELECT. Every builder method returns a new statement.
 */
export class Select extends ClauseElement {
  readonly visitName = "select";
  readonly #state: SelectState;

  constructor(state: SelectState) {
    super();
    this.#state = state;
  }

  get selectedColumns(): readonly ColumnElement[] {
    return this.#state.columns;
  }

  get froms(): readonly FromClause[] {
    return this.#state.from;
  }

  get whereClause(): ColumnElement | undefined {
    return this.#state.where;
  }

  get limitClause(): BindParameter | undefined {
    return this.#state.limit;
  }

  get offsetClause(): BindParameter | undefined {
    return this.#state.offset;
  }

  get groupByClauses(): readonly ColumnElement[] {
    return this.#state.groupBy;
  }

  get orderByClauses(): readonly ColumnElement[] {
    return this.#state.orderBy;
  }

  get isDistinct(): boolean {
    return this.#state.distinct;
  }

  /** FROM clauses an enclosing statement supplies; their order is irrelevant. */
  get correlated(): readonly FromClause[] {
    return this.#state.correlate;
  }

  selectFrom(...from: readonly FromClause[]): Select {
    return this.#with({ from: [...this.#state.from, ...from] });
  }

  where(...criteria: readonly ColumnElement[]): Select {
    const all =
      this.#state.where === undefined
        ? criteria
        : [this.#state.where, ...criteria];
    const combined = all.length === 1 ? all[0] : and_(...all);
    return this.#with({ where: combined });
  }

  groupBy(...clauses: readonly ColumnElement[]): Select {
    return this.#with({ groupBy: [...this.#state.groupBy, ...clauses] });
  }

  orderBy(...clauses: readonly ColumnElement[]): Select {
    return this.#with({ orderBy: [...this.#state.orderBy, ...clauses] });
  }

  limit(count: number): Select {
    return this.#with({ limit: new BindParameter(undefined, count, INTEGER) });
  }

  offset(count: number): Select {
    return this.#with({ offset: new BindParameter(undefined, count, INTEGER) });
  }

  distinct(): Select {
    return this.#with({ distinct: true });
  }

  correlate(...from: readonly FromClause[]): Select {
    return this.#with({ correlate: [...this.#state.correlate, ...from] });
  }

  alias(name?: string): Alias {
    return new Alias(this, name);
  }

  traversalFields(): readonly TraversalField[] {
    return [
      visit.nodeList("columns", this.#state.columns),
      visit.nodeList("from", this.#state.from),
      visit.node("where", this.#state.where),
      visit.nodeList("groupBy", this.#state.groupBy),
      visit.nodeList("orderBy", this.#state.orderBy),
      visit.node("limit", this.#state.limit),
      visit.node("offset", this.#state.offset),
      visit.plain("distinct", this.#state.distinct),
      visit.unorderedSet("correlate", this.#state.correlate),
    ];
  }

  #with(changes: Partial<SelectState>): Select {
    return new Select({ ...this.#state, ...changes });
  }
}

const BIND_PARAM_PATTERN = /(?<![:\w\\]):(\w+)(?!:)/g;

/**
 * Options for `TextClause.columns()`.
 */
export type TextColumnsOptions = Readonly<{
  /** Additional columns declared by name and type only */
  types?: ColumnDefinitions;
  /**
   * Match declared columns to result columns by position. Defaults to true
   * when columns are given as elements and no `types` are given.
   */
  positional?: boolean;
}>;

/**
 * Literal SQL text with `:name` bind parameters.
 */
export class TextClause extends ClauseElement {
  readonly visitName = "textclause";
  readonly text: string;
  readonly #bindParameters: ReadonlyMap<string, BindParameter>;
  /** Bind parameters are passed to the driver as a list, in order */
  readonly positionalParameters: boolean;

  constructor(
    text: string,
    bindParameters?: ReadonlyMap<string, BindParameter>,
    positionalParameters = false,
  ) {
    super();
    this.text = text;
    this.positionalParameters = positionalParameters;
    this.#bindParameters =
      bindParameters ??
      new Map(
        [...text.matchAll(BIND_PARAM_PATTERN)].flatMap((match) => {
          const name = match[1];
          return name === undefined
            ? []
            : [[name, new BindParameter(name, undefined, NULLTYPE)] as const];
        }),
      );
  }

  get bindParameters(): readonly BindParameter[] {
    return [...this.#bindParameters.values()];
  }

  /**
   * Returns a copy with values assigned to the named bind parameters.
   */
  bindParams(values: Readonly<Record<string, unknown>>): TextClause {
    const next = new Map(this.#bindParameters);
    for (const [name, value] of Object.entries(values)) {
      const existing = next.get(name);
      if (existing === undefined) {
        throw new InvalidRequestError(
          `This text() construct doesn't define a bound parameter named '${name}'`,
          { name, defined: [...this.#bindParameters.keys()] },
        );
      }
      const type = existing.type === NULLTYPE ? typeForValue(value) : existing.type;
      next.set(name, new BindParameter(name, value, type));
    }
    return new TextClause(this.text, next, this.positionalParameters);
  }

  /**
   * Declares the columns this text returns.
   */
  columns(
    columns: readonly (ColumnElement | string)[] = [],
    options: TextColumnsOptions = {},
  ): TextualSelect {
    const types = new Map(Object.entries(options.types ?? {}));
    const positionalColumns = columns.map((entry) => {
      const name =
        typeof entry === "string"
          ? entry
          : entry instanceof ColumnClause
            ? entry.name
            : undefined;
      const declared = name === undefined ? undefined : types.get(name);
      if (name !== undefined && declared !== undefined) {
        types.delete(name);
        return new ColumnClause(name, declared);
      }
      return typeof entry === "string" ? new ColumnClause(entry) : entry;
    });
    const keyedColumns = [...types.entries()].map(
      ([name, type]) => new ColumnClause(name, type),
    );

    return new TextualSelect(
      this,
      [...positionalColumns, ...keyedColumns],
      options.positional ??
        (positionalColumns.length > 0 && keyedColumns.length === 0),
    );
  }

  override get description(): string {
    return this.text;
  }

  traversalFields(): readonly TraversalField[] {
    return [
      this.positionalParameters
        ? visit.nodeList("bindParameters", this.bindParameters)
        : visit.stringNodeDict("bindParameters", this.#bindParameters),
      visit.plain("text", this.text),
      visit.plain("positionalParameters", this.positionalParameters),
    ];
  }
}

/**
 * Text with declared result columns.
 */
export class TextualSelect extends ClauseElement {
  readonly visitName = "textual_select";
  readonly element: TextClause;
  readonly columnArgs: readonly ColumnElement[];
  readonly positional: boolean;

  constructor(
    element: TextClause,
    columnArgs: readonly ColumnElement[],
    positional: boolean,
  ) {
    super();
    this.element = element;
    this.columnArgs = columnArgs;
    this.positional = positional;
  }

  get selectedColumns(): readonly ColumnElement[] {
    return this.columnArgs;
  }

  bindParams(values: Readonly<Record<string, unknown>>): TextualSelect {
    return new TextualSelect(
      this.element.bindParams(values),
      this.columnArgs,
      this.positional,
    );
  }

  override get description(): string {
    return this.element.text;
  }

  traversalFields(): readonly TraversalField[] {
    return [
      visit.node("element", this.element),
      visit.nodeList("columnArgs", this.columnArgs),
      visit.plain("positional", this.positional),
    ];
  }
}

// ============================================================
// Constructors
// ============================================================

export function table(
  name: string,
  columns: ColumnDefinitions,
  options?: Readonly<{ schema?: string }>,
): Table {
  return new Table(name, columns, options);
}

export function column(name: string, type?: SqlType): ColumnClause {
  return new ColumnClause(name, type);
}

/**
 * An anonymous bind parameter carrying `value`.
 */
export function literal(value: unknown, type?: SqlType): BindParameter {
  return new BindParameter(undefined, value, type);
}

export function bindParam(
  key: string,
  value?: unknown,
  type?: SqlType,
): BindParameter {
  return new BindParameter(key, value, type);
}

export function and_(...clauses: readonly ColumnElement[]): BooleanClauseList {
  return new BooleanClauseList(clauses, operators.and);
}

export function or_(...clauses: readonly ColumnElement[]): BooleanClauseList {
  return new BooleanClauseList(clauses, operators.or);
}

export function not_(clause: ColumnElement): ColumnElement {
  if (clause instanceof BinaryExpression && clause.negate !== undefined) {
    return new BinaryExpression(clause.left, clause.right, clause.negate, BOOLEAN);
  }
  return new UnaryExpression(clause, { operator: operators.not, type: BOOLEAN });
}

export function desc(clause: ColumnElement): UnaryExpression {
  return clause.desc();
}

export function asc(clause: ColumnElement): UnaryExpression {
  return clause.asc();
}

/**
 * Builds a CASE expression from `[condition, result]` pairs.
 */
export function case_(
  whens: readonly (readonly [ColumnElement, ColumnOperand])[],
  options: Readonly<{ else?: ColumnOperand }> = {},
): Case {
  return new Case(
    whens.map(([condition, result]) => [condition, coerce(result)] as const),
    options.else === undefined ? undefined : coerce(options.else),
  );
}

export function label(name: string, element: ColumnElement): Label {
  return new Label(name, element);
}

export function text(sql: string): TextClause {
  return new TextClause(sql);
}

/**
 * Builds a SELECT; a table selects all of its columns.
 */
export function select(...columns: readonly (ColumnElement | Table)[]): Select {
  return new Select({
    columns: columns.flatMap<ColumnElement>((entry) =>
      entry instanceof Table ? entry.columns : [entry],
    ),
    from: [],
    where: undefined,
    groupBy: [],
    orderBy: [],
    limit: undefined,
    offset: undefined,
    distinct: false,
    correlate: [],
  });
}

const star = (): ColumnClause =>
  new ColumnClause("*", NULLTYPE, { isLiteral: true });

/**
 * SQL function calls.
 */
export const func = {
  count: (element?: ColumnElement): FunctionCall =>
    new FunctionCall("count", [element ?? star()], INTEGER),
  max: (element: ColumnElement): FunctionCall =>
    new FunctionCall("max", [element], element.type),
  min: (element: ColumnElement): FunctionCall =>
    new FunctionCall("min", [element], element.type),
  sum: (element: ColumnElement): FunctionCall =>
    new FunctionCall("sum", [element], element.type),
  lower: (element: ColumnElement): FunctionCall =>
    new FunctionCall("lower", [element], element.type),
  upper: (element: ColumnElement): FunctionCall =>
    new FunctionCall("upper", [element], element.type),
  coalesce: (...elements: readonly ColumnElement[]): FunctionCall =>
    new FunctionCall("coalesce", elements, elements[0]?.type ?? NULLTYPE),
  call: (
    name: string,
    args: readonly ColumnElement[],
    type: SqlType = NULLTYPE,
  ): FunctionCall => new FunctionCall(name, args, type),
} as const;
