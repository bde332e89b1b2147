import type { Dialect } from "../dialect/types";
import type { DriverParameters } from "../driver/types";
import type { BindParameter, ClauseElement } from "../sql/elements";
import type { SqlType } from "../sql/types";

/**
 * Any key a column may be looked up by besides its position: a name, or the
 * element that declared it.
 */
export type ColumnKey = string | ClauseElement;

/**
 * A result column the compiler declared before execution.
 */
export type ResultColumn = Readonly<{
  /** Key the column is exposed under */
  name: string;
  /** Name as rendered in the SQL text */
  renderedName: string;
  /** Alternate keys: the declaring element, labels, names */
  objects: readonly ColumnKey[];
  type: SqlType;
}>;

export type CompiledStatement = Readonly<{
  sql: string;
  /** The element that was compiled */
  statement: ClauseElement;
  resultColumns: readonly ResultColumn[];
  /** Result columns follow the order of the SELECT list */
  columnsAreOrdered: boolean;
  /** Result columns were declared positionally for literal SQL text */
  textualOrdered: boolean;
  /** Raw names may match any alternate name of a result column */
  looseColumnNameMatching: boolean;
  /** Bind parameters of `statement`, in traversal order */
  bindParameters: readonly BindParameter[];
  /** Parameters are passed as a list rather than a record */
  positional: boolean;
  /**
   * Builds driver parameters. `extracted` holds the bind parameters of the
   * statement being executed, aligned with `bindParameters`; when omitted
   * the compiled values are used.
   */
  constructParams: (extracted?: readonly BindParameter[]) => DriverParameters;
}>;

export interface StatementCompiler {
  compile(statement: ClauseElement, dialect: Dialect): CompiledStatement;
}
