/**
 * Compiler for literal SQL text.
 *
 * The text is passed to the driver unchanged. Result columns come from
 * `text().columns()`: element lists are matched by position, named columns
 * by name with loose matching.
 */
import type { Dialect } from "../dialect/types";
import { InvalidRequestError } from "../errors";
import { type ClauseElement, TextClause, TextualSelect } from "../sql/elements";
import { createCompiledStatement, resultColumnFor } from "./compiled";
import type { CompiledStatement, StatementCompiler } from "./types";

export class TextCompiler implements StatementCompiler {
  compile(statement: ClauseElement, _dialect: Dialect): CompiledStatement {
    if (statement instanceof TextClause) {
      return createCompiledStatement({
        sql: statement.text,
        statement,
        resultColumns: [],
        columnsAreOrdered: false,
        textualOrdered: false,
        looseColumnNameMatching: false,
        bindParameters: statement.bindParameters,
        positional: statement.positionalParameters,
      });
    }

    if (statement instanceof TextualSelect) {
      const { positional } = statement;
      return createCompiledStatement({
        sql: statement.element.text,
        statement,
        resultColumns: statement.columnArgs.map((column, position) =>
          resultColumnFor(column, position),
        ),
        columnsAreOrdered: positional,
        textualOrdered: positional,
        looseColumnNameMatching: !positional && statement.columnArgs.length > 0,
        bindParameters: statement.element.bindParameters,
        positional: statement.element.positionalParameters,
      });
    }

    throw new InvalidRequestError(
      `TextCompiler cannot compile '${statement.visitName}' elements`,
      { visitName: statement.visitName },
      {
        suggestion: `Wrap literal SQL in text(), or pass a compiler for this element to createExecutor().`,
      },
    );
  }
}
