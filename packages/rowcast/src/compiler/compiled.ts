import { InvalidRequestError } from "../errors";
import { renderName } from "../sql/anonymous-name";
import {
  type BindParameter,
  type ClauseElement,
  ColumnClause,
  type ColumnElement,
  Label,
} from "../sql/elements";
import type { ColumnKey, CompiledStatement, ResultColumn } from "./types";

export type CompiledStatementInit = Omit<CompiledStatement, "constructParams">;

/**
 * Completes a compiled statement with its parameter builder.
 */
export function createCompiledStatement(
  init: CompiledStatementInit,
): CompiledStatement {
  const names = parameterNames(init.bindParameters);

  return {
    ...init,
    constructParams(extracted) {
      const values = init.bindParameters.map((parameter, index) => {
        const source = extracted?.[index] ?? parameter;
        if (source.value === undefined) {
          throw new InvalidRequestError(
            `A value is required for bind parameter '${names[index] ?? ""}'`,
            { parameter: names[index] },
          );
        }
        return source.value;
      });

      if (init.positional) {
        return values;
      }
      const named: Record<string, unknown> = {};
      for (const [index, value] of values.entries()) {
        const name = names[index];
        if (name !== undefined) named[name] = value;
      }
      return named;
    },
  };
}

/**
 * Renders bind parameter names; anonymous names are numbered in order.
 */
function parameterNames(parameters: readonly BindParameter[]): readonly string[] {
  let anonymous = 0;
  return parameters.map((parameter) =>
    typeof parameter.paramKey === "string"
      ? parameter.paramKey
      : renderName(parameter.paramKey, ++anonymous),
  );
}

/**
 * Declares the result column produced by selecting `element`.
 */
export function resultColumnFor(
  element: ColumnElement,
  position: number,
): ResultColumn {
  const name = element.key ?? anonymousColumnName(element, position);
  const objects: ColumnKey[] = [element, name];

  if (element instanceof Label && element.element instanceof ColumnClause) {
    objects.push(element.element);
  }

  return { name, renderedName: name, objects, type: element.type };
}

function anonymousColumnName(element: ClauseElement, position: number): string {
  return element instanceof Label
    ? renderName(element.name, position + 1)
    : `${element.visitName}_${position + 1}`;
}
