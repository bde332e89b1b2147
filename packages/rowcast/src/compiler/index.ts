export { createCompiledStatement, resultColumnFor } from "./compiled";
export { fromDrizzle } from "./drizzle";
export { TextCompiler } from "./text-compiler";
export type {
  ColumnKey,
  CompiledStatement,
  ResultColumn,
  StatementCompiler,
} from "./types";
