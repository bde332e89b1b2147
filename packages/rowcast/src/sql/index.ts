export { AnonymousName, renderName } from "./anonymous-name";
export {
  Alias,
  and_,
  asc,
  BinaryExpression,
  BindParameter,
  bindParam,
  BooleanClauseList,
  Case,
  case_,
  ClauseElement,
  ClauseList,
  column,
  ColumnClause,
  type ColumnClauseOptions,
  type ColumnDefinitions,
  ColumnElement,
  type ColumnOperand,
  desc,
  type FromClause,
  func,
  FunctionCall,
  label,
  Label,
  literal,
  not_,
  Null,
  OpaqueClause,
  or_,
  select,
  Select,
  Table,
  table,
  text,
  TextClause,
  type TextColumnsOptions,
  TextualSelect,
  UnaryExpression,
} from "./elements";
export {
  isComparison,
  negationOf,
  type Operator,
  type OperatorName,
  operators,
} from "./operators";
export {
  iterateElements,
  type KeyPart,
  type PlainValue,
  type TraversalField,
  visit,
  VisitKind,
} from "./traversal";
export {
  BlobType,
  BOOLEAN,
  BooleanType,
  DateTimeType,
  FloatType,
  INTEGER,
  IntegerType,
  JsonType,
  NULLTYPE,
  NullType,
  NumericType,
  type RawTypeCode,
  SqlType,
  STRING,
  StringType,
  type TypeAffinity,
  typeForValue,
  type ValueDecoder,
} from "./types";
