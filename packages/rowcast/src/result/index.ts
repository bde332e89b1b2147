export {
  CursorResult,
  type CursorResultInit,
  MappingResult,
  type ResultState,
  ScalarResult,
} from "./cursor-result";
export {
  type BufferingOptions,
  BufferedRowFetchStrategy,
  CursorFetchStrategy,
  type FetchOwner,
  type FetchStrategy,
  type FetchStrategyKind,
  FullyBufferedFetchStrategy,
  NoCursorNoRowsFetchStrategy,
  NoCursorRowsFetchStrategy,
} from "./fetch-strategy";
export {
  type ResolveRowMetadataInput,
  resolveRowMetadata,
  selectMatchStrategy,
} from "./resolver";
export { Row, RowMapping, type SerializedRow } from "./row";
export {
  type AmbiguousRecord,
  type ColumnRecord,
  type KeymapRecord,
  type MatchStrategy,
  type RowKey,
  RowMetadata,
  type RowMetadataInit,
  type SerializedRowMetadata,
  serializedRowMetadataSchema,
} from "./row-metadata";
