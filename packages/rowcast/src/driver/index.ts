export { createBetterSqliteConnection } from "./better-sqlite3";
export type {
  DriverConnection,
  DriverCursor,
  DriverParameters,
  RawColumnDescriptor,
  RawRow,
} from "./types";
