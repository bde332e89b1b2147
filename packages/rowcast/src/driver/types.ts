import type { RawTypeCode } from "../sql/types";

// ============================================================
// Driver Adapter Types
// ============================================================

/**
 * Name and type code the driver reports for one result column.
 */
export type RawColumnDescriptor = Readonly<{
  name: string;
  typeCode: RawTypeCode;
}>;

/**
 * One row as the driver returns it, before decoding.
 */
export type RawRow = readonly unknown[];

/**
 * Parameters in the form the driver accepts: a list for positional
 * placeholders, a record for named ones.
 */
export type DriverParameters =
  | readonly unknown[]
  | Readonly<Record<string, unknown>>;

/**
 * A live driver cursor. All calls block.
 */
export interface DriverCursor {
  /** Column descriptors, or undefined when the statement returns no rows */
  readonly description: readonly RawColumnDescriptor[] | undefined;
  /** Rows affected by a DML statement; -1 when unknown */
  readonly rowCount: number;
  /** Generated id of the last inserted row, when the driver reports one */
  readonly lastRowId: number | bigint | undefined;

  fetchOne(): RawRow | undefined;
  fetchMany(size?: number): RawRow[];
  fetchAll(): RawRow[];
  close(): void;
}

export interface DriverConnection {
  execute(sql: string, parameters: DriverParameters): DriverCursor;
}
