/**
 * PostgreSQL Dialect
 *
 * node-postgres already parses booleans, JSON and timestamps; 64-bit
 * integers arrive as strings and still need decoding. NUMERIC stays a
 * string unless its scale is 0.
 * Type codes are type OIDs.
 */
import { type Dialect } from "./types";

const TEXT_OIDS: ReadonlySet<number> = new Set([
  25, // text
  1043, // varchar
  1042, // bpchar
]);

export const postgresDialect: Dialect = {
  name: "postgres",
  caseSensitive: true,
  requiresNameNormalize: false,
  normalizeName: (name) => name,
  translateColumnName: undefined,
  getResultDecoder: (type, typeCode) => {
    switch (type.affinity) {
      case "integer":
      case "float":
      case "numeric": {
        return type.resultDecoder(typeCode);
      }
      case "boolean":
      case "datetime":
      case "json": {
        // Parsed by the driver unless the column was cast to text
        return typeof typeCode === "number" && TEXT_OIDS.has(typeCode)
          ? type.resultDecoder(typeCode)
          : undefined;
      }
      default: {
        return undefined;
      }
    }
  },
};
