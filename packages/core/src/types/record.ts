/**
 * Record types for data exchange between connectors
 */

/** Generic record type - a row of data */
export type Record = {
  [key: string]: unknown;
};

/** Result of a read operation */
export interface ReadResult {
  /** The retrieved records, in source order */
  records: Record[];
  /** Column names as declared by the source (header row, sheet header, or field names) */
  columns: string[];
  /** Number of records */
  totalCount: number;
}

/** Result of a write operation */
export interface WriteResult {
  /** Number of records written */
  success: number;
  /** Number of records that failed */
  failed: number;
  /** File (or other destination) the records were written to */
  destination: string;
}
