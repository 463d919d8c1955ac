export type RawCell = string | number | null;

export type RawTable = {
  sheetName?: string;
  conditions?: string | null;
  headers: string[];
  rows: RawCell[][];
};

export type LoggerFile = {
  fileName: string;
  table: RawTable;
};

export const TIMESTAMP_COLUMN = "Timestamp";
export const FILE_INDEX_COLUMN = "file_index";
export const TEST_PERIOD_COLUMN = "test_period";
export const TEST_DURATION_COLUMN = "test_duration";

/**
 * Column-oriented samples of one or more logger files. `Timestamp` holds epoch
 * milliseconds rounded to whole seconds.
 */
export type RawDataset = {
  files: string[];
  conditions: (string | null)[];
  rowCount: number;
  columns: Record<string, RawCell[]>;
};

export type RowFilterValue = string | number | null;

export type RowFilter = Record<string, RowFilterValue>;
