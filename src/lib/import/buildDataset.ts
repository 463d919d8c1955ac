import { createLogger } from "../logger";
import { formatTestPeriod, parseTimestampColumn } from "./time";
import {
  FILE_INDEX_COLUMN,
  TEST_DURATION_COLUMN,
  TEST_PERIOD_COLUMN,
  TIMESTAMP_COLUMN,
  type LoggerFile,
  type RawCell,
  type RawDataset
} from "./types";

const logger = createLogger("import");

const columnOf = (file: LoggerFile, header: string): RawCell[] => {
  const index = file.table.headers.indexOf(header);
  return file.table.rows.map((row) => (index === -1 ? null : row[index] ?? null));
};

/**
 * Stacks logger files into one dataset. Each file contributes its rows in order
 * plus the bookkeeping columns `file_index`, `test_period` and `test_duration`.
 */
export const buildRawDataset = (files: LoggerFile[]): RawDataset => {
  const headers: string[] = [];
  files.forEach((file) => {
    file.table.headers.forEach((header) => {
      if (!headers.includes(header)) {
        headers.push(header);
      }
    });
  });

  const columns: Record<string, RawCell[]> = {};
  headers
    .filter((header) => header !== TIMESTAMP_COLUMN)
    .forEach((header) => {
      columns[header] = files.flatMap((file) => columnOf(file, header));
    });

  const timestamps: number[] = [];
  const fileIndex: number[] = [];
  const testPeriod: string[] = [];
  const testDuration: number[] = [];

  files.forEach((file, index) => {
    const stamps = parseTimestampColumn(columnOf(file, TIMESTAMP_COLUMN));
    if (stamps.length === 0) {
      return;
    }
    const start = stamps[0];
    const stop = stamps[stamps.length - 1];
    const period = formatTestPeriod(start, stop);
    if (files.length === 1 && file.table.conditions) {
      logger.info("Test conditions", { fileName: file.fileName, conditions: file.table.conditions });
    }
    stamps.forEach((stamp) => {
      timestamps.push(stamp);
      fileIndex.push(index);
      testPeriod.push(period);
      testDuration.push((stop - start) / 1000);
    });
  });

  columns[TIMESTAMP_COLUMN] = timestamps;
  columns[FILE_INDEX_COLUMN] = fileIndex;
  columns[TEST_PERIOD_COLUMN] = testPeriod;
  columns[TEST_DURATION_COLUMN] = testDuration;

  return {
    files: files.map((file) => file.fileName),
    conditions: files.map((file) => file.table.conditions ?? null),
    rowCount: timestamps.length,
    columns
  };
};
