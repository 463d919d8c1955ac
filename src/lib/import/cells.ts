import type { RawCell } from "./types";

const numericPattern = /^-?\d+(?:\.\d+)?(?:[eE][+-]?\d+)?$/;
const commaDecimalPattern = /^-?\d+,\d+(?:[eE][+-]?\d+)?$/;

export const parseNumericCell = (value: RawCell): number | null => {
  if (value === null) {
    return null;
  }
  if (typeof value === "number") {
    return Number.isNaN(value) ? null : value;
  }
  const trimmed = value.trim();
  if (!trimmed) {
    return null;
  }
  const cleaned = trimmed.replace(/\s+/g, "");
  if (commaDecimalPattern.test(cleaned)) {
    const parsed = Number(cleaned.replace(",", "."));
    return Number.isNaN(parsed) ? null : parsed;
  }
  if (numericPattern.test(cleaned)) {
    const parsed = Number(cleaned);
    return Number.isNaN(parsed) ? null : parsed;
  }
  return null;
};

/** Numeric view of a raw column; unreadable cells become NaN. */
export const toNumericColumn = (cells: RawCell[]): number[] =>
  cells.map((cell) => parseNumericCell(cell) ?? Number.NaN);

/** Logger out-of-range markers become zero, everything else is parsed as usual. */
export const toCleanedColumn = (cells: RawCell[], sentinels: string[]): number[] =>
  cells.map((cell) => {
    if (typeof cell === "string" && sentinels.includes(cell.trim())) {
      return 0;
    }
    return parseNumericCell(cell) ?? Number.NaN;
  });
