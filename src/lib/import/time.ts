import { InvalidTimestampError } from "../errors";
import type { RawCell } from "./types";

const dayFirstPattern =
  /^(\d{1,2})[/.-](\d{1,2})[/.-](\d{4})[ T](\d{1,2}):(\d{2})(?::(\d{2}(?:\.\d+)?))?$/;

const EXCEL_EPOCH_OFFSET_DAYS = 25569;
const DAY_MS = 86_400_000;
const EXCEL_SERIAL_LIMIT = 100_000;

const pad = (value: number): string => value.toString().padStart(2, "0");

/**
 * Logger timestamps carry no zone; they are read and formatted as UTC wall-clock
 * times so the same file yields the same labels on every machine.
 */
export const parseTimestamp = (value: RawCell): number | null => {
  if (value === null) {
    return null;
  }
  if (typeof value === "number") {
    if (!Number.isFinite(value)) {
      return null;
    }
    // spreadsheet serial days
    if (Math.abs(value) < EXCEL_SERIAL_LIMIT) {
      return Math.round((value - EXCEL_EPOCH_OFFSET_DAYS) * DAY_MS);
    }
    return value;
  }
  const trimmed = value.trim();
  if (!trimmed) {
    return null;
  }
  const match = dayFirstPattern.exec(trimmed);
  if (match) {
    const [, day, month, year, hours, minutes, seconds] = match;
    const wholeSeconds = Number(seconds ?? "0");
    return (
      Date.UTC(Number(year), Number(month) - 1, Number(day), Number(hours), Number(minutes)) +
      Math.round(wholeSeconds * 1000)
    );
  }
  const isoLike = /[zZ]|[+-]\d{2}:?\d{2}$/.test(trimmed) ? trimmed : `${trimmed.replace(" ", "T")}Z`;
  const parsed = Date.parse(isoLike);
  return Number.isNaN(parsed) ? null : parsed;
};

export const roundToSecond = (timestamp: number): number => Math.round(timestamp / 1000) * 1000;

export const parseTimestampColumn = (cells: RawCell[]): number[] =>
  cells.map((cell, rowIndex) => {
    const parsed = parseTimestamp(cell);
    if (parsed === null) {
      throw new InvalidTimestampError(cell, rowIndex);
    }
    return roundToSecond(parsed);
  });

export const formatTestPeriod = (start: number, stop: number): string => {
  const startDate = new Date(start);
  const stopDate = new Date(stop);
  const day = (date: Date) => `${pad(date.getUTCDate())}/${pad(date.getUTCMonth() + 1)}`;
  const clock = (date: Date) => `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}`;
  const spansDays = stop - start > DAY_MS;
  return `${day(startDate)} ${clock(startDate)} - ${spansDays ? `${day(stopDate)} ` : ""}${clock(stopDate)}`;
};
