import * as XLSX from "xlsx";
import { isConditionLine } from "./parseCsv";
import type { RawCell, RawTable } from "./types";

const normalizeCell = (value: unknown): RawCell => {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === "number") {
    return value;
  }
  if (typeof value === "boolean") {
    return value ? 1 : 0;
  }
  const text = String(value).trim();
  return text.length === 0 ? null : text;
};

const buildHeaders = (rawHeaders: unknown[]): string[] =>
  rawHeaders.map((header, index) => {
    const label = normalizeCell(header);
    if (label === null || label === "") {
      return `Column ${index + 1}`;
    }
    return String(label);
  });

const isRowArray = (row: unknown): row is unknown[] => Array.isArray(row);

export const parseXlsxBuffer = (
  buffer: ArrayBuffer | Uint8Array,
  options: { conditionKeywords?: string[] } = {}
): RawTable[] => {
  const workbook = XLSX.read(buffer, { type: "array" });
  return workbook.SheetNames.map((sheetName) => {
    const sheet = workbook.Sheets[sheetName];
    const rows = XLSX.utils
      .sheet_to_json<unknown>(sheet, {
        header: 1,
        blankrows: false
      })
      .filter(isRowArray);

    const firstCell = normalizeCell(rows[0]?.[0]);
    const hasConditions =
      typeof firstCell === "string" &&
      isConditionLine(firstCell, options.conditionKeywords ?? []);
    const body = hasConditions ? rows.slice(1) : rows;

    const headers = buildHeaders(body[0] ?? []);
    const dataRows = body
      .slice(1)
      .map((row) => headers.map((_, index) => normalizeCell(row[index])));

    return {
      sheetName,
      conditions: hasConditions ? firstCell : null,
      headers,
      rows: dataRows
    };
  });
};
