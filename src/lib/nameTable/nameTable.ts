import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";

export type NameEntry = {
  name: string;
  column: string | null;
  unit: string | null;
  label: string | null;
  property: string | null;
};

export type NameTable = ReadonlyMap<string, NameEntry>;

export const NAME_TABLE_WIDTHS = [12, 36, 12, 20] as const;

export const DEFAULT_NAME_TABLE_PATH = fileURLToPath(
  new URL("../../../data/name_conversions.txt", import.meta.url)
);

const ABSENT = "-";

const cleanField = (value: string): string | null => {
  const trimmed = value.trim();
  return trimmed === "" || trimmed === ABSENT ? null : trimmed;
};

const splitFixedWidth = (line: string, widths: readonly number[]): string[] => {
  const fields: string[] = [];
  let offset = 0;
  widths.forEach((width) => {
    fields.push(line.slice(offset, offset + width));
    offset += width;
  });
  fields.push(line.slice(offset));
  return fields;
};

/**
 * Reads the fixed-width table mapping short quantity names to logger columns.
 * The first non-comment line is the header and is skipped.
 */
export const parseNameTable = (
  text: string,
  widths: readonly number[] = NAME_TABLE_WIDTHS
): NameTable => {
  const lines = text
    .replace(/\r\n/g, "\n")
    .split("\n")
    .filter((line) => line.trim().length > 0 && !line.trimStart().startsWith("#"));

  const table = new Map<string, NameEntry>();
  lines.slice(1).forEach((line) => {
    const [name, column, unit, label, property] = splitFixedWidth(line, widths).map(cleanField);
    if (!name) {
      return;
    }
    table.set(name, {
      name,
      column: column ?? null,
      unit: unit ?? null,
      label: label ?? null,
      property: property ?? null
    });
  });
  return table;
};

export const loadNameTable = async (path: string = DEFAULT_NAME_TABLE_PATH): Promise<NameTable> =>
  parseNameTable(await readFile(path, "utf8"));
