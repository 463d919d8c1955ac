import { readdir, readFile } from "node:fs/promises";
import { basename, extname, join } from "node:path";
import { NoInputFilesError, UnsupportedFileError } from "../errors";
import { createLogger } from "../logger";
import { decodeText, parseCsvText } from "./parseCsv";
import { parseXlsxBuffer } from "./parseXlsx";
import type { LoggerFile } from "./types";

const logger = createLogger("import");

export type ReadOptions = {
  conditionKeywords?: string[];
};

export type LoggerFileType = "csv" | "xlsx" | "all";

const fileExtension = (path: string): string => extname(path).slice(1).toLowerCase();

const matchesType = (path: string, fileType: LoggerFileType): boolean => {
  const extension = fileExtension(path);
  if (fileType === "all") {
    return extension === "csv" || extension === "xlsx";
  }
  return extension === fileType;
};

/** Logger exports in `directory`, sorted by name. */
export const listLoggerFiles = async (
  directory: string,
  fileType: LoggerFileType = "all"
): Promise<string[]> => {
  const entries = await readdir(directory, { withFileTypes: true });
  const paths = entries
    .filter((entry) => entry.isFile() && matchesType(entry.name, fileType))
    .map((entry) => entry.name)
    .sort()
    .map((name) => join(directory, name));
  if (paths.length === 0) {
    throw new NoInputFilesError(directory, fileType);
  }
  return paths;
};

export const readLoggerFile = async (
  path: string,
  options: ReadOptions = {}
): Promise<LoggerFile> => {
  const extension = fileExtension(path);
  if (extension !== "csv" && extension !== "xlsx") {
    throw new UnsupportedFileError(path);
  }

  const buffer = await readFile(path);
  const fileName = basename(path);

  if (extension === "csv") {
    const table = parseCsvText(decodeText(buffer), options);
    logger.info("Read logger file", { fileName, rows: table.rows.length });
    return { fileName, table };
  }

  const tables = parseXlsxBuffer(new Uint8Array(buffer), options);
  if (tables.length === 0) {
    throw new Error(`No sheets detected in ${fileName}.`);
  }
  logger.info("Read logger file", {
    fileName,
    sheet: tables[0].sheetName,
    rows: tables[0].rows.length
  });
  return { fileName, table: tables[0] };
};

export const readLoggerFiles = async (
  paths: string[],
  options: ReadOptions = {}
): Promise<LoggerFile[]> => {
  const files: LoggerFile[] = [];
  for (const path of paths) {
    files.push(await readLoggerFile(path, options));
  }
  return files;
};
