export type AnalysisErrorCode =
  | "UNKNOWN_QUANTITY"
  | "MISSING_COLUMN"
  | "DEPENDENCY_CYCLE"
  | "INCOMPATIBLE_UNITS"
  | "INVALID_THRESHOLD"
  | "EMPTY_SERIES"
  | "UNSUPPORTED_FILE"
  | "NO_INPUT_FILES"
  | "INVALID_TIMESTAMP"
  | "CONFIG_INVALID";

export class AnalysisError extends Error {
  code: AnalysisErrorCode;
  details?: Record<string, unknown>;

  constructor(code: AnalysisErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = "AnalysisError";
    this.code = code;
    this.details = details;
  }
}

export class UnknownQuantityError extends AnalysisError {
  quantity: string;

  constructor(quantity: string, reason?: string) {
    super(
      "UNKNOWN_QUANTITY",
      reason ? `Unknown quantity "${quantity}": ${reason}` : `Unknown quantity "${quantity}".`,
      { quantity }
    );
    this.name = "UnknownQuantityError";
    this.quantity = quantity;
  }
}

export class MissingColumnError extends AnalysisError {
  quantity: string;
  column: string | null;

  constructor(quantity: string, column: string | null) {
    super(
      "MISSING_COLUMN",
      column
        ? `Column "${column}" for quantity "${quantity}" is not in the dataset.`
        : `The name table has no column for quantity "${quantity}".`,
      { quantity, column }
    );
    this.name = "MissingColumnError";
    this.quantity = quantity;
    this.column = column;
  }
}

export class DependencyCycleError extends AnalysisError {
  path: string[];

  constructor(path: string[]) {
    super("DEPENDENCY_CYCLE", `Dependency cycle: ${path.join(" -> ")}`, { path });
    this.name = "DependencyCycleError";
    this.path = path;
  }
}

export class IncompatibleUnitsError extends AnalysisError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("INCOMPATIBLE_UNITS", message, details);
    this.name = "IncompatibleUnitsError";
  }
}

export class InvalidThresholdError extends AnalysisError {
  constructor(message: string, thresholds: number[]) {
    super("INVALID_THRESHOLD", message, { thresholds });
    this.name = "InvalidThresholdError";
  }
}

export class EmptySeriesError extends AnalysisError {
  constructor(message: string) {
    super("EMPTY_SERIES", message);
    this.name = "EmptySeriesError";
  }
}

export class UnsupportedFileError extends AnalysisError {
  constructor(path: string) {
    super("UNSUPPORTED_FILE", `Unsupported file type for "${path}". Use a .csv or .xlsx file.`, {
      path
    });
    this.name = "UnsupportedFileError";
  }
}

export class NoInputFilesError extends AnalysisError {
  constructor(directory: string, fileType: string) {
    super("NO_INPUT_FILES", `No ${fileType} logger files found in "${directory}".`, {
      directory,
      fileType
    });
    this.name = "NoInputFilesError";
  }
}

export class InvalidTimestampError extends AnalysisError {
  constructor(value: unknown, rowIndex: number) {
    super("INVALID_TIMESTAMP", `Row ${rowIndex + 1} has an unreadable timestamp.`, {
      value: String(value),
      rowIndex
    });
    this.name = "InvalidTimestampError";
  }
}

export class ConfigError extends AnalysisError {
  constructor(message: string, issues: unknown[]) {
    super("CONFIG_INVALID", message, { issues });
    this.name = "ConfigError";
  }
}
