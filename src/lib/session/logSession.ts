import { loadAnalysisConfig, type AnalysisConfig, type AnalysisConfigInput } from "../config";
import { UnknownQuantityError } from "../errors";
import { buildRawDataset } from "../import/buildDataset";
import { listLoggerFiles, readLoggerFiles, type LoggerFileType } from "../import/parseFile";
import type { RawCell, RawDataset, RowFilter } from "../import/types";
import { createLogger, setLogLevel } from "../logger";
import { loadNameTable, type NameTable } from "../nameTable/nameTable";
import { distinctValues, selectRows } from "../quantities/filter";
import { parseQuantityRequest } from "../quantities/request";
import { QuantityStore } from "../quantities/store";
import type { DerivationRule } from "../quantities/types";
import { binDurations, STEADY_STATE_COLUMN } from "../steadyState/binner";
import { segmentSteadyRuns } from "../steadyState/segmenter";
import { createPropertyAdapter } from "../thermo/refrigerant";
import type { PropertyAdapter } from "../thermo/types";
import type { Quantity } from "../units/quantity";
import { createUnitRegistry, type UnitRegistry } from "../units/registry";
import {
  defaultValidationChecks,
  runValidation,
  summarizeValidation,
  type QuantityReader,
  type ValidationCheck,
  type ValidationReport
} from "../validation/checks";

const logger = createLogger("session");

export type SteadyStateLimits = AnalysisConfig["steadyState"];

export type SessionParts = {
  dataset: RawDataset;
  nameTable: NameTable;
  config?: AnalysisConfigInput;
  properties?: PropertyAdapter;
  registry?: UnitRegistry;
  rules?: readonly DerivationRule[];
};

/** Explicit file paths, or every logger export of one type in a directory. */
export type SessionSource =
  | { paths: string[] }
  | { directory: string; fileType?: LoggerFileType };

export type OpenSessionOptions = SessionSource & {
  nameTablePath?: string;
  config?: AnalysisConfigInput;
  properties?: PropertyAdapter;
};

export type GetOptions = {
  /** Rebuild every cached quantity even when the filter is unchanged. */
  update?: boolean;
};

export type GroupedQuantity = {
  value: RawCell;
  quantity: Quantity;
};

/**
 * One analysis session over a loaded dataset: quantity requests, steady-state
 * labelling and validation all go through here.
 */
export class LogSession {
  readonly dataset: RawDataset;
  readonly nameTable: NameTable;
  readonly config: Readonly<AnalysisConfig>;
  readonly registry: UnitRegistry;
  readonly properties: PropertyAdapter;
  private store: QuantityStore;
  private limits: SteadyStateLimits;

  constructor(parts: SessionParts) {
    this.config = loadAnalysisConfig(parts.config);
    this.dataset = parts.dataset;
    this.nameTable = parts.nameTable;
    this.registry = parts.registry ?? createUnitRegistry();
    this.properties = parts.properties ?? createPropertyAdapter(this.config.fluid);
    this.store = new QuantityStore({
      dataset: this.dataset,
      nameTable: this.nameTable,
      registry: this.registry,
      properties: this.properties,
      config: this.config,
      rules: parts.rules
    });
    this.limits = { ...this.config.steadyState };
  }

  static async open(options: OpenSessionOptions): Promise<LogSession> {
    const config = loadAnalysisConfig(options.config);
    setLogLevel(config.logLevel);
    const paths =
      "paths" in options
        ? options.paths
        : await listLoggerFiles(options.directory, options.fileType);
    const files = await readLoggerFiles(paths, {
      conditionKeywords: config.conditionKeywords
    });
    const session = new LogSession({
      dataset: buildRawDataset(files),
      nameTable: await loadNameTable(options.nameTablePath),
      config: options.config,
      properties: options.properties
    });
    logger.info("Opened session", {
      files: session.dataset.files,
      rows: session.dataset.rowCount,
      fluid: session.config.fluid
    });
    session.setSteadyStateLimits();
    return session;
  }

  /** Quantities in request order, e.g. `get("T4 pout/bar")`. */
  get(request: string | readonly string[], filter: RowFilter = {}, options: GetOptions = {}): Quantity[] {
    const requests = parseQuantityRequest(request);
    const resolved = this.store.resolve(
      requests.map(({ name }) => name),
      filter,
      options.update ?? false
    );
    return requests.map(({ name, unit }) => {
      const quantity = resolved.get(name);
      if (!quantity) {
        throw new UnknownQuantityError(name, "was not resolved");
      }
      return unit ? quantity.to(unit) : quantity;
    });
  }

  /** Seconds between the first two samples. */
  timestep(): number {
    return this.store.samplingInterval();
  }

  get steadyStateLimits(): SteadyStateLimits {
    return { ...this.limits, thresholdsMinutes: [...this.limits.thresholdsMinutes] };
  }

  /**
   * Segments the whole recording by compressor frequency and writes the
   * duration label of every sample into the steady-state column.
   */
  setSteadyStateLimits(limits: Partial<SteadyStateLimits> = {}): (string | null)[] {
    const next = { ...this.limits, ...limits };
    const [frequency] = this.get(["f"]);
    const { runs, durations } = segmentSteadyRuns(
      frequency.magnitude("Hz"),
      this.timestep(),
      next.stdThresholdHz
    );
    const labels = binDurations(durations, {
      thresholds: next.thresholdsMinutes.map((minutes) => minutes * 60),
      includeBelow: next.includeBelow,
      includeAbove: next.includeAbove
    });
    this.limits = next;
    this.dataset.columns[STEADY_STATE_COLUMN] = labels;
    logger.debug("Steady-state labels updated", {
      runs: runs.length,
      unlabelled: labels.filter((label) => label === null).length
    });
    return labels;
  }

  /** Distinct non-null values of a dataset column, in order of appearance. */
  groupValues(column: string): RawCell[] {
    return distinctValues(this.dataset, column).filter((value) => value !== null);
  }

  /** One quantity per distinct value of `column` among the filtered rows. */
  getGrouped(name: string, column: string, filter: RowFilter = {}): GroupedQuantity[] {
    const [quantity] = this.get([name], filter);
    const groups = new Map<RawCell, number[]>();
    const cells = this.dataset.columns[column];
    this.groupValues(column).forEach((value) => groups.set(value, []));
    selectRows(this.dataset, filter).forEach((row, position) => {
      groups.get(cells[row] ?? null)?.push(position);
    });
    return Array.from(groups.entries())
      .filter(([, positions]) => positions.length > 0)
      .map(([value, positions]) => ({ value, quantity: quantity.select(positions) }));
  }

  reader(): QuantityReader {
    return {
      registry: this.registry,
      get: (names, filter) => this.get(names, filter)
    };
  }

  validate(checks: readonly ValidationCheck[] = defaultValidationChecks): ValidationReport {
    const report = runValidation(this.reader(), checks);
    const lines = summarizeValidation(report.findings);
    if (report.status === "clean") {
      logger.info(lines[0]);
    } else {
      logger.warn(lines.join("\n"), { checks: report.findings.map((finding) => finding.check) });
    }
    return report;
  }
}
