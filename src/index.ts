export { analysisConfigSchema, loadAnalysisConfig, supportedFluids } from "./lib/config";
export type { AnalysisConfig, AnalysisConfigInput, FluidName } from "./lib/config";
export * from "./lib/errors";
export { createLogger, Logger, setLogLevel } from "./lib/logger";
export { buildRawDataset } from "./lib/import/buildDataset";
export { listLoggerFiles, readLoggerFile, readLoggerFiles } from "./lib/import/parseFile";
export type { LoggerFileType } from "./lib/import/parseFile";
export { parseCsvText } from "./lib/import/parseCsv";
export { parseXlsxBuffer } from "./lib/import/parseXlsx";
export {
  FILE_INDEX_COLUMN,
  TEST_DURATION_COLUMN,
  TEST_PERIOD_COLUMN,
  TIMESTAMP_COLUMN
} from "./lib/import/types";
export type { LoggerFile, RawCell, RawDataset, RawTable, RowFilter } from "./lib/import/types";
export { loadNameTable, parseNameTable, DEFAULT_NAME_TABLE_PATH } from "./lib/nameTable/nameTable";
export type { NameEntry, NameTable } from "./lib/nameTable/nameTable";
export { filterSignature, samplingInterval, selectRows } from "./lib/quantities/filter";
export {
  correctPhase,
  determineOperatingMode,
  pressureSide,
  processStatesFor
} from "./lib/quantities/heat";
export { parseQuantityRequest } from "./lib/quantities/request";
export type { QuantityRequest } from "./lib/quantities/request";
export { asIsQuantity, defaultDerivationRules } from "./lib/quantities/rules";
export { QuantityStore } from "./lib/quantities/store";
export type { DerivationEnv, DerivationRule, OperatingMode, RuleCategory } from "./lib/quantities/types";
export { LogSession } from "./lib/session/logSession";
export type {
  GroupedQuantity,
  OpenSessionOptions,
  SessionSource,
  SteadyStateLimits
} from "./lib/session/logSession";
export {
  binDurations,
  binLabels,
  durationUnit,
  formatDuration,
  STEADY_STATE_COLUMN
} from "./lib/steadyState/binner";
export type { BinOptions, DurationUnit } from "./lib/steadyState/binner";
export {
  createSteadyRunState,
  segmentSteadyRuns,
  stepSteadyRun
} from "./lib/steadyState/segmenter";
export type { Segmentation, SteadyRun, SteadyRunState } from "./lib/steadyState/segmenter";
export { createPropertyAdapter, TabulatedRefrigerant } from "./lib/thermo/refrigerant";
export type { Phase, PropertyAdapter } from "./lib/thermo/types";
export { Quantity } from "./lib/units/quantity";
export type { QuantityMeta } from "./lib/units/quantity";
export { createUnitRegistry, DIMENSIONLESS, UnitRegistry } from "./lib/units/registry";
export {
  defaultValidationChecks,
  runValidation,
  summarizeValidation
} from "./lib/validation/checks";
export type { QuantityReader, ValidationCheck, ValidationFinding } from "./lib/validation/checks";
