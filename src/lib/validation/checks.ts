import type { RowFilter } from "../import/types";
import type { Quantity } from "../units/quantity";
import type { UnitRegistry } from "../units/registry";

export type ValidationSeverity = "info" | "warn" | "error";

export type ValidationStatus = "clean" | "warnings";

export type ValidationCode = "SUPPLY_HUMIDITY_EXCEEDS_RETURN" | "SHORT_CYCLING" | "LONG_STEP_CYCLING";

/** Read-only view of a session handed to validation checks. */
export type QuantityReader = {
  registry: UnitRegistry;
  get: (names: readonly string[], filter?: RowFilter) => Quantity[];
};

export type ValidationFinding = {
  check: string;
  code: ValidationCode;
  severity: ValidationSeverity;
  description: string;
  /** Quantities to show when the finding is plotted. */
  quantities: readonly string[];
  details?: Record<string, number>;
};

export type ValidationCheck = {
  id: string;
  quantities: readonly string[];
  run: (reader: QuantityReader) => ValidationFinding | null;
};

export type ValidationReport = {
  status: ValidationStatus;
  findings: ValidationFinding[];
};

const SHORT_CYCLING_VARIANCE_HZ2 = 400;
const LONG_STEP_VARIANCE_HZ2 = 100;

export const humidityCheck: ValidationCheck = {
  id: "humidity",
  quantities: ["wr", "ws"],
  run: (reader) => {
    const [returnRatio, supplyRatio] = reader.get(["wr", "ws"]);
    if (returnRatio.length === 0) {
      return null;
    }
    const exceeding = returnRatio.lessThan(supplyRatio).filter(Boolean).length;
    const share = exceeding / returnRatio.length;
    if (share === 0) {
      return null;
    }
    return {
      check: "humidity",
      code: "SUPPLY_HUMIDITY_EXCEEDS_RETURN",
      severity: "warn",
      description: `The supply humidity ratio exceeds the return humidity ratio ${(share * 100).toFixed(1)}% of the time.`,
      quantities: ["wr", "ws"],
      details: { exceeding, samples: returnRatio.length }
    };
  }
};

export const cyclingCheck: ValidationCheck = {
  id: "cycling",
  quantities: ["f"],
  run: (reader) => {
    const [frequency] = reader.get(["f"]);
    const variance = frequency.variance("Hz");
    if (variance > SHORT_CYCLING_VARIANCE_HZ2) {
      return {
        check: "cycling",
        code: "SHORT_CYCLING",
        severity: "warn",
        description: "There appears to be short cycling.",
        quantities: ["f"],
        details: { variance }
      };
    }
    if (variance > LONG_STEP_VARIANCE_HZ2) {
      return {
        check: "cycling",
        code: "LONG_STEP_CYCLING",
        severity: "warn",
        description: "There appears to be cycling with long steps.",
        quantities: ["f"],
        details: { variance }
      };
    }
    return null;
  }
};

export const defaultValidationChecks: readonly ValidationCheck[] = [humidityCheck, cyclingCheck];

export const runValidation = (
  reader: QuantityReader,
  checks: readonly ValidationCheck[] = defaultValidationChecks
): ValidationReport => {
  const findings = checks
    .map((check) => check.run(reader))
    .filter((finding): finding is ValidationFinding => Boolean(finding));
  return { status: findings.length > 0 ? "warnings" : "clean", findings };
};

const lowerFirst = (text: string): string => text.charAt(0).toLowerCase() + text.slice(1);

export const summarizeValidation = (findings: readonly ValidationFinding[]): string[] => {
  if (findings.length === 0) {
    return ["No warnings"];
  }
  if (findings.length === 1) {
    return [`Warning: ${lowerFirst(findings[0].description)}`];
  }
  return [
    `There are ${findings.length} warnings:`,
    ...findings.map((finding, index) => `  ${index + 1} ${finding.description}`)
  ];
};
