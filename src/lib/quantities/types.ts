import type { AnalysisConfig } from "../config";
import type { RawCell } from "../import/types";
import type { NameEntry } from "../nameTable/nameTable";
import type { PropertyAdapter } from "../thermo/types";
import type { Quantity } from "../units/quantity";
import type { UnitRegistry } from "../units/registry";

export type RuleCategory = "as-is" | "cleaned" | "humidity-ratio" | "dependent" | "enthalpy";

export type OperatingMode = "heating" | "cooling";

export type RawColumn = {
  entry: NameEntry;
  cells: RawCell[];
};

/** What a rule sees while deriving: the filtered rows and the session services. */
export type DerivationEnv = {
  registry: UnitRegistry;
  properties: PropertyAdapter;
  config: Readonly<AnalysisConfig>;
  mode: OperatingMode | null;
  rowCount: number;
  samplingInterval: () => number;
  rawColumn: (name: string) => RawColumn;
};

export type DerivationInputs = ReadonlyMap<string, Quantity>;

export type DerivationRule = {
  name: string;
  category: Exclude<RuleCategory, "as-is">;
  /** Rules whose inputs depend on the heating/cooling mode resolve `refdir` first. */
  usesMode: boolean;
  requires: (mode: OperatingMode | null) => readonly string[];
  derive: (inputs: DerivationInputs, env: DerivationEnv) => Quantity;
};
