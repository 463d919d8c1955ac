import type { AnalysisConfig } from "../config";
import { MissingColumnError, UnknownQuantityError, DependencyCycleError } from "../errors";
import type { RawDataset, RowFilter } from "../import/types";
import { createLogger } from "../logger";
import type { NameTable } from "../nameTable/nameTable";
import type { PropertyAdapter } from "../thermo/types";
import type { Quantity } from "../units/quantity";
import type { UnitRegistry } from "../units/registry";
import { filterSignature, samplingInterval, selectRows } from "./filter";
import { determineOperatingMode } from "./heat";
import { asIsQuantity, defaultDerivationRules } from "./rules";
import type { DerivationEnv, DerivationRule, OperatingMode, RawColumn } from "./types";

const logger = createLogger("quantities");

export const DIRECTION_QUANTITY = "refdir";

export type QuantityStoreOptions = {
  dataset: RawDataset;
  nameTable: NameTable;
  registry: UnitRegistry;
  properties: PropertyAdapter;
  config: Readonly<AnalysisConfig>;
  rules?: readonly DerivationRule[];
};

type ResolveContext = {
  rows: number[];
};

/**
 * Memoizes derived quantities for one row filter at a time. Asking for any other
 * filter, or forcing, drops every cached quantity before deriving again: a
 * quantity is only meaningful for the rows it was computed from.
 */
export class QuantityStore {
  private dataset: RawDataset;
  private nameTable: NameTable;
  private registry: UnitRegistry;
  private properties: PropertyAdapter;
  private config: Readonly<AnalysisConfig>;
  private rules: Map<string, DerivationRule>;
  private quantities = new Map<string, Quantity>();
  private filter: RowFilter = {};
  private signature = filterSignature({});
  private mode: OperatingMode | null = null;

  constructor(options: QuantityStoreOptions) {
    this.dataset = options.dataset;
    this.nameTable = options.nameTable;
    this.registry = options.registry;
    this.properties = options.properties;
    this.config = options.config;
    this.rules = new Map(
      (options.rules ?? defaultDerivationRules).map((rule) => [rule.name, rule])
    );
  }

  get activeFilter(): RowFilter {
    return { ...this.filter };
  }

  has(name: string): boolean {
    return this.quantities.has(name);
  }

  cachedNames(): string[] {
    return Array.from(this.quantities.keys());
  }

  /** Heating/cooling mode of the active filter, once something needed it. */
  get operatingMode(): OperatingMode | null {
    return this.mode;
  }

  samplingInterval(): number {
    return samplingInterval(this.dataset);
  }

  clear(): void {
    this.quantities.clear();
    this.mode = null;
  }

  resolve(names: Iterable<string>, filter: RowFilter = {}, force = false): Map<string, Quantity> {
    const requested = Array.from(new Set(names));
    const signature = filterSignature(filter);
    if (force || signature !== this.signature) {
      logger.debug("Rebuilding quantity store", {
        previous: this.signature,
        next: signature,
        force
      });
      this.clear();
      this.filter = { ...filter };
      this.signature = signature;
    }

    let context: ResolveContext | null = null;
    const getContext = (): ResolveContext => {
      context = context ?? { rows: selectRows(this.dataset, this.filter) };
      return context;
    };

    return new Map(requested.map((name) => [name, this.derive(name, [], getContext)]));
  }

  private derive(
    name: string,
    stack: string[],
    getContext: () => ResolveContext
  ): Quantity {
    const cached = this.quantities.get(name);
    if (cached) {
      return cached;
    }
    if (stack.includes(name)) {
      throw new DependencyCycleError([...stack, name]);
    }

    const rule = this.rules.get(name);
    const path = [...stack, name];
    let quantity: Quantity;
    if (!rule) {
      if (!this.nameTable.has(name)) {
        throw new UnknownQuantityError(name);
      }
      quantity = asIsQuantity(name, this.environment(getContext(), null));
    } else {
      const mode = rule.usesMode ? this.resolveMode(path, getContext) : null;
      const inputs = new Map<string, Quantity>();
      rule.requires(mode).forEach((dependency) => {
        inputs.set(dependency, this.derive(dependency, path, getContext));
      });
      quantity = rule.derive(inputs, this.environment(getContext(), mode));
    }

    this.quantities.set(name, quantity);
    logger.debug("Derived quantity", {
      name,
      category: rule?.category ?? "as-is",
      samples: quantity.length
    });
    return quantity;
  }

  private resolveMode(path: string[], getContext: () => ResolveContext): OperatingMode {
    if (this.mode) {
      return this.mode;
    }
    const direction = this.derive(DIRECTION_QUANTITY, path, getContext);
    this.mode = determineOperatingMode(direction.values);
    logger.debug("Operating mode", { mode: this.mode, filter: this.signature });
    return this.mode;
  }

  private rawColumn(name: string, rows: number[]): RawColumn {
    const entry = this.nameTable.get(name);
    if (!entry || !entry.column) {
      throw new MissingColumnError(name, null);
    }
    if (!(entry.column in this.dataset.columns)) {
      throw new MissingColumnError(name, entry.column);
    }
    const cells = this.dataset.columns[entry.column];
    return { entry, cells: rows.map((index) => cells[index] ?? null) };
  }

  private environment(context: ResolveContext, mode: OperatingMode | null): DerivationEnv {
    return {
      registry: this.registry,
      properties: this.properties,
      config: this.config,
      mode,
      rowCount: context.rows.length,
      samplingInterval: () => samplingInterval(this.dataset),
      rawColumn: (name) => this.rawColumn(name, context.rows)
    };
  }
}
