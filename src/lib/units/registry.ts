import { IncompatibleUnitsError } from "../errors";
import { Quantity, type QuantityMeta } from "./quantity";

export type Converter = (value: number) => number;

export const DIMENSIONLESS = "frac";

const dimensions = ["mass", "length", "time", "temperature"] as const;

type Dimension = (typeof dimensions)[number];

type DimensionVector = Readonly<Record<Dimension, number>>;

type UnitDefinition = {
  /** SI value = value × factor + offset. */
  factor: number;
  offset?: number;
  dimension: Partial<Record<Dimension, number>>;
  aliases?: string[];
};

/** A parsed unit expression in SI terms. */
type ResolvedUnit = {
  factor: number;
  offset: number;
  dimension: DimensionVector;
};

const ENERGY = { mass: 1, length: 2, time: -2 };
const POWER = { mass: 1, length: 2, time: -3 };
const PRESSURE = { mass: 1, length: -1, time: -2 };

const unitDefinitions: Record<string, UnitDefinition> = {
  [DIMENSIONLESS]: { factor: 1, dimension: {}, aliases: ["fraction", "ratio"] },
  pct: { factor: 0.01, dimension: {}, aliases: ["percent", "%"] },
  ppm: { factor: 1e-6, dimension: {} },
  K: { factor: 1, dimension: { temperature: 1 }, aliases: ["kelvin"] },
  degC: { factor: 1, offset: 273.15, dimension: { temperature: 1 }, aliases: ["°C", "celsius"] },
  s: { factor: 1, dimension: { time: 1 }, aliases: ["sec"] },
  min: { factor: 60, dimension: { time: 1 } },
  h: { factor: 3600, dimension: { time: 1 }, aliases: ["hour"] },
  Hz: { factor: 1, dimension: { time: -1 } },
  g: { factor: 1e-3, dimension: { mass: 1 } },
  kg: { factor: 1, dimension: { mass: 1 } },
  m: { factor: 1, dimension: { length: 1 } },
  Pa: { factor: 1, dimension: PRESSURE },
  kPa: { factor: 1e3, dimension: PRESSURE },
  MPa: { factor: 1e6, dimension: PRESSURE },
  bar: { factor: 1e5, dimension: PRESSURE },
  J: { factor: 1, dimension: ENERGY },
  kJ: { factor: 1e3, dimension: ENERGY },
  W: { factor: 1, dimension: POWER },
  kW: { factor: 1e3, dimension: POWER }
};

const zeroDimension = (): Record<Dimension, number> => ({
  mass: 0,
  length: 0,
  time: 0,
  temperature: 0
});

const sameDimension = (left: DimensionVector, right: DimensionVector): boolean =>
  dimensions.every((dimension) => left[dimension] === right[dimension]);

const termPattern = /^([^\s^*/]+)(?:\^(-?\d+))?$/;

/**
 * Holds the unit table of a session and caches the converters built from it.
 * Expressions combine table units with `*`, `/` and integer powers (`J/kg`,
 * `m^2`); offset units such as `degC` only stand alone. Ratios of like units
 * (`g/kg`) share the empty dimension of `frac`, `pct` and `ppm`.
 */
export class UnitRegistry {
  private units = new Map<string, UnitDefinition>();
  private resolved = new Map<string, ResolvedUnit>();
  private converters = new Map<string, Converter>();

  constructor(definitions: Record<string, UnitDefinition> = unitDefinitions) {
    Object.entries(definitions).forEach(([symbol, definition]) => {
      this.units.set(symbol, definition);
      definition.aliases?.forEach((alias) => this.units.set(alias, definition));
    });
  }

  private parse(unit: string): ResolvedUnit {
    const cached = this.resolved.get(unit);
    if (cached) {
      return cached;
    }
    const standalone = this.units.get(unit.trim());
    const resolved = standalone ? this.fromDefinition(standalone) : this.parseExpression(unit);
    this.resolved.set(unit, resolved);
    return resolved;
  }

  private fromDefinition(definition: UnitDefinition): ResolvedUnit {
    return {
      factor: definition.factor,
      offset: definition.offset ?? 0,
      dimension: { ...zeroDimension(), ...definition.dimension }
    };
  }

  private parseExpression(unit: string): ResolvedUnit {
    const [numerator, ...denominators] = unit.split("/");
    const dimension = zeroDimension();
    let factor = 1;
    const terms = [
      ...numerator.split("*").map((term) => ({ term, sign: 1 })),
      ...denominators.flatMap((part) => part.split("*").map((term) => ({ term, sign: -1 })))
    ];
    terms.forEach(({ term, sign }) => {
      const trimmed = term.trim();
      if (trimmed === "1" && sign === 1) {
        return;
      }
      const match = termPattern.exec(trimmed);
      const definition = match ? this.units.get(match[1]) : undefined;
      if (!match || !definition) {
        throw new IncompatibleUnitsError(`Unit "${unit}" is not recognized.`, { unit });
      }
      if (definition.offset) {
        throw new IncompatibleUnitsError(
          `Unit "${match[1]}" has an offset and cannot be combined in "${unit}".`,
          { unit }
        );
      }
      const power = sign * Number(match[2] ?? "1");
      factor *= definition.factor ** power;
      dimensions.forEach((name) => {
        dimension[name] += (definition.dimension[name] ?? 0) * power;
      });
    });
    return { factor, offset: 0, dimension };
  }

  isCompatible(from: string, to: string): boolean {
    return sameDimension(this.parse(from).dimension, this.parse(to).dimension);
  }

  assertCompatible(from: string, to: string): void {
    if (!this.isCompatible(from, to)) {
      throw new IncompatibleUnitsError(`Cannot convert "${from}" to "${to}".`, { from, to });
    }
  }

  /** Scale-only conversions use one factor; offset units go through SI per value. */
  converter(from: string, to: string): Converter {
    const key = `${from}->${to}`;
    const cached = this.converters.get(key);
    if (cached) {
      return cached;
    }
    this.assertCompatible(from, to);
    const source = this.parse(from);
    const target = this.parse(to);
    let convert: Converter;
    if (from === to) {
      convert = (value) => value;
    } else if (source.offset === 0 && target.offset === 0) {
      const factor = source.factor / target.factor;
      convert = (value) => value * factor;
    } else {
      convert = (value) => (value * source.factor + source.offset - target.offset) / target.factor;
    }
    this.converters.set(key, convert);
    return convert;
  }

  /** Factor turning `left × right` magnitudes into `target`. */
  productFactor(left: string, right: string, target: string): number {
    const leftUnit = this.parse(left);
    const rightUnit = this.parse(right);
    const expected = this.parse(target);
    const dimension = zeroDimension();
    dimensions.forEach((name) => {
      dimension[name] = leftUnit.dimension[name] + rightUnit.dimension[name];
    });
    const hasOffset = leftUnit.offset !== 0 || rightUnit.offset !== 0 || expected.offset !== 0;
    if (hasOffset || !sameDimension(dimension, expected.dimension)) {
      throw new IncompatibleUnitsError(
        `"${left}" times "${right}" cannot be expressed in "${target}".`,
        { left, right, target }
      );
    }
    return (leftUnit.factor * rightUnit.factor) / expected.factor;
  }

  quantity(values: readonly number[], meta: QuantityMeta): Quantity {
    this.parse(meta.unit);
    return new Quantity(this, values, meta);
  }
}

export const createUnitRegistry = (): UnitRegistry => new UnitRegistry();
