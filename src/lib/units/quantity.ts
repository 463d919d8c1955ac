import { IncompatibleUnitsError } from "../errors";
import type { UnitRegistry } from "./registry";

export type QuantityMeta = {
  unit: string;
  label: string;
  property: string;
};

/**
 * A unit-tagged array of samples. Instances never change; every operation
 * returns a new quantity sharing the registry.
 */
export class Quantity {
  readonly values: readonly number[];
  readonly unit: string;
  readonly label: string;
  readonly property: string;
  private registry: UnitRegistry;

  constructor(registry: UnitRegistry, values: readonly number[], meta: QuantityMeta) {
    this.registry = registry;
    this.values = Object.freeze([...values]);
    this.unit = meta.unit;
    this.label = meta.label;
    this.property = meta.property;
  }

  get length(): number {
    return this.values.length;
  }

  get meta(): QuantityMeta {
    return { unit: this.unit, label: this.label, property: this.property };
  }

  to(unit: string): Quantity {
    if (unit === this.unit) {
      return this;
    }
    const convert = this.registry.converter(this.unit, unit);
    return new Quantity(this.registry, this.values.map(convert), { ...this.meta, unit });
  }

  magnitude(unit?: string): number[] {
    return [...(unit ? this.to(unit) : this).values];
  }

  withMeta(meta: Partial<QuantityMeta>): Quantity {
    return new Quantity(this.registry, this.values, { ...this.meta, ...meta });
  }

  map(transform: (value: number, index: number) => number): Quantity {
    return new Quantity(this.registry, this.values.map(transform), this.meta);
  }

  scale(factor: number): Quantity {
    return this.map((value) => value * factor);
  }

  select(indices: readonly number[]): Quantity {
    return new Quantity(
      this.registry,
      indices.map((index) => this.values[index]),
      this.meta
    );
  }

  private aligned(other: Quantity): readonly number[] {
    if (other.length !== this.length) {
      throw new IncompatibleUnitsError(
        `Cannot combine ${this.label} (${this.length} samples) with ${other.label} (${other.length} samples).`,
        { left: this.length, right: other.length }
      );
    }
    if (!this.registry.isCompatible(this.unit, other.unit)) {
      throw new IncompatibleUnitsError(
        `Cannot combine ${this.label} [${this.unit}] with ${other.label} [${other.unit}].`,
        { left: this.unit, right: other.unit }
      );
    }
    return other.to(this.unit).values;
  }

  plus(other: Quantity): Quantity {
    const right = this.aligned(other);
    return this.map((value, index) => value + right[index]);
  }

  minus(other: Quantity): Quantity {
    const right = this.aligned(other);
    return this.map((value, index) => value - right[index]);
  }

  lessThan(other: Quantity): boolean[] {
    const right = this.aligned(other);
    return this.values.map((value, index) => value < right[index]);
  }

  times(other: Quantity, unit: string, meta: Omit<QuantityMeta, "unit">): Quantity {
    if (other.length !== this.length) {
      throw new IncompatibleUnitsError(
        `Cannot multiply ${this.label} (${this.length} samples) by ${other.label} (${other.length} samples).`,
        { left: this.length, right: other.length }
      );
    }
    const factor = this.registry.productFactor(this.unit, other.unit, unit);
    return new Quantity(
      this.registry,
      this.values.map((value, index) => value * other.values[index] * factor),
      { ...meta, unit }
    );
  }

  mean(unit?: string): number {
    const values = unit ? this.to(unit).values : this.values;
    if (values.length === 0) {
      return Number.NaN;
    }
    return values.reduce((sum, value) => sum + value, 0) / values.length;
  }

  /** Population variance, in the square of `unit`. */
  variance(unit?: string): number {
    const values = unit ? this.to(unit).values : this.values;
    if (values.length === 0) {
      return Number.NaN;
    }
    const mean = values.reduce((sum, value) => sum + value, 0) / values.length;
    return values.reduce((sum, value) => sum + (value - mean) ** 2, 0) / values.length;
  }
}
