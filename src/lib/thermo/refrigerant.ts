import { z } from "zod";
import r410a from "../../../data/fluids/r410a.json";
import type { FluidName } from "../config";
import { humidityRatio } from "./psychrometrics";
import type { Phase, PropertyAdapter, SaturationQuality } from "./types";

const CELSIUS_OFFSET = 273.15;

const fluidTableSchema = z.object({
  fluid: z.string().min(1),
  criticalTemperatureC: z.number(),
  criticalPressureKPa: z.number().positive(),
  vaporHeatCapacityKJPerKgK: z.number().positive(),
  saturationBandK: z.number().nonnegative(),
  saturation: z
    .array(
      z.object({
        temperatureC: z.number(),
        pressureKPa: z.number().positive(),
        liquidEnthalpyKJPerKg: z.number(),
        vaporEnthalpyKJPerKg: z.number()
      })
    )
    .min(2)
});

export type FluidTable = z.infer<typeof fluidTableSchema>;

const fluidTables: Record<FluidName, unknown> = {
  R410A: r410a
};

/** Piecewise-linear interpolation on ascending `xs`, clamped at both ends. */
const interpolate = (xs: number[], ys: number[], x: number): number => {
  if (x <= xs[0]) {
    return ys[0];
  }
  const last = xs.length - 1;
  if (x >= xs[last]) {
    return ys[last];
  }
  let upper = 1;
  while (xs[upper] < x) {
    upper += 1;
  }
  const lower = upper - 1;
  const weight = (x - xs[lower]) / (xs[upper] - xs[lower]);
  return ys[lower] + weight * (ys[upper] - ys[lower]);
};

/**
 * Refrigerant properties from a saturation table. Subcooled liquid takes the
 * saturated-liquid enthalpy at its own temperature; superheated vapour adds a
 * constant heat capacity to the saturated-vapour enthalpy. Points closer to
 * saturation than the table's band are reported as two-phase.
 */
export class TabulatedRefrigerant implements PropertyAdapter {
  readonly fluid: string;
  private temperatures: number[];
  private logPressures: number[];
  private liquidEnthalpies: number[];
  private vaporEnthalpies: number[];
  private criticalTemperature: number;
  private criticalPressure: number;
  private vaporHeatCapacity: number;
  private saturationBand: number;

  constructor(table: FluidTable) {
    const points = [...table.saturation].sort((a, b) => a.temperatureC - b.temperatureC);
    this.fluid = table.fluid;
    this.temperatures = points.map((point) => point.temperatureC + CELSIUS_OFFSET);
    this.logPressures = points.map((point) => Math.log(point.pressureKPa * 1000));
    this.liquidEnthalpies = points.map((point) => point.liquidEnthalpyKJPerKg * 1000);
    this.vaporEnthalpies = points.map((point) => point.vaporEnthalpyKJPerKg * 1000);
    this.criticalTemperature = table.criticalTemperatureC + CELSIUS_OFFSET;
    this.criticalPressure = table.criticalPressureKPa * 1000;
    this.vaporHeatCapacity = table.vaporHeatCapacityKJPerKgK * 1000;
    this.saturationBand = table.saturationBandK;
  }

  saturationTemperature(pressure: number): number {
    return interpolate(this.logPressures, this.temperatures, Math.log(pressure));
  }

  saturatedLiquidEnthalpy(temperature: number): number {
    return interpolate(this.temperatures, this.liquidEnthalpies, temperature);
  }

  saturatedVaporEnthalpy(temperature: number): number {
    return interpolate(this.temperatures, this.vaporEnthalpies, temperature);
  }

  phase(pressure: number, temperature: number): Phase {
    if (pressure >= this.criticalPressure) {
      return temperature >= this.criticalTemperature ? "supercritical" : "supercritical_liquid";
    }
    if (temperature >= this.criticalTemperature) {
      return "supercritical_gas";
    }
    const superheat = temperature - this.saturationTemperature(pressure);
    if (Math.abs(superheat) <= this.saturationBand) {
      return "twophase";
    }
    return superheat < 0 ? "liquid" : "gas";
  }

  enthalpy(pressure: number, temperature: number): number {
    const phase = this.phase(pressure, temperature);
    if (phase === "liquid" || phase === "supercritical_liquid") {
      return this.saturatedLiquidEnthalpy(temperature);
    }
    const saturation = this.saturationTemperature(pressure);
    if (phase === "twophase") {
      return (this.saturatedLiquidEnthalpy(saturation) + this.saturatedVaporEnthalpy(saturation)) / 2;
    }
    return this.saturatedVaporEnthalpy(saturation) + this.vaporHeatCapacity * (temperature - saturation);
  }

  enthalpyAtQuality(pressure: number, quality: SaturationQuality): number {
    const saturation = this.saturationTemperature(pressure);
    const liquid = this.saturatedLiquidEnthalpy(saturation);
    const vapor = this.saturatedVaporEnthalpy(saturation);
    return liquid + quality * (vapor - liquid);
  }

  humidityRatio(pressure: number, temperature: number, relativeHumidity: number): number {
    return humidityRatio(pressure, temperature, relativeHumidity);
  }
}

export const createPropertyAdapter = (fluid: FluidName): TabulatedRefrigerant =>
  new TabulatedRefrigerant(fluidTableSchema.parse(fluidTables[fluid]));
