export type Phase =
  | "liquid"
  | "gas"
  | "twophase"
  | "supercritical"
  | "supercritical_gas"
  | "supercritical_liquid";

/** Saturated liquid (0) or saturated vapour (1). */
export type SaturationQuality = 0 | 1;

/** Fluid properties in SI units: Pa, K, J/kg. */
export interface PropertyAdapter {
  readonly fluid: string;
  enthalpy(pressure: number, temperature: number): number;
  enthalpyAtQuality(pressure: number, quality: SaturationQuality): number;
  phase(pressure: number, temperature: number): Phase;
  /** Moist-air humidity ratio in kg water per kg dry air; `relativeHumidity` is a fraction. */
  humidityRatio(pressure: number, temperature: number, relativeHumidity: number): number;
}
