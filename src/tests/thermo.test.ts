import { describe, expect, it } from "vitest";
import { humidityRatio, saturationPressure } from "../lib/thermo/psychrometrics";
import { createPropertyAdapter } from "../lib/thermo/refrigerant";

const r410a = createPropertyAdapter("R410A");

describe("psychrometrics", () => {
  it("follows the saturation pressure of water", () => {
    expect(saturationPressure(293.15)).toBeCloseTo(2338.8, 0);
    expect(saturationPressure(263.15)).toBeCloseTo(259.9, 0);
  });

  it("computes the humidity ratio of moist air", () => {
    expect(humidityRatio(101325, 293.15, 0.5) * 1000).toBeCloseTo(7.26, 2);
    expect(humidityRatio(101325, 293.15, 0)).toBe(0);
  });
});

describe("tabulated refrigerant", () => {
  it("interpolates the saturation temperature from pressure", () => {
    expect(r410a.saturationTemperature(799_000)).toBeCloseTo(273.15, 6);
    expect(r410a.saturationTemperature(1_447_000)).toBeCloseTo(293.15, 6);
  });

  it("classifies phases around saturation and the critical point", () => {
    expect(r410a.phase(799_000, 283.15)).toBe("gas");
    expect(r410a.phase(799_000, 263.15)).toBe("liquid");
    expect(r410a.phase(799_000, 273.15)).toBe("twophase");
    expect(r410a.phase(5_000_000, 300)).toBe("supercritical_liquid");
    expect(r410a.phase(5_000_000, 350)).toBe("supercritical");
    expect(r410a.phase(1_000_000, 350)).toBe("supercritical_gas");
  });

  it("returns saturated enthalpies at quality 0 and 1", () => {
    expect(r410a.enthalpyAtQuality(799_000, 0)).toBeCloseTo(200_000, 2);
    expect(r410a.enthalpyAtQuality(799_000, 1)).toBeCloseTo(419_600, 2);
  });

  it("adds sensible heat to superheated vapour", () => {
    expect(r410a.enthalpy(799_000, 283.15)).toBeCloseTo(419_600 + 1200 * 10, 2);
  });

  it("uses the saturated liquid line for subcooled liquid", () => {
    expect(r410a.enthalpy(799_000, 263.15)).toBeCloseTo(186_400, 2);
  });

  it("delegates the humidity ratio to the psychrometric model", () => {
    expect(r410a.humidityRatio(101325, 293.15, 0.5)).toBe(humidityRatio(101325, 293.15, 0.5));
  });
});
