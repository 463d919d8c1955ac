import { toCleanedColumn, toNumericColumn } from "../import/cells";
import { createLogger } from "../logger";
import type { NameEntry } from "../nameTable/nameTable";
import type { Quantity, QuantityMeta } from "../units/quantity";
import { DIMENSIONLESS } from "../units/registry";
import {
  computeHeatTransfer,
  heatRequirements,
  pressureSide,
  requireInput,
  type HeatQuantity
} from "./heat";
import type { DerivationEnv, DerivationRule } from "./types";

const logger = createLogger("quantities");

const metaFromEntry = (entry: NameEntry): QuantityMeta => ({
  unit: entry.unit ?? DIMENSIONLESS,
  label: entry.label ?? entry.name,
  property: entry.property ?? entry.name
});

/** Raw column wrapped with the unit, label and property of its name-table entry. */
export const asIsQuantity = (name: string, env: DerivationEnv): Quantity => {
  const { entry, cells } = env.rawColumn(name);
  return env.registry.quantity(toNumericColumn(cells), metaFromEntry(entry));
};

const frequencyRule: DerivationRule = {
  name: "f",
  category: "cleaned",
  usesMode: false,
  requires: () => [],
  derive: (_inputs, env) => {
    const { entry, cells } = env.rawColumn("f");
    const { sentinels, scale } = env.config.frequency;
    const values = toCleanedColumn(cells, sentinels).map((value) => value * scale);
    return env.registry.quantity(values, metaFromEntry(entry));
  }
};

const massFlowRule: DerivationRule = {
  name: "flowrt_r",
  category: "cleaned",
  usesMode: false,
  requires: () => ["f"],
  derive: (inputs, env) => {
    const { entry, cells } = env.rawColumn("flowrt_r");
    const frequency = requireInput(inputs, "f").values;
    const values = toCleanedColumn(cells, env.config.frequency.sentinels).map((value, index) =>
      frequency[index] === 0 ? 0 : value
    );
    return env.registry.quantity(values, metaFromEntry(entry));
  }
};

const humidityRatioRule = (point: string): DerivationRule => {
  const temperature = `T${point}`;
  const relativeHumidity = `RH${point}`;
  return {
    name: `w${point}`,
    category: "humidity-ratio",
    usesMode: false,
    requires: () => [temperature, relativeHumidity],
    derive: (inputs, env) => {
      const kelvin = requireInput(inputs, temperature).magnitude("K");
      const fraction = requireInput(inputs, relativeHumidity).magnitude(DIMENSIONLESS);
      const pressure = env.config.atmosphericPressurePa;
      const values = kelvin.map((value, index) =>
        env.properties.humidityRatio(pressure, value, fraction[index])
      );
      return env.registry
        .quantity(values, { unit: "ratio", label: `ω_${point}`, property: "absolute humidity" })
        .to("g/kg");
    }
  };
};

const heatRule = (name: HeatQuantity): DerivationRule => ({
  name,
  category: "dependent",
  usesMode: true,
  requires: (mode) => heatRequirements(name, mode ?? "heating"),
  derive: (inputs, env) => {
    const { quantity, corrected } = computeHeatTransfer(name, inputs, env);
    if (corrected.inlet > 0 || corrected.outlet > 0) {
      logger.debug("Saturated enthalpy substituted", { quantity: name, ...corrected });
    }
    return quantity;
  }
});

const electricalPowerRule: DerivationRule = {
  name: "Pel",
  category: "dependent",
  usesMode: false,
  requires: () => ["Pa", "Pb"],
  derive: (inputs) =>
    requireInput(inputs, "Pa")
      .plus(requireInput(inputs, "Pb"))
      .withMeta({ label: "P_el", property: "electrical power" })
      .to("kW")
};

const elapsedTimeRule: DerivationRule = {
  name: "t",
  category: "dependent",
  usesMode: false,
  requires: () => [],
  derive: (_inputs, env) => {
    const interval = env.samplingInterval();
    const values = Array.from({ length: env.rowCount }, (_, index) => index * interval);
    return env.registry.quantity(values, { unit: "s", label: "t", property: "time" });
  }
};

const enthalpyRule = (stateIndex: number): DerivationRule => ({
  name: `h${stateIndex}`,
  category: "enthalpy",
  usesMode: true,
  requires: (mode) => [pressureSide(stateIndex, mode ?? "heating"), `T${stateIndex}`],
  derive: (inputs, env) => {
    const side = pressureSide(stateIndex, env.mode ?? "heating");
    const pressures = requireInput(inputs, side).magnitude("Pa");
    const temperatures = requireInput(inputs, `T${stateIndex}`).magnitude("K");
    const values = pressures.map((pressure, index) =>
      env.properties.enthalpy(pressure, temperatures[index])
    );
    return env.registry
      .quantity(values, { unit: "J/kg", label: `h_${stateIndex}`, property: "enthalpy" })
      .to("kJ/kg");
  }
});

export const defaultDerivationRules: readonly DerivationRule[] = [
  frequencyRule,
  massFlowRule,
  humidityRatioRule("s"),
  humidityRatioRule("r"),
  heatRule("Qcond"),
  heatRule("Qev"),
  heatRule("Pcomp"),
  heatRule("Qloss_ev"),
  electricalPowerRule,
  elapsedTimeRule,
  ...Array.from({ length: 9 }, (_, index) => enthalpyRule(index + 1))
];
