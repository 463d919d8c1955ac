import { UnknownQuantityError } from "../errors";
import type { Phase, PropertyAdapter, SaturationQuality } from "../thermo/types";
import type { Quantity } from "../units/quantity";
import type { DerivationEnv, DerivationInputs, OperatingMode } from "./types";

export type HeatQuantity = "Qcond" | "Qev" | "Pcomp" | "Qloss_ev";

export type PressureSide = "pin" | "pout";

export type StatePoint = {
  pressure: PressureSide;
  temperature: string;
};

export type ProcessStates = {
  inlet: StatePoint;
  outlet: StatePoint;
};

type ExpectedPhase = Extract<Phase, "liquid" | "gas">;

const state = (pressure: PressureSide, index: number): StatePoint => ({
  pressure,
  temperature: `T${index}`
});

const processStates: Record<OperatingMode, Partial<Record<HeatQuantity, ProcessStates>>> = {
  heating: {
    Qcond: { inlet: state("pout", 4), outlet: state("pout", 6) },
    Qev: { inlet: state("pout", 6), outlet: state("pin", 9) },
    Pcomp: { inlet: state("pin", 1), outlet: state("pout", 2) }
  },
  cooling: {
    Qcond: { inlet: state("pout", 9), outlet: state("pout", 7) },
    Qev: { inlet: state("pout", 7), outlet: state("pin", 4) },
    Pcomp: { inlet: state("pin", 1), outlet: state("pout", 2) },
    Qloss_ev: { inlet: state("pin", 4), outlet: state("pin", 1) }
  }
};

const expectedPhases: Record<HeatQuantity, { inlet: ExpectedPhase; outlet: ExpectedPhase }> = {
  Qcond: { inlet: "gas", outlet: "liquid" },
  Qev: { inlet: "liquid", outlet: "gas" },
  Pcomp: { inlet: "gas", outlet: "gas" },
  Qloss_ev: { inlet: "gas", outlet: "gas" }
};

const heatMeta: Record<HeatQuantity, { label: string; property: string; sign: 1 | -1 }> = {
  Qcond: { label: "Q_cond", property: "heat transfer rate", sign: -1 },
  Qev: { label: "Q_ev", property: "heat transfer rate", sign: 1 },
  Pcomp: { label: "P_comp", property: "mechanical power", sign: 1 },
  Qloss_ev: { label: "Q_loss,ev", property: "heat transfer rate", sign: 1 }
};

const saturationQuality: Record<ExpectedPhase, SaturationQuality> = {
  liquid: 0,
  gas: 1
};

/** Heating unless strictly more than half of the samples carry the cooling flag. */
export const determineOperatingMode = (direction: readonly number[]): OperatingMode => {
  const cooling = direction.filter((value) => value !== 0 && !Number.isNaN(value)).length;
  return cooling * 2 > direction.length ? "cooling" : "heating";
};

export const processStatesFor = (quantity: HeatQuantity, mode: OperatingMode): ProcessStates => {
  const states = processStates[mode][quantity];
  if (!states) {
    throw new UnknownQuantityError(quantity, `not defined in ${mode} mode`);
  }
  return states;
};

export const heatRequirements = (quantity: HeatQuantity, mode: OperatingMode): string[] => {
  const { inlet, outlet } = processStatesFor(quantity, mode);
  return Array.from(
    new Set(["flowrt_r", inlet.pressure, inlet.temperature, outlet.pressure, outlet.temperature])
  );
};

/** Which pressure bounds thermodynamic state 1-9 in the given mode. */
export const pressureSide = (stateIndex: number, mode: OperatingMode): PressureSide => {
  const lowSide = mode === "heating" ? [7, 8, 9, 1] : [6, 5, 4, 3, 1];
  const highSide = mode === "heating" ? [2, 3, 4, 5, 6] : [2, 9, 8, 7];
  if (lowSide.includes(stateIndex)) {
    return "pin";
  }
  if (highSide.includes(stateIndex)) {
    return "pout";
  }
  throw new UnknownQuantityError(`h${stateIndex}`, "the enthalpy state must be between 1 and 9");
};

export type PhaseCorrection = {
  enthalpies: number[];
  corrected: number;
};

/**
 * Replaces the enthalpy of every sample whose observed phase differs from the
 * phase the process requires by the saturated enthalpy at the same pressure.
 */
export const correctPhase = ({
  enthalpies,
  phases,
  pressures,
  expected,
  properties
}: {
  enthalpies: readonly number[];
  phases: readonly Phase[];
  pressures: readonly number[];
  expected: ExpectedPhase;
  properties: PropertyAdapter;
}): PhaseCorrection => {
  let corrected = 0;
  const values = enthalpies.map((enthalpy, index) => {
    if (phases[index] === expected) {
      return enthalpy;
    }
    corrected += 1;
    return properties.enthalpyAtQuality(pressures[index], saturationQuality[expected]);
  });
  return { enthalpies: values, corrected };
};

export const requireInput = (inputs: DerivationInputs, name: string): Quantity => {
  const quantity = inputs.get(name);
  if (!quantity) {
    throw new UnknownQuantityError(name, "input was not resolved");
  }
  return quantity;
};

const stateEnthalpies = (
  point: StatePoint,
  expected: ExpectedPhase,
  inputs: DerivationInputs,
  properties: PropertyAdapter
): PhaseCorrection => {
  const pressures = requireInput(inputs, point.pressure).magnitude("Pa");
  const temperatures = requireInput(inputs, point.temperature).magnitude("K");
  const enthalpies = pressures.map((pressure, index) =>
    properties.enthalpy(pressure, temperatures[index])
  );
  const phases = pressures.map((pressure, index) =>
    properties.phase(pressure, temperatures[index])
  );
  return correctPhase({ enthalpies, phases, pressures, expected, properties });
};

export type HeatResult = {
  quantity: Quantity;
  corrected: { inlet: number; outlet: number };
};

/** Mass flow times the enthalpy rise across the process, in kW. */
export const computeHeatTransfer = (
  quantity: HeatQuantity,
  inputs: DerivationInputs,
  env: DerivationEnv
): HeatResult => {
  const mode = env.mode ?? "heating";
  const { inlet, outlet } = processStatesFor(quantity, mode);
  const phases = expectedPhases[quantity];
  const hin = stateEnthalpies(inlet, phases.inlet, inputs, env.properties);
  const hout = stateEnthalpies(outlet, phases.outlet, inputs, env.properties);
  const rise = env.registry.quantity(
    hout.enthalpies.map((value, index) => value - hin.enthalpies[index]),
    { unit: "J/kg", label: `Δh ${quantity}`, property: "specific enthalpy" }
  );
  const { label, property, sign } = heatMeta[quantity];
  const power = requireInput(inputs, "flowrt_r")
    .times(rise, "W", { label, property })
    .scale(sign)
    .to("kW");
  return {
    quantity: power,
    corrected: { inlet: hin.corrected, outlet: hout.corrected }
  };
};
