import { beforeAll, describe, expect, it } from "vitest";
import {
  DependencyCycleError,
  EmptySeriesError,
  MissingColumnError,
  UnknownQuantityError
} from "../lib/errors";
import type { RawCell } from "../lib/import/types";
import { loadNameTable, type NameTable } from "../lib/nameTable/nameTable";
import { filterSignature } from "../lib/quantities/filter";
import { QuantityStore } from "../lib/quantities/store";
import type { DerivationRule } from "../lib/quantities/types";
import type { PropertyAdapter } from "../lib/thermo/types";
import { createUnitRegistry } from "../lib/units/registry";
import { buildDataset, createFakeAdapter, testConfig } from "./helpers";

let nameTable: NameTable;

beforeAll(async () => {
  nameTable = await loadNameTable();
});

const baseColumns = (overrides: Record<string, RawCell[]> = {}): Record<string, RawCell[]> => ({
  run: ["a", "a", "b", "b"],
  "Temperature 1 (C)": [5, 5, 5, 5],
  "Temperature 4 (C)": [80, 80, 80, 80],
  "Temperature 6 (C)": [30, 30, 30, 30],
  "Compressor frequency (Hz)": ["UnderRange", 100, 80, "OverRange"],
  "Refrigerant mass flow (g/s)": [5, 10, 12, 3],
  "Reversing valve": [0, 0, 1, 1],
  "Suction pressure (bar)": [5, 5, 5, 5],
  "Discharge pressure (bar)": [20, 20, 20, 20],
  "Power meter A (W)": [1000, 2000, 1500, 0],
  "Power meter B (W)": [500, 500, 500, 0],
  "Supply air temperature (C)": [20, 20, 20, 20],
  "Supply air humidity (%)": [50, 50, 50, 50],
  ...overrides
});

const createStore = ({
  columns = baseColumns(),
  properties = createFakeAdapter(),
  rules
}: {
  columns?: Record<string, RawCell[]>;
  properties?: PropertyAdapter;
  rules?: readonly DerivationRule[];
} = {}) =>
  new QuantityStore({
    dataset: buildDataset(columns),
    nameTable,
    registry: createUnitRegistry(),
    properties,
    config: testConfig,
    rules
  });

describe("filter signature", () => {
  it("ignores the order of filter entries", () => {
    expect(filterSignature({ b: 1, a: "x" })).toBe(filterSignature({ a: "x", b: 1 }));
    expect(filterSignature({ a: 1 })).not.toBe(filterSignature({ a: "1" }));
    expect(filterSignature({})).toBe("[]");
  });
});

describe("quantity store caching", () => {
  it("returns the cached quantity for an unchanged filter", () => {
    const store = createStore();
    const first = store.resolve(["T1"]).get("T1");
    const second = store.resolve(["T1"]).get("T1");
    expect(second).toBe(first);
  });

  it("drops every cached quantity when the filter changes", () => {
    const store = createStore();
    store.resolve(["T1", "T4"]);
    expect(store.cachedNames()).toEqual(["T1", "T4"]);

    const filtered = store.resolve(["T1"], { run: "b" });
    expect(store.cachedNames()).toEqual(["T1"]);
    expect(store.activeFilter).toEqual({ run: "b" });
    expect(filtered.get("T1")?.values).toEqual([5, 5]);
  });

  it("rebuilds on force with the same filter", () => {
    const store = createStore();
    const first = store.resolve(["T1"]).get("T1");
    const forced = store.resolve(["T1"], {}, true).get("T1");
    expect(forced).not.toBe(first);
    expect(forced?.values).toEqual(first?.values);
  });

  it("keeps working after an unknown quantity", () => {
    const store = createStore();
    store.resolve(["T1"]);
    expect(() => store.resolve(["nonsense"])).toThrow(UnknownQuantityError);
    expect(store.has("T1")).toBe(true);
  });

  it("reports a name-table column missing from the dataset", () => {
    const store = createStore();
    expect(() => store.resolve(["Tamb"])).toThrow(MissingColumnError);
  });

  it("reports a filter on an unknown column", () => {
    const store = createStore();
    expect(() => store.resolve(["T1"], { nowhere: 1 })).toThrow(MissingColumnError);
  });

  it("detects dependency cycles in custom rules", () => {
    const unreachable = () => {
      throw new Error("derive should not run");
    };
    const rules: DerivationRule[] = [
      { name: "a", category: "dependent", usesMode: false, requires: () => ["b"], derive: unreachable },
      { name: "b", category: "dependent", usesMode: false, requires: () => ["a"], derive: unreachable }
    ];
    const store = createStore({ rules });
    expect(() => store.resolve(["a"])).toThrow(DependencyCycleError);
    expect(() => store.resolve(["a"])).toThrow("Dependency cycle: a -> b -> a");
  });
});

describe("derivation rules", () => {
  it("wraps raw columns with the name-table unit and label", () => {
    const store = createStore();
    const pressure = store.resolve(["pout"]).get("pout");
    expect(pressure?.unit).toBe("bar");
    expect(pressure?.label).toBe("p_out");
    expect(pressure?.property).toBe("pressure");
  });

  it("zeroes sentinel readings and scales the frequency", () => {
    const store = createStore();
    expect(store.resolve(["f"]).get("f")?.values).toEqual([0, 50, 40, 0]);
  });

  it("zeroes the mass flow while the compressor is off", () => {
    const store = createStore();
    expect(store.resolve(["flowrt_r"]).get("flowrt_r")?.values).toEqual([0, 10, 12, 0]);
  });

  it("sums both power meters in kW", () => {
    const store = createStore();
    const power = store.resolve(["Pel"]).get("Pel");
    expect(power?.unit).toBe("kW");
    expect(power?.label).toBe("P_el");
    const values = power?.values ?? [];
    [1.5, 2.5, 2, 0].forEach((expected, index) => expect(values[index]).toBeCloseTo(expected, 9));
  });

  it("counts elapsed time over the filtered rows", () => {
    const store = createStore();
    expect(store.resolve(["t"], { run: "b" }).get("t")?.values).toEqual([0, 10]);
    expect(store.samplingInterval()).toBe(10);
  });

  it("expresses the humidity ratio in g/kg", () => {
    const properties = createFakeAdapter();
    const store = createStore({ properties });
    const ratio = store.resolve(["ws"]).get("ws");
    expect(ratio?.unit).toBe("g/kg");
    expect(ratio?.values[0]).toBeCloseTo(7.2617, 6);
    const [pressure, temperature, humidity] = properties.humidityRatio.mock.calls[0] ?? [];
    expect(pressure).toBe(101325);
    expect(temperature).toBeCloseTo(293.15, 9);
    expect(humidity).toBeCloseTo(0.5, 12);
    expect(ratio?.to("ratio").values[0]).toBeCloseTo(0.0072617, 12);
  });

  it("derives pressure and temperature before querying enthalpies", () => {
    const ready: boolean[] = [];
    const properties = createFakeAdapter();
    let store: QuantityStore | null = null;
    properties.enthalpy.mockImplementation((pressure: number, temperature: number) => {
      ready.push(Boolean(store?.has("pin") && store.has("T1")));
      return pressure / 1000 + temperature;
    });
    store = createStore({ properties });
    const enthalpy = store.resolve(["h1"]).get("h1");
    expect(ready).toEqual([true, true, true, true]);
    expect(enthalpy?.unit).toBe("kJ/kg");
    expect(enthalpy?.values[0]).toBeCloseTo((5e5 / 1000 + 278.15) / 1000, 9);
  });

  it("chooses the enthalpy pressure side by operating mode", () => {
    const heating = createFakeAdapter();
    createStore({ properties: heating }).resolve(["h4"]);
    expect(heating.enthalpy.mock.calls[0]?.[0]).toBeCloseTo(2e6, 3);

    const cooling = createFakeAdapter();
    const store = createStore({
      properties: cooling,
      columns: baseColumns({ "Reversing valve": [1, 1, 1, 0] })
    });
    store.resolve(["h4"]);
    expect(store.operatingMode).toBe("cooling");
    expect(cooling.enthalpy.mock.calls[0]?.[0]).toBeCloseTo(5e5, 3);
  });

  it("computes the condenser heat with phase correction and sign flip", () => {
    const properties = createFakeAdapter(() => "gas");
    const store = createStore({ properties });
    const heat = store.resolve(["Qcond"]).get("Qcond");
    expect(store.operatingMode).toBe("heating");
    expect(heat?.unit).toBe("kW");
    expect(heat?.label).toBe("Q_cond");
    const rise = 100_000 - (2e6 / 1000 + 353.15);
    const values = heat?.values ?? [];
    expect(values[0]).toBeCloseTo(0, 9);
    expect(values[1]).toBeCloseTo((-10 * rise) / 1e6, 9);
    expect(values[2]).toBeCloseTo((-12 * rise) / 1e6, 9);
    const [pressure, quality] = properties.enthalpyAtQuality.mock.calls[0] ?? [];
    expect(pressure).toBeCloseTo(2e6, 3);
    expect(quality).toBe(0);
  });

  it("substitutes the saturated vapour enthalpy at a liquid evaporator outlet", () => {
    const properties = createFakeAdapter(() => "liquid");
    const store = createStore({
      properties,
      columns: baseColumns({ "Temperature 9 (C)": [10, 10, 10, 10] })
    });
    const evaporator = store.resolve(["Qev"]).get("Qev");
    expect(store.operatingMode).toBe("heating");
    expect(evaporator?.label).toBe("Q_ev");
    const rise = 400_000 - (2e6 / 1000 + 303.15);
    expect(evaporator?.values[1]).toBeCloseTo((10 * rise) / 1e6, 9);
    expect(evaporator?.values[2]).toBeCloseTo((12 * rise) / 1e6, 9);
    expect(properties.enthalpyAtQuality).toHaveBeenCalledTimes(4);
    const [pressure, quality] = properties.enthalpyAtQuality.mock.calls[0] ?? [];
    expect(pressure).toBeCloseTo(5e5, 3);
    expect(quality).toBe(1);
  });

  it("computes the compressor power from suction to discharge", () => {
    const properties = createFakeAdapter();
    const store = createStore({
      properties,
      columns: baseColumns({ "Temperature 2 (C)": [70, 70, 70, 70] })
    });
    const power = store.resolve(["Pcomp"]).get("Pcomp");
    expect(power?.unit).toBe("kW");
    expect(power?.label).toBe("P_comp");
    const rise = 2e6 / 1000 + 343.15 - (5e5 / 1000 + 278.15);
    const values = power?.values ?? [];
    [0, (10 * rise) / 1e6, (12 * rise) / 1e6, 0].forEach((expected, index) =>
      expect(values[index]).toBeCloseTo(expected, 9)
    );
    expect(properties.enthalpyAtQuality).not.toHaveBeenCalled();
  });

  it("uses the cooling-mode state pairs", () => {
    const properties = createFakeAdapter();
    const store = createStore({
      properties,
      columns: baseColumns({
        "Reversing valve": [1, 1, 1, 0],
        "Temperature 7 (C)": [35, 35, 35, 35],
        "Temperature 9 (C)": [75, 75, 75, 75]
      })
    });
    const heat = store.resolve(["Qcond", "Qev", "Qloss_ev"]);
    expect(store.operatingMode).toBe("cooling");

    const condenserRise = 100_000 - (2e6 / 1000 + 348.15);
    const evaporatorRise = 5e5 / 1000 + 353.15 - 100_000;
    const lossRise = 5e5 / 1000 + 278.15 - (5e5 / 1000 + 353.15);
    expect(heat.get("Qcond")?.values[1]).toBeCloseTo((-10 * condenserRise) / 1e6, 9);
    expect(heat.get("Qev")?.values[2]).toBeCloseTo((12 * evaporatorRise) / 1e6, 9);
    expect(heat.get("Qloss_ev")?.values[1]).toBeCloseTo((10 * lossRise) / 1e6, 9);
    expect(heat.get("Qloss_ev")?.label).toBe("Q_loss,ev");

    expect(properties.enthalpyAtQuality).toHaveBeenCalledTimes(8);
    properties.enthalpyAtQuality.mock.calls.forEach(([pressure, quality]) => {
      expect(pressure).toBeCloseTo(2e6, 3);
      expect(quality).toBe(0);
    });
  });

  it("recomputes the operating mode for a new filter", () => {
    const store = createStore();
    store.resolve(["h4"], { run: "a" });
    expect(store.operatingMode).toBe("heating");

    const enthalpy = store.resolve(["h4"], { run: "b" }).get("h4");
    expect(store.operatingMode).toBe("cooling");
    expect(enthalpy?.values[0]).toBeCloseTo((5e5 / 1000 + 353.15) / 1000, 9);
  });

  it("keeps quantities derived before a failing name in the same request", () => {
    const store = createStore();
    expect(() => store.resolve(["T1", "nonsense"])).toThrow(UnknownQuantityError);
    expect(store.has("T1")).toBe(true);
  });

  it("rejects the evaporator loss in heating mode", () => {
    const store = createStore();
    expect(() => store.resolve(["Qloss_ev"])).toThrow(UnknownQuantityError);
  });

  it("needs two samples for the sampling interval", () => {
    const store = createStore({ columns: { "Temperature 1 (C)": [5] } });
    expect(() => store.resolve(["t"])).toThrow(EmptySeriesError);
  });
});
