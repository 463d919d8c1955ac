import { vi } from "vitest";
import { loadAnalysisConfig } from "../lib/config";
import { TIMESTAMP_COLUMN, type RawCell, type RawDataset } from "../lib/import/types";
import type { Phase, PropertyAdapter, SaturationQuality } from "../lib/thermo/types";

const START = Date.UTC(2024, 2, 1, 10, 0, 0);

/** In-memory dataset with one sample every `intervalSeconds`. */
export const buildDataset = (
  columns: Record<string, RawCell[]>,
  intervalSeconds = 10
): RawDataset => {
  const rowCount = Object.values(columns)[0]?.length ?? 0;
  return {
    files: ["memory.csv"],
    conditions: [null],
    rowCount,
    columns: {
      ...columns,
      [TIMESTAMP_COLUMN]: Array.from({ length: rowCount }, (_, index) => START + index * intervalSeconds * 1000),
      file_index: Array.from({ length: rowCount }, () => 0)
    }
  };
};

export const testConfig = loadAnalysisConfig({ logLevel: "error" });

/**
 * Linear stand-in for a fluid: h = p / 1000 + T (J/kg), saturated states at
 * fixed enthalpies, and a phase chosen by the test.
 */
export const createFakeAdapter = (phase: (pressure: number, temperature: number) => Phase = () => "gas") => ({
  fluid: "test-fluid",
  enthalpy: vi.fn((pressure: number, temperature: number) => pressure / 1000 + temperature),
  enthalpyAtQuality: vi.fn((_pressure: number, quality: SaturationQuality) =>
    quality === 0 ? 100_000 : 400_000
  ),
  phase: vi.fn(phase),
  humidityRatio: vi.fn(
    (_pressure: number, _temperature: number, _relativeHumidity: number) => 0.0072617
  )
}) satisfies PropertyAdapter;
