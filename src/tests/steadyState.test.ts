import { describe, expect, it } from "vitest";
import { EmptySeriesError, InvalidThresholdError } from "../lib/errors";
import {
  binDurations,
  binLabels,
  durationUnit,
  formatDuration
} from "../lib/steadyState/binner";
import {
  createSteadyRunState,
  segmentSteadyRuns,
  stepSteadyRun
} from "../lib/steadyState/segmenter";

describe("steady run state", () => {
  it("starts a run of one sample with zero variance", () => {
    expect(createSteadyRunState(42)).toEqual({ mean: 42, variance: 0, length: 1, count: 1 });
  });

  it("grows the run while the deviation stays under the threshold", () => {
    const step = stepSteadyRun({ mean: 50, variance: 0, length: 1, count: 1 }, 52, 2);
    expect(step.closed).toBeNull();
    expect(step.state).toEqual({ mean: 51, variance: 1, length: 2, count: 2 });
  });

  it("closes the run before the sample that breaks it", () => {
    const step = stepSteadyRun({ mean: 50, variance: 0, length: 4, count: 4 }, 90, 2);
    expect(step.closed).toBe(4);
    expect(step.state).toEqual({ mean: 90, variance: 0, length: 1, count: 1 });
  });

  it("lengthens the run over an unreadable sample without touching its statistics", () => {
    const step = stepSteadyRun({ mean: 50, variance: 1, length: 3, count: 3 }, Number.NaN, 2);
    expect(step.closed).toBeNull();
    expect(step.state).toEqual({ mean: 50, variance: 1, length: 4, count: 3 });
  });

  it("takes its statistics from the first readable sample", () => {
    const start = createSteadyRunState(Number.NaN);
    expect(start.count).toBe(0);
    const step = stepSteadyRun(start, 70, 2);
    expect(step.closed).toBeNull();
    expect(step.state).toEqual({ mean: 70, variance: 0, length: 2, count: 1 });
  });
});

describe("steady-state segmentation", () => {
  it("splits a frequency step into two runs", () => {
    const { runs, durations } = segmentSteadyRuns([50, 50, 50, 50, 90, 90, 90], 10);
    expect(runs).toEqual([
      { start: 0, length: 4 },
      { start: 4, length: 3 }
    ]);
    expect(durations).toEqual([40, 40, 40, 40, 30, 30, 30]);
  });

  it("keeps one run when the threshold tolerates the step", () => {
    const { runs } = segmentSteadyRuns([50, 50, 50, 50, 90, 90, 90], 10, 20);
    expect(runs).toEqual([{ start: 0, length: 7 }]);
  });

  it("covers every sample exactly once", () => {
    const frequency = [0, 10, 0, 10, 0, 10, 35, 35, 35];
    const { runs, durations } = segmentSteadyRuns(frequency, 5);
    expect(runs.reduce((sum, run) => sum + run.length, 0)).toBe(frequency.length);
    expect(durations).toHaveLength(frequency.length);
    runs.forEach((run, index) => {
      const next = runs[index + 1];
      expect(next ? next.start : frequency.length).toBe(run.start + run.length);
    });
    expect(durations).toEqual([5, 5, 5, 5, 5, 5, 15, 15, 15]);
  });

  it("still detects steps after an unreadable sample", () => {
    const { runs } = segmentSteadyRuns([50, 50, Number.NaN, 50, 50, 90, 90, 90, 10, 10], 10);
    expect(runs).toEqual([
      { start: 0, length: 5 },
      { start: 5, length: 3 },
      { start: 8, length: 2 }
    ]);
  });

  it("reports a single sample as a run of one interval", () => {
    expect(segmentSteadyRuns([60], 10).durations).toEqual([10]);
  });

  it("fails on an empty series", () => {
    expect(() => segmentSteadyRuns([], 10)).toThrow(EmptySeriesError);
  });
});

describe("duration binning", () => {
  const minutes = [60, 1800, 3600];

  it("puts the lower bound inside its interval", () => {
    expect(
      binDurations([1800], { thresholds: minutes, includeBelow: true, includeAbove: true })
    ).toEqual(["30 min ≤ τ < 60 min"]);
  });

  it("labels the open ends when they are included", () => {
    expect(
      binDurations([30, 600, 3600, 7200], {
        thresholds: minutes,
        includeBelow: true,
        includeAbove: true
      })
    ).toEqual(["τ < 1 min", "1 min ≤ τ < 30 min", "τ ≥ 60 min", "τ ≥ 60 min"]);
  });

  it("leaves the open ends unlabelled when excluded", () => {
    expect(
      binDurations([30, 600, 3600], {
        thresholds: minutes,
        includeBelow: false,
        includeAbove: false
      })
    ).toEqual([null, "1 min ≤ τ < 30 min", null]);
  });

  it("uses one unit for every bound of a label set", () => {
    expect(
      binDurations([45], { thresholds: [30, 120], includeBelow: false, includeAbove: false })
    ).toEqual(["0.5 min ≤ τ < 2 min"]);
    expect(
      binDurations([100, 150], { thresholds: [30, 59, 120], includeBelow: false, includeAbove: true })
    ).toEqual(["59 s ≤ τ < 120 s", "τ ≥ 120 s"]);
    expect(durationUnit([30, 60])).toBe("min");
    expect(formatDuration(12.5, "s")).toBe("12.5 s");
    expect(formatDuration(90, "min")).toBe("1.5 min");
  });

  it("lists the labels in ascending order", () => {
    expect(binLabels({ thresholds: minutes, includeBelow: true, includeAbove: false })).toEqual([
      "τ < 1 min",
      "1 min ≤ τ < 30 min",
      "30 min ≤ τ < 60 min"
    ]);
  });

  it("rejects thresholds that are not strictly ascending", () => {
    const options = { includeBelow: true, includeAbove: true };
    expect(() => binDurations([1], { ...options, thresholds: [60, 60, 120] })).toThrow(
      InvalidThresholdError
    );
    expect(() => binDurations([1], { ...options, thresholds: [120, 60] })).toThrow(
      InvalidThresholdError
    );
    expect(() => binDurations([1], { ...options, thresholds: [60] })).toThrow(
      InvalidThresholdError
    );
  });
});
