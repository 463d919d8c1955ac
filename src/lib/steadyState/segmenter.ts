import { EmptySeriesError } from "../errors";

export type SteadyRunState = {
  mean: number;
  variance: number;
  /** Samples in the run, unreadable ones included. */
  length: number;
  /** Finite samples behind `mean` and `variance`. */
  count: number;
};

export type SteadyRun = {
  start: number;
  length: number;
};

export type Segmentation = {
  runs: SteadyRun[];
  /** Per sample, the duration in seconds of the run containing it. */
  durations: number[];
};

export const createSteadyRunState = (x: number): SteadyRunState =>
  Number.isFinite(x)
    ? { mean: x, variance: 0, length: 1, count: 1 }
    : { mean: Number.NaN, variance: 0, length: 1, count: 0 };

export type SteadyRunStep = {
  state: SteadyRunState;
  /** Length of the run that `x` ended, or null when `x` joined the current run. */
  closed: number | null;
};

/**
 * Adds `x` to the current run with the growing-window mean/variance recurrence.
 * When the standard deviation would exceed `threshold`, the run ends before `x`
 * and `x` opens the next one. A sample that is not a finite number lengthens
 * the run and leaves its statistics alone.
 */
export const stepSteadyRun = (
  state: SteadyRunState,
  x: number,
  threshold: number
): SteadyRunStep => {
  const { mean, variance, length, count } = state;
  if (!Number.isFinite(x)) {
    return { state: { ...state, length: length + 1 }, closed: null };
  }
  if (count === 0) {
    return { state: { mean: x, variance: 0, length: length + 1, count: 1 }, closed: null };
  }
  const nextMean = mean + (x - mean) / (count + 1);
  const nextVariance = (count * variance + (x - mean) * (x - nextMean)) / (count + 1);
  if (Math.sqrt(nextVariance) > threshold) {
    return { state: createSteadyRunState(x), closed: length };
  }
  return {
    state: { mean: nextMean, variance: nextVariance, length: length + 1, count: count + 1 },
    closed: null
  };
};

export const segmentSteadyRuns = (
  frequency: readonly number[],
  interval: number,
  threshold = 2
): Segmentation => {
  if (frequency.length === 0) {
    throw new EmptySeriesError("The frequency series is empty.");
  }
  const runs: SteadyRun[] = [];
  let start = 0;
  let state = createSteadyRunState(frequency[0]);
  for (let index = 1; index < frequency.length; index += 1) {
    const step = stepSteadyRun(state, frequency[index], threshold);
    if (step.closed !== null) {
      runs.push({ start, length: step.closed });
      start = index;
    }
    state = step.state;
  }
  runs.push({ start, length: state.length });

  const durations = runs.flatMap((run) =>
    Array.from({ length: run.length }, () => run.length * interval)
  );
  return { runs, durations };
};
