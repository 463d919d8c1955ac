import { InvalidThresholdError } from "../errors";

export const STEADY_STATE_COLUMN = "steady_state_time";

export type BinOptions = {
  /** Ascending bounds in seconds. */
  thresholds: readonly number[];
  includeBelow: boolean;
  includeAbove: boolean;
};

const trimmed = (value: number): string => Number(value.toFixed(1)).toString();

export type DurationUnit = "s" | "min";

/** One unit for a whole label set: minutes once the second bound reaches a minute. */
export const durationUnit = (thresholds: readonly number[]): DurationUnit =>
  thresholds.length > 1 && thresholds[1] >= 60 ? "min" : "s";

export const formatDuration = (seconds: number, unit: DurationUnit): string =>
  unit === "s" ? `${trimmed(seconds)} s` : `${trimmed(seconds / 60)} min`;

const labelFormatter = (thresholds: readonly number[]) => {
  const unit = durationUnit(thresholds);
  return {
    below: (upper: number) => `τ < ${formatDuration(upper, unit)}`,
    between: (lower: number, upper: number) =>
      `${formatDuration(lower, unit)} ≤ τ < ${formatDuration(upper, unit)}`,
    above: (lower: number) => `τ ≥ ${formatDuration(lower, unit)}`
  };
};

export const assertThresholds = (thresholds: readonly number[]): void => {
  if (thresholds.length < 2) {
    throw new InvalidThresholdError("At least two steady-state thresholds are required.", [
      ...thresholds
    ]);
  }
  thresholds.forEach((value, index) => {
    if (!Number.isFinite(value)) {
      throw new InvalidThresholdError(`Threshold ${value} is not a finite duration.`, [
        ...thresholds
      ]);
    }
    if (index > 0 && value <= thresholds[index - 1]) {
      throw new InvalidThresholdError("Steady-state thresholds must be strictly ascending.", [
        ...thresholds
      ]);
    }
  });
};

/** Every label `binDurations` can emit for these options, shortest durations first. */
export const binLabels = ({ thresholds, includeBelow, includeAbove }: BinOptions): string[] => {
  assertThresholds(thresholds);
  const label = labelFormatter(thresholds);
  const labels = thresholds.slice(1).map((upper, index) => label.between(thresholds[index], upper));
  if (includeBelow) {
    labels.unshift(label.below(thresholds[0]));
  }
  if (includeAbove) {
    labels.push(label.above(thresholds[thresholds.length - 1]));
  }
  return labels;
};

/** Half-open intervals `[lo, hi)`; samples outside the included ones get null. */
export const binDurations = (
  durations: readonly number[],
  { thresholds, includeBelow, includeAbove }: BinOptions
): (string | null)[] => {
  assertThresholds(thresholds);
  const label = labelFormatter(thresholds);
  const first = thresholds[0];
  const last = thresholds[thresholds.length - 1];
  return durations.map((duration) => {
    if (Number.isNaN(duration)) {
      return null;
    }
    if (duration < first) {
      return includeBelow ? label.below(first) : null;
    }
    if (duration >= last) {
      return includeAbove ? label.above(last) : null;
    }
    const upperIndex = thresholds.findIndex((bound) => duration < bound);
    return label.between(thresholds[upperIndex - 1], thresholds[upperIndex]);
  });
};
