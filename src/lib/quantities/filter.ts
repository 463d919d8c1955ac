import { EmptySeriesError, MissingColumnError } from "../errors";
import { TIMESTAMP_COLUMN, type RawDataset, type RowFilter } from "../import/types";

/** Canonical key of a filter: entries sorted by column name, serialized as JSON. */
export const filterSignature = (filter: RowFilter): string =>
  JSON.stringify(
    Object.keys(filter)
      .sort()
      .map((key) => [key, filter[key]])
  );

export const selectRows = (dataset: RawDataset, filter: RowFilter): number[] => {
  const constraints = Object.entries(filter).map(([column, value]) => {
    if (!(column in dataset.columns)) {
      throw new MissingColumnError(column, column);
    }
    return { cells: dataset.columns[column], value };
  });
  const rows: number[] = [];
  for (let index = 0; index < dataset.rowCount; index += 1) {
    if (constraints.every(({ cells, value }) => cells[index] === value)) {
      rows.push(index);
    }
  }
  return rows;
};

export const distinctValues = (dataset: RawDataset, column: string): (string | number | null)[] => {
  if (!(column in dataset.columns)) {
    throw new MissingColumnError(column, column);
  }
  return Array.from(new Set(dataset.columns[column]));
};

/** Seconds between the first two samples of the whole dataset. */
export const samplingInterval = (dataset: RawDataset): number => {
  const stamps = dataset.columns[TIMESTAMP_COLUMN] ?? [];
  const [first, second] = stamps;
  if (typeof first !== "number" || typeof second !== "number") {
    throw new EmptySeriesError("At least two timestamped samples are needed for the sampling interval.");
  }
  return (second - first) / 1000;
};
