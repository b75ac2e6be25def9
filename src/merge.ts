import type { Dataset, ObservationRow } from "./types.js";

/**
 * Merge freshly parsed rows into previously stored rows.
 *
 * The result holds every timestamp of either input exactly once, ascending.
 * When both inputs have a row for the same timestamp the incoming row replaces
 * the stored one as a whole, including columns it reports as missing. Within
 * a single input, the last row for a timestamp wins.
 */
export function merge(
  existing: readonly ObservationRow[] | undefined,
  incoming: readonly ObservationRow[],
): ObservationRow[] {
  const byTime = new Map<number, ObservationRow>();

  for (const row of existing ?? []) byTime.set(row.timestamp.getTime(), row);
  for (const row of incoming) byTime.set(row.timestamp.getTime(), row);

  return [...byTime.entries()]
    .sort(([a], [b]) => a - b)
    .map(([, row]) => row);
}

export function mergeDatasets(
  existing: Dataset | undefined,
  incoming: Dataset,
): Dataset {
  if (
    existing &&
    (existing.station !== incoming.station ||
      existing.category !== incoming.category)
  ) {
    throw new Error(
      `Cannot merge ${existing.station}/${existing.category} with ${incoming.station}/${incoming.category}`,
    );
  }

  return {
    station: incoming.station,
    category: incoming.category,
    rows: merge(existing?.rows, incoming.rows),
  };
}

/**
 * Number of timestamps in `merged` that `existing` did not have.
 */
export function countAdded(
  existing: readonly ObservationRow[] | undefined,
  merged: readonly ObservationRow[],
): number {
  const known = new Set(existing?.map((row) => row.timestamp.getTime()));
  return merged.filter((row) => !known.has(row.timestamp.getTime())).length;
}

/**
 * True when rows are strictly ascending by timestamp.
 */
export function isChronological(rows: readonly ObservationRow[]): boolean {
  return rows.every(
    (row, index) =>
      index === 0 ||
      rows[index - 1]!.timestamp.getTime() < row.timestamp.getTime(),
  );
}
