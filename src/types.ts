export type FeedKind = "continuous" | "archival";

/**
 * Qualified category id. Continuous feeds live under `realtime/`, archival
 * feeds under `historical/`, e.g. `realtime/stdmet` and `historical/stdmet`.
 */
export type CategoryId = `realtime/${string}` | `historical/${string}`;

export type TimePart = "year" | "month" | "day" | "hour" | "minute";

export type ColumnKind = "float" | "integer" | "string";

export interface TimeColumn {
  name: string;
  time: TimePart;
}

export interface ValueColumn {
  name: string;
  kind: ColumnKind;
  unit?: string;
  // Tokens that mean "no measurement" for this column
  missing: readonly string[];
  // Band centre in Hz, for spectral columns
  frequency?: number;
}

export type ColumnSpec = TimeColumn | ValueColumn;

export interface Schema {
  readonly id: CategoryId;
  readonly name: string;
  readonly title: string;
  readonly feed: FeedKind;
  // Provider file code, e.g. "txt" for realtime stdmet or "h" for historical stdmet
  readonly code: string;
  // Layout era. Only the post-2007 layout is supported.
  readonly version: string;
  // Spectral bands are written as `value (frequency)` pairs
  readonly paired: boolean;
  readonly columns: readonly ColumnSpec[];
}

/**
 * A parsed value. `null` is "no measurement", distinct from zero and NaN.
 */
export type Value = number | string | null;

export interface ObservationRow {
  // UTC, minute resolution. Identity of the row within a dataset.
  readonly timestamp: Date;
  readonly values: Readonly<Record<string, Value>>;
}

export interface Dataset {
  readonly station: string;
  readonly category: CategoryId;
  // Strictly ascending by timestamp
  readonly rows: readonly ObservationRow[];
}

export interface StationMetadata {
  id: string | null;
  name: string | null;
  latitude: number | null;
  longitude: number | null;
  timezone: string | null;
  owner: string | null;
  type: string | null;
  hull: string | null;
  notes: string | null;
}

export type Logger = Pick<Console, "debug" | "info" | "warn" | "error">;

export function isTimeColumn(column: ColumnSpec): column is TimeColumn {
  return "time" in column;
}

export function valueColumns(schema: Schema): readonly ValueColumn[] {
  return schema.columns.filter(
    (column): column is ValueColumn => !isTimeColumn(column),
  );
}
