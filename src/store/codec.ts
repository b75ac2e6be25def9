import { StoreError } from "../errors.js";
import { schemaFor } from "../formats/index.js";
import { isChronological } from "../merge.js";
import {
  valueColumns,
  type Dataset,
  type ObservationRow,
  type Value,
  type ValueColumn,
} from "../types.js";
import {
  describeErrors,
  validateStoredDataset,
  type StoredDataset,
} from "../validation.js";

// JSON has no negative zero, so it is stored as a string in numeric columns
const NEGATIVE_ZERO = "-0";

/**
 * Serialise a dataset to its stored JSON shape. Values are written as arrays
 * in schema column order.
 */
export function encodeDataset(dataset: Dataset): StoredDataset {
  const schema = schemaFor(dataset.category);
  const columns = valueColumns(schema).map((column) => column.name);

  if (!isChronological(dataset.rows)) {
    throw new StoreError(
      `${dataset.station}/${dataset.category}: rows are not strictly ascending`,
    );
  }

  return {
    station: dataset.station,
    category: dataset.category,
    version: schema.version,
    columns,
    rows: dataset.rows.map((row) => ({
      timestamp: row.timestamp.toISOString(),
      values: columns.map((name) => {
        const value = row.values[name];
        if (value === undefined) {
          throw new StoreError(
            `${dataset.station}/${dataset.category}: row ${row.timestamp.toISOString()} has no ${name}`,
          );
        }
        return Object.is(value, -0) ? NEGATIVE_ZERO : value;
      }),
    })),
  };
}

/**
 * Rebuild a dataset from stored JSON, checking it against the registry.
 */
export function decodeDataset(data: unknown): Dataset {
  if (!validateStoredDataset(data)) {
    throw new StoreError(
      `Invalid stored dataset: ${describeErrors(validateStoredDataset)}`,
    );
  }

  const schema = storedSchema(data.category);
  const columns = valueColumns(schema);
  const label = `${data.station}/${schema.id}`;

  if (
    data.version !== schema.version ||
    data.columns.length !== columns.length ||
    data.columns.some((name, index) => name !== columns[index]?.name)
  ) {
    throw new StoreError(
      `${label}: stored layout ${data.version} [${data.columns.join(" ")}] does not match the current layout`,
    );
  }

  const rows = data.rows.map((stored, index): ObservationRow => {
    if (stored.values.length !== columns.length) {
      throw new StoreError(`${label}: row ${index} has ${stored.values.length} values`);
    }

    const values: Record<string, Value> = {};
    columns.forEach((column, i) => {
      const raw = stored.values[i] ?? null;
      const value =
        raw === NEGATIVE_ZERO && column.kind !== "string" ? -0 : raw;
      if (!conforms(value, column)) {
        throw new StoreError(
          `${label}: row ${index} has an invalid ${column.name} value`,
        );
      }
      values[column.name] = value;
    });

    return Object.freeze({
      timestamp: new Date(stored.timestamp),
      values: Object.freeze(values),
    });
  });

  if (!isChronological(rows)) {
    throw new StoreError(`${label}: stored rows are not strictly ascending`);
  }

  return { station: data.station, category: schema.id, rows };
}

function storedSchema(category: string) {
  try {
    return schemaFor(category);
  } catch (error) {
    throw new StoreError(`Stored dataset has an unknown category: ${category}`, {
      cause: error,
    });
  }
}

function conforms(value: Value, column: ValueColumn): boolean {
  if (value === null) return true;
  if (column.kind === "string") return typeof value === "string";
  if (typeof value !== "number") return false;
  return column.kind === "integer" ? Number.isInteger(value) : true;
}
