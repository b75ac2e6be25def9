import Ajv2020Module from "ajv/dist/2020.js";
import addFormatsModule from "ajv-formats";
import type { ColumnKind, FeedKind } from "./types.js";
import configSchema from "./schemas/config.schema.json" with { type: "json" };
import datasetSchema from "./schemas/dataset.schema.json" with { type: "json" };
import formatsSchema from "./schemas/formats.schema.json" with { type: "json" };

// Both packages are CommonJS; under Node's ESM loader the default import is
// `module.exports`, which carries the constructor/plugin again as `.default`.
const Ajv2020 = Ajv2020Module.default;
const addFormats = addFormatsModule.default;

export const ajv = new Ajv2020({ allErrors: true, strict: false });
addFormats(ajv);

// Environment values are strings; this instance converts them in place
const coercingAjv = new Ajv2020({
  allErrors: true,
  strict: false,
  coerceTypes: true,
});
addFormats(coercingAjv);

export interface ColumnDefinition {
  name: string;
  kind: ColumnKind;
  unit?: string;
  missing: string[];
}

export interface CategoryDefinition {
  name: string;
  title: string;
  feed: FeedKind;
  code: string;
  paired?: boolean;
  columns: ColumnDefinition[];
  bands?: Omit<ColumnDefinition, "name">;
}

export interface FormatCatalog {
  version: string;
  frequencies: number[];
  categories: CategoryDefinition[];
}

export interface StoredRow {
  timestamp: string;
  values: (number | string | null)[];
}

export interface StoredDataset {
  station: string;
  category: string;
  version: string;
  columns: string[];
  rows: StoredRow[];
}

export type ConfigEnv = {
  NDBC_BASE_URL?: string;
  BUOY_DATA_DIR?: string;
  BUOY_CACHE_PATH?: string;
  BUOY_FETCH_RETRIES?: number;
  BUOY_FETCH_TIMEOUT?: number;
  BUOY_FETCH_CONCURRENCY?: number;
};

export const validateFormatCatalog = ajv.compile<FormatCatalog>(formatsSchema);
export const validateStoredDataset = ajv.compile<StoredDataset>(datasetSchema);
export const validateConfigEnv = coercingAjv.compile<ConfigEnv>(configSchema);

export function describeErrors(
  validate: { errors?: Parameters<typeof ajv.errorsText>[0] },
  dataVar?: string,
): string {
  return ajv.errorsText(validate.errors, dataVar ? { dataVar } : undefined);
}
