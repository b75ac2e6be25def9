import { ConfigError } from "./errors.js";
import { DEFAULT_BASE_URL } from "./formats/locators.js";
import configSchema from "./schemas/config.schema.json" with { type: "json" };
import { describeErrors, validateConfigEnv } from "./validation.js";

export interface Config {
  // Provider root, e.g. https://www.ndbc.noaa.gov
  baseUrl: string;
  // Where FileStore keeps datasets
  dataDir: string;
  // make-fetch-happen HTTP cache
  cachePath: string;
  fetchRetries: number;
  // Milliseconds, per request
  fetchTimeout: number;
  fetchConcurrency: number;
}

export const DEFAULT_CONFIG: Config = {
  baseUrl: DEFAULT_BASE_URL,
  dataDir: "buoydata",
  cachePath: "node_modules/.cache",
  fetchRetries: 3,
  fetchTimeout: 30_000,
  fetchConcurrency: 4,
};

type Env = Record<string, string | undefined>;

const ENV_NAMES = Object.keys(configSchema.properties);

/**
 * Read configuration from environment variables, falling back to defaults.
 * Blank variables count as unset.
 */
export function loadConfig(env: Env = process.env): Config {
  const values: Record<string, unknown> = {};
  for (const name of ENV_NAMES) {
    const raw = env[name]?.trim();
    if (raw) values[name] = raw;
  }

  if (!validateConfigEnv(values)) {
    throw new ConfigError(
      `Invalid configuration: ${describeErrors(validateConfigEnv, "env")}`,
    );
  }

  return {
    baseUrl: values.NDBC_BASE_URL ?? DEFAULT_CONFIG.baseUrl,
    dataDir: values.BUOY_DATA_DIR ?? DEFAULT_CONFIG.dataDir,
    cachePath: values.BUOY_CACHE_PATH ?? DEFAULT_CONFIG.cachePath,
    fetchRetries: values.BUOY_FETCH_RETRIES ?? DEFAULT_CONFIG.fetchRetries,
    fetchTimeout: values.BUOY_FETCH_TIMEOUT ?? DEFAULT_CONFIG.fetchTimeout,
    fetchConcurrency:
      values.BUOY_FETCH_CONCURRENCY ?? DEFAULT_CONFIG.fetchConcurrency,
  };
}
