import { loadConfig, type Config } from "./config.js";
import { createHttpFetcher } from "./fetcher.js";
import { Station, type StationOptions } from "./station.js";
import { FileStore } from "./store/index.js";

export * from "./types.js";
export * from "./errors.js";
export * from "./config.js";
export * from "./fetcher.js";
export * from "./formats/index.js";
export * from "./formats/locators.js";
export * from "./parser.js";
export * from "./merge.js";
export * from "./metadata.js";
export * from "./station.js";
export * from "./catalog.js";
export * from "./store/index.js";
export {
  distance,
  positionToPoint,
  type CatalogStation,
  type NearOptions,
  type NearestOptions,
  type Position,
  type StationWithDistance,
  type TextSearchOptions,
} from "./search/index.js";

/**
 * Open a station with the HTTP fetcher and a file store configured from
 * `config` (by default, from the environment).
 */
export function createStation(
  id: string,
  config: Config = loadConfig(),
  options: Pick<StationOptions, "catalog" | "logger" | "now"> = {},
): Promise<Station> {
  return Station.open(id, {
    fetcher: createHttpFetcher({
      cachePath: config.cachePath,
      retries: config.fetchRetries,
      timeout: config.fetchTimeout,
      concurrency: config.fetchConcurrency,
    }),
    store: new FileStore(config.dataDir),
    baseUrl: config.baseUrl,
    ...options,
  });
}
