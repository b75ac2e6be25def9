import { FetchError, MetadataParseError } from "./errors.js";
import type { Fetcher } from "./fetcher.js";
import {
  DEFAULT_BASE_URL,
  stationOwnersLocator,
  stationTableLocator,
} from "./formats/locators.js";
import { decodeEntities, parseCoordinates } from "./metadata.js";
import {
  createStationSearch,
  type CatalogStation,
  type NearOptions,
  type NearestOptions,
  type StationSearch,
  type StationWithDistance,
  type TextSearchOptions,
} from "./search/index.js";
import type { Logger } from "./types.js";
import { parseDelimited } from "./util.js";

const STATION_TABLE_HEADERS = [
  "id",
  "owner",
  "ttype",
  "hull",
  "name",
  "payload",
  "location",
  "timezone",
  "forecast",
  "note",
] as const;

const OWNER_HEADERS = ["code", "name", "country"] as const;

export interface StationTableOptions {
  // Owner code to display name, from `parseStationOwners`
  owners?: ReadonlyMap<string, string>;
  onError?: (error: MetadataParseError) => void;
}

/**
 * Read the provider's `|` delimited owner list into a map of owner code to
 * `"<name>, <country>"`.
 */
export function parseStationOwners(content: string): Map<string, string> {
  return new Map(
    parseDelimited(content, OWNER_HEADERS)
      .filter((row) => row.code !== "")
      .map((row): [string, string] => [
        row.code,
        [row.name, row.country].filter(Boolean).join(", "),
      ]),
  );
}

/**
 * Read the provider's station table. Owner codes are replaced by the owner's
 * name where `owners` knows them. A location that cannot be read is reported
 * and leaves the coordinates `null`.
 */
export function parseStationTable(
  content: string,
  {
    owners = new Map<string, string>(),
    onError = (error) => console.warn(error.message),
  }: StationTableOptions = {},
): CatalogStation[] {
  return parseDelimited(content, STATION_TABLE_HEADERS)
    .filter((row) => row.id !== "")
    .map((row) => {
      let latitude: number | null = null;
      let longitude: number | null = null;

      if (row.location !== "") {
        try {
          ({ latitude, longitude } = parseCoordinates(row.location));
        } catch (error) {
          if (!(error instanceof MetadataParseError)) throw error;
          onError(error);
        }
      }

      return {
        id: row.id,
        name: text(row.name),
        latitude,
        longitude,
        timezone: text(row.timezone),
        owner: text(owners.get(row.owner) ?? row.owner),
        type: text(row.ttype),
        hull: text(row.hull),
        notes: text(row.note),
      };
    });
}

function text(value: string): string | null {
  const decoded = decodeEntities(value).trim();
  return decoded === "" ? null : decoded;
}

/**
 * Every station the provider lists, with lookup by id (case-insensitive),
 * text search and proximity queries.
 */
export class StationCatalog {
  private readonly byId: Map<string, CatalogStation>;
  private readonly index: StationSearch;

  constructor(stations: readonly CatalogStation[]) {
    // Later entries replace earlier ones with the same id
    this.byId = new Map(stations.map((s) => [s.id.toLowerCase(), s]));
    this.index = createStationSearch([...this.byId.values()]);
  }

  get size(): number {
    return this.byId.size;
  }

  get stations(): CatalogStation[] {
    return [...this.byId.values()];
  }

  get(id: string): CatalogStation | undefined {
    return this.byId.get(id.toLowerCase());
  }

  has(id: string): boolean {
    return this.byId.has(id.toLowerCase());
  }

  search(query: string, options?: TextSearchOptions): CatalogStation[] {
    return this.index.search(query, options);
  }

  near(options: NearOptions): StationWithDistance[] {
    return this.index.near(options);
  }

  nearest(options: NearestOptions): StationWithDistance | null {
    return this.index.nearest(options);
  }
}

export interface FetchCatalogOptions {
  baseUrl?: string;
  logger?: Logger;
}

/**
 * Fetch the station table and owner list and build a catalog. Without the
 * owner list, owners are left as the provider's codes.
 */
export async function fetchStationCatalog(
  fetcher: Fetcher,
  { baseUrl = DEFAULT_BASE_URL, logger = console }: FetchCatalogOptions = {},
): Promise<StationCatalog> {
  const [table, owners] = await Promise.all([
    fetcher.fetch(stationTableLocator(baseUrl)),
    fetcher.fetch(stationOwnersLocator(baseUrl)).then(
      parseStationOwners,
      (error: unknown) => {
        if (!(error instanceof FetchError)) throw error;
        logger.warn(`Station owners unavailable: ${error.message}`);
        return new Map<string, string>();
      },
    ),
  ]);

  const stations = parseStationTable(table, {
    owners,
    onError: (error) => logger.warn(error.message),
  });
  logger.info(`Loaded ${stations.length} stations`);
  return new StationCatalog(stations);
}
