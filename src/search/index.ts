import { around } from "geokdbush";
import type { StationMetadata } from "../types.js";
import {
  createGeoIndex,
  distance,
  positionToPoint,
  type Position,
} from "./geo.js";
import { createTextIndex } from "./text.js";

export { distance, positionToPoint, type Position } from "./geo.js";

/**
 * Station metadata as listed in the provider's station table, which always
 * carries an id.
 */
export type CatalogStation = StationMetadata & { id: string };

export type NearestOptions = Position & {
  maxDistance?: number;
  filter?: (station: CatalogStation) => boolean;
};

export type NearOptions = NearestOptions & {
  maxResults?: number;
};

export type TextSearchOptions = {
  filter?: (station: CatalogStation) => boolean;
  maxResults?: number;
};

/**
 * A tuple of a station and its distance from a given point, in kilometers.
 */
export type StationWithDistance = [CatalogStation, number];

export interface StationSearch {
  near(options: NearOptions): StationWithDistance[];
  nearest(options: NearestOptions): StationWithDistance | null;
  search(query: string, options?: TextSearchOptions): CatalogStation[];
}

/**
 * Build text and proximity search over a list of stations with unique ids.
 * Stations without coordinates are only found by text.
 */
export function createStationSearch(
  stations: readonly CatalogStation[],
): StationSearch {
  const stationMap = new Map(stations.map((s) => [s.id, s]));
  const textIndex = createTextIndex(stations);

  // Only stations with coordinates go in the geo index
  const located = stations.filter(
    (s): s is CatalogStation & { latitude: number; longitude: number } =>
      s.latitude !== null && s.longitude !== null,
  );
  const geoIndex = createGeoIndex(located);

  function near({
    maxDistance = Infinity,
    maxResults = 10,
    filter,
    ...position
  }: NearOptions): StationWithDistance[] {
    if (!geoIndex) return [];
    const [latitude, longitude] = positionToPoint(position);

    const ids: number[] = around(
      geoIndex,
      longitude,
      latitude,
      maxResults,
      maxDistance,
      filter ? (id: number) => filter(located[id]!) : undefined,
    );
    return ids.map((id): StationWithDistance => {
      const station = located[id]!;
      return [
        station,
        distance(latitude, longitude, station.latitude, station.longitude),
      ];
    });
  }

  function nearest(options: NearestOptions): StationWithDistance | null {
    const results = near({ ...options, maxResults: 1 });
    return results[0] ?? null;
  }

  function search(
    query: string,
    { filter, maxResults = 20 }: TextSearchOptions = {},
  ): CatalogStation[] {
    const searchOptions: Parameters<typeof textIndex.search>[1] = {};

    if (filter) {
      searchOptions.filter = (result) => {
        const station = stationMap.get(result.id);
        return station ? filter(station) : false;
      };
    }

    return textIndex
      .search(query, searchOptions)
      .slice(0, maxResults)
      .flatMap((result) => {
        const station = stationMap.get(result.id);
        return station ? [station] : [];
      });
  }

  return { near, nearest, search };
}
