import KDBush from "kdbush";
import { distance as lngLatDistance } from "geokdbush";

export type Position = Latitude & Longitude;
type Latitude = { latitude: number } | { lat: number };
type Longitude = { longitude: number } | { lon: number } | { lng: number };

/**
 * Great-circle distance between two points, in kilometers.
 */
export function distance(
  lat1: number,
  lon1: number,
  lat2: number,
  lon2: number,
): number {
  return lngLatDistance(lon1, lat1, lon2, lat2);
}

/**
 * Index points by longitude and latitude, in the order given. Returns `null`
 * for an empty list.
 */
export function createGeoIndex(
  points: readonly { latitude: number; longitude: number }[],
): KDBush | null {
  if (points.length === 0) return null;

  const index = new KDBush(points.length);
  for (const { longitude, latitude } of points) {
    index.add(longitude, latitude);
  }
  index.finish();
  return index;
}

/**
 * Normalise any accepted position shape to `[latitude, longitude]`.
 */
export function positionToPoint(position: Position): [number, number] {
  const longitude =
    "longitude" in position
      ? position.longitude
      : "lon" in position
        ? position.lon
        : position.lng;
  const latitude = "latitude" in position ? position.latitude : position.lat;
  return [latitude, longitude];
}
