import { MetadataParseError } from "./errors.js";
import type { StationMetadata } from "./types.js";

type TextField = Exclude<keyof StationMetadata, "latitude" | "longitude">;

// Alternatives are tried in order; every label must start a line
const LABELS: Record<TextField | "location", RegExp[]> = {
  id: [label("Station ID")],
  name: [label("Station Name"), label("Name")],
  location: [label("Location")],
  timezone: [label("Time Zone"), label("Timezone")],
  owner: [label("Owned and maintained by", false), label("Owner")],
  type: [label("Ttype"), label("Station Type"), label("Type")],
  hull: [label("Hull Type"), label("Hull")],
  notes: [label("Notes"), label("Note")],
};

function label(text: string, colon = true): RegExp {
  const escaped = text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
  return new RegExp(
    `^[ \\t]*${escaped}[ \\t]*${colon ? ":" : ":?"}[ \\t]*(.*)$`,
    "im",
  );
}

const ENTITIES: Record<string, string> = {
  amp: "&",
  lt: "<",
  gt: ">",
  quot: '"',
  apos: "'",
  nbsp: " ",
  deg: "°",
};

export interface ParseMetadataOptions {
  onError?: (error: MetadataParseError) => void;
}

export interface Coordinates {
  latitude: number;
  longitude: number;
}

/**
 * Extract station attributes from a labelled description, plain text or HTML.
 *
 * A label that is absent, or whose value is empty, gives `null`. A location
 * that cannot be read leaves latitude and longitude `null` and reports a
 * `MetadataParseError` without affecting the other fields.
 */
export function parseMetadata(
  raw: string,
  { onError = (error) => console.warn(error.message) }: ParseMetadataOptions = {},
): StationMetadata {
  const text = htmlToText(raw);

  const field = (key: TextField | "location") => {
    for (const pattern of LABELS[key]) {
      const match = pattern.exec(text);
      if (match) return clean(match[1]);
    }
    return null;
  };

  let coordinates: Coordinates | null = null;
  const location = field("location");
  if (location !== null) {
    try {
      coordinates = parseCoordinates(location);
    } catch (error) {
      if (!(error instanceof MetadataParseError)) throw error;
      onError(error);
    }
  }

  return {
    id: field("id"),
    name: field("name"),
    latitude: coordinates?.latitude ?? null,
    longitude: coordinates?.longitude ?? null,
    timezone: field("timezone"),
    owner: field("owner"),
    type: field("type"),
    hull: field("hull"),
    notes: field("notes"),
  };
}

/**
 * Read `D.DDD N/S, D.DDD E/W` as signed decimal degrees, north and east
 * positive. The comma is optional and trailing text is ignored.
 */
export function parseCoordinates(text: string): Coordinates {
  const match =
    /^\s*(\d{1,2}(?:\.\d+)?)\s*([NS])\s*,?\s*(\d{1,3}(?:\.\d+)?)\s*([EW])\b/i.exec(
      text,
    );

  if (!match) throw new MetadataParseError("location", text);

  const [, lat, ns, lon, ew] = match;
  const latitude = Number(lat) * (ns?.toUpperCase() === "S" ? -1 : 1);
  const longitude = Number(lon) * (ew?.toUpperCase() === "W" ? -1 : 1);

  if (Math.abs(latitude) > 90 || Math.abs(longitude) > 180) {
    throw new MetadataParseError("location", text);
  }

  return { latitude, longitude };
}

/**
 * Render metadata as the labelled block `parseMetadata` reads.
 */
export function formatMetadata(metadata: StationMetadata): string {
  const show = (value: string | number | null) =>
    value === null ? "unknown" : String(value);
  const location =
    metadata.latitude === null || metadata.longitude === null
      ? "unknown"
      : formatCoordinates(metadata.latitude, metadata.longitude);

  return [
    `Station ID: ${show(metadata.id)}`,
    `Station Name: ${show(metadata.name)}`,
    `Location: ${location}`,
    `Time Zone: ${show(metadata.timezone)}`,
    `Owner: ${show(metadata.owner)}`,
    `Ttype: ${show(metadata.type)}`,
    `Hull: ${show(metadata.hull)}`,
    `Notes: ${show(metadata.notes)}`,
  ].join("\n");
}

export function formatCoordinates(latitude: number, longitude: number) {
  return `${Math.abs(latitude).toFixed(3)} ${latitude < 0 ? "S" : "N"}, ${Math.abs(longitude).toFixed(3)} ${longitude < 0 ? "W" : "E"}`;
}

export function unknownMetadata(id: string | null = null): StationMetadata {
  return {
    id,
    name: null,
    latitude: null,
    longitude: null,
    timezone: null,
    owner: null,
    type: null,
    hull: null,
    notes: null,
  };
}

function clean(value: string | undefined): string | null {
  const trimmed = value?.trim() ?? "";
  return trimmed === "" || trimmed === "NaN" || trimmed === "unknown"
    ? null
    : trimmed;
}

export function htmlToText(raw: string): string {
  if (!/<[a-z!/][^>]*>/i.test(raw)) return raw;

  return decodeEntities(
    raw
      .replace(/<(script|style)[^>]*>[\s\S]*?<\/\1>/gi, "")
      .replace(/<br\s*\/?>|<\/(p|div|li|tr|h\d)>/gi, "\n")
      .replace(/<[^>]+>/g, ""),
  );
}

const MAX_CODE_POINT = 0x10ffff;

export function decodeEntities(text: string): string {
  return text.replace(/&(#x?[0-9a-f]+|[a-z]+);/gi, (entity, code: string) => {
    if (code.startsWith("#")) {
      const point =
        code[1]?.toLowerCase() === "x"
          ? parseInt(code.slice(2), 16)
          : parseInt(code.slice(1), 10);
      return point <= MAX_CODE_POINT ? String.fromCodePoint(point) : entity;
    }
    return ENTITIES[code.toLowerCase()] ?? entity;
  });
}
