import { describe, test, expect, vi } from "vitest";
import { readFileSync } from "fs";
import {
  decodeEntities,
  formatMetadata,
  htmlToText,
  MetadataParseError,
  parseCoordinates,
  parseMetadata,
  unknownMetadata,
} from "../src/index.js";

const HATTERAS = [
  "Station ID: 41001",
  "Station Name: EAST HATTERAS - 150 NM East of Cape Hatteras",
  "Location: 34.724 N, 72.317 W",
  "Time Zone: E",
  "Owner: National Data Buoy Center",
  "Ttype: 6-meter NOMAD buoy",
  "Hull: 6N",
].join("\n");

describe("parseMetadata", () => {
  test("a missing Notes label leaves only notes unknown", () => {
    expect(parseMetadata(HATTERAS)).toEqual({
      id: "41001",
      name: "EAST HATTERAS - 150 NM East of Cape Hatteras",
      latitude: 34.724,
      longitude: -72.317,
      timezone: "E",
      owner: "National Data Buoy Center",
      type: "6-meter NOMAD buoy",
      hull: "6N",
      notes: null,
    });
  });

  test("an unreadable location only affects the coordinates", () => {
    const onError = vi.fn();
    const metadata = parseMetadata(
      HATTERAS.replace("34.724 N, 72.317 W", "somewhere offshore"),
      { onError },
    );

    expect(metadata.latitude).toBeNull();
    expect(metadata.longitude).toBeNull();
    expect(metadata.name).toBe("EAST HATTERAS - 150 NM East of Cape Hatteras");
    expect(metadata.hull).toBe("6N");
    expect(onError).toHaveBeenCalledOnce();

    const error = onError.mock.calls[0]![0];
    expect(error).toBeInstanceOf(MetadataParseError);
    expect(error.field).toBe("location");
    expect(error.message).toBe('Unable to parse location: "somewhere offshore"');
  });

  test("empty values and NaN are unknown", () => {
    const metadata = parseMetadata("Station ID: 41001\nNotes:\nTime Zone: NaN");
    expect(metadata.notes).toBeNull();
    expect(metadata.timezone).toBeNull();
    expect(metadata.latitude).toBeNull();
  });

  test("accepts alternative labels", () => {
    const metadata = parseMetadata(
      "Name: Long Key, FL\nStation Type: C-MAN Station\nNote: seasonal",
    );
    expect(metadata.name).toBe("Long Key, FL");
    expect(metadata.type).toBe("C-MAN Station");
    expect(metadata.notes).toBe("seasonal");
  });

  test("reads a station page", () => {
    const html = readFileSync(
      new URL("./fixtures/station_page.html", import.meta.url),
      "utf-8",
    );

    expect(parseMetadata(html)).toEqual({
      id: "44013",
      name: "BOSTON 16 NM East of Boston, MA",
      latitude: 42.346,
      longitude: -70.651,
      timezone: null,
      owner: "National Data Buoy Center",
      type: null,
      hull: "3-meter discus buoy",
      notes: null,
    });
  });

  test("an out of range character reference is kept as text", () => {
    const metadata = parseMetadata(
      "<p><b>Station Name:</b> Buoy &#x110000;</p>\n<p><b>Hull:</b> 6N</p>",
    );
    expect(metadata.name).toBe("Buoy &#x110000;");
    expect(metadata.hull).toBe("6N");
  });
});

describe("parseCoordinates", () => {
  test("south and east", () => {
    expect(parseCoordinates("33.867 S 151.233 E")).toEqual({
      latitude: -33.867,
      longitude: 151.233,
    });
  });

  test("ignores trailing text", () => {
    expect(
      parseCoordinates(`24.843 N 80.862 W (24°50'35" N 80°51'43" W)`),
    ).toEqual({ latitude: 24.843, longitude: -80.862 });
  });

  test("rejects out of range values", () => {
    expect(() => parseCoordinates("95.000 N 10.000 W")).toThrow(
      MetadataParseError,
    );
  });
});

describe("formatMetadata", () => {
  test("renders a labelled block", () => {
    expect(formatMetadata(parseMetadata(HATTERAS))).toBe(
      [
        "Station ID: 41001",
        "Station Name: EAST HATTERAS - 150 NM East of Cape Hatteras",
        "Location: 34.724 N, 72.317 W",
        "Time Zone: E",
        "Owner: National Data Buoy Center",
        "Ttype: 6-meter NOMAD buoy",
        "Hull: 6N",
        "Notes: unknown",
      ].join("\n"),
    );
  });

  test("parses back to the same metadata", () => {
    const metadata = { ...parseMetadata(HATTERAS), notes: "Drifting" };
    expect(parseMetadata(formatMetadata(metadata))).toEqual(metadata);
    expect(parseMetadata(formatMetadata(unknownMetadata("41001")))).toEqual(
      unknownMetadata("41001"),
    );
  });
});

describe("htmlToText", () => {
  test("drops tags and scripts and decodes entities", () => {
    expect(
      htmlToText("<p>A &amp; B</p><script>x = 1</script><div>42&#176;</div>"),
    ).toBe("A & B\n42°\n");
  });

  test("keeps references beyond the last code point", () => {
    expect(decodeEntities("&#x10FFFF;|&#x110000;|&#99999999999;")).toBe(
      "\u{10FFFF}|&#x110000;|&#99999999999;",
    );
  });

  test("leaves plain text alone", () => {
    expect(htmlToText("a < b")).toBe("a < b");
  });
});
