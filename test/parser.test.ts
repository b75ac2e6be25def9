import { describe, test, expect } from "vitest";
import { readFileSync } from "fs";
import {
  bandName,
  castValue,
  defineSchema,
  isSentinel,
  MalformedRowError,
  parse,
  schemaFor,
  SchemaMismatchError,
  TIME_COLUMNS,
  tokenWidth,
} from "../src/index.js";

const fixture = (name: string) =>
  readFileSync(new URL(`./fixtures/${name}`, import.meta.url), "utf-8");

const wind = defineSchema({
  name: "wind",
  feed: "continuous",
  columns: [
    ...TIME_COLUMNS,
    { name: "wind_speed", kind: "float", missing: ["99.0"] },
    { name: "wind_dir", kind: "integer", missing: ["99"] },
    { name: "gust", kind: "float", missing: ["99.0"] },
  ],
});

const HISTORICAL_STDMET_HEADER = [
  "#YY  MM DD hh mm WDIR WSPD GST  WVHT   DPD   APD MWD   PRES  ATMP  WTMP  DEWP  VIS  TIDE",
  "#yr  mo dy hr mn degT m/s  m/s     m   sec   sec degT   hPa  degC  degC  degC  mi    ft",
];

function stdmetLine(hour: number) {
  const hh = String(hour).padStart(2, "0");
  return `2023 01 01 ${hh} 00 200  5.1  6.3  1.20  8.00  5.50 190 1015.2  12.1  18.3   9.0 99.0 99.00`;
}

describe("parse", () => {
  test("reads a two row wind feed", () => {
    const { rows, skipped, errors } = parse(
      "2023 05 01 00 30 5.2 270 1.1\n2023 05 01 01 30 99.0 99 99.0",
      wind,
    );

    expect(skipped).toBe(0);
    expect(errors).toEqual([]);
    expect(rows).toEqual([
      {
        timestamp: new Date("2023-05-01T00:30:00Z"),
        values: { wind_speed: 5.2, wind_dir: 270, gust: 1.1 },
      },
      {
        timestamp: new Date("2023-05-01T01:30:00Z"),
        values: { wind_speed: null, wind_dir: null, gust: null },
      },
    ]);
  });

  test("sentinels are per column", () => {
    const schema = schemaFor("historical/stdmet");
    const { rows } = parse(
      "2023 01 01 00 00 999 99.0 99.0 99.00 99.00 99.00 999 9999.0 99.0 999.0 999.0 99.0 99.00",
      schema,
    );

    const values = rows[0]!.values;
    expect(values["WSPD"]).toBeNull();
    expect(values["WDIR"]).toBeNull();
    expect(values["DEWP"]).toBeNull();
    // ATMP's sentinel is 999.0, so 99.0 is a reading
    expect(values["ATMP"]).toBe(99);
  });

  test("skips malformed rows and keeps the rest", () => {
    const lines = [
      ...HISTORICAL_STDMET_HEADER,
      ...[0, 1, 2, 3, 4].map(stdmetLine),
      "2023 01 01 05 30 200  5.1  6.3  1.20  8.00  5.50 190 1015.2  12.1  18.3   9.0 99.0",
      ...[5, 6, 7, 8, 9].map(stdmetLine),
    ];

    const { rows, skipped, errors } = parse(
      lines.join("\n"),
      schemaFor("historical/stdmet"),
    );

    expect(rows).toHaveLength(10);
    expect(skipped).toBe(1);
    expect(errors[0]).toBeInstanceOf(MalformedRowError);
    expect(errors[0]!.line).toBe(8);
    expect(errors[0]!.message).toBe("line 8: expected 18 tokens, found 17");
  });

  test("reads a provider file with a two line header", () => {
    const { rows, skipped } = parse(
      fixture("41001h2023.txt"),
      schemaFor("historical/stdmet"),
    );

    expect(skipped).toBe(0);
    expect(rows.map((row) => row.timestamp.toISOString())).toEqual([
      "2023-01-01T00:10:00.000Z",
      "2023-01-01T00:00:00.000Z",
    ]);
    expect(rows[1]!.values).toEqual({
      WDIR: 200,
      WSPD: 5.1,
      GST: 6.3,
      WVHT: 1.2,
      DPD: 8,
      APD: 5.5,
      MWD: 190,
      PRES: 1015.2,
      ATMP: 12.1,
      WTMP: 18.3,
      DEWP: 9,
      VIS: null,
      TIDE: null,
    });
  });

  test("realtime MM marks a missing value", () => {
    const { rows } = parse(
      "2024 03 05 12 40 250 6.8 MM 8.1 1236",
      schemaFor("realtime/cwind"),
    );
    expect(rows[0]!.values["GDR"]).toBeNull();
    expect(rows[0]!.values["GTIME"]).toBe(1236);
  });

  test("hex and exponent tokens are malformed", () => {
    const { rows, skipped, errors } = parse(
      "2024 03 05 12 40 250 0x1A MM 1e1 1236",
      schemaFor("realtime/cwind"),
    );
    expect(rows).toEqual([]);
    expect(skipped).toBe(1);
    expect(errors[0]!.message).toBe('line 1: invalid float "0x1A" in WSPD');
  });

  test("a header with the wrong column count is a schema mismatch", () => {
    const header = HISTORICAL_STDMET_HEADER[0]!;
    const run = () =>
      parse(`${header}\n${stdmetLine(0)}`, schemaFor("realtime/stdmet"));

    expect(run).toThrow(SchemaMismatchError);
    expect(run).toThrow("realtime/stdmet: header names 18 columns, expected 19");
    try {
      run();
    } catch (error) {
      expect(error).toBeInstanceOf(SchemaMismatchError);
      if (error instanceof SchemaMismatchError) {
        expect(error.sample).toBe(header);
      }
    }
  });

  test("rejects out of range dates", () => {
    const { rows, errors } = parse(
      "2023 02 30 00 00 5.2 270 1.1\n2023 05 01 24 00 5.2 270 1.1",
      wind,
    );
    expect(rows).toEqual([]);
    expect(errors.map((error) => error.message)).toEqual([
      "line 1: invalid date",
      "line 2: invalid date",
    ]);
  });

  test("rejects tokens of the wrong type", () => {
    const { errors } = parse("2023 05 01 00 30 5.2 270.5 1.1", wind);
    expect(errors[0]!.message).toBe('line 1: invalid integer "270.5" in wind_dir');
  });

  test("defaults the minute to zero", () => {
    const hourly = defineSchema({
      name: "hourly",
      feed: "archival",
      columns: [
        ...TIME_COLUMNS.slice(0, 4),
        { name: "value", kind: "float", missing: ["MM"] },
      ],
    });

    const { rows } = parse("2010 12 31 23 4.5", hourly);
    expect(rows[0]!.timestamp.toISOString()).toBe("2010-12-31T23:00:00.000Z");
  });

  test("rows keep source order", () => {
    const { rows } = parse(fixture("41001.cwind"), schemaFor("realtime/cwind"));
    expect(rows.map((row) => row.timestamp.toISOString())).toEqual([
      "2024-03-05T12:50:00.000Z",
      "2024-03-05T12:40:00.000Z",
    ]);
    expect(Object.isFrozen(rows[0])).toBe(true);
  });
});

describe("paired spectral layout", () => {
  const schema = schemaFor("realtime/swdir");
  const frequencies = schema.columns.flatMap((column) =>
    "frequency" in column && column.frequency !== undefined
      ? [column.frequency]
      : [],
  );

  function line(first = "12.5", firstFrequency?: string) {
    const pairs = frequencies.map((frequency, index) =>
      index === 0
        ? `${first} (${firstFrequency ?? frequency.toFixed(3)})`
        : `999.0 (${frequency.toFixed(3)})`,
    );
    return `2024 03 05 12 40 ${pairs.join(" ")}`;
  }

  test("reads value and frequency pairs", () => {
    expect(frequencies).toHaveLength(47);
    expect(tokenWidth(schema)).toBe(5 + 47 * 2);

    const { rows, skipped } = parse(`#YY  MM DD hh mm\n${line()}`, schema);

    expect(skipped).toBe(0);
    expect(rows[0]!.values[bandName(0.02)]).toBe(12.5);
    expect(rows[0]!.values[bandName(0.485)]).toBeNull();
  });

  test("a band at another frequency is a schema mismatch", () => {
    expect(() => parse(line("12.5", "0.025"), schema)).toThrow(
      SchemaMismatchError,
    );
  });
});

describe("sentinels and casting", () => {
  test("numeric sentinels compare by value", () => {
    expect(isSentinel("99.00", ["99.0"])).toBe(true);
    expect(isSentinel("MM", ["MM"])).toBe(true);
    expect(isSentinel("99.1", ["99.0"])).toBe(false);
    expect(isSentinel("N/A", ["MM"])).toBe(false);
  });

  test("castValue follows the column kind", () => {
    const column = { name: "x", kind: "float" as const, missing: ["MM"] };
    expect(castValue("1.5", column)).toBe(1.5);
    expect(castValue("MM", column)).toBeNull();
    expect(castValue("abc", column)).toBeUndefined();
    expect(castValue("abc", { ...column, kind: "string" })).toBe("abc");
    expect(castValue("7", { ...column, kind: "integer" })).toBe(7);
    expect(castValue("7.5", { ...column, kind: "integer" })).toBeUndefined();
  });

  test("only plain decimals are numbers", () => {
    const column = { name: "x", kind: "float" as const, missing: ["MM"] };
    expect(castValue("-.5", column)).toBe(-0.5);
    expect(castValue("+3.", column)).toBe(3);
    for (const token of ["0x1A", "0b11", "0o7", "1e1", "Infinity", "."]) {
      expect(castValue(token, column)).toBeUndefined();
    }
    expect(isSentinel("0x63", ["99"])).toBe(false);
  });
});
