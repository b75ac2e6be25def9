import { MalformedRowError, SchemaMismatchError } from "./errors.js";
import {
  isTimeColumn,
  type ObservationRow,
  type Schema,
  type TimePart,
  type Value,
  type ValueColumn,
} from "./types.js";

export interface ParseResult {
  // Source order, not sorted
  rows: ObservationRow[];
  skipped: number;
  errors: MalformedRowError[];
}

interface Line {
  number: number;
  text: string;
}

const MAX_HEADER_LINES = 2;
const SAMPLE_LENGTH = 200;

// Paired feeds print band frequencies with 3 decimals (0.0325 -> "(0.033)")
const FREQUENCY_TOLERANCE = 0.0006;
const FREQUENCY_TOKEN = /^\((\d*\.?\d+)\)$/;

/**
 * Parse one provider text feed into rows of the given schema.
 *
 * Lines with the wrong number of tokens, or tokens that cannot be read as the
 * column's type, are skipped and reported in `errors`. A header that does not
 * match the schema aborts the whole feed with a `SchemaMismatchError`.
 */
export function parse(raw: string, schema: Schema): ParseResult {
  const lines: Line[] = raw
    .split(/\r?\n/)
    .map((text, index) => ({ number: index + 1, text: text.trim() }))
    .filter((line) => line.text.length > 0);

  let start = 0;
  while (
    start < lines.length &&
    start < MAX_HEADER_LINES &&
    !isNumeric(tokenize(lines[start]!.text)[0])
  ) {
    start++;
  }

  if (start > 0) checkHeader(lines[0]!, schema);

  const width = tokenWidth(schema);
  const rows: ObservationRow[] = [];
  const errors: MalformedRowError[] = [];

  for (const line of lines.slice(start)) {
    try {
      rows.push(parseLine(line, schema, width));
    } catch (error) {
      if (!(error instanceof MalformedRowError)) throw error;
      errors.push(error);
    }
  }

  return { rows, skipped: errors.length, errors };
}

function tokenize(text: string): string[] {
  return text.split(/\s+/).filter(Boolean);
}

// Plain decimals only: no hex, binary, octal or exponent forms
const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)$/;

function isNumeric(token: string | undefined): boolean {
  return token !== undefined && DECIMAL.test(token);
}

function isPaired(schema: Schema, column: ValueColumn): boolean {
  return schema.paired && column.frequency !== undefined;
}

/**
 * Number of whitespace separated tokens in one data line.
 */
export function tokenWidth(schema: Schema): number {
  return schema.columns.reduce(
    (width, column) =>
      width + (!isTimeColumn(column) && isPaired(schema, column) ? 2 : 1),
    0,
  );
}

function checkHeader(header: Line, schema: Schema) {
  const labels = tokenize(header.text.replace(/^#/, ""));
  const sample = header.text.slice(0, SAMPLE_LENGTH);

  if (schema.paired) {
    // Paired headers only name the time columns, the bands follow in the data
    const timeColumns = schema.columns.filter(isTimeColumn).length;
    if (labels.length < timeColumns) {
      throw new SchemaMismatchError(
        schema.id,
        `header names ${labels.length} columns, expected at least ${timeColumns}`,
        sample,
      );
    }
    return;
  }

  if (labels.length !== schema.columns.length) {
    throw new SchemaMismatchError(
      schema.id,
      `header names ${labels.length} columns, expected ${schema.columns.length}`,
      sample,
    );
  }
}

function parseLine(line: Line, schema: Schema, width: number): ObservationRow {
  const tokens = tokenize(line.text);

  if (tokens.length !== width) {
    throw new MalformedRowError(
      line.number,
      line.text,
      `expected ${width} tokens, found ${tokens.length}`,
    );
  }

  const time: Partial<Record<TimePart, number>> = {};
  const values: Record<string, Value> = {};
  let index = 0;

  for (const column of schema.columns) {
    const token = tokens[index++]!;

    if (isTimeColumn(column)) {
      if (!/^\d+$/.test(token)) {
        throw new MalformedRowError(
          line.number,
          line.text,
          `invalid ${column.time} "${token}"`,
        );
      }
      time[column.time] = Number(token);
      continue;
    }

    if (isPaired(schema, column)) {
      checkFrequency(schema, column, tokens[index++]!, line);
    }

    const value = castValue(token, column);
    if (value === undefined) {
      throw new MalformedRowError(
        line.number,
        line.text,
        `invalid ${column.kind} "${token}" in ${column.name}`,
      );
    }
    values[column.name] = value;
  }

  return Object.freeze({
    timestamp: toTimestamp(time, line),
    values: Object.freeze(values),
  });
}

function checkFrequency(
  schema: Schema,
  column: ValueColumn,
  token: string,
  line: Line,
) {
  const match = FREQUENCY_TOKEN.exec(token);
  const frequency = match ? Number(match[1]) : NaN;

  if (
    column.frequency === undefined ||
    !(Math.abs(frequency - column.frequency) <= FREQUENCY_TOLERANCE)
  ) {
    throw new SchemaMismatchError(
      schema.id,
      `band ${column.name} reported as ${token}`,
      line.text.slice(0, SAMPLE_LENGTH),
    );
  }
}

export function isSentinel(token: string, missing: readonly string[]): boolean {
  return missing.some(
    (sentinel) =>
      sentinel === token ||
      (isNumeric(sentinel) &&
        isNumeric(token) &&
        Number(sentinel) === Number(token)),
  );
}

/**
 * Cast a token to the column's type. Returns `undefined` when it cannot be read.
 */
export function castValue(
  token: string,
  column: ValueColumn,
): Value | undefined {
  if (isSentinel(token, column.missing)) return null;

  switch (column.kind) {
    case "string":
      return token;
    case "float":
      return isNumeric(token) ? Number(token) : undefined;
    case "integer":
      return isNumeric(token) && Number.isInteger(Number(token))
        ? Number(token)
        : undefined;
  }
}

function toTimestamp(
  { year, month, day, hour, minute = 0 }: Partial<Record<TimePart, number>>,
  line: Line,
): Date {
  if (
    year === undefined ||
    month === undefined ||
    day === undefined ||
    hour === undefined
  ) {
    throw new MalformedRowError(line.number, line.text, "incomplete time");
  }

  const timestamp = new Date(Date.UTC(year, month - 1, day, hour, minute));

  if (
    month < 1 ||
    month > 12 ||
    hour > 23 ||
    minute > 59 ||
    timestamp.getUTCFullYear() !== year ||
    timestamp.getUTCDate() !== day
  ) {
    throw new MalformedRowError(line.number, line.text, "invalid date");
  }

  return timestamp;
}
