import { UnknownCategoryError } from "../errors.js";
import {
  isTimeColumn,
  type CategoryId,
  type ColumnSpec,
  type FeedKind,
  type Schema,
  type TimeColumn,
} from "../types.js";
import {
  describeErrors,
  validateFormatCatalog,
  type CategoryDefinition,
} from "../validation.js";
import catalog from "./catalog.json" with { type: "json" };

export interface SchemaDefinition {
  name: string;
  title?: string;
  feed: FeedKind;
  code?: string;
  version?: string;
  paired?: boolean;
  columns: ColumnSpec[];
}

const CATEGORY_NAME = /^[a-z0-9_]+$/;

/**
 * Time columns shared by every post-2007 layout: `#YY MM DD hh mm`.
 */
export const TIME_COLUMNS: readonly TimeColumn[] = [
  { name: "YY", time: "year" },
  { name: "MM", time: "month" },
  { name: "DD", time: "day" },
  { name: "hh", time: "hour" },
  { name: "mm", time: "minute" },
];

export function categoryId(name: string, feed: FeedKind): CategoryId {
  return feed === "continuous" ? `realtime/${name}` : `historical/${name}`;
}

/**
 * Validate a schema definition and return it frozen.
 */
export function defineSchema(definition: SchemaDefinition): Schema {
  const { name, feed, columns, paired = false } = definition;

  if (!CATEGORY_NAME.test(name)) {
    throw new Error(`Invalid category name: ${name}`);
  }

  const seen = new Set<string>();
  const parts = new Set<string>();
  for (const column of columns) {
    if (seen.has(column.name)) {
      throw new Error(`${name}: duplicate column ${column.name}`);
    }
    seen.add(column.name);

    if (isTimeColumn(column)) {
      if (parts.has(column.time)) {
        throw new Error(`${name}: duplicate time column ${column.time}`);
      }
      parts.add(column.time);
    }
  }

  for (const required of ["year", "month", "day", "hour"] as const) {
    if (!parts.has(required)) {
      throw new Error(`${name}: missing ${required} column`);
    }
  }

  if (paired && !columns.some((c) => !isTimeColumn(c) && c.frequency)) {
    throw new Error(`${name}: paired layout without frequency columns`);
  }

  return deepFreeze({
    id: categoryId(name, feed),
    name,
    title: definition.title ?? name,
    feed,
    code: definition.code ?? name,
    version: definition.version ?? catalog.version,
    paired,
    columns: columns.map((column) =>
      isTimeColumn(column)
        ? { ...column }
        : { ...column, missing: [...column.missing] },
    ),
  });
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object") {
    for (const child of Object.values(value)) deepFreeze(child);
    Object.freeze(value);
  }
  return value;
}

export function bandName(frequency: number): string {
  return frequency.toFixed(4);
}

function fromDefinition(
  definition: CategoryDefinition,
  frequencies: readonly number[],
  version: string,
): Schema {
  const { bands, columns, ...rest } = definition;

  return defineSchema({
    ...rest,
    version,
    columns: [
      ...TIME_COLUMNS,
      ...columns,
      ...(bands
        ? frequencies.map((frequency) => ({
            ...bands,
            name: bandName(frequency),
            frequency,
          }))
        : []),
    ],
  });
}

function loadCatalog(data: unknown): Map<CategoryId, Schema> {
  if (!validateFormatCatalog(data)) {
    throw new Error(
      `Invalid format catalog: ${describeErrors(validateFormatCatalog)}`,
    );
  }

  const { frequencies, version } = data;

  return new Map(
    data.categories.map((definition): [CategoryId, Schema] => {
      const schema = fromDefinition(definition, frequencies, version);
      return [schema.id, schema];
    }),
  );
}

const registry = loadCatalog(catalog);

/**
 * Look up the schema of a category by its qualified id, e.g. `realtime/stdmet`.
 */
export function schemaFor(category: string): Schema {
  const schema = isCategoryId(category) ? registry.get(category) : undefined;
  if (!schema) throw new UnknownCategoryError(category);
  return schema;
}

/**
 * Resolve a bare category name (e.g. `cwind`) within a feed family.
 */
export function resolveCategory(name: string, feed: FeedKind): Schema {
  return schemaFor(categoryId(name, feed));
}

export function categories(feed?: FeedKind): Schema[] {
  return [...registry.values()].filter(
    (schema) => feed === undefined || schema.feed === feed,
  );
}

export function isCategoryId(value: string): value is CategoryId {
  return /^(realtime|historical)\/[a-z0-9_]+$/.test(value);
}
