import type { StationCatalog } from "./catalog.js";
import {
  FetchError,
  SchemaMismatchError,
  UnknownStationError,
  type MalformedRowError,
} from "./errors.js";
import type { Fetcher } from "./fetcher.js";
import {
  categories,
  categoryId,
  resolveCategory,
  schemaFor,
} from "./formats/index.js";
import {
  DEFAULT_BASE_URL,
  formatPeriod,
  historicalLocator,
  historicalPeriods,
  metadataLocator,
  realtimeLocator,
  type PeriodRange,
} from "./formats/locators.js";
import { countAdded, merge } from "./merge.js";
import { formatMetadata, parseMetadata } from "./metadata.js";
import { parse } from "./parser.js";
import type { DatasetStore } from "./store/index.js";
import type {
  CategoryId,
  Dataset,
  FeedKind,
  Logger,
  Schema,
  StationMetadata,
} from "./types.js";
import { abortable } from "./util.js";

export type CategoryState =
  | "unfetched"
  | "fetching"
  | "parsed"
  | "merging"
  | "persistable"
  | "failed";

export interface StationOptions {
  fetcher: Fetcher;
  store: DatasetStore;
  baseUrl?: string;
  logger?: Logger;
  // Clock used to decide which archival periods are published
  now?: () => Date;
  // When given, metadata comes from the catalog instead of the station page
  catalog?: StationCatalog;
}

export interface RequestOptions {
  signal?: AbortSignal;
}

export interface AvailabilityOptions extends RequestOptions {
  // Archival periods to look in, as for `getHistorical`
  range?: PeriodRange;
}

export interface FetchResult {
  dataset: Dataset;
  // Lines dropped as malformed, across every feed read
  skipped: number;
  errors: MalformedRowError[];
  // Timestamps the persisted copy did not have
  added: number;
}

export type SaveReport =
  | {
      category: CategoryId;
      status: "saved";
      rows: number;
      added: number;
      skipped: number;
    }
  | { category: CategoryId; status: "unavailable"; error: FetchError }
  | { category: CategoryId; status: "failed"; error: Error };

const STATION_ID = /^[A-Za-z0-9]+$/;

/**
 * One observing station: its metadata and the datasets produced for it.
 *
 * Every fetch runs `unfetched → fetching → parsed → (merging →) persistable`
 * for its category, or ends in `failed`. Nothing is written to the store
 * unless a `save*` method is called, and a failed request never touches the
 * persisted copy.
 */
export class Station {
  private readonly fetcher: Fetcher;
  private readonly store: DatasetStore;
  private readonly baseUrl: string;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly datasets = new Map<CategoryId, Dataset>();
  private readonly states = new Map<CategoryId, CategoryState>();

  private constructor(
    readonly id: string,
    private readonly metadata: Readonly<StationMetadata>,
    options: StationOptions,
  ) {
    this.fetcher = options.fetcher;
    this.store = options.store;
    this.baseUrl = options.baseUrl ?? DEFAULT_BASE_URL;
    this.logger = options.logger ?? console;
    this.now = options.now ?? (() => new Date());
  }

  static async open(id: string, options: StationOptions): Promise<Station> {
    if (!STATION_ID.test(id)) throw new UnknownStationError(id);

    const station = id.toLowerCase();
    const logger = options.logger ?? console;
    let metadata: StationMetadata;

    if (options.catalog) {
      const entry = options.catalog.get(station);
      if (!entry) throw new UnknownStationError(id);
      metadata = { ...entry };
    } else {
      const raw = await options.fetcher.fetch(
        metadataLocator(station, options.baseUrl),
      );
      metadata = parseMetadata(raw, {
        onError: (error) => logger.warn(`${station}: ${error.message}`),
      });
    }

    return new Station(
      station,
      Object.freeze({ ...metadata, id: metadata.id ?? station }),
      options,
    );
  }

  getMetadata(): Readonly<StationMetadata> {
    return this.metadata;
  }

  describe(): string {
    return formatMetadata(this.metadata);
  }

  state(category: string): CategoryState {
    return this.states.get(schemaFor(category).id) ?? "unfetched";
  }

  /**
   * The dataset this station last fetched or loaded for a category.
   */
  dataset(category: string): Dataset | undefined {
    return this.datasets.get(schemaFor(category).id);
  }

  /**
   * Fetch the rolling window of a realtime category and merge it with the
   * persisted copy, if any. Does not save.
   */
  async getRealtime(
    name: string,
    { signal }: RequestOptions = {},
  ): Promise<FetchResult> {
    const schema = resolveCategory(name, "continuous");
    const locator = realtimeLocator(schema, this.id, this.baseUrl);

    return this.ingest(schema, async () => [
      await abortable(this.fetcher.fetch(locator), signal),
    ]);
  }

  /**
   * Fetch every archival period in `range` and merge them with the persisted
   * copy, if any. Periods the provider does not publish for this station are
   * skipped; when none is published the request fails as `not-found`.
   */
  async getHistorical(
    name: string,
    range: PeriodRange = {},
    { signal }: RequestOptions = {},
  ): Promise<FetchResult> {
    const schema = resolveCategory(name, "archival");
    const periods = historicalPeriods(range, this.now());

    return this.ingest(schema, async () => {
      const feeds = await Promise.all(
        periods.map((period) =>
          abortable(
            this.fetcher.fetch(
              historicalLocator(schema, this.id, period, this.baseUrl),
            ),
            signal,
          ).catch((error: unknown) => {
            if (error instanceof FetchError && error.kind === "not-found") {
              this.logger.debug(
                `No ${schema.id} for ${this.id} in ${formatPeriod(period)}`,
              );
              return null;
            }
            throw error;
          }),
        ),
      );

      const published = feeds.filter((feed): feed is string => feed !== null);
      if (published.length === 0) {
        throw new FetchError(
          "not-found",
          `${this.id}/${schema.id}`,
          "No archival data published",
        );
      }
      return published;
    });
  }

  async saveRealtime(
    names?: string[],
    options?: RequestOptions,
  ): Promise<SaveReport[]> {
    return this.saveAll("continuous", names, (name) =>
      this.getRealtime(name, options),
    );
  }

  async saveHistorical(
    names?: string[],
    range?: PeriodRange,
    options?: RequestOptions,
  ): Promise<SaveReport[]> {
    return this.saveAll("archival", names, (name) =>
      this.getHistorical(name, range, options),
    );
  }

  /**
   * Names of the categories of `feed` this station publishes. An archival
   * category counts when any period in `range` is published; periods are
   * tried newest first. Fetch failures other than `not-found` are thrown.
   */
  async availableCategories(
    feed: FeedKind,
    { signal, range = {} }: AvailabilityOptions = {},
  ): Promise<string[]> {
    const schemas = categories(feed);
    const periods =
      feed === "archival" ? historicalPeriods(range, this.now()).reverse() : [];

    const published = await Promise.all(
      schemas.map(async (schema) => {
        const locators =
          feed === "continuous"
            ? [realtimeLocator(schema, this.id, this.baseUrl)]
            : periods.map((period) =>
                historicalLocator(schema, this.id, period, this.baseUrl),
              );

        for (const locator of locators) {
          if (await this.isPublished(locator, signal)) return true;
        }
        return false;
      }),
    );

    return schemas
      .filter((_, index) => published[index])
      .map((schema) => schema.name);
  }

  /**
   * Read the persisted copy of a category, without fetching.
   */
  async load(category: string): Promise<Dataset | undefined> {
    const schema = schemaFor(category);
    const dataset = await this.store.load(this.id, schema.id);
    if (dataset) this.datasets.set(schema.id, dataset);
    return dataset;
  }

  private async isPublished(
    locator: string,
    signal?: AbortSignal,
  ): Promise<boolean> {
    try {
      await abortable(this.fetcher.fetch(locator), signal);
      return true;
    } catch (error) {
      if (error instanceof FetchError && error.kind === "not-found") {
        return false;
      }
      throw error;
    }
  }

  private async ingest(
    schema: Schema,
    fetchFeeds: () => Promise<string[]>,
  ): Promise<FetchResult> {
    const category = schema.id;
    const label = `${this.id}/${category}`;

    try {
      this.states.set(category, "fetching");
      const feeds = await fetchFeeds();

      // Archival periods are parsed one file at a time, oldest first
      const results = feeds.map((raw) => parse(raw, schema));
      const rows = results.flatMap((result) => result.rows);
      const errors = results.flatMap((result) => result.errors);
      this.states.set(category, "parsed");

      if (errors.length > 0) {
        this.logger.warn(`Skipped ${errors.length} malformed rows in ${label}`);
      }

      const existing = await this.store.load(this.id, category);
      if (existing) this.states.set(category, "merging");

      const merged = merge(existing?.rows, rows);
      const dataset: Dataset = { station: this.id, category, rows: merged };

      this.datasets.set(category, dataset);
      this.states.set(category, "persistable");

      return {
        dataset,
        skipped: errors.length,
        errors,
        added: countAdded(existing?.rows, merged),
      };
    } catch (error) {
      this.states.set(category, "failed");
      if (error instanceof SchemaMismatchError) {
        this.logger.error(`${this.id}: ${error.message}\n${error.sample}`);
      }
      throw error;
    }
  }

  private async saveAll(
    feed: FeedKind,
    names: string[] | undefined,
    get: (name: string) => Promise<FetchResult>,
  ): Promise<SaveReport[]> {
    const list = names ?? categories(feed).map((schema) => schema.name);

    return Promise.all(
      list.map(async (name): Promise<SaveReport> => {
        const category = categoryId(name, feed);

        try {
          const { dataset, added, skipped } = await get(name);
          try {
            await this.store.save(this.id, category, dataset);
          } catch (error) {
            this.states.set(category, "failed");
            throw error;
          }
          this.logger.info(`Added ${added} new rows to ${this.id}/${category}`);
          return {
            category,
            status: "saved",
            rows: dataset.rows.length,
            added,
            skipped,
          };
        } catch (error) {
          if (
            names === undefined &&
            error instanceof FetchError &&
            error.kind === "not-found"
          ) {
            this.logger.debug(`${this.id}/${category} is not published`);
            return { category, status: "unavailable", error };
          }

          const failure =
            error instanceof Error ? error : new Error(String(error));
          this.logger.error(
            `Unable to save ${this.id}/${category}: ${failure.message}`,
          );
          return { category, status: "failed", error: failure };
        }
      }),
    );
  }
}
