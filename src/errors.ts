/**
 * Base class for every error raised by this package.
 */
export class BuoyError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class UnknownCategoryError extends BuoyError {
  constructor(readonly category: string) {
    super(`Unknown category: ${category}`);
  }
}

export class UnknownStationError extends BuoyError {
  constructor(readonly station: string) {
    super(`${station} is not a known station id`);
  }
}

export type FetchErrorKind = "not-found" | "timeout" | "server-error";

/**
 * Raised by a fetcher. `not-found` and `timeout` are usually worth a retry or
 * a fallback to stored data; the station never converts them into empty data.
 */
export class FetchError extends BuoyError {
  constructor(
    readonly kind: FetchErrorKind,
    readonly locator: string,
    message: string,
    options?: ErrorOptions,
  ) {
    super(`${message} (${locator})`, options);
  }
}

/**
 * The header or layout of a feed does not match its schema. Fatal for that feed.
 */
export class SchemaMismatchError extends BuoyError {
  constructor(
    readonly category: string,
    message: string,
    readonly sample: string,
  ) {
    super(`${category}: ${message}`);
  }
}

export class MalformedRowError extends BuoyError {
  constructor(
    readonly line: number,
    readonly text: string,
    reason: string,
  ) {
    super(`line ${line}: ${reason}`);
  }
}

export class MetadataParseError extends BuoyError {
  constructor(
    readonly field: string,
    readonly text: string,
  ) {
    super(`Unable to parse ${field}: "${text}"`);
  }
}

export class StoreError extends BuoyError {}

export class ConfigError extends BuoyError {}
