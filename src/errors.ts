/**
 * Error taxonomy for the sync engine.
 *
 * Facet-level and record-level errors are absorbed into sync results;
 * type-level errors abort a single entity kind and never the whole run.
 */

/**
 * A remote endpoint could not be queried (network failure, non-2xx status,
 * malformed payload or timeout). Callers degrade the facet to empty.
 */
export class SourceUnavailableError extends Error {
  code = "SOURCE_UNAVAILABLE" as const;

  constructor(
    readonly source: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "SourceUnavailableError";
  }
}

/**
 * The primary facet for an entity kind produced no rows.
 */
export class NoPrimaryDataError extends Error {
  code = "NO_PRIMARY_DATA" as const;

  constructor(readonly kind: string) {
    super(`No primary data returned for ${kind}`);
    this.name = "NoPrimaryDataError";
  }
}

export class RecordTransformError extends Error {
  code = "RECORD_TRANSFORM_FAILED" as const;

  constructor(
    readonly entityName: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "RecordTransformError";
  }
}

/**
 * A batched write failed. Affects every record of the batch.
 */
export class PersistenceError extends Error {
  code = "PERSISTENCE_FAILED" as const;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PersistenceError";
  }
}

export class ConfigError extends Error {
  code = "CONFIG_INVALID" as const;

  constructor(
    message: string,
    readonly issues: string[] = []
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
