import { Value } from "@sinclair/typebox/value";

import { RecordTransformError } from "../../../errors.js";
import { bindingValue } from "../../../sparql/extractors.js";

import type { MergedRecord } from "../merger.js";
import type { SparqlBinding } from "../../../types/index.js";
import type { Static, TSchema } from "@sinclair/typebox";

const COMMONS_FILE_PATH = "http://commons.wikimedia.org/wiki/Special:FilePath/";

/**
 * Display name of a merged record, or null when the entity has no label.
 * The Wikidata label service echoes the entity id when no label exists.
 */
export function recordName(
  record: MergedRecord,
  variable = "itemLabel"
): string | null {
  const name = bindingValue(record.primary, variable);
  if (name === null || name === record.key) {
    return null;
  }
  return name;
}

export function nonNegative(value: number | null): number | null {
  return value !== null && value >= 0 ? value : null;
}

/**
 * First non-null result of `pick` over the rows.
 */
export function firstOf<T>(
  rows: readonly SparqlBinding[],
  pick: (row: SparqlBinding) => T | null
): T | null {
  for (const row of rows) {
    const value = pick(row);
    if (value !== null) {
      return value;
    }
  }
  return null;
}

/**
 * Commons file URL for a bare file name; URLs pass through.
 */
export function commonsFileUrl(value: string | null): string | null {
  if (value === null) {
    return null;
  }
  if (/^https?:\/\//i.test(value)) {
    return value;
  }
  return `${COMMONS_FILE_PATH}${encodeURIComponent(value.replaceAll(" ", "_"))}`;
}

export function commonsCategoryUrl(value: string | null): string | null {
  if (value === null) {
    return null;
  }
  return `https://commons.wikimedia.org/wiki/Category:${encodeURIComponent(value.replaceAll(" ", "_"))}`;
}

/**
 * Validate processor output before it reaches the store.
 *
 * @throws RecordTransformError naming the entity and the first failing path
 */
export function ensureValid<T extends TSchema>(
  schema: T,
  value: unknown,
  entityName: string
): Static<T> {
  if (Value.Check(schema, value)) {
    return value;
  }
  const [first] = [...Value.Errors(schema, value)];
  const detail =
    first === undefined ? "invalid value" : `${first.path} ${first.message}`;
  throw new RecordTransformError(entityName, `Invalid details: ${detail}`);
}
