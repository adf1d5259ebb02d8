/**
 * Field extractors for SPARQL bindings.
 *
 * Every function is total: malformed or missing input yields `null`, which
 * stands for "unknown" throughout the engine. Nothing here throws.
 */

import type { Coordinates, SparqlBinding } from "../types/index.js";

// ============================================================================
// Raw access
// ============================================================================

/**
 * Trimmed value of a bound variable, or null when unbound or blank.
 */
export function bindingValue(
  binding: SparqlBinding,
  variable: string
): string | null {
  const term = binding[variable];
  if (term === undefined) {
    return null;
  }
  const value = term.value.trim();
  return value === "" ? null : value;
}

// ============================================================================
// Coordinates
// ============================================================================

const POINT_PATTERN = /^Point\(\s*(\S+)\s+(\S+)\s*\)$/i;

function finiteNumber(token: string): number | null {
  if (token.trim() === "") {
    return null;
  }
  const value = Number(token);
  return Number.isFinite(value) ? value : null;
}

/**
 * Parse a WKT point. The first token is longitude, the second latitude.
 *
 * @example parsePoint("Point(-79.9 -2.19)") // { lat: -2.19, lon: -79.9 }
 */
export function parsePoint(raw: string | null | undefined): Coordinates | null {
  if (raw === null || raw === undefined) {
    return null;
  }
  const match = POINT_PATTERN.exec(raw.trim());
  if (match === null) {
    return null;
  }
  const lon = finiteNumber(match[1] ?? "");
  const lat = finiteNumber(match[2] ?? "");
  if (lon === null || lat === null) {
    return null;
  }
  return { lat, lon };
}

/**
 * Build a coordinate pair from separate latitude/longitude literals
 * (DBpedia geo:lat / geo:long). Both must parse or neither is kept.
 */
export function parseLatLon(
  lat: string | null | undefined,
  lon: string | null | undefined
): Coordinates | null {
  if (lat === null || lat === undefined || lon === null || lon === undefined) {
    return null;
  }
  const latitude = finiteNumber(lat);
  const longitude = finiteNumber(lon);
  if (latitude === null || longitude === null) {
    return null;
  }
  return { lat: latitude, lon: longitude };
}

// ============================================================================
// Dates and numbers
// ============================================================================

const DATE_PATTERN = /^([+-]?\d{4,})-(\d{2})-(\d{2})(?:[T\s].*)?$/;

/**
 * Truncate an ISO-8601 date or date-time to `YYYY-MM-DD`.
 */
export function parseDate(raw: string | null | undefined): string | null {
  if (raw === null || raw === undefined) {
    return null;
  }
  const match = DATE_PATTERN.exec(raw.trim());
  if (match === null) {
    return null;
  }

  const [, yearText = "", monthText = "", dayText = ""] = match;
  const year = Number(yearText);
  const month = Number(monthText);
  const day = Number(dayText);

  // Wikidata encodes year precision as month/day 00
  if (month < 1 || month > 12 || day < 1) {
    return null;
  }
  const daysInMonth = new Date(Date.UTC(2000, month, 0)).getUTCDate();
  const isLeap = (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
  const limit = month === 2 && !isLeap ? 28 : daysInMonth;
  if (day > limit) {
    return null;
  }

  return `${yearText.replace(/^\+/, "")}-${monthText}-${dayText}`;
}

/**
 * Parse an integer, accepting values encoded with a decimal part.
 */
export function parseInteger(raw: string | null | undefined): number | null {
  const value = parseDecimal(raw);
  return value === null ? null : Math.trunc(value);
}

export function parseDecimal(raw: string | null | undefined): number | null {
  if (raw === null || raw === undefined) {
    return null;
  }
  return finiteNumber(raw.trim());
}

export function parseUrl(raw: string | null | undefined): string | null {
  if (raw === null || raw === undefined) {
    return null;
  }
  const value = raw.trim();
  return value === "" ? null : value;
}

// ============================================================================
// Identifiers and labels
// ============================================================================

/**
 * Last path segment of an entity URI.
 *
 * @example extractEntityId("http://www.wikidata.org/entity/Q14594") // "Q14594"
 */
export function extractEntityId(uri: string | null | undefined): string | null {
  if (uri === null || uri === undefined) {
    return null;
  }
  const trimmed = uri.trim().replace(/\/+$/, "");
  const segment = trimmed.slice(trimmed.lastIndexOf("/") + 1);
  return segment === "" ? null : segment;
}

function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    // not valid percent-encoding
    return segment;
  }
}

/**
 * Readable label from a DBpedia resource URI or plain literal.
 *
 * @example labelFromResource("http://dbpedia.org/resource/Guayas_Province") // "Guayas Province"
 */
export function labelFromResource(
  value: string | null | undefined
): string | null {
  if (value === null || value === undefined) {
    return null;
  }
  const trimmed = value.trim();
  if (!/^https?:\/\//.test(trimmed)) {
    return trimmed === "" ? null : trimmed;
  }
  const id = extractEntityId(trimmed);
  if (id === null) {
    return null;
  }
  const label = decodeSegment(id).replaceAll("_", " ").trim();
  return label === "" ? null : label;
}
