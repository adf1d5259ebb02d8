/**
 * Fixed reference data about Ecuador used by queries and cleanup.
 */

/** Wikidata item for Ecuador */
export const ECUADOR_ENTITY_ID = "Q736";

/** Wikidata items of the 24 official provinces */
export const OFFICIAL_PROVINCE_IDS: readonly string[] = [
  "Q220451",
  "Q261165",
  "Q321729",
  "Q335471",
  "Q238492",
  "Q241140",
  "Q466019",
  "Q335526",
  "Q335464",
  "Q321863",
  "Q504238",
  "Q504260",
  "Q504666",
  "Q549522",
  "Q211900",
  "Q499475",
  "Q214814",
  "Q272586",
  "Q475038",
  "Q504252",
  "Q1124125",
  "Q1123208",
  "Q499456",
  "Q744670",
];

export interface GeoBounds {
  minLat: number;
  maxLat: number;
  minLon: number;
  maxLon: number;
}

/** Approximate bounding box of Ecuador, Galápagos included */
export const ECUADOR_BOUNDS: GeoBounds = {
  minLat: -5,
  maxLat: 2,
  minLon: -92,
  maxLon: -75,
};
