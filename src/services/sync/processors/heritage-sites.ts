/**
 * Heritage site processing: category resolution and enrichment selection.
 */

import {
  bindingValue,
  parseDate,
  parseDecimal,
  parseInteger,
  parsePoint,
  parseUrl,
} from "../../../sparql/extractors.js";
import { HeritageSiteDetailsSchema } from "../../../types/index.js";
import { enrichmentsFrom, type MergedRecord } from "../merger.js";
import {
  isHeritageCategory,
  pickBoundCategory,
  resolveHeritageCategory,
} from "./categories.js";
import {
  commonsCategoryUrl,
  ensureValid,
  firstOf,
  nonNegative,
  recordName,
} from "./shared.js";

import type {
  ArchaeologicalEnrichment,
  DbpediaEnrichment,
  EnrichmentBlock,
  HeritageCategory,
  HeritageSiteRecord,
  ReligiousEnrichment,
  SparqlBinding,
  UnescoEnrichment,
} from "../../../types/index.js";

// ============================================================================
// Enrichment blocks
// ============================================================================

/** Facet whose block is authoritative for a category */
const CATEGORY_ENRICHMENT: Partial<
  Record<HeritageCategory, EnrichmentBlock["source"]>
> = {
  WORLD_HERITAGE: "unesco",
  ARCHAEOLOGICAL: "archaeological",
  RELIGIOUS: "religious",
};

function distinctValues(
  rows: readonly SparqlBinding[],
  variable: string
): string[] {
  const values = new Set<string>();
  for (const row of rows) {
    const value = bindingValue(row, variable);
    if (value !== null) {
      values.add(value);
    }
  }
  return [...values];
}

export function unescoBlock(
  rows: readonly SparqlBinding[]
): UnescoEnrichment | null {
  if (rows.length === 0) {
    return null;
  }
  const criteria = distinctValues(rows, "criterionLabel");
  return {
    source: "unesco",
    inscribedOn: firstOf(rows, (row) =>
      parseDate(bindingValue(row, "inscribed"))
    ),
    criteria: criteria.length > 0 ? criteria.join(", ") : null,
    unescoNumber: firstOf(rows, (row) => bindingValue(row, "unescoNumber")),
    areaKm2: firstOf(rows, (row) => parseDecimal(bindingValue(row, "area"))),
    annualVisitors: firstOf(rows, (row) =>
      nonNegative(parseInteger(bindingValue(row, "visitors")))
    ),
  };
}

export function archaeologicalBlock(
  rows: readonly SparqlBinding[]
): ArchaeologicalEnrichment | null {
  const [row] = rows;
  if (row === undefined) {
    return null;
  }
  return {
    source: "archaeological",
    culture: bindingValue(row, "cultureLabel"),
    period: bindingValue(row, "periodLabel"),
    discoveredOn: parseDate(bindingValue(row, "discovered")),
    discoverer: bindingValue(row, "discovererLabel"),
    elevationM: parseDecimal(bindingValue(row, "elevation")),
    conservationStatus: bindingValue(row, "statusLabel"),
  };
}

export function religiousBlock(
  rows: readonly SparqlBinding[]
): ReligiousEnrichment | null {
  const [row] = rows;
  if (row === undefined) {
    return null;
  }
  return {
    source: "religious",
    religion: bindingValue(row, "religionLabel"),
    diocese: bindingValue(row, "dioceseLabel"),
    dedication: bindingValue(row, "dedicationLabel"),
    capacity: nonNegative(parseInteger(bindingValue(row, "capacity"))),
    builtOn: parseDate(bindingValue(row, "built")),
  };
}

export function dbpediaBlock(
  rows: readonly SparqlBinding[]
): DbpediaEnrichment | null {
  const [row] = rows;
  if (row === undefined) {
    return null;
  }
  return {
    source: "dbpedia",
    abstract: bindingValue(row, "abstract"),
    thumbnailUrl: parseUrl(bindingValue(row, "thumbnail")),
    elevationM: parseDecimal(bindingValue(row, "elevation")),
    annualVisitors: nonNegative(parseInteger(bindingValue(row, "visitors"))),
  };
}

/**
 * Split the blocks into the one matching the category and the rest.
 */
export function selectEnrichment(
  category: HeritageCategory,
  blocks: readonly EnrichmentBlock[]
): { enrichment: EnrichmentBlock | null; extra: EnrichmentBlock[] } {
  const wanted = CATEGORY_ENRICHMENT[category];
  const enrichment =
    wanted === undefined
      ? null
      : (blocks.find((block) => block.source === wanted) ?? null);
  return {
    enrichment,
    extra: blocks.filter((block) => block !== enrichment),
  };
}

// ============================================================================
// Processor
// ============================================================================

export function processHeritageSite(
  record: MergedRecord
): HeritageSiteRecord | null {
  const name = recordName(record);
  if (name === null) {
    return null;
  }

  const row = record.primary;
  const rows = [record.primary, ...record.alternates];

  // Every distinct type label takes part in keyword matching
  const typeLabels = distinctValues(rows, "typeLabel");
  const bound = distinctValues(rows, "category").filter(isHeritageCategory);
  const category = resolveHeritageCategory(
    typeLabels.length > 0 ? typeLabels.join("; ") : null,
    pickBoundCategory(bound)
  );

  const dbpedia = dbpediaBlock(enrichmentsFrom(record, "heritage-abstracts"));
  const blocks = [
    unescoBlock(enrichmentsFrom(record, "unesco")),
    archaeologicalBlock(enrichmentsFrom(record, "archaeological")),
    religiousBlock(enrichmentsFrom(record, "religious")),
    dbpedia,
  ].filter((block): block is EnrichmentBlock => block !== null);
  const { enrichment, extra } = selectEnrichment(category, blocks);

  const details = ensureValid(
    HeritageSiteDetailsSchema,
    {
      category,
      typeLabel: typeLabels[0] ?? null,
      subtype: bindingValue(row, "subtypeLabel"),
      description:
        bindingValue(row, "itemDescription") ?? dbpedia?.abstract ?? null,
      province: bindingValue(row, "provinceLabel"),
      city: bindingValue(row, "cityLabel"),
      history: {
        createdOn: parseDate(bindingValue(row, "created")),
        startedOn: parseDate(bindingValue(row, "started")),
        endedOn: parseDate(bindingValue(row, "ended")),
      },
      architecture: {
        architect: bindingValue(row, "architectLabel"),
        style: bindingValue(row, "styleLabel"),
        material: bindingValue(row, "materialLabel"),
        heightM: parseDecimal(bindingValue(row, "height")),
        areaM2: parseDecimal(bindingValue(row, "area")),
      },
      heritageStatus: bindingValue(row, "heritageLabel"),
      enrichment,
      extraEnrichments: extra,
      links: {
        image:
          parseUrl(bindingValue(row, "image")) ?? dbpedia?.thumbnailUrl ?? null,
        website: parseUrl(bindingValue(row, "website")),
        wikipedia: parseUrl(bindingValue(row, "article")),
        commons: commonsCategoryUrl(bindingValue(row, "commons")),
      },
    },
    name
  );

  return {
    kind: "sitios",
    sourceKey: record.key,
    name,
    coordinates: parsePoint(bindingValue(row, "coord")),
    details,
  };
}
