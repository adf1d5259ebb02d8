/**
 * Which facets feed each entity kind and how merged rows become records.
 */

import {
  processHeritageSite,
  processNaturalArea,
  processPlaza,
  processProvince,
} from "./processors/index.js";

import type { MergedRecord } from "./merger.js";
import type { SourceName } from "../../sparql/sources.js";
import type { EntityKind, EntityRecord } from "../../types/index.js";

export interface FacetRef {
  source: SourceName;
  facet: string;
}

export interface SyncPlan {
  kind: EntityKind;
  primary: FacetRef;
  secondaries: readonly FacetRef[];
  /** Primary variable holding the display name */
  nameVariable: string;
  /** Null for records without a usable name; throws on transform failure */
  process(record: MergedRecord): EntityRecord | null;
}

export const SYNC_PLANS: Readonly<Record<EntityKind, SyncPlan>> = {
  provincias: {
    kind: "provincias",
    primary: { source: "wikidata", facet: "provinces" },
    secondaries: [
      { source: "dbpedia", facet: "province-flags" },
      { source: "dbpedia", facet: "subdivisions" },
    ],
    nameVariable: "itemLabel",
    process: processProvince,
  },
  parques: {
    kind: "parques",
    primary: { source: "wikidata", facet: "natural-areas" },
    secondaries: [],
    nameVariable: "itemLabel",
    process: processNaturalArea,
  },
  sitios: {
    kind: "sitios",
    primary: { source: "wikidata", facet: "heritage-sites" },
    secondaries: [
      { source: "wikidata", facet: "unesco" },
      { source: "wikidata", facet: "archaeological" },
      { source: "wikidata", facet: "religious" },
      { source: "dbpedia", facet: "heritage-abstracts" },
    ],
    nameVariable: "itemLabel",
    process: processHeritageSite,
  },
  plazas: {
    kind: "plazas",
    primary: { source: "wikidata", facet: "plazas" },
    secondaries: [],
    nameVariable: "itemLabel",
    process: processPlaza,
  },
};
