/**
 * Builders for merged records and canonical entity records.
 */

import type {
  Enrichment,
  MergedRecord,
} from "../../src/services/sync/merger.js";
import type {
  Coordinates,
  NaturalAreaRecord,
  PlazaRecord,
  ProvinceRecord,
  SparqlBinding,
} from "../../src/types/index.js";

export function merged(
  key: string,
  primary: SparqlBinding,
  options: { alternates?: SparqlBinding[]; enrichments?: Enrichment[] } = {}
): MergedRecord {
  return {
    key,
    primary,
    alternates: options.alternates ?? [],
    enrichments: options.enrichments ?? [],
  };
}

export function provinceRecord(key: string, name: string): ProvinceRecord {
  return {
    kind: "provincias",
    sourceKey: key,
    name,
    coordinates: null,
    details: {
      capital: null,
      population: null,
      areaKm2: null,
      imageUrl: null,
      flagUrl: null,
      coatOfArmsUrl: null,
      wikipediaUrl: null,
      subdivisions: [],
    },
  };
}

export function parkRecord(
  key: string,
  name: string,
  coordinates: Coordinates | null = null
): NaturalAreaRecord {
  return {
    kind: "parques",
    sourceKey: key,
    name,
    coordinates,
    details: {
      description: null,
      areaKm2: null,
      establishedOn: null,
      province: null,
      imageUrl: null,
      websiteUrl: null,
    },
  };
}

export function plazaRecord(
  key: string,
  name: string,
  coordinates: Coordinates | null = null,
  city: string | null = null
): PlazaRecord {
  return {
    kind: "plazas",
    sourceKey: key,
    name,
    coordinates,
    details: { city, description: null, imageUrl: null },
  };
}
