/**
 * Canonical entity shapes.
 *
 * Details are described as TypeBox schemas because they are stored as JSON
 * and validated again when read back from the store.
 */

import { Type, type Static, type TSchema } from "@sinclair/typebox";

// ============================================================================
// Kinds
// ============================================================================

export const ENTITY_KINDS = [
  "provincias",
  "parques",
  "sitios",
  "plazas",
] as const;

export type EntityKind = (typeof ENTITY_KINDS)[number];

export function isEntityKind(value: string): value is EntityKind {
  return ENTITY_KINDS.some((kind) => kind === value);
}

// ============================================================================
// Shared pieces
// ============================================================================

const Nullable = <T extends TSchema>(schema: T) =>
  Type.Union([schema, Type.Null()]);

export const CoordinatesSchema = Type.Object({
  lat: Type.Number(),
  lon: Type.Number(),
});

export type Coordinates = Static<typeof CoordinatesSchema>;

// ============================================================================
// Provinces
// ============================================================================

export const SubdivisionSchema = Type.Object({
  name: Type.String(),
  seat: Nullable(Type.String()),
  population: Nullable(Type.Integer({ minimum: 0 })),
  coordinates: Nullable(CoordinatesSchema),
  url: Nullable(Type.String()),
  description: Nullable(Type.String()),
});

export const ProvinceDetailsSchema = Type.Object({
  capital: Nullable(Type.String()),
  population: Nullable(Type.Integer({ minimum: 0 })),
  areaKm2: Nullable(Type.Number({ minimum: 0 })),
  imageUrl: Nullable(Type.String()),
  flagUrl: Nullable(Type.String()),
  coatOfArmsUrl: Nullable(Type.String()),
  wikipediaUrl: Nullable(Type.String()),
  subdivisions: Type.Array(SubdivisionSchema),
});

export type Subdivision = Static<typeof SubdivisionSchema>;
export type ProvinceDetails = Static<typeof ProvinceDetailsSchema>;

// ============================================================================
// Natural areas
// ============================================================================

export const NaturalAreaDetailsSchema = Type.Object({
  description: Nullable(Type.String()),
  areaKm2: Nullable(Type.Number({ minimum: 0 })),
  establishedOn: Nullable(Type.String()),
  province: Nullable(Type.String()),
  imageUrl: Nullable(Type.String()),
  websiteUrl: Nullable(Type.String()),
});

export type NaturalAreaDetails = Static<typeof NaturalAreaDetailsSchema>;

// ============================================================================
// Heritage sites
// ============================================================================

export const HeritageCategorySchema = Type.Union([
  Type.Literal("WORLD_HERITAGE"),
  Type.Literal("ARCHAEOLOGICAL"),
  Type.Literal("HISTORIC_CENTER"),
  Type.Literal("RELIGIOUS"),
  Type.Literal("MUSEUM"),
  Type.Literal("MONUMENT"),
  Type.Literal("FORTIFICATION"),
  Type.Literal("PALACE"),
  Type.Literal("LIBRARY"),
  Type.Literal("THEATER"),
  Type.Literal("MARKET"),
]);

export type HeritageCategory = Static<typeof HeritageCategorySchema>;

export const UnescoEnrichmentSchema = Type.Object({
  source: Type.Literal("unesco"),
  inscribedOn: Nullable(Type.String()),
  criteria: Nullable(Type.String()),
  unescoNumber: Nullable(Type.String()),
  areaKm2: Nullable(Type.Number()),
  annualVisitors: Nullable(Type.Integer()),
});

export const ArchaeologicalEnrichmentSchema = Type.Object({
  source: Type.Literal("archaeological"),
  culture: Nullable(Type.String()),
  period: Nullable(Type.String()),
  discoveredOn: Nullable(Type.String()),
  discoverer: Nullable(Type.String()),
  elevationM: Nullable(Type.Number()),
  conservationStatus: Nullable(Type.String()),
});

export const ReligiousEnrichmentSchema = Type.Object({
  source: Type.Literal("religious"),
  religion: Nullable(Type.String()),
  diocese: Nullable(Type.String()),
  dedication: Nullable(Type.String()),
  capacity: Nullable(Type.Integer()),
  builtOn: Nullable(Type.String()),
});

export const DbpediaEnrichmentSchema = Type.Object({
  source: Type.Literal("dbpedia"),
  abstract: Nullable(Type.String()),
  thumbnailUrl: Nullable(Type.String()),
  elevationM: Nullable(Type.Number()),
  annualVisitors: Nullable(Type.Integer()),
});

export const EnrichmentBlockSchema = Type.Union([
  UnescoEnrichmentSchema,
  ArchaeologicalEnrichmentSchema,
  ReligiousEnrichmentSchema,
  DbpediaEnrichmentSchema,
]);

export type UnescoEnrichment = Static<typeof UnescoEnrichmentSchema>;
export type ArchaeologicalEnrichment = Static<
  typeof ArchaeologicalEnrichmentSchema
>;
export type ReligiousEnrichment = Static<typeof ReligiousEnrichmentSchema>;
export type DbpediaEnrichment = Static<typeof DbpediaEnrichmentSchema>;
export type EnrichmentBlock = Static<typeof EnrichmentBlockSchema>;

export const HeritageSiteDetailsSchema = Type.Object({
  category: HeritageCategorySchema,
  typeLabel: Nullable(Type.String()),
  subtype: Nullable(Type.String()),
  description: Nullable(Type.String()),
  province: Nullable(Type.String()),
  city: Nullable(Type.String()),
  history: Type.Object({
    createdOn: Nullable(Type.String()),
    startedOn: Nullable(Type.String()),
    endedOn: Nullable(Type.String()),
  }),
  architecture: Type.Object({
    architect: Nullable(Type.String()),
    style: Nullable(Type.String()),
    material: Nullable(Type.String()),
    heightM: Nullable(Type.Number()),
    areaM2: Nullable(Type.Number()),
  }),
  heritageStatus: Nullable(Type.String()),
  enrichment: Nullable(EnrichmentBlockSchema),
  extraEnrichments: Type.Array(EnrichmentBlockSchema),
  links: Type.Object({
    image: Nullable(Type.String()),
    website: Nullable(Type.String()),
    wikipedia: Nullable(Type.String()),
    commons: Nullable(Type.String()),
  }),
});

export type HeritageSiteDetails = Static<typeof HeritageSiteDetailsSchema>;

// ============================================================================
// Plazas
// ============================================================================

export const PlazaDetailsSchema = Type.Object({
  city: Nullable(Type.String()),
  description: Nullable(Type.String()),
  imageUrl: Nullable(Type.String()),
});

export type PlazaDetails = Static<typeof PlazaDetailsSchema>;

// ============================================================================
// Records
// ============================================================================

interface EntityBase {
  sourceKey: string;
  name: string;
  coordinates: Coordinates | null;
}

export interface ProvinceRecord extends EntityBase {
  kind: "provincias";
  details: ProvinceDetails;
}

export interface NaturalAreaRecord extends EntityBase {
  kind: "parques";
  details: NaturalAreaDetails;
}

export interface HeritageSiteRecord extends EntityBase {
  kind: "sitios";
  details: HeritageSiteDetails;
}

export interface PlazaRecord extends EntityBase {
  kind: "plazas";
  details: PlazaDetails;
}

export type EntityRecord =
  | ProvinceRecord
  | NaturalAreaRecord
  | HeritageSiteRecord
  | PlazaRecord;

export type StoredEntity = EntityRecord & {
  refreshedAt: string;
  createdAt: string;
};
