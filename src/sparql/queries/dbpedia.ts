/**
 * DBpedia query catalog.
 *
 * DBpedia resources carry no Wikidata id of their own; each facet binds
 * `?wikidata` from owl:sameAs when available and a readable label for
 * name-based reconciliation otherwise.
 */

import {
  preferredLabel,
  preferredLiteral,
  type FacetTemplate,
  type QueryContext,
} from "./template.js";

const PREFIXES = `PREFIX dbo: <http://dbpedia.org/ontology/>
PREFIX dbp: <http://dbpedia.org/property/>
PREFIX dbr: <http://dbpedia.org/resource/>
PREFIX dbc: <http://dbpedia.org/resource/Category:>
PREFIX dct: <http://purl.org/dc/terms/>
PREFIX rdfs: <http://www.w3.org/2000/01/rdf-schema#>
PREFIX owl: <http://www.w3.org/2002/07/owl#>
PREFIX geo: <http://www.w3.org/2003/01/geo/wgs84_pos#>`;

function wikidataLink(subject: string, target: string): string {
  return `OPTIONAL {
    ${subject} owl:sameAs ${target} .
    FILTER(STRSTARTS(STR(${target}), "http://www.wikidata.org/entity/"))
  }`;
}

function firstLanguage(context: QueryContext): QueryContext {
  return { languages: context.languages.slice(0, 1) };
}

const provinceFlags: FacetTemplate = {
  facet: "province-flags",
  description: "Flag images and thumbnails of the provinces",
  keyVariable: "wikidata",
  nameVariable: "label",
  render: (context) => `${PREFIXES}
SELECT DISTINCT ?province ?label ?wikidata ?flag ?thumbnail WHERE {
  ?province dct:subject dbc:Provinces_of_Ecuador .
  OPTIONAL { ?province dbp:imageFlag ?flag . }
  OPTIONAL { ?province dbo:thumbnail ?thumbnail . }
  ${wikidataLink("?province", "?wikidata")}
  ${preferredLabel("?province", "label", context)}
}
ORDER BY ?label`,
};

const subdivisions: FacetTemplate = {
  facet: "subdivisions",
  description: "Cantons of each province with seat and population",
  keyVariable: "wikidata",
  nameVariable: "provinceLabel",
  render: (context) => `${PREFIXES}
SELECT DISTINCT ?canton ?cantonLabel ?province ?provinceLabel ?wikidata ?seat ?population ?lat ?long ?abstract WHERE {
  ?province dct:subject dbc:Provinces_of_Ecuador .
  ?canton dbo:isPartOf ?province .
  OPTIONAL { ?canton dbo:seat ?seat . }
  OPTIONAL { ?canton dbo:populationTotal ?population . }
  OPTIONAL { ?canton geo:lat ?lat ; geo:long ?long . }
  ${preferredLiteral("?canton", "dbo:abstract", "abstract", firstLanguage(context))}
  ${wikidataLink("?province", "?wikidata")}
  ${preferredLabel("?canton", "cantonLabel", context)}
  ${preferredLabel("?province", "provinceLabel", context)}
}
ORDER BY ?provinceLabel ?cantonLabel`,
};

const heritageAbstracts: FacetTemplate = {
  facet: "heritage-abstracts",
  description: "Abstracts, thumbnails and visitor figures of heritage sites",
  keyVariable: "wikidata",
  nameVariable: "label",
  render: (context) => `${PREFIXES}
SELECT DISTINCT ?site ?label ?wikidata ?abstract ?thumbnail ?elevation ?visitors WHERE {
  {
    ?site dct:subject dbc:World_Heritage_Sites_in_Ecuador .
  } UNION {
    ?site a dbo:HistoricPlace ; dbo:location dbr:Ecuador .
  } UNION {
    ?site a dbo:Museum ; dbo:location dbr:Ecuador .
  } UNION {
    ?site a dbo:ReligiousBuilding ; dbo:country dbr:Ecuador .
  }
  OPTIONAL { ?site dbo:thumbnail ?thumbnail . }
  OPTIONAL { ?site dbo:elevation ?elevation . }
  OPTIONAL { ?site dbo:numberOfVisitors ?visitors . }
  ${preferredLiteral("?site", "dbo:abstract", "abstract", context)}
  ${wikidataLink("?site", "?wikidata")}
  ${preferredLabel("?site", "label", context)}
}
ORDER BY ?label`,
};

export const DBPEDIA_CATALOG: Readonly<Record<string, FacetTemplate>> = {
  [provinceFlags.facet]: provinceFlags,
  [subdivisions.facet]: subdivisions,
  [heritageAbstracts.facet]: heritageAbstracts,
};
