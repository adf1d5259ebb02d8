/**
 * Wikidata query catalog.
 *
 * Every facet keys its rows by `?item`. Labels come from the label service
 * in the configured language order.
 */

import { ECUADOR_ENTITY_ID, OFFICIAL_PROVINCE_IDS } from "../../constants.js";
import { labelService, type FacetTemplate } from "./template.js";

const PREFIXES = `PREFIX wd: <http://www.wikidata.org/entity/>
PREFIX wdt: <http://www.wikidata.org/prop/direct/>
PREFIX p: <http://www.wikidata.org/prop/>
PREFIX ps: <http://www.wikidata.org/prop/statement/>
PREFIX pq: <http://www.wikidata.org/prop/qualifier/>
PREFIX wikibase: <http://wikiba.se/ontology#>
PREFIX bd: <http://www.bigdata.com/rdf#>
PREFIX schema: <http://schema.org/>`;

const IN_ECUADOR = `?item wdt:P17 wd:${ECUADOR_ENTITY_ID} .`;

// Classes used to find heritage sites
const WORLD_HERITAGE_SITE = "Q9259";
const ARCHAEOLOGICAL_SITE = "Q839954";
const CHURCH_BUILDING = "Q16970";
const MUSEUM = "Q33506";
const MONUMENT = "Q4989906";
const HISTORIC_CENTER = "Q1266818";
const FORTIFICATION = "Q57821";
const PALACE = "Q16560";

const PROTECTED_AREA_CLASSES = ["Q46169", "Q473972", "Q179049", "Q158454"];
const TOWN_SQUARE = "Q174782";

function spanishArticle(): string {
  return `OPTIONAL {
    ?article schema:about ?item ;
             schema:isPartOf <https://es.wikipedia.org/> .
  }`;
}

// ============================================================================
// Base facets
// ============================================================================

const provinces: FacetTemplate = {
  facet: "provinces",
  description: "Official provinces with capital, population and imagery",
  keyVariable: "item",
  nameVariable: "itemLabel",
  render: (context) => `${PREFIXES}
SELECT DISTINCT ?item ?itemLabel ?capitalLabel ?population ?area ?coord ?image ?flag ?coatOfArms ?article WHERE {
  VALUES ?item { ${OFFICIAL_PROVINCE_IDS.map((id) => `wd:${id}`).join(" ")} }
  OPTIONAL { ?item wdt:P36 ?capital . }
  OPTIONAL { ?item wdt:P1082 ?population . }
  OPTIONAL { ?item wdt:P2046 ?area . }
  OPTIONAL { ?item wdt:P625 ?coord . }
  OPTIONAL { ?item wdt:P18 ?image . }
  OPTIONAL { ?item wdt:P41 ?flag . }
  OPTIONAL { ?item wdt:P94 ?coatOfArms . }
  ${spanishArticle()}
  ${labelService(context)}
}
ORDER BY ?itemLabel`,
};

const naturalAreas: FacetTemplate = {
  facet: "natural-areas",
  description: "National parks, reserves and other protected areas",
  keyVariable: "item",
  nameVariable: "itemLabel",
  render: (context) => `${PREFIXES}
SELECT DISTINCT ?item ?itemLabel ?itemDescription ?area ?inception ?coord ?provinceLabel ?image ?website WHERE {
  VALUES ?class { ${PROTECTED_AREA_CLASSES.map((id) => `wd:${id}`).join(" ")} }
  ?item wdt:P31 ?class .
  ${IN_ECUADOR}
  OPTIONAL { ?item wdt:P2046 ?area . }
  OPTIONAL { ?item wdt:P571 ?inception . }
  OPTIONAL { ?item wdt:P625 ?coord . }
  OPTIONAL { ?item wdt:P131 ?province . }
  OPTIONAL { ?item wdt:P18 ?image . }
  OPTIONAL { ?item wdt:P856 ?website . }
  ${labelService(context)}
}
ORDER BY ?itemLabel`,
};

const heritageSites: FacetTemplate = {
  facet: "heritage-sites",
  description: "Heritage sites across every category with shared attributes",
  keyVariable: "item",
  nameVariable: "itemLabel",
  render: (context) => `${PREFIXES}
SELECT DISTINCT ?item ?itemLabel ?itemDescription ?category ?typeLabel ?subtypeLabel ?coord ?image ?website
       ?created ?started ?ended ?architectLabel ?styleLabel ?materialLabel ?heritageLabel
       ?cityLabel ?provinceLabel ?height ?area ?article ?commons WHERE {
  {
    ?item wdt:P1435 wd:${WORLD_HERITAGE_SITE} . BIND("WORLD_HERITAGE" AS ?category)
  } UNION {
    ?item wdt:P31/wdt:P279* wd:${ARCHAEOLOGICAL_SITE} . BIND("ARCHAEOLOGICAL" AS ?category)
  } UNION {
    ?item wdt:P31/wdt:P279* wd:${CHURCH_BUILDING} . BIND("RELIGIOUS" AS ?category)
  } UNION {
    ?item wdt:P31/wdt:P279* wd:${MUSEUM} . BIND("MUSEUM" AS ?category)
  } UNION {
    ?item wdt:P31 wd:${HISTORIC_CENTER} . BIND("HISTORIC_CENTER" AS ?category)
  } UNION {
    ?item wdt:P31/wdt:P279* wd:${MONUMENT} . BIND("MONUMENT" AS ?category)
  } UNION {
    ?item wdt:P31/wdt:P279* wd:${FORTIFICATION} . BIND("FORTIFICATION" AS ?category)
  } UNION {
    ?item wdt:P31/wdt:P279* wd:${PALACE} . BIND("PALACE" AS ?category)
  }
  ${IN_ECUADOR}
  OPTIONAL { ?item wdt:P31 ?type . }
  OPTIONAL { ?item wdt:P366 ?subtype . }
  OPTIONAL { ?item wdt:P625 ?coord . }
  OPTIONAL { ?item wdt:P18 ?image . }
  OPTIONAL { ?item wdt:P856 ?website . }
  OPTIONAL { ?item wdt:P571 ?created . }
  OPTIONAL { ?item wdt:P580 ?started . }
  OPTIONAL { ?item wdt:P582 ?ended . }
  OPTIONAL { ?item wdt:P84 ?architect . }
  OPTIONAL { ?item wdt:P149 ?style . }
  OPTIONAL { ?item wdt:P186 ?material . }
  OPTIONAL { ?item wdt:P1435 ?heritage . }
  OPTIONAL { ?item wdt:P131 ?city . }
  OPTIONAL { ?item wdt:P131/wdt:P131 ?province . ?province wdt:P31 wd:Q719987 . }
  OPTIONAL { ?item wdt:P2048 ?height . }
  OPTIONAL { ?item wdt:P2046 ?area . }
  OPTIONAL { ?item wdt:P373 ?commons . }
  ${spanishArticle()}
  ${labelService(context)}
}
ORDER BY ?itemLabel`,
};

const plazas: FacetTemplate = {
  facet: "plazas",
  description: "Town squares",
  keyVariable: "item",
  nameVariable: "itemLabel",
  render: (context) => `${PREFIXES}
SELECT DISTINCT ?item ?itemLabel ?itemDescription ?cityLabel ?coord ?image WHERE {
  ?item wdt:P31/wdt:P279* wd:${TOWN_SQUARE} .
  ${IN_ECUADOR}
  OPTIONAL { ?item wdt:P131 ?city . }
  OPTIONAL { ?item wdt:P625 ?coord . }
  OPTIONAL { ?item wdt:P18 ?image . }
  ${labelService(context)}
}
ORDER BY ?itemLabel`,
};

// ============================================================================
// Heritage detail facets
// ============================================================================

const unesco: FacetTemplate = {
  facet: "unesco",
  description: "World Heritage inscription details",
  keyVariable: "item",
  render: (context) => `${PREFIXES}
SELECT DISTINCT ?item ?inscribed ?criterionLabel ?unescoNumber ?area ?visitors WHERE {
  ?item wdt:P1435 wd:${WORLD_HERITAGE_SITE} .
  ${IN_ECUADOR}
  OPTIONAL {
    ?item p:P1435 ?designation .
    ?designation ps:P1435 wd:${WORLD_HERITAGE_SITE} .
    OPTIONAL { ?designation pq:P580 ?inscribed . }
    OPTIONAL { ?designation pq:P2614 ?criterion . }
  }
  OPTIONAL { ?item wdt:P757 ?unescoNumber . }
  OPTIONAL { ?item wdt:P2046 ?area . }
  OPTIONAL { ?item wdt:P1174 ?visitors . }
  ${labelService(context)}
}`,
};

const archaeological: FacetTemplate = {
  facet: "archaeological",
  description: "Culture, period and discovery of archaeological sites",
  keyVariable: "item",
  render: (context) => `${PREFIXES}
SELECT DISTINCT ?item ?cultureLabel ?periodLabel ?discovered ?discovererLabel ?elevation ?statusLabel WHERE {
  ?item wdt:P31/wdt:P279* wd:${ARCHAEOLOGICAL_SITE} .
  ${IN_ECUADOR}
  OPTIONAL { ?item wdt:P2596 ?culture . }
  OPTIONAL { ?item wdt:P2348 ?period . }
  OPTIONAL { ?item wdt:P575 ?discovered . }
  OPTIONAL { ?item wdt:P61 ?discoverer . }
  OPTIONAL { ?item wdt:P2044 ?elevation . }
  OPTIONAL { ?item wdt:P5816 ?status . }
  ${labelService(context)}
}`,
};

const religious: FacetTemplate = {
  facet: "religious",
  description: "Denomination, diocese and capacity of religious buildings",
  keyVariable: "item",
  render: (context) => `${PREFIXES}
SELECT DISTINCT ?item ?religionLabel ?dioceseLabel ?dedicationLabel ?capacity ?built WHERE {
  ?item wdt:P31/wdt:P279* wd:${CHURCH_BUILDING} .
  ${IN_ECUADOR}
  OPTIONAL { ?item wdt:P140 ?religion . }
  OPTIONAL { ?item wdt:P708 ?diocese . }
  OPTIONAL { ?item wdt:P825 ?dedication . }
  OPTIONAL { ?item wdt:P1083 ?capacity . }
  OPTIONAL { ?item wdt:P571 ?built . }
  ${labelService(context)}
}`,
};

export const WIKIDATA_CATALOG: Readonly<Record<string, FacetTemplate>> = {
  [provinces.facet]: provinces,
  [naturalAreas.facet]: naturalAreas,
  [heritageSites.facet]: heritageSites,
  [plazas.facet]: plazas,
  [unesco.facet]: unesco,
  [archaeological.facet]: archaeological,
  [religious.facet]: religious,
};
