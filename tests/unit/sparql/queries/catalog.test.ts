import { describe, it, expect } from "vitest";

import { OFFICIAL_PROVINCE_IDS } from "../../../../src/constants.js";
import { DBPEDIA_CATALOG } from "../../../../src/sparql/queries/dbpedia.js";
import {
  labelService,
  preferredLabel,
} from "../../../../src/sparql/queries/template.js";
import { WIKIDATA_CATALOG } from "../../../../src/sparql/queries/wikidata.js";

const context = { languages: ["es", "en"] };

describe("sparql/queries", () => {
  describe("template helpers", () => {
    it("should request labels in preference order", () => {
      expect(labelService(context)).toBe(
        'SERVICE wikibase:label { bd:serviceParam wikibase:language "es,en" . }'
      );
    });

    it("should coalesce language-filtered labels and the subject URI", () => {
      const clause = preferredLabel("?site", "label", context);

      expect(clause).toContain(
        'OPTIONAL { ?site rdfs:label ?label_es . FILTER(LANG(?label_es) = "es") }'
      );
      expect(clause).toContain(
        "BIND(COALESCE(?label_es, ?label_en, STR(?site)) AS ?label)"
      );
    });
  });

  describe("catalogs", () => {
    it("should register every template under its own facet name", () => {
      for (const catalog of [WIKIDATA_CATALOG, DBPEDIA_CATALOG]) {
        for (const [name, template] of Object.entries(catalog)) {
          expect(template.facet).toBe(name);
        }
      }
    });

    it("should key every Wikidata facet by item", () => {
      for (const template of Object.values(WIKIDATA_CATALOG)) {
        expect(template.keyVariable).toBe("item");
      }
    });

    it("should key every DBpedia facet by its sameAs link", () => {
      for (const template of Object.values(DBPEDIA_CATALOG)) {
        expect(template.keyVariable).toBe("wikidata");
        expect(template.nameVariable).toBeDefined();
      }
    });

    it("should restrict provinces to the official list", () => {
      const query = WIKIDATA_CATALOG.provinces?.render(context) ?? "";

      for (const id of OFFICIAL_PROVINCE_IDS) {
        expect(query).toContain(`wd:${id}`);
      }
      expect(query).toContain('wikibase:language "es,en"');
    });

    it("should tag every heritage branch with a category", () => {
      const query = WIKIDATA_CATALOG["heritage-sites"]?.render(context) ?? "";

      expect(query).toContain('BIND("WORLD_HERITAGE" AS ?category)');
      expect(query).toContain('BIND("ARCHAEOLOGICAL" AS ?category)');
    });
  });
});
