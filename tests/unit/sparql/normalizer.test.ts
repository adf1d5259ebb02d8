import { describe, it, expect } from "vitest";

import {
  NORMALIZER_CACHE_SIZE,
  NameNormalizer,
  foldDiacritics,
  normalizeName,
} from "../../../src/sparql/normalizer.js";

describe("sparql/normalizer", () => {
  describe("foldDiacritics", () => {
    it("should lowercase and strip accents", () => {
      expect(foldDiacritics("Centro Histórico")).toBe("centro historico");
      expect(foldDiacritics("GALÁPAGOS")).toBe("galapagos");
      expect(foldDiacritics("Cañar")).toBe("canar");
    });
  });

  describe("normalizeName", () => {
    it("should map Spanish and English province names to the same key", () => {
      expect(normalizeName("Provincia del Guayas")).toBe("guayas");
      expect(normalizeName("Guayas Province")).toBe("guayas");
    });

    it("should drop stop words and punctuation", () => {
      expect(normalizeName("Santo Domingo de los Tsáchilas")).toBe(
        "santo domingo tsachilas"
      );
      expect(normalizeName("Islas Galápagos")).toBe("galapagos");
      expect(normalizeName("Morona-Santiago")).toBe("morona santiago");
    });

    it("should return an empty key when only stop words remain", () => {
      expect(normalizeName("Provincia de la")).toBe("");
    });
  });

  describe("NameNormalizer", () => {
    it("should memoize keys per instance", () => {
      const normalizer = new NameNormalizer();

      expect(normalizer.normalize("Cantón Durán")).toBe("canton duran");
      expect(normalizer.normalize("Cantón Durán")).toBe("canton duran");
      expect(normalizer.size).toBe(1);
      expect(new NameNormalizer().size).toBe(0);
    });

    it("should default to the shared capacity", () => {
      const normalizer = new NameNormalizer();
      for (let index = 0; index <= NORMALIZER_CACHE_SIZE; index++) {
        normalizer.normalize(`Name ${String(index)}`);
      }

      expect(normalizer.capacity).toBe(NORMALIZER_CACHE_SIZE);
      expect(normalizer.size).toBe(NORMALIZER_CACHE_SIZE);
    });

    it("should evict the least recently used name", () => {
      const normalizer = new NameNormalizer(2);
      normalizer.normalize("Guayas");
      normalizer.normalize("Pichincha");
      normalizer.normalize("Guayas");
      normalizer.normalize("Azuay");

      expect(normalizer.size).toBe(2);
      const keys = ["Guayas", "Azuay"].map((name) => normalizer.normalize(name));
      expect(keys).toEqual(["guayas", "azuay"]);
      expect(normalizer.size).toBe(2);
    });
  });
});
