import { normalizeName } from "../../../sparql/normalizer.js";
import {
  bindingValue,
  labelFromResource,
  parseDecimal,
  parseInteger,
  parseLatLon,
  parsePoint,
  parseUrl,
} from "../../../sparql/extractors.js";
import { ProvinceDetailsSchema } from "../../../types/index.js";
import { enrichmentsFrom, type MergedRecord } from "../merger.js";
import {
  commonsFileUrl,
  ensureValid,
  firstOf,
  nonNegative,
  recordName,
} from "./shared.js";

import type {
  ProvinceRecord,
  SparqlBinding,
  Subdivision,
} from "../../../types/index.js";

/**
 * DBpedia flag values are either URLs or bare Commons file names; only SVG
 * files are taken.
 */
export function dbpediaFlagUrl(value: string | null): string | null {
  if (value === null || !/\.svg$/i.test(value)) {
    return null;
  }
  return commonsFileUrl(value);
}

function toSubdivision(binding: SparqlBinding): Subdivision | null {
  const name = labelFromResource(
    bindingValue(binding, "cantonLabel") ?? bindingValue(binding, "canton")
  );
  if (name === null) {
    return null;
  }
  return {
    name,
    seat: labelFromResource(bindingValue(binding, "seat")),
    population: nonNegative(parseInteger(bindingValue(binding, "population"))),
    coordinates: parseLatLon(
      bindingValue(binding, "lat"),
      bindingValue(binding, "long")
    ),
    url: parseUrl(bindingValue(binding, "canton")),
    description: bindingValue(binding, "abstract"),
  };
}

/**
 * Subdivisions from every matched row, de-duplicated by normalized name.
 */
export function collectSubdivisions(
  bindings: readonly SparqlBinding[]
): Subdivision[] {
  const seen = new Set<string>();
  const subdivisions: Subdivision[] = [];

  for (const binding of bindings) {
    const subdivision = toSubdivision(binding);
    if (subdivision === null) {
      continue;
    }
    const key = normalizeName(subdivision.name) || subdivision.name;
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);
    subdivisions.push(subdivision);
  }

  return subdivisions;
}

export function processProvince(record: MergedRecord): ProvinceRecord | null {
  const name = recordName(record);
  if (name === null) {
    return null;
  }

  const row = record.primary;
  const flagRows = enrichmentsFrom(record, "province-flags");

  const details = ensureValid(
    ProvinceDetailsSchema,
    {
      capital: bindingValue(row, "capitalLabel"),
      population: nonNegative(parseInteger(bindingValue(row, "population"))),
      areaKm2: nonNegative(parseDecimal(bindingValue(row, "area"))),
      imageUrl:
        parseUrl(bindingValue(row, "image")) ??
        firstOf(flagRows, (flag) => parseUrl(bindingValue(flag, "thumbnail"))),
      flagUrl:
        parseUrl(bindingValue(row, "flag")) ??
        firstOf(flagRows, (flag) => dbpediaFlagUrl(bindingValue(flag, "flag"))),
      coatOfArmsUrl: parseUrl(bindingValue(row, "coatOfArms")),
      wikipediaUrl: parseUrl(bindingValue(row, "article")),
      subdivisions: collectSubdivisions(
        enrichmentsFrom(record, "subdivisions")
      ),
    },
    name
  );

  return {
    kind: "provincias",
    sourceKey: record.key,
    name,
    coordinates: parsePoint(bindingValue(row, "coord")),
    details,
  };
}
