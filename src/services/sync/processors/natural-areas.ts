import {
  bindingValue,
  parseDate,
  parseDecimal,
  parsePoint,
  parseUrl,
} from "../../../sparql/extractors.js";
import { NaturalAreaDetailsSchema } from "../../../types/index.js";
import { ensureValid, nonNegative, recordName } from "./shared.js";

import type { NaturalAreaRecord } from "../../../types/index.js";
import type { MergedRecord } from "../merger.js";

export function processNaturalArea(
  record: MergedRecord
): NaturalAreaRecord | null {
  const name = recordName(record);
  if (name === null) {
    return null;
  }

  const row = record.primary;

  return {
    kind: "parques",
    sourceKey: record.key,
    name,
    coordinates: parsePoint(bindingValue(row, "coord")),
    details: ensureValid(
      NaturalAreaDetailsSchema,
      {
        description: bindingValue(row, "itemDescription"),
        areaKm2: nonNegative(parseDecimal(bindingValue(row, "area"))),
        establishedOn: parseDate(bindingValue(row, "inception")),
        province: bindingValue(row, "provinceLabel"),
        imageUrl: parseUrl(bindingValue(row, "image")),
        websiteUrl: parseUrl(bindingValue(row, "website")),
      },
      name
    ),
  };
}
