import {
  bindingValue,
  parsePoint,
  parseUrl,
} from "../../../sparql/extractors.js";
import { PlazaDetailsSchema } from "../../../types/index.js";
import { ensureValid, recordName } from "./shared.js";

import type { PlazaRecord } from "../../../types/index.js";
import type { MergedRecord } from "../merger.js";

export function processPlaza(record: MergedRecord): PlazaRecord | null {
  const name = recordName(record);
  if (name === null) {
    return null;
  }

  const row = record.primary;

  return {
    kind: "plazas",
    sourceKey: record.key,
    name,
    coordinates: parsePoint(bindingValue(row, "coord")),
    details: ensureValid(
      PlazaDetailsSchema,
      {
        city: bindingValue(row, "cityLabel"),
        description: bindingValue(row, "itemDescription"),
        imageUrl: parseUrl(bindingValue(row, "image")),
      },
      name
    ),
  };
}
