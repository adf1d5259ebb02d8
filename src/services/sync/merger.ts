/**
 * Enrichment merger: left join of secondary facet rows onto the primary
 * entity list, keyed by source key.
 */

import { NameNormalizer } from "../../sparql/normalizer.js";
import {
  bindingValue,
  extractEntityId,
  labelFromResource,
} from "../../sparql/extractors.js";

import type { SparqlBinding } from "../../types/index.js";

// ============================================================================
// Types
// ============================================================================

export interface KeyedRow {
  key: string;
  binding: SparqlBinding;
}

export interface SecondaryList {
  /** Facet the rows came from, e.g. "subdivisions" */
  source: string;
  rows: KeyedRow[];
}

export interface Enrichment {
  source: string;
  binding: SparqlBinding;
}

export interface MergedRecord {
  key: string;
  /** First primary row seen for the key */
  primary: SparqlBinding;
  /** Further primary rows for the same key (multi-valued properties) */
  alternates: SparqlBinding[];
  enrichments: Enrichment[];
}

export interface MergeResult {
  records: MergedRecord[];
  /** Secondary rows whose key is absent from the primary list */
  orphans: number;
}

// ============================================================================
// Key reconciliation
// ============================================================================

/**
 * Normalized-name lookup built from the primary rows. Names shared by two
 * different keys are ambiguous and never resolve.
 */
export class NameIndex {
  private byName = new Map<string, string | null>();

  constructor(private normalizer: NameNormalizer = new NameNormalizer()) {}

  static fromRows(
    rows: readonly KeyedRow[],
    nameVariable: string,
    normalizer?: NameNormalizer
  ): NameIndex {
    const index = new NameIndex(normalizer);
    for (const row of rows) {
      const name = bindingValue(row.binding, nameVariable);
      if (name !== null) {
        index.add(name, row.key);
      }
    }
    return index;
  }

  add(name: string, key: string): void {
    const normalized = this.normalizer.normalize(name);
    if (normalized === "") {
      return;
    }
    const existing = this.byName.get(normalized);
    if (existing === undefined) {
      this.byName.set(normalized, key);
    } else if (existing !== key) {
      this.byName.set(normalized, null);
    }
  }

  resolve(name: string | null): string | null {
    if (name === null) {
      return null;
    }
    return this.byName.get(this.normalizer.normalize(name)) ?? null;
  }
}

export interface KeyingOptions {
  keyVariable: string;
  nameVariable?: string;
  nameIndex?: NameIndex;
}

/**
 * Attach a source key to each row: the entity id bound to `keyVariable`,
 * else the key the name index resolves for `nameVariable`.
 */
export function keyRows(
  bindings: readonly SparqlBinding[],
  options: KeyingOptions
): { rows: KeyedRow[]; unresolved: number } {
  const rows: KeyedRow[] = [];
  let unresolved = 0;

  for (const binding of bindings) {
    let key = extractEntityId(bindingValue(binding, options.keyVariable));

    if (
      key === null &&
      options.nameVariable !== undefined &&
      options.nameIndex !== undefined
    ) {
      const label = labelFromResource(
        bindingValue(binding, options.nameVariable)
      );
      key = options.nameIndex.resolve(label);
    }

    if (key === null) {
      unresolved++;
      continue;
    }
    rows.push({ key, binding });
  }

  return { rows, unresolved };
}

// ============================================================================
// Merge
// ============================================================================

/**
 * One merged record per primary key, in order of first appearance.
 * Secondary-only keys are dropped and counted as orphans.
 */
export function mergeEnrichments(
  primary: readonly KeyedRow[],
  secondaries: readonly SecondaryList[]
): MergeResult {
  const byKey = new Map<string, MergedRecord>();

  for (const row of primary) {
    const existing = byKey.get(row.key);
    if (existing === undefined) {
      byKey.set(row.key, {
        key: row.key,
        primary: row.binding,
        alternates: [],
        enrichments: [],
      });
    } else {
      existing.alternates.push(row.binding);
    }
  }

  let orphans = 0;
  for (const list of secondaries) {
    for (const row of list.rows) {
      const record = byKey.get(row.key);
      if (record === undefined) {
        orphans++;
        continue;
      }
      record.enrichments.push({ source: list.source, binding: row.binding });
    }
  }

  return { records: [...byKey.values()], orphans };
}

/**
 * Bindings contributed by one facet to a merged record.
 */
export function enrichmentsFrom(
  record: MergedRecord,
  source: string
): SparqlBinding[] {
  return record.enrichments
    .filter((enrichment) => enrichment.source === source)
    .map((enrichment) => enrichment.binding);
}
