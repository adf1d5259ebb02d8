/**
 * SPARQL 1.1 JSON result format (application/sparql-results+json)
 */

import { Type, type Static } from "@sinclair/typebox";

export const SparqlTermSchema = Type.Object({
  type: Type.String(),
  value: Type.String(),
  "xml:lang": Type.Optional(Type.String()),
  datatype: Type.Optional(Type.String()),
});

export const SparqlResponseSchema = Type.Object({
  head: Type.Object({
    vars: Type.Optional(Type.Array(Type.String())),
  }),
  results: Type.Object({
    bindings: Type.Array(Type.Record(Type.String(), SparqlTermSchema)),
  }),
});

export const SparqlBindingsSchema = Type.Array(
  Type.Record(Type.String(), SparqlTermSchema)
);

export type SparqlTerm = Static<typeof SparqlTermSchema>;
export type SparqlResponse = Static<typeof SparqlResponseSchema>;

/** One result row: variable name to bound term */
export type SparqlBinding = Record<string, SparqlTerm>;
