/**
 * Common TypeBox schemas for API validation
 */

import { Type, type Static, type TSchema } from "@sinclair/typebox";

import { ENTITY_KINDS } from "../../types/index.js";

// ============================================================================
// Error Schemas
// ============================================================================

export const ApiErrorSchema = Type.Object({
  error: Type.String(),
  message: Type.String(),
  details: Type.Optional(Type.Record(Type.String(), Type.Unknown())),
  requestId: Type.Optional(Type.String()),
});

export type ApiErrorBody = Static<typeof ApiErrorSchema>;

// ============================================================================
// Domain Schemas
// ============================================================================

export const EntityKindSchema = Type.Union(
  ENTITY_KINDS.map((kind) => Type.Literal(kind)),
  { description: "Entity type" }
);

export const KindParamSchema = Type.Object({
  kind: EntityKindSchema,
});

// ============================================================================
// Response Wrapper Schemas
// ============================================================================

export function createResponseSchema<T extends TSchema>(dataSchema: T) {
  return Type.Object({
    data: dataSchema,
  });
}
