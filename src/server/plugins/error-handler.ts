/**
 * Maps thrown errors to the JSON error body `{error, message, details?, requestId}`.
 *
 * Engine errors that escape a route (a broken store, an unreachable
 * endpoint) keep their own code; anything unrecognised becomes a 500.
 */

import fp from "fastify-plugin";

import { PersistenceError, SourceUnavailableError } from "../../errors.js";

import type { ApiErrorBody } from "../schemas/common.js";
import type {
  FastifyInstance,
  FastifyError,
  FastifyRequest,
  FastifyReply,
} from "fastify";

// ============================================================================
// API Error Classes
// ============================================================================

/**
 * Another process holds the lease lock of the requested entity type.
 */
export class SyncInProgressError extends Error {
  code = "SYNC_IN_PROGRESS" as const;
  statusCode = 409;

  constructor(readonly kind: string) {
    super(`A ${kind} sync is already running`);
    this.name = "SyncInProgressError";
  }
}

type KnownError =
  | SyncInProgressError
  | PersistenceError
  | SourceUnavailableError;

function statusOf(error: KnownError): number {
  if (error instanceof PersistenceError) {
    return 503;
  }
  if (error instanceof SourceUnavailableError) {
    return 502;
  }
  return error.statusCode;
}

function isKnownError(error: unknown): error is KnownError {
  return (
    error instanceof SyncInProgressError ||
    error instanceof PersistenceError ||
    error instanceof SourceUnavailableError
  );
}

// ============================================================================
// Plugin
// ============================================================================

function errorHandlerPlugin(fastify: FastifyInstance): void {
  const send = (
    reply: FastifyReply,
    request: FastifyRequest,
    status: number,
    body: Omit<ApiErrorBody, "requestId">
  ) => reply.status(status).send({ ...body, requestId: request.id });

  fastify.setErrorHandler(
    (error: FastifyError, request: FastifyRequest, reply: FastifyReply) => {
      // Schema validation of params, query or body
      if (error.validation) {
        return send(reply, request, 400, {
          error: "VALIDATION_ERROR",
          message: "Invalid request parameters",
          details: { validation: error.validation },
        });
      }

      if (isKnownError(error)) {
        const status = statusOf(error);
        if (status >= 500) {
          request.log.error({ err: error }, "Sync engine error");
        }
        return send(reply, request, status, {
          error: error.code,
          message: error.message,
        });
      }

      if (error.statusCode === 404) {
        return send(reply, request, 404, {
          error: "NOT_FOUND",
          message: error.message || "Resource not found",
        });
      }

      request.log.error(error, "Unhandled error");
      return send(reply, request, 500, {
        error: "INTERNAL_ERROR",
        message: "An unexpected error occurred",
      });
    }
  );

  fastify.setNotFoundHandler((request, reply) =>
    send(reply, request, 404, {
      error: "NOT_FOUND",
      message: `Route ${request.method} ${request.url} not found`,
    })
  );
}

export const errorHandler = fp(errorHandlerPlugin, {
  name: "error-handler",
});
