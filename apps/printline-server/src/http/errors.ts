import type { FastifyInstance, FastifyReply } from "fastify";
import { ValidationError, isRecord, type ErrorResponse } from "@printline/protocol";

/** Map a thrown error onto the queue's HTTP error shape */
export function sendError(reply: FastifyReply, err: unknown, operation: string): FastifyReply {
  if (err instanceof ValidationError) {
    console.warn(`[http] ${operation} rejected: ${err.message}`);
    return reply.code(400).send(errorBody(err.message));
  }

  console.error(`[http] ${operation} failed:`, err);
  return reply.code(500).send(errorBody("Internal server error"));
}

/** Keep Fastify's own failures (bad JSON, unknown routes) in the same shape */
export function registerErrorHandlers(app: FastifyInstance): void {
  app.setErrorHandler((err, request, reply) => {
    const status = err.statusCode ?? 500;
    if (status < 500) {
      return reply.code(status).send(errorBody(err.message));
    }
    console.error(`[http] ${request.method} ${request.url} failed:`, err);
    return reply.code(500).send(errorBody("Internal server error"));
  });

  app.setNotFoundHandler((request, reply) => {
    return reply.code(404).send(errorBody(`Route ${request.method} ${request.url} not found`));
  });
}

export function errorBody(error: string): ErrorResponse {
  return { error };
}

/**
 * Read one field of a request body typed as T. Fastify only parses the JSON,
 * so the value still has to go through a validator.
 */
export function readField<T>(body: unknown, key: keyof T & string): unknown {
  return isRecord(body) ? body[key] : undefined;
}
