import * as Sentry from "@sentry/node";
import type { FastifyError, FastifyReply, FastifyRequest } from "fastify";
import { ZodError } from "zod";

export function sendValidationError(reply: FastifyReply, error: ZodError) {
  return reply.code(400).send({ error: "validation_error", details: error.flatten() });
}

export function errorHandler(error: FastifyError | ZodError, request: FastifyRequest, reply: FastifyReply) {
  if (error instanceof ZodError) {
    return sendValidationError(reply, error);
  }

  // Client errors raised by Fastify itself (bad JSON, payload too large, ...)
  const statusCode = error.statusCode ?? 500;
  if (statusCode >= 400 && statusCode < 500) {
    return reply.code(statusCode).send({ error: error.code ?? "bad_request", message: error.message });
  }

  console.error(`Error while handling ${request.method} ${request.url}:`);
  console.error(error);
  Sentry.captureException(error);

  return reply.code(500).send({ error: "internal_error" });
}
