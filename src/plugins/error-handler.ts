import fp from "fastify-plugin";
import type { FastifyPluginCallback } from "fastify";
import { isWorkflowError } from "../orchestrator/errors";

const GENERATION_RETRY_AFTER_SEC = 5;

function statusCodeOf(error: unknown): number {
  if (typeof error === "object" && error !== null && "statusCode" in error && typeof error.statusCode === "number") {
    return error.statusCode;
  }
  return 500;
}

const errorHandlerPlugin: FastifyPluginCallback = (app, _opts, done) => {
  app.setErrorHandler((error, request, reply) => {
    if (request.raw.aborted || request.raw.destroyed) {
      reply.status(499).send({ error: "CLIENT_CLOSED_REQUEST" });
      return;
    }

    if (isWorkflowError(error)) {
      if (error.retryable) {
        request.log.warn({ err: error }, "generation unavailable");
        reply.header("Retry-After", String(GENERATION_RETRY_AFTER_SEC));
      }
      reply.status(error.statusCode).send({ error: error.code, message: error.message });
      return;
    }

    const statusCode = statusCodeOf(error);
    if (statusCode >= 400 && statusCode < 500) {
      let code = "BAD_REQUEST";
      if (statusCode === 401) code = "UNAUTHORIZED";
      else if (statusCode === 404) code = "NOT_FOUND";
      else if (statusCode === 413) code = "PAYLOAD_TOO_LARGE";
      else if (statusCode === 415) code = "UNSUPPORTED_MEDIA_TYPE";
      reply.status(statusCode).send({ error: code });
      return;
    }

    request.log.error({ err: error }, "Unhandled error");
    reply.status(500).send({ error: "INTERNAL_SERVER_ERROR" });
  });

  done();
};

export default fp(errorHandlerPlugin, { name: "error-handler" });
