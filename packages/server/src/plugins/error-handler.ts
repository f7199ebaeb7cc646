import fp from "fastify-plugin";
import type { FastifyInstance } from "fastify";
import type { ErrorResponse } from "@podcluster/shared";
import {
  CapacityError,
  ClusterBusyError,
  CredentialsError,
  PodApiError,
  ReadinessTimeoutError,
  TerminationError,
  UnsupportedOperationError,
  ValidationError,
} from "../errors.js";

export function httpStatusFor(err: Error): number {
  if (err instanceof ValidationError) return 400;
  if (err instanceof CapacityError || err instanceof ClusterBusyError) return 409;
  if (err instanceof UnsupportedOperationError) return 501;
  if (err instanceof PodApiError || err instanceof TerminationError) return 502;
  if (err instanceof CredentialsError) return 503;
  if (err instanceof ReadinessTimeoutError) return 504;
  // Fastify's own errors (malformed JSON, unsupported media type) carry a status
  if ("statusCode" in err && typeof err.statusCode === "number" && err.statusCode < 500) {
    return err.statusCode;
  }
  return 500;
}

export default fp(async function errorHandlerPlugin(fastify: FastifyInstance) {
  fastify.setErrorHandler<Error>((err, request, reply) => {
    const status = httpStatusFor(err);
    if (status >= 500 && status !== 501) {
      request.log.error({ err }, "Request failed");
    } else {
      request.log.warn({ err: err.message }, "Request rejected");
    }
    const body: ErrorResponse = { error: err.message };
    return reply.status(status).send(body);
  });
});
