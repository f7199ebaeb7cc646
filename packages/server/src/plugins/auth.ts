import fp from "fastify-plugin";
import { timingSafeEqual } from "node:crypto";
import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";

declare module "fastify" {
  interface FastifyInstance {
    verifyAuth: (
      request: FastifyRequest,
      reply: FastifyReply,
    ) => Promise<void>;
  }
}

// ---------------------------------------------------------------------------
// Plugin: bearer token check for the routes that change pods
// ---------------------------------------------------------------------------

export default fp(async function authPlugin(fastify: FastifyInstance) {
  const configToken = fastify.serverConfig.authToken;
  const expected = configToken ? Buffer.from(configToken, "utf-8") : null;

  async function verifyAuth(
    request: FastifyRequest,
    reply: FastifyReply,
  ): Promise<void> {
    const header = request.headers.authorization;
    if (expected && header?.startsWith("Bearer ")) {
      const provided = Buffer.from(header.slice(7), "utf-8");
      if (provided.length === expected.length && timingSafeEqual(provided, expected)) {
        return;
      }
    }

    request.log.warn({ url: request.url }, "Rejected unauthenticated request");
    reply
      .status(401)
      .send({ error: "Missing or invalid authentication credentials" });
  }

  fastify.decorate("verifyAuth", verifyAuth);
});
