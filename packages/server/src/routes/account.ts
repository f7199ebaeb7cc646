import { z } from "zod";
import type { FastifyInstance } from "fastify";
import type {
  CatalogResponse,
  CredentialsCheckResponse,
  ProviderInfoResponse,
  SshKeyResponse,
} from "@podcluster/shared";
import { parseWith } from "../validation.js";

const sshKeyBodySchema = z.object({
  publicKey: z
    .string()
    .trim()
    .regex(/^\S+\s+\S+/, "expected an OpenSSH public key (\"<type> <base64> [comment]\")"),
});

export default async function accountRoutes(fastify: FastifyInstance) {
  const provider = fastify.clusterProvider;

  // GET /api/credentials/check: can the configured API key list pods?
  fastify.get<{ Reply: CredentialsCheckResponse }>(
    "/api/credentials/check",
    { preHandler: [fastify.verifyAuth] },
    async () => provider.checkCredentials(),
  );

  // POST /api/ssh-keys: register a public key unless already present
  fastify.post<{ Reply: SshKeyResponse }>(
    "/api/ssh-keys",
    { preHandler: [fastify.verifyAuth] },
    async (request) => {
      const body = parseWith(sshKeyBodySchema, request.body, "SSH key request");
      return provider.registerSshKey(body.publicKey);
    },
  );

  // GET /api/provider: provider name and the features it cannot offer
  fastify.get<{ Reply: ProviderInfoResponse }>("/api/provider", async () => ({
    name: provider.name,
    unsupportedFeatures: { ...provider.unsupportedFeatures },
  }));

  // GET /api/catalog: instance types the launch path can resolve
  fastify.get<{ Reply: CatalogResponse }>("/api/catalog", async () => ({
    instanceTypes: provider.instanceTypes(),
  }));
}
