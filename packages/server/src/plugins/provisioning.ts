import fp from "fastify-plugin";
import type { FastifyInstance } from "fastify";
import type { ClusterProvider } from "../services/cluster-provider.js";
import { ClusterLocks } from "../services/cluster-locks.js";
import { loadCredentials } from "../services/credentials.js";
import { loadInstanceCatalog } from "../services/instance-catalog.js";
import { PodApiClient } from "../services/pod-api-client.js";
import { PodClusterProvider } from "../services/pod-cluster-provider.js";

declare module "fastify" {
  interface FastifyInstance {
    clusterProvider: ClusterProvider;
    clusterLocks: ClusterLocks;
  }
}

export default fp(async function provisioningPlugin(fastify: FastifyInstance) {
  const config = fastify.serverConfig;

  const apiKey = config.podApiKey ?? (await loadCredentials(config.credentialsPath)).apiKey;
  const catalog = await loadInstanceCatalog(config.catalogPath);
  fastify.log.info(
    { instanceTypes: catalog.instanceTypes().length, catalogPath: config.catalogPath },
    "Loaded instance catalog",
  );

  const client = new PodApiClient({
    apiKey,
    baseUrl: config.podApiUrl,
    log: fastify.log.child({ component: "pod-api" }),
  });

  fastify.decorate(
    "clusterProvider",
    new PodClusterProvider({ client, catalog, log: fastify.log }),
  );
  fastify.decorate("clusterLocks", new ClusterLocks());
});
