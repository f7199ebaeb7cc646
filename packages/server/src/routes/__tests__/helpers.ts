import Fastify from "fastify";
import type { FastifyInstance, FastifyPluginAsync } from "fastify";
import type { ServerConfig } from "../../config.js";
import authPlugin from "../../plugins/auth.js";
import errorHandlerPlugin from "../../plugins/error-handler.js";
import { ClusterLocks } from "../../services/cluster-locks.js";
import { PodClusterProvider } from "../../services/pod-cluster-provider.js";
import { FakePodApi, testCatalog } from "../../services/__tests__/helpers/fake-pod-api.js";

export const TEST_TOKEN = "test-bearer-token";
export const AUTH = { authorization: `Bearer ${TEST_TOKEN}` };

export function testConfig(): ServerConfig {
  return {
    port: 4500,
    host: "127.0.0.1",
    logLevel: "silent",
    authToken: TEST_TOKEN,
    podApiKey: "test-secret",
    credentialsPath: "/nonexistent",
    podApiUrl: "http://localhost:9000",
    catalogPath: "/nonexistent",
  };
}

/** App with the real provider wired to an in-memory pods API. */
export async function buildApp(
  routes: FastifyPluginAsync,
): Promise<{ app: FastifyInstance; api: FakePodApi }> {
  const api = new FakePodApi();
  const app = Fastify({ logger: false });

  app.decorate("serverConfig", testConfig());
  app.decorate(
    "clusterProvider",
    new PodClusterProvider({
      client: api.client(),
      catalog: testCatalog(),
      log: app.log,
      sleep: api.sleep,
    }),
  );
  app.decorate("clusterLocks", new ClusterLocks());

  await app.register(errorHandlerPlugin);
  await app.register(authPlugin);
  await app.register(routes);
  return { app, api };
}
