import Fastify from "fastify";
import { loadConfig, validateConfig, type ServerConfig } from "./config.js";
import corsPlugin from "./plugins/cors.js";
import errorHandlerPlugin from "./plugins/error-handler.js";
import authPlugin from "./plugins/auth.js";
import provisioningPlugin from "./plugins/provisioning.js";
import clusterRoutes from "./routes/clusters.js";
import accountRoutes from "./routes/account.js";

declare module "fastify" {
  interface FastifyInstance {
    serverConfig: ServerConfig;
  }
}

async function main() {
  const config = loadConfig();

  // Validate config before constructing the server
  const issues = validateConfig(config);
  for (const issue of issues) {
    if (issue.level === "error") {
      console.error(`Config error: ${issue.message}`);
    } else {
      console.warn(`Config warning: ${issue.message}`);
    }
  }
  if (issues.some((i) => i.level === "error")) {
    process.exit(1);
  }

  const fastify = Fastify({
    logger: {
      level: config.logLevel,
      transport: {
        target: "pino-pretty",
        options: { translateTime: "HH:MM:ss Z", ignore: "pid,hostname" },
      },
    },
  });

  fastify.decorate("serverConfig", config);

  // Plugins (order matters: error handler and auth before routes, provisioning reads config)
  await fastify.register(errorHandlerPlugin);
  await fastify.register(corsPlugin);
  await fastify.register(authPlugin);
  await fastify.register(provisioningPlugin);

  // API routes
  await fastify.register(clusterRoutes);
  await fastify.register(accountRoutes);

  fastify.setNotFoundHandler(async (_request, reply) => {
    return reply.status(404).send({ error: "Not found" });
  });

  await fastify.listen({ port: config.port, host: config.host });
  fastify.log.info(`Pod cluster server listening on http://localhost:${config.port}`);
}

main().catch((err) => {
  console.error("Failed to start server:", err);
  process.exit(1);
});
