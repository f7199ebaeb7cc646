import { z } from "zod";
import type { FastifyInstance } from "fastify";
import type {
  ClusterInfo,
  ClusterStatusResponse,
  ProvisionRecord,
  TerminateClusterResponse,
} from "@podcluster/shared";
import { ANY_REGION } from "../services/cluster-reconciler.js";
import { parseClusterName, parseWith } from "../validation.js";

const reconcileBodySchema = z.object({
  targetCount: z.number().int().positive(),
  instanceType: z.string().min(1),
  region: z.string().min(1).optional(),
  diskSize: z.number().int().positive().optional(),
});

const terminateQuerySchema = z.object({
  workerOnly: z.enum(["true", "false"]).optional(),
});

interface ClusterParams {
  clusterName: string;
}

export default async function clusterRoutes(fastify: FastifyInstance) {
  const provider = fastify.clusterProvider;
  const locks = fastify.clusterLocks;

  // POST /api/clusters/:clusterName/reconcile: bring the cluster to targetCount
  fastify.post<{ Params: ClusterParams; Reply: ProvisionRecord }>(
    "/api/clusters/:clusterName/reconcile",
    { preHandler: [fastify.verifyAuth] },
    async (request) => {
      const clusterName = parseClusterName(request.params.clusterName);
      const body = parseWith(reconcileBodySchema, request.body, "reconcile request");

      request.log.info(
        { clusterName, targetCount: body.targetCount, instanceType: body.instanceType },
        "Reconciling cluster",
      );
      return locks.withLock(clusterName, "reconcile", () =>
        provider.runInstances(body.region ?? ANY_REGION, clusterName, body.targetCount, {
          instanceType: body.instanceType,
          diskSize: body.diskSize,
        }),
      );
    },
  );

  // GET /api/clusters/:clusterName: connection info for every active node
  fastify.get<{ Params: ClusterParams; Reply: ClusterInfo }>(
    "/api/clusters/:clusterName",
    async (request) => {
      const clusterName = parseClusterName(request.params.clusterName);
      return provider.getClusterInfo(clusterName);
    },
  );

  // GET /api/clusters/:clusterName/status: canonical status per instance
  fastify.get<{ Params: ClusterParams; Reply: ClusterStatusResponse }>(
    "/api/clusters/:clusterName/status",
    async (request) => {
      const clusterName = parseClusterName(request.params.clusterName);
      const statuses = await provider.queryInstances(clusterName);
      return { clusterName, statuses };
    },
  );

  // DELETE /api/clusters/:clusterName: terminate all (or only worker) instances
  fastify.delete<{ Params: ClusterParams; Reply: TerminateClusterResponse }>(
    "/api/clusters/:clusterName",
    { preHandler: [fastify.verifyAuth] },
    async (request) => {
      const clusterName = parseClusterName(request.params.clusterName);
      const query = parseWith(terminateQuerySchema, request.query, "terminate query");
      const workerOnly = query.workerOnly === "true";

      const terminatedInstanceIds = await locks.withLock(clusterName, "terminate", () =>
        provider.terminateInstances(clusterName, workerOnly),
      );
      return { clusterName, terminatedInstanceIds };
    },
  );

  // POST /api/clusters/:clusterName/stop and /resume: never supported
  fastify.post<{ Params: ClusterParams }>(
    "/api/clusters/:clusterName/stop",
    { preHandler: [fastify.verifyAuth] },
    async (request) => provider.stopInstances(parseClusterName(request.params.clusterName)),
  );

  fastify.post<{ Params: ClusterParams }>(
    "/api/clusters/:clusterName/resume",
    { preHandler: [fastify.verifyAuth] },
    async (request) => provider.resumeInstances(parseClusterName(request.params.clusterName)),
  );
}
