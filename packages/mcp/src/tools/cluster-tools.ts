import { z } from "zod";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { ReconcileClusterRequest } from "@podcluster/shared";
import type { PodClusterApiClient } from "../http-client.js";
import { apiResult, type CallToolResult } from "../tool-result.js";

function clusterPath(clusterName: string, suffix = ""): string {
  return `/api/clusters/${encodeURIComponent(clusterName)}${suffix}`;
}

// ---------------------------------------------------------------------------
// Handlers
// ---------------------------------------------------------------------------

export async function handleReconcileCluster(
  client: PodClusterApiClient,
  params: ReconcileClusterRequest & { clusterName: string },
): Promise<CallToolResult> {
  const { clusterName, ...body } = params;
  return apiResult(await client.post(clusterPath(clusterName, "/reconcile"), body));
}

export async function handleGetClusterInfo(
  client: PodClusterApiClient,
  params: { clusterName: string },
): Promise<CallToolResult> {
  return apiResult(await client.get(clusterPath(params.clusterName)));
}

export async function handleGetClusterStatus(
  client: PodClusterApiClient,
  params: { clusterName: string },
): Promise<CallToolResult> {
  return apiResult(await client.get(clusterPath(params.clusterName, "/status")));
}

export async function handleTerminateCluster(
  client: PodClusterApiClient,
  params: { clusterName: string; workerOnly?: boolean },
): Promise<CallToolResult> {
  return apiResult(
    await client.delete(clusterPath(params.clusterName), { workerOnly: params.workerOnly }),
  );
}

// ---------------------------------------------------------------------------
// Registration
// ---------------------------------------------------------------------------

const clusterName = z.string().describe("Cluster name (lowercase letters, digits, hyphens)");

export function registerClusterTools(
  server: McpServer,
  client: PodClusterApiClient,
): void {
  server.registerTool("reconcile_cluster", {
    description:
      "Bring a cluster to the target number of active pods, launching the head first " +
      "when none exists. Blocks until every pod is active.",
    inputSchema: {
      clusterName,
      targetCount: z.number().int().positive().describe("Desired number of active pods"),
      instanceType: z
        .string()
        .describe("Catalog instance type, e.g. datacrunch__1xH100_80GB__30__120"),
      region: z
        .string()
        .optional()
        .describe('"{country} - {dataCenterId}"; omit for any location'),
      diskSize: z.number().int().positive().optional().describe("Disk size in GB (default 120)"),
    },
  }, async (params) => handleReconcileCluster(client, params));

  server.registerTool("get_cluster_info", {
    description: "SSH connection info for every active pod of a cluster",
    inputSchema: { clusterName },
  }, async (params) => handleGetClusterInfo(client, params));

  server.registerTool("get_cluster_status", {
    description: "Canonical status (INIT, UP, STOPPED) of each pod in a cluster",
    inputSchema: { clusterName },
  }, async (params) => handleGetClusterStatus(client, params));

  server.registerTool("terminate_cluster", {
    description: "Delete every pod of a cluster, or only the workers",
    inputSchema: {
      clusterName,
      workerOnly: z.boolean().optional().describe("Keep the head pod"),
    },
  }, async (params) => handleTerminateCluster(client, params));
}
