import { z } from "zod";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { RegisterSshKeyRequest } from "@podcluster/shared";
import type { PodClusterApiClient } from "../http-client.js";
import { apiResult, type CallToolResult } from "../tool-result.js";

export async function handleCheckCredentials(
  client: PodClusterApiClient,
): Promise<CallToolResult> {
  return apiResult(await client.get("/api/credentials/check"));
}

export async function handleListInstanceTypes(
  client: PodClusterApiClient,
): Promise<CallToolResult> {
  return apiResult(await client.get("/api/catalog"));
}

export async function handleRegisterSshKey(
  client: PodClusterApiClient,
  params: RegisterSshKeyRequest,
): Promise<CallToolResult> {
  return apiResult(await client.post("/api/ssh-keys", { publicKey: params.publicKey } satisfies RegisterSshKeyRequest));
}

export function registerAccountTools(
  server: McpServer,
  client: PodClusterApiClient,
): void {
  server.registerTool("check_credentials", {
    description: "Check that the server's pods API key is accepted",
    inputSchema: {},
  }, async () => handleCheckCredentials(client));

  server.registerTool("list_instance_types", {
    description: "Instance types the server can launch",
    inputSchema: {},
  }, async () => handleListInstanceTypes(client));

  server.registerTool("register_ssh_key", {
    description: "Register an OpenSSH public key with the pods API unless already present",
    inputSchema: {
      publicKey: z.string().describe('"<type> <base64> [comment]"'),
    },
  }, async (params) => handleRegisterSshKey(client, params));
}
