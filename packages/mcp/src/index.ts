#!/usr/bin/env node

// ---------------------------------------------------------------------------
// Pod cluster MCP server: stdio transport.
// All logging goes to stderr (stdout is reserved for MCP JSON-RPC).
// ---------------------------------------------------------------------------

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { FetchPodClusterApiClient } from "./http-client.js";
import { registerClusterTools } from "./tools/cluster-tools.js";
import { registerAccountTools } from "./tools/account-tools.js";

const BASE_URL = process.env.PODCLUSTER_API_URL ?? "http://localhost:4500";
const TOKEN = process.env.PODCLUSTER_API_TOKEN;

const server = new McpServer({
  name: "podcluster",
  version: "0.1.0",
});

const client = new FetchPodClusterApiClient(BASE_URL, TOKEN);

registerClusterTools(server, client);
registerAccountTools(server, client);

const transport = new StdioServerTransport();
await server.connect(transport);

console.error(`Pod cluster MCP server running (API: ${BASE_URL})`);
