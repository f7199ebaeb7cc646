import { describe, it } from "node:test";
import assert from "node:assert/strict";
import type { ApiResult, PodClusterApiClient, Query } from "../http-client.js";
import {
  handleGetClusterInfo,
  handleGetClusterStatus,
  handleReconcileCluster,
  handleTerminateCluster,
} from "../tools/cluster-tools.js";

// ---------------------------------------------------------------------------
// Recording client
// ---------------------------------------------------------------------------

interface Call {
  method: "get" | "post" | "delete";
  path: string;
  payload?: unknown;
}

function recordingClient(result: ApiResult): { client: PodClusterApiClient; calls: Call[] } {
  const calls: Call[] = [];
  const client: PodClusterApiClient = {
    get: async (path: string, query?: Query) => {
      calls.push({ method: "get", path, payload: query });
      return result;
    },
    post: async (path: string, body: unknown) => {
      calls.push({ method: "post", path, payload: body });
      return result;
    },
    delete: async (path: string, query?: Query) => {
      calls.push({ method: "delete", path, payload: query });
      return result;
    },
  };
  return { client, calls };
}

function okResult(data: unknown): ApiResult {
  return { ok: true, data, status: 200 };
}

function textOf(result: { content: Array<{ text: string }> }): string {
  return result.content[0].text;
}

// ---------------------------------------------------------------------------
// Cluster tools
// ---------------------------------------------------------------------------

describe("handleReconcileCluster", () => {
  it("posts the request body without the cluster name", async () => {
    const record = {
      providerName: "primeintellect",
      clusterName: "train",
      region: "PLACEHOLDER",
      zone: null,
      headInstanceId: "pod-1",
      resumedInstanceIds: [],
      createdInstanceIds: ["pod-1", "pod-2"],
    };
    const { client, calls } = recordingClient(okResult(record));

    const result = await handleReconcileCluster(client, {
      clusterName: "train",
      targetCount: 2,
      instanceType: "datacrunch__1xH100_80GB__30__120",
    });

    assert.deepEqual(calls, [
      {
        method: "post",
        path: "/api/clusters/train/reconcile",
        payload: { targetCount: 2, instanceType: "datacrunch__1xH100_80GB__30__120" },
      },
    ]);
    assert.equal(result.isError, undefined);
    assert.deepEqual(JSON.parse(textOf(result)), record);
  });

  it("returns an error result when the server rejects the request", async () => {
    const { client } = recordingClient({
      ok: false,
      error: "Cluster train already has 3 nodes, but 2 are required",
      status: 409,
    });

    const result = await handleReconcileCluster(client, {
      clusterName: "train",
      targetCount: 2,
      instanceType: "datacrunch__1xH100_80GB__30__120",
    });

    assert.equal(result.isError, true);
    assert.equal(textOf(result), "Error: Cluster train already has 3 nodes, but 2 are required");
  });
});

describe("handleGetClusterInfo", () => {
  it("escapes the cluster name in the path", async () => {
    const { client, calls } = recordingClient(okResult({ instances: {} }));

    await handleGetClusterInfo(client, { clusterName: "a/b" });

    assert.equal(calls[0].path, "/api/clusters/a%2Fb");
  });
});

describe("handleGetClusterStatus", () => {
  it("reads the status route", async () => {
    const { client, calls } = recordingClient(
      okResult({ clusterName: "train", statuses: { "pod-1": "INIT" } }),
    );

    const result = await handleGetClusterStatus(client, { clusterName: "train" });

    assert.equal(calls[0].method, "get");
    assert.equal(calls[0].path, "/api/clusters/train/status");
    assert.deepEqual(JSON.parse(textOf(result)).statuses, { "pod-1": "INIT" });
  });
});

describe("handleTerminateCluster", () => {
  it("passes workerOnly as a query parameter", async () => {
    const { client, calls } = recordingClient(
      okResult({ clusterName: "train", terminatedInstanceIds: ["pod-2"] }),
    );

    await handleTerminateCluster(client, { clusterName: "train", workerOnly: true });

    assert.deepEqual(calls, [
      { method: "delete", path: "/api/clusters/train", payload: { workerOnly: true } },
    ]);
  });
});
