import type { FastifyBaseLogger } from "fastify";
import type { ClusterInfo, ConnectionInfo, Instance } from "@podcluster/shared";
import { ReadinessTimeoutError } from "../errors.js";
import { isHeadInstance, type InstanceDirectory } from "./instance-directory.js";
import { pollUntil, realSleep, type Sleep } from "./poller.js";
import { PROVIDER_NAME } from "./cluster-reconciler.js";

export const SSH_RETRY_INTERVAL_MS = 10_000;
export const SSH_MAX_RETRIES = 6;
const DEFAULT_SSH_PORT = 22;
const PORT_MARKER = " -p ";

export interface SshEndpoint {
  user: string;
  host: string;
  port: number;
}

/** Parse `"user@host -p 2222"` or `"user@host"` (port 22). */
export function parseSshConnection(connection: string): SshEndpoint {
  const markerAt = connection.indexOf(PORT_MARKER);
  const target = markerAt >= 0 ? connection.slice(0, markerAt) : connection;
  const port =
    markerAt >= 0
      ? Number.parseInt(connection.slice(markerAt + PORT_MARKER.length).trim(), 10)
      : DEFAULT_SSH_PORT;

  const at = target.indexOf("@");
  return {
    user: (at >= 0 ? target.slice(0, at) : target).trim(),
    host: (at >= 0 ? target.slice(at + 1) : "").trim(),
    port: Number.isNaN(port) ? DEFAULT_SSH_PORT : port,
  };
}

export interface ClusterInfoAssemblerOptions {
  directory: InstanceDirectory;
  log: FastifyBaseLogger;
  sleep?: Sleep;
  retryIntervalMs?: number;
  maxRetries?: number;
}

/**
 * Turns ACTIVE pods into connection records. A pod reports ACTIVE before its
 * SSH gateway exists, so pods without an endpoint are re-read until one
 * appears. One unreachable pod fails the whole assembly.
 */
export class ClusterInfoAssembler {
  private directory: InstanceDirectory;
  private log: FastifyBaseLogger;
  private sleep: Sleep;
  private retryIntervalMs: number;
  private maxRetries: number;

  constructor(options: ClusterInfoAssemblerOptions) {
    this.directory = options.directory;
    this.log = options.log;
    this.sleep = options.sleep ?? realSleep;
    this.retryIntervalMs = options.retryIntervalMs ?? SSH_RETRY_INTERVAL_MS;
    this.maxRetries = options.maxRetries ?? SSH_MAX_RETRIES;
  }

  async assemble(
    clusterName: string,
    providerConfig: Record<string, unknown> | null = null,
  ): Promise<ClusterInfo> {
    const running = await this.directory.list(clusterName, ["ACTIVE"]);

    const instances: Record<string, ConnectionInfo[]> = {};
    let headInstanceId: string | null = null;
    let sshUser: string | null = null;

    for (const [instanceId, listed] of running) {
      const { instance, connection } = await this.waitForSsh(listed);
      const endpoint = parseSshConnection(connection);

      instances[instanceId] = [
        {
          instanceId,
          internalIp: "NOT_SUPPORTED",
          externalIp: instance.externalIp,
          sshPort: endpoint.port,
          tags: { provider: instance.providerType },
        },
      ];

      if (isHeadInstance(instance)) {
        headInstanceId = instanceId;
        sshUser = endpoint.user;
      }
    }

    return {
      instances,
      headInstanceId,
      providerName: PROVIDER_NAME,
      providerConfig,
      sshUser,
    };
  }

  private async waitForSsh(
    listed: Instance,
  ): Promise<{ instance: Instance; connection: string }> {
    // The first probe is the listing itself; later ones re-read the pod.
    let reads = 0;
    const outcome = await pollUntil<Instance>({
      probe: async () => {
        if (reads++ === 0) return listed;
        return this.directory.get(listed.id);
      },
      isDone: (instance) => instance.sshConnection !== null,
      intervalMs: this.retryIntervalMs,
      maxAttempts: this.maxRetries + 1,
      sleep: this.sleep,
      onWait: (instance, attempt) =>
        this.log.info(
          { instanceId: instance.id, name: instance.name, attempt, maxRetries: this.maxRetries },
          "SSH endpoint not ready, waiting",
        ),
    });

    const connection = outcome.value.sshConnection;
    if (outcome.status === "exhausted" || connection === null) {
      throw new ReadinessTimeoutError(listed.id, listed.name, this.maxRetries);
    }
    if (outcome.attempts > 1) {
      this.log.info({ instanceId: listed.id, attempts: outcome.attempts }, "SSH endpoint ready");
    }
    return { instance: outcome.value, connection };
  }
}
