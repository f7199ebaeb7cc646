import type { FastifyBaseLogger } from "fastify";
import type {
  Instance,
  InstanceTypeSpec,
  NodeConfig,
  NodeRole,
  PodStatus,
  ProvisionRecord,
} from "@podcluster/shared";
import { CapacityError, ValidationError } from "../errors.js";
import type { PodApiClient } from "./pod-api-client.js";
import type { InstanceTypeCatalog } from "./instance-catalog.js";
import {
  findHeadInstanceId,
  headInstanceName,
  workerInstanceName,
  type InstanceDirectory,
} from "./instance-directory.js";
import { pollUntil, realSleep, type Sleep } from "./poller.js";

export const PROVIDER_NAME = "primeintellect";
export const POLL_INTERVAL_MS = 5_000;
const MAX_POLLS = 60_000 / POLL_INTERVAL_MS;
// Provisioning is much slower than a status poll.
export const MAX_CONVERGE_POLLS = MAX_POLLS * 16;
export const DEFAULT_DISK_SIZE_GB = 120;

/** Region sentinel meaning "no country or datacenter constraint". */
export const ANY_REGION = "PLACEHOLDER";

const PENDING_STATUSES: readonly PodStatus[] = ["PROVISIONING", "PENDING"];
const ACTIVE_STATUSES: readonly PodStatus[] = ["ACTIVE"];

export interface RegionConstraint {
  country: string | null;
  dataCenterId: string | null;
}

/** `"{country} - {dataCenterId}"`, split at the first separator only. */
export function parseRegion(region: string): RegionConstraint {
  if (region === ANY_REGION) {
    return { country: null, dataCenterId: null };
  }
  const sep = region.indexOf(" - ");
  if (sep < 0) {
    return { country: region, dataCenterId: "" };
  }
  return { country: region.slice(0, sep), dataCenterId: region.slice(sep + 3) };
}

export interface ClusterReconcilerOptions {
  client: PodApiClient;
  directory: InstanceDirectory;
  catalog: InstanceTypeCatalog;
  log: FastifyBaseLogger;
  sleep?: Sleep;
  pollIntervalMs?: number;
  maxConvergePolls?: number;
}

/**
 * Brings a named cluster to a target number of ACTIVE pods. Pods are created
 * one at a time; the first one launched for a cluster without a head becomes
 * the head. Surplus pods are never deleted here.
 */
export class ClusterReconciler {
  private client: PodApiClient;
  private directory: InstanceDirectory;
  private catalog: InstanceTypeCatalog;
  private log: FastifyBaseLogger;
  private sleep: Sleep;
  private pollIntervalMs: number;
  private maxConvergePolls: number;

  constructor(options: ClusterReconcilerOptions) {
    this.client = options.client;
    this.directory = options.directory;
    this.catalog = options.catalog;
    this.log = options.log;
    this.sleep = options.sleep ?? realSleep;
    this.pollIntervalMs = options.pollIntervalMs ?? POLL_INTERVAL_MS;
    this.maxConvergePolls = options.maxConvergePolls ?? MAX_CONVERGE_POLLS;
  }

  async reconcile(
    clusterName: string,
    targetCount: number,
    nodeConfig: NodeConfig,
    region: string,
  ): Promise<ProvisionRecord> {
    if (!Number.isInteger(targetCount) || targetCount < 1) {
      throw new ValidationError(`targetCount must be a positive integer, got ${targetCount}`);
    }
    const spec = this.catalog.resolve(nodeConfig.instanceType);
    if (!spec) {
      throw new ValidationError(`Unknown instance type "${nodeConfig.instanceType}"`);
    }

    const resumed = await this.directory.list(clusterName, PENDING_STATUSES);
    await this.drainPending(clusterName);

    const pending = await this.directory.list(clusterName, PENDING_STATUSES);
    if (pending.size > targetCount) {
      throw this.overCapacity(clusterName, pending.size, targetCount);
    }

    const active = await this.directory.list(clusterName, ACTIVE_STATUSES);
    // No head-named pod survived: adopt any active one. The provider cannot
    // rename pods, so the name stays as it is.
    let headInstanceId = findHeadInstanceId(active) ?? (active.size > 0 ? firstKey(active) : null);
    const toStart = targetCount - active.size;

    if (toStart < 0) {
      throw this.overCapacity(clusterName, active.size, targetCount);
    }

    if (toStart === 0) {
      this.log.info(
        { clusterName, existing: active.size },
        "Cluster already at target size, nothing to launch",
      );
      return this.record(
        clusterName,
        region,
        headInstanceId ?? firstKey(active),
        [...resumed.keys()],
        [],
      );
    }

    const createdInstanceIds: string[] = [];
    for (let i = 0; i < toStart; i++) {
      const role: NodeRole = headInstanceId === null ? "head" : "worker";
      const instanceId = await this.launch(clusterName, role, spec, nodeConfig, region);
      createdInstanceIds.push(instanceId);
      if (headInstanceId === null) {
        headInstanceId = instanceId;
      }
    }

    const outcome = await pollUntil({
      probe: () => this.directory.list(clusterName, ACTIVE_STATUSES),
      isDone: (instances) => instances.size === targetCount,
      intervalMs: this.pollIntervalMs,
      maxAttempts: this.maxConvergePolls,
      sleep: this.sleep,
      onWait: (instances) =>
        this.log.info(
          { clusterName, active: instances.size, target: targetCount },
          "Waiting for instances to become active",
        ),
    });

    if (outcome.status === "exhausted") {
      this.log.warn(
        { clusterName, active: outcome.value.size, target: targetCount, polls: outcome.attempts },
        "Instances did not become active",
      );
      throw new CapacityError(
        clusterName,
        outcome.value.size,
        targetCount,
        `Failed to bring cluster ${clusterName} to ${targetCount} active instances ` +
          `after ${outcome.attempts} polls (${outcome.value.size} active); likely a capacity issue`,
      );
    }

    return this.record(
      clusterName,
      region,
      headInstanceId ?? firstKey(outcome.value),
      [],
      createdInstanceIds,
    );
  }

  /** Blocks, without a deadline, until no pod of the cluster is still being created. */
  private async drainPending(clusterName: string): Promise<void> {
    await pollUntil({
      probe: () => this.directory.list(clusterName, PENDING_STATUSES),
      isDone: (instances) => instances.size === 0,
      intervalMs: this.pollIntervalMs,
      sleep: this.sleep,
      onWait: (instances) =>
        this.log.info(
          {
            clusterName,
            pending: instances.size,
            statuses: [...instances.values()].map((i) => i.status),
          },
          "Waiting for pending instances to settle",
        ),
    });
  }

  private async launch(
    clusterName: string,
    role: NodeRole,
    spec: InstanceTypeSpec,
    nodeConfig: NodeConfig,
    region: string,
  ): Promise<string> {
    const { country, dataCenterId } = parseRegion(region);
    const name = role === "head" ? headInstanceName(clusterName) : workerInstanceName(clusterName);

    try {
      const instanceId = await this.client.createPod({
        name,
        cloudId: spec.upstreamCloudId,
        gpuType: spec.gpuType,
        gpuCount: spec.gpuCount,
        diskSize: nodeConfig.diskSize ?? DEFAULT_DISK_SIZE_GB,
        country,
        dataCenterId,
        providerType: spec.provider,
      });
      this.log.info({ clusterName, instanceId, role }, "Launched instance");
      return instanceId;
    } catch (err) {
      this.log.warn({ err, clusterName, role }, "Instance launch failed");
      throw err;
    }
  }

  private overCapacity(clusterName: string, observed: number, desired: number): CapacityError {
    return new CapacityError(
      clusterName,
      observed,
      desired,
      `Cluster ${clusterName} already has ${observed} nodes, but ${desired} are required`,
    );
  }

  private record(
    clusterName: string,
    region: string,
    headInstanceId: string,
    resumedInstanceIds: string[],
    createdInstanceIds: string[],
  ): ProvisionRecord {
    return {
      providerName: PROVIDER_NAME,
      clusterName,
      region,
      zone: null,
      headInstanceId,
      resumedInstanceIds,
      createdInstanceIds,
    };
  }
}

function firstKey(instances: Map<string, Instance>): string {
  const first = instances.keys().next();
  if (first.done) {
    throw new Error("Expected at least one instance");
  }
  return first.value;
}
