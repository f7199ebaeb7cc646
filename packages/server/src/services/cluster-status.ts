import type { FastifyBaseLogger } from "fastify";
import type { CanonicalStatus, PodStatus } from "@podcluster/shared";
import { TerminationError, UnsupportedOperationError } from "../errors.js";
import type { PodApiClient } from "./pod-api-client.js";
import { isHeadInstance, type InstanceDirectory } from "./instance-directory.js";

// PROVISIONING is a pre-ACTIVE state, same as PENDING.
export const CANONICAL_STATUS: Record<PodStatus, CanonicalStatus> = {
  PROVISIONING: "INIT",
  PENDING: "INIT",
  ERROR: "INIT",
  DELETING: "INIT",
  ACTIVE: "UP",
  STOPPED: "STOPPED",
  TERMINATED: "STOPPED",
};

export class ClusterStatusService {
  constructor(
    private client: PodApiClient,
    private directory: InstanceDirectory,
    private log: FastifyBaseLogger,
  ) {}

  async query(clusterName: string): Promise<Record<string, CanonicalStatus>> {
    const instances = await this.directory.list(clusterName);
    const statuses: Record<string, CanonicalStatus> = {};
    for (const [id, instance] of instances) {
      statuses[id] = CANONICAL_STATUS[instance.status];
    }
    return statuses;
  }

  /**
   * Delete every pod of the cluster (or only the workers). Stops at the first
   * failed deletion; callers retry the whole call.
   */
  async terminate(clusterName: string, workerOnly = false): Promise<string[]> {
    const instances = await this.directory.list(clusterName);
    const terminated: string[] = [];

    for (const [id, instance] of instances) {
      if (workerOnly && isHeadInstance(instance)) continue;
      this.log.debug({ clusterName, instanceId: id }, "Terminating instance");
      try {
        await this.client.deletePod(id);
      } catch (err) {
        throw new TerminationError(id, err);
      }
      terminated.push(id);
    }

    this.log.info({ clusterName, workerOnly, terminated }, "Terminated cluster instances");
    return terminated;
  }

  stop(): never {
    throw new UnsupportedOperationError("Stopping instances");
  }

  resume(): never {
    throw new UnsupportedOperationError("Resuming instances");
  }
}
