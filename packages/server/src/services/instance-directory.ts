import type { Instance, PodStatus } from "@podcluster/shared";
import type { PodApiClient } from "./pod-api-client.js";

export function headInstanceName(clusterName: string): string {
  return `${clusterName}-head`;
}

export function workerInstanceName(clusterName: string): string {
  return `${clusterName}-worker`;
}

export function isHeadInstance(instance: Pick<Instance, "name">): boolean {
  return instance.name.endsWith("-head");
}

/** Id of the first instance whose name marks it as the head, if any. */
export function findHeadInstanceId(instances: Map<string, Instance>): string | null {
  for (const [id, instance] of instances) {
    if (isHeadInstance(instance)) return id;
  }
  return null;
}

/**
 * Point-in-time view of the pods belonging to a cluster. The provider has no
 * cluster primitive, so membership is decided purely by pod name.
 */
export class InstanceDirectory {
  constructor(private client: PodApiClient) {}

  async list(
    clusterName: string,
    statusFilter?: readonly PodStatus[],
  ): Promise<Map<string, Instance>> {
    const names = new Set([headInstanceName(clusterName), workerInstanceName(clusterName)]);
    const pods = await this.client.listPods();

    const matched = new Map<string, Instance>();
    for (const pod of pods) {
      if (pod.name === null || !names.has(pod.name)) continue;
      const instance = this.client.toInstance(pod);
      if (statusFilter && !statusFilter.includes(instance.status)) continue;
      matched.set(instance.id, instance);
    }
    return matched;
  }

  async get(instanceId: string): Promise<Instance> {
    return this.client.getPod(instanceId);
  }
}
