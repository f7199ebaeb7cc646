// ── Pod status enums ─────────────────────────────────────────────────

export const POD_STATUSES = [
  "PROVISIONING",
  "PENDING",
  "ACTIVE",
  "STOPPED",
  "ERROR",
  "DELETING",
  "TERMINATED",
] as const;

export type PodStatus = (typeof POD_STATUSES)[number];

/** Cluster status understood by callers; coarser than {@link PodStatus}. */
export type CanonicalStatus = "INIT" | "UP" | "STOPPED";

export type NodeRole = "head" | "worker";

// ── Instance record ──────────────────────────────────────────────────

/**
 * A pod as seen by the cluster services. Role is carried only by the name:
 * `{clusterName}-head` or `{clusterName}-worker`.
 */
export interface Instance {
  id: string;
  name: string;
  status: PodStatus;
  externalIp: string | null;
  /** `"user@host -p port"` or `"user@host"`; null until the SSH gateway is up. */
  sshConnection: string | null;
  providerType: string;
}

/** Parsed `"{provider}__{gpuSpec}__..."` instance type. */
export interface InstanceTypeSpec {
  name: string;
  provider: string;
  gpuType: string;
  gpuCount: number;
  upstreamCloudId: string;
}

export interface NodeConfig {
  instanceType: string;
  diskSize?: number;
}
