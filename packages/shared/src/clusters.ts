import type { CanonicalStatus, InstanceTypeSpec } from "./instances.js";

// ── Reconciliation output ────────────────────────────────────────────

export interface ProvisionRecord {
  providerName: string;
  clusterName: string;
  region: string;
  /** The provider has no zones. */
  zone: null;
  headInstanceId: string;
  resumedInstanceIds: string[];
  createdInstanceIds: string[];
}

// ── Connection info ──────────────────────────────────────────────────

export interface ConnectionInfo {
  instanceId: string;
  internalIp: "NOT_SUPPORTED";
  externalIp: string | null;
  sshPort: number;
  tags: Record<string, string>;
}

export interface ClusterInfo {
  instances: Record<string, ConnectionInfo[]>;
  headInstanceId: string | null;
  providerName: string;
  providerConfig: Record<string, unknown> | null;
  sshUser: string | null;
}

// ── API request/response types ───────────────────────────────────────

/** POST /api/clusters/:clusterName/reconcile */
export interface ReconcileClusterRequest {
  targetCount: number;
  instanceType: string;
  region?: string;
  diskSize?: number;
}

/** GET /api/clusters/:clusterName/status */
export interface ClusterStatusResponse {
  clusterName: string;
  statuses: Record<string, CanonicalStatus>;
}

/** DELETE /api/clusters/:clusterName */
export interface TerminateClusterResponse {
  clusterName: string;
  terminatedInstanceIds: string[];
}

/** GET /api/credentials/check */
export interface CredentialsCheckResponse {
  ok: boolean;
  reason?: string;
}

/** POST /api/ssh-keys */
export interface RegisterSshKeyRequest {
  publicKey: string;
}

export interface SshKeyResponse {
  name: string;
  publicKey: string;
}

/** GET /api/catalog */
export interface CatalogResponse {
  instanceTypes: InstanceTypeSpec[];
}

export interface ErrorResponse {
  error: string;
}

/** GET /api/provider */
export interface ProviderInfoResponse {
  name: string;
  /** Feature → reason it cannot be offered. */
  unsupportedFeatures: Partial<Record<string, string>>;
}
