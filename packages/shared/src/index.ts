export { POD_STATUSES } from "./instances.js";
export type {
  PodStatus,
  CanonicalStatus,
  NodeRole,
  Instance,
  InstanceTypeSpec,
  NodeConfig,
} from "./instances.js";
export type {
  ProvisionRecord,
  ConnectionInfo,
  ClusterInfo,
  ReconcileClusterRequest,
  ClusterStatusResponse,
  TerminateClusterResponse,
  CredentialsCheckResponse,
  RegisterSshKeyRequest,
  SshKeyResponse,
  CatalogResponse,
  ProviderInfoResponse,
  ErrorResponse,
} from "./clusters.js";
