import type {
  CanonicalStatus,
  ClusterInfo,
  CredentialsCheckResponse,
  InstanceTypeSpec,
  NodeConfig,
  ProvisionRecord,
  SshKeyResponse,
} from "@podcluster/shared";

export type ProviderFeature = "stop" | "autostop" | "spot";

export interface ClusterProvider {
  readonly name: string;
  readonly unsupportedFeatures: Readonly<Partial<Record<ProviderFeature, string>>>;

  runInstances(
    region: string,
    clusterName: string,
    count: number,
    nodeConfig: NodeConfig,
  ): Promise<ProvisionRecord>;
  waitInstances(clusterName: string): Promise<void>;
  getClusterInfo(
    clusterName: string,
    providerConfig?: Record<string, unknown> | null,
  ): Promise<ClusterInfo>;
  queryInstances(clusterName: string): Promise<Record<string, CanonicalStatus>>;
  terminateInstances(clusterName: string, workerOnly?: boolean): Promise<string[]>;
  stopInstances(clusterName: string): Promise<never>;
  resumeInstances(clusterName: string): Promise<never>;
  cleanupPorts(clusterName: string, ports: string[]): Promise<void>;
  checkCredentials(): Promise<CredentialsCheckResponse>;
  registerSshKey(publicKey: string): Promise<SshKeyResponse>;
  instanceTypes(): InstanceTypeSpec[];
}
