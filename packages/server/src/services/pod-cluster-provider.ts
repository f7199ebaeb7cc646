import type { FastifyBaseLogger } from "fastify";
import type {
  CanonicalStatus,
  ClusterInfo,
  CredentialsCheckResponse,
  InstanceTypeSpec,
  NodeConfig,
  ProvisionRecord,
  SshKeyResponse,
} from "@podcluster/shared";
import { PodApiError } from "../errors.js";
import type { ClusterProvider, ProviderFeature } from "./cluster-provider.js";
import { ClusterInfoAssembler } from "./cluster-info-assembler.js";
import { ClusterReconciler, PROVIDER_NAME } from "./cluster-reconciler.js";
import { ClusterStatusService } from "./cluster-status.js";
import type { InstanceTypeCatalog } from "./instance-catalog.js";
import { InstanceDirectory } from "./instance-directory.js";
import type { PodApiClient } from "./pod-api-client.js";
import type { Sleep } from "./poller.js";

const UNSUPPORTED_FEATURES: Record<ProviderFeature, string> = {
  stop: "Stopping is not supported by the pods API.",
  autostop: "Autostop requires stopping, which the pods API does not support.",
  spot: "The pods API does not offer spot instances.",
};

export interface PodClusterProviderOptions {
  client: PodApiClient;
  catalog: InstanceTypeCatalog;
  log: FastifyBaseLogger;
  sleep?: Sleep;
}

/** The pods API behind the {@link ClusterProvider} operations. */
export class PodClusterProvider implements ClusterProvider {
  readonly name = PROVIDER_NAME;
  readonly unsupportedFeatures = UNSUPPORTED_FEATURES;

  private client: PodApiClient;
  private catalog: InstanceTypeCatalog;
  private log: FastifyBaseLogger;
  private reconciler: ClusterReconciler;
  private assembler: ClusterInfoAssembler;
  private status: ClusterStatusService;

  constructor(options: PodClusterProviderOptions) {
    this.client = options.client;
    this.catalog = options.catalog;
    this.log = options.log;

    const directory = new InstanceDirectory(options.client);
    this.reconciler = new ClusterReconciler({
      client: options.client,
      directory,
      catalog: options.catalog,
      log: options.log,
      sleep: options.sleep,
    });
    this.assembler = new ClusterInfoAssembler({
      directory,
      log: options.log,
      sleep: options.sleep,
    });
    this.status = new ClusterStatusService(options.client, directory, options.log);
  }

  async runInstances(
    region: string,
    clusterName: string,
    count: number,
    nodeConfig: NodeConfig,
  ): Promise<ProvisionRecord> {
    return this.reconciler.reconcile(clusterName, count, nodeConfig, region);
  }

  // runInstances already waits for every instance to become active.
  async waitInstances(_clusterName: string): Promise<void> {}

  async getClusterInfo(
    clusterName: string,
    providerConfig: Record<string, unknown> | null = null,
  ): Promise<ClusterInfo> {
    return this.assembler.assemble(clusterName, providerConfig);
  }

  async queryInstances(clusterName: string): Promise<Record<string, CanonicalStatus>> {
    return this.status.query(clusterName);
  }

  async terminateInstances(clusterName: string, workerOnly = false): Promise<string[]> {
    return this.status.terminate(clusterName, workerOnly);
  }

  async stopInstances(_clusterName: string): Promise<never> {
    return this.status.stop();
  }

  async resumeInstances(_clusterName: string): Promise<never> {
    return this.status.resume();
  }

  // The pods API exposes no firewall rules.
  async cleanupPorts(_clusterName: string, _ports: string[]): Promise<void> {}

  async checkCredentials(): Promise<CredentialsCheckResponse> {
    try {
      await this.client.listPods();
      return { ok: true };
    } catch (err) {
      if (err instanceof PodApiError && (err.status === 401 || err.status === 403)) {
        this.log.warn({ status: err.status }, "Pods API rejected credentials");
        return {
          ok: false,
          reason:
            "The API key was rejected. Check that it has pod permissions, " +
            "or generate a new one in the provider dashboard.",
        };
      }
      throw err;
    }
  }

  async registerSshKey(publicKey: string): Promise<SshKeyResponse> {
    return this.client.getOrAddSshKey(publicKey);
  }

  instanceTypes(): InstanceTypeSpec[] {
    return this.catalog.instanceTypes();
  }
}
