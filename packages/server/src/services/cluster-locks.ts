import { ClusterBusyError } from "../errors.js";

/**
 * Per-cluster mutual exclusion within this process. Role assignment relies on
 * a single writer per cluster name; different clusters never block each other.
 */
export class ClusterLocks {
  private held = new Map<string, string>();

  async withLock<T>(clusterName: string, operation: string, fn: () => Promise<T>): Promise<T> {
    const current = this.held.get(clusterName);
    if (current !== undefined) {
      throw new ClusterBusyError(clusterName, current);
    }
    this.held.set(clusterName, operation);
    try {
      return await fn();
    } finally {
      this.held.delete(clusterName);
    }
  }
}
