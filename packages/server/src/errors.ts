// ---------------------------------------------------------------------------
// Error taxonomy for the pod cluster services. The error handler plugin maps
// each class to an HTTP status.
// ---------------------------------------------------------------------------

/** Non-2xx response from the pods API (including an exhausted 429 budget). */
export class PodApiError extends Error {
  readonly method: string;
  readonly url: string;
  readonly status: number;
  readonly reason: string;

  constructor(method: string, url: string, status: number, reason: string) {
    super(`API request failed: ${method.toUpperCase()} ${url}: ${status} ${reason}`);
    this.name = "PodApiError";
    this.method = method;
    this.url = url;
    this.status = status;
    this.reason = reason;
  }
}

/** The cluster cannot be brought to (or already exceeds) the target size. */
export class CapacityError extends Error {
  readonly clusterName: string;
  readonly observed: number;
  readonly desired: number;

  constructor(clusterName: string, observed: number, desired: number, message: string) {
    super(message);
    this.name = "CapacityError";
    this.clusterName = clusterName;
    this.observed = observed;
    this.desired = desired;
  }
}

/** An ACTIVE instance never exposed an SSH endpoint. */
export class ReadinessTimeoutError extends Error {
  readonly instanceId: string;
  readonly attempts: number;

  constructor(instanceId: string, instanceName: string, attempts: number) {
    super(
      `SSH endpoint for instance ${instanceId} (${instanceName}) not ready after ${attempts} attempts`,
    );
    this.name = "ReadinessTimeoutError";
    this.instanceId = instanceId;
    this.attempts = attempts;
  }
}

/** Thrown when a mutating operation is already running for the cluster. */
export class ClusterBusyError extends Error {
  readonly clusterName: string;
  readonly operation: string;

  constructor(clusterName: string, operation: string) {
    super(`Cluster ${clusterName} is busy: ${operation} already running`);
    this.name = "ClusterBusyError";
    this.clusterName = clusterName;
    this.operation = operation;
  }
}

export class TerminationError extends Error {
  readonly instanceId: string;

  constructor(instanceId: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to terminate instance ${instanceId}: ${detail}`, { cause });
    this.name = "TerminationError";
    this.instanceId = instanceId;
  }
}

/** Stop/resume: the pods API has no such operations. */
export class UnsupportedOperationError extends Error {
  constructor(operation: string) {
    super(`${operation} is not supported by the pods API`);
    this.name = "UnsupportedOperationError";
  }
}

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

export class CredentialsError extends Error {
  readonly path: string;

  constructor(path: string, detail: string) {
    super(`Invalid pods API credentials at ${path}: ${detail}`);
    this.name = "CredentialsError";
    this.path = path;
  }
}
