import type { z } from "zod";
import { ValidationError } from "./errors.js";

const MAX_CLUSTER_NAME_LENGTH = 120;
const CLUSTER_NAME_RE = /^[a-z0-9]([a-z0-9-]*[a-z0-9])?$/;

/** Parse `value` or throw a {@link ValidationError} naming the first issue. */
export function parseWith<S extends z.ZodTypeAny>(schema: S, value: unknown, what: string): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue?.path.length ? `${issue.path.join(".")}: ` : "";
    throw new ValidationError(`Invalid ${what}: ${field}${issue?.message ?? "schema mismatch"}`);
  }
  return result.data;
}

/**
 * Cluster names become pod names (`{name}-head`), so they are restricted to
 * lowercase alphanumerics and inner hyphens.
 */
export function parseClusterName(name: string): string {
  if (name.length > MAX_CLUSTER_NAME_LENGTH) {
    throw new ValidationError(
      `Cluster name is ${name.length} characters; the limit is ${MAX_CLUSTER_NAME_LENGTH}`,
    );
  }
  if (!CLUSTER_NAME_RE.test(name)) {
    throw new ValidationError(
      `Invalid cluster name "${name}": use lowercase letters, digits and inner hyphens`,
    );
  }
  return name;
}
