import fsp from "node:fs/promises";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import type { InstanceTypeSpec } from "@podcluster/shared";
import { ValidationError } from "../errors.js";

export const CPU_NODE = "CPU_NODE";

const catalogFileSchema = z.object({
  instanceTypes: z.array(
    z.object({
      instanceType: z.string().min(1),
      upstreamCloudId: z.string().min(1),
    }),
  ),
});

type ParsedInstanceType = Omit<InstanceTypeSpec, "upstreamCloudId">;

/**
 * Parse `"{provider}__{gpuSpec}__..."`. `gpuSpec` is either `CPU_NODE`
 * (counted as one unit) or `"{count}x{gpuType}"`.
 */
export function parseInstanceType(name: string): ParsedInstanceType {
  const [provider, gpuSpec] = name.split("__");
  if (!provider || !gpuSpec) {
    throw new ValidationError(
      `Malformed instance type "${name}": expected "{provider}__{gpuSpec}__..."`,
    );
  }

  if (gpuSpec.includes(CPU_NODE)) {
    return { name, provider, gpuType: CPU_NODE, gpuCount: 1 };
  }

  const sep = gpuSpec.indexOf("x");
  const count = sep > 0 ? Number(gpuSpec.slice(0, sep)) : Number.NaN;
  const gpuType = gpuSpec.slice(sep + 1);
  if (!Number.isInteger(count) || count < 1 || sep < 0 || !gpuType) {
    throw new ValidationError(
      `Malformed GPU spec "${gpuSpec}" in instance type "${name}": expected "{count}x{gpuType}" or ${CPU_NODE}`,
    );
  }
  return { name, provider, gpuType, gpuCount: count };
}

/**
 * Read-only instance type lookup, built once at startup and passed to the
 * launch path.
 */
export class InstanceTypeCatalog {
  private readonly byName: ReadonlyMap<string, InstanceTypeSpec>;

  constructor(entries: Array<{ instanceType: string; upstreamCloudId: string }>) {
    const byName = new Map<string, InstanceTypeSpec>();
    for (const entry of entries) {
      byName.set(entry.instanceType, {
        ...parseInstanceType(entry.instanceType),
        upstreamCloudId: entry.upstreamCloudId,
      });
    }
    this.byName = byName;
  }

  resolve(instanceType: string): InstanceTypeSpec | null {
    return this.byName.get(instanceType) ?? null;
  }

  has(instanceType: string): boolean {
    return this.byName.has(instanceType);
  }

  instanceTypes(): InstanceTypeSpec[] {
    return [...this.byName.values()];
  }
}

export async function loadInstanceCatalog(catalogPath: string): Promise<InstanceTypeCatalog> {
  const raw = await fsp.readFile(catalogPath, "utf-8");
  const result = catalogFileSchema.safeParse(parseYaml(raw));
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ValidationError(
      `Invalid instance catalog ${catalogPath}: ${issue ? `${issue.path.join(".")}: ${issue.message}` : "schema mismatch"}`,
    );
  }
  return new InstanceTypeCatalog(result.data.instanceTypes);
}
