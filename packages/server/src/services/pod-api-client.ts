import { customAlphabet } from "nanoid";
import { z } from "zod";
import type { FastifyBaseLogger } from "fastify";
import { POD_STATUSES, type Instance, type PodStatus } from "@podcluster/shared";
import { PodApiError } from "../errors.js";
import { Backoff } from "./backoff.js";
import { realSleep, type Sleep } from "./poller.js";

export const DEFAULT_API_URL = "https://api.primeintellect.ai/api/v1";
export const INITIAL_BACKOFF_MS = 10_000;
export const MAX_BACKOFF_FACTOR = 10;
export const MAX_ATTEMPTS = 6;

const SSH_KEY_PREFIX = "skypilot-";
const sshKeySuffix = customAlphabet("0123456789abcdef", 8);

export type HttpMethod = "get" | "post" | "put" | "patch" | "delete";

export interface PodApiClientConfig {
  apiKey: string;
  log: FastifyBaseLogger;
  baseUrl?: string;
  maxAttempts?: number;
  sleep?: Sleep;
  random?: () => number;
  fetch?: typeof fetch;
}

export interface CreatePodRequest {
  name: string;
  cloudId: string;
  gpuType: string;
  gpuCount: number;
  diskSize: number;
  country: string | null;
  dataCenterId: string | null;
  providerType: string;
}

export interface SshKey {
  name: string;
  publicKey: string;
}

// --- Pods API response shapes ---

// Listings cover the whole account, so name and status stay loose here; only
// pods that belong to a cluster are narrowed to an Instance.
const podSchema = z.object({
  id: z.string(),
  name: z.string().nullish(),
  status: z.string(),
  ip: z.string().nullish(),
  sshConnection: z.string().nullish(),
  providerType: z.string().nullish(),
});

type Pod = z.infer<typeof podSchema>;

/** A pod as listed by the API, before its status has been checked. */
export interface PodListing {
  id: string;
  name: string | null;
  status: string;
  externalIp: string | null;
  sshConnection: string | null;
  providerType: string;
}

const podListSchema = z.object({ data: z.array(podSchema) });
const podDetailSchema = z.union([z.object({ data: podSchema }), podSchema]);
const createdPodSchema = z.object({ id: z.string() });
const sshKeyListSchema = z.object({
  data: z.array(z.object({ name: z.string(), publicKey: z.string() })),
});

function toListing(pod: Pod): PodListing {
  return {
    id: pod.id,
    name: pod.name ?? null,
    status: pod.status,
    externalIp: pod.ip ?? null,
    sshConnection: pod.sshConnection ?? null,
    providerType: pod.providerType ?? "unknown",
  };
}

function podStatusOf(status: string): PodStatus | undefined {
  return POD_STATUSES.find((known) => known === status);
}

/** First two whitespace-delimited tokens: key type and key body, no comment. */
function keyIdentity(publicKey: string): string {
  return publicKey.trim().split(/\s+/).slice(0, 2).join(" ");
}

interface RawResponse {
  url: string;
  status: number;
  data: unknown;
}

/**
 * Client for the pods REST API. Rate-limited calls (429) are retried with
 * exponential backoff; every other failure surfaces at once as a
 * {@link PodApiError}.
 */
export class PodApiClient {
  private readonly baseUrl: string;
  private readonly headers: Record<string, string>;
  private readonly log: FastifyBaseLogger;
  private readonly maxAttempts: number;
  private readonly sleep: Sleep;
  private readonly random: () => number;
  private readonly fetchImpl: typeof fetch;

  constructor(config: PodApiClientConfig) {
    if (!config.apiKey) {
      throw new Error("Pods API key is required");
    }
    this.baseUrl = (config.baseUrl ?? DEFAULT_API_URL).replace(/\/+$/, "");
    this.headers = {
      Authorization: `Bearer ${config.apiKey}`,
      "Content-Type": "application/json",
    };
    this.log = config.log;
    this.maxAttempts = config.maxAttempts ?? MAX_ATTEMPTS;
    this.sleep = config.sleep ?? realSleep;
    this.random = config.random ?? Math.random;
    this.fetchImpl = config.fetch ?? globalThis.fetch;
  }

  /**
   * Issue one API call. For `get` the body becomes query parameters. Returns
   * the parsed JSON body, or null when the body is empty.
   */
  async request(
    method: HttpMethod,
    path: string,
    body?: Record<string, unknown>,
  ): Promise<unknown> {
    const res = await this.send(method, path, body);
    return res.data;
  }

  async listPods(filters?: Record<string, string | number>): Promise<PodListing[]> {
    const res = await this.requestParsed(podListSchema, "get", "/pods", filters);
    return res.data.map(toListing);
  }

  async getPod(id: string): Promise<Instance> {
    const res = await this.requestParsed(
      podDetailSchema,
      "get",
      `/pods/${encodeURIComponent(id)}`,
    );
    return this.toInstance(toListing("data" in res ? res.data : res));
  }

  /**
   * Narrow a listed pod to an {@link Instance}. A pod without a name or with
   * a status outside {@link POD_STATUSES} is a {@link PodApiError}.
   */
  toInstance(listing: PodListing): Instance {
    const status = podStatusOf(listing.status);
    const url = `${this.baseUrl}/pods/${encodeURIComponent(listing.id)}`;
    if (listing.name === null) {
      throw new PodApiError("get", url, 200, `pod ${listing.id} has no name`);
    }
    if (status === undefined) {
      throw new PodApiError(
        "get",
        url,
        200,
        `pod ${listing.id} (${listing.name}) has unknown status "${listing.status}"`,
      );
    }
    return { ...listing, name: listing.name, status };
  }

  /** Create a pod and return its provider-assigned id. */
  async createPod(request: CreatePodRequest): Promise<string> {
    const res = await this.requestParsed(createdPodSchema, "post", "/pods", {
      pod: {
        name: request.name,
        cloudId: request.cloudId,
        socket: "PCIe",
        gpuType: request.gpuType,
        gpuCount: request.gpuCount,
        diskSize: request.diskSize,
        country: request.country,
        dataCenterId: request.dataCenterId,
      },
      provider: { type: request.providerType },
    });
    return res.id;
  }

  async deletePod(id: string): Promise<void> {
    await this.send("delete", `/pods/${encodeURIComponent(id)}`);
  }

  async listSshKeys(): Promise<SshKey[]> {
    const res = await this.requestParsed(sshKeyListSchema, "get", "/ssh_keys");
    return res.data;
  }

  /** Register `publicKey` unless a key with the same type and body exists. */
  async getOrAddSshKey(publicKey: string): Promise<SshKey> {
    const wanted = keyIdentity(publicKey);
    const existing = (await this.listSshKeys()).find(
      (key) => keyIdentity(key.publicKey) === wanted,
    );
    if (existing) {
      return { name: existing.name, publicKey };
    }

    const name = `${SSH_KEY_PREFIX}${sshKeySuffix()}`;
    await this.send("post", "/ssh_keys", { name, publicKey });
    this.log.info({ name }, "Registered SSH key with pods API");
    return { name, publicKey };
  }

  private async requestParsed<S extends z.ZodTypeAny>(
    schema: S,
    method: HttpMethod,
    path: string,
    body?: Record<string, unknown>,
  ): Promise<z.output<S>> {
    const res = await this.send(method, path, body);
    const parsed = schema.safeParse(res.data);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue ? `${issue.path.join(".") || "body"}: ${issue.message}` : "schema mismatch";
      throw new PodApiError(method, res.url, res.status, `invalid response body (${where})`);
    }
    return parsed.data;
  }

  private async send(
    method: HttpMethod,
    path: string,
    body?: Record<string, unknown>,
  ): Promise<RawResponse> {
    const url = this.buildUrl(method, path, body);
    const init: RequestInit = { method: method.toUpperCase(), headers: this.headers };
    if (body !== undefined && method !== "get" && method !== "delete") {
      init.body = JSON.stringify(body);
    }

    const backoff = new Backoff({
      initialMs: INITIAL_BACKOFF_MS,
      maxFactor: MAX_BACKOFF_FACTOR,
      random: this.random,
    });

    for (let attempt = 1; ; attempt++) {
      const res = await this.fetchImpl(url, init);

      if (res.status === 429 && attempt < this.maxAttempts) {
        await res.body?.cancel();
        const delayMs = backoff.next();
        this.log.warn(
          { method: init.method, path, attempt, delayMs },
          "Pods API rate limited, backing off",
        );
        await this.sleep(delayMs);
        continue;
      }

      if (!res.ok) {
        await res.body?.cancel();
        throw new PodApiError(method, url, res.status, res.statusText);
      }

      const text = await res.text();
      if (!text) {
        return { url, status: res.status, data: null };
      }
      try {
        const data: unknown = JSON.parse(text);
        return { url, status: res.status, data };
      } catch {
        throw new PodApiError(method, url, res.status, "invalid JSON body");
      }
    }
  }

  private buildUrl(
    method: HttpMethod,
    path: string,
    body?: Record<string, unknown>,
  ): string {
    const url = `${this.baseUrl}${path}`;
    if (method !== "get" || !body) return url;

    const params = new URLSearchParams();
    for (const [key, value] of Object.entries(body)) {
      if (value !== undefined && value !== null) {
        params.set(key, String(value));
      }
    }
    const qs = params.toString();
    return qs ? `${url}?${qs}` : url;
  }
}
