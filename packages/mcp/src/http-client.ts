// ---------------------------------------------------------------------------
// HTTP client abstraction for the pod cluster server API
// ---------------------------------------------------------------------------

/** Successful API result. */
export interface ApiOk {
  ok: true;
  data: unknown;
  status: number;
}

/** Failed API result. */
export interface ApiErr {
  ok: false;
  error: string;
  status: number;
}

/** Discriminated union returned by all client methods. */
export type ApiResult = ApiOk | ApiErr;

export type Query = Record<string, string | number | boolean | undefined>;

/** Injectable interface so tests can mock the HTTP layer. */
export interface PodClusterApiClient {
  get(path: string, query?: Query): Promise<ApiResult>;
  post(path: string, body: unknown): Promise<ApiResult>;
  delete(path: string, query?: Query): Promise<ApiResult>;
}

/** Pull `error` (or `message`) out of a JSON error body, else the raw text. */
function errorMessage(text: string): string {
  try {
    const parsed: unknown = JSON.parse(text);
    if (typeof parsed === "object" && parsed !== null) {
      if ("error" in parsed && typeof parsed.error === "string") return parsed.error;
      if ("message" in parsed && typeof parsed.message === "string") return parsed.message;
    }
  } catch {
    // not JSON; fall through to the raw text
  }
  return text;
}

// ---------------------------------------------------------------------------
// Production implementation using Node 20's built-in fetch
// ---------------------------------------------------------------------------

export class FetchPodClusterApiClient implements PodClusterApiClient {
  constructor(
    private baseUrl: string,
    private token?: string,
    private fetchImpl: typeof fetch = globalThis.fetch,
  ) {}

  async get(path: string, query?: Query): Promise<ApiResult> {
    return this.execute(this.url(path, query), { method: "GET", headers: this.headers() });
  }

  async post(path: string, body: unknown): Promise<ApiResult> {
    return this.execute(this.url(path), {
      method: "POST",
      headers: { ...this.headers(), "Content-Type": "application/json" },
      body: JSON.stringify(body),
    });
  }

  async delete(path: string, query?: Query): Promise<ApiResult> {
    return this.execute(this.url(path, query), { method: "DELETE", headers: this.headers() });
  }

  private url(path: string, query?: Query): string {
    let url = `${this.baseUrl}${path}`;
    if (query) {
      const params = new URLSearchParams();
      for (const [key, value] of Object.entries(query)) {
        if (value !== undefined) {
          params.set(key, String(value));
        }
      }
      const qs = params.toString();
      if (qs) url += `?${qs}`;
    }
    return url;
  }

  private headers(): Record<string, string> {
    const h: Record<string, string> = {};
    if (this.token) {
      h["Authorization"] = `Bearer ${this.token}`;
    }
    return h;
  }

  private async execute(url: string, init: RequestInit): Promise<ApiResult> {
    try {
      const res = await this.fetchImpl(url, init);
      if (res.ok) {
        const data: unknown = await res.json();
        return { ok: true, data, status: res.status };
      }
      return { ok: false, error: errorMessage(await res.text()), status: res.status };
    } catch (err) {
      return {
        ok: false,
        error: `Network error: ${err instanceof Error ? err.message : String(err)}`,
        status: 0,
      };
    }
  }
}
