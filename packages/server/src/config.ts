import path from "node:path";

import { DEFAULT_API_URL } from "./services/pod-api-client.js";
import { DEFAULT_CREDENTIALS_PATH } from "./services/credentials.js";

export interface ConfigWarning {
  level: "warn" | "error";
  message: string;
}

export interface ServerConfig {
  port: number;
  host: string;
  logLevel: string;
  /** Bearer token guarding the mutating routes. */
  authToken: string | null;
  /** Overrides the credentials file when set. */
  podApiKey: string | null;
  credentialsPath: string;
  podApiUrl: string;
  catalogPath: string;
}

const LOG_LEVELS = new Set(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);

/**
 * Validate server config at startup. Returns a list of warnings/errors.
 * Callers should log warnings and exit on errors.
 */
export function validateConfig(config: ServerConfig): ConfigWarning[] {
  const issues: ConfigWarning[] = [];

  if (!config.authToken) {
    issues.push({
      level: "warn",
      message:
        "PODCLUSTER_AUTH_TOKEN is not set; reconcile, terminate and key routes will reject every request",
    });
  }

  if (!Number.isInteger(config.port) || config.port < 1 || config.port > 65535) {
    issues.push({ level: "error", message: `PORT must be between 1 and 65535, got ${config.port}` });
  }

  if (!LOG_LEVELS.has(config.logLevel)) {
    issues.push({ level: "error", message: `LOG_LEVEL "${config.logLevel}" is not a pino level` });
  }

  if (!/^https?:\/\//.test(config.podApiUrl)) {
    issues.push({
      level: "error",
      message: `PRIME_API_URL must be an http(s) URL, got "${config.podApiUrl}"`,
    });
  }

  return issues;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const packageRoot = path.resolve(import.meta.dirname, "..");

  return {
    port: parseInt(env.PORT ?? "4500", 10),
    host: env.HOST ?? "0.0.0.0",
    logLevel: env.LOG_LEVEL ?? "info",
    authToken: env.PODCLUSTER_AUTH_TOKEN || null,
    podApiKey: env.PRIME_API_KEY || null,
    credentialsPath: env.PRIME_CREDENTIALS_PATH ?? DEFAULT_CREDENTIALS_PATH,
    podApiUrl: env.PRIME_API_URL ?? DEFAULT_API_URL,
    catalogPath:
      env.PODCLUSTER_CATALOG_PATH ?? path.join(packageRoot, "catalog", "vms.yaml"),
  };
}
