import fsp from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { z } from "zod";
import { CredentialsError } from "../errors.js";

export const DEFAULT_CREDENTIALS_PATH = "~/.prime/config.json";

const credentialsFileSchema = z.object({
  api_key: z.string().min(1, "api_key is missing or empty"),
});

export interface PodApiCredentials {
  apiKey: string;
}

export function expandHome(filePath: string): string {
  if (filePath === "~") return os.homedir();
  if (filePath.startsWith("~/")) return path.join(os.homedir(), filePath.slice(2));
  return filePath;
}

export async function loadCredentials(
  credentialsPath: string = DEFAULT_CREDENTIALS_PATH,
): Promise<PodApiCredentials> {
  const resolved = expandHome(credentialsPath);

  let raw: string;
  try {
    raw = await fsp.readFile(resolved, "utf-8");
  } catch {
    throw new CredentialsError(credentialsPath, "file does not exist or is unreadable");
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new CredentialsError(credentialsPath, "file is not valid JSON");
  }

  const result = credentialsFileSchema.safeParse(parsed);
  if (!result.success) {
    throw new CredentialsError(
      credentialsPath,
      result.error.issues[0]?.message ?? "unexpected content",
    );
  }
  return { apiKey: result.data.api_key };
}

