import { homedir } from "node:os";
import { join } from "node:path";
import { z } from "zod";

import { ConfigError } from "./errors.js";
import { HETZNER_API } from "./providers/hetzner.js";

const nonNegativeInt = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((v) => Number(v))
    .pipe(z.number().int().nonnegative());

const envSchema = z.object({
  /** API token for the Hetzner Cloud project. Required. */
  HCLOUD_TOKEN: z.string({ required_error: "HCLOUD_TOKEN is required" }).trim().min(1, "HCLOUD_TOKEN is required"),

  /** API base URL (overridable for proxies and tests). */
  HCLOUD_API_URL: z.string().url().default(HETZNER_API),

  /** Server type for every machine. */
  HCLOUD_SERVER_TYPE: z.string().min(1).default("cx23"),

  /** Milliseconds to wait after a batch is created before describing it. */
  HCLOUD_SETTLE_MS: nonNegativeInt("20000"),

  /** Project server limit; enables the pre-creation quota check when set. */
  HCLOUD_SERVER_LIMIT: z
    .string()
    .regex(/^\d+$/, "HCLOUD_SERVER_LIMIT must be a whole number")
    .transform((v) => Number(v))
    .optional(),

  /** Where preferences.json lives. */
  HCLOUD_DATA_DIR: z.string().min(1).optional(),

  /** Requester identity for CLI invocations. */
  HCLOUD_USER: z.string().min(1).optional(),
});

export interface ProvisionerConfig {
  providerToken: string;
  apiUrl: string;
  serverType: string;
  settleMs: number;
  serverLimit?: number;
  dataDir: string;
  storePath: string;
  defaultUser?: string;
}

/**
 * Read configuration from the environment.
 * Throws ConfigError listing every problem; callers treat it as fatal.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): ProvisionerConfig {
  // Blank values count as unset
  const raw = Object.fromEntries(
    Object.entries(env).filter(([, v]) => v !== undefined && v.trim() !== ""),
  );
  const result = envSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`));
  }

  const e = result.data;
  const dataDir = e.HCLOUD_DATA_DIR ?? join(homedir(), ".hcloud-provisioner");
  return {
    providerToken: e.HCLOUD_TOKEN,
    apiUrl: e.HCLOUD_API_URL,
    serverType: e.HCLOUD_SERVER_TYPE,
    settleMs: e.HCLOUD_SETTLE_MS,
    serverLimit: e.HCLOUD_SERVER_LIMIT,
    dataDir,
    storePath: join(dataDir, "preferences.json"),
    defaultUser: e.HCLOUD_USER,
  };
}
