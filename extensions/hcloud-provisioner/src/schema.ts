/**
 * Provisioner Schemas
 *
 * Shapes shared by the cache, the preference store, the orchestrator and the
 * command surface. Anything that crosses a trust boundary (command input,
 * persisted file) is a zod schema; the rest are plain types inferred from them.
 */
import { z } from "zod";

// -- Resource kinds --

/** Account-level resources a user may have several of and must choose between. */
export const RESOURCE_KINDS = ["network", "sshKey", "firewall"] as const;
export const resourceKindSchema = z.enum(RESOURCE_KINDS);
export type ResourceKind = z.infer<typeof resourceKindSchema>;

/** Everything the catalog holds, as addressed by list commands. */
export const CATALOG_KINDS = [
  "locations",
  "serverTypes",
  "images",
  "networks",
  "sshKeys",
  "firewalls",
] as const;
export const catalogKindSchema = z.enum(CATALOG_KINDS);
export type CatalogKind = z.infer<typeof catalogKindSchema>;

// -- Catalog entries --

export const resourceRefSchema = z.object({
  id: z.number().int().positive(),
  name: z.string(),
});
export type ResourceRef = z.infer<typeof resourceRefSchema>;

export interface LocationEntry {
  /** Location code as accepted by the API (e.g. "hel1") */
  code: string;
  description: string;
}

export interface ServerTypeEntry {
  name: string;
  architecture: string;
}

export interface ImageEntry {
  id: number;
  name: string;
  architecture: string;
}

// -- App profiles --

export const APP_PROFILES = ["none", "coolify", "wireguard"] as const;
export const appProfileSchema = z.enum(APP_PROFILES);
export type AppProfile = z.infer<typeof appProfileSchema>;

// -- Batch bounds --

export const MIN_BATCH = 1;
export const MAX_BATCH = 10;

/** A single RFC 1123 label, leaving room for the one-digit batch suffix. */
const HOSTNAME_LABEL = /^[A-Za-z0-9](?:[A-Za-z0-9-]{0,60}[A-Za-z0-9])?$/;

// -- Creation request --

export const creationRequestSchema = z.object({
  /** Identity of the user asking; owns the resulting servers */
  requesterId: z.string().trim().min(1, "requester id is required"),
  /** Name of the first machine; later machines get a numeric suffix */
  baseName: z
    .string()
    .trim()
    .min(1, "Name can't be empty.")
    .regex(HOSTNAME_LABEL, "Name must be a hostname label (letters, digits, inner hyphens)."),
  /** Location code, e.g. "nbg1" */
  locationCode: z.string().trim().min(1, "location is required"),
  /** Image ID or image name */
  imageId: z.union([z.string(), z.number()]).transform((v) => String(v).trim()),
  /** Application installed through cloud-init */
  appProfile: z
    .preprocess(
      (v) => (typeof v === "string" && v.trim() === "" ? "none" : v),
      z.string().trim().toLowerCase().pipe(appProfileSchema),
    )
    .default("none"),
  /** How many machines to create */
  count: z
    .number({ invalid_type_error: "count must be a number." })
    .int("count must be a whole number.")
    .min(MIN_BATCH, `count must be between ${MIN_BATCH} and ${MAX_BATCH}.`)
    .max(MAX_BATCH, `count must be between ${MIN_BATCH} and ${MAX_BATCH}.`)
    .default(1),
});

export type CreationRequestInput = z.input<typeof creationRequestSchema>;
export type CreationRequest = z.output<typeof creationRequestSchema>;

// -- Preferences --

const optionalId = z.number().int().positive().optional();

export const defaultsUpdateSchema = z.object({
  networkId: optionalId,
  sshKeyId: optionalId,
  firewallId: optionalId,
});
export type DefaultsUpdate = z.infer<typeof defaultsUpdateSchema>;

/** Stored per-user defaults. Each may be stale against the current catalog. */
export type UserPreferences = DefaultsUpdate;

/** Default field for each resolvable kind. */
export const DEFAULT_FIELD: Record<ResourceKind, keyof UserPreferences> = {
  network: "networkId",
  sshKey: "sshKeyId",
  firewall: "firewallId",
};

export const serverOwnershipSchema = z.object({
  userId: z.string(),
  serverName: z.string(),
  serverId: z.number().int().positive(),
  createdAt: z.string(),
});
export type ServerOwnership = z.infer<typeof serverOwnershipSchema>;
