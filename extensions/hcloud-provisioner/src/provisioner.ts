/**
 * VM Provisioner
 *
 * Provider-agnostic interface for the cloud API, and the orchestrator that
 * turns a creation request into a batch of servers:
 *
 *   validating -> resolving -> quota_checking -> creating -> settling -> persisting -> done
 *
 * Anything that fails before `creating` aborts the batch with no side
 * effects. From `creating` on, failures are collected per machine and never
 * stop the other machines in the batch.
 */
import { setTimeout as delay } from "node:timers/promises";

import type { CatalogSnapshot, ResourceCache } from "./catalog.js";
import { isX86Architecture, suggestNames, SUGGESTION_LIMIT } from "./catalog.js";
import { cloudInitForProfile } from "./cloud-init.js";
import {
  ProviderError,
  ProvisionerError,
  QuotaExceededError,
  ValidationError,
  describeError,
} from "./errors.js";
import type { ValidationReason } from "./errors.js";
import type { PreferenceStore } from "./preferences.js";
import { resolveAll } from "./resolver.js";
import type { ResolvedResources } from "./resolver.js";
import type {
  CreationRequest,
  ImageEntry,
  LocationEntry,
  ResourceRef,
  ServerTypeEntry,
} from "./schema.js";
import { creationRequestSchema } from "./schema.js";

// -- Types --

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface RequestOptions {
  signal?: AbortSignal;
}

export interface CreateServerOptions {
  name: string;
  serverType: string;
  imageId: number;
  location: string;
  networkId: number;
  sshKeyId: number;
  firewallId: number;
  /** cloud-init user data (null = none) */
  userData: string | null;
  labels: Record<string, string>;
}

export interface ServerDetails {
  id: number;
  name: string;
  /** Provider status, e.g. "initializing", "running" */
  status: string;
  ipv4: string | null;
  ipv6: string | null;
  datacenter: string | null;
  location: string | null;
  image: string | null;
  serverType: string | null;
}

export type QuotaInfo = { supported: true; remaining: number } | { supported: false };

// -- Provider Interface --

export interface CloudProvider {
  /** Provider identifier */
  readonly name: string;

  listLocations(opts?: RequestOptions): Promise<LocationEntry[]>;
  listServerTypes(opts?: RequestOptions): Promise<ServerTypeEntry[]>;
  listImages(opts?: RequestOptions): Promise<ImageEntry[]>;
  listNetworks(opts?: RequestOptions): Promise<ResourceRef[]>;
  listSshKeys(opts?: RequestOptions): Promise<ResourceRef[]>;
  listFirewalls(opts?: RequestOptions): Promise<ResourceRef[]>;

  /** Remaining server capacity, when the provider can tell */
  getQuota(opts?: RequestOptions): Promise<QuotaInfo>;

  /** Create one server; resolves with the provider-assigned ID */
  createServer(server: CreateServerOptions, opts?: RequestOptions): Promise<{ serverId: number }>;

  /** Current details; rejects with NotFoundError for unknown IDs */
  getServer(serverId: number, opts?: RequestOptions): Promise<ServerDetails>;
}

export type ProvisioningPhase =
  | "validating"
  | "resolving"
  | "quota_checking"
  | "creating"
  | "settling"
  | "persisting"
  | "done";

export interface MachineSuccess {
  ok: true;
  name: string;
  serverId: number;
  ipv4: string | null;
  ipv6: string | null;
  datacenter: string | null;
  location: string | null;
  image: string | null;
  serverType: string | null;
  status: string;
  /** Set when the server exists but its ownership record could not be saved */
  persistenceError?: string;
}

export interface MachineFailure {
  ok: false;
  name: string;
  failureReason: string;
  /** Present when the server was created but could not be described */
  serverId?: number;
}

export type MachineOutcome = MachineSuccess | MachineFailure;

export type ProvisionResult =
  | {
      success: true;
      request: CreationRequest;
      resources: ResolvedResources;
      outcome: MachineOutcome[];
    }
  | { success: false; phase: ProvisioningPhase; error: ProvisionerError };

export interface ProvisionerOptions {
  provider: CloudProvider;
  cache: ResourceCache;
  preferences: PreferenceStore;
  /** Server type used for every machine (e.g. "cx23") */
  serverType: string;
  /** Wait after creation before describing the new servers */
  settleMs: number;
  logger?: Logger;
  /** Injected for tests; must reject when the signal aborts */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export interface CreateOptions {
  /** Aborts provider calls and the settle wait (e.g. AbortSignal.timeout) */
  signal?: AbortSignal;
  onPhase?: (phase: ProvisioningPhase) => void;
}

/** Base name first, then base1, base2, ... */
export function generateNames(baseName: string, count: number): string[] {
  return Array.from({ length: count }, (_, i) => (i === 0 ? baseName : `${baseName}${i}`));
}

const LABEL_VALUE_INVALID = /[^A-Za-z0-9_.-]/g;

/** Hetzner label values: at most 63 chars of [A-Za-z0-9_.-]. */
export function toLabelValue(value: string): string {
  return value.replace(LABEL_VALUE_INVALID, "_").slice(0, 63);
}

type CreateAttempt =
  | { name: string; created: true; serverId: number }
  | { name: string; created: false; reason: string };

type DescribeAttempt =
  | { ok: true; details: ServerDetails }
  | { ok: false; reason: string };

const REQUEST_FIELD_REASONS: Record<string, ValidationReason> = {
  requesterId: "INVALID_REQUEST",
  baseName: "INVALID_NAME",
  locationCode: "INVALID_LOCATION",
  imageId: "INVALID_IMAGE",
  appProfile: "INVALID_APP_PROFILE",
  count: "INVALID_COUNT",
};

// -- Provisioner --

export class VmProvisioner {
  private logger: Logger;
  private sleep: (ms: number, signal?: AbortSignal) => Promise<void>;

  constructor(private options: ProvisionerOptions) {
    this.logger = options.logger ?? console;
    this.sleep = options.sleep ?? ((ms, signal) => delay(ms, undefined, { signal }));
  }

  async create(input: unknown, opts: CreateOptions = {}): Promise<ProvisionResult> {
    const { provider, cache, preferences } = this.options;
    const { signal } = opts;
    let phase: ProvisioningPhase = "validating";
    const enter = (next: ProvisioningPhase) => {
      phase = next;
      this.logger.info(`[hcloud] create: ${next}`);
      opts.onPhase?.(next);
    };
    const fail = (error: unknown): ProvisionResult => ({
      success: false,
      phase,
      error: error instanceof ProvisionerError ? error : new ProviderError(describeError(error)),
    });

    enter("validating");
    const parsed = parseCreationRequest(input);
    if (!parsed.success) return fail(parsed.error);
    const request = parsed.request;

    let snapshot: CatalogSnapshot;
    try {
      snapshot = await cache.ensure();
    } catch (err) {
      return fail(err);
    }

    const target = validateAgainstCatalog(request, snapshot, this.options.serverType);
    if (!target.success) return fail(target.error);
    const { image, location } = target;

    enter("resolving");
    let resources: ResolvedResources;
    try {
      const defaults = await preferences.getDefaults(request.requesterId);
      const resolved = resolveAll(snapshot, defaults);
      if (!resolved.success) return fail(resolved.error);
      resources = resolved.resources;
    } catch (err) {
      return fail(err);
    }

    enter("quota_checking");
    try {
      const quota = await provider.getQuota({ signal });
      if (!quota.supported) {
        this.logger.warn("[hcloud] Provider does not report server quota; skipping check");
      } else if (quota.remaining < request.count) {
        return fail(new QuotaExceededError(request.count, quota.remaining));
      }
    } catch (err) {
      if (signal?.aborted) return fail(err);
      this.logger.warn(`[hcloud] Quota check failed, continuing without it: ${describeError(err)}`);
    }

    enter("creating");
    const names = generateNames(request.baseName, request.count);
    const userData = cloudInitForProfile(request.appProfile);
    const labels = {
      "managed-by": "hcloud-provisioner",
      "owner-id": toLabelValue(request.requesterId),
    };

    const attempts = await Promise.all(
      names.map(async (name): Promise<CreateAttempt> => {
        try {
          const { serverId } = await provider.createServer(
            {
              name,
              serverType: this.options.serverType,
              imageId: image.id,
              location: location.code,
              networkId: resources.network.id,
              sshKeyId: resources.sshKey.id,
              firewallId: resources.firewall.id,
              userData,
              labels,
            },
            { signal },
          );
          this.logger.info(`[hcloud] Created ${name} (id ${serverId})`);
          return { name, created: true, serverId };
        } catch (err) {
          this.logger.error(`[hcloud] Failed creating ${name}: ${describeError(err)}`);
          return { name, created: false, reason: creationFailureReason(err) };
        }
      }),
    );

    enter("settling");
    const details = new Map<number, DescribeAttempt>();
    const created = attempts.filter(
      (a): a is Extract<CreateAttempt, { created: true }> => a.created,
    );
    if (created.length > 0) {
      let settled = true;
      try {
        await this.sleep(this.options.settleMs, signal);
      } catch (err) {
        settled = false;
        this.logger.warn(`[hcloud] Settle wait interrupted: ${describeError(err)}`);
        for (const a of created) {
          details.set(a.serverId, { ok: false, reason: `settle wait interrupted: ${describeError(err)}` });
        }
      }
      if (settled) {
        await Promise.all(
          created.map(async (a) => {
            try {
              details.set(a.serverId, { ok: true, details: await provider.getServer(a.serverId, { signal }) });
            } catch (err) {
              details.set(a.serverId, { ok: false, reason: describeError(err) });
            }
          }),
        );
      }
    }

    enter("persisting");
    const outcome: MachineOutcome[] = [];
    for (const attempt of attempts) {
      if (!attempt.created) {
        outcome.push({ ok: false, name: attempt.name, failureReason: attempt.reason });
        continue;
      }

      // The server exists either way; keep an ownership record for it
      let persistenceError: string | undefined;
      try {
        await preferences.recordOwnership(request.requesterId, attempt.name, attempt.serverId);
      } catch (err) {
        persistenceError = describeError(err);
        this.logger.error(
          `[hcloud] Created ${attempt.name} (id ${attempt.serverId}) but could not record ownership: ${persistenceError}`,
        );
      }

      const described = details.get(attempt.serverId);
      if (described?.ok) {
        const d = described.details;
        outcome.push({
          ok: true,
          name: attempt.name,
          serverId: attempt.serverId,
          ipv4: d.ipv4,
          ipv6: d.ipv6,
          datacenter: d.datacenter,
          location: d.location,
          image: d.image,
          serverType: d.serverType,
          status: d.status,
          ...(persistenceError !== undefined ? { persistenceError } : {}),
        });
      } else {
        const why = described ? described.reason : "details were not fetched";
        outcome.push({
          ok: false,
          name: attempt.name,
          serverId: attempt.serverId,
          failureReason:
            `Created server ${attempt.serverId}, but fetching details failed: ${why}` +
            (persistenceError !== undefined ? `; ownership not recorded: ${persistenceError}` : ""),
        });
      }
    }

    enter("done");
    const succeeded = outcome.filter((o) => o.ok).length;
    this.logger.info(`[hcloud] Batch ${request.baseName}: ${succeeded}/${names.length} ready`);
    return { success: true, request, resources, outcome };
  }
}

// -- Validation --

export function parseCreationRequest(
  input: unknown,
): { success: true; request: CreationRequest } | { success: false; error: ValidationError } {
  const parsed = creationRequestSchema.safeParse(input);
  if (parsed.success) return { success: true, request: parsed.data };

  const [issue] = parsed.error.issues;
  const field = issue ? String(issue.path[0] ?? "") : "";
  const reason = REQUEST_FIELD_REASONS[field] ?? "INVALID_REQUEST";
  return {
    success: false,
    error: new ValidationError(reason, issue?.message ?? "Invalid request", {
      field,
      issues: parsed.error.issues.map((i) => ({ path: i.path.join("."), message: i.message })),
    }),
  };
}

function listHint(prefix: string, all: string[]): string {
  const shown = all.slice(0, SUGGESTION_LIMIT);
  return `${prefix} (first ${SUGGESTION_LIMIT}): ${shown.join(", ")}${all.length > SUGGESTION_LIMIT ? " …" : ""}`;
}

export function findImage(snapshot: CatalogSnapshot, query: string): ImageEntry | undefined {
  const q = query.trim();
  if (/^\d+$/.test(q)) {
    const id = Number(q);
    const byId = snapshot.images.find((img) => img.id === id);
    if (byId) return byId;
  }
  // Hetzner lists one image per architecture under the same name
  const byName = snapshot.images.filter((img) => img.name === q);
  return byName.find((img) => isX86Architecture(img.architecture)) ?? byName[0];
}

export function validateAgainstCatalog(
  request: CreationRequest,
  snapshot: CatalogSnapshot,
  serverType: string,
):
  | { success: true; image: ImageEntry; location: LocationEntry; serverType: ServerTypeEntry }
  | { success: false; error: ValidationError } {
  const type = snapshot.serverTypes.find((t) => t.name === serverType);
  if (!type) {
    return {
      success: false,
      error: new ValidationError(
        "UNKNOWN_SERVER_TYPE",
        `Server type ${serverType} not found in Hetzner.`,
        { serverType },
      ),
    };
  }

  const image = findImage(snapshot, request.imageId);
  if (!image || !isX86Architecture(image.architecture)) {
    const all = suggestNames(snapshot, "images", "", Number.MAX_SAFE_INTEGER);
    const hint = listHint("Valid x86 images", all);
    const message = image
      ? `Image "${request.imageId}" is not x86-compatible (architecture: ${image.architecture}). Pick an x86 image. ${hint}`
      : `Unknown image "${request.imageId}". Use images to list valid x86 options. ${hint}`;
    return {
      success: false,
      error: new ValidationError("INVALID_IMAGE", message, {
        image: request.imageId,
        architecture: image?.architecture ?? null,
        suggestions: all.slice(0, SUGGESTION_LIMIT),
      }),
    };
  }

  const location = snapshot.locations.find((l) => l.code === request.locationCode);
  if (!location) {
    const all = suggestNames(snapshot, "locations", "", Number.MAX_SAFE_INTEGER);
    return {
      success: false,
      error: new ValidationError(
        "INVALID_LOCATION",
        `Unknown location "${request.locationCode}". ${listHint("Try a different location. Available", all)}`,
        { location: request.locationCode, suggestions: all.slice(0, SUGGESTION_LIMIT) },
      ),
    };
  }

  return { success: true, image, location, serverType: type };
}

function creationFailureReason(err: unknown): string {
  if (err instanceof ProviderError && err.isResourceLimit) {
    return "Hetzner server limit reached on this account.";
  }
  return describeError(err);
}
