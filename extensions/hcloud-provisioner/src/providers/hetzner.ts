/**
 * Hetzner Cloud Provider
 *
 * CloudProvider over the Hetzner Cloud API v1: https://docs.hetzner.cloud/
 * List endpoints are paginated (`meta.pagination.next_page`); every response
 * is checked with zod before it reaches the core.
 *
 * The public API has no server-quota endpoint. When a server limit is
 * configured, remaining capacity is that limit minus the servers in the
 * project; otherwise quota is reported as unsupported.
 */
import { z } from "zod";

import { NotFoundError, ProviderError, describeError } from "../errors.js";
import type {
  CloudProvider,
  CreateServerOptions,
  QuotaInfo,
  RequestOptions,
  ServerDetails,
} from "../provisioner.js";
import type { ImageEntry, LocationEntry, ResourceRef, ServerTypeEntry } from "../schema.js";

export const HETZNER_API = "https://api.hetzner.cloud/v1";
const PAGE_SIZE = 50;

export interface HetznerConfig {
  apiToken: string;
  apiUrl?: string;
  /** Max servers the project may hold; enables the quota check */
  serverLimit?: number;
  /** Injected for tests */
  fetch?: typeof fetch;
}

// -- Hetzner API payloads (minimal subset) --

const paginationSchema = z
  .object({
    meta: z
      .object({
        pagination: z.object({ next_page: z.number().nullable() }),
      })
      .optional(),
  })
  .passthrough();

const apiErrorSchema = z.object({
  error: z.object({ code: z.string(), message: z.string() }),
});

const locationSchema = z
  .object({ name: z.string(), description: z.string().nullish() })
  .transform((l): LocationEntry => ({ code: l.name, description: l.description ?? "" }));

const serverTypeSchema = z
  .object({ name: z.string(), architecture: z.string().nullish() })
  .transform((t): ServerTypeEntry => ({ name: t.name, architecture: t.architecture ?? "unknown" }));

const imageSchema = z
  .object({
    id: z.number().int(),
    name: z.string().nullish(),
    description: z.string().nullish(),
    architecture: z.string().nullish(),
  })
  .transform(
    (i): ImageEntry => ({
      id: i.id,
      // Snapshots and backups have no name
      name: i.name ?? i.description ?? String(i.id),
      architecture: i.architecture ?? "unknown",
    }),
  );

const resourceSchema = z
  .object({ id: z.number().int(), name: z.string() })
  .transform((r): ResourceRef => ({ id: r.id, name: r.name }));

const serverSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  status: z.string(),
  public_net: z
    .object({
      ipv4: z.object({ ip: z.string() }).nullish(),
      ipv6: z.object({ ip: z.string() }).nullish(),
    })
    .nullish(),
  server_type: z.object({ name: z.string() }).nullish(),
  datacenter: z
    .object({
      name: z.string(),
      location: z.object({ name: z.string() }).nullish(),
    })
    .nullish(),
  image: z
    .object({ name: z.string().nullish(), description: z.string().nullish() })
    .nullish(),
});

type HetznerServer = z.infer<typeof serverSchema>;

function toServerDetails(server: HetznerServer): ServerDetails {
  return {
    id: server.id,
    name: server.name,
    status: server.status,
    ipv4: server.public_net?.ipv4?.ip ?? null,
    ipv6: server.public_net?.ipv6?.ip ?? null,
    datacenter: server.datacenter?.name ?? null,
    location: server.datacenter?.location?.name ?? null,
    image: server.image ? (server.image.name ?? server.image.description ?? null) : null,
    serverType: server.server_type?.name ?? null,
  };
}

export function createHetznerProvider(config: HetznerConfig): CloudProvider {
  const baseUrl = (config.apiUrl ?? HETZNER_API).replace(/\/+$/, "");
  const fetchImpl = config.fetch ?? fetch;
  const headers = {
    Authorization: `Bearer ${config.apiToken}`,
    "Content-Type": "application/json",
  };

  async function hetznerFetch<T>(
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    init?: RequestInit,
  ): Promise<T> {
    let res: Response;
    try {
      res = await fetchImpl(`${baseUrl}${path}`, {
        ...init,
        headers: { ...headers, ...init?.headers },
      });
    } catch (err) {
      throw new ProviderError(`Hetzner request failed: ${describeError(err)}`);
    }

    if (!res.ok) {
      const body = await res.text().catch(() => "");
      const apiError = parseApiError(body);
      throw new ProviderError(
        `Hetzner API ${res.status}: ${apiError?.message ?? body}`,
        res.status,
        apiError?.code ?? null,
      );
    }

    let json: unknown;
    try {
      json = await res.json();
    } catch (err) {
      throw new ProviderError(`Hetzner returned invalid JSON for ${path}: ${describeError(err)}`, res.status);
    }
    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      throw new ProviderError(
        `Unexpected Hetzner response for ${path}: ${parsed.error.issues
          .map((i) => `${i.path.join(".")}: ${i.message}`)
          .join("; ")}`,
        res.status,
      );
    }
    return parsed.data;
  }

  async function listAll<T>(
    path: string,
    key: string,
    item: z.ZodType<T, z.ZodTypeDef, unknown>,
    opts?: RequestOptions,
  ): Promise<T[]> {
    const items: T[] = [];
    const itemsSchema = z.array(item);
    let page: number | null = 1;
    while (page !== null) {
      const body: z.infer<typeof paginationSchema> = await hetznerFetch(
        `${path}?page=${page}&per_page=${PAGE_SIZE}`,
        paginationSchema,
        { signal: opts?.signal },
      );
      const parsed = itemsSchema.safeParse(body[key]);
      if (!parsed.success) {
        throw new ProviderError(`Unexpected Hetzner response for ${path}: missing or invalid "${key}"`);
      }
      items.push(...parsed.data);
      page = body.meta?.pagination.next_page ?? null;
    }
    return items;
  }

  return {
    name: "hetzner",

    listLocations: (opts) => listAll("/locations", "locations", locationSchema, opts),
    listServerTypes: (opts) => listAll("/server_types", "server_types", serverTypeSchema, opts),
    listImages: (opts) => listAll("/images", "images", imageSchema, opts),
    listNetworks: (opts) => listAll("/networks", "networks", resourceSchema, opts),
    listSshKeys: (opts) => listAll("/ssh_keys", "ssh_keys", resourceSchema, opts),
    listFirewalls: (opts) => listAll("/firewalls", "firewalls", resourceSchema, opts),

    async getQuota(opts): Promise<QuotaInfo> {
      if (config.serverLimit === undefined) return { supported: false };
      const servers = await listAll("/servers", "servers", z.object({ id: z.number() }), opts);
      return { supported: true, remaining: config.serverLimit - servers.length };
    },

    async createServer(server: CreateServerOptions, opts): Promise<{ serverId: number }> {
      const body: Record<string, unknown> = {
        name: server.name,
        server_type: server.serverType,
        image: server.imageId,
        location: server.location,
        networks: [server.networkId],
        ssh_keys: [server.sshKeyId],
        firewalls: [{ firewall: server.firewallId }],
        labels: server.labels,
        start_after_create: true,
      };
      if (server.userData) {
        body.user_data = server.userData;
      }

      const data = await hetznerFetch(
        "/servers",
        z.object({ server: z.object({ id: z.number().int() }) }),
        { method: "POST", body: JSON.stringify(body), signal: opts?.signal },
      );
      return { serverId: data.server.id };
    },

    async getServer(serverId, opts): Promise<ServerDetails> {
      try {
        const data = await hetznerFetch(`/servers/${serverId}`, z.object({ server: serverSchema }), {
          signal: opts?.signal,
        });
        return toServerDetails(data.server);
      } catch (err) {
        if (err instanceof ProviderError && err.statusCode === 404) {
          throw new NotFoundError(`Server ${serverId} not found in Hetzner.`, { serverId });
        }
        throw err;
      }
    },
  };
}

function parseApiError(body: string): { code: string; message: string } | null {
  try {
    const parsed = apiErrorSchema.safeParse(JSON.parse(body));
    return parsed.success ? parsed.data.error : null;
  } catch {
    return null;
  }
}
