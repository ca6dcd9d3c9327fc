/**
 * In-process stand-ins for tests: a scriptable CloudProvider and a logger
 * that records instead of printing.
 */
import { NotFoundError } from "./errors.js";
import type {
  CloudProvider,
  CreateServerOptions,
  Logger,
  QuotaInfo,
  ServerDetails,
} from "./provisioner.js";
import type { ImageEntry, LocationEntry, ResourceRef, ServerTypeEntry } from "./schema.js";

type ListMethod =
  | "listLocations"
  | "listServerTypes"
  | "listImages"
  | "listNetworks"
  | "listSshKeys"
  | "listFirewalls";

export class FakeProvider implements CloudProvider {
  readonly name = "fake";

  locations: LocationEntry[] = [
    { code: "nbg1", description: "Nuremberg DC Park 1" },
    { code: "hel1", description: "Helsinki DC Park 1" },
    { code: "fsn1", description: "Falkenstein DC Park 1" },
  ];
  serverTypes: ServerTypeEntry[] = [
    { name: "cx23", architecture: "x86" },
    { name: "cax11", architecture: "arm" },
  ];
  /** One entry per architecture under the same name, as Hetzner lists them */
  images: ImageEntry[] = [
    { id: 201, name: "ubuntu-24.04", architecture: "arm" },
    { id: 101, name: "ubuntu-24.04", architecture: "x86" },
    { id: 102, name: "debian-12", architecture: "x86" },
  ];
  networks: ResourceRef[] = [{ id: 11, name: "private" }];
  sshKeys: ResourceRef[] = [{ id: 21, name: "laptop" }];
  firewalls: ResourceRef[] = [{ id: 31, name: "default" }];

  quota: QuotaInfo = { supported: true, remaining: 100 };
  quotaError: Error | null = null;

  /** Errors thrown by list calls, per method */
  listFailures: Partial<Record<ListMethod, Error>> = {};
  /** Errors thrown by createServer, per server name */
  createFailures = new Map<string, Error>();
  /** Errors thrown by getServer, per server ID */
  describeFailures = new Map<number, Error>();

  /** Every call, in order */
  calls: string[] = [];
  created: CreateServerOptions[] = [];
  servers = new Map<number, ServerDetails>();
  private nextId = 1000;

  private async list<T>(method: ListMethod, items: T[]): Promise<T[]> {
    this.calls.push(method);
    const failure = this.listFailures[method];
    if (failure) throw failure;
    return items.map((i) => ({ ...i }));
  }

  listLocations() {
    return this.list("listLocations", this.locations);
  }
  listServerTypes() {
    return this.list("listServerTypes", this.serverTypes);
  }
  listImages() {
    return this.list("listImages", this.images);
  }
  listNetworks() {
    return this.list("listNetworks", this.networks);
  }
  listSshKeys() {
    return this.list("listSshKeys", this.sshKeys);
  }
  listFirewalls() {
    return this.list("listFirewalls", this.firewalls);
  }

  async getQuota(): Promise<QuotaInfo> {
    this.calls.push("getQuota");
    if (this.quotaError) throw this.quotaError;
    return this.quota;
  }

  async createServer(server: CreateServerOptions): Promise<{ serverId: number }> {
    this.calls.push(`createServer:${server.name}`);
    this.created.push(server);
    const failure = this.createFailures.get(server.name);
    if (failure) throw failure;

    const id = this.nextId++;
    const location = this.locations.find((l) => l.code === server.location);
    this.servers.set(id, {
      id,
      name: server.name,
      status: "running",
      ipv4: `203.0.113.${id - 990}`,
      ipv6: null,
      datacenter: `${server.location}-dc3`,
      location: location?.code ?? null,
      image: this.images.find((i) => i.id === server.imageId)?.name ?? null,
      serverType: server.serverType,
    });
    return { serverId: id };
  }

  async getServer(serverId: number): Promise<ServerDetails> {
    this.calls.push(`getServer:${serverId}`);
    const failure = this.describeFailures.get(serverId);
    if (failure) throw failure;
    const server = this.servers.get(serverId);
    if (!server) throw new NotFoundError(`Server ${serverId} not found in Hetzner.`, { serverId });
    return { ...server };
  }
}

export interface RecordingLogger extends Logger {
  lines: { level: "info" | "warn" | "error"; message: string }[];
}

export function recordingLogger(): RecordingLogger {
  const lines: RecordingLogger["lines"] = [];
  return {
    lines,
    info: (message) => lines.push({ level: "info", message }),
    warn: (message) => lines.push({ level: "warn", message }),
    error: (message) => lines.push({ level: "error", message }),
  };
}
