/**
 * Resource Cache
 *
 * Holds the last complete snapshot of account-level catalog data. A refresh
 * queries every kind from the provider; only a fully successful round is
 * published, by swapping a single frozen reference, so readers always see
 * either the old snapshot or the new one.
 */
import type { CloudProvider, Logger } from "./provisioner.js";
import type {
  CatalogKind,
  ImageEntry,
  LocationEntry,
  ResourceRef,
  ServerTypeEntry,
} from "./schema.js";
import { ProviderError, describeError } from "./errors.js";

export interface CatalogSnapshot {
  readonly locations: readonly LocationEntry[];
  readonly serverTypes: readonly ServerTypeEntry[];
  readonly images: readonly ImageEntry[];
  readonly networks: readonly ResourceRef[];
  readonly sshKeys: readonly ResourceRef[];
  readonly firewalls: readonly ResourceRef[];
  readonly refreshedAt: string;
}

export type CatalogState =
  | { populated: false }
  | { populated: true; snapshot: CatalogSnapshot };

export interface CatalogSummary {
  locations: number;
  serverTypes: number;
  imagesAll: number;
  imagesX86: number;
  networks: number;
  sshKeys: number;
  firewalls: number;
}

export type CatalogEntry = LocationEntry | ServerTypeEntry | ImageEntry | ResourceRef;

export const SUGGESTION_LIMIT = 25;

export function isX86Architecture(arch: string | null | undefined): boolean {
  const a = (arch ?? "").toLowerCase();
  return a.includes("x86") || a.includes("amd64");
}

export function x86Images(snapshot: CatalogSnapshot): ImageEntry[] {
  return snapshot.images.filter((img) => isX86Architecture(img.architecture));
}

export function summarizeCatalog(snapshot: CatalogSnapshot): CatalogSummary {
  return {
    locations: snapshot.locations.length,
    serverTypes: snapshot.serverTypes.length,
    imagesAll: snapshot.images.length,
    imagesX86: x86Images(snapshot).length,
    networks: snapshot.networks.length,
    sshKeys: snapshot.sshKeys.length,
    firewalls: snapshot.firewalls.length,
  };
}

export type SuggestKind = "locations" | "images";

/** Sorted location codes or x86 image names containing `query`, case-insensitive. */
export function suggestNames(
  snapshot: CatalogSnapshot,
  kind: SuggestKind,
  query = "",
  limit = SUGGESTION_LIMIT,
): string[] {
  const names =
    kind === "locations"
      ? snapshot.locations.map((l) => l.code)
      : x86Images(snapshot).map((img) => img.name);
  const q = query.trim().toLowerCase();
  return names
    .filter((n) => !q || n.toLowerCase().includes(q))
    .sort()
    .slice(0, limit);
}

export class ResourceCache {
  private snapshot: CatalogSnapshot | null = null;
  private inflight: Promise<CatalogSnapshot> | null = null;

  constructor(
    private provider: CloudProvider,
    private logger: Logger = console,
  ) {}

  current(): CatalogState {
    const snapshot = this.snapshot;
    return snapshot ? { populated: true, snapshot } : { populated: false };
  }

  /** Returns the published snapshot, refreshing first if there is none yet. */
  async ensure(): Promise<CatalogSnapshot> {
    return this.snapshot ?? this.refresh();
  }

  /** Concurrent callers share one provider round. */
  refresh(): Promise<CatalogSnapshot> {
    if (!this.inflight) {
      this.inflight = this.fetchSnapshot().finally(() => {
        this.inflight = null;
      });
    }
    return this.inflight;
  }

  summary(): CatalogSummary | null {
    return this.snapshot ? summarizeCatalog(this.snapshot) : null;
  }

  /** Autocomplete over the published snapshot; empty before the first refresh. */
  suggest(kind: SuggestKind, query = "", limit = SUGGESTION_LIMIT): string[] {
    const snapshot = this.snapshot;
    return snapshot ? suggestNames(snapshot, kind, query, limit) : [];
  }

  private async fetchSnapshot(): Promise<CatalogSnapshot> {
    let lists: [
      LocationEntry[],
      ServerTypeEntry[],
      ImageEntry[],
      ResourceRef[],
      ResourceRef[],
      ResourceRef[],
    ];
    try {
      lists = await Promise.all([
        this.provider.listLocations(),
        this.provider.listServerTypes(),
        this.provider.listImages(),
        this.provider.listNetworks(),
        this.provider.listSshKeys(),
        this.provider.listFirewalls(),
      ]);
    } catch (err) {
      this.logger.error(`[catalog] Refresh failed, keeping previous snapshot: ${describeError(err)}`);
      if (err instanceof ProviderError) throw err;
      throw new ProviderError(`Catalog refresh failed: ${describeError(err)}`);
    }

    const [locations, serverTypes, images, networks, sshKeys, firewalls] = lists;
    const next: CatalogSnapshot = Object.freeze({
      locations: Object.freeze(locations.map((l) => Object.freeze({ ...l }))),
      serverTypes: Object.freeze(serverTypes.map((t) => Object.freeze({ ...t }))),
      images: Object.freeze(images.map((i) => Object.freeze({ ...i }))),
      networks: Object.freeze(networks.map((n) => Object.freeze({ ...n }))),
      sshKeys: Object.freeze(sshKeys.map((k) => Object.freeze({ ...k }))),
      firewalls: Object.freeze(firewalls.map((f) => Object.freeze({ ...f }))),
      refreshedAt: new Date().toISOString(),
    });
    this.snapshot = next;
    this.logger.info(
      `[catalog] Refreshed: ${locations.length} locations, ${images.length} images, ` +
        `${networks.length} networks, ${sshKeys.length} SSH keys, ${firewalls.length} firewalls`,
    );
    return next;
  }
}

/** Entries of one catalog kind, sorted for display. */
export function listCatalog(snapshot: CatalogSnapshot, kind: CatalogKind): CatalogEntry[] {
  switch (kind) {
    case "locations":
      return [...snapshot.locations].sort((a, b) => a.code.localeCompare(b.code));
    case "serverTypes":
      return [...snapshot.serverTypes].sort((a, b) => a.name.localeCompare(b.name));
    case "images":
      return x86Images(snapshot).sort((a, b) => a.name.localeCompare(b.name));
    case "networks":
      return sortResourceRefs(snapshot.networks);
    case "sshKeys":
      return sortResourceRefs(snapshot.sshKeys);
    case "firewalls":
      return sortResourceRefs(snapshot.firewalls);
  }
}

/** By name, then id. */
export function sortResourceRefs(refs: readonly ResourceRef[]): ResourceRef[] {
  return [...refs].sort((a, b) => a.name.localeCompare(b.name) || a.id - b.id);
}
