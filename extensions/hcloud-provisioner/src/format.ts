/**
 * Plain-text rendering of command results, for the CLI and for chat
 * front ends that only need text.
 */
import type { CommandBody } from "./api.js";
import type { CatalogEntry } from "./catalog.js";
import type { ErrorPayload } from "./errors.js";
import type { MachineOutcome, ServerDetails } from "./provisioner.js";
import type { CatalogKind, ResourceRef, UserPreferences } from "./schema.js";

const LIST_TITLES: Record<CatalogKind, string> = {
  locations: "Locations",
  serverTypes: "Server types",
  images: "x86 Images",
  networks: "Networks",
  sshKeys: "SSH keys",
  firewalls: "Firewalls",
};

const na = (v: string | null | undefined) => v || "N/A";

export function formatServer(details: ServerDetails): string {
  return [
    `✅ VM Ready: ${details.name}`,
    `  Server ID: ${details.id}`,
    `  Status: ${details.status}`,
    `  Type: ${na(details.serverType)}`,
    `  Location: ${na(details.datacenter)} (${na(details.location)})`,
    `  IPv4: ${na(details.ipv4)}`,
    `  IPv6: ${na(details.ipv6)}`,
    `  Image: ${na(details.image)}`,
  ].join("\n");
}

export function formatOutcome(entry: MachineOutcome): string {
  if (!entry.ok) {
    return `❌ ${entry.name}: ${entry.failureReason}`;
  }
  const text = formatServer({
    id: entry.serverId,
    name: entry.name,
    status: entry.status,
    ipv4: entry.ipv4,
    ipv6: entry.ipv6,
    datacenter: entry.datacenter,
    location: entry.location,
    image: entry.image,
    serverType: entry.serverType,
  });
  return entry.persistenceError
    ? `${text}\n  ⚠️ Ownership not recorded: ${entry.persistenceError}`
    : text;
}

function formatRef(ref: ResourceRef): string {
  return `- ${ref.name} (id ${ref.id})`;
}

function formatEntry(kind: CatalogKind, entry: CatalogEntry): string {
  if ("code" in entry) {
    return entry.description ? `${entry.code} (${entry.description})` : entry.code;
  }
  if (kind === "serverTypes" && "architecture" in entry) {
    return `${entry.name} (${entry.architecture})`;
  }
  if (kind === "images") return entry.name;
  if ("id" in entry) return `- ${entry.name} (id ${entry.id})`;
  return entry.name;
}

function formatDefault(value: number | undefined): string {
  return value === undefined ? "not set" : String(value);
}

export function formatDefaults(defaults: UserPreferences): string {
  return [
    "✅ Defaults saved:",
    `- network_id: ${formatDefault(defaults.networkId)}`,
    `- ssh_key_id: ${formatDefault(defaults.sshKeyId)}`,
    `- firewall_id: ${formatDefault(defaults.firewallId)}`,
  ].join("\n");
}

export function formatError(error: ErrorPayload): string {
  return `❌ ${error.message}`;
}

export function formatBody(body: CommandBody): string {
  switch (body.command) {
    case "refresh": {
      const s = body.summary;
      return [
        "✅ Refreshed.",
        `Locations: ${s.locations}`,
        `Server types: ${s.serverTypes}`,
        `Images(all): ${s.imagesAll}`,
        `Images(x86): ${s.imagesX86}`,
        `Networks: ${s.networks}`,
        `SSH keys: ${s.sshKeys}`,
        `Firewalls: ${s.firewalls}`,
      ].join("\n");
    }

    case "list": {
      const lines = body.entries.map((e) => formatEntry(body.kind, e));
      return `${LIST_TITLES[body.kind]}:\n${lines.length ? lines.join("\n") : "None"}`;
    }

    case "resolve_preview": {
      const lines = body.candidates.map(formatRef);
      const choice = body.selected
        ? `Would use: ${body.selected.name} (id ${body.selected.id})`
        : `Would use: nothing. ${body.problem?.message ?? ""}`.trimEnd();
      return [
        `Available:\n${lines.length ? lines.join("\n") : "None"}`,
        `Default: ${body.defaultId ?? "not set"}`,
        choice,
      ].join("\n");
    }

    case "set_defaults":
      return formatDefaults(body.defaults);

    case "create": {
      const created = body.outcome.filter((o) => o.ok).length;
      const header = `Batch ${body.baseName}: ${created}/${body.outcome.length} ready`;
      return [header, ...body.outcome.map(formatOutcome)].join("\n\n");
    }

    case "lookup":
      return body.details
        ? formatServer(body.details)
        : `⚠️ ${body.server.serverName} (id ${body.server.serverId}) is yours, but fetch failed: ${body.detailsError ?? "unknown error"}`;

    case "suggest":
      return body.names.join("\n");
  }
}
