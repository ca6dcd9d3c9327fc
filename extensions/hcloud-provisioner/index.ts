/**
 * Hetzner Cloud Provisioner
 *
 * Lets users request Hetzner Cloud VMs through chat-style commands, remembers
 * which servers each user created, and turns account-level resource choices
 * (network, SSH key, firewall) into concrete IDs at creation time.
 *
 * 1. Resource Cache - refreshable snapshot of locations, images, networks, ...
 * 2. Preference Store - per-user defaults and server ownership
 * 3. Resource Resolver - single candidate, stored default, or explicit ambiguity
 * 4. VM Provisioner - validate, resolve, quota, batch create, settle, persist
 * 5. Command Handler - structured requests in, structured results out
 *
 * The CLI (cli.ts) is one front end over the command handler; a chat bot
 * would be another.
 */
import { userInfo } from "node:os";

import type { Command } from "commander";

import type { CommandHandler, CommandRequest } from "./src/api.js";
import { createCommandHandler } from "./src/api.js";
import { ResourceCache } from "./src/catalog.js";
import type { ProvisionerConfig } from "./src/config.js";
import { formatBody, formatError } from "./src/format.js";
import type { PreferenceRepository } from "./src/preferences.js";
import { JsonFilePreferenceRepository, PreferenceStore } from "./src/preferences.js";
import { createHetznerProvider } from "./src/providers/hetzner.js";
import type { CloudProvider, Logger } from "./src/provisioner.js";
import { VmProvisioner } from "./src/provisioner.js";
import type { ResourceKind } from "./src/schema.js";

export * from "./src/api.js";
export * from "./src/catalog.js";
export * from "./src/cloud-init.js";
export * from "./src/config.js";
export * from "./src/errors.js";
export * from "./src/format.js";
export * from "./src/preferences.js";
export * from "./src/providers/hetzner.js";
export * from "./src/provisioner.js";
export * from "./src/resolver.js";
export * from "./src/schema.js";

export interface ProvisionerRuntime {
  provider: CloudProvider;
  cache: ResourceCache;
  preferences: PreferenceStore;
  provisioner: VmProvisioner;
  handle: CommandHandler;
}

export interface RuntimeOverrides {
  provider?: CloudProvider;
  repository?: PreferenceRepository;
  logger?: Logger;
}

export function createRuntime(
  config: ProvisionerConfig,
  overrides: RuntimeOverrides = {},
): ProvisionerRuntime {
  const logger = overrides.logger ?? console;
  const provider =
    overrides.provider ??
    createHetznerProvider({
      apiToken: config.providerToken,
      apiUrl: config.apiUrl,
      serverLimit: config.serverLimit,
    });
  const cache = new ResourceCache(provider, logger);
  const preferences = new PreferenceStore(
    overrides.repository ?? new JsonFilePreferenceRepository(config.storePath),
    logger,
  );
  const provisioner = new VmProvisioner({
    provider,
    cache,
    preferences,
    serverType: config.serverType,
    settleMs: config.settleMs,
    logger,
  });
  const handle = createCommandHandler({ cache, preferences, provisioner, provider, logger });
  return { provider, cache, preferences, provisioner, handle };
}

// -- CLI --

const RESOURCE_KIND_ARGS: Record<string, ResourceKind> = {
  network: "network",
  sshkey: "sshKey",
  firewall: "firewall",
};

function toNumber(value: string): number {
  return Number(value);
}

export interface CliOutput {
  out(text: string): void;
  err(text: string): void;
}

export function registerCli(
  program: Command,
  runtime: ProvisionerRuntime,
  config: ProvisionerConfig,
  output: CliOutput = { out: (t) => console.log(t), err: (t) => console.error(t) },
): void {
  program.option("-u, --user <id>", "Requester identity", config.defaultUser ?? userInfo().username);

  const user = (): string => String(program.opts<{ user: string }>().user);

  async function run(request: CommandRequest, signal?: AbortSignal): Promise<void> {
    const res = await runtime.handle(request, { signal });
    if (res.status === "ok") {
      output.out(formatBody(res.body));
    } else {
      output.err(formatError(res.error));
      process.exitCode = 1;
    }
  }

  program
    .command("refresh")
    .description("Refresh the Hetzner options cache")
    .action(() => run({ command: "refresh" }));

  const lists = [
    ["locations", "locations", "List available Hetzner locations"],
    ["servertypes", "serverTypes", "List server types"],
    ["images", "images", "List all x86 image names"],
    ["networks", "networks", "List networks in the project"],
    ["sshkeys", "sshKeys", "List SSH keys in the project"],
    ["firewalls", "firewalls", "List firewalls in the project"],
  ] as const;
  for (const [name, kind, description] of lists) {
    program
      .command(name)
      .description(description)
      .action(() => run({ command: "list", kind }));
  }

  program
    .command("preview")
    .description("Show which network, SSH key or firewall a create would use")
    .argument("<kind>", "network | sshkey | firewall")
    .action(async (kindArg: string) => {
      const kind = RESOURCE_KIND_ARGS[kindArg.toLowerCase()];
      if (!kind) {
        output.err(`❌ Unknown kind "${kindArg}". Use network, sshkey or firewall.`);
        process.exitCode = 1;
        return;
      }
      await run({ command: "resolve_preview", kind, userId: user() });
    });

  program
    .command("setdefaults")
    .description("Set defaults (only needed with several networks/SSH keys/firewalls)")
    .option("--network-id <id>", "Default network ID", toNumber)
    .option("--ssh-key-id <id>", "Default SSH key ID", toNumber)
    .option("--firewall-id <id>", "Default firewall ID", toNumber)
    .action((opts: { networkId?: number; sshKeyId?: number; firewallId?: number }) =>
      run({
        command: "set_defaults",
        userId: user(),
        defaults: { networkId: opts.networkId, sshKeyId: opts.sshKeyId, firewallId: opts.firewallId },
      }),
    );

  program
    .command("create")
    .description("Create one or more VMs")
    .argument("<name>", "VM name; extra VMs get a numeric suffix")
    .requiredOption("-l, --location <code>", "Hetzner location (e.g. hel1, nbg1)")
    .requiredOption("-i, --image <image>", "x86 image name or ID")
    .option("-a, --app <profile>", "App installed via cloud-init (none, coolify, wireguard)", "none")
    .option("-c, --count <n>", "How many VMs to create (1-10)", toNumber, 1)
    .option("--timeout <seconds>", "Abort the whole request after this many seconds", toNumber)
    .action(
      (
        name: string,
        opts: { location: string; image: string; app: string; count: number; timeout?: number },
      ) =>
        run(
          {
            command: "create",
            request: {
              requesterId: user(),
              baseName: name,
              locationCode: opts.location,
              imageId: opts.image,
              appProfile: opts.app,
              count: opts.count,
            },
          },
          opts.timeout !== undefined ? AbortSignal.timeout(opts.timeout * 1000) : undefined,
        ),
    );

  program
    .command("server")
    .description("Get info about one of your servers (by name or ID)")
    .argument("<server>", "Server name or ID")
    .action((server: string) => run({ command: "lookup", userId: user(), nameOrId: server }));

  program
    .command("suggest")
    .description("Autocomplete location codes or x86 image names")
    .argument("<kind>", "locations | images")
    .argument("[query]", "Substring to match", "")
    .action(async (kind: string, query: string) => {
      if (kind !== "locations" && kind !== "images") {
        output.err(`❌ Unknown kind "${kind}". Use locations or images.`);
        process.exitCode = 1;
        return;
      }
      // Suggestions read the published snapshot, so populate it first
      await runtime.cache.ensure();
      await run({ command: "suggest", kind, query });
    });
}
