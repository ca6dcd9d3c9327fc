import { describe, expect, it, vi } from "vitest";

import { ResourceCache } from "./catalog.js";
import { CLOUD_INIT_PROFILES } from "./cloud-init.js";
import { ProviderError } from "./errors.js";
import { MemoryPreferenceRepository, PreferenceStore } from "./preferences.js";
import type { ProvisioningPhase } from "./provisioner.js";
import { VmProvisioner, generateNames, toLabelValue } from "./provisioner.js";
import type { ServerOwnership } from "./schema.js";
import { FakeProvider, recordingLogger } from "./test-helpers.js";

function setup(repo = new MemoryPreferenceRepository()) {
  const provider = new FakeProvider();
  const logger = recordingLogger();
  const cache = new ResourceCache(provider, logger);
  const preferences = new PreferenceStore(repo, logger);
  const sleep = vi.fn(async (_ms: number, _signal?: AbortSignal) => {});
  const provisioner = new VmProvisioner({
    provider,
    cache,
    preferences,
    serverType: "cx23",
    settleMs: 5000,
    logger,
    sleep,
  });
  return { provider, logger, cache, preferences, provisioner, sleep };
}

const request = {
  requesterId: "alice",
  baseName: "web",
  locationCode: "nbg1",
  imageId: "ubuntu-24.04",
};

describe("generateNames", () => {
  it("keeps the base name first and suffixes the rest", () => {
    expect(generateNames("web", 1)).toEqual(["web"]);
    expect(generateNames("web", 3)).toEqual(["web", "web1", "web2"]);
  });
});

describe("toLabelValue", () => {
  it("replaces characters labels cannot hold", () => {
    expect(toLabelValue("alice@example.com")).toBe("alice_example.com");
    expect(toLabelValue("x".repeat(80))).toHaveLength(63);
  });
});

describe("VmProvisioner.create", () => {
  it.each([0, 11, 2.5])("rejects count %s before touching the provider", async (count) => {
    const { provider, provisioner } = setup();
    const result = await provisioner.create({ ...request, count });

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.phase).toBe("validating");
    expect(result.error.code).toBe("VALIDATION_ERROR");
    expect(result.error.details.reason).toBe("INVALID_COUNT");
    expect(provider.calls).toEqual([]);
  });

  it("rejects a name that is not a hostname label", async () => {
    const { provider, provisioner } = setup();
    const result = await provisioner.create({ ...request, baseName: "my_vm" });
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.details.reason).toBe("INVALID_NAME");
    expect(result.error.message).toBe("Name must be a hostname label (letters, digits, inner hyphens).");
    expect(provider.calls).toEqual([]);
  });

  it("creates one server and records its owner", async () => {
    const { provider, preferences, provisioner, sleep } = setup();
    const phases: ProvisioningPhase[] = [];
    const result = await provisioner.create(request, { onPhase: (p) => phases.push(p) });

    expect(phases).toEqual([
      "validating",
      "resolving",
      "quota_checking",
      "creating",
      "settling",
      "persisting",
      "done",
    ]);
    expect(result).toEqual({
      success: true,
      request: { ...request, appProfile: "none", count: 1 },
      resources: {
        network: { id: 11, name: "private" },
        sshKey: { id: 21, name: "laptop" },
        firewall: { id: 31, name: "default" },
      },
      outcome: [
        {
          ok: true,
          name: "web",
          serverId: 1000,
          ipv4: "203.0.113.10",
          ipv6: null,
          datacenter: "nbg1-dc3",
          location: "nbg1",
          image: "ubuntu-24.04",
          serverType: "cx23",
          status: "running",
        },
      ],
    });
    expect(provider.created).toEqual([
      {
        name: "web",
        serverType: "cx23",
        imageId: 101,
        location: "nbg1",
        networkId: 11,
        sshKeyId: 21,
        firewallId: 31,
        userData: null,
        labels: { "managed-by": "hcloud-provisioner", "owner-id": "alice" },
      },
    ]);
    expect(sleep).toHaveBeenCalledTimes(1);
    expect(sleep).toHaveBeenCalledWith(5000, undefined);
    expect((await preferences.lookupServer("alice", "web")).serverId).toBe(1000);
  });

  it("accepts an image ID and passes the app profile as user data", async () => {
    const { provider, provisioner } = setup();
    const result = await provisioner.create({
      ...request,
      requesterId: "alice@example.com",
      imageId: 102,
      appProfile: "Coolify",
    });

    expect(result.success).toBe(true);
    expect(provider.created[0]?.imageId).toBe(102);
    expect(provider.created[0]?.userData).toBe(CLOUD_INIT_PROFILES.coolify);
    expect(provider.created[0]?.labels["owner-id"]).toBe("alice_example.com");
  });

  it("keeps going when one machine in a batch fails", async () => {
    const { provider, preferences, provisioner, sleep } = setup();
    provider.createFailures.set("web1", new Error("uncategorized_error"));

    const result = await provisioner.create({ ...request, count: 3 });
    expect(result.success).toBe(true);
    if (!result.success) return;

    expect(result.outcome.map((o) => [o.name, o.ok])).toEqual([
      ["web", true],
      ["web1", false],
      ["web2", true],
    ]);
    expect(result.outcome[1]).toEqual({ ok: false, name: "web1", failureReason: "uncategorized_error" });
    expect(sleep).toHaveBeenCalledTimes(1);

    const owned = await preferences.listServers("alice");
    expect(owned.map((s: ServerOwnership) => [s.serverName, s.serverId])).toEqual([
      ["web", 1000],
      ["web2", 1001],
    ]);
  });

  it("reports an exhausted server limit per machine", async () => {
    const { provider, provisioner, sleep } = setup();
    provider.createFailures.set(
      "web",
      new ProviderError("Hetzner API 403: server limit exceeded", 403, "resource_limit_exceeded"),
    );

    const result = await provisioner.create(request);
    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.outcome).toEqual([
      { ok: false, name: "web", failureReason: "Hetzner server limit reached on this account." },
    ]);
    // Nothing was created, so nothing to wait for
    expect(sleep).not.toHaveBeenCalled();
  });

  it("refuses a batch larger than the remaining quota", async () => {
    const { provider, provisioner } = setup();
    provider.quota = { supported: true, remaining: 2 };

    const result = await provisioner.create({ ...request, count: 3 });
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.phase).toBe("quota_checking");
    expect(result.error.code).toBe("QUOTA_EXCEEDED");
    expect(result.error.message).toBe(
      "You requested 3 VM(s), but the account only has quota for 2 more.",
    );
    expect(provider.created).toEqual([]);
  });

  it("reports a full account when no quota remains", async () => {
    const { provider, provisioner } = setup();
    provider.quota = { supported: true, remaining: 0 };
    const result = await provisioner.create(request);
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.message).toBe("Hetzner server limit reached on this account.");
  });

  it("skips the quota check when the provider cannot report it", async () => {
    const { provider, provisioner, logger } = setup();
    provider.quota = { supported: false };

    const result = await provisioner.create(request);
    expect(result.success).toBe(true);
    expect(logger.lines).toContainEqual({
      level: "warn",
      message: "[hcloud] Provider does not report server quota; skipping check",
    });
  });

  it("continues when the quota call itself fails", async () => {
    const { provider, provisioner, logger } = setup();
    provider.quotaError = new Error("timeout");

    const result = await provisioner.create(request);
    expect(result.success).toBe(true);
    expect(logger.lines).toContainEqual({
      level: "warn",
      message: "[hcloud] Quota check failed, continuing without it: timeout",
    });
  });

  it("aborts on ambiguity before creating anything", async () => {
    const { provider, provisioner } = setup();
    provider.networks = [
      { id: 12, name: "staging" },
      { id: 11, name: "private" },
    ];

    const result = await provisioner.create(request);
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.phase).toBe("resolving");
    expect(result.error.code).toBe("AMBIGUOUS_SELECTION");
    expect(result.error.details.candidates).toEqual([
      { id: 11, name: "private" },
      { id: 12, name: "staging" },
    ]);
    expect(provider.calls.some((c) => c.startsWith("createServer"))).toBe(false);
    expect(provider.calls).not.toContain("getQuota");
  });

  it("uses the stored default when several candidates exist", async () => {
    const { provider, preferences, provisioner } = setup();
    provider.networks = [
      { id: 12, name: "staging" },
      { id: 11, name: "private" },
    ];
    await preferences.setDefaults("alice", { networkId: 12 });

    const result = await provisioner.create(request);
    expect(result.success).toBe(true);
    expect(provider.created[0]?.networkId).toBe(12);
  });

  it("aborts when the account has no firewall", async () => {
    const { provider, provisioner } = setup();
    provider.firewalls = [];
    const result = await provisioner.create(request);
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.code).toBe("NONE_AVAILABLE");
    expect(result.error.message).toBe("No firewall exists in this Hetzner project.");
  });

  it("picks the x86 image when several share a name", async () => {
    const { cache, provider, provisioner } = setup();
    await cache.refresh();
    expect(cache.suggest("images", "ubuntu")).toEqual(["ubuntu-24.04"]);

    const result = await provisioner.create({ ...request, imageId: "ubuntu-24.04" });
    expect(result.success).toBe(true);
    expect(provider.created[0]?.imageId).toBe(101);
  });

  it("rejects a non-x86 image with the valid options", async () => {
    const { provider, provisioner } = setup();
    provider.images.push({ id: 301, name: "arm-builder", architecture: "arm" });

    const result = await provisioner.create({ ...request, imageId: "arm-builder" });
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.phase).toBe("validating");
    expect(result.error.details.reason).toBe("INVALID_IMAGE");
    expect(result.error.details.architecture).toBe("arm");
    expect(result.error.message).toBe(
      'Image "arm-builder" is not x86-compatible (architecture: arm). Pick an x86 image. ' +
        "Valid x86 images (first 25): debian-12, ubuntu-24.04",
    );
    expect(provider.created).toEqual([]);
  });

  it("rejects an arm image picked by ID", async () => {
    const { provisioner } = setup();
    const result = await provisioner.create({ ...request, imageId: 201 });
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.details.reason).toBe("INVALID_IMAGE");
    expect(result.error.details.architecture).toBe("arm");
  });

  it("checks the image before the location", async () => {
    const { provisioner } = setup();
    const result = await provisioner.create({ ...request, imageId: "gentoo", locationCode: "xyz1" });
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.details.reason).toBe("INVALID_IMAGE");
  });

  it("rejects an unknown image", async () => {
    const { provisioner } = setup();
    const result = await provisioner.create({ ...request, imageId: "gentoo" });
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.message).toBe(
      'Unknown image "gentoo". Use images to list valid x86 options. ' +
        "Valid x86 images (first 25): debian-12, ubuntu-24.04",
    );
  });

  it("rejects an unknown location with suggestions", async () => {
    const { provisioner } = setup();
    const result = await provisioner.create({ ...request, locationCode: "xyz1" });
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.details.reason).toBe("INVALID_LOCATION");
    expect(result.error.message).toBe(
      'Unknown location "xyz1". Try a different location. Available (first 25): fsn1, hel1, nbg1',
    );
  });

  it("rejects when the configured server type is missing", async () => {
    const { provider } = setup();
    const logger = recordingLogger();
    const provisioner = new VmProvisioner({
      provider,
      cache: new ResourceCache(provider, logger),
      preferences: new PreferenceStore(new MemoryPreferenceRepository(), logger),
      serverType: "cx99",
      settleMs: 0,
      logger,
      sleep: async () => {},
    });
    const result = await provisioner.create(request);
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.message).toBe("Server type cx99 not found in Hetzner.");
  });

  it("fails the request when the catalog cannot be loaded", async () => {
    const { provider, provisioner } = setup();
    provider.listFailures.listLocations = new Error("connection reset");
    const result = await provisioner.create(request);
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.phase).toBe("validating");
    expect(result.error.code).toBe("PROVIDER_ERROR");
  });

  it("keeps the server when ownership cannot be saved", async () => {
    class FullDiskRepository extends MemoryPreferenceRepository {
      override async insertServer(_record: ServerOwnership): Promise<void> {
        throw new Error("disk full");
      }
    }
    const { provisioner } = setup(new FullDiskRepository());

    const result = await provisioner.create(request);
    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.outcome[0]).toMatchObject({
      ok: true,
      name: "web",
      serverId: 1000,
      persistenceError: "Failed to save server: disk full",
    });
  });

  it("reports a created server whose details could not be fetched", async () => {
    const { provider, preferences, provisioner } = setup();
    provider.describeFailures.set(1000, new Error("timeout"));

    const result = await provisioner.create(request);
    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.outcome).toEqual([
      {
        ok: false,
        name: "web",
        serverId: 1000,
        failureReason: "Created server 1000, but fetching details failed: timeout",
      },
    ]);
    expect((await preferences.lookupServer("alice", "1000")).serverName).toBe("web");
  });

  it("skips describing when the settle wait is interrupted", async () => {
    const { provider, provisioner, sleep } = setup();
    sleep.mockRejectedValueOnce(new Error("aborted"));

    const result = await provisioner.create(request);
    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.outcome[0]).toEqual({
      ok: false,
      name: "web",
      serverId: 1000,
      failureReason: "Created server 1000, but fetching details failed: settle wait interrupted: aborted",
    });
    expect(provider.calls.some((c) => c.startsWith("getServer"))).toBe(false);
  });
});
