import { Command } from "commander";
import { afterEach, describe, expect, it } from "vitest";

import { createRuntime, registerCli } from "./index.js";
import type { ProvisionerConfig } from "./src/config.js";
import { MemoryPreferenceRepository } from "./src/preferences.js";
import { FakeProvider, recordingLogger } from "./src/test-helpers.js";

const config: ProvisionerConfig = {
  providerToken: "test-secret",
  apiUrl: "https://api.test/v1",
  serverType: "cx23",
  settleMs: 0,
  dataDir: "/nonexistent",
  storePath: "/nonexistent/preferences.json",
  defaultUser: "alice",
};

function setup() {
  const provider = new FakeProvider();
  const runtime = createRuntime(config, {
    provider,
    repository: new MemoryPreferenceRepository(),
    logger: recordingLogger(),
  });
  const out: string[] = [];
  const err: string[] = [];

  async function cli(...args: string[]) {
    const program = new Command().exitOverride();
    registerCli(program, runtime, config, { out: (t) => out.push(t), err: (t) => err.push(t) });
    await program.parseAsync(args, { from: "user" });
  }
  return { provider, runtime, out, err, cli };
}

afterEach(() => {
  process.exitCode = undefined;
});

describe("registerCli", () => {
  it("lists networks", async () => {
    const { cli, out } = setup();
    await cli("networks");
    expect(out).toEqual(["Networks:\n- private (id 11)"]);
  });

  it("stores defaults for the selected user", async () => {
    const { cli, out, runtime } = setup();
    await cli("--user", "bob", "setdefaults", "--network-id", "12", "--firewall-id", "31");
    expect(out).toEqual([
      "✅ Defaults saved:\n- network_id: 12\n- ssh_key_id: not set\n- firewall_id: 31",
    ]);
    expect(await runtime.preferences.getDefaults("bob")).toEqual({ networkId: 12, firewallId: 31 });
    expect(await runtime.preferences.getDefaults("alice")).toEqual({});
  });

  it("creates a batch and finds the server afterwards", async () => {
    const { cli, out, provider } = setup();
    await cli("create", "web", "--location", "hel1", "--image", "debian-12", "--count", "2", "--app", "wireguard");

    expect(provider.created.map((s) => s.name)).toEqual(["web", "web1"]);
    expect(out[0]?.split("\n\n")[0]).toBe("Batch web: 2/2 ready");

    await cli("server", "web1");
    expect(out[1]?.split("\n")[0]).toBe("✅ VM Ready: web1");
  });

  it("prints errors and sets the exit code", async () => {
    const { cli, out, err } = setup();
    await cli("server", "nope");
    expect(out).toEqual([]);
    expect(err).toEqual(['❌ I can\'t find a server "nope" under your user.']);
    expect(process.exitCode).toBe(1);
  });

  it("rejects an unknown preview kind", async () => {
    const { cli, err } = setup();
    await cli("preview", "volume");
    expect(err).toEqual(['❌ Unknown kind "volume". Use network, sshkey or firewall.']);
  });

  it("previews the SSH key a create would use", async () => {
    const { cli, out } = setup();
    await cli("preview", "sshkey");
    expect(out).toEqual(["Available:\n- laptop (id 21)\nDefault: not set\nWould use: laptop (id 21)"]);
  });

  it("loads the catalog before suggesting", async () => {
    const { cli, out } = setup();
    await cli("suggest", "images", "deb");
    expect(out).toEqual(["debian-12"]);
  });
});
