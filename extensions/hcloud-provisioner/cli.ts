#!/usr/bin/env node
import { Command } from "commander";

import { createRuntime, registerCli } from "./index.js";
import type { ProvisionerConfig } from "./src/config.js";
import { loadConfig } from "./src/config.js";
import { ConfigError, describeError } from "./src/errors.js";
import type { Logger } from "./src/provisioner.js";

async function main(argv: string[]): Promise<void> {
  let config: ProvisionerConfig;
  try {
    config = loadConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(`[hcloud] ${err.message}`);
      process.exitCode = 1;
      return;
    }
    throw err;
  }

  const verbose = argv.includes("--verbose") || argv.includes("-v");
  // stdout carries command output; diagnostics go to stderr
  const logger: Logger = {
    info: (msg) => {
      if (verbose) console.error(msg);
    },
    warn: (msg) => console.error(msg),
    error: (msg) => console.error(msg),
  };

  const program = new Command();
  program
    .name("hcloud-provisioner")
    .description("Provision Hetzner Cloud VMs and track who owns them")
    .option("-v, --verbose", "Log provisioning phases and cache refreshes");

  registerCli(program, createRuntime(config, { logger }), config);
  await program.parseAsync(argv);
}

main(process.argv).catch((err: unknown) => {
  console.error(`[hcloud] ${describeError(err)}`);
  process.exitCode = 1;
});
