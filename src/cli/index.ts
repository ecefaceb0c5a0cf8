#!/usr/bin/env node
import path from "path";
import dotenv from "dotenv";
import { Command } from "commander";
import pkg from "../../package.json";
import { runDiscover } from "../commands/discover";
import { allRejected, runGate } from "../commands/gate";
import { runInitDb } from "../commands/initDb";
import { runStatus } from "../commands/status";
import { EXIT_ALL_REJECTED, errorMessage, exitCodeFor } from "../errors";
import { projectRoot } from "../io/paths";

function readArgValue(argv: string[], flag: string): string | undefined {
  const prefix = `${flag}=`;
  const inlineArg = argv.find((arg) => arg.startsWith(prefix));
  if (inlineArg) return inlineArg.slice(prefix.length);
  const index = argv.indexOf(flag);
  if (index >= 0) {
    return argv[index + 1];
  }
  return undefined;
}

function resolveEnvPath(argv: string[], fallback: string): string {
  const cliValue = readArgValue(argv, "--env-file");
  if (cliValue) return cliValue;
  return process.env.SNAPDIFF_ENV_FILE ?? process.env.DOTENV_CONFIG_PATH ?? fallback;
}

const defaultEnvPath = path.join(projectRoot(), ".env");
const envPath = resolveEnvPath(process.argv.slice(2), defaultEnvPath);
dotenv.config({ path: envPath });

const defaultConfigPath = process.env.SNAPDIFF_CONFIG ?? "config/pipeline.yaml";

const program = new Command();

program
  .name("snapdiff")
  .description("Snapshot diffing and DQ-gated promotion of canonical partitions")
  .version(pkg.version);

program.option("--env-file <path>", "Path to .env file (overrides SNAPDIFF_ENV_FILE/DOTENV_CONFIG_PATH)", envPath);

program
  .command("discover")
  .description("Diff a snapshot version against the manifest and print the dirty partitions")
  .requiredOption("--snapshot-version <version>", "Snapshot version (the date=<version> directory)")
  .option("--config <path>", "Pipeline config (YAML or JSON)", defaultConfigPath)
  .action(async (opts: { snapshotVersion: string; config: string }) => {
    const report = await runDiscover({ configPath: opts.config, snapshotVersion: opts.snapshotVersion });
    if (report.failures.length > 0) {
      for (const failure of report.failures) console.error(failure.error);
      process.exitCode = 3;
    }
  });

program
  .command("gate")
  .description("Evaluate and promote the pending partitions of a layer")
  .requiredOption("--layer <name>", "Layer to evaluate")
  .option("--config <path>", "Pipeline config (YAML or JSON)", defaultConfigPath)
  .action(async (opts: { layer: string; config: string }) => {
    const report = await runGate({ configPath: opts.config, layer: opts.layer });
    if (report.failures.length > 0) {
      for (const failure of report.failures) console.error(failure.error);
      process.exitCode = 3;
    } else if (allRejected(report)) {
      process.exitCode = EXIT_ALL_REJECTED;
    }
  });

program
  .command("status")
  .description("List manifest entries of a layer")
  .requiredOption("--layer <name>", "Layer to list")
  .option("--status <status>", "Only entries with this status (NEW, DIRTY, CLEAN, DELETED)")
  .option("--promotion <state>", "Only entries in this promotion state")
  .option("--config <path>", "Pipeline config (YAML or JSON)", defaultConfigPath)
  .action(async (opts: { layer: string; status?: string; promotion?: string; config: string }) => {
    await runStatus({ configPath: opts.config, layer: opts.layer, status: opts.status, promotion: opts.promotion });
  });

program
  .command("init-db")
  .description("Create the manifest and DQ result tables")
  .option("--config <path>", "Pipeline config (YAML or JSON)", defaultConfigPath)
  .action(async (opts: { config: string }) => {
    await runInitDb({ configPath: opts.config });
  });

program.parseAsync().catch((error: unknown) => {
  console.error(errorMessage(error));
  process.exitCode = exitCodeFor(error);
});
