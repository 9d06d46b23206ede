#!/usr/bin/env node
/**
 * Standalone runner for the `drift-audit` CLI.
 * Usage: drift-audit reconcile declared.json actual.json --fail-on high
 */
import { Command } from "commander";
import { registerDriftCli } from "../src/cli/program.js";
import { VERSION } from "../src/version.js";

const program = new Command("drift-audit");
program.description("Configuration drift detection and security classification").version(VERSION);
registerDriftCli({ program });

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
});
