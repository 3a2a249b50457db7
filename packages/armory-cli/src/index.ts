#!/usr/bin/env node
import { Command } from "commander";
import pkg from "../package.json" with { type: "json" };
import { initContext } from "./lib/cli-context.js";
import { renderUnknownError } from "./lib/errors/renderer.js";
import { registerConfigCommands } from "./modules/config-cmd.js";
import { registerDownloadCommand } from "./modules/download.js";

export async function main(argv = process.argv): Promise<void> {
  initContext(argv);

  const program = new Command()
    .name("armory-dl")
    .description("Download files from armory repositories, resuming interrupted transfers")
    .version(pkg.version)
    .option("--json", "Print the result as JSON")
    .option("-q, --quiet", "Hide the progress indicator")
    .option("--no-input", "Fail instead of prompting for credentials")
    .option("-v, --verbose", "Write debug logs to stderr");

  registerConfigCommands(program);
  registerDownloadCommand(program);

  try {
    await program.parseAsync(argv);
  } catch (error) {
    renderUnknownError(error);
    process.exitCode = 1;
  }
}

void main();
