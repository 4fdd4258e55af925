import fs from "node:fs";
import { Command } from "commander";
import { writeDefaultConfig } from "../../config/config.js";
import { Output } from "../context.js";

export function runConfigure(out: Output, configPath: string, opts: { force?: boolean }): void {
  if (fs.existsSync(configPath) && !opts.force) {
    out.line(`Config file already exists at ${configPath}. Use --force to overwrite.`);
    return;
  }
  writeDefaultConfig(configPath);
  out.line(`Config file written to ${configPath}`);
  out.line("Edit it to set api.api_key, or export PLAIN_API_KEY.");
}

export function registerConfigureCommand(program: Command, out: Output, configPath: () => string) {
  program
    .command("configure")
    .description("Write a default config file")
    .option("-f, --force", "overwrite an existing config file")
    .action((opts: { force?: boolean }) => {
      runConfigure(out, configPath(), opts);
    });
}
