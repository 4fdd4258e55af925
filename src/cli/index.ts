#!/usr/bin/env node

/**
 * threadscope: read-only command line client for a support workspace.
 *
 * Commands:
 *   configure            - Write a default config file
 *   threads list|all     - List threads
 *   threads get|show     - Show one thread, optionally with its timeline
 *   customers ...        - List, look up and search customers
 *   report [range]       - Threads updated within 1d/7d/30d/60d
 *   dashboard            - Thread counts at a glance
 */

import path from "node:path";

import dotenv from "dotenv";
dotenv.config({ path: path.resolve(process.cwd(), ".env.local") });
dotenv.config({ path: path.resolve(process.cwd(), ".env") });

import { program } from "commander";

import { ApiClient } from "../client/api-client.js";
import { AppConfig, defaultConfigPath, loadConfig } from "../config/config.js";
import { log, setLogLevel } from "../lib/logger.js";
import { registerConfigureCommand } from "./commands/configure.js";
import { registerCustomersCommand } from "./commands/customers.js";
import { registerDashboardCommand } from "./commands/dashboard.js";
import { registerReportCommand } from "./commands/report.js";
import { registerThreadsCommand } from "./commands/threads.js";
import { CommandContext, stdout } from "./context.js";

const abort = new AbortController();
process.once("SIGINT", () => {
  log.warn("interrupted");
  abort.abort();
});

function configPath(): string {
  const opts = program.opts<{ config?: string }>();
  return opts.config || defaultConfigPath();
}

let context: CommandContext | undefined;

function makeContext(): CommandContext {
  if (context) return context;
  const config: AppConfig = loadConfig(configPath());
  if (config.ui.show_debug && !program.opts<{ logLevel?: string }>().logLevel) setLogLevel("debug");
  context = {
    api: new ApiClient({ endpoint: config.api.endpoint, apiKey: config.api.api_key }),
    out: stdout,
    pageSize: config.ui.page_size,
    signal: abort.signal
  };
  return context;
}

async function main() {
  program
    .name("threadscope")
    .description("Browse support threads and customers from the terminal")
    .version("0.1.0")
    .option("--config <path>", "config file (default: ~/.threadscope/config.yaml)")
    .option("--log-level <level>", "log level (trace, debug, info, warn, error)")
    .hook("preAction", () => {
      const { logLevel } = program.opts<{ logLevel?: string }>();
      if (logLevel) setLogLevel(logLevel);
    });

  registerConfigureCommand(program, stdout, configPath);
  registerThreadsCommand(program, makeContext);
  registerCustomersCommand(program, makeContext);
  registerReportCommand(program, makeContext);
  registerDashboardCommand(program, makeContext);

  await program.parseAsync(process.argv);
}

main().catch((err) => {
  log.error({ err }, "fatal");
  process.exit(1);
});
