import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { z } from "zod";
import { parse, stringify } from "yaml";

export const DEFAULT_ENDPOINT = "https://core-api.uk.plain.com/graphql/v1";

const ConfigSchema = z.object({
  api: z.object({
    api_key: z.string().min(1, "API key is required (set PLAIN_API_KEY or api.api_key in the config file)"),
    endpoint: z.string().url(),
    workspace_id: z.string()
  }),
  ui: z.object({
    page_size: z.number().int().positive("ui.page_size must be positive"),
    show_debug: z.boolean()
  })
});

export type AppConfig = z.infer<typeof ConfigSchema>;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

const DEFAULT_CONFIG: AppConfig = {
  api: { api_key: "", endpoint: DEFAULT_ENDPOINT, workspace_id: "" },
  ui: { page_size: 20, show_debug: false }
};

export function defaultConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return env.THREADSCOPE_CONFIG || path.join(os.homedir(), ".threadscope", "config.yaml");
}

// Shape check only; values are validated after merging.
const FileSchema = z
  .object({
    api: z.object({ api_key: z.string(), endpoint: z.string(), workspace_id: z.string() }).partial(),
    ui: z.object({ page_size: z.number(), show_debug: z.boolean() }).partial()
  })
  .partial();

type PartialConfig = z.infer<typeof FileSchema>;

function firstIssue(err: z.ZodError): string {
  const issue = err.issues[0];
  return `${issue.path.join(".")}: ${issue.message}`;
}

function readFileConfig(configPath: string): PartialConfig {
  if (!fs.existsSync(configPath)) return {};
  const raw = fs.readFileSync(configPath, "utf-8");
  let parsed: unknown;
  try {
    parsed = parse(raw);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`failed to parse config file ${configPath}: ${detail}`);
  }
  if (parsed === null || parsed === undefined) return {};
  const r = FileSchema.safeParse(parsed);
  if (!r.success) throw new ConfigError(`invalid config file ${configPath}: ${firstIssue(r.error)}`);
  return r.data;
}

/**
 * Defaults, then the YAML file, then PLAIN_API_KEY from the environment.
 * The merged result is validated; failures raise ConfigError.
 */
export function loadConfig(configPath: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const file = readFileConfig(configPath);
  const merged = {
    api: { ...DEFAULT_CONFIG.api, ...file.api },
    ui: { ...DEFAULT_CONFIG.ui, ...file.ui }
  };
  if (env.PLAIN_API_KEY) merged.api.api_key = env.PLAIN_API_KEY;

  const r = ConfigSchema.safeParse(merged);
  if (!r.success) throw new ConfigError(`invalid configuration: ${firstIssue(r.error)}`);
  return r.data;
}

export function saveConfig(configPath: string, config: AppConfig): void {
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, stringify(config), "utf-8");
}

export function writeDefaultConfig(configPath: string): void {
  saveConfig(configPath, {
    api: { api_key: "your-api-key-here", endpoint: DEFAULT_ENDPOINT, workspace_id: "your-workspace-id-here" },
    ui: { ...DEFAULT_CONFIG.ui }
  });
}
