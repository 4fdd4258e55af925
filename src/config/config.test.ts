import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { ConfigError, DEFAULT_ENDPOINT, defaultConfigPath, loadConfig, writeDefaultConfig } from "./config.js";

describe("loadConfig", () => {
  let dir: string;
  let file: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "threadscope-config-"));
    file = path.join(dir, "config.yaml");
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("uses defaults and the environment key when there is no file", () => {
    const cfg = loadConfig(file, { PLAIN_API_KEY: "test-secret" });
    assert.deepStrictEqual(cfg, {
      api: { api_key: "test-secret", endpoint: DEFAULT_ENDPOINT, workspace_id: "" },
      ui: { page_size: 20, show_debug: false }
    });
  });

  it("requires an API key", () => {
    assert.throws(() => loadConfig(file, {}), (err: unknown) => {
      assert.ok(err instanceof ConfigError);
      assert.strictEqual(
        err.message,
        "invalid configuration: api.api_key: API key is required (set PLAIN_API_KEY or api.api_key in the config file)"
      );
      return true;
    });
  });

  it("merges the file over defaults and lets the environment override the key", () => {
    fs.writeFileSync(file, "api:\n  api_key: file-key\nui:\n  page_size: 50\n");
    const fromFile = loadConfig(file, {});
    assert.strictEqual(fromFile.api.api_key, "file-key");
    assert.strictEqual(fromFile.api.endpoint, DEFAULT_ENDPOINT);
    assert.deepStrictEqual(fromFile.ui, { page_size: 50, show_debug: false });

    assert.strictEqual(loadConfig(file, { PLAIN_API_KEY: "test-secret" }).api.api_key, "test-secret");
  });

  it("rejects a non-positive page size", () => {
    fs.writeFileSync(file, "ui:\n  page_size: 0\n");
    assert.throws(() => loadConfig(file, { PLAIN_API_KEY: "test-secret" }), {
      message: "invalid configuration: ui.page_size: ui.page_size must be positive"
    });
  });

  it("reports YAML syntax errors", () => {
    fs.writeFileSync(file, "api: [\n");
    assert.throws(() => loadConfig(file, {}), (err: unknown) => {
      assert.ok(err instanceof ConfigError);
      assert.ok(err.message.startsWith(`failed to parse config file ${file}: `));
      return true;
    });
  });

  it("reports wrongly typed values with their path", () => {
    fs.writeFileSync(file, "ui:\n  page_size: lots\n");
    assert.throws(() => loadConfig(file, {}), (err: unknown) => {
      assert.ok(err instanceof ConfigError);
      assert.ok(err.message.startsWith(`invalid config file ${file}: ui.page_size: `));
      return true;
    });
  });

  it("treats an empty file as no settings", () => {
    fs.writeFileSync(file, "");
    assert.strictEqual(loadConfig(file, { PLAIN_API_KEY: "test-secret" }).ui.page_size, 20);
  });

  it("reads back a default file", () => {
    const nested = path.join(dir, "nested", "config.yaml");
    writeDefaultConfig(nested);
    const cfg = loadConfig(nested, {});
    assert.strictEqual(cfg.api.api_key, "your-api-key-here");
    assert.strictEqual(cfg.api.workspace_id, "your-workspace-id-here");
    assert.strictEqual(cfg.ui.page_size, 20);
  });
});

describe("defaultConfigPath", () => {
  it("honours THREADSCOPE_CONFIG", () => {
    assert.strictEqual(defaultConfigPath({ THREADSCOPE_CONFIG: "/tmp/ts.yaml" }), "/tmp/ts.yaml");
  });

  it("falls back to the home directory", () => {
    assert.strictEqual(defaultConfigPath({}), path.join(os.homedir(), ".threadscope", "config.yaml"));
  });
});
