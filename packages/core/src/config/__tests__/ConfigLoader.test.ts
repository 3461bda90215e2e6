import test from "node:test";
import assert from "node:assert/strict";
import { mkdtempSync, writeFileSync } from "node:fs";
import os from "node:os";
import path from "node:path";
import { ConfigError, loadConfig } from "../ConfigLoader.js";

const makeTmpDir = (): string => mkdtempSync(path.join(os.tmpdir(), "vaultsplit-config-"));

test("loadConfig merges cli over env over file", { concurrency: false }, async () => {
  const tmpDir = makeTmpDir();
  writeFileSync(
    path.join(tmpDir, "vaultsplit.config.json"),
    JSON.stringify(
      {
        vaultRoot: "/file",
        provider: "file-provider",
        model: "file-model",
        limits: { maxToolRounds: 7 },
      },
      null,
      2,
    ),
  );

  const config = await loadConfig({
    cwd: tmpDir,
    env: {
      VAULTSPLIT_VAULT_ROOT: "/env",
      VAULTSPLIT_PROVIDER: "env-provider",
      VAULTSPLIT_MODEL: "env-model",
      VAULTSPLIT_MAX_TOOL_CALLS: "9",
    },
    cli: {
      vaultRoot: "cli-vault",
      provider: "cli-provider",
    },
  });

  assert.equal(config.vaultRoot, path.resolve(tmpDir, "cli-vault"));
  assert.equal(config.provider, "cli-provider");
  assert.equal(config.model, "env-model");
  assert.equal(config.limits.maxToolRounds, 7);
  assert.equal(config.limits.maxToolCalls, 9);
  assert.equal(config.limits.maxChatTurns, 20);
});

test("loadConfig applies defaults and resolves paths against the vault", { concurrency: false }, async () => {
  const tmpDir = makeTmpDir();
  const config = await loadConfig({
    cwd: tmpDir,
    env: {
      VAULTSPLIT_PROVIDER: "openai-compatible",
      VAULTSPLIT_MODEL: "test-model",
      VAULTSPLIT_STATE_DIR: "state",
    },
  });

  assert.equal(config.vaultRoot, tmpDir);
  assert.equal(config.watchDir, path.join(tmpDir, "Clippings"));
  assert.equal(config.stateDir, path.join(tmpDir, "state"));
  assert.equal(config.extension, ".md");
  assert.equal(config.logging.directory, "logs");
  assert.deepEqual(config.watch, { queueCapacity: 32, catchUpScan: true });
  assert.deepEqual(config.limits, {
    maxToolRounds: 12,
    maxToolCalls: 40,
    maxChatTurns: 20,
    stepTimeoutMs: 300000,
    providerTimeoutMs: 120000,
  });
});

test("loadConfig reads an explicit config path", { concurrency: false }, async () => {
  const tmpDir = makeTmpDir();
  writeFileSync(
    path.join(tmpDir, "custom.json"),
    JSON.stringify({
      provider: "anthropic",
      model: "file-model",
      watchDir: "Inbox",
      extension: "MD",
      watch: { queueCapacity: 4, catchUpScan: false },
      toolHost: { url: "http://127.0.0.1:8765" },
    }),
  );

  const config = await loadConfig({ cwd: tmpDir, env: {}, configPath: "custom.json" });

  assert.equal(config.provider, "anthropic");
  assert.equal(config.watchDir, path.join(tmpDir, "Inbox"));
  assert.equal(config.extension, ".md");
  assert.deepEqual(config.watch, { queueCapacity: 4, catchUpScan: false });
  assert.equal(config.toolHost.url, "http://127.0.0.1:8765");
});

test("loadConfig rejects invalid numbers in env", { concurrency: false }, async () => {
  const tmpDir = makeTmpDir();
  await assert.rejects(
    () =>
      loadConfig({
        cwd: tmpDir,
        env: {
          VAULTSPLIT_PROVIDER: "openai-compatible",
          VAULTSPLIT_MODEL: "test-model",
          VAULTSPLIT_MAX_TOOL_ROUNDS: "lots",
        },
      }),
    (error: unknown) =>
      error instanceof ConfigError && error.message === "Invalid VAULTSPLIT_MAX_TOOL_ROUNDS: expected number.",
  );
});

test("loadConfig rejects invalid booleans in env", { concurrency: false }, async () => {
  const tmpDir = makeTmpDir();
  await assert.rejects(
    () =>
      loadConfig({
        cwd: tmpDir,
        env: {
          VAULTSPLIT_PROVIDER: "openai-compatible",
          VAULTSPLIT_MODEL: "test-model",
          VAULTSPLIT_CATCH_UP_SCAN: "maybe",
        },
      }),
    /Invalid VAULTSPLIT_CATCH_UP_SCAN: expected boolean\./,
  );
});

test("loadConfig rejects wrongly typed file values", { concurrency: false }, async () => {
  const tmpDir = makeTmpDir();
  writeFileSync(
    path.join(tmpDir, "vaultsplit.config.json"),
    JSON.stringify({ limits: { maxToolCalls: "40" } }),
  );
  await assert.rejects(
    () => loadConfig({ cwd: tmpDir, env: {}, requireProvider: false }),
    /Invalid vaultsplit\.config\.json\.limits\.maxToolCalls: expected number\./,
  );
});

test("loadConfig requires provider and model unless told otherwise", { concurrency: false }, async () => {
  const tmpDir = makeTmpDir();
  await assert.rejects(() => loadConfig({ cwd: tmpDir, env: {} }), /Missing required config: provider, model/);
  const config = await loadConfig({ cwd: tmpDir, env: {}, requireProvider: false });
  assert.equal(config.provider, "");
});

test("loadConfig rejects non-positive caps", { concurrency: false }, async () => {
  const tmpDir = makeTmpDir();
  await assert.rejects(
    () =>
      loadConfig({
        cwd: tmpDir,
        env: { VAULTSPLIT_MAX_TOOL_ROUNDS: "0" },
        requireProvider: false,
      }),
    /Invalid config values: limits\.maxToolRounds/,
  );
});
