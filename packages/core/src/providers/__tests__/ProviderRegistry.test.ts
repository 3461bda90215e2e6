import test from "node:test";
import assert from "node:assert/strict";
import { ProviderRegistry, createProvider, defaultProviderRegistry } from "../ProviderRegistry.js";
import type { Provider, ProviderConfig, ProviderRequest, ProviderResponse } from "../ProviderTypes.js";

test("ProviderRegistry registers and creates providers", { concurrency: false }, async () => {
  const registry = new ProviderRegistry();
  const factory = (config: ProviderConfig): Provider => ({
    name: "stub",
    async generate(_request: ProviderRequest): Promise<ProviderResponse> {
      return {
        message: { role: "assistant", content: `model:${config.model}` },
      };
    },
  });

  registry.register("stub", factory);
  const provider = registry.create("stub", { model: "test-model" });
  assert.equal(provider.name, "stub");
  const response = await provider.generate({ messages: [] });
  assert.equal(response.message.content, "model:test-model");
  assert.deepEqual(registry.list(), ["stub"]);
});

test("ProviderRegistry throws on unknown provider", { concurrency: false }, () => {
  const registry = new ProviderRegistry();
  assert.throws(() => registry.create("missing", { model: "x" }), /Unknown provider: missing/);
});

test("ProviderRegistry rejects duplicate providers", { concurrency: false }, () => {
  const registry = new ProviderRegistry();
  const factory = (_config: ProviderConfig): Provider => ({
    name: "dup",
    async generate(_request: ProviderRequest): Promise<ProviderResponse> {
      return { message: { role: "assistant", content: "ok" } };
    },
  });

  registry.register("dup", factory);
  assert.throws(() => registry.register("dup", factory), /already registered/);
});

test("default registry ships the built-in providers", { concurrency: false }, () => {
  assert.deepEqual(defaultProviderRegistry.list(), ["openai-compatible", "openai", "anthropic"]);
  assert.equal(createProvider("anthropic", { model: "test-model" }).name, "anthropic");
  assert.equal(createProvider("openai", { model: "test-model" }).name, "openai-compatible");
});
