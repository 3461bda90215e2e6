import test from "node:test";
import assert from "node:assert/strict";
import { OpenAiCompatibleProvider } from "../OpenAiCompatibleProvider.js";
import { ProviderError } from "../ProviderTypes.js";
import { withStubbedFetch, type CapturedRequest } from "./fetchStub.js";

test("OpenAiCompatibleProvider returns message content and usage", { concurrency: false }, async () => {
  let captured: CapturedRequest | undefined;
  await withStubbedFetch(
    (request) => {
      captured = request;
      return {
        body: {
          choices: [{ message: { role: "assistant", content: "hello" } }],
          usage: { prompt_tokens: 3, completion_tokens: 2, total_tokens: 5 },
        },
      };
    },
    async () => {
      const provider = new OpenAiCompatibleProvider({
        model: "test-model",
        apiKey: "test-secret",
        baseUrl: "http://127.0.0.1:9999/v1",
      });
      const result = await provider.generate({ messages: [{ role: "user", content: "hi" }] });
      assert.equal(result.message.content, "hello");
      assert.deepEqual(result.usage, { inputTokens: 3, outputTokens: 2, totalTokens: 5 });
      assert.equal(result.toolCalls, undefined);
    },
  );

  assert.equal(captured?.url, "http://127.0.0.1:9999/v1/chat/completions");
  assert.equal(captured?.headers.authorization, "Bearer test-secret");
  assert.deepEqual(captured?.body, {
    model: "test-model",
    messages: [{ role: "user", content: "hi" }],
  });
});

test("OpenAiCompatibleProvider parses tool calls", { concurrency: false }, async () => {
  await withStubbedFetch(
    () => ({
      body: {
        choices: [
          {
            message: {
              role: "assistant",
              content: null,
              tool_calls: [
                {
                  id: "call_1",
                  type: "function",
                  function: { name: "read_note", arguments: "{\"path\":\"Clippings/a.md\"}" },
                },
              ],
            },
          },
        ],
      },
    }),
    async () => {
      const provider = new OpenAiCompatibleProvider({ model: "test-model", baseUrl: "http://127.0.0.1:9999/v1/" });
      const result = await provider.generate({ messages: [{ role: "user", content: "read" }] });
      assert.equal(result.message.content, "");
      assert.deepEqual(result.toolCalls, [{ id: "call_1", name: "read_note", args: { path: "Clippings/a.md" } }]);
      assert.deepEqual(result.message.toolCalls, result.toolCalls);
    },
  );
});

test("OpenAiCompatibleProvider replays tool calls and sends tool definitions", { concurrency: false }, async () => {
  let captured: CapturedRequest | undefined;
  await withStubbedFetch(
    (request) => {
      captured = request;
      return { body: { choices: [{ message: { role: "assistant", content: "done" } }] } };
    },
    async () => {
      const provider = new OpenAiCompatibleProvider({ model: "test-model", baseUrl: "http://127.0.0.1:9999/v1" });
      await provider.generate({
        messages: [
          { role: "user", content: "go" },
          {
            role: "assistant",
            content: "",
            toolCalls: [{ id: "call_1", name: "vault_info", args: {} }],
          },
          { role: "tool", content: "{}", toolCallId: "call_1", name: "vault_info" },
        ],
        tools: [{ name: "vault_info", description: "Vault info" }],
        toolChoice: "auto",
        temperature: 0.2,
      });
    },
  );

  assert.deepEqual(captured?.body, {
    model: "test-model",
    messages: [
      { role: "user", content: "go" },
      {
        role: "assistant",
        content: "",
        tool_calls: [{ id: "call_1", type: "function", function: { name: "vault_info", arguments: "{}" } }],
      },
      { role: "tool", content: "{}", tool_call_id: "call_1" },
    ],
    tools: [
      {
        type: "function",
        function: {
          name: "vault_info",
          description: "Vault info",
          parameters: { type: "object", properties: {} },
        },
      },
    ],
    tool_choice: "auto",
    temperature: 0.2,
  });
});

test("OpenAiCompatibleProvider surfaces HTTP errors as ProviderError", { concurrency: false }, async () => {
  await withStubbedFetch(
    () => ({ status: 500, body: "boom" }),
    async () => {
      const provider = new OpenAiCompatibleProvider({ model: "test-model", baseUrl: "http://127.0.0.1:9999/v1" });
      await assert.rejects(
        () => provider.generate({ messages: [{ role: "user", content: "hi" }] }),
        (error: unknown) =>
          error instanceof ProviderError &&
          error.code === "provider_http" &&
          error.status === 500 &&
          error.message === "OpenAI-compatible error 500: boom",
      );
    },
  );
});

test("OpenAiCompatibleProvider rejects responses without choices", { concurrency: false }, async () => {
  await withStubbedFetch(
    () => ({ body: { choices: [] } }),
    async () => {
      const provider = new OpenAiCompatibleProvider({ model: "test-model", baseUrl: "http://127.0.0.1:9999/v1" });
      await assert.rejects(
        () => provider.generate({ messages: [{ role: "user", content: "hi" }] }),
        /OpenAI-compatible response missing choices/,
      );
    },
  );
});

test("OpenAiCompatibleProvider reports an already aborted signal", { concurrency: false }, async () => {
  const original = globalThis.fetch;
  globalThis.fetch = async (...args: Parameters<typeof fetch>): Promise<Response> => {
    const signal = args[1]?.signal;
    if (signal?.aborted) {
      throw new Error("The operation was aborted");
    }
    return new Response("{}");
  };
  try {
    const controller = new AbortController();
    controller.abort();
    const provider = new OpenAiCompatibleProvider({ model: "test-model", baseUrl: "http://127.0.0.1:9999/v1" });
    await assert.rejects(
      () => provider.generate({ messages: [{ role: "user", content: "hi" }], signal: controller.signal }),
      (error: unknown) => error instanceof ProviderError && error.code === "provider_aborted",
    );
  } finally {
    globalThis.fetch = original;
  }
});
