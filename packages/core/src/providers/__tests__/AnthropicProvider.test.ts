import test from "node:test";
import assert from "node:assert/strict";
import { ANTHROPIC_VERSION, AnthropicProvider, toAnthropicMessages } from "../AnthropicProvider.js";
import { withStubbedFetch, type CapturedRequest } from "./fetchStub.js";

test("toAnthropicMessages lifts system prompts and merges tool results", { concurrency: false }, () => {
  const mapped = toAnthropicMessages([
    { role: "system", content: "You split articles." },
    { role: "user", content: "go" },
    {
      role: "assistant",
      content: "Reading both.",
      toolCalls: [
        { id: "tu_1", name: "read_note", args: { path: "a.md" } },
        { id: "tu_2", name: "read_note", args: { path: "b.md" } },
      ],
    },
    { role: "tool", content: "alpha", toolCallId: "tu_1" },
    { role: "tool", content: "ERROR: missing", toolCallId: "tu_2" },
  ]);

  assert.equal(mapped.system, "You split articles.");
  assert.deepEqual(mapped.messages, [
    { role: "user", content: [{ type: "text", text: "go" }] },
    {
      role: "assistant",
      content: [
        { type: "text", text: "Reading both." },
        { type: "tool_use", id: "tu_1", name: "read_note", input: { path: "a.md" } },
        { type: "tool_use", id: "tu_2", name: "read_note", input: { path: "b.md" } },
      ],
    },
    {
      role: "user",
      content: [
        { type: "tool_result", tool_use_id: "tu_1", content: "alpha", is_error: undefined },
        { type: "tool_result", tool_use_id: "tu_2", content: "ERROR: missing", is_error: true },
      ],
    },
  ]);
});

test("AnthropicProvider sends headers and parses tool_use blocks", { concurrency: false }, async () => {
  let captured: CapturedRequest | undefined;
  await withStubbedFetch(
    (request) => {
      captured = request;
      return {
        body: {
          content: [
            { type: "text", text: "Writing notes." },
            { type: "tool_use", id: "tu_9", name: "write_note", input: { path: "x.md", content: "x" } },
          ],
          usage: { input_tokens: 10, output_tokens: 4 },
        },
      };
    },
    async () => {
      const provider = new AnthropicProvider({
        model: "test-model",
        apiKey: "test-secret",
        baseUrl: "http://127.0.0.1:9998",
      });
      const result = await provider.generate({
        messages: [
          { role: "system", content: "sys" },
          { role: "user", content: "hi" },
        ],
        tools: [{ name: "write_note", inputSchema: { type: "object", required: ["path"] } }],
        toolChoice: "auto",
      });

      assert.equal(result.message.content, "Writing notes.");
      assert.deepEqual(result.toolCalls, [
        { id: "tu_9", name: "write_note", args: { path: "x.md", content: "x" } },
      ]);
      assert.deepEqual(result.usage, { inputTokens: 10, outputTokens: 4, totalTokens: 14 });
    },
  );

  assert.equal(captured?.url, "http://127.0.0.1:9998/v1/messages");
  assert.equal(captured?.headers["x-api-key"], "test-secret");
  assert.equal(captured?.headers["anthropic-version"], ANTHROPIC_VERSION);
  assert.deepEqual(captured?.body, {
    model: "test-model",
    max_tokens: 4096,
    system: "sys",
    messages: [{ role: "user", content: [{ type: "text", text: "hi" }] }],
    tools: [{ name: "write_note", input_schema: { type: "object", required: ["path"] } }],
    tool_choice: { type: "auto" },
  });
});

test("AnthropicProvider rejects replies without content", { concurrency: false }, async () => {
  await withStubbedFetch(
    () => ({ body: { type: "error" } }),
    async () => {
      const provider = new AnthropicProvider({ model: "test-model", baseUrl: "http://127.0.0.1:9998" });
      await assert.rejects(
        () => provider.generate({ messages: [{ role: "user", content: "hi" }] }),
        /Anthropic response missing content/,
      );
    },
  );
});
