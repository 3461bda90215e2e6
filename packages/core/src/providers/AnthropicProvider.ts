import { isRecord, optionalNumber, postJson } from "./ProviderHttp.js";
import {
  ProviderError,
  type Provider,
  type ProviderConfig,
  type ProviderMessage,
  type ProviderRequest,
  type ProviderResponse,
  type ProviderToolCall,
} from "./ProviderTypes.js";

export const ANTHROPIC_VERSION = "2023-06-01";
const DEFAULT_MAX_TOKENS = 4096;

type AnthropicBlock =
  | { type: "text"; text: string }
  | { type: "tool_use"; id: string; name: string; input: unknown }
  | { type: "tool_result"; tool_use_id: string; content: string; is_error?: boolean };

interface AnthropicMessage {
  role: "user" | "assistant";
  content: string | AnthropicBlock[];
}

const normalizeBaseUrl = (baseUrl?: string): string => {
  const root = baseUrl ?? "https://api.anthropic.com";
  return root.endsWith("/") ? root : `${root}/`;
};

const toBlocks = (content: string | AnthropicBlock[]): AnthropicBlock[] =>
  typeof content === "string" ? (content ? [{ type: "text", text: content }] : []) : content;

/**
 * Maps the provider-neutral transcript onto the messages API: system messages
 * are lifted out, tool results become `tool_result` blocks on a user turn and
 * consecutive same-role turns are merged.
 */
export const toAnthropicMessages = (
  messages: ProviderMessage[],
): { system?: string; messages: AnthropicMessage[] } => {
  const systemParts: string[] = [];
  const result: AnthropicMessage[] = [];

  const append = (role: AnthropicMessage["role"], blocks: AnthropicBlock[]): void => {
    const last = result[result.length - 1];
    if (last && last.role === role) {
      last.content = [...toBlocks(last.content), ...blocks];
      return;
    }
    result.push({ role, content: blocks });
  };

  for (const message of messages) {
    if (message.role === "system") {
      systemParts.push(message.content);
      continue;
    }
    if (message.role === "tool") {
      append("user", [
        {
          type: "tool_result",
          tool_use_id: message.toolCallId ?? "",
          content: message.content,
          is_error: message.content.startsWith("ERROR:") ? true : undefined,
        },
      ]);
      continue;
    }
    if (message.role === "assistant" && message.toolCalls?.length) {
      append("assistant", [
        ...toBlocks(message.content),
        ...message.toolCalls.map((call): AnthropicBlock => ({
          type: "tool_use",
          id: call.id,
          name: call.name,
          input: call.args ?? {},
        })),
      ]);
      continue;
    }
    append(message.role, toBlocks(message.content));
  }

  return {
    system: systemParts.length ? systemParts.join("\n\n") : undefined,
    messages: result,
  };
};

const toToolChoice = (choice: ProviderRequest["toolChoice"]): unknown => {
  if (!choice) return undefined;
  if (choice === "auto") return { type: "auto" };
  if (choice === "none") return { type: "none" };
  return { type: "tool", name: choice.name };
};

export class AnthropicProvider implements Provider {
  name = "anthropic";

  constructor(private config: ProviderConfig) {}

  async generate(request: ProviderRequest): Promise<ProviderResponse> {
    const url = new URL("v1/messages", normalizeBaseUrl(this.config.baseUrl)).toString();
    const headers: Record<string, string> = { "anthropic-version": ANTHROPIC_VERSION };
    if (this.config.apiKey) {
      headers["x-api-key"] = this.config.apiKey;
    }

    const { system, messages } = toAnthropicMessages(request.messages);
    const tools = request.tools?.length
      ? request.tools.map((tool) => ({
          name: tool.name,
          description: tool.description,
          input_schema: tool.inputSchema ?? { type: "object", properties: {} },
        }))
      : undefined;

    const raw = await postJson({
      label: "Anthropic",
      url,
      headers,
      body: {
        model: this.config.model,
        max_tokens: request.maxTokens ?? DEFAULT_MAX_TOKENS,
        system,
        messages,
        tools,
        tool_choice: tools ? toToolChoice(request.toolChoice) : undefined,
        temperature: request.temperature,
      },
      timeoutMs: this.config.timeoutMs ?? 60_000,
      signal: request.signal,
    });

    if (!isRecord(raw) || !Array.isArray(raw.content)) {
      throw new ProviderError("provider_response", "Anthropic response missing content");
    }

    const textParts: string[] = [];
    const toolCalls: ProviderToolCall[] = [];
    for (const block of raw.content) {
      if (!isRecord(block)) continue;
      if (block.type === "text" && typeof block.text === "string") {
        textParts.push(block.text);
      } else if (block.type === "tool_use" && typeof block.id === "string" && typeof block.name === "string") {
        toolCalls.push({ id: block.id, name: block.name, args: block.input });
      }
    }

    const usage = isRecord(raw.usage) ? raw.usage : undefined;
    const inputTokens = optionalNumber(usage?.input_tokens);
    const outputTokens = optionalNumber(usage?.output_tokens);
    return {
      message: {
        role: "assistant",
        content: textParts.join(""),
        toolCalls: toolCalls.length ? toolCalls : undefined,
      },
      toolCalls: toolCalls.length ? toolCalls : undefined,
      usage: usage
        ? {
            inputTokens,
            outputTokens,
            totalTokens:
              inputTokens !== undefined && outputTokens !== undefined ? inputTokens + outputTokens : undefined,
          }
        : undefined,
      raw,
    };
  }
}
