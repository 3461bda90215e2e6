import { isRecord, optionalNumber, parseToolArgs, postJson } from "./ProviderHttp.js";
import {
  ProviderError,
  type Provider,
  type ProviderConfig,
  type ProviderMessage,
  type ProviderRequest,
  type ProviderResponse,
  type ProviderToolCall,
  type ProviderUsage,
} from "./ProviderTypes.js";

const normalizeBaseUrl = (baseUrl?: string): string => {
  const root = baseUrl ?? "https://api.openai.com/v1";
  return root.endsWith("/") ? root : `${root}/`;
};

const toOpenAiMessage = (message: ProviderMessage): Record<string, unknown> => ({
  role: message.role,
  content: message.content,
  name: message.role === "tool" ? undefined : message.name,
  tool_call_id: message.toolCallId,
  tool_calls: message.toolCalls?.length
    ? message.toolCalls.map((call) => ({
        id: call.id,
        type: "function",
        function: {
          name: call.name,
          arguments: typeof call.args === "string" ? call.args : JSON.stringify(call.args ?? {}),
        },
      }))
    : undefined,
});

const toToolChoice = (choice: ProviderRequest["toolChoice"]): unknown => {
  if (!choice || typeof choice === "string") return choice;
  return { type: "function", function: { name: choice.name } };
};

const parseToolCalls = (value: unknown): ProviderToolCall[] | undefined => {
  if (!Array.isArray(value) || value.length === 0) return undefined;
  const calls: ProviderToolCall[] = [];
  value.forEach((entry: unknown, index) => {
    if (!isRecord(entry) || !isRecord(entry.function)) return;
    const name = entry.function.name;
    if (typeof name !== "string") return;
    const args = entry.function.arguments;
    calls.push({
      id: typeof entry.id === "string" ? entry.id : `call_${index + 1}`,
      name,
      args: typeof args === "string" ? parseToolArgs(args) : args,
    });
  });
  return calls.length ? calls : undefined;
};

const parseUsage = (value: unknown): ProviderUsage | undefined => {
  if (!isRecord(value)) return undefined;
  return {
    inputTokens: optionalNumber(value.prompt_tokens),
    outputTokens: optionalNumber(value.completion_tokens),
    totalTokens: optionalNumber(value.total_tokens),
  };
};

export class OpenAiCompatibleProvider implements Provider {
  name = "openai-compatible";

  constructor(private config: ProviderConfig) {}

  async generate(request: ProviderRequest): Promise<ProviderResponse> {
    const url = new URL("chat/completions", normalizeBaseUrl(this.config.baseUrl)).toString();
    const headers: Record<string, string> = {};
    if (this.config.apiKey) {
      headers.authorization = `Bearer ${this.config.apiKey}`;
    }

    const tools = request.tools?.length
      ? request.tools.map((tool) => ({
          type: "function",
          function: {
            name: tool.name,
            description: tool.description,
            parameters: tool.inputSchema ?? { type: "object", properties: {} },
          },
        }))
      : undefined;

    const raw = await postJson({
      label: "OpenAI-compatible",
      url,
      headers,
      body: {
        model: this.config.model,
        messages: request.messages.map(toOpenAiMessage),
        tools,
        tool_choice: tools ? toToolChoice(request.toolChoice) : undefined,
        max_tokens: request.maxTokens,
        temperature: request.temperature,
      },
      timeoutMs: this.config.timeoutMs ?? 60_000,
      signal: request.signal,
    });

    const choices = isRecord(raw) ? raw.choices : undefined;
    const first: unknown = Array.isArray(choices) ? choices[0] : undefined;
    const choice = isRecord(first) && isRecord(first.message) ? first.message : undefined;
    if (!choice) {
      throw new ProviderError("provider_response", "OpenAI-compatible response missing choices");
    }

    const toolCalls = parseToolCalls(choice.tool_calls);
    return {
      message: {
        role: "assistant",
        content: typeof choice.content === "string" ? choice.content : "",
        toolCalls,
      },
      toolCalls,
      usage: isRecord(raw) ? parseUsage(raw.usage) : undefined,
      raw,
    };
  }
}
