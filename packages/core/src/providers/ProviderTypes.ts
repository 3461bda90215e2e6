export type ProviderRole = "system" | "user" | "assistant" | "tool";

export interface ProviderToolDefinition {
  name: string;
  description?: string;
  inputSchema?: Record<string, unknown>;
}

export interface ProviderToolCall {
  id: string;
  name: string;
  args: unknown;
}

export interface ProviderMessage {
  role: ProviderRole;
  content: string;
  name?: string;
  toolCallId?: string;
  /** Set on assistant messages that requested tools, so the next round can be replayed. */
  toolCalls?: ProviderToolCall[];
}

export interface ProviderUsage {
  inputTokens?: number;
  outputTokens?: number;
  totalTokens?: number;
}

export interface ProviderRequest {
  messages: ProviderMessage[];
  tools?: ProviderToolDefinition[];
  toolChoice?: "auto" | "none" | { name: string };
  maxTokens?: number;
  temperature?: number;
  signal?: AbortSignal;
}

export interface ProviderResponse {
  message: ProviderMessage;
  toolCalls?: ProviderToolCall[];
  usage?: ProviderUsage;
  raw?: unknown;
}

export interface ProviderConfig {
  model: string;
  apiKey?: string;
  baseUrl?: string;
  timeoutMs?: number;
}

export interface Provider {
  name: string;
  generate(request: ProviderRequest): Promise<ProviderResponse>;
}

export type ProviderErrorCode = "provider_http" | "provider_response" | "provider_timeout" | "provider_aborted";

export class ProviderError extends Error {
  readonly code: ProviderErrorCode;
  readonly status?: number;

  constructor(code: ProviderErrorCode, message: string, status?: number) {
    super(message);
    this.name = "ProviderError";
    this.code = code;
    this.status = status;
  }
}
