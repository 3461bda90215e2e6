import type { Provider, ProviderMessage } from "../providers/ProviderTypes.js";
import type { RunLogger } from "../runtime/RunLogger.js";
import { Runner, type RunnerLimit } from "../runtime/Runner.js";
import type { ToolRegistry } from "../tools/ToolRegistry.js";
import type { ToolContext } from "../tools/ToolTypes.js";
import { systemMessage, type RoleProfile } from "./AgentRoles.js";

export interface ChatSessionOptions {
  provider: Provider;
  tools: ToolRegistry;
  context: ToolContext;
  profile: RoleProfile;
  maxTurns: number;
  maxToolRounds: number;
  maxToolCalls: number;
  maxTokens?: number;
  temperature?: number;
  logger?: RunLogger;
}

export type ChatReply =
  | { status: "ok"; reply: string; toolCalls: number }
  | { status: "limit_reached"; limit: "turns" | RunnerLimit }
  | { status: "error"; message: string };

export interface ChatStatus {
  turnsUsed: number;
  maxTurns: number;
  messages: number;
}

const UNANSWERED_TOOL_CALL = "ERROR: not executed (limit reached)";

/**
 * Gives every assistant tool call a matching tool message. A round cut short by
 * a limit or an abort leaves calls unanswered, and providers reject such history.
 */
export const closeOpenToolCalls = (messages: ProviderMessage[]): ProviderMessage[] => {
  const closed: ProviderMessage[] = [];
  let index = 0;
  while (index < messages.length) {
    const message = messages[index];
    index += 1;
    if (!message) continue;
    closed.push(message);
    if (message.role !== "assistant" || !message.toolCalls?.length) continue;
    const answered = new Set<string>();
    while (index < messages.length && messages[index]?.role === "tool") {
      const reply = messages[index];
      if (reply) {
        if (reply.toolCallId) answered.add(reply.toolCallId);
        closed.push(reply);
      }
      index += 1;
    }
    for (const call of message.toolCalls) {
      if (answered.has(call.id)) continue;
      closed.push({ role: "tool", content: UNANSWERED_TOOL_CALL, toolCallId: call.id, name: call.name });
    }
  }
  return closed;
};

/** Multi-turn conversation with one role; history carries over between turns. */
export class ChatSession {
  private options: ChatSessionOptions;
  private history: ProviderMessage[] = [];
  private turnsUsed = 0;

  constructor(options: ChatSessionOptions) {
    this.options = options;
  }

  status(): ChatStatus {
    return { turnsUsed: this.turnsUsed, maxTurns: this.options.maxTurns, messages: this.history.length };
  }

  reset(): void {
    this.history = [];
    this.turnsUsed = 0;
  }

  async send(text: string, signal?: AbortSignal): Promise<ChatReply> {
    if (this.turnsUsed >= this.options.maxTurns) {
      return { status: "limit_reached", limit: "turns" };
    }
    this.turnsUsed += 1;
    const { profile } = this.options;
    const runner = new Runner({
      provider: this.options.provider,
      tools: this.options.tools,
      context: { ...this.options.context, signal },
      maxSteps: this.options.maxToolRounds,
      maxToolCalls: this.options.maxToolCalls,
      maxTokens: this.options.maxTokens,
      temperature: this.options.temperature,
      signal,
      logger: this.options.logger,
    });
    const pending: ProviderMessage[] = [...this.history, { role: "user", content: text }];

    try {
      const result = await runner.run([systemMessage(profile), ...pending]);
      this.history = closeOpenToolCalls(result.messages.slice(1));
      if (result.status === "limit_reached") {
        return { status: "limit_reached", limit: result.limit ?? "steps" };
      }
      if (result.status === "cancelled") {
        return { status: "error", message: "Turn was cancelled" };
      }
      return { status: "ok", reply: result.finalMessage?.content ?? "", toolCalls: result.toolCallsExecuted };
    } catch (error) {
      return { status: "error", message: error instanceof Error ? error.message : String(error) };
    }
  }
}
