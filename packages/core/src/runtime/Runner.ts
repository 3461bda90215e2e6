import type {
  Provider,
  ProviderMessage,
  ProviderResponse,
  ProviderToolCall,
  ProviderUsage,
} from "../providers/ProviderTypes.js";
import { ToolRegistry } from "../tools/ToolRegistry.js";
import type { ToolContext, ToolExecutionResult } from "../tools/ToolTypes.js";
import type { RunLogger } from "./RunLogger.js";

export interface RunnerOptions {
  provider: Provider;
  tools: ToolRegistry;
  context: ToolContext;
  /** Provider rounds allowed per `run` call. */
  maxSteps: number;
  maxToolCalls: number;
  maxTokens?: number;
  temperature?: number;
  signal?: AbortSignal;
  logger?: RunLogger;
}

export type RunnerStatus = "completed" | "limit_reached" | "cancelled";

export type RunnerLimit = "steps" | "tool_calls";

export interface RunnerResult {
  status: RunnerStatus;
  limit?: RunnerLimit;
  finalMessage?: ProviderMessage;
  messages: ProviderMessage[];
  toolCallsExecuted: number;
  usage?: ProviderUsage;
}

const buildToolMessage = (call: ProviderToolCall, content: string): ProviderMessage => ({
  role: "tool",
  content,
  toolCallId: call.id,
  name: call.name,
});

/**
 * Drives one provider conversation: each round the provider may request tools,
 * whose results are appended as tool messages before the next round. Caps end
 * the run with `limit_reached`; provider errors propagate to the caller.
 */
export class Runner {
  private provider: Provider;
  private tools: ToolRegistry;
  private context: ToolContext;
  private maxSteps: number;
  private maxToolCalls: number;
  private maxTokens?: number;
  private temperature?: number;
  private signal?: AbortSignal;
  private logger?: RunLogger;

  constructor(options: RunnerOptions) {
    this.provider = options.provider;
    this.tools = options.tools;
    this.context = options.context;
    this.maxSteps = options.maxSteps;
    this.maxToolCalls = options.maxToolCalls;
    this.maxTokens = options.maxTokens;
    this.temperature = options.temperature;
    this.signal = options.signal;
    this.logger = options.logger;
  }

  async run(initialMessages: ProviderMessage[]): Promise<RunnerResult> {
    const messages: ProviderMessage[] = [...initialMessages];
    let toolCallsExecuted = 0;
    let usageTotals: ProviderUsage | undefined;

    const recordUsage = (usage?: ProviderUsage): void => {
      if (!usage) return;
      if (!usageTotals) usageTotals = {};
      if (usage.inputTokens !== undefined) {
        usageTotals.inputTokens = (usageTotals.inputTokens ?? 0) + usage.inputTokens;
      }
      if (usage.outputTokens !== undefined) {
        usageTotals.outputTokens = (usageTotals.outputTokens ?? 0) + usage.outputTokens;
      }
      if (usage.totalTokens !== undefined) {
        usageTotals.totalTokens = (usageTotals.totalTokens ?? 0) + usage.totalTokens;
      }
    };

    const finish = async (
      status: RunnerStatus,
      finalMessage?: ProviderMessage,
      limit?: RunnerLimit,
    ): Promise<RunnerResult> => {
      if (status !== "completed" && this.logger) {
        await this.logger.log("runner_stopped", { status, limit, toolCallsExecuted });
      }
      return { status, limit, finalMessage, messages, toolCallsExecuted, usage: usageTotals };
    };

    const toolDefinitions = this.tools.describe().map((tool) => ({
      name: tool.name,
      description: tool.description,
      inputSchema: tool.inputSchema,
    }));

    for (let step = 0; step < this.maxSteps; step += 1) {
      if (this.signal?.aborted) {
        return finish("cancelled");
      }

      let response: ProviderResponse;
      try {
        response = await this.provider.generate({
          messages,
          tools: toolDefinitions.length ? toolDefinitions : undefined,
          toolChoice: toolDefinitions.length ? "auto" : undefined,
          maxTokens: this.maxTokens,
          temperature: this.temperature,
          signal: this.signal,
        });
      } catch (error) {
        if (this.signal?.aborted) return finish("cancelled");
        throw error;
      }

      recordUsage(response.usage);
      const toolCalls = response.toolCalls ?? [];
      const assistantMessage: ProviderMessage = toolCalls.length
        ? { ...response.message, toolCalls }
        : response.message;
      messages.push(assistantMessage);
      if (this.logger) {
        await this.logger.log("provider_response", {
          message: response.message,
          toolCalls: response.toolCalls,
          usage: response.usage,
        });
      }

      if (toolCalls.length === 0) {
        return finish("completed", response.message);
      }

      for (const call of toolCalls) {
        if (toolCallsExecuted >= this.maxToolCalls) {
          return finish("limit_reached", undefined, "tool_calls");
        }
        if (this.signal?.aborted) {
          return finish("cancelled");
        }
        toolCallsExecuted += 1;
        const result: ToolExecutionResult = await this.tools.execute(call.name, call.args, this.context);
        const content = result.ok ? result.output : `ERROR: ${result.error ?? "tool failed"}`;
        messages.push(buildToolMessage(call, content));
        if (this.logger) {
          await this.logger.log("tool_call", {
            name: call.name,
            args: call.args,
            ok: result.ok,
            error: result.error,
          });
        }
      }
    }

    return finish("limit_reached", undefined, "steps");
  }
}
