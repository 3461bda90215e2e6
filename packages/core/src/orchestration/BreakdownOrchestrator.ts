import { promises as fs } from "node:fs";
import path from "node:path";
import type { LimitsConfig } from "../config/Config.js";
import type { Provider, ProviderMessage } from "../providers/ProviderTypes.js";
import { RunContext, createRunId } from "../runtime/RunContext.js";
import type { RunLogger } from "../runtime/RunLogger.js";
import { Runner, type RunnerResult } from "../runtime/Runner.js";
import { ToolRegistry } from "../tools/ToolRegistry.js";
import { toVaultRelative } from "../tools/vault/VaultPaths.js";
import type { ChangeDetector } from "../watch/ChangeDetector.js";
import { roleProfile, systemMessage, type RoleProfile } from "./AgentRoles.js";
import { parsePlan } from "./PlanParser.js";
import { DEFAULT_PROMPTS, type PromptSet } from "./Prompts.js";
import { augmentStep, classifyStep, type StepCategory } from "./StepClassifier.js";

export type RunState = "idle" | "planning" | "executing" | "completed" | "failed";

export type RunErrorKind = "read" | "planning" | "tool_execution" | "limit_reached" | "cancelled";

export interface RunError {
  kind: RunErrorKind;
  message: string;
  /** 1-based index of the step that failed. */
  step?: number;
}

export type StepStatus = "completed" | "failed" | "limit_reached" | "cancelled";

export interface StepOutcome {
  index: number;
  instruction: string;
  category: StepCategory;
  status: StepStatus;
  toolCalls: number;
  finalMessage?: string;
}

export interface RunOutcome {
  runId: string;
  item: string;
  state: "completed" | "failed";
  plan: string[];
  steps: StepOutcome[];
  error?: RunError;
  touchedFiles: string[];
}

export interface BreakdownOrchestratorOptions {
  provider: Provider;
  tools: ToolRegistry;
  vaultRoot: string;
  limits: LimitsConfig;
  prompts?: PromptSet;
  /** Told about every completed run; failed runs leave the item unmarked. */
  detector?: ChangeDetector;
  temperature?: number;
  createLogger?: (runId: string) => RunLogger | undefined;
  onStateChange?: (state: RunState, runId: string, detail?: Record<string, unknown>) => void;
  now?: () => Date;
}

const errorText = (error: unknown): string => (error instanceof Error ? error.message : String(error));

interface StepSignal {
  signal: AbortSignal;
  dispose(): void;
}

const stepSignal = (timeoutMs: number, parent?: AbortSignal): StepSignal => {
  const controller = new AbortController();
  const onParentAbort = (): void => controller.abort(parent?.reason);
  if (parent?.aborted) {
    controller.abort(parent.reason);
  } else {
    parent?.addEventListener("abort", onParentAbort, { once: true });
  }
  const timer = timeoutMs > 0 ? setTimeout(() => controller.abort(new Error("Step timed out")), timeoutMs) : undefined;
  return {
    signal: controller.signal,
    dispose: () => {
      if (timer) clearTimeout(timer);
      parent?.removeEventListener("abort", onParentAbort);
    },
  };
};

/**
 * Runs one item through planner then executor. Planning happens once; steps
 * run in order, each in a fresh executor conversation, and the first step that
 * does not complete fails the run.
 */
export class BreakdownOrchestrator {
  private provider: Provider;
  private tools: ToolRegistry;
  private vaultRoot: string;
  private limits: LimitsConfig;
  private planner: RoleProfile;
  private executor: RoleProfile;
  private detector?: ChangeDetector;
  private temperature?: number;
  private createLogger?: (runId: string) => RunLogger | undefined;
  private onStateChange?: BreakdownOrchestratorOptions["onStateChange"];
  private now: () => Date;
  private state: RunState = "idle";

  constructor(options: BreakdownOrchestratorOptions) {
    const prompts = options.prompts ?? DEFAULT_PROMPTS;
    this.provider = options.provider;
    this.tools = options.tools;
    this.vaultRoot = path.resolve(options.vaultRoot);
    this.limits = options.limits;
    this.planner = roleProfile("planner", prompts);
    this.executor = roleProfile("executor", prompts);
    this.detector = options.detector;
    this.temperature = options.temperature;
    this.createLogger = options.createLogger;
    this.onStateChange = options.onStateChange;
    this.now = options.now ?? (() => new Date());
  }

  get currentState(): RunState {
    return this.state;
  }

  async run(item: string, signal?: AbortSignal): Promise<RunOutcome> {
    const absoluteItem = path.resolve(item);
    const runId = createRunId(this.now());
    const context = new RunContext(runId, this.vaultRoot);
    const logger = this.createLogger?.(runId);
    const articlePath = toVaultRelative(this.vaultRoot, absoluteItem);
    let plan: string[] = [];
    const steps: StepOutcome[] = [];

    const transition = async (state: RunState, detail: Record<string, unknown> = {}): Promise<void> => {
      this.state = state;
      this.onStateChange?.(state, runId, detail);
      await logger?.log("run_state", { state, ...detail });
    };

    const fail = async (error: RunError): Promise<RunOutcome> => {
      await transition("failed", { error });
      return {
        runId,
        item: absoluteItem,
        state: "failed",
        plan,
        steps,
        error,
        touchedFiles: context.getTouchedFiles(),
      };
    };

    await transition("idle", { item: absoluteItem, articlePath });

    let articleContent: string;
    try {
      articleContent = await fs.readFile(absoluteItem, "utf8");
    } catch (error) {
      return fail({ kind: "read", message: `Failed to read ${absoluteItem}: ${errorText(error)}` });
    }

    await transition("planning");
    const planning = await this.plan(articlePath, articleContent, context, logger, signal);
    if (!planning.ok) {
      return fail({ kind: planning.kind, message: planning.message });
    }
    plan = planning.steps;
    await logger?.writeArtifact("plan", { text: planning.text, steps: plan });

    for (const [offset, instruction] of plan.entries()) {
      const index = offset + 1;
      await transition("executing", { step: index, instruction });
      const category = classifyStep(instruction);
      const task = augmentStep(instruction, category, { articleContent, articlePath });
      const scoped = stepSignal(this.limits.stepTimeoutMs, signal);
      let result: RunnerResult;
      try {
        result = await this.execute(task, context, logger, scoped.signal);
      } catch (error) {
        steps.push({ index, instruction, category, status: "failed", toolCalls: 0 });
        return fail({ kind: "tool_execution", message: errorText(error), step: index });
      } finally {
        scoped.dispose();
      }

      const outcome: StepOutcome = {
        index,
        instruction,
        category,
        status: result.status,
        toolCalls: result.toolCallsExecuted,
        finalMessage: result.finalMessage?.content,
      };
      steps.push(outcome);
      await logger?.log("step_finished", {
        step: index,
        status: outcome.status,
        toolCalls: outcome.toolCalls,
        limit: result.limit,
      });
      if (result.status === "limit_reached") {
        return fail({
          kind: "limit_reached",
          message: `Step ${index} hit the ${result.limit ?? "steps"} limit`,
          step: index,
        });
      }
      if (result.status === "cancelled") {
        return fail({ kind: "cancelled", message: `Step ${index} was cancelled`, step: index });
      }
    }

    await transition("completed", { steps: steps.length, touchedFiles: context.getTouchedFiles() });
    if (this.detector) {
      await this.detector.markProcessed(absoluteItem);
    }
    return {
      runId,
      item: absoluteItem,
      state: "completed",
      plan,
      steps,
      touchedFiles: context.getTouchedFiles(),
    };
  }

  private async plan(
    articlePath: string,
    articleContent: string,
    context: RunContext,
    logger: RunLogger | undefined,
    signal: AbortSignal | undefined,
  ): Promise<
    | { ok: true; text: string; steps: string[] }
    | { ok: false; kind: "planning" | "cancelled"; message: string }
  > {
    const request = `User request: Break down the article located at ${articlePath}\n\nArticle Content:\n${articleContent}`;
    const scoped = stepSignal(this.limits.stepTimeoutMs, signal);
    let result: RunnerResult;
    try {
      result = await new Runner({
        provider: this.provider,
        tools: this.planner.usesTools ? this.tools : new ToolRegistry(),
        context: { vaultRoot: this.vaultRoot, runId: context.runId, signal: scoped.signal },
        maxSteps: 1,
        maxToolCalls: 0,
        maxTokens: this.limits.maxTokens,
        temperature: this.temperature,
        signal: scoped.signal,
        logger,
      }).run([systemMessage(this.planner), { role: "user", content: request }]);
    } catch (error) {
      return { ok: false, kind: "planning", message: `Planner failed: ${errorText(error)}` };
    } finally {
      scoped.dispose();
    }

    if (result.status === "cancelled") {
      return { ok: false, kind: "cancelled", message: "Planning was cancelled" };
    }
    const text = result.finalMessage?.content.trim() ?? "";
    if (!text) {
      return { ok: false, kind: "planning", message: "Planner returned no plan" };
    }
    const steps = parsePlan(text);
    if (steps.length === 0) {
      return { ok: false, kind: "planning", message: "Planner reply contained no numbered steps" };
    }
    return { ok: true, text, steps };
  }

  private async execute(
    task: string,
    context: RunContext,
    logger: RunLogger | undefined,
    signal: AbortSignal,
  ): Promise<RunnerResult> {
    const messages: ProviderMessage[] = [systemMessage(this.executor), { role: "user", content: task }];
    const runner = new Runner({
      provider: this.provider,
      tools: this.executor.usesTools ? this.tools : new ToolRegistry(),
      context: {
        vaultRoot: this.vaultRoot,
        runId: context.runId,
        signal,
        recordTouchedFile: (filePath) => context.recordTouchedFile(filePath),
      },
      maxSteps: this.limits.maxToolRounds,
      maxToolCalls: this.limits.maxToolCalls,
      maxTokens: this.limits.maxTokens,
      temperature: this.temperature,
      signal,
      logger,
    });
    return runner.run(messages);
  }
}
