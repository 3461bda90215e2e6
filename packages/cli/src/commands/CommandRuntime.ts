import {
  BreakdownOrchestrator,
  ChangeDetector,
  RemoteToolHost,
  RunLogger,
  ToolRegistry,
  WatchStateStore,
  createBreakdownTools,
  createProvider,
  createRunId,
  createVaultTools,
  loadConfig,
  loadPrompts,
  registerRemoteTools,
  type Provider,
  type RunOutcome,
  type VaultsplitConfig,
} from "@vaultsplit/core";
import type { CommandArgs } from "./CommandArgs.js";

export const loadCommandConfig = (args: CommandArgs, requireProvider = true): Promise<VaultsplitConfig> =>
  loadConfig({ cli: args.cli, configPath: args.configPath, requireProvider });

export const buildProvider = (config: VaultsplitConfig): Provider =>
  createProvider(config.provider, {
    model: config.model,
    apiKey: config.apiKey,
    baseUrl: config.baseUrl,
    timeoutMs: config.limits.providerTimeoutMs || undefined,
  });

/**
 * Breakdown tools always run in process. Note tools come from the remote host
 * when one is configured, otherwise from the vault itself.
 */
export const buildToolRegistry = async (config: VaultsplitConfig): Promise<ToolRegistry> => {
  const registry = new ToolRegistry();
  registry.registerAll(createBreakdownTools());
  if (config.toolHost.url) {
    const host = new RemoteToolHost(config.toolHost.url, {
      authToken: config.toolHost.authToken,
      timeoutMs: config.limits.providerTimeoutMs || undefined,
    });
    const registered = await registerRemoteTools(registry, host);
    if (!registered.ok) {
      throw new Error(`Could not load tools from ${config.toolHost.url}: ${registered.error}`);
    }
  } else {
    registry.registerAll(createVaultTools());
  }
  return registry;
};

export const openDetector = (config: VaultsplitConfig, logger?: RunLogger): Promise<ChangeDetector> =>
  ChangeDetector.open({ store: new WatchStateStore(config.stateDir), extension: config.extension, logger });

export const createLogger = (config: VaultsplitConfig, runId: string): RunLogger =>
  new RunLogger(config.stateDir, config.logging.directory, runId);

export const createServiceLogger = (config: VaultsplitConfig, kind: string): RunLogger =>
  createLogger(config, `${kind}-${createRunId()}`);

export const buildOrchestrator = async (
  config: VaultsplitConfig,
  detector?: ChangeDetector,
): Promise<BreakdownOrchestrator> =>
  new BreakdownOrchestrator({
    provider: buildProvider(config),
    tools: await buildToolRegistry(config),
    vaultRoot: config.vaultRoot,
    limits: config.limits,
    prompts: await loadPrompts(config.prompts),
    detector,
    temperature: config.temperature,
    createLogger: (runId) => createLogger(config, runId),
  });

export const formatRunOutcome = (outcome: RunOutcome): string => {
  if (outcome.state === "completed") {
    const files = outcome.touchedFiles.length;
    return `Completed ${outcome.item}: ${outcome.steps.length} steps, ${files} file${files === 1 ? "" : "s"} written (run ${outcome.runId})`;
  }
  const step = outcome.error?.step ? ` at step ${outcome.error.step}` : "";
  return `Failed ${outcome.item}${step}: [${outcome.error?.kind ?? "unknown"}] ${outcome.error?.message ?? ""} (run ${outcome.runId})`;
};
