export * from "./config/Config.js";
export * from "./config/ConfigLoader.js";
export * from "./providers/ProviderTypes.js";
export * from "./providers/ProviderRegistry.js";
export * from "./providers/OpenAiCompatibleProvider.js";
export * from "./providers/AnthropicProvider.js";
export * from "./tools/ToolTypes.js";
export * from "./tools/ToolRegistry.js";
export * from "./tools/vault/VaultPaths.js";
export * from "./tools/vault/VaultTools.js";
export * from "./tools/breakdown/BreakdownTools.js";
export * from "./tools/remote/RemoteToolHost.js";
export * from "./runtime/RunContext.js";
export * from "./runtime/RunLogger.js";
export * from "./runtime/Runner.js";
export * from "./breakdown/StructureParser.js";
export * from "./breakdown/FileNaming.js";
export * from "./breakdown/DocumentMaterializer.js";
export * from "./breakdown/CanvasLayout.js";
export * from "./breakdown/BreakdownPipeline.js";
export * from "./watch/WatchStateStore.js";
export * from "./watch/AsyncChannel.js";
export * from "./watch/ChangeDetector.js";
export * from "./watch/WatchService.js";
export * from "./orchestration/Prompts.js";
export * from "./orchestration/PlanParser.js";
export * from "./orchestration/StepClassifier.js";
export * from "./orchestration/AgentRoles.js";
export * from "./orchestration/BreakdownOrchestrator.js";
export * from "./orchestration/ChatSession.js";
