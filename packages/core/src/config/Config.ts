export interface LimitsConfig {
  /** Provider rounds allowed in one step turn before it ends as `limit_reached`. */
  maxToolRounds: number;
  maxToolCalls: number;
  maxChatTurns: number;
  stepTimeoutMs: number;
  providerTimeoutMs: number;
  maxTokens?: number;
}

export interface WatchConfig {
  queueCapacity: number;
  catchUpScan: boolean;
}

export interface ToolHostConfig {
  url?: string;
  authToken?: string;
}

export interface PromptConfig {
  plannerPath?: string;
  executorPath?: string;
}

export interface LoggingConfig {
  directory: string;
}

export interface VaultsplitConfig {
  vaultRoot: string;
  watchDir: string;
  extension: string;
  stateDir: string;
  provider: string;
  model: string;
  apiKey?: string;
  baseUrl?: string;
  temperature?: number;
  toolHost: ToolHostConfig;
  limits: LimitsConfig;
  watch: WatchConfig;
  prompts: PromptConfig;
  logging: LoggingConfig;
}

export const DEFAULT_WATCH_DIR = "Clippings";
export const DEFAULT_EXTENSION = ".md";
export const DEFAULT_LOG_DIR = "logs";

export const DEFAULT_LIMITS: LimitsConfig = {
  maxToolRounds: 12,
  maxToolCalls: 40,
  maxChatTurns: 20,
  stepTimeoutMs: 5 * 60 * 1000,
  providerTimeoutMs: 120_000,
};

export const DEFAULT_WATCH: WatchConfig = {
  queueCapacity: 32,
  catchUpScan: true,
};

export const DEFAULT_LOGGING: LoggingConfig = {
  directory: DEFAULT_LOG_DIR,
};
