import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import path from "node:path";
import { PathHelper } from "@vaultsplit/shared";
import {
  DEFAULT_EXTENSION,
  DEFAULT_LIMITS,
  DEFAULT_LOGGING,
  DEFAULT_WATCH,
  DEFAULT_WATCH_DIR,
  type LimitsConfig,
  type LoggingConfig,
  type PromptConfig,
  type ToolHostConfig,
  type VaultsplitConfig,
  type WatchConfig,
} from "./Config.js";

export interface ConfigSource {
  vaultRoot?: string;
  watchDir?: string;
  extension?: string;
  stateDir?: string;
  provider?: string;
  model?: string;
  apiKey?: string;
  baseUrl?: string;
  temperature?: number;
  toolHost?: Partial<ToolHostConfig>;
  limits?: Partial<LimitsConfig>;
  watch?: Partial<WatchConfig>;
  prompts?: Partial<PromptConfig>;
  logging?: Partial<LoggingConfig>;
}

export interface LoadConfigOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  cli?: ConfigSource;
  configPath?: string;
  /** Commands that never call a model (e.g. `state`) skip the provider/model check. */
  requireProvider?: boolean;
}

export class ConfigError extends Error {
  readonly code = "config_invalid";

  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

const CONFIG_FILENAMES = ["vaultsplit.config.json", ".vaultsplitrc"];

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const parseNumberStrict = (value: string | undefined, label: string): number | undefined => {
  if (!value) return undefined;
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new ConfigError(`Invalid ${label}: expected number.`);
  }
  return parsed;
};

const parseBooleanStrict = (value: string | undefined, label: string): boolean | undefined => {
  if (!value) return undefined;
  const normalized = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "off"].includes(normalized)) return false;
  throw new ConfigError(`Invalid ${label}: expected boolean.`);
};

const stringField = (source: Record<string, unknown>, key: string, label: string): string | undefined => {
  const value = source[key];
  if (value === undefined) return undefined;
  if (typeof value !== "string") {
    throw new ConfigError(`Invalid ${label}.${key}: expected string.`);
  }
  return value;
};

const numberField = (source: Record<string, unknown>, key: string, label: string): number | undefined => {
  const value = source[key];
  if (value === undefined) return undefined;
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new ConfigError(`Invalid ${label}.${key}: expected number.`);
  }
  return value;
};

const booleanField = (source: Record<string, unknown>, key: string, label: string): boolean | undefined => {
  const value = source[key];
  if (value === undefined) return undefined;
  if (typeof value !== "boolean") {
    throw new ConfigError(`Invalid ${label}.${key}: expected boolean.`);
  }
  return value;
};

const section = (source: Record<string, unknown>, key: string, label: string): Record<string, unknown> | undefined => {
  const value = source[key];
  if (value === undefined) return undefined;
  if (!isRecord(value)) {
    throw new ConfigError(`Invalid ${label}.${key}: expected object.`);
  }
  return value;
};

const pruneUndefined = <T extends object>(value: T): Partial<T> => {
  const result: Partial<T> = {};
  for (const key in value) {
    if (value[key] !== undefined) result[key] = value[key];
  }
  return result;
};

const normalizeConfigSource = (raw: unknown, label: string): ConfigSource => {
  if (!isRecord(raw)) {
    throw new ConfigError(`Invalid ${label}: expected a JSON object.`);
  }
  const source: ConfigSource = {
    vaultRoot: stringField(raw, "vaultRoot", label),
    watchDir: stringField(raw, "watchDir", label),
    extension: stringField(raw, "extension", label),
    stateDir: stringField(raw, "stateDir", label),
    provider: stringField(raw, "provider", label),
    model: stringField(raw, "model", label),
    apiKey: stringField(raw, "apiKey", label),
    baseUrl: stringField(raw, "baseUrl", label),
    temperature: numberField(raw, "temperature", label),
  };

  const toolHost = section(raw, "toolHost", label);
  if (toolHost) {
    source.toolHost = pruneUndefined({
      url: stringField(toolHost, "url", `${label}.toolHost`),
      authToken: stringField(toolHost, "authToken", `${label}.toolHost`),
    });
  }
  const limits = section(raw, "limits", label);
  if (limits) {
    const limitsLabel = `${label}.limits`;
    source.limits = pruneUndefined({
      maxToolRounds: numberField(limits, "maxToolRounds", limitsLabel),
      maxToolCalls: numberField(limits, "maxToolCalls", limitsLabel),
      maxChatTurns: numberField(limits, "maxChatTurns", limitsLabel),
      stepTimeoutMs: numberField(limits, "stepTimeoutMs", limitsLabel),
      providerTimeoutMs: numberField(limits, "providerTimeoutMs", limitsLabel),
      maxTokens: numberField(limits, "maxTokens", limitsLabel),
    });
  }
  const watch = section(raw, "watch", label);
  if (watch) {
    source.watch = pruneUndefined({
      queueCapacity: numberField(watch, "queueCapacity", `${label}.watch`),
      catchUpScan: booleanField(watch, "catchUpScan", `${label}.watch`),
    });
  }
  const prompts = section(raw, "prompts", label);
  if (prompts) {
    source.prompts = pruneUndefined({
      plannerPath: stringField(prompts, "plannerPath", `${label}.prompts`),
      executorPath: stringField(prompts, "executorPath", `${label}.prompts`),
    });
  }
  const logging = section(raw, "logging", label);
  if (logging) {
    source.logging = pruneUndefined({ directory: stringField(logging, "directory", `${label}.logging`) });
  }
  return pruneUndefined(source);
};

const findConfigFile = (cwd: string): string | undefined => {
  for (const candidate of CONFIG_FILENAMES) {
    const candidatePath = path.join(cwd, candidate);
    if (existsSync(candidatePath)) {
      return candidatePath;
    }
  }
  return undefined;
};

const readConfigFile = async (configPath?: string): Promise<ConfigSource | undefined> => {
  if (!configPath) return undefined;
  if (!existsSync(configPath)) {
    throw new ConfigError(`Config file not found: ${configPath}`);
  }
  const content = await readFile(configPath, "utf8");
  if (!content.trim()) return undefined;
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(
      `Config file ${configPath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
  return normalizeConfigSource(parsed, path.basename(configPath));
};

const loadEnvConfig = (env: NodeJS.ProcessEnv): ConfigSource => {
  const limits = pruneUndefined<Partial<LimitsConfig>>({
    maxToolRounds: parseNumberStrict(env.VAULTSPLIT_MAX_TOOL_ROUNDS, "VAULTSPLIT_MAX_TOOL_ROUNDS"),
    maxToolCalls: parseNumberStrict(env.VAULTSPLIT_MAX_TOOL_CALLS, "VAULTSPLIT_MAX_TOOL_CALLS"),
    maxChatTurns: parseNumberStrict(env.VAULTSPLIT_MAX_CHAT_TURNS, "VAULTSPLIT_MAX_CHAT_TURNS"),
    stepTimeoutMs: parseNumberStrict(env.VAULTSPLIT_STEP_TIMEOUT_MS, "VAULTSPLIT_STEP_TIMEOUT_MS"),
    providerTimeoutMs: parseNumberStrict(env.VAULTSPLIT_PROVIDER_TIMEOUT_MS, "VAULTSPLIT_PROVIDER_TIMEOUT_MS"),
  });
  const watch = pruneUndefined<Partial<WatchConfig>>({
    catchUpScan: parseBooleanStrict(env.VAULTSPLIT_CATCH_UP_SCAN, "VAULTSPLIT_CATCH_UP_SCAN"),
  });

  const config: ConfigSource = { limits, watch };
  if (env.VAULTSPLIT_VAULT_ROOT) config.vaultRoot = env.VAULTSPLIT_VAULT_ROOT;
  if (env.VAULTSPLIT_WATCH_DIR) config.watchDir = env.VAULTSPLIT_WATCH_DIR;
  if (env.VAULTSPLIT_STATE_DIR) config.stateDir = env.VAULTSPLIT_STATE_DIR;
  if (env.VAULTSPLIT_PROVIDER) config.provider = env.VAULTSPLIT_PROVIDER;
  if (env.VAULTSPLIT_MODEL) config.model = env.VAULTSPLIT_MODEL;
  if (env.VAULTSPLIT_API_KEY) config.apiKey = env.VAULTSPLIT_API_KEY;
  if (env.VAULTSPLIT_BASE_URL) config.baseUrl = env.VAULTSPLIT_BASE_URL;
  if (env.VAULTSPLIT_TOOL_HOST_URL) config.toolHost = { url: env.VAULTSPLIT_TOOL_HOST_URL };
  if (env.VAULTSPLIT_LOG_DIR) config.logging = { directory: env.VAULTSPLIT_LOG_DIR };
  return config;
};

const mergeConfigs = (
  defaults: VaultsplitConfig,
  fileConfig?: ConfigSource,
  envConfig?: ConfigSource,
  cliConfig?: ConfigSource,
): VaultsplitConfig => {
  const toolHost = {
    ...defaults.toolHost,
    ...fileConfig?.toolHost,
    ...envConfig?.toolHost,
    ...cliConfig?.toolHost,
  };
  const limits = {
    ...defaults.limits,
    ...fileConfig?.limits,
    ...envConfig?.limits,
    ...cliConfig?.limits,
  };
  const watch = {
    ...defaults.watch,
    ...fileConfig?.watch,
    ...envConfig?.watch,
    ...cliConfig?.watch,
  };
  const prompts = {
    ...defaults.prompts,
    ...fileConfig?.prompts,
    ...envConfig?.prompts,
    ...cliConfig?.prompts,
  };
  const logging = {
    ...defaults.logging,
    ...fileConfig?.logging,
    ...envConfig?.logging,
    ...cliConfig?.logging,
  };

  return {
    ...defaults,
    ...fileConfig,
    ...envConfig,
    ...cliConfig,
    toolHost,
    limits,
    watch,
    prompts,
    logging,
  };
};

const finalizeConfig = (cwd: string, config: VaultsplitConfig): VaultsplitConfig => {
  const vaultRoot = path.resolve(cwd, config.vaultRoot);
  const stateDir = config.stateDir
    ? path.resolve(cwd, config.stateDir)
    : PathHelper.getVaultStateDir(vaultRoot);
  const extension = config.extension.startsWith(".") ? config.extension : `.${config.extension}`;
  return {
    ...config,
    vaultRoot,
    watchDir: path.resolve(vaultRoot, config.watchDir),
    stateDir,
    extension: extension.toLowerCase(),
    prompts: {
      plannerPath: config.prompts.plannerPath ? path.resolve(cwd, config.prompts.plannerPath) : undefined,
      executorPath: config.prompts.executorPath ? path.resolve(cwd, config.prompts.executorPath) : undefined,
    },
  };
};

const assertRequired = (config: VaultsplitConfig): void => {
  const missing: string[] = [];
  if (!config.provider) missing.push("provider");
  if (!config.model) missing.push("model");
  if (missing.length) {
    throw new ConfigError(`Missing required config: ${missing.join(", ")}`);
  }
};

const assertValid = (config: VaultsplitConfig): void => {
  const errors: string[] = [];
  const positive = (value: number, label: string): void => {
    if (!Number.isInteger(value) || value < 1) errors.push(label);
  };
  positive(config.limits.maxToolRounds, "limits.maxToolRounds");
  positive(config.limits.maxChatTurns, "limits.maxChatTurns");
  positive(config.watch.queueCapacity, "watch.queueCapacity");
  if (config.limits.maxToolCalls < 0) errors.push("limits.maxToolCalls");
  if (config.limits.stepTimeoutMs < 0) errors.push("limits.stepTimeoutMs");
  if (config.limits.providerTimeoutMs < 0) errors.push("limits.providerTimeoutMs");
  if (config.toolHost.url) {
    try {
      new URL(config.toolHost.url);
    } catch {
      errors.push("toolHost.url");
    }
  }
  if (errors.length) {
    throw new ConfigError(`Invalid config values: ${errors.join(", ")}`);
  }
};

export const loadConfig = async (options: LoadConfigOptions = {}): Promise<VaultsplitConfig> => {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  const configPath = options.configPath ? path.resolve(cwd, options.configPath) : findConfigFile(cwd);
  const fileConfig = await readConfigFile(configPath);
  const envConfig = loadEnvConfig(env);

  const defaults: VaultsplitConfig = {
    vaultRoot: ".",
    watchDir: DEFAULT_WATCH_DIR,
    extension: DEFAULT_EXTENSION,
    stateDir: "",
    provider: "",
    model: "",
    apiKey: undefined,
    baseUrl: undefined,
    toolHost: {},
    limits: DEFAULT_LIMITS,
    watch: DEFAULT_WATCH,
    prompts: {},
    logging: DEFAULT_LOGGING,
  };

  const cliConfig = options.cli ? pruneUndefined(options.cli) : undefined;
  const merged = mergeConfigs(defaults, fileConfig, envConfig, cliConfig);
  const finalized = finalizeConfig(cwd, merged);
  if (options.requireProvider ?? true) {
    assertRequired(finalized);
  }
  assertValid(finalized);
  return finalized;
};
