import type { ConfigSource, LimitsConfig } from "@vaultsplit/core";

export interface CommandArgs {
  configPath?: string;
  cli: ConfigSource;
  /** First positional argument, e.g. the article for `breakdown`. */
  target?: string;
  outline?: string;
  catchUp?: boolean;
  reset: boolean;
  json: boolean;
  help: boolean;
}

export class CommandArgsError extends Error {
  readonly code = "invalid_args";

  constructor(message: string) {
    super(message);
    this.name = "CommandArgsError";
  }
}

type StringConfigKey = "vaultRoot" | "watchDir" | "extension" | "stateDir" | "provider" | "model" | "apiKey" | "baseUrl";

const STRING_FLAGS = new Map<string, StringConfigKey>([
  ["--vault", "vaultRoot"],
  ["--watch-dir", "watchDir"],
  ["--extension", "extension"],
  ["--state-dir", "stateDir"],
  ["--provider", "provider"],
  ["--model", "model"],
  ["--api-key", "apiKey"],
  ["--base-url", "baseUrl"],
]);

const LIMIT_FLAGS = new Map<string, keyof LimitsConfig>([
  ["--max-tool-rounds", "maxToolRounds"],
  ["--max-tool-calls", "maxToolCalls"],
  ["--max-chat-turns", "maxChatTurns"],
  ["--step-timeout-ms", "stepTimeoutMs"],
  ["--max-tokens", "maxTokens"],
]);

const parseNumber = (flag: string, value: string): number => {
  const parsed = Number(value);
  if (!value.trim() || !Number.isFinite(parsed)) {
    throw new CommandArgsError(`Invalid value for ${flag}: expected number`);
  }
  return parsed;
};

export const parseCommandArgs = (argv: string[]): CommandArgs => {
  const parsed: CommandArgs = { cli: {}, reset: false, json: false, help: false };
  const limits: Partial<LimitsConfig> = {};

  const valueFor = (flag: string, index: number): string => {
    const value = argv[index + 1];
    if (value === undefined || value.startsWith("--")) {
      throw new CommandArgsError(`Missing value for ${flag}`);
    }
    return value;
  };

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (arg === undefined) continue;
    const configKey = STRING_FLAGS.get(arg);
    if (configKey) {
      parsed.cli[configKey] = valueFor(arg, i);
      i += 1;
      continue;
    }
    const limitKey = LIMIT_FLAGS.get(arg);
    if (limitKey) {
      limits[limitKey] = parseNumber(arg, valueFor(arg, i));
      i += 1;
      continue;
    }
    switch (arg) {
      case "--config":
        parsed.configPath = valueFor(arg, i);
        i += 1;
        break;
      case "--tool-host":
        parsed.cli.toolHost = { url: valueFor(arg, i) };
        i += 1;
        break;
      case "--temperature":
        parsed.cli.temperature = parseNumber(arg, valueFor(arg, i));
        i += 1;
        break;
      case "--outline":
        parsed.outline = valueFor(arg, i);
        i += 1;
        break;
      case "--no-catch-up":
        parsed.catchUp = false;
        break;
      case "--catch-up":
        parsed.catchUp = true;
        break;
      case "--reset":
        parsed.reset = true;
        break;
      case "--json":
        parsed.json = true;
        break;
      case "--help":
      case "-h":
        parsed.help = true;
        break;
      default:
        if (arg.startsWith("-")) {
          throw new CommandArgsError(`Unknown option: ${arg}`);
        }
        if (parsed.target !== undefined) {
          throw new CommandArgsError(`Unexpected argument: ${arg}`);
        }
        parsed.target = arg;
        break;
    }
  }

  if (Object.keys(limits).length > 0) {
    parsed.cli.limits = limits;
  }
  return parsed;
};

export const COMMON_OPTIONS = [
  "Options:",
  "  --vault <path>            Vault root (default: current directory)",
  "  --watch-dir <path>        Watched folder, relative to the vault (default: Clippings)",
  "  --state-dir <path>        Where last-run time and processed items are kept",
  "  --config <path>           Config file (default: ./vaultsplit.config.json)",
  "  --provider <name>         openai-compatible | openai | anthropic",
  "  --model <name>            Model id",
  "  --api-key <key>           Provider API key",
  "  --base-url <url>          Provider base URL",
  "  --tool-host <url>         Use a remote tool host instead of the in-process vault tools",
  "  --max-tool-rounds <n>     Provider rounds per step",
  "  --max-tool-calls <n>      Tool calls per step",
  "  --step-timeout-ms <n>     Abort a step after this long (0 disables)",
  "  --help, -h                Show help",
].join("\n");
