import { readFileSync } from "node:fs";
import { BreakdownCommand } from "../commands/breakdown/BreakdownCommand.js";
import { ChatCommand } from "../commands/chat/ChatCommand.js";
import { ScanCommand } from "../commands/scan/ScanCommand.js";
import { StateCommand } from "../commands/state/StateCommand.js";
import { WatchCommand } from "../commands/watch/WatchCommand.js";

export const USAGE = [
  "Usage: vaultsplit <watch|scan|breakdown|chat|state> [...args]",
  "",
  "Commands:",
  "  watch      Watch the clippings folder and break down each new article",
  "  scan       Break down articles added since the last run, then exit",
  "  breakdown  Break down one article (or write notes from an outline with --outline)",
  "  chat       Interactive session with the vault tools",
  "  state      Show or reset the processed-items state",
  "",
  "Run `vaultsplit <command> --help` for options.",
].join("\n");

export const readPackageVersion = (): string => {
  try {
    const raw: unknown = JSON.parse(readFileSync(new URL("../../package.json", import.meta.url), "utf8"));
    if (typeof raw === "object" && raw !== null && "version" in raw && typeof raw.version === "string") {
      return raw.version;
    }
  } catch {
    return "dev";
  }
  return "dev";
};

export class VaultsplitEntrypoint {
  static async run(argv: string[] = process.argv.slice(2)): Promise<void> {
    const [command, ...rest] = argv;
    if (command === "--version" || command === "-v" || command === "version") {
      // eslint-disable-next-line no-console
      console.log(readPackageVersion());
      return;
    }
    if (command === "--help" || command === "-h" || command === "help") {
      // eslint-disable-next-line no-console
      console.log(USAGE);
      return;
    }
    if (!command) {
      throw new Error(USAGE);
    }
    switch (command) {
      case "watch":
        await WatchCommand.run(rest);
        return;
      case "scan":
        await ScanCommand.run(rest);
        return;
      case "breakdown":
        await BreakdownCommand.run(rest);
        return;
      case "chat":
        await ChatCommand.run(rest);
        return;
      case "state":
        await StateCommand.run(rest);
        return;
      default:
        throw new Error(`Unknown command: ${command}\n\n${USAGE}`);
    }
  }
}
