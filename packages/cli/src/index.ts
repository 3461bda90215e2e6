export { VaultsplitEntrypoint, USAGE } from "./bin/VaultsplitEntrypoint.js";
export { parseCommandArgs, CommandArgsError, type CommandArgs } from "./commands/CommandArgs.js";
export { formatWatchEvent } from "./commands/watch/WatchCommand.js";
export { formatRunOutcome } from "./commands/CommandRuntime.js";
