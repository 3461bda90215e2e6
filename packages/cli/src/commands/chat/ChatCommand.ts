import { createInterface } from "node:readline/promises";
import process from "node:process";
import { ChatSession, RunContext, createRunId, loadPrompts, roleProfile, type ChatReply } from "@vaultsplit/core";
import { COMMON_OPTIONS, parseCommandArgs } from "../CommandArgs.js";
import { buildProvider, buildToolRegistry, createLogger, loadCommandConfig } from "../CommandRuntime.js";

const USAGE = `Usage: vaultsplit chat [options]\n\nTalk to the executor with the vault tools attached.\n\n${COMMON_OPTIONS}`;

export const CHAT_HELP = [
  "/help    Show this help",
  "/status  Show turns used and the message count",
  "/quit    Leave the chat",
].join("\n");

export type ChatInput =
  | { kind: "command"; command: "help" | "status" | "quit" }
  | { kind: "message"; text: string }
  | { kind: "unknown"; command: string }
  | { kind: "empty" };

export const parseChatInput = (line: string): ChatInput => {
  const text = line.trim();
  if (!text) return { kind: "empty" };
  if (!text.startsWith("/")) return { kind: "message", text };
  const command = text.slice(1).toLowerCase();
  if (command === "help" || command === "status" || command === "quit") {
    return { kind: "command", command };
  }
  if (command === "exit") return { kind: "command", command: "quit" };
  return { kind: "unknown", command: text };
};

export const formatChatReply = (reply: ChatReply): string => {
  switch (reply.status) {
    case "ok":
      return reply.reply || "(no reply)";
    case "limit_reached":
      return reply.limit === "turns"
        ? "Turn limit reached. Start a new chat to continue."
        : `Stopped: ${reply.limit} limit reached for this turn.`;
    case "error":
      return `Error: ${reply.message}`;
  }
};

export class ChatCommand {
  static async run(argv: string[]): Promise<void> {
    const args = parseCommandArgs(argv);
    if (args.help) {
      // eslint-disable-next-line no-console
      console.log(USAGE);
      return;
    }
    const config = await loadCommandConfig(args);
    const runId = createRunId();
    const context = new RunContext(runId, config.vaultRoot);
    const prompts = await loadPrompts(config.prompts);
    const session = new ChatSession({
      provider: buildProvider(config),
      tools: await buildToolRegistry(config),
      context: {
        vaultRoot: config.vaultRoot,
        runId,
        recordTouchedFile: (filePath) => context.recordTouchedFile(filePath),
      },
      profile: roleProfile("executor", prompts),
      maxTurns: config.limits.maxChatTurns,
      maxToolRounds: config.limits.maxToolRounds,
      maxToolCalls: config.limits.maxToolCalls,
      maxTokens: config.limits.maxTokens,
      temperature: config.temperature,
      logger: createLogger(config, `chat-${runId}`),
    });

    const rl = createInterface({ input: process.stdin, output: process.stdout });
    rl.setPrompt("> ");
    // eslint-disable-next-line no-console
    console.log(`Chatting with ${config.provider}/${config.model} in ${config.vaultRoot}. Type /help for commands.`);
    rl.prompt();
    try {
      for await (const line of rl) {
        const input = parseChatInput(line);
        if (input.kind === "command" && input.command === "quit") break;
        if (input.kind === "unknown") {
          // eslint-disable-next-line no-console
          console.log(`Unknown command ${input.command}. Type /help.`);
        } else if (input.kind === "command" && input.command === "help") {
          // eslint-disable-next-line no-console
          console.log(CHAT_HELP);
        } else if (input.kind === "command") {
          const status = session.status();
          // eslint-disable-next-line no-console
          console.log(
            `Turns: ${status.turnsUsed}/${status.maxTurns}, messages: ${status.messages}, files written: ${context.getTouchedFiles().length}`,
          );
        } else if (input.kind === "message") {
          const reply = await session.send(input.text);
          // eslint-disable-next-line no-console
          console.log(formatChatReply(reply));
        }
        rl.prompt();
      }
    } finally {
      rl.close();
    }
  }
}
