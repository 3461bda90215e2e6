import { readFile } from "node:fs/promises";
import path from "node:path";
import { createVaultWriter, resolveVaultPath, runBreakdown, toVaultRelative } from "@vaultsplit/core";
import { COMMON_OPTIONS, CommandArgsError, parseCommandArgs } from "../CommandArgs.js";
import { buildOrchestrator, formatRunOutcome, loadCommandConfig, openDetector } from "../CommandRuntime.js";

const USAGE = [
  "Usage: vaultsplit breakdown <article> [--outline <file>] [options]",
  "",
  "Breaks down one article. With --outline the notes and canvas are written straight from an",
  "outline file (# Summary / # Section / ## Subsection / # Special: Title) without calling a model.",
  "",
  COMMON_OPTIONS,
].join("\n");

export class BreakdownCommand {
  static async run(argv: string[]): Promise<void> {
    const args = parseCommandArgs(argv);
    if (args.help) {
      // eslint-disable-next-line no-console
      console.log(USAGE);
      return;
    }
    if (!args.target) {
      throw new CommandArgsError(USAGE);
    }

    if (args.outline) {
      const config = await loadCommandConfig(args, false);
      const article = path.resolve(args.target);
      const articlePath = toVaultRelative(config.vaultRoot, article);
      resolveVaultPath(config.vaultRoot, articlePath);
      const outline = await readFile(path.resolve(args.outline), "utf8");
      const result = await runBreakdown({ outline, articlePath }, createVaultWriter(config.vaultRoot));
      for (const document of result.documents) {
        // eslint-disable-next-line no-console
        console.log(`Wrote ${document.path}`);
      }
      for (const failure of result.failures) {
        // eslint-disable-next-line no-console
        console.error(`Failed ${failure.path}: ${failure.error}`);
      }
      if (result.failures.length > 0) process.exitCode = 1;
      return;
    }

    const config = await loadCommandConfig(args);
    const detector = await openDetector(config);
    const orchestrator = await buildOrchestrator(config, detector);
    const outcome = await orchestrator.run(path.resolve(args.target));
    // eslint-disable-next-line no-console
    console.log(formatRunOutcome(outcome));
    if (outcome.state === "failed") process.exitCode = 1;
  }
}
