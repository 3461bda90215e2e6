import { COMMON_OPTIONS, parseCommandArgs } from "../CommandArgs.js";
import { buildOrchestrator, createServiceLogger, formatRunOutcome, loadCommandConfig, openDetector } from "../CommandRuntime.js";

const USAGE = `Usage: vaultsplit scan [options]\n\nOne pass over the watched folder: breaks down every article changed since the last run, then exits.\n\n${COMMON_OPTIONS}`;

export class ScanCommand {
  static async run(argv: string[]): Promise<void> {
    const args = parseCommandArgs(argv);
    if (args.help) {
      // eslint-disable-next-line no-console
      console.log(USAGE);
      return;
    }
    const config = await loadCommandConfig(args);
    const detector = await openDetector(config, createServiceLogger(config, "scan"));
    const orchestrator = await buildOrchestrator(config, detector);
    const items = await detector.scan(config.watchDir);
    if (items.length === 0) {
      // eslint-disable-next-line no-console
      console.log(`Nothing new in ${config.watchDir}`);
      return;
    }
    let failed = 0;
    for (const item of items) {
      const outcome = await orchestrator.run(item);
      if (outcome.state === "failed") failed += 1;
      // eslint-disable-next-line no-console
      console.log(formatRunOutcome(outcome));
    }
    if (failed > 0) {
      process.exitCode = 1;
    }
  }
}
