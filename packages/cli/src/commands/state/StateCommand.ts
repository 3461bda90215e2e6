import { COMMON_OPTIONS, parseCommandArgs } from "../CommandArgs.js";
import { loadCommandConfig, openDetector } from "../CommandRuntime.js";

const USAGE = `Usage: vaultsplit state [--reset] [--json] [options]\n\nShows (or clears) the last-run time and the processed items for a vault.\n\n${COMMON_OPTIONS}`;

export class StateCommand {
  static async run(argv: string[]): Promise<void> {
    const args = parseCommandArgs(argv);
    if (args.help) {
      // eslint-disable-next-line no-console
      console.log(USAGE);
      return;
    }
    const config = await loadCommandConfig(args, false);
    const detector = await openDetector(config);
    if (args.reset) {
      await detector.reset();
      // eslint-disable-next-line no-console
      console.log(`Cleared state in ${config.stateDir}`);
      return;
    }
    const snapshot = detector.snapshot();
    const processed = Array.from(snapshot.processedItems).sort();
    if (args.json) {
      // eslint-disable-next-line no-console
      console.log(
        JSON.stringify(
          { stateDir: config.stateDir, lastRunTime: snapshot.lastRunTime.toISOString(), processedItems: processed },
          null,
          2,
        ),
      );
      return;
    }
    const lines = [
      `State dir: ${config.stateDir}`,
      `Last run: ${snapshot.lastRunTime.getTime() === 0 ? "never" : snapshot.lastRunTime.toISOString()}`,
      `Processed: ${processed.length}`,
      ...processed.map((item) => `  ${item}`),
    ];
    // eslint-disable-next-line no-console
    console.log(lines.join("\n"));
  }
}
