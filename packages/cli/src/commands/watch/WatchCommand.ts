import { WatchService, type WatchEvent } from "@vaultsplit/core";
import { COMMON_OPTIONS, parseCommandArgs } from "../CommandArgs.js";
import { buildOrchestrator, createServiceLogger, formatRunOutcome, loadCommandConfig, openDetector } from "../CommandRuntime.js";

const USAGE = `Usage: vaultsplit watch [--no-catch-up] [options]\n\nBreaks down every new article that lands in the watched folder.\n\n${COMMON_OPTIONS}`;

export const formatWatchEvent = (event: WatchEvent): string => {
  switch (event.type) {
    case "started":
      return `Watching ${event.directory}`;
    case "queued":
      return `Queued ${event.item}${event.source === "catch_up" ? " (catch-up)" : ""}`;
    case "dropped":
      return `Dropped ${event.item}: ${event.reason === "overflow" ? "queue is full" : "already queued"}`;
    case "run_finished":
      return event.outcome.state === "completed"
        ? `Finished ${event.item}`
        : `Failed ${event.item}: [${event.outcome.error?.kind ?? "unknown"}] ${event.outcome.error?.message ?? ""}`;
    case "run_crashed":
      return `Crashed ${event.item}: ${event.message}`;
    case "watch_error":
      return `Watch error: ${event.message}`;
    case "stopped":
      return event.reason === "persistence_error"
        ? "Stopped: processed-state could not be saved"
        : "Stopped";
  }
};

export class WatchCommand {
  static async run(argv: string[]): Promise<void> {
    const args = parseCommandArgs(argv);
    if (args.help) {
      // eslint-disable-next-line no-console
      console.log(USAGE);
      return;
    }
    const config = await loadCommandConfig(args);
    const logger = createServiceLogger(config, "watch");
    const detector = await openDetector(config, logger);
    const orchestrator = await buildOrchestrator(config, detector);

    const service = new WatchService({
      directory: config.watchDir,
      extension: config.extension,
      detector,
      queueCapacity: config.watch.queueCapacity,
      catchUpScan: args.catchUp ?? config.watch.catchUpScan,
      logger,
      process: async (item) => {
        const outcome = await orchestrator.run(item);
        // eslint-disable-next-line no-console
        console.log(formatRunOutcome(outcome));
        return { state: outcome.state, error: outcome.error };
      },
      onEvent: (event) => {
        const line = formatWatchEvent(event);
        if (event.type === "run_crashed" || event.type === "watch_error" || event.type === "dropped") {
          // eslint-disable-next-line no-console
          console.error(line);
        } else if (event.type !== "run_finished") {
          // eslint-disable-next-line no-console
          console.log(line);
        }
      },
    });

    const shutdown = (): void => {
      service.stop().catch((error: unknown) => {
        // eslint-disable-next-line no-console
        console.error(`Failed to stop cleanly: ${error instanceof Error ? error.message : String(error)}`);
        process.exitCode = 1;
      });
    };
    process.once("SIGINT", shutdown);
    process.once("SIGTERM", shutdown);
    try {
      await service.start();
      await service.waitUntilStopped();
    } finally {
      process.off("SIGINT", shutdown);
      process.off("SIGTERM", shutdown);
    }
  }
}
