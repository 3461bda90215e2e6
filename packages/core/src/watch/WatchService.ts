import { watch as fsWatch, promises as fs } from "node:fs";
import path from "node:path";
import type { RunLogger } from "../runtime/RunLogger.js";
import { AsyncChannel } from "./AsyncChannel.js";
import { ChangeDetector, hasExtension } from "./ChangeDetector.js";
import { PersistenceError } from "./WatchStateStore.js";

export interface DirectoryWatcher {
  close(): void;
}

export type WatchFactory = (
  directory: string,
  onFileEvent: (fileName: string) => void,
  onError: (error: Error) => void,
) => DirectoryWatcher;

export interface ProcessOutcome {
  state: "completed" | "failed";
  error?: { kind: string; message: string };
}

export type WatchEvent =
  | { type: "started"; directory: string }
  | { type: "queued"; item: string; source: "event" | "catch_up" }
  | { type: "dropped"; item: string; reason: "duplicate" | "overflow" }
  | { type: "run_finished"; item: string; outcome: ProcessOutcome }
  | { type: "run_crashed"; item: string; message: string }
  | { type: "watch_error"; message: string }
  | { type: "stopped"; reason: "requested" | "persistence_error" };

export interface WatchServiceOptions {
  directory: string;
  extension?: string;
  detector: ChangeDetector;
  process: (item: string) => Promise<ProcessOutcome>;
  queueCapacity?: number;
  catchUpScan?: boolean;
  logger?: RunLogger;
  watchFactory?: WatchFactory;
  onEvent?: (event: WatchEvent) => void;
}

export const nodeWatchFactory: WatchFactory = (directory, onFileEvent, onError) => {
  const watcher = fsWatch(directory, { persistent: true }, (_eventType, fileName) => {
    if (fileName) onFileEvent(fileName.toString());
  });
  watcher.on("error", onError);
  return watcher;
};

/**
 * Watches one directory and runs one item at a time. File events only enqueue;
 * a single consumer drains the queue, so runs never overlap.
 */
export class WatchService {
  private directory: string;
  private extension: string;
  private detector: ChangeDetector;
  private processItem: (item: string) => Promise<ProcessOutcome>;
  private catchUpScan: boolean;
  private logger?: RunLogger;
  private watchFactory: WatchFactory;
  private onEvent?: (event: WatchEvent) => void;
  private channel: AsyncChannel<string>;
  private watcher?: DirectoryWatcher;
  private consumer?: Promise<void>;
  private pendingChecks = new Set<Promise<void>>();
  private stopReason: "requested" | "persistence_error" | undefined;

  constructor(options: WatchServiceOptions) {
    this.directory = path.resolve(options.directory);
    this.extension = options.extension ?? ".md";
    this.detector = options.detector;
    this.processItem = options.process;
    this.catchUpScan = options.catchUpScan ?? true;
    this.logger = options.logger;
    this.watchFactory = options.watchFactory ?? nodeWatchFactory;
    this.onEvent = options.onEvent;
    this.channel = new AsyncChannel<string>(options.queueCapacity ?? 32);
  }

  async start(): Promise<void> {
    if (this.watcher) {
      throw new Error("Watch service already started");
    }
    const stats = await fs.stat(this.directory).catch(() => undefined);
    if (!stats?.isDirectory()) {
      throw new Error(`Watch directory not found: ${this.directory}`);
    }

    this.watcher = this.watchFactory(
      this.directory,
      (fileName) => this.trackCheck(this.handleFileEvent(fileName)),
      (error) => this.trackCheck(this.emit({ type: "watch_error", message: error.message })),
    );
    await this.emit({ type: "started", directory: this.directory });

    if (this.catchUpScan) {
      let items: string[];
      try {
        items = await this.detector.scan(this.directory);
      } catch (error) {
        this.watcher?.close();
        this.channel.close();
        throw error;
      }
      for (const item of items) {
        await this.enqueue(item, "catch_up");
      }
    }
    this.consumer = this.consume();
  }

  /** Resolves once the consumer loop has ended, after `stop()` or a persistence failure. */
  async waitUntilStopped(): Promise<void> {
    await this.consumer;
  }

  /** Closes the watcher, lets the in-flight run finish and drops anything still queued. */
  async stop(): Promise<void> {
    if (!this.stopReason) this.stopReason = "requested";
    this.watcher?.close();
    this.channel.close();
    await Promise.all(this.pendingChecks);
    await this.consumer;
  }

  private trackCheck(check: Promise<void>): void {
    const tracked = check.catch((error: unknown) =>
      this.emit({ type: "watch_error", message: error instanceof Error ? error.message : String(error) }),
    );
    this.pendingChecks.add(tracked);
    void tracked.finally(() => this.pendingChecks.delete(tracked));
  }

  private async handleFileEvent(fileName: string): Promise<void> {
    const item = path.resolve(this.directory, fileName);
    if (path.dirname(item) !== this.directory) return;
    if (!hasExtension(item, this.extension)) return;
    const stats = await fs.stat(item).catch(() => undefined);
    if (!stats?.isFile()) return;
    if (!this.detector.shouldProcess(item)) return;
    await this.enqueue(item, "event");
  }

  private async enqueue(item: string, source: "event" | "catch_up"): Promise<void> {
    const outcome = this.channel.push(item);
    if (outcome === "queued") {
      await this.emit({ type: "queued", item, source });
    } else if (outcome === "duplicate" || outcome === "overflow") {
      await this.emit({ type: "dropped", item, reason: outcome });
    }
  }

  private async consume(): Promise<void> {
    for await (const item of this.channel) {
      if (this.stopReason) break;
      if (!this.detector.shouldProcess(item)) continue;
      try {
        const outcome = await this.processItem(item);
        await this.emit({ type: "run_finished", item, outcome });
      } catch (error) {
        if (error instanceof PersistenceError) {
          await this.emit({ type: "run_crashed", item, message: error.message });
          this.stopReason = "persistence_error";
          this.watcher?.close();
          this.channel.close();
          break;
        }
        await this.emit({
          type: "run_crashed",
          item,
          message: error instanceof Error ? error.message : String(error),
        });
      }
    }
    await this.emit({ type: "stopped", reason: this.stopReason ?? "requested" });
  }

  private async emit(event: WatchEvent): Promise<void> {
    this.onEvent?.(event);
    if (!this.logger) return;
    const { type, ...data } = event;
    try {
      await this.logger.log(`watch_${type}`, data);
    } catch (error) {
      this.onEvent?.({
        type: "watch_error",
        message: `Could not write watch log: ${error instanceof Error ? error.message : String(error)}`,
      });
    }
  }
}
