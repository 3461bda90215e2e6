import { promises as fs } from "node:fs";
import path from "node:path";
import type { RunLogger } from "../runtime/RunLogger.js";
import { WatchStateStore, type WatchState } from "./WatchStateStore.js";

export interface ChangeDetectorOptions {
  store: WatchStateStore;
  extension?: string;
  logger?: RunLogger;
  now?: () => Date;
}

export const hasExtension = (filePath: string, extension: string): boolean =>
  path.extname(filePath).toLowerCase() === extension.toLowerCase();

/**
 * Decides which documents still need a breakdown. An item is identified by its
 * resolved absolute path; once marked processed it is never offered again.
 */
export class ChangeDetector {
  private store: WatchStateStore;
  private extension: string;
  private logger?: RunLogger;
  private now: () => Date;
  private state: WatchState;

  private constructor(options: ChangeDetectorOptions, state: WatchState) {
    this.store = options.store;
    this.extension = options.extension ?? ".md";
    this.logger = options.logger;
    this.now = options.now ?? (() => new Date());
    this.state = state;
  }

  static async open(options: ChangeDetectorOptions): Promise<ChangeDetector> {
    const state = await options.store.load();
    return new ChangeDetector(options, state);
  }

  /**
   * Lists direct children of `directory` with the watched extension that
   * changed after the last scan and were never processed. The scan's start
   * time becomes the new last-run time even when nothing is found.
   */
  async scan(directory: string): Promise<string[]> {
    const startedAt = this.now();
    const root = path.resolve(directory);
    const entries = await fs.readdir(root, { withFileTypes: true });
    const names = entries
      .filter((entry) => (entry.isFile() || entry.isSymbolicLink()) && hasExtension(entry.name, this.extension))
      .map((entry) => entry.name)
      .sort();

    const found: string[] = [];
    const since = this.state.lastRunTime.getTime();
    for (const name of names) {
      const item = path.join(root, name);
      try {
        const stats = await fs.stat(item);
        if (!stats.isFile()) continue;
        if (stats.mtimeMs > since && this.shouldProcess(item)) {
          found.push(item);
        }
      } catch (error) {
        if (this.logger) {
          await this.logger.log("scan_stat_error", {
            item,
            error: error instanceof Error ? error.message : String(error),
          });
        }
      }
    }

    this.state.lastRunTime = startedAt;
    await this.store.saveLastRunTime(startedAt);
    return found;
  }

  shouldProcess(item: string): boolean {
    return !this.state.processedItems.has(path.resolve(item));
  }

  async markProcessed(item: string): Promise<void> {
    this.state.processedItems.add(path.resolve(item));
    await this.store.saveProcessedItems(this.state.processedItems);
  }

  async reset(): Promise<void> {
    await this.store.clear();
    this.state = { lastRunTime: new Date(0), processedItems: new Set() };
  }

  snapshot(): WatchState {
    return {
      lastRunTime: new Date(this.state.lastRunTime.getTime()),
      processedItems: new Set(this.state.processedItems),
    };
  }
}
