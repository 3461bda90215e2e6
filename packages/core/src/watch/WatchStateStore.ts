import { promises as fs } from "node:fs";
import path from "node:path";

export const LAST_RUN_FILENAME = "last_run.txt";
export const PROCESSED_FILENAME = "processed_files.json";

export interface WatchState {
  lastRunTime: Date;
  processedItems: Set<string>;
}

export class PersistenceError extends Error {
  readonly code = "persistence_failed";
  readonly path: string;

  constructor(filePath: string, cause: unknown) {
    super(`Failed to persist ${filePath}: ${cause instanceof Error ? cause.message : String(cause)}`);
    this.name = "PersistenceError";
    this.path = filePath;
  }
}

const epoch = (): Date => new Date(0);

/**
 * Reads and writes the watcher's two state files. Reads never fail: a missing
 * or unreadable file means "never run". Writes raise `PersistenceError`.
 */
export class WatchStateStore {
  readonly stateDir: string;
  readonly lastRunPath: string;
  readonly processedPath: string;

  constructor(stateDir: string) {
    this.stateDir = stateDir;
    this.lastRunPath = path.join(stateDir, LAST_RUN_FILENAME);
    this.processedPath = path.join(stateDir, PROCESSED_FILENAME);
  }

  async load(): Promise<WatchState> {
    const [lastRunTime, processedItems] = await Promise.all([this.loadLastRunTime(), this.loadProcessedItems()]);
    return { lastRunTime, processedItems };
  }

  async loadLastRunTime(): Promise<Date> {
    let raw: string;
    try {
      raw = await fs.readFile(this.lastRunPath, "utf8");
    } catch {
      return epoch();
    }
    const parsed = new Date(raw.trim());
    return Number.isNaN(parsed.getTime()) ? epoch() : parsed;
  }

  async loadProcessedItems(): Promise<Set<string>> {
    let raw: string;
    try {
      raw = await fs.readFile(this.processedPath, "utf8");
    } catch {
      return new Set();
    }
    try {
      const parsed: unknown = JSON.parse(raw);
      if (!Array.isArray(parsed)) return new Set();
      return new Set(parsed.filter((entry): entry is string => typeof entry === "string"));
    } catch {
      return new Set();
    }
  }

  async saveLastRunTime(time: Date): Promise<void> {
    await this.writeFile(this.lastRunPath, time.toISOString());
  }

  async saveProcessedItems(items: Iterable<string>): Promise<void> {
    await this.writeFile(this.processedPath, JSON.stringify(Array.from(items).sort(), null, 2));
  }

  async clear(): Promise<void> {
    for (const filePath of [this.lastRunPath, this.processedPath]) {
      try {
        await fs.rm(filePath, { force: true });
      } catch (error) {
        throw new PersistenceError(filePath, error);
      }
    }
  }

  private async writeFile(filePath: string, content: string): Promise<void> {
    const tmpPath = `${filePath}.${process.pid}.tmp`;
    try {
      await fs.mkdir(this.stateDir, { recursive: true });
      await fs.writeFile(tmpPath, content, "utf8");
      await fs.rename(tmpPath, filePath);
    } catch (error) {
      throw new PersistenceError(filePath, error);
    }
  }
}
