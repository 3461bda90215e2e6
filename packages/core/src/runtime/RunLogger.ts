import { promises as fs } from "node:fs";
import path from "node:path";

export interface RunLogEvent {
  type: string;
  timestamp: string;
  data: Record<string, unknown>;
}

/** Appends one JSON event per line to `<logDir>/<runId>.jsonl`. */
export class RunLogger {
  readonly logPath: string;
  readonly logDir: string;
  readonly runId: string;

  constructor(stateDir: string, logDir: string, runId: string) {
    const resolvedDir = path.resolve(stateDir, logDir);
    this.logDir = resolvedDir;
    this.runId = runId;
    this.logPath = path.join(resolvedDir, `${runId}.jsonl`);
  }

  async log(type: string, data: Record<string, unknown>): Promise<void> {
    await fs.mkdir(path.dirname(this.logPath), { recursive: true });
    const event: RunLogEvent = {
      type,
      timestamp: new Date().toISOString(),
      data,
    };
    await fs.appendFile(this.logPath, `${JSON.stringify(event)}\n`, "utf8");
  }

  async writeArtifact(kind: string, payload: unknown): Promise<string> {
    const artifactDir = path.join(this.logDir, "artifacts");
    await fs.mkdir(artifactDir, { recursive: true });
    const safeKind = kind.replace(/[^a-z0-9_-]/gi, "_");
    const ext = typeof payload === "string" ? "txt" : "json";
    const filePath = path.join(artifactDir, `${this.runId}-${safeKind}.${ext}`);
    const content = typeof payload === "string" ? payload : JSON.stringify(payload, null, 2);
    await fs.writeFile(filePath, content, "utf8");
    return filePath;
  }
}

const isRunLogEvent = (value: unknown): value is RunLogEvent => {
  if (typeof value !== "object" || value === null) return false;
  const record = Object.fromEntries(Object.entries(value));
  return (
    typeof record.type === "string" &&
    typeof record.timestamp === "string" &&
    typeof record.data === "object" &&
    record.data !== null
  );
};

/** Reads a run log back; malformed lines are skipped. */
export const readRunLog = async (logPath: string): Promise<RunLogEvent[]> => {
  const content = await fs.readFile(logPath, "utf8");
  const events: RunLogEvent[] = [];
  for (const line of content.split("\n")) {
    if (!line.trim()) continue;
    try {
      const parsed: unknown = JSON.parse(line);
      if (isRunLogEvent(parsed)) events.push(parsed);
    } catch {
      continue;
    }
  }
  return events;
};
