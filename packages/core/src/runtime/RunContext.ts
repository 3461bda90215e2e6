import { randomUUID } from "node:crypto";

export const createRunId = (now: Date = new Date()): string =>
  `${now.toISOString().replace(/[:.]/g, "-")}-${randomUUID().slice(0, 8)}`;

export class RunContext {
  readonly runId: string;
  readonly vaultRoot: string;
  readonly startedAt: number;
  private touchedFiles = new Set<string>();

  constructor(runId: string, vaultRoot: string) {
    this.runId = runId;
    this.vaultRoot = vaultRoot;
    this.startedAt = Date.now();
  }

  recordTouchedFile(filePath: string): void {
    this.touchedFiles.add(filePath);
  }

  getTouchedFiles(): string[] {
    return Array.from(this.touchedFiles).sort();
  }
}
