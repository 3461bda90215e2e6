import test from "node:test";
import assert from "node:assert/strict";
import { existsSync, mkdtempSync, writeFileSync } from "node:fs";
import os from "node:os";
import path from "node:path";
import { WatchStateStore } from "@vaultsplit/core";
import { USAGE, VaultsplitEntrypoint } from "../bin/VaultsplitEntrypoint.js";
import { formatChatReply, parseChatInput } from "../commands/chat/ChatCommand.js";
import { formatWatchEvent } from "../commands/watch/WatchCommand.js";

const captureLogs = async (fn: () => Promise<void> | void): Promise<string[]> => {
  const logs: string[] = [];
  const originalLog = console.log;
  console.log = (...args: unknown[]) => {
    logs.push(args.map(String).join(" "));
  };
  try {
    await fn();
  } finally {
    console.log = originalLog;
  }
  return logs;
};

const tempVault = (): { vault: string; stateDir: string } => {
  const vault = mkdtempSync(path.join(os.tmpdir(), "vaultsplit-cli-"));
  return { vault, stateDir: path.join(vault, ".state") };
};

test("VaultsplitEntrypoint prints version", { concurrency: false }, async () => {
  const logs = await captureLogs(() => VaultsplitEntrypoint.run(["--version"]));
  assert.deepEqual(logs, ["0.1.0"]);
});

test("VaultsplitEntrypoint prints usage for --help", { concurrency: false }, async () => {
  const logs = await captureLogs(() => VaultsplitEntrypoint.run(["--help"]));
  assert.deepEqual(logs, [USAGE]);
});

test("VaultsplitEntrypoint rejects missing and unknown commands", { concurrency: false }, async () => {
  await assert.rejects(() => VaultsplitEntrypoint.run([]), /Usage: vaultsplit/);
  await assert.rejects(() => VaultsplitEntrypoint.run(["totally-unknown"]), /Unknown command: totally-unknown/);
});

test("state shows and resets processed items", { concurrency: false }, async () => {
  const { vault, stateDir } = tempVault();
  const store = new WatchStateStore(stateDir);
  await store.saveLastRunTime(new Date("2024-05-02T00:00:00.000Z"));
  await store.saveProcessedItems(new Set(["/notes/Clippings/b.md", "/notes/Clippings/a.md"]));
  const flags = ["--vault", vault, "--state-dir", stateDir];

  const shown = await captureLogs(() => VaultsplitEntrypoint.run(["state", ...flags]));
  assert.deepEqual(shown, [
    [
      `State dir: ${stateDir}`,
      "Last run: 2024-05-02T00:00:00.000Z",
      "Processed: 2",
      "  /notes/Clippings/a.md",
      "  /notes/Clippings/b.md",
    ].join("\n"),
  ]);

  const cleared = await captureLogs(() => VaultsplitEntrypoint.run(["state", "--reset", ...flags]));
  assert.deepEqual(cleared, [`Cleared state in ${stateDir}`]);

  const json = await captureLogs(() => VaultsplitEntrypoint.run(["state", "--json", ...flags]));
  assert.deepEqual(JSON.parse(json.join("\n")), {
    stateDir,
    lastRunTime: "1970-01-01T00:00:00.000Z",
    processedItems: [],
  });
});

test("breakdown --outline writes notes without a provider", { concurrency: false }, async () => {
  const { vault, stateDir } = tempVault();
  const outline = path.join(vault, "outline.md");
  writeFileSync(outline, "# Summary\nS\n# A\nbodyA");
  const article = path.join(vault, "Clippings", "Article.md");

  const logs = await captureLogs(() =>
    VaultsplitEntrypoint.run(["breakdown", article, "--outline", outline, "--vault", vault, "--state-dir", stateDir]),
  );

  assert.deepEqual(logs, [
    "Wrote Article-Breakdown/00-Summary.md",
    "Wrote Article-Breakdown/01-A.md",
    "Wrote Article-Breakdown/Article-Breakdown.canvas",
  ]);
  assert.equal(existsSync(path.join(vault, "Article-Breakdown", "Article-Breakdown.canvas")), true);
});

test("formatWatchEvent renders watcher events", { concurrency: false }, () => {
  assert.equal(formatWatchEvent({ type: "queued", item: "/v/a.md", source: "catch_up" }), "Queued /v/a.md (catch-up)");
  assert.equal(
    formatWatchEvent({ type: "dropped", item: "/v/a.md", reason: "overflow" }),
    "Dropped /v/a.md: queue is full",
  );
  assert.equal(
    formatWatchEvent({
      type: "run_finished",
      item: "/v/a.md",
      outcome: { state: "failed", error: { kind: "planning", message: "no steps" } },
    }),
    "Failed /v/a.md: [planning] no steps",
  );
  assert.equal(formatWatchEvent({ type: "stopped", reason: "persistence_error" }), "Stopped: processed-state could not be saved");
});

test("chat input and replies", { concurrency: false }, () => {
  assert.deepEqual(parseChatInput("  /STATUS "), { kind: "command", command: "status" });
  assert.deepEqual(parseChatInput("/exit"), { kind: "command", command: "quit" });
  assert.deepEqual(parseChatInput("/nope"), { kind: "unknown", command: "/nope" });
  assert.deepEqual(parseChatInput("   "), { kind: "empty" });
  assert.deepEqual(parseChatInput("list my notes"), { kind: "message", text: "list my notes" });
  assert.equal(
    formatChatReply({ status: "limit_reached", limit: "turns" }),
    "Turn limit reached. Start a new chat to continue.",
  );
  assert.equal(formatChatReply({ status: "error", message: "bad gateway" }), "Error: bad gateway");
});
