import test from "node:test";
import assert from "node:assert/strict";
import { parseCommandArgs } from "../commands/CommandArgs.js";

test("parseCommandArgs maps flags onto config overrides", { concurrency: false }, () => {
  const parsed = parseCommandArgs([
    "Clippings/a.md",
    "--vault",
    "/vault",
    "--provider",
    "openai",
    "--model",
    "test-model",
    "--max-tool-rounds",
    "5",
    "--tool-host",
    "http://127.0.0.1:8000",
    "--no-catch-up",
    "--json",
  ]);
  assert.deepEqual(parsed, {
    cli: {
      vaultRoot: "/vault",
      provider: "openai",
      model: "test-model",
      toolHost: { url: "http://127.0.0.1:8000" },
      limits: { maxToolRounds: 5 },
    },
    target: "Clippings/a.md",
    catchUp: false,
    reset: false,
    json: true,
    help: false,
  });
});

test("parseCommandArgs reads command-specific flags", { concurrency: false }, () => {
  const parsed = parseCommandArgs(["--outline", "outline.md", "--config", "alt.json", "--reset", "-h"]);
  assert.equal(parsed.outline, "outline.md");
  assert.equal(parsed.configPath, "alt.json");
  assert.equal(parsed.reset, true);
  assert.equal(parsed.help, true);
  assert.deepEqual(parsed.cli, {});
});

test("parseCommandArgs rejects missing values", { concurrency: false }, () => {
  assert.throws(() => parseCommandArgs(["--vault"]), /Missing value for --vault/);
  assert.throws(() => parseCommandArgs(["--model", "--provider", "x"]), /Missing value for --model/);
});

test("parseCommandArgs rejects bad numbers and unknown options", { concurrency: false }, () => {
  assert.throws(
    () => parseCommandArgs(["--max-tool-calls", "many"]),
    /Invalid value for --max-tool-calls: expected number/,
  );
  assert.throws(() => parseCommandArgs(["--verbose"]), /Unknown option: --verbose/);
  assert.throws(() => parseCommandArgs(["a.md", "b.md"]), /Unexpected argument: b.md/);
});

test("parseCommandArgs treats object property names as plain positionals", { concurrency: false }, () => {
  assert.equal(parseCommandArgs(["toString"]).target, "toString");
});
