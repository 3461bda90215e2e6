import test from "node:test";
import assert from "node:assert/strict";
import { existsSync, mkdtempSync, readFileSync } from "node:fs";
import os from "node:os";
import path from "node:path";
import { ToolRegistry } from "../ToolRegistry.js";
import { createBreakdownTools } from "../breakdown/BreakdownTools.js";

const outline = "# Summary\nS\n# A\nbodyA\n## A1\nsubA\n# Special: X\nspecial";

const setup = () => {
  const vaultRoot = mkdtempSync(path.join(os.tmpdir(), "vaultsplit-breakdown-tools-"));
  const registry = new ToolRegistry();
  registry.registerAll(createBreakdownTools());
  const touched: string[] = [];
  const context = { vaultRoot, recordTouchedFile: (file: string) => void touched.push(file) };
  return { vaultRoot, registry, touched, context };
};

test("create_breakdown_notes writes the linked notes", { concurrency: false }, async () => {
  const { vaultRoot, registry, touched, context } = setup();
  const result = await registry.execute(
    "create_breakdown_notes",
    { articlePath: "Clippings/Article.md", outline },
    context,
  );

  assert.equal(result.ok, true);
  assert.equal(
    result.output,
    [
      "Wrote 4 notes to Article-Breakdown",
      "- Article-Breakdown/00-Summary.md",
      "- Article-Breakdown/01-A.md",
      "- Article-Breakdown/01.01-A1.md",
      "- Article-Breakdown/X.md",
    ].join("\n"),
  );
  assert.deepEqual(touched, [
    "Article-Breakdown/00-Summary.md",
    "Article-Breakdown/01-A.md",
    "Article-Breakdown/01.01-A1.md",
    "Article-Breakdown/X.md",
  ]);
  assert.match(readFileSync(path.join(vaultRoot, "Article-Breakdown", "01-A.md"), "utf8"), /\n# A\n\nbodyA\n/);
});

test("create_breakdown_notes writes only the summary for outlines without headings", { concurrency: false }, async () => {
  const { vaultRoot, registry, touched, context } = setup();
  const result = await registry.execute(
    "create_breakdown_notes",
    { articlePath: "Clippings/Article.md", outline: "just prose" },
    context,
  );

  assert.equal(result.ok, true);
  assert.equal(result.output, ["Wrote 1 notes to Article-Breakdown", "- Article-Breakdown/00-Summary.md"].join("\n"));
  assert.deepEqual(touched, ["Article-Breakdown/00-Summary.md"]);
  assert.ok(existsSync(path.join(vaultRoot, "Article-Breakdown", "00-Summary.md")));
});

test("create_breakdown_canvas writes the canvas file", { concurrency: false }, async () => {
  const { vaultRoot, registry, context } = setup();
  const result = await registry.execute(
    "create_breakdown_canvas",
    { articlePath: "Clippings/Article.md", outline },
    context,
  );

  assert.equal(result.output, "Wrote Article-Breakdown/Article-Breakdown.canvas");
  const canvasPath = path.join(vaultRoot, "Article-Breakdown", "Article-Breakdown.canvas");
  assert.ok(existsSync(canvasPath));
  const canvas: unknown = JSON.parse(readFileSync(canvasPath, "utf8"));
  assert.ok(typeof canvas === "object" && canvas !== null && "nodes" in canvas && Array.isArray(canvas.nodes));
  assert.equal(canvas.nodes.length, 5);
});

test("breakdown tools require both arguments", { concurrency: false }, async () => {
  const { registry, context } = setup();
  const result = await registry.execute("create_breakdown_canvas", { articlePath: "a.md" }, context);
  assert.equal(result.error, "Missing required arguments: outline");
});
