import { materialize, type WriteFile } from "../../breakdown/DocumentMaterializer.js";
import { articleLabel, breakdownPaths } from "../../breakdown/FileNaming.js";
import { createVaultWriter, writeBreakdownCanvas } from "../../breakdown/BreakdownPipeline.js";
import { parseArticleTree } from "../../breakdown/StructureParser.js";
import type { ToolContext, ToolDefinition } from "../ToolTypes.js";
import { stringArg } from "../ToolArgs.js";

const breakdownSchema = {
  type: "object",
  required: ["articlePath", "outline"],
  properties: {
    articlePath: { type: "string", description: "Vault-relative path of the source article." },
    outline: {
      type: "string",
      description:
        "Outline using '# Summary', '# <section>', '## <subsection>' and '# Special: <title>' headings, each followed by its content.",
    },
  },
};

const recordingWriter = (context: ToolContext): WriteFile => {
  const write = createVaultWriter(context.vaultRoot);
  return async (target, content) => {
    const result = await write(target, content);
    if (result.ok) context.recordTouchedFile?.(target);
    return result;
  };
};

export const createBreakdownTools = (): ToolDefinition[] => {
  return [
    {
      name: "create_breakdown_notes",
      description:
        "Parse an article outline and write the linked breakdown notes (summary, sections, subsections, special nodes).",
      inputSchema: breakdownSchema,
      handler: async (args, context) => {
        const articlePath = stringArg(args, "articlePath");
        const tree = parseArticleTree(stringArg(args, "outline"));
        const rootLabel = articleLabel(articlePath);
        const result = await materialize(tree, { rootLabel, sourcePath: articlePath }, recordingWriter(context));
        const lines = [
          `Wrote ${result.documents.length} notes to ${breakdownPaths(rootLabel).folder}`,
          ...result.documents.map((document) => `- ${document.path}`),
          ...result.failures.map((failure) => `FAILED ${failure.path}: ${failure.error}`),
        ];
        if (result.documents.length === 0 && result.failures.length > 0) {
          throw new Error(lines.join("\n"));
        }
        return {
          output: lines.join("\n"),
          data: { documents: result.documents.map((document) => document.path), failures: result.failures },
        };
      },
    },
    {
      name: "create_breakdown_canvas",
      description: "Lay out the breakdown of an article outline as a canvas file next to its notes.",
      inputSchema: breakdownSchema,
      handler: async (args, context) => {
        const articlePath = stringArg(args, "articlePath");
        const canvas = await writeBreakdownCanvas(
          { articlePath, outline: stringArg(args, "outline") },
          recordingWriter(context),
        );
        if (canvas.failure) {
          throw new Error(`Could not write ${canvas.failure.path}: ${canvas.failure.error}`);
        }
        return { output: `Wrote ${canvas.document.path}`, data: { path: canvas.document.path } };
      },
    },
  ];
};
