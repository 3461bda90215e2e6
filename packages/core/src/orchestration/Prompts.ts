import { promises as fs } from "node:fs";
import type { PromptConfig } from "../config/Config.js";

export const PLANNER_PROMPT = [
  "ROLE: Breakdown Planner",
  "TASK: Plan how to break one article into linked vault notes and a canvas.",
  "CONSTRAINTS:",
  "- You cannot call tools. Another agent executes your plan one step at a time.",
  "- Each step must be a single action that agent can complete on its own.",
  "- Base section and subsection titles on the article's own structure.",
  "STEP VOCABULARY:",
  "- Create summary file ... (the overview note)",
  "- Create section file ... / Create subsection file ... (one per part of the article)",
  "- Create canvas ... (always the last step)",
  "OUTPUT FORMAT:",
  "1. <step>",
  "2. <step>",
  "Output ONLY the numbered list.",
].join("\n");

export const EXECUTOR_PROMPT = [
  "ROLE: Vault Editor",
  "TASK: Carry out exactly one instruction against the vault using the available tools.",
  "TOOLS:",
  "- create_breakdown_notes writes the summary, section, subsection and special notes from an outline.",
  "- create_breakdown_canvas writes the canvas that links those notes to the source article.",
  "- read_note, write_note, list_files, search_vault, create_directory and vault_info work on single notes.",
  "OUTLINE FORMAT (for create_breakdown_notes and create_breakdown_canvas):",
  "# Summary",
  "<two or three paragraphs>",
  "# <section title>",
  "<section content>",
  "## <subsection title>",
  "<subsection content>",
  "# Special: <title>",
  "<content that belongs to no section, such as references>",
  "CONSTRAINTS:",
  "- Pass the original article path exactly as given.",
  "- Use only facts from the article content.",
  "- If a tool returns ERROR, fix the arguments and retry once, then report the failure.",
  "- Reply with a one-line summary of what you did when the instruction is complete.",
].join("\n");

export interface PromptSet {
  planner: string;
  executor: string;
}

export const DEFAULT_PROMPTS: PromptSet = {
  planner: PLANNER_PROMPT,
  executor: EXECUTOR_PROMPT,
};

const readPrompt = async (filePath: string | undefined, fallback: string): Promise<string> => {
  if (!filePath) return fallback;
  let content: string;
  try {
    content = await fs.readFile(filePath, "utf8");
  } catch (error) {
    throw new Error(
      `Failed to read prompt file ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
  const trimmed = content.trim();
  if (!trimmed) {
    throw new Error(`Prompt file is empty: ${filePath}`);
  }
  return trimmed;
};

/** Built-in prompts, replaced per role by the files named in config. */
export const loadPrompts = async (config: PromptConfig = {}): Promise<PromptSet> => ({
  planner: await readPrompt(config.plannerPath, PLANNER_PROMPT),
  executor: await readPrompt(config.executorPath, EXECUTOR_PROMPT),
});
