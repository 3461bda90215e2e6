export type StepCategory = "content" | "canvas" | "plain";

const CONTENT_PREFIXES = ["create summary file", "create section file", "create subsection file"];
const CANVAS_PREFIX = "create canvas";

export const classifyStep = (instruction: string): StepCategory => {
  const lowered = instruction.trim().toLowerCase();
  if (CONTENT_PREFIXES.some((prefix) => lowered.startsWith(prefix))) return "content";
  if (lowered.startsWith(CANVAS_PREFIX)) return "canvas";
  return "plain";
};

export interface StepContext {
  articleContent: string;
  articlePath: string;
}

/** The executor's task text: content steps carry the article, canvas steps its path. */
export const augmentStep = (instruction: string, category: StepCategory, context: StepContext): string => {
  switch (category) {
    case "content":
      return (
        `${instruction}. Use this content:\n\n${context.articleContent}` +
        `\nOriginal article path for linking: ${context.articlePath}`
      );
    case "canvas":
      return `${instruction}\nOriginal article path for canvas node: ${context.articlePath}`;
    default:
      return instruction;
  }
};
