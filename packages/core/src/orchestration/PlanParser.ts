const STEP_LINE = /^\d+\./;

/**
 * Numbered lines of a planner reply, in order. The text after the first period
 * is the instruction; lines without a leading number are commentary.
 */
export const parsePlan = (text: string): string[] => {
  const steps: string[] = [];
  for (const raw of text.split(/\r?\n/)) {
    const line = raw.trim();
    if (!STEP_LINE.test(line)) continue;
    const instruction = line.slice(line.indexOf(".") + 1).trim();
    if (instruction) steps.push(instruction);
  }
  return steps;
};
