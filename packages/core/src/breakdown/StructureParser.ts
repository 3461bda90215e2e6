import type { ArticleTree, Section, SpecialNode, Subsection } from "@vaultsplit/shared";

const SUMMARY_HEADING = "# Summary";
const SPECIAL_PREFIX = "# Special: ";
const TOP_LEVEL_PREFIX = "# ";
const SUBSECTION_PREFIX = "## ";

interface NodeBuilder {
  title: string;
  lines: string[];
}

interface SectionBuilder extends NodeBuilder {
  subsections: NodeBuilder[];
}

const body = (lines: string[]): string => lines.join("\n").trim();

/**
 * Parses a heading-delimited outline:
 *
 * - `# Summary` opens the summary, which runs to the next top-level heading
 * - `# Special: <title>` opens a special node and closes any open section
 * - `# <title>` opens a section, `## <title>` a subsection of the open section
 *
 * Content lines attach to the deepest open node; lines with nothing open are
 * dropped. Never throws.
 */
export const parseArticleTree = (text: string): ArticleTree => {
  const summaryLines: string[][] = [];
  const sections: SectionBuilder[] = [];
  const specials: NodeBuilder[] = [];

  let summary: string[] | undefined;
  let section: SectionBuilder | undefined;
  let subsection: NodeBuilder | undefined;
  let special: NodeBuilder | undefined;

  for (const line of text.split(/\r?\n/)) {
    if (line.trimEnd() === SUMMARY_HEADING) {
      summary = [];
      summaryLines.push(summary);
      section = undefined;
      subsection = undefined;
      special = undefined;
      continue;
    }
    if (line.startsWith(SPECIAL_PREFIX)) {
      summary = undefined;
      section = undefined;
      subsection = undefined;
      special = { title: line.slice(SPECIAL_PREFIX.length).trim(), lines: [] };
      specials.push(special);
      continue;
    }
    if (line.startsWith(TOP_LEVEL_PREFIX)) {
      summary = undefined;
      subsection = undefined;
      special = undefined;
      section = { title: line.slice(TOP_LEVEL_PREFIX.length).trim(), lines: [], subsections: [] };
      sections.push(section);
      continue;
    }
    if (summary) {
      summary.push(line);
      continue;
    }
    if (line.startsWith(SUBSECTION_PREFIX) && section) {
      subsection = { title: line.slice(SUBSECTION_PREFIX.length).trim(), lines: [] };
      section.subsections.push(subsection);
      continue;
    }
    const target = subsection ?? section ?? special;
    target?.lines.push(line);
  }

  return {
    summary: summaryLines
      .map(body)
      .filter((part) => part.length > 0)
      .join("\n\n"),
    sections: sections.map(
      (entry): Section => ({
        title: entry.title,
        body: body(entry.lines),
        subsections: entry.subsections.map((child): Subsection => ({ title: child.title, body: body(child.lines) })),
      }),
    ),
    specialNodes: specials.map((entry): SpecialNode => ({ title: entry.title, body: body(entry.lines) })),
  };
};
