import YAML from "yaml";
import type { ArticleTree, OutputDocument, OutputDocumentSet, Result } from "@vaultsplit/shared";
import { SUMMARY_FILENAME, breakdownPaths, sectionFileName, specialFileName, subsectionFileName } from "./FileNaming.js";

export interface MaterializeOptions {
  /** Label the breakdown folder and canvas are named after. */
  rootLabel: string;
  /** Vault-relative path of the source article, recorded as `original_article`. */
  sourcePath: string;
  /** `YYYY-MM-DD`; defaults to today. */
  date?: string;
}

export type WriteFile = (path: string, content: string) => Promise<Result<void, string>>;

export interface MaterializeFailure {
  path: string;
  error: string;
}

export interface MaterializeResult {
  documents: OutputDocumentSet;
  failures: MaterializeFailure[];
}

interface FrontMatter {
  title: string;
  date: string;
  parent?: string;
  original_article: string;
  tags: string[];
}

export const formatDate = (date: Date): string => {
  const month = String(date.getMonth() + 1).padStart(2, "0");
  const day = String(date.getDate()).padStart(2, "0");
  return `${date.getFullYear()}-${month}-${day}`;
};

const renderFrontMatter = (data: FrontMatter): string => {
  const doc = new YAML.Document(data);
  const tags = doc.get("tags", true);
  if (YAML.isSeq(tags)) {
    tags.flow = true;
  }
  return `---\n${doc.toString()}---\n`;
};

const renderDocument = (frontMatter: FrontMatter, blocks: string[]): string =>
  `${renderFrontMatter(frontMatter)}\n${blocks.filter((block) => block.length > 0).join("\n\n")}\n`;

const link = (fileName: string, label: string): string => `[[${fileName}|${label}]]`;

/**
 * Lays out every markdown document of a breakdown without touching disk, in
 * write order: summary, each section followed by its subsections, specials.
 */
export const planDocuments = (tree: ArticleTree, options: MaterializeOptions): OutputDocumentSet => {
  const paths = breakdownPaths(options.rootLabel);
  const date = options.date ?? formatDate(new Date());
  const documents: OutputDocument[] = [];

  const tocLines: string[] = [];
  tree.sections.forEach((section, sectionIdx) => {
    const i = sectionIdx + 1;
    tocLines.push(`- ${link(sectionFileName(i, section.title), section.title)}`);
    if (section.subsections.length) {
      const children = section.subsections.map((child, childIdx) =>
        link(subsectionFileName(i, childIdx + 1, child.title), child.title),
      );
      tocLines.push(`  - ${children.join(" | ")}`);
    }
  });
  const specialLinks = tree.specialNodes.map((node) => `- ${link(specialFileName(node.title), node.title)}`);

  documents.push({
    path: paths.summary,
    kind: "summary",
    position: [],
    content: renderDocument(
      {
        title: `Summary of ${options.rootLabel}`,
        date,
        original_article: options.sourcePath,
        tags: ["summary", "article-breakdown"],
      },
      [
        "# Summary",
        tree.summary,
        tocLines.length ? "## Table of Contents" : "",
        tocLines.join("\n"),
        specialLinks.length ? "## Special Nodes" : "",
        specialLinks.join("\n"),
      ],
    ),
  });

  tree.sections.forEach((section, sectionIdx) => {
    const i = sectionIdx + 1;
    const sectionFile = sectionFileName(i, section.title);
    const childLinks = section.subsections.map(
      (child, childIdx) => `- ${link(subsectionFileName(i, childIdx + 1, child.title), child.title)}`,
    );
    documents.push({
      path: paths.section(i, section.title),
      kind: "section",
      position: [i],
      content: renderDocument(
        {
          title: section.title,
          date,
          parent: `[[${SUMMARY_FILENAME}]]`,
          original_article: options.sourcePath,
          tags: ["section", "article-breakdown"],
        },
        [
          `# ${section.title}`,
          section.body,
          childLinks.length ? "## Subsections" : "",
          childLinks.join("\n"),
          link(SUMMARY_FILENAME, "Back to Summary"),
        ],
      ),
    });

    section.subsections.forEach((child, childIdx) => {
      const j = childIdx + 1;
      documents.push({
        path: paths.subsection(i, j, child.title),
        kind: "subsection",
        position: [i, j],
        content: renderDocument(
          {
            title: child.title,
            date,
            parent: `[[${sectionFile}]]`,
            original_article: options.sourcePath,
            tags: ["subsection", "article-breakdown"],
          },
          [`# ${child.title}`, child.body, link(sectionFile, `Back to ${section.title}`)],
        ),
      });
    });
  });

  tree.specialNodes.forEach((node, idx) => {
    documents.push({
      path: paths.special(node.title),
      kind: "special",
      position: [idx + 1],
      content: renderDocument(
        {
          title: node.title,
          date,
          original_article: options.sourcePath,
          tags: ["special-node", "article-breakdown"],
        },
        [`# ${node.title}`, node.body],
      ),
    });
  });

  return documents;
};

/**
 * Writes the planned documents in order. A failed write is reported and left
 * out of `documents`; the remaining writes still run.
 */
export const materialize = async (
  tree: ArticleTree,
  options: MaterializeOptions,
  writeFile: WriteFile,
): Promise<MaterializeResult> => {
  const documents: OutputDocumentSet = [];
  const failures: MaterializeFailure[] = [];
  for (const document of planDocuments(tree, options)) {
    const result = await writeFile(document.path, document.content);
    if (result.ok) {
      documents.push(document);
    } else {
      failures.push({ path: document.path, error: result.error });
    }
  }
  return { documents, failures };
};
