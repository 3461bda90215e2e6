import path from "node:path";

const INVALID_FILENAME_CHARS = /[\/\\:*?"<>|]/g;

export const SUMMARY_FILENAME = "00-Summary.md";

export const sanitizeFileName = (name: string): string => name.replace(INVALID_FILENAME_CHARS, "-");

export const pad2 = (value: number): string => String(value).padStart(2, "0");

/** Label of a source article: its file name without extension, sanitized. */
export const articleLabel = (sourcePath: string): string => {
  const base = path.posix.basename(sourcePath.replace(/\\/g, "/"));
  const ext = path.posix.extname(base);
  return sanitizeFileName(ext ? base.slice(0, -ext.length) : base);
};

export const sectionFileName = (index: number, title: string): string =>
  `${pad2(index)}-${sanitizeFileName(title)}.md`;

export const subsectionFileName = (sectionIndex: number, index: number, title: string): string =>
  `${pad2(sectionIndex)}.${pad2(index)}-${sanitizeFileName(title)}.md`;

export const specialFileName = (title: string): string => `${sanitizeFileName(title)}.md`;

export interface BreakdownLayoutPaths {
  folder: string;
  summary: string;
  canvas: string;
  section(index: number, title: string): string;
  subsection(sectionIndex: number, index: number, title: string): string;
  special(title: string): string;
}

/** Vault-relative output paths for one article, all inside `<label>-Breakdown/`. */
export const breakdownPaths = (rootLabel: string): BreakdownLayoutPaths => {
  const label = sanitizeFileName(rootLabel);
  const folder = `${label}-Breakdown`;
  return {
    folder,
    summary: `${folder}/${SUMMARY_FILENAME}`,
    canvas: `${folder}/${label}-Breakdown.canvas`,
    section: (index, title) => `${folder}/${sectionFileName(index, title)}`,
    subsection: (sectionIndex, index, title) => `${folder}/${subsectionFileName(sectionIndex, index, title)}`,
    special: (title) => `${folder}/${specialFileName(title)}`,
  };
};
