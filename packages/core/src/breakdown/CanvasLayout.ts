import { randomUUID } from "node:crypto";
import type {
  ArticleTree,
  CanvasEdge,
  CanvasGraph,
  CanvasNode,
  CanvasNodeKind,
  CanvasSide,
  OutputDocumentSet,
} from "@vaultsplit/shared";
import { articleLabel, breakdownPaths } from "./FileNaming.js";

export type IdFactory = () => string;

export const NODE_WIDTH = 300;
export const NODE_HEIGHT = 200;
export const NODE_GAP = 200;
const ROW_STEP = NODE_WIDTH + NODE_GAP;

const SOURCE_Y = -600;
const SUMMARY_Y = -300;
const SECTION_Y = 0;
const SUBSECTION_Y = 300;
const SPECIAL_X = 800;
const SPECIAL_START_Y = -300;
const SPECIAL_STEP = 250;

export const CANVAS_COLORS: Record<CanvasNodeKind, string> = {
  source: "6",
  summary: "4",
  section: "3",
  subsection: "5",
  special: "2",
};

/** x of the first node in a row of `count` nodes centred on `centre`. */
export const rowStartX = (count: number, centre = 0): number => {
  const total = count * NODE_WIDTH + (count - 1) * NODE_GAP;
  return centre - total / 2;
};

const positionKey = (kind: string, position: readonly number[]): string => `${kind}:${position.join(".")}`;

/**
 * Positions the breakdown graph: source above summary, sections in a row below
 * it, each section's subsections centred under their parent, and specials in a
 * column to the right. Coordinates depend only on the tree's shape.
 */
export const layoutCanvas = (
  tree: ArticleTree,
  fileSet: OutputDocumentSet,
  originalPath: string,
  idFactory: IdFactory = randomUUID,
): CanvasGraph => {
  const fallback = breakdownPaths(articleLabel(originalPath));
  const files = new Map(fileSet.map((document) => [positionKey(document.kind, document.position), document.path]));
  const fileFor = (kind: string, position: readonly number[], fallbackPath: string): string =>
    files.get(positionKey(kind, position)) ?? fallbackPath;

  const nodes: CanvasNode[] = [];
  const edges: CanvasEdge[] = [];

  const addNode = (kind: CanvasNodeKind, x: number, y: number, file: string): CanvasNode => {
    const node: CanvasNode = {
      id: idFactory(),
      x,
      y,
      width: NODE_WIDTH,
      height: NODE_HEIGHT,
      type: "file",
      file,
      color: CANVAS_COLORS[kind],
      kind,
    };
    nodes.push(node);
    return node;
  };

  const connect = (from: CanvasNode, fromSide: CanvasSide, to: CanvasNode, toSide: CanvasSide): void => {
    edges.push({ id: idFactory(), fromNode: from.id, fromSide, toNode: to.id, toSide });
  };

  const source = addNode("source", 0, SOURCE_Y, originalPath);
  const summary = addNode("summary", 0, SUMMARY_Y, fileFor("summary", [], fallback.summary));
  connect(source, "bottom", summary, "top");

  const sectionStart = rowStartX(tree.sections.length);
  const sectionNodes = tree.sections.map((section, idx) => {
    const i = idx + 1;
    const node = addNode(
      "section",
      sectionStart + idx * ROW_STEP,
      SECTION_Y,
      fileFor("section", [i], fallback.section(i, section.title)),
    );
    connect(summary, "bottom", node, "top");
    return node;
  });

  tree.sections.forEach((section, sectionIdx) => {
    const parent = sectionNodes[sectionIdx];
    if (!parent || section.subsections.length === 0) return;
    // Subsection rows centre on the parent's middle; the section row centres on x = 0, the summary's left edge.
    const start = rowStartX(section.subsections.length, parent.x + NODE_WIDTH / 2);
    section.subsections.forEach((child, childIdx) => {
      const i = sectionIdx + 1;
      const j = childIdx + 1;
      const node = addNode(
        "subsection",
        start + childIdx * ROW_STEP,
        SUBSECTION_Y,
        fileFor("subsection", [i, j], fallback.subsection(i, j, child.title)),
      );
      connect(parent, "bottom", node, "top");
    });
  });

  tree.specialNodes.forEach((special, idx) => {
    const node = addNode(
      "special",
      SPECIAL_X,
      SPECIAL_START_Y + idx * SPECIAL_STEP,
      fileFor("special", [idx + 1], fallback.special(special.title)),
    );
    connect(summary, "right", node, "left");
  });

  return { nodes, edges };
};

/** Canvas file JSON: two-space indented, without the in-memory `kind`. */
export const serializeCanvas = (graph: CanvasGraph): string => {
  const nodes = graph.nodes.map((node) => ({
    id: node.id,
    x: node.x,
    y: node.y,
    width: node.width,
    height: node.height,
    type: node.type,
    file: node.file,
    color: node.color,
  }));
  const edges = graph.edges.map((edge) => ({
    id: edge.id,
    fromNode: edge.fromNode,
    fromSide: edge.fromSide,
    toNode: edge.toNode,
    toSide: edge.toSide,
  }));
  return JSON.stringify({ nodes, edges }, null, 2);
};
