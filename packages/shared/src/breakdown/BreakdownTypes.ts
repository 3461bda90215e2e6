export interface Subsection {
  readonly title: string;
  readonly body: string;
}

export interface Section {
  readonly title: string;
  readonly body: string;
  readonly subsections: readonly Subsection[];
}

export interface SpecialNode {
  readonly title: string;
  readonly body: string;
}

export interface ArticleTree {
  readonly summary: string;
  readonly sections: readonly Section[];
  readonly specialNodes: readonly SpecialNode[];
}

export type OutputDocumentKind = "summary" | "section" | "subsection" | "special" | "canvas";

/** 1-based tree position: `[]` for summary/canvas, `[i]` for sections and specials, `[i, j]` for subsections. */
export type TreePosition = readonly [] | readonly [number] | readonly [number, number];

export interface OutputDocument {
  path: string;
  content: string;
  kind: OutputDocumentKind;
  position: TreePosition;
}

export type OutputDocumentSet = OutputDocument[];

export type CanvasNodeKind = "source" | "summary" | "section" | "subsection" | "special";

export type CanvasSide = "top" | "bottom" | "left" | "right";

export interface CanvasNode {
  id: string;
  x: number;
  y: number;
  width: number;
  height: number;
  type: "file";
  file: string;
  color: string;
  kind: CanvasNodeKind;
}

export interface CanvasEdge {
  id: string;
  fromNode: string;
  fromSide: CanvasSide;
  toNode: string;
  toSide: CanvasSide;
}

export interface CanvasGraph {
  nodes: CanvasNode[];
  edges: CanvasEdge[];
}
