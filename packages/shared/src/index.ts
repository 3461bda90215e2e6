export * from "./paths/PathHelper.js";
export * from "./result/Result.js";
export type {
  ArticleTree,
  CanvasEdge,
  CanvasGraph,
  CanvasNode,
  CanvasNodeKind,
  CanvasSide,
  OutputDocument,
  OutputDocumentKind,
  OutputDocumentSet,
  Section,
  SpecialNode,
  Subsection,
  TreePosition,
} from "./breakdown/BreakdownTypes.js";
