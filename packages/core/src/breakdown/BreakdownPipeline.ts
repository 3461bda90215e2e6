import { promises as fs } from "node:fs";
import path from "node:path";
import { err, errorMessage, ok, type ArticleTree, type OutputDocument, type OutputDocumentSet } from "@vaultsplit/shared";
import { resolveVaultPath } from "../tools/vault/VaultPaths.js";
import { layoutCanvas, serializeCanvas, type IdFactory } from "./CanvasLayout.js";
import {
  materialize,
  planDocuments,
  type MaterializeFailure,
  type WriteFile,
} from "./DocumentMaterializer.js";
import { articleLabel, breakdownPaths } from "./FileNaming.js";
import { parseArticleTree } from "./StructureParser.js";

export interface BreakdownRequest {
  /** Heading-structured outline of the article. */
  outline: string;
  /** Vault-relative path of the source article. */
  articlePath: string;
  rootLabel?: string;
  date?: string;
  idFactory?: IdFactory;
}

export interface BreakdownResult {
  tree: ArticleTree;
  folder: string;
  documents: OutputDocumentSet;
  canvasPath?: string;
  failures: MaterializeFailure[];
}

/** A write capability confined to one vault root. */
export const createVaultWriter = (vaultRoot: string): WriteFile => {
  return async (target, content) => {
    try {
      const resolved = resolveVaultPath(vaultRoot, target);
      await fs.mkdir(path.dirname(resolved), { recursive: true });
      await fs.writeFile(resolved, content, "utf8");
      return ok(undefined);
    } catch (error) {
      return err(errorMessage(error));
    }
  };
};

const labelFor = (request: BreakdownRequest): string => request.rootLabel ?? articleLabel(request.articlePath);

/** Writes only the canvas, laid out against the planned document paths. */
export const writeBreakdownCanvas = async (
  request: BreakdownRequest,
  writeFile: WriteFile,
  tree: ArticleTree = parseArticleTree(request.outline),
  documents?: OutputDocumentSet,
): Promise<{ document: OutputDocument; failure?: MaterializeFailure }> => {
  const rootLabel = labelFor(request);
  const fileSet =
    documents ?? planDocuments(tree, { rootLabel, sourcePath: request.articlePath, date: request.date });
  const graph = layoutCanvas(tree, fileSet, request.articlePath, request.idFactory);
  const document: OutputDocument = {
    path: breakdownPaths(rootLabel).canvas,
    content: serializeCanvas(graph),
    kind: "canvas",
    position: [],
  };
  const written = await writeFile(document.path, document.content);
  return written.ok ? { document } : { document, failure: { path: document.path, error: written.error } };
};

/** Parse, write the notes, then lay out and write the canvas. */
export const runBreakdown = async (request: BreakdownRequest, writeFile: WriteFile): Promise<BreakdownResult> => {
  const tree = parseArticleTree(request.outline);
  const rootLabel = labelFor(request);
  const materialized = await materialize(
    tree,
    { rootLabel, sourcePath: request.articlePath, date: request.date },
    writeFile,
  );
  const canvas = await writeBreakdownCanvas(request, writeFile, tree, materialized.documents);
  const failures = canvas.failure ? [...materialized.failures, canvas.failure] : materialized.failures;
  return {
    tree,
    folder: breakdownPaths(rootLabel).folder,
    documents: canvas.failure ? materialized.documents : [...materialized.documents, canvas.document],
    canvasPath: canvas.failure ? undefined : canvas.document.path,
    failures,
  };
};
