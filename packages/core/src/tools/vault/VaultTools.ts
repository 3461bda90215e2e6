import { promises as fs } from "node:fs";
import path from "node:path";
import type { ToolContext, ToolDefinition } from "../ToolTypes.js";
import { optionalBooleanArg, optionalNumberArg, optionalStringArg, stringArg } from "../ToolArgs.js";
import { resolveVaultPath, toVaultRelative } from "./VaultPaths.js";

const SEARCHABLE_EXTENSIONS = new Set([".md", ".txt"]);
const SNIPPET_RADIUS = 50;
const DEFAULT_MAX_RESULTS = 50;

export interface SearchHit {
  path: string;
  snippet: string;
}

export interface VaultInfo {
  vaultPath: string;
  vaultName: string;
  totalFiles: number;
  fileCounts: { markdown: number; canvas: number; other: number };
}

const walkFiles = async (dir: string, files: string[] = []): Promise<string[]> => {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  for (const entry of entries) {
    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      await walkFiles(fullPath, files);
    } else if (entry.isFile()) {
      files.push(fullPath);
    }
  }
  return files;
};

const assertDirectory = async (resolved: string, label: string): Promise<void> => {
  const stats = await fs.stat(resolved).catch(() => undefined);
  if (!stats?.isDirectory()) {
    throw new Error(`Folder not found: ${label}`);
  }
};

export const snippetAround = (content: string, query: string): string | undefined => {
  const index = content.toLowerCase().indexOf(query.toLowerCase());
  if (index < 0) return undefined;
  const start = Math.max(0, index - SNIPPET_RADIUS);
  const end = Math.min(content.length, index + query.length + SNIPPET_RADIUS);
  return content.slice(start, end);
};

export const searchVault = async (
  context: ToolContext,
  query: string,
  target = ".",
  maxResults = DEFAULT_MAX_RESULTS,
): Promise<SearchHit[]> => {
  const resolved = resolveVaultPath(context.vaultRoot, target);
  await assertDirectory(resolved, target);
  const results: SearchHit[] = [];
  for (const file of await walkFiles(resolved)) {
    if (results.length >= maxResults) break;
    if (!SEARCHABLE_EXTENSIONS.has(path.extname(file).toLowerCase())) continue;
    let content: string;
    try {
      content = await fs.readFile(file, "utf8");
    } catch {
      // unreadable files are not search hits
      continue;
    }
    const snippet = snippetAround(content, query);
    if (snippet !== undefined) {
      results.push({ path: toVaultRelative(context.vaultRoot, file), snippet });
    }
  }
  return results;
};

export const describeVault = async (context: ToolContext): Promise<VaultInfo> => {
  const root = path.resolve(context.vaultRoot);
  const fileCounts = { markdown: 0, canvas: 0, other: 0 };
  const files = await walkFiles(root);
  for (const file of files) {
    const ext = path.extname(file).toLowerCase();
    if (ext === ".md") fileCounts.markdown += 1;
    else if (ext === ".canvas") fileCounts.canvas += 1;
    else fileCounts.other += 1;
  }
  return {
    vaultPath: root,
    vaultName: path.basename(root),
    totalFiles: files.length,
    fileCounts,
  };
};

export const createVaultTools = (): ToolDefinition[] => {
  return [
    {
      name: "read_note",
      description: "Read a text file from the vault.",
      inputSchema: {
        type: "object",
        required: ["path"],
        properties: {
          path: { type: "string", description: "Vault-relative path." },
        },
      },
      handler: async (args, context) => {
        const target = stringArg(args, "path");
        const resolved = resolveVaultPath(context.vaultRoot, target);
        const stats = await fs.stat(resolved).catch(() => undefined);
        if (!stats?.isFile()) {
          throw new Error(`File not found: ${target}`);
        }
        return { output: await fs.readFile(resolved, "utf8") };
      },
    },
    {
      name: "write_note",
      description: "Write content to a file in the vault, creating parent folders.",
      inputSchema: {
        type: "object",
        required: ["path", "content"],
        properties: {
          path: { type: "string" },
          content: { type: "string" },
        },
      },
      handler: async (args, context) => {
        const target = stringArg(args, "path");
        const content = stringArg(args, "content");
        const resolved = resolveVaultPath(context.vaultRoot, target);
        await fs.mkdir(path.dirname(resolved), { recursive: true });
        await fs.writeFile(resolved, content, "utf8");
        const relative = toVaultRelative(context.vaultRoot, resolved);
        context.recordTouchedFile?.(relative);
        return { output: `Wrote ${relative}`, data: { path: relative } };
      },
    },
    {
      name: "create_directory",
      description: "Create a folder (and its parents) in the vault.",
      inputSchema: {
        type: "object",
        required: ["path"],
        properties: {
          path: { type: "string" },
        },
      },
      handler: async (args, context) => {
        const resolved = resolveVaultPath(context.vaultRoot, stringArg(args, "path"));
        await fs.mkdir(resolved, { recursive: true });
        return { output: `Created ${toVaultRelative(context.vaultRoot, resolved)}` };
      },
    },
    {
      name: "list_files",
      description: "List files in a vault folder.",
      inputSchema: {
        type: "object",
        properties: {
          path: { type: "string" },
          recursive: { type: "boolean" },
        },
      },
      handler: async (args, context) => {
        const target = optionalStringArg(args, "path") ?? ".";
        const recursive = optionalBooleanArg(args, "recursive") ?? false;
        const resolved = resolveVaultPath(context.vaultRoot, target);
        await assertDirectory(resolved, target);
        let files: string[];
        if (recursive) {
          files = await walkFiles(resolved);
        } else {
          const entries = await fs.readdir(resolved, { withFileTypes: true });
          files = entries
            .filter((entry) => entry.isFile())
            .map((entry) => path.join(resolved, entry.name))
            .sort();
        }
        const relative = files.map((file) => toVaultRelative(context.vaultRoot, file));
        return { output: relative.join("\n"), data: { files: relative } };
      },
    },
    {
      name: "search_vault",
      description: "Case-insensitive text search over .md and .txt files.",
      inputSchema: {
        type: "object",
        required: ["query"],
        properties: {
          query: { type: "string" },
          path: { type: "string" },
          maxResults: { type: "number" },
        },
      },
      handler: async (args, context) => {
        const results = await searchVault(
          context,
          stringArg(args, "query"),
          optionalStringArg(args, "path"),
          optionalNumberArg(args, "maxResults"),
        );
        return { output: JSON.stringify({ results }, null, 2), data: { results } };
      },
    },
    {
      name: "vault_info",
      description: "Summarize the vault: name, path and file counts by type.",
      inputSchema: { type: "object", properties: {} },
      handler: async (_args, context) => {
        const info = await describeVault(context);
        return { output: JSON.stringify(info, null, 2), data: info };
      },
    },
  ];
};
