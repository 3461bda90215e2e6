import { err, errorMessage, ok, type Result } from "@vaultsplit/shared";
import type { ToolRegistry } from "../ToolRegistry.js";

export interface RemoteToolDescriptor {
  name: string;
  description: string;
  inputSchema?: Record<string, unknown>;
}

export interface RemoteServerInfo {
  name?: string;
  version?: string;
  tools: RemoteToolDescriptor[];
}

export interface RemoteToolHostOptions {
  timeoutMs?: number;
  authToken?: string;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const parseDescriptor = (value: unknown): RemoteToolDescriptor | undefined => {
  if (!isRecord(value) || typeof value.name !== "string") return undefined;
  const schema = value.input_schema ?? value.inputSchema;
  return {
    name: value.name,
    description: typeof value.description === "string" ? value.description : value.name,
    inputSchema: isRecord(schema) ? schema : undefined,
  };
};

/**
 * HTTP client for an out-of-process tool host: `GET /` describes the host and
 * its tools, `POST /tool` runs one. Failures come back as `Result` errors.
 */
export class RemoteToolHost {
  private baseUrl: string;
  private timeoutMs: number;
  private authToken?: string;

  constructor(baseUrl: string, options: RemoteToolHostOptions = {}) {
    this.baseUrl = baseUrl.endsWith("/") ? baseUrl : `${baseUrl}/`;
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.authToken = options.authToken;
  }

  async describe(signal?: AbortSignal): Promise<Result<RemoteServerInfo>> {
    const response = await this.request("GET", "", undefined, signal);
    if (!response.ok) return response;
    const body = response.value;
    if (!isRecord(body) || !Array.isArray(body.tools)) {
      return err("Tool host info is missing a tools list");
    }
    const tools = body.tools
      .map(parseDescriptor)
      .filter((tool): tool is RemoteToolDescriptor => tool !== undefined);
    return ok({
      name: typeof body.name === "string" ? body.name : undefined,
      version: typeof body.version === "string" ? body.version : undefined,
      tools,
    });
  }

  async call(name: string, args: unknown, signal?: AbortSignal): Promise<Result<unknown>> {
    return this.request("POST", "tool", { tool_name: name, arguments: args ?? {} }, signal);
  }

  private async request(
    method: "GET" | "POST",
    route: string,
    body: unknown,
    signal?: AbortSignal,
  ): Promise<Result<unknown>> {
    if (signal?.aborted) return err("Tool host request aborted");
    const url = new URL(route, this.baseUrl).toString();
    const headers: Record<string, string> = { accept: "application/json" };
    if (body !== undefined) headers["content-type"] = "application/json";
    if (this.authToken) headers.authorization = `Bearer ${this.authToken}`;

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    const onAbort = (): void => controller.abort();
    signal?.addEventListener("abort", onAbort, { once: true });
    try {
      const response = await fetch(url, {
        method,
        headers,
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: controller.signal,
      });
      const text = await response.text();
      let parsed: unknown = undefined;
      if (text.trim()) {
        try {
          parsed = JSON.parse(text);
        } catch {
          return err(`Tool host returned invalid JSON (${response.status})`);
        }
      }
      if (isRecord(parsed) && parsed.error !== undefined) {
        return err(typeof parsed.error === "string" ? parsed.error : JSON.stringify(parsed.error));
      }
      if (!response.ok) {
        return err(`Tool host error ${response.status}`);
      }
      return ok(parsed);
    } catch (error) {
      if (controller.signal.aborted) {
        return err(signal?.aborted ? "Tool host request aborted" : `Tool host request timed out after ${this.timeoutMs}ms`);
      }
      return err(`Tool host unreachable: ${errorMessage(error)}`);
    } finally {
      clearTimeout(timeout);
      signal?.removeEventListener("abort", onAbort);
    }
  }
}

export const formatRemoteOutput = (value: unknown): string => {
  if (isRecord(value) && typeof value.content === "string") return value.content;
  if (typeof value === "string") return value;
  return JSON.stringify(value ?? null, null, 2);
};

/** Registers every tool the host advertises. Names already in the registry are skipped. */
export const registerRemoteTools = async (registry: ToolRegistry, host: RemoteToolHost): Promise<Result<string[]>> => {
  const info = await host.describe();
  if (!info.ok) return info;
  const registered: string[] = [];
  for (const tool of info.value.tools) {
    if (registry.has(tool.name)) continue;
    registry.register({
      name: tool.name,
      description: tool.description,
      inputSchema: tool.inputSchema,
      handler: async (args, context) => {
        const result = await host.call(tool.name, args, context.signal);
        if (!result.ok) {
          throw new Error(result.error);
        }
        return { output: formatRemoteOutput(result.value), data: result.value };
      },
    });
    registered.push(tool.name);
  }
  return ok(registered);
};
