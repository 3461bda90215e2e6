export interface ToolContext {
  vaultRoot: string;
  runId?: string;
  signal?: AbortSignal;
  recordTouchedFile?: (path: string) => void;
}

export interface ToolHandlerResult {
  output: string;
  data?: unknown;
}

export interface ToolExecutionResult extends ToolHandlerResult {
  ok: boolean;
  error?: string;
}

export type ToolHandler = (args: unknown, context: ToolContext) => Promise<ToolHandlerResult>;

export interface ToolDefinition {
  name: string;
  description: string;
  inputSchema?: Record<string, unknown>;
  handler: ToolHandler;
}
