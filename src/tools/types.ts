import { FetchErrorKind } from '../reference/types';

/** Tool definition metadata */
export interface ToolDefinition {
  name: string;
  version: string;
  description: string;
  inputSchema: Record<string, unknown>; // JSON Schema
  handler: ToolHandler;
  /** Per-call timeout; the runtime default applies when absent */
  timeoutMs?: number;
}

/** Tool execution context */
export interface ToolContext {
  requestId: string;
}

/** Tool handler function */
export type ToolHandler = (
  args: Record<string, unknown>,
  ctx: ToolContext,
) => Promise<ToolResult>;

/** Tool execution result */
export interface ToolResult {
  success: boolean;
  data?: unknown;
  error?: string;
  /** Failure class, so callers can tell a bad argument from an outage */
  errorKind?: FetchErrorKind | 'unknown_tool' | 'timeout' | 'internal';
}

/** Tool call log record */
export interface ToolCallLog {
  tool: string;
  version: string;
  args: Record<string, unknown>;
  result: Pick<ToolResult, 'success' | 'error' | 'errorKind'>;
  durationMs: number;
  timestamp: number;
  requestId: string;
}
