import Ajv, { ValidateFunction } from 'ajv';
import { ToolRegistry } from './registry';
import { ToolContext, ToolResult, ToolCallLog, ToolDefinition } from './types';
import { logger, Logger } from '../observability/logger';
import { toolCallDuration } from '../observability/metrics';

const DEFAULT_TOOL_TIMEOUT_MS = 15_000;

export interface ToolRuntimeOptions {
  /** Applies to tools that do not set their own timeoutMs */
  defaultTimeoutMs?: number;
}

class ToolTimeoutError extends Error {
  constructor(ms: number) {
    super(`Tool execution timeout after ${ms}ms`);
    this.name = 'ToolTimeoutError';
  }
}

export class ToolRuntime {
  private readonly ajv = new Ajv({ allErrors: true, coerceTypes: true });
  private readonly validators = new Map<string, ValidateFunction>();
  private readonly defaultTimeoutMs: number;

  constructor(
    private readonly registry: ToolRegistry,
    options: ToolRuntimeOptions = {},
  ) {
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? DEFAULT_TOOL_TIMEOUT_MS;
  }

  /**
   * Execute a tool call:
   * - Registry lookup
   * - Schema validation
   * - Timeout enforcement
   * - Structured logging + duration metric
   * - Safe error messages
   */
  async execute(
    toolName: string,
    args: Record<string, unknown>,
    ctx: ToolContext,
  ): Promise<ToolResult> {
    const startTime = Date.now();
    const log = logger.child({ tool: toolName, requestId: ctx.requestId });

    // 1. Check tool exists
    const tool = this.registry.get(toolName);
    if (!tool) {
      log.warn('Tool not found in registry');
      return { success: false, error: `Unknown tool: ${toolName}`, errorKind: 'unknown_tool' };
    }

    // 2. Schema validation
    let validate: ValidateFunction;
    try {
      validate = this.validatorFor(tool);
    } catch (err) {
      log.error({ err }, 'Schema compilation error');
      return { success: false, error: 'Internal validation error', errorKind: 'internal' };
    }
    if (!validate(args)) {
      const errors = validate.errors?.map((e) => `${e.instancePath || '/'} ${e.message ?? 'is invalid'}`).join('; ');
      log.warn({ errors }, 'Tool input schema validation failed');
      return { success: false, error: `Invalid input: ${errors}`, errorKind: 'invalid_input' };
    }

    // 3. Execute with timeout
    const result = await this.tryExecute(tool, args, ctx, log);

    // 4. Log and return
    const durationMs = Date.now() - startTime;
    toolCallDuration.observe(
      { tool: toolName, status: result.success ? 'success' : 'error' },
      durationMs / 1000,
    );
    this.logToolCall(tool, args, result, durationMs, ctx, log);
    return result;
  }

  private validatorFor(tool: ToolDefinition): ValidateFunction {
    const key = `${tool.name}@${tool.version}`;
    let validate = this.validators.get(key);
    if (!validate) {
      validate = this.ajv.compile(tool.inputSchema);
      this.validators.set(key, validate);
    }
    return validate;
  }

  /** Execute a single attempt with timeout */
  private async tryExecute(
    tool: ToolDefinition,
    args: Record<string, unknown>,
    ctx: ToolContext,
    log: Logger,
  ): Promise<ToolResult> {
    const timeoutMs = tool.timeoutMs ?? this.defaultTimeoutMs;
    let timer: NodeJS.Timeout | undefined;
    try {
      return await Promise.race([
        tool.handler(args, ctx),
        new Promise<ToolResult>((_, reject) => {
          timer = setTimeout(() => reject(new ToolTimeoutError(timeoutMs)), timeoutMs);
        }),
      ]);
    } catch (err) {
      if (err instanceof ToolTimeoutError) {
        log.warn({ timeoutMs }, 'Tool execution timed out');
        return { success: false, error: 'Tool execution timed out', errorKind: 'timeout' };
      }
      log.error({ err }, 'Tool execution failed');
      return { success: false, error: 'Tool execution failed', errorKind: 'internal' };
    } finally {
      clearTimeout(timer);
    }
  }

  private logToolCall(
    tool: ToolDefinition,
    args: Record<string, unknown>,
    result: ToolResult,
    durationMs: number,
    ctx: ToolContext,
    log: Logger,
  ): void {
    const logEntry: ToolCallLog = {
      tool: tool.name,
      version: tool.version,
      args,
      // Payloads can be whole monster stat blocks; keep them out of the log
      result: { success: result.success, error: result.error, errorKind: result.errorKind },
      durationMs,
      timestamp: Date.now(),
      requestId: ctx.requestId,
    };

    log.info({ toolCallLog: logEntry }, 'Tool call completed');
  }
}
