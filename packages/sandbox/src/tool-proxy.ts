import {
  AuditEntry,
  AuditFilter,
  AuditLogger,
  createConsoleLogger,
  DEFAULT_RATE_LIMIT_KEY,
  deniedResult,
  errorMessage,
  ExecutionResult,
  failedResult,
  isSandboxRequired,
  Logger,
  optionalNumberArg,
  ResolvedSandboxConfig,
  SandboxTimeoutError,
  SecurityManager,
  ToolCall,
  UnsupportedToolError,
  withExecutionMeta,
} from "@toolwarden/core";
import { isDispatchableTool, SandboxBackend, withTimeout } from "./base-sandbox";
import { SandboxProvider } from "./provider";

export interface CallContext {
  userId?: string;
  sessionId?: string;
}

export interface ToolProxyOptions {
  config: ResolvedSandboxConfig;
  provider: SandboxProvider;
  securityManager: SecurityManager;
  auditLogger: AuditLogger;
  logger?: Logger;
  context?: CallContext;
}

/**
 * ToolProxy - per-call entry point.
 *
 * Received → Validating → Denied
 *                       → Routing → Executing → Completed | Failed
 *
 * `execute` resolves with exactly one ExecutionResult for every policy
 * outcome and backend failure, and records exactly one audit entry. The
 * only rejection is UnsupportedToolError, which is audited first.
 */
export class ToolProxy {
  readonly securityManager: SecurityManager;
  readonly auditLogger: AuditLogger;
  private readonly config: ResolvedSandboxConfig;
  private readonly provider: SandboxProvider;
  private readonly logger: Logger;
  private context: CallContext;

  constructor(options: ToolProxyOptions) {
    this.config = options.config;
    this.provider = options.provider;
    this.securityManager = options.securityManager;
    this.auditLogger = options.auditLogger;
    this.logger = options.logger ?? createConsoleLogger("ToolProxy");
    this.context = { ...options.context };
  }

  /** Default caller identity for subsequent calls. */
  setContext(userId?: string, sessionId?: string): void {
    this.context = { userId, sessionId };
  }

  shouldSandbox(toolName: string): boolean {
    return isSandboxRequired(toolName);
  }

  async execute(call: ToolCall, context: CallContext = {}): Promise<ExecutionResult> {
    const started = Date.now();
    const ctx: CallContext = {
      userId: context.userId ?? this.context.userId,
      sessionId: context.sessionId ?? this.context.sessionId,
    };

    const verdict = this.securityManager.validate(call, ctx.userId ?? DEFAULT_RATE_LIMIT_KEY);
    if (!verdict.allowed) {
      const denied = deniedResult(verdict.reason ?? "Policy violation", Date.now() - started);
      this.record(call, denied, ctx);
      return denied;
    }

    if (!isDispatchableTool(call.tool_name)) {
      const error = new UnsupportedToolError(call.tool_name);
      this.record(call, failedResult(error.message, { execution_time_ms: Date.now() - started }), ctx);
      throw error;
    }

    const result = await this.route(call, started);
    this.record(call, result, ctx);
    return result;
  }

  getAuditLog(filter?: AuditFilter): AuditEntry[] {
    return this.auditLogger.getEntries(filter);
  }

  // -----------------------------------------------------------------------
  // Internals
  // -----------------------------------------------------------------------

  private async route(call: ToolCall, started: number): Promise<ExecutionResult> {
    const timeoutMs = this.timeoutFor(call);

    let handle: SandboxBackend;
    const pending = this.provider.acquire();
    try {
      handle = await withTimeout(pending, timeoutMs, "Sandbox acquisition");
    } catch (err) {
      if (err instanceof SandboxTimeoutError) {
        // A handle that arrives after the timeout goes straight back
        void pending.then(
          (late) => this.provider.release(late),
          () => undefined
        );
      }
      this.logger.error(`Sandbox acquisition failed: ${errorMessage(err)}`, { tool_name: call.tool_name });
      return failedResult(errorMessage(err), { execution_time_ms: Date.now() - started });
    }

    try {
      const raw = await withTimeout(handle.executeTool(call), timeoutMs, `${call.tool_name} execution`);
      await this.provider.release(handle, { discard: !handle.isConnected });
      return withExecutionMeta(raw, { execution_time_ms: Date.now() - started, sandbox_id: handle.sandboxId });
    } catch (err) {
      // A timed-out handle keeps serving; anything else means the transport is broken
      const broken = !(err instanceof SandboxTimeoutError) || !handle.isConnected;
      await this.provider.release(handle, { discard: broken });
      this.logger.error(`Tool execution failed: ${errorMessage(err)}`, {
        tool_name: call.tool_name,
        sandbox_id: handle.sandboxId,
      });
      return failedResult(errorMessage(err), {
        execution_time_ms: Date.now() - started,
        sandbox_id: handle.sandboxId,
      });
    }
  }

  private timeoutFor(call: ToolCall): number {
    const defaultMs = this.config.resource_limits.timeout_seconds * 1000;
    if (call.tool_name === "Bash") {
      return optionalNumberArg(call.arguments, "timeout") ?? defaultMs;
    }
    return defaultMs;
  }

  private record(call: ToolCall, result: ExecutionResult, ctx: CallContext): void {
    this.auditLogger.log({
      tool_name: call.tool_name,
      tool_args: call.arguments,
      result,
      sandbox_id: result.sandbox_id ?? null,
      user_id: ctx.userId ?? null,
      session_id: ctx.sessionId ?? null,
    });
  }
}
