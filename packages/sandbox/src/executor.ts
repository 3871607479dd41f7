import {
  assertValidSandboxConfig,
  AuditEntry,
  AuditFilter,
  AuditLogger,
  AuditRecord,
  createConsoleLogger,
  createSandboxConfig,
  createToolCall,
  errorMessage,
  ExecutionResult,
  ExecutorNotStartedError,
  Logger,
  ResolvedSandboxConfig,
  RiskFinding,
  SandboxConfigInput,
  SecurityManager,
  ToolCall,
  ViolationFilter,
  ViolationStats,
} from "@toolwarden/core";
import { SandboxBackend } from "./base-sandbox";
import { DedicatedSandbox } from "./dedicated-sandbox";
import { createPermissionCallback, PermissionCallback } from "./permission-callback";
import { ProviderStats, SandboxProvider } from "./provider";
import { SandboxFactoryOptions, sandboxFactoryFor } from "./sandbox-factory";
import { SandboxPool } from "./sandbox-pool";
import { CallContext, ToolProxy } from "./tool-proxy";

export interface SandboxExecutorOptions extends SandboxFactoryOptions {
  /** Override backend construction (default: from `sandbox_type`) */
  sandboxFactory?: (config: ResolvedSandboxConfig) => SandboxBackend;
  /** Called for every audit record, e.g. to persist it */
  onAuditRecord?: (record: AuditRecord) => void;
  onViolation?: (violation: RiskFinding) => void;
  context?: CallContext;
}

export interface ExecutorStats {
  provider: ProviderStats;
  audit_entries: number;
  violations: ViolationStats;
}

interface Running {
  provider: SandboxProvider;
  proxy: ToolProxy;
}

/**
 * SandboxExecutor - lifecycle façade.
 *
 * `start` validates the configuration and wires the security manager, the
 * audit logger, a sandbox provider (a pool, or one dedicated handle when
 * pooling is disabled) and the tool proxy. `stop` tears them down in
 * reverse order. Every other method requires a started executor.
 *
 * @example
 * ```typescript
 * const executor = new SandboxExecutor({ security: { blocked_tools: ['WebFetch'] } });
 * await executor.start();
 * const result = await executor.executeBash('ls -la');
 * await executor.stop();
 * ```
 */
export class SandboxExecutor {
  readonly config: ResolvedSandboxConfig;
  private readonly options: SandboxExecutorOptions;
  private readonly logger: Logger;
  private running?: Running;
  private security?: SecurityManager;
  private audit?: AuditLogger;

  constructor(config: SandboxConfigInput = {}, options: SandboxExecutorOptions = {}) {
    this.config = createSandboxConfig(config);
    this.options = options;
    this.logger = options.logger ?? createConsoleLogger("SandboxExecutor", { level: this.config.debug ? "debug" : "info" });
  }

  get isStarted(): boolean {
    return this.running !== undefined;
  }

  /**
   * Validate configuration and build dependencies. Idempotent.
   * Throws ConfigurationError on invalid configuration.
   */
  async start(): Promise<void> {
    if (this.running) return;
    assertValidSandboxConfig(this.config);

    const config = this.config;
    const security = new SecurityManager(config.security, {
      workingDirectory: config.working_directory,
      homeDirectory: config.home_directory,
      logger: this.logger,
      onViolation: this.options.onViolation,
    });
    const onAuditRecord = this.options.onAuditRecord;
    const audit = new AuditLogger({
      enabled: config.security.enable_audit_log,
      logger: this.logger,
      onEntry: onAuditRecord ? (record) => onAuditRecord(record) : undefined,
    });

    const buildSandbox = this.options.sandboxFactory;
    const factory = buildSandbox ? () => buildSandbox(config) : sandboxFactoryFor(config, this.options);
    const provider: SandboxProvider = config.pool.enabled
      ? new SandboxPool({
          factory,
          maxSize: config.pool.max_size,
          reuse: !config.auto_cleanup,
          idleTimeoutMs: config.pool.idle_timeout_seconds * 1000,
          logger: this.logger,
        })
      : new DedicatedSandbox({ factory, logger: this.logger });

    const proxy = new ToolProxy({
      config,
      provider,
      securityManager: security,
      auditLogger: audit,
      logger: this.logger,
      context: this.options.context,
    });

    this.security = security;
    this.audit = audit;
    this.running = { provider, proxy };
    this.logger.info(
      `Sandbox executor started (${config.sandbox_type}, ${config.pool.enabled ? `pool of ${config.pool.max_size}` : "dedicated sandbox"})`
    );
  }

  /**
   * Release every sandbox. Teardown errors are logged, never thrown.
   */
  async stop(): Promise<void> {
    const running = this.running;
    if (!running) return;
    this.running = undefined;
    try {
      await running.provider.closeAll();
    } catch (err) {
      this.logger.error(`Error while closing sandboxes: ${errorMessage(err)}`);
    }
    this.logger.info("Sandbox executor stopped");
  }

  // -----------------------------------------------------------------------
  // Tool execution
  // -----------------------------------------------------------------------

  async executeTool(call: ToolCall, context?: CallContext): Promise<ExecutionResult> {
    return this.require("executeTool").proxy.execute(call, context);
  }

  /** Build a ToolCall from a name and arguments and execute it. */
  async run(toolName: string, args: Record<string, unknown> = {}, context?: CallContext): Promise<ExecutionResult> {
    return this.require("run").proxy.execute(createToolCall(toolName, args), context);
  }

  async executeBash(command: string, timeoutMs?: number): Promise<ExecutionResult> {
    return this.run("Bash", timeoutMs ? { command, timeout: timeoutMs } : { command });
  }

  async readFile(filePath: string): Promise<ExecutionResult> {
    return this.run("Read", { file_path: filePath });
  }

  async writeFile(filePath: string, content: string): Promise<ExecutionResult> {
    return this.run("Write", { file_path: filePath, content });
  }

  async editFile(filePath: string, oldString: string, newString: string, replaceAll = false): Promise<ExecutionResult> {
    return this.run("Edit", { file_path: filePath, old_string: oldString, new_string: newString, replace_all: replaceAll });
  }

  async listFiles(dirPath = ".", pattern?: string): Promise<ExecutionResult> {
    return this.run("Glob", pattern ? { path: dirPath, pattern } : { path: dirPath });
  }

  async searchFiles(pattern: string, dirPath = ".", filePattern?: string): Promise<ExecutionResult> {
    return this.run("Grep", filePattern ? { pattern, path: dirPath, include: filePattern } : { pattern, path: dirPath });
  }

  /**
   * Run `fn` with a sandbox handle held for its duration.
   * The handle is used directly: no policy check and no audit entry.
   */
  async withSandbox<T>(fn: (sandbox: SandboxBackend) => Promise<T>): Promise<T> {
    const { provider } = this.require("withSandbox");
    const handle = await provider.acquire();
    let discard = false;
    try {
      return await fn(handle);
    } catch (err) {
      discard = !handle.isConnected;
      throw err;
    } finally {
      await provider.release(handle, { discard });
    }
  }

  getPermissionCallback(context?: CallContext): PermissionCallback {
    return createPermissionCallback(this.require("getPermissionCallback").proxy, context);
  }

  // -----------------------------------------------------------------------
  // Inspection
  // -----------------------------------------------------------------------

  getAuditLog(filter?: AuditFilter): AuditEntry[] {
    return this.requireAudit("getAuditLog").getEntries(filter);
  }

  exportAuditLog(): AuditRecord[] {
    return this.requireAudit("exportAuditLog").export();
  }

  getViolations(filter?: ViolationFilter): RiskFinding[] {
    return this.requireSecurity("getViolations").getViolations(filter);
  }

  stats(): ExecutorStats {
    const { provider } = this.require("stats");
    return {
      provider: provider.stats(),
      audit_entries: this.requireAudit("stats").size,
      violations: this.requireSecurity("stats").getStats(),
    };
  }

  private require(operation: string): Running {
    if (!this.running) throw new ExecutorNotStartedError(operation);
    return this.running;
  }

  // Audit trail and violations stay readable after stop()
  private requireAudit(operation: string): AuditLogger {
    if (!this.audit) throw new ExecutorNotStartedError(operation);
    return this.audit;
  }

  private requireSecurity(operation: string): SecurityManager {
    if (!this.security) throw new ExecutorNotStartedError(operation);
    return this.security;
  }
}
