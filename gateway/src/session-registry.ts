import { v4 as uuidv4 } from "uuid";
import { createConsoleLogger, errorMessage, Logger, SandboxConfigInput } from "@toolwarden/core";
import { ExecutorStats, SandboxExecutor } from "@toolwarden/sandbox";

export interface SessionInfo {
  session_id: string;
  created_at: string; // ISO-8601
  sandbox_type: string;
  stats: ExecutorStats;
}

export type ExecutorBuilder = (config: SandboxConfigInput, sessionId: string) => SandboxExecutor;

export interface SessionRegistryOptions {
  /** Configuration for sessions created without one */
  defaultConfig?: SandboxConfigInput;
  /** Builds the (unstarted) executor behind a session */
  createExecutor?: ExecutorBuilder;
  logger?: Logger;
}

interface Session {
  executor: SandboxExecutor;
  createdAt: string;
}

/**
 * SessionRegistry - named executors, one per client session.
 *
 * Owned by whoever serves the sessions (the gateway server) and passed
 * explicitly to the routes.
 */
export class SessionRegistry {
  private readonly sessions = new Map<string, Session>();
  private readonly defaultConfig: SandboxConfigInput;
  private readonly createExecutor: ExecutorBuilder;
  private readonly logger: Logger;

  constructor(options: SessionRegistryOptions = {}) {
    this.defaultConfig = options.defaultConfig ?? {};
    this.logger = options.logger ?? createConsoleLogger("SessionRegistry");
    this.createExecutor =
      options.createExecutor ??
      ((config, sessionId) => new SandboxExecutor(config, { logger: this.logger, context: { sessionId } }));
  }

  /**
   * Start a new executor and register it. Throws ConfigurationError when the
   * configuration is invalid; nothing is registered in that case.
   */
  async create(config: SandboxConfigInput = this.defaultConfig, sessionId: string = uuidv4()): Promise<string> {
    if (this.sessions.has(sessionId)) {
      throw new Error(`Session already exists: ${sessionId}`);
    }
    const executor = this.createExecutor(config, sessionId);
    await executor.start();
    this.sessions.set(sessionId, { executor, createdAt: new Date().toISOString() });
    this.logger.info(`Session created: ${sessionId}`);
    return sessionId;
  }

  get(sessionId: string): SandboxExecutor | undefined {
    return this.sessions.get(sessionId)?.executor;
  }

  /**
   * Stop and forget a session. Returns false when it does not exist.
   */
  async close(sessionId: string): Promise<boolean> {
    const session = this.sessions.get(sessionId);
    if (!session) return false;
    this.sessions.delete(sessionId);
    await session.executor.stop();
    this.logger.info(`Session closed: ${sessionId}`);
    return true;
  }

  async closeAll(): Promise<void> {
    const ids = [...this.sessions.keys()];
    for (const id of ids) {
      try {
        await this.close(id);
      } catch (err) {
        this.logger.error(`Failed to close session ${id}: ${errorMessage(err)}`);
      }
    }
  }

  list(): SessionInfo[] {
    return [...this.sessions.entries()].map(([sessionId, session]) => ({
      session_id: sessionId,
      created_at: session.createdAt,
      sandbox_type: session.executor.config.sandbox_type,
      stats: session.executor.stats(),
    }));
  }

  get size(): number {
    return this.sessions.size;
  }
}
