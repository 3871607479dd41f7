import * as http from "http";
import express from "express";
import { createConsoleLogger, Logger, SandboxConfigInput } from "@toolwarden/core";
import { SandboxExecutor } from "@toolwarden/sandbox";
import { createGatewayApp } from "./app";
import { AuditLog } from "./audit-log";
import { SessionRegistry } from "./session-registry";

export const DEFAULT_SESSION_ID = "default";

export interface GatewayServerOptions {
  port?: number;
  logDir?: string;
  /** Configuration of the default session and of sessions created without one */
  sandbox?: SandboxConfigInput;
  logger?: Logger;
}

/**
 * GatewayServer - HTTP front for sandboxed tool execution.
 *
 * Owns the session registry, the default session and the JSONL audit sink
 * that every session writes to.
 */
export class GatewayServer {
  readonly registry: SessionRegistry;
  private readonly app: express.Application;
  private readonly auditLog: AuditLog;
  private readonly port: number;
  private readonly sandbox: SandboxConfigInput;
  private readonly logger: Logger;
  private server?: http.Server;

  constructor(options: GatewayServerOptions = {}) {
    this.port = options.port ?? 3000;
    this.sandbox = options.sandbox ?? {};
    this.logger = options.logger ?? createConsoleLogger("Gateway");
    this.auditLog = new AuditLog(options.logDir ?? "./logs");

    const auditLog = this.auditLog;
    const logger = this.logger;
    this.registry = new SessionRegistry({
      defaultConfig: this.sandbox,
      logger,
      createExecutor: (config, sessionId) =>
        new SandboxExecutor(config, {
          logger,
          context: { sessionId },
          onAuditRecord: (record) => auditLog.writeRecord(record),
        }),
    });
    this.app = createGatewayApp({ registry: this.registry, defaultSessionId: DEFAULT_SESSION_ID, logger });
  }

  /**
   * Start the default session, then listen. Resolves once the port is bound.
   */
  async start(): Promise<void> {
    if (!this.registry.get(DEFAULT_SESSION_ID)) {
      await this.registry.create(this.sandbox, DEFAULT_SESSION_ID);
    }

    await new Promise<void>((resolve, reject) => {
      const server = this.app.listen(this.port, () => {
        this.logger.info(`Gateway server listening on port ${this.address()}`);
        this.logger.info(`Audit log: ${this.auditLog.getLogPath()}`);
        resolve();
      });
      server.once("error", reject);
      this.server = server;
    });
  }

  /**
   * Stop listening, close every session, then flush the audit log.
   */
  async stop(): Promise<void> {
    const server = this.server;
    this.server = undefined;
    if (server) {
      await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
    }
    await this.registry.closeAll();
    await this.auditLog.close();
  }

  /** Bound port, or the configured one before start. */
  address(): number {
    const address = this.server?.address();
    return address && typeof address === "object" ? address.port : this.port;
  }

  /**
   * Get the Express app (for testing)
   */
  getApp(): express.Application {
    return this.app;
  }
}
