import express, { NextFunction, Request, Response } from "express";
import {
  ConfigurationError,
  createConsoleLogger,
  createToolCall,
  errorMessage,
  ExecutionResult,
  isPlainObject,
  Logger,
  SandboxConfigLoader,
  UnsupportedToolError,
} from "@toolwarden/core";
import { SandboxExecutor } from "@toolwarden/sandbox";
import { SessionRegistry } from "./session-registry";

export const SERVICE_NAME = "toolwarden-gateway";
export const SERVICE_VERSION = "0.1.0";

export interface GatewayAppOptions {
  registry: SessionRegistry;
  /** Session used when a request names none */
  defaultSessionId: string;
  logger?: Logger;
}

/** Wire shape of an ExecutionResult. */
export interface ExecuteResponse {
  success: boolean;
  output: string;
  error: string | null;
  exit_code: number;
  execution_time_ms: number;
  sandbox_id: string | null;
}

/**
 * Error carrying an HTTP status, raised by request validation.
 */
export class HttpError extends Error {
  constructor(
    public readonly status: number,
    message: string
  ) {
    super(message);
    this.name = "HttpError";
  }
}

type Body = Record<string, unknown>;

function readBody(req: Request): Body {
  const body: unknown = req.body;
  if (body === undefined) return {};
  if (!isPlainObject(body)) throw new HttpError(400, "request body must be a JSON object");
  return body;
}

function requiredString(body: Body, key: string): string {
  const value = body[key];
  if (typeof value !== "string" || value.length === 0) {
    throw new HttpError(400, `${key} must be a non-empty string`);
  }
  return value;
}

function optionalString(body: Body, key: string): string | undefined {
  const value = body[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "string") throw new HttpError(400, `${key} must be a string`);
  return value;
}

function optionalPositiveNumber(body: Body, key: string): number | undefined {
  const value = body[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "number" || !(value > 0)) throw new HttpError(400, `${key} must be a positive number`);
  return value;
}

export function toExecuteResponse(result: ExecutionResult): ExecuteResponse {
  return {
    success: result.success,
    output: result.output,
    error: result.error ?? null,
    exit_code: result.exit_code,
    execution_time_ms: result.execution_time_ms,
    sandbox_id: result.sandbox_id ?? null,
  };
}

/**
 * Build the express app over an explicitly passed session registry.
 *
 * Status codes: 404 for an unknown session, 400 for a malformed body, an
 * invalid session configuration or a tool with no sandbox dispatch, 500 for
 * anything else. Policy denials and tool failures are 200 with
 * `success: false`.
 */
export function createGatewayApp(options: GatewayAppOptions): express.Application {
  const { registry, defaultSessionId } = options;
  const logger = options.logger ?? createConsoleLogger("Gateway");
  const app = express();
  app.use(express.json());

  function executorFor(sessionId: string | undefined): SandboxExecutor {
    const id = sessionId ?? defaultSessionId;
    const executor = registry.get(id);
    if (!executor) throw new HttpError(404, `Session not found: ${id}`);
    return executor;
  }

  function sessionFromQuery(req: Request): string | undefined {
    const value = req.query.session_id;
    return typeof value === "string" && value.length > 0 ? value : undefined;
  }

  // Express 4 does not catch rejected handlers; route them to the error middleware
  const route =
    (handler: (req: Request, res: Response) => Promise<void>) =>
    (req: Request, res: Response, next: NextFunction): void => {
      handler(req, res).catch(next);
    };

  app.get("/", (_req, res) => {
    res.json({
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      status: "running",
      default_session_ready: registry.get(defaultSessionId)?.isStarted ?? false,
    });
  });

  app.get("/health", (_req, res) => {
    res.json({
      status: "healthy",
      sandbox_ready: registry.get(defaultSessionId)?.isStarted ?? false,
    });
  });

  app.post(
    "/execute",
    route(async (req, res) => {
      const body = readBody(req);
      const toolName = requiredString(body, "tool_name");
      const args = body.arguments ?? {};
      if (!isPlainObject(args)) throw new HttpError(400, "arguments must be an object");
      const executor = executorFor(optionalString(body, "session_id"));

      const result = await executor.executeTool(createToolCall(toolName, args));
      res.json(toExecuteResponse(result));
    })
  );

  app.post(
    "/bash",
    route(async (req, res) => {
      const body = readBody(req);
      const command = requiredString(body, "command");
      const timeout = optionalPositiveNumber(body, "timeout");
      const executor = executorFor(optionalString(body, "session_id"));

      res.json(toExecuteResponse(await executor.executeBash(command, timeout)));
    })
  );

  app.post(
    "/files/read",
    route(async (req, res) => {
      const body = readBody(req);
      const filePath = requiredString(body, "path");
      const executor = executorFor(optionalString(body, "session_id"));

      res.json(toExecuteResponse(await executor.readFile(filePath)));
    })
  );

  app.post(
    "/files/write",
    route(async (req, res) => {
      const body = readBody(req);
      const filePath = requiredString(body, "path");
      const content = body.content;
      if (typeof content !== "string") throw new HttpError(400, "content must be a string");
      const executor = executorFor(optionalString(body, "session_id"));

      res.json(toExecuteResponse(await executor.writeFile(filePath, content)));
    })
  );

  app.post(
    "/search",
    route(async (req, res) => {
      const body = readBody(req);
      const pattern = requiredString(body, "pattern");
      const searchPath = optionalString(body, "path") ?? ".";
      const include = optionalString(body, "include");
      const executor = executorFor(optionalString(body, "session_id"));

      res.json(toExecuteResponse(await executor.searchFiles(pattern, searchPath, include)));
    })
  );

  app.get(
    "/audit-logs",
    route(async (req, res) => {
      res.json({ logs: executorFor(sessionFromQuery(req)).exportAuditLog() });
    })
  );

  app.get(
    "/stats",
    route(async (req, res) => {
      res.json({ executor: executorFor(sessionFromQuery(req)).stats(), sessions: registry.size });
    })
  );

  app.post(
    "/sessions",
    route(async (req, res) => {
      const body = readBody(req);
      const config = body.config === undefined ? undefined : SandboxConfigLoader.loadFromObject(body.config);
      const sessionId = await registry.create(config);
      res.status(201).json({ session_id: sessionId });
    })
  );

  app.get("/sessions", (_req, res) => {
    res.json({ sessions: registry.list() });
  });

  app.delete(
    "/sessions/:session_id",
    route(async (req, res) => {
      const { session_id } = req.params;
      if (!(await registry.close(session_id))) {
        throw new HttpError(404, `Session not found: ${session_id}`);
      }
      res.json({ message: `Session ${session_id} closed` });
    })
  );

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof HttpError) {
      res.status(err.status).json({ error: err.message });
      return;
    }
    if (err instanceof UnsupportedToolError || err instanceof ConfigurationError) {
      res.status(400).json({ error: err.message });
      return;
    }
    // body-parser reports unparseable JSON as a SyntaxError
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: "request body is not valid JSON" });
      return;
    }
    logger.error(`Error processing request: ${errorMessage(err)}`);
    res.status(500).json({ error: "Internal server error" });
  });

  return app;
}
