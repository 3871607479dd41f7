import axios, { AxiosAdapter, AxiosInstance, AxiosResponse } from "axios";
import {
  createConsoleLogger,
  createExecutionResult,
  ExecutionResult,
  isPlainObject,
  Logger,
  NetworkPolicy,
  ResourceLimits,
} from "@toolwarden/core";
import { BaseSandbox } from "./base-sandbox";

export interface RemoteSandboxOptions {
  /** Base URL of the sandbox service */
  baseUrl: string;
  /** Sent as a bearer token */
  apiKey?: string;
  /** Template / image to boot (default: "base") */
  template?: string;
  /** Per-request HTTP timeout in ms (default: 60_000) */
  timeoutMs?: number;
  /** Lifetime the service grants the sandbox */
  sessionTimeoutSeconds?: number;
  resourceLimits?: ResourceLimits;
  network?: NetworkPolicy;
  workingDirectory?: string;
  /** Custom axios adapter, e.g. an in-process transport */
  adapter?: AxiosAdapter;
  logger?: Logger;
}

/**
 * RemoteSandbox - HTTP client for a sandbox service.
 *
 * Protocol (JSON bodies):
 *   POST   /sandboxes                  { template, session_timeout_seconds, ... } → { sandbox_id }
 *   DELETE /sandboxes/:id
 *   POST   /sandboxes/:id/commands     { command, timeout_ms } → { stdout, stderr, exit_code }
 *   GET    /sandboxes/:id/files?path=  → { content }
 *   PUT    /sandboxes/:id/files        { path, content } → { path, created }
 *   GET    /sandboxes/:id/files/list?path=&pattern= → { files }
 *   POST   /sandboxes/:id/search       { pattern, path, file_pattern } → { matches: [{ path, line, text }] }
 *
 * HTTP error responses become failed results. Requests that get no response
 * at all (connection refused, timeout) throw.
 */
export class RemoteSandbox extends BaseSandbox {
  private readonly http: AxiosInstance;
  private readonly options: RemoteSandboxOptions;
  private readonly logger: Logger;

  constructor(options: RemoteSandboxOptions) {
    super("");
    this.options = options;
    this.logger = options.logger ?? createConsoleLogger("RemoteSandbox");
    this.http = axios.create({
      baseURL: options.baseUrl.replace(/\/+$/, ""),
      timeout: options.timeoutMs ?? 60_000,
      headers: options.apiKey ? { Authorization: `Bearer ${options.apiKey}` } : {},
      // Status codes are mapped to results below, never thrown
      validateStatus: () => true,
      ...(options.adapter ? { adapter: options.adapter } : {}),
    });
  }

  protected async openSession(): Promise<void> {
    const response = await this.http.post<unknown>("/sandboxes", {
      template: this.options.template ?? "base",
      session_timeout_seconds: this.options.sessionTimeoutSeconds,
      resource_limits: this.options.resourceLimits,
      network: this.options.network,
      working_directory: this.options.workingDirectory,
    });
    if (response.status >= 400) {
      throw new Error(`Failed to create sandbox: ${describeFailure(response)}`);
    }
    const sandboxId = readString(response.data, "sandbox_id");
    if (!sandboxId) {
      throw new Error("Failed to create sandbox: response has no sandbox_id");
    }
    this.id = sandboxId;
    this.logger.info(`Sandbox created: ${sandboxId}`);
  }

  protected async closeSession(): Promise<void> {
    const response = await this.http.delete<unknown>(this.sandboxPath(""));
    if (response.status >= 400 && response.status !== 404) {
      throw new Error(`Failed to delete sandbox ${this.id}: ${describeFailure(response)}`);
    }
    this.logger.info(`Sandbox closed: ${this.id}`);
  }

  async executeBash(command: string, timeoutMs?: number): Promise<ExecutionResult> {
    this.requireConnected("executeBash");
    const started = Date.now();
    const response = await this.http.post<unknown>(
      this.sandboxPath("/commands"),
      { command, timeout_ms: timeoutMs },
      timeoutMs ? { timeout: timeoutMs + 5_000 } : undefined
    );
    if (response.status >= 400) {
      return this.httpFailure(response, started);
    }

    const exitCode = readNumber(response.data, "exit_code") ?? -1;
    const stderr = readString(response.data, "stderr") ?? "";
    const success = exitCode === 0;
    return createExecutionResult({
      success,
      output: readString(response.data, "stdout") ?? "",
      error: success ? undefined : stderr.trim() || `Command exited with code ${exitCode}`,
      exit_code: exitCode,
      execution_time_ms: Date.now() - started,
      sandbox_id: this.id,
    });
  }

  async readFile(filePath: string): Promise<ExecutionResult> {
    this.requireConnected("readFile");
    const started = Date.now();
    const response = await this.http.get<unknown>(this.sandboxPath("/files"), { params: { path: filePath } });
    if (response.status >= 400) {
      return this.httpFailure(response, started);
    }
    return createExecutionResult({
      success: true,
      output: readString(response.data, "content") ?? "",
      execution_time_ms: Date.now() - started,
      sandbox_id: this.id,
    });
  }

  async writeFile(filePath: string, content: string): Promise<ExecutionResult> {
    this.requireConnected("writeFile");
    const started = Date.now();
    const response = await this.http.put<unknown>(this.sandboxPath("/files"), { path: filePath, content });
    if (response.status >= 400) {
      return this.httpFailure(response, started);
    }
    const writtenPath = readString(response.data, "path") ?? filePath;
    const created = isPlainObject(response.data) && response.data.created === true;
    return createExecutionResult({
      success: true,
      output: `Wrote ${Buffer.byteLength(content, "utf-8")} bytes to ${writtenPath}`,
      execution_time_ms: Date.now() - started,
      sandbox_id: this.id,
      files_created: created ? [writtenPath] : [],
      files_modified: created ? [] : [writtenPath],
    });
  }

  async listFiles(dirPath: string, pattern?: string): Promise<ExecutionResult> {
    this.requireConnected("listFiles");
    const started = Date.now();
    const response = await this.http.get<unknown>(this.sandboxPath("/files/list"), {
      params: { path: dirPath, ...(pattern ? { pattern } : {}) },
    });
    if (response.status >= 400) {
      return this.httpFailure(response, started);
    }
    const files = isPlainObject(response.data) && Array.isArray(response.data.files) ? response.data.files : [];
    return createExecutionResult({
      success: true,
      output: files.filter((file): file is string => typeof file === "string").join("\n"),
      execution_time_ms: Date.now() - started,
      sandbox_id: this.id,
    });
  }

  async searchFiles(pattern: string, dirPath: string, filePattern?: string): Promise<ExecutionResult> {
    this.requireConnected("searchFiles");
    const started = Date.now();
    const response = await this.http.post<unknown>(this.sandboxPath("/search"), {
      pattern,
      path: dirPath,
      ...(filePattern ? { file_pattern: filePattern } : {}),
    });
    if (response.status >= 400) {
      return this.httpFailure(response, started);
    }
    const matches = isPlainObject(response.data) && Array.isArray(response.data.matches) ? response.data.matches : [];
    const lines = matches
      .filter(isPlainObject)
      .map((match) => `${String(match.path)}:${String(match.line)}:${String(match.text)}`);
    return createExecutionResult({
      success: true,
      output: lines.join("\n"),
      execution_time_ms: Date.now() - started,
      sandbox_id: this.id,
    });
  }

  private sandboxPath(suffix: string): string {
    return `/sandboxes/${encodeURIComponent(this.id)}${suffix}`;
  }

  private httpFailure(response: AxiosResponse<unknown>, started: number): ExecutionResult {
    return createExecutionResult({
      success: false,
      error: describeFailure(response),
      exit_code: -1,
      execution_time_ms: Date.now() - started,
      sandbox_id: this.id,
    });
  }
}

function describeFailure(response: AxiosResponse<unknown>): string {
  const detail = readString(response.data, "error") ?? readString(response.data, "message");
  return detail ? `HTTP ${response.status}: ${detail}` : `HTTP ${response.status}`;
}

function readString(data: unknown, key: string): string | undefined {
  if (!isPlainObject(data)) return undefined;
  const value = data[key];
  return typeof value === "string" ? value : undefined;
}

function readNumber(data: unknown, key: string): number | undefined {
  if (!isPlainObject(data)) return undefined;
  const value = data[key];
  return typeof value === "number" ? value : undefined;
}

