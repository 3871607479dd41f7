/**
 * Error taxonomy.
 *
 * Policy denials and backend failures are reported as ExecutionResults and
 * never appear here. These classes cover startup failures and misuse of the
 * API, which are raised to the immediate caller.
 */

/**
 * Thrown when a configuration fails validation. Fatal at startup.
 */
export class ConfigurationError extends Error {
  constructor(public readonly errors: string[]) {
    super(`Invalid sandbox configuration: ${errors.join("; ")}`);
    this.name = "ConfigurationError";
  }
}

/**
 * Thrown when an executor method is called before `start()` or after `stop()`.
 */
export class ExecutorNotStartedError extends Error {
  constructor(operation: string) {
    super(`Sandbox executor is not started (call start() before ${operation})`);
    this.name = "ExecutorNotStartedError";
  }
}

/**
 * Thrown when a tool has no sandbox dispatch.
 */
export class UnsupportedToolError extends Error {
  constructor(public readonly toolName: string) {
    super(`Unsupported tool: ${toolName}`);
    this.name = "UnsupportedToolError";
  }
}

export class SandboxTimeoutError extends Error {
  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = "SandboxTimeoutError";
  }
}

export class SandboxPoolClosedError extends Error {
  constructor() {
    super("Sandbox pool is closed");
    this.name = "SandboxPoolClosedError";
  }
}

export class SandboxNotConnectedError extends Error {
  constructor(operation: string) {
    super(`Sandbox is not connected (${operation})`);
    this.name = "SandboxNotConnectedError";
  }
}

/**
 * Render an unknown thrown value as a message string.
 */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message || err.name;
  if (typeof err === "string") return err;
  return String(err);
}
