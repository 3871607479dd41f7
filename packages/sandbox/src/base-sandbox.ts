import {
  ConnectionState,
  createExecutionResult,
  ExecutionResult,
  optionalNumberArg,
  optionalStringArg,
  PATH_ARG_KEYS,
  SandboxNotConnectedError,
  SandboxTimeoutError,
  stringArg,
  ToolCall,
  UnsupportedToolError,
} from "@toolwarden/core";

/**
 * Capability contract every execution backend satisfies.
 *
 * Backends report command and file failures as failed ExecutionResults.
 * They throw only when the backend itself cannot be reached or is not
 * connected; callers treat such a handle as broken.
 */
export interface SandboxBackend {
  readonly sandboxId: string;
  readonly state: ConnectionState;
  readonly isConnected: boolean;

  connect(): Promise<void>;
  disconnect(): Promise<void>;

  /** @param timeoutMs per-command limit forwarded to the backend */
  executeBash(command: string, timeoutMs?: number): Promise<ExecutionResult>;
  readFile(path: string): Promise<ExecutionResult>;
  writeFile(path: string, content: string): Promise<ExecutionResult>;
  listFiles(path: string, pattern?: string): Promise<ExecutionResult>;
  searchFiles(pattern: string, path: string, filePattern?: string): Promise<ExecutionResult>;

  /**
   * Dispatch a tool call to the matching operation.
   * Throws UnsupportedToolError for tools with no dispatch.
   */
  executeTool(call: ToolCall): Promise<ExecutionResult>;
}

export const DISPATCHABLE_TOOLS: readonly string[] = ["Bash", "Read", "Write", "Edit", "Glob", "Grep"];

const DISPATCHABLE: ReadonlySet<string> = new Set(DISPATCHABLE_TOOLS);

export function isDispatchableTool(toolName: string): boolean {
  return DISPATCHABLE.has(toolName);
}

/**
 * BaseSandbox - shared lifecycle and tool dispatch for backends.
 *
 * Subclasses provide the transport (`openSession` / `closeSession`) and the
 * five primitive operations; the Edit tool is composed from read and write.
 */
export abstract class BaseSandbox implements SandboxBackend {
  protected connectionState: ConnectionState = "disconnected";

  protected constructor(protected id: string) {}

  get sandboxId(): string {
    return this.id;
  }

  get state(): ConnectionState {
    return this.connectionState;
  }

  get isConnected(): boolean {
    return this.connectionState === "connected";
  }

  async connect(): Promise<void> {
    if (this.connectionState === "connected") return;
    await this.openSession();
    this.connectionState = "connected";
  }

  async disconnect(): Promise<void> {
    if (this.connectionState !== "connected") return;
    this.connectionState = "closing";
    try {
      await this.closeSession();
    } finally {
      this.connectionState = "disconnected";
    }
  }

  protected abstract openSession(): Promise<void>;
  protected abstract closeSession(): Promise<void>;

  abstract executeBash(command: string, timeoutMs?: number): Promise<ExecutionResult>;
  abstract readFile(path: string): Promise<ExecutionResult>;
  abstract writeFile(path: string, content: string): Promise<ExecutionResult>;
  abstract listFiles(path: string, pattern?: string): Promise<ExecutionResult>;
  abstract searchFiles(pattern: string, path: string, filePattern?: string): Promise<ExecutionResult>;

  async executeTool(call: ToolCall): Promise<ExecutionResult> {
    const args = call.arguments;
    switch (call.tool_name) {
      case "Bash":
        return this.executeBash(stringArg(args, ["command"]), optionalNumberArg(args, "timeout"));
      case "Read":
        return this.readFile(stringArg(args, PATH_ARG_KEYS));
      case "Write":
        return this.writeFile(stringArg(args, PATH_ARG_KEYS), stringArg(args, ["content", "file_content"]));
      case "Edit":
        return this.editFile(
          stringArg(args, PATH_ARG_KEYS),
          stringArg(args, ["old_string", "old_text"]),
          stringArg(args, ["new_string", "new_text"]),
          args.replace_all === true
        );
      case "Glob":
        return this.listFiles(stringArg(args, ["path"], "."), optionalStringArg(args, ["pattern"]));
      case "Grep":
        return this.searchFiles(
          stringArg(args, ["pattern"]),
          stringArg(args, ["path"], "."),
          optionalStringArg(args, ["include", "glob"])
        );
      default:
        throw new UnsupportedToolError(call.tool_name);
    }
  }

  /**
   * Replace `oldString` with `newString` in a file.
   *
   * The old text must occur exactly once unless `replaceAll` is set. An
   * empty `oldString` replaces the whole content, which also creates a
   * missing file.
   */
  async editFile(filePath: string, oldString: string, newString: string, replaceAll = false): Promise<ExecutionResult> {
    const started = Date.now();
    const current = await this.readFile(filePath);
    const existed = current.success;
    const content = existed ? current.output : "";

    let updated: string;
    let replacements: number;
    if (oldString.length === 0) {
      updated = newString;
      replacements = 1;
    } else {
      const occurrences = countOccurrences(content, oldString);
      if (occurrences === 0) {
        return this.editFailure(`old_string not found in ${filePath}`, started);
      }
      if (occurrences > 1 && !replaceAll) {
        return this.editFailure(`old_string is not unique in ${filePath} (${occurrences} occurrences)`, started);
      }
      if (replaceAll) {
        updated = content.split(oldString).join(newString);
        replacements = occurrences;
      } else {
        const index = content.indexOf(oldString);
        updated = content.slice(0, index) + newString + content.slice(index + oldString.length);
        replacements = 1;
      }
    }

    const written = await this.writeFile(filePath, updated);
    if (!written.success) {
      return written;
    }

    return createExecutionResult({
      success: true,
      output: `Edited ${filePath} (${replacements} replacement${replacements === 1 ? "" : "s"})`,
      execution_time_ms: Date.now() - started,
      sandbox_id: this.id,
      files_created: existed ? [] : written.files_created,
      files_modified: existed ? written.files_modified : [],
    });
  }

  protected requireConnected(operation: string): void {
    if (this.connectionState !== "connected") {
      throw new SandboxNotConnectedError(operation);
    }
  }

  private editFailure(error: string, started: number): ExecutionResult {
    return createExecutionResult({
      success: false,
      error,
      exit_code: 1,
      execution_time_ms: Date.now() - started,
      sandbox_id: this.id,
    });
  }
}

function countOccurrences(haystack: string, needle: string): number {
  let count = 0;
  let index = haystack.indexOf(needle);
  while (index !== -1) {
    count++;
    index = haystack.indexOf(needle, index + needle.length);
  }
  return count;
}

/**
 * Race a promise against a timeout, cleaning up the timer when the promise
 * settles. A non-positive or missing timeout disables the race.
 */
export function withTimeout<T>(promise: Promise<T>, timeoutMs: number | undefined, operation: string): Promise<T> {
  if (timeoutMs === undefined || !(timeoutMs > 0)) {
    return promise;
  }

  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new SandboxTimeoutError(operation, timeoutMs)), timeoutMs);
  });

  return Promise.race([promise, timeout]).finally(() => {
    clearTimeout(timer);
  });
}
