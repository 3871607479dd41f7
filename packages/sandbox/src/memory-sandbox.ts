import * as path from "path";
import { v4 as uuidv4 } from "uuid";
import { checkRegexPattern, createExecutionResult, ExecutionResult } from "@toolwarden/core";
import { BaseSandbox } from "./base-sandbox";

// ---------------------------------------------------------------------------
// Command runner
// ---------------------------------------------------------------------------

export interface CommandContext {
  /** Working directory of the sandbox */
  cwd: string;
  resolve(filePath: string): string;
  readFile(filePath: string): string | undefined;
  /** Names directly under a directory, sorted */
  listDirectory(dirPath: string): string[];
  timeoutMs?: number;
}

export interface CommandOutput {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export type CommandRunner = (command: string, context: CommandContext) => CommandOutput | Promise<CommandOutput>;

/**
 * Understands a handful of read-only builtins. Anything else exits 127, the
 * way a shell reports an unknown command.
 */
export const builtinCommandRunner: CommandRunner = (command, context) => {
  const [name = "", ...args] = command.trim().split(/\s+/).filter((token) => token.length > 0);

  switch (name) {
    case "":
    case "true":
      return { stdout: "", stderr: "", exitCode: 0 };
    case "false":
      return { stdout: "", stderr: "", exitCode: 1 };
    case "echo":
      return { stdout: `${args.map(unquote).join(" ")}\n`, stderr: "", exitCode: 0 };
    case "pwd":
      return { stdout: `${context.cwd}\n`, stderr: "", exitCode: 0 };
    case "cat": {
      let stdout = "";
      for (const file of args.map(unquote)) {
        const content = context.readFile(file);
        if (content === undefined) {
          return { stdout, stderr: `cat: ${file}: No such file or directory\n`, exitCode: 1 };
        }
        stdout += content;
      }
      return { stdout, stderr: "", exitCode: 0 };
    }
    case "ls": {
      const target = args.filter((arg) => !arg.startsWith("-")).map(unquote)[0] ?? ".";
      const entries = context.listDirectory(target);
      return { stdout: entries.length > 0 ? `${entries.join("\n")}\n` : "", stderr: "", exitCode: 0 };
    }
    default:
      return { stdout: "", stderr: `${name}: command not found\n`, exitCode: 127 };
  }
};

function unquote(token: string): string {
  return /^(['"]).*\1$/.test(token) ? token.slice(1, -1) : token;
}

// ---------------------------------------------------------------------------
// MemorySandbox
// ---------------------------------------------------------------------------

export interface MemorySandboxOptions {
  sandboxId?: string;
  /** Root for relative paths (default: /workspace) */
  workingDirectory?: string;
  /** Target of "~" (default: /home/user) */
  homeDirectory?: string;
  /** Keep files across disconnect (default: false) */
  persistFiles?: boolean;
  /** Initial files, keyed by path */
  files?: Record<string, string>;
  runner?: CommandRunner;
}

/**
 * MemorySandbox - local backend with an in-process virtual filesystem.
 *
 * It isolates nothing on the host: commands go to the configured
 * CommandRunner and files live in a Map. Useful for development, tests and
 * as the reference implementation of the backend contract.
 */
export class MemorySandbox extends BaseSandbox {
  readonly workingDirectory: string;
  readonly homeDirectory: string;
  private readonly persistFiles: boolean;
  private readonly runner: CommandRunner;
  private readonly files = new Map<string, string>();

  constructor(options: MemorySandboxOptions = {}) {
    super(options.sandboxId ?? `local-${uuidv4()}`);
    this.workingDirectory = options.workingDirectory ?? "/workspace";
    this.homeDirectory = options.homeDirectory ?? "/home/user";
    this.persistFiles = options.persistFiles ?? false;
    this.runner = options.runner ?? builtinCommandRunner;
    for (const [filePath, content] of Object.entries(options.files ?? {})) {
      this.files.set(this.resolve(filePath), content);
    }
  }

  protected async openSession(): Promise<void> {
    // nothing to open
  }

  protected async closeSession(): Promise<void> {
    if (!this.persistFiles) {
      this.files.clear();
    }
  }

  async executeBash(command: string, timeoutMs?: number): Promise<ExecutionResult> {
    this.requireConnected("executeBash");
    const started = Date.now();
    const { stdout, stderr, exitCode } = await this.runner(command, {
      cwd: this.workingDirectory,
      resolve: (filePath) => this.resolve(filePath),
      readFile: (filePath) => this.files.get(this.resolve(filePath)),
      listDirectory: (dirPath) => this.listDirectory(dirPath),
      timeoutMs,
    });

    const success = exitCode === 0;
    return createExecutionResult({
      success,
      output: stdout,
      error: success ? undefined : stderr.trim() || `Command exited with code ${exitCode}`,
      exit_code: exitCode,
      execution_time_ms: Date.now() - started,
      sandbox_id: this.id,
    });
  }

  async readFile(filePath: string): Promise<ExecutionResult> {
    this.requireConnected("readFile");
    const resolved = this.resolve(filePath);
    const content = this.files.get(resolved);
    if (content === undefined) {
      return createExecutionResult({
        success: false,
        error: `File not found: ${resolved}`,
        exit_code: 1,
        sandbox_id: this.id,
      });
    }
    return createExecutionResult({ success: true, output: content, sandbox_id: this.id });
  }

  async writeFile(filePath: string, content: string): Promise<ExecutionResult> {
    this.requireConnected("writeFile");
    const resolved = this.resolve(filePath);
    const existed = this.files.has(resolved);
    this.files.set(resolved, content);
    return createExecutionResult({
      success: true,
      output: `Wrote ${Buffer.byteLength(content, "utf-8")} bytes to ${resolved}`,
      sandbox_id: this.id,
      files_created: existed ? [] : [resolved],
      files_modified: existed ? [resolved] : [],
    });
  }

  async listFiles(dirPath: string, pattern?: string): Promise<ExecutionResult> {
    this.requireConnected("listFiles");
    const matcher = pattern ? globToRegExp(pattern) : undefined;
    const matches = this.filesUnder(dirPath)
      .filter(({ relative }) => !matcher || matcher.test(relative))
      .map(({ absolute }) => absolute);

    return createExecutionResult({ success: true, output: matches.join("\n"), sandbox_id: this.id });
  }

  async searchFiles(pattern: string, dirPath: string, filePattern?: string): Promise<ExecutionResult> {
    this.requireConnected("searchFiles");
    const problem = checkRegexPattern(pattern);
    if (problem) {
      return createExecutionResult({
        success: false,
        error: `Invalid search pattern: ${problem}`,
        exit_code: 2,
        sandbox_id: this.id,
      });
    }

    const regex = new RegExp(pattern);
    const fileMatcher = filePattern ? globToRegExp(filePattern) : undefined;
    const lines: string[] = [];

    for (const { absolute } of this.filesUnder(dirPath)) {
      if (fileMatcher && !fileMatcher.test(path.posix.basename(absolute))) continue;
      const content = this.files.get(absolute) ?? "";
      content.split("\n").forEach((line, index) => {
        if (regex.test(line)) {
          lines.push(`${absolute}:${index + 1}:${line}`);
        }
      });
    }

    return createExecutionResult({ success: true, output: lines.join("\n"), sandbox_id: this.id });
  }

  /** Absolute POSIX path inside the sandbox, with "~" expanded. */
  resolve(filePath: string): string {
    let p = filePath;
    if (p === "~") {
      p = this.homeDirectory;
    } else if (p.startsWith("~/")) {
      p = path.posix.join(this.homeDirectory, p.slice(2));
    }
    const absolute = path.posix.isAbsolute(p) ? p : path.posix.join(this.workingDirectory, p);
    const normalized = path.posix.normalize(absolute);
    return normalized.length > 1 && normalized.endsWith("/") ? normalized.slice(0, -1) : normalized;
  }

  private filesUnder(dirPath: string): Array<{ absolute: string; relative: string }> {
    const root = this.resolve(dirPath);
    const prefix = root === "/" ? "/" : `${root}/`;
    return [...this.files.keys()]
      .filter((absolute) => absolute.startsWith(prefix))
      .sort()
      .map((absolute) => ({ absolute, relative: absolute.slice(prefix.length) }));
  }

  private listDirectory(dirPath: string): string[] {
    const names = new Set<string>();
    for (const { relative } of this.filesUnder(dirPath)) {
      const [first] = relative.split("/");
      names.add(relative.includes("/") ? `${first}/` : first);
    }
    return [...names].sort();
  }
}

/**
 * Convert a glob to an anchored regex. `**` crosses directories, `*` and `?`
 * stay within one path segment.
 */
export function globToRegExp(glob: string): RegExp {
  let source = "";
  for (let i = 0; i < glob.length; i++) {
    const char = glob[i];
    if (char === "*" && glob[i + 1] === "*") {
      if (glob[i + 2] === "/") {
        source += "(?:.*/)?";
        i += 2;
      } else {
        source += ".*";
        i += 1;
      }
    } else if (char === "*") {
      source += "[^/]*";
    } else if (char === "?") {
      source += "[^/]";
    } else {
      source += char.replace(/[.+^${}()|[\]\\]/g, "\\$&");
    }
  }
  return new RegExp(`^${source}$`);
}
