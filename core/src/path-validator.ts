import * as path from "path";
import { PathVerdict } from "./schemas";

export const DEFAULT_SENSITIVE_PATHS: readonly string[] = [
  "/etc/passwd",
  "/etc/shadow",
  "/etc/sudoers",
  "/root",
  "~/.ssh",
  "~/.gnupg",
  "~/.aws",
  "~/.config",
];

export const DEFAULT_READ_ONLY_PATHS: readonly string[] = [
  "/etc",
  "/usr",
  "/bin",
  "/sbin",
  "/lib",
  "/lib64",
  "/boot",
  "/sys",
  "/proc",
  "/dev",
];

export interface PathValidatorOptions {
  /** Base for relative paths (default: /workspace) */
  workingDirectory?: string;
  /** Expansion target for a leading "~" (default: /home/user) */
  homeDirectory?: string;
  sensitivePaths?: readonly string[];
  readOnlyPaths?: readonly string[];
}

/**
 * PathValidator - checks sandbox filesystem paths against sensitive and
 * read-only path sets.
 *
 * Paths are POSIX paths inside the sandbox, so normalization never consults
 * the host filesystem. Both sets are canonicalized once at construction.
 */
export class PathValidator {
  readonly workingDirectory: string;
  readonly homeDirectory: string;
  private readonly sensitive: readonly string[];
  private readonly readOnly: readonly string[];

  constructor(options: PathValidatorOptions = {}) {
    this.workingDirectory = options.workingDirectory ?? "/workspace";
    this.homeDirectory = options.homeDirectory ?? "/home/user";
    this.sensitive = (options.sensitivePaths ?? DEFAULT_SENSITIVE_PATHS).map((p) => this.normalize(p));
    this.readOnly = (options.readOnlyPaths ?? DEFAULT_READ_ONLY_PATHS).map((p) => this.normalize(p));
  }

  validateRead(filePath: string): PathVerdict {
    const normalized = this.normalize(filePath);
    const sensitive = this.matchSensitive(normalized);
    if (sensitive) {
      return { valid: false, reason: `Read access to sensitive path denied: ${sensitive}` };
    }
    return { valid: true };
  }

  validateWrite(filePath: string): PathVerdict {
    const normalized = this.normalize(filePath);

    const sensitive = this.matchSensitive(normalized);
    if (sensitive) {
      return { valid: false, reason: `Write access to sensitive path denied: ${sensitive}` };
    }

    const readOnly = this.readOnly.find((p) => isSameOrNested(normalized, p));
    if (readOnly) {
      return { valid: false, reason: `Write access to system path denied: ${readOnly}` };
    }

    return { valid: true };
  }

  /**
   * Expand "~", resolve against the working directory and collapse "." / ".." segments.
   */
  normalize(filePath: string): string {
    let p = filePath.trim();
    if (p === "~") {
      p = this.homeDirectory;
    } else if (p.startsWith("~/")) {
      p = path.posix.join(this.homeDirectory, p.slice(2));
    }
    if (!p.startsWith("/")) {
      p = path.posix.join(this.workingDirectory, p);
    }
    const normalized = path.posix.normalize(p);
    return normalized.length > 1 && normalized.endsWith("/") ? normalized.slice(0, -1) : normalized;
  }

  // A sensitive member anywhere in the path counts, not only as a prefix.
  private matchSensitive(normalized: string): string | undefined {
    return this.sensitive.find((p) => normalized.includes(p));
  }
}

function isSameOrNested(candidate: string, base: string): boolean {
  if (base === "/") return true;
  return candidate === base || candidate.startsWith(base + "/");
}
