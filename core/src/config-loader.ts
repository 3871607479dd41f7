import * as fs from "fs";
import * as path from "path";
import {
  assertValidSandboxConfig,
  createSandboxConfig,
  ResolvedSandboxConfig,
  SANDBOX_TYPES,
  SandboxConfigInput,
  SandboxType,
} from "./config";
import { ConfigurationError, errorMessage } from "./errors";
import { isPlainObject } from "./tools";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const DEFAULT_MAX_FILE_SIZE_BYTES = 1 * 1024 * 1024; // 1 MB
const MAX_JSON_SIZE_BYTES = 1 * 1024 * 1024; // 1 MB
const MAX_OBJECT_DEPTH = 10;

type Obj = Record<string, unknown>;

/**
 * SandboxConfigLoader - loads and validates sandbox configuration from
 * multiple sources.
 *
 * Supports:
 *   - File path (sync, with path sanitization and size limits)
 *   - JSON string (sync)
 *   - Plain object (sync)
 *
 * Every source ends in the same pipeline: shape check, defaults, semantic
 * validation. Any failure throws ConfigurationError.
 */
export class SandboxConfigLoader {
  /**
   * Load configuration from a JSON file.
   *
   * @param options.allowedBasePath Restrict file loading to this directory (default: cwd)
   * @param options.maxSizeBytes Maximum allowed file size in bytes (default: 1 MB)
   */
  static loadFromFile(
    filePath: string,
    options?: { allowedBasePath?: string; maxSizeBytes?: number }
  ): ResolvedSandboxConfig {
    const sanitized = this.sanitizePath(
      filePath,
      options?.allowedBasePath,
      options?.maxSizeBytes ?? DEFAULT_MAX_FILE_SIZE_BYTES
    );
    const content = fs.readFileSync(sanitized, "utf-8");
    return this.loadFromString(content);
  }

  static loadFromString(json: string): ResolvedSandboxConfig {
    if (Buffer.byteLength(json, "utf-8") > MAX_JSON_SIZE_BYTES) {
      throw new ConfigurationError([`configuration JSON exceeds ${MAX_JSON_SIZE_BYTES} bytes`]);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(json);
    } catch (err) {
      throw new ConfigurationError([`configuration JSON parse error: ${errorMessage(err)}`]);
    }

    const depth = getObjectDepth(raw);
    if (depth > MAX_OBJECT_DEPTH) {
      throw new ConfigurationError([
        `configuration JSON exceeds maximum object depth of ${MAX_OBJECT_DEPTH} (actual depth: ${depth})`,
      ]);
    }

    return this.loadFromObject(raw);
  }

  static loadFromObject(raw: unknown): ResolvedSandboxConfig {
    const input = this.validateShape(raw);
    const config = createSandboxConfig(input);
    assertValidSandboxConfig(config);
    return config;
  }

  // -----------------------------------------------------------------------
  // Shape validation
  // -----------------------------------------------------------------------

  /**
   * Runtime type checks that turn untrusted JSON into a config input.
   * Unknown keys are ignored; wrong types are reported all at once.
   */
  private static validateShape(raw: unknown): SandboxConfigInput {
    if (!isPlainObject(raw)) {
      throw new ConfigurationError(["configuration must be a JSON object"]);
    }

    const errors: string[] = [];
    const r = new FieldReader(errors);
    const input: SandboxConfigInput = {};

    const sandboxType = r.str(raw, "sandbox_type");
    if (sandboxType !== undefined) {
      if (isSandboxType(sandboxType)) {
        input.sandbox_type = sandboxType;
      } else {
        errors.push(`sandbox_type must be one of: ${SANDBOX_TYPES.join(", ")}. Got: "${sandboxType}"`);
      }
    }

    const remote = r.obj(raw, "remote");
    if (remote) {
      input.remote = {
        base_url: r.str(remote, "base_url", "remote"),
        api_key: r.str(remote, "api_key", "remote"),
        template: r.str(remote, "template", "remote"),
      };
    }

    const limits = r.obj(raw, "resource_limits");
    if (limits) {
      input.resource_limits = {
        cpu_cores: r.num(limits, "cpu_cores", "resource_limits"),
        memory_mb: r.num(limits, "memory_mb", "resource_limits"),
        disk_mb: r.num(limits, "disk_mb", "resource_limits"),
        timeout_seconds: r.num(limits, "timeout_seconds", "resource_limits"),
        max_processes: r.num(limits, "max_processes", "resource_limits"),
      };
    }

    const network = r.obj(raw, "network");
    if (network) {
      input.network = {
        enabled: r.bool(network, "enabled", "network"),
        allowed_domains: r.strList(network, "allowed_domains", "network"),
        allow_external_api: r.bool(network, "allow_external_api", "network"),
      };
    }

    const security = r.obj(raw, "security");
    if (security) {
      const rateLimit = r.obj(security, "rate_limit", "security");
      input.security = {
        allowed_tools: r.strList(security, "allowed_tools", "security"),
        blocked_tools: r.strList(security, "blocked_tools", "security"),
        command_blacklist: r.strList(security, "command_blacklist", "security"),
        enable_audit_log: r.bool(security, "enable_audit_log", "security"),
        allow_root: r.bool(security, "allow_root", "security"),
        sensitive_paths: r.strList(security, "sensitive_paths", "security"),
        read_only_paths: r.strList(security, "read_only_paths", "security"),
        ...(rateLimit
          ? {
              rate_limit: {
                max_requests: r.num(rateLimit, "max_requests", "security.rate_limit"),
                window_seconds: r.num(rateLimit, "window_seconds", "security.rate_limit"),
              },
            }
          : {}),
      };
      if (security.command_whitelist === null) {
        input.security.command_whitelist = null;
      } else {
        input.security.command_whitelist = r.strList(security, "command_whitelist", "security");
      }
    }

    const pool = r.obj(raw, "pool");
    if (pool) {
      input.pool = {
        enabled: r.bool(pool, "enabled", "pool"),
        max_size: r.num(pool, "max_size", "pool"),
        idle_timeout_seconds: r.num(pool, "idle_timeout_seconds", "pool"),
      };
    }

    input.session_timeout_minutes = r.num(raw, "session_timeout_minutes");
    input.auto_cleanup = r.bool(raw, "auto_cleanup");
    input.persist_files = r.bool(raw, "persist_files");
    input.working_directory = r.str(raw, "working_directory");
    input.home_directory = r.str(raw, "home_directory");
    input.debug = r.bool(raw, "debug");

    if (errors.length > 0) {
      throw new ConfigurationError(errors);
    }
    return input;
  }

  // -----------------------------------------------------------------------
  // Path sanitization
  // -----------------------------------------------------------------------

  /**
   * Resolve to an absolute path inside the allowed base directory, reject
   * symlinks, and check file size before reading.
   */
  private static sanitizePath(filePath: string, allowedBasePath: string | undefined, maxSizeBytes: number): string {
    const resolved = path.resolve(filePath);
    const base = allowedBasePath ? path.resolve(allowedBasePath) : path.resolve(".");

    if (!resolved.startsWith(base + path.sep) && resolved !== base) {
      throw new ConfigurationError([
        `configuration file path "${filePath}" resolves outside the allowed directory "${base}"`,
      ]);
    }

    let lstat: fs.Stats;
    try {
      lstat = fs.lstatSync(resolved);
    } catch (err) {
      if (isErrnoException(err) && err.code === "ENOENT") {
        throw new ConfigurationError([`configuration file not found: "${resolved}"`]);
      }
      throw err;
    }

    if (lstat.isSymbolicLink()) {
      throw new ConfigurationError([`configuration file "${resolved}" is a symbolic link`]);
    }
    if (!lstat.isFile()) {
      throw new ConfigurationError([`configuration path "${resolved}" is not a regular file`]);
    }
    if (lstat.size > maxSizeBytes) {
      throw new ConfigurationError([
        `configuration file "${resolved}" exceeds maximum allowed size of ${maxSizeBytes} bytes (actual: ${lstat.size} bytes)`,
      ]);
    }

    return resolved;
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Typed field accessors that record a message for every wrong type and
 * return undefined for missing or invalid fields.
 */
class FieldReader {
  constructor(private readonly errors: string[]) {}

  str(obj: Obj, key: string, prefix?: string): string | undefined {
    const value = obj[key];
    if (value === undefined) return undefined;
    if (typeof value === "string") return value;
    this.errors.push(`${label(prefix, key)} must be a string`);
    return undefined;
  }

  num(obj: Obj, key: string, prefix?: string): number | undefined {
    const value = obj[key];
    if (value === undefined) return undefined;
    if (typeof value === "number" && Number.isFinite(value)) return value;
    this.errors.push(`${label(prefix, key)} must be a number`);
    return undefined;
  }

  bool(obj: Obj, key: string, prefix?: string): boolean | undefined {
    const value = obj[key];
    if (value === undefined) return undefined;
    if (typeof value === "boolean") return value;
    this.errors.push(`${label(prefix, key)} must be a boolean`);
    return undefined;
  }

  strList(obj: Obj, key: string, prefix?: string): string[] | undefined {
    const value = obj[key];
    if (value === undefined) return undefined;
    if (Array.isArray(value) && value.every((item): item is string => typeof item === "string")) {
      return value;
    }
    this.errors.push(`${label(prefix, key)} must be a string[]`);
    return undefined;
  }

  obj(obj: Obj, key: string, prefix?: string): Obj | undefined {
    const value = obj[key];
    if (value === undefined) return undefined;
    if (isPlainObject(value)) return value;
    this.errors.push(`${label(prefix, key)} must be an object`);
    return undefined;
  }
}

function label(prefix: string | undefined, key: string): string {
  return prefix ? `${prefix}.${key}` : key;
}

function isSandboxType(value: string): value is SandboxType {
  return SANDBOX_TYPES.some((type) => type === value);
}

// fs errors can come from another realm, so no instanceof Error here
function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return typeof err === "object" && err !== null && "code" in err;
}

/**
 * Maximum nesting depth of a JSON value.
 */
function getObjectDepth(value: unknown, currentDepth = 0): number {
  if (currentDepth > MAX_OBJECT_DEPTH) {
    return currentDepth;
  }
  if (value === null || typeof value !== "object") {
    return currentDepth;
  }
  const children: unknown[] = Array.isArray(value) ? value : Object.values(value);
  if (children.length === 0) return currentDepth + 1;
  return Math.max(...children.map((child) => getObjectDepth(child, currentDepth + 1)));
}
