import * as path from "path";
import { ConfigurationError } from "./errors";
import { DEFAULT_READ_ONLY_PATHS, DEFAULT_SENSITIVE_PATHS } from "./path-validator";
import { checkRegexPattern } from "./regex";

// ---------------------------------------------------------------------------
// Configuration schema
// ---------------------------------------------------------------------------

export type SandboxType = "local" | "remote";

export const SANDBOX_TYPES: readonly SandboxType[] = ["local", "remote"];

export interface RemoteSandboxSettings {
  /** Base URL of the sandbox service, e.g. https://sandbox.internal/api */
  base_url: string;
  api_key?: string;
  /** Template / image the service should boot */
  template: string;
}

export interface ResourceLimits {
  cpu_cores: number;
  memory_mb: number;
  disk_mb: number;
  /** Default per-operation timeout */
  timeout_seconds: number;
  max_processes: number;
}

export interface NetworkPolicy {
  enabled: boolean;
  allowed_domains: string[];
  allow_external_api: boolean;
}

export interface RateLimitSettings {
  max_requests: number;
  window_seconds: number;
}

export interface SecurityPolicy {
  /** Tools allowed to run (empty = all) */
  allowed_tools: string[];
  blocked_tools: string[];
  /** Regex patterns, matched case-insensitively */
  command_blacklist: string[];
  /** Command prefixes; null disables whitelisting */
  command_whitelist: string[] | null;
  enable_audit_log: boolean;
  allow_root: boolean;
  sensitive_paths: string[];
  read_only_paths: string[];
  rate_limit: RateLimitSettings;
}

export interface PoolSettings {
  enabled: boolean;
  max_size: number;
  idle_timeout_seconds: number;
}

export interface SandboxConfig {
  sandbox_type: SandboxType;
  remote?: RemoteSandboxSettings;
  resource_limits: ResourceLimits;
  network: NetworkPolicy;
  security: SecurityPolicy;
  pool: PoolSettings;
  session_timeout_minutes: number;
  /** Dispose of a sandbox after each call instead of reusing it */
  auto_cleanup: boolean;
  persist_files: boolean;
  working_directory: string;
  home_directory: string;
  debug: boolean;
}

export type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends Array<infer U>
    ? U[]
    : T[K] extends object | undefined
      ? DeepPartial<NonNullable<T[K]>>
      : T[K];
};

export type SandboxConfigInput = DeepPartial<SandboxConfig>;

/** A configuration snapshot, frozen at every level at runtime. */
export type ResolvedSandboxConfig = Readonly<SandboxConfig>;

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export const DEFAULT_COMMAND_BLACKLIST: readonly string[] = [
  "rm\\s+-rf\\s+/", // root deletion
  ":\\(\\)\\s*\\{\\s*:\\|:&\\s*\\};\\s*:", // fork bomb
  "dd\\s+if=/dev/zero", // disk fill
  "mkfs\\.", // format
  "chmod\\s+-R\\s+777\\s+/",
  "curl.*\\|\\s*(ba)?sh", // remote script execution
  "wget.*\\|\\s*(ba)?sh",
];

function defaultConfig(): SandboxConfig {
  return {
    sandbox_type: "local",
    resource_limits: {
      cpu_cores: 2,
      memory_mb: 512,
      disk_mb: 1024,
      timeout_seconds: 60,
      max_processes: 50,
    },
    network: {
      enabled: false,
      allowed_domains: [],
      allow_external_api: false,
    },
    security: {
      allowed_tools: [],
      blocked_tools: [],
      command_blacklist: [...DEFAULT_COMMAND_BLACKLIST],
      command_whitelist: null,
      enable_audit_log: true,
      allow_root: false,
      sensitive_paths: [...DEFAULT_SENSITIVE_PATHS],
      read_only_paths: [...DEFAULT_READ_ONLY_PATHS],
      rate_limit: { max_requests: 100, window_seconds: 60 },
    },
    pool: {
      enabled: false,
      max_size: 5,
      idle_timeout_seconds: 300,
    },
    session_timeout_minutes: 60,
    auto_cleanup: true,
    persist_files: false,
    working_directory: "/workspace",
    home_directory: "/home/user",
    debug: false,
  };
}

/**
 * Build a frozen configuration snapshot from overrides on top of the defaults.
 * Does not validate; see `validateSandboxConfig`.
 */
export function createSandboxConfig(overrides: SandboxConfigInput = {}): ResolvedSandboxConfig {
  const base = defaultConfig();
  const security = overrides.security ?? {};

  const merged: SandboxConfig = {
    ...mergeDefined(base, {
      sandbox_type: overrides.sandbox_type,
      session_timeout_minutes: overrides.session_timeout_minutes,
      auto_cleanup: overrides.auto_cleanup,
      persist_files: overrides.persist_files,
      working_directory: overrides.working_directory,
      home_directory: overrides.home_directory,
      debug: overrides.debug,
    }),
    resource_limits: mergeDefined(base.resource_limits, overrides.resource_limits ?? {}),
    network: mergeDefined(base.network, overrides.network ?? {}),
    security: {
      ...mergeDefined(base.security, {
        allowed_tools: security.allowed_tools,
        blocked_tools: security.blocked_tools,
        command_blacklist: security.command_blacklist,
        enable_audit_log: security.enable_audit_log,
        allow_root: security.allow_root,
        sensitive_paths: security.sensitive_paths,
        read_only_paths: security.read_only_paths,
      }),
      // null is meaningful here: it disables whitelisting
      command_whitelist:
        security.command_whitelist === undefined ? base.security.command_whitelist : security.command_whitelist,
      rate_limit: mergeDefined(base.security.rate_limit, security.rate_limit ?? {}),
    },
    pool: mergeDefined(base.pool, overrides.pool ?? {}),
  };

  if (overrides.remote) {
    merged.remote = {
      base_url: overrides.remote.base_url ?? "",
      template: overrides.remote.template ?? "base",
      ...(overrides.remote.api_key ? { api_key: overrides.remote.api_key } : {}),
    };
  }

  return deepFreeze(merged);
}

/**
 * Predefined configuration templates.
 */
export const SANDBOX_PRESETS: Readonly<Record<"minimal" | "standard" | "development", ResolvedSandboxConfig>> = {
  minimal: createSandboxConfig({
    resource_limits: { cpu_cores: 1, memory_mb: 256, timeout_seconds: 30 },
    network: { enabled: false },
  }),
  standard: createSandboxConfig({
    resource_limits: { cpu_cores: 2, memory_mb: 512, timeout_seconds: 60 },
    network: { enabled: false },
  }),
  development: createSandboxConfig({
    resource_limits: { cpu_cores: 4, memory_mb: 2048, timeout_seconds: 300 },
    network: { enabled: true, allowed_domains: ["pypi.org", "npmjs.com", "github.com"] },
    debug: true,
  }),
};

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

/**
 * Validate a configuration. Returns every problem found (empty when valid).
 */
export function validateSandboxConfig(config: ResolvedSandboxConfig): string[] {
  const errors: string[] = [];

  if (!SANDBOX_TYPES.includes(config.sandbox_type)) {
    errors.push(`sandbox_type must be one of: ${SANDBOX_TYPES.join(", ")}. Got: "${config.sandbox_type}"`);
  }

  if (config.sandbox_type === "remote") {
    if (!config.remote?.base_url) {
      errors.push("remote sandbox requires remote.base_url");
    } else if (!/^https?:\/\//i.test(config.remote.base_url)) {
      errors.push(`remote.base_url must be an http(s) URL. Got: "${config.remote.base_url}"`);
    }
  }

  const limits = config.resource_limits;
  if (!(limits.timeout_seconds >= 1)) {
    errors.push("resource_limits.timeout_seconds must be at least 1");
  }
  if (!(limits.memory_mb >= 128)) {
    errors.push("resource_limits.memory_mb must be at least 128");
  }
  if (!(limits.cpu_cores >= 1)) {
    errors.push("resource_limits.cpu_cores must be at least 1");
  }
  if (!(limits.max_processes >= 1)) {
    errors.push("resource_limits.max_processes must be at least 1");
  }

  if (!Number.isInteger(config.pool.max_size) || config.pool.max_size < 1) {
    errors.push("pool.max_size must be a positive integer");
  }
  if (!(config.pool.idle_timeout_seconds >= 0)) {
    errors.push("pool.idle_timeout_seconds must not be negative");
  }
  if (!(config.session_timeout_minutes >= 1)) {
    errors.push("session_timeout_minutes must be at least 1");
  }

  const rateLimit = config.security.rate_limit;
  if (!Number.isInteger(rateLimit.max_requests) || rateLimit.max_requests < 1) {
    errors.push("security.rate_limit.max_requests must be a positive integer");
  }
  if (!(rateLimit.window_seconds > 0)) {
    errors.push("security.rate_limit.window_seconds must be positive");
  }

  if (!path.posix.isAbsolute(config.working_directory)) {
    errors.push(`working_directory must be absolute. Got: "${config.working_directory}"`);
  }
  if (!path.posix.isAbsolute(config.home_directory)) {
    errors.push(`home_directory must be absolute. Got: "${config.home_directory}"`);
  }

  config.security.command_blacklist.forEach((pattern, index) => {
    const problem = checkRegexPattern(pattern);
    if (problem) {
      errors.push(`security.command_blacklist[${index}] "${pattern}": ${problem}`);
    }
  });

  return errors;
}

/**
 * Throw a ConfigurationError listing every problem, if any.
 */
export function assertValidSandboxConfig(config: ResolvedSandboxConfig): void {
  const errors = validateSandboxConfig(config);
  if (errors.length > 0) {
    throw new ConfigurationError(errors);
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function mergeDefined<T extends object>(base: T, overrides: Partial<T>): T {
  const out: T = { ...base };
  for (const key in overrides) {
    const value = overrides[key];
    if (value !== undefined) {
      out[key] = value;
    }
  }
  return out;
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object") {
    for (const item of Object.values(value)) {
      deepFreeze(item);
    }
    Object.freeze(value);
  }
  return value;
}
