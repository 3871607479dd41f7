import { CommandAnalyzer } from "./command-analyzer";
import { SecurityPolicy } from "./config";
import { errorMessage } from "./errors";
import { createFinding } from "./findings";
import { createConsoleLogger, Logger } from "./logger";
import { PathValidator } from "./path-validator";
import { DEFAULT_RATE_LIMIT_KEY, RateLimiter } from "./rate-limiter";
import {
  RiskCategory,
  RiskFinding,
  RiskSeverity,
  ToolArguments,
  ToolCall,
  ValidationVerdict,
} from "./schemas";
import { optionalStringArg, PATH_ARG_KEYS, stringArg } from "./tools";

/** Default max violation log size (entries). */
const DEFAULT_MAX_VIOLATIONS = 10_000;

export type SecurityManagerPolicy = Pick<
  SecurityPolicy,
  "allowed_tools" | "blocked_tools" | "command_blacklist" | "command_whitelist" | "allow_root"
> &
  Partial<Pick<SecurityPolicy, "sensitive_paths" | "read_only_paths" | "rate_limit">>;

export interface SecurityManagerOptions {
  workingDirectory?: string;
  homeDirectory?: string;
  logger?: Logger;
  /** Called for every recorded violation */
  onViolation?: (violation: RiskFinding) => void;
  /**
   * Maximum number of violations kept in memory; oldest are evicted first.
   * Set to 0 for unlimited.
   */
  maxViolations?: number;
}

export interface ViolationFilter {
  since?: Date;
  until?: Date;
  severity?: RiskSeverity;
  category?: RiskCategory;
}

export interface ViolationStats {
  total_violations: number;
  by_severity: Partial<Record<RiskSeverity, number>>;
  by_category: Partial<Record<RiskCategory, number>>;
}

interface CheckFailure {
  category: RiskCategory;
  severity: RiskSeverity;
  reason: string;
}

/**
 * SecurityManager - one verdict per tool call.
 *
 * Checks run cheapest first and the first failure wins:
 *   1. Rate limit (per caller)
 *   2. Tool block-list
 *   3. Tool allow-list (only when non-empty)
 *   4. Tool-specific check: command analysis for Bash, path checks for
 *      file tools
 *
 * Every failure is recorded as a RiskFinding in a bounded violation log.
 */
export class SecurityManager {
  readonly commandAnalyzer: CommandAnalyzer;
  readonly pathValidator: PathValidator;
  readonly rateLimiter: RateLimiter;

  private readonly allowedTools: ReadonlySet<string>;
  private readonly blockedTools: ReadonlySet<string>;
  private readonly logger: Logger;
  private readonly onViolation?: (violation: RiskFinding) => void;
  private readonly maxViolations: number;
  private violations: RiskFinding[] = [];

  constructor(policy: SecurityManagerPolicy, options: SecurityManagerOptions = {}) {
    this.commandAnalyzer = new CommandAnalyzer({
      blacklist: policy.command_blacklist,
      whitelist: policy.command_whitelist,
      allowRoot: policy.allow_root,
    });
    this.pathValidator = new PathValidator({
      workingDirectory: options.workingDirectory,
      homeDirectory: options.homeDirectory,
      sensitivePaths: policy.sensitive_paths,
      readOnlyPaths: policy.read_only_paths,
    });
    this.rateLimiter = new RateLimiter({
      maxRequests: policy.rate_limit?.max_requests,
      windowMs: policy.rate_limit ? policy.rate_limit.window_seconds * 1000 : undefined,
    });
    this.allowedTools = new Set(policy.allowed_tools);
    this.blockedTools = new Set(policy.blocked_tools);
    this.logger = options.logger ?? createConsoleLogger("SecurityManager");
    this.onViolation = options.onViolation;
    this.maxViolations = options.maxViolations ?? DEFAULT_MAX_VIOLATIONS;
  }

  validate(call: ToolCall, callerId: string = DEFAULT_RATE_LIMIT_KEY): ValidationVerdict {
    const failure = this.evaluate(call, callerId);
    if (!failure) {
      return { allowed: true };
    }
    this.recordViolation(failure, call.tool_name, call.arguments);
    return { allowed: false, reason: failure.reason };
  }

  // -----------------------------------------------------------------------
  // Violations
  // -----------------------------------------------------------------------

  getViolations(filter: ViolationFilter = {}): RiskFinding[] {
    return this.violations.filter((violation) => {
      const at = Date.parse(violation.timestamp);
      if (filter.since && at < filter.since.getTime()) return false;
      if (filter.until && at > filter.until.getTime()) return false;
      if (filter.severity && violation.severity !== filter.severity) return false;
      if (filter.category && violation.category !== filter.category) return false;
      return true;
    });
  }

  /**
   * Plain JSON-ready copies of every violation, oldest first.
   */
  exportViolations(): Array<Record<string, unknown>> {
    return this.violations.map((violation) => ({
      timestamp: violation.timestamp,
      category: violation.category,
      description: violation.description,
      severity: violation.severity,
      tool_name: violation.tool_name,
      tool_args: { ...violation.tool_args },
      blocked: violation.blocked,
    }));
  }

  getStats(): ViolationStats {
    const stats: ViolationStats = {
      total_violations: this.violations.length,
      by_severity: {},
      by_category: {},
    };
    for (const violation of this.violations) {
      stats.by_severity[violation.severity] = (stats.by_severity[violation.severity] ?? 0) + 1;
      stats.by_category[violation.category] = (stats.by_category[violation.category] ?? 0) + 1;
    }
    return stats;
  }

  clearViolations(): void {
    this.violations = [];
  }

  // -----------------------------------------------------------------------
  // Internals
  // -----------------------------------------------------------------------

  private evaluate(call: ToolCall, callerId: string): CheckFailure | null {
    const rate = this.rateLimiter.check(callerId);
    if (!rate.allowed) {
      return { category: "rate_limit", severity: "medium", reason: rate.reason ?? "Rate limit exceeded" };
    }

    const toolName = call.tool_name;
    if (this.blockedTools.has(toolName)) {
      return { category: "tool_blocked", severity: "high", reason: `Tool ${toolName} is blocked` };
    }

    if (this.allowedTools.size > 0 && !this.allowedTools.has(toolName)) {
      return {
        category: "tool_not_allowed",
        severity: "medium",
        reason: `Tool ${toolName} is not in the allowed tools list`,
      };
    }

    return this.checkTool(toolName, call.arguments);
  }

  private checkTool(toolName: string, args: ToolArguments): CheckFailure | null {
    switch (toolName) {
      case "Bash": {
        const verdict = this.commandAnalyzer.isSafe(stringArg(args, ["command"]));
        return verdict.safe
          ? null
          : { category: "unsafe_command", severity: "high", reason: verdict.reason ?? "Unsafe command" };
      }
      case "Read":
        return this.checkRead(stringArg(args, PATH_ARG_KEYS));
      case "Write":
      case "Edit":
        return this.checkWrite(stringArg(args, PATH_ARG_KEYS));
      case "NotebookEdit":
        return this.checkWrite(stringArg(args, ["notebook_path", ...PATH_ARG_KEYS]));
      case "Glob":
      case "Grep": {
        const searchPath = optionalStringArg(args, ["path"]);
        return searchPath === undefined ? null : this.checkRead(searchPath);
      }
      default:
        return null;
    }
  }

  private checkRead(filePath: string): CheckFailure | null {
    const verdict = this.pathValidator.validateRead(filePath);
    return verdict.valid
      ? null
      : { category: "invalid_path", severity: "medium", reason: verdict.reason ?? "Invalid path" };
  }

  private checkWrite(filePath: string): CheckFailure | null {
    const verdict = this.pathValidator.validateWrite(filePath);
    return verdict.valid
      ? null
      : { category: "invalid_path", severity: "high", reason: verdict.reason ?? "Invalid path" };
  }

  /**
   * Record a violation. Enforces max log size (FIFO eviction).
   */
  private recordViolation(failure: CheckFailure, toolName: string, toolArgs: ToolArguments): void {
    const violation = createFinding({
      category: failure.category,
      description: failure.reason,
      severity: failure.severity,
      toolName,
      toolArgs,
      blocked: true,
    });

    this.violations.push(violation);
    if (this.maxViolations > 0 && this.violations.length > this.maxViolations) {
      this.violations.splice(0, this.violations.length - this.maxViolations);
    }

    this.logger.warn(`Violation: ${violation.category} - ${violation.description}`, {
      tool_name: toolName,
      severity: violation.severity,
    });

    if (this.onViolation) {
      try {
        this.onViolation(violation);
      } catch (err) {
        this.logger.error(`onViolation listener failed: ${errorMessage(err)}`);
      }
    }
  }
}
