/**
 * Canonical Schemas
 *
 * These schemas are the contract shared by the policy engine, the audit
 * trail and the sandbox layer. Wire-facing records use snake_case so they
 * can be exported and shipped without renaming.
 */

// ---------------------------------------------------------------------------
// Tools
// ---------------------------------------------------------------------------

export const KNOWN_TOOL_NAMES = [
  // file operations
  "Read",
  "Write",
  "Edit",
  // command execution
  "Bash",
  // search
  "Glob",
  "Grep",
  // task management
  "Task",
  "TaskOutput",
  // misc
  "WebFetch",
  "WebSearch",
  "NotebookEdit",
  "TodoWrite",
  "AskUserQuestion",
  "Skill",
  "SlashCommand",
  "EnterPlanMode",
  "ExitPlanMode",
  "KillShell",
] as const;

export type KnownToolName = (typeof KNOWN_TOOL_NAMES)[number];

/** A known tool, or "unknown" for any name outside the closed set. */
export type ToolKind = KnownToolName | "unknown";

export type ToolRiskClass = "high" | "read_only" | "standard";

export type ToolArguments = Readonly<Record<string, unknown>>;

export interface ToolCall {
  readonly tool_name: string;
  readonly arguments: ToolArguments;
  readonly tool_use_id?: string;
}

// ---------------------------------------------------------------------------
// Execution Result
// ---------------------------------------------------------------------------

export interface ExecutionResult {
  readonly success: boolean;
  readonly output: string;
  readonly error?: string;
  readonly exit_code: number;
  readonly execution_time_ms: number;
  readonly sandbox_id?: string;
  readonly files_created: readonly string[];
  readonly files_modified: readonly string[];
  readonly files_deleted: readonly string[];
  readonly timestamp: string; // ISO-8601
}

/** Result shape consumed by agent runtimes that speak MCP-style tool results. */
export interface ToolResultContent {
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
}

// ---------------------------------------------------------------------------
// Risk Findings
// ---------------------------------------------------------------------------

export type RiskSeverity = "low" | "medium" | "high" | "critical";

export type CommandRiskCategory =
  | "filesystem_destruction"
  | "system_destruction"
  | "privilege_escalation"
  | "remote_code_execution"
  | "network_attack"
  | "information_disclosure"
  | "resource_exhaustion";

export type RiskCategory =
  | CommandRiskCategory
  | "blacklist_match"
  | "whitelist_violation"
  | "rate_limit"
  | "tool_blocked"
  | "tool_not_allowed"
  | "unsafe_command"
  | "invalid_path";

export interface RiskFinding {
  readonly finding_id: string; // uuid
  readonly timestamp: string; // ISO-8601
  readonly category: RiskCategory;
  readonly description: string;
  readonly severity: RiskSeverity;
  readonly tool_name: string;
  readonly tool_args: ToolArguments;
  readonly blocked: boolean;
}

// ---------------------------------------------------------------------------
// Audit
// ---------------------------------------------------------------------------

export interface AuditResultSummary {
  readonly success: boolean;
  readonly output: string; // truncated
  readonly error: string | null;
  readonly exit_code: number;
  readonly execution_time_ms: number;
}

export interface AuditEntry {
  readonly entry_id: string; // uuid
  readonly timestamp: string; // ISO-8601
  readonly tool_name: string;
  readonly tool_args: ToolArguments;
  readonly result: AuditResultSummary;
  readonly sandbox_id: string | null;
  readonly user_id: string | null;
  readonly session_id: string | null;
}

/** Flat, order-preserving export shape for log shipping. */
export interface AuditRecord {
  timestamp: string;
  tool_name: string;
  tool_input: ToolArguments;
  success: boolean;
  output: string | null;
  error: string | null;
  exit_code: number;
  execution_time_ms: number;
  sandbox_id: string | null;
  user_id: string | null;
  session_id: string | null;
}

// ---------------------------------------------------------------------------
// Verdicts
// ---------------------------------------------------------------------------

export interface SafetyVerdict {
  safe: boolean;
  reason?: string;
}

export interface PathVerdict {
  valid: boolean;
  reason?: string;
}

export interface RateLimitVerdict {
  allowed: boolean;
  reason?: string;
}

export interface ValidationVerdict {
  allowed: boolean;
  reason?: string;
}

// ---------------------------------------------------------------------------
// Sandbox handles
// ---------------------------------------------------------------------------

export type ConnectionState = "disconnected" | "connected" | "closing";
