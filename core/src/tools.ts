import {
  KNOWN_TOOL_NAMES,
  KnownToolName,
  ToolArguments,
  ToolCall,
  ToolKind,
  ToolRiskClass,
} from "./schemas";

const KNOWN_TOOLS: ReadonlySet<string> = new Set<string>(KNOWN_TOOL_NAMES);

/**
 * Tool → risk class table. Anything missing here (including every unknown
 * tool name) is treated as high risk.
 */
const TOOL_RISK_CLASS: Readonly<Record<KnownToolName, ToolRiskClass>> = {
  Bash: "high",
  Write: "high",
  Edit: "high",
  Task: "high",
  NotebookEdit: "high",
  Read: "read_only",
  Glob: "read_only",
  Grep: "read_only",
  TaskOutput: "standard",
  WebFetch: "standard",
  WebSearch: "standard",
  TodoWrite: "standard",
  AskUserQuestion: "standard",
  Skill: "standard",
  SlashCommand: "standard",
  EnterPlanMode: "standard",
  ExitPlanMode: "standard",
  KillShell: "standard",
};

export function isKnownToolName(name: string): name is KnownToolName {
  return KNOWN_TOOLS.has(name);
}

export function resolveToolKind(name: string): ToolKind {
  return isKnownToolName(name) ? name : "unknown";
}

export function riskClassOfTool(name: string): ToolRiskClass {
  const kind = resolveToolKind(name);
  return kind === "unknown" ? "high" : TOOL_RISK_CLASS[kind];
}

export function riskClassOf(call: ToolCall): ToolRiskClass {
  return riskClassOfTool(call.tool_name);
}

/** Whether calls to this tool must be executed inside a sandbox. */
export function isSandboxRequired(name: string): boolean {
  return riskClassOfTool(name) === "high";
}

/**
 * Build an immutable ToolCall. Arguments are copied and frozen so later
 * mutation of the caller's object cannot change what was validated.
 */
export function createToolCall(
  toolName: string,
  args: Record<string, unknown> = {},
  toolUseId?: string
): ToolCall {
  const call: ToolCall = {
    tool_name: toolName,
    arguments: freezeArguments(args),
    ...(toolUseId ? { tool_use_id: toolUseId } : {}),
  };
  return Object.freeze(call);
}

// fromEntries defines own properties, so a "__proto__" key stays a key
function freezeArguments(args: Record<string, unknown>): ToolArguments {
  return Object.freeze(Object.fromEntries(Object.entries(args).map(([key, value]) => [key, freezeValue(value)])));
}

function freezeValue(value: unknown): unknown {
  if (Array.isArray(value)) {
    return Object.freeze(value.map(freezeValue));
  }
  if (isPlainObject(value)) {
    return freezeArguments(value);
  }
  return value;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== "object" || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

// ---------------------------------------------------------------------------
// Argument accessors
// ---------------------------------------------------------------------------

/**
 * Read the first string-valued argument among `keys`.
 * Returns `fallback` when none of them holds a string.
 */
export function stringArg(args: ToolArguments, keys: readonly string[], fallback = ""): string {
  for (const key of keys) {
    const value = args[key];
    if (typeof value === "string") return value;
  }
  return fallback;
}

export function optionalStringArg(args: ToolArguments, keys: readonly string[]): string | undefined {
  for (const key of keys) {
    const value = args[key];
    if (typeof value === "string" && value.length > 0) return value;
  }
  return undefined;
}

export function optionalNumberArg(args: ToolArguments, key: string): number | undefined {
  const value = args[key];
  return typeof value === "number" && Number.isFinite(value) && value > 0 ? value : undefined;
}

export const PATH_ARG_KEYS = ["path", "file_path"] as const;
