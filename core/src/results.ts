import { ExecutionResult, ToolResultContent } from "./schemas";

export interface ExecutionResultInit {
  success: boolean;
  output?: string;
  error?: string | null;
  exit_code?: number;
  execution_time_ms?: number;
  sandbox_id?: string | null;
  files_created?: readonly string[];
  files_modified?: readonly string[];
  files_deleted?: readonly string[];
  timestamp?: string;
}

const UNKNOWN_ERROR = "Unknown error";

/**
 * Build a frozen ExecutionResult.
 *
 * A failed result always carries a non-empty error; when the producer gave
 * none, "Unknown error" is filled in.
 */
export function createExecutionResult(init: ExecutionResultInit): ExecutionResult {
  const error = init.error ? init.error : init.success ? undefined : UNKNOWN_ERROR;
  const result: ExecutionResult = {
    success: init.success,
    output: init.output ?? "",
    ...(error !== undefined ? { error } : {}),
    exit_code: init.exit_code ?? (init.success ? 0 : 1),
    execution_time_ms: Math.max(0, Math.round(init.execution_time_ms ?? 0)),
    ...(init.sandbox_id ? { sandbox_id: init.sandbox_id } : {}),
    files_created: Object.freeze([...(init.files_created ?? [])]),
    files_modified: Object.freeze([...(init.files_modified ?? [])]),
    files_deleted: Object.freeze([...(init.files_deleted ?? [])]),
    timestamp: init.timestamp ?? new Date().toISOString(),
  };
  return Object.freeze(result);
}

export function failedResult(
  error: string,
  extra: Omit<ExecutionResultInit, "success" | "error"> = {}
): ExecutionResult {
  return createExecutionResult({ exit_code: -1, ...extra, success: false, error });
}

/**
 * Result synthesized for a call rejected by policy. Never touches a backend.
 */
export function deniedResult(reason: string, executionTimeMs = 0): ExecutionResult {
  return failedResult(`Security validation failed: ${reason}`, {
    execution_time_ms: executionTimeMs,
  });
}

/**
 * Return a copy of `result` tagged with timing and backend metadata.
 */
export function withExecutionMeta(
  result: ExecutionResult,
  meta: { execution_time_ms?: number; sandbox_id?: string | null }
): ExecutionResult {
  return createExecutionResult({
    ...result,
    execution_time_ms: meta.execution_time_ms ?? result.execution_time_ms,
    sandbox_id: meta.sandbox_id ?? result.sandbox_id,
  });
}

export function toToolResult(result: ExecutionResult): ToolResultContent {
  if (result.success) {
    return { content: [{ type: "text", text: result.output }] };
  }
  return {
    content: [{ type: "text", text: `Error: ${result.error ?? UNKNOWN_ERROR}` }],
    isError: true,
  };
}
