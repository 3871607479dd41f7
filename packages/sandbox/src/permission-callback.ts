import { createToolCall, UnsupportedToolError } from "@toolwarden/core";
import { CallContext, ToolProxy } from "./tool-proxy";

export interface PermissionAllow {
  behavior: "allow";
  /** Original input plus the sandboxed result, when the tool ran in a sandbox */
  updatedInput?: Record<string, unknown>;
}

export interface PermissionDeny {
  behavior: "deny";
  message: string;
  interrupt: boolean;
}

export type PermissionResult = PermissionAllow | PermissionDeny;

export type PermissionCallback = (toolName: string, input: Record<string, unknown>) => Promise<PermissionResult>;

export function allow(updatedInput?: Record<string, unknown>): PermissionAllow {
  return updatedInput ? { behavior: "allow", updatedInput } : { behavior: "allow" };
}

export function deny(message: string, interrupt = false): PermissionDeny {
  return { behavior: "deny", message, interrupt };
}

/**
 * Adapt a ToolProxy to the permission hook of an agent runtime.
 *
 * Tools outside the sandbox-required set are allowed untouched. The rest are
 * executed through the proxy, and on success their output is embedded in the
 * input under `_sandbox_result` / `_sandbox_executed`.
 */
export function createPermissionCallback(proxy: ToolProxy, context?: CallContext): PermissionCallback {
  return async (toolName, input) => {
    if (!proxy.shouldSandbox(toolName)) {
      return allow();
    }

    try {
      const result = await proxy.execute(createToolCall(toolName, input), context);
      if (!result.success) {
        return deny(`Sandbox execution failed: ${result.error ?? "Unknown error"}`);
      }
      return allow({ ...input, _sandbox_result: result.output, _sandbox_executed: true });
    } catch (err) {
      if (err instanceof UnsupportedToolError) {
        return deny(err.message);
      }
      throw err;
    }
  };
}
