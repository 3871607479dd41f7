import { createSandboxConfig, SandboxConfigInput } from "../config";
import { Logger, silentLogger } from "../logger";
import { SecurityManager, SecurityManagerOptions } from "../security-manager";
import { createToolCall } from "../tools";

function makeManager(
  security: SandboxConfigInput["security"] = {},
  options: SecurityManagerOptions = {}
): SecurityManager {
  const config = createSandboxConfig({ security });
  return new SecurityManager(config.security, {
    workingDirectory: config.working_directory,
    homeDirectory: config.home_directory,
    logger: silentLogger,
    ...options,
  });
}

describe("SecurityManager", () => {
  test("1. safe Bash command is allowed with no violation", () => {
    const manager = makeManager();
    expect(manager.validate(createToolCall("Bash", { command: "ls -la" }))).toEqual({ allowed: true });
    expect(manager.getViolations()).toEqual([]);
  });

  test("2. dangerous command is denied with every blocking description", () => {
    const manager = makeManager();
    const verdict = manager.validate(createToolCall("Bash", { command: "rm -rf /" }));
    expect(verdict).toEqual({
      allowed: false,
      reason: "Command matches blacklist pattern: rm\\s+-rf\\s+/ (high); Root directory deletion (critical)",
    });

    const [violation] = manager.getViolations();
    expect(violation.category).toBe("unsafe_command");
    expect(violation.severity).toBe("high");
    expect(violation.blocked).toBe(true);
    expect(violation.tool_name).toBe("Bash");
    expect(violation.tool_args).toEqual({ command: "rm -rf /" });
  });

  test("3. blocked tool is denied with high severity", () => {
    const manager = makeManager({ blocked_tools: ["WebFetch"] });
    expect(manager.validate(createToolCall("WebFetch", { url: "https://example.test" }))).toEqual({
      allowed: false,
      reason: "Tool WebFetch is blocked",
    });
    expect(manager.getViolations()[0].severity).toBe("high");
    expect(manager.getViolations()[0].category).toBe("tool_blocked");
  });

  test("4. allow-list is enforced only when non-empty", () => {
    const restricted = makeManager({ allowed_tools: ["Read"] });
    expect(restricted.validate(createToolCall("Bash", { command: "ls" }))).toEqual({
      allowed: false,
      reason: "Tool Bash is not in the allowed tools list",
    });
    expect(restricted.getViolations()[0].severity).toBe("medium");
    expect(restricted.validate(createToolCall("Read", { path: "notes.txt" }))).toEqual({ allowed: true });

    const open = makeManager({ allowed_tools: [] });
    expect(open.validate(createToolCall("Bash", { command: "ls" })).allowed).toBe(true);
  });

  test("5. block-list wins over allow-list", () => {
    const manager = makeManager({ allowed_tools: ["Bash"], blocked_tools: ["Bash"] });
    expect(manager.validate(createToolCall("Bash", { command: "ls" })).reason).toBe("Tool Bash is blocked");
  });

  test("6. write to system and sensitive paths is denied as high", () => {
    const manager = makeManager();
    expect(manager.validate(createToolCall("Write", { path: "/etc/hosts", content: "x" }))).toEqual({
      allowed: false,
      reason: "Write access to system path denied: /etc",
    });
    expect(manager.validate(createToolCall("Edit", { file_path: "/etc/passwd" }))).toEqual({
      allowed: false,
      reason: "Write access to sensitive path denied: /etc/passwd",
    });
    expect(manager.getViolations().map((v) => [v.category, v.severity])).toEqual([
      ["invalid_path", "high"],
      ["invalid_path", "high"],
    ]);
  });

  test("7. read of a sensitive path is denied as medium", () => {
    const manager = makeManager();
    expect(manager.validate(createToolCall("Read", { file_path: "/etc/shadow" }))).toEqual({
      allowed: false,
      reason: "Read access to sensitive path denied: /etc/shadow",
    });
    expect(manager.getViolations()[0].severity).toBe("medium");
    expect(manager.validate(createToolCall("Read", { path: "/etc/hosts" }))).toEqual({ allowed: true });
  });

  test("8. NotebookEdit, Glob and Grep paths are checked", () => {
    const manager = makeManager();
    expect(manager.validate(createToolCall("NotebookEdit", { notebook_path: "/usr/share/nb.ipynb" })).reason).toBe(
      "Write access to system path denied: /usr"
    );
    expect(manager.validate(createToolCall("Grep", { pattern: "key", path: "~/.aws" })).reason).toBe(
      "Read access to sensitive path denied: /home/user/.aws"
    );
    expect(manager.validate(createToolCall("Glob", { pattern: "**/*.ts" }))).toEqual({ allowed: true });
  });

  test("9. unknown tools pass policy checks", () => {
    const manager = makeManager();
    expect(manager.validate(createToolCall("CustomTool", { anything: 1 }))).toEqual({ allowed: true });
  });

  test("10. rate limit is checked first and keyed by caller", () => {
    const manager = makeManager({
      blocked_tools: ["WebFetch"],
      rate_limit: { max_requests: 2, window_seconds: 60 },
    });
    const call = createToolCall("Read", { path: "a.txt" });
    expect(manager.validate(call, "alice").allowed).toBe(true);
    expect(manager.validate(call, "alice").allowed).toBe(true);

    const blocked = manager.validate(createToolCall("WebFetch", {}), "alice");
    expect(blocked).toEqual({ allowed: false, reason: "Rate limit exceeded: 2 requests per 60s" });
    expect(manager.getViolations()[0].category).toBe("rate_limit");
    expect(manager.getViolations()[0].severity).toBe("medium");

    expect(manager.validate(call, "bob").allowed).toBe(true);
  });

  test("11. violation stats, filters and clear", () => {
    const manager = makeManager({ blocked_tools: ["WebSearch"] });
    manager.validate(createToolCall("WebSearch", { query: "x" }));
    manager.validate(createToolCall("Read", { path: "/etc/shadow" }));
    manager.validate(createToolCall("Write", { path: "/etc/motd" }));

    expect(manager.getStats()).toEqual({
      total_violations: 3,
      by_severity: { high: 2, medium: 1 },
      by_category: { tool_blocked: 1, invalid_path: 2 },
    });
    expect(manager.getViolations({ severity: "medium" })).toHaveLength(1);
    expect(manager.getViolations({ category: "invalid_path" })).toHaveLength(2);
    expect(manager.getViolations({ since: new Date(Date.now() + 60_000) })).toEqual([]);

    manager.clearViolations();
    expect(manager.getStats().total_violations).toBe(0);
  });

  test("12. exportViolations returns plain records", () => {
    const manager = makeManager({ blocked_tools: ["Task"] });
    manager.validate(createToolCall("Task", { prompt: "go" }));
    const [record] = manager.exportViolations();
    expect(record).toEqual({
      timestamp: expect.any(String),
      category: "tool_blocked",
      description: "Tool Task is blocked",
      severity: "high",
      tool_name: "Task",
      tool_args: { prompt: "go" },
      blocked: true,
    });
  });

  test("13. violation log is bounded with FIFO eviction", () => {
    const manager = makeManager({ blocked_tools: ["Task"] }, { maxViolations: 2 });
    manager.validate(createToolCall("Task", { n: 1 }));
    manager.validate(createToolCall("Task", { n: 2 }));
    manager.validate(createToolCall("Task", { n: 3 }));
    expect(manager.getViolations().map((v) => v.tool_args.n)).toEqual([2, 3]);
  });

  test("14. onViolation listener is called and its errors do not change the verdict", () => {
    const onViolation = jest.fn(() => {
      throw new Error("listener down");
    });
    const logger: Logger = { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() };
    const manager = makeManager({ blocked_tools: ["Task"] }, { onViolation, logger });

    expect(manager.validate(createToolCall("Task", {})).allowed).toBe(false);
    expect(onViolation).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledWith("Violation: tool_blocked - Tool Task is blocked", {
      tool_name: "Task",
      severity: "high",
    });
    expect(logger.error).toHaveBeenCalledWith("onViolation listener failed: listener down");
  });
});
