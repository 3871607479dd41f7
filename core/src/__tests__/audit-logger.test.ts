import { AuditLogger } from "../audit-logger";
import { Logger, silentLogger } from "../logger";
import { createExecutionResult, deniedResult } from "../results";

const OK = createExecutionResult({ success: true, output: "hello\n", execution_time_ms: 12, sandbox_id: "sbx-1" });

describe("AuditLogger", () => {
  test("1. log records a frozen entry with a result summary", () => {
    const audit = new AuditLogger({ logger: silentLogger });
    const entry = audit.log({
      tool_name: "Bash",
      tool_args: { command: "echo hello" },
      result: OK,
      user_id: "alice",
      session_id: "s-1",
    });

    expect(entry).toBeDefined();
    expect(Object.isFrozen(entry)).toBe(true);
    expect(entry?.result).toEqual({
      success: true,
      output: "hello\n",
      error: null,
      exit_code: 0,
      execution_time_ms: 12,
    });
    expect(entry?.sandbox_id).toBe("sbx-1");
    expect(entry?.user_id).toBe("alice");
    expect(entry?.session_id).toBe("s-1");
    expect(audit.size).toBe(1);
  });

  test("2. output is truncated to the configured limit", () => {
    const audit = new AuditLogger({ logger: silentLogger });
    const result = createExecutionResult({ success: true, output: "x".repeat(1500) });
    const entry = audit.log({ tool_name: "Read", tool_args: { path: "big.txt" }, result });
    expect(entry?.result.output).toHaveLength(1000);

    const short = new AuditLogger({ logger: silentLogger, outputLimit: 4 });
    expect(short.log({ tool_name: "Read", tool_args: {}, result })?.result.output).toBe("xxxx");
  });

  test("3. disabled logger records nothing", () => {
    const audit = new AuditLogger({ enabled: false, logger: silentLogger });
    expect(audit.log({ tool_name: "Bash", tool_args: {}, result: OK })).toBeUndefined();
    expect(audit.size).toBe(0);
  });

  test("4. export produces flat records in insertion order", () => {
    const audit = new AuditLogger({ logger: silentLogger });
    audit.log({ tool_name: "Bash", tool_args: { command: "echo hello" }, result: OK, session_id: "s-1" });
    audit.log({ tool_name: "Write", tool_args: { path: "/etc/x" }, result: deniedResult("nope") });

    const records = audit.export();
    expect(records.map((r) => r.tool_name)).toEqual(["Bash", "Write"]);
    expect(records[1]).toEqual({
      timestamp: expect.any(String),
      tool_name: "Write",
      tool_input: { path: "/etc/x" },
      success: false,
      output: null,
      error: "Security validation failed: nope",
      exit_code: -1,
      execution_time_ms: 0,
      sandbox_id: null,
      user_id: null,
      session_id: null,
    });
  });

  test("5. entries are bounded with FIFO eviction", () => {
    const audit = new AuditLogger({ logger: silentLogger, maxEntries: 2 });
    audit.log({ tool_name: "A", tool_args: {}, result: OK });
    audit.log({ tool_name: "B", tool_args: {}, result: OK });
    audit.log({ tool_name: "C", tool_args: {}, result: OK });
    expect(audit.getEntries().map((e) => e.tool_name)).toEqual(["B", "C"]);
  });

  test("6. getEntries filters by tool, session and time", () => {
    const audit = new AuditLogger({ logger: silentLogger });
    audit.log({ tool_name: "Bash", tool_args: {}, result: OK, session_id: "s-1" });
    audit.log({ tool_name: "Read", tool_args: {}, result: OK, session_id: "s-2" });
    audit.log({ tool_name: "Bash", tool_args: {}, result: OK, session_id: "s-2" });

    expect(audit.getEntries({ toolName: "Bash" })).toHaveLength(2);
    expect(audit.getEntries({ sessionId: "s-2" })).toHaveLength(2);
    expect(audit.getEntries({ toolName: "Bash", sessionId: "s-2" })).toHaveLength(1);
    expect(audit.getEntries({ until: new Date(Date.now() - 60_000) })).toEqual([]);
  });

  test("7. onEntry sink receives records; sink errors are logged", () => {
    const logger: Logger = { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() };
    const onEntry = jest.fn(() => {
      throw new Error("disk full");
    });
    const audit = new AuditLogger({ logger, onEntry });

    const entry = audit.log({ tool_name: "Bash", tool_args: {}, result: OK });
    expect(entry).toBeDefined();
    expect(onEntry).toHaveBeenCalledTimes(1);
    expect(logger.error).toHaveBeenCalledWith("Audit sink failed: disk full");
    expect(logger.info).toHaveBeenCalledWith("Tool executed: Bash", { execution_time_ms: 12 });
  });

  test("8. clear empties the log", () => {
    const audit = new AuditLogger({ logger: silentLogger });
    audit.log({ tool_name: "Bash", tool_args: {}, result: OK });
    audit.clear();
    expect(audit.size).toBe(0);
    expect(audit.export()).toEqual([]);
  });
});
