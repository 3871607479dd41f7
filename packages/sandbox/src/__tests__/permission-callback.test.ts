import { allow, createPermissionCallback, deny } from "../permission-callback";
import { makeProxy } from "./helpers";

describe("createPermissionCallback", () => {
  test("1. tools outside the sandbox set are allowed without running", async () => {
    const { proxy, audit } = makeProxy();
    const callback = createPermissionCallback(proxy);

    await expect(callback("Read", { file_path: "a.txt" })).resolves.toEqual({ behavior: "allow" });
    expect(audit.size).toBe(0);
  });

  test("2. sandboxed success embeds the output in the input", async () => {
    const { proxy } = makeProxy();
    const callback = createPermissionCallback(proxy);

    await expect(callback("Bash", { command: "echo hi" })).resolves.toEqual({
      behavior: "allow",
      updatedInput: { command: "echo hi", _sandbox_result: "hi\n", _sandbox_executed: true },
    });
  });

  test("3. a failed or denied execution becomes a deny", async () => {
    const { proxy } = makeProxy();
    const callback = createPermissionCallback(proxy);

    await expect(callback("Bash", { command: "rm -rf /" })).resolves.toEqual({
      behavior: "deny",
      message:
        "Sandbox execution failed: Security validation failed: Command matches blacklist pattern: rm\\s+-rf\\s+/ (high); Root directory deletion (critical)",
      interrupt: false,
    });
  });

  test("4. an unsupported sandbox tool is denied with the error message", async () => {
    const { proxy, audit } = makeProxy();
    const callback = createPermissionCallback(proxy);

    await expect(callback("Task", { prompt: "summarize" })).resolves.toEqual({
      behavior: "deny",
      message: "Unsupported tool: Task",
      interrupt: false,
    });
    expect(audit.size).toBe(1);
  });

  test("5. context passed to the factory reaches the audit log", async () => {
    const { proxy, audit } = makeProxy();
    const callback = createPermissionCallback(proxy, { userId: "agent-7", sessionId: "run-1" });

    await callback("Bash", { command: "pwd" });
    expect(audit.getEntries()[0].user_id).toBe("agent-7");
    expect(audit.getEntries()[0].session_id).toBe("run-1");
  });

  test("6. allow and deny helpers", () => {
    expect(allow()).toEqual({ behavior: "allow" });
    expect(allow({ a: 1 })).toEqual({ behavior: "allow", updatedInput: { a: 1 } });
    expect(deny("no", true)).toEqual({ behavior: "deny", message: "no", interrupt: true });
  });
});
