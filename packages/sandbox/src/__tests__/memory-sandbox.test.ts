import { SandboxNotConnectedError } from "@toolwarden/core";
import { globToRegExp, MemorySandbox } from "../memory-sandbox";

async function connected(files: Record<string, string> = {}, persistFiles = false): Promise<MemorySandbox> {
  const sandbox = new MemorySandbox({ sandboxId: "local-test", files, persistFiles });
  await sandbox.connect();
  return sandbox;
}

describe("MemorySandbox", () => {
  test("1. connects and reports its state", async () => {
    const sandbox = new MemorySandbox({ sandboxId: "local-test" });
    expect(sandbox.state).toBe("disconnected");
    await sandbox.connect();
    expect(sandbox.isConnected).toBe(true);
    expect(sandbox.sandboxId).toBe("local-test");
    await sandbox.disconnect();
    expect(sandbox.state).toBe("disconnected");
  });

  test("2. generates a local- id when none is given", () => {
    expect(new MemorySandbox().sandboxId).toMatch(/^local-[0-9a-f-]{36}$/);
  });

  test("3. operations require a connection", async () => {
    const sandbox = new MemorySandbox();
    await expect(sandbox.readFile("a.txt")).rejects.toBeInstanceOf(SandboxNotConnectedError);
    await expect(sandbox.executeBash("echo hi")).rejects.toThrow("Sandbox is not connected (executeBash)");
  });

  test("4. write then read round-trips and tracks created vs modified", async () => {
    const sandbox = await connected();
    const created = await sandbox.writeFile("notes.txt", "hello\n");
    expect(created.success).toBe(true);
    expect(created.output).toBe("Wrote 6 bytes to /workspace/notes.txt");
    expect(created.files_created).toEqual(["/workspace/notes.txt"]);
    expect(created.files_modified).toEqual([]);

    const modified = await sandbox.writeFile("/workspace/notes.txt", "héllo");
    expect(modified.output).toBe("Wrote 6 bytes to /workspace/notes.txt");
    expect(modified.files_created).toEqual([]);
    expect(modified.files_modified).toEqual(["/workspace/notes.txt"]);

    const read = await sandbox.readFile("notes.txt");
    expect(read.output).toBe("héllo");
    expect(read.sandbox_id).toBe("local-test");
  });

  test("5. reading a missing file fails with exit code 1", async () => {
    const sandbox = await connected();
    const result = await sandbox.readFile("missing.txt");
    expect(result.success).toBe(false);
    expect(result.error).toBe("File not found: /workspace/missing.txt");
    expect(result.exit_code).toBe(1);
  });

  test("6. builtin commands", async () => {
    const sandbox = await connected({ "greeting.txt": "hi there\n" });

    expect((await sandbox.executeBash('echo hello "world"')).output).toBe("hello world\n");
    expect((await sandbox.executeBash("pwd")).output).toBe("/workspace\n");
    expect((await sandbox.executeBash("cat greeting.txt")).output).toBe("hi there\n");

    const missing = await sandbox.executeBash("cat nope.txt");
    expect(missing.error).toBe("cat: nope.txt: No such file or directory");
    expect(missing.exit_code).toBe(1);

    const falsy = await sandbox.executeBash("false");
    expect(falsy.success).toBe(false);
    expect(falsy.error).toBe("Command exited with code 1");
  });

  test("7. unknown commands exit 127", async () => {
    const sandbox = await connected();
    const result = await sandbox.executeBash("nmap localhost");
    expect(result.success).toBe(false);
    expect(result.exit_code).toBe(127);
    expect(result.error).toBe("nmap: command not found");
  });

  test("8. ls lists direct children with a slash on directories", async () => {
    const sandbox = await connected({ "src/a.ts": "", "src/lib/b.ts": "", "README.md": "" });
    expect((await sandbox.executeBash("ls -la")).output).toBe("README.md\nsrc/\n");
    expect((await sandbox.executeBash("ls src")).output).toBe("a.ts\nlib/\n");
  });

  test("9. a custom runner receives the sandbox context", async () => {
    const sandbox = new MemorySandbox({
      sandboxId: "local-test",
      files: { "data.csv": "a,b" },
      runner: (command, context) => ({
        stdout: `${command}|${context.cwd}|${context.readFile("data.csv") ?? ""}|${context.timeoutMs ?? 0}`,
        stderr: "",
        exitCode: 0,
      }),
    });
    await sandbox.connect();
    expect((await sandbox.executeBash("wc -l", 500)).output).toBe("wc -l|/workspace|a,b|500");
  });

  test("10. listFiles applies glob patterns relative to the directory", async () => {
    const sandbox = await connected({ "src/a.ts": "", "src/lib/b.ts": "", "src/c.md": "" });

    expect((await sandbox.listFiles(".", "**/*.ts")).output).toBe("/workspace/src/a.ts\n/workspace/src/lib/b.ts");
    expect((await sandbox.listFiles("src", "*.ts")).output).toBe("/workspace/src/a.ts");
    expect((await sandbox.listFiles("src")).output).toBe(
      "/workspace/src/a.ts\n/workspace/src/c.md\n/workspace/src/lib/b.ts"
    );
    expect((await sandbox.listFiles("empty")).output).toBe("");
  });

  test("11. searchFiles reports path:line:text and filters by file name", async () => {
    const sandbox = await connected({
      "src/a.ts": "const x = 1;\nexport function run() {}\n",
      "docs/run.md": "run it\n",
    });

    expect((await sandbox.searchFiles("run", ".")).output).toBe(
      "/workspace/docs/run.md:1:run it\n/workspace/src/a.ts:2:export function run() {}"
    );
    expect((await sandbox.searchFiles("run", ".", "*.ts")).output).toBe("/workspace/src/a.ts:2:export function run() {}");

    const none = await sandbox.searchFiles("absent", ".");
    expect(none.success).toBe(true);
    expect(none.output).toBe("");
  });

  test("12. searchFiles rejects unsafe patterns", async () => {
    const sandbox = await connected();
    const result = await sandbox.searchFiles("(a+)+", ".");
    expect(result.success).toBe(false);
    expect(result.exit_code).toBe(2);
    expect(result.error).toBe("Invalid search pattern: pattern may cause catastrophic backtracking");
  });

  test("13. files are cleared on disconnect unless persisted", async () => {
    const ephemeral = await connected({ "a.txt": "a" });
    await ephemeral.disconnect();
    await ephemeral.connect();
    expect((await ephemeral.readFile("a.txt")).success).toBe(false);

    const persistent = await connected({ "a.txt": "a" }, true);
    await persistent.disconnect();
    await persistent.connect();
    expect((await persistent.readFile("a.txt")).output).toBe("a");
  });

  test("14. ~ paths land in the home directory", async () => {
    const sandbox = new MemorySandbox({ sandboxId: "local-test", homeDirectory: "/home/dev" });
    await sandbox.connect();

    expect((await sandbox.writeFile("~/notes.txt", "hello")).files_created).toEqual(["/home/dev/notes.txt"]);
    expect((await sandbox.readFile("/home/dev/notes.txt")).output).toBe("hello");
    expect(sandbox.resolve("~")).toBe("/home/dev");
    expect(sandbox.resolve("~user/x")).toBe("/workspace/~user/x");
  });
});

describe("globToRegExp", () => {
  test("1. single star stays within a segment", () => {
    expect(globToRegExp("*.ts").test("a.ts")).toBe(true);
    expect(globToRegExp("*.ts").test("lib/a.ts")).toBe(false);
  });

  test("2. double star crosses directories", () => {
    expect(globToRegExp("**/*.ts").test("a.ts")).toBe(true);
    expect(globToRegExp("**/*.ts").test("lib/deep/a.ts")).toBe(true);
    expect(globToRegExp("src/**").test("src/lib/a.ts")).toBe(true);
  });

  test("3. question mark and literal characters", () => {
    expect(globToRegExp("file?.md").test("file1.md")).toBe(true);
    expect(globToRegExp("file?.md").test("file10.md")).toBe(false);
    expect(globToRegExp("a+b.txt").test("a+b.txt")).toBe(true);
    expect(globToRegExp("a+b.txt").test("aab.txt")).toBe(false);
  });
});
