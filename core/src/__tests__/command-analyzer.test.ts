import { CommandAnalyzer } from "../command-analyzer";
import { RISK_RULES, rulesForCategory } from "../risk-rules";

describe("CommandAnalyzer", () => {
  test("1. empty or whitespace command has no findings and is safe", () => {
    const analyzer = new CommandAnalyzer();
    expect(analyzer.analyze("")).toEqual([]);
    expect(analyzer.analyze("   ")).toEqual([]);
    expect(analyzer.isSafe("")).toEqual({ safe: true });
  });

  test("2. root directory deletion is critical and unsafe", () => {
    const analyzer = new CommandAnalyzer();
    const findings = analyzer.analyze("rm -rf /");
    expect(findings).toHaveLength(1);
    expect(findings[0].category).toBe("filesystem_destruction");
    expect(findings[0].severity).toBe("critical");
    expect(findings[0].blocked).toBe(true);
    expect(findings[0].tool_name).toBe("Bash");
    expect(findings[0].tool_args).toEqual({ command: "rm -rf /" });
    expect(analyzer.isSafe("rm -rf /")).toEqual({
      safe: false,
      reason: "Root directory deletion (critical)",
    });
  });

  test("3. ordinary command is safe with no findings", () => {
    const analyzer = new CommandAnalyzer();
    expect(analyzer.analyze("ls -la")).toEqual([]);
    expect(analyzer.isSafe("ls -la")).toEqual({ safe: true });
  });

  test("4. blacklist match is blocking and names the pattern", () => {
    const analyzer = new CommandAnalyzer({ blacklist: ["git\\s+push"] });
    const verdict = analyzer.isSafe("GIT PUSH origin main");
    expect(verdict).toEqual({
      safe: false,
      reason: "Command matches blacklist pattern: git\\s+push (high)",
    });
    expect(analyzer.analyze("git push")[0].category).toBe("blacklist_match");
  });

  test("5. low and medium findings are recorded but not blocking", () => {
    const analyzer = new CommandAnalyzer();

    const low = analyzer.analyze("cat /etc/passwd");
    expect(low).toHaveLength(1);
    expect(low[0].severity).toBe("low");
    expect(low[0].blocked).toBe(false);
    expect(analyzer.isSafe("cat /etc/passwd")).toEqual({ safe: true });

    const medium = analyzer.analyze("nmap -sV example.test");
    expect(medium.map((f) => f.description)).toEqual(["Network scan"]);
    expect(analyzer.isSafe("nmap -sV example.test").safe).toBe(true);
  });

  test("6. all matches are collected across categories", () => {
    const analyzer = new CommandAnalyzer();
    const findings = analyzer.analyze("sudo rm -rf /");
    expect(findings.map((f) => f.category)).toEqual(["filesystem_destruction", "privilege_escalation"]);
    expect(analyzer.isSafe("sudo rm -rf /").reason).toBe(
      "Root directory deletion (critical); Use of sudo (high)"
    );
  });

  test("7. allowRoot downgrades privilege escalation to low", () => {
    const analyzer = new CommandAnalyzer({ allowRoot: true });
    const findings = analyzer.analyze("sudo apt-get update");
    expect(findings).toHaveLength(1);
    expect(findings[0].category).toBe("privilege_escalation");
    expect(findings[0].severity).toBe("low");
    expect(findings[0].blocked).toBe(false);
    expect(analyzer.isSafe("sudo apt-get update")).toEqual({ safe: true });
  });

  test("8. whitelist enforces command prefixes", () => {
    const analyzer = new CommandAnalyzer({ whitelist: ["ls", "git status"] });
    expect(analyzer.isSafe("ls -la")).toEqual({ safe: true });
    expect(analyzer.isSafe("  git status --short")).toEqual({ safe: true });

    const verdict = analyzer.isSafe("python script.py");
    expect(verdict).toEqual({ safe: false, reason: "Command is not in the whitelist (high)" });
    expect(analyzer.analyze("python script.py")[0].category).toBe("whitelist_violation");
  });

  test("9. empty whitelist disables whitelisting", () => {
    const analyzer = new CommandAnalyzer({ whitelist: [] });
    expect(analyzer.isSafe("python script.py")).toEqual({ safe: true });
  });

  test("10. unsafe blacklist pattern is rejected at construction", () => {
    expect(() => new CommandAnalyzer({ blacklist: ["(a+)+"] })).toThrow(/Unsafe or invalid blacklist pattern/);
  });

  test("11. findings are frozen", () => {
    const [finding] = new CommandAnalyzer().analyze("rm -rf /");
    expect(Object.isFrozen(finding)).toBe(true);
  });
});

describe("RiskRule catalog", () => {
  test("1. catalog has 28 case-insensitive rules in 7 categories", () => {
    expect(RISK_RULES).toHaveLength(28);
    expect(RISK_RULES.every((rule) => rule.pattern.flags.includes("i"))).toBe(true);
    expect(new Set(RISK_RULES.map((rule) => rule.category)).size).toBe(7);
  });

  test("2. rulesForCategory filters by category", () => {
    const rules = rulesForCategory("privilege_escalation");
    expect(rules.map((rule) => rule.description)).toEqual(["Use of sudo", "User switch", "SUID/SGID bit change"]);
  });

  test("3. fork bomb is critical", () => {
    const findings = new CommandAnalyzer().analyze(":(){ :|:& };:");
    expect(findings.map((f) => [f.description, f.severity])).toEqual([["Fork bomb", "critical"]]);
  });
});
