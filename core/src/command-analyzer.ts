import { createFinding, isBlockingSeverity } from "./findings";
import { getSafeRegex } from "./regex";
import { RISK_RULES } from "./risk-rules";
import { RiskFinding, SafetyVerdict } from "./schemas";

export interface CommandAnalyzerOptions {
  /** Regex patterns (case-insensitive) that are always blocking */
  blacklist?: readonly string[];
  /** Command prefixes; when set, any command not starting with one is blocked */
  whitelist?: readonly string[] | null;
  /** Downgrade privilege-escalation findings to non-blocking */
  allowRoot?: boolean;
}

const BASH_TOOL = "Bash";

/**
 * CommandAnalyzer - evaluates a shell command against the built-in risk
 * catalog plus caller-supplied blacklist and whitelist.
 *
 * Every match is collected; there is no precedence between categories.
 * Only high and critical findings block execution.
 */
export class CommandAnalyzer {
  private readonly blacklist: Array<{ source: string; regex: RegExp }>;
  private readonly whitelist: readonly string[] | null;
  private readonly allowRoot: boolean;

  constructor(options: CommandAnalyzerOptions = {}) {
    this.blacklist = [];
    for (const source of options.blacklist ?? []) {
      const regex = getSafeRegex(source);
      if (!regex) {
        // Rejected by config validation; reaching here means validation was skipped
        throw new Error(`Unsafe or invalid blacklist pattern: "${source}"`);
      }
      this.blacklist.push({ source, regex });
    }
    this.whitelist = options.whitelist && options.whitelist.length > 0 ? [...options.whitelist] : null;
    this.allowRoot = options.allowRoot ?? false;
  }

  analyze(command: string): RiskFinding[] {
    if (command.trim().length === 0) return [];

    const toolArgs = Object.freeze({ command });
    const findings: RiskFinding[] = [];

    for (const { source, regex } of this.blacklist) {
      if (regex.test(command)) {
        findings.push(
          createFinding({
            category: "blacklist_match",
            description: `Command matches blacklist pattern: ${source}`,
            severity: "high",
            toolName: BASH_TOOL,
            toolArgs,
          })
        );
      }
    }

    for (const rule of RISK_RULES) {
      if (rule.pattern.test(command)) {
        const severity =
          this.allowRoot && rule.category === "privilege_escalation" ? "low" : rule.severity;
        findings.push(
          createFinding({
            category: rule.category,
            description: rule.description,
            severity,
            toolName: BASH_TOOL,
            toolArgs,
          })
        );
      }
    }

    if (this.whitelist) {
      const trimmed = command.trim();
      const allowed = this.whitelist.some((prefix) => trimmed.startsWith(prefix));
      if (!allowed) {
        findings.push(
          createFinding({
            category: "whitelist_violation",
            description: "Command is not in the whitelist",
            severity: "high",
            toolName: BASH_TOOL,
            toolArgs,
          })
        );
      }
    }

    return findings;
  }

  isSafe(command: string): SafetyVerdict {
    const blocking = this.analyze(command).filter((finding) => isBlockingSeverity(finding.severity));
    if (blocking.length === 0) {
      return { safe: true };
    }
    return {
      safe: false,
      reason: blocking.map((finding) => `${finding.description} (${finding.severity})`).join("; "),
    };
  }
}
