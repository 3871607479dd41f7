import { CommandRiskCategory, RiskSeverity } from "./schemas";

export interface RiskRule {
  readonly pattern: RegExp;
  readonly description: string;
  readonly severity: RiskSeverity;
  readonly category: CommandRiskCategory;
}

type RuleSpec = [pattern: RegExp, description: string, severity: RiskSeverity];

/**
 * Built-in catalog of dangerous shell command patterns, grouped by category.
 * All patterns are case-insensitive and matched anywhere in the command.
 */
const CATALOG: Readonly<Record<CommandRiskCategory, readonly RuleSpec[]>> = {
  filesystem_destruction: [
    [/rm\s+-rf\s+\/(?!\S)/i, "Root directory deletion", "critical"],
    [/rm\s+-rf\s+\/\*/i, "Deletion of all files under root", "critical"],
    [/rm\s+-rf\s+~/i, "Home directory deletion", "high"],
    [/mkfs\.\w+/i, "Filesystem format", "critical"],
    [/dd\s+if=\/dev\/(zero|random)\s+of=\/dev\/[sh]d/i, "Disk overwrite", "critical"],
  ],
  system_destruction: [
    [/:\(\)\s*\{\s*:\|:&\s*\};\s*:/i, "Fork bomb", "critical"],
    [/>\s*\/dev\/[sh]d[a-z]/i, "Disk device overwrite", "critical"],
    [/chmod\s+-R\s+777\s+\//i, "Dangerous recursive permission change", "high"],
    [/chmod\s+777\s+\/etc/i, "System configuration permission change", "high"],
  ],
  privilege_escalation: [
    [/\bsudo\b/i, "Use of sudo", "high"],
    [/\bsu\s+-/i, "User switch", "high"],
    [/chmod\s+[ugoa]*\+[rwx]*s/i, "SUID/SGID bit change", "high"],
  ],
  remote_code_execution: [
    [/curl.*\|\s*(ba)?sh/i, "Remote script execution (curl)", "critical"],
    [/wget.*\|\s*(ba)?sh/i, "Remote script execution (wget)", "critical"],
    [/curl.*-o\s*\/tmp.*&&.*sh/i, "Download and execute", "high"],
    [/python\s+-c\s+['"]import\s+urllib/i, "Python remote download", "medium"],
  ],
  network_attack: [
    [/nc\s+-l/i, "Network listener", "high"],
    [/nmap\s+/i, "Network scan", "medium"],
    [/tcpdump\s+/i, "Packet capture", "medium"],
  ],
  information_disclosure: [
    [/cat\s+\/etc\/passwd/i, "User list read", "low"],
    [/cat\s+\/etc\/shadow/i, "Password file read", "high"],
    [/cat\s+~\/\.ssh\//i, "SSH key read", "high"],
    [/cat\s+.*\.env/i, "Environment file read", "medium"],
    [/printenv|env\s*$/i, "Environment variable dump", "low"],
  ],
  resource_exhaustion: [
    [/while\s+true.*do/i, "Infinite loop", "medium"],
    [/for\s*\(\s*;\s*;\s*\)/i, "Infinite loop", "medium"],
    [/dd\s+if=\/dev\/zero\s+of=/i, "Disk fill", "high"],
    [/yes\s+/i, "Unbounded output", "medium"],
  ],
};

const CATEGORY_ORDER: readonly CommandRiskCategory[] = [
  "filesystem_destruction",
  "system_destruction",
  "privilege_escalation",
  "remote_code_execution",
  "network_attack",
  "information_disclosure",
  "resource_exhaustion",
];

export const RISK_RULES: readonly RiskRule[] = Object.freeze(
  CATEGORY_ORDER.flatMap((category) =>
    CATALOG[category].map(([pattern, description, severity]) =>
      Object.freeze({ pattern, description, severity, category })
    )
  )
);

export function rulesForCategory(category: CommandRiskCategory): RiskRule[] {
  return RISK_RULES.filter((rule) => rule.category === category);
}
