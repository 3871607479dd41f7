import { v4 as uuidv4 } from "uuid";
import { RiskCategory, RiskFinding, RiskSeverity, ToolArguments } from "./schemas";

export const BLOCKING_SEVERITIES: ReadonlySet<RiskSeverity> = new Set<RiskSeverity>(["high", "critical"]);

export function isBlockingSeverity(severity: RiskSeverity): boolean {
  return BLOCKING_SEVERITIES.has(severity);
}

/**
 * Create a RiskFinding. Findings are frozen at creation and never mutated.
 *
 * @param blocked defaults to whether the severity blocks execution
 */
export function createFinding(params: {
  category: RiskCategory;
  description: string;
  severity: RiskSeverity;
  toolName: string;
  toolArgs: ToolArguments;
  blocked?: boolean;
}): RiskFinding {
  return Object.freeze({
    finding_id: uuidv4(),
    timestamp: new Date().toISOString(),
    category: params.category,
    description: params.description,
    severity: params.severity,
    tool_name: params.toolName,
    tool_args: params.toolArgs,
    blocked: params.blocked ?? isBlockingSeverity(params.severity),
  });
}
