/**
 * Toolwarden - Core
 *
 * Policy engine for agent tool calls: command and path risk analysis, rate
 * limiting, a violation log and an append-only audit trail.
 *
 * @example
 * ```typescript
 * import { SecurityManager, createSandboxConfig, createToolCall } from '@toolwarden/core';
 *
 * const config = createSandboxConfig({ security: { blocked_tools: ['WebFetch'] } });
 * const security = new SecurityManager(config.security);
 * const verdict = security.validate(createToolCall('Bash', { command: 'rm -rf /' }));
 * if (!verdict.allowed) console.warn(verdict.reason);
 * ```
 */

export * from "./schemas";
export * from "./errors";
export * from "./logger";
export * from "./mutex";
export * from "./tools";
export * from "./results";
export * from "./findings";
export * from "./risk-rules";
export * from "./regex";
export * from "./command-analyzer";
export * from "./path-validator";
export * from "./rate-limiter";
export * from "./security-manager";
export * from "./audit-logger";
export * from "./config";
export * from "./config-loader";
