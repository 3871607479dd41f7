/**
 * Toolwarden - Sandbox
 *
 * Routes approved tool calls to execution backends: the backend contract,
 * local and remote backends, pooling, the tool proxy and the executor.
 */

export * from "./base-sandbox";
export * from "./memory-sandbox";
export * from "./remote-sandbox";
export * from "./sandbox-factory";
export * from "./provider";
export * from "./sandbox-pool";
export * from "./dedicated-sandbox";
export * from "./tool-proxy";
export * from "./permission-callback";
export * from "./executor";
