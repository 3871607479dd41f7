import { AxiosAdapter } from "axios";
import { ConfigurationError, Logger, ResolvedSandboxConfig } from "@toolwarden/core";
import { SandboxBackend } from "./base-sandbox";
import { CommandRunner, MemorySandbox } from "./memory-sandbox";
import { RemoteSandbox } from "./remote-sandbox";

export interface SandboxFactoryOptions {
  logger?: Logger;
  /** Command runner for local sandboxes */
  runner?: CommandRunner;
  /** axios adapter for remote sandboxes */
  adapter?: AxiosAdapter;
}

export type SandboxFactory = () => SandboxBackend;

/**
 * Create an unconnected backend for the configured sandbox type.
 */
export function createSandbox(config: ResolvedSandboxConfig, options: SandboxFactoryOptions = {}): SandboxBackend {
  switch (config.sandbox_type) {
    case "local":
      return new MemorySandbox({
        workingDirectory: config.working_directory,
        homeDirectory: config.home_directory,
        persistFiles: config.persist_files,
        runner: options.runner,
      });
    case "remote": {
      if (!config.remote) {
        throw new ConfigurationError(["remote sandbox requires remote.base_url"]);
      }
      return new RemoteSandbox({
        baseUrl: config.remote.base_url,
        apiKey: config.remote.api_key,
        template: config.remote.template,
        timeoutMs: config.resource_limits.timeout_seconds * 1000,
        sessionTimeoutSeconds: config.session_timeout_minutes * 60,
        resourceLimits: config.resource_limits,
        network: config.network,
        workingDirectory: config.working_directory,
        adapter: options.adapter,
        logger: options.logger,
      });
    }
  }
}

/**
 * Bind a configuration into a zero-argument factory for pools and providers.
 */
export function sandboxFactoryFor(config: ResolvedSandboxConfig, options: SandboxFactoryOptions = {}): SandboxFactory {
  return () => createSandbox(config, options);
}
