import { ConfigurationError, SANDBOX_TYPES, SandboxConfigInput, SandboxType } from "@toolwarden/core";

export interface GatewaySettings {
  port: number;
  logDir: string;
  sandbox: SandboxConfigInput;
}

function isSandboxType(value: string): value is SandboxType {
  return SANDBOX_TYPES.some((type) => type === value);
}

/**
 * Sandbox configuration from SANDBOX_* environment variables.
 * Unset variables keep the defaults. Throws ConfigurationError listing
 * every malformed variable.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): SandboxConfigInput {
  const errors: string[] = [];
  const config: SandboxConfigInput = {};

  function positiveInteger(name: string): number | undefined {
    const raw = env[name];
    if (raw === undefined || raw === "") return undefined;
    const value = Number(raw);
    if (!Number.isInteger(value) || value < 1) {
      errors.push(`${name} must be a positive integer. Got: "${raw}"`);
      return undefined;
    }
    return value;
  }

  const type = env.SANDBOX_TYPE;
  if (type) {
    if (isSandboxType(type)) {
      config.sandbox_type = type;
    } else {
      errors.push(`SANDBOX_TYPE must be one of: ${SANDBOX_TYPES.join(", ")}. Got: "${type}"`);
    }
  }

  if (env.SANDBOX_BASE_URL) {
    config.remote = {
      base_url: env.SANDBOX_BASE_URL,
      ...(env.SANDBOX_API_KEY ? { api_key: env.SANDBOX_API_KEY } : {}),
      ...(env.SANDBOX_TEMPLATE ? { template: env.SANDBOX_TEMPLATE } : {}),
    };
  }

  const timeout = positiveInteger("SANDBOX_TIMEOUT");
  if (timeout !== undefined) {
    config.resource_limits = { timeout_seconds: timeout };
  }

  const poolSize = positiveInteger("SANDBOX_POOL_SIZE");
  if (poolSize !== undefined) {
    config.pool = { enabled: true, max_size: poolSize };
  }

  if (env.SANDBOX_WORKDIR) {
    config.working_directory = env.SANDBOX_WORKDIR;
  }

  if (env.SANDBOX_DEBUG) {
    config.debug = ["1", "true", "yes"].includes(env.SANDBOX_DEBUG.toLowerCase());
  }

  if (errors.length > 0) {
    throw new ConfigurationError(errors);
  }
  return config;
}

export function settingsFromEnv(env: NodeJS.ProcessEnv = process.env): GatewaySettings {
  return {
    port: parseInt(env.PORT || "3000", 10),
    logDir: env.LOG_DIR || "./logs",
    sandbox: configFromEnv(env),
  };
}
