import { ConfigurationError } from "@toolwarden/core";
import { configFromEnv, settingsFromEnv } from "../config";

describe("configFromEnv", () => {
  test("1. an empty environment keeps every default", () => {
    expect(configFromEnv({})).toEqual({});
  });

  test("2. reads every SANDBOX_* variable", () => {
    expect(
      configFromEnv({
        SANDBOX_TYPE: "remote",
        SANDBOX_BASE_URL: "https://sandbox.test",
        SANDBOX_API_KEY: "test-secret",
        SANDBOX_TEMPLATE: "node20",
        SANDBOX_TIMEOUT: "30",
        SANDBOX_POOL_SIZE: "4",
        SANDBOX_WORKDIR: "/srv/work",
        SANDBOX_DEBUG: "true",
      })
    ).toEqual({
      sandbox_type: "remote",
      remote: { base_url: "https://sandbox.test", api_key: "test-secret", template: "node20" },
      resource_limits: { timeout_seconds: 30 },
      pool: { enabled: true, max_size: 4 },
      working_directory: "/srv/work",
      debug: true,
    });
  });

  test("3. SANDBOX_DEBUG accepts only truthy words", () => {
    expect(configFromEnv({ SANDBOX_DEBUG: "1" }).debug).toBe(true);
    expect(configFromEnv({ SANDBOX_DEBUG: "off" }).debug).toBe(false);
  });

  test("4. malformed variables are reported together", () => {
    expect(() => configFromEnv({ SANDBOX_TYPE: "vm", SANDBOX_TIMEOUT: "soon", SANDBOX_POOL_SIZE: "0" })).toThrow(
      new ConfigurationError([
        'SANDBOX_TYPE must be one of: local, remote. Got: "vm"',
        'SANDBOX_TIMEOUT must be a positive integer. Got: "soon"',
        'SANDBOX_POOL_SIZE must be a positive integer. Got: "0"',
      ])
    );
  });
});

describe("settingsFromEnv", () => {
  test("1. PORT and LOG_DIR with defaults", () => {
    expect(settingsFromEnv({})).toEqual({ port: 3000, logDir: "./logs", sandbox: {} });
    expect(settingsFromEnv({ PORT: "8080", LOG_DIR: "/var/log/toolwarden" })).toEqual({
      port: 8080,
      logDir: "/var/log/toolwarden",
      sandbox: {},
    });
  });
});
