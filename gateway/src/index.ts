#!/usr/bin/env node

import { errorMessage } from "@toolwarden/core";
import { settingsFromEnv } from "./config";
import { GatewayServer } from "./server";

/**
 * Main entry point for the gateway server
 */
async function main(): Promise<void> {
  const settings = settingsFromEnv();

  console.log("Starting toolwarden gateway...");
  console.log(`Port: ${settings.port}`);
  console.log(`Log directory: ${settings.logDir}`);
  console.log(`Sandbox type: ${settings.sandbox.sandbox_type ?? "local"}`);

  const server = new GatewayServer({ port: settings.port, logDir: settings.logDir, sandbox: settings.sandbox });
  await server.start();

  // Graceful shutdown
  process.once("SIGINT", () => {
    console.log("\nShutting down gateway...");
    server.stop().then(
      () => process.exit(0),
      (err: unknown) => {
        console.error(`Shutdown failed: ${errorMessage(err)}`);
        process.exit(1);
      }
    );
  });
}

if (require.main === module) {
  main().catch((err: unknown) => {
    console.error(`Gateway failed to start: ${errorMessage(err)}`);
    process.exit(1);
  });
}

export * from "./app";
export * from "./audit-log";
export * from "./config";
export * from "./server";
export * from "./session-registry";
