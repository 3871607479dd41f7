import {
  AuditLogger,
  createSandboxConfig,
  ResolvedSandboxConfig,
  SandboxConfigInput,
  SecurityManager,
  silentLogger,
} from "@toolwarden/core";
import { SandboxBackend } from "../base-sandbox";
import { DedicatedSandbox } from "../dedicated-sandbox";
import { CommandOutput, MemorySandbox, MemorySandboxOptions } from "../memory-sandbox";
import { ToolProxy } from "../tool-proxy";

/** A runner whose commands never finish. */
export const hangingRunner = (): Promise<CommandOutput> => new Promise<CommandOutput>(() => undefined);

/** Backend that fails to boot. */
export class UnbootableSandbox extends MemorySandbox {
  protected async openSession(): Promise<void> {
    throw new Error("boot failed");
  }
}

/** Backend whose transport breaks on the first command. */
export class BrokenTransportSandbox extends MemorySandbox {
  async executeBash(): Promise<never> {
    throw new Error("connection reset");
  }
}

/** Factory handing out MemorySandboxes named sbx-1, sbx-2, ... */
export function countingFactory(options: MemorySandboxOptions = {}): {
  factory: () => MemorySandbox;
  created: MemorySandbox[];
} {
  const created: MemorySandbox[] = [];
  const factory = (): MemorySandbox => {
    const sandbox = new MemorySandbox({ ...options, sandboxId: `sbx-${created.length + 1}` });
    created.push(sandbox);
    return sandbox;
  };
  return { factory, created };
}

export interface ProxyFixture {
  proxy: ToolProxy;
  provider: DedicatedSandbox;
  audit: AuditLogger;
  security: SecurityManager;
  config: ResolvedSandboxConfig;
}

export function makeProxy(
  input: SandboxConfigInput = {},
  factory: () => SandboxBackend = () => new MemorySandbox({ sandboxId: "sbx-test" })
): ProxyFixture {
  const config = createSandboxConfig(input);
  const security = new SecurityManager(config.security, {
    workingDirectory: config.working_directory,
    homeDirectory: config.home_directory,
    logger: silentLogger,
  });
  const audit = new AuditLogger({ logger: silentLogger });
  const provider = new DedicatedSandbox({ factory, logger: silentLogger });
  const proxy = new ToolProxy({
    config,
    provider,
    securityManager: security,
    auditLogger: audit,
    logger: silentLogger,
  });
  return { proxy, provider, audit, security, config };
}
