import { AsyncMutex, createConsoleLogger, Logger, SandboxPoolClosedError } from "@toolwarden/core";
import { SandboxBackend } from "./base-sandbox";
import { disposeSandbox, ProviderStats, ReleaseOptions, SandboxProvider } from "./provider";

export interface DedicatedSandboxOptions {
  factory: () => SandboxBackend | Promise<SandboxBackend>;
  logger?: Logger;
}

/**
 * DedicatedSandbox - a single persistent backend shared by every call.
 *
 * The handle is created on first acquire and kept until it is discarded or
 * the provider is closed. The mutex is held from acquire to release, so
 * calls on the handle run strictly one after another.
 */
export class DedicatedSandbox implements SandboxProvider {
  private readonly factory: () => SandboxBackend | Promise<SandboxBackend>;
  private readonly logger: Logger;
  private readonly mutex = new AsyncMutex();
  private handle?: SandboxBackend;
  private lentHandle?: SandboxBackend;
  private totalCreated = 0;
  private closed = false;

  constructor(options: DedicatedSandboxOptions) {
    this.factory = options.factory;
    this.logger = options.logger ?? createConsoleLogger("DedicatedSandbox");
  }

  async acquire(): Promise<SandboxBackend> {
    if (this.closed) throw new SandboxPoolClosedError();
    await this.mutex.acquire();
    try {
      if (this.closed) throw new SandboxPoolClosedError();
      const handle = await this.ensureConnected();
      this.lentHandle = handle;
      return handle;
    } catch (err) {
      this.mutex.release();
      throw err;
    }
  }

  async release(handle: SandboxBackend, options: ReleaseOptions = {}): Promise<void> {
    if (!this.lentHandle || handle !== this.lentHandle) return;
    this.lentHandle = undefined;
    try {
      if (options.discard || !handle.isConnected) {
        if (this.handle === handle) this.handle = undefined;
        await disposeSandbox(handle, this.logger);
      }
    } finally {
      this.mutex.release();
    }
  }

  async closeAll(): Promise<void> {
    this.closed = true;
    const handle = this.handle;
    this.handle = undefined;
    if (handle) {
      await disposeSandbox(handle, this.logger);
    }
  }

  stats(): ProviderStats {
    return {
      total_created: this.totalCreated,
      in_use: this.lentHandle ? 1 : 0,
      available: this.handle && !this.lentHandle ? 1 : 0,
      waiting: this.mutex.pending,
      max_size: 1,
    };
  }

  private async ensureConnected(): Promise<SandboxBackend> {
    if (this.handle?.isConnected) {
      return this.handle;
    }
    if (this.handle) {
      await disposeSandbox(this.handle, this.logger);
      this.handle = undefined;
    }

    const handle = await this.factory();
    try {
      await handle.connect();
    } catch (err) {
      await disposeSandbox(handle, this.logger);
      throw err;
    }
    this.handle = handle;
    this.totalCreated++;
    this.logger.debug(`Sandbox connected: ${handle.sandboxId}`);
    return handle;
  }
}
