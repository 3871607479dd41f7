import {
  createConsoleLogger,
  Logger,
  SandboxPoolClosedError,
  SandboxTimeoutError,
} from "@toolwarden/core";
import { SandboxBackend } from "./base-sandbox";
import { disposeSandbox, ProviderStats, ReleaseOptions, SandboxProvider } from "./provider";

export interface SandboxPoolOptions {
  factory: () => SandboxBackend | Promise<SandboxBackend>;
  /** Upper bound on live handles (idle + in use + connecting) */
  maxSize: number;
  /** Keep released handles for reuse instead of disconnecting them */
  reuse: boolean;
  /** Idle handles older than this are retired on the next acquire. 0 disables. */
  idleTimeoutMs?: number;
  /** Reject an acquire that waits longer than this. 0 waits forever. */
  acquireTimeoutMs?: number;
  logger?: Logger;
}

type Grant = { kind: "handle"; handle: SandboxBackend } | { kind: "slot" };

interface Waiter {
  grant(grant: Grant): void;
  fail(err: Error): void;
}

/**
 * SandboxPool - bounded set of live backends.
 *
 * All bookkeeping (idle queue, in-use set, live count, waiters) is updated
 * synchronously between awaits, so size accounting and handle assignment
 * cannot interleave. Waiters are served in FIFO order: a reusable handle
 * goes straight to the oldest waiter, and a freed slot lets it create one.
 */
export class SandboxPool implements SandboxProvider {
  private readonly factory: () => SandboxBackend | Promise<SandboxBackend>;
  private readonly maxSize: number;
  private readonly reuse: boolean;
  private readonly idleTimeoutMs: number;
  private readonly acquireTimeoutMs: number;
  private readonly logger: Logger;

  private idle: Array<{ handle: SandboxBackend; since: number }> = [];
  private readonly inUse = new Set<SandboxBackend>();
  private waiters: Waiter[] = [];
  /** Handles counted against maxSize, including ones still connecting */
  private live = 0;
  private totalCreated = 0;
  private closed = false;

  constructor(options: SandboxPoolOptions) {
    this.factory = options.factory;
    this.maxSize = options.maxSize;
    this.reuse = options.reuse;
    this.idleTimeoutMs = options.idleTimeoutMs ?? 0;
    this.acquireTimeoutMs = options.acquireTimeoutMs ?? 0;
    this.logger = options.logger ?? createConsoleLogger("SandboxPool");
  }

  async acquire(): Promise<SandboxBackend> {
    if (this.closed) throw new SandboxPoolClosedError();

    const expired = this.takeExpiredIdle();
    const immediate = this.tryGrant();
    if (expired.length > 0) {
      await Promise.all(expired.map((handle) => disposeSandbox(handle, this.logger)));
    }

    const grant = immediate ?? (await this.enqueueWaiter());
    return grant.kind === "handle" ? grant.handle : this.createHandle();
  }

  async release(handle: SandboxBackend, options: ReleaseOptions = {}): Promise<void> {
    if (!this.inUse.delete(handle)) return;

    if (this.reuse && !options.discard && handle.isConnected) {
      const waiter = this.waiters.shift();
      if (waiter) {
        this.inUse.add(handle);
        waiter.grant({ kind: "handle", handle });
      } else {
        this.idle.push({ handle, since: Date.now() });
      }
      return;
    }

    this.live--;
    this.grantSlotToWaiter();
    await disposeSandbox(handle, this.logger);
  }

  /**
   * Disconnect every handle and reject pending acquires. The pool cannot be
   * used afterwards.
   */
  async closeAll(): Promise<void> {
    this.closed = true;
    const handles = [...this.inUse, ...this.idle.map((entry) => entry.handle)];
    this.inUse.clear();
    this.idle = [];
    this.live = 0;

    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter.fail(new SandboxPoolClosedError());
    }

    await Promise.all(handles.map((handle) => disposeSandbox(handle, this.logger)));
    if (handles.length > 0) {
      this.logger.info(`Closed ${handles.length} sandbox(es)`);
    }
  }

  stats(): ProviderStats {
    return {
      total_created: this.totalCreated,
      in_use: this.inUse.size,
      available: this.idle.length,
      waiting: this.waiters.length,
      max_size: this.maxSize,
    };
  }

  // -----------------------------------------------------------------------
  // Internals
  // -----------------------------------------------------------------------

  private async createHandle(): Promise<SandboxBackend> {
    const handle = await this.connectNew().catch((err: unknown) => {
      if (!this.closed) {
        this.live--;
        this.grantSlotToWaiter();
      }
      throw err;
    });

    if (this.closed) {
      await disposeSandbox(handle, this.logger);
      throw new SandboxPoolClosedError();
    }

    this.totalCreated++;
    this.inUse.add(handle);
    this.logger.debug(`Sandbox connected: ${handle.sandboxId}`, { live: this.live, max_size: this.maxSize });
    return handle;
  }

  private async connectNew(): Promise<SandboxBackend> {
    const handle = await this.factory();
    try {
      await handle.connect();
    } catch (err) {
      await disposeSandbox(handle, this.logger);
      throw err;
    }
    return handle;
  }

  private grantSlotToWaiter(): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      this.live++;
      waiter.grant({ kind: "slot" });
    }
  }

  private takeExpiredIdle(): SandboxBackend[] {
    if (this.idleTimeoutMs <= 0) return [];
    const cutoff = Date.now() - this.idleTimeoutMs;
    const expired = this.idle.filter((entry) => entry.since <= cutoff).map((entry) => entry.handle);
    if (expired.length > 0) {
      this.idle = this.idle.filter((entry) => entry.since > cutoff);
      this.live -= expired.length;
    }
    return expired;
  }

  private tryGrant(): Grant | undefined {
    let idle = this.idle.shift();
    // Handles the backend dropped while idle only free their slot
    while (idle && !idle.handle.isConnected) {
      this.live--;
      idle = this.idle.shift();
    }
    if (idle) {
      this.inUse.add(idle.handle);
      return { kind: "handle", handle: idle.handle };
    }
    if (this.live < this.maxSize) {
      this.live++;
      return { kind: "slot" };
    }
    return undefined;
  }

  private enqueueWaiter(): Promise<Grant> {
    return new Promise<Grant>((resolve, reject) => {
      let timer: ReturnType<typeof setTimeout> | undefined;
      const waiter: Waiter = {
        grant: (grant) => {
          clearTimeout(timer);
          resolve(grant);
        },
        fail: (err) => {
          clearTimeout(timer);
          reject(err);
        },
      };
      if (this.acquireTimeoutMs > 0) {
        timer = setTimeout(() => {
          this.waiters = this.waiters.filter((w) => w !== waiter);
          reject(new SandboxTimeoutError("Sandbox acquire", this.acquireTimeoutMs));
        }, this.acquireTimeoutMs);
      }
      this.waiters.push(waiter);
    });
  }
}
