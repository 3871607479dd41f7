import { errorMessage, Logger } from "@toolwarden/core";
import { SandboxBackend } from "./base-sandbox";

export interface ReleaseOptions {
  /** Disconnect and drop the handle instead of keeping it for reuse */
  discard?: boolean;
}

export interface ProviderStats {
  total_created: number;
  in_use: number;
  available: number;
  waiting: number;
  max_size: number;
}

/**
 * Hands out connected backends, one caller at a time per handle.
 *
 * `release` never rejects and ignores handles it does not currently lend.
 */
export interface SandboxProvider {
  acquire(): Promise<SandboxBackend>;
  release(handle: SandboxBackend, options?: ReleaseOptions): Promise<void>;
  closeAll(): Promise<void>;
  stats(): ProviderStats;
}

/**
 * Best-effort disconnect. Failures are logged and never rethrown.
 */
export async function disposeSandbox(handle: SandboxBackend, logger: Logger): Promise<void> {
  try {
    await handle.disconnect();
  } catch (err) {
    logger.warn(`Failed to disconnect sandbox ${handle.sandboxId}: ${errorMessage(err)}`);
  }
}
