import { v4 as uuidv4 } from "uuid";
import { errorMessage } from "./errors";
import { createConsoleLogger, Logger } from "./logger";
import { AuditEntry, AuditRecord, ExecutionResult, ToolArguments } from "./schemas";

/** Default max audit log size (entries). */
const DEFAULT_MAX_ENTRIES = 10_000;
/** Characters of output kept in an entry's result summary. */
const DEFAULT_OUTPUT_LIMIT = 1000;

export interface AuditLoggerOptions {
  /** When false, `log` records nothing (default: true) */
  enabled?: boolean;
  /**
   * Maximum number of entries to retain in memory.
   * When exceeded, oldest entries are evicted (FIFO). Set to 0 for unlimited.
   */
  maxEntries?: number;
  outputLimit?: number;
  logger?: Logger;
  /** Called for every recorded entry, e.g. to ship it to a file */
  onEntry?: (record: AuditRecord, entry: AuditEntry) => void;
}

export interface AuditInput {
  tool_name: string;
  tool_args: ToolArguments;
  result: ExecutionResult;
  sandbox_id?: string | null;
  user_id?: string | null;
  session_id?: string | null;
}

export interface AuditFilter {
  since?: Date;
  until?: Date;
  toolName?: string;
  sessionId?: string;
}

/**
 * AuditLogger - append-only, bounded record of every tool-call attempt.
 *
 * Entries are appended when the call finishes, so their order reflects
 * completion order.
 */
export class AuditLogger {
  readonly enabled: boolean;
  private readonly maxEntries: number;
  private readonly outputLimit: number;
  private readonly logger: Logger;
  private readonly onEntry?: (record: AuditRecord, entry: AuditEntry) => void;
  private entries: AuditEntry[] = [];

  constructor(options: AuditLoggerOptions = {}) {
    this.enabled = options.enabled ?? true;
    this.maxEntries = options.maxEntries ?? DEFAULT_MAX_ENTRIES;
    this.outputLimit = options.outputLimit ?? DEFAULT_OUTPUT_LIMIT;
    this.logger = options.logger ?? createConsoleLogger("AuditLogger");
    this.onEntry = options.onEntry;
  }

  /**
   * Record one attempt. Returns the entry, or undefined when disabled.
   */
  log(input: AuditInput): AuditEntry | undefined {
    if (!this.enabled) return undefined;

    const { result } = input;
    const entry: AuditEntry = Object.freeze({
      entry_id: uuidv4(),
      timestamp: new Date().toISOString(),
      tool_name: input.tool_name,
      tool_args: input.tool_args,
      result: Object.freeze({
        success: result.success,
        output: result.output.slice(0, this.outputLimit),
        error: result.error ?? null,
        exit_code: result.exit_code,
        execution_time_ms: result.execution_time_ms,
      }),
      sandbox_id: input.sandbox_id ?? result.sandbox_id ?? null,
      user_id: input.user_id ?? null,
      session_id: input.session_id ?? null,
    });

    this.entries.push(entry);
    if (this.maxEntries > 0 && this.entries.length > this.maxEntries) {
      this.entries.splice(0, this.entries.length - this.maxEntries);
    }

    if (result.success) {
      this.logger.info(`Tool executed: ${entry.tool_name}`, { execution_time_ms: result.execution_time_ms });
    } else {
      this.logger.warn(`Tool failed: ${entry.tool_name} - ${result.error ?? ""}`);
    }

    if (this.onEntry) {
      try {
        this.onEntry(toAuditRecord(entry), entry);
      } catch (err) {
        this.logger.error(`Audit sink failed: ${errorMessage(err)}`);
      }
    }

    return entry;
  }

  getEntries(filter: AuditFilter = {}): AuditEntry[] {
    return this.entries.filter((entry) => {
      const at = Date.parse(entry.timestamp);
      if (filter.since && at < filter.since.getTime()) return false;
      if (filter.until && at > filter.until.getTime()) return false;
      if (filter.toolName && entry.tool_name !== filter.toolName) return false;
      if (filter.sessionId && entry.session_id !== filter.sessionId) return false;
      return true;
    });
  }

  /** Flat records, oldest first. */
  export(): AuditRecord[] {
    return this.entries.map(toAuditRecord);
  }

  clear(): void {
    this.entries = [];
  }

  get size(): number {
    return this.entries.length;
  }
}

export function toAuditRecord(entry: AuditEntry): AuditRecord {
  return {
    timestamp: entry.timestamp,
    tool_name: entry.tool_name,
    tool_input: entry.tool_args,
    success: entry.result.success,
    output: entry.result.output.length > 0 ? entry.result.output : null,
    error: entry.result.error,
    exit_code: entry.result.exit_code,
    execution_time_ms: entry.result.execution_time_ms,
    sandbox_id: entry.sandbox_id,
    user_id: entry.user_id,
    session_id: entry.session_id,
  };
}
