import * as fs from "fs";
import * as path from "path";
import { AuditRecord } from "@toolwarden/core";

/**
 * AuditLog - append-only writer of audit records to events.jsonl
 */
export class AuditLog {
  private logPath: string;
  private writeStream: fs.WriteStream;

  constructor(logDir: string = "./logs") {
    if (!fs.existsSync(logDir)) {
      fs.mkdirSync(logDir, { recursive: true });
    }

    this.logPath = path.join(logDir, "events.jsonl");
    this.writeStream = fs.createWriteStream(this.logPath, { flags: "a" });
  }

  /**
   * Append one record as a JSON line
   */
  writeRecord(record: AuditRecord): void {
    this.writeStream.write(JSON.stringify(record) + "\n");
  }

  /**
   * Flush pending lines and close the file
   */
  close(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.writeStream.once("error", reject);
      this.writeStream.end(() => resolve());
    });
  }

  getLogPath(): string {
    return this.logPath;
  }
}
