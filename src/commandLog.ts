import EventEmitter from "events";
import fs from "fs";
import path from "path";
import { randomUUID } from "crypto";

import { describeError } from "./errors.js";
import { CommandLogEntry } from "./types.js";

/**
 * Every dispatched command. The newest `limit` entries stay in memory for
 * the hub; all of them are appended, in dispatch order, to the JSONL audit
 * log when a path is given.
 */
export class CommandLog extends EventEmitter {
  private entries: CommandLogEntry[] = [];
  private writes: Promise<void> = Promise.resolve();

  constructor(
    private readonly auditLogPath?: string,
    private readonly limit = 500
  ) {
    super();
  }

  record(entry: Omit<CommandLogEntry, "id" | "timestamp">): CommandLogEntry {
    const saved: CommandLogEntry = { ...entry, id: randomUUID(), timestamp: new Date().toISOString() };
    this.entries.push(saved);
    if (this.entries.length > this.limit) {
      this.entries.splice(0, this.entries.length - this.limit);
    }
    const target = this.auditLogPath;
    if (target) {
      this.writes = this.writes.then(() =>
        this.append(target, saved).catch((error) =>
          console.error(`[CommandLog] Failed to append audit entry: ${describeError(error)}`)
        )
      );
    }
    this.emit("entry", saved);
    return saved;
  }

  all(): CommandLogEntry[] {
    return [...this.entries];
  }

  recent(count: number): CommandLogEntry[] {
    return count > 0 ? this.entries.slice(-count) : [];
  }

  /** Resolves once every recorded entry has reached the audit log. */
  flush(): Promise<void> {
    return this.writes;
  }

  private async append(target: string, entry: CommandLogEntry): Promise<void> {
    await fs.promises.mkdir(path.dirname(target), { recursive: true });
    await fs.promises.appendFile(target, `${JSON.stringify(entry)}\n`, "utf-8");
  }
}
