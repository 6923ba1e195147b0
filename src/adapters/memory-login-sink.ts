import { PersistenceError } from "../errors.js";
import type { LoginEntrySink } from "../interfaces/login-sink.js";
import { type LoginEntry, loginEntryKey } from "../types/login-entry.js";

/**
 * In-memory sink for testing and dry runs.
 * Enforces the store's (user, record_time, tty) key.
 */
export class MemoryLoginSink implements LoginEntrySink {
  private entries = new Map<string, LoginEntry>();
  private aborted = false;
  /** Keys whose next save fails with a connectivity error, for fault injection. */
  private failing = new Set<string>();

  async save(entry: LoginEntry): Promise<void> {
    if (this.aborted) {
      throw new PersistenceError("Store connection has been aborted", "connectivity");
    }
    const key = loginEntryKey(entry);
    if (this.failing.delete(key)) {
      throw new PersistenceError(`Simulated write failure for ${entry.user} on ${entry.tty}`, "connectivity");
    }
    if (this.entries.has(key)) {
      throw new PersistenceError(
        `Duplicate entry for ${entry.user} on ${entry.tty} at ${entry.recordTime}`,
        "duplicate",
      );
    }
    this.entries.set(key, { ...entry });
  }

  abort(): void {
    this.aborted = true;
  }

  get isAborted(): boolean {
    return this.aborted;
  }

  /** For testing: make the next save of this entry fail. */
  failNextSave(entry: LoginEntry): void {
    this.failing.add(loginEntryKey(entry));
  }

  /** For testing: stored entries in insertion order. */
  list(): LoginEntry[] {
    return Array.from(this.entries.values(), (e) => ({ ...e }));
  }

  /** For testing: get the number of stored entries. */
  get size(): number {
    return this.entries.size;
  }

  /** For testing: clear all stored data. */
  clear(): void {
    this.entries.clear();
    this.failing.clear();
  }
}
