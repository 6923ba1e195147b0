import type { CaptureObserver } from "../interfaces/capture-observer.js";
import type { Logger } from "../interfaces/logger.js";
import type { LoginEntry } from "../types/login-entry.js";

/**
 * Logs each captured batch and keeps running totals.
 * Default observer for the CLI.
 */
export class LoggingCaptureObserver implements CaptureObserver {
  private batchCount = 0;
  private rowCount = 0;
  private lastUsers: readonly string[] = [];

  constructor(private logger: Logger) {}

  onCapture(batch: readonly LoginEntry[]): void {
    this.batchCount++;
    this.rowCount += batch.length;
    this.lastUsers = [...new Set(batch.map((e) => e.user))];

    this.logger.info("Captured login sessions", {
      component: "observer",
      rows: batch.length,
      users: this.lastUsers,
      recordTime: batch[0]?.recordTime,
    });
    for (const entry of batch) {
      this.logger.debug?.("Session", {
        component: "observer",
        user: entry.user,
        tty: entry.tty,
        from: entry.from,
        what: entry.what,
      });
    }
  }

  getStats(): { batches: number; rows: number; lastUsers: readonly string[] } {
    return { batches: this.batchCount, rows: this.rowCount, lastUsers: this.lastUsers };
  }
}
