import type { LoginEntry } from "../types/login-entry.js";

/**
 * Receives every successfully captured batch, after all of its writes have
 * been attempted. Called inside the capture task: a slow observer delays the
 * next cycle.
 */
export interface CaptureObserver {
  onCapture(batch: readonly LoginEntry[]): void | Promise<void>;
}
