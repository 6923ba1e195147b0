/**
 * Capture Lifecycle — allowed states and transitions of a CaptureLoop.
 *
 * A loop runs at most once: "stopped" only leads to "disposed". Every state
 * can be disposed.
 *
 * @module
 */

export const CAPTURE_STATES = ["idle", "running", "stopped", "disposed"] as const;

export type CaptureState = (typeof CAPTURE_STATES)[number];

const ALLOWED_TRANSITIONS: Record<CaptureState, ReadonlySet<CaptureState>> = {
  idle: new Set(["running", "disposed"]),
  running: new Set(["stopped", "disposed"]),
  stopped: new Set(["disposed"]),
  disposed: new Set(),
};

export function isCaptureTransitionAllowed(from: CaptureState, to: CaptureState): boolean {
  return ALLOWED_TRANSITIONS[from].has(to);
}
