import { describe, expect, it } from "vitest";
import { CAPTURE_STATES, isCaptureTransitionAllowed } from "./capture-lifecycle.js";

describe("capture lifecycle transitions", () => {
  it("allows the forward path", () => {
    expect(isCaptureTransitionAllowed("idle", "running")).toBe(true);
    expect(isCaptureTransitionAllowed("running", "stopped")).toBe(true);
    expect(isCaptureTransitionAllowed("stopped", "disposed")).toBe(true);
  });

  it("allows dispose from every live state", () => {
    for (const state of CAPTURE_STATES) {
      if (state === "disposed") continue;
      expect(isCaptureTransitionAllowed(state, "disposed")).toBe(true);
    }
  });

  it("rejects restart and resurrection", () => {
    expect(isCaptureTransitionAllowed("stopped", "running")).toBe(false);
    expect(isCaptureTransitionAllowed("disposed", "running")).toBe(false);
    expect(isCaptureTransitionAllowed("disposed", "disposed")).toBe(false);
    expect(isCaptureTransitionAllowed("idle", "stopped")).toBe(false);
  });
});
