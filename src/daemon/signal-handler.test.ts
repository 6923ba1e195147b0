import { afterEach, beforeEach, describe, expect, it, type MockInstance, vi } from "vitest";
import { registerShutdownHandlers, type ShutdownTarget } from "./signal-handler.js";

function target(done: Promise<void> = Promise.resolve()) {
  return { dispose: vi.fn(), done } satisfies ShutdownTarget;
}

function mockLogger() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe("registerShutdownHandlers", () => {
  let registeredHandlers: Map<string | symbol, () => void>;
  let exitSpy: MockInstance<typeof process.exit>;

  function trigger(signal: "SIGTERM" | "SIGINT"): void {
    const handler = registeredHandlers.get(signal);
    if (!handler) throw new Error(`no ${signal} handler registered`);
    handler();
  }

  beforeEach(() => {
    vi.useFakeTimers();
    registeredHandlers = new Map();

    vi.spyOn(process, "on").mockImplementation((event: string | symbol, handler: (...args: unknown[]) => void) => {
      registeredHandlers.set(event, () => handler());
      return process;
    });

    exitSpy = vi.spyOn(process, "exit").mockImplementation(() => undefined as never);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.useRealTimers();
  });

  it("registers SIGTERM and SIGINT handlers", () => {
    registerShutdownHandlers(target());

    expect([...registeredHandlers.keys()]).toEqual(["SIGTERM", "SIGINT"]);
  });

  it("disposes the target and exits 0 once its task has ended", async () => {
    let finish = () => {};
    const loop = target(
      new Promise<void>((resolve) => {
        finish = resolve;
      }),
    );
    const logger = mockLogger();
    registerShutdownHandlers(loop, { logger });

    trigger("SIGTERM");

    expect(loop.dispose).toHaveBeenCalledOnce();
    expect(logger.info).toHaveBeenCalledWith("Shutting down", { component: "shutdown", signal: "SIGTERM" });
    await vi.advanceTimersByTimeAsync(0);
    expect(exitSpy).not.toHaveBeenCalled();

    finish();
    await vi.advanceTimersByTimeAsync(0);
    expect(exitSpy).toHaveBeenCalledWith(0);
    expect(logger.info).toHaveBeenCalledWith("Shutdown complete", { component: "shutdown" });
  });

  it("exits 1 when dispose throws", () => {
    const loop = target();
    loop.dispose.mockImplementation(() => {
      throw new Error("close failed");
    });
    const logger = mockLogger();
    registerShutdownHandlers(loop, { logger });

    trigger("SIGINT");

    expect(logger.error).toHaveBeenCalledWith("Shutdown failed", {
      component: "shutdown",
      error: new Error("close failed"),
    });
    expect(exitSpy).toHaveBeenCalledWith(1);
  });

  it("force-exits with 1 when the task outlives the timeout", async () => {
    const logger = mockLogger();
    registerShutdownHandlers(target(new Promise(() => {})), { logger, timeoutMs: 5_000 });

    trigger("SIGTERM");
    await vi.advanceTimersByTimeAsync(4_999);
    expect(exitSpy).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(1);
    expect(exitSpy).toHaveBeenCalledWith(1);
    expect(logger.error).toHaveBeenCalledWith("Shutdown timed out, force exiting", {
      component: "shutdown",
      timeoutMs: 5_000,
    });
  });

  it("ignores a second signal while shutting down", async () => {
    const loop = target(new Promise(() => {}));
    registerShutdownHandlers(loop);

    trigger("SIGTERM");
    trigger("SIGINT");
    await vi.advanceTimersByTimeAsync(0);

    expect(loop.dispose).toHaveBeenCalledOnce();
    expect(exitSpy).not.toHaveBeenCalled();
  });
});
