/**
 * Public test utilities, exported from the `"wscrape/testing"` entry point.
 * Consumers can import these to exercise a CaptureLoop without SSH or MySQL.
 */
export { MemoryLoginSink } from "./adapters/memory-login-sink.js";
export { NoopLogger, noopLogger } from "./adapters/noop-logger.js";
export type { ScriptedRemoteSessionOptions, ScriptedResponse } from "./testing/scripted-remote-session.js";
export { ScriptedRemoteSession } from "./testing/scripted-remote-session.js";
