/**
 * wscrape public API barrel.
 *
 * Re-exports the capture loop, its collaborators, and the types that make up
 * the public surface area of the `wscrape` package.
 * @module
 */

// Adapters
export { LoggingCaptureObserver } from "./adapters/logging-capture-observer.js";
export {
  classifyPersistenceFailure,
  connectMysqlLoginSink,
  INSERT_LOGIN_ENTRY_SQL,
  MysqlLoginSink,
} from "./adapters/mysql-login-sink.js";
export type { SqlConnection } from "./adapters/mysql-login-sink.js";
export { NoopLogger, noopLogger } from "./adapters/noop-logger.js";
export { connectSsh2Session, Ssh2RemoteSession } from "./adapters/ssh2-remote-session.js";
export type { StructuredLoggerOptions } from "./adapters/structured-logger.js";
export { LogLevel, parseLogLevel, StructuredLogger } from "./adapters/structured-logger.js";
// Config
export type { Credentials } from "./config/config-schema.js";
export { credentialsSchema, wscrapeOptionsSchema } from "./config/config-schema.js";
export { loadCredentials } from "./config/credentials.js";
// Core
export type { CaptureState } from "./core/capture-lifecycle.js";
export { CAPTURE_STATES, isCaptureTransitionAllowed } from "./core/capture-lifecycle.js";
export type { CaptureLoopDeps, CaptureLoopOptions, CaptureResult } from "./core/capture-loop.js";
export { CaptureLoop } from "./core/capture-loop.js";
export { StatusCommandExecutor } from "./core/status-command-executor.js";
export { parseStatusOutput, parseStatusRow } from "./core/status-parser.js";
// Errors
export type { PersistenceFailureKind } from "./errors.js";
export {
  ConfigurationError,
  ConnectionError,
  errorMessage,
  PersistenceError,
  toWScrapeError,
  WScrapeError,
} from "./errors.js";
// Interfaces
export type { CaptureObserver } from "./interfaces/capture-observer.js";
export type { Logger } from "./interfaces/logger.js";
export type {
  LoginEntrySink,
  LoginEntrySinkConnectOptions,
  LoginEntrySinkConnector,
} from "./interfaces/login-sink.js";
export type {
  RemoteExecOptions,
  RemoteSession,
  RemoteSessionConnectOptions,
  RemoteSessionConnector,
} from "./interfaces/remote-session.js";
// Types
export type { WScrapeOptions } from "./types/config.js";
export { normalizeStoreUrl, resolveOptions, SSH_PORT, STATUS_COMMAND } from "./types/config.js";
export type { LoginEntry } from "./types/login-entry.js";
export { LOGIN_ENTRY_COLUMNS, toColumnValues } from "./types/login-entry.js";
