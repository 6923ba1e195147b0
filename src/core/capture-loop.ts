/**
 * Capture Loop — the long-running task that polls `w` on a remote host.
 *
 * Each cycle: run the status command, parse its output, store every record,
 * hand the batch to the observer, sleep. The loop owns one remote session and
 * one store connection from construction until dispose().
 *
 * Cancellation is cooperative. stop() and dispose() abort a signal that the
 * remote exec and the sleep both observe. Once a batch has started to be
 * stored, stop() lets it finish, observer included; dispose() drops the rest
 * of it, since the store is gone.
 *
 * @module
 */

import { connectMysqlLoginSink } from "../adapters/mysql-login-sink.js";
import { noopLogger } from "../adapters/noop-logger.js";
import { connectSsh2Session } from "../adapters/ssh2-remote-session.js";
import type { Credentials } from "../config/config-schema.js";
import { loadCredentials } from "../config/credentials.js";
import { ConfigurationError, errorMessage, PersistenceError, toWScrapeError } from "../errors.js";
import type { CaptureObserver } from "../interfaces/capture-observer.js";
import type { Logger } from "../interfaces/logger.js";
import type { LoginEntrySink, LoginEntrySinkConnector } from "../interfaces/login-sink.js";
import type { RemoteSession, RemoteSessionConnector } from "../interfaces/remote-session.js";
import { resolveOptions, SSH_PORT, type WScrapeOptions } from "../types/config.js";
import { abortableDelay } from "../utils/abortable-delay.js";
import { type CaptureState, isCaptureTransitionAllowed } from "./capture-lifecycle.js";
import { StatusCommandExecutor } from "./status-command-executor.js";
import { parseStatusOutput } from "./status-parser.js";

export interface CaptureLoopOptions {
  session: RemoteSession;
  sink: LoginEntrySink;
  captureIntervalMs: number;
  observer?: CaptureObserver;
  logger?: Logger;
  /** Clock for the date part of record timestamps. */
  now?: () => Date;
}

/** Collaborators for CaptureLoop.connect; each defaults to the production one. */
export interface CaptureLoopDeps {
  logger?: Logger;
  now?: () => Date;
  loadCredentials?: (path: string) => Promise<Credentials>;
  connectSink?: LoginEntrySinkConnector;
  connectRemoteSession?: RemoteSessionConnector;
}

/** Outcome of one completed cycle. */
export interface CaptureResult {
  rows: number;
  stored: number;
  duplicates: number;
  failed: number;
}

export class CaptureLoop {
  private currentState: CaptureState = "idle";
  private readonly controller = new AbortController();
  private task: Promise<void> | null = null;
  private readonly session: RemoteSession;
  private readonly sink: LoginEntrySink;
  private readonly executor: StatusCommandExecutor;
  private readonly captureIntervalMs: number;
  private readonly observer: CaptureObserver | undefined;
  private readonly logger: Logger;
  private readonly now: () => Date;

  /**
   * Load credentials, open the store connection and the SSH session.
   * Rejects with ConfigurationError; nothing stays open on failure.
   * The returned loop is idle.
   */
  static async connect(options: WScrapeOptions, deps: CaptureLoopDeps = {}): Promise<CaptureLoop> {
    const resolved = resolveOptions(options);
    const logger = deps.logger ?? noopLogger;
    const load = deps.loadCredentials ?? loadCredentials;
    const connectSink =
      deps.connectSink ?? ((connectOptions) => connectMysqlLoginSink(connectOptions, logger));
    const connectSession =
      deps.connectRemoteSession ?? ((connectOptions) => connectSsh2Session(connectOptions, logger));

    let storeLogin: Credentials;
    let sshLogin: Credentials;
    try {
      [storeLogin, sshLogin] = await Promise.all([
        load(resolved.storeCredentialsPath),
        load(resolved.sshCredentialsPath),
      ]);
    } catch (err) {
      if (err instanceof ConfigurationError) throw err;
      throw new ConfigurationError(`Cannot load credentials: ${errorMessage(err)}`, { cause: err });
    }

    let sink: LoginEntrySink;
    try {
      sink = await connectSink({ url: resolved.storeUrl, user: storeLogin.user, password: storeLogin.pass });
    } catch (err) {
      throw new ConfigurationError(`Cannot connect to store: ${errorMessage(err)}`, { cause: err });
    }

    let session: RemoteSession;
    try {
      session = await connectSession({
        host: resolved.sshHost,
        port: SSH_PORT,
        username: sshLogin.user,
        password: sshLogin.pass,
      });
    } catch (err) {
      sink.abort();
      throw new ConfigurationError(`Cannot connect to ${resolved.sshHost}: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    logger.info("Connected", { component: "capture-loop", host: resolved.sshHost });
    return new CaptureLoop({
      session,
      sink,
      captureIntervalMs: resolved.captureIntervalMs,
      observer: resolved.observer,
      logger,
      now: deps.now,
    });
  }

  constructor(options: CaptureLoopOptions) {
    if (!Number.isInteger(options.captureIntervalMs) || options.captureIntervalMs <= 0) {
      throw new ConfigurationError(
        `captureIntervalMs must be a positive integer, got ${options.captureIntervalMs}`,
      );
    }
    this.session = options.session;
    this.sink = options.sink;
    this.executor = new StatusCommandExecutor(options.session);
    this.captureIntervalMs = options.captureIntervalMs;
    this.observer = options.observer;
    this.logger = options.logger ?? noopLogger;
    this.now = options.now ?? (() => new Date());
  }

  get state(): CaptureState {
    return this.currentState;
  }

  /** Settles once the background task has exited; already settled if it never ran. */
  get done(): Promise<void> {
    return this.task ?? Promise.resolve();
  }

  /** Begin capturing. Has no effect unless the loop is idle. */
  start(): void {
    if (this.currentState === "running") return;
    if (!this.transition("running")) {
      this.logger.warn(`Ignoring start() on a ${this.currentState} capture loop`, {
        component: "capture-loop",
      });
      return;
    }
    this.task = this.run(this.controller.signal).catch((err: unknown) => {
      this.logger.error("Capture task exited unexpectedly", {
        component: "capture-loop",
        error: toWScrapeError(err),
      });
    });
  }

  /** Cancel the running task. Resources stay open until dispose(). */
  stop(): void {
    if (this.currentState !== "running") return;
    this.transition("stopped");
    this.controller.abort();
    this.logger.info("Capture loop stopped", { component: "capture-loop" });
  }

  /** Cancel the task if any and release the store connection and the session. */
  dispose(): void {
    if (!this.transition("disposed")) return;
    this.controller.abort();

    try {
      this.sink.abort();
    } catch (err) {
      this.logger.warn("Failed to abort store connection", { component: "capture-loop", error: err });
    }
    try {
      this.session.close();
    } catch (err) {
      this.logger.warn("Failed to close SSH session", { component: "capture-loop", error: err });
    }
    this.logger.info("Capture loop disposed", { component: "capture-loop" });
  }

  /** The store and session are released; a batch in progress is dropped. */
  private get disposed(): boolean {
    return this.currentState === "disposed";
  }

  private transition(to: CaptureState): boolean {
    if (!isCaptureTransitionAllowed(this.currentState, to)) return false;
    this.currentState = to;
    return true;
  }

  private async run(signal: AbortSignal): Promise<void> {
    this.logger.info("Capture loop started", {
      component: "capture-loop",
      intervalMs: this.captureIntervalMs,
    });
    while (!signal.aborted) {
      await this.captureOnce(signal);
      if (signal.aborted) break;
      await abortableDelay(this.captureIntervalMs, signal);
    }
  }

  /** One cycle. Returns null when the cycle was abandoned. */
  private async captureOnce(signal: AbortSignal): Promise<CaptureResult | null> {
    let output: string;
    try {
      output = await this.executor.execute(signal);
    } catch (err) {
      if (signal.aborted) return null;
      this.logger.warn("Capture failed; retrying after the interval", {
        component: "capture-loop",
        error: err,
        intervalMs: this.captureIntervalMs,
      });
      return null;
    }
    if (signal.aborted) return null;

    const batch = parseStatusOutput(output, this.now());
    const result: CaptureResult = { rows: batch.length, stored: 0, duplicates: 0, failed: 0 };

    for (const entry of batch) {
      if (this.disposed) return null;
      try {
        await this.sink.save(entry);
        result.stored++;
      } catch (err) {
        if (this.disposed) return null;
        if (err instanceof PersistenceError && err.kind === "duplicate") {
          result.duplicates++;
          this.logger.debug?.("Entry already stored", {
            component: "capture-loop",
            user: entry.user,
            tty: entry.tty,
            recordTime: entry.recordTime,
          });
        } else {
          result.failed++;
          this.logger.warn("Failed to store entry", {
            component: "capture-loop",
            user: entry.user,
            tty: entry.tty,
            error: err,
          });
        }
      }
    }

    if (this.disposed) return null;
    if (this.observer) {
      try {
        await this.observer.onCapture(batch);
      } catch (err) {
        this.logger.error("Capture observer failed", { component: "capture-loop", error: err });
      }
    }

    this.logger.debug?.("Capture completed", { component: "capture-loop", ...result });
    return result;
  }
}
