/**
 * RemoteSession over the ssh2 client. One exec channel per call; the channel
 * is closed before the call settles, whichever way it settles.
 */

import { Client, type ClientChannel } from "ssh2";
import { abortError, ConnectionError, errorMessage } from "../errors.js";
import type { Logger } from "../interfaces/logger.js";
import type {
  RemoteExecOptions,
  RemoteSession,
  RemoteSessionConnectOptions,
} from "../interfaces/remote-session.js";
import { SSH_READY_TIMEOUT_MS } from "../types/config.js";
import { noopLogger } from "./noop-logger.js";

export class Ssh2RemoteSession implements RemoteSession {
  private disconnected = false;
  private ended = false;
  private lastError: Error | undefined;

  constructor(
    private readonly client: Client,
    private readonly logger: Logger = noopLogger,
  ) {
    // Without a listener a late socket error would crash the process.
    client.on("error", (err: Error) => {
      this.lastError = err;
      this.logger.warn("SSH session error", { component: "ssh", error: err });
    });
    client.on("close", () => {
      this.disconnected = true;
    });
  }

  exec(command: string, options: RemoteExecOptions = {}): Promise<string> {
    const { signal } = options;
    if (this.ended || this.disconnected) {
      const reason = this.lastError ? `: ${this.lastError.message}` : "";
      return Promise.reject(new ConnectionError(`SSH session is closed${reason}`, { cause: this.lastError }));
    }
    if (signal?.aborted) return Promise.reject(abortError());

    return new Promise<string>((resolve, reject) => {
      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      let channel: ClientChannel | undefined;
      let channelClosed = false;
      let settled = false;
      let exitCode: number | null | undefined;
      let exitSignal: string | undefined;

      const finish = (err?: Error) => {
        if (settled) return;
        settled = true;
        signal?.removeEventListener("abort", onAbort);
        if (channel && !channelClosed) channel.close();
        if (err) {
          reject(err);
          return;
        }
        if (stderr.length > 0) {
          this.logger.debug?.("Remote command wrote to stderr", {
            component: "ssh",
            command,
            stderr: Buffer.concat(stderr).toString("utf-8").trim(),
          });
        }
        resolve(Buffer.concat(stdout).toString("utf-8"));
      };
      const onAbort = () => finish(abortError());
      // Output is only trusted once the command reported a zero exit status.
      const exitFailure = (): ConnectionError | undefined => {
        if (exitCode === 0) return undefined;
        const errText = Buffer.concat(stderr).toString("utf-8").trim();
        const detail = errText ? `: ${errText}` : "";
        if (exitCode === undefined) {
          return new ConnectionError(`Remote command "${command}" ended without an exit status${detail}`);
        }
        const status = exitCode === null ? `signal ${exitSignal ?? "unknown"}` : `status ${exitCode}`;
        return new ConnectionError(`Remote command "${command}" exited with ${status}${detail}`);
      };
      signal?.addEventListener("abort", onAbort, { once: true });

      try {
        this.client.exec(command, (err, stream) => {
          if (err) {
            finish(new ConnectionError(`Failed to open exec channel: ${err.message}`, { cause: err }));
            return;
          }
          channel = stream;
          if (settled) {
            // aborted while the channel was opening
            stream.close();
            return;
          }
          stream.on("data", (chunk: Buffer) => stdout.push(chunk));
          stream.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));
          stream.on("error", (streamErr: Error) => {
            finish(new ConnectionError(`Exec channel failed: ${streamErr.message}`, { cause: streamErr }));
          });
          stream.on("exit", (code: number | null, signalName?: string) => {
            exitCode = code;
            exitSignal = signalName;
          });
          stream.on("close", () => {
            channelClosed = true;
            finish(exitFailure());
          });
        });
      } catch (execErr) {
        finish(new ConnectionError(`Failed to run "${command}": ${errorMessage(execErr)}`, { cause: execErr }));
      }
    });
  }

  close(): void {
    if (this.ended) return;
    this.ended = true;
    this.client.end();
  }
}

/**
 * Open and authenticate a session. The host key is accepted without
 * verification. Rejects with ConnectionError.
 */
export function connectSsh2Session(
  options: RemoteSessionConnectOptions,
  logger: Logger = noopLogger,
): Promise<Ssh2RemoteSession> {
  const client = new Client();

  return new Promise<Ssh2RemoteSession>((resolve, reject) => {
    const onReady = () => {
      client.removeListener("error", onError);
      resolve(new Ssh2RemoteSession(client, logger));
    };
    const onError = (err: Error) => {
      client.removeListener("ready", onReady);
      client.end();
      reject(
        new ConnectionError(`SSH connection to ${options.host}:${options.port} failed: ${err.message}`, {
          cause: err,
        }),
      );
    };
    client.once("ready", onReady);
    client.once("error", onError);

    try {
      client.connect({
        host: options.host,
        port: options.port,
        username: options.username,
        password: options.password,
        readyTimeout: options.readyTimeoutMs ?? SSH_READY_TIMEOUT_MS,
        hostVerifier: () => true,
      });
    } catch (err) {
      onError(err instanceof Error ? err : new Error(errorMessage(err)));
    }
  });
}
