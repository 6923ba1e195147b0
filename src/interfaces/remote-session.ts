/** Options for a single remote command execution. */
export interface RemoteExecOptions {
  /** Aborting closes the exec channel and rejects the pending call. */
  signal?: AbortSignal;
}

/**
 * An authenticated remote shell session.
 *
 * `exec` opens one channel per call and closes it before the returned promise
 * settles. Failures reject with ConnectionError.
 */
export interface RemoteSession {
  exec(command: string, options?: RemoteExecOptions): Promise<string>;
  /** Close the session. Safe to call more than once. */
  close(): void;
}

export interface RemoteSessionConnectOptions {
  host: string;
  port: number;
  username: string;
  password: string;
  readyTimeoutMs?: number;
}

export type RemoteSessionConnector = (options: RemoteSessionConnectOptions) => Promise<RemoteSession>;
