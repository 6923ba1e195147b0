import type { LoginEntry } from "../types/login-entry.js";

/**
 * Durable destination for captured entries. One write per entry; there is no
 * batch transaction. Failures reject with PersistenceError.
 */
export interface LoginEntrySink {
  save(entry: LoginEntry): Promise<void>;
  /** Drop the underlying connection. Safe to call more than once. */
  abort(): void;
}

export interface LoginEntrySinkConnectOptions {
  url: string;
  user: string;
  password: string;
}

export type LoginEntrySinkConnector = (options: LoginEntrySinkConnectOptions) => Promise<LoginEntrySink>;
