import { wscrapeOptionsSchema } from "../config/config-schema.js";
import { ConfigurationError } from "../errors.js";
import type { CaptureObserver } from "../interfaces/capture-observer.js";

/** Options accepted by CaptureLoop.connect. */
export interface WScrapeOptions {
  /** Store connection URL, e.g. `mysql://db.internal:3306/logins`. */
  storeUrl: string;
  /** Remote host; always reached on port 22. */
  sshHost: string;
  /** Delay between the end of one capture and the start of the next. */
  captureIntervalMs: number;
  /** Credential file for the store. */
  storeCredentialsPath: string;
  /** Credential file for the SSH session. */
  sshCredentialsPath: string;
  observer?: CaptureObserver;
}

export const SSH_PORT = 22;
export const SSH_READY_TIMEOUT_MS = 20_000;
export const STATUS_COMMAND = "w";

export function resolveOptions(options: WScrapeOptions): WScrapeOptions {
  const validation = wscrapeOptionsSchema.safeParse(options);
  if (!validation.success) {
    throw new ConfigurationError(`Invalid configuration: ${validation.error.message}`);
  }
  return { ...options, storeUrl: normalizeStoreUrl(options.storeUrl) };
}

/** Strip a leading `jdbc:` so the URL can be handed to the driver. */
export function normalizeStoreUrl(url: string): string {
  return url.startsWith("jdbc:") ? url.slice("jdbc:".length) : url;
}
