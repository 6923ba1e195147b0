import { ConnectionError, errorMessage, isAbortError } from "../errors.js";
import type { RemoteSession } from "../interfaces/remote-session.js";
import { STATUS_COMMAND } from "../types/config.js";

/**
 * Runs the status command over a borrowed session. The session belongs to the
 * caller; this class never closes it.
 */
export class StatusCommandExecutor {
  constructor(
    private readonly session: RemoteSession,
    private readonly command: string = STATUS_COMMAND,
  ) {}

  /** Raw output of one run. Rejects with ConnectionError, or an AbortError when `signal` fires. */
  async execute(signal?: AbortSignal): Promise<string> {
    try {
      return await this.session.exec(this.command, { signal });
    } catch (err) {
      if (err instanceof ConnectionError || isAbortError(err)) throw err;
      throw new ConnectionError(`Remote command "${this.command}" failed: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }
}
