/**
 * LoginEntrySink backed by a single mysql2 connection.
 *
 * Expects this table:
 * ```sql
 * create table LoginEntry
 * (
 *     record_time timestamp    not null,
 *     user        varchar(16)  not null,
 *     tty         varchar(16)  not null,
 *     `from`      varchar(32)  not null,
 *     `login@`    varchar(16)  not null,
 *     idle        varchar(16)  not null,
 *     jcpu        varchar(16)  not null,
 *     pcpu        varchar(16)  not null,
 *     what        varchar(256) not null,
 *     primary key (user, record_time, tty)
 * );
 * ```
 */

import { createConnection } from "mysql2/promise";
import { errorMessage, type PersistenceFailureKind, PersistenceError } from "../errors.js";
import type { Logger } from "../interfaces/logger.js";
import type { LoginEntrySink, LoginEntrySinkConnectOptions } from "../interfaces/login-sink.js";
import { type LoginEntry, toColumnValues } from "../types/login-entry.js";
import { noopLogger } from "./noop-logger.js";

export const INSERT_LOGIN_ENTRY_SQL =
  "INSERT INTO LoginEntry (record_time, user, tty, `from`, `login@`, idle, jcpu, pcpu, what) " +
  "VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)";

const CONNECTIVITY_CODES = new Set([
  "PROTOCOL_CONNECTION_LOST",
  "PROTOCOL_ENQUEUE_AFTER_FATAL_ERROR",
  "PROTOCOL_ENQUEUE_AFTER_QUIT",
  "ECONNRESET",
  "ECONNREFUSED",
  "ETIMEDOUT",
  "EPIPE",
]);

/** The part of a mysql2 connection the sink uses. */
export interface SqlConnection {
  execute(sql: string, values: string[]): Promise<unknown>;
  destroy(): void;
}

export function classifyPersistenceFailure(err: unknown): PersistenceFailureKind {
  if (typeof err !== "object" || err === null) return "rejected";
  if ("code" in err && err.code === "ER_DUP_ENTRY") return "duplicate";
  if ("fatal" in err && err.fatal === true) return "connectivity";
  if ("code" in err && typeof err.code === "string" && CONNECTIVITY_CODES.has(err.code)) {
    return "connectivity";
  }
  return "rejected";
}

export class MysqlLoginSink implements LoginEntrySink {
  private aborted = false;
  private lostError: Error | undefined;
  /** Rejecters of in-flight saves; the driver does not settle them after destroy(). */
  private pending = new Set<(err: PersistenceError) => void>();

  constructor(
    private readonly connection: SqlConnection,
    private readonly logger: Logger = noopLogger,
  ) {}

  async save(entry: LoginEntry): Promise<void> {
    if (this.aborted) {
      throw new PersistenceError("Store connection has been aborted", "connectivity");
    }
    if (this.lostError) {
      throw new PersistenceError(`Store connection lost: ${this.lostError.message}`, "connectivity", {
        cause: this.lostError,
      });
    }
    try {
      await this.execute(toColumnValues(entry));
    } catch (err) {
      if (err instanceof PersistenceError) throw err;
      const kind = classifyPersistenceFailure(err);
      throw new PersistenceError(
        `Failed to store entry for ${entry.user} on ${entry.tty} at ${entry.recordTime}: ${errorMessage(err)}`,
        kind,
        { cause: err },
      );
    }
  }

  /**
   * Record a fatal error reported by the driver outside any query.
   * Later saves fail fast with a connectivity error.
   */
  connectionLost(err: Error): void {
    if (this.lostError || this.aborted) return;
    this.lostError = err;
    this.logger.warn("Store connection lost", { component: "mysql", error: err });
    this.failPending(
      new PersistenceError(`Store connection lost: ${err.message}`, "connectivity", { cause: err }),
    );
  }

  abort(): void {
    if (this.aborted) return;
    this.aborted = true;
    this.failPending(new PersistenceError("Store connection has been aborted", "connectivity"));
    this.connection.destroy();
  }

  private execute(values: string[]): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const fail = (err: PersistenceError) => reject(err);
      this.pending.add(fail);
      void this.connection.execute(INSERT_LOGIN_ENTRY_SQL, values).then(
        () => {
          this.pending.delete(fail);
          resolve();
        },
        (err: unknown) => {
          this.pending.delete(fail);
          reject(err);
        },
      );
    });
  }

  private failPending(err: PersistenceError): void {
    for (const fail of this.pending) fail(err);
    this.pending.clear();
  }
}

/** Open a connection to `url` with the given credentials. */
export async function connectMysqlLoginSink(
  options: LoginEntrySinkConnectOptions,
  logger: Logger = noopLogger,
): Promise<MysqlLoginSink> {
  const connection = await createConnection({
    uri: options.url,
    user: options.user,
    password: options.password,
  });
  const sink = new MysqlLoginSink(
    {
      execute: (sql, values) => connection.execute(sql, values),
      destroy: () => connection.destroy(),
    },
    logger,
  );
  // Without a listener a server-side disconnect while idle would crash the process.
  connection.on("error", (err: Error) => sink.connectionLost(err));
  return sink;
}
