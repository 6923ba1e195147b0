/**
 * In-process stand-in for the ssh2 module, installed in tests with
 * `vi.mock("ssh2", () => import("./ssh2-mock-helpers.js"))`.
 */

import { EventEmitter } from "node:events";

export class MockChannel extends EventEmitter {
  readonly stderr = new EventEmitter();
  closeCalls = 0;

  close(): void {
    this.closeCalls++;
  }

  /** Send output and an exit status, then end the channel the way ssh2 does. */
  respond(stdout: string, stderr = "", exitCode = 0): void {
    if (stdout) this.emit("data", Buffer.from(stdout));
    if (stderr) this.stderr.emit("data", Buffer.from(stderr));
    this.emit("exit", exitCode);
    this.emit("close");
  }
}

type ExecCallback = (err: Error | undefined, channel: MockChannel) => void;

export interface PendingExec {
  command: string;
  callback: ExecCallback;
}

export class Client extends EventEmitter {
  static readonly instances: Client[] = [];

  connectConfig: Record<string, unknown> | undefined;
  readonly execs: PendingExec[] = [];
  endCalls = 0;
  throwOnExec: Error | undefined;

  constructor() {
    super();
    Client.instances.push(this);
  }

  connect(config: Record<string, unknown>): this {
    this.connectConfig = config;
    return this;
  }

  exec(command: string, callback: ExecCallback): this {
    if (this.throwOnExec) throw this.throwOnExec;
    this.execs.push({ command, callback });
    return this;
  }

  end(): this {
    this.endCalls++;
    return this;
  }

  /** Open a channel for the oldest pending exec and return it. */
  openChannel(): MockChannel {
    const pending = this.execs.shift();
    if (!pending) throw new Error("no pending exec");
    const channel = new MockChannel();
    pending.callback(undefined, channel);
    return channel;
  }

  failChannel(err: Error): void {
    const pending = this.execs.shift();
    if (!pending) throw new Error("no pending exec");
    pending.callback(err, new MockChannel());
  }

  static latest(): Client {
    const client = Client.instances.at(-1);
    if (!client) throw new Error("no client created");
    return client;
  }

  static reset(): void {
    Client.instances.length = 0;
  }
}
