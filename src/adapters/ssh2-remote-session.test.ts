import { Client as RealClient } from "ssh2";
import { afterEach, describe, expect, it, vi } from "vitest";
import { ConnectionError, isAbortError } from "../errors.js";
import { Client } from "./ssh2-mock-helpers.js";
import { connectSsh2Session, Ssh2RemoteSession } from "./ssh2-remote-session.js";

vi.mock("ssh2", () => import("./ssh2-mock-helpers.js"));

const CONNECT = { host: "shell.test", port: 22, username: "scraper", password: "test-secret" };

async function connected(): Promise<{ session: Ssh2RemoteSession; client: Client }> {
  const pending = connectSsh2Session(CONNECT);
  const client = Client.latest();
  client.emit("ready");
  return { session: await pending, client };
}

describe("connectSsh2Session", () => {
  afterEach(() => {
    Client.reset();
  });

  it("uses the mocked client", () => {
    expect(new RealClient()).toBeInstanceOf(Client);
  });

  it("connects with password auth and an accept-all host verifier", async () => {
    const { client } = await connected();

    expect(client.connectConfig).toMatchObject({
      host: "shell.test",
      port: 22,
      username: "scraper",
      password: "test-secret",
      readyTimeout: 20_000,
    });
    const verifier = client.connectConfig?.hostVerifier;
    expect(typeof verifier === "function" && verifier()).toBe(true);
  });

  it("rejects with ConnectionError and ends the client when connecting fails", async () => {
    const pending = connectSsh2Session(CONNECT);
    const client = Client.latest();
    client.emit("error", new Error("ECONNREFUSED"));

    await expect(pending).rejects.toThrow(
      new ConnectionError("SSH connection to shell.test:22 failed: ECONNREFUSED"),
    );
    expect(client.endCalls).toBe(1);
  });
});

describe("Ssh2RemoteSession", () => {
  afterEach(() => {
    Client.reset();
  });

  it("returns the full stdout and closes nothing twice", async () => {
    const { session, client } = await connected();

    const pending = session.exec("w");
    const channel = client.openChannel();
    channel.emit("data", Buffer.from(" 10:15:32 up\nUSER TTY\n"));
    channel.respond("alice pts/0 10.0.0.5 09:00 0.00s 0.10s 0.01s -bash\n");

    await expect(pending).resolves.toBe(
      " 10:15:32 up\nUSER TTY\nalice pts/0 10.0.0.5 09:00 0.00s 0.10s 0.01s -bash\n",
    );
    expect(channel.closeCalls).toBe(0);
  });

  it("issues the requested command", async () => {
    const { session, client } = await connected();

    const pending = session.exec("w");
    expect(client.execs[0].command).toBe("w");
    client.openChannel().respond("");

    await expect(pending).resolves.toBe("");
  });

  it("rejects output cut off before the command reported an exit status", async () => {
    const { session, client } = await connected();

    const pending = session.exec("w");
    const channel = client.openChannel();
    channel.emit("data", Buffer.from("alice pts/0 10.0.0.5 09:00 0.00s 0.10s 0.01s vim no"));
    channel.emit("close");

    await expect(pending).rejects.toThrow(
      new ConnectionError('Remote command "w" ended without an exit status'),
    );
  });

  it("rejects a nonzero exit status with the stderr text", async () => {
    const { session, client } = await connected();

    const pending = session.exec("w");
    const channel = client.openChannel();
    channel.respond("", "bash: w: command not found\n", 127);

    const err = await pending.catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ConnectionError);
    expect(err).toMatchObject({
      message: 'Remote command "w" exited with status 127: bash: w: command not found',
    });
  });

  it("rejects a command killed by a signal", async () => {
    const { session, client } = await connected();

    const pending = session.exec("w");
    const channel = client.openChannel();
    channel.emit("exit", null, "KILL");
    channel.emit("close");

    await expect(pending).rejects.toThrow(new ConnectionError('Remote command "w" exited with signal KILL'));
  });

  it("rejects with ConnectionError when the channel cannot be opened", async () => {
    const { session, client } = await connected();

    const pending = session.exec("w");
    client.failChannel(new Error("open failed"));

    await expect(pending).rejects.toThrow(new ConnectionError("Failed to open exec channel: open failed"));
  });

  it("closes the channel when it errors", async () => {
    const { session, client } = await connected();

    const pending = session.exec("w");
    const channel = client.openChannel();
    channel.emit("error", new Error("reset"));

    await expect(pending).rejects.toThrow(new ConnectionError("Exec channel failed: reset"));
    expect(channel.closeCalls).toBe(1);
  });

  it("wraps a synchronous exec failure", async () => {
    const { session, client } = await connected();
    client.throwOnExec = new Error("Not connected");

    await expect(session.exec("w")).rejects.toThrow(new ConnectionError('Failed to run "w": Not connected'));
  });

  it("closes the channel and rejects when aborted", async () => {
    const { session, client } = await connected();
    const controller = new AbortController();

    const pending = session.exec("w", { signal: controller.signal });
    const channel = client.openChannel();
    controller.abort();

    const err = await pending.catch((e: unknown) => e);
    expect(isAbortError(err)).toBe(true);
    expect(channel.closeCalls).toBe(1);
  });

  it("closes a channel that opens after the call was aborted", async () => {
    const { session, client } = await connected();
    const controller = new AbortController();

    const pending = session.exec("w", { signal: controller.signal });
    controller.abort();
    const channel = client.openChannel();

    const err = await pending.catch((e: unknown) => e);
    expect(isAbortError(err)).toBe(true);
    expect(channel.closeCalls).toBe(1);
  });

  it("refuses to exec after the connection closed", async () => {
    const { session, client } = await connected();
    client.emit("error", new Error("socket hang up"));
    client.emit("close");

    await expect(session.exec("w")).rejects.toThrow(new ConnectionError("SSH session is closed: socket hang up"));
  });

  it("ends the client exactly once", async () => {
    const { session, client } = await connected();

    session.close();
    session.close();

    expect(client.endCalls).toBe(1);
    await expect(session.exec("w")).rejects.toBeInstanceOf(ConnectionError);
  });
});
