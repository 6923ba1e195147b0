import { describe, expect, it } from "vitest";
import { ConnectionError, isAbortError } from "../errors.js";
import { ScriptedRemoteSession } from "../testing/scripted-remote-session.js";
import { StatusCommandExecutor } from "./status-command-executor.js";

describe("StatusCommandExecutor", () => {
  it("runs w and returns its output unchanged", async () => {
    const session = new ScriptedRemoteSession([" 10:15:32 up 1 day\nUSER TTY\n"]);
    const executor = new StatusCommandExecutor(session);

    await expect(executor.execute()).resolves.toBe(" 10:15:32 up 1 day\nUSER TTY\n");
    expect(session.commands).toEqual(["w"]);
  });

  it("runs a custom command", async () => {
    const session = new ScriptedRemoteSession(["ok"]);

    await new StatusCommandExecutor(session, "w -i").execute();

    expect(session.commands).toEqual(["w -i"]);
  });

  it("passes ConnectionError through", async () => {
    const original = new ConnectionError("SSH session is closed");
    const executor = new StatusCommandExecutor(new ScriptedRemoteSession([original]));

    await expect(executor.execute()).rejects.toBe(original);
  });

  it("wraps other failures in ConnectionError", async () => {
    const cause = new Error("channel reset");
    const executor = new StatusCommandExecutor(new ScriptedRemoteSession([cause]));

    const err = await executor.execute().catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ConnectionError);
    expect(err).toMatchObject({ message: 'Remote command "w" failed: channel reset', cause });
  });

  it("rejects with an abort error when the signal already fired", async () => {
    const controller = new AbortController();
    controller.abort();
    const session = new ScriptedRemoteSession(["unused"]);

    const err = await new StatusCommandExecutor(session).execute(controller.signal).catch((e: unknown) => e);

    expect(isAbortError(err)).toBe(true);
    expect(session.commands).toEqual([]);
  });

  it("never closes the session it borrows", async () => {
    const session = new ScriptedRemoteSession([new Error("boom")]);

    await new StatusCommandExecutor(session).execute().catch(() => undefined);

    expect(session.closed).toBe(false);
  });
});
