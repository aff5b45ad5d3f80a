import { afterEach, describe, expect, it, vi } from "vitest";
import { ScriptedSocket, cooperativeServer, factoryFor } from "../../../__fixtures__/ddp-socket.js";
import type { RawEvent } from "../../../core/types.js";
import { StreamError } from "../../../utils/errors.js";
import { DdpCallError, DdpConnection } from "../ddp.js";

const URL = "ws://chat.test/websocket";

async function connect(socket: ScriptedSocket, pingIntervalMs = 0, timeoutMs = 1_000): Promise<DdpConnection> {
  socket.respond ??= cooperativeServer();
  return DdpConnection.open(URL, { socketFactory: factoryFor(socket), pingIntervalMs, timeoutMs });
}

async function collect(connection: DdpConnection): Promise<RawEvent[]> {
  const events: RawEvent[] = [];
  for await (const event of connection) events.push(event);
  return events;
}

afterEach(() => {
  vi.useRealTimers();
});

describe("DdpConnection handshake", () => {
  it("speaks protocol version 1 on open", async () => {
    const socket = new ScriptedSocket();
    const urls: string[] = [];
    socket.respond = cooperativeServer();

    const connection = await DdpConnection.open(URL, {
      socketFactory: factoryFor(socket, urls),
      pingIntervalMs: 0,
      timeoutMs: 1_000,
    });

    expect(urls).toEqual([URL]);
    expect(socket.sent[0]).toEqual({ msg: "connect", version: "1", support: ["1"] });
    expect(connection.isClosed).toBe(false);
    connection.close();
    expect(socket.closed).toBe(true);
  });

  it("fails when the server refuses the protocol version", async () => {
    const socket = new ScriptedSocket();
    socket.respond = (frame, s) => {
      if (frame.msg === "connect") s.receive({ msg: "failed", version: "pre2" });
    };

    await expect(connect(socket)).rejects.toThrow("Server refused DDP protocol version 1");
  });

  it("times out a silent server", async () => {
    const socket = new ScriptedSocket();
    socket.respond = () => {};

    await expect(connect(socket, 0, 20)).rejects.toThrow(`DDP handshake with ${URL} timed out`);
    expect(socket.closed).toBe(true);
  });
});

describe("DdpConnection messaging", () => {
  it("answers server pings", async () => {
    const socket = new ScriptedSocket();
    const connection = await connect(socket);

    socket.receive({ server_id: "0" });
    socket.receive({ msg: "ping", id: "p1" });

    expect(socket.sent[socket.sent.length - 1]).toEqual({ msg: "pong", id: "p1" });
    connection.close();
  });

  it("resolves a method call with its result", async () => {
    const socket = new ScriptedSocket();
    const connection = await connect(socket);

    const result = await connection.call("login", [{ resume: "test-token" }]);

    expect(result).toEqual({ id: "bot-id", token: "test-token" });
    const login = socket.sent.find((frame) => frame.msg === "method");
    expect(login?.method).toBe("login");
    expect(login?.params).toEqual([{ resume: "test-token" }]);
    connection.close();
  });

  it("rejects a method call with the server's error code", async () => {
    const socket = new ScriptedSocket();
    socket.respond = cooperativeServer({
      login: (frame, s) =>
        s.receive({
          msg: "result",
          id: frame.id,
          error: { error: 403, reason: "You've been logged out by the server. Please log in again." },
        }),
    });
    const connection = await connect(socket);

    const failure = connection.call("login", [{ resume: "stale" }]);

    await expect(failure).rejects.toBeInstanceOf(DdpCallError);
    await expect(failure).rejects.toMatchObject({
      errorCode: 403,
      message: "You've been logged out by the server. Please log in again.",
    });
    connection.close();
  });

  it("splits collection frames into one event per argument", async () => {
    const socket = new ScriptedSocket();
    const connection = await connect(socket);
    await connection.subscribe("stream-room-messages", ["__my_messages__", false]);

    socket.receive({
      msg: "changed",
      collection: "stream-room-messages",
      id: "id",
      fields: { eventName: "r-general", args: [{ _id: "m1" }, { _id: "m2" }] },
    });
    socket.receive({
      msg: "added",
      collection: "stream-notify-logged",
      id: "id",
      fields: { eventName: "Users:NameChanged", args: [{ _id: "u-alice" }] },
    });
    connection.close();

    const events = await collect(connection);
    expect(events).toEqual([
      { collection: "stream-room-messages", eventName: "r-general", payload: { _id: "m1" }, receivedAt: expect.any(Number) },
      { collection: "stream-room-messages", eventName: "r-general", payload: { _id: "m2" }, receivedAt: expect.any(Number) },
      { collection: "stream-notify-logged", eventName: "Users:NameChanged", payload: { _id: "u-alice" }, receivedAt: expect.any(Number) },
    ]);
  });

  it("fails the stream when the server drops a live subscription", async () => {
    const socket = new ScriptedSocket();
    const connection = await connect(socket);
    await connection.subscribe("stream-room-messages", ["__my_messages__", false]);
    const sub = socket.sent.find((frame) => frame.msg === "sub");

    socket.receive({ msg: "nosub", id: sub?.id });

    await expect(collect(connection)).rejects.toThrow("Subscription stopped");
    expect(socket.closed).toBe(true);
  });

  it("rejects a subscription the server refuses", async () => {
    const socket = new ScriptedSocket();
    socket.respond = cooperativeServer({
      subscription: (frame, s) => s.receive({ msg: "nosub", id: frame.id, error: { error: "not-allowed", reason: "Not allowed" } }),
    });
    const connection = await connect(socket);

    await expect(connection.subscribe("stream-room-messages", ["__my_messages__", false])).rejects.toThrow("Not allowed");
    connection.close();
  });

  it("fails the stream when the server closes the socket", async () => {
    const socket = new ScriptedSocket();
    const connection = await connect(socket);

    socket.serverClose(1006, "going away");

    await expect(collect(connection)).rejects.toThrow(new StreamError("Stream closed by server (code 1006: going away)"));
  });

  it("fails outstanding calls when closed and refuses new ones", async () => {
    const socket = new ScriptedSocket();
    socket.respond = (frame, s) => {
      if (frame.msg === "connect") s.receive({ msg: "connected", session: "sess-1" });
    };
    const connection = await connect(socket);

    const pending = connection.call("slowMethod", []);
    connection.close();

    await expect(pending).rejects.toThrow("Stream closed");
    await expect(connection.call("another", [])).rejects.toThrow("Cannot start method another: stream closed");
    expect(await collect(connection)).toEqual([]);
  });
});

describe("DdpConnection keep-alive", () => {
  it("pings on the interval and gives up after two silent intervals", async () => {
    vi.useFakeTimers();
    const socket = new ScriptedSocket();
    const connection = await connect(socket, 1_000);

    vi.advanceTimersByTime(3_000);

    expect(socket.sent.filter((frame) => frame.msg === "ping")).toHaveLength(2);
    await expect(collect(connection)).rejects.toThrow("Keep-alive timed out");
    expect(socket.closed).toBe(true);
  });

  it("stays open while the server answers", async () => {
    vi.useFakeTimers();
    const socket = new ScriptedSocket();
    const server = cooperativeServer();
    socket.respond = (frame, s) => {
      if (frame.msg === "ping") s.receive({ msg: "pong", id: frame.id });
      else server(frame, s);
    };
    const connection = await connect(socket, 1_000);

    vi.advanceTimersByTime(10_000);

    expect(connection.isClosed).toBe(false);
    expect(socket.sent.filter((frame) => frame.msg === "ping")).toHaveLength(10);
    connection.close();
  });
});
