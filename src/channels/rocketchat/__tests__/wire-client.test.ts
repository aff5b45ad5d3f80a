import { describe, expect, it } from "vitest";
import { ScriptedSocket, cooperativeServer, factoryFor } from "../../../__fixtures__/ddp-socket.js";
import { httpStub, ok, type Route } from "../../../__fixtures__/http.js";
import type { Session } from "../../../core/types.js";
import { SessionExpiredError, StreamError } from "../../../utils/errors.js";
import {
  MESSAGE_STREAM,
  NOTIFY_LOGGED_STREAM,
  RocketChatWireClient,
  toIdentity,
  toRoom,
} from "../wire-client.js";

const session: Session = Object.freeze({
  authToken: "test-token",
  userId: "bot-id",
  username: "bot",
  serverUri: "http://chat.test",
  streamUrl: "ws://chat.test/websocket",
  state: "live",
  establishedAt: 1,
});

function wireWith(options: { route?: Route; socket?: ScriptedSocket; urls?: string[]; resumable?: boolean } = {}) {
  const stub = httpStub(options.route ?? (() => ok({ success: true })));
  const socket = options.socket ?? new ScriptedSocket();
  const wire = new RocketChatWireClient({
    serverUri: "http://chat.test",
    streamUrl: "ws://chat.test/websocket",
    requestTimeoutMs: 1_000,
    pingIntervalMs: 0,
    resumable: options.resumable ?? false,
    httpAdapter: stub.adapter,
    socketFactory: factoryFor(socket, options.urls),
  });
  return { wire, requests: stub.requests, socket };
}

describe("RocketChatWireClient.authenticate", () => {
  it("logs in with a password and returns a frozen session", async () => {
    const { wire } = wireWith({
      route: () => ok({ status: "success", data: { authToken: "test-token", userId: "bot-id", me: { username: "bot" } } }),
    });

    const result = await wire.authenticate({ kind: "password", username: "bot", password: "test-secret" });

    expect(result).toEqual({
      authToken: "test-token",
      userId: "bot-id",
      username: "bot",
      serverUri: "http://chat.test",
      streamUrl: "ws://chat.test/websocket",
      state: "authenticating",
      establishedAt: expect.any(Number),
    });
    expect(Object.isFrozen(result)).toBe(true);
  });

  it("validates a personal access token through /me", async () => {
    const { wire, requests } = wireWith({ route: () => ok({ _id: "bot-id", username: "helper-bot", name: "Helper" }) });

    const result = await wire.authenticate({ kind: "token", userId: "bot-id", authToken: "test-token" });

    expect(result.username).toBe("helper-bot");
    expect(result.authToken).toBe("test-token");
    expect(requests.map((r) => [r.method, r.url, r.authToken, r.userId])).toEqual([["GET", "me", "test-token", "bot-id"]]);
  });
});

describe("RocketChatWireClient.openStream", () => {
  it("resumes the session and subscribes to messages and renames", async () => {
    const socket = new ScriptedSocket();
    socket.respond = cooperativeServer();
    const urls: string[] = [];
    const { wire } = wireWith({ socket, urls });

    const stream = await wire.openStream(session);

    expect(urls).toEqual(["ws://chat.test/websocket"]);
    expect(socket.sent.map((frame) => [frame.msg, frame.method ?? frame.name, frame.params])).toEqual([
      ["connect", undefined, undefined],
      ["method", "login", [{ resume: "test-token" }]],
      ["sub", MESSAGE_STREAM, ["__my_messages__", false]],
      ["sub", NOTIFY_LOGGED_STREAM, ["Users:NameChanged", false]],
    ]);
    stream.close();
    expect(socket.closed).toBe(true);
  });

  it("reports a rejected resume token as an expired session", async () => {
    const socket = new ScriptedSocket();
    socket.respond = cooperativeServer({
      login: (frame, s) => s.receive({ msg: "result", id: frame.id, error: { error: 403, reason: "You've been logged out by the server." } }),
    });
    const { wire } = wireWith({ socket });

    const failure = wire.openStream(session);

    await expect(failure).rejects.toBeInstanceOf(StreamError);
    await expect(failure).rejects.toMatchObject({
      message: "Stream login rejected: You've been logged out by the server.",
      cause: expect.any(SessionExpiredError),
    });
    expect(socket.closed).toBe(true);
  });

  it("fails when the message subscription is refused", async () => {
    const socket = new ScriptedSocket();
    socket.respond = cooperativeServer({
      subscription: (frame, s) =>
        s.receive({ msg: "nosub", id: frame.id, error: { error: "not-allowed", reason: "Not allowed" } }),
    });
    const { wire } = wireWith({ socket });

    await expect(wire.openStream(session)).rejects.toThrow("Not allowed");
    expect(socket.closed).toBe(true);
  });

  it("keeps the stream when only rename notifications are refused", async () => {
    const socket = new ScriptedSocket();
    socket.respond = cooperativeServer({
      subscription: (frame, s) => {
        if (frame.name === NOTIFY_LOGGED_STREAM) {
          s.receive({ msg: "nosub", id: frame.id, error: { error: "not-allowed", reason: "Not allowed" } });
        } else {
          s.receive({ msg: "ready", subs: [frame.id] });
        }
      },
    });
    const { wire } = wireWith({ socket });

    const stream = await wire.openStream(session);

    expect(socket.closed).toBe(false);
    stream.close();
  });
});

describe("RocketChatWireClient lookups", () => {
  it("maps room info onto a RemoteRoom", async () => {
    const { wire, requests } = wireWith({
      route: () => ok({ success: true, room: { _id: "r-ops", t: "p", name: "ops", fname: "Operations" } }),
    });

    const room = await wire.fetchRoom(session, "r-ops");

    expect(room).toEqual({ roomId: "r-ops", type: "group", name: "Operations" });
    expect(requests[0]?.params).toEqual({ roomId: "r-ops" });
  });

  it("wraps synced history as stream events", async () => {
    const { wire, requests } = wireWith({
      resumable: true,
      route: () =>
        ok({
          success: true,
          result: {
            updated: [
              { _id: "m2", ts: "2023-11-14T22:13:22.000Z" },
              { _id: "m1", ts: "2023-11-14T22:13:21.000Z" },
            ],
          },
        }),
    });

    const events = await wire.fetchRoomHistory(session, "r-general", new Date(1_700_000_000_000));

    expect(wire.capabilities.resumableStream).toBe(true);
    expect(requests[0]?.url).toBe("chat.syncMessages");
    expect(requests[0]?.params).toEqual({ roomId: "r-general", lastUpdate: "2023-11-14T22:13:20.000Z" });
    expect(events).toEqual([
      {
        collection: MESSAGE_STREAM,
        eventName: "r-general",
        payload: { _id: "m1", ts: "2023-11-14T22:13:21.000Z" },
        receivedAt: expect.any(Number),
      },
      {
        collection: MESSAGE_STREAM,
        eventName: "r-general",
        payload: { _id: "m2", ts: "2023-11-14T22:13:22.000Z" },
        receivedAt: expect.any(Number),
      },
    ]);
  });

  it("resolves a direct room for a username", async () => {
    const { wire, requests } = wireWith({ route: () => ok({ success: true, room: { _id: "r-dm", rid: "r-dm" } }) });

    expect(await wire.openDirectRoom(session, "alice")).toBe("r-dm");
    expect(requests[0]?.body).toEqual({ username: "alice" });
  });
});

describe("RocketChatWireClient.request", () => {
  it("runs an arbitrary endpoint with the session token", async () => {
    const { wire, requests } = wireWith({ route: () => ok({ success: true, count: 2 }) });

    const result = await wire.request<{ count: number }>(session, {
      method: "GET",
      path: "channels.counters",
      query: { roomName: "general" },
    });

    expect(result.count).toBe(2);
    expect(requests[0]).toMatchObject({
      method: "GET",
      url: "channels.counters",
      params: { roomName: "general" },
      authToken: "test-token",
      userId: "bot-id",
    });
  });
});

describe("toRoom", () => {
  it("names direct rooms after their members", () => {
    expect(toRoom({ _id: "r-dm", t: "d", usernames: ["alice", "bot"] })).toEqual({
      roomId: "r-dm",
      type: "direct",
      name: "alice, bot",
    });
  });

  it("treats a missing type as a channel", () => {
    expect(toRoom({ _id: "r-general", name: "general" })).toEqual({ roomId: "r-general", type: "channel", name: "general" });
  });

  it("treats unknown types as private groups and falls back to the id", () => {
    expect(toRoom({ _id: "r-live", t: "l" })).toEqual({ roomId: "r-live", type: "group", name: "r-live" });
  });
});

describe("toIdentity", () => {
  it("falls back to the username when the display name is empty", () => {
    expect(toIdentity({ _id: "u-carol", username: "carol", name: "" })).toEqual({
      userId: "u-carol",
      username: "carol",
      displayName: "carol",
    });
  });
});
